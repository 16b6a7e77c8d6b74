/**
 * Compilation backends.
 *
 * The set of backends is closed: every backend-specific decision goes
 * through `backendConvention`, whose switch the compiler checks for
 * exhaustiveness.
 */

import { z } from "zod";

/**
 * Supported compilation backends.
 *
 *   llvm      compiles the definition to a native interpreter
 *   java      the legacy symbolic backend
 *   haskell   the symbolic backend used for proofs
 */
export const Backend = z.enum(["llvm", "java", "haskell"]);
export type Backend = z.infer<typeof Backend>;

export interface BackendConvention {
  readonly backend: Backend;
  /** File inside the kompiled directory whose timestamp marks a finished compile */
  readonly kompiledOutput: string;
  /** Extra Maven flags that build the toolchain with only this backend */
  readonly toolchainBuildFlags: string;
}

export function backendConvention(backend: Backend): BackendConvention {
  switch (backend) {
    case "llvm":
      return {
        backend,
        kompiledOutput: "interpreter",
        toolchainBuildFlags: "-Dhaskell.backend.skip -Dproject.build.type=RelWithDebInfo",
      };
    case "java":
      return {
        backend,
        kompiledOutput: "timestamp",
        toolchainBuildFlags: "-Dllvm.backend.skip -Dhaskell.backend.skip",
      };
    case "haskell":
      return {
        backend,
        kompiledOutput: "definition.kore",
        toolchainBuildFlags: "-Dllvm.backend.skip",
      };
    default: {
      const unreachable: never = backend;
      throw new Error(`Unknown backend: ${String(unreachable)}`);
    }
  }
}
