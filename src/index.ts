/**
 * kbuild: generate Ninja manifests for language-definition projects.
 *
 * Usage:
 *   import { ToolchainProject } from "kbuild";
 *
 *   const proj = new ToolchainProject();
 *   const imp = proj.definition({ alias: "imp", backend: "llvm", main: "imp.k" });
 *   imp.tests({ glob: "tests/*.imp" });
 *   await proj.main();
 */

export * from "./graph/index.js";
export * from "./ninja/index.js";
export * from "./toolchain/index.js";
export * from "./runner/index.js";
export * from "./inputs/index.js";
export * from "./logging/index.js";
export {
  config,
  validateConfig,
  configuredLogLevel,
  EnvConfigError,
  type AppConfig,
  DEFAULT_PROJECT_OPTIONS,
  ProjectOptionsSchema,
  loadProjectOptions,
  validateProjectOptions,
  ProjectOptionsError,
  type ProjectOptions,
  type ProjectOptionsIssue,
} from "./config/index.js";
