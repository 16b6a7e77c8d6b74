/**
 * Hand-off to an external process.
 *
 * Node cannot replace its own process image, so a hand-off spawns the
 * tool with the parent's stdio, relays termination signals to it, and
 * then ends the parent with the child's exit status (or the child's
 * terminating signal). From the caller's side it never returns.
 */

import { spawn } from "node:child_process";

export interface Invocation {
  /** Executable path or name */
  readonly file: string;
  readonly args: readonly string[];
  /** Full environment of the child (default: the parent's) */
  readonly env?: NodeJS.ProcessEnv;
}

export interface ProcessLauncher {
  handOff(invocation: Invocation): Promise<never>;
}

export class LaunchError extends Error {
  constructor(
    public readonly file: string,
    cause: Error
  ) {
    super(`Failed to start "${file}": ${cause.message}`, { cause });
    this.name = "LaunchError";
  }
}

const FORWARDED_SIGNALS: readonly NodeJS.Signals[] = ["SIGINT", "SIGTERM", "SIGHUP"];

/**
 * Render an invocation as a shell-like command line, for logs.
 */
export function formatInvocation(invocation: Invocation): string {
  const quote = (word: string): string => (/^[\w@%+=:,./-]+$/.test(word) ? word : JSON.stringify(word));
  return [invocation.file, ...invocation.args].map(quote).join(" ");
}

export class SpawnLauncher implements ProcessLauncher {
  handOff(invocation: Invocation): Promise<never> {
    return new Promise<never>((_resolve, reject) => {
      const child = spawn(invocation.file, [...invocation.args], {
        stdio: "inherit",
        env: invocation.env ?? process.env,
      });

      const relays = FORWARDED_SIGNALS.map((signal) => {
        const relay = (): void => {
          child.kill(signal);
        };
        process.on(signal, relay);
        return { signal, relay };
      });
      const detach = (): void => {
        for (const { signal, relay } of relays) {
          process.off(signal, relay);
        }
      };

      child.once("error", (err) => {
        detach();
        reject(new LaunchError(invocation.file, err));
      });

      child.once("exit", (code, signal) => {
        detach();
        if (signal !== null) {
          process.kill(process.pid, signal);
          return;
        }
        process.exit(code ?? 1);
      });
    });
  }
}
