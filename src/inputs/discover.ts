/**
 * Input discovery by glob pattern.
 */

import { globSync } from "glob";

export interface DiscoverOptions {
  /** Directory the pattern is relative to (default: the working directory) */
  cwd?: string;
  /** Patterns to leave out */
  ignore?: string | string[];
}

/**
 * Expand a glob pattern into manifest paths.
 *
 * Matches are POSIX paths relative to `cwd`, sorted so that the same tree
 * always produces the same manifest.
 */
export function discoverInputs(pattern: string, options: DiscoverOptions = {}): string[] {
  const matches = globSync(pattern, {
    cwd: options.cwd,
    ignore: options.ignore,
    nodir: true,
    posix: true,
  });
  return matches.sort();
}
