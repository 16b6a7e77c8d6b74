/**
 * Executable lookup on PATH.
 */

import { accessSync, constants, statSync } from "node:fs";
import { delimiter, join } from "node:path";

export type ExecutableLocator = (name: string) => string | undefined;

/**
 * Find `name` on `searchPath` the way a shell would, returning the first
 * match that is an executable regular file.
 */
export function findExecutable(
  name: string,
  searchPath: string = process.env.PATH ?? ""
): string | undefined {
  for (const dir of searchPath.split(delimiter)) {
    if (dir.length === 0) {
      continue;
    }
    const candidate = join(dir, name);
    try {
      if (statSync(candidate).isFile()) {
        accessSync(candidate, constants.X_OK);
        return candidate;
      }
    } catch {
      // not here, keep looking
    }
  }
  return undefined;
}
