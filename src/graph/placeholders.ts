/**
 * Command placeholder extraction.
 *
 * Rule commands use Ninja's variable syntax:
 *
 *   $name              simple reference, name is [a-zA-Z0-9_-]+
 *   ${name}            braced reference, name may also contain dots
 *   $$  $   $:         escapes for a literal dollar, space and colon
 *   $<newline>         line continuation
 *
 * Escapes are consumed by the same expression so that `$$out` is read as a
 * literal "$out" rather than a reference to `out`.
 */

const PLACEHOLDER_RE = /\$(?:\{([a-zA-Z0-9_.-]+)\}|([a-zA-Z0-9_-]+)|[$ :\n])/g;

/**
 * Variables Ninja binds on every edge.
 */
export const NINJA_BUILTIN_VARIABLES: ReadonlySet<string> = new Set([
  "in",
  "in_newline",
  "out",
]);

/**
 * Extract every referenced variable name, deduplicated and sorted.
 */
export function extractPlaceholders(command: string): string[] {
  const found = new Set<string>();
  for (const match of command.matchAll(PLACEHOLDER_RE)) {
    const name = match[1] ?? match[2];
    if (name !== undefined) {
      found.add(name);
    }
  }
  return [...found].sort();
}

/**
 * Placeholders of `command` not covered by any of the binding sets.
 */
export function findUnboundPlaceholders(
  command: string,
  ...bound: ReadonlyArray<ReadonlySet<string> | readonly string[]>
): string[] {
  const isBound = (name: string): boolean =>
    NINJA_BUILTIN_VARIABLES.has(name) ||
    bound.some((set) => ("has" in set ? set.has(name) : set.includes(name)));

  return extractPlaceholders(command).filter((name) => !isBound(name));
}
