/**
 * Path lists kept in text files, such as lists of known-failing tests.
 *
 * Format: one path per line. Everything after a `#` is a comment; blank
 * lines and trailing whitespace are ignored.
 *
 *   # proofs that time out on the java backend
 *   tests/proofs/sum-spec.k
 *   tests/proofs/gcd-spec.k   # tracked upstream
 */

import { readFileSync } from "node:fs";

/**
 * Parse list-file text into its entries, in file order.
 */
export function parseList(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((line) => (line.split("#")[0] ?? "").trimEnd())
    .filter((line) => line.trim().length > 0);
}

/**
 * Read a list file.
 */
export function readListFile(path: string): string[] {
  return parseList(readFileSync(path, "utf-8"));
}

/**
 * Remove every entry of `remove` from `list`, keeping the order of `list`.
 */
export function filterOut(list: readonly string[], remove: readonly string[]): string[] {
  const excluded = new Set(remove);
  return list.filter((entry) => !excluded.has(entry));
}
