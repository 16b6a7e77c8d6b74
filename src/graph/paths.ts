/**
 * Path helpers for manifest paths.
 *
 * Manifest paths are always POSIX paths, relative to the project root
 * unless they point at something outside the project.
 */

import { posix } from "node:path";

export function basenameNoExt(path: string): string {
  const base = posix.basename(path);
  const ext = posix.extname(base);
  return ext.length > 0 ? base.slice(0, -ext.length) : base;
}

export function getExtension(path: string): string {
  return posix.extname(path).slice(1);
}

export function appendExtension(path: string, extension: string): string {
  return `${path}.${extension}`;
}

export function replaceExtension(path: string, extension: string): string {
  const ext = posix.extname(path);
  const stem = ext.length > 0 ? path.slice(0, -ext.length) : path;
  return `${stem}.${extension}`;
}

/**
 * Whether `path` lies strictly inside `parent`.
 */
export function isSubpath(path: string, parent: string): boolean {
  return posix.resolve(path).startsWith(posix.resolve(parent) + posix.sep);
}

/**
 * Whether a relative path climbs out of the directory it is relative to.
 */
export function escapesRoot(path: string): boolean {
  const normalized = posix.normalize(path);
  return normalized === ".." || normalized.startsWith("../");
}

/**
 * Nest a relative path under `dir` unless it already is.
 * Callers reject absolute paths before getting here.
 */
export function placeInDir(path: string, dir: string): string {
  if (isSubpath(path, dir)) {
    return path;
  }
  return posix.join(dir, path);
}
