/**
 * Project options module.
 *
 * Usage:
 *   import { loadProjectOptions, DEFAULT_PROJECT_OPTIONS } from "./config/project/index.js";
 *
 *   const options = loadProjectOptions({
 *     ...DEFAULT_PROJECT_OPTIONS,
 *     buildDir: "out",
 *   });
 */

export type { ProjectOptions } from "./schema.js";
export { ProjectOptionsSchema } from "./schema.js";

export {
  loadProjectOptions,
  validateProjectOptions,
  ProjectOptionsError,
  type ProjectOptionsIssue,
} from "./loader.js";

export { DEFAULT_PROJECT_OPTIONS } from "./defaults.js";
