/**
 * Toolchain projects, definitions and the pipelines built on them.
 */

export {
  ToolchainProject,
  type ToolchainProjectOptions,
  type DefinitionOptions,
} from "./project.js";
export {
  Definition,
  joinFlags,
  type DefinitionInit,
  type PipelineOptions,
  type TestOptions,
  type RunnerMode,
} from "./definition.js";
export { Backend, backendConvention, type BackendConvention } from "./backends.js";
export { DefinitionRegistry } from "./registry.js";
export { findExecutable, type ExecutableLocator } from "./locate.js";
