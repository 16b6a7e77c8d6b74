/**
 * Build-graph construction.
 */

export {
  BuildGraph,
  type BuildEdge,
  type BuildGraphOptions,
  type RuleRegistration,
  type SingletonKey,
  type SingletonKind,
} from "./build-graph.js";
export { RuleTemplate, type RuleTemplateFields } from "./rule.js";
export { Target, type TargetLike } from "./target.js";
export {
  ConfigurationError,
  RuleConflictError,
  UnboundVariableError,
  GraphFinalizedError,
  type ConfigurationErrorDetails,
} from "./errors.js";
export {
  basenameNoExt,
  getExtension,
  appendExtension,
  replaceExtension,
  isSubpath,
  escapesRoot,
  placeInDir,
} from "./paths.js";
export {
  NINJA_BUILTIN_VARIABLES,
  extractPlaceholders,
  findUnboundPlaceholders,
} from "./placeholders.js";
