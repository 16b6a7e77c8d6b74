/**
 * Ninja manifest emission.
 */

export {
  NinjaWriter,
  escape,
  escapePath,
  type RuleDeclaration,
  type BuildDeclaration,
} from "./writer.js";
export { FileManifestSink, MemoryManifestSink, type ManifestSink } from "./sink.js";
