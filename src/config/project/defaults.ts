/**
 * Default project options.
 */

import type { ProjectOptions } from "./schema.js";

export const DEFAULT_PROJECT_OPTIONS: ProjectOptions = {
  buildDir: ".build",
  extDir: "ext",
  toolchainSubmodule: "k",
  manifestName: "generated.ninja",
  ninjaRequiredVersion: "1.7",
  useSystemToolchain: false,
};
