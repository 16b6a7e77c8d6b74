/**
 * Project options schema.
 *
 * Project options fix the on-disk layout a manifest is generated for: where
 * build outputs go, where external repositories are checked out, and what
 * the manifest file is called. They are validated once, when the project is
 * constructed, and frozen afterwards; every path in the generated manifest
 * is derived from them.
 */

import { posix } from "node:path";
import { z } from "zod";

const RelativeDirectory = z
  .string()
  .min(1)
  .refine((p) => !posix.isAbsolute(p), {
    message: "must be relative to the project root",
  })
  .refine((p) => !posix.normalize(p).startsWith(".."), {
    message: "must stay inside the project root",
  })
  .refine((p) => posix.normalize(p).replace(/\/+$/, "") !== ".", {
    message: "must name a subdirectory, not the project root",
  });

export const ProjectOptionsSchema = z
  .object({
    /** Directory that holds every generated file, including the manifest */
    buildDir: RelativeDirectory.describe("Managed build-output directory"),

    /** Directory holding external repositories (git submodules) */
    extDir: RelativeDirectory.describe("Directory for external repositories"),

    /** Submodule directory name of the toolchain inside extDir */
    toolchainSubmodule: z
      .string()
      .min(1)
      .regex(/^[^/]+$/, "must be a single directory name")
      .describe("Toolchain submodule directory"),

    /** Manifest file name, written inside buildDir */
    manifestName: z
      .string()
      .min(1)
      .regex(/^[^/]+$/, "must be a file name, not a path")
      .describe("Generated manifest file name"),

    /** Oldest executor version the manifest syntax requires */
    ninjaRequiredVersion: z
      .string()
      .regex(/^\d+\.\d+(\.\d+)?$/, "must look like 1.7 or 1.10.2")
      .describe("Minimum Ninja version"),

    /** Resolve the toolchain from PATH instead of building it from source */
    useSystemToolchain: z.boolean().describe("Use a pre-installed toolchain"),
  })
  .strict();

export type ProjectOptions = z.infer<typeof ProjectOptionsSchema>;
