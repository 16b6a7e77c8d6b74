/**
 * Project Options Loader Tests
 *
 * Run with: npx tsx --test src/config/project/loader.test.ts
 */

import { describe, it } from "node:test";
import assert from "node:assert/strict";
import {
  DEFAULT_PROJECT_OPTIONS,
  ProjectOptionsError,
  loadProjectOptions,
  validateProjectOptions,
} from "./index.js";

describe("loadProjectOptions", () => {
  it("loads and freezes the defaults", () => {
    const options = loadProjectOptions(DEFAULT_PROJECT_OPTIONS);

    assert.deepEqual(options, {
      buildDir: ".build",
      extDir: "ext",
      toolchainSubmodule: "k",
      manifestName: "generated.ninja",
      ninjaRequiredVersion: "1.7",
      useSystemToolchain: false,
    });
    assert.equal(Object.isFrozen(options), true);
  });

  it("reports every invalid field", () => {
    assert.throws(
      () =>
        loadProjectOptions({
          ...DEFAULT_PROJECT_OPTIONS,
          buildDir: "../build",
          ninjaRequiredVersion: "latest",
        }),
      (err: unknown) =>
        err instanceof ProjectOptionsError &&
        err.issues.length === 2 &&
        err.format() ===
          "Project options validation failed:\n" +
            "  - buildDir: must stay inside the project root\n" +
            "  - ninjaRequiredVersion: must look like 1.7 or 1.10.2"
    );
  });

  it("rejects directories that resolve to the project root", () => {
    for (const buildDir of [".", "./", "out/.."]) {
      assert.throws(
        () => loadProjectOptions({ ...DEFAULT_PROJECT_OPTIONS, buildDir }),
        (err: unknown) =>
          err instanceof ProjectOptionsError &&
          err.format() ===
            "Project options validation failed:\n" +
              "  - buildDir: must name a subdirectory, not the project root"
      );
    }
  });

  it("rejects unknown keys", () => {
    assert.throws(
      () => loadProjectOptions({ ...DEFAULT_PROJECT_OPTIONS, outDir: "out" }),
      (err: unknown) => err instanceof ProjectOptionsError && err.issues[0]?.code === "unrecognized_keys"
    );
  });
});

describe("validateProjectOptions", () => {
  it("returns the options or the issues without throwing", () => {
    const ok = validateProjectOptions({ ...DEFAULT_PROJECT_OPTIONS, buildDir: "out" });
    const bad = validateProjectOptions({ ...DEFAULT_PROJECT_OPTIONS, extDir: "/abs" });

    assert.equal(ok.success, true);
    assert.equal(ok.options?.buildDir, "out");
    assert.equal(bad.success, false);
    assert.deepEqual(bad.errors?.map((e) => e.path), [["extDir"]]);
  });
});
