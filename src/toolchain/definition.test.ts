/**
 * Definition Pipeline Tests
 *
 * Run with: npx tsx --test src/toolchain/definition.test.ts
 *
 * These tests verify:
 *   1. tests() builds one source → execute → check chain per input
 *   2. proofs() checks every proof against the shared baseline
 *   3. Runner scripts replace the toolchain tools when configured
 *   4. Aliases and default marking of chain heads
 */

import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { ToolchainProject } from "./project.js";
import type { Definition } from "./definition.js";
import type { DefinitionOptions } from "./project.js";
import { ConfigurationError } from "../graph/errors.js";
import { MemoryManifestSink } from "../ninja/sink.js";
import { silentLogger } from "../logging/index.js";

// ═══════════════════════════════════════════════════════════════════════════
// TEST FIXTURES
// ═══════════════════════════════════════════════════════════════════════════

const KOMPILED = ".build/defn/imp/imp-kompiled/interpreter";

function makeDefinition(
  overrides: Partial<DefinitionOptions> = {}
): { proj: ToolchainProject; imp: Definition } {
  const proj = new ToolchainProject({
    sink: new MemoryManifestSink(),
    logger: silentLogger,
    useSystemToolchain: true,
    locateExecutable: () => "/opt/k/bin/kompile",
    width: 1000,
  });
  const imp = proj.definition({ alias: "imp", backend: "llvm", main: "imp.k", ...overrides });
  return { proj, imp };
}

// ═══════════════════════════════════════════════════════════════════════════
// LAYOUT
// ═══════════════════════════════════════════════════════════════════════════

describe("Definition layout", () => {
  it("derives directories and extensions from the alias", () => {
    const { imp } = makeDefinition();

    assert.equal(imp.directory(), ".build/defn/imp");
    assert.equal(imp.directory("cache"), ".build/defn/imp/cache");
    assert.equal(imp.kompiledDir(), ".build/defn/imp/imp-kompiled");
    assert.equal(imp.krunExtension, "imp-krun");
    assert.equal(imp.kproveExtension, "imp-kprove");
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// TESTS
// ═══════════════════════════════════════════════════════════════════════════

describe("Definition.tests", () => {
  it("builds one independent chain per input", () => {
    const { proj, imp } = makeDefinition();

    const heads = imp.tests({ inputs: ["tests/a.imp", "tests/b.imp"] });

    assert.deepEqual(
      heads.map((h) => h.path),
      [".build/tests/a.imp.imp-krun.test", ".build/tests/b.imp.imp-krun.test"]
    );
    assert.deepEqual(proj.producerOf(".build/tests/b.imp.imp-krun.test"), {
      rule: "check",
      inputs: [".build/tests/b.imp.imp-krun"],
      outputs: [".build/tests/b.imp.imp-krun.test"],
      implicitInputs: ["tests/b.imp.expected"],
      implicitOutputs: [],
      pool: undefined,
      variables: { expected: "tests/b.imp.expected", flags: "" },
    });
    assert.deepEqual(proj.producerOf(".build/tests/b.imp.imp-krun")?.implicitInputs, [KOMPILED]);
  });

  it("marks chain heads default unless told otherwise", () => {
    const marked = makeDefinition();
    marked.imp.tests({ inputs: ["a.imp"] });
    const unmarked = makeDefinition();
    unmarked.imp.tests({ inputs: ["a.imp"], markDefault: false });

    assert.deepEqual(marked.proj.defaultTargets, ["dummy", ".build/a.imp.imp-krun.test"]);
    assert.deepEqual(unmarked.proj.defaultTargets, ["dummy"]);
  });

  it("aliases the chain heads", () => {
    const { proj, imp } = makeDefinition();

    imp.tests({ inputs: ["a.imp", "b.imp"], alias: "imp-tests" });

    assert.deepEqual(proj.aliasInputs("imp-tests"), [
      ".build/a.imp.imp-krun.test",
      ".build/b.imp.imp-krun.test",
    ]);
  });

  it("uses a shared expected file when given", () => {
    const { proj, imp } = makeDefinition();

    imp.tests({ inputs: ["a.imp", "b.imp"], expected: "tests/all.expected" });

    assert.deepEqual(
      proj.edges.filter((e) => e.rule === "check").map((e) => e.variables.expected),
      ["tests/all.expected", "tests/all.expected"]
    );
  });

  it("combines definition and call flags and adds implicit inputs", () => {
    const { proj, imp } = makeDefinition({ krunFlags: "--smt none", krunEnv: "timeout 60" });

    imp.tests({ inputs: ["a.imp"], flags: "--depth 3", implicitInputs: ["tests/helper.py"] });

    const execute = proj.producerOf(".build/a.imp.imp-krun");
    assert.deepEqual(execute?.variables, {
      directory: ".build/defn/imp",
      flags: "--smt none --depth 3",
      env: "timeout 60",
    });
    assert.deepEqual(execute?.implicitInputs, [KOMPILED, "tests/helper.py"]);
  });

  it("declares nothing for an empty input list", () => {
    const { proj, imp } = makeDefinition();
    const before = proj.edges.length;

    assert.deepEqual(imp.tests({ inputs: [] }), []);
    assert.equal(proj.edges.length, before);
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// PROOFS
// ═══════════════════════════════════════════════════════════════════════════

describe("Definition.proofs", () => {
  it("checks every proof against the shared baseline", () => {
    const { proj, imp } = makeDefinition({ kproveFlags: "--smt_prelude prelude.smt2" });

    const [head] = imp.proofs({ inputs: ["proofs/sum-spec.k"], alias: "proofs", markDefault: false });

    const baseline = proj.supportDir("kprove.expected");
    assert.equal(head?.path, ".build/proofs/sum-spec.k.imp-kprove.test");
    assert.deepEqual(proj.producerOf(".build/proofs/sum-spec.k.imp-kprove.test")?.implicitInputs, [
      baseline,
    ]);
    assert.deepEqual(proj.producerOf(".build/proofs/sum-spec.k.imp-kprove")?.variables, {
      directory: ".build/defn/imp",
      flags: "--smt_prelude prelude.smt2",
      env: "",
    });
    assert.deepEqual(proj.aliasInputs("proofs"), [".build/proofs/sum-spec.k.imp-kprove.test"]);
    assert.deepEqual(proj.defaultTargets, ["dummy"]);
  });

  it("takes another expected file", () => {
    const { proj, imp } = makeDefinition();

    imp.proofs({ inputs: ["p-spec.k"], expected: "proofs/expected.out" });

    assert.equal(
      proj.producerOf(".build/p-spec.k.imp-kprove.test")?.variables.expected,
      "proofs/expected.out"
    );
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// LOW LEVEL RULES
// ═══════════════════════════════════════════════════════════════════════════

describe("Definition rules", () => {
  it("parses programs with kast", () => {
    const { proj, imp } = makeDefinition({ krunEnv: "nice" });

    const parsed = proj.source("a.imp").then(imp.kast());

    assert.equal(parsed.path, ".build/a.imp.kast");
    assert.deepEqual(proj.producerOf(parsed.path)?.variables, {
      directory: ".build/defn/imp",
      flags: "",
      env: "nice",
    });
  });

  it("runs tests and proofs through the runner script", () => {
    const { proj, imp } = makeDefinition({ runnerScript: "./kbuild.sh" });

    imp.tests({ inputs: ["a.imp"], flags: "--fast" });
    imp.proofs({ inputs: ["a-spec.k"] });

    const run = proj.ruleRegistrations.find((r) => r.name === "runner-script-imp-run");
    assert.deepEqual(run, {
      name: "runner-script-imp-run",
      description: "run: imp $in",
      command: './kbuild.sh run --definition "$definition" "$in" $flags > "$out" || (cat "$out"; false)',
    });
    assert.equal(proj.hasRule("runner-script-imp-prove"), true);
    assert.equal(proj.hasRule("krun"), false);
    assert.deepEqual(proj.producerOf(".build/a.imp.imp-run")?.variables, {
      definition: "imp",
      flags: "--fast",
    });
    assert.equal(proj.producerOf(".build/a-spec.k.imp-prove.test")?.rule, "check");
  });

  it("requires a runner script for runnerScript()", () => {
    const { imp } = makeDefinition();

    assert.throws(
      () => imp.runnerScript("run"),
      (err: unknown) =>
        err instanceof ConfigurationError &&
        err.rule === "runner-script-imp-run" &&
        err.attribute === "runnerScript"
    );
  });
});
