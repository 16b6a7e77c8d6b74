/**
 * Rule Template Tests
 *
 * Run with: npx tsx --test src/graph/rule.test.ts
 *
 * These tests verify:
 *   1. Updaters return new templates and never touch the receiver
 *   2. Output paths are derived from the extension or taken verbatim
 *   3. Applying a template records exactly one edge
 */

import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { BuildGraph } from "./build-graph.js";
import { ConfigurationError } from "./errors.js";
import { MemoryManifestSink } from "../ninja/sink.js";
import { silentLogger } from "../logging/index.js";

function makeGraph(): BuildGraph {
  return new BuildGraph({ sink: new MemoryManifestSink(), logger: silentLogger });
}

// ═══════════════════════════════════════════════════════════════════════════
// FUNCTIONAL UPDATES
// ═══════════════════════════════════════════════════════════════════════════

describe("RuleTemplate updates", () => {
  it("leave the receiver unchanged", () => {
    const graph = makeGraph();
    const base = graph.registerRule("cc", "cc: $in", "cc $flags -c $in -o $out");

    const derived = base.withExtension("o").withVariable("flags", "-O2").withPool("console");

    assert.equal(base.extension, undefined);
    assert.deepEqual(base.variables, {});
    assert.equal(base.pool, undefined);
    assert.equal(derived.extension, "o");
    assert.deepEqual(derived.variables, { flags: "-O2" });
    assert.equal(derived.pool, "console");
  });

  it("branch into independent edges", () => {
    const graph = makeGraph();
    const base = graph.registerRule("cc", "cc: $in", "cc $flags -c $in -o $out").withExtension("o");
    const optimized = base.withVariable("flags", "-O2");
    const plain = base.withVariable("flags", "");

    graph.source("a.c").then(optimized);
    graph.source("b.c").then(plain);

    assert.deepEqual(base.variables, {});
    assert.deepEqual(
      graph.edges.map((e) => [e.inputs, e.outputs, e.variables]),
      [
        [["a.c"], [".build/a.c.o"], { flags: "-O2" }],
        [["b.c"], [".build/b.c.o"], { flags: "" }],
      ]
    );
  });

  it("produce frozen templates", () => {
    const template = makeGraph().registerRule("cc", undefined, "cc $in -o $out").withExtension("o");

    assert.equal(Object.isFrozen(template), true);
    assert.equal(Object.isFrozen(template.variables), true);
    assert.equal(Object.isFrozen(template.implicitInputs), true);
  });

  it("merge variables, later bindings winning", () => {
    const template = makeGraph()
      .registerRule("cc", undefined, "cc $a $b $in -o $out")
      .withVariables({ a: "1", b: "2" })
      .withVariables({ b: "3" });

    assert.deepEqual(template.variables, { a: "1", b: "3" });
  });

  it("append implicit inputs and outputs", () => {
    const graph = makeGraph();
    const header = graph.source("gen/config.h");
    const template = graph
      .registerRule("cc", undefined, "cc $in -o $out")
      .withImplicitInputs(["a.h"])
      .withImplicitInputs([["b.h", null], header])
      .withImplicitOutputs("out.d");

    assert.deepEqual(template.implicitInputs, ["a.h", "b.h", "gen/config.h"]);
    assert.deepEqual(template.implicitOutputs, ["out.d"]);
  });

  it("lists placeholders of the command", () => {
    const template = makeGraph().registerRule("cc", undefined, "cc $flags $in -o $out");

    assert.deepEqual(template.placeholders(), ["flags", "in", "out"]);
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// OUTPUT PATHS
// ═══════════════════════════════════════════════════════════════════════════

describe("RuleTemplate.resolveOutputPath", () => {
  it("derives outputs inside the build directory from the extension", () => {
    const graph = makeGraph();
    const template = graph.registerRule("cc", undefined, "cc $in -o $out").withExtension("o");

    assert.equal(template.resolveOutputPath(graph.source("src/a.c")), ".build/src/a.c.o");
  });

  it("does not nest outputs of already-derived sources", () => {
    const graph = makeGraph();
    const template = graph.registerRule("cc", undefined, "cc $in -o $out").withExtension("o");

    assert.equal(template.resolveOutputPath(graph.source(".build/src/a.c")), ".build/src/a.c.o");
  });

  it("takes an explicit output verbatim", () => {
    const graph = makeGraph();
    const template = graph
      .registerRule("cc", undefined, "cc $in -o $out")
      .withExtension("o")
      .withOutput("bin/tool");

    assert.equal(template.resolveOutputPath(graph.source("src/a.c")), "bin/tool");
  });

  it("rejects absolute explicit outputs", () => {
    const graph = makeGraph();
    const template = graph.registerRule("cc", undefined, "cc $in -o $out").withOutput("/tmp/a.o");

    assert.throws(
      () => template.resolveOutputPath(graph.source("a.c")),
      (err: unknown) =>
        err instanceof ConfigurationError && err.rule === "cc" && err.attribute === "output"
    );
  });

  it("rejects sources outside the project root", () => {
    const graph = makeGraph();
    const template = graph.registerRule("cc", undefined, "cc $in -o $out").withExtension("o");

    assert.throws(() => template.resolveOutputPath(graph.source("../a.c")), ConfigurationError);
  });

  it("requires an output or an extension", () => {
    const graph = makeGraph();
    const template = graph.registerRule("cc", undefined, "cc $in -o $out");

    assert.throws(() => template.resolveOutputPath(graph.source("a.c")), /no derivable output/);
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// APPLYING
// ═══════════════════════════════════════════════════════════════════════════

describe("Target.then", () => {
  it("records one edge and returns the produced target", () => {
    const graph = makeGraph();
    const cc = graph
      .registerRule("cc", undefined, "cc $flags $in -o $out")
      .withExtension("o")
      .withVariable("flags", "-g")
      .withImplicitInputs(["a.h"]);

    const object = graph.source("a.c").then(cc);

    assert.equal(object.path, ".build/a.c.o");
    assert.equal(object.graph, graph);
    assert.deepEqual(graph.edges, [
      {
        rule: "cc",
        inputs: ["a.c"],
        outputs: [".build/a.c.o"],
        implicitInputs: ["a.h"],
        implicitOutputs: [],
        pool: undefined,
        variables: { flags: "-g" },
      },
    ]);
  });

  it("chains stages", () => {
    const graph = makeGraph();
    const cc = graph.registerRule("cc", undefined, "cc $in -o $out").withExtension("o");
    const link = graph.registerRule("link", undefined, "ld $in -o $out").withExtension("bin");

    const binary = graph.source("a.c").then(cc).then(link);

    assert.equal(binary.path, ".build/a.c.o.bin");
    assert.deepEqual(
      graph.edges.map((e) => [e.rule, e.inputs, e.outputs]),
      [
        ["cc", ["a.c"], [".build/a.c.o"]],
        ["link", [".build/a.c.o"], [".build/a.c.o.bin"]],
      ]
    );
  });

  it("takes no inputs from the dot target", () => {
    const graph = makeGraph();
    const stamp = graph.dotTarget().then(
      graph.registerRule("init", undefined, "touch $out").withOutput(".build/init")
    );

    assert.equal(stamp.path, ".build/init");
    assert.deepEqual(graph.edges[0]?.inputs, []);
  });
});
