/**
 * The build graph.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * WHAT A BUILD GRAPH OWNS
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * A BuildGraph is a labelled multigraph that is serialized to one Ninja
 * manifest:
 *
 *   - Nodes are targets: generally files, sometimes phony alias names.
 *   - Labels are rules: a command parameterised over a set of variables.
 *   - Edges specify how to build one or more targets from zero or more
 *     inputs, and may bind values for the variables their rule uses.
 *
 * All state lives on the instance. Two graphs in the same process share
 * nothing, which is what lets tests build many of them side by side.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * INVARIANTS
 * ═══════════════════════════════════════════════════════════════════════════
 *
 *   1. Each rule name is declared exactly once. Registering it again with
 *      the same body is a no-op; with a different body it is an error.
 *   2. Every edge names a declared rule, and every placeholder in that
 *      rule's command is bound by the edge, by a global variable, or by
 *      Ninja itself ($in, $out, $in_newline).
 *   3. Each output has one producer. Re-adding an identical edge is a
 *      no-op; a different edge for the same output is an error.
 *   4. Derived outputs live under the build directory, so a clean is a
 *      single `rm -rf`.
 *   5. Nothing can be added once the manifest has been flushed.
 *
 * Graph declaration is synchronous and single-threaded; the only I/O is the
 * final write of the manifest in `flush()`.
 */

import { posix } from "node:path";
import { config, configuredLogLevel } from "../config/index.js";
import { createLogger, type Logger } from "../logging/index.js";
import { NinjaWriter } from "../ninja/writer.js";
import { FileManifestSink, type ManifestSink } from "../ninja/sink.js";
import {
  ConfigurationError,
  GraphFinalizedError,
  RuleConflictError,
  UnboundVariableError,
} from "./errors.js";
import { escapesRoot, placeInDir } from "./paths.js";
import { findUnboundPlaceholders } from "./placeholders.js";
import { RuleTemplate } from "./rule.js";
import { Target, type TargetLike } from "./target.js";

/**
 * One declared production of outputs from inputs via a named rule.
 * A snapshot taken when a RuleTemplate is applied.
 */
export interface BuildEdge {
  readonly rule: string;
  readonly inputs: readonly string[];
  readonly outputs: readonly string[];
  readonly implicitInputs: readonly string[];
  readonly implicitOutputs: readonly string[];
  readonly pool?: string;
  readonly variables: Readonly<Record<string, string>>;
}

/**
 * A rule as declared in the manifest.
 */
export interface RuleRegistration {
  readonly name: string;
  readonly description?: string;
  readonly command: string;
}

/**
 * Kinds of memoized infrastructure targets.
 */
export type SingletonKind = "repository" | "toolchain" | "environment";

/**
 * Cache key for a singleton target.
 * Format: "{kind}:{identifier}", e.g. "toolchain:llvm".
 */
export type SingletonKey = `${SingletonKind}:${string}`;

export interface BuildGraphOptions {
  /** Managed build-output directory (default: ".build") */
  buildDir?: string;
  /** Manifest file name inside buildDir (default: "generated.ninja") */
  manifestName?: string;
  /** Where the manifest is written (default: a file at buildDir/manifestName) */
  sink?: ManifestSink;
  logger?: Logger;
  /** Line width of the manifest (default: 78) */
  width?: number;
}

const RULE_NAME_RE = /^[a-zA-Z0-9_.-]+$/;
const VARIABLE_NAME_RE = /^[a-zA-Z0-9_.-]+$/;
const RESERVED_RULES: ReadonlySet<string> = new Set(["phony"]);
const BUILTIN_POOLS: ReadonlySet<string> = new Set(["console"]);

/**
 * Identity of an edge for duplicate detection; variable order is ignored.
 */
function edgeKey(edge: BuildEdge): string {
  const variables = Object.keys(edge.variables)
    .sort()
    .map((k) => [k, edge.variables[k]]);
  return JSON.stringify([
    edge.rule,
    edge.inputs,
    edge.outputs,
    edge.implicitInputs,
    edge.implicitOutputs,
    edge.pool ?? null,
    variables,
  ]);
}

/** Same members, in any order. */
function sameTargetSet(a: readonly string[], b: readonly string[]): boolean {
  const left = new Set(a);
  const right = new Set(b);
  return left.size === right.size && [...left].every((p) => right.has(p));
}

export class BuildGraph {
  /** Managed build-output directory */
  readonly outputDir: string;
  readonly manifestPath: string;
  protected readonly logger: Logger;

  private readonly sink: ManifestSink;
  private readonly width: number;

  private readonly globals = new Map<string, string>();
  private readonly pools = new Map<string, number>();
  private readonly rules = new Map<string, RuleRegistration>();
  private readonly edgeList: BuildEdge[] = [];
  private readonly producers = new Map<string, BuildEdge>();
  private readonly aliases = new Map<string, readonly string[]>();
  private readonly defaults = new Set<string>();
  private readonly singletons = new Map<SingletonKey, Target>();
  private readonly pendingSingletons = new Set<SingletonKey>();
  private finalized = false;

  constructor(options: BuildGraphOptions = {}) {
    this.outputDir = options.buildDir ?? ".build";
    this.manifestPath = posix.join(this.outputDir, options.manifestName ?? "generated.ninja");
    this.sink = options.sink ?? new FileManifestSink(this.manifestPath);
    this.width = options.width ?? 78;
    this.logger =
      options.logger ?? createLogger({ level: configuredLogLevel(), logFile: config.logFile });
  }

  // ============================================================
  // Layout
  // ============================================================

  /**
   * Path inside the managed build directory.
   */
  buildDir(...paths: string[]): string {
    return posix.join(this.outputDir, ...paths);
  }

  /**
   * Nest a relative path under the build directory unless it already is
   * there. Idempotent.
   *
   * @param rule - Rule the path is derived for, named in errors
   * @throws ConfigurationError for absolute paths and paths that leave the project root
   */
  placeInOutputDir(path: string, rule?: string): string {
    const where = rule !== undefined ? ` for rule "${rule}"` : "";
    if (posix.isAbsolute(path)) {
      throw new ConfigurationError(
        `Cannot place absolute path "${path}" in the build directory "${this.outputDir}"${where}`,
        { rule, attribute: "output" }
      );
    }
    const normalized = posix.normalize(path);
    if (escapesRoot(path) || normalized === ".") {
      throw new ConfigurationError(
        `Cannot place "${path}" in the build directory "${this.outputDir}"${where}: ` +
          `it does not name a file inside the project root`,
        { rule, attribute: "output" }
      );
    }
    return placeInDir(path, this.outputDir);
  }

  // ============================================================
  // Targets
  // ============================================================

  source(path: string): Target {
    return new Target(this, path);
  }

  toTarget(value: string | Target): Target {
    return typeof value === "string" ? this.source(value) : value;
  }

  /**
   * Placeholder source for edges that take no inputs.
   */
  dotTarget(): Target {
    return new Target(this, "");
  }

  // ============================================================
  // Declarations
  // ============================================================

  /**
   * Declare a global manifest variable.
   */
  variable(name: string, value: string): void {
    this.assertOpen("declare a variable");
    if (!VARIABLE_NAME_RE.test(name)) {
      throw new ConfigurationError(`Invalid variable name "${name}"`, { attribute: "variable" });
    }
    const existing = this.globals.get(name);
    if (existing !== undefined && existing !== value) {
      throw new ConfigurationError(
        `Global variable "${name}" is already declared as "${existing}", cannot redeclare as "${value}"`,
        { attribute: "variable" }
      );
    }
    this.globals.set(name, value);
  }

  declarePool(name: string, depth: number): void {
    this.assertOpen("declare a pool");
    if (BUILTIN_POOLS.has(name) || !RULE_NAME_RE.test(name)) {
      throw new ConfigurationError(`Invalid pool name "${name}"`, { attribute: "pool" });
    }
    if (!Number.isInteger(depth) || depth < 1) {
      throw new ConfigurationError(`Pool "${name}" needs a positive integer depth, got ${depth}`, {
        attribute: "pool",
      });
    }
    const existing = this.pools.get(name);
    if (existing !== undefined && existing !== depth) {
      throw new ConfigurationError(
        `Pool "${name}" is already declared with depth ${existing}`,
        { attribute: "pool" }
      );
    }
    this.pools.set(name, depth);
  }

  /**
   * Register a rule and return a template for it.
   *
   * The first registration of a name is the one declared in the manifest.
   * A repeat registration with an identical body returns an equivalent
   * template.
   *
   * @throws RuleConflictError if `name` is registered with a different body
   */
  registerRule(name: string, description: string | undefined, command: string): RuleTemplate {
    this.declare({ name, description, command });
    return RuleTemplate.create(name, description, command);
  }

  /**
   * Make sure the rule behind `template` is declared. Used when a template
   * is applied to a graph it was not registered with.
   */
  declareRule(template: RuleTemplate): void {
    this.declare({
      name: template.name,
      description: template.description,
      command: template.command,
    });
  }

  private declare(rule: RuleRegistration): void {
    this.assertOpen(`register rule "${rule.name}"`);
    if (!RULE_NAME_RE.test(rule.name) || RESERVED_RULES.has(rule.name)) {
      throw new ConfigurationError(`Invalid rule name "${rule.name}"`, {
        rule: rule.name,
        attribute: "name",
      });
    }

    const existing = this.rules.get(rule.name);
    if (existing === undefined) {
      this.rules.set(rule.name, Object.freeze({ ...rule }));
      this.logger.debug("Rule registered", { rule: rule.name });
      return;
    }
    if (existing.command !== rule.command) {
      throw new RuleConflictError(rule.name, "command", existing.command, rule.command);
    }
    if (existing.description !== rule.description) {
      throw new RuleConflictError(rule.name, "description", existing.description, rule.description);
    }
  }

  /**
   * Record a build edge.
   *
   * @throws ConfigurationError if the rule is undeclared, the pool unknown,
   *         an output empty or already produced by a different edge
   * @throws UnboundVariableError if a command placeholder has no binding
   */
  addEdge(edge: BuildEdge): void {
    this.assertOpen("add a build edge");

    const rule = this.rules.get(edge.rule);
    if (rule === undefined) {
      throw new ConfigurationError(
        `Build edge for ${edge.outputs.join(", ")} uses undeclared rule "${edge.rule}"`,
        { rule: edge.rule, attribute: "rule" }
      );
    }

    const allOutputs = [...edge.outputs, ...edge.implicitOutputs];
    if (edge.outputs.length === 0 || allOutputs.some((o) => o.length === 0)) {
      throw new ConfigurationError(`Rule "${edge.rule}" produced an edge with an empty output`, {
        rule: edge.rule,
        attribute: "output",
      });
    }

    if (edge.pool !== undefined && !BUILTIN_POOLS.has(edge.pool) && !this.pools.has(edge.pool)) {
      throw new ConfigurationError(`Rule "${edge.rule}" uses undeclared pool "${edge.pool}"`, {
        rule: edge.rule,
        attribute: "pool",
      });
    }

    const unbound = findUnboundPlaceholders(
      rule.command,
      Object.keys(edge.variables),
      new Set(this.globals.keys())
    );
    if (unbound.length > 0) {
      throw new UnboundVariableError(edge.rule, unbound);
    }

    const key = edgeKey(edge);
    for (const output of allOutputs) {
      const producer = this.producers.get(output);
      if (producer === undefined) {
        continue;
      }
      if (edgeKey(producer) === key) {
        return;
      }
      throw new ConfigurationError(
        `Output "${output}" of rule "${edge.rule}" is already produced by rule "${producer.rule}"`,
        { rule: edge.rule, attribute: "output" }
      );
    }
    for (const output of allOutputs) {
      if (this.aliases.has(output)) {
        throw new ConfigurationError(
          `Output "${output}" of rule "${edge.rule}" collides with a phony alias`,
          { rule: edge.rule, attribute: "output" }
        );
      }
    }

    const snapshot: BuildEdge = Object.freeze({
      rule: edge.rule,
      inputs: Object.freeze([...edge.inputs]),
      outputs: Object.freeze([...edge.outputs]),
      implicitInputs: Object.freeze([...edge.implicitInputs]),
      implicitOutputs: Object.freeze([...edge.implicitOutputs]),
      pool: edge.pool,
      variables: Object.freeze({ ...edge.variables }),
    });
    this.edgeList.push(snapshot);
    for (const output of allOutputs) {
      this.producers.set(output, snapshot);
    }
    this.logger.debug("Build edge added", { rule: edge.rule, outputs: edge.outputs });
  }

  /**
   * Declare a phony node `name` depending on `targets`.
   * Repeating a declaration over the same set of targets, in any order,
   * returns the same alias; the manifest keeps the first declared order.
   *
   * @throws ConfigurationError if `name` is already an alias of different
   *         targets, or is the output of a build edge
   */
  alias(name: string, targets: TargetLike): Target {
    this.assertOpen(`declare alias "${name}"`);
    const paths = Target.toPaths(targets).filter((p) => p.length > 0);

    const existing = this.aliases.get(name);
    if (existing !== undefined) {
      if (!sameTargetSet(existing, paths)) {
        throw new ConfigurationError(
          `Alias "${name}" is already declared for [${existing.join(", ")}]`,
          { rule: "phony", attribute: "alias" }
        );
      }
      return new Target(this, name, name);
    }
    if (name.length === 0 || this.producers.has(name)) {
      throw new ConfigurationError(`Alias "${name}" collides with a build output`, {
        rule: "phony",
        attribute: "alias",
      });
    }

    this.aliases.set(name, Object.freeze(paths));
    this.logger.debug("Alias declared", { alias: name, targets: paths.length });
    return new Target(this, name, name);
  }

  /**
   * Add targets to the default set. Duplicates are ignored.
   */
  markDefault(targets: TargetLike): void {
    this.assertOpen("mark default targets");
    for (const path of Target.toPaths(targets)) {
      if (path.length > 0) {
        this.defaults.add(path);
      }
    }
  }

  /**
   * Return the target cached under `key`, creating it with `factory` the
   * first time. `factory` runs at most once per key.
   */
  getOrCreateSingleton(key: SingletonKey, factory: () => Target): Target {
    const cached = this.singletons.get(key);
    if (cached !== undefined) {
      return cached;
    }
    if (this.pendingSingletons.has(key)) {
      throw new Error(`Singleton "${key}" depends on itself`);
    }

    this.pendingSingletons.add(key);
    try {
      const target = factory();
      this.singletons.set(key, target);
      this.logger.debug("Singleton created", { key, path: target.path });
      return target;
    } finally {
      this.pendingSingletons.delete(key);
    }
  }

  // ============================================================
  // Inspection
  // ============================================================

  get edges(): readonly BuildEdge[] {
    return this.edgeList;
  }

  get ruleRegistrations(): readonly RuleRegistration[] {
    return [...this.rules.values()];
  }

  get defaultTargets(): readonly string[] {
    return [...this.defaults];
  }

  get aliasNames(): readonly string[] {
    return [...this.aliases.keys()];
  }

  hasRule(name: string): boolean {
    return this.rules.has(name);
  }

  aliasInputs(name: string): readonly string[] | undefined {
    return this.aliases.get(name);
  }

  producerOf(path: string): BuildEdge | undefined {
    return this.producers.get(path);
  }

  get isFinalized(): boolean {
    return this.finalized;
  }

  // ============================================================
  // Emission
  // ============================================================

  /**
   * Render the manifest: header, global variables, pools, rules, build
   * edges, phony aliases, and the default statement, in that order.
   */
  render(): string {
    const writer = new NinjaWriter(this.width);
    writer.comment("This is a generated file");

    if (this.globals.size > 0) {
      writer.newline();
      for (const [name, value] of this.globals) {
        writer.variable(name, value);
      }
    }

    if (this.pools.size > 0) {
      writer.newline();
      for (const [name, depth] of this.pools) {
        writer.pool(name, depth);
      }
    }

    if (this.rules.size > 0) {
      writer.newline();
      for (const rule of this.rules.values()) {
        writer.rule(rule.name, { command: rule.command, description: rule.description });
      }
    }

    if (this.edgeList.length > 0) {
      writer.newline();
      for (const edge of this.edgeList) {
        writer.build(edge.outputs, edge.rule, {
          inputs: edge.inputs,
          implicit: edge.implicitInputs,
          implicitOutputs: edge.implicitOutputs,
          pool: edge.pool,
          variables: edge.variables,
        });
      }
    }

    if (this.aliases.size > 0) {
      writer.newline();
      for (const [name, paths] of this.aliases) {
        writer.build([name], "phony", { inputs: paths });
      }
    }

    if (this.defaults.size > 0) {
      writer.newline();
      writer.defaultTargets([...this.defaults]);
    }

    return writer.toString();
  }

  /**
   * Write the manifest and close the sink. Call exactly once.
   */
  flush(): void {
    this.assertOpen("flush");
    this.finalized = true;
    this.sink.write(this.render());
    this.sink.close();
    this.logger.info("Manifest written", {
      location: this.sink.location,
      rules: this.rules.size,
      edges: this.edgeList.length,
    });
  }

  private assertOpen(operation: string): void {
    if (this.finalized) {
      throw new GraphFinalizedError(operation);
    }
  }
}
