/**
 * Rule templates.
 *
 * A RuleTemplate describes one class of build action: the rule declared in
 * the manifest (name, description, command) plus everything an edge using
 * it needs (output convention, implicit inputs and outputs, pool, variable
 * bindings).
 *
 * Templates are persistent values. Every `with…` method returns a new,
 * frozen template and leaves the receiver untouched, so a template handed
 * out once can be customized independently by any number of callers:
 *
 *   const krun = project.registerRule("krun", "krun: $in", "krun $flags $in > $out")
 *     .withExtension("krun");
 *
 *   const fast = krun.withVariable("flags", "--depth 10");
 *   const slow = krun.withVariable("flags", "");
 *   // krun, fast and slow are three unrelated values
 *
 * Applying a template snapshots it into a build edge; later customization
 * of the same template never reaches edges already recorded.
 */

import { posix } from "node:path";
import type { BuildGraph } from "./build-graph.js";
import { ConfigurationError } from "./errors.js";
import { extractPlaceholders } from "./placeholders.js";
import { Target, type TargetLike } from "./target.js";

export interface RuleTemplateFields {
  readonly name: string;
  readonly description?: string;
  readonly command: string;
  /** Output is `<source path>.<extension>`, placed in the build directory */
  readonly extension?: string;
  /** Explicit output path; takes precedence over `extension` */
  readonly output?: string;
  readonly implicitInputs: readonly string[];
  readonly implicitOutputs: readonly string[];
  readonly pool?: string;
  readonly variables: Readonly<Record<string, string>>;
}

export class RuleTemplate implements RuleTemplateFields {
  readonly name: string;
  readonly description?: string;
  readonly command: string;
  readonly extension?: string;
  readonly output?: string;
  readonly implicitInputs: readonly string[];
  readonly implicitOutputs: readonly string[];
  readonly pool?: string;
  readonly variables: Readonly<Record<string, string>>;

  private constructor(fields: RuleTemplateFields) {
    this.name = fields.name;
    this.description = fields.description;
    this.command = fields.command;
    this.extension = fields.extension;
    this.output = fields.output;
    this.implicitInputs = Object.freeze([...fields.implicitInputs]);
    this.implicitOutputs = Object.freeze([...fields.implicitOutputs]);
    this.pool = fields.pool;
    this.variables = Object.freeze({ ...fields.variables });
    Object.freeze(this);
  }

  /**
   * Create a bare template. Prefer `BuildGraph.registerRule`, which also
   * records the rule declaration.
   */
  static create(name: string, description: string | undefined, command: string): RuleTemplate {
    return new RuleTemplate({
      name,
      description,
      command,
      implicitInputs: [],
      implicitOutputs: [],
      variables: {},
    });
  }

  // ============================================================
  // Functional updates
  // ============================================================

  private with(patch: Partial<RuleTemplateFields>): RuleTemplate {
    return new RuleTemplate({ ...this.fields(), ...patch });
  }

  withExtension(extension: string): RuleTemplate {
    return this.with({ extension });
  }

  withOutput(output: string): RuleTemplate {
    return this.with({ output });
  }

  /** Appends to the implicit inputs. */
  withImplicitInputs(inputs: TargetLike): RuleTemplate {
    return this.with({ implicitInputs: [...this.implicitInputs, ...Target.toPaths(inputs)] });
  }

  /** Appends to the implicit outputs. */
  withImplicitOutputs(outputs: TargetLike): RuleTemplate {
    return this.with({ implicitOutputs: [...this.implicitOutputs, ...Target.toPaths(outputs)] });
  }

  withPool(pool: string): RuleTemplate {
    return this.with({ pool });
  }

  /** Merges over the existing bindings. */
  withVariables(variables: Readonly<Record<string, string>>): RuleTemplate {
    return this.with({ variables: { ...this.variables, ...variables } });
  }

  withVariable(name: string, value: string): RuleTemplate {
    return this.withVariables({ [name]: value });
  }

  // ============================================================
  // Edges
  // ============================================================

  /**
   * Variable names the command references.
   */
  placeholders(): string[] {
    return extractPlaceholders(this.command);
  }

  /**
   * Output path of an edge applying this template to `source`.
   *
   * @throws ConfigurationError if the explicit output is absolute, or if
   *         neither an output nor an extension is set
   */
  resolveOutputPath(source: Target): string {
    if (this.output !== undefined) {
      if (posix.isAbsolute(this.output)) {
        throw new ConfigurationError(
          `Rule "${this.name}" has an absolute output path "${this.output}"; ` +
            `outputs must be relative to the project root`,
          { rule: this.name, attribute: "output" }
        );
      }
      return this.output;
    }
    if (this.extension !== undefined) {
      return source.graph.placeInOutputDir(`${source.path}.${this.extension}`, this.name);
    }
    throw new ConfigurationError(
      `Rule "${this.name}" produces no derivable output; an explicit output or an extension is required`,
      { rule: this.name, attribute: "output" }
    );
  }

  /**
   * Record a build edge from `source` to `output` in `graph` and return the
   * produced target. Declares the rule in `graph` if it is not there yet.
   */
  apply(graph: BuildGraph, source: Target, output: string): Target {
    graph.declareRule(this);
    graph.addEdge({
      rule: this.name,
      inputs: Target.toPaths(source).filter((p) => p.length > 0),
      outputs: [output],
      implicitInputs: this.implicitInputs,
      implicitOutputs: this.implicitOutputs,
      pool: this.pool,
      variables: this.variables,
    });
    return new Target(graph, output);
  }

  private fields(): RuleTemplateFields {
    return {
      name: this.name,
      description: this.description,
      command: this.command,
      extension: this.extension,
      output: this.output,
      implicitInputs: this.implicitInputs,
      implicitOutputs: this.implicitOutputs,
      pool: this.pool,
      variables: this.variables,
    };
  }
}
