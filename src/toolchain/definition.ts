/**
 * Compiled language definitions and the pipelines built on them.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * PIPELINE SHAPE
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * A Definition wraps the target produced by `kompile`. Everything derived
 * from it lists that target as an implicit input, so recompiling the
 * definition invalidates every test and proof result downstream:
 *
 * ```
 *   program.imp ──krun──▶ .build/program.imp.imp-krun ──check──▶ …imp-krun.test
 *                  ▲                                       ▲
 *                  │ implicit                              │ implicit
 *           kompiled target                       program.imp.expected
 * ```
 *
 * Every chain is independent: one input's failure at execution time never
 * affects how another input's chain is declared.
 *
 * The execute and verify commands redirect the tool's output to `$out` and,
 * on a non-zero exit, print that output before failing. The toolchain
 * reports errors on stdout, so without this a failing stage would show
 * nothing.
 */

import { posix } from "node:path";
import { ConfigurationError } from "../graph/errors.js";
import { appendExtension } from "../graph/paths.js";
import type { RuleTemplate } from "../graph/rule.js";
import type { Target, TargetLike } from "../graph/target.js";
import { discoverInputs } from "../inputs/discover.js";
import type { Backend } from "./backends.js";
import type { ToolchainProject } from "./project.js";

/** Runner-script modes, one per execute/verify stage. */
export type RunnerMode = "run" | "prove";

export interface DefinitionInit {
  readonly project: ToolchainProject;
  readonly alias: string;
  readonly backend: Backend;
  /** Directory passed to the toolchain as --directory */
  readonly directory: string;
  /** `<directory>/<main>-kompiled` */
  readonly kompiledDir: string;
  /** Output of the kompile edge */
  readonly target: Target;
  /** Script invoked as `<script> <mode> --definition <alias> <input>` */
  readonly runnerScript?: string;
  readonly krunFlags?: string;
  /** Command prefix for krun, e.g. a sandbox wrapper */
  readonly krunEnv?: string;
  readonly kproveFlags?: string;
  /** Command prefix for kprove */
  readonly kproveEnv?: string;
}

/**
 * Options shared by `tests` and `proofs`.
 */
export interface PipelineOptions {
  /** Input files */
  inputs?: readonly string[];
  /** Glob pattern whose matches are appended to `inputs` */
  glob?: string;
  /** Expected-output file used for every input, instead of the per-input default */
  expected?: string;
  /** Declare a phony alias over the resulting chain heads */
  alias?: string;
  /** Add every chain head to the default set (default: true) */
  markDefault?: boolean;
  /** Extra flags for the execute/verify stage */
  flags?: string;
}

export interface TestOptions extends PipelineOptions {
  /** Additional implicit inputs of the execute stage */
  implicitInputs?: TargetLike;
}

export function joinFlags(...flags: Array<string | undefined>): string {
  return flags
    .map((f) => f?.trim() ?? "")
    .filter((f) => f.length > 0)
    .join(" ");
}

export class Definition {
  readonly project: ToolchainProject;
  readonly alias: string;
  readonly backend: Backend;
  readonly target: Target;
  readonly runnerScriptPath?: string;
  readonly krunFlags: string;
  readonly krunEnv: string;
  readonly kproveFlags: string;
  readonly kproveEnv: string;

  private readonly directoryPath: string;
  private readonly kompiledPath: string;

  constructor(init: DefinitionInit) {
    this.project = init.project;
    this.alias = init.alias;
    this.backend = init.backend;
    this.target = init.target;
    this.directoryPath = init.directory;
    this.kompiledPath = init.kompiledDir;
    this.runnerScriptPath = init.runnerScript;
    this.krunFlags = init.krunFlags ?? "";
    this.krunEnv = init.krunEnv ?? "";
    this.kproveFlags = init.kproveFlags ?? "";
    this.kproveEnv = init.kproveEnv ?? "";
  }

  // ============================================================
  // Layout
  // ============================================================

  directory(...paths: string[]): string {
    return posix.join(this.directoryPath, ...paths);
  }

  kompiledDir(...paths: string[]): string {
    return posix.join(this.kompiledPath, ...paths);
  }

  /** Extension of execute-stage outputs. */
  get krunExtension(): string {
    return `${this.alias}-krun`;
  }

  /** Extension of verify-stage outputs. */
  get kproveExtension(): string {
    return `${this.alias}-kprove`;
  }

  // ============================================================
  // High level interface
  // ============================================================

  /**
   * Declare one `input → execute → check` chain per input.
   *
   * The expected output of `foo.imp` defaults to `foo.imp.expected`. When a
   * runner script is configured it performs the execute stage; otherwise
   * `krun` does.
   *
   * @returns The chain heads (the check-stage targets), in input order
   */
  tests(options: TestOptions = {}): Target[] {
    const execute = (
      this.runnerScriptPath !== undefined
        ? this.runnerScript("run", options.flags)
        : this.krun(options.flags)
    ).withImplicitInputs(options.implicitInputs);

    const heads = this.collectInputs(options).map((input) => {
      const expected = options.expected ?? appendExtension(input, "expected");
      return this.project.source(input).then(execute).then(this.project.check(expected));
    });

    return this.finish(heads, options);
  }

  /**
   * Declare one `specification → prove → check` chain per input.
   *
   * Every proof is checked against the same expected output, by default
   * the shared `kprove.expected` baseline.
   *
   * @returns The chain heads (the check-stage targets), in input order
   */
  proofs(options: PipelineOptions = {}): Target[] {
    const expected = options.expected ?? this.project.supportDir("kprove.expected");
    const verify =
      this.runnerScriptPath !== undefined
        ? this.runnerScript("prove", options.flags)
        : this.kprove(options.flags);
    const check = this.project.check(expected);

    const heads = this.collectInputs(options).map((input) =>
      this.project.source(input).then(verify).then(check)
    );

    return this.finish(heads, options);
  }

  // ============================================================
  // Low level interface
  // ============================================================

  /**
   * Execute a program with krun.
   */
  krun(flags?: string): RuleTemplate {
    return this.project
      .registerRule(
        "krun",
        "krun: $in ($directory)",
        '$env "krun" $flags --directory "$directory" "$in" > "$out" || (cat "$out"; false)'
      )
      .withExtension(this.krunExtension)
      .withVariables({
        directory: this.directory(),
        flags: joinFlags(this.krunFlags, flags),
        env: this.krunEnv,
      })
      .withImplicitInputs([this.target]);
  }

  /**
   * Parse a program with kast.
   */
  kast(flags?: string): RuleTemplate {
    return this.project
      .registerRule(
        "kast",
        "kast: $in ($directory)",
        '$env "kast" $flags --directory "$directory" "$in" > "$out" || (cat "$out"; false)'
      )
      .withExtension("kast")
      .withVariables({
        directory: this.directory(),
        flags: joinFlags(flags),
        env: this.krunEnv,
      })
      .withImplicitInputs([this.target]);
  }

  /**
   * Check a specification with kprove.
   */
  kprove(flags?: string): RuleTemplate {
    return this.project
      .registerRule(
        "kprove",
        "kprove: $in ($directory)",
        '$env "kprove" $flags --directory "$directory" "$in" > "$out" || (cat "$out"; false)'
      )
      .withExtension(this.kproveExtension)
      .withVariables({
        directory: this.directory(),
        flags: joinFlags(this.kproveFlags, flags),
        env: this.kproveEnv,
      })
      .withImplicitInputs([this.target]);
  }

  /**
   * Execute or verify through the project's runner script.
   *
   * Each definition and mode gets its own rule, because the output
   * extension belongs to the template rather than the edge.
   *
   * @throws ConfigurationError if no runner script was configured
   */
  runnerScript(mode: RunnerMode, flags?: string): RuleTemplate {
    const script = this.runnerScriptPath;
    if (script === undefined) {
      throw new ConfigurationError(
        `Definition "${this.alias}" has no runner script configured`,
        { rule: `runner-script-${this.alias}-${mode}`, attribute: "runnerScript" }
      );
    }
    return this.project
      .registerRule(
        `runner-script-${this.alias}-${mode}`,
        `${mode}: ${this.alias} $in`,
        `${script} ${mode} --definition "$definition" "$in" $flags > "$out" || (cat "$out"; false)`
      )
      .withExtension(`${this.alias}-${mode}`)
      .withVariables({ definition: this.alias, flags: joinFlags(flags) })
      .withImplicitInputs([this.target]);
  }

  // ============================================================
  // Helpers
  // ============================================================

  private collectInputs(options: PipelineOptions): string[] {
    const inputs = [...(options.inputs ?? [])];
    if (options.glob !== undefined) {
      inputs.push(...discoverInputs(options.glob));
    }
    return inputs;
  }

  private finish(heads: Target[], options: PipelineOptions): Target[] {
    if (options.markDefault ?? true) {
      this.project.markDefault(heads);
    }
    if (options.alias !== undefined) {
      this.project.alias(options.alias, heads);
    }
    return heads;
  }
}
