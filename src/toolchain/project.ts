/**
 * Toolchain projects.
 *
 * A ToolchainProject is a BuildGraph that knows where the language toolchain
 * lives and how to build it, and that creates Definitions.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * DIRECTORY LAYOUT
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * ```
 *   <extDir>/<toolchainSubmodule>/            toolchain sources (git submodule)
 *   <extDir>/pandoc-tangle/                   literate-source filter (git submodule)
 *   <buildDir>/<manifestName>                 the generated manifest
 *   <buildDir>/defn/<alias>/                  compiled definitions
 *   <buildDir>/toolchain-<backend>            stamp of a finished toolchain build
 * ```
 *
 * Subclasses may override the layout methods for other project shapes.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * TOOLCHAIN SELECTION
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * By default the toolchain is built from the submodule: every definition
 * depends on one `build-toolchain` edge per backend, which depends on one
 * submodule checkout. With `useSystemToolchain` (or the environment
 * variable KBUILD_USE_SYSTEM_TOOLCHAIN) the release directory is derived
 * from the `kompile` found on PATH and no toolchain edges are declared.
 */

import { existsSync } from "node:fs";
import { delimiter, dirname, join, posix } from "node:path";
import { fileURLToPath } from "node:url";
import { config } from "../config/index.js";
import {
  DEFAULT_PROJECT_OPTIONS,
  loadProjectOptions,
  type ProjectOptions,
} from "../config/project/index.js";
import { BuildGraph } from "../graph/build-graph.js";
import { ConfigurationError } from "../graph/errors.js";
import { basenameNoExt, escapesRoot } from "../graph/paths.js";
import type { RuleTemplate } from "../graph/rule.js";
import type { Target, TargetLike } from "../graph/target.js";
import type { Logger } from "../logging/index.js";
import type { ManifestSink } from "../ninja/sink.js";
import {
  SpawnLauncher,
  formatInvocation,
  type Invocation,
  type ProcessLauncher,
} from "../runner/launcher.js";
import { Backend, backendConvention } from "./backends.js";
import { Definition, joinFlags } from "./definition.js";
import { findExecutable, type ExecutableLocator } from "./locate.js";
import { DefinitionRegistry } from "./registry.js";

export interface ToolchainProjectOptions extends Partial<ProjectOptions> {
  /** Where the manifest is written (default: a file at buildDir/manifestName) */
  sink?: ManifestSink;
  logger?: Logger;
  /** Used by `main` to hand off to the build executor */
  launcher?: ProcessLauncher;
  /** Finds `kompile` when using a system toolchain */
  locateExecutable?: ExecutableLocator;
  /** Build executor binary (default: KBUILD_NINJA or "ninja") */
  ninjaBinary?: string;
  width?: number;
}

export interface DefinitionOptions {
  /** Name the definition is known by; also its phony alias */
  alias: string;
  backend: Backend;
  /** Main source file of the definition */
  main: string | Target;
  /** Other source files the main file includes */
  other?: TargetLike;
  /** Output directory (default: <buildDir>/defn/<alias>) */
  directory?: string;
  /** Extra kompile flags */
  flags?: string;
  /** Command prefix for kompile */
  env?: string;
  runnerScript?: string;
  krunFlags?: string;
  krunEnv?: string;
  kproveFlags?: string;
  kproveEnv?: string;
}

const ALIAS_RE = /^[a-zA-Z0-9_.-]+$/;

let packageRoot: string | undefined;

/**
 * Directory of this package's package.json, found from the running module
 * so that sources and compiled output resolve the same support files.
 */
function findPackageRoot(): string {
  if (packageRoot !== undefined) {
    return packageRoot;
  }
  let dir = dirname(fileURLToPath(import.meta.url));
  while (!existsSync(join(dir, "package.json"))) {
    const parent = dirname(dir);
    if (parent === dir) {
      throw new Error(`No package.json above ${fileURLToPath(import.meta.url)}`);
    }
    dir = parent;
  }
  packageRoot = dir;
  return dir;
}

function resolveProjectOptions(overrides: Partial<ProjectOptions>): ProjectOptions {
  return loadProjectOptions({
    buildDir: overrides.buildDir ?? DEFAULT_PROJECT_OPTIONS.buildDir,
    extDir: overrides.extDir ?? DEFAULT_PROJECT_OPTIONS.extDir,
    toolchainSubmodule: overrides.toolchainSubmodule ?? DEFAULT_PROJECT_OPTIONS.toolchainSubmodule,
    manifestName: overrides.manifestName ?? DEFAULT_PROJECT_OPTIONS.manifestName,
    ninjaRequiredVersion:
      overrides.ninjaRequiredVersion ?? DEFAULT_PROJECT_OPTIONS.ninjaRequiredVersion,
    useSystemToolchain: overrides.useSystemToolchain ?? config.useSystemToolchain,
  });
}

export class ToolchainProject extends BuildGraph {
  readonly options: Readonly<ProjectOptions>;
  readonly definitions = new DefinitionRegistry();

  private readonly releaseDir: string;
  private readonly launcher: ProcessLauncher;
  private readonly ninjaBinary: string;

  constructor(options: ToolchainProjectOptions = {}) {
    const { sink, logger, launcher, locateExecutable, ninjaBinary, width, ...overrides } = options;
    const projectOptions = resolveProjectOptions(overrides);

    super({
      buildDir: projectOptions.buildDir,
      manifestName: projectOptions.manifestName,
      sink,
      logger,
      width,
    });

    this.options = projectOptions;
    this.launcher = launcher ?? new SpawnLauncher();
    this.ninjaBinary = ninjaBinary ?? config.ninjaBinary;

    if (projectOptions.useSystemToolchain) {
      const kompile = (locateExecutable ?? findExecutable)("kompile");
      if (kompile === undefined) {
        throw new ConfigurationError('"kompile" not found in PATH', {
          attribute: "useSystemToolchain",
        });
      }
      this.releaseDir = dirname(dirname(kompile));
    } else {
      this.releaseDir = this.toolchainRepoDir("k-distribution/target/release/k");
    }

    this.logger.debug("Toolchain selected", {
      useSystemToolchain: projectOptions.useSystemToolchain,
      binDir: this.toolchainBinDir(),
    });

    this.generateHeader();
  }

  // ============================================================
  // Layout
  // ============================================================

  /** Directory holding external repositories. */
  extDir(...paths: string[]): string {
    return posix.join(this.options.extDir, ...paths);
  }

  /** Toolchain sources. */
  toolchainRepoDir(...paths: string[]): string {
    return this.extDir(this.options.toolchainSubmodule, ...paths);
  }

  /** Pandoc filter used to extract code blocks from literate sources. */
  tangleRepoDir(...paths: string[]): string {
    return this.extDir("pandoc-tangle", ...paths);
  }

  toolchainReleaseDir(...paths: string[]): string {
    return posix.join(this.releaseDir, ...paths);
  }

  toolchainBinDir(...paths: string[]): string {
    return this.toolchainReleaseDir("bin", ...paths);
  }

  toolchainLibDir(...paths: string[]): string {
    return this.toolchainReleaseDir("lib/kframework", ...paths);
  }

  /** Files shipped with this package, such as the default proof baseline. */
  supportDir(...paths: string[]): string {
    return posix.join(findPackageRoot(), "support", ...paths);
  }

  // ============================================================
  // Infrastructure targets
  // ============================================================

  gitSubmoduleInit(path: string, stampFile: string): RuleTemplate {
    return this.registerRule(
      "git-submodule-init",
      "submodule: $path",
      'git submodule update $flags --init "$path" && touch "$out"'
    )
      .withOutput(stampFile)
      .withVariables({ path, flags: "" });
  }

  /**
   * Check out the toolchain submodule, once.
   */
  initToolchainSubmodule(): Target {
    const name = this.options.toolchainSubmodule;
    return this.getOrCreateSingleton(`repository:${name}`, () =>
      this.dotTarget().then(
        this.gitSubmoduleInit(this.toolchainRepoDir(), this.buildDir(`${name}.init`)).withVariable(
          "flags",
          "--recursive"
        )
      )
    );
  }

  /**
   * Check out the pandoc-tangle submodule, once.
   */
  initTangleSubmodule(): Target {
    return this.getOrCreateSingleton("repository:pandoc-tangle", () =>
      this.dotTarget().then(
        this.gitSubmoduleInit(this.tangleRepoDir(), this.buildDir("pandoc-tangle.init"))
      )
    );
  }

  buildToolchainRule(backend: Backend): RuleTemplate {
    return this.registerRule(
      "build-toolchain",
      "build toolchain: $backend",
      '(cd "$toolchain_repository" && mvn package -DskipTests $flags) && touch "$out"'
    )
      .withOutput(this.buildDir(`toolchain-${backend}`))
      .withPool("console")
      .withImplicitInputs([this.initToolchainSubmodule()])
      .withVariables({
        flags: backendConvention(backend).toolchainBuildFlags,
        backend,
      });
  }

  /**
   * Build the toolchain for `backend`, once per backend.
   */
  buildToolchain(backend: Backend): Target {
    return this.getOrCreateSingleton(`toolchain:${backend}`, () =>
      this.dotTarget().then(this.buildToolchainRule(backend))
    );
  }

  // ============================================================
  // Rules
  // ============================================================

  kompileRule(): RuleTemplate {
    return this.registerRule(
      "kompile",
      "kompile: $directory $in",
      '$env "kompile" --backend "$backend" $flags --directory "$directory" "$in"'
    );
  }

  /**
   * Diff a stage's output against `expected`. Any difference fails the
   * stage; `expected` is an implicit input so editing it re-runs the check.
   */
  check(expected: string): RuleTemplate {
    return this.registerRule(
      "check",
      "diff: $in",
      'git diff --color=always --no-index $flags "$expected" "$in" && touch "$out"'
    )
      .withExtension("test")
      .withVariables({ expected, flags: "" })
      .withImplicitInputs([expected]);
  }

  /**
   * Extract the code blocks of a literate source with pandoc.
   *
   * @param selector - Class of the code blocks to keep
   * @param extension - Extension of the extracted file
   */
  tangle(selector = ".k", extension = "k"): RuleTemplate {
    return this.registerRule(
      "tangle",
      "tangle: $in",
      'LUA_PATH="$tangle_repository/?.lua" pandoc "$in" -o "$out" ' +
        '--metadata=code:"$tangle_selector" --to "$tangle_repository/tangle.lua"'
    )
      .withExtension(extension)
      .withVariables({ tangle_repository: this.tangleRepoDir(), tangle_selector: selector })
      .withImplicitInputs([this.initTangleSubmodule()]);
  }

  // ============================================================
  // Definitions and suites
  // ============================================================

  /**
   * Compile a language definition and register it under its alias.
   *
   * @throws ConfigurationError for a taken or malformed alias, an unknown
   *         backend, a directory outside the project, or a main file
   *         without a base name
   */
  definition(options: DefinitionOptions): Definition {
    const { alias } = options;
    if (!ALIAS_RE.test(alias)) {
      throw new ConfigurationError(`Invalid definition alias "${alias}"`, {
        rule: alias,
        attribute: "alias",
      });
    }
    if (this.definitions.has(alias)) {
      throw new ConfigurationError(`Definition alias "${alias}" is already registered`, {
        rule: alias,
        attribute: "alias",
      });
    }

    const parsedBackend = Backend.safeParse(options.backend);
    if (!parsedBackend.success) {
      throw new ConfigurationError(
        `Definition "${alias}" has unknown backend "${String(options.backend)}" ` +
          `(expected one of ${Backend.options.join(", ")})`,
        { rule: alias, attribute: "backend" }
      );
    }
    const backend = parsedBackend.data;

    const directory = options.directory ?? this.buildDir("defn", alias);
    if (posix.isAbsolute(directory) || escapesRoot(directory)) {
      throw new ConfigurationError(
        `Definition "${alias}" has directory "${directory}"; compiled definitions must be ` +
          `placed inside the project root`,
        { rule: alias, attribute: "directory" }
      );
    }

    const main = this.toTarget(options.main);
    const mainName = basenameNoExt(main.path);
    if (mainName.length === 0) {
      throw new ConfigurationError(
        `Definition "${alias}" has main file "${main.path}" without a base name`,
        { rule: alias, attribute: "main" }
      );
    }

    const kompiledDir = posix.join(directory, `${mainName}-kompiled`);
    const toolchain = this.options.useSystemToolchain ? [] : [this.buildToolchain(backend)];

    const target = main
      .then(
        this.kompileRule()
          .withOutput(posix.join(kompiledDir, backendConvention(backend).kompiledOutput))
          .withImplicitInputs(options.other)
          .withImplicitInputs(toolchain)
          .withVariables({
            backend,
            directory,
            env: options.env ?? "",
            flags: joinFlags(`-I ${directory}`, options.flags),
          })
      )
      .alias(alias);

    const definition = new Definition({
      project: this,
      alias,
      backend,
      directory,
      kompiledDir,
      target,
      runnerScript: options.runnerScript,
      krunFlags: options.krunFlags,
      krunEnv: options.krunEnv,
      kproveFlags: options.kproveFlags,
      kproveEnv: options.kproveEnv,
    });
    this.definitions.register(definition);
    this.logger.debug("Definition registered", { alias, backend, directory });
    return definition;
  }

  /**
   * Run `runner` over every input and alias the results as `name`.
   */
  suite(
    name: string,
    inputs: readonly string[],
    runner: (input: string) => TargetLike,
    markDefault = true
  ): Target {
    const alias = this.alias(
      name,
      inputs.map((input) => runner(input))
    );
    if (markDefault) {
      this.markDefault([alias]);
    }
    return alias;
  }

  // ============================================================
  // Hand-off
  // ============================================================

  /**
   * Environment the build executor runs in. A toolchain built from source
   * is put first on PATH.
   */
  toolchainEnvironment(): NodeJS.ProcessEnv {
    if (this.options.useSystemToolchain) {
      return { ...process.env };
    }
    const path = [this.toolchainBinDir(), process.env.PATH]
      .filter((p): p is string => p !== undefined && p.length > 0)
      .join(delimiter);
    return { ...process.env, PATH: path };
  }

  /**
   * The build-executor invocation for `argv`.
   */
  executorInvocation(argv: readonly string[]): Invocation {
    return {
      file: this.ninjaBinary,
      args: ["-f", this.manifestPath, ...argv],
      env: this.toolchainEnvironment(),
    };
  }

  /**
   * Write the manifest and hand the process over to the build executor,
   * passing `argv` through.
   */
  main(argv: readonly string[] = process.argv.slice(2)): Promise<never> {
    this.flush();
    const invocation = this.executorInvocation(argv);
    this.logger.info("Handing off to build executor", { command: formatInvocation(invocation) });
    return this.launcher.handOff(invocation);
  }

  private generateHeader(): void {
    this.variable("ninja_required_version", this.options.ninjaRequiredVersion);
    this.variable("builddir", this.outputDir);
    this.variable("toolchain_repository", this.toolchainRepoDir());

    this.dotTarget().then(
      this.registerRule(
        "clean",
        "cleaning",
        'ninja -t clean ; rm -rf "$builddir" ; git submodule update --init --recursive'
      ).withOutput("clean")
    );

    // Always have one default target, otherwise ninja builds everything, clean included
    this.markDefault([this.alias("dummy", [])]);
  }
}
