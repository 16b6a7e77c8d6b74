/**
 * Runner: command-line dispatcher over a project's definitions.
 *
 * Usage:
 *   <script> kast  [--definition NAME] <program>       [-- args...]
 *   <script> run   [--definition NAME] <program>       [-- args...]
 *   <script> prove [--definition NAME] <specification> [-- args...]
 *
 * The selected toolchain tool takes over the process:
 *
 *   kast   → <bindir>/kast   --directory <dir> <program>
 *   run    → <bindir>/krun   --directory <dir> <program> <krunFlags...>
 *   prove  → <bindir>/kprove --directory <dir> <specification> <kproveFlags...>
 *
 * followed by the trailing arguments. `--definition` is checked against
 * the registered aliases while parsing, so an unknown alias never launches
 * anything.
 */

import { parseArgs } from "node:util";
import { config, configuredLogLevel } from "../config/index.js";
import { createLogger, type Logger } from "../logging/index.js";
import type { Definition } from "../toolchain/definition.js";
import type { ToolchainProject } from "../toolchain/project.js";
import { UnknownDefinitionError, UsageError } from "./errors.js";
import { SpawnLauncher, formatInvocation, type Invocation, type ProcessLauncher } from "./launcher.js";

// ============================================================
// Types
// ============================================================

export const RUNNER_COMMANDS = ["kast", "run", "prove"] as const;
export type RunnerCommand = (typeof RUNNER_COMMANDS)[number];

export interface DispatchRequest {
  readonly kind: "dispatch";
  readonly command: RunnerCommand;
  /** Alias of the selected definition */
  readonly definition: string;
  /** Program or specification path */
  readonly path: string;
  /** Passed through to the tool after the definition's flags */
  readonly args: readonly string[];
}

export interface HelpRequest {
  readonly kind: "help";
}

export type RunnerRequest = DispatchRequest | HelpRequest;

export interface RunnerOptions {
  /** Alias used when --definition is omitted (default: first registered) */
  defaultDefinition?: string;
  launcher?: ProcessLauncher;
  logger?: Logger;
}

interface ToolSpec {
  readonly binary: string;
  readonly flags: (definition: Definition) => string;
}

const TOOLS: Record<RunnerCommand, ToolSpec> = {
  kast: { binary: "kast", flags: () => "" },
  run: { binary: "krun", flags: (d) => d.krunFlags },
  prove: { binary: "kprove", flags: (d) => d.kproveFlags },
};

const USAGE = `Usage: <script> {kast|run|prove} [--definition NAME] <path> [-- args...]

Commands:
  kast                 Parse a program against a definition
  run                  Run a program against a definition
  prove                Check a specification with kprove

Options:
  --definition NAME    Alias of the definition to use
  -h, --help           Show this help message`;

function isRunnerCommand(value: string): value is RunnerCommand {
  return RUNNER_COMMANDS.some((command) => command === value);
}

/**
 * Index of the first positional argument, skipping the dispatcher's own
 * options.
 */
function findPathIndex(argv: readonly string[]): number {
  for (let i = 0; i < argv.length; i++) {
    const token = argv[i] ?? "";
    if (token === "--definition") {
      i++;
      continue;
    }
    if (token.startsWith("--definition=") || token === "-h" || token === "--help") {
      continue;
    }
    if (token.startsWith("-") && token !== "-") {
      throw new UsageError(`unrecognized argument: ${token}`);
    }
    return i;
  }
  return -1;
}

// ============================================================
// Runner
// ============================================================

export class Runner {
  private readonly launcher: ProcessLauncher;
  private readonly logger: Logger;
  private readonly defaultDefinition?: string;

  constructor(
    private readonly project: ToolchainProject,
    options: RunnerOptions = {}
  ) {
    this.defaultDefinition = options.defaultDefinition;
    this.launcher = options.launcher ?? new SpawnLauncher();
    this.logger =
      options.logger ?? createLogger({ level: configuredLogLevel(), logFile: config.logFile });
  }

  /**
   * Parse dispatcher arguments.
   *
   * @throws UsageError for a missing or unknown command, an unrecognized
   *         option, or a missing path
   * @throws UnknownDefinitionError if the selected alias is not registered
   */
  parse(argv: readonly string[]): RunnerRequest {
    const [command, ...rest] = argv;
    if (command === "-h" || command === "--help") {
      return { kind: "help" };
    }
    if (command === undefined) {
      throw new UsageError(`a command is required (choose from ${RUNNER_COMMANDS.join(", ")})`);
    }
    if (!isRunnerCommand(command)) {
      throw new UsageError(
        `invalid command: "${command}" (choose from ${RUNNER_COMMANDS.join(", ")})`
      );
    }

    const pathIndex = findPathIndex(rest);
    const head = pathIndex === -1 ? rest : rest.slice(0, pathIndex);

    const { values } = parseArgs({
      args: head,
      options: {
        definition: { type: "string" },
        help: { type: "boolean", short: "h", default: false },
      },
      strict: true,
      allowPositionals: false,
    });

    if (values.help) {
      return { kind: "help" };
    }

    const path = pathIndex === -1 ? undefined : rest[pathIndex];
    if (path === undefined) {
      throw new UsageError(
        `the following arguments are required: ${command === "prove" ? "specification" : "program"}`
      );
    }

    const trailing = rest.slice(pathIndex + 1);
    const args = trailing[0] === "--" ? trailing.slice(1) : trailing;

    return {
      kind: "dispatch",
      command,
      definition: this.resolveDefinition(values.definition),
      path,
      args,
    };
  }

  /**
   * The tool invocation a dispatch request hands off to.
   */
  invocation(request: DispatchRequest): Invocation {
    const definition = this.project.definitions.get(request.definition);
    if (definition === undefined) {
      throw new UnknownDefinitionError(request.definition, this.project.definitions.aliases());
    }
    const tool = TOOLS[request.command];
    const definitionFlags = tool.flags(definition).split(/\s+/).filter((f) => f.length > 0);

    return {
      file: this.project.toolchainBinDir(tool.binary),
      args: [
        "--directory",
        definition.directory(),
        request.path,
        ...definitionFlags,
        ...request.args,
      ],
    };
  }

  /**
   * Parse `argv` and hand the process over to the selected tool. Usage
   * errors are reported on stderr with exit code 2.
   */
  async main(argv: readonly string[] = process.argv.slice(2)): Promise<void> {
    let request: RunnerRequest;
    try {
      request = this.parse(argv);
    } catch (err) {
      if (err instanceof UsageError || isParseArgsError(err)) {
        console.error(USAGE);
        console.error(`error: ${err.message}`);
        process.exitCode = 2;
        return;
      }
      throw err;
    }

    if (request.kind === "help") {
      console.log(USAGE);
      return;
    }

    const invocation = this.invocation(request);
    this.logger.info("Dispatching", {
      command: request.command,
      definition: request.definition,
      invocation: formatInvocation(invocation),
    });
    await this.launcher.handOff(invocation);
  }

  private resolveDefinition(requested: string | undefined): string {
    const choices = this.project.definitions.aliases();
    const alias = requested ?? this.defaultDefinition ?? this.project.definitions.first()?.alias;
    if (alias === undefined) {
      throw new UsageError("no definitions are registered");
    }
    if (!this.project.definitions.has(alias)) {
      throw new UnknownDefinitionError(alias, choices);
    }
    return alias;
  }
}

/**
 * parseArgs reports unknown options and missing option values with
 * TypeErrors carrying an ERR_PARSE_ARGS_* code.
 */
function isParseArgsError(err: unknown): err is Error {
  return (
    err instanceof Error &&
    "code" in err &&
    typeof err.code === "string" &&
    err.code.startsWith("ERR_PARSE_ARGS_")
  );
}
