/**
 * Command-line dispatcher and process hand-off.
 */

export {
  Runner,
  RUNNER_COMMANDS,
  type RunnerCommand,
  type RunnerOptions,
  type RunnerRequest,
  type DispatchRequest,
  type HelpRequest,
} from "./runner.js";
export {
  SpawnLauncher,
  LaunchError,
  formatInvocation,
  type Invocation,
  type ProcessLauncher,
} from "./launcher.js";
export { UsageError, UnknownDefinitionError } from "./errors.js";
