/**
 * retrykit command line: run a command until it succeeds
 */

export { createProgram, type CLIDependencies } from './cli.js';
export { CommandFailedError } from './errors.js';
export {
  BACKOFF_TYPES,
  RUN_DEFAULTS,
  backOffConfigFromOptions,
  describeBackOff,
  inferBackOffType,
  parseExitCodes,
  parseInteger,
  parseNumber,
  resolveRunPlan,
  type BackOffType,
  type OutputOptions,
  type RunCommandOptions,
  type RunPlan,
} from './plan.js';
export { executeRun, exitCodeFor, type ExecuteOptions, type RunOutcome } from './run.js';
export { spawnCommand, type CommandResult, type CommandRunner } from './runner.js';
