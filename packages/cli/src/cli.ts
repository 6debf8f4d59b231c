import { ConfigUtils, ConfigValidationError } from '@retrykit/configuration';
import { toError } from '@retrykit/errors';
import { LoggerFactory, LogLevel, type Logger } from '@retrykit/logging';
import { loadRetryConfig } from '@retrykit/retry';
import { Command, Option } from 'commander';

import {
  BACKOFF_TYPES,
  describeBackOff,
  parseExitCodes,
  parseInteger,
  parseNumber,
  resolveRunPlan,
  type OutputOptions,
  type RunCommandOptions,
} from './plan.js';
import { executeRun } from './run.js';
import { spawnCommand, type CommandRunner } from './runner.js';

export interface CLIDependencies {
  version?: string;
  runner?: CommandRunner;
  createLogger?: (options: OutputOptions) => Logger;
  /** Receives the exit code of each command */
  exit?: (code: number) => void;
  /** Machine-readable output for `--json` */
  write?: (line: string) => void;
}

const defaultLogger = (options: OutputOptions): Logger =>
  LoggerFactory.createConsoleLogger(
    'retrykit',
    options.verbose ? LogLevel.DEBUG : LogLevel.INFO,
    options.json ? 'json' : 'text'
  );

/**
 * Report a failure that happened before or outside the retry loop
 */
function outputError(logger: Logger, message: string, error: unknown): void {
  if (error instanceof ConfigValidationError) {
    logger.error(`❌ ${message}: ${error.message}`);
    for (const issue of error.getFormattedErrors()) {
      logger.error(`   ${issue}`);
    }
    return;
  }
  logger.error(`❌ ${message}: ${toError(error).message}`, error);
}

export function createProgram(deps: CLIDependencies = {}): Command {
  const runner = deps.runner ?? spawnCommand;
  const createLogger = deps.createLogger ?? defaultLogger;
  const exit =
    deps.exit ??
    ((code: number) => {
      process.exitCode = code;
    });
  const write = deps.write ?? ((line: string) => process.stdout.write(`${line}\n`));

  const program = new Command();

  program
    .name('retrykit')
    .description('Run commands until they succeed, with backoff')
    .version(deps.version ?? '0.0.0')
    .enablePositionalOptions();

  program
    .command('run')
    .description('Run a command until it exits 0')
    .argument('<command>', 'Command to run')
    .argument('[args...]', 'Arguments passed to the command')
    .addOption(
      new Option('-b, --backoff <type>', 'Backoff policy (default: attempts)').choices(
        BACKOFF_TYPES
      )
    )
    .option('-i, --interval <duration>', 'Delay between attempts for interval and attempts policies')
    .option('-a, --attempts <count>', 'Attempt limit (retry limit for exponential)', parseInteger)
    .option('--min <duration>', 'Exponential base delay')
    .option('--max <duration>', 'Exponential delay cap')
    .option('--factor <number>', 'Exponential growth factor', parseNumber)
    .option('-t, --timeout <duration>', 'Give up once this much time has passed')
    .option('--stop-on <codes>', 'Comma separated exit codes that end retrying', parseExitCodes)
    .option('-c, --config <path>', 'Read the policy from a YAML file')
    .option('-v, --verbose', 'Log every attempt')
    .option('--json', 'Print the outcome as JSON')
    .passThroughOptions()
    .action(async (command: string, args: string[], options: RunCommandOptions) => {
      const logger = createLogger(options);
      try {
        const plan = await resolveRunPlan(options);
        const outcome = await executeRun(command, args, plan, { runner, logger });

        if (options.json) {
          write(
            JSON.stringify({
              command: [command, ...args],
              exitCode: outcome.exitCode,
              attempts: outcome.attempts,
              ...(outcome.reason && { reason: outcome.reason }),
              ...(outcome.error && { error: outcome.error.message }),
            })
          );
        } else if (outcome.error) {
          logger.error(`❌ ${outcome.error.message}`);
        } else {
          logger.info(`✅ Command succeeded on attempt ${outcome.attempts}`);
        }

        exit(outcome.exitCode);
      } catch (error) {
        outputError(logger, 'Cannot run command', error);
        exit(1);
      } finally {
        await logger.close();
      }
    });

  program
    .command('validate')
    .description('Validate a retry policy file')
    .argument('<file>', 'YAML policy file')
    .option('--json', 'Print the parsed policy as JSON')
    .action(async (file: string, options: OutputOptions) => {
      const logger = createLogger(options);
      try {
        const config = await loadRetryConfig(file, { enableEnvSubstitution: true });

        if (options.json) {
          write(JSON.stringify(config));
        } else {
          const timeout =
            config.timeout === undefined
              ? 'no timeout'
              : `timeout ${ConfigUtils.formatDuration(config.timeout)}`;
          logger.info(`✅ ${file}: ${describeBackOff(config.backoff)}, ${timeout}`);
        }
        exit(0);
      } catch (error) {
        outputError(logger, `Invalid policy file ${file}`, error);
        exit(1);
      } finally {
        await logger.close();
      }
    });

  return program;
}
