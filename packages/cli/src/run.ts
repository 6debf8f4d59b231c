import { createCancelContext, withTimeout } from '@retrykit/cancel';
import { ConfigUtils } from '@retrykit/configuration';
import type { Logger } from '@retrykit/logging';
import { isRetryError, RetryReason, stop, until } from '@retrykit/retry';

import { CommandFailedError } from './errors.js';
import type { RunPlan } from './plan.js';
import type { CommandRunner } from './runner.js';

export interface RunOutcome {
  exitCode: number;
  attempts: number;
  /** Set when the loop gave up */
  reason?: RetryReason;
  error?: Error;
}

export interface ExecuteOptions {
  runner: CommandRunner;
  logger: Logger;
}

/**
 * Exit code for a loop that gave up: the command's own code when it was
 * stopped by one of the stop codes, 1 otherwise
 */
export function exitCodeFor(reason: RetryReason, cause: Error): number {
  if (reason === RetryReason.STOPPED && cause instanceof CommandFailedError) {
    return cause.exitCode;
  }
  return 1;
}

/**
 * Run `command` under `plan` until it exits 0 or the loop gives up
 */
export async function executeRun(
  command: string,
  args: readonly string[],
  plan: RunPlan,
  { runner, logger }: ExecuteOptions
): Promise<RunOutcome> {
  const commandLine = [command, ...args].join(' ');
  const ctx =
    plan.timeoutMs === undefined ? createCancelContext() : withTimeout(plan.timeoutMs);
  let attempts = 0;

  try {
    await until(
      ctx,
      plan.backOff,
      async (_signal, attempt) => {
        attempts = attempt;
        logger.debug(`Attempt ${attempt}: ${commandLine}`);

        let exitCode: number;
        try {
          ({ exitCode } = await runner(command, args));
        } catch (error) {
          // spawn failures are not retried
          throw stop(error);
        }

        if (exitCode === 0) {
          return;
        }
        const failure = new CommandFailedError(commandLine, exitCode);
        throw plan.stopOn.has(exitCode) ? stop(failure) : failure;
      },
      {
        logger,
        onRetry: (error, attempt, delayMs) => {
          logger.warn(
            `🔄 Attempt ${attempt} failed: ${error.message}; retrying in ${ConfigUtils.formatDuration(delayMs)}`
          );
        },
      }
    );

    return { exitCode: 0, attempts };
  } catch (error) {
    if (!isRetryError(error)) {
      throw error;
    }
    return {
      exitCode: exitCodeFor(error.reason, error.cause),
      attempts: error.attempts,
      reason: error.reason,
      error,
    };
  } finally {
    ctx.cancel();
  }
}
