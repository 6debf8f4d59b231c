/**
 * Turns `retrykit run` options into a backoff policy, deadline and stop codes
 */

import { ConfigUtils, ConfigValidationError } from '@retrykit/configuration';
import { toError, ValidationError } from '@retrykit/errors';
import {
  BackOffConfigSchema,
  backOffFromConfig,
  loadRetryConfig,
  type BackOff,
  type BackOffConfig,
} from '@retrykit/retry';
import { InvalidArgumentError } from 'commander';

export const BACKOFF_TYPES = ['interval', 'attempts', 'exponential'] as const;
export type BackOffType = (typeof BACKOFF_TYPES)[number];

export const RUN_DEFAULTS = {
  interval: '1s',
  attempts: 5,
  min: '100ms',
  max: '30s',
} as const;

export interface OutputOptions {
  verbose?: boolean;
  json?: boolean;
}

export interface RunCommandOptions extends OutputOptions {
  backoff?: BackOffType;
  interval?: string;
  attempts?: number;
  min?: string;
  max?: string;
  factor?: number;
  timeout?: string;
  stopOn?: number[];
  config?: string;
}

export interface RunPlan {
  backOff: BackOff;
  /** Overall deadline for the loop, if any */
  timeoutMs: number | undefined;
  /** Exit codes that end the loop without retrying */
  stopOn: ReadonlySet<number>;
}

export function parseInteger(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isInteger(parsed)) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return parsed;
}

export function parseNumber(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed)) {
    throw new InvalidArgumentError('Not a number.');
  }
  return parsed;
}

/**
 * Parse a comma separated list of exit codes, e.g. "2,127"
 */
export function parseExitCodes(value: string): number[] {
  return value.split(',').map(part => {
    const code = parseInteger(part);
    if (code < 0 || code > 255) {
      throw new InvalidArgumentError(`Exit code out of range: ${code}.`);
    }
    return code;
  });
}

/**
 * Policy type when `--backoff` is not given: exponential as soon as one of
 * its own flags is present, attempt-limited otherwise
 */
export function inferBackOffType(options: RunCommandOptions): BackOffType {
  if (options.backoff) {
    return options.backoff;
  }
  if (options.min !== undefined || options.max !== undefined || options.factor !== undefined) {
    return 'exponential';
  }
  return 'attempts';
}

export function backOffConfigFromOptions(options: RunCommandOptions): BackOffConfig {
  const interval = options.interval ?? RUN_DEFAULTS.interval;
  let raw: Record<string, unknown>;

  switch (inferBackOffType(options)) {
    case 'interval':
      raw = { type: 'interval', interval };
      break;
    case 'attempts':
      raw = { type: 'attempts', attempts: options.attempts ?? RUN_DEFAULTS.attempts, interval };
      break;
    case 'exponential':
      raw = {
        type: 'exponential',
        min: options.min ?? RUN_DEFAULTS.min,
        max: options.max ?? RUN_DEFAULTS.max,
        factor: options.factor,
        attempts: options.attempts,
      };
      break;
  }

  const result = BackOffConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigValidationError('Invalid backoff options', result.error);
  }
  return result.data;
}

function parseTimeout(value: string): number {
  try {
    return ConfigUtils.parseDuration(value);
  } catch (error) {
    throw new ValidationError(`Invalid timeout: ${toError(error).message}`, {
      code: 'INVALID_OPTION',
      cause: toError(error),
    });
  }
}

/**
 * Build the run plan from flags, or from a policy file when `config` is set.
 * An explicit `timeout` flag overrides the file's timeout.
 */
export async function resolveRunPlan(options: RunCommandOptions): Promise<RunPlan> {
  let backOffConfig: BackOffConfig;
  let timeoutMs: number | undefined;

  if (options.config) {
    const config = await loadRetryConfig(options.config, { enableEnvSubstitution: true });
    backOffConfig = config.backoff;
    timeoutMs = config.timeout;
  } else {
    backOffConfig = backOffConfigFromOptions(options);
  }

  if (options.timeout !== undefined) {
    timeoutMs = parseTimeout(options.timeout);
  }

  return {
    backOff: backOffFromConfig(backOffConfig),
    timeoutMs,
    stopOn: new Set(options.stopOn ?? []),
  };
}

/**
 * One-line description of a policy for human output
 */
export function describeBackOff(config: BackOffConfig): string {
  const fmt = (ms: number) => ConfigUtils.formatDuration(ms);
  switch (config.type) {
    case 'interval':
      return `interval backoff (every ${fmt(config.interval)}, until cancelled)`;
    case 'attempts':
      return `attempts backoff (${config.attempts} attempts, every ${fmt(config.interval)})`;
    case 'exponential': {
      const limit = config.attempts === 0 ? 'unlimited retries' : `${config.attempts} retries`;
      return `exponential backoff (min ${fmt(config.min)}, max ${fmt(config.max)}, factor ${config.factor}, ${limit})`;
    }
  }
}
