/**
 * Backoff policies described in configuration files
 *
 * Delays accept either milliseconds or duration strings ("250ms", "1.5s").
 *
 * @example
 * ```yaml
 * backoff:
 *   type: exponential
 *   min: 100ms
 *   max: 30s
 *   attempts: 8
 * timeout: 5m
 * ```
 */

import { ConfigUtils, createConfigManager, z, type ConfigOptions } from '@retrykit/configuration';

import {
  AttemptsBackOff,
  ExponentialBackOff,
  IntervalBackOff,
  type BackOff,
  type BackOffConfig,
} from './backoff.js';

const duration = ConfigUtils.durationTransformer();

const IntervalConfigSchema = z.object({
  type: z.literal('interval'),
  interval: duration,
});

const AttemptsConfigSchema = z.object({
  type: z.literal('attempts'),
  attempts: z.number().int().min(1),
  interval: duration,
});

const ExponentialConfigSchema = z.object({
  type: z.literal('exponential'),
  min: duration,
  max: duration,
  factor: z.number().min(1).default(2),
  attempts: z.number().int().min(0).default(0),
});

export const BackOffConfigSchema: z.ZodType<BackOffConfig, z.ZodTypeDef, unknown> = z
  .discriminatedUnion('type', [IntervalConfigSchema, AttemptsConfigSchema, ExponentialConfigSchema])
  .superRefine((value, ctx) => {
    if (value.type === 'exponential' && value.min > value.max) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['max'],
        message: `max (${value.max}ms) must not be below min (${value.min}ms)`,
      });
    }
  });

export const RetryConfigSchema = z.object({
  backoff: BackOffConfigSchema,
  /** Overall deadline for the whole loop */
  timeout: duration.optional(),
});

export type RetryConfig = z.infer<typeof RetryConfigSchema>;

export function backOffFromConfig(config: BackOffConfig): BackOff {
  switch (config.type) {
    case 'interval':
      return new IntervalBackOff(config.interval);
    case 'attempts':
      return new AttemptsBackOff(config.attempts, config.interval);
    case 'exponential':
      return new ExponentialBackOff(config);
  }
}

/**
 * Load and validate a YAML retry configuration file
 */
export function loadRetryConfig(path: string, options: ConfigOptions = {}): Promise<RetryConfig> {
  return createConfigManager(path, RetryConfigSchema, options).loadConfig();
}
