/**
 * Configuration utilities for parsing, transformation, and standardization
 */

import { z } from 'zod';

/**
 * Time units and their millisecond multipliers
 */
const TIME_UNITS = {
  ms: 1,
  s: 1000,
  m: 60 * 1000,
  h: 60 * 60 * 1000,
  d: 24 * 60 * 60 * 1000,
} as const;

export type TimeUnit = keyof typeof TIME_UNITS;
export type DurationString = `${number}${TimeUnit}`;

/**
 * Readable time constants for use in configuration defaults
 */
export const TIME = {
  MILLISECOND: TIME_UNITS.ms,
  SECOND: TIME_UNITS.s,
  MINUTE: TIME_UNITS.m,
  HOUR: TIME_UNITS.h,
  DAY: TIME_UNITS.d,
} as const;

export const isTimeUnit = (value: string): value is TimeUnit => Object.hasOwn(TIME_UNITS, value);

/**
 * Configuration parsing and transformation utilities
 */
export class ConfigUtils {
  /**
   * Parse duration string to milliseconds
   * @param duration Duration string like "10ms", "1h30m", "1.5s", or a number of milliseconds
   * @returns Duration in milliseconds
   */
  static parseDuration(duration: string | number): number {
    if (typeof duration === 'number') {
      if (!Number.isFinite(duration) || duration < 0) {
        throw new Error(`Invalid duration value: ${duration}`);
      }
      return duration;
    }

    const durationStr = duration.trim().toLowerCase();

    // Handle simple numeric values (assume milliseconds)
    if (/^\d+$/.test(durationStr)) {
      return parseInt(durationStr, 10);
    }

    if (!/^(\d+(?:\.\d+)?\s*[a-z]+\s*)+$/.test(durationStr)) {
      throw new Error(
        `Invalid duration format: ${duration}. Expected format like "10ms", "1h30m", "30s"`
      );
    }

    let totalMs = 0;

    // Parse complex duration strings like "1h30m15s"
    for (const match of durationStr.matchAll(/(\d+(?:\.\d+)?)\s*([a-z]+)/g)) {
      const [, valueStr = '', unit = ''] = match;
      const value = parseFloat(valueStr);

      if (!isTimeUnit(unit)) {
        const validUnits = Object.keys(TIME_UNITS).join(', ');
        throw new Error(`Invalid duration unit: ${unit}. Valid units: ${validUnits}`);
      }

      totalMs += value * TIME_UNITS[unit];
    }

    return Math.floor(totalMs);
  }

  /**
   * Format milliseconds to human-readable duration
   * @param ms Duration in milliseconds
   * @returns Formatted duration string
   */
  static formatDuration(ms: number): string {
    if (ms === 0) return '0ms';

    const units: Array<{ unit: TimeUnit; value: number }> = [
      { unit: 'd', value: TIME_UNITS.d },
      { unit: 'h', value: TIME_UNITS.h },
      { unit: 'm', value: TIME_UNITS.m },
      { unit: 's', value: TIME_UNITS.s },
      { unit: 'ms', value: TIME_UNITS.ms },
    ];

    const parts: string[] = [];
    let remaining = Math.floor(ms);

    for (const { unit, value } of units) {
      if (remaining >= value) {
        const count = Math.floor(remaining / value);
        parts.push(`${count}${unit}`);
        remaining %= value;
      }
    }

    return parts.join(' ') || '0ms';
  }

  /**
   * Process environment variable substitution in configuration
   * @param obj Configuration object
   * @returns Configuration with environment variables substituted
   */
  static processEnvVars(obj: unknown, env: NodeJS.ProcessEnv = process.env): unknown {
    if (typeof obj === 'string') {
      return ConfigUtils.substituteEnvVars(obj, env);
    }

    if (Array.isArray(obj)) {
      return obj.map(item => ConfigUtils.processEnvVars(item, env));
    }

    if (ConfigUtils.isPlainObject(obj)) {
      const result: Record<string, unknown> = {};
      for (const [key, value] of Object.entries(obj)) {
        result[key] = ConfigUtils.processEnvVars(value, env);
      }
      return result;
    }

    return obj;
  }

  /**
   * Substitute `${VAR}` and `${VAR:-default}` placeholders in a string
   */
  static substituteEnvVars(str: string, env: NodeJS.ProcessEnv = process.env): string {
    return str.replace(/\$\{([^}]+)\}/g, (_match, varExpr: string) => {
      const [varName = '', defaultValue] = varExpr.split(':-');
      const envValue = env[varName.trim()];

      if (envValue !== undefined) {
        return envValue;
      }

      if (defaultValue !== undefined) {
        return defaultValue.trim();
      }

      throw new Error(`Required environment variable not set: ${varName}`);
    });
  }

  /**
   * Merge configuration objects with deep merging
   * @param target Target configuration object
   * @param sources Source configuration objects to merge
   * @returns Merged configuration
   */
  static mergeConfigs(
    target: Record<string, unknown>,
    ...sources: Record<string, unknown>[]
  ): Record<string, unknown> {
    const result: Record<string, unknown> = { ...target };

    for (const source of sources) {
      for (const [key, value] of Object.entries(source)) {
        if (value === undefined) {
          continue;
        }

        const existing = result[key];
        if (ConfigUtils.isPlainObject(value) && ConfigUtils.isPlainObject(existing)) {
          result[key] = ConfigUtils.mergeConfigs(existing, value);
        } else {
          // Direct assignment for primitives, arrays, and null values
          result[key] = value;
        }
      }
    }

    return result;
  }

  static isPlainObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
  }

  /**
   * Zod schema accepting a duration string or a number of milliseconds
   */
  static durationTransformer() {
    return z.union([z.string(), z.number()]).transform((value, ctx) => {
      try {
        return ConfigUtils.parseDuration(value);
      } catch (error) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: error instanceof Error ? error.message : String(error),
        });
        return z.NEVER;
      }
    });
  }
}
