import { promises as fs } from 'fs';

import { ConfigurationError, toError } from '@retrykit/errors';
import type { Logger } from '@retrykit/logging';
import { load as yamlLoad } from 'js-yaml';
import { z } from 'zod';

import { ConfigUtils } from './utils.js';

/**
 * Options for configuration management
 */
export interface ConfigOptions {
  /** Logger instance for configuration operations */
  logger?: Logger;
  /** Whether to enable `${VAR}` / `${VAR:-default}` substitution */
  enableEnvSubstitution?: boolean;
  /** Environment used for substitution, defaults to process.env */
  env?: NodeJS.ProcessEnv;
  /** Default configuration to merge with loaded config */
  defaults?: Record<string, unknown>;
}

/**
 * Configuration validation error with detailed information
 */
export class ConfigValidationError extends ConfigurationError {
  constructor(
    message: string,
    public readonly errors: z.ZodError
  ) {
    super(message, { code: 'CONFIG_VALIDATION_ERROR', data: { issues: errors.issues.length } });
  }

  /**
   * Get formatted error details
   */
  getFormattedErrors(): string[] {
    return this.errors.issues.map(issue => {
      const path = issue.path.join('.');
      return path ? `${path}: ${issue.message}` : issue.message;
    });
  }
}

/**
 * Generic configuration manager with zod validation
 *
 * Provides:
 * - YAML (and therefore JSON) file loading
 * - Environment variable substitution
 * - Zod-based schema validation
 * - Type-safe configuration access
 */
export class ConfigManager<T> {
  private config: T | null = null;
  private readonly logger: Logger | undefined;
  private readonly options: ConfigOptions;

  constructor(
    private readonly configPath: string,
    private readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    options: ConfigOptions = {}
  ) {
    this.logger = options.logger;
    this.options = {
      enableEnvSubstitution: false,
      ...options,
    };
  }

  /**
   * Load configuration from file
   */
  async loadConfig(): Promise<T> {
    try {
      if (!(await this.configExists())) {
        throw new ConfigurationError(`Configuration file not found: ${this.configPath}`, {
          code: 'CONFIG_NOT_FOUND',
        });
      }

      const configContent = await fs.readFile(this.configPath, 'utf8');
      const config = this.validateAndTransform(this.parseYaml(configContent));

      this.config = config;
      this.logger?.info(`Configuration loaded from: ${this.configPath}`);

      return config;
    } catch (error) {
      if (error instanceof ConfigValidationError) {
        this.logger?.error(`Configuration validation failed: ${error.message}`, undefined, {
          errors: error.getFormattedErrors(),
        });
      } else {
        this.logger?.error('Failed to load configuration', error);
      }
      throw error;
    }
  }

  /**
   * Get current configuration (must be loaded first)
   */
  getConfig(): T {
    if (this.config === null) {
      throw new ConfigurationError('Configuration not loaded. Call loadConfig() first.', {
        code: 'CONFIG_NOT_LOADED',
      });
    }
    return this.config;
  }

  isLoaded(): boolean {
    return this.config !== null;
  }

  /**
   * Validate configuration without loading from file
   */
  validateConfig(config: unknown): T {
    const result = this.schema.safeParse(config);

    if (!result.success) {
      throw new ConfigValidationError('Configuration validation failed', result.error);
    }

    return result.data;
  }

  /**
   * Apply env substitution and defaults, then validate
   */
  validateAndTransform(config: unknown): T {
    let processedConfig = config;

    if (this.options.enableEnvSubstitution) {
      processedConfig = ConfigUtils.processEnvVars(processedConfig, this.options.env);
    }

    if (this.options.defaults) {
      processedConfig = ConfigUtils.isPlainObject(processedConfig)
        ? ConfigUtils.mergeConfigs(this.options.defaults, processedConfig)
        : (processedConfig ?? this.options.defaults);
    }

    const result = this.schema.safeParse(processedConfig);
    if (!result.success) {
      throw new ConfigValidationError(
        `Configuration validation failed for ${this.configPath}`,
        result.error
      );
    }

    return result.data;
  }

  /**
   * Check if configuration file exists
   */
  async configExists(): Promise<boolean> {
    try {
      await fs.access(this.configPath);
      return true;
    } catch {
      return false;
    }
  }

  getConfigPath(): string {
    return this.configPath;
  }

  private parseYaml(content: string): unknown {
    try {
      return yamlLoad(content);
    } catch (error) {
      throw new ConfigurationError(`Invalid YAML in ${this.configPath}`, {
        code: 'CONFIG_PARSE_ERROR',
        cause: toError(error),
      });
    }
  }
}

/**
 * Utility function to create a configuration manager
 */
export function createConfigManager<T>(
  configPath: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  options?: ConfigOptions
): ConfigManager<T> {
  return new ConfigManager(configPath, schema, options);
}

// Re-export Zod for schema creation
export { z } from 'zod';

export { ConfigUtils, TIME, isTimeUnit, type TimeUnit, type DurationString } from './utils.js';
