import { DEFAULTS, ENV_VARS } from '@common/constants/config';
import { ConfigurationError, ErrorHandler, errorMessage } from '@common/utils/error-handler';
import { parseHealthCheckConfig } from '@config/health-check-config';
import { Injectable, Logger } from '@nestjs/common';
import type { BindAddress, HealthCheckConfig, RpcEndpoint } from '@types';
import * as dotenv from 'dotenv';
import * as fs from 'fs';
import { join } from 'path';

export interface ConfigServiceOptions {
  /**
   * YAML configuration file; falls back to CONFIG_FILE, then config.yaml
   */
  configPath?: string;

  /**
   * Already validated configuration, used instead of reading a file
   */
  config?: HealthCheckConfig;

  /**
   * Environment to read from (default: process.env)
   */
  env?: Record<string, string | undefined>;

  /**
   * .env file merged over the environment; null disables it (default: ./.env)
   */
  envFilePath?: string | null;
}

/**
 * Configuration service with strict typing and validation.
 *
 * The YAML file is read and validated once, at construction. An invalid file throws
 * {@link ConfigurationError} before any module that depends on it is created.
 */
@Injectable()
export class ConfigService {
  private readonly logger = new Logger(ConfigService.name);
  private readonly errorHandler = new ErrorHandler(ConfigService.name);
  private readonly env: Record<string, string | undefined>;
  private readonly healthCheckConfig: HealthCheckConfig;

  readonly configPath: string | null;

  constructor(options: ConfigServiceOptions = {}) {
    this.env = this.loadEnv(options.env ?? process.env, options.envFilePath);

    if (options.config) {
      this.configPath = null;
      this.healthCheckConfig = options.config;
    } else {
      this.configPath = options.configPath ?? this.get(ENV_VARS.CONFIG_FILE, DEFAULTS.CONFIG_FILE);
      this.healthCheckConfig = this.loadConfigFile(this.configPath);
    }
  }

  /**
   * Get a string value from environment variables
   */
  get(key: string, defaultValue?: string): string {
    return this.read(key, defaultValue, value => value);
  }

  /**
   * Get an optional string from environment variables
   */
  getOptional(key: string): string | undefined {
    const value = this.env[key];
    return value === undefined || value === '' ? undefined : value;
  }

  /**
   * Get a boolean value from environment variables
   */
  getBoolean(key: string, defaultValue?: boolean): boolean {
    return this.read<boolean>(key, defaultValue, value => {
      if (value.toLowerCase() === 'true' || value === '1') return true;
      if (value.toLowerCase() === 'false' || value === '0') return false;
      throw new Error(`Cannot convert "${value}" to a boolean`);
    });
  }

  /**
   * Get the log level
   */
  getLogLevel(): string {
    return this.get(ENV_VARS.LOG_LEVEL, DEFAULTS.LOG_LEVEL);
  }

  /**
   * Directory for log files; file logging is off when unset
   */
  getLogDirectory(): string | undefined {
    return this.getOptional(ENV_VARS.LOG_DIR);
  }

  /**
   * Get the runtime environment name
   */
  getEnvironment(): string {
    return this.get(ENV_VARS.NODE_ENV, DEFAULTS.NODE_ENV);
  }

  /**
   * Whether process metrics are exposed next to the gauges
   */
  isDefaultMetricsEnabled(): boolean {
    return this.getBoolean(ENV_VARS.ENABLE_DEFAULT_METRICS, DEFAULTS.ENABLE_DEFAULT_METRICS);
  }

  /**
   * Get the validated health check configuration
   */
  getHealthCheckConfig(): HealthCheckConfig {
    return this.healthCheckConfig;
  }

  /**
   * Get the configured endpoints, in file order
   */
  getEndpoints(): readonly RpcEndpoint[] {
    return this.healthCheckConfig.endpoints;
  }

  /**
   * Get the RPC method probed on every endpoint
   */
  getMethod(): string {
    return this.healthCheckConfig.method;
  }

  /**
   * Get the address the metrics surface listens on
   */
  getMetricsAddress(): BindAddress {
    return this.healthCheckConfig.metricsAddress;
  }

  /**
   * Get the check interval in milliseconds
   */
  get checkIntervalMs(): number {
    return this.healthCheckConfig.intervalMinutes * 60_000;
  }

  /**
   * Read an environment variable with type conversion
   */
  private read<T>(key: string, defaultValue: T | undefined, transform: (value: string) => T): T {
    const value = this.env[key];

    if (value === undefined || value === '') {
      if (defaultValue !== undefined) {
        return defaultValue;
      }
      throw new ConfigurationError(`Missing required environment variable: ${key}`, key);
    }

    try {
      return transform(value);
    } catch (error) {
      throw new ConfigurationError(`Failed to transform environment variable ${key}: ${errorMessage(error)}`, key);
    }
  }

  private loadEnv(
    base: Record<string, string | undefined>,
    envFilePath: string | null | undefined,
  ): Record<string, string | undefined> {
    if (envFilePath === null) {
      return { ...base };
    }

    const envPath = envFilePath ?? join(process.cwd(), '.env');
    try {
      if (fs.existsSync(envPath)) {
        const envConfig = dotenv.parse(fs.readFileSync(envPath));
        this.logger.log(`Loaded environment variables from ${envPath}`);
        return { ...base, ...envConfig };
      }
    } catch (error) {
      this.logger.error(`Failed to load environment variables: ${errorMessage(error)}`);
    }

    return { ...base };
  }

  private loadConfigFile(path: string): HealthCheckConfig {
    let source: string;
    try {
      source = fs.readFileSync(path, 'utf8');
    } catch (error) {
      throw this.errorHandler.handleConfigError(`Error reading config file ${path}: ${errorMessage(error)}`, 'config');
    }

    try {
      const config = parseHealthCheckConfig(source, `config file ${path}`);
      this.logger.log(
        `Loaded configuration from ${path}: ${config.endpoints.length} endpoint(s), method ${config.method}, ` +
          `interval ${config.intervalMinutes}m`,
      );
      return config;
    } catch (error) {
      if (error instanceof ConfigurationError) {
        throw this.errorHandler.handleConfigError(error.message, error.configKey);
      }
      throw error;
    }
  }
}
