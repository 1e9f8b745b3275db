import { Logger } from '@nestjs/common';
import type { ProbeFailureReason } from '@types';

/**
 * Base class for application errors
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly metadata?: Record<string, unknown>,
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Get a string representation of the error
   */
  toString(): string {
    return `${this.name}(${this.code}): ${this.message}`;
  }

  /**
   * Convert to an object for logging or API responses
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      metadata: this.metadata,
      stack: this.stack,
    };
  }
}

/**
 * Error for RPC-related issues
 */
export class RpcError extends AppError {
  constructor(
    message: string,
    public readonly reason: ProbeFailureReason,
    code: string,
    public readonly endpoint?: string,
    public readonly method?: string,
    metadata?: Record<string, unknown>,
  ) {
    super(message, code, { ...metadata, endpoint, method });
  }
}

/**
 * The connection or TLS handshake to the endpoint could not be established
 */
export class ConnectError extends RpcError {
  constructor(message: string, endpoint?: string, method?: string, metadata?: Record<string, unknown>) {
    super(message, 'connect', 'RPC_CONNECT_ERROR', endpoint, method, metadata);
  }
}

/**
 * The endpoint was reached but the call failed, returned no usable result or ran out of time
 */
export class CallError extends RpcError {
  constructor(
    message: string,
    endpoint?: string,
    method?: string,
    public readonly timedOut = false,
    metadata?: Record<string, unknown>,
  ) {
    super(message, 'call', 'RPC_CALL_ERROR', endpoint, method, { ...metadata, timedOut });
  }
}

/**
 * A remote result was not a well-formed hexadecimal quantity
 */
export class DecodeError extends AppError {
  readonly reason: ProbeFailureReason = 'decode';

  constructor(
    message: string,
    public readonly input: string,
    metadata?: Record<string, unknown>,
  ) {
    super(message, 'DECODE_ERROR', { ...metadata, input });
  }
}

/**
 * Error for configuration issues
 */
export class ConfigurationError extends AppError {
  constructor(
    message: string,
    public readonly configKey?: string,
    metadata?: Record<string, unknown>,
  ) {
    super(message, 'CONFIGURATION_ERROR', { ...metadata, configKey });
  }
}

/**
 * Error for command line arguments the process does not understand
 */
export class UsageError extends AppError {
  constructor(
    message: string,
    public readonly argument: string,
  ) {
    super(message, 'USAGE_ERROR', { argument });
  }
}

/**
 * Read the message off anything thrown
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

/**
 * Utility class for consistent error handling across the application
 */
export class ErrorHandler {
  private readonly logger: Logger;

  constructor(context: string) {
    this.logger = new Logger(context);
  }

  /**
   * Log and wrap an error if it's not already an AppError
   */
  handleError(
    error: unknown,
    defaultMessage = 'An unexpected error occurred',
    metadata?: Record<string, unknown>,
  ): AppError {
    if (error instanceof AppError) {
      this.logger.error(`${error.name}(${error.code}): ${error.message}`, error.stack);
      return error;
    }

    const message = error instanceof Error && error.message ? error.message : defaultMessage;
    const appError = new AppError(message, 'UNKNOWN_ERROR', {
      ...metadata,
      originalError: String(error),
    });

    this.logger.error(`${appError.name}(${appError.code}): ${appError.message}`, appError.stack);
    return appError;
  }

  /**
   * Log a probe failure with the endpoint it belongs to
   */
  handleRpcError(error: RpcError | DecodeError, endpointName: string, url: string): void {
    const detail = error instanceof CallError && error.timedOut ? ' (deadline exceeded)' : '';
    this.logger.error(
      `${error.name}(${error.code}): ${error.message}${detail} [endpoint: ${endpointName}, url: ${url}]`,
    );
  }

  /**
   * Create and log a specific configuration error
   */
  handleConfigError(message: string, configKey?: string, metadata?: Record<string, unknown>): ConfigurationError {
    const error = new ConfigurationError(message, configKey, metadata);
    this.logger.error(`${error.name}(${error.code}): ${message} [config key: ${configKey || 'unknown'}]`, error.stack);
    return error;
  }
}
