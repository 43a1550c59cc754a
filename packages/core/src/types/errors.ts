/**
 * Error hierarchy for hostbench
 * Setup and output failures are fatal and carry a stable code; per-test
 * execution failures are recorded in the results instead of thrown.
 */

import { ErrorCode, type Severity, getExitCode } from '../errors/codes.js';

export interface ErrorContext {
  path?: string; // File or directory involved (config file, run directory)
  setting?: string; // Dotted configuration key (e.g. 'network.server_ip')
  command?: string; // Command line of a failed setup step
  suggestion?: string;
  [key: string]: unknown;
}

export interface SerializedError {
  name: string;
  message: string;
  errorCode: ErrorCode;
  severity: Severity;
  context?: ErrorContext;
  stack?: string;
  cause?: { name: string; message: string } | undefined;
}

export interface HostbenchErrorParams {
  message: string;
  errorCode: ErrorCode;
  severity?: Severity;
  context?: ErrorContext;
  cause?: Error;
}

/**
 * Base error class for all hostbench errors
 */
export abstract class HostbenchError extends Error {
  public readonly errorCode: ErrorCode;
  public readonly severity: Severity;
  public readonly context?: ErrorContext;
  public override readonly cause?: Error;

  constructor(params: HostbenchErrorParams) {
    const { message, errorCode, severity = 'error', context, cause } = params;
    super(message, { cause });
    this.name = this.constructor.name;
    this.errorCode = errorCode;
    this.severity = severity;
    this.context = context;
    this.cause = cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Serialize error to JSON for logging and debugging
   * - dev: includes stack
   * - prod: excludes stack
   */
  toJSON(env: 'dev' | 'prod' = 'dev'): SerializedError {
    const base: SerializedError = {
      name: this.name,
      message: this.message,
      errorCode: this.errorCode,
      severity: this.severity,
      context: this.context,
      cause: this.cause
        ? { name: this.cause.name, message: this.cause.message }
        : undefined,
    };

    if (env !== 'prod') {
      base.stack = this.stack;
    }
    return base;
  }

  /** Resolve the process exit code associated with this error */
  getExitCode(): number {
    return getExitCode(this.errorCode);
  }
}

type SubclassParams = Omit<HostbenchErrorParams, 'errorCode'> & {
  errorCode?: ErrorCode;
};

/**
 * Configuration file errors (missing, unreadable, malformed, invalid values)
 */
export class ConfigError extends HostbenchError {
  constructor(params: SubclassParams) {
    super({
      ...params,
      errorCode: params.errorCode ?? ErrorCode.CONFIG_INVALID,
    });
  }

  get setting(): string | undefined {
    return this.context?.setting;
  }
}

/**
 * Host preparation errors (package manager detection, package installation)
 */
export class SetupError extends HostbenchError {
  constructor(params: SubclassParams) {
    super({
      ...params,
      errorCode: params.errorCode ?? ErrorCode.PACKAGE_INSTALL_FAILED,
    });
  }
}

/**
 * Run artifact errors (directory creation, file writes)
 */
export class OutputError extends HostbenchError {
  constructor(params: SubclassParams) {
    super({
      ...params,
      errorCode: params.errorCode ?? ErrorCode.OUTPUT_WRITE_FAILED,
    });
  }
}

/**
 * Wraps errors that escaped without a hostbench classification
 */
export class InternalError extends HostbenchError {
  constructor(params: SubclassParams) {
    super({
      ...params,
      errorCode: params.errorCode ?? ErrorCode.INTERNAL_ERROR,
    });
  }
}

export function isHostbenchError(error: unknown): error is HostbenchError {
  return error instanceof HostbenchError;
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
