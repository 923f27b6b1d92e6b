/**
 * Automation Error Types
 *
 * Structured error types carrying a code and optional details
 */

import { ErrorCode } from './error-codes.js';

export interface StructuredError {
  error: string;
  code: ErrorCode;
  details?: Record<string, unknown>;
  stack?: string;
}

/**
 * Base error class
 */
export class AutomationError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode = ErrorCode.UNKNOWN_ERROR,
    public readonly details?: Record<string, unknown>,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'AutomationError';

    // Maintain proper stack trace for where error was thrown (V8 only)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, AutomationError);
    }
  }

  /**
   * Convert to a plain object for logs and CLI output
   */
  toStructured(): StructuredError {
    return {
      error: this.message,
      code: this.code,
      details: this.details,
      stack: this.stack,
    };
  }

  /**
   * Wrap any thrown value, keeping AutomationErrors as they are
   */
  static fromError(error: unknown, code: ErrorCode = ErrorCode.UNKNOWN_ERROR): AutomationError {
    if (error instanceof AutomationError) return error;
    if (error instanceof Error) {
      return new AutomationError(error.message, code, undefined, error);
    }
    return new AutomationError(String(error), code);
  }
}

/**
 * Domain-specific error classes
 */

export class DomTreeError extends AutomationError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCode.PAGE_EVALUATION_FAILED,
    details?: Record<string, unknown>,
    cause?: Error,
  ) {
    super(message, code, details, cause);
    this.name = 'DomTreeError';
  }
}

export class BrowserError extends AutomationError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCode.BROWSER_LAUNCH_FAILED,
    details?: Record<string, unknown>,
    cause?: Error,
  ) {
    super(message, code, details, cause);
    this.name = 'BrowserError';
  }
}

export class ConfigError extends AutomationError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCode.INVALID_ARGUMENT, details);
    this.name = 'ConfigError';
  }
}

/**
 * Message of any thrown value
 */
export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
