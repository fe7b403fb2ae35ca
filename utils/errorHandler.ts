/**
 * Unified error handling system
 *
 * Usage:
 * - throw new AppError('Failed to scan folder', ErrorCode.FOLDER_NOT_FOUND)
 * - handleError(error, 'ContextName')
 */

import { logger } from '../services/logger';

/**
 * Error codes for categorization
 */
export enum ErrorCode {
  // State file errors
  STATE_LOAD_FAILED = 'STATE_LOAD_FAILED',
  STATE_SAVE_FAILED = 'STATE_SAVE_FAILED',

  // Instance lock errors
  LOCK_UNAVAILABLE = 'LOCK_UNAVAILABLE',

  // Folder errors
  FOLDER_NOT_FOUND = 'FOLDER_NOT_FOUND',

  // Playlist errors
  INVALID_PERMUTATION = 'INVALID_PERMUTATION',

  // Validation errors
  INVALID_ARGUMENT = 'INVALID_ARGUMENT',
  INVALID_STATE = 'INVALID_STATE',

  // Unknown errors
  UNKNOWN = 'UNKNOWN',
}

/**
 * Application error class with additional context
 */
export class AppError extends Error {
  constructor(
    message: string,
    public code: ErrorCode,
    public recoverable: boolean = true,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AppError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  /**
   * Convert error to plain object for serialization
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      recoverable: this.recoverable,
      details: this.details,
      stack: this.stack,
    };
  }
}

/**
 * The state file exists but cannot be read, parsed or validated
 */
export class StateLoadError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCode.STATE_LOAD_FAILED, true, details);
    this.name = 'StateLoadError';
  }
}

/**
 * Writing or renaming the state file failed; the previous file is intact
 */
export class StateSaveError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCode.STATE_SAVE_FAILED, true, details);
    this.name = 'StateSaveError';
  }
}

export class FolderNotFoundError extends AppError {
  constructor(public readonly folderPath: string, originalError?: Error) {
    super(`Folder not found: ${folderPath}`, ErrorCode.FOLDER_NOT_FOUND, true, {
      folderPath,
      originalError: originalError?.message,
    });
    this.name = 'FolderNotFoundError';
  }
}

function messageOf(error: unknown): string | undefined {
  if (error instanceof Error) {
    return error.message;
  }
  return typeof error === 'string' ? error : undefined;
}

/**
 * Handle and normalize errors
 * @param error - The error to handle
 * @param context - Context where the error occurred
 * @param options - Fallback message and code for non-AppError values
 * @returns Normalized AppError
 */
export function handleError(
  error: unknown,
  context: string,
  options?: { fallbackMessage?: string; code?: ErrorCode }
): AppError {
  const { fallbackMessage = 'An error occurred', code = ErrorCode.UNKNOWN } = options || {};

  // Already an AppError
  if (error instanceof AppError) {
    logger.error(`[${context}]`, error.message, { code: error.code, details: error.details });
    return error;
  }

  // Standard Error
  if (error instanceof Error) {
    const appError = new AppError(
      error.message || fallbackMessage,
      code,
      true,
      { originalMessage: error.message, stack: error.stack }
    );
    logger.error(`[${context}]`, error.message, { stack: error.stack });
    return appError;
  }

  // String error
  if (typeof error === 'string') {
    const appError = new AppError(error, code, true);
    logger.error(`[${context}]`, error);
    return appError;
  }

  // Unknown error type
  const appError = new AppError(fallbackMessage, code, true, { originalError: error });
  logger.error(`[${context}]`, 'Unknown error', error);
  return appError;
}

/**
 * Create an error result object
 */
export interface ErrorResult {
  success: false;
  error: {
    message: string;
    code: ErrorCode;
    recoverable: boolean;
    details?: Record<string, unknown>;
  };
}

/**
 * Create a success result object
 */
export interface SuccessResult<T = unknown> {
  success: true;
  data: T;
}

export type Result<T> = SuccessResult<T> | ErrorResult;

/**
 * Convert an error to an error result object
 */
export function errorResult(error: AppError): ErrorResult {
  return {
    success: false,
    error: {
      message: error.message,
      code: error.code,
      recoverable: error.recoverable,
      details: error.details,
    },
  };
}

export function successResult<T>(data: T): SuccessResult<T> {
  return { success: true, data };
}

/**
 * Type guard for error results
 */
export function isErrorResult(result: unknown): result is ErrorResult {
  return typeof result === 'object' && result !== null && 'success' in result && result.success === false;
}

/**
 * Common error creators
 */
export const Errors = {
  stateLoadFailed: (filePath: string, reason: string, originalError?: unknown) =>
    new StateLoadError(`Failed to load state from ${filePath}: ${reason}`, {
      filePath,
      originalError: messageOf(originalError),
    }),

  stateSaveFailed: (filePath: string, originalError?: unknown) =>
    new StateSaveError(`Failed to save state to ${filePath}`, {
      filePath,
      originalError: messageOf(originalError),
    }),

  lockUnavailable: (lockPath: string, originalError?: unknown) =>
    new AppError(
      `Instance lock unavailable: ${lockPath}`,
      ErrorCode.LOCK_UNAVAILABLE,
      true,
      { lockPath, originalError: messageOf(originalError) }
    ),

  folderNotFound: (folderPath: string, originalError?: Error) =>
    new FolderNotFoundError(folderPath, originalError),

  invalidPermutation: (folderPath: string, trackCount: number) =>
    new AppError(
      `Shuffle order for ${folderPath} is not a permutation of ${trackCount} tracks`,
      ErrorCode.INVALID_PERMUTATION,
      true,
      { folderPath, trackCount }
    ),

  invalidArgument: (argName: string, expectedType: string) =>
    new AppError(
      `Invalid argument: ${argName} (expected ${expectedType})`,
      ErrorCode.INVALID_ARGUMENT,
      true
    ),
};
