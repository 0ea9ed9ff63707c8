/**
 * @fileoverview Standardized error handling utilities.
 *
 * Provides consistent error patterns across the codebase:
 * - AppError: Base class for application-specific errors
 * - StoreError / TimeoutError / ClassificationError: the engine's error kinds
 * - withErrorContext: Wraps operations with consistent error logging
 * - safeExecute: Returns result objects instead of throwing
 */

import { createLogger } from './observability/index.js';

const log = createLogger({ domain: 'errors' });

/**
 * Base class for application-specific errors.
 * Includes error code, recoverability flag, and optional context.
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly recoverable: boolean = false,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AppError';
  }
}

/**
 * The document store could not execute a query: it is unavailable or it
 * rejected the query. The only error kind that crosses the engine boundary.
 */
export class StoreError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'STORE_UNAVAILABLE', true, context);
    this.name = 'StoreError';
  }
}

/** An operation exceeded its time budget. */
export class TimeoutError extends AppError {
  constructor(message: string, public readonly timeoutMs: number) {
    super(message, 'TIMEOUT', true, { timeoutMs });
    this.name = 'TimeoutError';
  }
}

/** The classification collaborator failed or answered outside the schema. */
export class ClassificationError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'CLASSIFICATION_FAILED', true, context);
    this.name = 'ClassificationError';
  }
}

/**
 * Result type for operations that may fail.
 * Prefer this over try-catch when callers need to handle both cases.
 */
export type Result<T> =
  | { success: true; data: T }
  | { success: false; error: string };

/**
 * Extract a printable message from an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Execute an async function with consistent error logging.
 * Errors are logged and re-thrown for the caller to handle.
 */
export async function withErrorContext<T>(
  fn: () => Promise<T>,
  context: string
): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    log.error('operation_failed', {
      operation: context,
      error: errorMessage(error),
      code: error instanceof AppError ? error.code : undefined,
    });
    throw error;
  }
}

/**
 * Execute an async function and return a Result object.
 * Use for operations where the caller wants to handle failure without exceptions.
 */
export async function safeExecute<T>(
  fn: () => Promise<T>,
  context: string
): Promise<Result<T>> {
  try {
    const data = await fn();
    return { success: true, data };
  } catch (error) {
    log.error('operation_failed', {
      operation: context,
      error: errorMessage(error),
      code: error instanceof AppError ? error.code : undefined,
    });
    return {
      success: false,
      error: errorMessage(error),
    };
  }
}
