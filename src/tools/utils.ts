/**
 * Shared utilities for tool handlers.
 */

import { StoreError, errorMessage } from '../utils/errors.js';

/**
 * Create a standard error result.
 */
export function errorResult(error: unknown): Record<string, unknown> {
  return {
    success: false,
    error: errorMessage(error),
  };
}

/**
 * Error result for a failed engine call. Store failures are reported as
 * "<prefix>: <message>" so the caller can tell them from input errors.
 */
export function failureResult(error: unknown, prefix: string): Record<string, unknown> {
  if (error instanceof StoreError) {
    return { success: false, error: `${prefix}: ${error.message}` };
  }
  return errorResult(error);
}

/**
 * Field specification for validateInput.
 */
export interface FieldSpec {
  type: 'string' | 'number' | 'boolean' | 'array' | 'object';
  required: boolean;
  /** Reject empty/whitespace-only strings. Defaults to true for required strings. */
  nonEmpty?: boolean;
  /** Custom validator returning an error message or null if valid. */
  validate?: (value: unknown) => string | null;
}

/**
 * Validate tool input fields against a specification.
 * Returns an error result object if validation fails, or null if input is valid.
 */
export function validateInput(
  input: Record<string, unknown>,
  spec: Record<string, FieldSpec>
): Record<string, unknown> | null {
  for (const [field, fieldSpec] of Object.entries(spec)) {
    const value = input[field];

    if (fieldSpec.required) {
      if (value === undefined || value === null) {
        return { success: false, error: `${field} is required.` };
      }
    } else if (value === undefined || value === null) {
      continue;
    }

    if (fieldSpec.type === 'array') {
      if (!Array.isArray(value)) {
        return { success: false, error: `${field} must be an array.` };
      }
    } else if (fieldSpec.type === 'object') {
      if (typeof value !== 'object' || Array.isArray(value)) {
        return { success: false, error: `${field} must be an object.` };
      }
    } else if (typeof value !== fieldSpec.type) {
      return { success: false, error: `${field} must be a ${fieldSpec.type}.` };
    }

    const nonEmpty = fieldSpec.nonEmpty ?? (fieldSpec.required && fieldSpec.type === 'string');
    if (nonEmpty && typeof value === 'string' && !value.trim()) {
      return { success: false, error: `${field} must be a non-empty string.` };
    }

    if (fieldSpec.validate) {
      const customError = fieldSpec.validate(value);
      if (customError) {
        return { success: false, error: customError };
      }
    }
  }

  return null;
}

/**
 * Validator for a value drawn from a closed set.
 */
export function oneOf(allowed: readonly string[], field: string): (value: unknown) => string | null {
  return (value) =>
    allowed.some((option) => option === value)
      ? null
      : `${field} must be one of: ${allowed.join(', ')}.`;
}

/** Validator for a positive integer. */
export function positiveInteger(field: string): (value: unknown) => string | null {
  return (value) =>
    typeof value === 'number' && Number.isInteger(value) && value > 0
      ? null
      : `${field} must be a positive integer.`;
}

/** Validator for an array of strings. */
export function stringArray(field: string): (value: unknown) => string | null {
  return (value) =>
    Array.isArray(value) && value.every((item) => typeof item === 'string')
      ? null
      : `${field} must be an array of strings.`;
}

// Typed readers for validated input.

export function readString(input: Record<string, unknown>, field: string): string | undefined {
  const value = input[field];
  return typeof value === 'string' ? value : undefined;
}

export function readNumber(input: Record<string, unknown>, field: string): number | undefined {
  const value = input[field];
  return typeof value === 'number' ? value : undefined;
}

export function readBoolean(input: Record<string, unknown>, field: string): boolean | undefined {
  const value = input[field];
  return typeof value === 'boolean' ? value : undefined;
}

export function readStringArray(input: Record<string, unknown>, field: string): string[] | undefined {
  const value = input[field];
  return Array.isArray(value) ? value.filter((item): item is string => typeof item === 'string') : undefined;
}

/** Narrow a string to a member of `allowed`, or undefined. */
export function readEnum<T extends string>(
  input: Record<string, unknown>,
  field: string,
  allowed: readonly T[]
): T | undefined {
  const value = input[field];
  return allowed.find((option) => option === value);
}
