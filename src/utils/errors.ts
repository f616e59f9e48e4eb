/**
 * Centralized error classification and handling.
 *
 * Provides:
 * - The error kinds a validation pass reports as data
 * - Custom error classes for faults that are thrown (bad schema definitions,
 *   misuse of instance accessors, bad configuration, unreadable input)
 * - Error classification for process exit codes and JSON output
 */

import { ZodError } from 'zod';
import type { ValidationError } from '../types/validation.js';

/**
 * Error codes for programmatic error handling.
 */
export const ErrorCode = {
  // Validation outcomes (returned, never thrown by the engine)
  MISSING_FIELD: 'MISSING_FIELD',
  TYPE_MISMATCH: 'TYPE_MISMATCH',
  CONSTRAINT_VIOLATION: 'CONSTRAINT_VIOLATION',
  BUSINESS_RULE_VIOLATION: 'BUSINESS_RULE_VIOLATION',

  // Programmer errors
  SCHEMA_DEFINITION_ERROR: 'SCHEMA_DEFINITION_ERROR',
  FIELD_ACCESS_ERROR: 'FIELD_ACCESS_ERROR',

  // Caller errors
  INVALID_RECORD: 'INVALID_RECORD',
  INVALID_ARGUMENTS: 'INVALID_ARGUMENTS',
  CONFIGURATION_ERROR: 'CONFIGURATION_ERROR',
  INPUT_ERROR: 'INPUT_ERROR',
  NOT_FOUND: 'NOT_FOUND',

  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode];

/**
 * The four ways a single validation attempt can fail.
 */
export const ErrorKind = {
  MISSING_FIELD: ErrorCode.MISSING_FIELD,
  TYPE_MISMATCH: ErrorCode.TYPE_MISMATCH,
  CONSTRAINT_VIOLATION: ErrorCode.CONSTRAINT_VIOLATION,
  BUSINESS_RULE_VIOLATION: ErrorCode.BUSINESS_RULE_VIOLATION,
} as const;

export type ErrorKind = (typeof ErrorKind)[keyof typeof ErrorKind];

/**
 * Process exit codes used by the CLI
 */
export const ExitCode = {
  OK: 0,
  INVALID_RECORD: 1,
  USAGE: 2,
  INPUT: 3,
  CONFIGURATION: 78,
  INTERNAL: 70,
} as const;

export type ExitCodeType = (typeof ExitCode)[keyof typeof ExitCode];

/**
 * Base error class with error code support
 */
export class RecordRulesError extends Error {
  public readonly code: ErrorCodeType;
  public readonly exitCode: ExitCodeType;
  public readonly details: Record<string, unknown> | undefined;

  constructor(
    message: string,
    code: ErrorCodeType,
    options?: {
      exitCode?: ExitCodeType;
      details?: Record<string, unknown> | undefined;
      cause?: unknown;
    }
  ) {
    super(message, { cause: options?.cause });
    this.name = 'RecordRulesError';
    this.code = code;
    this.exitCode = options?.exitCode ?? this.defaultExitCode(code);
    this.details = options?.details;
  }

  private defaultExitCode(code: ErrorCodeType): ExitCodeType {
    switch (code) {
      case ErrorCode.MISSING_FIELD:
      case ErrorCode.TYPE_MISMATCH:
      case ErrorCode.CONSTRAINT_VIOLATION:
      case ErrorCode.BUSINESS_RULE_VIOLATION:
      case ErrorCode.INVALID_RECORD:
        return ExitCode.INVALID_RECORD;
      case ErrorCode.INVALID_ARGUMENTS:
      case ErrorCode.NOT_FOUND:
        return ExitCode.USAGE;
      case ErrorCode.INPUT_ERROR:
        return ExitCode.INPUT;
      case ErrorCode.CONFIGURATION_ERROR:
        return ExitCode.CONFIGURATION;
      default:
        return ExitCode.INTERNAL;
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      error: true,
      code: this.code,
      message: this.message,
      exitCode: this.exitCode,
      ...(this.details && { details: this.details }),
    };
  }
}

/**
 * Thrown by `validateOrThrow` when a record fails validation.
 * Carries the single validation error of the failed pass.
 */
export class InvalidRecordError extends RecordRulesError {
  public readonly validationError: ValidationError;

  constructor(schemaName: string, validationError: ValidationError) {
    const line = validationError.field === null
      ? validationError.message
      : `${validationError.field}: ${validationError.message}`;
    super(`Invalid ${schemaName}: ${line}`, ErrorCode.INVALID_RECORD, {
      details: {
        schema: schemaName,
        field: validationError.field,
        kind: validationError.code,
      },
    });
    this.name = 'InvalidRecordError';
    this.validationError = validationError;
  }
}

/**
 * Thrown while building a schema whose declaration is inconsistent
 */
export class SchemaDefinitionError extends RecordRulesError {
  constructor(
    schemaName: string,
    message: string,
    issues?: Array<{ path: string; message: string }>
  ) {
    super(`Invalid schema definition '${schemaName}': ${message}`, ErrorCode.SCHEMA_DEFINITION_ERROR, {
      details: { schema: schemaName, ...(issues && { issues }) },
    });
    this.name = 'SchemaDefinitionError';
  }

  static fromZodError(schemaName: string, error: ZodError): SchemaDefinitionError {
    const issues = error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    return new SchemaDefinitionError(
      schemaName,
      issues.map((i) => (i.path ? `${i.path}: ${i.message}` : i.message)).join(', '),
      issues
    );
  }
}

/**
 * Thrown when rule code reads a field that was not declared,
 * or reads it as the wrong type
 */
export class FieldAccessError extends RecordRulesError {
  constructor(schemaName: string, field: string, message: string) {
    super(`${schemaName}.${field}: ${message}`, ErrorCode.FIELD_ACCESS_ERROR, {
      details: { schema: schemaName, field },
    });
    this.name = 'FieldAccessError';
  }
}

/**
 * Error thrown when configuration values are invalid
 */
export class ConfigurationError extends RecordRulesError {
  constructor(
    message: string,
    issues?: Array<{ path: string; message: string }>
  ) {
    super(message, ErrorCode.CONFIGURATION_ERROR, issues ? { details: { issues } } : undefined);
    this.name = 'ConfigurationError';
  }

  static fromZodError(error: ZodError): ConfigurationError {
    const issues = error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    return new ConfigurationError(
      `Invalid configuration: ${issues.map((i) => `${i.path}: ${i.message}`).join(', ')}`,
      issues
    );
  }
}

/**
 * Error thrown when an input document cannot be read or parsed
 */
export class InputError extends RecordRulesError {
  constructor(source: string, message: string, cause?: unknown) {
    super(`Cannot read ${source}: ${message}`, ErrorCode.INPUT_ERROR, {
      details: { source },
      cause,
    });
    this.name = 'InputError';
  }
}

/**
 * Error thrown when a requested resource is not found
 */
export class NotFoundError extends RecordRulesError {
  constructor(
    resourceType: string,
    resourceId: string,
    details?: Record<string, unknown>
  ) {
    super(`${resourceType} not found: ${resourceId}`, ErrorCode.NOT_FOUND, {
      details: {
        resourceType,
        resourceId,
        ...details,
      },
    });
    this.name = 'NotFoundError';
  }
}

/**
 * Error thrown for malformed command-line arguments
 */
export class UsageError extends RecordRulesError {
  constructor(message: string) {
    super(message, ErrorCode.INVALID_ARGUMENTS);
    this.name = 'UsageError';
  }
}

/**
 * Classify an error and return an appropriate RecordRulesError.
 * This normalizes all errors to a consistent format.
 */
export function classifyError(error: unknown): RecordRulesError {
  if (error instanceof RecordRulesError) {
    return error;
  }

  if (error instanceof ZodError) {
    return ConfigurationError.fromZodError(error);
  }

  if (error instanceof Error) {
    return new RecordRulesError(error.message, ErrorCode.INTERNAL_ERROR, {
      cause: error,
    });
  }

  return new RecordRulesError(
    'An unexpected error occurred',
    ErrorCode.INTERNAL_ERROR,
    {
      details: { originalError: String(error) },
    }
  );
}

/**
 * Create a structured error body for JSON output.
 */
export function createErrorResponse(
  error: unknown,
  runId?: string
): Record<string, unknown> {
  const classified = classifyError(error);
  return {
    ...classified.toJSON(),
    ...(runId && { runId }),
  };
}
