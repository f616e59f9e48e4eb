/**
 * Validator orchestration.
 *
 * A pass moves through FieldChecking, then RuleChecking, and ends either
 * Valid or Failed. Nothing is kept between calls; schemas are only read.
 */

import type { RecordSchema } from '../types/schema.js';
import type {
  FieldValue,
  RecordInput,
  ValidationError,
  ValidationMode,
  ValidationReport,
  ValidationResult,
} from '../types/validation.js';
import { ErrorKind, InvalidRecordError } from '../utils/errors.js';
import { validateField, type NonEmpty } from './field-validator.js';
import { createInstance, type ValidatedInstance } from './instance.js';

export type PassOutcome =
  | { ok: true; instance: ValidatedInstance }
  | { ok: false; errors: NonEmpty<ValidationError> };

function readField(input: RecordInput, name: string): unknown {
  return Object.hasOwn(input, name) ? input[name] : undefined;
}

function nonEmpty(errors: ValidationError[]): NonEmpty<ValidationError> | undefined {
  const [first, ...rest] = errors;
  return first ? [first, ...rest] : undefined;
}

/**
 * Run one validation pass. In fail-fast mode the first error ends the pass;
 * in collect-all mode every field is checked (one error per field), and the
 * rules run only when all fields passed.
 */
export function runValidation(schema: RecordSchema, input: RecordInput, mode: ValidationMode): PassOutcome {
  const entries: Array<[string, FieldValue]> = [];
  const fieldErrors: ValidationError[] = [];

  for (const field of schema.fields) {
    const outcome = validateField(field, readField(input, field.name), mode);
    if (outcome.ok) {
      entries.push([field.name, outcome.value]);
      continue;
    }
    if (mode === 'fail-fast') {
      return outcome;
    }
    fieldErrors.push(...outcome.errors);
  }
  const failedFields = nonEmpty(fieldErrors);
  if (failedFields) {
    return { ok: false, errors: failedFields };
  }

  const instance = createInstance(schema.name, entries);
  const ruleErrors: ValidationError[] = [];
  for (const rule of schema.rules) {
    const outcome = rule.evaluate(instance);
    if (outcome.ok) continue;

    const error: ValidationError = {
      field: null,
      code: ErrorKind.BUSINESS_RULE_VIOLATION,
      message: outcome.message,
    };
    if (mode === 'fail-fast') {
      return { ok: false, errors: [error] };
    }
    ruleErrors.push(error);
  }
  const failedRules = nonEmpty(ruleErrors);
  return failedRules ? { ok: false, errors: failedRules } : { ok: true, instance };
}

/**
 * Validate a record, stopping at the first failure.
 *
 * @returns The validated instance, or the single error that stopped the pass
 */
export function validate(schema: RecordSchema, input: RecordInput): ValidationResult {
  const outcome = runValidation(schema, input, 'fail-fast');
  return outcome.ok
    ? { valid: true, instance: outcome.instance }
    : { valid: false, error: outcome.errors[0] };
}

/**
 * Validate a record and report every violation found instead of the first.
 */
export function collectViolations(schema: RecordSchema, input: RecordInput): ValidationReport {
  const outcome = runValidation(schema, input, 'collect-all');
  return outcome.ok
    ? { valid: true, instance: outcome.instance, errors: [] }
    : { valid: false, errors: outcome.errors };
}

/**
 * Validate a record, throwing on failure.
 *
 * @throws {InvalidRecordError} Carrying the first validation error
 */
export function validateOrThrow(schema: RecordSchema, input: RecordInput): ValidatedInstance {
  const result = validate(schema, input);
  if (!result.valid) {
    throw new InvalidRecordError(schema.name, result.error);
  }
  return result.instance;
}
