/**
 * Composition of validators for record and list fields.
 */

import type { FieldDescriptor } from '../types/field.js';
import type { RecordSchema } from '../types/schema.js';
import type { RecordInput, ValidationError, ValidationMode } from '../types/validation.js';
import { ErrorKind } from '../utils/errors.js';
import { fieldFailure, firstConstraintViolation, type FieldOutcome, type NonEmpty } from './field-validator.js';
import { describeValue } from './format.js';
import { ValidatedInstance } from './instance.js';
import { runValidation } from './record-validator.js';

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function toRecordInput(raw: unknown): RecordInput | undefined {
  if (raw instanceof ValidatedInstance) return raw.toInput();
  return isPlainRecord(raw) ? raw : undefined;
}

/**
 * Prefix a nested error with the path of the field holding the record.
 * A nested rule violation (no field) is attributed to the record itself.
 */
export function relabel(error: ValidationError, path: string): ValidationError {
  return {
    ...error,
    field: error.field === null ? path : `${path}.${error.field}`,
  };
}

function relabelAll(errors: NonEmpty<ValidationError>, path: string): NonEmpty<ValidationError> {
  const [first, ...rest] = errors;
  return [relabel(first, path), ...rest.map((error) => relabel(error, path))];
}

/**
 * Validate a mapping against a nested schema, labelling failures with `path`.
 */
export function validateNestedRecord(
  path: string,
  schema: RecordSchema,
  raw: unknown,
  mode: ValidationMode
): FieldOutcome {
  const input = toRecordInput(raw);
  if (!input) {
    return fieldFailure(path, ErrorKind.TYPE_MISMATCH, `expected record, received ${describeValue(raw)}`);
  }

  const outcome = runValidation(schema, input, mode);
  return outcome.ok
    ? { ok: true, value: outcome.instance }
    : { ok: false, errors: relabelAll(outcome.errors, path) };
}

/**
 * Validate a bounded list: element count first, then each element in order.
 * Elements are labelled `field[index]`.
 */
export function validateCollection(
  field: FieldDescriptor,
  of: RecordSchema,
  raw: unknown,
  mode: ValidationMode
): FieldOutcome {
  if (!Array.isArray(raw)) {
    return fieldFailure(field.name, ErrorKind.TYPE_MISMATCH, `expected list, received ${describeValue(raw)}`);
  }
  const elements: readonly unknown[] = raw;

  const countViolation = firstConstraintViolation(field, elements);
  if (countViolation) {
    return { ok: false, errors: [countViolation] };
  }

  const items: ValidatedInstance[] = [];
  const errors: ValidationError[] = [];
  for (const [index, element] of elements.entries()) {
    const outcome = validateNestedRecord(`${field.name}[${index}]`, of, element, mode);
    if (!outcome.ok) {
      errors.push(...outcome.errors);
      if (mode === 'fail-fast') break;
    } else if (outcome.value instanceof ValidatedInstance) {
      items.push(outcome.value);
    }
  }

  const [first, ...rest] = errors;
  return first ? { ok: false, errors: [first, ...rest] } : { ok: true, value: items };
}
