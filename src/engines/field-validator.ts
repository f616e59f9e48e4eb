import type { FieldDescriptor } from '../types/field.js';
import type { FieldValue, ValidationError, ValidationMode } from '../types/validation.js';
import { ErrorKind } from '../utils/errors.js';
import { coercePrimitive } from './coerce.js';
import { checkConstraint, isAbsent } from './constraints.js';
import { describeValue } from './format.js';
import { validateCollection, validateNestedRecord } from './nested.js';

/** At least one element */
export type NonEmpty<T> = [T, ...T[]];

export type FieldOutcome =
  | { ok: true; value: FieldValue }
  | { ok: false; errors: NonEmpty<ValidationError> };

export function fieldFailure(field: string, code: ErrorKind, message: string): FieldOutcome & { ok: false } {
  return { ok: false, errors: [{ field, code, message }] };
}

/**
 * First value constraint of the field that the value fails, if any.
 */
export function firstConstraintViolation(field: FieldDescriptor, value: unknown): ValidationError | undefined {
  for (const constraint of field.constraints) {
    const check = checkConstraint(constraint, value);
    if (!check.ok) {
      return { field: field.name, code: ErrorKind.CONSTRAINT_VIOLATION, message: check.reason };
    }
  }
  return undefined;
}

/**
 * Validate one raw value against its descriptor:
 * presence, then type, then each constraint in declaration order.
 *
 * A substituted default is returned as-is; no constraint runs against it.
 * Record and list fields delegate to the nested validator, whose errors come
 * back labelled with this field's path.
 */
export function validateField(
  field: FieldDescriptor,
  raw: unknown,
  mode: ValidationMode = 'fail-fast'
): FieldOutcome {
  if (isAbsent(raw)) {
    const presence = field.presence;
    if (presence.kind === 'optional') {
      return { ok: true, value: presence.default };
    }
    const check = checkConstraint(presence, raw);
    return fieldFailure(field.name, ErrorKind.MISSING_FIELD, check.ok ? 'field is required' : check.reason);
  }

  const type = field.type;
  if (typeof type !== 'string') {
    return type.kind === 'record'
      ? validateNestedRecord(field.name, type.schema, raw, mode)
      : validateCollection(field, type.of, raw, mode);
  }

  const coerced = coercePrimitive(type, raw);
  if (!coerced.ok) {
    return fieldFailure(field.name, ErrorKind.TYPE_MISMATCH, `expected ${type}, received ${describeValue(raw)}`);
  }

  const violation = firstConstraintViolation(field, coerced.value);
  if (violation) {
    return { ok: false, errors: [violation] };
  }
  return { ok: true, value: coerced.value };
}
