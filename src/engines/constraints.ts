/**
 * Constraint primitives: constructors and the single `checkConstraint` entry point.
 */

import type {
  CheckResult,
  Constraint,
  LengthConstraint,
  OneOfConstraint,
  OptionalConstraint,
  RangeConstraint,
  RequiredConstraint,
  Scalar,
} from '../types/constraint.js';
import type { FieldValue } from '../types/validation.js';
import { describeValue } from './format.js';

const PASS: CheckResult = Object.freeze({ ok: true });

function fail(reason: string): CheckResult {
  return { ok: false, reason };
}

export function range(min: number, max: number): RangeConstraint {
  return Object.freeze({ kind: 'range', min, max });
}

export function length(min: number, max: number): LengthConstraint {
  return Object.freeze({ kind: 'length', min, max });
}

export function oneOf(allowed: readonly Scalar[]): OneOfConstraint {
  return Object.freeze({ kind: 'oneOf', allowed: Object.freeze([...allowed]) });
}

export function required(): RequiredConstraint {
  return Object.freeze({ kind: 'required' });
}

/**
 * Mark a field optional. Without a default, absence yields `null`.
 */
export function optional(defaultValue: FieldValue = null): OptionalConstraint {
  return Object.freeze({ kind: 'optional', default: defaultValue });
}

/**
 * Absent means `undefined` or `null`.
 */
export function isAbsent(value: unknown): value is undefined | null {
  return value === undefined || value === null;
}

/**
 * Check a single value against a single constraint.
 *
 * Strings are measured in code points, lists in elements.
 */
export function checkConstraint(constraint: Constraint, value: unknown): CheckResult {
  switch (constraint.kind) {
    case 'required':
      return isAbsent(value) ? fail('field is required') : PASS;

    case 'optional':
      return PASS;

    case 'range': {
      if (typeof value !== 'number') {
        return fail(`must be a number to check its range, received ${describeValue(value)}`);
      }
      return value < constraint.min || value > constraint.max
        ? fail(`must be between ${constraint.min} and ${constraint.max}, received ${describeValue(value)}`)
        : PASS;
    }

    case 'length': {
      if (Array.isArray(value)) {
        return value.length < constraint.min || value.length > constraint.max
          ? fail(`must contain between ${constraint.min} and ${constraint.max} items, received ${value.length}`)
          : PASS;
      }
      if (typeof value === 'string') {
        const count = Array.from(value).length;
        return count < constraint.min || count > constraint.max
          ? fail(`length must be between ${constraint.min} and ${constraint.max} characters, received ${count}`)
          : PASS;
      }
      return fail(`must be a string or a list to check its length, received ${describeValue(value)}`);
    }

    case 'oneOf': {
      const member = constraint.allowed.some((allowed) => allowed === value);
      return member
        ? PASS
        : fail(`must be one of ${constraint.allowed.map(describeValue).join(', ')}, received ${describeValue(value)}`);
    }
  }
}
