import type { FieldValue } from './validation.js';

/**
 * Scalar values an enumerated constraint can list.
 */
export type Scalar = string | number | boolean;

/**
 * Inclusive numeric bounds.
 */
export interface RangeConstraint {
  readonly kind: 'range';
  readonly min: number;
  readonly max: number;
}

/**
 * Inclusive bounds on the number of characters in a string,
 * or the number of elements in a list.
 */
export interface LengthConstraint {
  readonly kind: 'length';
  readonly min: number;
  readonly max: number;
}

/**
 * Enumerated membership, compared with strict equality.
 */
export interface OneOfConstraint {
  readonly kind: 'oneOf';
  readonly allowed: readonly Scalar[];
}

export interface RequiredConstraint {
  readonly kind: 'required';
}

export interface OptionalConstraint {
  readonly kind: 'optional';
  /** Substituted when the value is absent; `null` when the field simply tolerates absence */
  readonly default: FieldValue;
}

/** Constraints applied to a present, already-typed value */
export type ValueConstraint = RangeConstraint | LengthConstraint | OneOfConstraint;

/** Constraints deciding what happens when a value is absent */
export type PresenceConstraint = RequiredConstraint | OptionalConstraint;

export type Constraint = ValueConstraint | PresenceConstraint;

/**
 * Outcome of a single constraint check.
 */
export type CheckResult = { ok: true } | { ok: false; reason: string };
