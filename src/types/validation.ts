/**
 * Validation types used across the engine.
 */

import type { ValidatedInstance } from '../engines/instance.js';
import type { ErrorKind } from '../utils/errors.js';

/**
 * A typed value held by a validated instance.
 */
export type FieldValue =
  | string
  | number
  | boolean
  | Date
  | ValidatedInstance
  | readonly ValidatedInstance[]
  | null;

/**
 * Raw input handed to the validator. Values are expected to be typed already;
 * anything else is reported as a type mismatch.
 */
export type RecordInput = Readonly<Record<string, unknown>>;

/**
 * A single validation failure.
 */
export interface ValidationError {
  /** Dotted/indexed path of the offending field; null for record-level rule violations */
  field: string | null;
  code: ErrorKind;
  /** The reason for field errors, the rule's message for rule violations */
  message: string;
}

/**
 * Result of a first-failure validation pass.
 */
export type ValidationResult =
  | { valid: true; instance: ValidatedInstance }
  | { valid: false; error: ValidationError };

/**
 * Result of a collect-all validation pass.
 */
export type ValidationReport =
  | { valid: true; instance: ValidatedInstance; errors: [] }
  | { valid: false; errors: ValidationError[] };

export type ValidationMode = 'fail-fast' | 'collect-all';
