/**
 * Type Definitions
 *
 * Central export for all types used across the engine.
 */

// Constraint types
export type {
  Scalar,
  RangeConstraint,
  LengthConstraint,
  OneOfConstraint,
  RequiredConstraint,
  OptionalConstraint,
  ValueConstraint,
  PresenceConstraint,
  Constraint,
  CheckResult,
} from './constraint.js';

// Field types
export {
  type PrimitiveType,
  type RecordRef,
  type ListRef,
  type FieldType,
  type FieldDescriptor,
  PrimitiveTypeSchema,
} from './field.js';

// Schema types
export type { RuleOutcome, ModelRule, RecordSchema } from './schema.js';

// Validation outcome types
export type {
  FieldValue,
  RecordInput,
  ValidationError,
  ValidationResult,
  ValidationReport,
  ValidationMode,
} from './validation.js';
