import type { ValidatedInstance } from '../engines/instance.js';
import type { FieldDescriptor } from './field.js';

/**
 * Outcome of evaluating a model rule.
 */
export type RuleOutcome = { ok: true } | { ok: false; message: string };

/**
 * Cross-field predicate evaluated once every field has passed on its own.
 * Rules must be pure: they read the instance and never mutate anything.
 */
export interface ModelRule {
  readonly name: string;
  evaluate(instance: ValidatedInstance): RuleOutcome;
}

/**
 * Ordered field descriptors (unique names) plus ordered model rules.
 */
export interface RecordSchema {
  readonly name: string;
  readonly fields: readonly FieldDescriptor[];
  readonly rules: readonly ModelRule[];
}
