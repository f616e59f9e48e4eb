import { z } from 'zod';
import type { PresenceConstraint, ValueConstraint } from './constraint.js';
import type { RecordSchema } from './schema.js';

/**
 * Primitive value types a field can declare
 */
export const PrimitiveTypeSchema = z.enum([
  'string',
  'integer',   // Finite whole numbers
  'number',    // Finite numbers
  'boolean',
  'timestamp', // Date instances
]);

export type PrimitiveType = z.infer<typeof PrimitiveTypeSchema>;

/**
 * A field holding a single nested record.
 */
export interface RecordRef {
  readonly kind: 'record';
  readonly schema: RecordSchema;
}

/**
 * A field holding an ordered, bounded sequence of nested records.
 */
export interface ListRef {
  readonly kind: 'list';
  readonly of: RecordSchema;
}

export type FieldType = PrimitiveType | RecordRef | ListRef;

/**
 * A named, typed slot in a record.
 */
export interface FieldDescriptor {
  readonly name: string;
  readonly type: FieldType;
  /** `required`, or `optional` with the default substituted on absence */
  readonly presence: PresenceConstraint;
  /** Value constraints, checked in declaration order */
  readonly constraints: readonly ValueConstraint[];
}
