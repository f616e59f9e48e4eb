/**
 * Field descriptor builders.
 *
 * Each builder takes the field name followed by its constraints in the order
 * they should be checked. A `required()` or `optional(default)` constraint may
 * appear anywhere in the list; without one the field is required.
 */

import { z } from 'zod';
import type { Constraint, PresenceConstraint, ValueConstraint } from '../types/constraint.js';
import type { FieldDescriptor, FieldType } from '../types/field.js';
import type { RecordSchema } from '../types/schema.js';
import { SchemaDefinitionError } from '../utils/errors.js';
import { coercePrimitive } from './coerce.js';
import { optional, required } from './constraints.js';

const FieldNameSchema = z
  .string()
  .regex(/^[A-Za-z_][A-Za-z0-9_]*$/, 'field names must be identifiers');

const BoundsSchema = z
  .object({
    min: z.number().finite(),
    max: z.number().finite(),
  })
  .refine((bounds) => bounds.min <= bounds.max, { message: 'min must not exceed max' });

const LengthBoundsSchema = z.object({
  min: z.number().int().nonnegative(),
  max: z.number().int().nonnegative(),
});

function typeLabel(type: FieldType): string {
  return typeof type === 'string' ? type : type.kind;
}

function checkApplicable(name: string, type: FieldType, constraint: ValueConstraint): void {
  const label = typeLabel(type);
  const applicable = {
    range: label === 'integer' || label === 'number',
    length: label === 'string' || label === 'list',
    oneOf: label === 'string' || label === 'integer' || label === 'number' || label === 'boolean',
  }[constraint.kind];

  if (!applicable) {
    throw new SchemaDefinitionError(name, `${constraint.kind} does not apply to ${label} fields`);
  }
}

function checkParameters(name: string, constraint: ValueConstraint): void {
  if (constraint.kind === 'oneOf') {
    if (constraint.allowed.length === 0) {
      throw new SchemaDefinitionError(name, 'oneOf needs at least one allowed value');
    }
    return;
  }

  const bounds = BoundsSchema.safeParse(constraint);
  if (!bounds.success) {
    throw SchemaDefinitionError.fromZodError(name, bounds.error);
  }
  if (constraint.kind === 'length') {
    const lengths = LengthBoundsSchema.safeParse(constraint);
    if (!lengths.success) {
      throw SchemaDefinitionError.fromZodError(name, lengths.error);
    }
  }
}

/**
 * Resolve the presence constraint, coercing a non-null default to the field type.
 */
function resolvePresence(
  name: string,
  type: FieldType,
  presence: PresenceConstraint[]
): PresenceConstraint {
  if (presence.length > 1) {
    throw new SchemaDefinitionError(name, 'a field takes at most one required/optional constraint');
  }
  const declared = presence[0] ?? required();
  if (declared.kind === 'required' || declared.default === null) {
    return declared;
  }
  if (typeof type !== 'string') {
    throw new SchemaDefinitionError(name, `${type.kind} fields only take a null default`);
  }
  const coerced = coercePrimitive(type, declared.default);
  if (!coerced.ok) {
    throw new SchemaDefinitionError(name, `default does not match the ${type} type`);
  }
  return optional(coerced.value);
}

/**
 * Declare a field.
 *
 * @throws {SchemaDefinitionError} If the name is not an identifier, a constraint
 *   does not apply to the type, bounds are inverted, or the default has the wrong type
 */
export function defineField(name: string, type: FieldType, ...constraints: Constraint[]): FieldDescriptor {
  const parsedName = FieldNameSchema.safeParse(name);
  if (!parsedName.success) {
    throw SchemaDefinitionError.fromZodError(name, parsedName.error);
  }

  const presence: PresenceConstraint[] = [];
  const values: ValueConstraint[] = [];
  for (const constraint of constraints) {
    if (constraint.kind === 'required' || constraint.kind === 'optional') {
      presence.push(constraint);
    } else {
      checkApplicable(name, type, constraint);
      checkParameters(name, constraint);
      values.push(constraint);
    }
  }

  return Object.freeze({
    name,
    type,
    presence: resolvePresence(name, type, presence),
    constraints: Object.freeze(values),
  });
}

export function stringField(name: string, ...constraints: Constraint[]): FieldDescriptor {
  return defineField(name, 'string', ...constraints);
}

export function integerField(name: string, ...constraints: Constraint[]): FieldDescriptor {
  return defineField(name, 'integer', ...constraints);
}

export function numberField(name: string, ...constraints: Constraint[]): FieldDescriptor {
  return defineField(name, 'number', ...constraints);
}

export function booleanField(name: string, ...constraints: Constraint[]): FieldDescriptor {
  return defineField(name, 'boolean', ...constraints);
}

export function timestampField(name: string, ...constraints: Constraint[]): FieldDescriptor {
  return defineField(name, 'timestamp', ...constraints);
}

/**
 * A field holding one nested record of the given schema.
 */
export function recordField(name: string, schema: RecordSchema, ...constraints: Constraint[]): FieldDescriptor {
  return defineField(name, { kind: 'record', schema }, ...constraints);
}

/**
 * A field holding an ordered list of records; a `length` constraint bounds
 * the element count.
 */
export function listField(name: string, of: RecordSchema, ...constraints: Constraint[]): FieldDescriptor {
  return defineField(name, { kind: 'list', of }, ...constraints);
}

export function isOptional(field: FieldDescriptor): boolean {
  return field.presence.kind === 'optional';
}
