import { z } from 'zod';
import type { FieldDescriptor } from '../types/field.js';
import type { ModelRule, RecordSchema } from '../types/schema.js';
import { SchemaDefinitionError } from '../utils/errors.js';

function uniqueNames(label: string) {
  return z.array(z.string().min(1)).superRefine((names, ctx) => {
    const seen = new Set<string>();
    names.forEach((name, index) => {
      if (seen.has(name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [index],
          message: `duplicate ${label} '${name}'`,
        });
      }
      seen.add(name);
    });
  });
}

const DeclarationSchema = z.object({
  name: z.string().min(1, 'schema name must not be empty'),
  fields: uniqueNames('field'),
  rules: uniqueNames('rule'),
});

/**
 * Declare a record schema. Fields are checked in the given order, then rules.
 * The returned schema is frozen and may be shared between validation calls.
 *
 * @throws {SchemaDefinitionError} On an empty name or duplicate field/rule names
 */
export function defineSchema(
  name: string,
  declaration: {
    fields: readonly FieldDescriptor[];
    rules?: readonly ModelRule[];
  }
): RecordSchema {
  const rules = declaration.rules ?? [];
  const checked = DeclarationSchema.safeParse({
    name,
    fields: declaration.fields.map((field) => field.name),
    rules: rules.map((rule) => rule.name),
  });
  if (!checked.success) {
    throw SchemaDefinitionError.fromZodError(name, checked.error);
  }

  return Object.freeze({
    name,
    fields: Object.freeze([...declaration.fields]),
    rules: Object.freeze([...rules]),
  });
}

/**
 * Look up a field descriptor by name.
 */
export function getField(schema: RecordSchema, name: string): FieldDescriptor | undefined {
  return schema.fields.find((field) => field.name === name);
}
