/**
 * Engine exports
 */

export { range, length, oneOf, required, optional, isAbsent, checkConstraint } from './constraints.js';
export { coercePrimitive, type CoerceResult, type PrimitiveValue } from './coerce.js';
export {
  defineField,
  stringField,
  integerField,
  numberField,
  booleanField,
  timestampField,
  recordField,
  listField,
  isOptional,
} from './field.js';
export { validateField, type FieldOutcome, type NonEmpty } from './field-validator.js';
export { defineSchema, getField } from './schema.js';
export {
  rule,
  prefixRule,
  whenEquals,
  byVariant,
  requiredAbove,
  atLeastOne,
  minProportion,
  everyElement,
  onlyWhen,
  satisfied,
  violation,
} from './rules.js';
export { ValidatedInstance } from './instance.js';
export { validate, collectViolations, validateOrThrow, runValidation, type PassOutcome } from './record-validator.js';
export { relabel } from './nested.js';
export { formatError, formatErrors, describeValue } from './format.js';
