import { describe, it, expect } from 'vitest';
import { ErrorKind } from '../utils/errors.js';
import { integerField } from './field.js';
import { describeValue, formatError, formatErrors } from './format.js';
import { validateOrThrow } from './record-validator.js';
import { defineSchema } from './schema.js';

describe('describeValue', () => {
  it('should quote strings', () => {
    expect(describeValue('radio')).toBe("'radio'");
  });

  it('should escape control characters', () => {
    expect(describeValue('a\nb')).toBe("'a\\u000ab'");
  });

  it('should cut long strings', () => {
    expect(describeValue('a'.repeat(70))).toBe(`'${'a'.repeat(57)}...'`);
    expect(describeValue('a'.repeat(60))).toBe(`'${'a'.repeat(60)}'`);
  });

  it('should render scalars, dates and containers', () => {
    expect(describeValue(12.5)).toBe('12.5');
    expect(describeValue(false)).toBe('false');
    expect(describeValue(null)).toBe('null');
    expect(describeValue(undefined)).toBe('undefined');
    expect(describeValue(new Date('2024-05-01T00:00:00Z'))).toBe('2024-05-01T00:00:00.000Z');
    expect(describeValue(new Date(Number.NaN))).toBe('Invalid Date');
    expect(describeValue([1, 2])).toBe('array(2)');
    expect(describeValue({ x: 1 })).toBe('object');
  });

  it('should name the schema of a validated instance', () => {
    const point = defineSchema('point', { fields: [integerField('x')] });
    expect(describeValue(validateOrThrow(point, { x: 1 }))).toBe('record(point)');
  });
});

describe('formatError', () => {
  it('should prefix field errors with the field path', () => {
    expect(
      formatError({
        field: 'crew[0].age',
        code: ErrorKind.CONSTRAINT_VIOLATION,
        message: 'must be between 18 and 80, received 12',
      })
    ).toBe('crew[0].age: must be between 18 and 80, received 12');
  });

  it('should render rule violations verbatim', () => {
    expect(
      formatError({
        field: null,
        code: ErrorKind.BUSINESS_RULE_VIOLATION,
        message: 'All crew members must be active',
      })
    ).toBe('All crew members must be active');
  });

  it('should put one error per line', () => {
    expect(
      formatErrors([
        { field: 'name', code: ErrorKind.MISSING_FIELD, message: 'field is required' },
        { field: null, code: ErrorKind.BUSINESS_RULE_VIOLATION, message: 'Rule failed' },
      ])
    ).toBe('name: field is required\nRule failed');
  });
});
