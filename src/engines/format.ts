/**
 * Rendering of validation errors and offending values.
 *
 * Every string produced here is deterministic for a given input so that the
 * same invalid record always yields the same line.
 */

import type { ValidationError } from '../types/validation.js';
import { ValidatedInstance } from './instance.js';

/** Strings longer than this (in code points) are cut in messages */
const MAX_DISPLAY_LENGTH = 60;

/**
 * Control and invisible characters, escaped so a message stays on one line
 */
const CONTROL_CHARS_PATTERN = /[\u0000-\u001F\u007F-\u009F\u200B-\u200F\u2028\u2029\uFEFF]/g;

function escapeControl(input: string): string {
  return input.replace(
    CONTROL_CHARS_PATTERN,
    (ch) => `\\u${ch.charCodeAt(0).toString(16).padStart(4, '0')}`
  );
}

function displayString(value: string): string {
  const codePoints = Array.from(value);
  const shown = codePoints.length > MAX_DISPLAY_LENGTH
    ? `${codePoints.slice(0, MAX_DISPLAY_LENGTH - 3).join('')}...`
    : value;
  return `'${escapeControl(shown)}'`;
}

/**
 * Render any value for inclusion in an error reason.
 *
 * @example
 * describeValue('radio') // => "'radio'"
 * describeValue([1, 2])  // => 'array(2)'
 */
export function describeValue(value: unknown): string {
  if (value === null) return 'null';
  if (value === undefined) return 'undefined';
  if (typeof value === 'string') return displayString(value);
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? 'Invalid Date' : value.toISOString();
  }
  if (value instanceof ValidatedInstance) return `record(${value.schemaName})`;
  if (Array.isArray(value)) return `array(${value.length})`;
  if (typeof value === 'object') return 'object';
  return typeof value;
}

/**
 * Render a validation error as a single line: `<field>: <reason>` for field
 * errors, the rule message verbatim for record-level rule violations.
 */
export function formatError(error: ValidationError): string {
  return error.field === null ? error.message : `${error.field}: ${error.message}`;
}

export function formatErrors(errors: readonly ValidationError[]): string {
  return errors.map(formatError).join('\n');
}
