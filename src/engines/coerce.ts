import { z } from 'zod';
import type { PrimitiveType } from '../types/field.js';

/** Decimal or exponent notation; no hex, no blanks */
const NUMERIC_TEXT = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

/** ISO-8601 date, optionally followed by a time and an offset */
const ISO_TIMESTAMP = /^(\d{4}-\d{2}-\d{2})(?:[T ](\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?)(Z|[+-]\d{2}:?\d{2})?)?$/;

/** The date part names a real calendar day (no rollover such as Feb 30) */
function isCalendarDate(text: string): boolean {
  const [year, month, day] = text.slice(0, 10).split('-').map(Number);
  const probe = new Date(0);
  probe.setUTCFullYear(year, month - 1, day);
  return probe.getUTCFullYear() === year && probe.getUTCMonth() === month - 1 && probe.getUTCDate() === day;
}

/**
 * Read ISO text as an instant. Text without an offset is UTC, whether or not
 * it carries a time, so the result never depends on the host's timezone.
 */
function parseTimestamp(text: string): Date {
  const match = ISO_TIMESTAMP.exec(text);
  if (!match) return new Date(Number.NaN);
  const [, date, time = '00:00', offset = 'Z'] = match;
  const zone = offset === 'Z' || offset.includes(':') ? offset : `${offset.slice(0, 3)}:${offset.slice(3)}`;
  return new Date(`${date}T${time}${zone}`);
}

const numberParser = z
  .union([z.number(), z.string().trim().regex(NUMERIC_TEXT).transform(Number)])
  .pipe(z.number().finite());

/**
 * One zod parser per primitive type. Text forms are accepted for numbers,
 * booleans and timestamps; every other mismatch fails.
 */
const parsers = {
  string: z.string(),
  integer: numberParser.pipe(z.number().int()),
  number: numberParser,
  boolean: z.union([
    z.boolean(),
    z.enum(['true', 'false']).transform((text) => text === 'true'),
  ]),
  timestamp: z
    .union([
      z.date(),
      z.string().trim().regex(ISO_TIMESTAMP).refine(isCalendarDate).transform(parseTimestamp),
    ])
    .pipe(z.date()),
} satisfies Record<PrimitiveType, z.ZodTypeAny>;

export type PrimitiveValue = string | number | boolean | Date;

export type CoerceResult =
  | { ok: true; value: PrimitiveValue }
  | { ok: false };

/**
 * Interpret a raw value as the declared primitive type.
 */
export function coercePrimitive(type: PrimitiveType, raw: unknown): CoerceResult {
  const parsed = parsers[type].safeParse(raw);
  return parsed.success ? { ok: true, value: parsed.data } : { ok: false };
}
