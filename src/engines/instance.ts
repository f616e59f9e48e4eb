import type { FieldValue } from '../types/validation.js';
import { FieldAccessError } from '../utils/errors.js';

function isInstanceList(value: FieldValue): value is readonly ValidatedInstance[] {
  return Array.isArray(value);
}

function copyValue(value: FieldValue): FieldValue {
  return value instanceof Date ? new Date(value.getTime()) : value;
}

/** Held only by this module; the constructor refuses any other key */
const constructionKey = Symbol('ValidatedInstance');

type Entries = ReadonlyArray<readonly [string, FieldValue]>;

/**
 * Immutable mapping from field name to typed value.
 *
 * Only the validator builds instances, and only after every field constraint
 * and every model rule has passed. There is no way to change a value
 * afterwards: lists are frozen and timestamps are handed out as copies.
 */
export class ValidatedInstance {
  readonly schemaName: string;
  private readonly values: ReadonlyMap<string, FieldValue>;

  constructor(key: symbol, schemaName: string, entries: Entries) {
    if (key !== constructionKey) {
      throw new TypeError('ValidatedInstance is created by validate(), not directly');
    }
    this.schemaName = schemaName;
    this.values = new Map(
      entries.map(([name, value]): [string, FieldValue] => [
        name,
        isInstanceList(value) ? Object.freeze([...value]) : copyValue(value),
      ])
    );
    Object.freeze(this);
  }

  /** Field names in declaration order */
  fieldNames(): string[] {
    return [...this.values.keys()];
  }

  has(name: string): boolean {
    return this.values.has(name);
  }

  get(name: string): FieldValue {
    if (!this.values.has(name)) {
      throw new FieldAccessError(this.schemaName, name, 'no such field');
    }
    return copyValue(this.values.get(name) ?? null);
  }

  string(name: string): string {
    const value = this.get(name);
    if (typeof value !== 'string') throw this.wrongType(name, 'string');
    return value;
  }

  /** A string field that may hold `null` (an optional field without a default) */
  optionalString(name: string): string | null {
    const value = this.get(name);
    if (value !== null && typeof value !== 'string') throw this.wrongType(name, 'string or null');
    return value;
  }

  number(name: string): number {
    const value = this.get(name);
    if (typeof value !== 'number') throw this.wrongType(name, 'number');
    return value;
  }

  boolean(name: string): boolean {
    const value = this.get(name);
    if (typeof value !== 'boolean') throw this.wrongType(name, 'boolean');
    return value;
  }

  timestamp(name: string): Date {
    const value = this.get(name);
    if (!(value instanceof Date)) throw this.wrongType(name, 'timestamp');
    return value;
  }

  record(name: string): ValidatedInstance {
    const value = this.get(name);
    if (!(value instanceof ValidatedInstance)) throw this.wrongType(name, 'record');
    return value;
  }

  list(name: string): readonly ValidatedInstance[] {
    const value = this.get(name);
    if (value === null || !isInstanceList(value)) throw this.wrongType(name, 'list');
    return value;
  }

  /**
   * Plain input mapping holding the same values.
   * Validating it against the same schema succeeds again.
   */
  toInput(): Record<string, unknown> {
    const input: Record<string, unknown> = {};
    for (const [name, value] of this.values) {
      if (value instanceof ValidatedInstance) {
        input[name] = value.toInput();
      } else if (value !== null && isInstanceList(value)) {
        input[name] = value.map((item) => item.toInput());
      } else {
        input[name] = copyValue(value);
      }
    }
    return input;
  }

  toJSON(): Record<string, unknown> {
    const json: Record<string, unknown> = {};
    for (const [name, value] of this.values) {
      if (value instanceof Date) {
        json[name] = value.toISOString();
      } else if (value instanceof ValidatedInstance) {
        json[name] = value.toJSON();
      } else if (value !== null && isInstanceList(value)) {
        json[name] = value.map((item) => item.toJSON());
      } else {
        json[name] = value;
      }
    }
    return json;
  }

  private wrongType(name: string, expected: string): FieldAccessError {
    return new FieldAccessError(this.schemaName, name, `is not a ${expected}`);
  }
}

/**
 * Engine-internal factory used once a pass has succeeded.
 * Not re-exported from the package entry points.
 */
export function createInstance(schemaName: string, entries: Entries): ValidatedInstance {
  return new ValidatedInstance(constructionKey, schemaName, entries);
}
