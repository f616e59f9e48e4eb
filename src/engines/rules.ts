/**
 * Model rule builders.
 *
 * Each builder returns a named, pure rule over a fully field-valid instance.
 * List rules read a list field of nested records.
 */

import type { z } from 'zod';
import type { Scalar } from '../types/constraint.js';
import type { ModelRule, RuleOutcome } from '../types/schema.js';
import { FieldAccessError } from '../utils/errors.js';
import type { ValidatedInstance } from './instance.js';

type Predicate = (instance: ValidatedInstance) => boolean;

const PASS: RuleOutcome = Object.freeze({ ok: true });

export function satisfied(): RuleOutcome {
  return PASS;
}

export function violation(message: string): RuleOutcome {
  return { ok: false, message };
}

/**
 * A rule that holds when `predicate` returns true.
 */
export function rule(name: string, message: string, predicate: Predicate): ModelRule {
  return Object.freeze({
    name,
    evaluate: (instance: ValidatedInstance) => (predicate(instance) ? PASS : violation(message)),
  });
}

/**
 * A string field must start with a literal prefix (case-sensitive).
 */
export function prefixRule(field: string, prefix: string, message = `${field} must start with '${prefix}'`): ModelRule {
  return rule(`${field}-prefix`, message, (instance) => instance.string(field).startsWith(prefix));
}

/**
 * When `field` equals `equals`, `require` must hold.
 */
export function whenEquals(
  name: string,
  options: { field: string; equals: Scalar; require: Predicate; message: string }
): ModelRule {
  return rule(name, options.message, (instance) =>
    instance.get(options.field) !== options.equals || options.require(instance)
  );
}

/**
 * One requirement per member of an enumeration. The handler table must name
 * every member, so adding a member to the enumeration fails to compile until
 * its requirement is stated.
 */
export function byVariant<T extends [string, ...string[]]>(
  name: string,
  field: string,
  variants: z.ZodEnum<T>,
  handlers: Record<T[number], (instance: ValidatedInstance) => RuleOutcome>
): ModelRule {
  return Object.freeze({
    name,
    evaluate: (instance: ValidatedInstance) => {
      const variant = variants.safeParse(instance.string(field));
      if (!variant.success) {
        throw new FieldAccessError(instance.schemaName, field, `is not one of ${variants.options.join(', ')}`);
      }
      const handler: (instance: ValidatedInstance) => RuleOutcome = handlers[variant.data];
      return handler(instance);
    },
  });
}

/**
 * When the numeric `field` exceeds `threshold`, the optional `requires` field
 * becomes mandatory: it must hold a value other than null or the empty string.
 */
export function requiredAbove(
  name: string,
  options: { field: string; threshold: number; requires: string; message: string }
): ModelRule {
  return rule(name, options.message, (instance) => {
    if (instance.number(options.field) <= options.threshold) return true;
    const value = instance.get(options.requires);
    return value !== null && value !== '';
  });
}

/**
 * At least one element of the list satisfies `where`.
 */
export function atLeastOne(
  name: string,
  options: { list: string; where: Predicate; message: string }
): ModelRule {
  return rule(name, options.message, (instance) => instance.list(options.list).some(options.where));
}

/**
 * `count(where) / count(all) >= proportion`, with exact division.
 * An empty list only satisfies a proportion of zero or less.
 */
export function minProportion(
  name: string,
  options: { list: string; where: Predicate; proportion: number; message: string }
): ModelRule {
  return rule(name, options.message, (instance) => {
    const items = instance.list(options.list);
    if (items.length === 0) return options.proportion <= 0;
    const matching = items.filter(options.where).length;
    return matching / items.length >= options.proportion;
  });
}

/**
 * Every element of the list satisfies `where`.
 */
export function everyElement(
  name: string,
  options: { list: string; where: Predicate; message: string }
): ModelRule {
  return rule(name, options.message, (instance) => instance.list(options.list).every(options.where));
}

/**
 * Evaluate `inner` only when `condition` holds; otherwise the rule passes.
 */
export function onlyWhen(condition: Predicate, inner: ModelRule): ModelRule {
  return Object.freeze({
    name: inner.name,
    evaluate: (instance: ValidatedInstance) => (condition(instance) ? inner.evaluate(instance) : PASS),
  });
}
