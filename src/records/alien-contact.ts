import { z } from 'zod';
import { length, oneOf, optional, range } from '../engines/constraints.js';
import { booleanField, integerField, numberField, stringField, timestampField } from '../engines/field.js';
import { byVariant, prefixRule, requiredAbove, satisfied, violation } from '../engines/rules.js';
import { defineSchema } from '../engines/schema.js';

/**
 * How contact was made
 */
export const ContactTypeSchema = z.enum([
  'radio',
  'visual',
  'physical',
  'telepathic',
]);

export type ContactType = z.infer<typeof ContactTypeSchema>;

/** Minimum witnesses for a telepathic report */
const TELEPATHIC_MIN_WITNESSES = 3;

/** Signals above this strength must come with the message received */
const STRONG_SIGNAL_THRESHOLD = 7.0;

export const alienContactRecord = defineSchema('alien_contact', {
  fields: [
    stringField('contact_id', length(5, 15)),
    timestampField('timestamp'),
    stringField('location', length(3, 100)),
    stringField('contact_type', oneOf(ContactTypeSchema.options)),
    numberField('signal_strength', range(0, 10)),
    integerField('duration_minutes', range(1, 1440)),
    integerField('witness_count', range(1, 100)),
    stringField('message_received', optional(), length(0, 500)),
    booleanField('is_verified', optional(false)),
  ],
  rules: [
    prefixRule('contact_id', 'AC'),
    byVariant('contact-type-requirements', 'contact_type', ContactTypeSchema, {
      radio: satisfied,
      visual: satisfied,
      physical: (contact) =>
        contact.boolean('is_verified')
          ? satisfied()
          : violation('Physical contact reports must be verified'),
      telepathic: (contact) =>
        contact.number('witness_count') >= TELEPATHIC_MIN_WITNESSES
          ? satisfied()
          : violation(`Telepathic contact requires at least ${TELEPATHIC_MIN_WITNESSES} witnesses`),
    }),
    requiredAbove('strong-signal-message', {
      field: 'signal_strength',
      threshold: STRONG_SIGNAL_THRESHOLD,
      requires: 'message_received',
      message: 'Strong signals must include a received message',
    }),
  ],
});
