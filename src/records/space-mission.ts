import { z } from 'zod';
import { length, oneOf, optional, range } from '../engines/constraints.js';
import {
  booleanField,
  integerField,
  listField,
  numberField,
  stringField,
  timestampField,
} from '../engines/field.js';
import { atLeastOne, everyElement, minProportion, onlyWhen, prefixRule } from '../engines/rules.js';
import { defineSchema } from '../engines/schema.js';

/**
 * Crew ranks, lowest first
 */
export const RankSchema = z.enum([
  'cadet',
  'officer',
  'lieutenant',
  'captain',
  'commander',
]);

export type Rank = z.infer<typeof RankSchema>;

const COMMANDING: Record<Rank, boolean> = {
  cadet: false,
  officer: false,
  lieutenant: false,
  captain: true,
  commander: true,
};

/** Missions longer than this many days are long-duration */
const LONG_MISSION_DAYS = 365;
const EXPERIENCED_YEARS = 5;
const MIN_EXPERIENCED_SHARE = 0.5;

export const crewMemberRecord = defineSchema('crew_member', {
  fields: [
    stringField('member_id', length(3, 10)),
    stringField('name', length(2, 50)),
    stringField('rank', oneOf(RankSchema.options)),
    integerField('age', range(18, 80)),
    stringField('specialization', length(3, 30)),
    integerField('years_experience', range(0, 50)),
    booleanField('is_active', optional(true)),
  ],
});

export const spaceMissionRecord = defineSchema('space_mission', {
  fields: [
    stringField('mission_id', length(5, 15)),
    stringField('mission_name', length(3, 100)),
    stringField('destination', length(3, 50)),
    timestampField('launch_date'),
    integerField('duration_days', range(1, 3650)),
    listField('crew', crewMemberRecord, length(1, 12)),
    stringField('mission_status', optional('planned')),
    numberField('budget_millions', range(1, 10000)),
  ],
  rules: [
    prefixRule('mission_id', 'M'),
    atLeastOne('commanding-officer', {
      list: 'crew',
      where: (member) => COMMANDING[RankSchema.parse(member.string('rank'))],
      message: 'Mission must have at least one Commander or Captain',
    }),
    onlyWhen(
      (mission) => mission.number('duration_days') > LONG_MISSION_DAYS,
      minProportion('experienced-crew', {
        list: 'crew',
        where: (member) => member.number('years_experience') >= EXPERIENCED_YEARS,
        proportion: MIN_EXPERIENCED_SHARE,
        message: 'Long missions need 50% experienced crew (5+ years)',
      })
    ),
    everyElement('crew-active', {
      list: 'crew',
      where: (member) => member.boolean('is_active'),
      message: 'All crew members must be active',
    }),
  ],
});
