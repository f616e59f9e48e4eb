import type { RecordSchema } from '../types/schema.js';
import { NotFoundError } from '../utils/errors.js';
import { alienContactRecord } from './alien-contact.js';
import { crewMemberRecord, spaceMissionRecord } from './space-mission.js';
import { spaceStationRecord } from './space-station.js';

export { spaceStationRecord } from './space-station.js';
export { alienContactRecord, ContactTypeSchema, type ContactType } from './alien-contact.js';
export { spaceMissionRecord, crewMemberRecord, RankSchema, type Rank } from './space-mission.js';

/**
 * Record schemas by the name the CLI accepts
 */
export const recordSchemas = {
  station: spaceStationRecord,
  contact: alienContactRecord,
  mission: spaceMissionRecord,
  'crew-member': crewMemberRecord,
} as const satisfies Record<string, RecordSchema>;

export type RecordSchemaName = keyof typeof recordSchemas;

export function isRecordSchemaName(name: string): name is RecordSchemaName {
  return Object.hasOwn(recordSchemas, name);
}

/**
 * @throws {NotFoundError} If no schema is registered under `name`
 */
export function findSchema(name: string): RecordSchema {
  if (!isRecordSchemaName(name)) {
    throw new NotFoundError('Record schema', name, { available: Object.keys(recordSchemas) });
  }
  return recordSchemas[name];
}
