import { length, optional, range } from '../engines/constraints.js';
import { booleanField, integerField, numberField, stringField, timestampField } from '../engines/field.js';
import { defineSchema } from '../engines/schema.js';

/**
 * Space station status record. Field-level constraints only.
 */
export const spaceStationRecord = defineSchema('space_station', {
  fields: [
    stringField('station_id', length(3, 10)),
    stringField('name', length(1, 50)),
    integerField('crew_size', range(1, 20)),
    numberField('power_level', range(0, 100)),   // percent
    numberField('oxygen_level', range(0, 100)),  // percent
    timestampField('last_maintenance'),
    booleanField('is_operational', optional(true)),
    stringField('notes', optional(), length(0, 200)),
  ],
});
