import { describe, it, expect } from 'vitest';
import { formatError } from '../../src/engines/format.js';
import { validate } from '../../src/engines/record-validator.js';
import { spaceStationRecord } from '../../src/records/space-station.js';
import { ErrorKind } from '../../src/utils/errors.js';

function station(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    station_id: 'SS-001',
    name: 'ISS',
    crew_size: 6,
    power_level: 85.5,
    oxygen_level: 90.0,
    last_maintenance: new Date('2024-05-01T00:00:00Z'),
    is_operational: true,
    ...overrides,
  };
}

describe('Space station record', () => {
  it('should accept a valid station', () => {
    const result = validate(spaceStationRecord, station());

    expect(result.valid).toBe(true);
    if (!result.valid) return;
    expect(result.instance.number('crew_size')).toBe(6);
    expect(result.instance.number('power_level')).toBe(85.5);
    expect(result.instance.optionalString('notes')).toBeNull();
  });

  it('should reject an oversized crew', () => {
    const result = validate(spaceStationRecord, station({ crew_size: 99 }));

    expect(result).toEqual({
      valid: false,
      error: {
        field: 'crew_size',
        code: ErrorKind.CONSTRAINT_VIOLATION,
        message: 'must be between 1 and 20, received 99',
      },
    });
    if (result.valid) return;
    expect(formatError(result.error)).toBe('crew_size: must be between 1 and 20, received 99');
  });

  it('should report the crew size before later fields', () => {
    const result = validate(spaceStationRecord, station({ station_id: 'ISS002', crew_size: 99, power_level: 150 }));

    expect(result.valid === false && result.error.field).toBe('crew_size');
  });

  it('should default is_operational to true', () => {
    const result = validate(spaceStationRecord, station({ is_operational: undefined }));

    expect(result.valid && result.instance.boolean('is_operational')).toBe(true);
  });

  it('should accept the inclusive percentage bounds', () => {
    expect(validate(spaceStationRecord, station({ power_level: 0, oxygen_level: 100 })).valid).toBe(true);
    expect(validate(spaceStationRecord, station({ oxygen_level: 100.0001 }))).toEqual({
      valid: false,
      error: {
        field: 'oxygen_level',
        code: ErrorKind.CONSTRAINT_VIOLATION,
        message: 'must be between 0 and 100, received 100.0001',
      },
    });
  });

  it('should limit notes to 200 characters', () => {
    expect(validate(spaceStationRecord, station({ notes: 'n'.repeat(200) })).valid).toBe(true);
    expect(validate(spaceStationRecord, station({ notes: 'n'.repeat(201) }))).toEqual({
      valid: false,
      error: {
        field: 'notes',
        code: ErrorKind.CONSTRAINT_VIOLATION,
        message: 'length must be between 0 and 200 characters, received 201',
      },
    });
  });

  it('should reject a malformed maintenance timestamp', () => {
    expect(validate(spaceStationRecord, station({ last_maintenance: 'not-a-date' }))).toEqual({
      valid: false,
      error: {
        field: 'last_maintenance',
        code: ErrorKind.TYPE_MISMATCH,
        message: "expected timestamp, received 'not-a-date'",
      },
    });
  });

  it('should require a station id', () => {
    expect(validate(spaceStationRecord, station({ station_id: undefined }))).toEqual({
      valid: false,
      error: { field: 'station_id', code: ErrorKind.MISSING_FIELD, message: 'field is required' },
    });
  });
});
