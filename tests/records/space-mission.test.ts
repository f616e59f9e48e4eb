import { describe, it, expect } from 'vitest';
import { validate } from '../../src/engines/record-validator.js';
import { spaceMissionRecord } from '../../src/records/space-mission.js';
import { ErrorKind } from '../../src/utils/errors.js';

function member(
  id: string,
  rank: string,
  yearsExperience: number,
  overrides: Record<string, unknown> = {}
): Record<string, unknown> {
  return {
    member_id: id,
    name: `Crew ${id}`,
    rank,
    age: 35,
    specialization: 'Engineering',
    years_experience: yearsExperience,
    ...overrides,
  };
}

function mission(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    mission_id: 'M2024_MARS',
    mission_name: 'Mars Colony Establishment',
    destination: 'Mars',
    launch_date: new Date('2024-06-01T00:00:00Z'),
    duration_days: 900,
    budget_millions: 2500.0,
    crew: [
      member('CM001', 'commander', 15),
      member('CM002', 'lieutenant', 8),
      member('CM003', 'officer', 6),
    ],
    ...overrides,
  };
}

function ruleViolation(message: string) {
  return {
    valid: false,
    error: { field: null, code: ErrorKind.BUSINESS_RULE_VIOLATION, message },
  };
}

describe('Space mission record', () => {
  it('should accept a valid mission', () => {
    const result = validate(spaceMissionRecord, mission());

    expect(result.valid).toBe(true);
    if (!result.valid) return;
    expect(result.instance.string('mission_status')).toBe('planned');
    expect(result.instance.list('crew').map((m) => m.string('rank'))).toEqual(['commander', 'lieutenant', 'officer']);
    expect(result.instance.list('crew')[0]?.boolean('is_active')).toBe(true);
  });

  it('should validate its own values again', () => {
    const first = validate(spaceMissionRecord, mission());
    expect(first.valid).toBe(true);
    if (!first.valid) return;

    expect(validate(spaceMissionRecord, first.instance.toInput()).valid).toBe(true);
  });

  it('should require a commander or captain', () => {
    const result = validate(
      spaceMissionRecord,
      mission({
        mission_id: 'M2024_FAIL',
        duration_days: 30,
        budget_millions: 100.0,
        crew: [member('CM004', 'cadet', 1)],
      })
    );

    expect(result).toEqual(ruleViolation('Mission must have at least one Commander or Captain'));
  });

  it('should require half the crew to be experienced on long missions', () => {
    const crew = [member('CM001', 'commander', 10), member('CM002', 'officer', 1), member('CM003', 'cadet', 2)];

    expect(validate(spaceMissionRecord, mission({ crew }))).toEqual(
      ruleViolation('Long missions need 50% experienced crew (5+ years)')
    );
  });

  it('should not apply the experience rule to short missions', () => {
    const crew = [member('CM001', 'commander', 10), member('CM002', 'officer', 1), member('CM003', 'cadet', 2)];

    expect(validate(spaceMissionRecord, mission({ crew, duration_days: 365 })).valid).toBe(true);
  });

  it('should accept exactly half experienced crew', () => {
    const crew = [member('CM001', 'captain', 5), member('CM002', 'cadet', 4)];

    expect(validate(spaceMissionRecord, mission({ crew })).valid).toBe(true);
  });

  it('should require every crew member to be active', () => {
    const crew = [member('CM001', 'commander', 15), member('CM002', 'officer', 9, { is_active: false })];

    expect(validate(spaceMissionRecord, mission({ crew }))).toEqual(
      ruleViolation('All crew members must be active')
    );
  });

  it('should check the mission id prefix', () => {
    expect(validate(spaceMissionRecord, mission({ mission_id: 'X2024_MARS' }))).toEqual(
      ruleViolation("mission_id must start with 'M'")
    );
  });

  it('should label crew member errors with their index', () => {
    const crew = [member('CM001', 'commander', 15), member('CM002', 'officer', 9, { age: 12 })];

    expect(validate(spaceMissionRecord, mission({ crew }))).toEqual({
      valid: false,
      error: {
        field: 'crew[1].age',
        code: ErrorKind.CONSTRAINT_VIOLATION,
        message: 'must be between 18 and 80, received 12',
      },
    });
  });

  it('should bound the crew size', () => {
    const crew = Array.from({ length: 13 }, (_, i) => member(`CM${100 + i}`, 'commander', 10));

    expect(validate(spaceMissionRecord, mission({ crew }))).toEqual({
      valid: false,
      error: {
        field: 'crew',
        code: ErrorKind.CONSTRAINT_VIOLATION,
        message: 'must contain between 1 and 12 items, received 13',
      },
    });
    expect(validate(spaceMissionRecord, mission({ crew: [] }))).toEqual({
      valid: false,
      error: {
        field: 'crew',
        code: ErrorKind.CONSTRAINT_VIOLATION,
        message: 'must contain between 1 and 12 items, received 0',
      },
    });
  });

  it('should reject unknown ranks', () => {
    const crew = [member('CM001', 'admiral', 15)];

    expect(validate(spaceMissionRecord, mission({ crew }))).toEqual({
      valid: false,
      error: {
        field: 'crew[0].rank',
        code: ErrorKind.CONSTRAINT_VIOLATION,
        message: "must be one of 'cadet', 'officer', 'lieutenant', 'captain', 'commander', received 'admiral'",
      },
    });
  });
});
