/**
 * Profile Record Helper Tests
 */

import { describe, it, expect } from 'vitest';
import {
  EMPTY_FIELDS,
  collectAttributes,
  deriveCoastal,
  failedProfile,
  fieldsOf,
  findDomainViolations,
  isPassThroughValue,
} from '../../../services/profile-records.js';
import { sampleProfile } from '../../utils/fixtures.js';

describe('deriveCoastal', () => {
  it.each([
    [50, 1500, true],
    [150, 1500, false],
    [99, 500, true],
    [50, 3000, true],
    [50, 499, false],
    [50, 3001, false],
    [100, 1500, false],
  ])('elevation %d m, rainfall %d mm → %s', (elevation, rainfall, expected) => {
    expect(deriveCoastal(elevation, rainfall)).toBe(expected);
  });

  it('is false when either input is unknown', () => {
    expect(deriveCoastal(null, 1500)).toBe(false);
    expect(deriveCoastal(50, null)).toBe(false);
  });
});

describe('findDomainViolations', () => {
  it('accepts values inside the data dictionary domains', () => {
    expect(findDomainViolations(fieldsOf(sampleProfile({ rainfall_mm: 1200 })))).toEqual([]);
  });

  it('lists every out-of-domain field and skips nulls', () => {
    const fields = fieldsOf(sampleProfile({ rainfall_mm: 400, soil_ph: 9.1, elevation_m: null }));

    expect(findDomainViolations(fields)).toEqual([
      'rainfall_mm=400 outside [1000, 3000]',
      'soil_ph=9.1 outside [4, 8.5]',
    ]);
  });
});

describe('failedProfile', () => {
  it('defaults every field to empty', () => {
    const profile = failedProfile('farm-9', 2024, { owner: 'test-owner' }, 'Error: boom');

    expect(profile).toEqual({
      id: 'farm-9',
      year: 2024,
      ...EMPTY_FIELDS,
      attributes: { owner: 'test-owner' },
      status: 'failed',
      error: 'Error: boom',
    });
  });
});

describe('pass-through attributes', () => {
  it('accepts JSON-like values, including nested ones', () => {
    expect(isPassThroughValue('x')).toBe(true);
    expect(isPassThroughValue(null)).toBe(true);
    expect(isPassThroughValue({ crops: ['maize', 'beans'], plots: { north: 2 } })).toBe(true);
  });

  it('rejects values that cannot be serialized faithfully', () => {
    expect(isPassThroughValue(undefined)).toBe(false);
    expect(isPassThroughValue(Number.NaN)).toBe(false);
    expect(isPassThroughValue(() => 1)).toBe(false);
    expect(isPassThroughValue({ nested: [1, undefined] })).toBe(false);
  });

  it('collects all keys except the excluded ones and reports drops', () => {
    const { attributes, dropped } = collectAttributes(
      { farm_id: 'A', geometry: [1, 2], owner: 'test-owner', size: 3, callback: () => 0 },
      ['geometry', 'farm_id']
    );

    expect(attributes).toEqual({ owner: 'test-owner', size: 3 });
    expect(dropped).toEqual(['callback']);
  });
});
