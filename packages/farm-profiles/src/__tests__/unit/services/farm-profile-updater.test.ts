/**
 * Farm Profile Updater Tests
 *
 * Selective updates touch only temporal fields; full refreshes recompute
 * everything; identity and pass-through attributes always survive.
 */

import { describe, it, expect, vi } from 'vitest';
import { InvalidGeometryError, RemoteQueryError } from '../../../core/errors.js';
import { createTestStack, sampleProfile, RASTER_READINGS, ASSETS } from '../../utils/fixtures.js';

const GEOMETRY: [number, number] = [10, 20];

describe('FarmProfileUpdater selective updates', () => {
  it('recomputes only the requested temporal field', async () => {
    const { updater, service } = createTestStack();
    const existing = sampleProfile();

    const updated = await updater.update(existing, GEOMETRY, ['rainfall_mm'], 2024);

    expect(updated).toEqual({ ...existing, year: 2024, rainfall_mm: 1500, coastal: false });
    expect(service.rasterRequests()).toHaveLength(1);
    expect(service.calls[0]).toMatchObject({ assetId: ASSETS.rainfall, year: 2024 });
  });

  it('leaves year-invariant fields unchanged even when named', async () => {
    const { updater, service } = createTestStack();
    const existing = sampleProfile();

    const updated = await updater.update(existing, GEOMETRY, ['temperature_celsius', 'elevation_m'], 2024);

    expect(updated.temperature_celsius).toBe(22);
    expect(updated.elevation_m).toBe(340);
    expect(service.rasterRequests()).toHaveLength(1);
  });

  it('re-derives coastal when rainfall changes', async () => {
    const { updater } = createTestStack();
    const existing = sampleProfile({ elevation_m: 50, rainfall_mm: 400, coastal: false });

    const updated = await updater.update(existing, GEOMETRY, ['rainfall_mm'], 2024);

    expect(updated.rainfall_mm).toBe(1500);
    expect(updated.coastal).toBe(true);
  });

  it('ignores unknown field names with a warning', async () => {
    const stack = createTestStack();
    const warn = vi.spyOn(stack.logger, 'warn');
    const existing = sampleProfile();

    const updated = await stack.updater.update(existing, GEOMETRY, ['ndvi'], 2025);

    expect(updated).toEqual({ ...existing, year: 2025 });
    expect(stack.service.rasterRequests()).toHaveLength(0);
    expect(warn).toHaveBeenCalledWith('Ignoring unknown profile field', { field: 'ndvi' });
  });

  it('records null when the refreshed value is unavailable', async () => {
    const { updater } = createTestStack({
      failures: {
        reduceRasterRegion: new RemoteQueryError('reduceRasterRegion failed: timeout', 'timeout', 'reduceRasterRegion'),
      },
    });
    const existing = sampleProfile();

    const updated = await updater.update(existing, GEOMETRY, ['rainfall_mm'], 2024);

    expect(updated.status).toBe('success');
    expect(updated.rainfall_mm).toBeNull();
    expect(updated.temperature_celsius).toBe(20);
  });
});

describe('FarmProfileUpdater full refresh', () => {
  it.each<[readonly string[] | null | undefined]>([[null], [undefined], [[]]])(
    'recomputes every field when fields is %j',
    async (fields) => {
      const { updater } = createTestStack();
      const existing = sampleProfile();

      const updated = await updater.update(existing, GEOMETRY, fields, 2024);

      expect(updated).toEqual({
        id: 'farm-1',
        year: 2024,
        rainfall_mm: 1500,
        temperature_celsius: 22,
        elevation_m: 50,
        slope_degrees: 3.1,
        soil_ph: 6.5,
        soil_texture_id: null,
        area_ha: 0,
        latitude: 10,
        longitude: 20,
        coastal: true,
        attributes: { owner: 'test-owner' },
        status: 'success',
      });
    }
  );

  it('keeps previous values and reports the error when the refresh fails', async () => {
    const { updater } = createTestStack({
      rasterValues: RASTER_READINGS,
      failures: { geometryArea: new Error('projection failed') },
    });
    const existing = sampleProfile();

    const updated = await updater.update(existing, GEOMETRY, null, 2024);

    expect(updated).toEqual({
      ...existing,
      year: 2024,
      status: 'failed',
      error: 'Error: projection failed',
    });
  });

  it('throws for invalid geometry', async () => {
    const { updater } = createTestStack();

    await expect(updater.update(sampleProfile(), 'invalid', null, 2024)).rejects.toThrow(InvalidGeometryError);
  });
});
