/**
 * Transform Pipeline Tests
 */

import { describe, it, expect } from 'vitest';
import type { RasterDatasetConfig, VectorDatasetConfig } from '../../../core/types/dataset.js';
import {
  applyPostProcess,
  applyRasterTransforms,
  applyTransforms,
  applyVectorTransforms,
  roundTo,
} from '../../../extraction/transforms.js';

describe('roundTo', () => {
  it('rounds ties to even', () => {
    expect(roundTo(2.5, 0)).toBe(2);
    expect(roundTo(3.5, 0)).toBe(4);
    expect(roundTo(-2.5, 0)).toBe(-2);
    expect(roundTo(1500.5, 0)).toBe(1500);
    expect(roundTo(1499.5, 0)).toBe(1500);
    expect(roundTo(0.125, 2)).toBe(0.12);
    expect(roundTo(0.375, 2)).toBe(0.38);
  });

  it('rounds the stored binary value, not its decimal spelling', () => {
    // 2.675 is stored as 2.67499999999999982236431605997495353221893310546875
    expect(roundTo(2.675, 2)).toBe(2.67);
    expect(roundTo(1.005, 2)).toBe(1);
    // 0.0005 is stored just above the half
    expect(roundTo(0.0005, 3)).toBe(0.001);
  });

  it('rounds non-ties to the nearest value', () => {
    expect(roundTo(50.4, 0)).toBe(50);
    expect(roundTo(50.6, 0)).toBe(51);
    expect(roundTo(-3.16, 1)).toBe(-3.2);
  });

  it('never returns negative zero', () => {
    expect(Object.is(roundTo(-0.04, 1), 0)).toBe(true);
  });

  it('keeps values that need no rounding', () => {
    expect(roundTo(36.821946, 6)).toBe(36.821946);
    expect(roundTo(1500, 0)).toBe(1500);
  });
});

describe('applyPostProcess', () => {
  it.each([
    ['round_int', 1499.5, 1500],
    ['round_1dp', 1.26, 1.3],
    ['round_2dp', 1.256, 1.26],
    ['round_3dp', 0.0005, 0.001],
  ] as const)('%s rounds %d to %d', (rule, value, expected) => {
    expect(applyPostProcess(value, rule)).toBe(expected);
  });

  it('leaves values alone for none or no rule', () => {
    expect(applyPostProcess(1.26, 'none')).toBe(1.26);
    expect(applyPostProcess(1.26, undefined)).toBe(1.26);
  });
});

describe('applyTransforms', () => {
  it('short-circuits null', () => {
    expect(applyTransforms(null, { scale_factor: 2, offset: 1, post_process: 'round_int' })).toBeNull();
  });

  it('applies scale, offset, bias, then rounding', () => {
    // 15000 * 0.02 = 300 K; 300 - 273.15 = 26.85 °C; 26.85 - 4.43 = 22.42
    expect(
      applyTransforms(15000, {
        scale_factor: 0.02,
        offset: -273.15,
        bias_correction: -4.43,
        post_process: 'round_1dp',
      })
    ).toBe(22.4);
  });

  it('rounds after scaling, not before', () => {
    expect(applyTransforms(14, { scale_factor: 0.1, post_process: 'round_int' })).toBe(1);
    expect(applyTransforms(15, { scale_factor: 0.1, post_process: 'round_int' })).toBe(2);
  });
});

describe('dataset-specific transforms', () => {
  it('applies every raster step', () => {
    const config: RasterDatasetConfig = {
      name: 'lst',
      type: 'raster',
      asset_id: 'test/lst',
      band: 'LST',
      scale: 1000,
      reducer: 'mean',
      temporal: false,
      scale_factor: 2,
      offset: 10,
      bias_correction: -1,
    };

    expect(applyRasterTransforms(5, config)).toBe(19);
  });

  it('applies only scale factor and rounding to vector values', () => {
    const config: VectorDatasetConfig = {
      name: 'clay_pct',
      type: 'vector',
      asset_id: 'test/soils',
      field: 'clay',
      scale_factor: 0.5,
      post_process: 'round_int',
    };

    // 9 * 0.5 = 4.5, a tie
    expect(applyVectorTransforms(9, config)).toBe(4);
  });
});
