/**
 * Value transform pipeline
 *
 * ORDER (raster): scale_factor → offset → bias_correction → post_process
 * ORDER (vector): scale_factor → post_process
 *
 * null short-circuits every stage.
 */

import type {
  PostProcessRule,
  RasterDatasetConfig,
  VectorDatasetConfig,
} from '../core/types/dataset.js';

export interface TransformSteps {
  readonly scale_factor?: number;
  readonly offset?: number;
  readonly bias_correction?: number;
  readonly post_process?: PostProcessRule;
}

/**
 * Round to a number of decimals, nearest value of the stored binary number,
 * ties to even. 2.5 → 2, 2.675 → 2.67 (stored as 2.67499…).
 */
export function roundTo(value: number, decimals: number): number {
  const magnitude = Math.abs(value);
  if (!Number.isFinite(magnitude) || magnitude >= 1e21) {
    return value;
  }

  // toFixed rounds the exact binary value, picking the larger candidate on a tie
  let rounded = Number(magnitude.toFixed(decimals));
  const [whole, fraction = ''] = magnitude.toFixed(100).split('.');
  const remainder = fraction.slice(decimals);
  if (remainder.startsWith('5') && /^5?0*$/.test(remainder)) {
    const kept = `${whole}${fraction.slice(0, decimals)}`;
    const lastDigit = Number(kept.charAt(kept.length - 1));
    if (lastDigit % 2 === 0) {
      rounded = Number(decimals === 0 ? whole : `${whole}.${fraction.slice(0, decimals)}`);
    }
  }

  if (rounded === 0) {
    return 0;
  }
  return value < 0 ? -rounded : rounded;
}

const POST_PROCESS_DECIMALS: Record<Exclude<PostProcessRule, 'none'>, number> = {
  round_int: 0,
  round_1dp: 1,
  round_2dp: 2,
  round_3dp: 3,
};

export function applyPostProcess(value: number | null, rule: PostProcessRule | undefined): number | null {
  if (value === null || rule === undefined || rule === 'none') {
    return value;
  }
  return roundTo(value, POST_PROCESS_DECIMALS[rule]);
}

export function applyTransforms(value: number | null, steps: TransformSteps): number | null {
  if (value === null) {
    return null;
  }

  let result = value;
  if (steps.scale_factor !== undefined) {
    result *= steps.scale_factor;
  }
  if (steps.offset !== undefined) {
    result += steps.offset;
  }
  if (steps.bias_correction !== undefined) {
    result += steps.bias_correction;
  }

  return applyPostProcess(result, steps.post_process);
}

export function applyRasterTransforms(value: number | null, config: RasterDatasetConfig): number | null {
  return applyTransforms(value, {
    scale_factor: config.scale_factor,
    offset: config.offset,
    bias_correction: config.bias_correction,
    post_process: config.post_process,
  });
}

/** Vector sources take no offset or bias correction */
export function applyVectorTransforms(value: number | null, config: VectorDatasetConfig): number | null {
  return applyTransforms(value, {
    scale_factor: config.scale_factor,
    post_process: config.post_process,
  });
}
