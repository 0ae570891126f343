import { ConfigurationError } from '../errors/health-errors';
import { SohWeights } from '../interfaces/health-types';

export interface SohInput {
  measuredCapacityAh: number;
  nominalCapacityAh: number;
  resistanceMohm: number;
  baselineResistanceMohm: number;
  cycleCount: number;
}

export interface SohFactors {
  capacity: number;
  resistance: number;
  cycle: number;
}

export const DEFAULT_SOH_WEIGHTS: SohWeights = {
  capacity: 1 / 3,
  resistance: 1 / 3,
  cycle: 1 / 3,
};

export const DEFAULT_RATED_CYCLE_LIFE = 2000;

export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

function isPositive(value: number | undefined): value is number {
  return value !== undefined && Number.isFinite(value) && value > 0;
}

/**
 * Normalized degradation factors, each clamped to [0, 1].
 *
 * @throws ConfigurationError when nominal capacity, baseline resistance or
 * rated cycle life is missing or not positive
 */
export function computeSohFactors(
  input: SohInput,
  ratedCycleLife: number,
): SohFactors {
  const issues: string[] = [];
  if (!isPositive(input.nominalCapacityAh)) {
    issues.push(`nominalCapacityAh must be > 0, got ${input.nominalCapacityAh}`);
  }
  if (!isPositive(input.baselineResistanceMohm)) {
    issues.push(
      `baselineResistanceMohm must be > 0, got ${input.baselineResistanceMohm}`,
    );
  }
  if (!isPositive(ratedCycleLife)) {
    issues.push(`ratedCycleLife must be > 0, got ${ratedCycleLife}`);
  }
  if (issues.length > 0) {
    throw new ConfigurationError('Invalid SoH baseline', issues);
  }

  const growth =
    (input.resistanceMohm - input.baselineResistanceMohm) /
    input.baselineResistanceMohm;

  return {
    capacity: clamp(input.measuredCapacityAh / input.nominalCapacityAh, 0, 1),
    resistance: clamp(1 - growth, 0, 1),
    cycle: clamp(1 - input.cycleCount / ratedCycleLife, 0, 1),
  };
}

/**
 * Weighted State of Health in percent, clamped to [0, 100].
 */
export function estimateSoh(
  input: SohInput,
  weights: SohWeights = DEFAULT_SOH_WEIGHTS,
  ratedCycleLife: number = DEFAULT_RATED_CYCLE_LIFE,
): number {
  const factors = computeSohFactors(input, ratedCycleLife);
  const score =
    weights.capacity * factors.capacity +
    weights.resistance * factors.resistance +
    weights.cycle * factors.cycle;

  return clamp(100 * score, 0, 100);
}
