import { InsufficientDataError } from '../errors/health-errors';
import {
  ResistanceFit,
  TelemetrySample,
} from '../interfaces/health-types';

export interface ResistanceEstimatorOptions {
  /** Samples with |current| at or below this value are rest samples (A) */
  noiseFloorA: number;
  /** Minimum number of in-window samples */
  minSamples: number;
  /** Population variance of current below this is treated as constant */
  varianceEpsilon: number;
}

export const DEFAULT_RESISTANCE_OPTIONS: ResistanceEstimatorOptions = {
  noiseFloorA: 0.01,
  minSamples: 3,
  varianceEpsilon: 1e-9,
};

/**
 * Samples drawn under non-negligible load.
 */
export function selectLoadWindow(
  samples: readonly TelemetrySample[],
  noiseFloorA: number,
): TelemetrySample[] {
  return samples.filter((s) => Math.abs(s.currentA) > noiseFloorA);
}

/**
 * Ordinary least-squares fit of `voltage = intercept + slope * current`.
 *
 * Sums are taken around the means, so the result does not depend on the
 * order of the window.
 */
export function fitVoltageCurrent(
  window: readonly Pick<TelemetrySample, 'voltageV' | 'currentA'>[],
  options: Pick<ResistanceEstimatorOptions, 'minSamples' | 'varianceEpsilon'>,
): ResistanceFit {
  const n = window.length;
  if (n < options.minSamples) {
    throw new InsufficientDataError(
      `Resistance fit needs at least ${options.minSamples} load samples, got ${n}`,
      n,
    );
  }

  let sumI = 0;
  let sumV = 0;
  for (const s of window) {
    sumI += s.currentA;
    sumV += s.voltageV;
  }
  const meanI = sumI / n;
  const meanV = sumV / n;

  let sxx = 0;
  let sxy = 0;
  let syy = 0;
  for (const s of window) {
    const dI = s.currentA - meanI;
    const dV = s.voltageV - meanV;
    sxx += dI * dI;
    sxy += dI * dV;
    syy += dV * dV;
  }

  const currentVariance = sxx / n;
  if (currentVariance < options.varianceEpsilon) {
    throw new InsufficientDataError(
      `Current variance ${currentVariance} is below ${options.varianceEpsilon}; load window has no usable current step`,
      n,
    );
  }

  const slope = sxy / sxx;
  const intercept = meanV - slope * meanI;

  let ssRes = 0;
  for (const s of window) {
    const residual = s.voltageV - (intercept + slope * s.currentA);
    ssRes += residual * residual;
  }
  const rSquared = syy === 0 ? 1 : 1 - ssRes / syy;

  return { slope, intercept, rSquared, sampleCount: n };
}

/** Internal resistance in milliohms implied by a fit */
export function resistanceFromFit(fit: ResistanceFit): number {
  return -fit.slope * 1000;
}

/**
 * Select the load window of a cell series and fit it.
 *
 * @throws InsufficientDataError when the window is too small or current
 * does not vary
 */
export function estimateResistance(
  samples: readonly TelemetrySample[],
  options: ResistanceEstimatorOptions = DEFAULT_RESISTANCE_OPTIONS,
): ResistanceFit {
  const window = selectLoadWindow(samples, options.noiseFloorA);
  return fitVoltageCurrent(window, options);
}
