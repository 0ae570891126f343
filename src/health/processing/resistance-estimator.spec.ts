import { InsufficientDataError } from '../errors/health-errors';
import { TelemetrySample } from '../interfaces/health-types';
import {
  DEFAULT_RESISTANCE_OPTIONS,
  estimateResistance,
  fitVoltageCurrent,
  resistanceFromFit,
  selectLoadWindow,
} from './resistance-estimator';

function sample(
  currentA: number,
  voltageV: number,
  second = 0,
): TelemetrySample {
  return {
    timestamp: new Date(Date.UTC(2025, 2, 1, 10, 0, second)),
    cellId: 'C1',
    voltageV,
    currentA,
    temperatureC: 25,
  };
}

describe('resistance estimator', () => {
  describe('fitVoltageCurrent', () => {
    it('should fit slope -0.05 for 1/2/3 A at 3.70/3.65/3.60 V', () => {
      const fit = fitVoltageCurrent(
        [sample(1, 3.7), sample(2, 3.65), sample(3, 3.6)],
        DEFAULT_RESISTANCE_OPTIONS,
      );

      expect(fit.slope).toBeCloseTo(-0.05, 10);
      expect(fit.intercept).toBeCloseTo(3.75, 10);
      expect(fit.rSquared).toBeCloseTo(1, 10);
      expect(fit.sampleCount).toBe(3);
      expect(resistanceFromFit(fit)).toBeCloseTo(50, 8);
    });

    it('should not depend on the order of the window', () => {
      const window = [
        sample(0.5, 3.9),
        sample(1.5, 3.84),
        sample(2.5, 3.79),
        sample(4.0, 3.7),
        sample(5.5, 3.62),
      ];
      const forward = fitVoltageCurrent(window, DEFAULT_RESISTANCE_OPTIONS);
      const reversed = fitVoltageCurrent(
        [...window].reverse(),
        DEFAULT_RESISTANCE_OPTIONS,
      );
      const shuffled = fitVoltageCurrent(
        [window[3], window[0], window[4], window[2], window[1]],
        DEFAULT_RESISTANCE_OPTIONS,
      );

      expect(reversed.slope).toBeCloseTo(forward.slope, 12);
      expect(shuffled.slope).toBeCloseTo(forward.slope, 12);
      expect(shuffled.intercept).toBeCloseTo(forward.intercept, 12);
      expect(shuffled.rSquared).toBeCloseTo(forward.rSquared, 12);
    });

    it('should report rSquared below 1 for noisy data', () => {
      const fit = fitVoltageCurrent(
        [sample(1, 3.7), sample(2, 3.66), sample(3, 3.6), sample(4, 3.57)],
        DEFAULT_RESISTANCE_OPTIONS,
      );
      expect(fit.rSquared).toBeGreaterThan(0.9);
      expect(fit.rSquared).toBeLessThan(1);
    });

    it('should report rSquared 1 when voltage does not move', () => {
      const fit = fitVoltageCurrent(
        [sample(1, 3.75), sample(2, 3.75), sample(3, 3.75)],
        DEFAULT_RESISTANCE_OPTIONS,
      );
      expect(fit.slope).toBe(0);
      expect(fit.rSquared).toBe(1);
    });

    it('should throw InsufficientDataError below the minimum sample count', () => {
      expect(() =>
        fitVoltageCurrent(
          [sample(1, 3.7), sample(2, 3.65)],
          DEFAULT_RESISTANCE_OPTIONS,
        ),
      ).toThrow(InsufficientDataError);
    });

    it('should honour a lower configured minimum', () => {
      const fit = fitVoltageCurrent([sample(1, 3.7), sample(2, 3.65)], {
        minSamples: 2,
        varianceEpsilon: 1e-9,
      });
      expect(fit.slope).toBeCloseTo(-0.05, 10);
    });

    it('should throw InsufficientDataError for constant current', () => {
      const attempt = () =>
        fitVoltageCurrent(
          [sample(2, 3.7), sample(2, 3.65), sample(2, 3.6)],
          DEFAULT_RESISTANCE_OPTIONS,
        );

      expect(attempt).toThrow(InsufficientDataError);
      expect(attempt).toThrow(/Current variance 0 is below 1e-9/);
    });

    it('should carry the window size on the error', () => {
      let sampleCount: number | undefined;
      try {
        fitVoltageCurrent([sample(2, 3.7)], DEFAULT_RESISTANCE_OPTIONS);
      } catch (error) {
        if (error instanceof InsufficientDataError) {
          sampleCount = error.sampleCount;
        }
      }
      expect(sampleCount).toBe(1);
    });
  });

  describe('selectLoadWindow', () => {
    it('should keep only samples above the noise floor in either direction', () => {
      const samples = [
        sample(0, 4.0),
        sample(0.005, 4.0),
        sample(-0.005, 4.0),
        sample(1, 3.95),
        sample(-1, 4.05),
      ];
      const window = selectLoadWindow(samples, 0.01);
      expect(window.map((s) => s.currentA)).toEqual([1, -1]);
    });
  });

  describe('estimateResistance', () => {
    it('should ignore rest samples when fitting', () => {
      const fit = estimateResistance([
        sample(0, 4.1, 0),
        sample(1, 3.7, 1),
        sample(2, 3.65, 2),
        sample(3, 3.6, 3),
        sample(0.001, 4.2, 4),
      ]);
      expect(fit.sampleCount).toBe(3);
      expect(resistanceFromFit(fit)).toBeCloseTo(50, 8);
    });

    it('should fail when only rest samples exist', () => {
      expect(() =>
        estimateResistance([sample(0, 4.1), sample(0, 4.1), sample(0, 4.1)]),
      ).toThrow(InsufficientDataError);
    });
  });
});
