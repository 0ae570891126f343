import { ConfigurationError } from '../errors/health-errors';
import {
  clamp,
  computeSohFactors,
  estimateSoh,
  SohInput,
} from './soh-estimator';

describe('SoH estimator', () => {
  const healthy: SohInput = {
    measuredCapacityAh: 50,
    nominalCapacityAh: 50,
    resistanceMohm: 50,
    baselineResistanceMohm: 50,
    cycleCount: 0,
  };

  describe('computeSohFactors', () => {
    it('should compute each normalized factor', () => {
      const factors = computeSohFactors(
        {
          measuredCapacityAh: 45,
          nominalCapacityAh: 50,
          resistanceMohm: 60,
          baselineResistanceMohm: 50,
          cycleCount: 500,
        },
        2000,
      );

      expect(factors.capacity).toBeCloseTo(0.9, 12);
      expect(factors.resistance).toBeCloseTo(0.8, 12);
      expect(factors.cycle).toBeCloseTo(0.75, 12);
    });

    it('should clamp factors to [0, 1]', () => {
      const factors = computeSohFactors(
        {
          measuredCapacityAh: 60,
          nominalCapacityAh: 50,
          resistanceMohm: 200,
          baselineResistanceMohm: 50,
          cycleCount: 5000,
        },
        2000,
      );

      expect(factors).toEqual({ capacity: 1, resistance: 0, cycle: 0 });
    });

    it('should cap the resistance factor at 1 when below baseline', () => {
      const factors = computeSohFactors(
        { ...healthy, resistanceMohm: 30 },
        2000,
      );
      expect(factors.resistance).toBe(1);
    });

    it.each<[string, Partial<SohInput>]>([
      ['zero nominal capacity', { nominalCapacityAh: 0 }],
      ['NaN nominal capacity', { nominalCapacityAh: Number.NaN }],
      ['zero baseline resistance', { baselineResistanceMohm: 0 }],
      ['negative baseline resistance', { baselineResistanceMohm: -5 }],
    ])('should throw ConfigurationError for %s', (_label, override) => {
      expect(() =>
        computeSohFactors({ ...healthy, ...override }, 2000),
      ).toThrow(ConfigurationError);
    });

    it('should throw ConfigurationError for a non-positive cycle life', () => {
      expect(() => computeSohFactors(healthy, 0)).toThrow(
        /ratedCycleLife must be > 0/,
      );
    });
  });

  describe('estimateSoh', () => {
    it('should return 100 for a new cell', () => {
      expect(estimateSoh(healthy)).toBeCloseTo(100, 10);
    });

    it('should average the factors with equal default weights', () => {
      const soh = estimateSoh({
        measuredCapacityAh: 45,
        nominalCapacityAh: 50,
        resistanceMohm: 60,
        baselineResistanceMohm: 50,
        cycleCount: 500,
      });
      // (0.9 + 0.8 + 0.75) / 3
      expect(soh).toBeCloseTo(81.6667, 3);
    });

    it('should apply custom weights', () => {
      const soh = estimateSoh(
        {
          measuredCapacityAh: 40,
          nominalCapacityAh: 50,
          resistanceMohm: 50,
          baselineResistanceMohm: 50,
          cycleCount: 1000,
        },
        { capacity: 0.5, resistance: 0.25, cycle: 0.25 },
      );
      // 0.5 * 0.8 + 0.25 * 1 + 0.25 * 0.5
      expect(soh).toBeCloseTo(77.5, 10);
    });

    it('should use the configured rated cycle life', () => {
      const soh = estimateSoh(
        { ...healthy, cycleCount: 1000 },
        { capacity: 0, resistance: 0, cycle: 1 },
        4000,
      );
      expect(soh).toBeCloseTo(75, 10);
    });

    it('should not exceed 100 when measured capacity exceeds nominal', () => {
      expect(estimateSoh({ ...healthy, measuredCapacityAh: 75 })).toBeLessThanOrEqual(
        100,
      );
      expect(estimateSoh({ ...healthy, measuredCapacityAh: 75 })).toBeCloseTo(
        100,
        10,
      );
    });

    it('should stay within [0, 100] across extreme inputs', () => {
      const capacities = [0, 10, 50, 500];
      const resistances = [0, 50, 100, 10_000];
      const cycles = [0, 1000, 1_000_000];

      for (const measuredCapacityAh of capacities) {
        for (const resistanceMohm of resistances) {
          for (const cycleCount of cycles) {
            const soh = estimateSoh({
              measuredCapacityAh,
              nominalCapacityAh: 50,
              resistanceMohm,
              baselineResistanceMohm: 50,
              cycleCount,
            });
            expect(soh).toBeGreaterThanOrEqual(0);
            expect(soh).toBeLessThanOrEqual(100);
          }
        }
      }
    });

    it('should return 0 for a fully degraded cell', () => {
      expect(
        estimateSoh({
          measuredCapacityAh: 0,
          nominalCapacityAh: 50,
          resistanceMohm: 100,
          baselineResistanceMohm: 50,
          cycleCount: 2000,
        }),
      ).toBe(0);
    });
  });

  describe('clamp', () => {
    it('should bound values on both sides', () => {
      expect(clamp(-1, 0, 1)).toBe(0);
      expect(clamp(2, 0, 1)).toBe(1);
      expect(clamp(0.25, 0, 1)).toBe(0.25);
    });
  });
});
