import { z } from 'zod';
import { ConfigurationError } from '../errors/health-errors';
import { CellProfile, Threshold } from '../interfaces/health-types';
import { findOcvTableIssues } from '../processing/ocv-interpolator';
import { findThresholdIssues } from '../processing/threshold-evaluator';
import { DEFAULT_RESISTANCE_OPTIONS } from '../processing/resistance-estimator';
import { DEFAULT_TEMPERATURE_RANGE } from '../processing/sample-ingestion';
import {
  DEFAULT_RATED_CYCLE_LIFE,
  DEFAULT_SOH_WEIGHTS,
} from '../processing/soh-estimator';

/**
 * Engine Configuration Schema
 *
 * Everything the engine needs for one batch, supplied by the caller as a
 * plain object. The validated result is deep-frozen; the engine never
 * caches it between calls.
 */

const WEIGHT_SUM_TOLERANCE = 1e-6;

const finite = () => z.number().finite();

export const OcvTablePointSchema = z.object({
  voltageV: finite().positive(),
  socPercent: finite().min(0).max(100),
});

export const OcvTableSchema = z
  .array(OcvTablePointSchema)
  .superRefine((table, ctx) => {
    for (const message of findOcvTableIssues(table)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message });
    }
  });

export const ThresholdSchema = z
  .object({
    metricType: z.enum(['soc', 'soh', 'resistance', 'temperature']),
    minValue: finite().nullish(),
    maxValue: finite().nullish(),
    severity: z.enum(['warning', 'critical']),
  })
  .superRefine((threshold, ctx) => {
    for (const message of findThresholdIssues(threshold)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message });
    }
  })
  .transform((t): Threshold => {
    const threshold: Threshold = {
      metricType: t.metricType,
      severity: t.severity,
    };
    if (t.minValue !== undefined && t.minValue !== null) {
      threshold.minValue = t.minValue;
    }
    if (t.maxValue !== undefined && t.maxValue !== null) {
      threshold.maxValue = t.maxValue;
    }
    return threshold;
  });

export const CellProfileSchema = z
  .object({
    nominalCapacityAh: finite().positive(),
    measuredCapacityAh: finite().min(0),
    baselineResistanceMohm: finite().positive(),
    cycleCount: z.number().int().min(0),
  })
  .partial();

export const SohWeightsSchema = z
  .object({
    capacity: finite().min(0),
    resistance: finite().min(0),
    cycle: finite().min(0),
  })
  .refine(
    (w) =>
      Math.abs(w.capacity + w.resistance + w.cycle - 1) <=
      WEIGHT_SUM_TOLERANCE,
    { message: 'SoH weights must sum to 1' },
  );

export const EngineConfigSchema = z.object({
  ocvTable: OcvTableSchema,
  thresholds: z.array(ThresholdSchema).default([]),
  sohWeights: SohWeightsSchema.default(DEFAULT_SOH_WEIGHTS),
  ratedCycleLife: finite().positive().default(DEFAULT_RATED_CYCLE_LIFE),
  defaultCell: CellProfileSchema.default({}),
  cells: z.record(z.string(), CellProfileSchema).default({}),
  resistance: z
    .object({
      noiseFloorA: finite()
        .min(0)
        .default(DEFAULT_RESISTANCE_OPTIONS.noiseFloorA),
      minSamples: z
        .number()
        .int()
        .min(2)
        .default(DEFAULT_RESISTANCE_OPTIONS.minSamples),
      varianceEpsilon: finite()
        .positive()
        .default(DEFAULT_RESISTANCE_OPTIONS.varianceEpsilon),
    })
    .default({}),
  temperatureRangeC: z
    .object({
      min: finite().default(DEFAULT_TEMPERATURE_RANGE.min),
      max: finite().default(DEFAULT_TEMPERATURE_RANGE.max),
    })
    .default({})
    .refine((r) => r.min < r.max, {
      message: 'temperatureRangeC.min must be below max',
    }),
  representativeSample: z.enum(['last', 'mean']).default('last'),
});

export type EngineConfigInput = z.input<typeof EngineConfigSchema>;
export type EngineConfig = z.output<typeof EngineConfigSchema>;

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${path}: ${issue.message}`;
  });
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze<unknown>(nested);
    }
  }
  return value;
}

/**
 * Validate a caller-supplied configuration and apply defaults.
 *
 * @throws ConfigurationError listing every problem found
 */
export function validateEngineConfig(input: unknown): EngineConfig {
  const parsed = EngineConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigurationError(
      'Invalid engine configuration',
      formatIssues(parsed.error),
    );
  }
  return deepFreeze(parsed.data);
}

/**
 * Resolve the SoH baseline of every cell, merging `defaultCell` with the
 * per-cell override. Cycle count defaults to 0 (a new cell); the other
 * values must be configured.
 *
 * @throws ConfigurationError naming every cell with a missing value
 */
export function resolveCellProfiles(
  config: EngineConfig,
  cellIds: readonly string[],
): Map<string, CellProfile> {
  const profiles = new Map<string, CellProfile>();
  const issues: string[] = [];

  for (const cellId of cellIds) {
    const merged = {
      ...config.defaultCell,
      ...(Object.hasOwn(config.cells, cellId) ? config.cells[cellId] : {}),
    };
    const {
      nominalCapacityAh,
      measuredCapacityAh,
      baselineResistanceMohm,
      cycleCount = 0,
    } = merged;

    const missing: string[] = [];
    if (nominalCapacityAh === undefined) missing.push('nominalCapacityAh');
    if (measuredCapacityAh === undefined) missing.push('measuredCapacityAh');
    if (baselineResistanceMohm === undefined) {
      missing.push('baselineResistanceMohm');
    }

    if (
      nominalCapacityAh === undefined ||
      measuredCapacityAh === undefined ||
      baselineResistanceMohm === undefined
    ) {
      issues.push(`cells.${cellId}: missing ${missing.join(', ')}`);
      continue;
    }

    profiles.set(cellId, {
      nominalCapacityAh,
      measuredCapacityAh,
      baselineResistanceMohm,
      cycleCount,
    });
  }

  if (issues.length > 0) {
    throw new ConfigurationError('Incomplete cell baseline', issues);
  }
  return profiles;
}
