import { Injectable, Logger } from '@nestjs/common';
import {
  EngineConfig,
  EngineConfigInput,
  resolveCellProfiles,
  validateEngineConfig,
} from './config/engine-config.schema';
import { ConfigurationError, ParseError } from './errors/health-errors';
import {
  BatchResult,
  CellDiagnostics,
  CellFailure,
  CellProfile,
  CellSeries,
  HealthMetric,
  METRIC_TYPES,
  MetricType,
  ProcessBatchOptions,
  ProcessingStage,
  RawTelemetryRow,
  RowError,
  Severity,
  TelemetrySample,
  Threshold,
  ThresholdBreach,
} from './interfaces/health-types';
import { interpolateSoc } from './processing/ocv-interpolator';
import {
  estimateResistance,
  resistanceFromFit,
} from './processing/resistance-estimator';
import { compareCellIds, ingestRows } from './processing/sample-ingestion';
import { estimateSoh } from './processing/soh-estimator';
import {
  evaluateThresholds,
  worstSeverity,
} from './processing/threshold-evaluator';

/**
 * Error raised inside one stage of one cell. Never leaves this file.
 */
class CellStageFailure extends Error {
  constructor(
    public readonly stage: ProcessingStage,
    public readonly original: unknown,
    public readonly socPercent?: number,
  ) {
    super(original instanceof Error ? original.message : String(original));
    this.name = 'CellStageFailure';
  }
}

/**
 * Run one stage of a cell, tagging any error with the stage name.
 * Configuration errors are fatal to the batch and pass through untouched.
 */
function runStage<T>(
  stage: ProcessingStage,
  fn: () => T,
  socPercent?: number,
): T {
  try {
    return fn();
  } catch (error) {
    if (error instanceof ConfigurationError) throw error;
    throw new CellStageFailure(stage, error, socPercent);
  }
}

/** Two-decimal rounding; `+ 0` turns -0 into 0 */
function round2(value: number): number {
  return Math.round(value * 100) / 100 + 0;
}

interface Representative {
  voltageV: number;
  temperatureC: number;
}

function pickRepresentative(
  samples: readonly TelemetrySample[],
  mode: EngineConfig['representativeSample'],
): Representative {
  if (mode === 'mean') {
    let voltage = 0;
    let temperature = 0;
    for (const s of samples) {
      voltage += s.voltageV;
      temperature += s.temperatureC;
    }
    return {
      voltageV: voltage / samples.length,
      temperatureC: temperature / samples.length,
    };
  }

  const last = samples[samples.length - 1];
  return { voltageV: last.voltageV, temperatureC: last.temperatureC };
}

interface Classification {
  passesThreshold: boolean;
  severity: Severity;
  breaches: ThresholdBreach[];
}

/**
 * Worst-case classification across every metric type of one cell.
 */
function classify(
  values: Record<MetricType, number>,
  thresholds: readonly Threshold[],
): Classification {
  let severity: Severity = 'none';
  const breaches: ThresholdBreach[] = [];

  for (const metricType of METRIC_TYPES) {
    const evaluation = evaluateThresholds(
      metricType,
      values[metricType],
      thresholds,
    );
    severity = worstSeverity(severity, evaluation.severity);
    if (evaluation.breach) breaches.push(evaluation.breach);
  }

  return { passesThreshold: breaches.length === 0, severity, breaches };
}

/**
 * HealthProcessingService - Metric aggregator of the health engine
 *
 * Turns one batch of raw telemetry rows into one HealthMetric per cell:
 * 1. Validate the configuration (fatal on error, before any cell work)
 * 2. Ingest rows into per-cell series, recording bad rows
 * 3. Per cell: SoC -> resistance -> SoH -> thresholds
 * 4. Isolate per-cell failures; other cells carry on
 *
 * Pure with respect to its inputs: no clock, no randomness, no I/O.
 */
@Injectable()
export class HealthProcessingService {
  private readonly logger = new Logger(HealthProcessingService.name);

  /**
   * Process one measurement batch.
   *
   * @param rows - Raw rows with `timestamp`, `cell_id`, `voltage_v`,
   *   `current_a`, `temperature_c` columns
   * @param configInput - OCV table, thresholds, SoH weights and cell baselines
   * @param options - Measurement the resulting metrics belong to
   * @throws ConfigurationError when the configuration is unusable
   * @throws ParseError when no row of the batch yields a valid sample
   */
  processBatch(
    rows: readonly RawTelemetryRow[],
    configInput: EngineConfigInput,
    options: ProcessBatchOptions,
  ): BatchResult {
    const { measurementId } = options;
    const config = this.validateConfig(configInput, measurementId);

    const { series, rowErrors, emptyCells } = ingestRows(
      rows,
      config.temperatureRangeC,
    );
    this.logRowErrors(rowErrors);

    if (series.length === 0) {
      throw new ParseError(
        `No valid telemetry rows in batch (${rows.length} row(s), ${rowErrors.length} rejected)`,
        rowErrors,
      );
    }

    const profiles = this.resolveProfiles(config, series, measurementId);

    const failures: Record<string, CellFailure> = {};
    for (const cellId of emptyCells) {
      failures[cellId] = this.emptyCellFailure(cellId, rowErrors);
    }

    const metrics: HealthMetric[] = [];
    const diagnostics: Record<string, CellDiagnostics> = {};

    for (const cell of series) {
      const profile = profiles.get(cell.cellId);
      if (!profile) continue;

      try {
        const outcome = this.processCell(cell, profile, config, measurementId);
        metrics.push(outcome.metric);
        diagnostics[cell.cellId] = outcome.diagnostics;
      } catch (error) {
        if (!(error instanceof CellStageFailure)) throw error;

        const original = error.original;
        const failure: CellFailure = {
          cellId: cell.cellId,
          stage: error.stage,
          errorName: original instanceof Error ? original.name : 'Error',
          message: error.message,
        };
        if (error.socPercent !== undefined) {
          failure.socPercent = error.socPercent;
        }
        failures[cell.cellId] = failure;
        this.logger.warn(
          `Cell ${cell.cellId} failed at ${error.stage}: ${error.message}`,
        );
      }
    }

    metrics.sort((a, b) => compareCellIds(a.cellId, b.cellId));

    this.logger.log(
      `Measurement ${measurementId}: ${metrics.length} cell(s) processed, ${Object.keys(failures).length} failed, ${rowErrors.length} row error(s)`,
    );

    return { measurementId, metrics, failures, rowErrors, diagnostics };
  }

  private validateConfig(
    configInput: EngineConfigInput,
    measurementId: number,
  ): EngineConfig {
    try {
      return validateEngineConfig(configInput);
    } catch (error) {
      if (error instanceof ConfigurationError) {
        this.logger.error(
          `Measurement ${measurementId} rejected: ${error.message}`,
        );
      }
      throw error;
    }
  }

  private resolveProfiles(
    config: EngineConfig,
    series: readonly CellSeries[],
    measurementId: number,
  ): Map<string, CellProfile> {
    try {
      return resolveCellProfiles(
        config,
        series.map((s) => s.cellId),
      );
    } catch (error) {
      if (error instanceof ConfigurationError) {
        this.logger.error(
          `Measurement ${measurementId} rejected: ${error.message}`,
        );
      }
      throw error;
    }
  }

  private processCell(
    cell: CellSeries,
    profile: CellProfile,
    config: EngineConfig,
    measurementId: number,
  ): { metric: HealthMetric; diagnostics: CellDiagnostics } {
    const representative = pickRepresentative(
      cell.samples,
      config.representativeSample,
    );

    const socPercent = runStage('soc', () =>
      interpolateSoc(representative.voltageV, config.ocvTable),
    );
    const soc = round2(socPercent);

    const resistanceFit = runStage(
      'resistance',
      () => estimateResistance(cell.samples, config.resistance),
      soc,
    );
    const fittedMohm = resistanceFromFit(resistanceFit);
    if (fittedMohm < 0) {
      this.logger.warn(
        `Cell ${cell.cellId}: voltage rises with current (slope ${resistanceFit.slope}); resistance reported as 0`,
      );
    }
    const resistanceMohm = Math.max(0, fittedMohm);

    const sohPercent = runStage(
      'soh',
      () =>
        estimateSoh(
          { ...profile, resistanceMohm },
          config.sohWeights,
          config.ratedCycleLife,
        ),
      soc,
    );

    const values: Record<MetricType, number> = {
      soc,
      soh: round2(sohPercent),
      resistance: round2(resistanceMohm),
      temperature: round2(representative.temperatureC),
    };

    const classification = runStage(
      'thresholds',
      () => classify(values, config.thresholds),
      soc,
    );

    const metric: HealthMetric = Object.freeze({
      cellId: cell.cellId,
      measurementId,
      socPercent: values.soc,
      sohPercent: values.soh,
      internalResistanceMohm: values.resistance,
      temperatureC: values.temperature,
      passesThreshold: classification.passesThreshold,
      severity: classification.severity,
    });

    return {
      metric,
      diagnostics: { resistanceFit, breaches: classification.breaches },
    };
  }

  private emptyCellFailure(cellId: string, rowErrors: RowError[]): CellFailure {
    const errors = rowErrors.filter((e) => e.cellId === cellId);
    const first = errors[0];
    return {
      cellId,
      stage: 'ingestion',
      errorName: first?.errorName ?? 'ValidationError',
      message: `All ${errors.length} row(s) rejected${first ? `; first: ${first.message}` : ''}`,
    };
  }

  /**
   * Log a warning for rejected rows, but only for the first few
   */
  private logRowErrors(rowErrors: readonly RowError[]): void {
    rowErrors.slice(0, 5).forEach((e) => {
      this.logger.warn(`Row ${e.row}: ${e.errorName}: ${e.message}`);
    });
    if (rowErrors.length > 5) {
      this.logger.warn(`${rowErrors.length - 5} more row error(s) suppressed`);
    }
  }
}
