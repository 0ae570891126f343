/**
 * Shared types for the battery health processing engine.
 *
 * Current sign convention: positive `currentA` means discharge (current drawn
 * from the cell). Under load the terminal voltage sags, so a healthy fit of
 * voltage against current has a negative slope.
 */

/**
 * Raw input row as handed over by the caller (CSV reader, API layer, ...).
 * Keys follow the tabular column names; unknown keys are ignored.
 */
export type RawTelemetryRow = Readonly<Record<string, unknown>>;

/**
 * A decoded and range-checked telemetry reading for one cell.
 */
export interface TelemetrySample {
  timestamp: Date;
  cellId: string;
  voltageV: number;
  currentA: number;
  temperatureC: number;
}

/**
 * All valid samples of one cell, sorted by timestamp ascending.
 * Built by the aggregator for a single batch.
 */
export interface CellSeries {
  cellId: string;
  samples: TelemetrySample[];
}

export interface OcvTablePoint {
  voltageV: number;
  socPercent: number;
}

export type OcvTable = readonly OcvTablePoint[];

export interface ResistanceFit {
  slope: number;
  intercept: number;
  rSquared: number;
  sampleCount: number;
}

export type MetricType = 'soc' | 'soh' | 'resistance' | 'temperature';

export const METRIC_TYPES: readonly MetricType[] = [
  'soc',
  'soh',
  'resistance',
  'temperature',
];

export type Severity = 'none' | 'warning' | 'critical';

/** Severities a configured threshold may carry */
export type ThresholdSeverity = Exclude<Severity, 'none'>;

export interface Threshold {
  metricType: MetricType;
  minValue?: number;
  maxValue?: number;
  severity: ThresholdSeverity;
}

export interface HealthMetric {
  cellId: string;
  measurementId: number;
  socPercent: number;
  sohPercent: number;
  internalResistanceMohm: number;
  temperatureC: number;
  passesThreshold: boolean;
  severity: Severity;
}

/**
 * Per-cell baseline and nominal values used by the SoH estimator.
 */
export interface CellProfile {
  nominalCapacityAh: number;
  measuredCapacityAh: number;
  baselineResistanceMohm: number;
  cycleCount: number;
}

export interface SohWeights {
  capacity: number;
  resistance: number;
  cycle: number;
}

export type ProcessingStage =
  | 'ingestion'
  | 'soc'
  | 'resistance'
  | 'soh'
  | 'thresholds';

/**
 * Row-level problem found during ingestion. `errorName` is the name of the
 * ParseError or ValidationError raised for the row.
 */
export interface RowError {
  /** 1-based position of the row in the batch */
  row: number;
  cellId?: string;
  errorName: 'ParseError' | 'ValidationError';
  message: string;
}

export interface CellFailure {
  cellId: string;
  stage: ProcessingStage;
  errorName: string;
  message: string;
  /** Rounded SoC, present when the cell failed after the SoC stage */
  socPercent?: number;
}

export interface ThresholdBreach {
  metricType: MetricType;
  value: number;
  threshold: Threshold;
  margin: number;
}

export interface CellDiagnostics {
  resistanceFit: ResistanceFit;
  breaches: ThresholdBreach[];
}

export interface BatchResult {
  measurementId: number;
  metrics: HealthMetric[];
  failures: Record<string, CellFailure>;
  rowErrors: RowError[];
  diagnostics: Record<string, CellDiagnostics>;
}

export interface ProcessBatchOptions {
  measurementId: number;
}
