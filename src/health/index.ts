// Re-export public API
export { HealthModule } from './health.module';
export { HealthProcessingService } from './health-processing.service';
export { HealthReportService } from './health-report.service';
export type { HealthReport } from './health-report.service';
export { TelemetryCsvReader } from './readers/telemetry-csv.reader';
export {
  EngineConfigSchema,
  validateEngineConfig,
} from './config/engine-config.schema';
export type {
  EngineConfig,
  EngineConfigInput,
} from './config/engine-config.schema';
export {
  HealthProcessingError,
  ParseError,
  ValidationError,
  InsufficientDataError,
  ConfigurationError,
} from './errors/health-errors';
export { interpolateSoc } from './processing/ocv-interpolator';
export {
  estimateResistance,
  fitVoltageCurrent,
} from './processing/resistance-estimator';
export { estimateSoh } from './processing/soh-estimator';
export { evaluateThresholds } from './processing/threshold-evaluator';
export { ingestRows } from './processing/sample-ingestion';
export * from './interfaces/health-types';
