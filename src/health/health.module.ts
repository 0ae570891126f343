import { Module } from '@nestjs/common';
import { HealthMetricsModule } from '../health-metrics/health-metrics.module';
import { HealthProcessingService } from './health-processing.service';
import { HealthReportService } from './health-report.service';
import { TelemetryCsvReader } from './readers/telemetry-csv.reader';

/**
 * HealthModule
 *
 * Battery health processing for uploaded BMS telemetry.
 *
 * Components:
 * - HealthProcessingService: the engine (ingestion, SoC, resistance, SoH,
 *   thresholds, per-cell aggregation)
 * - TelemetryCsvReader: header-first CSV to raw rows
 * - HealthReportService: reads a file, runs the engine, stores the metrics
 *
 * Requires a global ConfigModule with the `engine` namespace loaded.
 */
@Module({
  imports: [HealthMetricsModule],
  providers: [HealthProcessingService, HealthReportService, TelemetryCsvReader],
  exports: [HealthProcessingService, HealthReportService],
})
export class HealthModule {}
