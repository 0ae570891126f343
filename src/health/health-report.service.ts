import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ENGINE_CONFIG_KEY } from '../config/engine.config';
import { HealthMetricsService } from '../health-metrics/health-metrics.service';
import { EngineConfig } from './config/engine-config.schema';
import { HealthProcessingError } from './errors/health-errors';
import { HealthProcessingService } from './health-processing.service';
import { CellFailure, RowError } from './interfaces/health-types';
import { TelemetryCsvReader } from './readers/telemetry-csv.reader';

/**
 * Health Report Summary
 */
export interface HealthReport {
  measurementId: number;
  filename: string;
  metricsCreated: number;
  failedCells: number;
  rowErrors: RowError[];
  failures: CellFailure[];
  durationMs: number;
}

/**
 * HealthReportService - Runs the engine for one uploaded measurement file
 *
 * Responsibilities:
 * 1. Read CSV rows from the file buffer
 * 2. Build the per-call engine configuration (file config + stored thresholds)
 * 3. Run the health engine
 * 4. Hand the resulting metrics to the storage collaborator
 *
 * Configuration and batch-level parse errors are logged and rethrown;
 * nothing is retried.
 */
@Injectable()
export class HealthReportService {
  private readonly logger = new Logger(HealthReportService.name);

  constructor(
    private readonly configService: ConfigService,
    private readonly csvReader: TelemetryCsvReader,
    private readonly processingService: HealthProcessingService,
    private readonly metricsService: HealthMetricsService,
  ) {}

  /**
   * Process a measurement file and persist its health metrics
   *
   * @param measurementId - Measurement the metrics belong to
   * @param filename - Original filename, for logging and the report
   * @param fileBuffer - CSV content
   */
  async processFile(
    measurementId: number,
    filename: string,
    fileBuffer: Buffer,
  ): Promise<HealthReport> {
    const startTime = Date.now();
    this.logger.log(
      `Processing ${filename} for measurement ${measurementId} (${fileBuffer.length} bytes)`,
    );

    try {
      const rows = await this.csvReader.readRows(fileBuffer);
      const config = await this.buildConfig();
      const result = this.processingService.processBatch(rows, config, {
        measurementId,
      });
      const metricsCreated = await this.metricsService.saveMetrics(
        result.metrics,
      );

      const failures = Object.values(result.failures);
      const report: HealthReport = {
        measurementId,
        filename,
        metricsCreated,
        failedCells: failures.length,
        rowErrors: result.rowErrors,
        failures,
        durationMs: Date.now() - startTime,
      };

      this.logger.log(
        `Report for ${filename}: ${metricsCreated} metric(s) stored, ${failures.length} cell(s) failed in ${report.durationMs}ms`,
      );
      return report;
    } catch (error) {
      if (error instanceof HealthProcessingError) {
        this.logger.error(
          `Processing failed for ${filename}: [${error.name}] ${error.message}`,
        );
      }
      throw error;
    }
  }

  /**
   * Engine configuration for one call. Stored thresholds replace the file
   * thresholds when any exist.
   */
  private async buildConfig(): Promise<EngineConfig> {
    const base = this.configService.getOrThrow<EngineConfig>(ENGINE_CONFIG_KEY);
    const stored = await this.metricsService.findThresholds();

    if (stored.length === 0) return base;

    this.logger.debug(`Using ${stored.length} stored threshold(s)`);
    return { ...base, thresholds: stored };
  }
}
