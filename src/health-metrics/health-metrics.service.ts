import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { FindOptionsWhere, Repository } from 'typeorm';
import { QueryDeepPartialEntity } from 'typeorm/query-builder/QueryPartialEntity';
import { HealthMetricEntity } from '../database/entities/health-metric.entity';
import { HealthThresholdEntity } from '../database/entities/health-threshold.entity';
import { ThresholdSchema } from '../health/config/engine-config.schema';
import { ConfigurationError } from '../health/errors/health-errors';
import {
  HealthMetric,
  Severity,
  Threshold,
} from '../health/interfaces/health-types';

export interface HealthMetricFilter {
  measurementId?: number;
  passesThreshold?: boolean;
}

const SEVERITIES: readonly Severity[] = ['none', 'warning', 'critical'];

function toSeverity(value: string): Severity {
  return SEVERITIES.find((s) => s === value) ?? 'none';
}

/**
 * HealthMetricsService - Storage collaborator of the health engine
 *
 * Persists HealthMetric rows keyed by (measurementId, cellId) and serves the
 * stored threshold bands. Holds no engine logic.
 */
@Injectable()
export class HealthMetricsService {
  private readonly logger = new Logger(HealthMetricsService.name);

  constructor(
    @InjectRepository(HealthMetricEntity)
    private readonly metricRepository: Repository<HealthMetricEntity>,
    @InjectRepository(HealthThresholdEntity)
    private readonly thresholdRepository: Repository<HealthThresholdEntity>,
  ) {}

  /**
   * Upsert metrics (ON CONFLICT (measurementId, cellId) DO UPDATE)
   *
   * @returns Number of rows written
   */
  async saveMetrics(metrics: readonly HealthMetric[]): Promise<number> {
    if (metrics.length === 0) return 0;

    const values: QueryDeepPartialEntity<HealthMetricEntity>[] = metrics.map(
      (m) => ({
        measurementId: m.measurementId,
        cellId: m.cellId,
        socPercent: m.socPercent,
        sohPercent: m.sohPercent,
        internalResistanceMohm: m.internalResistanceMohm,
        temperatureC: m.temperatureC,
        passesThreshold: m.passesThreshold,
        severity: m.severity,
      }),
    );

    try {
      const result = await this.metricRepository
        .createQueryBuilder()
        .insert()
        .into(HealthMetricEntity)
        .values(values)
        .orUpdate(
          [
            'socPercent',
            'sohPercent',
            'internalResistanceMohm',
            'temperatureC',
            'passesThreshold',
            'severity',
          ],
          ['measurementId', 'cellId'],
        )
        .execute();

      return result.identifiers.length;
    } catch (error) {
      this.logger.error('Health metric upsert failed', {
        batchSize: metrics.length,
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }
  }

  async findMetrics(filter: HealthMetricFilter = {}): Promise<HealthMetric[]> {
    const where: FindOptionsWhere<HealthMetricEntity> = {};
    if (filter.measurementId !== undefined) {
      where.measurementId = filter.measurementId;
    }
    if (filter.passesThreshold !== undefined) {
      where.passesThreshold = filter.passesThreshold;
    }

    const rows = await this.metricRepository.find({
      where,
      order: { measurementId: 'ASC', cellId: 'ASC' },
    });

    return rows.map((row) => ({
      cellId: row.cellId,
      measurementId: row.measurementId,
      socPercent: row.socPercent,
      sohPercent: row.sohPercent,
      internalResistanceMohm: row.internalResistanceMohm,
      temperatureC: row.temperatureC,
      passesThreshold: row.passesThreshold,
      severity: toSeverity(row.severity),
    }));
  }

  /**
   * Stored threshold bands as engine thresholds.
   *
   * @throws ConfigurationError if any stored row is malformed (unknown
   * metric type or severity, no bound, min above max)
   */
  async findThresholds(): Promise<Threshold[]> {
    const rows = await this.thresholdRepository.find({
      order: { thresholdId: 'ASC' },
    });

    const thresholds: Threshold[] = [];
    const issues: string[] = [];

    for (const row of rows) {
      const parsed = ThresholdSchema.safeParse({
        metricType: row.metricType,
        minValue: row.minValue,
        maxValue: row.maxValue,
        severity: row.severity,
      });
      if (parsed.success) {
        thresholds.push(parsed.data);
      } else {
        for (const issue of parsed.error.issues) {
          issues.push(`threshold ${row.thresholdId}: ${issue.message}`);
        }
      }
    }

    if (issues.length > 0) {
      throw new ConfigurationError('Invalid stored thresholds', issues);
    }
    return thresholds;
  }
}
