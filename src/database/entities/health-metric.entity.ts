import { Entity, Column, PrimaryColumn, Index, CreateDateColumn } from 'typeorm';

/**
 * HealthMetric Entity
 *
 * One row per cell per measurement, written by the report orchestrator after
 * an engine run.
 *
 * Composite Primary Key: [measurementId, cellId]
 * - A cell has exactly one metric per measurement
 * - Re-processing a measurement upserts instead of duplicating
 */
@Entity('health_metrics')
@Index('idx_health_metrics_cell_id', ['cellId'])
export class HealthMetricEntity {
  @PrimaryColumn({ type: 'integer' })
  measurementId!: number;

  @PrimaryColumn({ type: 'varchar', length: 64 })
  cellId!: string;

  /** State of Charge, 0-100 */
  @Column({ type: 'float' })
  socPercent!: number;

  /** State of Health, 0-100 */
  @Column({ type: 'float' })
  sohPercent!: number;

  @Column({ type: 'float' })
  internalResistanceMohm!: number;

  @Column({ type: 'float' })
  temperatureC!: number;

  @Column({ type: 'boolean', default: true })
  passesThreshold!: boolean;

  /** 'none' | 'warning' | 'critical' */
  @Column({ type: 'varchar', length: 16, default: 'none' })
  severity!: string;

  @CreateDateColumn({ type: 'timestamptz' })
  createdAt!: Date;
}
