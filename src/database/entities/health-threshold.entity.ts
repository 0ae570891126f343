import { Entity, Column, PrimaryGeneratedColumn } from 'typeorm';

/**
 * HealthThreshold Entity
 *
 * Severity band for one metric type. Several rows may target the same
 * metric type (e.g. a warning band and a critical band).
 *
 * Seed rows used by the default deployment:
 *   soh         min 80 warning,  min 70 critical
 *   resistance  max 100 warning, max 150 critical
 *   temperature max 45 warning,  max 55 critical
 */
@Entity('health_thresholds')
export class HealthThresholdEntity {
  @PrimaryGeneratedColumn()
  thresholdId!: number;

  /** 'soc' | 'soh' | 'resistance' | 'temperature' */
  @Column({ type: 'varchar', length: 50 })
  metricType!: string;

  @Column({ type: 'float', nullable: true })
  minValue!: number | null;

  @Column({ type: 'float', nullable: true })
  maxValue!: number | null;

  /** 'warning' | 'critical' */
  @Column({ type: 'varchar', length: 50 })
  severity!: string;
}
