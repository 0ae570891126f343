import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { HealthMetricEntity } from '../database/entities/health-metric.entity';
import { HealthThresholdEntity } from '../database/entities/health-threshold.entity';
import { HealthMetricsService } from './health-metrics.service';

@Module({
  imports: [
    TypeOrmModule.forFeature([HealthMetricEntity, HealthThresholdEntity]),
  ],
  providers: [HealthMetricsService],
  exports: [HealthMetricsService],
})
export class HealthMetricsModule {}
