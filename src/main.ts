import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import * as fs from 'fs';
import * as path from 'path';
import { AppModule } from './app.module';
import { HealthReportService } from './health/health-report.service';

const USAGE = 'Usage: node dist/main.js <telemetry.csv> <measurementId>';

/**
 * Process one telemetry CSV file and store its health metrics.
 */
async function bootstrap(): Promise<void> {
  const logger = new Logger('Bootstrap');
  const [filePath, measurementArg] = process.argv.slice(2);
  const measurementId = Number(measurementArg);

  if (!filePath || !Number.isInteger(measurementId) || measurementId <= 0) {
    logger.error(USAGE);
    process.exitCode = 1;
    return;
  }

  const app = await NestFactory.createApplicationContext(AppModule);
  try {
    const report = await app
      .get(HealthReportService)
      .processFile(
        measurementId,
        path.basename(filePath),
        fs.readFileSync(filePath),
      );
    logger.log(JSON.stringify(report, null, 2));
    if (report.metricsCreated === 0) process.exitCode = 2;
  } finally {
    await app.close();
  }
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error(
    error instanceof Error ? error.message : String(error),
  );
  process.exitCode = 1;
});
