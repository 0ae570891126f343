import { Test, TestingModule } from '@nestjs/testing';
import { INestApplicationContext } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { getRepositoryToken } from '@nestjs/typeorm';
import * as path from 'path';
import * as fs from 'fs';
import engineConfig from '../src/config/engine.config';
import { HealthModule, HealthReportService } from '../src/health';
import { HealthMetricEntity } from '../src/database/entities/health-metric.entity';
import { HealthThresholdEntity } from '../src/database/entities/health-threshold.entity';

/**
 * E2E Tests for HealthReportService
 *
 * Uses the real HealthModule (reader + engine + storage service) and the
 * bundled engine configuration, but overrides both TypeORM repositories to
 * prevent actual database access.
 */
describe('HealthReportService (e2e)', () => {
  let app: INestApplicationContext;
  let reportService: HealthReportService;
  let mockQueryBuilder: {
    insert: jest.Mock;
    into: jest.Mock;
    values: jest.Mock;
    orUpdate: jest.Mock;
    execute: jest.Mock;
  };
  let mockThresholdRepository: { find: jest.Mock };

  const fixturePath = path.join(__dirname, 'fixtures', 'pack-telemetry.csv');
  const originalConfigPath = process.env.ENGINE_CONFIG_PATH;

  beforeAll(() => {
    if (!fs.existsSync(fixturePath)) {
      throw new Error(`Test fixture not found: ${fixturePath}`);
    }
    delete process.env.ENGINE_CONFIG_PATH;
  });

  afterAll(() => {
    if (originalConfigPath !== undefined) {
      process.env.ENGINE_CONFIG_PATH = originalConfigPath;
    }
  });

  beforeEach(async () => {
    mockQueryBuilder = {
      insert: jest.fn().mockReturnThis(),
      into: jest.fn().mockReturnThis(),
      values: jest.fn().mockReturnThis(),
      orUpdate: jest.fn().mockReturnThis(),
      execute: jest.fn().mockResolvedValue({
        identifiers: [
          { measurementId: 42, cellId: '1' },
          { measurementId: 42, cellId: '2' },
        ],
      }),
    };
    mockThresholdRepository = { find: jest.fn().mockResolvedValue([]) };

    const moduleFixture: TestingModule = await Test.createTestingModule({
      imports: [
        ConfigModule.forRoot({
          isGlobal: true,
          ignoreEnvFile: true,
          load: [engineConfig],
        }),
        HealthModule,
      ],
    })
      .overrideProvider(getRepositoryToken(HealthMetricEntity))
      .useValue({ createQueryBuilder: jest.fn(() => mockQueryBuilder) })
      .overrideProvider(getRepositoryToken(HealthThresholdEntity))
      .useValue(mockThresholdRepository)
      .compile();

    app = await moduleFixture.init();
    reportService = app.get(HealthReportService);
  });

  afterEach(async () => {
    await app.close();
  });

  it('should store one metric per healthy cell', async () => {
    const report = await reportService.processFile(
      42,
      'pack-telemetry.csv',
      fs.readFileSync(fixturePath),
    );

    expect(report.metricsCreated).toBe(2);
    expect(mockQueryBuilder.values).toHaveBeenCalledWith([
      {
        measurementId: 42,
        cellId: '1',
        socPercent: 50,
        sohPercent: 100,
        internalResistanceMohm: 50,
        temperatureC: 25.2,
        passesThreshold: true,
        severity: 'none',
      },
      {
        measurementId: 42,
        cellId: '2',
        socPercent: 75,
        sohPercent: 100,
        internalResistanceMohm: 50,
        temperatureC: 47.8,
        passesThreshold: false,
        severity: 'warning',
      },
    ]);
  });

  it('should report failed cells and rejected rows', async () => {
    const report = await reportService.processFile(
      42,
      'pack-telemetry.csv',
      fs.readFileSync(fixturePath),
    );

    expect(report.failedCells).toBe(2);
    expect(report.failures).toEqual(
      expect.arrayContaining([
        {
          cellId: '3',
          stage: 'ingestion',
          errorName: 'ParseError',
          message: 'All 1 row(s) rejected; first: voltage_v: not a number',
        },
        expect.objectContaining({
          cellId: '4',
          stage: 'resistance',
          errorName: 'InsufficientDataError',
        }),
      ]),
    );
    expect(report.rowErrors).toEqual([
      {
        row: 7,
        cellId: '3',
        errorName: 'ParseError',
        message: 'voltage_v: not a number',
      },
    ]);
  });

  it('should apply stored thresholds over the bundled ones', async () => {
    mockThresholdRepository.find.mockResolvedValue([
      {
        thresholdId: 1,
        metricType: 'temperature',
        minValue: null,
        maxValue: 40,
        severity: 'critical',
      },
    ]);

    await reportService.processFile(
      42,
      'pack-telemetry.csv',
      fs.readFileSync(fixturePath),
    );

    const [[stored]] = mockQueryBuilder.values.mock.calls;
    expect(stored).toEqual([
      expect.objectContaining({ cellId: '1', severity: 'none' }),
      expect.objectContaining({ cellId: '2', severity: 'critical' }),
    ]);
  });

  it('should reject a file without data rows', async () => {
    await expect(
      reportService.processFile(
        43,
        'empty.csv',
        Buffer.from('timestamp,cell_id,voltage_v,current_a,temperature_c\n'),
      ),
    ).rejects.toThrow('File is empty or has no data rows');
    expect(mockQueryBuilder.execute).not.toHaveBeenCalled();
  });
});
