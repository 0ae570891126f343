import { z } from 'zod';
import { ParseError, ValidationError } from '../errors/health-errors';
import {
  CellSeries,
  RawTelemetryRow,
  RowError,
  TelemetrySample,
} from '../interfaces/health-types';

const NUMBER_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/**
 * ISO-8601 date, optionally with a time (`T` or space separated) and a
 * zone. A time without a zone is read as UTC.
 */
const TIMESTAMP_PATTERN =
  /^(\d{4}-\d{2}-\d{2})(?:[T ](\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?)(Z|[+-]\d{2}:?\d{2})?)?$/;

function isMissing(raw: unknown): raw is undefined | null {
  return raw === undefined || raw === null;
}

/**
 * Numeric column: a finite number, or a string that parses completely
 * to one. Empty strings and trailing units are rejected.
 */
const numericField = z.unknown().transform((raw, ctx): number => {
  if (isMissing(raw)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'required' });
    return z.NEVER;
  }
  const value =
    typeof raw === 'string' && NUMBER_PATTERN.test(raw.trim())
      ? Number(raw.trim())
      : raw;
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'not a number' });
    return z.NEVER;
  }
  return value;
});

function parseTimestamp(raw: unknown): Date | null {
  if (raw instanceof Date) return new Date(raw.getTime());
  if (typeof raw === 'number' && Number.isFinite(raw)) return new Date(raw);
  if (typeof raw !== 'string') return null;

  const match = TIMESTAMP_PATTERN.exec(raw.trim());
  if (!match) return null;

  const [, date, time, zone = 'Z'] = match;
  if (time === undefined) return new Date(`${date}T00:00:00Z`);
  const offset = zone.length === 5 ? `${zone.slice(0, 3)}:${zone.slice(3)}` : zone;
  return new Date(`${date}T${time}${offset}`);
}

/**
 * Timestamp column: a Date, epoch milliseconds or an ISO-8601 string.
 */
const timestampField = z.unknown().transform((raw, ctx): Date => {
  if (isMissing(raw)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'required' });
    return z.NEVER;
  }
  const date = parseTimestamp(raw);
  if (date === null || Number.isNaN(date.getTime())) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `unparseable timestamp "${String(raw)}"`,
    });
    return z.NEVER;
  }
  return date;
});

const cellIdField = z.unknown().transform((raw, ctx): string => {
  if (typeof raw === 'number' && Number.isInteger(raw)) return String(raw);
  if (typeof raw !== 'string') {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'required' });
    return z.NEVER;
  }
  const cellId = raw.trim();
  if (cellId.length === 0) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'cell_id is empty' });
    return z.NEVER;
  }
  return cellId;
});

/**
 * Decode stage: column types only.
 */
export const TelemetryRowSchema = z.object({
  timestamp: timestampField,
  cell_id: cellIdField,
  voltage_v: numericField,
  current_a: numericField,
  temperature_c: numericField,
});

export interface TemperatureRange {
  min: number;
  max: number;
}

export const DEFAULT_TEMPERATURE_RANGE: TemperatureRange = {
  min: -40,
  max: 100,
};

/**
 * Range stage: physical plausibility of a decoded sample.
 */
export function createSampleRangeSchema(range: TemperatureRange) {
  return z.object({
    voltageV: z.number().positive('voltage_v must be > 0'),
    temperatureC: z
      .number()
      .min(range.min, `temperature_c must be >= ${range.min}`)
      .max(range.max, `temperature_c must be <= ${range.max}`),
  });
}

export type DecodeResult =
  | { ok: true; sample: TelemetrySample }
  | { ok: false; error: RowError };

export interface IngestionOutcome {
  series: CellSeries[];
  rowErrors: RowError[];
  /** Cells that appeared in the batch but kept no valid sample */
  emptyCells: string[];
}

function formatIssues(error: z.ZodError, withPath: boolean): string {
  return error.issues
    .map((issue) =>
      withPath && issue.path.length > 0
        ? `${issue.path.join('.')}: ${issue.message}`
        : issue.message,
    )
    .join('; ');
}

function toRowError(
  row: number,
  cellId: string | undefined,
  error: ParseError | ValidationError,
): RowError {
  return { row, cellId, errorName: error.name, message: error.message };
}

/** Best-effort cell id of a row that failed decoding */
function peekCellId(row: RawTelemetryRow): string | undefined {
  const parsed = cellIdField.safeParse(row['cell_id']);
  return parsed.success ? parsed.data : undefined;
}

/**
 * Decode and range-check a single raw row.
 *
 * @param rowNumber - 1-based position used in error reports
 */
export function decodeRow(
  row: RawTelemetryRow,
  rowNumber: number,
  rangeSchema = createSampleRangeSchema(DEFAULT_TEMPERATURE_RANGE),
): DecodeResult {
  const decoded = TelemetryRowSchema.safeParse(row);
  if (!decoded.success) {
    return {
      ok: false,
      error: toRowError(
        rowNumber,
        peekCellId(row),
        new ParseError(formatIssues(decoded.error, true)),
      ),
    };
  }

  const sample: TelemetrySample = {
    timestamp: decoded.data.timestamp,
    cellId: decoded.data.cell_id,
    voltageV: decoded.data.voltage_v,
    currentA: decoded.data.current_a,
    temperatureC: decoded.data.temperature_c,
  };

  const ranged = rangeSchema.safeParse(sample);
  if (!ranged.success) {
    return {
      ok: false,
      error: toRowError(
        rowNumber,
        sample.cellId,
        new ValidationError(formatIssues(ranged.error, false)),
      ),
    };
  }

  return { ok: true, sample };
}

/**
 * Parse raw rows and group the valid samples into per-cell series.
 *
 * Bad rows are reported and skipped; they never abort the batch. Series are
 * sorted by timestamp with a stable sort, so duplicate timestamps keep their
 * input order. Cells are returned in ascending id order.
 */
export function ingestRows(
  rows: readonly RawTelemetryRow[],
  temperatureRange: TemperatureRange = DEFAULT_TEMPERATURE_RANGE,
): IngestionOutcome {
  const rangeSchema = createSampleRangeSchema(temperatureRange);
  const byCell = new Map<string, TelemetrySample[]>();
  const seenCells = new Set<string>();
  const rowErrors: RowError[] = [];

  rows.forEach((row, index) => {
    const result = decodeRow(row, index + 1, rangeSchema);
    if (!result.ok) {
      rowErrors.push(result.error);
      if (result.error.cellId !== undefined) {
        seenCells.add(result.error.cellId);
      }
      return;
    }

    const { sample } = result;
    seenCells.add(sample.cellId);
    const samples = byCell.get(sample.cellId);
    if (samples) {
      samples.push(sample);
    } else {
      byCell.set(sample.cellId, [sample]);
    }
  });

  const series: CellSeries[] = [...byCell.entries()]
    .sort(([a], [b]) => compareCellIds(a, b))
    .map(([cellId, samples]) => ({
      cellId,
      samples: samples.sort(
        (a, b) => a.timestamp.getTime() - b.timestamp.getTime(),
      ),
    }));

  const emptyCells = [...seenCells]
    .filter((cellId) => !byCell.has(cellId))
    .sort(compareCellIds);

  return { series, rowErrors, emptyCells };
}

/** Code-unit order, independent of locale */
export function compareCellIds(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
