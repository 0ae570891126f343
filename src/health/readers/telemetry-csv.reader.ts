import { Injectable, Logger } from '@nestjs/common';
import { Readable } from 'node:stream';
import csvParser from 'csv-parser';
import { ParseError } from '../errors/health-errors';

export const REQUIRED_COLUMNS = [
  'timestamp',
  'cell_id',
  'voltage_v',
  'current_a',
  'temperature_c',
] as const;

/**
 * BMS Telemetry CSV Reader
 *
 * Reads header-first CSV exports with one reading per row:
 *
 * ```csv
 * timestamp,cell_id,voltage_v,current_a,temperature_c
 * 2025-03-01T10:00:00Z,1,3.71,2.0,25.4
 * ```
 *
 * Header names are trimmed and lower-cased. Extra columns are kept in the
 * row and ignored downstream. Values stay strings; typing happens in the
 * engine's ingestion stage.
 */
@Injectable()
export class TelemetryCsvReader {
  private readonly logger = new Logger(TelemetryCsvReader.name);

  /**
   * @throws ParseError if the file has no header, no data rows or lacks a
   * required column
   */
  async readRows(fileBuffer: Buffer): Promise<Record<string, string>[]> {
    let headers: string[] = [];
    const rows: Record<string, string>[] = [];

    const stream = Readable.from(fileBuffer).pipe(
      csvParser({
        mapHeaders: ({ header }) => header.trim().toLowerCase(),
        mapValues: ({ value }) => String(value).trim(),
      }),
    );
    stream.on('headers', (parsed: string[]) => {
      headers = parsed;
    });

    for await (const row of stream) {
      rows.push(row);
    }

    const missing = REQUIRED_COLUMNS.filter((c) => !headers.includes(c));
    if (headers.length > 0 && missing.length > 0) {
      throw new ParseError(
        `Missing required column(s): ${missing.join(', ')}`,
      );
    }
    if (rows.length === 0) {
      throw new ParseError('File is empty or has no data rows');
    }

    this.logger.debug(
      `Read ${rows.length} row(s) with columns: ${headers.join(', ')}`,
    );
    return rows;
  }
}
