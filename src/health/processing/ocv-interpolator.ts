import { ConfigurationError } from '../errors/health-errors';
import { OcvTable } from '../interfaces/health-types';

/**
 * Collect structural problems of an OCV table.
 * Empty result means the table is usable for interpolation.
 */
export function findOcvTableIssues(table: OcvTable): string[] {
  const issues: string[] = [];

  if (table.length < 2) {
    issues.push(`OCV table needs at least 2 points, got ${table.length}`);
    return issues;
  }

  for (let i = 1; i < table.length; i++) {
    const prev = table[i - 1];
    const curr = table[i];
    if (!(curr.voltageV > prev.voltageV)) {
      issues.push(
        `OCV table voltage must be strictly increasing (point ${i}: ${curr.voltageV} V after ${prev.voltageV} V)`,
      );
    }
    if (curr.socPercent < prev.socPercent) {
      issues.push(
        `OCV table SoC must be non-decreasing (point ${i}: ${curr.socPercent}% after ${prev.socPercent}%)`,
      );
    }
  }

  return issues;
}

/**
 * Map a voltage reading to SoC percent by linear interpolation over the
 * open-circuit-voltage table.
 *
 * Voltages outside the table clamp to the first/last entry. A voltage that
 * equals a table entry returns that entry's SoC exactly.
 *
 * @throws ConfigurationError if the table is too short or not monotonic
 */
export function interpolateSoc(voltageV: number, table: OcvTable): number {
  const issues = findOcvTableIssues(table);
  if (issues.length > 0) {
    throw new ConfigurationError('Invalid OCV table', issues);
  }

  const first = table[0];
  const last = table[table.length - 1];

  if (voltageV <= first.voltageV) return first.socPercent;
  if (voltageV >= last.voltageV) return last.socPercent;

  // Largest index whose voltage is <= the reading
  let lo = 0;
  let hi = table.length - 1;
  while (hi - lo > 1) {
    const mid = (lo + hi) >> 1;
    if (table[mid].voltageV <= voltageV) {
      lo = mid;
    } else {
      hi = mid;
    }
  }

  const lower = table[lo];
  const upper = table[hi];

  if (lower.voltageV === voltageV) return lower.socPercent;

  return (
    lower.socPercent +
    ((voltageV - lower.voltageV) * (upper.socPercent - lower.socPercent)) /
      (upper.voltageV - lower.voltageV)
  );
}
