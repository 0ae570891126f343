import { ConfigurationError } from '../errors/health-errors';
import {
  MetricType,
  Severity,
  Threshold,
  ThresholdBreach,
} from '../interfaces/health-types';

export interface ThresholdEvaluation {
  passesThreshold: boolean;
  severity: Severity;
  /** The breach that decided the severity, if any */
  breach?: ThresholdBreach;
}

const SEVERITY_RANK: Record<Severity, number> = {
  none: 0,
  warning: 1,
  critical: 2,
};

export function severityRank(severity: Severity): number {
  return SEVERITY_RANK[severity];
}

/** The more severe of two severities */
export function worstSeverity(a: Severity, b: Severity): Severity {
  return SEVERITY_RANK[b] > SEVERITY_RANK[a] ? b : a;
}

/**
 * Collect structural problems of a threshold row.
 * Accepts `null` bounds as stored by the persistence layer.
 */
export function findThresholdIssues(threshold: {
  minValue?: number | null;
  maxValue?: number | null;
}): string[] {
  const { minValue, maxValue } = threshold;
  const hasMin = minValue !== undefined && minValue !== null;
  const hasMax = maxValue !== undefined && maxValue !== null;

  if (!hasMin && !hasMax) {
    return ['threshold needs a minValue or a maxValue'];
  }
  if (hasMin && hasMax && minValue > maxValue) {
    return [`minValue ${minValue} is greater than maxValue ${maxValue}`];
  }
  return [];
}

/**
 * How far a value lies outside a threshold band; `null` when inside.
 * Equality at a bound is not a breach.
 */
export function breachMargin(value: number, threshold: Threshold): number | null {
  let margin: number | null = null;

  if (threshold.minValue !== undefined && value < threshold.minValue) {
    margin = threshold.minValue - value;
  }
  if (threshold.maxValue !== undefined && value > threshold.maxValue) {
    const over = value - threshold.maxValue;
    margin = margin === null ? over : Math.max(margin, over);
  }

  return margin;
}

/**
 * Resolve a metric value against the configured severity bands.
 *
 * The most severe breached threshold wins. Among breaches of equal severity
 * the one with the largest margin wins, then the earliest in configuration
 * order.
 *
 * @throws ConfigurationError for a threshold without any bound
 */
export function evaluateThresholds(
  metricType: MetricType,
  value: number,
  thresholds: readonly Threshold[],
): ThresholdEvaluation {
  let decisive: ThresholdBreach | undefined;

  for (const [index, threshold] of thresholds.entries()) {
    if (threshold.metricType !== metricType) continue;

    const issues = findThresholdIssues(threshold);
    if (issues.length > 0) {
      throw new ConfigurationError(
        `Invalid ${metricType} threshold at index ${index}`,
        issues,
      );
    }

    const margin = breachMargin(value, threshold);
    if (margin === null) continue;

    const candidate: ThresholdBreach = { metricType, value, threshold, margin };
    if (!decisive || outranks(candidate, decisive)) {
      decisive = candidate;
    }
  }

  if (!decisive) {
    return { passesThreshold: true, severity: 'none' };
  }

  return {
    passesThreshold: false,
    severity: decisive.threshold.severity,
    breach: decisive,
  };
}

function outranks(a: ThresholdBreach, b: ThresholdBreach): boolean {
  const rankA = SEVERITY_RANK[a.threshold.severity];
  const rankB = SEVERITY_RANK[b.threshold.severity];
  if (rankA !== rankB) return rankA > rankB;
  return a.margin > b.margin;
}
