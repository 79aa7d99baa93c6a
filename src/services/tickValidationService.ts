/**
 * Tick Validation Service
 * Checks a tick series before it is replayed through a strategy
 */

import { Tick } from '../types';
import { formatTimestamp } from '../utils/timeUtils';

export interface ValidationResult {
  isValid: boolean;
  errors: string[];
  warnings: string[];
}

export interface DataQualityCheck {
  priceAnomalies: number;
  outOfOrder: number;
  duplicateTimestamps: number;
  timeGaps: number;
}

/**
 * Validate a tick series
 * Errors: empty series, non-finite or non-positive prices, decreasing timestamps
 * Warnings: duplicate timestamps, gaps larger than twice the most common interval
 */
export function validateTicks(ticks: Tick[]): ValidationResult & { check: DataQualityCheck } {
  const errors: string[] = [];
  const warnings: string[] = [];
  const check: DataQualityCheck = {
    priceAnomalies: 0,
    outOfOrder: 0,
    duplicateTimestamps: 0,
    timeGaps: 0,
  };

  if (ticks.length === 0) {
    errors.push('No ticks provided');
    return { isValid: false, errors, warnings, check };
  }

  for (const tick of ticks) {
    if (!Number.isFinite(tick.timestamp)) {
      check.priceAnomalies++;
      errors.push(`Invalid timestamp: ${tick.timestamp}`);
      continue;
    }
    if (!Number.isFinite(tick.price) || tick.price <= 0) {
      check.priceAnomalies++;
      errors.push(`Invalid price ${tick.price} at ${formatTimestamp(tick.timestamp)}`);
    }
  }

  const intervals: number[] = [];
  for (let i = 1; i < ticks.length; i++) {
    const delta = ticks[i].timestamp - ticks[i - 1].timestamp;
    if (delta < 0) {
      check.outOfOrder++;
      errors.push(`Timestamp goes backwards at ${formatTimestamp(ticks[i].timestamp)}`);
    } else if (delta === 0) {
      check.duplicateTimestamps++;
      warnings.push(`Duplicate timestamp ${formatTimestamp(ticks[i].timestamp)}`);
    } else if (delta > 0) {
      intervals.push(delta);
    }
  }

  if (intervals.length > 0) {
    // Most common interval (mode)
    const intervalCounts = new Map<number, number>();
    for (const interval of intervals) {
      intervalCounts.set(interval, (intervalCounts.get(interval) || 0) + 1);
    }
    const mostCommonInterval = Array.from(intervalCounts.entries())
      .sort((a, b) => b[1] - a[1] || a[0] - b[0])[0][0];

    for (let i = 1; i < ticks.length; i++) {
      const delta = ticks[i].timestamp - ticks[i - 1].timestamp;
      if (delta > mostCommonInterval * 2) {
        check.timeGaps++;
        warnings.push(
          `Large time gap detected: ${delta}ms (expected ~${mostCommonInterval}ms) at ${formatTimestamp(ticks[i - 1].timestamp)}`
        );
      }
    }
  }

  return {
    isValid: errors.length === 0,
    errors,
    warnings,
    check,
  };
}
