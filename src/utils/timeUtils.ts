/**
 * Time utility functions
 */

const UNIT_MS: Record<string, number> = {
  m: 60 * 1000,
  h: 60 * 60 * 1000,
  d: 24 * 60 * 60 * 1000,
  w: 7 * 24 * 60 * 60 * 1000,
};

/**
 * Convert timeframe string to milliseconds
 * Supports: 1m, 3m, 5m, 15m, 30m, 1h, 2h, 4h, 6h, 8h, 12h, 1d, 3d, 1w
 */
export function getIntervalMs(interval: string): number {
  const unit = interval.slice(-1);
  const value = parseInt(interval.slice(0, -1), 10);
  const unitMs = UNIT_MS[unit];

  if (unitMs === undefined) {
    throw new Error(`Unknown interval unit: ${unit}`);
  }
  if (!Number.isFinite(value) || value <= 0) {
    throw new Error(`Invalid interval: ${interval}`);
  }
  return value * unitMs;
}

/**
 * Parse a timestamp given as epoch milliseconds or an ISO date string
 * @returns epoch milliseconds, or NaN when the text is neither
 */
export function parseTimestamp(text: string): number {
  const trimmed = text.trim();
  if (/^-?\d+(\.\d+)?$/.test(trimmed)) {
    return Number(trimmed);
  }
  return trimmed === '' ? NaN : Date.parse(trimmed);
}

/**
 * Format epoch milliseconds for logs and reports
 */
export function formatTimestamp(timestamp: number | null): string {
  if (timestamp === null) {
    return '-';
  }
  return Number.isFinite(timestamp) ? new Date(timestamp).toISOString() : String(timestamp);
}
