/**
 * Unit tests for tick validation
 */

import { validateTicks } from '../tickValidationService';
import { Tick } from '../../types';

function ticksAt(entries: Array<[number, number]>): Tick[] {
  return entries.map(([timestamp, price]) => ({ timestamp, price }));
}

describe('validateTicks', () => {
  it('should fail an empty series', () => {
    const result = validateTicks([]);

    expect(result.isValid).toBe(false);
    expect(result.errors).toEqual(['No ticks provided']);
  });

  it('should pass a regular series', () => {
    const result = validateTicks(ticksAt([[1000, 10], [2000, 11], [3000, 10.5]]));

    expect(result.isValid).toBe(true);
    expect(result.errors).toEqual([]);
    expect(result.warnings).toEqual([]);
  });

  it('should warn about duplicate timestamps and large gaps', () => {
    const result = validateTicks(ticksAt([[1000, 10], [2000, 11], [2000, 12], [3000, 13], [10000, 14]]));

    expect(result.isValid).toBe(true);
    expect(result.warnings).toEqual([
      'Duplicate timestamp 1970-01-01T00:00:02.000Z',
      'Large time gap detected: 7000ms (expected ~1000ms) at 1970-01-01T00:00:03.000Z',
    ]);
    expect(result.check).toEqual({ priceAnomalies: 0, outOfOrder: 0, duplicateTimestamps: 1, timeGaps: 1 });
  });

  it('should fail invalid prices and timestamps going backwards', () => {
    const result = validateTicks(ticksAt([[1000, 10], [500, -1]]));

    expect(result.isValid).toBe(false);
    expect(result.errors).toEqual([
      'Invalid price -1 at 1970-01-01T00:00:00.500Z',
      'Timestamp goes backwards at 1970-01-01T00:00:00.500Z',
    ]);
    expect(result.check.priceAnomalies).toBe(1);
    expect(result.check.outOfOrder).toBe(1);
  });

  it('should fail a tick without a usable timestamp', () => {
    const result = validateTicks([{ timestamp: NaN, price: 10 }]);

    expect(result.errors).toEqual(['Invalid timestamp: NaN']);
  });
});
