/**
 * Unit tests for the kline cache
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { DataCache } from '../cache';
import { Kline } from '../../types';
import { StructuredLogger } from '../../utils/logger';

const HOUR = 60 * 60 * 1000;

function createLogger(): StructuredLogger {
  return { debug: jest.fn(), info: jest.fn(), warn: jest.fn(), error: jest.fn() };
}

function createKline(openTime: number, close: number): Kline {
  return { openTime, open: close, high: close, low: close, close, volume: 1, closeTime: openTime + HOUR - 1 };
}

describe('DataCache', () => {
  let dir: string;
  let logger: StructuredLogger;
  let cache: DataCache;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'kline-cache-'));
    logger = createLogger();
    cache = new DataCache(dir, logger);
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should merge, deduplicate and sort klines', () => {
    cache.saveCache('TST', '1h', [createKline(2 * HOUR, 2), createKline(0, 0)]);
    const merged = cache.mergeCache('TST', '1h', [createKline(HOUR, 1), createKline(2 * HOUR, 20)]);

    expect(merged?.klines.map((k) => k.close)).toEqual([0, 1, 20]);
    expect(merged?.metadata.count).toBe(3);
    expect(merged?.metadata.firstTimestamp).toBe(0);
    expect(merged?.metadata.lastTimestamp).toBe(2 * HOUR);
  });

  it('should return cached klines within a range', () => {
    cache.saveCache('TST', '1h', [createKline(0, 0), createKline(HOUR, 1), createKline(2 * HOUR, 2)]);

    expect(cache.getCachedKlines('TST', '1h', HOUR, 2 * HOUR).map((k) => k.close)).toEqual([1, 2]);
  });

  it('should report the missing ranges around the cached data', () => {
    cache.saveCache('TST', '1h', [createKline(10 * HOUR, 1), createKline(11 * HOUR, 2)]);

    expect(cache.findGaps('TST', '1h', 10 * HOUR, 12 * HOUR - 1)).toEqual([]);
    expect(cache.findGaps('TST', '1h', 0, 20 * HOUR)).toEqual([
      [0, 10 * HOUR - 1],
      [12 * HOUR, 20 * HOUR],
    ]);
    expect(cache.findGaps('OTHER', '1h', 0, HOUR)).toEqual([[0, HOUR]]);
  });

  it('should treat a malformed cache file as missing', () => {
    fs.writeFileSync(path.join(dir, 'TST_1h.json'), JSON.stringify({ metadata: {}, klines: [] }));

    expect(cache.loadCache('TST', '1h')).toBeNull();
    expect(logger.warn).toHaveBeenCalledWith(`Ignoring malformed cache file ${path.join(dir, 'TST_1h.json')}`);
  });
});
