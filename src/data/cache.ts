/**
 * Historical data cache manager
 * Persists kline data to local files to reduce API requests
 */

import * as fs from "fs";
import * as path from "path";
import { Kline } from "../types";
import { getIntervalMs } from "../utils/timeUtils";
import { StructuredLogger, logger as defaultLogger } from "../utils/logger";

export interface CacheMetadata {
  symbol: string;
  interval: string;
  firstTimestamp: number;
  lastTimestamp: number;
  count: number;
  updatedAt: number;
}

export interface CachedData {
  metadata: CacheMetadata;
  klines: Kline[];
}

const KLINE_FIELDS = ["openTime", "closeTime", "open", "high", "low", "close", "volume"] as const;

function isKline(value: unknown): value is Kline {
  if (typeof value !== "object" || value === null) {
    return false;
  }
  const record: Record<string, unknown> = { ...value };
  return KLINE_FIELDS.every((field) => typeof record[field] === "number");
}

function isCacheMetadata(value: unknown): value is CacheMetadata {
  if (typeof value !== "object" || value === null) {
    return false;
  }
  const record: Record<string, unknown> = { ...value };
  return (
    typeof record.symbol === "string" &&
    typeof record.interval === "string" &&
    typeof record.firstTimestamp === "number" &&
    typeof record.lastTimestamp === "number"
  );
}

function parseCachedData(content: string): CachedData | null {
  const data: unknown = JSON.parse(content);
  if (typeof data !== "object" || data === null || !("metadata" in data) || !("klines" in data)) {
    return null;
  }
  const { metadata, klines } = data;
  if (!isCacheMetadata(metadata) || !Array.isArray(klines) || !klines.every(isKline)) {
    return null;
  }
  return { metadata, klines };
}

export class DataCache {
  private cacheDir: string;
  private logger: StructuredLogger;

  constructor(cacheDir: string = "data/cache", logger: StructuredLogger = defaultLogger) {
    this.cacheDir = cacheDir;
    this.logger = logger;
    this.ensureCacheDir();
  }

  /**
   * Ensure cache directory exists
   */
  private ensureCacheDir(): void {
    if (!fs.existsSync(this.cacheDir)) {
      fs.mkdirSync(this.cacheDir, { recursive: true });
    }
  }

  private getCacheFilePath(symbol: string, interval: string): string {
    return path.join(this.cacheDir, `${symbol}_${interval}.json`);
  }

  /**
   * Load cached data from file; a missing or malformed file reads as no cache
   */
  loadCache(symbol: string, interval: string): CachedData | null {
    const filePath = this.getCacheFilePath(symbol, interval);

    if (!fs.existsSync(filePath)) {
      return null;
    }

    try {
      const data = parseCachedData(fs.readFileSync(filePath, "utf-8"));
      if (!data) {
        this.logger.warn(`Ignoring malformed cache file ${filePath}`);
      }
      return data;
    } catch (error: unknown) {
      this.logger.warn(`Failed to load cache from ${filePath}`, {
        error: error instanceof Error ? error.message : String(error),
      });
      return null;
    }
  }

  /**
   * Save data to cache file
   */
  saveCache(symbol: string, interval: string, klines: Kline[]): void {
    if (klines.length === 0) {
      return;
    }

    const sorted = [...klines].sort((a, b) => a.openTime - b.openTime);

    const data: CachedData = {
      metadata: {
        symbol,
        interval,
        firstTimestamp: sorted[0].openTime,
        lastTimestamp: sorted[sorted.length - 1].openTime,
        count: sorted.length,
        updatedAt: Date.now(),
      },
      klines: sorted,
    };

    const filePath = this.getCacheFilePath(symbol, interval);

    try {
      fs.writeFileSync(filePath, JSON.stringify(data, null, 2), "utf-8");
    } catch (error: unknown) {
      this.logger.warn(`Failed to save cache to ${filePath}`, {
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  /**
   * Merge new klines with existing cache
   * Removes duplicates and sorts by timestamp
   */
  mergeCache(symbol: string, interval: string, newKlines: Kline[]): CachedData | null {
    const existing = this.loadCache(symbol, interval);

    const klineMap = new Map<number, Kline>();
    for (const kline of existing?.klines ?? []) {
      klineMap.set(kline.openTime, kline);
    }
    for (const kline of newKlines) {
      klineMap.set(kline.openTime, kline);
    }

    const merged = Array.from(klineMap.values()).sort((a, b) => a.openTime - b.openTime);
    this.saveCache(symbol, interval, merged);

    return this.loadCache(symbol, interval);
  }

  /**
   * Get cached klines within time range
   */
  getCachedKlines(symbol: string, interval: string, startTime: number, endTime: number): Kline[] {
    const cached = this.loadCache(symbol, interval);
    if (!cached) {
      return [];
    }
    return cached.klines.filter((k) => k.openTime >= startTime && k.openTime <= endTime);
  }

  /**
   * Find gaps in cached data for a given time range
   * Returns array of [startTime, endTime] tuples for missing periods
   * Gaps shorter than one interval are ignored
   */
  findGaps(symbol: string, interval: string, startTime: number, endTime: number): Array<[number, number]> {
    const cached = this.loadCache(symbol, interval);

    if (!cached || cached.klines.length === 0) {
      return [[startTime, endTime]];
    }

    const firstOpenTime = cached.klines[0].openTime;
    const lastCloseTime = cached.klines[cached.klines.length - 1].closeTime;

    if (startTime >= firstOpenTime && endTime <= lastCloseTime) {
      return [];
    }

    const intervalMs = getIntervalMs(interval);
    const gaps: Array<[number, number]> = [];

    if (startTime < firstOpenTime && firstOpenTime - startTime >= intervalMs) {
      gaps.push([startTime, firstOpenTime - 1]);
    }
    if (endTime > lastCloseTime && endTime - lastCloseTime >= intervalMs) {
      gaps.push([lastCloseTime + 1, endTime]);
    }

    return gaps;
  }
}
