/**
 * K-line data fetcher
 * Pulls historical klines and the latest price from Binance and turns them into ticks
 * Includes local cache to reduce API requests
 */

import axios from "axios";
import { Kline, Tick } from "../types";
import { DataCache } from "./cache";
import { StructuredLogger, logger as defaultLogger } from "../utils/logger";

const BINANCE_MAX_LIMIT = 1000;

function toNumber(value: unknown, field: string, index: number): number {
  const parsed = typeof value === "number" ? value : typeof value === "string" ? parseFloat(value) : NaN;
  if (!Number.isFinite(parsed)) {
    throw new Error(`Invalid kline ${field} at row ${index}: ${String(value)}`);
  }
  return parsed;
}

/**
 * Parse the array-of-arrays payload of /api/v3/klines
 */
export function parseKlines(payload: unknown): Kline[] {
  if (!Array.isArray(payload)) {
    throw new Error("Unexpected klines payload: not an array");
  }
  return payload.map((row: unknown, index) => {
    if (!Array.isArray(row) || row.length < 7) {
      throw new Error(`Unexpected kline row at ${index}`);
    }
    return {
      openTime: toNumber(row[0], "openTime", index),
      open: toNumber(row[1], "open", index),
      high: toNumber(row[2], "high", index),
      low: toNumber(row[3], "low", index),
      close: toNumber(row[4], "close", index),
      volume: toNumber(row[5], "volume", index),
      closeTime: toNumber(row[6], "closeTime", index),
    };
  });
}

/**
 * One tick per kline: the close price at close time
 */
export function klinesToTicks(klines: Kline[]): Tick[] {
  return klines.map((k) => ({ timestamp: k.closeTime, price: k.close }));
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class DataFetcher {
  private baseUrl: string;
  private cache: DataCache;
  private useCache: boolean;
  private logger: StructuredLogger;

  constructor(
    baseUrl: string = "https://api.binance.com",
    useCache: boolean = true,
    cacheDir?: string,
    logger: StructuredLogger = defaultLogger
  ) {
    this.baseUrl = baseUrl;
    this.useCache = useCache;
    this.logger = logger;
    this.cache = new DataCache(cacheDir, logger);
  }

  /**
   * Fetch historical klines from Binance
   * @param symbol Trading pair (e.g., "BTCUSDT")
   * @param interval Timeframe (e.g., "1h", "4h")
   * @param limit Number of candles to fetch (max 1000)
   * @param endTime Optional end timestamp in ms
   */
  async fetchKlines(
    symbol: string,
    interval: string,
    limit: number = 500,
    endTime?: number
  ): Promise<Kline[]> {
    const params: Record<string, string | number> = {
      symbol,
      interval,
      limit,
    };

    if (endTime) {
      params.endTime = endTime;
    }

    let payload: unknown;
    try {
      const response = await axios.get<unknown>(`${this.baseUrl}/api/v3/klines`, {
        params,
      });
      payload = response.data;
    } catch (error: unknown) {
      throw new Error(`Failed to fetch klines: ${describeError(error)}`);
    }
    return parseKlines(payload);
  }

  /**
   * Fetch klines for a replay
   * Uses cache to reduce API requests - only fetches missing data
   */
  async fetchKlinesForRange(
    symbol: string,
    interval: string,
    startTime: number,
    endTime: number
  ): Promise<Kline[]> {
    if (!this.useCache) {
      return this.fetchKlinesFromAPI(symbol, interval, startTime, endTime);
    }

    const cachedKlines = this.cache.getCachedKlines(symbol, interval, startTime, endTime);
    const gaps = this.cache.findGaps(symbol, interval, startTime, endTime);

    if (gaps.length === 0 && cachedKlines.length > 0) {
      this.logger.info(`Cache hit: ${cachedKlines.length} ${interval} klines for ${symbol}`);
      return cachedKlines;
    }

    if (cachedKlines.length > 0) {
      this.logger.info(`Partial cache: ${cachedKlines.length} cached, fetching ${gaps.length} gap(s)`);
    } else {
      this.logger.info(`Cache miss: fetching data for ${symbol} ${interval}`);
    }

    const fetchedKlines: Kline[] = [];
    for (const [gapStart, gapEnd] of gaps) {
      const gapData = await this.fetchKlinesFromAPI(symbol, interval, gapStart, gapEnd);
      fetchedKlines.push(...gapData);

      if (gapData.length > 0) {
        this.cache.mergeCache(symbol, interval, gapData);
      }
    }

    const uniqueKlines = this.deduplicateKlines([...cachedKlines, ...fetchedKlines]);
    return uniqueKlines.sort((a, b) => a.openTime - b.openTime);
  }

  /**
   * Fetch klines from API, paging backwards from endTime
   */
  private async fetchKlinesFromAPI(
    symbol: string,
    interval: string,
    startTime: number,
    endTime: number
  ): Promise<Kline[]> {
    const allKlines: Kline[] = [];
    let currentEndTime = endTime;

    while (true) {
      const klines = await this.fetchKlines(symbol, interval, BINANCE_MAX_LIMIT, currentEndTime);

      if (klines.length === 0) break;

      const filtered = klines.filter(
        (k) => k.openTime >= startTime && k.openTime <= endTime
      );
      allKlines.unshift(...filtered);

      if (klines[0].openTime <= startTime || klines.length < BINANCE_MAX_LIMIT) {
        break;
      }

      currentEndTime = klines[0].openTime - 1;

      // Small delay to avoid rate limiting
      await new Promise((resolve) => setTimeout(resolve, 100));
    }

    return allKlines.sort((a, b) => a.openTime - b.openTime);
  }

  /**
   * Remove duplicate klines (same openTime)
   */
  private deduplicateKlines(klines: Kline[]): Kline[] {
    const map = new Map<number, Kline>();
    for (const kline of klines) {
      map.set(kline.openTime, kline);
    }
    return Array.from(map.values());
  }

  /**
   * Get current price as a tick stamped with the local clock
   */
  async getCurrentTick(symbol: string): Promise<Tick> {
    let payload: unknown;
    try {
      const response = await axios.get<unknown>(`${this.baseUrl}/api/v3/ticker/price`, {
        params: { symbol },
      });
      payload = response.data;
    } catch (error: unknown) {
      throw new Error(`Failed to get current price: ${describeError(error)}`);
    }

    const price =
      typeof payload === "object" && payload !== null && "price" in payload
        ? parseFloat(String(payload.price))
        : NaN;
    if (!Number.isFinite(price)) {
      throw new Error(`Unexpected ticker payload for ${symbol}`);
    }
    return { timestamp: Date.now(), price };
  }
}
