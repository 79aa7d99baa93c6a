/**
 * Data Service
 * Resolves the tick series of an instance from its configured data source
 */

import { DataFetcher, klinesToTicks } from '../data/fetcher';
import { loadTicksFromCsv } from '../data/csvLoader';
import { DataSourceConfig } from '../config/config';
import { globalConfig } from '../config/globalConfig';
import { Tick } from '../types';
import { StructuredLogger, logger as defaultLogger } from '../utils/logger';

function parseDate(value: string, field: string): number {
  const time = new Date(value).getTime();
  if (isNaN(time)) {
    throw new Error(`Invalid ${field}: ${value}`);
  }
  return time;
}

/**
 * Fetch and prepare the ticks of one instance
 */
export async function prepareTicks(
  instanceId: string,
  symbol: string,
  data: DataSourceConfig,
  logger: StructuredLogger = defaultLogger
): Promise<Tick[]> {
  if (data.source === 'csv') {
    const ticks = await loadTicksFromCsv(data.file);
    logger.info(`Loaded ${ticks.length} ticks from ${data.file}`);
    return ticks;
  }

  const startTime = parseDate(data.startDate, 'startDate');
  const endTime = parseDate(data.endDate, 'endDate');
  if (startTime >= endTime) {
    throw new Error(`[${instanceId}] startDate must be before endDate`);
  }

  const fetcher = new DataFetcher(
    globalConfig.exchange.baseUrl,
    globalConfig.cache.enabled,
    globalConfig.cache.directory,
    logger
  );
  const klines = await fetcher.fetchKlinesForRange(symbol, data.interval, startTime, endTime);
  logger.info(`Fetched ${klines.length} ${data.interval} klines for ${symbol}`);

  // Closes after endTime belong to a bar that is still open
  return klinesToTicks(klines).filter((tick) => tick.timestamp <= endTime);
}
