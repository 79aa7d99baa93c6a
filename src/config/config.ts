/**
 * Configuration file for the strategy simulator
 * Instance-specific configuration (strategy + runtime)
 * Global infrastructure config is in globalConfig.ts
 */

import { InstrumentType, StrategyMode } from '../types';
import { RawParameters } from './strategyParameters';

/**
 * Strategy configuration (per-instance)
 * Parameters that define trading strategy behavior
 */
export interface StrategyConfig {
  mode: StrategyMode;

  // Flat parameter mapping shared by all subroutines (see strategyParameters.ts)
  parameters: RawParameters;
}

/**
 * Instrument identity (per-instance)
 */
export interface InstrumentConfig {
  id: number;
  name: string;
  type: InstrumentType;
}

/**
 * Where the ticks of an instance come from
 */
export type DataSourceConfig =
  | {
      source: "csv";
      file: string;           // Path to a "timestamp,price" file
    }
  | {
      source: "binance";
      interval: string;       // Kline interval, e.g. "1h"; ticks are kline closes
      startDate: string;      // ISO date string, e.g. "2024-01-01"
      endDate: string;        // ISO date string, e.g. "2024-12-31"
    };

/**
 * Runtime configuration (per-instance)
 * Parameters for account and data
 */
export interface RuntimeConfig {
  // Account configuration
  account: {
    initialFund: number;  // Cash at the start of the run
    initialUnit: number;  // Holdings at the start of the run
  };

  instrument: InstrumentConfig;

  data: DataSourceConfig;
}

/**
 * Complete instance configuration
 * Combines strategy and runtime configuration
 */
export interface Config extends StrategyConfig, RuntimeConfig {}

export const defaultConfig: Config = {
  mode: "chase",

  // Empty mapping: every subroutine runs on its documented defaults
  parameters: {},

  account: {
    initialFund: 10_000,
    initialUnit: 0,
  },

  instrument: {
    id: 0,
    name: "Sample stock",
    type: "stock",
  },

  data: {
    source: "csv",
    file: "data/sample-ticks.csv",
  },
};
