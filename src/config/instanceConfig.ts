import { defaultConfig } from './config';
import { StrategyInstanceConfig } from '../instance/strategyInstance';

/**
 * Config Registry: all simulation instances
 * Adding a simulation = adding one entry
 */
export interface InstanceConfigRegistry {
  [instanceId: string]: StrategyInstanceConfig;
}

export const instanceConfigs: InstanceConfigRegistry = {
  "SAMPLE_CHASE_V1": {
    instanceId: "SAMPLE_CHASE_V1",
    symbol: "SMPL",
    config: {
      ...defaultConfig,
      parameters: { gap: 2, upper_limit: 0.5, lower_limit: 0.5, init: 20, inc: 5 },
      account: { initialFund: 10_000, initialUnit: 10 },
    },
  },
  "SAMPLE_TURNING_V1": {
    instanceId: "SAMPLE_TURNING_V1",
    symbol: "SMPL",
    config: {
      ...defaultConfig,
      mode: "turning",
      parameters: { mode_turning: "size", buysell: 1, n: 10, n_delta: 1, h: 1.5 },
      account: { initialFund: 10_000, initialUnit: 10 },
    },
  },
  // "BTCUSDT_CHASE_V1": {
  //   instanceId: "BTCUSDT_CHASE_V1",
  //   symbol: "BTCUSDT",
  //   config: {
  //     mode: "chase",
  //     parameters: { gap: 1500, upper_limit: 200, lower_limit: 100, init: 0.05, inc: 0.01 },
  //     account: { initialFund: 10_000, initialUnit: 0.05 },
  //     instrument: { id: 1, name: "Bitcoin / Tether", type: "future" },
  //     data: { source: "binance", interval: "1h", startDate: "2025-01-01", endDate: "2025-07-01" },
  //   },
  // },
};
