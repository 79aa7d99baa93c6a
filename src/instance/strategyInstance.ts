import { Instrument } from '../core/instrument/instrument';
import { StrategyOrchestrator } from '../core/orchestrator/strategyOrchestrator';
import { Config } from '../config/config';
import {
  RawParameters,
  ResolvedParameters,
  buildChasingConfig,
  buildThresholdControlConfig,
  buildTurningPointConfig,
  parseStrategyMode,
  resolveParameters,
} from '../config/strategyParameters';
import { SimulationResult } from '../types';
import { Logger, logger as defaultLogger } from '../utils/logger';

export interface StrategyInstanceConfig {
  instanceId: string;              // Unique id, e.g. "SAMPLE_CHASE_V1"
  symbol: string;                  // Instrument symbol, e.g. "BTCUSDT"
  config: Config;                  // Complete configuration
}

export class StrategyInstance {
  readonly instanceId: string;
  readonly symbol: string;
  readonly config: Config;
  readonly instrument: Instrument;
  readonly parameters: ResolvedParameters;

  private orchestrator: StrategyOrchestrator | null = null;
  private readonly logger: Logger;

  constructor(config: StrategyInstanceConfig, parentLogger: Logger = defaultLogger) {
    this.instanceId = config.instanceId;
    this.symbol = config.symbol;
    this.config = config.config;
    this.logger = parentLogger.child(config.instanceId);

    // Configuration errors surface here, not on the first tick
    parseStrategyMode(config.config.mode);
    this.parameters = resolveParameters(config.config.parameters, this.logger);
    buildThresholdControlConfig(this.parameters);
    buildChasingConfig(this.parameters);
    buildTurningPointConfig(this.parameters);

    const { id, name, type } = config.config.instrument;
    this.instrument = new Instrument(id, name, config.symbol, type);
  }

  /**
   * Merge extra parameters (e.g. from the command line) over the configured ones
   */
  static withParameters(config: StrategyInstanceConfig, overrides: RawParameters): StrategyInstanceConfig {
    return {
      ...config,
      config: {
        ...config.config,
        parameters: { ...config.config.parameters, ...overrides },
      },
    };
  }

  /**
   * The orchestrator is built on the first tick so its baseline uses a real price
   */
  getOrchestrator(): StrategyOrchestrator {
    if (!this.orchestrator) {
      this.orchestrator = new StrategyOrchestrator({
        instrument: this.instrument,
        fund: this.config.account.initialFund,
        unit: this.config.account.initialUnit,
        mode: this.config.mode,
        parameters: this.parameters,
        logger: this.logger,
      });
    }
    return this.orchestrator;
  }

  hasStarted(): boolean {
    return this.orchestrator !== null;
  }

  getLogger(): Logger {
    return this.logger;
  }

  getResults(): SimulationResult | null {
    return this.orchestrator ? this.orchestrator.getResults() : null;
  }
}
