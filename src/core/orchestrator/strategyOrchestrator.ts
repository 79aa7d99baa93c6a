import { Instrument } from '../instrument/instrument';
import { ThresholdControl } from '../risk/thresholdControl';
import { Chasing } from '../strategy/chasing';
import { TurningPoint } from '../strategy/turningPoint';
import { TradeLogger } from '../logger/tradeLogger';
import {
  RawParameters,
  ResolvedParameters,
  buildChasingConfig,
  buildThresholdControlConfig,
  buildTurningPointConfig,
  parseStrategyMode,
  resolveParameters,
} from '../../config/strategyParameters';
import { Order, OrderSource, SimulationResult, Snapshot, StrategyMode } from '../../types';
import { StructuredLogger, logger as defaultLogger } from '../../utils/logger';

export interface StrategyOrchestratorOptions {
  instrument: Instrument;
  fund: number;
  unit: number;
  /** "chase" or "turning"; a list contributes its first element */
  mode?: unknown;
  parameters?: RawParameters;
  logger?: StructuredLogger;
}

/**
 * Strategy Orchestrator
 *
 * Owns fund / unit and the three subroutines of one simulation.
 * Execution order per tick: snapshot → primary subroutine → ThresholdControl → transact
 *
 * - Primary proposal comes from Chasing (mode "chase") or TurningPoint (mode "turning")
 * - ThresholdControl may override it; an override is executed instead of the proposal
 *   and ThresholdControl is re-anchored to the post-trade fund / unit
 */
export class StrategyOrchestrator {
  readonly instrument: Instrument;
  readonly mode: StrategyMode;
  readonly parameters: ResolvedParameters;
  readonly total0: number;

  readonly thresholdControl: ThresholdControl;
  readonly chasing: Chasing;
  readonly turningPoint: TurningPoint;

  private currentFund: number;
  private currentUnit: number;
  private readonly logger: StructuredLogger;
  private readonly tradeLogger: TradeLogger;

  constructor(options: StrategyOrchestratorOptions) {
    this.logger = options.logger ?? defaultLogger;
    this.mode = parseStrategyMode(options.mode ?? 'chase');
    this.instrument = options.instrument;
    this.currentFund = options.fund;
    this.currentUnit = options.unit;
    this.total0 = options.fund + options.unit * this.instrument.price;

    this.parameters = resolveParameters(options.parameters ?? {}, this.logger);

    this.thresholdControl = new ThresholdControl(
      this.instrument,
      options.fund,
      options.unit,
      buildThresholdControlConfig(this.parameters),
      this.logger
    );
    this.chasing = new Chasing(this.instrument, buildChasingConfig(this.parameters), this.logger);
    this.turningPoint = new TurningPoint(this.instrument, buildTurningPointConfig(this.parameters), this.logger);

    this.tradeLogger = new TradeLogger(this.logger);
    this.tradeLogger.setInitialValue(this.total0);
  }

  get fund(): number {
    return this.currentFund;
  }

  get unit(): number {
    return this.currentUnit;
  }

  get orders(): readonly Order[] {
    return this.tradeLogger.getOrders();
  }

  get snapshots(): readonly Snapshot[] {
    return this.tradeLogger.getSnapshots();
  }

  /**
   * Gain of the current portfolio against the baseline
   */
  gain(): number {
    return this.currentFund + this.currentUnit * this.instrument.price - this.total0;
  }

  /**
   * Run one strategy step on the instrument's current tick
   */
  update(): void {
    this.tradeLogger.logSnapshot({
      timestamp: this.instrument.timestamp,
      price: this.instrument.price,
      fund: this.currentFund,
      unit: this.currentUnit,
      gain: this.gain(),
    });

    const proposal = this.mode === 'chase' ? this.chasing.update() : this.turningPoint.update();
    const override = this.thresholdControl.update(this.currentFund, proposal);

    if (override === 0) {
      if (proposal !== 0) {
        this.transact(proposal, this.mode);
      }
      return;
    }

    this.logger.info('Threshold control override', { proposal, override });
    this.transact(override, 'thresholdcontrol');
    this.thresholdControl.reset(this.currentFund, this.currentUnit);
  }

  /**
   * Execute a signed quantity at the current price (negative = sell).
   * A trade that would leave no cash is clipped to what the fund can buy, and the fund is zeroed.
   */
  transact(quantity: number, source: OrderSource = 'other'): void {
    const price = this.instrument.price;
    let filled = quantity;

    if (this.currentFund - price * quantity <= 0) {
      filled = this.currentFund / price;
      this.logger.warn('Running out of funds, clipping order', {
        requested: quantity,
        filled,
        fund: this.currentFund,
        price,
      });
      this.currentUnit += filled;
      this.currentFund = 0;
    } else {
      this.currentFund -= price * quantity;
      this.currentUnit += quantity;
    }

    this.tradeLogger.logOrder({
      timestamp: this.instrument.timestamp,
      price,
      quantity,
      filled,
      source,
    });
  }

  getResults(): SimulationResult {
    return this.tradeLogger.getResults({
      fund: this.currentFund,
      unit: this.currentUnit,
      price: this.instrument.price,
    });
  }

  setSilent(silent: boolean): void {
    this.tradeLogger.setSilent(silent);
  }
}
