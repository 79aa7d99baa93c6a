import { Instrument } from '../instrument/instrument';
import { PriceMove, ReversalTracker } from '../subroutine/subroutine';
import { ChasingConfig } from '../../config/strategyParameters';
import { ArmState, ChaseMode, Side } from '../../types';
import { StructuredLogger, logger as defaultLogger } from '../../utils/logger';

/**
 * Chasing subroutine
 *
 * Follows the larger-scale trend of the instrument through stepped thresholds
 * placed `gap` away from the last trigger price.
 *
 * Modes:
 * - chase: add to the position in the direction of the trend, with a size that
 *   shrinks by `inc` on every confirmed trade (init - stack * inc, floored at 0)
 * - safety: trade against the trend at turning points with a fixed size
 *
 * Should run under ThresholdControl, which manages the risk of the position it builds.
 */

interface ChaseState {
  armState: ArmState;
  nextStepUp: number;
  nextStepDown: number;
  stack: number;
}

interface ChaseTick extends PriceMove {
  high: number | undefined;
  low: number | undefined;
}

type BranchKey = `${ChaseMode}:${Side}`;
type Branch = (state: ChaseState, tick: ChaseTick, config: ChasingConfig) => number;

/**
 * Size of the next chase trade (init - stack * inc); counted on the stack when positive
 */
function takeStackedAmount(state: ChaseState, config: ChasingConfig): number {
  const amount = config.init - state.stack * config.inc;
  if (amount <= 0) {
    return 0;
  }
  state.stack += 1;
  return amount;
}

/**
 * One handler per (mode, trend). Each handler owns the arm/disarm transitions
 * of its branch and returns the signed amount to trade.
 */
const BRANCHES: Record<BranchKey, Branch> = {
  'chase:1': (state, { price }, config) => {
    if (price >= state.nextStepUp) {
      state.armState = 'ARMED_BUY';
    }
    if (price >= state.nextStepUp + config.upperLimit) {
      if (state.armState !== 'ARMED_BUY') {
        return 0;
      }
      const amount = takeStackedAmount(state, config);
      state.nextStepUp = price + config.gap;
      state.armState = 'IDLE';
      return amount;
    }
    if (price <= state.nextStepUp - config.lowerLimit) {
      state.armState = 'IDLE';
    }
    return 0;
  },

  'chase:-1': (state, { price }, config) => {
    if (price <= state.nextStepDown) {
      state.armState = 'ARMED_SELL';
    }
    if (price <= state.nextStepDown - config.lowerLimit) {
      if (state.armState !== 'ARMED_SELL') {
        return 0;
      }
      const amount = takeStackedAmount(state, config);
      state.nextStepDown = price - config.gap;
      state.armState = 'IDLE';
      return amount === 0 ? 0 : -amount;
    }
    if (price >= state.nextStepDown + config.upperLimit) {
      state.armState = 'IDLE';
    }
    return 0;
  },

  'safety:1': (state, { price, direction, high }, config) => {
    if (state.armState === 'IDLE') {
      if (price >= state.nextStepUp) {
        state.armState = 'ARMED_SELL';
        state.nextStepUp = price + config.gap;
        state.nextStepDown = price - config.gap;
      } else if (price <= state.nextStepDown) {
        state.armState = 'ARMED_SELL';
        state.nextStepDown = price - config.gap;
      }
      return 0;
    }
    if (
      state.armState === 'ARMED_SELL' &&
      direction === -1 &&
      high !== undefined &&
      high - price >= config.lowerLimit
    ) {
      state.armState = 'IDLE';
      return -config.safetyAmount;
    }
    return 0;
  },

  'safety:-1': (state, { price, direction, low }, config) => {
    if (state.armState === 'IDLE') {
      if (price <= state.nextStepDown) {
        state.armState = 'ARMED_BUY';
        state.nextStepUp = price + config.gap;
        state.nextStepDown = price - config.gap;
      } else if (price >= state.nextStepUp) {
        state.armState = 'ARMED_BUY';
        state.nextStepUp = price + config.gap;
      }
      return 0;
    }
    if (
      state.armState === 'ARMED_BUY' &&
      direction === 1 &&
      low !== undefined &&
      price - low >= config.lowerLimit
    ) {
      state.armState = 'IDLE';
      return config.safetyAmount;
    }
    // Armed but the rebound is not confirmed yet: no-op
    return 0;
  },
};

export class Chasing extends ReversalTracker {
  private readonly state: ChaseState;
  private readonly branch: Branch;

  constructor(inst: Instrument, readonly config: ChasingConfig, logger: StructuredLogger = defaultLogger) {
    super(inst, logger);
    this.state = {
      armState: 'IDLE',
      nextStepUp: inst.price + config.gap,
      nextStepDown: inst.price - config.gap,
      stack: 0,
    };
    const key: BranchKey = `${config.mode}:${config.trend}`;
    this.branch = BRANCHES[key];
    this.logger.debug('Chasing initialised', {
      mode: config.mode,
      trend: config.trend,
      init: config.init,
      nextStepUp: this.state.nextStepUp,
      nextStepDown: this.state.nextStepDown,
    });
  }

  /** Number of confirmed chase trades so far */
  get stack(): number {
    return this.state.stack;
  }

  get armState(): ArmState {
    return this.state.armState;
  }

  get nextStepUp(): number {
    return this.state.nextStepUp;
  }

  get nextStepDown(): number {
    return this.state.nextStepDown;
  }

  protected decide(move: PriceMove): number {
    const amount = this.branch(this.state, { ...move, high: this.high, low: this.low }, this.config);
    if (amount !== 0) {
      this.logger.info('Chasing trade', { price: move.price, amount, stack: this.state.stack });
    }
    return amount;
  }
}
