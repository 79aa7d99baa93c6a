import { Instrument } from '../instrument/instrument';
import { Side, Trend } from '../../types';
import { StructuredLogger } from '../../utils/logger';

/**
 * Subroutine contract
 *
 * A subroutine is a stateful decision unit tracing one instrument:
 *   construct (config, instrument) -> update * N -> output
 * update() consumes the current tick and returns the signed trade proposal
 * (positive = buy, negative = sell, 0 = nothing); output() repeats the last one.
 */
export interface Subroutine<TArgs extends unknown[] = []> {
  update(...args: TArgs): number;
  output(): number;
}

/**
 * A price move observed by a reversal-tracking subroutine
 */
export interface PriceMove {
  price: number;
  previous: number;
  direction: Side;
}

/**
 * Direction transitions: [current trend][observed direction] -> what happened.
 * A reversal records the previous price as the new high (turning down) or low (turning up).
 */
type TrendEvent = 'FIRST' | 'CONTINUE' | 'REVERSAL_HIGH' | 'REVERSAL_LOW';

type Movement = Exclude<Trend, 'UNSET'>;

const TREND_TRANSITIONS: Record<Trend, Record<Movement, TrendEvent>> = {
  UNSET: { RISING: 'FIRST', FALLING: 'FIRST' },
  RISING: { RISING: 'CONTINUE', FALLING: 'REVERSAL_HIGH' },
  FALLING: { RISING: 'REVERSAL_LOW', FALLING: 'CONTINUE' },
};

/**
 * Shared direction / extremum tracking for Chasing and TurningPoint
 */
export abstract class ReversalTracker implements Subroutine {
  protected trend: Trend = 'UNSET';
  /** Price at the most recent turn downward; undefined until one happened */
  protected high: number | undefined = undefined;
  /** Price at the most recent turn upward; undefined until one happened */
  protected low: number | undefined = undefined;

  protected readonly prices: number[];
  protected readonly times: Array<number | null>;
  private lastOutput: number = 0;

  constructor(protected readonly inst: Instrument, protected readonly logger: StructuredLogger) {
    this.prices = [inst.price];
    this.times = [inst.timestamp];
  }

  update(): number {
    this.lastOutput = this.step();
    return this.lastOutput;
  }

  output(): number {
    return this.lastOutput;
  }

  get direction(): Trend {
    return this.trend;
  }

  get lastHigh(): number | undefined {
    return this.high;
  }

  get lastLow(): number | undefined {
    return this.low;
  }

  get priceHistory(): readonly number[] {
    return this.prices;
  }

  get timeHistory(): ReadonlyArray<number | null> {
    return this.times;
  }

  /**
   * Decide on the trade for a tick that moved the price after the first direction was known
   */
  protected abstract decide(move: PriceMove): number;

  /**
   * Hook for subclasses that keep their own extremum history
   */
  protected onReversal(_kind: 'HIGH' | 'LOW', _price: number): void {}

  private step(): number {
    const previous = this.prices[this.prices.length - 1];
    const price = this.inst.price;
    this.prices.push(price);
    this.times.push(this.inst.timestamp);

    let direction: Side;
    if (price > previous) {
      direction = 1;
    } else if (price < previous) {
      direction = -1;
    } else {
      return 0;
    }

    const movement: Movement = direction === 1 ? 'RISING' : 'FALLING';
    const event = TREND_TRANSITIONS[this.trend][movement];
    this.trend = movement;

    switch (event) {
      case 'FIRST':
        return 0;
      case 'REVERSAL_HIGH':
        this.high = previous;
        this.onReversal('HIGH', previous);
        break;
      case 'REVERSAL_LOW':
        this.low = previous;
        this.onReversal('LOW', previous);
        break;
      case 'CONTINUE':
        break;
    }

    return this.decide({ price, previous, direction });
  }
}
