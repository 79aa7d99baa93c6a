import { Instrument } from '../instrument/instrument';
import { PriceMove, ReversalTracker } from '../subroutine/subroutine';
import { TurningPointConfig } from '../../config/strategyParameters';
import { Side } from '../../types';
import { StructuredLogger, logger as defaultLogger } from '../../utils/logger';

/**
 * Turning Point subroutine
 *
 * Micromanages small-scale fluctuations: alternates buys and sells, each one
 * placed once the price has moved `h` away from the last recorded extremum.
 *
 * Sizing adapts to the gain ledger (cash flow of its own trades). After every
 * trade the step min(nDelta, floor(gain / price)), floored at 0, is added to
 * the buy size (increase), the sell size (decrease) or both (size).
 */
export class TurningPoint extends ReversalTracker {
  private pending: Side;
  private buyingSize: number;
  private sellingSize: number;
  private gain: number = 0;
  private tradeCount: number = 0;
  private readonly highs: number[] = [];
  private readonly lows: number[] = [];
  private readonly gains: number[] = [];

  constructor(inst: Instrument, readonly config: TurningPointConfig, logger: StructuredLogger = defaultLogger) {
    super(inst, logger);
    this.pending = config.pendingSide;
    this.buyingSize = config.n;
    this.sellingSize = config.n;
  }

  /** Side of the next expected trade */
  get pendingSide(): Side {
    return this.pending;
  }

  get buying(): number {
    return this.buyingSize;
  }

  get selling(): number {
    return this.sellingSize;
  }

  /** Signed cash flow of all trades so far */
  get gainLedger(): number {
    return this.gain;
  }

  get trades(): number {
    return this.tradeCount;
  }

  get highHistory(): readonly number[] {
    return this.highs;
  }

  get lowHistory(): readonly number[] {
    return this.lows;
  }

  get gainHistory(): readonly number[] {
    return this.gains;
  }

  protected onReversal(kind: 'HIGH' | 'LOW', price: number): void {
    if (kind === 'HIGH') {
      this.highs.push(price);
    } else {
      this.lows.push(price);
    }
  }

  protected decide({ price, direction }: PriceMove): number {
    let amount = 0;
    if (this.pending === 1 && direction === 1 && this.low !== undefined && price - this.low >= this.config.h) {
      amount = this.buyingSize;
      this.gain -= amount * price;
      this.pending = -1;
    } else if (
      this.pending === -1 &&
      direction === -1 &&
      this.high !== undefined &&
      this.high - price >= this.config.h
    ) {
      amount = -this.sellingSize;
      this.gain -= amount * price;
      this.pending = 1;
    }
    this.gains.push(this.gain);

    if (amount !== 0) {
      this.tradeCount += 1;
      this.adapt(price);
      this.logger.info('Turning point trade', {
        price,
        amount,
        gain: this.gain,
        buying: this.buyingSize,
        selling: this.sellingSize,
      });
    }
    return amount;
  }

  private adapt(price: number): void {
    const step = Math.max(0, Math.min(this.config.nDelta, Math.floor(this.gain / price)));
    switch (this.config.mode) {
      case 'increase':
        this.buyingSize += step;
        break;
      case 'decrease':
        this.sellingSize += step;
        break;
      case 'size':
        this.buyingSize += step;
        this.sellingSize += step;
        break;
    }
  }
}
