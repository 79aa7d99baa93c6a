import { InstrumentType, Tick } from '../../types';
import { formatTimestamp } from '../../utils/timeUtils';

const INSTRUMENT_TYPES: readonly InstrumentType[] = ['stock', 'future'];

/**
 * A stock or future and the prices observed for it.
 *
 * All subroutines of one simulation read the same Instrument, so the caller
 * updates it once per tick before stepping the strategy. Timestamps are
 * expected to be non-decreasing; this is not checked.
 */
export class Instrument {
  readonly id: number;
  readonly name: string;
  readonly symbol: string;
  readonly type: InstrumentType;

  private currentPrice: number = NaN;
  private currentTimestamp: number | null = null;
  private readonly ticks: Tick[] = [];

  constructor(id: number, name: string, symbol: string, type: string = 'stock') {
    const instrumentType = INSTRUMENT_TYPES.find((t) => t === type);
    if (instrumentType === undefined) {
      throw new Error(`Type of instrument is not supported: ${type}`);
    }
    if (!Number.isInteger(id) || id < 0) {
      throw new Error(`Instrument id is invalid: ${id}`);
    }
    this.id = id;
    this.name = name;
    this.symbol = symbol;
    this.type = instrumentType;
  }

  update(timestamp: number, price: number): void {
    this.currentPrice = price;
    this.currentTimestamp = timestamp;
    this.ticks.push({ timestamp, price });
  }

  /** NaN until the first update */
  get price(): number {
    return this.currentPrice;
  }

  get timestamp(): number | null {
    return this.currentTimestamp;
  }

  get history(): readonly Tick[] {
    return this.ticks;
  }

  toString(): string {
    return `[I][${this.type},${this.id}][${this.symbol}] ${this.name}: ${this.currentPrice} @ ${formatTimestamp(this.currentTimestamp)}`;
  }
}
