import { Instrument } from '../instrument/instrument';
import { Subroutine } from '../subroutine/subroutine';
import { ThresholdControlConfig } from '../../config/strategyParameters';
import { StructuredLogger, logger as defaultLogger } from '../../utils/logger';

/**
 * Threshold Control
 *
 * Responsibilities:
 * - Hold a baseline portfolio value (total0 = fund + unit * price) fixed until reset
 * - On every tick, apply the proposed unit delta and measure gain against the baseline
 * - Profit taking: gain / total0 >= winningPer moves sellingPerWin of holdings toward neutral
 * - Stop loss: |gain / total0| >= losingPer moves sellingPerLose of holdings toward neutral
 * - Can override the primary subroutine's proposal (non-zero return value)
 *
 * The caller is expected to reset() after acting on an override.
 * A gain of exactly 0 is tested against the winning branch first.
 */
export class ThresholdControl implements Subroutine<[fund: number, deltaUnit?: number]> {
  private total0: number = 0;
  private prices: number[] = [];
  private times: Array<number | null> = [];
  private funds: number[] = [];
  private units: number[] = [];
  private lastOutput: number = 0;

  constructor(
    private readonly inst: Instrument,
    fund: number,
    unit: number,
    private readonly config: ThresholdControlConfig,
    private readonly logger: StructuredLogger = defaultLogger
  ) {
    for (const [key, value] of Object.entries(config)) {
      if (!(value >= 0 && value <= 1)) {
        throw new Error(`ThresholdControl ${key} must be within [0, 1], got ${value}`);
      }
    }
    this.reset(fund, unit);
  }

  /**
   * Anchor a fresh baseline to the given fund / unit, keeping the configuration
   */
  reset(fund: number, unit: number): void {
    this.total0 = fund + unit * this.inst.price;
    this.prices = [this.inst.price];
    this.times = [this.inst.timestamp];
    this.funds = [fund];
    this.units = [unit];
    this.lastOutput = 0;
  }

  update(fund: number, deltaUnit: number = 0): number {
    this.lastOutput = this.evaluate(fund, deltaUnit);
    return this.lastOutput;
  }

  output(): number {
    return this.lastOutput;
  }

  get baseline(): number {
    return this.total0;
  }

  get unitHistory(): readonly number[] {
    return this.units;
  }

  get fundHistory(): readonly number[] {
    return this.funds;
  }

  get priceHistory(): readonly number[] {
    return this.prices;
  }

  get timeHistory(): ReadonlyArray<number | null> {
    return this.times;
  }

  private evaluate(fund: number, deltaUnit: number): number {
    const price = this.inst.price;
    this.prices.push(price);
    this.times.push(this.inst.timestamp);

    const unit = this.units[this.units.length - 1] + deltaUnit;
    if (unit === 0) {
      return 0;
    }

    const total = fund + unit * price;
    const gain = total - this.total0;
    const ratio = gain / this.total0;

    if (gain >= 0 && ratio >= this.config.winningPer) {
      const delta = this.towardNeutral(unit, this.config.sellingPerWin);
      this.logger.info('Winning control triggered', { gain, ratio, delta });
      this.record(fund, unit, delta, price);
      return delta;
    }

    if (gain <= 0 && Math.abs(ratio) >= this.config.losingPer) {
      const delta = this.towardNeutral(unit, this.config.sellingPerLose);
      this.logger.info('Losing control triggered', { gain, ratio, delta });
      this.record(fund, unit, delta, price);
      return delta;
    }

    this.funds.push(fund);
    this.units.push(unit);
    return 0;
  }

  /**
   * Signed delta moving `unit` toward zero by `share` of its size, never past zero
   */
  private towardNeutral(unit: number, share: number): number {
    const size = Math.min(Math.abs(unit), Math.abs(unit) * share);
    return unit > 0 ? -size : size;
  }

  private record(fund: number, unit: number, delta: number, price: number): void {
    this.units.push(unit + delta);
    this.funds.push(fund - delta * price);
  }
}
