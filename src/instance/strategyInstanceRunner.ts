import { StrategyInstance } from './strategyInstance';
import { Tick } from '../types';

export class StrategyInstanceRunner {
  private instance: StrategyInstance;

  constructor(instance: StrategyInstance) {
    this.instance = instance;
  }

  /**
   * Execute one tick for this instance
   * Execution order: Instrument update → (first tick: build orchestrator) → strategy step
   *
   * The first tick only anchors the baseline: subroutines start tracking from its price.
   */
  onTick(tick: Tick): void {
    this.instance.instrument.update(tick.timestamp, tick.price);

    if (!this.instance.hasStarted()) {
      this.instance.getOrchestrator();
      return;
    }

    this.instance.getOrchestrator().update();
  }
}
