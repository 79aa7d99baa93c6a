import { StrategyInstance } from './strategyInstance';
import { StrategyInstanceRunner } from './strategyInstanceRunner';
import { SimulationResult, Tick } from '../types';
import { logError } from '../utils/logger';

export interface InstanceTick {
  instanceId: string;
  tick: Tick;
}

/**
 * Runs several independent simulations side by side.
 * Instances never share fund, holdings or decisions; they only share the replay clock.
 */
export class InstanceOrchestrator {
  private instances: Map<string, StrategyInstance> = new Map();
  private runners: Map<string, StrategyInstanceRunner> = new Map();
  private failed: Set<string> = new Set();

  /**
   * Register a strategy instance
   */
  registerInstance(instance: StrategyInstance): void {
    this.instances.set(instance.instanceId, instance);
    this.runners.set(instance.instanceId, new StrategyInstanceRunner(instance));
  }

  getInstance(instanceId: string): StrategyInstance | undefined {
    return this.instances.get(instanceId);
  }

  /**
   * Execute one tick for a specific instance
   */
  executeInstance(instanceId: string, tick: Tick): void {
    const runner = this.runners.get(instanceId);
    if (!runner) {
      throw new Error(`Instance ${instanceId} not found`);
    }
    runner.onTick(tick);
  }

  /**
   * Execute one tick for each listed instance.
   * A failing instance is logged and skipped for the rest of the replay; the others continue.
   */
  executeAllInstances(ticks: InstanceTick[]): void {
    for (const { instanceId, tick } of ticks) {
      if (this.failed.has(instanceId)) continue;
      try {
        this.executeInstance(instanceId, tick);
      } catch (error: unknown) {
        this.failed.add(instanceId);
        const err = error instanceof Error ? error : new Error(String(error));
        logError(`Error executing tick: ${err.message}`, { stack: err.stack, timestamp: tick.timestamp }, instanceId);
      }
    }
  }

  /**
   * Instances that stopped because of an error during replay
   */
  getFailedInstances(): string[] {
    return Array.from(this.failed);
  }

  /**
   * Get instance results
   */
  getInstanceResults(instanceId: string): SimulationResult | null {
    const instance = this.instances.get(instanceId);
    if (!instance) return null;
    return instance.getResults();
  }

  /**
   * Get results of every instance that received at least one tick
   */
  getAllResults(): Map<string, SimulationResult> {
    const results = new Map<string, SimulationResult>();
    for (const [instanceId, instance] of this.instances) {
      const result = instance.getResults();
      if (result) {
        results.set(instanceId, result);
      }
    }
    return results;
  }

  /**
   * Replay tick series for all registered instances on a unified time axis
   */
  replay(ticksByInstance: Map<string, Tick[]>): void {
    const allTimes = new Set<number>();
    for (const ticks of ticksByInstance.values()) {
      for (const tick of ticks) {
        allTimes.add(tick.timestamp);
      }
    }
    const sortedTimes = Array.from(allTimes).sort((a, b) => a - b);

    // Per-instance read cursor; ticks are already in time order
    const cursors = new Map<string, number>();
    for (const instanceId of ticksByInstance.keys()) {
      cursors.set(instanceId, 0);
    }

    for (const time of sortedTimes) {
      const batch: InstanceTick[] = [];

      for (const [instanceId, ticks] of ticksByInstance) {
        let cursor = cursors.get(instanceId) ?? 0;
        // Several ticks may share a timestamp; replay all of them in order
        while (cursor < ticks.length && ticks[cursor].timestamp === time) {
          batch.push({ instanceId, tick: ticks[cursor] });
          cursor++;
        }
        cursors.set(instanceId, cursor);
      }

      if (batch.length > 0) {
        this.executeAllInstances(batch);
      }
    }
  }
}
