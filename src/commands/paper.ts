/**
 * Paper command: feed live exchange prices into the strategy, no real orders
 */

import { InstanceOrchestrator } from "../instance/instanceOrchestrator";
import { StrategyInstance, StrategyInstanceConfig } from "../instance/strategyInstance";
import { DataFetcher } from "../data/fetcher";
import { globalConfig } from "../config/globalConfig";
import { logError, logInfo } from "../utils/logger";

export interface PaperOptions {
  /** Stop after this many polling rounds; runs until interrupted when omitted */
  maxIterations?: number;
  pollIntervalMs?: number;
}

/**
 * Poll the latest price of every instance's symbol and step its strategy on each new price
 */
export async function runPaperTrading(
  instanceConfigs: StrategyInstanceConfig[],
  options: PaperOptions = {}
): Promise<void> {
  console.log("=".repeat(60));
  console.log("Strategy Simulator - Paper Mode");
  console.log("=".repeat(60));
  console.log(`Instances: ${instanceConfigs.length}`);
  console.log("=".repeat(60));
  console.log();

  const orchestrator = new InstanceOrchestrator();
  const instances: StrategyInstance[] = [];
  for (const instanceConfig of instanceConfigs) {
    const instance = new StrategyInstance(instanceConfig);
    instances.push(instance);
    orchestrator.registerInstance(instance);
    console.log(`Registered instance: ${instance.instanceId} (${instance.symbol})`);
  }

  const fetcher = new DataFetcher(
    globalConfig.exchange.baseUrl,
    false,
    globalConfig.cache.directory
  );
  const pollIntervalMs = options.pollIntervalMs ?? globalConfig.paper.pollIntervalMs;

  console.log();
  console.log("Paper mode started. Polling prices...");
  console.log("Press Ctrl+C to stop.");
  console.log();

  for (let iteration = 1; options.maxIterations === undefined || iteration <= options.maxIterations; iteration++) {
    for (const instance of instances) {
      try {
        const tick = await fetcher.getCurrentTick(instance.symbol);
        orchestrator.executeAllInstances([{ instanceId: instance.instanceId, tick }]);

        if (instance.hasStarted()) {
          const strategy = instance.getOrchestrator();
          logInfo(
            `price=${tick.price} fund=${strategy.fund.toFixed(2)} unit=${strategy.unit.toFixed(4)} gain=${strategy.gain().toFixed(2)}`,
            undefined,
            instance.instanceId
          );
        }
      } catch (error: unknown) {
        logError(
          `Error polling price: ${error instanceof Error ? error.message : String(error)}`,
          undefined,
          instance.instanceId
        );
      }
    }

    if (options.maxIterations === undefined || iteration < options.maxIterations) {
      await new Promise((resolve) => setTimeout(resolve, pollIntervalMs));
    }
  }
}
