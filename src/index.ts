#!/usr/bin/env node
/**
 * Main entry point for the strategy simulator
 * Supports multi-instance replay and paper modes
 */

import { instanceConfigs } from "./config/instanceConfig";
import { StrategyInstance, StrategyInstanceConfig } from "./instance/strategyInstance";
import { runSimulation } from "./commands/simulate";
import { runPaperTrading } from "./commands/paper";
import { CliArgs, parseArgs } from "./commands/cliArgs";
import { LogLevel, logError, logger } from "./utils/logger";

function selectInstances(args: CliArgs): StrategyInstanceConfig[] {
  let selected = Object.values(instanceConfigs);

  if (args.instanceId !== undefined) {
    const config = instanceConfigs[args.instanceId];
    if (!config) {
      throw new Error(
        `Instance "${args.instanceId}" not found. Available: ${Object.keys(instanceConfigs).join(", ")}`
      );
    }
    selected = [config];
  }

  const file = args.file;
  return selected.map((config): StrategyInstanceConfig => {
    const withParams = StrategyInstance.withParameters(config, args.parameters);
    if (file === undefined) {
      return withParams;
    }
    return {
      ...withParams,
      config: { ...withParams.config, data: { source: "csv", file } },
    };
  });
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  if (args.debug) {
    logger.setLevel(LogLevel.DEBUG);
  }

  const instances = selectInstances(args);

  if (args.mode === "paper") {
    await runPaperTrading(instances, { maxIterations: args.iterations });
    return;
  }

  const ok = await runSimulation(instances);
  if (!ok) {
    process.exitCode = 1;
  }
}

main().catch((error: unknown) => {
  const err = error instanceof Error ? error : new Error(String(error));
  logError(`Fatal error: ${err.message}`, { stack: err.stack });
  process.exit(1);
});
