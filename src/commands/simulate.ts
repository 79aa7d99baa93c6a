/**
 * Simulate command: multi-instance replay with data validation and report export
 */

import { InstanceOrchestrator } from "../instance/instanceOrchestrator";
import { StrategyInstance, StrategyInstanceConfig } from "../instance/strategyInstance";
import { globalConfig } from "../config/globalConfig";
import { prepareTicks } from "../services/dataService";
import { validateTicks } from "../services/tickValidationService";
import {
  generateDetailedReport,
  formatReportAsText,
  exportReportToJSON,
  exportOrdersToCSV,
} from "../services/simulationReportService";
import { Tick } from "../types";
import { logInfo, logWarn, logError } from "../utils/logger";

/**
 * Replay every instance over its tick series, display and export results.
 * @returns false when data validation failed or an instance stopped during replay
 */
export async function runSimulation(instanceConfigs: StrategyInstanceConfig[]): Promise<boolean> {
  console.log("=".repeat(60));
  console.log("Strategy Simulator - Multi-Instance Replay");
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
    console.log(`Registered instance: ${instance.instanceId} (${instance.symbol}, mode=${instance.config.mode})`);
  }
  console.log();

  console.log(`Loading ticks for ${instances.length} instances...`);
  const loaded = await Promise.all(
    instances.map(async (instance) => ({
      instance,
      ticks: await prepareTicks(instance.instanceId, instance.symbol, instance.config.data, instance.getLogger()),
    }))
  );

  console.log();
  console.log("Validating ticks...");
  const ticksByInstance = new Map<string, Tick[]>();
  let hasValidationErrors = false;
  for (const { instance, ticks } of loaded) {
    const validation = validateTicks(ticks);

    if (!validation.isValid) {
      hasValidationErrors = true;
      logError(`Validation FAILED`, { errors: validation.errors }, instance.instanceId);
    }
    if (validation.warnings.length > 0) {
      logWarn(`Validation warnings`, { warnings: validation.warnings }, instance.instanceId);
    }
    if (validation.isValid && validation.warnings.length === 0) {
      logInfo(`Validation passed (${ticks.length} ticks)`, undefined, instance.instanceId);
    }
    ticksByInstance.set(instance.instanceId, ticks);
  }

  if (hasValidationErrors) {
    logError("Tick validation failed. Please fix data quality issues before running the simulation.");
    return false;
  }

  console.log();
  console.log("Replaying ticks for all instances...");
  console.log();
  orchestrator.replay(ticksByInstance);

  console.log();
  console.log("=".repeat(60));
  console.log("Simulation Results Summary");
  console.log("=".repeat(60));
  console.log();

  for (const [instanceId, results] of orchestrator.getAllResults()) {
    const report = generateDetailedReport(instanceId, results);
    console.log(formatReportAsText(report));

    const timestamp = new Date().toISOString().replace(/[:.]/g, "-");
    const reportsDir = `${globalConfig.reports.directory}/${instanceId}`;
    exportReportToJSON(report, `${reportsDir}/${timestamp}.json`);
    exportOrdersToCSV(results.orders, `${reportsDir}/${timestamp}-orders.csv`);
    logInfo(`Detailed reports exported to ${reportsDir}/`, undefined, instanceId);
  }

  const failed = orchestrator.getFailedInstances();
  for (const instanceId of failed) {
    logError(`Instance stopped early because of an error`, undefined, instanceId);
  }

  console.log("=".repeat(60));
  return failed.length === 0;
}
