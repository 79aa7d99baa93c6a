/**
 * Command-line arguments
 *   --mode=simulate|paper   (default simulate)
 *   --instance=<id>         run one configured instance only
 *   --file=<csv>            replay this CSV file instead of the configured source
 *   --param=<key>=<value>   strategy parameter override, repeatable
 *   --iterations=<n>        paper mode: stop after n polling rounds
 *   --debug                 verbose logging
 */

import { RawParameters } from "../config/strategyParameters";

export type CliMode = "simulate" | "paper";

export interface CliArgs {
  mode: CliMode;
  instanceId?: string;
  file?: string;
  parameters: RawParameters;
  iterations?: number;
  debug: boolean;
}

function readOption(arg: string, name: string): string | undefined {
  const prefix = `--${name}=`;
  return arg.startsWith(prefix) ? arg.slice(prefix.length) : undefined;
}

export function parseArgs(args: string[]): CliArgs {
  const result: CliArgs = { mode: "simulate", parameters: {}, debug: false };

  for (const arg of args) {
    const mode = readOption(arg, "mode");
    const instanceId = readOption(arg, "instance");
    const file = readOption(arg, "file");
    const param = readOption(arg, "param");
    const iterations = readOption(arg, "iterations");

    if (mode !== undefined) {
      if (mode !== "simulate" && mode !== "paper") {
        throw new Error(`Unknown mode "${mode}". Use --mode=simulate or --mode=paper`);
      }
      result.mode = mode;
    } else if (instanceId !== undefined) {
      result.instanceId = instanceId;
    } else if (file !== undefined) {
      result.file = file;
    } else if (param !== undefined) {
      const separator = param.indexOf("=");
      if (separator <= 0) {
        throw new Error(`Invalid --param "${param}", expected key=value`);
      }
      result.parameters[param.slice(0, separator)] = param.slice(separator + 1);
    } else if (iterations !== undefined) {
      const count = Number(iterations);
      if (!Number.isInteger(count) || count <= 0) {
        throw new Error(`Invalid --iterations "${iterations}"`);
      }
      result.iterations = count;
    } else if (arg === "--debug") {
      result.debug = true;
    } else {
      throw new Error(`Unknown argument "${arg}"`);
    }
  }

  return result;
}
