/**
 * Strategy parameters
 *
 * All three subroutines are configured from one flat mapping of named parameters.
 * The mapping is coerced once (resolveParameters) and then read into a typed,
 * validated configuration per subroutine.
 */

import { ChaseMode, Side, StrategyMode, TurningMode } from '../types';
import { StructuredLogger } from '../utils/logger';

/**
 * Raw parameter mapping as it arrives from config files or the command line.
 * Values given as lists (e.g. parsed query strings) contribute their first element.
 */
export type RawParameters = Record<string, unknown>;

export type ParameterValue = number | string;
export type ResolvedParameters = Readonly<Record<string, ParameterValue>>;

/* =========================================================
 * Typed configuration per subroutine
 * ========================================================= */

export interface ThresholdControlConfig {
  winningPer: number;     // gain ratio that triggers profit taking
  losingPer: number;      // loss ratio that triggers the stop
  sellingPerWin: number;  // share of holdings moved toward neutral on a win
  sellingPerLose: number; // share of holdings moved toward neutral on a loss
}

export interface ChasingConfig {
  trend: Side;
  mode: ChaseMode;
  gap: number;
  upperLimit: number;
  lowerLimit: number;
  init: number;
  inc: number;
  safetyAmount: number;
}

export interface TurningPointConfig {
  mode: TurningMode;
  pendingSide: Side; // side of the first expected trade
  n: number;         // starting buy and sell size
  nDelta: number;
  h: number;         // reversal threshold
}

export const DEFAULT_THRESHOLD_CONTROL: ThresholdControlConfig = {
  winningPer: 0.4,
  losingPer: 0.2,
  sellingPerWin: 0.5,
  sellingPerLose: 1,
};

export const DEFAULT_CHASING: ChasingConfig = {
  trend: 1,
  mode: 'chase',
  gap: 5,
  upperLimit: 1,
  lowerLimit: 0.5,
  init: 50,
  inc: 10,
  safetyAmount: 20,
};

export const DEFAULT_TURNING_POINT: TurningPointConfig = {
  mode: 'increase',
  pendingSide: -1,
  n: 10,
  nDelta: 1,
  h: 1.0,
};

const STRATEGY_MODES: readonly StrategyMode[] = ['chase', 'turning'];
const CHASE_MODES: readonly ChaseMode[] = ['chase', 'safety'];
const TURNING_MODES: readonly TurningMode[] = ['increase', 'decrease', 'size'];

/* =========================================================
 * Coercion
 * ========================================================= */

function coerceValue(value: unknown): ParameterValue | undefined {
  if (Array.isArray(value)) {
    return value.length > 0 ? coerceValue(value[0]) : undefined;
  }
  if (typeof value === 'number') {
    return value;
  }
  if (typeof value === 'boolean') {
    return value ? 1 : 0;
  }
  if (typeof value === 'bigint') {
    return Number(value);
  }
  if (typeof value === 'string') {
    return parseDecimal(value) ?? value;
  }
  return undefined;
}

const DECIMAL_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;
const SPECIAL_PATTERN = /^([+-]?)(inf|infinity|nan)$/i;

/**
 * Decimal text only: "0x1A" or "1_000" stay text, "inf" and "nan" are accepted
 */
function parseDecimal(text: string): number | undefined {
  const trimmed = text.trim();
  if (DECIMAL_PATTERN.test(trimmed)) {
    return Number(trimmed);
  }
  const special = SPECIAL_PATTERN.exec(trimmed);
  if (!special) {
    return undefined;
  }
  if (special[2].toLowerCase() === 'nan') {
    return NaN;
  }
  return special[1] === '-' ? -Infinity : Infinity;
}

/**
 * Coerce every value to a number if possible, else keep it as text.
 * Values that are neither are dropped with a warning; this never throws.
 */
export function resolveParameters(raw: RawParameters, logger: StructuredLogger): ResolvedParameters {
  const resolved: Record<string, ParameterValue> = {};
  for (const [key, value] of Object.entries(raw)) {
    const coerced = coerceValue(value);
    if (coerced === undefined) {
      logger.warn(`Failed to convert parameter ${key}, skipping`, { key, value: String(value) });
      continue;
    }
    resolved[key] = coerced;
  }
  logger.debug('Resolved strategy parameters', resolved);
  return resolved;
}

/* =========================================================
 * Typed readers
 * ========================================================= */

function readNumber(params: ResolvedParameters, key: string, fallback: number): number {
  const value = params[key];
  if (value === undefined) {
    return fallback;
  }
  if (typeof value !== 'number') {
    throw new Error(`Parameter "${key}" must be numeric, got "${value}"`);
  }
  return value;
}

function readChoice<T extends string>(
  params: ResolvedParameters,
  key: string,
  choices: readonly T[],
  fallback: T
): T {
  const value = params[key];
  if (value === undefined) {
    return fallback;
  }
  const choice = choices.find((c) => c === String(value));
  if (choice === undefined) {
    throw new Error(`Unsupported ${key} "${value}". Supported: ${choices.join(', ')}`);
  }
  return choice;
}

function readPercentage(params: ResolvedParameters, key: string, fallback: number): number {
  const value = readNumber(params, key, fallback);
  if (!(value >= 0 && value <= 1)) {
    throw new Error(`Parameter "${key}" must be within [0, 1], got ${value}`);
  }
  return value;
}

/**
 * Any value other than -1, text included, means an upward trend / buy side
 */
function toSide(value: ParameterValue): Side {
  return value === -1 ? -1 : 1;
}

/**
 * Validate and normalise a strategy mode; list values use their first element
 */
export function parseStrategyMode(mode: unknown): StrategyMode {
  const value = coerceValue(mode);
  const choice = STRATEGY_MODES.find((m) => m === value);
  if (choice === undefined) {
    throw new Error(`Mode not supported: ${String(value)}. Supported: ${STRATEGY_MODES.join(', ')}`);
  }
  return choice;
}

export function buildThresholdControlConfig(params: ResolvedParameters): ThresholdControlConfig {
  return {
    winningPer: readPercentage(params, 'winningPer', DEFAULT_THRESHOLD_CONTROL.winningPer),
    losingPer: readPercentage(params, 'losingPer', DEFAULT_THRESHOLD_CONTROL.losingPer),
    sellingPerWin: readPercentage(params, 'sellingPerWin', DEFAULT_THRESHOLD_CONTROL.sellingPerWin),
    sellingPerLose: readPercentage(params, 'sellingPerLose', DEFAULT_THRESHOLD_CONTROL.sellingPerLose),
  };
}

export function buildChasingConfig(params: ResolvedParameters): ChasingConfig {
  return {
    trend: toSide(params.trend ?? DEFAULT_CHASING.trend),
    mode: readChoice(params, 'mode_chase', CHASE_MODES, DEFAULT_CHASING.mode),
    gap: readNumber(params, 'gap', DEFAULT_CHASING.gap),
    upperLimit: readNumber(params, 'upper_limit', DEFAULT_CHASING.upperLimit),
    lowerLimit: readNumber(params, 'lower_limit', DEFAULT_CHASING.lowerLimit),
    init: readNumber(params, 'init', DEFAULT_CHASING.init),
    inc: readNumber(params, 'inc', DEFAULT_CHASING.inc),
    safetyAmount: readNumber(params, 'safetyamount', DEFAULT_CHASING.safetyAmount),
  };
}

export function buildTurningPointConfig(params: ResolvedParameters): TurningPointConfig {
  return {
    mode: readChoice(params, 'mode_turning', TURNING_MODES, DEFAULT_TURNING_POINT.mode),
    pendingSide: toSide(readNumber(params, 'buysell', DEFAULT_TURNING_POINT.pendingSide)),
    n: readNumber(params, 'n', DEFAULT_TURNING_POINT.n),
    nDelta: readNumber(params, 'n_delta', DEFAULT_TURNING_POINT.nDelta),
    h: readNumber(params, 'h', DEFAULT_TURNING_POINT.h),
  };
}
