/* =========================================================
 * Market data
 * ========================================================= */

export interface Kline {
  openTime: number;
  closeTime: number;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

/**
 * One (timestamp, price) observation.
 * Timestamps are epoch milliseconds throughout the project.
 */
export interface Tick {
  timestamp: number;
  price: number;
}

export type InstrumentType = "stock" | "future";

/* =========================================================
 * Subroutine state machines
 * ========================================================= */

/**
 * Local price direction, updated on every tick whose price moved
 */
export type Trend = "UNSET" | "RISING" | "FALLING";

/**
 * Pending-trade marker used by Chasing
 */
export type ArmState = "IDLE" | "ARMED_BUY" | "ARMED_SELL";

/**
 * +1 buys / rises, -1 sells / falls
 */
export type Side = 1 | -1;

/* =========================
 * Modes
 * ========================= */

export type StrategyMode = "chase" | "turning";
export type ChaseMode = "chase" | "safety";
export type TurningMode = "increase" | "decrease" | "size";

export type OrderSource = StrategyMode | "thresholdcontrol" | "other";

/* =========================================================
 * Execution records
 * ========================================================= */

export interface Order {
  readonly timestamp: number | null;
  readonly price: number;
  /** Requested signed quantity (negative = sell) */
  readonly quantity: number;
  /** Quantity actually credited to holdings after clipping */
  readonly filled: number;
  readonly source: OrderSource;
}

/**
 * Portfolio state captured at the start of every strategy step
 */
export interface Snapshot {
  readonly timestamp: number | null;
  readonly price: number;
  readonly fund: number;
  readonly unit: number;
  readonly gain: number;
}

/* =========================================================
 * Simulation results
 * ========================================================= */

export interface SourceStats {
  orders: number;
  volume: number;
}

export interface SimulationResult {
  initialValue: number;
  finalValue: number;
  finalGain: number;
  finalFund: number;
  finalUnit: number;
  orders: Order[];
  snapshots: Snapshot[];

  stats: {
    totalOrders: number;
    buyVolume: number;
    sellVolume: number;
    clippedOrders: number;
    bySource: Record<OrderSource, SourceStats>;
    maxDrawdown: number;
    totalReturn: number; // Percentage return
  };
}
