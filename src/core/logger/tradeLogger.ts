import { Order, OrderSource, SimulationResult, Snapshot, SourceStats } from '../../types';
import { StructuredLogger, logger as defaultLogger } from '../../utils/logger';

/**
 * Append-only order log and per-tick snapshots of one simulation
 */
export class TradeLogger {
  private orders: Order[] = [];
  private snapshots: Snapshot[] = [];
  private initialValue: number = 0;
  private silent: boolean = false;

  constructor(private readonly logger: StructuredLogger = defaultLogger) {}

  setInitialValue(value: number) {
    this.initialValue = value;
  }

  setSilent(silent: boolean) {
    this.silent = silent;
  }

  logSnapshot(snapshot: Snapshot) {
    this.snapshots.push(Object.freeze({ ...snapshot }));
  }

  logOrder(order: Order) {
    this.orders.push(Object.freeze({ ...order }));

    if (!this.silent) {
      const side = order.quantity > 0 ? 'BUY' : 'SELL';
      this.logger.info(`[${side}] ${Math.abs(order.filled)} @ ${order.price}`, {
        source: order.source,
        requested: order.quantity,
        timestamp: order.timestamp,
      });
    }
  }

  getOrders(): readonly Order[] {
    return this.orders;
  }

  getSnapshots(): readonly Snapshot[] {
    return this.snapshots;
  }

  /**
   * Summarise the run; `current` is the portfolio state after the last tick
   */
  getResults(current: { fund: number; unit: number; price: number }): SimulationResult {
    const finalValue = current.fund + current.unit * current.price;

    const bySource: Record<OrderSource, SourceStats> = {
      chase: { orders: 0, volume: 0 },
      turning: { orders: 0, volume: 0 },
      thresholdcontrol: { orders: 0, volume: 0 },
      other: { orders: 0, volume: 0 },
    };

    let buyVolume = 0;
    let sellVolume = 0;
    let clippedOrders = 0;
    for (const order of this.orders) {
      bySource[order.source].orders += 1;
      bySource[order.source].volume += Math.abs(order.filled);
      if (order.filled > 0) {
        buyVolume += order.filled;
      } else {
        sellVolume += -order.filled;
      }
      if (order.filled !== order.quantity) {
        clippedOrders += 1;
      }
    }

    // Max drawdown of portfolio value across snapshots
    let maxValue = this.initialValue;
    let maxDrawdown = 0;
    for (const snapshot of this.snapshots) {
      const value = this.initialValue + snapshot.gain;
      if (value > maxValue) {
        maxValue = value;
      }
      const drawdown = maxValue - value;
      if (drawdown > maxDrawdown) {
        maxDrawdown = drawdown;
      }
    }

    const totalReturn = this.initialValue > 0
      ? ((finalValue - this.initialValue) / this.initialValue) * 100
      : 0;

    return {
      initialValue: this.initialValue,
      finalValue,
      finalGain: finalValue - this.initialValue,
      finalFund: current.fund,
      finalUnit: current.unit,
      orders: [...this.orders],
      snapshots: [...this.snapshots],
      stats: {
        totalOrders: this.orders.length,
        buyVolume,
        sellVolume,
        clippedOrders,
        bySource,
        maxDrawdown,
        totalReturn,
      },
    };
  }
}
