/**
 * Simulation Report Service
 * Generates detailed simulation reports with statistics and analysis
 */

import { Order, OrderSource, SimulationResult, SourceStats } from '../types';
import * as fs from 'fs';
import * as path from 'path';

export interface MonthlyStats {
  year: number;
  month: number;
  orders: number;
  netQuantity: number;
  cashFlow: number;
}

export interface DetailedSimulationReport {
  instanceId: string;
  summary: SimulationResult['stats'] & {
    initialValue: number;
    finalValue: number;
    finalGain: number;
    finalFund: number;
    finalUnit: number;
  };
  sourceBreakdown: Array<{ source: OrderSource } & SourceStats>;
  monthlyStats: MonthlyStats[];
  drawdownAnalysis: {
    maxDrawdown: number;
    maxDrawdownPercent: number;
    avgDrawdown: number;
    drawdownPeriods: number;
  };
  valueCurve: Array<{ time: number | null; value: number }>;
}

/**
 * Generate detailed simulation report
 */
export function generateDetailedReport(
  instanceId: string,
  result: SimulationResult
): DetailedSimulationReport {
  const sourceBreakdown = Object.entries(result.stats.bySource)
    .map(([source, stats]) => ({ source: toOrderSource(source), ...stats }))
    .filter((entry) => entry.orders > 0);

  return {
    instanceId,
    summary: {
      ...result.stats,
      initialValue: result.initialValue,
      finalValue: result.finalValue,
      finalGain: result.finalGain,
      finalFund: result.finalFund,
      finalUnit: result.finalUnit,
    },
    sourceBreakdown,
    monthlyStats: calculateMonthlyStats(result.orders),
    drawdownAnalysis: calculateDrawdownAnalysis(result),
    valueCurve: generateValueCurve(result),
  };
}

function toOrderSource(source: string): OrderSource {
  switch (source) {
    case 'chase':
    case 'turning':
    case 'thresholdcontrol':
      return source;
    default:
      return 'other';
  }
}

/**
 * Orders, net quantity and cash flow per calendar month (UTC)
 */
function calculateMonthlyStats(orders: Order[]): MonthlyStats[] {
  const monthlyMap = new Map<string, MonthlyStats>();

  for (const order of orders) {
    if (order.timestamp === null) continue;
    const date = new Date(order.timestamp);
    const year = date.getUTCFullYear();
    const month = date.getUTCMonth() + 1;
    const key = `${year}-${month}`;

    let stats = monthlyMap.get(key);
    if (!stats) {
      stats = { year, month, orders: 0, netQuantity: 0, cashFlow: 0 };
      monthlyMap.set(key, stats);
    }
    stats.orders++;
    stats.netQuantity += order.filled;
    stats.cashFlow -= order.filled * order.price;
  }

  return Array.from(monthlyMap.values()).sort((a, b) => {
    if (a.year !== b.year) return a.year - b.year;
    return a.month - b.month;
  });
}

/**
 * Drawdown analysis on the per-tick portfolio value
 */
function calculateDrawdownAnalysis(result: SimulationResult): DetailedSimulationReport['drawdownAnalysis'] {
  let maxValue = result.initialValue;
  let maxDrawdown = 0;
  let totalDrawdown = 0;
  let drawdownPeriods = 0;
  let currentDrawdown = 0;

  for (const snapshot of result.snapshots) {
    const value = result.initialValue + snapshot.gain;
    if (value > maxValue) {
      maxValue = value;
      if (currentDrawdown > 0) {
        totalDrawdown += currentDrawdown;
        drawdownPeriods++;
        currentDrawdown = 0;
      }
    } else {
      const drawdown = maxValue - value;
      if (drawdown > maxDrawdown) {
        maxDrawdown = drawdown;
      }
      currentDrawdown = Math.max(currentDrawdown, drawdown);
    }
  }

  if (currentDrawdown > 0) {
    totalDrawdown += currentDrawdown;
    drawdownPeriods++;
  }

  return {
    maxDrawdown,
    maxDrawdownPercent: result.initialValue > 0 ? (maxDrawdown / result.initialValue) * 100 : 0,
    avgDrawdown: drawdownPeriods > 0 ? totalDrawdown / drawdownPeriods : 0,
    drawdownPeriods,
  };
}

function generateValueCurve(result: SimulationResult): DetailedSimulationReport['valueCurve'] {
  return result.snapshots.map((snapshot) => ({
    time: snapshot.timestamp,
    value: result.initialValue + snapshot.gain,
  }));
}

/**
 * Format report as text
 */
export function formatReportAsText(report: DetailedSimulationReport): string {
  const lines: string[] = [];
  const { summary } = report;

  lines.push('='.repeat(80));
  lines.push(`Simulation Report: ${report.instanceId}`);
  lines.push('='.repeat(80));
  lines.push('');

  lines.push('SUMMARY');
  lines.push('-'.repeat(80));
  lines.push(`Initial Value: ${summary.initialValue.toFixed(2)}`);
  lines.push(`Final Value: ${summary.finalValue.toFixed(2)}`);
  lines.push(`Total Return: ${summary.totalReturn.toFixed(2)}%`);
  lines.push(`Final Fund: ${summary.finalFund.toFixed(2)}`);
  lines.push(`Final Unit: ${summary.finalUnit.toFixed(4)}`);
  lines.push(`Orders: ${summary.totalOrders} (clipped: ${summary.clippedOrders})`);
  lines.push(`Max Drawdown: ${report.drawdownAnalysis.maxDrawdownPercent.toFixed(2)}%`);
  lines.push('');

  if (report.sourceBreakdown.length > 0) {
    lines.push('ORDERS BY SOURCE');
    lines.push('-'.repeat(80));
    for (const entry of report.sourceBreakdown) {
      lines.push(`${entry.source.padEnd(16)} | ${String(entry.orders).padStart(6)} | volume ${entry.volume.toFixed(4)}`);
    }
    lines.push('');
  }

  if (report.monthlyStats.length > 0) {
    lines.push('MONTHLY STATISTICS');
    lines.push('-'.repeat(80));
    lines.push('Month   | Orders | Net Qty    | Cash Flow');
    lines.push('-'.repeat(80));
    for (const month of report.monthlyStats) {
      lines.push(
        `${month.year}-${String(month.month).padStart(2, '0')} | ` +
        `${String(month.orders).padStart(6)} | ` +
        `${month.netQuantity.toFixed(4).padStart(10)} | ` +
        `${month.cashFlow.toFixed(2)}`
      );
    }
    lines.push('');
  }

  lines.push('DRAWDOWN ANALYSIS');
  lines.push('-'.repeat(80));
  lines.push(`Max Drawdown: ${report.drawdownAnalysis.maxDrawdown.toFixed(2)} (${report.drawdownAnalysis.maxDrawdownPercent.toFixed(2)}%)`);
  lines.push(`Average Drawdown: ${report.drawdownAnalysis.avgDrawdown.toFixed(2)}`);
  lines.push(`Drawdown Periods: ${report.drawdownAnalysis.drawdownPeriods}`);
  lines.push('');

  return lines.join('\n');
}

function ensureDir(outputPath: string): void {
  const dir = path.dirname(outputPath);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
}

/**
 * Export report to JSON file
 */
export function exportReportToJSON(report: DetailedSimulationReport, outputPath: string): void {
  ensureDir(outputPath);
  fs.writeFileSync(outputPath, JSON.stringify(report, null, 2), 'utf-8');
}

/**
 * Export the order log to CSV
 */
export function exportOrdersToCSV(orders: Order[], outputPath: string): void {
  const lines: string[] = ['timestamp,price,quantity,filled,source'];
  for (const order of orders) {
    lines.push(`${order.timestamp ?? ''},${order.price},${order.quantity},${order.filled},${order.source}`);
  }
  ensureDir(outputPath);
  fs.writeFileSync(outputPath, lines.join('\n') + '\n', 'utf-8');
}
