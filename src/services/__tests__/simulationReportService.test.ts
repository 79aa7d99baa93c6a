/**
 * Unit tests for the simulation report service
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  exportOrdersToCSV,
  exportReportToJSON,
  formatReportAsText,
  generateDetailedReport,
} from '../simulationReportService';
import { Order, SimulationResult } from '../../types';

const JAN_15 = Date.UTC(2025, 0, 15);
const FEB_3 = Date.UTC(2025, 1, 3);

function createResult(): SimulationResult {
  const orders: Order[] = [
    { timestamp: JAN_15, price: 10, quantity: 10, filled: 10, source: 'chase' },
    { timestamp: FEB_3, price: 12, quantity: -5, filled: -5, source: 'thresholdcontrol' },
  ];
  return {
    initialValue: 1000,
    finalValue: 1020,
    finalGain: 20,
    finalFund: 500,
    finalUnit: 13,
    orders,
    snapshots: [0, 100, -50, 20].map((gain, i) => ({
      timestamp: JAN_15 + i * 1000,
      price: 10,
      fund: 0,
      unit: 0,
      gain,
    })),
    stats: {
      totalOrders: 2,
      buyVolume: 10,
      sellVolume: 5,
      clippedOrders: 0,
      bySource: {
        chase: { orders: 1, volume: 10 },
        turning: { orders: 0, volume: 0 },
        thresholdcontrol: { orders: 1, volume: 5 },
        other: { orders: 0, volume: 0 },
      },
      maxDrawdown: 150,
      totalReturn: 2,
    },
  };
}

describe('generateDetailedReport', () => {
  it('should only list sources that traded', () => {
    const report = generateDetailedReport('TEST', createResult());

    expect(report.sourceBreakdown).toEqual([
      { source: 'chase', orders: 1, volume: 10 },
      { source: 'thresholdcontrol', orders: 1, volume: 5 },
    ]);
  });

  it('should group orders by month', () => {
    const report = generateDetailedReport('TEST', createResult());

    expect(report.monthlyStats).toEqual([
      { year: 2025, month: 1, orders: 1, netQuantity: 10, cashFlow: -100 },
      { year: 2025, month: 2, orders: 1, netQuantity: -5, cashFlow: 60 },
    ]);
  });

  it('should measure drawdowns on the value curve', () => {
    const report = generateDetailedReport('TEST', createResult());

    expect(report.valueCurve.map((point) => point.value)).toEqual([1000, 1100, 950, 1020]);
    expect(report.drawdownAnalysis).toEqual({
      maxDrawdown: 150,
      maxDrawdownPercent: 15,
      avgDrawdown: 150,
      drawdownPeriods: 1,
    });
  });
});

describe('formatReportAsText', () => {
  it('should render the summary, sources and months', () => {
    const lines = formatReportAsText(generateDetailedReport('TEST', createResult())).split('\n');

    expect(lines[1]).toBe('Simulation Report: TEST');
    expect(lines).toContain('Total Return: 2.00%');
    expect(lines).toContain('Final Unit: 13.0000');
    expect(lines).toContain('Orders: 2 (clipped: 0)');
    expect(lines).toContain('chase            |      1 | volume 10.0000');
    expect(lines).toContain('2025-01 |      1 |    10.0000 | -100.00');
    expect(lines).toContain('Max Drawdown: 150.00 (15.00%)');
  });
});

describe('report export', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'sim-report-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should write the order log as CSV', () => {
    const output = path.join(dir, 'nested', 'orders.csv');

    exportOrdersToCSV(
      [...createResult().orders, { timestamp: null, price: 9, quantity: 1, filled: 1, source: 'other' }],
      output
    );

    expect(fs.readFileSync(output, 'utf-8')).toBe(
      'timestamp,price,quantity,filled,source\n' +
        `${JAN_15},10,10,10,chase\n` +
        `${FEB_3},12,-5,-5,thresholdcontrol\n` +
        ',9,1,1,other\n'
    );
  });

  it('should write the report as JSON', () => {
    const output = path.join(dir, 'report.json');
    const report = generateDetailedReport('TEST', createResult());

    exportReportToJSON(report, output);

    expect(JSON.parse(fs.readFileSync(output, 'utf-8'))).toEqual(report);
  });
});
