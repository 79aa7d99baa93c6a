/**
 * Unit tests for the Chasing subroutine
 */

import { Instrument } from '../../instrument/instrument';
import { Chasing } from '../chasing';
import { ChasingConfig, DEFAULT_CHASING } from '../../../config/strategyParameters';
import { StructuredLogger } from '../../../utils/logger';

function createLogger(): StructuredLogger {
  return { debug: jest.fn(), info: jest.fn(), warn: jest.fn(), error: jest.fn() };
}

describe('Chasing', () => {
  let inst: Instrument;
  let time: number;

  function createChasing(overrides: Partial<ChasingConfig> = {}): Chasing {
    return new Chasing(inst, { ...DEFAULT_CHASING, ...overrides }, createLogger());
  }

  function feed(chasing: Chasing, prices: number[]): number[] {
    return prices.map((price) => {
      time += 1000;
      inst.update(time, price);
      return chasing.update();
    });
  }

  beforeEach(() => {
    time = 0;
    inst = new Instrument(1, 'Test', 'TST');
    inst.update(time, 100);
  });

  it('should place the first steps one gap away from the starting price', () => {
    const chasing = createChasing();

    expect(chasing.nextStepUp).toBe(105);
    expect(chasing.nextStepDown).toBe(95);
    expect(chasing.armState).toBe('IDLE');
    expect(chasing.stack).toBe(0);
  });

  describe('chase mode, upward trend', () => {
    it('should buy once the price clears the step by upper_limit', () => {
      const chasing = createChasing();

      expect(feed(chasing, [102, 104, 106, 111])).toEqual([0, 0, 50, 0]);
      expect(chasing.nextStepUp).toBe(111);
      expect(chasing.stack).toBe(1);
      expect(chasing.armState).toBe('ARMED_BUY');
    });

    it('should shrink each trade by inc until it reaches zero', () => {
      const chasing = createChasing();

      const amounts = feed(chasing, [102, 106, 112, 118, 124, 130, 136, 142]);

      expect(amounts).toEqual([0, 50, 40, 30, 20, 10, 0, 0]);
      expect(chasing.stack).toBe(5);
      expect(chasing.nextStepUp).toBe(147);
    });

    it('should disarm when the price falls lower_limit below the step', () => {
      const chasing = createChasing();

      feed(chasing, [102, 105]);
      expect(chasing.armState).toBe('ARMED_BUY');

      feed(chasing, [104]);
      expect(chasing.armState).toBe('IDLE');
    });

    it('should ignore falling prices', () => {
      const chasing = createChasing();

      expect(feed(chasing, [99, 90, 80])).toEqual([0, 0, 0]);
      expect(chasing.stack).toBe(0);
    });
  });

  describe('chase mode, downward trend', () => {
    it('should sell once the price clears the step by lower_limit', () => {
      const chasing = createChasing({ trend: -1 });

      expect(feed(chasing, [98, 95, 94])).toEqual([0, 0, -50]);
      expect(chasing.nextStepDown).toBe(89);
      expect(chasing.stack).toBe(1);
      expect(chasing.armState).toBe('IDLE');
    });

    it('should disarm when the price rises upper_limit above the step', () => {
      const chasing = createChasing({ trend: -1 });

      feed(chasing, [98, 95]);
      expect(chasing.armState).toBe('ARMED_SELL');

      feed(chasing, [97]);
      expect(chasing.armState).toBe('IDLE');
    });

    it('should return zero rather than a negative zero once the size is spent', () => {
      const chasing = createChasing({ trend: -1, init: 10, inc: 10 });

      const amounts = feed(chasing, [98, 94, 88]);

      expect(amounts).toEqual([0, -10, 0]);
      expect(Object.is(amounts[2], 0)).toBe(true);
      expect(chasing.stack).toBe(1);
    });
  });

  describe('safety mode', () => {
    it('should sell the fixed amount when an upward trend turns down', () => {
      const chasing = createChasing({ mode: 'safety' });

      expect(feed(chasing, [102, 106])).toEqual([0, 0]);
      expect(chasing.armState).toBe('ARMED_SELL');
      expect(chasing.nextStepUp).toBe(111);
      expect(chasing.nextStepDown).toBe(101);

      expect(feed(chasing, [107, 105])).toEqual([0, -20]);
      expect(chasing.lastHigh).toBe(107);
      expect(chasing.armState).toBe('IDLE');
    });

    it('should buy the fixed amount when a downward trend turns up', () => {
      const chasing = createChasing({ mode: 'safety', trend: -1 });

      expect(feed(chasing, [98, 94])).toEqual([0, 0]);
      expect(chasing.armState).toBe('ARMED_BUY');
      expect(chasing.nextStepUp).toBe(99);
      expect(chasing.nextStepDown).toBe(89);

      // Still falling: armed, nothing to do
      expect(feed(chasing, [93])).toEqual([0]);
      expect(chasing.armState).toBe('ARMED_BUY');

      expect(feed(chasing, [94])).toEqual([20]);
      expect(chasing.lastLow).toBe(93);
      expect(chasing.armState).toBe('IDLE');
    });

    it('should arm on a break above the upper step in a downward trend', () => {
      const chasing = createChasing({ mode: 'safety', trend: -1 });

      feed(chasing, [102, 106]);

      expect(chasing.armState).toBe('ARMED_BUY');
      expect(chasing.nextStepUp).toBe(111);
      expect(chasing.nextStepDown).toBe(95);
    });

    it('should wait for a turn that is deep enough', () => {
      const chasing = createChasing({ mode: 'safety', lowerLimit: 3 });

      feed(chasing, [102, 106, 107]);

      expect(feed(chasing, [105])).toEqual([0]);
      expect(feed(chasing, [104])).toEqual([-20]);
    });
  });

  it('should leave its state unchanged on a repeated price', () => {
    const chasing = createChasing();
    feed(chasing, [102, 106]);

    expect(feed(chasing, [106, 106])).toEqual([0, 0]);
    expect(chasing.stack).toBe(1);
    expect(chasing.nextStepUp).toBe(111);
    expect(chasing.armState).toBe('IDLE');
    expect(chasing.priceHistory).toEqual([100, 102, 106, 106, 106]);
  });
});
