/**
 * Unit tests for Instrument
 */

import { Instrument } from '../instrument';

describe('Instrument', () => {
  it('should start without a price or timestamp', () => {
    const inst = new Instrument(1, 'Test stock', 'TST');

    expect(inst.price).toBeNaN();
    expect(inst.timestamp).toBeNull();
    expect(inst.history).toEqual([]);
    expect(inst.type).toBe('stock');
  });

  it('should record every update in order', () => {
    const inst = new Instrument(1, 'Test future', 'TFUT', 'future');

    inst.update(1000, 10.5);
    inst.update(2000, 11);

    expect(inst.price).toBe(11);
    expect(inst.timestamp).toBe(2000);
    expect(inst.history).toEqual([
      { timestamp: 1000, price: 10.5 },
      { timestamp: 2000, price: 11 },
    ]);
  });

  it('should keep the same price on repeated updates', () => {
    const inst = new Instrument(0, 'Flat', 'FLT');
    inst.update(1000, 5);
    inst.update(2000, 5);

    expect(inst.price).toBe(5);
    expect(inst.history).toHaveLength(2);
  });

  it('should reject unsupported types', () => {
    expect(() => new Instrument(1, 'Bond', 'BND', 'bond')).toThrow(
      'Type of instrument is not supported: bond'
    );
  });

  it('should reject negative or fractional ids', () => {
    expect(() => new Instrument(-1, 'Bad', 'BAD')).toThrow('Instrument id is invalid: -1');
    expect(() => new Instrument(1.5, 'Bad', 'BAD')).toThrow('Instrument id is invalid: 1.5');
  });

  it('should describe itself', () => {
    const inst = new Instrument(3, 'Test stock', 'TST');
    expect(inst.toString()).toBe('[I][stock,3][TST] Test stock: NaN @ -');

    inst.update(0, 12);
    expect(inst.toString()).toBe('[I][stock,3][TST] Test stock: 12 @ 1970-01-01T00:00:00.000Z');
  });
});
