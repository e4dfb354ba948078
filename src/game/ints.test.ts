import {checkInt, checkIntRange, checkNumeral, iota} from './ints';

describe('ints', () => {
  it('checks for integers', () => {
    expect(checkInt(3)).toBe(3);
    expect(() => checkInt(0.5)).toThrow('0.5 is not an integer');
    expect(() => checkInt(NaN)).toThrow('NaN is not an integer');
  });

  it('checks ranges with an exclusive upper bound', () => {
    expect(checkIntRange(0, 0, 9)).toBe(0);
    expect(checkIntRange(8, 0, 9)).toBe(8);
    expect(() => checkIntRange(9, 0, 9)).toThrow('9 out of range 0..9');
  });

  it('checks numerals', () => {
    expect(checkNumeral(1)).toBe(1);
    expect(checkNumeral(9)).toBe(9);
    expect(() => checkNumeral(0)).toThrow('0 out of range 1..10');
  });

  it('counts from zero', () => {
    expect(iota(0)).toEqual([]);
    expect(iota(4)).toEqual([0, 1, 2, 3]);
    expect(() => iota(-1)).toThrow(/out of range/);
  });
});
