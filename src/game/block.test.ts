import {blockIndex, blockLocIndices} from './block';
import {iota} from './ints';

describe('blockIndex', () => {
  it('maps corner cells to the expected blocks', () => {
    expect(blockIndex(0, 0)).toBe(0);
    expect(blockIndex(2, 2)).toBe(0);
    expect(blockIndex(0, 3)).toBe(1);
    expect(blockIndex(3, 0)).toBe(3);
    expect(blockIndex(4, 4)).toBe(4);
    expect(blockIndex(5, 8)).toBe(5);
    expect(blockIndex(6, 2)).toBe(6);
    expect(blockIndex(8, 8)).toBe(8);
  });

  it('agrees with the division formula everywhere', () => {
    for (const row of iota(9)) {
      for (const col of iota(9)) {
        expect(blockIndex(row, col), `(${row}, ${col})`).toBe(
          Math.floor(row / 3) * 3 + Math.floor(col / 3),
        );
      }
    }
  });

  it('partitions the grid into nine groups of nine', () => {
    const counts = new Array<number>(9).fill(0);
    for (const row of iota(9)) {
      for (const col of iota(9)) {
        ++counts[blockIndex(row, col)];
      }
    }
    expect(counts).toEqual(new Array(9).fill(9));
  });

  it('rejects out-of-range coordinates', () => {
    expect(() => blockIndex(9, 0)).toThrow('9 out of range 0..9');
    expect(() => blockIndex(0, -1)).toThrow('-1 out of range 0..9');
    expect(() => blockIndex(1.5, 0)).toThrow('1.5 is not an integer');
  });
});

describe('blockLocIndices', () => {
  it('lists the cells of a block in row-major order', () => {
    expect(blockLocIndices(0)).toEqual([0, 1, 2, 9, 10, 11, 18, 19, 20]);
    expect(blockLocIndices(5)).toEqual([33, 34, 35, 42, 43, 44, 51, 52, 53]);
    expect(blockLocIndices(8)).toEqual([60, 61, 62, 69, 70, 71, 78, 79, 80]);
  });

  it('covers each location exactly once', () => {
    const all = iota(9).flatMap(block => [...blockLocIndices(block)]);
    expect(all.sort((a, b) => a - b)).toEqual(iota(81));
  });

  it('agrees with blockIndex', () => {
    for (const block of iota(9)) {
      for (const index of blockLocIndices(block)) {
        expect(blockIndex(Math.floor(index / 9), index % 9)).toBe(block);
      }
    }
  });
});
