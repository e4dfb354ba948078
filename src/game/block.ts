import {checkIntRange} from './ints';

/*
 * The nine 3x3 blocks (subgrids) of the Sudoku grid, numbered in row-major
 * block order: block 0 covers rows 0-2 and columns 0-2, block 1 covers rows
 * 0-2 and columns 3-5, and so on through block 8 at rows 6-8, columns 6-8.
 */

// prettier-ignore
const BLOCK_INDICES: readonly (readonly number[])[] = [
  [0, 0, 0, 1, 1, 1, 2, 2, 2],
  [0, 0, 0, 1, 1, 1, 2, 2, 2],
  [0, 0, 0, 1, 1, 1, 2, 2, 2],
  [3, 3, 3, 4, 4, 4, 5, 5, 5],
  [3, 3, 3, 4, 4, 4, 5, 5, 5],
  [3, 3, 3, 4, 4, 4, 5, 5, 5],
  [6, 6, 6, 7, 7, 7, 8, 8, 8],
  [6, 6, 6, 7, 7, 7, 8, 8, 8],
  [6, 6, 6, 7, 7, 7, 8, 8, 8],
];

/**
 * Returns the block containing the cell at the given row and column.  Equal to
 * `floor(row / 3) * 3 + floor(col / 3)`.
 *
 * @param row The row index, in 0..9.
 * @param col The column index, in 0..9.
 * @throws Error if either index is out of range.
 */
export function blockIndex(row: number, col: number): number {
  return BLOCK_INDICES[checkIntRange(row, 0, 9)][checkIntRange(col, 0, 9)];
}

/**
 * Returns the row-major location indices (0..81) of the nine cells in the
 * given block, in row-major order.
 */
export function blockLocIndices(block: number): readonly number[] {
  return BLOCK_LOC_INDICES[checkIntRange(block, 0, 9)];
}

const BLOCK_LOC_INDICES: readonly (readonly number[])[] = BLOCK_INDICES.map(
  (_, block) => {
    const top = Math.floor(block / 3) * 3;
    const left = (block % 3) * 3;
    const indices: number[] = [];
    for (let row = top; row < top + 3; ++row) {
      for (let col = left; col < left + 3; ++col) {
        indices.push(row * 9 + col);
      }
    }
    return indices;
  },
);
