import {blockIndex, blockLocIndices} from './block';
import {checkIntRange, iota} from './ints';

/** One of the 81 cell locations of a Sudoku grid. */
export class Loc extends Object {
  /** The row index, in 0..9. */
  readonly row: number;
  /** The column index, in 0..9. */
  readonly col: number;
  /** The block (3x3 subgrid) index, in 0..9. */
  readonly block: number;
  /** The location index, in 0..81. */
  readonly index: number;

  private constructor(index: number) {
    super();
    this.index = index;
    this.row = Math.floor(index / 9);
    this.col = index % 9;
    this.block = blockIndex(this.row, this.col);
  }

  /** The location as an ordered pair, and 1-based rather than 0-based. */
  override toString(): string {
    return `(${this.row + 1}, ${this.col + 1})`;
  }

  /**
   * The 81 locations of a Sudoku grid, in row-major order.
   */
  static readonly ALL: readonly Loc[] = iota(81).map(i => new Loc(i));

  /** The locations of each row, top to bottom. */
  static readonly ROWS: readonly (readonly Loc[])[] = iota(9).map(row =>
    Loc.ALL.slice(row * 9, row * 9 + 9),
  );

  /** The locations of each column, left to right. */
  static readonly COLS: readonly (readonly Loc[])[] = iota(9).map(col =>
    iota(9).map(row => Loc.ALL[row * 9 + col]),
  );

  /** The locations of each block, in block order. */
  static readonly BLOCKS: readonly (readonly Loc[])[] = iota(9).map(block =>
    blockLocIndices(block).map(index => Loc.ALL[index]),
  );

  /** All 27 units: the rows, then the columns, then the blocks. */
  static readonly UNITS: readonly (readonly Loc[])[] = [
    ...Loc.ROWS,
    ...Loc.COLS,
    ...Loc.BLOCKS,
  ];

  /** Converts a location index into a Loc. */
  static of(index: number): Loc;

  /** Converts a row-column pair into a Loc. */
  static of(row: number, col: number): Loc;

  static of(rowOrIndex: number, col?: number): Loc {
    if (col === undefined) return Loc.ALL[checkIntRange(rowOrIndex, 0, 81)];
    const row = checkIntRange(rowOrIndex, 0, 9);
    const index = row * 9 + checkIntRange(col, 0, 9);
    return Loc.ALL[index];
  }
}
