import * as checker from './checker';
import {checkNumeral} from './ints';
import {Loc} from './loc';
import {type GridString, isGridString} from './types';

/**
 * A 9x9 grid of optional numerals in the range 1..=9: a Sudoku grid.
 */
export class Grid {
  // The cells of the grid are either 0, meaning blank, or 1..=9, the numeral.
  private readonly array: Uint8Array;

  /** Duplicates a grid, or constructs an empty grid if no grid is supplied. */
  constructor(grid?: ReadonlyGrid) {
    this.array = grid ? new Uint8Array(grid.bytes) : new Uint8Array(81);
  }

  /**
   * Parses the flat string form of a grid.
   *
   * @throws Error if `s` is not 81 characters of numerals and periods.
   */
  static fromString(s: string): Grid {
    if (!isGridString(s)) {
      throw new Error(`Not a grid string: ${JSON.stringify(s)}`);
    }
    const grid = new Grid();
    for (const loc of Loc.ALL) {
      const ch = s[loc.index];
      if (ch !== '.') grid.array[loc.index] = Number(ch);
    }
    return grid;
  }

  /**
   * Builds a grid from 9 rows of 9 integers, with 0 meaning blank: the shape
   * that the verification service uses.
   *
   * @throws Error if the rows have the wrong shape or hold other numbers.
   */
  static fromRows(rows: readonly (readonly number[])[]): Grid {
    if (rows.length !== 9 || rows.some(row => row.length !== 9)) {
      throw new Error('Expected 9 rows of 9 cells');
    }
    const grid = new Grid();
    for (const loc of Loc.ALL) {
      const num = rows[loc.row][loc.col];
      grid.set(loc, num === 0 ? null : num);
    }
    return grid;
  }

  /**
   * Returns this grid's current numeral assignment for the given location, or
   * null.
   */
  get(loc: Loc): number | null {
    return this.array[loc.index] || null;
  }

  /**
   * Assigns the given numeral to the given location, or clears the location if
   * given null.
   */
  set(loc: Loc, num: number | null): void {
    this.array[loc.index] = num === null ? 0 : checkNumeral(num);
  }

  /** Returns a read-only view of the array backing the grid. */
  get bytes(): Readonly<Uint8Array> {
    return this.array;
  }

  /**
   * Returns the grid as nine lines of nine characters, numerals or periods,
   * followed by a blank line.
   */
  toString(): string {
    let answer = '';
    for (let row = 0; row < 9; ++row) {
      const start = row * 9;
      answer += this.flatChars(start, start + 9) + '\n';
    }
    return answer + '\n';
  }

  /** Returns an 81-character representation of this grid, with dots for blanks. */
  toFlatString(): GridString {
    const s = this.flatChars(0, 81);
    if (!isGridString(s)) throw new Error(`Corrupt grid: ${s}`);
    return s;
  }

  /** Returns the grid as 9 rows of 9 integers, with 0 for blank locations. */
  toRows(): number[][] {
    return Loc.ROWS.map(row => row.map(loc => this.array[loc.index]));
  }

  /**
   * Returns the set of locations that should be displayed as erroneous.  This
   * is empty when the grid is incomplete, and when the puzzle is solved.
   */
  brokenLocs(): Set<Loc> {
    return checker.brokenLocs(this);
  }

  /**
   * Tells whether this grid is a valid Sudoku solution.
   */
  isSolved(): boolean {
    return checker.isSolved(this);
  }

  private flatChars(start: number, end: number): string {
    let answer = '';
    for (let index = start; index < end; ++index) {
      const num = this.array[index];
      answer += num ? String(num) : '.';
    }
    return answer;
  }
}

/** A Grid that you can't modify. */
export type ReadonlyGrid = Omit<Grid, 'set'>;
