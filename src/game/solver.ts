import {Grid, type ReadonlyGrid} from './grid';
import {checkIntRange} from './ints';
import {Loc} from './loc';

/**
 * Thrown when a puzzle's clues already break the rules of Sudoku: two clues
 * with the same numeral share a row, column or block.
 */
export class InvalidCluesError extends Error {
  override readonly name = 'InvalidCluesError';

  constructor(
    /** The location of the first clue found to repeat an earlier one. */
    readonly loc: Loc,
    /** The repeated numeral. */
    readonly num: number,
  ) {
    super(`Clue ${num} at ${loc} repeats in its row, column or block`);
  }
}

/**
 * Tracks which numerals are used in each row, column and block, as 9-bit
 * masks: bit `n - 1` is set when numeral `n` is present in the unit.  Every
 * placement and retraction must go through here so that the masks always
 * match the grid being searched.
 */
class Constraints {
  private readonly rows = new Uint16Array(9);
  private readonly cols = new Uint16Array(9);
  private readonly blocks = new Uint16Array(9);

  /**
   * Builds the masks for the clues of the given grid.
   *
   * @throws InvalidCluesError on the first clue that repeats in a unit.
   */
  constructor(grid: ReadonlyGrid) {
    for (const loc of Loc.ALL) {
      const num = grid.get(loc);
      if (num === null) continue;
      if (!this.isFree(loc, num)) throw new InvalidCluesError(loc, num);
      this.place(loc, num);
    }
  }

  /** Tells whether `num` is absent from every unit containing `loc`. */
  isFree(loc: Loc, num: number): boolean {
    const used = this.rows[loc.row] | this.cols[loc.col] | this.blocks[loc.block];
    return (used & (1 << (num - 1))) === 0;
  }

  place(loc: Loc, num: number): void {
    const bit = 1 << (num - 1);
    this.rows[loc.row] |= bit;
    this.cols[loc.col] |= bit;
    this.blocks[loc.block] |= bit;
  }

  retract(loc: Loc, num: number): void {
    const mask = ~(1 << (num - 1));
    this.rows[loc.row] &= mask;
    this.cols[loc.col] &= mask;
    this.blocks[loc.block] &= mask;
  }
}

/**
 * Fills in the blank locations of a Sudoku grid, in place, by depth-first
 * search.  Locations are visited in row-major order and numerals tried in
 * ascending order, so for a puzzle with several solutions the one returned is
 * the first in that order.
 *
 * @param grid The puzzle to solve.  On success it holds the solution; on
 * failure it is left exactly as it was passed in.
 * @returns Whether a solution was found.
 * @throws InvalidCluesError if the clues contradict each other, before any
 * location is changed.
 */
export function solve(grid: Grid): boolean {
  const constraints = new Constraints(grid);
  return searchFrom(grid, constraints, 0);
}

/**
 * Counts the solutions of a puzzle, stopping once `limit` have been found.  The
 * given grid is not modified.
 *
 * @throws InvalidCluesError if the clues contradict each other.
 */
export function countSolutions(clues: ReadonlyGrid, limit = 2): number {
  checkIntRange(limit, 1, Number.MAX_SAFE_INTEGER);
  const grid = new Grid(clues);
  const constraints = new Constraints(grid);
  let count = 0;
  // Reporting success only at the limit makes the search backtrack past each
  // earlier solution and keep looking.
  searchFrom(grid, constraints, 0, () => ++count >= limit);
  return count;
}

/**
 * Searches for an assignment of the blank locations from `index` onward.  When
 * the search succeeds the placements stay in the grid; when it fails every
 * placement it made has been retracted.
 */
function searchFrom(
  grid: Grid,
  constraints: Constraints,
  index: number,
  onComplete: () => boolean = () => true,
): boolean {
  while (index < 81 && grid.get(Loc.ALL[index]) !== null) ++index;
  if (index === 81) return onComplete();
  const loc = Loc.ALL[index];
  for (let num = 1; num <= 9; ++num) {
    if (!constraints.isFree(loc, num)) continue;
    grid.set(loc, num);
    constraints.place(loc, num);
    if (searchFrom(grid, constraints, index + 1, onComplete)) return true;
    grid.set(loc, null);
    constraints.retract(loc, num);
  }
  return false;
}
