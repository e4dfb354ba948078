import {Grid, type ReadonlyGrid} from './grid';
import {solve} from './solver';

/**
 * Describes a Sudoku puzzle together with the solution found for it, if any.
 */
export class Sudoku {
  constructor(
    readonly clues: ReadonlyGrid,
    readonly solution: ReadonlyGrid | null,
  ) {}

  /**
   * Solves a copy of the given clues.  The clues themselves are left alone.
   *
   * @throws InvalidCluesError if the clues contradict each other.
   */
  static solve(clues: ReadonlyGrid): Sudoku {
    const grid = new Grid(clues);
    return new Sudoku(new Grid(clues), solve(grid) ? grid : null);
  }

  /** Tells whether a solution was found. */
  get isSolved(): boolean {
    return this.solution !== null;
  }
}
