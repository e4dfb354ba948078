import {Grid} from './grid';
import {Loc} from './loc';

/** Thrown when the input runs out partway through a puzzle. */
export class UnexpectedEndError extends Error {
  override readonly name = 'UnexpectedEndError';

  constructor(
    /** How many of the puzzle's 81 cells were read before the input ended. */
    readonly cellsRead: number,
  ) {
    super(`Input ended after ${cellsRead} of 81 cells`);
  }
}

/** Tells whether a character stands for a cell: a numeral 1-9, or `.`. */
function isCellChar(ch: string): boolean {
  return ch === '.' || (ch >= '1' && ch <= '9');
}

/**
 * Reads Sudoku puzzles out of free-form text.  Each puzzle is 81 cell
 * characters in row-major order, numerals for clues and periods for blanks;
 * any other characters (line breaks, spaces, borders, comments without
 * numerals) are skipped wherever they appear.
 */
export class PuzzleReader {
  private pos = 0;

  constructor(private readonly text: string) {}

  /**
   * Returns the next puzzle, or null when there are no more.
   *
   * @throws UnexpectedEndError if the text ends partway through a puzzle.
   */
  next(): Grid | null {
    const {text} = this;
    while (this.pos < text.length && !isCellChar(text[this.pos])) ++this.pos;
    if (this.pos >= text.length) return null;

    const grid = new Grid();
    for (const loc of Loc.ALL) {
      while (this.pos < text.length && !isCellChar(text[this.pos])) ++this.pos;
      if (this.pos >= text.length) throw new UnexpectedEndError(loc.index);
      const ch = text[this.pos++];
      grid.set(loc, ch === '.' ? null : Number(ch));
    }
    return grid;
  }

  *[Symbol.iterator](): Iterator<Grid> {
    for (let grid = this.next(); grid; grid = this.next()) {
      yield grid;
    }
  }
}

/**
 * Reads every puzzle in the given text.
 *
 * @throws UnexpectedEndError if the text ends partway through a puzzle.
 */
export function readPuzzles(text: string): Grid[] {
  return [...new PuzzleReader(text)];
}
