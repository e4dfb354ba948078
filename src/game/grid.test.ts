import {FIRST_SOLUTION, MINIMAL_PUZZLE, MINIMAL_SOLUTION} from './fake-data';
import {Grid} from './grid';
import {Loc} from './loc';

describe('Grid', () => {
  it('starts out blank', () => {
    const grid = new Grid();
    expect(grid.get(Loc.of(40))).toBeNull();
    expect(grid.toFlatString()).toBe('.'.repeat(81));
  });

  it('parses and reproduces the flat string form', () => {
    const grid = Grid.fromString(MINIMAL_PUZZLE);
    expect(grid.get(Loc.of(0, 1))).toBe(6);
    expect(grid.get(Loc.of(0, 0))).toBeNull();
    expect(grid.toFlatString()).toBe(MINIMAL_PUZZLE);
  });

  it('rejects malformed strings', () => {
    expect(() => Grid.fromString('123')).toThrow('Not a grid string: "123"');
    expect(() => Grid.fromString('0'.repeat(81))).toThrow(/Not a grid string/);
  });

  it('sets and clears locations', () => {
    const grid = new Grid();
    grid.set(Loc.of(3, 4), 9);
    expect(grid.get(Loc.of(3, 4))).toBe(9);
    expect(grid.bytes[31]).toBe(9);
    grid.set(Loc.of(3, 4), null);
    expect(grid.get(Loc.of(3, 4))).toBeNull();
  });

  it('rejects numerals outside 1..9', () => {
    const grid = new Grid();
    expect(() => grid.set(Loc.of(0), 0)).toThrow('0 out of range 1..10');
    expect(() => grid.set(Loc.of(0), 10)).toThrow('10 out of range 1..10');
  });

  it('copies rather than shares', () => {
    const original = Grid.fromString(MINIMAL_PUZZLE);
    const copy = new Grid(original);
    copy.set(Loc.of(0), 3);
    expect(original.get(Loc.of(0))).toBeNull();
    expect(original.toFlatString()).toBe(MINIMAL_PUZZLE);
    expect(copy.toFlatString()).toBe('3' + MINIMAL_PUZZLE.slice(1));
  });

  it('prints nine rows and a blank line', () => {
    expect(Grid.fromString(MINIMAL_PUZZLE).toString()).toBe(
      [
        '.6.7.1...',
        '.4...6.75',
        '.....9...',
        '27..5.1..',
        '5..2..9..',
        '......7..',
        '......39.',
        '...96..8.',
        '.....3.4.',
        '',
        '',
      ].join('\n'),
    );
  });

  it('converts to rows of numbers with 0 for blanks', () => {
    const rows = Grid.fromString(MINIMAL_PUZZLE).toRows();
    expect(rows.length).toBe(9);
    expect(rows[0]).toEqual([0, 6, 0, 7, 0, 1, 0, 0, 0]);
    expect(rows[8]).toEqual([0, 0, 0, 0, 0, 3, 0, 4, 0]);
  });

  it('builds from rows of numbers', () => {
    const grid = Grid.fromRows(Grid.fromString(MINIMAL_PUZZLE).toRows());
    expect(grid.toFlatString()).toBe(MINIMAL_PUZZLE);
    expect(() => Grid.fromRows([[1, 2, 3]])).toThrow('Expected 9 rows of 9 cells');
  });

  it('knows when it is solved', () => {
    expect(Grid.fromString(MINIMAL_SOLUTION).isSolved()).toBe(true);
    expect(Grid.fromString(FIRST_SOLUTION).isSolved()).toBe(true);
    expect(Grid.fromString(MINIMAL_PUZZLE).isSolved()).toBe(false);
  });

  it('finds broken locations only in complete grids', () => {
    const grid = Grid.fromString(MINIMAL_SOLUTION);
    expect(grid.brokenLocs().size).toBe(0);
    grid.set(Loc.of(0), null);
    expect(grid.brokenLocs().size).toBe(0);
  });
});
