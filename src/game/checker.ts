import type {ReadonlyGrid} from './grid';
import {Loc} from './loc';

/*
 * Checks grids against the rules of Sudoku by scanning every row, column and
 * block afresh.  Nothing here is shared with the solver, so these checks can
 * catch a solver that breaks its own bookkeeping.
 */

/**
 * Tells whether the given grid is a valid Sudoku solution: every location is
 * assigned and every row, column and block holds each numeral exactly once.
 */
export function isSolved(grid: ReadonlyGrid): boolean {
  for (const unit of Loc.UNITS) {
    let seen = 0;
    for (const loc of unit) {
      const num = grid.get(loc);
      if (num === null) return false;
      const bit = 1 << (num - 1);
      if (seen & bit) return false;
      seen |= bit;
    }
  }
  return true;
}

/**
 * Returns the locations whose numerals are repeated within at least one of
 * their units.  This is empty when the grid is incomplete, and when it is
 * solved.
 */
export function brokenLocs(grid: ReadonlyGrid): Set<Loc> {
  const broken = new Set<Loc>();
  if (Loc.ALL.some(loc => grid.get(loc) === null)) return broken;
  for (const unit of Loc.UNITS) {
    const locsByNum = new Map<number, Loc[]>();
    for (const loc of unit) {
      const num = grid.get(loc);
      if (num === null) continue;
      const locs = locsByNum.get(num);
      if (locs) {
        locs.push(loc);
      } else {
        locsByNum.set(num, [loc]);
      }
    }
    for (const locs of locsByNum.values()) {
      if (locs.length > 1) locs.forEach(loc => broken.add(loc));
    }
  }
  return broken;
}
