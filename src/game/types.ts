declare const brandKey: unique symbol;
type Brand<B> = {[brandKey]: B};
export type Branded<T, B> = T & Brand<B>;

/**
 * The flat string form of a Sudoku grid: 81 characters in row-major order, each
 * either a numeral 1-9 or a period meaning the location is empty.
 */
export type GridString = Branded<string, 'Grid'>;

const GRID_STRING_PATTERN = /^[1-9.]{81}$/;

/** Tells whether the given string is a well-formed GridString. */
export function isGridString(s: string): s is GridString {
  return GRID_STRING_PATTERN.test(s);
}

/**
 * Gets the compiler to ensure that a value being switched on (or tested using
 * if statements) has had all possible values eliminated.  So if you change your
 * code to allow another value, your call to this function will stop compiling.
 * @param value The value being exhaustively switched on.
 */
export function ensureExhaustiveSwitch(value: never): never {
  throw new Error(`Unexpected value: ${String(value)}`);
}
