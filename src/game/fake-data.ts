// Puzzles shared by the tests.

/** A puzzle with a unique solution, from which no clue can be removed. */
export const MINIMAL_PUZZLE =
  '.6.7.1....4...6.75.....9...27..5.1..5..2..9........7........39....96..8......3.4.';
export const MINIMAL_SOLUTION =
  '365781429941326875728549613279658134514237968683194752856412397437965281192873546';

/** Another puzzle with a unique solution. */
export const SPARSE_PUZZLE =
  '.....8..53..9..8....15....95..7.34..8.....1.......42...6741..8..25...........6...';
export const SPARSE_SOLUTION =
  '249368715356971824781542639512783496874629153693154278967415382425837961138296547';

/**
 * MINIMAL_PUZZLE with one more clue, which repeats nothing but leaves the
 * puzzle with no solution.
 */
export const UNSOLVABLE_PUZZLE =
  '.6.7.1....4...6.75.....9...27..5.1..5..2..9........7........39....96..8......3.41';

/** What the solver makes of a blank grid. */
export const FIRST_SOLUTION =
  '123456789456789123789123456214365897365897214897214365531642978642978531978531642';

/** A blank grid. */
export const BLANK = '.'.repeat(81);

/** Two 5s at the start of the first row, and nothing else. */
export const DUPLICATE_IN_ROW = '55' + '.'.repeat(79);
