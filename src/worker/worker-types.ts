import type {GridString} from '../game/types';

export enum ToWorkerMessageType {
  SOLVE_PUZZLE = 'SOLVE_PUZZLE',
  CHECK_PUZZLE = 'CHECK_PUZZLE',
}

interface ToWorkerMessageBase {
  readonly interactionId: number;
  readonly type: ToWorkerMessageType;
}

export interface SolvePuzzleMessage extends ToWorkerMessageBase {
  readonly type: ToWorkerMessageType.SOLVE_PUZZLE;

  /** The clues of the puzzle to solve. */
  readonly clues: GridString;
}

export interface CheckPuzzleMessage extends ToWorkerMessageBase {
  readonly type: ToWorkerMessageType.CHECK_PUZZLE;

  /** The grid to check against the rules of Sudoku. */
  readonly grid: GridString;
}

export type ToWorkerMessage = SolvePuzzleMessage | CheckPuzzleMessage;

export enum FromWorkerMessageType {
  ERROR_CAUGHT = 'ERROR_CAUGHT',
  PUZZLE_SOLVED = 'PUZZLE_SOLVED',
  PUZZLE_CHECKED = 'PUZZLE_CHECKED',
}

interface FromWorkerMessageBase {
  readonly toWorkerMessage: ToWorkerMessage;
  readonly type: FromWorkerMessageType;
}

/** Identifies the clue that made a puzzle invalid. */
export interface InvalidClue {
  /** The row-major location index of the clue. */
  readonly index: number;
  /** The clue's numeral. */
  readonly num: number;
}

export interface ErrorCaughtMessage extends FromWorkerMessageBase {
  readonly type: FromWorkerMessageType.ERROR_CAUGHT;

  /** The incoming message that this is the result for. */
  readonly toWorkerMessage: ToWorkerMessage;

  /** What the worker was doing when the error was caught. */
  readonly activity: string;

  /** If an actual Error was caught, its message. */
  readonly errorMessage?: string;

  /** If an actual Error was caught, its stack trace string. */
  readonly stack?: string;

  /** Set when the error was a puzzle whose clues contradict each other. */
  readonly invalidClue?: InvalidClue;
}

export interface PuzzleSolvedMessage extends FromWorkerMessageBase {
  readonly toWorkerMessage: SolvePuzzleMessage;
  readonly type: FromWorkerMessageType.PUZZLE_SOLVED;

  /** The solution found, or null if the puzzle has none. */
  readonly solution: GridString | null;

  /** Whether the solution found is the only one. */
  readonly unique: boolean;

  /** How long it took the worker to solve the puzzle, in milliseconds. */
  readonly elapsedMs: number;
}

export interface PuzzleCheckedMessage extends FromWorkerMessageBase {
  readonly toWorkerMessage: CheckPuzzleMessage;
  readonly type: FromWorkerMessageType.PUZZLE_CHECKED;

  /** Whether the grid is a valid, complete solution. */
  readonly solved: boolean;

  /** The location indices of numerals that repeat within a unit. */
  readonly brokenLocs: readonly number[];
}

export type FromWorkerMessage =
  | ErrorCaughtMessage
  | PuzzleSolvedMessage
  | PuzzleCheckedMessage;
