import {Grid} from '../game/grid';
import {countSolutions, InvalidCluesError, solve} from '../game/solver';
import {ensureExhaustiveSwitch} from '../game/types';
import {
  type CheckPuzzleMessage,
  type ErrorCaughtMessage,
  type FromWorkerMessage,
  FromWorkerMessageType,
  type SolvePuzzleMessage,
  type ToWorkerMessage,
  ToWorkerMessageType,
} from './worker-types';

/** The part of a message port that the worker replies through. */
export interface ReplyPort {
  postMessage(message: FromWorkerMessage): void;
}

/** Handles one incoming message, replying through the given port. */
export function handleToWorkerMessage(
  port: ReplyPort,
  message: ToWorkerMessage,
): void {
  port.postMessage(respondTo(message));
}

/** Computes the worker's reply to the given message. */
export function respondTo(message: ToWorkerMessage): FromWorkerMessage {
  const messageType = message.type;
  switch (messageType) {
    case ToWorkerMessageType.SOLVE_PUZZLE:
      return solvePuzzle(message);
    case ToWorkerMessageType.CHECK_PUZZLE:
      return checkPuzzle(message);
    default:
      return ensureExhaustiveSwitch(messageType);
  }
}

function solvePuzzle(m: SolvePuzzleMessage): FromWorkerMessage {
  let grid;
  let solved;
  const startTimeMs = performance.now();
  try {
    grid = Grid.fromString(m.clues);
    solved = solve(grid);
  } catch (e: unknown) {
    return toErrorCaught(m, 'solve', e);
  }
  const elapsedMs = performance.now() - startTimeMs;
  let unique = false;
  if (solved) {
    try {
      unique = countSolutions(Grid.fromString(m.clues), 2) === 1;
    } catch (e: unknown) {
      return toErrorCaught(m, 'countSolutions', e);
    }
  }
  return {
    type: FromWorkerMessageType.PUZZLE_SOLVED,
    toWorkerMessage: m,
    solution: solved ? grid.toFlatString() : null,
    unique,
    elapsedMs,
  };
}

function checkPuzzle(m: CheckPuzzleMessage): FromWorkerMessage {
  let grid;
  try {
    grid = Grid.fromString(m.grid);
  } catch (e: unknown) {
    return toErrorCaught(m, 'checkPuzzle', e);
  }
  return {
    type: FromWorkerMessageType.PUZZLE_CHECKED,
    toWorkerMessage: m,
    solved: grid.isSolved(),
    brokenLocs: [...grid.brokenLocs()].map(loc => loc.index).sort((a, b) => a - b),
  };
}

function toErrorCaught(
  toWorkerMessage: ToWorkerMessage,
  activity: string,
  e: unknown,
): ErrorCaughtMessage {
  let answer: ErrorCaughtMessage = {
    type: FromWorkerMessageType.ERROR_CAUGHT,
    toWorkerMessage,
    activity,
  };
  if (e instanceof Error) {
    answer = {...answer, errorMessage: e.message, stack: e.stack};
  }
  if (e instanceof InvalidCluesError) {
    answer = {...answer, invalidClue: {index: e.loc.index, num: e.num}};
  }
  return answer;
}
