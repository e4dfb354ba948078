export {blockIndex, blockLocIndices} from './game/block';
export {brokenLocs, isSolved} from './game/checker';
export {Grid, type ReadonlyGrid} from './game/grid';
export {Loc} from './game/loc';
export {PuzzleReader, readPuzzles, UnexpectedEndError} from './game/reader';
export {countSolutions, InvalidCluesError, solve} from './game/solver';
export {Sudoku} from './game/sudoku';
export type {GridString} from './game/types';
export {type Config, ConfigError, loadConfig} from './system/config';
export {EventType, logEvent, setLogLevel, setLogSink} from './system/logging';
export {PuzzleService, WorkerError} from './system/puzzle-service';
export {
  GarbledResponseError,
  toVerifyPayload,
  VerifyHttpError,
  verifyPuzzle,
  verifyPuzzles,
  type VerifyReport,
} from './system/verifier';
