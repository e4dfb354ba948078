#!/usr/bin/env node

import {readFile} from 'node:fs/promises';
import {parseArgs} from 'node:util';
import {Grid, type ReadonlyGrid} from './game/grid';
import {readPuzzles} from './game/reader';
import {InvalidCluesError} from './game/solver';
import {Sudoku} from './game/sudoku';
import {type Config, ConfigError, loadConfig} from './system/config';
import {EventType, logEvent, setLogLevel} from './system/logging';
import {
  PuzzleService,
  type WorkerFactory,
  WorkerError,
} from './system/puzzle-service';
import {type FetchFn, verifyPuzzles} from './system/verifier';

const USAGE = `Usage: sudoku-backtrack [options] [file...]

Solves the Sudoku puzzles in the given files (or standard input).  Each puzzle
is 81 cells of 1-9 for clues and . for blanks; other characters are ignored.

Options:
  --print                  Print each solution
  --verify                 Submit the solutions to the verification service
  --url <url>              Verification service URL
  --max-connections <n>    Most verification requests in flight at once
  --timeout-ms <n>         Verification request timeout
  --workers <n>            Solve on this many worker threads (0: this thread)
  --log-level <level>      error, system or action
  --help                   Show this message
`;

/** Everything the program touches outside itself. */
export interface CliIo {
  readonly env: NodeJS.ProcessEnv;
  stdout(text: string): void;
  stderr(text: string): void;
  readFile(path: string): Promise<string>;
  readStdin(): Promise<string>;
  readonly fetch?: FetchFn;
  readonly startWorker?: WorkerFactory;
}

/** What became of one puzzle. */
interface Outcome {
  readonly clues: ReadonlyGrid;
  readonly solution: ReadonlyGrid | null;
  readonly invalid: boolean;
}

/**
 * Runs the program with the given arguments, not including the executable and
 * script names.
 *
 * @returns The process exit code: 0 if every puzzle was solved (and verified,
 * when asked), 1 if not, 2 for bad usage, configuration or input.
 */
export async function run(argv: readonly string[], io: CliIo): Promise<number> {
  let parsed;
  try {
    parsed = parseArgs({
      args: [...argv],
      allowPositionals: true,
      options: {
        'print': {type: 'boolean'},
        'verify': {type: 'boolean'},
        'url': {type: 'string'},
        'max-connections': {type: 'string'},
        'timeout-ms': {type: 'string'},
        'workers': {type: 'string'},
        'log-level': {type: 'string'},
        'help': {type: 'boolean'},
      },
    });
  } catch (e: unknown) {
    io.stderr(`${e instanceof Error ? e.message : String(e)}\n\n${USAGE}`);
    return 2;
  }
  const {values, positionals} = parsed;
  if (values.help) {
    io.stdout(USAGE);
    return 0;
  }

  let config;
  try {
    config = loadConfig(io.env, {
      verifyUrl: values.url,
      maxConnections: values['max-connections'],
      timeoutMs: values['timeout-ms'],
      workers: values.workers,
      logLevel: values['log-level'],
    });
  } catch (e: unknown) {
    if (!(e instanceof ConfigError)) throw e;
    io.stderr(`${e.message}\n`);
    return 2;
  }
  setLogLevel(config.logLevel);

  let puzzles;
  try {
    puzzles = await readInput(positionals, io);
  } catch (e: unknown) {
    io.stderr(`${e instanceof Error ? e.message : String(e)}\n`);
    return 2;
  }
  logEvent(EventType.ACTION, {
    category: 'solve',
    detail: `${puzzles.length} puzzles from ${positionals.join(', ') || 'stdin'}`,
  });

  const startTimeMs = performance.now();
  const outcomes = await solveAll(puzzles, config, io.startWorker);
  logEvent(EventType.SYSTEM, {
    category: 'solve batch',
    detail: `${puzzles.length} puzzles`,
    elapsedMs: performance.now() - startTimeMs,
  });

  const solutions: ReadonlyGrid[] = [];
  let invalid = 0;
  for (const outcome of outcomes) {
    if (outcome.invalid) ++invalid;
    if (!outcome.solution) continue;
    if (!outcome.solution.isSolved()) {
      logEvent(EventType.ERROR, {
        category: 'solution failed validation',
        detail: outcome.clues.toFlatString(),
      });
      continue;
    }
    solutions.push(outcome.solution);
    if (values.print) io.stdout(outcome.solution.toString());
  }
  io.stdout(`Solved ${solutions.length} of ${puzzles.length}\n`);
  if (invalid) io.stdout(`Invalid ${invalid}\n`);
  let allGood = solutions.length === puzzles.length;

  if (values.verify) {
    logEvent(EventType.ACTION, {category: 'verify', detail: config.verifyUrl});
    const report = await verifyPuzzles(solutions, {
      url: config.verifyUrl,
      maxConnections: config.maxConnections,
      timeoutMs: config.timeoutMs,
      fetch: io.fetch,
    });
    io.stdout(`Verified ${report.verified} out of ${puzzles.length}\n`);
    allGood = allGood && report.verified === puzzles.length;
  }
  return allGood ? 0 : 1;
}

async function readInput(
  paths: readonly string[],
  io: CliIo,
): Promise<Grid[]> {
  if (!paths.length) return readPuzzles(await io.readStdin());
  const puzzles: Grid[] = [];
  for (const path of paths) {
    puzzles.push(...readPuzzles(await io.readFile(path)));
  }
  return puzzles;
}

async function solveAll(
  puzzles: readonly Grid[],
  config: Config,
  startWorker: WorkerFactory | undefined,
): Promise<Outcome[]> {
  if (!config.workers) return puzzles.map(solveHere);
  const service = new PuzzleService(config.workers, startWorker);
  try {
    return await Promise.all(
      puzzles.map(async clues => {
        try {
          const {solution} = await service.solve(clues.toFlatString());
          return {
            clues,
            solution: solution ? Grid.fromString(solution) : null,
            invalid: false,
          };
        } catch (e: unknown) {
          if (!(e instanceof WorkerError) || !e.caught.invalidClue) throw e;
          return {clues, solution: null, invalid: true};
        }
      }),
    );
  } finally {
    await service.close();
  }
}

function solveHere(clues: Grid): Outcome {
  try {
    const sudoku = Sudoku.solve(clues);
    return {clues, solution: sudoku.solution, invalid: false};
  } catch (e: unknown) {
    if (!(e instanceof InvalidCluesError)) throw e;
    logEvent(EventType.ERROR, {
      category: 'invalid clues',
      detail: `${clues.toFlatString()}: ${e.message}`,
    });
    return {clues, solution: null, invalid: true};
  }
}

/** The real world, for running from the command line. */
function nodeIo(): CliIo {
  return {
    env: process.env,
    stdout: text => process.stdout.write(text),
    stderr: text => process.stderr.write(text),
    readFile: path => readFile(path, 'utf8'),
    readStdin: async () => {
      let text = '';
      process.stdin.setEncoding('utf8');
      for await (const chunk of process.stdin) text += String(chunk);
      return text;
    },
  };
}

if (require.main === module) {
  run(process.argv.slice(2), nodeIo()).then(
    code => {
      process.exitCode = code;
    },
    (e: unknown) => {
      logEvent(EventType.ERROR, {
        category: 'uncaught error',
        detail: e instanceof Error ? (e.stack ?? e.message) : String(e),
      });
      process.exitCode = 2;
    },
  );
}
