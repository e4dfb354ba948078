import * as path from 'node:path';
import {Worker} from 'node:worker_threads';
import {checkIntRange, iota} from '../game/ints';
import {ensureExhaustiveSwitch, type GridString} from '../game/types';
import {
  type CheckPuzzleMessage,
  type ErrorCaughtMessage,
  type FromWorkerMessage,
  FromWorkerMessageType,
  type PuzzleCheckedMessage,
  type PuzzleSolvedMessage,
  type SolvePuzzleMessage,
  type ToWorkerMessage,
  ToWorkerMessageType,
} from '../worker/worker-types';
import {EventType, logEvent} from './logging';

/** The parts of a worker thread that the queue talks to. */
export interface WorkerLike {
  postMessage(message: ToWorkerMessage): void;
  onMessage(listener: (message: FromWorkerMessage) => void): void;
  onError(listener: (error: Error) => void): void;
  terminate(): Promise<void>;
}

/** Starts a worker. */
export type WorkerFactory = () => WorkerLike;

/** Rejects a request that the worker answered with a caught error. */
export class WorkerError extends Error {
  override readonly name = 'WorkerError';

  constructor(readonly caught: ErrorCaughtMessage) {
    super(caught.errorMessage || `Error caught in worker: ${caught.activity}`);
  }
}

interface PendingMessage {
  readonly sent: ToWorkerMessage;
  readonly expectedResponseType: FromWorkerMessageType;
  resolve(result: FromWorkerMessage): void;
  reject(error: Error): void;
}

type Unsent<T extends ToWorkerMessage> = T extends ToWorkerMessage
  ? Omit<T, 'interactionId'>
  : never;

/**
 * A worker thread that solves and checks puzzles, together with a queue of
 * messages to be sent to it.  The worker handles one message at a time.
 */
class WorkerQueue {
  private readonly pending: PendingMessage[] = [];
  private static messageCounter = 0;
  /** Set once the worker has died; every later request fails with it. */
  private failure: Error | null = null;

  constructor(private readonly worker: WorkerLike) {
    worker.onError(e => {
      if (this.failure) return;
      this.failure = e;
      logEvent(EventType.ERROR, {
        category: 'uncaught worker error',
        detail: String(e),
      });
      for (const pending of this.pending.splice(0)) {
        pending.reject(e);
      }
    });
    worker.onMessage(message => this.receive(message));
  }

  get failed(): boolean {
    return this.failure !== null;
  }

  request(
    message: Unsent<ToWorkerMessage>,
    expectedResponseType: FromWorkerMessageType,
  ): Promise<FromWorkerMessage> {
    return new Promise((resolve, reject) => {
      if (this.failure) {
        reject(this.failure);
        return;
      }
      const sent: ToWorkerMessage = {
        ...message,
        interactionId: WorkerQueue.messageCounter++,
      };
      this.pending.push({sent, expectedResponseType, resolve, reject});
      if (this.pending.length === 1) {
        this.sendNextRequest();
      }
    });
  }

  terminate(): Promise<void> {
    return this.worker.terminate();
  }

  private receive(message: FromWorkerMessage) {
    const pending = this.pending.shift();
    if (!pending) {
      logEvent(EventType.ERROR, {
        category: 'unexpected message from worker',
        detail: JSON.stringify(message),
      });
      return;
    }
    this.sendNextRequest();
    if (message.toWorkerMessage.interactionId !== pending.sent.interactionId) {
      logEvent(EventType.ERROR, {
        category: 'wrong response received from worker',
        detail: `interaction ID ${message.toWorkerMessage.interactionId} instead of ${pending.sent.interactionId}`,
      });
      pending.reject(
        new Error(
          `Response for interaction ${message.toWorkerMessage.interactionId} received out of order`,
        ),
      );
      return;
    }
    if (
      message.type !== pending.expectedResponseType &&
      message.type !== FromWorkerMessageType.ERROR_CAUGHT
    ) {
      logEvent(EventType.ERROR, {
        category: 'wrong response type received from worker',
        detail: `expected ${pending.expectedResponseType}, got ${message.type}`,
      });
      pending.reject(new Error(`Unexpected response type ${message.type}`));
      return;
    }
    const responseType = message.type;
    switch (responseType) {
      case FromWorkerMessageType.ERROR_CAUGHT:
        logEvent(EventType.ERROR, {
          category: `worker error caught: ${message.activity}`,
          detail: `${JSON.stringify(pending.sent)}; ${message.errorMessage}`,
        });
        pending.reject(new WorkerError(message));
        break;
      case FromWorkerMessageType.PUZZLE_SOLVED:
        logEvent(EventType.SYSTEM, {
          category: 'worker puzzle solve time',
          detail: message.toWorkerMessage.clues,
          elapsedMs: message.elapsedMs,
        });
        pending.resolve(message);
        break;
      case FromWorkerMessageType.PUZZLE_CHECKED:
        pending.resolve(message);
        break;
      default:
        ensureExhaustiveSwitch(responseType);
    }
  }

  private sendNextRequest() {
    if (this.pending.length) {
      this.worker.postMessage(this.pending[0].sent);
    }
  }
}

/** The parts of a `node:worker_threads` Worker that the service uses. */
export interface ThreadLike {
  postMessage(message: ToWorkerMessage): void;
  on(event: 'message', listener: (message: FromWorkerMessage) => void): unknown;
  on(event: 'error', listener: (error: Error) => void): unknown;
  on(event: 'exit', listener: (exitCode: number) => void): unknown;
  terminate(): Promise<number>;
}

/**
 * Adapts a worker thread to the queue.  The worker never exits on its own, so
 * an exit before `terminate` is reported as an error.
 */
export function adaptThread(thread: ThreadLike): WorkerLike {
  let terminating = false;
  return {
    postMessage: message => thread.postMessage(message),
    onMessage: listener => {
      thread.on('message', listener);
    },
    onError: listener => {
      thread.on('error', listener);
      thread.on('exit', exitCode => {
        if (!terminating) {
          listener(new Error(`Worker exited with code ${exitCode}`));
        }
      });
    },
    terminate: async () => {
      terminating = true;
      await thread.terminate();
    },
  };
}

/**
 * Starts a worker thread running the compiled worker entry point.  This needs
 * the JavaScript build output next to this module, so tests use `adaptThread`
 * with a stand-in thread instead.
 */
export function startThreadWorker(): WorkerLike {
  return adaptThread(
    new Worker(path.join(__dirname, '..', 'worker', 'bootstrap-worker.js')),
  );
}

/**
 * Spreads puzzle solving across a fixed number of workers.  Requests go to the
 * workers in rotation; each worker answers its own requests in order.
 */
export class PuzzleService {
  private readonly queues: WorkerQueue[];
  private nextQueue = 0;

  constructor(workers: number, startWorker: WorkerFactory = startThreadWorker) {
    this.queues = iota(checkIntRange(workers, 1, 65)).map(
      () => new WorkerQueue(startWorker()),
    );
  }

  /**
   * Asks a worker to solve the given puzzle.
   *
   * @returns A promise that resolves to the worker's answer, or rejects with a
   * WorkerError if the worker caught one, such as contradictory clues.
   */
  async solve(clues: GridString): Promise<PuzzleSolvedMessage> {
    const message: Unsent<SolvePuzzleMessage> = {
      type: ToWorkerMessageType.SOLVE_PUZZLE,
      clues,
    };
    const response = await this.nextWorker().request(
      message,
      FromWorkerMessageType.PUZZLE_SOLVED,
    );
    if (response.type !== FromWorkerMessageType.PUZZLE_SOLVED) {
      throw new Error(`Unexpected response type ${response.type}`);
    }
    return response;
  }

  /** Asks a worker to check a grid against the rules of Sudoku. */
  async check(grid: GridString): Promise<PuzzleCheckedMessage> {
    const message: Unsent<CheckPuzzleMessage> = {
      type: ToWorkerMessageType.CHECK_PUZZLE,
      grid,
    };
    const response = await this.nextWorker().request(
      message,
      FromWorkerMessageType.PUZZLE_CHECKED,
    );
    if (response.type !== FromWorkerMessageType.PUZZLE_CHECKED) {
      throw new Error(`Unexpected response type ${response.type}`);
    }
    return response;
  }

  /** Stops all the workers. */
  async close(): Promise<void> {
    await Promise.all(this.queues.map(q => q.terminate()));
  }

  /**
   * Picks the next worker in rotation, passing over any that have died.
   *
   * @throws Error if every worker has died.
   */
  private nextWorker(): WorkerQueue {
    for (let tries = 0; tries < this.queues.length; ++tries) {
      const queue = this.queues[this.nextQueue];
      this.nextQueue = (this.nextQueue + 1) % this.queues.length;
      if (!queue.failed) return queue;
    }
    throw new Error('Every worker has failed');
  }
}
