import type {ReadonlyGrid} from '../game/grid';
import {checkIntRange, iota} from '../game/ints';
import {DEFAULT_CONFIG} from './config';
import {EventType, logEvent} from './logging';

/*
 * A client for the verification service, which accepts a solved puzzle as JSON
 * and answers with a body of "1" when the solution is correct.
 */

/** The byte length of every verification payload. */
export const VERIFY_PAYLOAD_LENGTH = 202;

/** Thrown when the service answers with a non-success HTTP status. */
export class VerifyHttpError extends Error {
  override readonly name = 'VerifyHttpError';

  constructor(
    readonly status: number,
    statusText: string,
  ) {
    super(`Verification service answered ${status} ${statusText}`.trim());
  }
}

/** Thrown when the service's answer is not valid UTF-8 text. */
export class GarbledResponseError extends Error {
  override readonly name = 'GarbledResponseError';

  constructor(readonly byteLength: number) {
    super(`Garbled response from verification service (${byteLength} bytes)`);
  }
}

/** The parts of a fetch response the client reads. */
export interface VerifyResponse {
  readonly ok: boolean;
  readonly status: number;
  readonly statusText: string;
  arrayBuffer(): Promise<ArrayBuffer>;
}

/** A function with the shape of the global `fetch`, narrowed to our needs. */
export type FetchFn = (url: string, init: RequestInit) => Promise<VerifyResponse>;

export interface VerifyOptions {
  /** Where to post the puzzle. */
  readonly url: string;
  /** How long to wait for the answer, in milliseconds. */
  readonly timeoutMs?: number;
  /** Replaces the global `fetch`. */
  readonly fetch?: FetchFn;
}

export interface VerifyBatchOptions extends VerifyOptions {
  /** The most requests in flight at once. */
  readonly maxConnections?: number;
}

/** Why a puzzle in a batch was not verified. */
export interface VerifyFailure {
  /** The puzzle's position in the batch. */
  readonly index: number;
  /** `rejected` when the service said no, `error` when there was no answer. */
  readonly reason: 'rejected' | 'error';
  /** For errors, what went wrong. */
  readonly message?: string;
}

export interface VerifyReport {
  readonly total: number;
  readonly verified: number;
  readonly failures: readonly VerifyFailure[];
  /** Wall-clock time for the whole batch, in milliseconds. */
  readonly elapsedMs: number;
}

/**
 * Renders a grid as the JSON body the service expects, for example
 * `{"content": [[1,2,3,4,5,6,7,8,9], [4,5,6,...], ...]}`, with 0 for blank
 * locations.
 */
export function toVerifyPayload(grid: ReadonlyGrid): string {
  const rows = grid.toRows().map(row => `[${row.join(',')}]`);
  return `{"content": [${rows.join(', ')}]}`;
}

/**
 * Posts a grid to the verification service and tells whether the service
 * accepted it.
 *
 * @throws VerifyHttpError for a non-success status.
 * @throws GarbledResponseError if the answer is not UTF-8 text.
 */
export async function verifyPuzzle(
  grid: ReadonlyGrid,
  options: VerifyOptions,
): Promise<boolean> {
  const {
    url,
    timeoutMs = DEFAULT_CONFIG.timeoutMs,
    fetch: fetchFn = fetch,
  } = options;
  const response = await fetchFn(url, {
    method: 'POST',
    headers: {'Content-Type': 'application/json'},
    body: toVerifyPayload(grid),
    signal: AbortSignal.timeout(timeoutMs),
  });
  if (!response.ok) {
    throw new VerifyHttpError(response.status, response.statusText);
  }
  const body = await response.arrayBuffer();
  let text;
  try {
    text = new TextDecoder('utf-8', {fatal: true}).decode(body);
  } catch (e: unknown) {
    throw new GarbledResponseError(body.byteLength);
  }
  return text === '1';
}

/**
 * Verifies a batch of grids, keeping at most `maxConnections` requests in
 * flight.  Failed requests are reported in the result rather than thrown.
 *
 * @throws Error if `maxConnections` is not an integer in 1..256.
 */
export async function verifyPuzzles(
  grids: readonly ReadonlyGrid[],
  options: VerifyBatchOptions,
): Promise<VerifyReport> {
  const {maxConnections = DEFAULT_CONFIG.maxConnections} = options;
  checkIntRange(maxConnections, 1, 257);
  const startTimeMs = Date.now();
  const outcomes: Array<VerifyFailure | null> = [];
  let next = 0;

  const verifyAt = async (index: number): Promise<VerifyFailure | null> => {
    try {
      return (await verifyPuzzle(grids[index], options))
        ? null
        : {index, reason: 'rejected'};
    } catch (e: unknown) {
      const message = e instanceof Error ? e.message : String(e);
      logEvent(EventType.ERROR, {
        category: 'verify request failed',
        detail: `puzzle ${index}: ${message}`,
      });
      return {index, reason: 'error', message};
    }
  };
  const lane = async () => {
    while (next < grids.length) {
      const index = next++;
      outcomes[index] = await verifyAt(index);
    }
  };
  await Promise.all(iota(Math.min(maxConnections, grids.length)).map(lane));

  const failures = outcomes.filter((f): f is VerifyFailure => !!f);
  const report = {
    total: grids.length,
    verified: outcomes.filter(f => f === null).length,
    failures,
    elapsedMs: Date.now() - startTimeMs,
  };
  logEvent(EventType.SYSTEM, {
    category: 'verify batch',
    detail: `${report.verified} of ${report.total} verified`,
    elapsedMs: report.elapsedMs,
  });
  return report;
}
