import {advanceBy, advanceTo, clear} from 'jest-date-mock';
import {
  FIRST_SOLUTION,
  MINIMAL_PUZZLE,
  MINIMAL_SOLUTION,
  SPARSE_PUZZLE,
  SPARSE_SOLUTION,
} from '../game/fake-data';
import {Grid} from '../game/grid';
import {EventType, setLogSink, stderrSink} from './logging';
import {
  type FetchFn,
  GarbledResponseError,
  toVerifyPayload,
  VERIFY_PAYLOAD_LENGTH,
  VerifyHttpError,
  verifyPuzzle,
  verifyPuzzles,
  type VerifyResponse,
} from './verifier';

const VERIFY_URL = 'http://verify.test/verify';

function bytes(...values: number[]): ArrayBuffer {
  const buffer = new ArrayBuffer(values.length);
  new Uint8Array(buffer).set(values);
  return buffer;
}

function respond(body: string | ArrayBuffer, status = 200): VerifyResponse {
  const buffer =
    typeof body === 'string'
      ? bytes(...[...body].map(ch => ch.charCodeAt(0)))
      : body;
  return {
    ok: status >= 200 && status < 300,
    status,
    statusText: status === 200 ? 'OK' : 'Internal Server Error',
    arrayBuffer: async () => buffer,
  };
}

describe('verifier', () => {
  const sink = jest.fn();

  beforeEach(() => {
    sink.mockReset();
    setLogSink(sink);
  });

  afterEach(() => {
    setLogSink(stderrSink);
  });

  describe('toVerifyPayload', () => {
    it('renders a solution as the service expects', () => {
      const payload = toVerifyPayload(Grid.fromString(MINIMAL_SOLUTION));
      expect(payload).toBe(
        '{"content": [[3,6,5,7,8,1,4,2,9], [9,4,1,3,2,6,8,7,5], ' +
          '[7,2,8,5,4,9,6,1,3], [2,7,9,6,5,8,1,3,4], [5,1,4,2,3,7,9,6,8], ' +
          '[6,8,3,1,9,4,7,5,2], [8,5,6,4,1,2,3,9,7], [4,3,7,9,6,5,2,8,1], ' +
          '[1,9,2,8,7,3,5,4,6]]}',
      );
      expect(payload.length).toBe(VERIFY_PAYLOAD_LENGTH);
    });

    it('writes 0 for blank locations', () => {
      const payload = toVerifyPayload(Grid.fromString(MINIMAL_PUZZLE));
      expect(payload.startsWith('{"content": [[0,6,0,7,0,1,0,0,0], ')).toBe(
        true,
      );
      expect(payload.length).toBe(VERIFY_PAYLOAD_LENGTH);
      expect(JSON.parse(payload)).toEqual({
        content: Grid.fromString(MINIMAL_PUZZLE).toRows(),
      });
    });
  });

  describe('verifyPuzzle', () => {
    it('posts the payload as JSON', async () => {
      const fetch = jest.fn<Promise<VerifyResponse>, Parameters<FetchFn>>(
        async () => respond('1'),
      );
      const grid = Grid.fromString(MINIMAL_SOLUTION);
      expect(await verifyPuzzle(grid, {url: VERIFY_URL, fetch})).toBe(true);
      expect(fetch).toHaveBeenCalledTimes(1);
      const [url, init] = fetch.mock.calls[0];
      expect(url).toBe(VERIFY_URL);
      expect(init).toMatchObject({
        method: 'POST',
        headers: {'Content-Type': 'application/json'},
        body: toVerifyPayload(grid),
      });
      expect(init.signal).toBeInstanceOf(AbortSignal);
    });

    it('treats any body other than "1" as a rejection', async () => {
      const grid = Grid.fromString(MINIMAL_SOLUTION);
      for (const body of ['0', '1\n', '', 'true']) {
        const fetch: FetchFn = async () => respond(body);
        expect(await verifyPuzzle(grid, {url: VERIFY_URL, fetch}), body).toBe(false);
      }
    });

    it('throws on an HTTP error status', async () => {
      const fetch: FetchFn = async () => respond('1', 500);
      const promise = verifyPuzzle(Grid.fromString(MINIMAL_SOLUTION), {
        url: VERIFY_URL,
        fetch,
      });
      await expect(promise).rejects.toThrow(VerifyHttpError);
      await expect(promise).rejects.toThrow(
        'Verification service answered 500 Internal Server Error',
      );
    });

    it('throws on a body that is not UTF-8', async () => {
      const fetch: FetchFn = async () => respond(bytes(0xff, 0xfe));
      await expect(
        verifyPuzzle(Grid.fromString(MINIMAL_SOLUTION), {url: VERIFY_URL, fetch}),
      ).rejects.toThrow(
        new GarbledResponseError(2),
      );
    });
  });

  describe('verifyPuzzles', () => {
    const grids = [
      MINIMAL_SOLUTION,
      SPARSE_SOLUTION,
      FIRST_SOLUTION,
      MINIMAL_PUZZLE,
      SPARSE_PUZZLE,
    ].map(s => Grid.fromString(s));
    const indexOfPayload = new Map(grids.map((g, i) => [toVerifyPayload(g), i]));

    beforeEach(() => {
      advanceTo(new Date(2026, 0, 1, 12, 0, 0));
    });

    afterEach(() => {
      clear();
    });

    it('keeps at most maxConnections requests in flight', async () => {
      let inFlight = 0;
      let maxInFlight = 0;
      const seen: number[] = [];
      const fetch: FetchFn = async (_url, init) => {
        seen.push(indexOfPayload.get(String(init.body)) ?? -1);
        maxInFlight = Math.max(maxInFlight, ++inFlight);
        await new Promise(resolve => setImmediate(resolve));
        --inFlight;
        return respond('1');
      };
      const report = await verifyPuzzles(grids, {
        url: VERIFY_URL,
        fetch,
        maxConnections: 2,
      });
      expect(maxInFlight).toBe(2);
      expect(seen.sort()).toEqual([0, 1, 2, 3, 4]);
      expect(report).toMatchObject({total: 5, verified: 5, failures: []});
    });

    it('records rejections and errors without throwing', async () => {
      const fetch: FetchFn = async (_url, init) => {
        advanceBy(10);
        const index = indexOfPayload.get(String(init.body));
        if (index === 3) return respond('0');
        if (index === 4) throw new Error('connection reset');
        return respond('1');
      };
      const report = await verifyPuzzles(grids, {url: VERIFY_URL, fetch});
      expect(report).toEqual({
        total: 5,
        verified: 3,
        failures: [
          {index: 3, reason: 'rejected'},
          {index: 4, reason: 'error', message: 'connection reset'},
        ],
        elapsedMs: 50,
      });
      expect(sink).toHaveBeenCalledWith(EventType.ERROR, {
        category: 'verify request failed',
        detail: 'puzzle 4: connection reset',
      });
      expect(sink).toHaveBeenCalledWith(EventType.SYSTEM, {
        category: 'verify batch',
        detail: '3 of 5 verified',
        elapsedMs: 50,
      });
    });

    it('refuses to run without a connection', async () => {
      const fetch = jest.fn<Promise<VerifyResponse>, Parameters<FetchFn>>(
        async () => respond('1'),
      );
      await expect(
        verifyPuzzles(grids, {url: VERIFY_URL, fetch, maxConnections: 0}),
      ).rejects.toThrow('0 out of range 1..257');
      await expect(
        verifyPuzzles(grids, {url: VERIFY_URL, fetch, maxConnections: 1.5}),
      ).rejects.toThrow('1.5 is not an integer');
      expect(fetch).not.toHaveBeenCalled();
    });

    it('handles an empty batch', async () => {
      const fetch = jest.fn<Promise<VerifyResponse>, Parameters<FetchFn>>();
      const report = await verifyPuzzles([], {url: VERIFY_URL, fetch});
      expect(report).toEqual({total: 0, verified: 0, failures: [], elapsedMs: 0});
      expect(fetch).not.toHaveBeenCalled();
    });
  });
});
