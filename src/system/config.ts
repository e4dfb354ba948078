import {checkIntRange} from '../game/ints';
import {EventType, isLogLevel} from './logging';

/** Settings for solving and verifying puzzles. */
export interface Config {
  /** Where solved puzzles are posted for verification. */
  readonly verifyUrl: string;
  /** The most verification requests in flight at once. */
  readonly maxConnections: number;
  /** How long to wait for each verification response, in milliseconds. */
  readonly timeoutMs: number;
  /** How many worker threads solve puzzles; 0 means solve in this thread. */
  readonly workers: number;
  /** The most detailed kind of event to log. */
  readonly logLevel: EventType;
}

export const DEFAULT_CONFIG: Config = Object.freeze({
  verifyUrl: 'http://localhost:4590/verify',
  maxConnections: 8,
  timeoutMs: 30_000,
  workers: 0,
  logLevel: EventType.SYSTEM,
});

/** Thrown for a setting with an unusable value. */
export class ConfigError extends Error {
  override readonly name = 'ConfigError';

  constructor(
    readonly setting: string,
    reason: string,
  ) {
    super(`Invalid ${setting}: ${reason}`);
  }
}

/** Environment variables naming each setting. */
export const ENV_VARS: {readonly [key in keyof Config]: string} = {
  verifyUrl: 'SUDOKU_VERIFY_URL',
  maxConnections: 'SUDOKU_MAX_CONNECTIONS',
  timeoutMs: 'SUDOKU_TIMEOUT_MS',
  workers: 'SUDOKU_WORKERS',
  logLevel: 'SUDOKU_LOG_LEVEL',
};

/** Unvalidated settings, as strings from the environment or command line. */
export type RawConfig = {readonly [key in keyof Config]?: string};

/**
 * Builds the configuration from defaults, then environment variables, then
 * explicit overrides such as command-line options.
 *
 * @throws ConfigError if any setting is unusable.
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: RawConfig = {},
): Config {
  const raw = (key: keyof Config): string | undefined =>
    overrides[key] ?? env[ENV_VARS[key]];
  return Object.freeze({
    verifyUrl: parseUrl('verifyUrl', raw('verifyUrl')),
    maxConnections: parseInteger('maxConnections', raw('maxConnections'), 1, 257),
    timeoutMs: parseInteger('timeoutMs', raw('timeoutMs'), 1, 600_001),
    workers: parseInteger('workers', raw('workers'), 0, 65),
    logLevel: parseLogLevel(raw('logLevel')),
  });
}

function parseUrl(key: 'verifyUrl', value: string | undefined): string {
  if (value === undefined) return DEFAULT_CONFIG[key];
  let url;
  try {
    url = new URL(value);
  } catch (e: unknown) {
    throw new ConfigError(key, `${JSON.stringify(value)} is not a URL`);
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new ConfigError(key, `unsupported protocol ${url.protocol}`);
  }
  return url.href;
}

function parseInteger(
  key: 'maxConnections' | 'timeoutMs' | 'workers',
  value: string | undefined,
  lo: number,
  hi: number,
): number {
  if (value === undefined) return DEFAULT_CONFIG[key];
  if (!/^\d+$/.test(value.trim())) {
    throw new ConfigError(key, `${JSON.stringify(value)} is not a whole number`);
  }
  try {
    return checkIntRange(Number(value), lo, hi);
  } catch (e: unknown) {
    throw new ConfigError(key, e instanceof Error ? e.message : String(e));
  }
}

function parseLogLevel(value: string | undefined): EventType {
  if (value === undefined) return DEFAULT_CONFIG.logLevel;
  if (!isLogLevel(value)) {
    throw new ConfigError(
      'logLevel',
      `${JSON.stringify(value)} is not one of ${Object.values(EventType).join(', ')}`,
    );
  }
  return value;
}
