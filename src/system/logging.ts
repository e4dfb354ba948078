/**
 * All the kinds of events the program logs.
 */
export enum EventType {
  // The person did something.
  ACTION = 'action',

  // The computer did something.
  SYSTEM = 'system',

  // Something bad happened.
  ERROR = 'error',
}

/**
 * Extra information we might include with an event.
 */
export declare interface EventParams {
  category?: string;
  detail?: string;
  elapsedMs?: number;
}

/** Receives each logged event that passes the level filter. */
export type LogSink = (event: EventType, params: EventParams) => void;

// Events at or below the configured level are logged.
const LEVELS: {readonly [event in EventType]: number} = {
  [EventType.ERROR]: 0,
  [EventType.SYSTEM]: 1,
  [EventType.ACTION]: 2,
};

/** Writes an event to stderr as a single line. */
export const stderrSink: LogSink = (event, params) => {
  process.stderr.write(formatEvent(event, params) + '\n');
};

let sink: LogSink = stderrSink;
let level: EventType = EventType.SYSTEM;

/**
 * Replaces the destination of logged events, returning the previous one.
 */
export function setLogSink(newSink: LogSink): LogSink {
  const prev = sink;
  sink = newSink;
  return prev;
}

/**
 * Sets the most detailed kind of event that gets logged: ERROR logs only
 * errors, SYSTEM adds the program's own activity, ACTION logs everything.
 */
export function setLogLevel(newLevel: EventType): void {
  level = newLevel;
}

/** Tells whether the given string names a log level. */
export function isLogLevel(s: string): s is EventType {
  const levels: readonly string[] = Object.values(EventType);
  return levels.includes(s);
}

/**
 * Logs something that happened.
 * @param event What happened.
 */
export function logEvent(event: EventType, params: EventParams = {}) {
  if (LEVELS[event] <= LEVELS[level]) {
    sink(event, params);
  }
}

/**
 * Renders an event as `[type] category: detail (N ms)`, leaving out the parts
 * that are absent.
 */
export function formatEvent(event: EventType, params: EventParams): string {
  let line = `[${event}]`;
  if (params.category) line += ` ${params.category}`;
  if (params.detail) line += `${params.category ? ':' : ''} ${params.detail}`;
  if (params.elapsedMs !== undefined) {
    line += ` (${params.elapsedMs.toFixed(1)} ms)`;
  }
  return line;
}
