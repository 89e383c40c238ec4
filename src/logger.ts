// ── Structured logger ──
// JSON lines on stderr, so --json output on stdout stays parseable.
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

export type LogSink = (line: string) => void;

let minLevel: LogLevel = 'info';
let sink: LogSink = line => console.error(line);

export function setLogLevel(level: LogLevel): void {
  minLevel = level;
}

/** Redirect log output; returns the previous sink so tests can restore it. */
export function setLogSink(next: LogSink): LogSink {
  const prev = sink;
  sink = next;
  return prev;
}

export function log(level: LogLevel, msg: string, data?: Record<string, unknown>): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[minLevel]) return;
  const entry = {
    ts: new Date().toISOString(),
    level,
    msg,
    ...data,
  };
  sink(JSON.stringify(entry));
}
