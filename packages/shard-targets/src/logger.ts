// packages/shard-targets/src/logger.ts
//
// Event-style logger: one JSON line per event on the console.

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogData = Record<string, unknown>;

export interface Logger {
  debug(event: string, data?: LogData): void;
  info(event: string, data?: LogData): void;
  warn(event: string, data?: LogData): void;
  error(event: string, data?: LogData): void;
}

export type LogLine = {
  ts: string;
  level: LogLevel;
  event: string;
} & LogData;

export function formatLogLine(level: LogLevel, event: string, data: LogData | undefined, now: Date): string {
  const line: LogLine = { ...data, ts: now.toISOString(), level, event };
  return JSON.stringify(line, (_key, value: unknown) => (typeof value === 'bigint' ? value.toString() : value));
}

export type ConsoleLoggerOptions = {
  debug?: boolean;
  now?: () => Date;

  /** Sink for every line. Defaults to console.log (debug/info) and console.error (warn/error). */
  write?: (line: string) => void;
};

export function createConsoleLogger(opts: ConsoleLoggerOptions = {}): Logger {
  const debugEnabled = opts.debug ?? Boolean(process.env.DEBUG);
  const now = opts.now ?? (() => new Date());
  const out = opts.write ?? ((line: string) => console.log(line));
  const err = opts.write ?? ((line: string) => console.error(line));

  return {
    debug(event, data) {
      if (debugEnabled) out(formatLogLine('debug', event, data, now()));
    },
    info(event, data) {
      out(formatLogLine('info', event, data, now()));
    },
    warn(event, data) {
      err(formatLogLine('warn', event, data, now()));
    },
    error(event, data) {
      err(formatLogLine('error', event, data, now()));
    },
  };
}
