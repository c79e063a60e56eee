export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

const LEVEL_RANK: Record<LogLevel, number> = { DEBUG: 10, INFO: 20, WARN: 30, ERROR: 40 };

export const isLogLevel = (value: string): value is LogLevel => value in LEVEL_RANK;

/** Reads a LOG_LEVEL value; anything unrecognised falls back to INFO. */
export const parseLogLevel = (value: string | undefined): LogLevel => {
  const upper = (value || '').trim().toUpperCase();
  return isLogLevel(upper) ? upper : 'INFO';
};

export type LogWriter = (line: string, ...meta: unknown[]) => void;

export interface LoggerOptions {
  threshold?: () => LogLevel;
  stdout?: LogWriter;
  stderr?: LogWriter;
  now?: () => Date;
}

export type Logger = (level: LogLevel, msg: string, meta?: unknown) => void;

// WARN and ERROR go to stderr so stdout carries only the report
export const createLogger = ({
  threshold = () => parseLogLevel(process.env.LOG_LEVEL),
  stdout = (line, ...meta) => console.log(line, ...meta),
  stderr = (line, ...meta) => console.error(line, ...meta),
  now = () => new Date(),
}: LoggerOptions = {}): Logger => (level, msg, meta) => {
  if (LEVEL_RANK[level] < LEVEL_RANK[threshold()]) return;
  const write = LEVEL_RANK[level] >= LEVEL_RANK.WARN ? stderr : stdout;
  const line = `[${now().toISOString()}] [${level}] ${msg}`;
  if (meta !== undefined) {
    write(line, meta);
  } else {
    write(line);
  }
};

export const log: Logger = createLogger();
