export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug';

type ActiveLevel = Exclude<LogLevel, 'silent'>;

const ORDER: Record<ActiveLevel, number> = {
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
};

export interface Logger {
  error(msg: string, meta?: unknown): void;
  warn(msg: string, meta?: unknown): void;
  info(msg: string, meta?: unknown): void;
  debug(msg: string, meta?: unknown): void;
}

/** Where formatted lines go. Defaults to the console (stderr for error/warn). */
export type LogSink = (level: ActiveLevel, line: string) => void;

export interface LoggerOptions {
  /** Printed in brackets after the level, e.g. `DEBUG [engine] ...`. */
  scope?: string;
  sink?: LogSink;
  clock?: () => Date;
}

const consoleSink: LogSink = (level, line) => {
  if (level === 'error') console.error(line);
  else if (level === 'warn') console.warn(line);
  else console.log(line);
};

function fmtMeta(meta: unknown) {
  if (meta === undefined) return '';
  if (typeof meta === 'string') return ` ${meta}`;
  try {
    return ` ${JSON.stringify(meta)}`;
  } catch {
    return ' [meta-unserializable]';
  }
}

export const silentLogger: Logger = {
  error: () => {},
  warn: () => {},
  info: () => {},
  debug: () => {},
};

export function createLogger(level: LogLevel = 'info', opts: LoggerOptions = {}): Logger {
  if (level === 'silent') return silentLogger;

  const threshold = ORDER[level];
  const sink = opts.sink ?? consoleSink;
  const clock = opts.clock ?? (() => new Date());
  const scope = opts.scope ? ` [${opts.scope}]` : '';

  const emit = (lvl: ActiveLevel, msg: string, meta: unknown) => {
    if (ORDER[lvl] > threshold) return;
    sink(lvl, `${clock().toISOString()} ${lvl.toUpperCase()}${scope} ${msg}${fmtMeta(meta)}`);
  };

  return {
    error: (msg, meta) => emit('error', msg, meta),
    warn: (msg, meta) => emit('warn', msg, meta),
    info: (msg, meta) => emit('info', msg, meta),
    debug: (msg, meta) => emit('debug', msg, meta),
  };
}
