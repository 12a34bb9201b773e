export type Logger = {
  debug?: (message: string) => void;
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
};

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export function createLevelLogger(level: LogLevel, sink: Logger = console): Logger {
  const threshold = LEVEL_ORDER[level];
  const enabled = (candidate: LogLevel): boolean => LEVEL_ORDER[candidate] >= threshold;
  const noop = (): void => undefined;
  const debug = sink.debug;
  return {
    debug: enabled('debug') && debug ? (message) => debug.call(sink, message) : noop,
    info: enabled('info') ? (message) => sink.info(message) : noop,
    warn: enabled('warn') ? (message) => sink.warn(message) : noop,
    error: enabled('error') ? (message) => sink.error(message) : noop,
  };
}

export const silentLogger: Logger = createLevelLogger('silent');
