export type LogLevel = 'info' | 'debug';

export interface Logger {
  info: (...args: unknown[]) => void;
  debug: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
}

export function createLogger(scope: string, level: LogLevel = 'info'): Logger {
  const prefix = `[${scope}]`;
  const allowDebug = level === 'debug';

  return {
    info: (...args: unknown[]) => console.log(prefix, ...args),
    debug: (...args: unknown[]) => {
      if (allowDebug) console.log(prefix, ...args);
    },
    warn: (...args: unknown[]) => console.warn(prefix, ...args),
    error: (...args: unknown[]) => console.error(prefix, ...args)
  };
}

/** Logger that drops everything; used by tests and embedded servers. */
export function createSilentLogger(): Logger {
  const noop = (): void => {};
  return { info: noop, debug: noop, warn: noop, error: noop };
}

export function parseLogLevel(value: unknown, fallback: LogLevel = 'info'): LogLevel {
  if (value === 'debug') return 'debug';
  if (value === 'info') return 'info';
  return fallback;
}
