export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  child(scope: string): Logger;
}

const LEVELS: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export const now = () => new Date().toISOString();

const formatContext = (context?: LogContext) =>
  context && Object.keys(context).length > 0 ? ` ${JSON.stringify(context)}` : '';

export const createLogger = (scope: string, level: LogLevel = 'info'): Logger => {
  const threshold = LEVELS[level];

  const emit = (lvl: LogLevel, message: string, context?: LogContext) => {
    if (LEVELS[lvl] < threshold) return;
    const line = `[${now()}] [${lvl.toUpperCase()}] [${scope}] ${message}${formatContext(context)}`;
    if (lvl === 'error') console.error(line);
    else if (lvl === 'warn') console.warn(line);
    else console.log(line);
  };

  return {
    debug: (message, context) => emit('debug', message, context),
    info: (message, context) => emit('info', message, context),
    warn: (message, context) => emit('warn', message, context),
    error: (message, context) => emit('error', message, context),
    child: (sub) => createLogger(`${scope}:${sub}`, level),
  };
};

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
  child: () => silentLogger,
};
