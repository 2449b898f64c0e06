// Leveled console logging shared by the actor system and the client
export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug';

export type LogSink = Pick<Console, 'error' | 'warn' | 'info' | 'debug'>;

export interface Logger {
  error(message: string): void;
  warn(message: string): void;
  info(message: string): void;
  debug(message: string): void;
}

const LEVELS: Record<LogLevel, number> = { silent: 0, error: 1, warn: 2, info: 3, debug: 4 };

export function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.prototype.hasOwnProperty.call(LEVELS, value);
}

export function createLogger(scope: string, level: LogLevel, sink: LogSink = console): Logger {
  const threshold = LEVELS[level];
  const emit = (at: Exclude<LogLevel, 'silent'>) => (message: string) => {
    if (LEVELS[at] <= threshold) sink[at](`[${scope}] ${message}`);
  };
  return { error: emit('error'), warn: emit('warn'), info: emit('info'), debug: emit('debug') };
}
