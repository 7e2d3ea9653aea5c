import pino, { type Logger } from 'pino';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface LoggerOptions {
  level?: LogLevel;
  pretty?: boolean;
}

function createRootLogger(options: LoggerOptions = {}): Logger {
  return pino({
    level: options.level ?? 'info',
    transport: options.pretty
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:HH:MM:ss',
            ignore: 'pid,hostname',
          },
        }
      : undefined,
    base: { service: 'agent-studio' },
  });
}

let root = createRootLogger({ level: 'info' });

/**
 * Rebuild the root logger. Child loggers created afterwards pick up the new
 * settings; call once at startup, before components are constructed.
 */
export function configureLogger(options: LoggerOptions): void {
  root = createRootLogger(options);
}

export function createLogger(module: string): Logger {
  return root.child({ module });
}
