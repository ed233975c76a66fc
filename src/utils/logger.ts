import chalk from 'chalk';
import { log } from '@clack/prompts';

export type LogLevel = 'debug' | 'info' | 'step' | 'success' | 'warn' | 'error';

export type Logger = {
  debug(message: string): void;
  info(message: string): void;
  step(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
};

export type LogEntry = { level: LogLevel; message: string };

export type MemoryLogger = Logger & {
  entries: LogEntry[];
  messages(level?: LogLevel): string[];
};

const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  step: () => {},
  success: () => {},
  warn: () => {},
  error: () => {},
};

/**
 * Logger backed by the same terminal UI the CLI draws its intro and outro with.
 * `debug` lines only show up when `verbose` is set.
 */
export function createLogger(opts: { silent?: boolean; verbose?: boolean } = {}): Logger {
  if (opts.silent) return silentLogger;
  return {
    debug: (message) => {
      if (opts.verbose) log.message(chalk.dim(message));
    },
    info: (message) => log.info(message),
    step: (message) => log.step(message),
    success: (message) => log.success(message),
    warn: (message) => log.warn(message),
    error: (message) => log.error(message),
  };
}

export function createMemoryLogger(): MemoryLogger {
  const entries: LogEntry[] = [];
  const push = (level: LogLevel) => (message: string) => {
    entries.push({ level, message });
  };
  return {
    entries,
    messages: (level) => entries.filter((e) => !level || e.level === level).map((e) => e.message),
    debug: push('debug'),
    info: push('info'),
    step: push('step'),
    success: push('success'),
    warn: push('warn'),
    error: push('error'),
  };
}
