import chalk from 'chalk';
import type { LogLevel, LogPayload } from '@tasksync/protocol';
import type { SyncBus } from './events.js';

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

const LEVEL_STYLE: Record<LogLevel, (text: string) => string> = {
  debug: chalk.gray,
  info: chalk.cyan,
  warn: chalk.yellow,
  error: chalk.red,
};

export interface ConsoleLoggerOptions {
  level?: LogLevel;
  /** Output sink, stderr by default so stdout stays clean for data */
  write?: (line: string) => void;
}

export function formatLogLine(payload: LogPayload): string {
  const tag = LEVEL_STYLE[payload.level](payload.level.toUpperCase().padEnd(5));
  const scope = payload.scope ? chalk.dim(`[${payload.scope}]`) + ' ' : '';
  const source = payload.source ? chalk.bold(payload.source) + ': ' : '';
  return `${tag} ${scope}${source}${payload.message}`;
}

/**
 * Print a bus's log events to the console.
 * Returns a detach function.
 */
export function attachConsoleLogger(bus: SyncBus, options: ConsoleLoggerOptions = {}): () => void {
  const threshold = LEVEL_ORDER[options.level ?? 'info'];
  const write = options.write ?? ((line: string) => process.stderr.write(line + '\n'));

  const listener = (payload: LogPayload): void => {
    if (LEVEL_ORDER[payload.level] < threshold) return;
    write(formatLogLine(payload));
  };

  bus.on('log', listener);
  return () => {
    bus.off('log', listener);
  };
}
