import type { LogLevel } from '../types/config.js';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export type LogSink = (level: Exclude<LogLevel, 'silent'>, line: string) => void;

export interface Logger {
  readonly name: string;
  readonly level: LogLevel;
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  child(name: string): Logger;
}

const consoleSink: LogSink = (level, line) => {
  if (level === 'error') console.error(line);
  else if (level === 'warn') console.warn(line);
  else console.log(line);
};

export function formatLogLine(level: string, name: string, message: string, time = new Date()): string {
  return `${time.toISOString()} | ${level.toUpperCase()} | ${name} | ${message}`;
}

export function createLogger(name: string, level: LogLevel = 'info', sink: LogSink = consoleSink): Logger {
  const threshold = LEVEL_ORDER[level];
  const write = (lvl: Exclude<LogLevel, 'silent'>, message: string) => {
    if (LEVEL_ORDER[lvl] < threshold) return;
    sink(lvl, formatLogLine(lvl, name, message));
  };

  return {
    name,
    level,
    debug: (message) => write('debug', message),
    info: (message) => write('info', message),
    warn: (message) => write('warn', message),
    error: (message) => write('error', message),
    child: (childName) => createLogger(`${name}:${childName}`, level, sink),
  };
}

export const silentLogger: Logger = createLogger('silent', 'silent');
