import { format } from 'node:util';
import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogFormat = 'json' | 'text';
/** `split` sends errors to stderr and the rest to stdout */
export type LogDestination = 'split' | 'stderr';

let currentLevel: LogLevel = 'info';
let currentFormat: LogFormat = 'text';
let currentDestination: LogDestination = 'split';

const levels: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const colors: Record<LogLevel, (text: string) => string> = {
  debug: chalk.gray,
  info: chalk.blue,
  warn: chalk.yellow,
  error: chalk.red,
};

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

export function setLogFormat(fmt: LogFormat): void {
  currentFormat = fmt;
}

export function getLogFormat(): LogFormat {
  return currentFormat;
}

// Commands that write data to stdout move all log output to stderr.
export function setLogDestination(dest: LogDestination): void {
  currentDestination = dest;
}

export function getLogDestination(): LogDestination {
  return currentDestination;
}

export function configureLogging(opts: { level: LogLevel; format: LogFormat }): void {
  setLogLevel(opts.level);
  setLogFormat(opts.format);
}

function shouldLog(level: LogLevel): boolean {
  return levels[level] >= levels[currentLevel];
}

/**
 * Render one log line. JSON format emits a single object per line;
 * text format keeps the bracketed level prefix.
 */
export function formatLine(level: LogLevel, msg: string, args: unknown[], now: Date = new Date()): string {
  const message = args.length > 0 ? format(msg, ...args) : msg;
  if (currentFormat === 'json') {
    return JSON.stringify({
      timestamp: now.toISOString(),
      level: level.toUpperCase(),
      message,
    });
  }
  return colors[level](`[${level.toUpperCase()}] ${message}`);
}

function emit(level: LogLevel, msg: string, args: unknown[]): void {
  if (!shouldLog(level)) return;
  const line = formatLine(level, msg, args);
  if (level === 'error' || currentDestination === 'stderr') console.error(line);
  else console.log(line);
}

export function debug(msg: string, ...args: unknown[]): void {
  emit('debug', msg, args);
}

export function info(msg: string, ...args: unknown[]): void {
  emit('info', msg, args);
}

export function warn(msg: string, ...args: unknown[]): void {
  emit('warn', msg, args);
}

export function error(msg: string, ...args: unknown[]): void {
  emit('error', msg, args);
}
