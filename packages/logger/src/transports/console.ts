import { inspect } from 'node:util';

import type { LoggerOptions, Transport } from '../interfaces';
import type { Color, LogLevel, LogMessage } from '../types';

const DEFAULT_COLORS: Record<LogLevel, Color> = {
  trace: 'gray',
  debug: 'blue',
  info: 'green',
  warn: 'yellow',
  error: 'red',
  fatal: 'magenta',
};

// ANSI Color Codes
const RESET = '\x1b[0m';
const COLORS: Record<Color, string> = {
  black: '\x1b[30m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  magenta: '\x1b[35m',
  cyan: '\x1b[36m',
  white: '\x1b[37m',
  gray: '\x1b[90m',
};

function toPlain(value: unknown): unknown {
  if (value instanceof Error) {
    return {
      name: value.name,
      message: value.message,
      stack: value.stack,
    };
  }

  if (value && typeof value === 'object' && 'toLog' in value && typeof value.toLog === 'function') {
    return value.toLog();
  }

  return value;
}

function paint(code: string, text: string): string {
  return `${code}${text}${RESET}`;
}

function clock(time: number): string {
  const date = new Date(time);

  return [date.getHours(), date.getMinutes(), date.getSeconds()].map(part => part.toString().padStart(2, '0')).join(':');
}

export class ConsoleTransport implements Transport {
  constructor(private options: LoggerOptions = {}) {}

  log(message: LogMessage): void {
    const format = this.options.format || (process.env.NODE_ENV === 'production' ? 'json' : 'pretty');

    if (format === 'json') {
      this.logJson(message);
    } else {
      this.logPretty(message);
    }
  }

  private logJson(message: LogMessage): void {
    const str = JSON.stringify(message, (_key: string, value: unknown) => toPlain(value));

    process.stdout.write(str + '\n');
  }

  /**
   * One colored line, then every remaining field (the error included) through the same
   * serializer the json format uses.
   */
  private logPretty(message: LogMessage): void {
    const { level, time, msg, context, reqId, err, ...rest } = message;
    const code = COLORS[this.options.prettyOptions?.colors?.[level] ?? DEFAULT_COLORS[level]];
    const parts = [paint(COLORS.gray, clock(time)), paint(code, level.toUpperCase().padEnd(5))];

    if (reqId) {
      parts.push(`[${reqId}]`);
    }
    if (context) {
      parts.push(`[${paint(COLORS.cyan, context)}]`);
    }
    parts.push(paint(code, msg));

    const write = level === 'error' || level === 'fatal' ? console.error : console.log;

    write(parts.join(' '));

    const fields: Record<string, unknown> = err ? { ...rest, err } : rest;
    const entries = Object.entries(fields);

    if (entries.length > 0) {
      const details = Object.fromEntries(entries.map(([key, value]) => [key, toPlain(value)]));

      write(inspect(details, { colors: true, depth: 2 }));
    }
  }
}
