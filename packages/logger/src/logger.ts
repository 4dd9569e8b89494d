import { LogContext } from './async-storage';
import type { Loggable, LoggerOptions, Transport } from './interfaces';
import { ConsoleTransport } from './transports/console';
import type { LogArgument, LogLevel, LogMessage } from './types';

const LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'];

const envLevel = process.env.LOG_LEVEL;

function isLogLevel(value: string | undefined): value is LogLevel {
  return LEVELS.some(level => level === value);
}

export class Logger {
  private static globalOptions: LoggerOptions = {
    level: isLogLevel(envLevel) ? envLevel : 'info',
    format: process.env.NODE_ENV === 'production' ? 'json' : undefined,
  };
  private static transport: Transport = new ConsoleTransport(Logger.globalOptions);

  private readonly context?: string;

  constructor(context?: string | Function | object) {
    if (typeof context === 'function') {
      this.context = context.name;
    } else if (typeof context === 'object' && context !== null) {
      this.context = context.constructor.name;
    } else if (typeof context === 'string') {
      this.context = context;
    }
  }

  static configure(options: LoggerOptions) {
    this.globalOptions = { ...this.globalOptions, ...options };
    this.transport = new ConsoleTransport(this.globalOptions);
  }

  /**
   * Replace the transport records are written to. Configuring again restores the console transport.
   */
  static useTransport(transport: Transport) {
    this.transport = transport;
  }

  /* -------------------------------------------------------------------------- */
  /*                               Logging Methods                              */
  /* -------------------------------------------------------------------------- */

  trace(msg: string, ...args: LogArgument[]) {
    this.log('trace', msg, ...args);
  }

  debug(msg: string, ...args: LogArgument[]) {
    this.log('debug', msg, ...args);
  }

  info(msg: string, ...args: LogArgument[]) {
    this.log('info', msg, ...args);
  }

  warn(msg: string, ...args: LogArgument[]) {
    this.log('warn', msg, ...args);
  }

  error(msg: string, ...args: LogArgument[]) {
    this.log('error', msg, ...args);
  }

  fatal(msg: string, ...args: LogArgument[]) {
    this.log('fatal', msg, ...args);
  }

  isLevelEnabled(level: LogLevel): boolean {
    const configuredLevel = Logger.globalOptions.level ?? 'info';

    return LEVELS.indexOf(level) >= LEVELS.indexOf(configuredLevel);
  }

  /* -------------------------------------------------------------------------- */
  /*                               Internal Logic                               */
  /* -------------------------------------------------------------------------- */

  private log(level: LogLevel, msg: string, ...args: LogArgument[]) {
    if (!this.isLevelEnabled(level)) {
      return;
    }

    const logMessage: LogMessage = {
      level,
      msg,
      time: Date.now(),
    };

    if (this.context) {
      logMessage.context = this.context;
    }

    const reqId = LogContext.getRequestId();

    if (reqId) {
      logMessage.reqId = reqId;
    }

    for (const arg of args) {
      if (arg instanceof Error) {
        logMessage.err = arg;
      } else if (this.isLoggable(arg)) {
        Object.assign(logMessage, arg.toLog());
      } else {
        Object.assign(logMessage, arg);
      }
    }

    Logger.transport.log(logMessage);
  }

  private isLoggable(arg: LogArgument): arg is Loggable {
    return 'toLog' in arg && typeof arg.toLog === 'function';
  }
}
