/**
 * @fileoverview Logger contract injected into editing sessions
 * @description Console-backed logger with a debug toggle, plus a silent logger
 * for hosts that route status through notifications only.
 */

/**
 * Free-text logging sink. Hosts may pass any object with these methods
 * (a pino or winston instance fits as-is).
 */
interface Logger {
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

interface ConsoleLoggerOptions {
  /** Emit debug/info/warn output. Errors are always printed. */
  debug?: boolean;
  /** Prefix prepended to every line */
  prefix?: string;
}

/**
 * Console logger whose verbosity can be flipped at runtime
 */
class ConsoleLogger implements Logger {
  private debugOutputEnabled: boolean;
  private readonly prefix: string | null;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.debugOutputEnabled = options.debug ?? false;
    this.prefix = options.prefix ?? null;
  }

  debug(...args: unknown[]): void {
    if (this.debugOutputEnabled) {
      // eslint-disable-next-line no-console
      console.log(...this._withPrefix(args));
    }
  }

  info(...args: unknown[]): void {
    if (this.debugOutputEnabled) {
      // eslint-disable-next-line no-console
      console.info(...this._withPrefix(args));
    }
  }

  warn(...args: unknown[]): void {
    if (this.debugOutputEnabled) {
      // eslint-disable-next-line no-console
      console.warn(...this._withPrefix(args));
    }
  }

  error(...args: unknown[]): void {
    // eslint-disable-next-line no-console
    console.error(...this._withPrefix(args));
  }

  setDebug(enable: boolean): void {
    this.debugOutputEnabled = enable;
  }

  isDebugEnabled(): boolean {
    return this.debugOutputEnabled;
  }

  private _withPrefix(args: unknown[]): unknown[] {
    return this.prefix ? [`[${this.prefix}]`, ...args] : args;
  }
}

function createConsoleLogger(options: ConsoleLoggerOptions = {}): ConsoleLogger {
  return new ConsoleLogger(options);
}

/**
 * Logger that drops everything
 */
const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined
};

export {
  ConsoleLogger,
  createConsoleLogger,
  silentLogger,
  type Logger,
  type ConsoleLoggerOptions
};
