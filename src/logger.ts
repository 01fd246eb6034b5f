/**
 * Structured logging for staging and rendering.
 */

import type { Config } from './config.js';

const LEVELS = {
  trace: 0,
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  fatal: 50,
} as const;

export type LogLevel = keyof typeof LEVELS;
export type LogFormat = 'json' | 'text';

export interface WritableOutput {
  write(s: string): void;
}

export interface LoggerOptions {
  name?: string;
  format?: LogFormat;
  level?: LogLevel;
  output?: WritableOutput;
}

function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && value in LEVELS;
}

export class Logger {
  private _name: string;
  private _format: LogFormat;
  private _levelValue: number;
  private _output: WritableOutput;

  constructor(options?: LoggerOptions) {
    this._name = options?.name ?? 'headdeps';
    this._format = options?.format ?? 'json';
    this._levelValue = LEVELS[options?.level ?? 'info'];
    this._output = options?.output ?? { write: (s: string) => console.error(s.trimEnd()) };
  }

  /** Reads `logging.level` and `logging.format`. */
  static fromConfig(config: Config, options?: { name?: string; output?: WritableOutput }): Logger {
    const level = config.get('logging.level');
    const format = config.get('logging.format');
    return new Logger({
      name: options?.name,
      output: options?.output,
      level: isLogLevel(level) ? level : undefined,
      format: format === 'text' || format === 'json' ? format : undefined,
    });
  }

  /** A logger sharing this one's settings under another name. */
  child(name: string): Logger {
    const logger = new Logger({ name, format: this._format, output: this._output });
    logger._levelValue = this._levelValue;
    return logger;
  }

  isEnabled(level: LogLevel): boolean {
    return LEVELS[level] >= this._levelValue;
  }

  private _emit(level: LogLevel, message: string, extra?: Record<string, unknown>): void {
    if (!this.isEnabled(level)) return;

    const now = new Date();
    if (this._format === 'json') {
      const entry: Record<string, unknown> = {
        timestamp: now.toISOString(),
        level,
        message,
        logger: this._name,
        extra: extra ?? null,
      };
      this._output.write(JSON.stringify(entry) + '\n');
    } else {
      const ts = now.toISOString().replace('T', ' ').replace(/\.\d+Z$/, '');
      let extrasStr = '';
      if (extra) {
        extrasStr = ' ' + Object.entries(extra).map(([k, v]) => `${k}=${String(v)}`).join(' ');
      }
      this._output.write(`${ts} [${level.toUpperCase()}] [${this._name}] ${message}${extrasStr}\n`);
    }
  }

  trace(message: string, extra?: Record<string, unknown>): void {
    this._emit('trace', message, extra);
  }

  debug(message: string, extra?: Record<string, unknown>): void {
    this._emit('debug', message, extra);
  }

  info(message: string, extra?: Record<string, unknown>): void {
    this._emit('info', message, extra);
  }

  warn(message: string, extra?: Record<string, unknown>): void {
    this._emit('warn', message, extra);
  }

  error(message: string, extra?: Record<string, unknown>): void {
    this._emit('error', message, extra);
  }

  fatal(message: string, extra?: Record<string, unknown>): void {
    this._emit('fatal', message, extra);
  }
}

export const defaultLogger = new Logger();
