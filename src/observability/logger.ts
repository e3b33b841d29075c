/**
 * Structured leveled logger.
 */

const LEVELS: Record<LogLevel, number> = {
  trace: 0,
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  fatal: 50,
};

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';
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

export class Logger {
  private _name: string;
  private _format: LogFormat;
  private _level: LogLevel;
  private _levelValue: number;
  private _output: WritableOutput;
  private _bindings: Record<string, unknown>;

  constructor(options?: LoggerOptions, bindings?: Record<string, unknown>) {
    this._name = options?.name ?? 'tallytree';
    this._format = options?.format ?? 'json';
    this._level = options?.level ?? 'info';
    this._levelValue = LEVELS[this._level];
    this._output = options?.output ?? { write: (s: string) => console.error(s) };
    this._bindings = bindings ?? {};
  }

  get name(): string {
    return this._name;
  }

  get level(): LogLevel {
    return this._level;
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LEVELS[level] >= this._levelValue;
  }

  /**
   * Logger sharing this one's settings, with `bindings` added to every entry.
   */
  child(bindings: Record<string, unknown>, name?: string): Logger {
    return new Logger(
      { name: name ?? this._name, format: this._format, level: this._level, output: this._output },
      { ...this._bindings, ...bindings },
    );
  }

  private _emit(level: LogLevel, message: string, extra?: Record<string, unknown>): void {
    if (!this.isLevelEnabled(level)) return;

    const fields = { ...this._bindings, ...extra };
    const now = new Date();

    if (this._format === 'json') {
      const entry: Record<string, unknown> = {
        timestamp: now.toISOString(),
        level,
        logger: this._name,
        message,
        ...fields,
      };
      this._output.write(JSON.stringify(entry) + '\n');
      return;
    }

    const ts = now.toISOString().replace('T', ' ').replace(/\.\d+Z$/, '');
    const extras = Object.entries(fields)
      .map(([k, v]) => ` ${k}=${typeof v === 'string' ? v : JSON.stringify(v)}`)
      .join('');
    this._output.write(`${ts} [${level.toUpperCase()}] [${this._name}] ${message}${extras}\n`);
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
