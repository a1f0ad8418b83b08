import chalk, { Chalk, type ChalkInstance } from 'chalk';

export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug';

export type LogStream = 'stdout' | 'stderr';

export interface LoggerOptions {
  level?: LogLevel;
  color?: boolean;
  /**
   * Receives every formatted line. Defaults to console output.
   */
  write?: (stream: LogStream, line: string) => void;
}

const LEVELS: LogLevel[] = ['silent', 'error', 'warn', 'info', 'debug'];

function consoleWrite(stream: LogStream, line: string) {
  if (stream === 'stderr') {
    console.error(line);
  } else {
    console.log(line);
  }
}

export function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && LEVELS.some((level) => level === value);
}

export class Logger {
  private level: LogLevel;
  private readonly write: (stream: LogStream, line: string) => void;
  readonly paint: ChalkInstance;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? 'info';
    this.write = options.write ?? consoleWrite;
    this.paint = options.color === false ? new Chalk({ level: 0 }) : chalk;
  }

  setLevel(level: LogLevel) {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  isSilent(): boolean {
    return this.level === 'silent';
  }

  private enabled(target: LogLevel): boolean {
    if (target === 'error') return true;
    return LEVELS.indexOf(target) <= LEVELS.indexOf(this.level);
  }

  success(message: string) {
    if (!this.enabled('info')) return;
    this.write('stdout', `${this.paint.green.bold('✓')} ${message}`);
  }

  info(message: string) {
    if (!this.enabled('info')) return;
    this.write('stdout', `${this.paint.blue.bold('ℹ')} ${message}`);
  }

  warn(message: string) {
    if (!this.enabled('warn')) return;
    this.write('stdout', `${this.paint.yellow.bold('⚠')} ${message}`);
  }

  error(message: string) {
    this.write('stderr', `${this.paint.red.bold('✗')} ${message}`);
  }

  debug(message: string) {
    if (!this.enabled('debug')) return;
    this.write('stdout', this.paint.gray(message));
  }

  /**
   * Unprefixed informational output such as tables and listings. Hidden by `--quiet`.
   */
  line(text = '') {
    if (!this.enabled('info')) return;
    this.write('stdout', text);
  }

  /** Help, version and values the user asked for; written at every level. */
  output(text: string) {
    this.write('stdout', text.replace(/\n$/, ''));
  }
}

export function createLogger(env: NodeJS.ProcessEnv = process.env): Logger {
  const level = env.KILN_LOG_LEVEL;
  return new Logger({
    level: isLogLevel(level) ? level : 'info',
    color: env.NO_COLOR === undefined
  });
}
