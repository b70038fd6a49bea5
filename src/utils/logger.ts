import colors, { enabled as colorsEnabled, type ColorName } from './colors.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'none';

export interface LoggerOptions {
  /** Defaults to `debug` when DEBUG names ftptree (or is `*`), else `none` */
  level?: LogLevel;
  prefix?: string;
  timestamp?: boolean;
  colors?: boolean;
  /** Sink for debug/info lines (default: console.log) */
  out?: (line: string) => void;
  /** Sink for warn/error lines (default: console.error) */
  err?: (line: string) => void;
}

const RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  none: Number.POSITIVE_INFINITY,
};

function levelFromEnv(): LogLevel {
  const debug = process.env.DEBUG ?? '';
  return debug === '*' || debug.split(',').some((name) => name.trim().startsWith('ftptree'))
    ? 'debug'
    : 'none';
}

export class Logger {
  private level: LogLevel;
  private readonly prefix: string;
  private readonly timestamps: boolean;
  private readonly styled: boolean;
  private readonly out: (line: string) => void;
  private readonly err: (line: string) => void;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? levelFromEnv();
    this.prefix = options.prefix ?? 'ftptree';
    this.timestamps = options.timestamp ?? true;
    this.styled = (options.colors ?? true) && colorsEnabled;
    this.out = options.out ?? ((line) => console.log(line));
    this.err = options.err ?? ((line) => console.error(line));
  }

  getLevel(): LogLevel {
    return this.level;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  shouldLog(level: LogLevel): boolean {
    return level !== 'none' && RANK[level] >= RANK[this.level];
  }

  debug(message: string): void {
    this.emit('debug', message);
  }

  info(message: string): void {
    this.emit('info', message);
  }

  warn(message: string): void {
    this.emit('warn', this.paint(message, 'yellow'));
  }

  error(message: string): void {
    this.emit('error', this.paint(message, 'red'));
  }

  /**
   * Protocol traffic: `>>>` for commands sent, `<<<` for replies
   */
  wire(direction: '>>>' | '<<<', text: string): void {
    if (!this.shouldLog('debug')) return;
    this.debug(`${this.paint(direction, direction === '>>>' ? 'green' : 'blue')} ${text}`);
  }

  /**
   * An error with its suggestions; in debug mode also the top stack frames
   */
  logError(error: Error & { suggestions?: string[] }): void {
    if (!this.shouldLog('error')) return;

    this.error(`${this.paint('✖', 'red')} ${error.name}: ${error.message}`);

    for (const suggestion of error.suggestions ?? []) {
      this.err(`  ${this.paint('→', 'gray')} ${suggestion}`);
    }

    if (error.stack && this.shouldLog('debug')) {
      const frames = error.stack.split('\n').slice(1, 4);
      this.err(frames.map((frame) => `  ${this.paint('│', 'gray')} ${frame.trim()}`).join('\n'));
    }
  }

  private emit(level: Exclude<LogLevel, 'none'>, message: string): void {
    if (!this.shouldLog(level)) return;

    const stamp = this.timestamps ? `${this.paint(`[${clockTime()}]`, 'gray')} ` : '';
    const line = `${stamp}${this.paint(`[${this.prefix}]`, 'cyan')} ${message}`;

    if (level === 'warn' || level === 'error') {
      this.err(line);
    } else {
      this.out(line);
    }
  }

  private paint(text: string, color: ColorName): string {
    return this.styled ? colors[color](text) : text;
  }
}

function clockTime(): string {
  return new Date().toTimeString().slice(0, 8);
}

let globalLogger: Logger | null = null;

export function getLogger(): Logger {
  globalLogger ??= new Logger();
  return globalLogger;
}

export function setLogger(logger: Logger): void {
  globalLogger = logger;
}
