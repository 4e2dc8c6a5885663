import kleur from 'kleur';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

const LEVEL_RANK: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

const LEVEL_COLOR: Record<LogLevel, (text: string) => string> = {
  error: (text) => kleur.red(text),
  warn: (text) => kleur.yellow(text),
  info: (text) => text,
  debug: (text) => kleur.gray(text),
};

export type LogSink = (line: string) => void;

/**
 * Scoped console logger: "[Scope] message", written to stderr
 */
export class Logger {
  private readonly scope: string;
  private readonly level: LogLevel;
  private readonly sink: LogSink;

  constructor(scope: string, level: LogLevel = 'warn', sink: LogSink = (line) => console.error(line)) {
    this.scope = scope;
    this.level = level;
    this.sink = sink;
  }

  /**
   * Map a -v count to a level: none -> warn, -v -> info, -vv -> debug
   */
  public static levelForVerbosity(verbosity: number): LogLevel {
    if (verbosity >= 2) {
      return 'debug';
    }
    return verbosity === 1 ? 'info' : 'warn';
  }

  /**
   * Logger for another scope sharing level and sink
   */
  public child(scope: string): Logger {
    return new Logger(scope, this.level, this.sink);
  }

  public isEnabled(level: LogLevel): boolean {
    return LEVEL_RANK[level] <= LEVEL_RANK[this.level];
  }

  public error(message: string): void {
    this.write('error', message);
  }

  public warn(message: string): void {
    this.write('warn', message);
  }

  public info(message: string): void {
    this.write('info', message);
  }

  public debug(message: string): void {
    this.write('debug', message);
  }

  private write(level: LogLevel, message: string): void {
    if (!this.isEnabled(level)) {
      return;
    }
    this.sink(LEVEL_COLOR[level](`[${this.scope}] ${message}`));
  }
}
