import chalk from "chalk";

/**
 * Log levels from most to least verbose
 */
export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

/**
 * Leveled console logger. Components take a `child` with their own
 * prefix; children always use the level of the root they came from, so
 * `--verbose` or `--quiet` applied after module load reaches them too.
 */
export class Logger {
  private level: LogLevel = "info";

  constructor(
    private readonly prefix = "",
    private readonly root?: Logger
  ) {}

  configure(config: { level: LogLevel }): void {
    (this.root ?? this).level = config.level;
  }

  getLevel(): LogLevel {
    return this.root ? this.root.getLevel() : this.level;
  }

  private enabled(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.getLevel()];
  }

  private format(message: string): string {
    return this.prefix ? `${this.prefix} ${message}` : message;
  }

  /** Gray, for state transitions and per-call detail */
  debug(message: string): void {
    if (this.enabled("debug")) {
      console.debug(chalk.gray(this.format(message)));
    }
  }

  info(message: string): void {
    if (this.enabled("info")) {
      console.info(this.format(message));
    }
  }

  /** Yellow, for recovered failures such as backoff and fallback */
  warn(message: string): void {
    if (this.enabled("warn")) {
      console.warn(chalk.yellow(this.format(message)));
    }
  }

  child(prefix: string): Logger {
    return new Logger(this.prefix ? `${this.prefix} ${prefix}` : prefix, this.root ?? this);
  }
}

/**
 * Global logger instance
 */
export const logger = new Logger();
