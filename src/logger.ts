/*
 * Centralized logger for the stagecraft CLI and library.
 * - Supports levels: silent < error < warn < info < verbose < debug
 * - Routes logs to stderr so `--stdout` output stays a clean YAML document
 */

export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'verbose' | 'debug';

const LOG_LEVELS: readonly LogLevel[] = ['silent', 'error', 'warn', 'info', 'verbose', 'debug'];

function levelToNumber(level: LogLevel): number {
  switch (level) {
    case 'silent':
      return 0;
    case 'error':
      return 10;
    case 'warn':
      return 20;
    case 'info':
      return 30;
    case 'verbose':
      return 40;
    case 'debug':
      return 50;
  }
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

class Logger {
  private level: LogLevel = 'info';
  private showTimestamps: boolean = true;

  configure(
    opts: {
      level?: LogLevel;
      debug?: boolean;
      verbose?: boolean;
      quiet?: boolean;
      timestamps?: boolean;
    } = {}
  ): void {
    let lvl: LogLevel = 'info';
    const envLevel = process.env.STAGECRAFT_LOG_LEVEL;

    if (opts.debug || process.env.STAGECRAFT_DEBUG === 'true') {
      lvl = 'debug';
    } else if (opts.verbose || envLevel === 'verbose') {
      lvl = 'verbose';
    } else if (opts.quiet || envLevel === 'quiet') {
      lvl = 'warn';
    } else if (opts.level) {
      lvl = opts.level;
    } else if (envLevel && isLogLevel(envLevel)) {
      lvl = envLevel;
    }

    this.level = lvl;
    if (typeof opts.timestamps === 'boolean') {
      this.showTimestamps = opts.timestamps;
    }
  }

  getLevel(): LogLevel {
    return this.level;
  }

  private shouldLog(level: LogLevel): boolean {
    return levelToNumber(level) <= levelToNumber(this.level);
  }

  private write(msg: string, level: LogLevel): void {
    try {
      if (this.showTimestamps) {
        const ts = new Date().toISOString();
        process.stderr.write(`[${ts}] [${level}] ${msg}\n`);
      } else {
        process.stderr.write(msg + '\n');
      }
    } catch {
      // stderr closed
    }
  }

  info(msg: string): void {
    if (this.shouldLog('info')) this.write(msg, 'info');
  }

  warn(msg: string): void {
    if (this.shouldLog('warn')) this.write(msg, 'warn');
  }

  error(msg: string): void {
    if (this.shouldLog('error')) this.write(msg, 'error');
  }

  verbose(msg: string): void {
    if (this.shouldLog('verbose')) this.write(msg, 'verbose');
  }

  debug(msg: string): void {
    if (this.shouldLog('debug')) this.write(msg, 'debug');
  }

  success(msg: string): void {
    if (this.shouldLog('info')) this.write(`✔ ${msg}`, 'info');
  }
}

// Singleton instance
export const logger = new Logger();

// Helper to configure from CLI options in a single place
export function configureLoggerFromCli(options: {
  debug?: boolean;
  verbose?: boolean;
  quiet?: boolean;
}): void {
  logger.configure({
    debug: options.debug,
    verbose: options.verbose,
    quiet: options.quiet,
  });

  if (typeof options.debug === 'boolean' && options.debug) {
    process.env.STAGECRAFT_DEBUG = 'true';
  }
}
