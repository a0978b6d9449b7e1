export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

const LEVEL_NAMES: Record<string, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
}

/**
 * Maps a level name from configuration (case-insensitive) to a LogLevel
 * @param name - One of debug, info, warn, error
 * @returns The matching level, or null for an unknown name
 */
export function parseLogLevel(name: string): LogLevel | null {
  return LEVEL_NAMES[name.trim().toLowerCase()] ?? null
}

/**
 * Minimal leveled logger writing timestamped lines to the console
 */
export class Logger {
  private level: LogLevel = LogLevel.INFO

  setLevel(level: LogLevel): void {
    this.level = level
  }

  getLevel(): LogLevel {
    return this.level
  }

  debug(message: string): void {
    if (this.level <= LogLevel.DEBUG) console.debug(this.format('DEBUG', message))
  }

  info(message: string): void {
    if (this.level <= LogLevel.INFO) console.info(this.format('INFO', message))
  }

  warn(message: string): void {
    if (this.level <= LogLevel.WARN) console.warn(this.format('WARN', message))
  }

  error(message: string): void {
    if (this.level <= LogLevel.ERROR) console.error(this.format('ERROR', message))
  }

  private format(level: string, message: string): string {
    return `[${new Date().toISOString()}] ${level.padEnd(5)} ${message}`
  }
}

export const logger = new Logger()
