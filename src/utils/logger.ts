import { appendFileSync } from "fs";
import { InvalidLogLevelError } from "../errors";

export enum LogLevel {
  ERROR = 0,
  WARN = 1,
  INFO = 2,
  DEBUG = 3,
}

export interface LoggerOptions {
  level?: LogLevel;
  silent?: boolean;
  timestamp?: boolean;
  /** Append every emitted record, uncoloured, to this file. */
  file?: string;
}

const colors = {
  reset: "\u001B[0m",
  red: "\u001B[31m",
  green: "\u001B[32m",
  yellow: "\u001B[33m",
  white: "\u001B[37m",
};

const emoji = {
  error: "❌",
  warn: "⚠️",
  info: "🔹",
  debug: "🐞",
  success: "⚡️",
};

type Kind = keyof typeof emoji;

const fileLevelNames: Record<Kind, string> = {
  error: "ERROR",
  warn: "WARNING",
  info: "INFO",
  debug: "DEBUG",
  success: "INFO",
};

const levelsByName: Record<string, LogLevel> = {
  error: LogLevel.ERROR,
  warn: LogLevel.WARN,
  warning: LogLevel.WARN,
  info: LogLevel.INFO,
  debug: LogLevel.DEBUG,
};

export function parseLogLevel(name: string): LogLevel {
  const level = levelsByName[name.trim().toLowerCase()];
  if (level === undefined) {
    throw new InvalidLogLevelError(name);
  }
  return level;
}

export class Logger {
  private level: LogLevel;
  private silent: boolean;
  private timestamp: boolean;
  private file?: string;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? LogLevel.INFO;
    this.silent = options.silent ?? false;
    this.timestamp = options.timestamp ?? false;
    this.file = options.file;
  }

  private prefix(): string {
    return this.timestamp ? `[${new Date().toISOString()}] ` : "";
  }

  private shouldLog(level: LogLevel): boolean {
    return !this.silent && level <= this.level;
  }

  private formatData(data?: unknown): string {
    if (data === undefined) return "";
    if (data instanceof Error) {
      const stack = data.stack ? `\n${data.stack}` : "";
      return ` ${data.name}: ${data.message}${stack}`;
    }
    try {
      return ` ${JSON.stringify(data)}`;
    } catch {
      return ` ${String(data)}`;
    }
  }

  private withEmojiPrefix(kind: Kind, message: string): string {
    return `${this.prefix()}${emoji[kind]} ${message}`;
  }

  private writeToFile(kind: Kind, message: string, data?: unknown): void {
    if (!this.file) return;
    const line = `${new Date().toISOString()} ${fileLevelNames[kind].padEnd(8)} ${message}${this.formatData(data)}\n`;
    appendFileSync(this.file, line, "utf8");
  }

  error(message: string, data?: unknown): void {
    if (!this.shouldLog(LogLevel.ERROR)) return;
    const msg = `${this.withEmojiPrefix("error", message)}${this.formatData(data)}`;
    console.error(`${colors.red}${msg}${colors.reset}`);
    this.writeToFile("error", message, data);
  }

  warn(message: string, data?: unknown): void {
    if (!this.shouldLog(LogLevel.WARN)) return;
    const msg = `${this.withEmojiPrefix("warn", message)}${this.formatData(data)}`;
    console.warn(`${colors.yellow}${msg}${colors.reset}`);
    this.writeToFile("warn", message, data);
  }

  info(message: string, data?: unknown): void {
    if (!this.shouldLog(LogLevel.INFO)) return;
    const msg = `${this.withEmojiPrefix("info", message)}${this.formatData(data)}`;
    console.log(`${colors.white}${msg}${colors.reset}`);
    this.writeToFile("info", message, data);
  }

  debug(message: string, data?: unknown): void {
    if (!this.shouldLog(LogLevel.DEBUG)) return;
    const msg = `${this.withEmojiPrefix("debug", message)}${this.formatData(data)}`;
    console.log(msg);
    this.writeToFile("debug", message, data);
  }

  success(message: string, data?: unknown): void {
    if (!this.shouldLog(LogLevel.INFO)) return;
    const msg = `${this.withEmojiPrefix("success", message)}${this.formatData(data)}`;
    console.log(`${colors.green}${msg}${colors.reset}`);
    this.writeToFile("success", message, data);
  }

  getLevel(): LogLevel {
    return this.level;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  setTimestamp(timestamp: boolean): void {
    this.timestamp = timestamp;
  }

  setFile(file: string | undefined): void {
    this.file = file;
  }
}

// Default logger instance, used by the CLI shell before a run context exists
export const logger = new Logger();

// e.g. fleetroll-2024_03_09_14_05.log
export function logFileName(date: Date, prefix = "fleetroll"): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  return `${prefix}-${date.getFullYear()}_${pad(date.getMonth() + 1)}_${pad(date.getDate())}_${pad(date.getHours())}_${pad(date.getMinutes())}.log`;
}
