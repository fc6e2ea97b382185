/**
 * JSONL logging system for pagewright.
 *
 * Provides structured logging to both global (~/.pagewright/logs/) and
 * project-level (.pagewright/logs/) directories.
 */

import { mkdir, appendFile } from "node:fs/promises";
import { existsSync } from "node:fs";
import { dirname, join } from "node:path";
import os from "node:os";
import crypto from "node:crypto";

/** Log levels in order of severity */
export type LogLevel = "off" | "error" | "warn" | "info" | "debug";

/** Log entry types */
export type LogEntryType = "cli.command" | "cli.result" | "render.event" | "error";

/** Base fields present in all log entries */
export interface BaseLogEntry {
  id: string;
  timestamp: string;
  level: Exclude<LogLevel, "off">;
  type: LogEntryType;
  pid: number;
  sessionId: string;
}

/** CLI command invocation data */
export interface CommandData {
  command: string[];
  args: string[];
  flags: Record<string, string | boolean | string[]>;
  cwd: string;
}

/** CLI command result data */
export interface ResultData {
  command: string[];
  exitCode: number;
  durationMs: number;
  result?: unknown;
}

/** One rendered (or failed) document */
export interface RenderEventData {
  eventType: "render" | "error";
  input: string;
  template: string;
  output?: string;
  placeholders?: number;
  durationMs?: number;
  message?: string;
}

/** Error log data */
export interface ErrorData {
  code?: string;
  message: string;
  stack?: string;
  context?: {
    command?: string[];
    file?: string;
  };
}

/** Complete log entry types */
export type LogEntry =
  | (BaseLogEntry & { type: "cli.command"; data: CommandData })
  | (BaseLogEntry & { type: "cli.result"; data: ResultData })
  | (BaseLogEntry & { type: "render.event"; data: RenderEventData })
  | (BaseLogEntry & { type: "error"; data: ErrorData });

/** Logger configuration options */
export interface LoggerOptions {
  level?: LogLevel;
  enableGlobal?: boolean;
  enableProject?: boolean;
  projectDir?: string;
  /** Overrides ~/.pagewright/logs */
  globalDir?: string;
}

/** Numeric level values for comparison */
const LEVEL_VALUES: Record<LogLevel, number> = {
  off: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
};

/**
 * Get the global logs directory (~/.pagewright/logs/).
 */
function getGlobalLogsDir(): string {
  return join(os.homedir(), ".pagewright", "logs");
}

function getProjectLogsDir(projectDir: string): string {
  return join(projectDir, ".pagewright", "logs");
}

/**
 * Get today's log filename (YYYY-MM-DD.jsonl).
 */
export function getLogFilename(date = new Date()): string {
  return `${date.toISOString().split("T")[0]}.jsonl`;
}

/**
 * JSONL Logger singleton.
 */
export class Logger {
  private static instance: Logger | null = null;

  private level: LogLevel = "info";
  private enableGlobal = true;
  private enableProject = true;
  private projectDir: string | null = null;
  private globalDir: string | null = null;
  private sessionId: string;
  private disabled = false;
  private pending = new Set<Promise<void>>();
  private failedWrites = 0;

  private constructor() {
    this.sessionId = crypto.randomUUID();
  }

  /**
   * Get the singleton logger instance.
   */
  static getInstance(): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger();
    }
    return Logger.instance;
  }

  /**
   * Configure the logger.
   */
  static configure(options: LoggerOptions): void {
    const logger = Logger.getInstance();
    if (options.level !== undefined) {
      logger.level = options.level;
    }
    if (options.enableGlobal !== undefined) {
      logger.enableGlobal = options.enableGlobal;
    }
    if (options.enableProject !== undefined) {
      logger.enableProject = options.enableProject;
    }
    if (options.projectDir !== undefined) {
      logger.projectDir = options.projectDir;
    }
    if (options.globalDir !== undefined) {
      logger.globalDir = options.globalDir;
    }
  }

  /**
   * Disable all logging (for --no-log flag).
   */
  static disable(): void {
    Logger.getInstance().disabled = true;
  }

  /**
   * Re-enable logging.
   */
  static enable(): void {
    Logger.getInstance().disabled = false;
  }

  /**
   * Reset the logger (for testing).
   */
  static reset(): void {
    const logger = Logger.getInstance();
    logger.level = "info";
    logger.enableGlobal = true;
    logger.enableProject = true;
    logger.projectDir = null;
    logger.globalDir = null;
    logger.disabled = false;
    logger.failedWrites = 0;
    logger.sessionId = crypto.randomUUID();
  }

  getSessionId(): string {
    return this.sessionId;
  }

  /** Number of entries that could not be appended to a log file. */
  getFailedWrites(): number {
    return this.failedWrites;
  }

  /**
   * Wait for every write issued so far.
   */
  async flush(): Promise<void> {
    await Promise.all(this.pending);
  }

  private shouldLog(level: Exclude<LogLevel, "off">): boolean {
    if (this.disabled || this.level === "off") {
      return false;
    }
    return LEVEL_VALUES[level] <= LEVEL_VALUES[this.level];
  }

  /**
   * Queue a log entry for all configured destinations.
   */
  private write(entry: LogEntry): void {
    if (!this.shouldLog(entry.level)) {
      return;
    }

    const line = JSON.stringify(entry) + "\n";
    const filename = getLogFilename(new Date(entry.timestamp));
    const targets: string[] = [];

    if (this.enableGlobal) {
      targets.push(join(this.globalDir ?? getGlobalLogsDir(), filename));
    }

    // Project logs only go where a .pagewright directory already exists
    if (this.enableProject && this.projectDir && existsSync(join(this.projectDir, ".pagewright"))) {
      targets.push(join(getProjectLogsDir(this.projectDir), filename));
    }

    for (const target of targets) {
      const write = this.appendToLog(target, line).finally(() => {
        this.pending.delete(write);
      });
      this.pending.add(write);
    }
  }

  /**
   * Append a line to a log file, creating the directory if needed.
   * A failed write is counted, never thrown.
   */
  private async appendToLog(path: string, line: string): Promise<void> {
    try {
      await mkdir(dirname(path), { recursive: true });
      await appendFile(path, line);
    } catch {
      this.failedWrites++;
    }
  }

  private createBase(level: Exclude<LogLevel, "off">, type: LogEntryType): BaseLogEntry {
    return {
      id: crypto.randomUUID(),
      timestamp: new Date().toISOString(),
      level,
      type,
      pid: process.pid,
      sessionId: this.sessionId,
    };
  }

  /**
   * Log a CLI command invocation.
   */
  command(data: CommandData): void {
    this.write({ ...this.createBase("info", "cli.command"), type: "cli.command", data });
  }

  /**
   * Log a CLI command result.
   */
  result(data: ResultData): void {
    const level = data.exitCode === 0 ? "info" : "error";
    this.write({ ...this.createBase(level, "cli.result"), type: "cli.result", data });
  }

  /**
   * Log a rendered document.
   */
  render(data: RenderEventData): void {
    const level = data.eventType === "error" ? "error" : "info";
    this.write({ ...this.createBase(level, "render.event"), type: "render.event", data });
  }

  /**
   * Log an error.
   */
  error(error: Error, context?: ErrorData["context"]): void {
    this.write({
      ...this.createBase("error", "error"),
      type: "error",
      data: {
        message: error.message,
        stack: error.stack,
        context,
      },
    });
  }

  /**
   * Log an error with a code.
   */
  errorWithCode(code: string, message: string, context?: ErrorData["context"]): void {
    this.write({
      ...this.createBase("error", "error"),
      type: "error",
      data: { code, message, context },
    });
  }
}

/**
 * Get the singleton logger instance.
 */
export function getLogger(): Logger {
  return Logger.getInstance();
}

/**
 * Configure the logger.
 */
export function configureLogging(options: LoggerOptions): void {
  Logger.configure(options);
}
