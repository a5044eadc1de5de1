/* eslint-disable no-console */
import * as fs from "fs";
import * as path from "path";

/**
 * Logging utility for the trail simulation backend.
 *
 * Features:
 * - Console output with colored levels and a minimum level threshold
 * - Memory buffer with periodic evacuation to a JSON Lines file (opt-in)
 * - Category-based logging for subsystem identification
 * - Throttling to prevent log spam from tight tick loops
 */

import { LogLevel, LogCategory } from "../../shared/constants/LogEnums";

/**
 * Log entry kept in memory and written to disk.
 */
export interface LogEntry {
  /** Unique identifier for this log entry */
  id: string;
  /** Log severity level */
  level: LogLevel;
  /** Log category/subsystem */
  category: LogCategory;
  /** Human-readable message */
  message: string;
  /** ISO timestamp */
  timestamp: string;
  /** Unix timestamp for sorting/filtering */
  timestampMs: number;
  /** Simulation turn when the log was created */
  turn?: number;
  /** Additional structured data */
  data?: unknown;
}

/**
 * Filter options for log queries.
 */
export interface LogFilter {
  levels?: LogLevel[];
  categories?: LogCategory[];
  messageContains?: string;
  limit?: number;
}

interface LoggerConfig {
  minLevel: LogLevel;
  maxMemoryLogs: number;
  evacuationThreshold: number;
  writeToFile: boolean;
  logDir: string;
  throttleWindowMs: number;
  maxThrottleCount: number;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.ERROR]: 3,
};

function parseLevel(value: string | undefined): LogLevel {
  const match = Object.values(LogLevel).find((level) => level === value);
  return match ?? LogLevel.INFO;
}

const DEFAULT_CONFIG: LoggerConfig = {
  minLevel: parseLevel(process.env.LOG_LEVEL),
  maxMemoryLogs: 2000,
  evacuationThreshold: Number(process.env.LOG_EVACUATION_THRESHOLD ?? 1500),
  writeToFile: process.env.LOG_TO_FILE === "true",
  logDir: process.env.LOG_DIR
    ? path.resolve(process.env.LOG_DIR)
    : path.join(process.cwd(), "logs"),
  throttleWindowMs: Number(process.env.LOG_THROTTLE_WINDOW_MS ?? 5000),
  maxThrottleCount: Number(process.env.LOG_MAX_THROTTLE_COUNT ?? 3),
};

function isCategory(value: unknown): value is LogCategory {
  return (
    typeof value === "string" &&
    Object.values(LogCategory).some((category) => category === value)
  );
}

/**
 * Logger class with memory buffering and optional file evacuation.
 * Console: levels at or above the threshold, with colors
 * Memory: every accepted entry with full metadata
 * File: JSON Lines, appended when the buffer is evacuated
 */
export class Logger {
  private config: LoggerConfig;
  private memoryBuffer: LogEntry[] = [];
  private throttleMap = new Map<string, { count: number; lastTime: number }>();
  private evacuationInterval?: NodeJS.Timeout;
  private evacuationPromise: Promise<void> = Promise.resolve();
  private sequence = 0;
  private currentTurn = 0;

  constructor(config: Partial<LoggerConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };

    if (this.config.writeToFile) {
      this.ensureLogDir();
      const writeIntervalMs = Number(process.env.LOG_WRITE_INTERVAL_MS ?? 5000);
      this.evacuationInterval = setInterval(
        () => this.evacuateToFile(),
        writeIntervalMs,
      );
      this.evacuationInterval.unref();
    }
  }

  private ensureLogDir(): void {
    try {
      if (!fs.existsSync(this.config.logDir)) {
        fs.mkdirSync(this.config.logDir, { recursive: true });
      }
    } catch (error) {
      console.warn(
        `Failed to create log directory ${this.config.logDir}:`,
        error instanceof Error ? error.message : String(error),
      );
    }
  }

  private getLogFilePath(): string {
    const date = new Date().toISOString().split("T")[0];
    return path.join(this.config.logDir, `logs-${date}.jsonl`);
  }

  private formatConsoleMessage(
    level: LogLevel,
    category: LogCategory,
    message: string,
  ): string {
    const levelColors: Record<LogLevel, string> = {
      [LogLevel.DEBUG]: "\x1b[36m",
      [LogLevel.INFO]: "\x1b[32m",
      [LogLevel.WARN]: "\x1b[33m",
      [LogLevel.ERROR]: "\x1b[31m",
    };
    const reset = "\x1b[0m";
    return `${levelColors[level]}[${new Date().toISOString()}] [${level.toUpperCase()}] [${category}]${reset} ${message}`;
  }

  private shouldThrottle(message: string): boolean {
    const now = Date.now();
    const key = message.substring(0, 100);
    const entry = this.throttleMap.get(key);

    if (!entry) {
      this.throttleMap.set(key, { count: 1, lastTime: now });
      return false;
    }

    if (now - entry.lastTime > this.config.throttleWindowMs) {
      entry.count = 1;
      entry.lastTime = now;
      return false;
    }

    entry.count++;
    return entry.count > this.config.maxThrottleCount;
  }

  private addToMemory(entry: LogEntry): void {
    this.memoryBuffer.push(entry);
    if (this.memoryBuffer.length > this.config.maxMemoryLogs) {
      this.memoryBuffer.splice(
        0,
        this.memoryBuffer.length - this.config.maxMemoryLogs,
      );
    }

    if (
      this.config.writeToFile &&
      this.memoryBuffer.length >= this.config.evacuationThreshold
    ) {
      this.evacuateToFile();
    }
  }

  private evacuateToFile(): void {
    this.evacuationPromise = this.evacuationPromise.then(() =>
      this.doEvacuate(),
    );
  }

  private async doEvacuate(): Promise<void> {
    if (!this.config.writeToFile || this.memoryBuffer.length === 0) return;

    const logsToWrite = this.memoryBuffer.splice(0);
    const logFilePath = this.getLogFilePath();

    try {
      const lines = logsToWrite.map((log) => JSON.stringify(log)).join("\n");
      await fs.promises.appendFile(logFilePath, lines + "\n", "utf-8");
    } catch (error) {
      this.memoryBuffer = [...logsToWrite, ...this.memoryBuffer].slice(
        -this.config.maxMemoryLogs,
      );
      console.error("Failed to evacuate logs:", {
        error: error instanceof Error ? error.message : String(error),
        bufferSize: logsToWrite.length,
        filePath: logFilePath,
      });
    }
  }

  /**
   * Set the current simulation turn for log context.
   */
  setTurn(turn: number): void {
    this.currentTurn = turn;
  }

  /**
   * Log with explicit category.
   */
  log(
    level: LogLevel,
    category: LogCategory,
    message: string,
    data?: unknown,
  ): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.config.minLevel]) return;
    if (this.shouldThrottle(message)) return;

    const now = Date.now();
    this.addToMemory({
      id: `${now}-${++this.sequence}`,
      level,
      category,
      message,
      timestamp: new Date(now).toISOString(),
      timestampMs: now,
      turn: this.currentTurn,
      data,
    });

    const consoleMsg = this.formatConsoleMessage(level, category, message);
    switch (level) {
      case LogLevel.DEBUG:
        console.log(consoleMsg, data ?? "");
        break;
      case LogLevel.INFO:
        console.info(consoleMsg, data ?? "");
        break;
      case LogLevel.WARN:
        console.warn(consoleMsg, data ?? "");
        break;
      case LogLevel.ERROR:
        console.error(consoleMsg, data ?? "");
        break;
    }
  }

  private route(
    level: LogLevel,
    message: string,
    categoryOrData?: unknown,
    data?: unknown,
  ): void {
    if (isCategory(categoryOrData)) {
      this.log(level, categoryOrData, message, data);
      return;
    }
    this.log(level, LogCategory.GENERAL, message, categoryOrData);
  }

  /**
   * Debug level log; the second argument is either a category or data.
   */
  debug(message: string, categoryOrData?: unknown, data?: unknown): void {
    this.route(LogLevel.DEBUG, message, categoryOrData, data);
  }

  info(message: string, categoryOrData?: unknown, data?: unknown): void {
    this.route(LogLevel.INFO, message, categoryOrData, data);
  }

  warn(message: string, categoryOrData?: unknown, data?: unknown): void {
    this.route(LogLevel.WARN, message, categoryOrData, data);
  }

  error(message: string, categoryOrData?: unknown, data?: unknown): void {
    this.route(LogLevel.ERROR, message, categoryOrData, data);
  }

  /**
   * Query logs from memory buffer with filters.
   */
  queryLogs(filter: LogFilter = {}): LogEntry[] {
    const { levels, categories, messageContains, limit } = filter;
    let results = [...this.memoryBuffer];

    if (levels?.length) {
      results = results.filter((e) => levels.includes(e.level));
    }
    if (categories?.length) {
      results = results.filter((e) => categories.includes(e.category));
    }
    if (messageContains) {
      const search = messageContains.toLowerCase();
      results = results.filter((e) => e.message.toLowerCase().includes(search));
    }
    if (limit) {
      results = results.slice(-limit);
    }

    return results;
  }

  /**
   * Force immediate evacuation of logs to file.
   */
  async flush(): Promise<void> {
    await this.evacuationPromise;
    await this.doEvacuate();
  }

  getBufferSize(): number {
    return this.memoryBuffer.length;
  }

  /**
   * Cleanup resources.
   */
  destroy(): void {
    if (this.evacuationInterval) {
      clearInterval(this.evacuationInterval);
      this.evacuationInterval = undefined;
    }
  }
}

export const logger = new Logger();

export { LogLevel, LogCategory } from "../../shared/constants/LogEnums";
