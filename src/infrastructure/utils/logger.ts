/* eslint-disable no-console */
import * as fs from "fs";
import * as path from "path";

/**
 * Logging utility for the village backend.
 *
 * Features:
 * - Console output with colored levels
 * - Bounded memory buffer for queries from the API and tests
 * - Optional evacuation to daily JSON-lines files
 * - Category-based logging for subsystem identification
 * - Per-villager entries tagged with the simulated day
 */

import { LogLevel, LogCategory } from "../../shared/constants/LogEnums";
import { CONFIG } from "../../config/config";

export interface LogEntry {
  id: string;
  level: LogLevel;
  category: LogCategory;
  message: string;
  /** ISO timestamp */
  timestamp: string;
  timestampMs: number;
  /** Set when the entry concerns a single villager */
  villagerId?: string;
  /** Simulated day when the entry was created */
  day: number;
  data?: unknown;
}

interface LogMetrics {
  byLevel: Record<LogLevel, number>;
  byCategory: Partial<Record<LogCategory, number>>;
  startTime: number;
  endTime: number;
  totalCount: number;
}

export interface LogFilter {
  levels?: LogLevel[];
  categories?: LogCategory[];
  villagerId?: string;
  day?: number;
  messageContains?: string;
  /** Keep only the most recent N matches */
  limit?: number;
}

export interface LoggerConfig {
  minLevel: LogLevel;
  maxMemoryLogs: number;
  consoleOutput: boolean;
  /** Append entries to `<logDir>/logs-YYYY-MM-DD.jsonl` */
  fileOutput: boolean;
  logDir: string;
  writeIntervalMs: number;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.ERROR]: 3,
};

const LEVEL_COLORS: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: "\x1b[36m",
  [LogLevel.INFO]: "\x1b[32m",
  [LogLevel.WARN]: "\x1b[33m",
  [LogLevel.ERROR]: "\x1b[31m",
};

const LOG_CATEGORIES: ReadonlySet<unknown> = new Set<unknown>(
  Object.values(LogCategory),
);

export function isLogCategory(value: unknown): value is LogCategory {
  return LOG_CATEGORIES.has(value);
}

const DEFAULT_CONFIG: LoggerConfig = {
  minLevel: CONFIG.LOG_LEVEL,
  maxMemoryLogs: 5000,
  consoleOutput: process.env.NODE_ENV !== "test",
  fileOutput: CONFIG.LOG_TO_FILE,
  logDir: CONFIG.LOG_DIR,
  writeIntervalMs: 5000,
};

let logCounter = 0;

function generateLogId(): string {
  return `${Date.now()}-${(++logCounter).toString(36)}`;
}

function getDateString(): string {
  return new Date().toISOString().split("T")[0];
}

/**
 * Splits the `(message, categoryOrData?, data?)` call shape.
 */
function resolveCategory(
  categoryOrData: unknown,
  data: unknown,
): { category: LogCategory; data: unknown } {
  if (isLogCategory(categoryOrData)) {
    return { category: categoryOrData, data };
  }
  return { category: LogCategory.GENERAL, data: categoryOrData };
}

/**
 * Logger with memory buffering and optional file evacuation.
 * Console: levels at or above `minLevel`, with colors
 * Memory: the last `maxMemoryLogs` entries
 * Files: JSON lines, one file per calendar day
 */
export class Logger {
  private config: LoggerConfig;
  private memoryBuffer: LogEntry[] = [];
  private pendingWrites: LogEntry[] = [];
  private evacuationInterval?: NodeJS.Timeout;
  private evacuationPromise: Promise<void> = Promise.resolve();
  private metrics: LogMetrics;
  private currentDay = 0;

  constructor(config: Partial<LoggerConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.metrics = this.initMetrics();

    if (this.config.fileOutput) {
      this.ensureLogDir();
      this.evacuationInterval = setInterval(
        () => this.evacuateToFile(),
        this.config.writeIntervalMs,
      );
      this.evacuationInterval.unref();
    }
  }

  private initMetrics(): LogMetrics {
    const now = Date.now();
    return {
      byLevel: {
        [LogLevel.DEBUG]: 0,
        [LogLevel.INFO]: 0,
        [LogLevel.WARN]: 0,
        [LogLevel.ERROR]: 0,
      },
      byCategory: {},
      startTime: now,
      endTime: now,
      totalCount: 0,
    };
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
    return path.join(this.config.logDir, `logs-${getDateString()}.jsonl`);
  }

  private formatConsoleMessage(
    entry: Pick<LogEntry, "level" | "category" | "message" | "day">,
  ): string {
    const reset = "\x1b[0m";
    return `${LEVEL_COLORS[entry.level]}[day ${entry.day}] [${entry.level.toUpperCase()}] [${entry.category}]${reset} ${entry.message}`;
  }

  private updateMetrics(entry: LogEntry): void {
    this.metrics.byLevel[entry.level]++;
    this.metrics.byCategory[entry.category] =
      (this.metrics.byCategory[entry.category] ?? 0) + 1;
    this.metrics.endTime = entry.timestampMs;
    this.metrics.totalCount++;
  }

  private addToMemory(entry: LogEntry): void {
    this.memoryBuffer.push(entry);
    if (this.memoryBuffer.length > this.config.maxMemoryLogs) {
      this.memoryBuffer.splice(
        0,
        this.memoryBuffer.length - this.config.maxMemoryLogs,
      );
    }
    if (this.config.fileOutput) {
      this.pendingWrites.push(entry);
    }
    this.updateMetrics(entry);
  }

  private evacuateToFile(): void {
    this.evacuationPromise = this.evacuationPromise.then(() =>
      this.doEvacuate(),
    );
  }

  private async doEvacuate(): Promise<void> {
    if (this.pendingWrites.length === 0) return;

    const logsToWrite = this.pendingWrites;
    this.pendingWrites = [];
    const logFilePath = this.getLogFilePath();

    try {
      const lines = logsToWrite.map((log) => JSON.stringify(log)).join("\n");
      await fs.promises.appendFile(logFilePath, lines + "\n", "utf-8");
    } catch (error) {
      this.pendingWrites = [...logsToWrite, ...this.pendingWrites];
      console.error("Failed to evacuate logs:", {
        error: error instanceof Error ? error.message : String(error),
        bufferSize: logsToWrite.length,
        filePath: logFilePath,
      });
    }
  }

  /**
   * Set the current simulated day for log context.
   */
  setTick(day: number): void {
    this.currentDay = day;
  }

  log(
    level: LogLevel,
    category: LogCategory,
    message: string,
    options?: { villagerId?: string; data?: unknown },
  ): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.config.minLevel]) return;

    const now = Date.now();
    const entry: LogEntry = {
      id: generateLogId(),
      level,
      category,
      message,
      timestamp: new Date(now).toISOString(),
      timestampMs: now,
      villagerId: options?.villagerId,
      day: this.currentDay,
      data: options?.data,
    };
    this.addToMemory(entry);

    if (!this.config.consoleOutput) return;

    const consoleMsg = this.formatConsoleMessage(entry);
    const extra = options?.data ?? "";
    switch (level) {
      case LogLevel.DEBUG:
        console.log(consoleMsg, extra);
        break;
      case LogLevel.INFO:
        console.info(consoleMsg, extra);
        break;
      case LogLevel.WARN:
        console.warn(consoleMsg, extra);
        break;
      case LogLevel.ERROR:
        console.error(consoleMsg, extra);
        break;
    }
  }

  debug(message: string, categoryOrData?: unknown, data?: unknown): void {
    const resolved = resolveCategory(categoryOrData, data);
    this.log(LogLevel.DEBUG, resolved.category, message, {
      data: resolved.data,
    });
  }

  info(message: string, categoryOrData?: unknown, data?: unknown): void {
    const resolved = resolveCategory(categoryOrData, data);
    this.log(LogLevel.INFO, resolved.category, message, {
      data: resolved.data,
    });
  }

  warn(message: string, categoryOrData?: unknown, data?: unknown): void {
    const resolved = resolveCategory(categoryOrData, data);
    this.log(LogLevel.WARN, resolved.category, message, {
      data: resolved.data,
    });
  }

  error(message: string, categoryOrData?: unknown, data?: unknown): void {
    const resolved = resolveCategory(categoryOrData, data);
    this.log(LogLevel.ERROR, resolved.category, message, {
      data: resolved.data,
    });
  }

  /**
   * Log an event about one villager.
   */
  agentLog(
    level: LogLevel,
    category: LogCategory,
    villagerId: string,
    message: string,
    data?: unknown,
  ): void {
    this.log(level, category, `[Villager:${villagerId}] ${message}`, {
      villagerId,
      data,
    });
  }

  getMetrics(): LogMetrics {
    return {
      ...this.metrics,
      byLevel: { ...this.metrics.byLevel },
      byCategory: { ...this.metrics.byCategory },
    };
  }

  resetMetrics(): void {
    this.metrics = this.initMetrics();
  }

  queryLogs(filter: LogFilter = {}): LogEntry[] {
    const { levels, categories, villagerId, day, messageContains, limit } =
      filter;
    const search = messageContains?.toLowerCase();

    const results = this.memoryBuffer.filter((e) => {
      if (levels?.length && !levels.includes(e.level)) return false;
      if (categories?.length && !categories.includes(e.category)) return false;
      if (villagerId !== undefined && e.villagerId !== villagerId) return false;
      if (day !== undefined && e.day !== day) return false;
      if (search && !e.message.toLowerCase().includes(search)) return false;
      return true;
    });

    return limit ? results.slice(-limit) : results;
  }

  getRecentLogs(count: number = 100): LogEntry[] {
    return this.memoryBuffer.slice(-count);
  }

  getBufferSize(): number {
    return this.memoryBuffer.length;
  }

  /**
   * Force immediate evacuation of pending entries to file.
   */
  async flush(): Promise<void> {
    await this.evacuationPromise;
    await this.doEvacuate();
  }

  destroy(): void {
    if (this.evacuationInterval) {
      clearInterval(this.evacuationInterval);
      this.evacuationInterval = undefined;
    }
  }
}

export const logger = new Logger();

export { LogLevel, LogCategory } from "../../shared/constants/LogEnums";
