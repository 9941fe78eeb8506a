import { v4 as uuidv4 } from "uuid";
import type {
  ErrorType,
  InsertScrapingErrorLog,
  ScrapingErrorLog,
} from "@shared/types/scraping-errors";

export interface ErrorLogQuery {
  sourceName?: string;
  errorType?: ErrorType;
  startDate?: Date;
  endDate?: Date;
  limit?: number;
  offset?: number;
}

export interface ErrorLogStats {
  totalErrors: number;
  errorsByType: Record<ErrorType, number>;
  recentErrors: number; // Last 24 hours
}

export interface IErrorLoggingStorage {
  createErrorLog(errorLog: InsertScrapingErrorLog): Promise<ScrapingErrorLog>;

  // Newest first
  getErrorLogs(options?: ErrorLogQuery): Promise<ScrapingErrorLog[]>;

  getErrorLogsBySource(sourceName: string): Promise<ScrapingErrorLog[]>;

  getErrorLogStats(now?: Date): Promise<ErrorLogStats>;

  clearOldErrorLogs(olderThan: Date): Promise<number>;
}

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Bounded in-process error log. Oldest entries are dropped once capacity is reached.
 */
export class InMemoryErrorLoggingStorage implements IErrorLoggingStorage {
  private entries: ScrapingErrorLog[] = [];

  constructor(
    private readonly capacity = 1000,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  async createErrorLog(errorLog: InsertScrapingErrorLog): Promise<ScrapingErrorLog> {
    const created: ScrapingErrorLog = {
      ...errorLog,
      id: uuidv4(),
      timestamp: this.clock(),
    };

    this.entries.push(created);
    if (this.entries.length > this.capacity) {
      this.entries.splice(0, this.entries.length - this.capacity);
    }

    return created;
  }

  async getErrorLogs(options: ErrorLogQuery = {}): Promise<ScrapingErrorLog[]> {
    const filtered = this.entries
      .filter((entry) => !options.sourceName || entry.sourceName === options.sourceName)
      .filter((entry) => !options.errorType || entry.errorType === options.errorType)
      .filter((entry) => !options.startDate || entry.timestamp >= options.startDate)
      .filter((entry) => !options.endDate || entry.timestamp <= options.endDate)
      .reverse();

    const offset = options.offset ?? 0;
    const limit = options.limit ?? 100;
    return filtered.slice(offset, offset + limit);
  }

  async getErrorLogsBySource(sourceName: string): Promise<ScrapingErrorLog[]> {
    return this.getErrorLogs({ sourceName, limit: this.capacity });
  }

  async getErrorLogStats(now: Date = this.clock()): Promise<ErrorLogStats> {
    const errorsByType: Record<ErrorType, number> = {
      network: 0,
      timeout: 0,
      parsing: 0,
      extraction: 0,
      scoring: 0,
      task: 0,
      configuration: 0,
      unknown: 0,
    };

    let recentErrors = 0;
    for (const entry of this.entries) {
      errorsByType[entry.errorType]++;
      if (now.getTime() - entry.timestamp.getTime() <= DAY_MS) {
        recentErrors++;
      }
    }

    return {
      totalErrors: this.entries.length,
      errorsByType,
      recentErrors,
    };
  }

  async clearOldErrorLogs(olderThan: Date): Promise<number> {
    const before = this.entries.length;
    this.entries = this.entries.filter((entry) => entry.timestamp >= olderThan);
    return before - this.entries.length;
  }
}

