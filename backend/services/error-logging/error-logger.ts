import type { IErrorLoggingStorage } from "./storage";
import { log } from "backend/utils/log";
import type { ErrorType, ExtractionStep } from "@shared/types/scraping-errors";

export interface ErrorContext {
  sourceName?: string;
  sourceUrl: string;
  articleUrl?: string;
  extractionStep: ExtractionStep;
  retryCount?: number;
  additionalDetails?: Record<string, unknown>;
}

export class ErrorLogger {
  constructor(readonly storage: IErrorLoggingStorage) {}

  /**
   * Record an error in the error log and mirror it to the console
   */
  async logError(
    errorType: ErrorType,
    errorMessage: string,
    context: ErrorContext,
    error?: Error
  ): Promise<void> {
    const errorDetails: Record<string, unknown> = {
      ...context.additionalDetails,
    };

    if (error) {
      errorDetails.stack = error.stack;
      errorDetails.name = error.name;
    }

    const contextStr = `[${context.extractionStep}]${context.sourceName ? ` [${context.sourceName}]` : ''}`;
    log(
      `${contextStr} ${errorType.toUpperCase()}: ${errorMessage} (Source: ${context.sourceUrl}${context.articleUrl ? `, Article: ${context.articleUrl}` : ''})`,
      "scraper-error",
      'error'
    );

    try {
      await this.storage.createErrorLog({
        sourceName: context.sourceName,
        sourceUrl: context.sourceUrl,
        articleUrl: context.articleUrl,
        errorType,
        errorMessage,
        errorDetails,
        extractionStep: context.extractionStep,
        retryCount: context.retryCount ?? 0,
      });
    } catch (loggingError) {
      log(
        `Error logging failed: ${loggingError instanceof Error ? loggingError.message : 'Unknown error'}. Original error: ${errorMessage}`,
        "scraper-error",
        'error'
      );
    }
  }
}
