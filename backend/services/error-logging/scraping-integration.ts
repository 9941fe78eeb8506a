import type { ErrorContext, ErrorLogger } from "./error-logger";
import {
  ConfigurationError,
  CoordinatorTaskFailure,
  ExtractionError,
  FetchError,
  ScoringError,
  toError,
} from "./errors";
import type { ErrorType, ExtractionStep } from "@shared/types/scraping-errors";

/**
 * Utility functions for integrating error logging into scraping operations
 */

export interface ScrapingContextInfo {
  sourceName?: string;
  sourceUrl: string;
}

export interface ScrapingOperationContext extends ScrapingContextInfo {
  articleUrl?: string;
  extractionStep: ExtractionStep;
  retryCount?: number;
}

export function createErrorContext(
  operation: ScrapingOperationContext,
  additionalDetails?: Record<string, unknown>
): ErrorContext {
  return {
    sourceName: operation.sourceName,
    sourceUrl: operation.sourceUrl,
    articleUrl: operation.articleUrl,
    extractionStep: operation.extractionStep,
    retryCount: operation.retryCount ?? 0,
    additionalDetails,
  };
}

/**
 * Infer error type from error instance and message
 */
export function inferErrorType(error: Error): ErrorType {
  if (error instanceof FetchError) {
    return error.kind === 'parse' ? 'parsing' : error.kind;
  }
  if (error instanceof ExtractionError) return 'extraction';
  if (error instanceof ScoringError) return 'scoring';
  if (error instanceof ConfigurationError) return 'configuration';
  if (error instanceof CoordinatorTaskFailure) {
    return error.timedOut ? 'timeout' : 'task';
  }

  const message = error.message.toLowerCase();
  const name = error.name.toLowerCase();

  if (
    message.includes('timeout') ||
    message.includes('timed out') ||
    name.includes('timeout') ||
    name === 'aborterror'
  ) {
    return 'timeout';
  }

  if (
    message.includes('econnrefused') ||
    message.includes('enotfound') ||
    message.includes('econnreset') ||
    message.includes('connection') ||
    message.includes('network') ||
    message.includes('fetch')
  ) {
    return 'network';
  }

  if (
    message.includes('parse') ||
    message.includes('syntax') ||
    message.includes('malformed') ||
    name.includes('syntax')
  ) {
    return 'parsing';
  }

  if (
    message.includes('http') ||
    message.includes('status') ||
    message.includes('response')
  ) {
    return 'network';
  }

  return 'unknown';
}

export async function logSourceScrapingError(
  error: Error,
  context: ScrapingContextInfo,
  additionalDetails: Record<string, unknown> | undefined,
  logger: ErrorLogger
): Promise<void> {
  const errorContext = createErrorContext({
    ...context,
    extractionStep: 'source-scraping',
  }, additionalDetails);

  await logger.logError(inferErrorType(error), error.message, errorContext, error);
}

export async function logArticleScrapingError(
  error: Error,
  context: ScrapingContextInfo,
  articleUrl: string | undefined,
  extractionStep: ExtractionStep,
  additionalDetails: Record<string, unknown> | undefined,
  logger: ErrorLogger
): Promise<void> {
  const errorContext = createErrorContext({
    ...context,
    articleUrl,
    extractionStep,
  }, additionalDetails);

  await logger.logError(inferErrorType(error), error.message, errorContext, error);
}
