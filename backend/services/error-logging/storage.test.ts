import { describe, expect, it } from 'vitest';
import type { InsertScrapingErrorLog } from '@shared/types/scraping-errors';
import { InMemoryErrorLoggingStorage } from './storage';

const NOW = new Date('2024-05-01T12:00:00Z');
const HOUR = 60 * 60 * 1000;

function entry(sourceName: string, errorType: InsertScrapingErrorLog['errorType']): InsertScrapingErrorLog {
  return {
    sourceName,
    sourceUrl: `https://${sourceName}.example.com/`,
    errorType,
    errorMessage: `${errorType} failure`,
    errorDetails: {},
    extractionStep: 'source-scraping',
    retryCount: 0,
  };
}

describe('InMemoryErrorLoggingStorage', () => {
  it('returns entries newest first and filters by source', async () => {
    const clock = { now: NOW };
    const storage = new InMemoryErrorLoggingStorage(10, () => clock.now);

    await storage.createErrorLog(entry('alpha', 'network'));
    clock.now = new Date(NOW.getTime() + HOUR);
    await storage.createErrorLog(entry('beta', 'timeout'));
    await storage.createErrorLog(entry('alpha', 'parsing'));

    expect((await storage.getErrorLogs()).map((log) => log.errorType)).toEqual(['parsing', 'timeout', 'network']);
    expect((await storage.getErrorLogsBySource('alpha')).map((log) => log.errorType)).toEqual(['parsing', 'network']);
    expect((await storage.getErrorLogs({ errorType: 'timeout' })).map((log) => log.sourceName)).toEqual(['beta']);
  });

  it('drops the oldest entries past capacity', async () => {
    const storage = new InMemoryErrorLoggingStorage(2, () => NOW);

    await storage.createErrorLog(entry('one', 'network'));
    await storage.createErrorLog(entry('two', 'network'));
    await storage.createErrorLog(entry('three', 'network'));

    expect((await storage.getErrorLogs()).map((log) => log.sourceName)).toEqual(['three', 'two']);
  });

  it('counts errors by type and within the last day', async () => {
    const clock = { now: new Date(NOW.getTime() - 30 * HOUR) };
    const storage = new InMemoryErrorLoggingStorage(10, () => clock.now);
    await storage.createErrorLog(entry('old', 'extraction'));
    clock.now = NOW;
    await storage.createErrorLog(entry('fresh', 'task'));
    await storage.createErrorLog(entry('fresh', 'task'));

    const stats = await storage.getErrorLogStats(NOW);

    expect(stats.totalErrors).toBe(3);
    expect(stats.recentErrors).toBe(2);
    expect(stats.errorsByType).toMatchObject({ extraction: 1, task: 2, network: 0 });
  });

  it('clears entries older than a cutoff', async () => {
    const clock = { now: new Date(NOW.getTime() - 48 * HOUR) };
    const storage = new InMemoryErrorLoggingStorage(10, () => clock.now);
    await storage.createErrorLog(entry('old', 'network'));
    clock.now = NOW;
    await storage.createErrorLog(entry('fresh', 'network'));

    expect(await storage.clearOldErrorLogs(new Date(NOW.getTime() - 24 * HOUR))).toBe(1);
    expect((await storage.getErrorLogs()).map((log) => log.sourceName)).toEqual(['fresh']);
  });
});
