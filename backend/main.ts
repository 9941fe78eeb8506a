import { loadDefaultSources } from 'backend/config/default-sources';
import { loadSettings } from 'backend/config/settings';
import { closeDb } from 'backend/db/db';
import { ErrorLogger } from 'backend/services/error-logging/error-logger';
import { toError } from 'backend/services/error-logging/errors';
import { InMemoryErrorLoggingStorage } from 'backend/services/error-logging/storage';
import { ThreatRadarEngine } from 'backend/services/threat-radar/engine';
import { log } from 'backend/utils/log';

async function main(): Promise<void> {
  const settings = loadSettings();
  log(`[NODE_ENV] ${settings.nodeEnv}`, 'engine');

  const errorLogger = new ErrorLogger(new InMemoryErrorLoggingStorage());
  const engine = new ThreatRadarEngine({ settings, errorLogger });

  const shutdown = async (signal: string) => {
    log(`Received ${signal}, shutting down`, 'engine');
    engine.stopMonitoring();
    try {
      await closeDb();
    } catch (error) {
      log(`Error closing database: ${toError(error).message}`, 'db', 'error');
    }
    process.exit(0);
  };

  process.once('SIGINT', () => void shutdown('SIGINT'));
  process.once('SIGTERM', () => void shutdown('SIGTERM'));

  await engine.startMonitoring(() => loadDefaultSources());
}

main().catch((error: unknown) => {
  log(`Startup failed: ${toError(error).message}`, 'engine', 'error');
  process.exit(1);
});
