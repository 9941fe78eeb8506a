export type LogLevel = 'info' | 'warn' | 'error' | 'debug';

export type LogListener = (message: string, source: string, level: LogLevel) => void;

// Mirrors of the console output (admin live view, test collectors)
const listeners = new Set<LogListener>();

/**
 * Register a listener that receives every log line after it is printed.
 * Returns the function that removes it again.
 */
export function registerLogListener(listener: LogListener): () => void {
  listeners.add(listener);
  return () => {
    listeners.delete(listener);
  };
}

export function formatLogTime(date: Date = new Date()): string {
  return date.toLocaleTimeString("en-US", {
    hour: "numeric",
    minute: "2-digit",
    second: "2-digit",
    hour12: true,
  });
}

export function log(message: string, source = "threat-sentinel", level: LogLevel = 'info') {
  const logMessage = `${formatLogTime()} [${source}] ${message}`;

  if (level === 'error') {
    console.error(logMessage);
  } else if (level === 'warn') {
    console.warn(logMessage);
  } else {
    console.log(logMessage);
  }

  for (const listener of listeners) {
    try {
      listener(message, source, level);
    } catch (error) {
      console.error(`${formatLogTime()} [log] Listener failed: ${error instanceof Error ? error.message : String(error)}`);
    }
  }
}
