/**
 * Observability primitives shared by every module.
 *
 * Components take a Logger and a Metrics collector through their options;
 * the defaults write JSON lines to the console and drop metrics.
 */

/**
 * Logger interface for observability
 */
export interface Logger {
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  debug(message: string, context?: Record<string, unknown>): void;
}

/**
 * Metrics collector interface for observability
 */
export interface Metrics {
  incrementCounter(name: string, tags?: Record<string, string>): void;
  recordDuration(name: string, durationMs: number, tags?: Record<string, string>): void;
  recordGauge(name: string, value: number, tags?: Record<string, string>): void;
}

type Level = 'info' | 'warn' | 'error' | 'debug';

const WRITERS: Record<Level, (line: string) => void> = {
  info: (line) => console.log(line),
  warn: (line) => console.warn(line),
  error: (line) => console.error(line),
  debug: (line) => console.debug(line),
};

/**
 * Create a JSON-line console logger tagged with a module name
 */
export function createLogger(module: string): Logger {
  const write = (level: Level, message: string, context?: Record<string, unknown>): void => {
    WRITERS[level](
      JSON.stringify({ level, module, message, ...context, timestamp: new Date().toISOString() })
    );
  };

  return {
    info: (message, context) => write('info', message, context),
    warn: (message, context) => write('warn', message, context),
    error: (message, context) => write('error', message, context),
    debug: (message, context) => write('debug', message, context),
  };
}

/**
 * Logger that discards everything
 */
export const silentLogger: Logger = {
  info: () => { /* no-op */ },
  warn: () => { /* no-op */ },
  error: () => { /* no-op */ },
  debug: () => { /* no-op */ },
};

/**
 * Default no-op metrics implementation
 */
export const noopMetrics: Metrics = {
  incrementCounter: () => { /* no-op */ },
  recordDuration: () => { /* no-op */ },
  recordGauge: () => { /* no-op */ },
};

/**
 * Observability options accepted by components
 */
export interface Observability {
  logger?: Logger | undefined;
  metrics?: Metrics | undefined;
}

/**
 * Sleep utility shared by pacing and polling code
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
