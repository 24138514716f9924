import pino from 'pino';
import type { LogConfig } from './config.js';
import { resolveProjectPath } from './paths.js';

// The viewer owns stdout while it runs, so the CLI defaults to the file target.
function getTransport(config: LogConfig): pino.TransportSingleOptions {
  if (config.target === 'file') {
    return {
      target: 'pino/file',
      options: {
        destination: resolveProjectPath(config.filePath),
        mkdir: true,
      },
    };
  }

  return {
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: 'HH:MM:ss',
      ignore: 'pid,hostname',
      singleLine: true,
      destination: 2, // stderr
    },
  };
}

// Create logger instance with given config
export function createLogger(config: LogConfig): pino.Logger {
  if (config.level === 'silent') {
    return pino({ level: 'silent' });
  }
  return pino({
    level: config.level,
    transport: getTransport(config),
    // The codebase logs error objects under `error` (not `err`).
    // Pino only auto-serializes the `err` key, so register the same
    // serializer for `error` to get message/stack extraction.
    serializers: { error: pino.stdSerializers.err },
  });
}

// Module-level logger instance
// Must be initialized via initLogger() before use
let _logger: pino.Logger | undefined;

// Initialize the global logger; call early in the entry point
export function initLogger(config: LogConfig): pino.Logger {
  _logger = createLogger(config);
  return _logger;
}

// Get the global logger instance
export function getLogger(): pino.Logger {
  if (!_logger) {
    throw new Error('Logger not initialized. Call initLogger() first.');
  }
  return _logger;
}

// Export logger as a getter for convenience
// Will throw if accessed before initLogger()
export const logger = new Proxy({} as pino.Logger, {
  get(_target, prop) {
    const instance = getLogger();
    const value: unknown = Reflect.get(instance, prop);
    return typeof value === 'function' ? value.bind(instance) : value;
  },
});

export default logger;
