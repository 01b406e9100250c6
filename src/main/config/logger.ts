/**
 * electron-log v5 Configuration
 *
 * Structured logging for the normalization engine, running under plain Node
 * through the `electron-log/node` entry point.
 * - Structured output (module, message, timestamp, context)
 * - Log levels: DEBUG, INFO, WARN, ERROR
 * - Console transport always on; file transport with rotation when
 *   MAILNORM_LOG_FILE is set
 */

import log from 'electron-log/node';
import { ConfigManager } from './ConfigManager';

const FILE_FORMAT = '[{y}-{m}-{d} {h}:{i}:{s}.{ms}] [{level}] {text}';

/**
 * Check if running in test environment
 */
function isTestEnvironment(): boolean {
  return process.env.NODE_ENV === 'test' || process.env.VITEST === 'true';
}

/**
 * Initialize electron-log transports
 */
function initializeLogger(): void {
  const { config, error } = ConfigManager.load();

  log.transports.console.level = config.logLevel;

  // Tests never write log files
  if (config.logFile && !isTestEnvironment()) {
    const logFile = config.logFile;
    log.transports.file.level = config.logLevel;
    log.transports.file.format = FILE_FORMAT;
    log.transports.file.maxSize = config.logMaxSize;
    log.transports.file.resolvePathFn = () => logFile;
  } else {
    log.transports.file.level = false;
  }

  if (error) {
    log.warn({
      level: 'WARN',
      module: 'Logger',
      message: 'Invalid logging configuration, using defaults',
      timestamp: Date.now(),
      issues: error.issues,
    });
  }
}

// Initialize logger on module load
initializeLogger();

/**
 * Structured logging helper
 * Provides consistent logging interface across the engine
 */
export const logger = {
  /**
   * Log debug message
   * @param module - Module name (e.g., 'MsgParser', 'HeaderDecoder')
   * @param message - Log message
   * @param context - Additional context metadata
   */
  debug: (module: string, message: string, context?: Record<string, unknown>) => {
    log.debug({
      level: 'DEBUG',
      module,
      message,
      timestamp: Date.now(),
      ...context,
    });
  },

  /**
   * Log info message
   */
  info: (module: string, message: string, context?: Record<string, unknown>) => {
    log.info({
      level: 'INFO',
      module,
      message,
      timestamp: Date.now(),
      ...context,
    });
  },

  /**
   * Log warning message
   */
  warn: (module: string, message: string, context?: Record<string, unknown>) => {
    log.warn({
      level: 'WARN',
      module,
      message,
      timestamp: Date.now(),
      ...context,
    });
  },

  /**
   * Log error message
   * @param module - Module name
   * @param message - Log message
   * @param error - Error object (optional)
   * @param context - Additional context metadata
   */
  error: (
    module: string,
    message: string,
    error?: unknown,
    context?: Record<string, unknown>
  ) => {
    const errorData: Record<string, unknown> = {};

    if (error instanceof Error) {
      errorData.error = {
        message: error.message,
        stack: error.stack,
        name: error.name,
      };
    } else if (error !== undefined) {
      errorData.error = String(error);
    }

    log.error({
      level: 'ERROR',
      module,
      message,
      timestamp: Date.now(),
      ...errorData,
      ...context,
    });
  },
};

/**
 * Tag file output with a context ID (the CLI uses the input file name)
 * @param contextId - Identifier for the unit of work being logged
 */
export function setContextId(contextId: string): void {
  log.transports.file.format = `[{y}-{m}-{d} {h}:{i}:{s}.{ms}] [{level}] [${contextId}] {text}`;
}

/**
 * Clear context ID
 */
export function clearContextId(): void {
  log.transports.file.format = FILE_FORMAT;
}

export default log;
