/**
 * Global Error Handler for the normalization CLI
 *
 * - Catch unhandled errors (uncaughtException, unhandledRejection)
 * - Log with context (error category, module, message, timestamp)
 * - Print a short user-facing message on stderr and set a failing exit code
 *
 * The library API never throws for unparsable input; anything reaching this
 * handler is a bug or an environment problem (missing file, bad config).
 *
 * @module main/error-handler
 */

import { logger } from './config/logger';
import { ConfigurationError } from './config/ConfigManager';
import { ContainerParseError, EmailParseError } from './email/errors';

/**
 * Error severity levels for user-facing messages
 */
export enum ErrorSeverity {
  /** Processing can continue with the next file */
  WARNING = 'warning',

  /** Operation failed but the process is stable */
  ERROR = 'error',

  /** Process state is unknown, stop as soon as possible */
  CRITICAL = 'critical',
}

/**
 * Error categories for better error handling
 */
export enum ErrorCategory {
  /** Outlook container could not be opened */
  CONTAINER_PARSE = 'container_parse',

  /** RFC-822 text could not be parsed (or neither format worked) */
  TEXT_PARSE = 'text_parse',

  /** Requested attachment missing or unwritable */
  ATTACHMENT = 'attachment',

  /** Configuration errors */
  CONFIGURATION = 'configuration',

  /** File system errors */
  FILESYSTEM = 'filesystem',

  /** Unknown/uncategorized errors */
  UNKNOWN = 'unknown',
}

/**
 * Structured error information for logging
 */
export interface ErrorInfo {
  category: ErrorCategory;
  severity: ErrorSeverity;

  /** User-friendly error message (non-technical) */
  userMessage: string;

  /** Technical error message for logging */
  technicalMessage: string;

  /** Module where error occurred */
  module: string;

  error: Error;
  context?: Record<string, unknown>;
  timestamp: number;
}

/**
 * User-friendly error messages by error category
 */
const USER_FRIENDLY_MESSAGES: Record<ErrorCategory, string> = {
  [ErrorCategory.CONTAINER_PARSE]: 'The Outlook message could not be opened.',
  [ErrorCategory.TEXT_PARSE]: 'The email could not be read. Check that it is an Outlook .msg or RFC-822 file.',
  [ErrorCategory.ATTACHMENT]: 'The attachment could not be found in this email.',
  [ErrorCategory.CONFIGURATION]: 'Invalid configuration. Check the MAILNORM_* environment variables.',
  [ErrorCategory.FILESYSTEM]: 'File access failed. Check the path and its permissions.',
  [ErrorCategory.UNKNOWN]: 'An unexpected error occurred.',
};

/**
 * Destination for user-facing messages
 */
export type MessageSink = (message: string) => void;

/**
 * Global error handler class
 *
 * Registers handlers for:
 * - uncaughtException: Synchronous errors in Node.js
 * - unhandledRejection: Unhandled Promise rejections
 */
export class GlobalErrorHandler {
  private errorCount = 0;
  private readonly MAX_ERRORS_BEFORE_EXIT = 10;
  private errorTimestamps: number[] = [];
  private sink: MessageSink = (message) => {
    process.stderr.write(`${message}\n`);
  };

  /**
   * Initialize global error handlers
   *
   * Should be called once during CLI startup.
   */
  initialize(): void {
    process.on('uncaughtException', (error: Error) => this.handleUncaughtException(error));
    process.on('unhandledRejection', (reason: unknown) => this.handleUnhandledRejection(reason));

    logger.debug('ErrorHandler', 'Global error handlers registered');
  }

  /**
   * Redirect user-facing messages (tests capture them)
   */
  setMessageSink(sink: MessageSink): void {
    this.sink = sink;
  }

  /**
   * Handle uncaught exceptions
   *
   * The process keeps its exit code set to 1 and stops once errors loop.
   */
  private handleUncaughtException(error: Error): void {
    const category = this.categorizeError(error);
    const errorInfo: ErrorInfo = {
      category,
      severity: ErrorSeverity.CRITICAL,
      userMessage: USER_FRIENDLY_MESSAGES[category],
      technicalMessage: error.message || 'Unknown error',
      module: 'Process',
      error,
      timestamp: Date.now(),
    };

    logger.error('ErrorHandler', 'Uncaught exception', error, {
      category: errorInfo.category,
      severity: errorInfo.severity,
      module: errorInfo.module,
    });

    this.trackError();
    this.showErrorMessage(errorInfo);
    process.exitCode = 1;

    // Exit if too many errors occur (prevent error loops)
    if (this.errorCount >= this.MAX_ERRORS_BEFORE_EXIT) {
      logger.error('ErrorHandler', 'Too many errors, exiting');
      process.exit(1);
    }
  }

  /**
   * Handle unhandled promise rejections
   *
   * @param reason - Rejection reason (error or other value)
   */
  private handleUnhandledRejection(reason: unknown): void {
    const error = reason instanceof Error ? reason : new Error(String(reason));
    const category = this.categorizeError(error);

    const errorInfo: ErrorInfo = {
      category,
      severity: ErrorSeverity.ERROR,
      userMessage: USER_FRIENDLY_MESSAGES[category],
      technicalMessage: error.message || 'Unhandled promise rejection',
      module: 'Process',
      error,
      timestamp: Date.now(),
    };

    logger.error('ErrorHandler', 'Unhandled promise rejection', error, {
      category: errorInfo.category,
      severity: errorInfo.severity,
      module: errorInfo.module,
    });

    this.trackError();
    this.showErrorMessage(errorInfo);
    process.exitCode = 1;
  }

  private showErrorMessage(errorInfo: ErrorInfo): void {
    this.sink(`Error: ${errorInfo.userMessage}`);
  }

  /**
   * Categorize error by type first, then by message keywords
   *
   * @param error - Error object to categorize
   * @returns Error category
   */
  categorizeError(error: Error): ErrorCategory {
    if (error instanceof ContainerParseError) {
      return ErrorCategory.CONTAINER_PARSE;
    }
    if (error instanceof EmailParseError) {
      return ErrorCategory.TEXT_PARSE;
    }
    if (error instanceof ConfigurationError) {
      return ErrorCategory.CONFIGURATION;
    }

    const message = error.message.toLowerCase();

    if (
      message.includes('enoent') ||
      message.includes('eacces') ||
      message.includes('eisdir') ||
      message.includes('no such file')
    ) {
      return ErrorCategory.FILESYSTEM;
    }

    if (message.includes('attachment')) {
      return ErrorCategory.ATTACHMENT;
    }

    if (
      message.includes('email') ||
      message.includes('parse') ||
      message.includes('mime')
    ) {
      return ErrorCategory.TEXT_PARSE;
    }

    if (message.includes('config') || message.includes('environment')) {
      return ErrorCategory.CONFIGURATION;
    }

    return ErrorCategory.UNKNOWN;
  }

  /**
   * Track error occurrences to detect error loops
   */
  private trackError(): void {
    this.errorCount++;
    const now = Date.now();
    this.errorTimestamps.push(now);

    // Remove timestamps older than 1 minute
    this.errorTimestamps = this.errorTimestamps.filter((timestamp) => now - timestamp < 60000);

    if (this.errorTimestamps.length > 5) {
      logger.warn('ErrorHandler', 'High error rate detected', {
        errorCount: this.errorCount,
        recentErrors: this.errorTimestamps.length,
      });
    }
  }

  /**
   * Manually report an error with context
   *
   * @param error - Error object
   * @param category - Error category
   * @param module - Module where error occurred
   * @param context - Additional context
   * @returns Structured information about the reported error
   */
  reportError(
    error: Error,
    category: ErrorCategory,
    module: string,
    context?: Record<string, unknown>
  ): ErrorInfo {
    const errorInfo: ErrorInfo = {
      category,
      severity: this.determineSeverity(category),
      userMessage: USER_FRIENDLY_MESSAGES[category],
      technicalMessage: error.message,
      module,
      error,
      context,
      timestamp: Date.now(),
    };

    logger.error(module, errorInfo.technicalMessage, error, {
      category: errorInfo.category,
      severity: errorInfo.severity,
      ...context,
    });

    this.trackError();

    if (errorInfo.severity !== ErrorSeverity.WARNING) {
      this.showErrorMessage(errorInfo);
    }

    return errorInfo;
  }

  /**
   * Parse failures only affect one file; everything else fails the operation
   */
  private determineSeverity(category: ErrorCategory): ErrorSeverity {
    if (category === ErrorCategory.CONTAINER_PARSE || category === ErrorCategory.TEXT_PARSE) {
      return ErrorSeverity.WARNING;
    }
    if (category === ErrorCategory.CONFIGURATION) {
      return ErrorSeverity.CRITICAL;
    }
    return ErrorSeverity.ERROR;
  }
}

// Export singleton instance
export const errorHandler = new GlobalErrorHandler();

export default errorHandler;
