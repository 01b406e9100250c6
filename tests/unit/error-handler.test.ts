/**
 * Unit tests for GlobalErrorHandler
 *
 * - Catch unhandled errors (uncaughtException, unhandledRejection)
 * - Log with structured context
 * - Categorize engine errors and print user-facing messages
 * - Error rate tracking
 *
 * @test: unit/error-handler
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { GlobalErrorHandler, ErrorSeverity, ErrorCategory } from '@/error-handler';
import { logger } from '@/config/logger';
import { ConfigurationError } from '@/config/ConfigManager';
import { ContainerParseError, ParseFailure, TextParseError } from '@/email/errors';

vi.mock('@/config/logger', () => ({
  logger: {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

type ProcessListener = (...args: unknown[]) => void;

describe('GlobalErrorHandler', () => {
  let handler: GlobalErrorHandler;
  let messages: string[];

  beforeEach(() => {
    vi.clearAllMocks();
    handler = new GlobalErrorHandler();
    messages = [];
    handler.setMessageSink((message) => messages.push(message));
  });

  afterEach(() => {
    process.exitCode = undefined;
    vi.restoreAllMocks();
  });

  function registeredListeners(): Map<string, ProcessListener> {
    const listeners = new Map<string, ProcessListener>();
    const processOnSpy = vi.spyOn(process, 'on').mockImplementation((event, listener) => {
      listeners.set(String(event), listener);
      return process;
    });

    handler.initialize();
    processOnSpy.mockRestore();
    return listeners;
  }

  describe('initialize', () => {
    it('should register global error handlers', () => {
      const listeners = registeredListeners();

      expect([...listeners.keys()]).toEqual(['uncaughtException', 'unhandledRejection']);
      expect(logger.debug).toHaveBeenCalledWith('ErrorHandler', 'Global error handlers registered');
    });
  });

  describe('uncaught exceptions', () => {
    it('should log, print a message and set a failing exit code', () => {
      const listener = registeredListeners().get('uncaughtException');
      const error = new Error('ENOENT: no such file or directory');

      listener?.(error);

      expect(logger.error).toHaveBeenCalledWith('ErrorHandler', 'Uncaught exception', error, {
        category: ErrorCategory.FILESYSTEM,
        severity: ErrorSeverity.CRITICAL,
        module: 'Process',
      });
      expect(messages).toEqual(['Error: File access failed. Check the path and its permissions.']);
      expect(process.exitCode).toBe(1);
    });
  });

  describe('unhandled rejections', () => {
    it('should wrap non-Error reasons', () => {
      const listener = registeredListeners().get('unhandledRejection');

      listener?.('plain reason');

      expect(logger.error).toHaveBeenCalledWith(
        'ErrorHandler',
        'Unhandled promise rejection',
        expect.objectContaining({ message: 'plain reason' }),
        expect.objectContaining({ category: ErrorCategory.UNKNOWN, severity: ErrorSeverity.ERROR })
      );
      expect(messages).toEqual(['Error: An unexpected error occurred.']);
      expect(process.exitCode).toBe(1);
    });
  });

  describe('categorizeError', () => {
    it('should recognize engine error types', () => {
      const containerError = new ContainerParseError('bad container');
      const textError = new TextParseError('no headers');

      expect(handler.categorizeError(containerError)).toBe(ErrorCategory.CONTAINER_PARSE);
      expect(handler.categorizeError(textError)).toBe(ErrorCategory.TEXT_PARSE);
      expect(handler.categorizeError(new ParseFailure('x.msg', containerError, textError))).toBe(
        ErrorCategory.TEXT_PARSE
      );
      expect(handler.categorizeError(new ConfigurationError('Invalid configuration'))).toBe(
        ErrorCategory.CONFIGURATION
      );
    });

    it('should fall back to message keywords', () => {
      expect(handler.categorizeError(new Error('EACCES: permission denied'))).toBe(ErrorCategory.FILESYSTEM);
      expect(handler.categorizeError(new Error('Attachment report.pdf not found'))).toBe(ErrorCategory.ATTACHMENT);
      expect(handler.categorizeError(new Error('Cannot parse MIME boundary'))).toBe(ErrorCategory.TEXT_PARSE);
      expect(handler.categorizeError(new Error('Bad config value'))).toBe(ErrorCategory.CONFIGURATION);
      expect(handler.categorizeError(new Error('boom'))).toBe(ErrorCategory.UNKNOWN);
    });
  });

  describe('reportError', () => {
    it('should log with context and show the message for errors', () => {
      const error = new Error('Attachment logo.png not found in a.eml');

      const info = handler.reportError(error, ErrorCategory.ATTACHMENT, 'CLI', { name: 'logo.png' });

      expect(info.severity).toBe(ErrorSeverity.ERROR);
      expect(logger.error).toHaveBeenCalledWith('CLI', 'Attachment logo.png not found in a.eml', error, {
        category: ErrorCategory.ATTACHMENT,
        severity: ErrorSeverity.ERROR,
        name: 'logo.png',
      });
      expect(messages).toEqual(['Error: The attachment could not be found in this email.']);
    });

    it('should treat parse errors as warnings without a message', () => {
      const info = handler.reportError(new TextParseError('empty'), ErrorCategory.TEXT_PARSE, 'CLI');

      expect(info.severity).toBe(ErrorSeverity.WARNING);
      expect(messages).toEqual([]);
    });

    it('should treat configuration errors as critical', () => {
      const info = handler.reportError(new ConfigurationError('bad'), ErrorCategory.CONFIGURATION, 'Config');

      expect(info.severity).toBe(ErrorSeverity.CRITICAL);
      expect(messages).toHaveLength(1);
    });
  });

  describe('error rate tracking', () => {
    it('should count errors and warn when the rate is high', () => {
      for (let i = 0; i < 6; i++) {
        handler.reportError(new Error(`failure ${i}`), ErrorCategory.UNKNOWN, 'Test');
      }

      expect(logger.warn).toHaveBeenCalledWith('ErrorHandler', 'High error rate detected', {
        errorCount: 6,
        recentErrors: 6,
      });
    });

    it('should not warn at five errors', () => {
      for (let i = 0; i < 5; i++) {
        handler.reportError(new Error(`failure ${i}`), ErrorCategory.UNKNOWN, 'Test');
      }

      expect(logger.warn).not.toHaveBeenCalledWith('ErrorHandler', 'High error rate detected', expect.anything());
    });
  });
});
