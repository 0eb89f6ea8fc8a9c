import winston from 'winston';
import path from 'path';
import fs from 'fs';
import type { BackoffStrategy } from '../types';
import { PipelineAbortedError, ServiceTimeoutError } from '../types';

const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  silent: process.env.NODE_ENV === 'test',
  format: winston.format.combine(
    winston.format.timestamp({
      format: 'YYYY-MM-DD HH:mm:ss'
    }),
    winston.format.errors({ stack: true }),
    winston.format.json()
  ),
  defaultMeta: { service: 'empathetic-review' },
  transports: [
    // stdout is left alone; progress goes to stderr
    new winston.transports.Console({
      stderrLevels: ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'],
      format: winston.format.combine(
        winston.format.colorize(),
        winston.format.simple()
      )
    }),
  ],
});

const logsDir = process.env.LOG_DIR;
if (logsDir) {
  if (!fs.existsSync(logsDir)) {
    fs.mkdirSync(logsDir, { recursive: true });
  }
  logger.add(new winston.transports.File({
    filename: path.join(logsDir, 'error.log'),
    level: 'error'
  }));
  logger.add(new winston.transports.File({
    filename: path.join(logsDir, 'combined.log')
  }));
}

export function setLogLevel(level: string): void {
  logger.level = level;
}

/**
 * Structured logging utility
 */
export class Logger {
  private static instance: Logger;

  static getInstance(): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger();
    }
    return Logger.instance;
  }

  /**
   * Log loading of the input file
   */
  input(operation: string, data: {
    filePath: string;
    success: boolean;
    commentsCount?: number;
    error?: string;
  }) {
    const logData = {
      operation,
      file: data.filePath,
      success: data.success,
      comments: data.commentsCount,
      error: data.error
    };

    if (data.success) {
      logger.info('Input Loaded', logData);
    } else {
      logger.error('Input Rejected', logData);
    }
  }

  /**
   * Log one per-comment analysis
   */
  analysis(data: {
    index: number;
    total: number;
    comment: string;
    success: boolean;
    duration?: number;
    severity?: string;
    error?: string;
  }) {
    const logData = {
      comment: `${data.index + 1}/${data.total}`,
      text: data.comment,
      success: data.success,
      duration: data.duration,
      severity: data.severity,
      error: data.error
    };

    if (data.success) {
      logger.info('Comment Analyzed', logData);
    } else {
      logger.warn('Comment Analysis Degraded', logData);
    }
  }

  /**
   * Log the closing summary call
   */
  summary(data: { success: boolean; duration?: number; error?: string }) {
    const logData = {
      success: data.success,
      duration: data.duration,
      error: data.error
    };

    if (data.success) {
      logger.info('Summary Generated', logData);
    } else {
      logger.warn('Summary Degraded', logData);
    }
  }

  info(message: string, metadata?: Record<string, unknown>) {
    logger.info(message, metadata);
  }

  warn(message: string, metadata?: Record<string, unknown>) {
    logger.warn(message, metadata);
  }

  /**
   * Log performance metrics
   */
  performance(operation: string, duration: number, metadata?: Record<string, unknown>) {
    logger.debug('Performance Metric', {
      operation,
      duration,
      ...metadata
    });
  }

  /**
   * Log errors with context
   */
  error(context: string, error: unknown, metadata?: Record<string, unknown>) {
    const errorMessage = error instanceof Error ? error.message : String(error);
    const stack = error instanceof Error ? error.stack : undefined;

    logger.error('Application Error', {
      context,
      error: errorMessage,
      stack,
      ...metadata
    });
  }
}

export const appLogger = Logger.getInstance();

export function computeBackoffDelay(strategy: BackoffStrategy, baseDelay: number, attempt: number): number {
  return strategy === 'exponential' ? baseDelay * Math.pow(2, attempt) : baseDelay;
}

/**
 * Retry utility with fixed or exponential backoff.
 * `maxRetries` counts extra attempts, so 0 means a single call.
 */
export async function withRetry<T>(
  operation: () => Promise<T>,
  maxRetries: number = 0,
  baseDelay: number = 1000,
  context: string = 'retry-operation',
  strategy: BackoffStrategy = 'exponential'
): Promise<T> {
  let lastError: Error = new Error('Unknown error');

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    try {
      const result = await operation();

      if (attempt > 0) {
        appLogger.performance(`${context}_retry_success`, 0, {
          attempt,
          maxRetries
        });
      }

      return result;
    } catch (error) {
      if (error instanceof PipelineAbortedError) {
        throw error;
      }
      lastError = error instanceof Error ? error : new Error(String(error));

      if (attempt < maxRetries) {
        const delay = computeBackoffDelay(strategy, baseDelay, attempt);
        appLogger.warn(`Retrying ${context}`, {
          attempt: attempt + 1,
          maxRetries,
          delay,
          error: lastError.message
        });

        await new Promise(resolve => setTimeout(resolve, delay));
      }
    }
  }

  if (maxRetries > 0) {
    appLogger.error(`${context}_exhausted_retries`, lastError, {
      maxRetries
    });
  }

  throw lastError;
}

/**
 * Timeout wrapper for operations. `onTimeout` runs when the deadline
 * passes, so the caller can cancel the underlying work.
 */
export async function withTimeout<T>(
  operation: Promise<T>,
  timeoutMs: number,
  context: string = 'timeout-operation',
  onTimeout?: () => void
): Promise<T> {
  return new Promise((resolve, reject) => {
    const timeoutId = setTimeout(() => {
      onTimeout?.();
      reject(new ServiceTimeoutError(context, timeoutMs));
    }, timeoutMs);

    operation
      .then((result) => {
        clearTimeout(timeoutId);
        resolve(result);
      })
      .catch((error: unknown) => {
        clearTimeout(timeoutId);
        reject(error);
      });
  });
}
