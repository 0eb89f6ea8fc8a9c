/**
 * Error taxonomy shared across the CLI
 */

export class ReviewError extends Error {
  constructor(message: string, public operation: string, cause?: Error) {
    super(message, cause ? { cause } : undefined);
    this.name = 'ReviewError';
  }
}

/** Missing or invalid credential/settings. Fatal before any network call. */
export class ConfigError extends ReviewError {
  constructor(message: string, public issues: string[] = []) {
    super(message, 'config');
    this.name = 'ConfigError';
  }
}

/** Malformed or incomplete input file. Fatal before any network call. */
export class InputError extends ReviewError {
  constructor(message: string, public filePath: string, cause?: Error) {
    super(message, 'input', cause);
    this.name = 'InputError';
  }
}

export class ServiceError extends ReviewError {
  status?: number;

  constructor(message: string, operation: string, cause?: Error, status?: number) {
    super(message, operation, cause);
    this.name = 'ServiceError';
    this.status = status;
  }
}

export class ServiceTimeoutError extends ServiceError {
  constructor(operation: string, timeoutMs: number) {
    super(`Operation '${operation}' timed out after ${timeoutMs}ms`, operation);
    this.name = 'ServiceTimeoutError';
  }
}

/** Model text without recognizable sections. Always recovered by the parser. */
export class ParseError extends ReviewError {
  constructor(message: string, public rawText: string) {
    super(message, 'parse');
    this.name = 'ParseError';
  }
}

export class PipelineAbortedError extends ReviewError {
  constructor() {
    super('Review pipeline was aborted before the report was complete', 'pipeline');
    this.name = 'PipelineAbortedError';
  }
}
