/**
 * Error types for the storage client
 */

export class StorageError extends Error {
  code?: string;
  details?: Record<string, unknown>;

  constructor(message: string, code?: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'StorageError';
    this.code = code;
    this.details = details;
  }
}

/**
 * The server answered with a 4xx/5xx status
 */
export class StorageApiError extends StorageError {
  status: number;
  body: unknown;

  constructor(message: string, status: number, body: unknown) {
    super(message, 'API_ERROR', { status });
    this.name = 'StorageApiError';
    this.status = status;
    this.body = body;
  }
}

/**
 * No response was received from the server
 */
export class StorageTransportError extends StorageError {
  url: string;
  reason: string;

  constructor(message: string, url: string, reason: string, code = 'TRANSPORT_ERROR') {
    super(message, code, { url, reason });
    this.name = 'StorageTransportError';
    this.url = url;
    this.reason = reason;
  }
}

export class StorageConnectionError extends StorageTransportError {
  constructor(url: string, reason: string) {
    super(`Connection failed to ${url}: ${reason}`, url, reason, 'CONNECTION_ERROR');
    this.name = 'StorageConnectionError';
  }
}

export class StorageTimeoutError extends StorageTransportError {
  timeoutMs: number;

  constructor(url: string, timeoutMs: number) {
    super(`Request timed out: ${url} after ${timeoutMs}ms`, url, 'timeout', 'TIMEOUT');
    this.name = 'StorageTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

export class StorageSerializationError extends StorageError {
  constructor(reason: string) {
    super(`Could not serialize request body: ${reason}`, 'SERIALIZATION_ERROR', { reason });
    this.name = 'StorageSerializationError';
  }
}

/**
 * The server answered 2xx with a body of the wrong shape
 */
export class StorageDecodeError extends StorageError {
  body: unknown;

  constructor(operation: string, expected: string, body: unknown) {
    super(`Unexpected response to ${operation}: expected ${expected}`, 'DECODE_ERROR', {
      operation,
      expected,
    });
    this.name = 'StorageDecodeError';
    this.body = body;
  }
}

export class ValidationError extends StorageError {
  field: string;
  reason: string;

  constructor(field: string, reason: string) {
    super(`Validation error for ${field}: ${reason}`, 'VALIDATION_ERROR', {
      field,
      reason,
    });
    this.name = 'ValidationError';
    this.field = field;
    this.reason = reason;
  }
}

export class ConfigurationError extends StorageError {
  constructor(message: string) {
    super(message, 'CONFIGURATION_ERROR');
    this.name = 'ConfigurationError';
  }
}

// Type guards
export function isStorageError(error: unknown): error is StorageError {
  return error instanceof StorageError;
}

export function isApiError(error: unknown): error is StorageApiError {
  return error instanceof StorageApiError;
}

export function isTransportError(error: unknown): error is StorageTransportError {
  return error instanceof StorageTransportError;
}

export function isTimeout(error: unknown): error is StorageTimeoutError {
  return error instanceof StorageTimeoutError;
}

/**
 * The storage service reports some missing resources as 400 with a
 * `statusCode: "404"` field in the body.
 */
export function isNotFound(error: unknown): error is StorageApiError {
  if (!(error instanceof StorageApiError)) {
    return false;
  }
  if (error.status === 404) {
    return true;
  }
  const body = error.body;
  return (
    typeof body === 'object' &&
    body !== null &&
    'statusCode' in body &&
    String(body.statusCode) === '404'
  );
}
