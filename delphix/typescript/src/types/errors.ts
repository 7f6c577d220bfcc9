/**
 * Error types for the Delphix clients.
 * @module errors
 */

/**
 * Delphix error kinds for categorizing errors.
 */
export enum DelphixErrorKind {
  // Configuration errors
  InvalidConfiguration = 'invalid_configuration',

  // Authentication/Authorization errors
  LoginFailed = 'login_failed',
  Unauthorized = 'unauthorized',
  Forbidden = 'forbidden',

  // Request errors
  ValidationError = 'validation_error',
  UndefinedOperation = 'undefined_operation',

  // Resource errors
  NotFound = 'not_found',
  Conflict = 'conflict',

  // Engine-reported failures (ErrorResult envelopes)
  EngineError = 'engine_error',

  // Network errors
  ConnectionFailed = 'connection_failed',
  Timeout = 'timeout',
  NetworkError = 'network_error',

  // Server errors
  InternalError = 'internal_error',
  BadGateway = 'bad_gateway',
  ServiceUnavailable = 'service_unavailable',

  // Response errors
  DeserializationError = 'deserialization_error',

  // Generic
  Unknown = 'unknown',
}

/**
 * Delphix API error with detailed information.
 */
export class DelphixError extends Error {
  /** Error kind */
  public readonly kind: DelphixErrorKind;
  /** HTTP status code */
  public readonly statusCode?: number;
  /** Engine error identifier (e.g. "exception.jetstream.bookmark.not.found") */
  public readonly errorId?: string;
  /** Underlying cause */
  public readonly cause?: Error;

  constructor(
    kind: DelphixErrorKind,
    message: string,
    options?: {
      statusCode?: number;
      errorId?: string;
      cause?: Error;
    }
  ) {
    super(message);
    this.name = 'DelphixError';
    this.kind = kind;
    this.statusCode = options?.statusCode;
    this.errorId = options?.errorId;
    this.cause = options?.cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, DelphixError);
    }
  }

  /**
   * Returns true when the engine could not be reached at all.
   */
  isConnectivityError(): boolean {
    return [
      DelphixErrorKind.ConnectionFailed,
      DelphixErrorKind.Timeout,
      DelphixErrorKind.NetworkError,
    ].includes(this.kind);
  }

  /**
   * Creates an error from an HTTP status code and response message.
   */
  static fromResponse(status: number, message: string): DelphixError {
    return new DelphixError(DelphixError.kindFromStatus(status), message, {
      statusCode: status,
    });
  }

  /**
   * Maps HTTP status code to error kind.
   */
  private static kindFromStatus(status: number): DelphixErrorKind {
    switch (status) {
      case 400:
        return DelphixErrorKind.ValidationError;
      case 401:
        return DelphixErrorKind.Unauthorized;
      case 403:
        return DelphixErrorKind.Forbidden;
      case 404:
        return DelphixErrorKind.NotFound;
      case 409:
        return DelphixErrorKind.Conflict;
      case 500:
        return DelphixErrorKind.InternalError;
      case 502:
        return DelphixErrorKind.BadGateway;
      case 503:
        return DelphixErrorKind.ServiceUnavailable;
      default:
        return DelphixErrorKind.Unknown;
    }
  }

  // Convenience factory methods

  /**
   * Creates a configuration error.
   */
  static configuration(message: string): DelphixError {
    return new DelphixError(DelphixErrorKind.InvalidConfiguration, message);
  }

  /**
   * Creates an error for an ErrorResult envelope returned by the engine.
   */
  static engine(details: string, errorId?: string): DelphixError {
    return new DelphixError(DelphixErrorKind.EngineError, details, { errorId });
  }

  /**
   * Creates an error for an operation name the step does not define.
   */
  static undefinedOperation(message: string): DelphixError {
    return new DelphixError(DelphixErrorKind.UndefinedOperation, message);
  }

  /**
   * Creates a timeout error.
   */
  static timeout(message: string): DelphixError {
    return new DelphixError(DelphixErrorKind.Timeout, message);
  }

  /**
   * Creates a network error.
   */
  static network(message: string, cause?: Error): DelphixError {
    return new DelphixError(DelphixErrorKind.NetworkError, message, { cause });
  }

  /**
   * Creates a deserialization error.
   */
  static deserialization(message: string): DelphixError {
    return new DelphixError(DelphixErrorKind.DeserializationError, message);
  }

  /**
   * Formats the error for display.
   */
  toString(): string {
    let result = `[${this.kind}] ${this.message}`;
    if (this.statusCode) {
      result += ` (HTTP ${this.statusCode})`;
    }
    if (this.errorId) {
      result += ` [error_id: ${this.errorId}]`;
    }
    return result;
  }
}

/**
 * Type guard for DelphixError.
 */
export function isDelphixError(error: unknown): error is DelphixError {
  return error instanceof DelphixError;
}
