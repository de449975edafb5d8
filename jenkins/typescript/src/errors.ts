/**
 * Error types for the Jenkins client.
 * @module errors
 */

/**
 * Error kinds for categorizing Jenkins errors.
 */
export enum JenkinsErrorKind {
  // API errors (HTTP status codes)
  /** Bad request (400). */
  BadRequest = 'bad_request',
  /** Unauthorized (401). */
  Unauthorized = 'unauthorized',
  /** Forbidden (403). */
  Forbidden = 'forbidden',
  /** Not found (404). */
  NotFound = 'not_found',
  /** Conflict (409). */
  Conflict = 'conflict',
  /** Internal server error (500). */
  InternalError = 'internal_error',
  /** Service unavailable (502, 503, 504). */
  ServiceUnavailable = 'service_unavailable',
  /** Any other error status. */
  UnexpectedStatus = 'unexpected_status',

  // Client errors
  /** Invalid client configuration. */
  InvalidConfiguration = 'invalid_configuration',
  /** A required argument was empty. */
  MissingParameter = 'missing_parameter',
  /** Credential provider could not supply credentials. */
  CredentialsUnavailable = 'credentials_unavailable',
  /** Build trigger response carried no queue location. */
  NoQueueLocation = 'no_queue_location',
  /** Queue location could not be parsed. */
  InvalidQueueLocation = 'invalid_queue_location',
  /** Network connection failed. */
  Network = 'network',
  /** Request timeout. */
  Timeout = 'timeout',
  /** Response body could not be decoded. */
  Deserialization = 'deserialization',

  // Crumb errors
  /** Failed to fetch CSRF crumb. */
  CrumbFetchFailed = 'crumb_fetch_failed',

  // Generic
  /** Unknown error. */
  Unknown = 'unknown',
}

/**
 * Jenkins API error with detailed information.
 */
export class JenkinsError extends Error {
  /** Error kind. */
  public readonly kind: JenkinsErrorKind;
  /** HTTP status code. */
  public readonly statusCode?: number;
  /** URL of the request that failed. */
  public readonly url?: string;

  constructor(
    kind: JenkinsErrorKind,
    message: string,
    options?: {
      statusCode?: number;
      url?: string;
      cause?: unknown;
    }
  ) {
    super(message, { cause: options?.cause });
    this.name = 'JenkinsError';
    this.kind = kind;
    this.statusCode = options?.statusCode;
    this.url = options?.url;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, JenkinsError);
    }
  }

  /**
   * Returns true if this error is retryable.
   * The client never retries; this is a hint for callers.
   */
  isRetryable(): boolean {
    return [
      JenkinsErrorKind.InternalError,
      JenkinsErrorKind.ServiceUnavailable,
      JenkinsErrorKind.Network,
      JenkinsErrorKind.Timeout,
    ].includes(this.kind);
  }

  /**
   * Creates an error from an HTTP error status.
   */
  static fromResponse(status: number, message: string, url?: string): JenkinsError {
    return new JenkinsError(JenkinsError.kindFromStatus(status), message, {
      statusCode: status,
      url,
    });
  }

  /**
   * Maps HTTP status code to error kind.
   */
  private static kindFromStatus(status: number): JenkinsErrorKind {
    switch (status) {
      case 400:
        return JenkinsErrorKind.BadRequest;
      case 401:
        return JenkinsErrorKind.Unauthorized;
      case 403:
        return JenkinsErrorKind.Forbidden;
      case 404:
        return JenkinsErrorKind.NotFound;
      case 409:
        return JenkinsErrorKind.Conflict;
      case 500:
        return JenkinsErrorKind.InternalError;
      case 502:
      case 503:
      case 504:
        return JenkinsErrorKind.ServiceUnavailable;
      default:
        return JenkinsErrorKind.UnexpectedStatus;
    }
  }

  // Convenience factory methods

  static configuration(message: string): JenkinsError {
    return new JenkinsError(JenkinsErrorKind.InvalidConfiguration, message);
  }

  static missingParameter(message: string): JenkinsError {
    return new JenkinsError(JenkinsErrorKind.MissingParameter, message);
  }

  static credentialsUnavailable(cause: unknown): JenkinsError {
    const reason = cause instanceof Error ? cause.message : String(cause);
    return new JenkinsError(JenkinsErrorKind.CredentialsUnavailable, `Failed to get credentials: ${reason}`, {
      cause,
    });
  }

  static network(url: string, cause: unknown): JenkinsError {
    const reason = cause instanceof Error ? cause.message : String(cause);
    return new JenkinsError(JenkinsErrorKind.Network, `Request to ${url} failed: ${reason}`, { url, cause });
  }

  static timeout(url: string, timeoutMs: number): JenkinsError {
    return new JenkinsError(JenkinsErrorKind.Timeout, `Request timeout after ${timeoutMs}ms`, { url });
  }

  static deserialization(message: string, cause?: unknown): JenkinsError {
    return new JenkinsError(JenkinsErrorKind.Deserialization, message, { cause });
  }

  /**
   * Formats the error for display.
   */
  toString(): string {
    let result = `[${this.kind}] ${this.message}`;
    if (this.statusCode) {
      result += ` (HTTP ${this.statusCode})`;
    }
    return result;
  }
}

/**
 * Type guard for JenkinsError.
 */
export function isJenkinsError(error: unknown): error is JenkinsError {
  return error instanceof JenkinsError;
}
