/**
 * Error types for the registry client.
 * @module errors
 */

/**
 * Error kinds for categorizing registry errors.
 */
export enum RegistryErrorKind {
  // Configuration errors
  /** Invalid client configuration. */
  InvalidConfiguration = 'invalid_configuration',

  // Transport errors
  /** Connection or protocol failure. */
  NetworkError = 'network_error',
  /** Request timeout. */
  Timeout = 'timeout',
  /** Status code outside the accepted set for the operation. */
  UnexpectedStatus = 'unexpected_status',

  // Authentication errors
  /** Registry answered with a Basic challenge. */
  BasicAuthRequired = 'basic_auth_required',
  /** 401 without a usable WWW-Authenticate header. */
  ChallengeInvalid = 'challenge_invalid',
  /** Token endpoint reply carried neither token nor access_token. */
  TokenResponseInvalid = 'token_response_invalid',
  /** Registry refused the supplied credentials. */
  AuthenticationFailed = 'authentication_failed',

  // Input errors
  /** Body could not be decoded. */
  Deserialization = 'deserialization',
  /** Image reference could not be parsed. */
  InvalidReference = 'invalid_reference',
  /** Pull secret is malformed or of the wrong type. */
  InvalidSecret = 'invalid_secret',

  // Generic
  /** Unknown error. */
  Unknown = 'unknown',
}

/**
 * Registry error with detailed information.
 */
export class RegistryError extends Error {
  /** Error kind. */
  public readonly kind: RegistryErrorKind;
  /** HTTP status code. */
  public readonly statusCode?: number;
  /** URL of the request that failed. */
  public readonly url?: string;

  constructor(
    kind: RegistryErrorKind,
    message: string,
    options?: {
      statusCode?: number;
      url?: string;
      cause?: unknown;
    }
  ) {
    super(message, { cause: options?.cause });
    this.name = 'RegistryError';
    this.kind = kind;
    this.statusCode = options?.statusCode;
    this.url = options?.url;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  /**
   * Returns true if a caller may reasonably retry the operation.
   * The client itself never retries.
   */
  isRetryable(): boolean {
    switch (this.kind) {
      case RegistryErrorKind.NetworkError:
      case RegistryErrorKind.Timeout:
        return true;
      case RegistryErrorKind.UnexpectedStatus:
        return this.statusCode === 429 || (this.statusCode !== undefined && this.statusCode >= 500);
      default:
        return false;
    }
  }

  // Convenience factory methods

  static configuration(message: string): RegistryError {
    return new RegistryError(RegistryErrorKind.InvalidConfiguration, message);
  }

  static network(url: string, cause: unknown): RegistryError {
    const reason = cause instanceof Error ? cause.message : String(cause);
    return new RegistryError(RegistryErrorKind.NetworkError, `Request to ${url} failed: ${reason}`, {
      url,
      cause,
    });
  }

  static timeout(url: string, timeoutMs: number): RegistryError {
    return new RegistryError(RegistryErrorKind.Timeout, `Request to ${url} timed out after ${timeoutMs}ms`, {
      url,
    });
  }

  static unexpectedStatus(status: number, url: string): RegistryError {
    return new RegistryError(RegistryErrorKind.UnexpectedStatus, `got status code: ${status}`, {
      statusCode: status,
      url,
    });
  }

  static challengeInvalid(message: string): RegistryError {
    return new RegistryError(RegistryErrorKind.ChallengeInvalid, message, { statusCode: 401 });
  }

  static tokenResponseInvalid(url: string): RegistryError {
    return new RegistryError(
      RegistryErrorKind.TokenResponseInvalid,
      'Token endpoint response contains neither token nor access_token',
      { url }
    );
  }

  static authenticationFailed(message: string, statusCode?: number): RegistryError {
    return new RegistryError(RegistryErrorKind.AuthenticationFailed, message, { statusCode });
  }

  static deserialization(message: string, cause?: unknown): RegistryError {
    return new RegistryError(RegistryErrorKind.Deserialization, message, { cause });
  }

  static invalidReference(reference: string, reason: string): RegistryError {
    return new RegistryError(RegistryErrorKind.InvalidReference, `Invalid image reference "${reference}": ${reason}`);
  }

  static invalidSecret(message: string): RegistryError {
    return new RegistryError(RegistryErrorKind.InvalidSecret, message);
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
 * Raised when a registry answers the probe with a Basic challenge.
 * The bearer flow does not apply to such registries.
 */
export class BasicAuthRequiredError extends RegistryError {
  constructor(url?: string) {
    super(RegistryErrorKind.BasicAuthRequired, 'basic auth required', { statusCode: 401, url });
    this.name = 'BasicAuthRequiredError';
  }
}

/**
 * Type guard for RegistryError.
 */
export function isRegistryError(error: unknown): error is RegistryError {
  return error instanceof RegistryError;
}

/**
 * Type guard for the basic-auth sentinel.
 */
export function isBasicAuthRequired(error: unknown): error is BasicAuthRequiredError {
  return error instanceof BasicAuthRequiredError;
}
