/**
 * Secret handling for registry credentials.
 * @module auth/secret
 */

/**
 * SecretString wrapper to prevent accidental logging of sensitive values.
 * The value is only accessible via the expose() method.
 */
export class SecretString {
  private readonly value: string;

  constructor(value: string) {
    this.value = value;
  }

  /**
   * Exposes the secret value. Use with caution.
   */
  expose(): string {
    return this.value;
  }

  /**
   * True when the wrapped value is the empty string.
   */
  isEmpty(): boolean {
    return this.value.length === 0;
  }

  toString(): string {
    return '***';
  }

  toJSON(): string {
    return '***';
  }
}

/**
 * Username and password for a registry server.
 */
export interface RegistryCredentials {
  username: string;
  password: SecretString;
}

/**
 * Builds an HTTP Basic `Authorization` header value.
 */
export function basicAuthorization(credentials: RegistryCredentials): string {
  const encoded = Buffer.from(`${credentials.username}:${credentials.password.expose()}`).toString('base64');
  return `Basic ${encoded}`;
}
