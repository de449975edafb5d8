/**
 * Authentication mechanisms for Jenkins API.
 * @module auth
 */

/**
 * Secret string wrapper to prevent accidental exposure.
 */
export class SecretString {
  private readonly value: string;

  constructor(value: string) {
    this.value = value;
  }

  /**
   * Exposes the secret value.
   * Use with caution - avoid logging or displaying.
   */
  expose(): string {
    return this.value;
  }

  toString(): string {
    return '***';
  }

  toJSON(): string {
    return '***';
  }
}

/**
 * Jenkins credentials using username and API token (or password).
 */
export interface JenkinsCredentials {
  username: string;
  token: SecretString;
}

/**
 * Credential provider interface for dynamic credential resolution.
 */
export interface CredentialProvider {
  getCredentials(): Promise<JenkinsCredentials>;
}

/**
 * Static credential provider using fixed credentials.
 */
export class StaticCredentialProvider implements CredentialProvider {
  private readonly credentials: JenkinsCredentials;

  constructor(username: string, token: string) {
    this.credentials = {
      username,
      token: new SecretString(token),
    };
  }

  async getCredentials(): Promise<JenkinsCredentials> {
    return this.credentials;
  }
}

/**
 * Environment variable credential provider. Variables are re-read on every call.
 */
export class EnvCredentialProvider implements CredentialProvider {
  constructor(
    private readonly usernameVar: string = 'JENKINS_USERNAME',
    private readonly tokenVar: string = 'JENKINS_TOKEN',
    private readonly env: NodeJS.ProcessEnv = process.env
  ) {}

  async getCredentials(): Promise<JenkinsCredentials> {
    const username = this.env[this.usernameVar];
    const token = this.env[this.tokenVar];

    if (!username) {
      throw new Error(`Environment variable ${this.usernameVar} not set`);
    }

    if (!token) {
      throw new Error(`Environment variable ${this.tokenVar} not set`);
    }

    return {
      username,
      token: new SecretString(token),
    };
  }
}

/**
 * Formats credentials as an HTTP Basic `Authorization` value.
 */
export function basicAuthorization(credentials: JenkinsCredentials): string {
  const encoded = Buffer.from(`${credentials.username}:${credentials.token.expose()}`).toString('base64');
  return `Basic ${encoded}`;
}
