/**
 * Bearer token negotiation for the Docker Registry HTTP API v2.
 *
 * The negotiator probes the target URL without credentials. A 200 means the
 * registry is open and the empty token is returned; a 401 Bearer challenge is
 * exchanged for a token at the realm; a 401 Basic challenge fails fast.
 *
 * @module auth/token
 */

import { z } from 'zod';
import type { Logger } from '@devops-console/logging';
import { NoopLogger } from '@devops-console/logging';
import type { HttpTransport } from '../transport/http.js';
import type { AuthChallenge, Token } from '../types/index.js';
import { RegistryError } from '../errors.js';
import { parseAuthChallenge } from './challenge.js';
import { basicAuthorization, type RegistryCredentials } from './secret.js';

const tokenResponseSchema = z.object({
  token: z.string().optional(),
  access_token: z.string().optional(),
});

/**
 * Resolves bearer tokens for registry URLs.
 */
export class TokenNegotiator {
  private readonly logger: Logger;

  constructor(
    private readonly transport: HttpTransport,
    private readonly credentials: RegistryCredentials | null,
    logger?: Logger
  ) {
    this.logger = logger ?? new NoopLogger();
  }

  /**
   * Returns a token for `url`, or `''` when the registry needs none.
   *
   * @throws {BasicAuthRequiredError} If the registry asks for Basic auth.
   * @throws {RegistryError} On any other status or an unusable challenge.
   */
  async token(url: string): Promise<Token> {
    const probe = await this.transport.get(url);

    if (probe.status === 200) {
      this.logger.debug('registry requires no token', { url });
      return '';
    }

    if (probe.status !== 401) {
      throw RegistryError.unexpectedStatus(probe.status, url);
    }

    const challenge = parseAuthChallenge(probe.headers['www-authenticate'], url);
    return this.exchange(challenge);
  }

  /**
   * Exchanges a Bearer challenge for a token at its realm.
   *
   * @param challenge - Parsed challenge.
   * @param credentials - Overrides the negotiator's credentials.
   */
  async exchange(challenge: AuthChallenge, credentials = this.credentials): Promise<Token> {
    const realm = new URL(challenge.realm.toString());
    if (challenge.service) {
      realm.searchParams.set('service', challenge.service);
    }
    for (const scope of challenge.scope) {
      realm.searchParams.append('scope', scope);
    }

    const headers: Record<string, string> = {};
    if (credentials) {
      headers['authorization'] = basicAuthorization(credentials);
    }

    const tokenUrl = realm.toString();
    this.logger.debug('requesting registry token', {
      realm: challenge.realm.origin + challenge.realm.pathname,
      service: challenge.service,
      scope: challenge.scope,
      authenticated: credentials !== null,
    });

    const response = await this.transport.get(tokenUrl, headers);
    if (response.status !== 200) {
      throw RegistryError.unexpectedStatus(response.status, tokenUrl);
    }

    let payload: unknown;
    try {
      payload = JSON.parse(response.body.toString('utf8'));
    } catch (error) {
      throw RegistryError.deserialization('Token endpoint returned invalid JSON', error);
    }

    const parsed = tokenResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw RegistryError.tokenResponseInvalid(tokenUrl);
    }

    const token = parsed.data.token || parsed.data.access_token;
    if (!token) {
      throw RegistryError.tokenResponseInvalid(tokenUrl);
    }
    return token;
  }
}
