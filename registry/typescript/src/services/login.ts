/**
 * Registry login verification.
 *
 * Mirrors what `docker login` checks against `/v2/`: the probe decides
 * between the token flow and plain Basic auth, and the credentials must be
 * accepted by whichever the registry uses.
 *
 * @module services/login
 */

import type { Logger } from '@devops-console/logging';
import { NoopLogger } from '@devops-console/logging';
import { resolveRegistryOptions, type RegistryOptions } from '../config.js';
import { normalizeServerAddress, withScheme, type RegistryDeps } from '../client.js';
import { HttpTransport } from '../transport/http.js';
import { challengeScheme, parseAuthChallenge } from '../auth/challenge.js';
import { TokenNegotiator } from '../auth/token.js';
import { SecretString, basicAuthorization, type RegistryCredentials } from '../auth/secret.js';
import type { AuthInfo, LoginResult } from '../types/index.js';
import { RegistryError, RegistryErrorKind } from '../errors.js';

/** Status reported for accepted credentials. */
export const LOGIN_SUCCEEDED = 'Login Succeeded';

/**
 * Collaborators of {@link verifyRegistryLogin}.
 */
export interface LoginDeps extends RegistryDeps {
  options?: Partial<RegistryOptions>;
}

/**
 * Verifies that a registry accepts the given credentials.
 *
 * @throws {RegistryError} `AuthenticationFailed` when the credentials are
 * refused; transport and protocol errors otherwise.
 */
export async function verifyRegistryLogin(authInfo: AuthInfo, deps: LoginDeps = {}): Promise<LoginResult> {
  const logger: Logger = deps.logger ?? new NoopLogger();
  const options = resolveRegistryOptions(deps.options);

  if (authInfo.username === '' || authInfo.password === '') {
    throw RegistryError.authenticationFailed('username and password are required');
  }

  const credentials: RegistryCredentials = {
    username: authInfo.username,
    password: new SecretString(authInfo.password),
  };
  const transport =
    deps.transport ??
    new HttpTransport({
      timeout: options.timeout,
      insecureSkipVerify: options.insecureSkipVerify,
      dispatcher: deps.dispatcher,
      userAgent: options.userAgent,
      headers: options.headers,
      logger,
    });

  try {
    return await login(transport, authInfo.serverHost, credentials, options.useSSL, logger);
  } finally {
    if (deps.transport === undefined) {
      await transport.close();
    }
  }
}

async function login(
  transport: HttpTransport,
  serverHost: string,
  credentials: RegistryCredentials,
  useSSL: boolean,
  logger: Logger
): Promise<LoginResult> {
  const pingUrl = `${withScheme(normalizeServerAddress(serverHost), useSSL)}/v2/`;
  logger.info('verifying registry login', { url: pingUrl, username: credentials.username });

  const probe = await transport.get(pingUrl);
  if (probe.status === 200) {
    await basicLogin(transport, pingUrl, credentials);
    return { status: LOGIN_SUCCEEDED };
  }
  if (probe.status !== 401) {
    throw RegistryError.unexpectedStatus(probe.status, pingUrl);
  }

  const header = probe.headers['www-authenticate'];
  if (challengeScheme(header) === 'basic') {
    await basicLogin(transport, pingUrl, credentials);
    return { status: LOGIN_SUCCEEDED };
  }

  const challenge = parseAuthChallenge(header, pingUrl);
  const negotiator = new TokenNegotiator(transport, credentials, logger);
  try {
    await negotiator.exchange({ ...challenge, scope: [] });
  } catch (error) {
    throw refusal(error);
  }
  return { status: LOGIN_SUCCEEDED };
}

async function basicLogin(transport: HttpTransport, url: string, credentials: RegistryCredentials): Promise<void> {
  const response = await transport.get(url, { authorization: basicAuthorization(credentials) });
  if (response.status === 200) {
    return;
  }
  throw refusal(RegistryError.unexpectedStatus(response.status, url));
}

function refusal(error: unknown): unknown {
  if (
    error instanceof RegistryError &&
    error.kind === RegistryErrorKind.UnexpectedStatus &&
    (error.statusCode === 401 || error.statusCode === 403)
  ) {
    return RegistryError.authenticationFailed('registry refused the credentials', error.statusCode);
  }
  return error;
}
