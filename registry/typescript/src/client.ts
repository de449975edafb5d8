/**
 * Registry client.
 *
 * One `Registry` is created per registry host and is safe for concurrent
 * use: every operation is a single request/response with no shared state
 * beyond the transport's connection pool.
 *
 * @module client
 */

import type { Dispatcher } from 'undici';
import type { Logger } from '@devops-console/logging';
import { NoopLogger } from '@devops-console/logging';
import { DEFAULT_DOCKER_REGISTRY, resolveRegistryOptions, type RegistryOptions } from './config.js';
import { HttpTransport, type HttpResponse } from './transport/http.js';
import { TokenNegotiator } from './auth/token.js';
import { SecretString, type RegistryCredentials } from './auth/secret.js';
import { ManifestService, MANIFEST_MEDIA_TYPES, type RegistryRequester } from './services/manifest.js';
import { BlobService } from './services/blob.js';
import type { Image, ImageManifest, Token } from './types/index.js';

const PROTOCOL_PATTERN = /^https?:\/\//;

/**
 * Registry server address with optional credentials.
 */
export interface AuthConfig {
  serverAddress: string;
  username?: string;
  password?: SecretString;
}

/**
 * Collaborators of a registry client.
 */
export interface RegistryDeps {
  logger?: Logger;
  /** Dispatcher for the default transport. */
  dispatcher?: Dispatcher;
  /** Replaces the default transport. */
  transport?: HttpTransport;
}

/**
 * Maps an empty or bare "docker.io" address to the canonical Docker Hub registry.
 */
export function normalizeServerAddress(serverAddress: string): string {
  if (serverAddress === '' || serverAddress === 'docker.io') {
    return DEFAULT_DOCKER_REGISTRY;
  }
  return serverAddress;
}

/**
 * Trims trailing slashes and adds a scheme when none is present.
 */
export function withScheme(address: string, useSSL: boolean): string {
  const trimmed = address.replace(/\/+$/, '');
  if (PROTOCOL_PATTERN.test(trimmed)) {
    return trimmed;
  }
  return `${useSSL ? 'https' : 'http'}://${trimmed}`;
}

/**
 * Builds the auth configuration for a registry.
 * Credentials are kept only when username, password and address are all non-empty.
 */
export function getAuthConfig(username: string, password: string, registry: string, logger?: Logger): AuthConfig {
  const serverAddress = normalizeServerAddress(registry);
  if (username !== '' && password !== '' && serverAddress !== '') {
    return { serverAddress, username, password: new SecretString(password) };
  }

  logger?.info('using registry with no authentication', { registry: serverAddress });
  return { serverAddress };
}

/**
 * Client for the Docker Registry HTTP API v2.
 */
export class Registry implements RegistryRequester {
  /** Base URL with scheme, no trailing slash. */
  readonly url: string;
  /** Base URL without scheme. */
  readonly domain: string;
  /** Auth server URL with scheme. */
  readonly authUrl: string;
  readonly options: RegistryOptions;
  readonly logger: Logger;
  readonly manifests: ManifestService;
  readonly blobs: BlobService;

  private readonly credentials: RegistryCredentials | null;
  private readonly transport: HttpTransport;
  private readonly ownsTransport: boolean;
  private readonly negotiator: TokenNegotiator;

  constructor(auth: AuthConfig, options: Partial<RegistryOptions> = {}, deps: RegistryDeps = {}) {
    this.options = resolveRegistryOptions(options);
    this.logger = deps.logger ?? new NoopLogger();

    const serverAddress = normalizeServerAddress(auth.serverAddress);
    const domain =
      this.options.domain === '' || this.options.domain === 'docker.io' ? serverAddress : this.options.domain;

    this.url = withScheme(domain, this.options.useSSL);
    this.authUrl = withScheme(serverAddress, this.options.useSSL);
    this.domain = this.url.replace(PROTOCOL_PATTERN, '');

    this.credentials =
      auth.username && auth.password && !auth.password.isEmpty()
        ? { username: auth.username, password: auth.password }
        : null;

    this.ownsTransport = deps.transport === undefined;
    this.transport =
      deps.transport ??
      new HttpTransport({
        timeout: this.options.timeout,
        insecureSkipVerify: this.options.insecureSkipVerify,
        dispatcher: deps.dispatcher,
        userAgent: this.options.userAgent,
        headers: this.options.headers,
        logger: this.logger,
      });
    this.negotiator = new TokenNegotiator(this.transport, this.credentials, this.logger);
    this.manifests = new ManifestService(this);
    this.blobs = new BlobService(this);
  }

  /**
   * Manifest URL: `{base}/v2/{path}/manifests/{tag}`.
   */
  digestUrl(image: Image): string {
    return `${this.url}/v2/${image.path}/manifests/${image.tag}`;
  }

  /**
   * Blob URL: `{base}/v2/{path}/blobs/{digest}`.
   */
  blobUrl(image: Image): string {
    return `${this.url}/v2/${image.path}/blobs/${image.digest ?? ''}`;
  }

  /**
   * True when credentials are configured.
   */
  hasCredentials(): boolean {
    return this.credentials !== null;
  }

  /**
   * Resolves a bearer token for `url`; `''` when none is needed.
   */
  token(url: string): Promise<Token> {
    return this.negotiator.token(url);
  }

  /**
   * Returns the config digest of an image, `''` when the manifest is missing.
   */
  digest(image: Image, token: Token): Promise<string> {
    return this.manifests.digest(image, token);
  }

  /**
   * Returns the schema2 manifest of an image, `null` when missing.
   */
  manifest(image: Image, token: Token): Promise<ImageManifest | null> {
    return this.manifests.get(image, token);
  }

  /**
   * Returns the decoded bytes of the blob `image.digest`.
   */
  blob(image: Image, token: Token): Promise<Buffer> {
    return this.blobs.get(image, token);
  }

  /**
   * Releases the connection pool of a transport this client created.
   */
  async close(): Promise<void> {
    if (this.ownsTransport) {
      await this.transport.close();
    }
  }

  getWithToken(url: string, token: Token): Promise<HttpResponse> {
    const headers: Record<string, string> = {
      accept: MANIFEST_MEDIA_TYPES.DOCKER_V2,
    };
    if (token !== '') {
      headers['authorization'] = `Bearer ${token}`;
    }
    return this.transport.get(url, headers);
  }
}

/**
 * Parameters of {@link createRegistryClient}.
 */
export interface CreateRegistryClientParams {
  /** Auth server address; defaults to `domain`. */
  authUrl?: string;
  username?: string;
  password?: string;
  /** Registry domain of the image. */
  domain?: string;
}

/**
 * Creates a registry client for an image domain.
 *
 * @example
 * const registry = createRegistryClient({ domain: 'docker.io' });
 * const image = parseImage('alpine');
 * const token = await registry.token(registry.digestUrl(image));
 * const digest = await registry.digest(image, token);
 */
export function createRegistryClient(
  params: CreateRegistryClientParams,
  options: Partial<RegistryOptions> = {},
  deps: RegistryDeps = {}
): Registry {
  const domain = params.domain ?? '';
  const authDomain = params.authUrl || domain;
  const auth = getAuthConfig(params.username ?? '', params.password ?? '', authDomain, deps.logger);

  deps.logger?.info('creating registry client', { domain, serverAddress: auth.serverAddress });
  return new Registry(auth, { ...options, domain }, deps);
}
