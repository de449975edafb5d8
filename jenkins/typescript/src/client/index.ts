/**
 * Jenkins HTTP Client
 *
 * Requester for the Jenkins REST API with support for:
 * - Basic authentication with API tokens
 * - CSRF/crumb handling with a single re-issue on 403
 * - A counting semaphore bounding in-flight requests
 * - Status code mapping to JenkinsError kinds
 *
 * Nothing is retried on transient failure; callers own that policy.
 *
 * @module client
 */

import { request, type Dispatcher } from 'undici';
import type { z } from 'zod';
import type { Logger } from '@devops-console/logging';
import { NoopLogger } from '@devops-console/logging';
import { validateConfig, type JenkinsConfig } from '../config.js';
import { JenkinsError } from '../errors.js';
import { basicAuthorization, type CredentialProvider } from '../auth/index.js';
import { CrumbManager, CRUMB_ISSUER_PATH, type Crumb } from './crumb.js';
import { Semaphore } from './semaphore.js';

/**
 * HTTP method types.
 */
export type HttpMethod = 'GET' | 'POST';

/**
 * Query parameter values; undefined entries are skipped.
 */
export type QueryParams = Record<string, string | number | boolean | undefined>;

/**
 * HTTP request options.
 */
export interface RequestOptions {
  /** Request headers */
  headers?: Record<string, string>;
  /** Query parameters */
  query?: QueryParams;
  /** Resolve with error statuses instead of throwing */
  allowErrorStatus?: boolean;
}

/**
 * Request body with its content type.
 */
export interface RequestBody {
  contentType: string;
  payload: string;
}

/**
 * HTTP response structure.
 */
export interface JenkinsResponse {
  /** Response status code */
  status: number;
  /** Response headers, lowercase names */
  headers: Record<string, string>;
  /** Response body text */
  body: string;
  /** Request URL */
  url: string;
}

/**
 * Collaborators of a Jenkins client.
 */
export interface JenkinsClientDeps {
  /** Credentials for HTTP Basic auth; requests are anonymous without one. */
  credentials?: CredentialProvider;
  logger?: Logger;
  /** Dispatcher to send requests through. */
  dispatcher?: Dispatcher;
}

/**
 * Main Jenkins API client.
 */
export class JenkinsClient {
  private readonly config: JenkinsConfig;
  private readonly baseUrl: string;
  private readonly crumbManager: CrumbManager;
  private readonly gate: Semaphore;
  private readonly credentials?: CredentialProvider;
  private readonly dispatcher?: Dispatcher;
  private readonly logger: Logger;

  /**
   * @throws {JenkinsError} `InvalidConfiguration` when the config fails validation.
   */
  constructor(config: JenkinsConfig, deps: JenkinsClientDeps = {}) {
    validateConfig(config);
    this.config = { ...config };
    this.baseUrl = config.baseUrl.replace(/\/+$/, '');
    this.credentials = deps.credentials;
    this.dispatcher = deps.dispatcher;
    this.logger = deps.logger ?? new NoopLogger();
    this.gate = new Semaphore(config.maxConnections);
    this.crumbManager = new CrumbManager(
      async () => this.send('GET', this.buildUrl(CRUMB_ISSUER_PATH), await this.buildHeaders()),
      config.crumbEnabled,
      config.crumbTtl
    );
  }

  /**
   * Make a GET request.
   */
  async get(path: string, options?: RequestOptions): Promise<JenkinsResponse> {
    return this.request('GET', path, undefined, options);
  }

  /**
   * Make a GET request and decode the JSON body with a schema.
   */
  async getJson<T>(
    path: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    options?: RequestOptions
  ): Promise<T> {
    const response = await this.get(path, options);
    return decodeJson(response, schema);
  }

  /**
   * Make a POST request.
   */
  async post(path: string, body?: RequestBody, options?: RequestOptions): Promise<JenkinsResponse> {
    return this.request('POST', path, body, options);
  }

  /**
   * Make a POST request with form data.
   */
  async postForm(
    path: string,
    formData: Record<string, string>,
    options?: RequestOptions
  ): Promise<JenkinsResponse> {
    return this.post(
      path,
      {
        contentType: 'application/x-www-form-urlencoded',
        payload: new URLSearchParams(formData).toString(),
      },
      options
    );
  }

  /**
   * Make a POST request with an XML document.
   */
  async postXml(path: string, xml: string, options?: RequestOptions): Promise<JenkinsResponse> {
    return this.post(path, { contentType: 'application/xml', payload: xml }, options);
  }

  /**
   * Core request method with crumb handling.
   */
  private async request(
    method: HttpMethod,
    path: string,
    body?: RequestBody,
    options: RequestOptions = {}
  ): Promise<JenkinsResponse> {
    const url = this.buildUrl(path, options.query);
    const headers = await this.buildHeaders(options.headers, body);

    if (method === 'GET') {
      return this.checkStatus(method, await this.send(method, url, headers), options);
    }

    const crumb = await this.crumbManager.getOrFetch();
    let response = await this.send(method, url, withCrumb(headers, crumb), body);

    // A 403 on POST usually means the crumb expired server side
    if (response.status === 403 && crumb) {
      this.logger.warn('crumb rejected, re-issuing request', { url });
      this.crumbManager.invalidate();
      const fresh = await this.crumbManager.getOrFetch();
      response = await this.send(method, url, withCrumb(headers, fresh), body);
    }

    return this.checkStatus(method, response, options);
  }

  /**
   * Sends one request while holding a gate permit.
   */
  private async send(
    method: HttpMethod,
    url: string,
    headers: Record<string, string>,
    body?: RequestBody
  ): Promise<JenkinsResponse> {
    return this.gate.run(async () => {
      const controller = new AbortController();
      const timeoutId = setTimeout(() => controller.abort(), this.config.timeout);

      try {
        this.logger.debug('jenkins request', { method, url });
        const response = await request(url, {
          method,
          headers,
          body: body?.payload,
          signal: controller.signal,
          ...(this.dispatcher ? { dispatcher: this.dispatcher } : {}),
        });
        const text = await response.body.text();
        this.logger.debug('jenkins response', { method, url, status: response.statusCode });

        return {
          status: response.statusCode,
          headers: flattenHeaders(response.headers),
          body: text,
          url,
        };
      } catch (error) {
        if (controller.signal.aborted) {
          throw JenkinsError.timeout(url, this.config.timeout);
        }
        throw JenkinsError.network(url, error);
      } finally {
        clearTimeout(timeoutId);
      }
    });
  }

  /**
   * Redirects are not followed; Jenkins answers most form posts with one.
   */
  private checkStatus(method: HttpMethod, response: JenkinsResponse, options: RequestOptions): JenkinsResponse {
    if (response.status < 400 || options.allowErrorStatus) {
      return response;
    }
    throw JenkinsError.fromResponse(
      response.status,
      `${method} ${response.url} failed with HTTP ${response.status}`,
      response.url
    );
  }

  /**
   * Build full URL with query parameters.
   */
  private buildUrl(path: string, query?: QueryParams): string {
    const normalizedPath = path.startsWith('/') ? path : `/${path}`;
    const params = new URLSearchParams();
    for (const [key, value] of Object.entries(query ?? {})) {
      if (value !== undefined) {
        params.append(key, String(value));
      }
    }
    const search = params.toString();
    return `${this.baseUrl}${normalizedPath}${search ? `?${search}` : ''}`;
  }

  /**
   * Build request headers with authentication.
   */
  private async buildHeaders(
    customHeaders: Record<string, string> = {},
    body?: RequestBody
  ): Promise<Record<string, string>> {
    const headers: Record<string, string> = {
      'user-agent': this.config.userAgent,
    };
    for (const [name, value] of Object.entries(customHeaders)) {
      headers[name.toLowerCase()] = value;
    }
    if (body) {
      headers['content-type'] = body.contentType;
    }

    if (this.credentials) {
      try {
        headers['authorization'] = basicAuthorization(await this.credentials.getCredentials());
      } catch (error) {
        throw JenkinsError.credentialsUnavailable(error);
      }
    }

    return headers;
  }

  /**
   * Get the client configuration.
   */
  getConfig(): Readonly<JenkinsConfig> {
    return { ...this.config };
  }
}

/**
 * Decodes a JSON response body with a schema.
 *
 * @throws {JenkinsError} If the body is not JSON or does not match.
 */
export function decodeJson<T>(response: JenkinsResponse, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T {
  let raw: unknown;
  try {
    raw = JSON.parse(response.body);
  } catch (error) {
    throw JenkinsError.deserialization(`Failed to parse JSON response from ${response.url}`, error);
  }

  const result = schema.safeParse(raw);
  if (!result.success) {
    throw JenkinsError.deserialization(
      `Unexpected response shape from ${response.url}: ${result.error.issues[0].message}`,
      result.error
    );
  }
  return result.data;
}

function withCrumb(headers: Record<string, string>, crumb: Crumb | null): Record<string, string> {
  if (!crumb) {
    return headers;
  }
  return { ...headers, [crumb.field.toLowerCase()]: crumb.value };
}

function flattenHeaders(headers: Record<string, string | string[] | undefined>): Record<string, string> {
  const flat: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    if (value === undefined) {
      continue;
    }
    flat[name.toLowerCase()] = Array.isArray(value) ? value.join(', ') : value;
  }
  return flat;
}
