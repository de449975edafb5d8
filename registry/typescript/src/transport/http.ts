/**
 * HTTP transport for registry requests.
 *
 * Wraps undici's `request` with the behavior the registry flows rely on:
 * - per-request timeout
 * - optional TLS verification bypass
 * - bounded redirect following that drops `Authorization` across origins
 * - gzip-aware body decoding
 *
 * @module transport/http
 */

import { Agent, request, type Dispatcher } from 'undici';
import { gunzipSync } from 'zlib';
import type { Logger } from '@devops-console/logging';
import { NoopLogger } from '@devops-console/logging';
import { DEFAULT_TIMEOUT, DEFAULT_USER_AGENT, MAX_REDIRECTS } from '../config.js';
import { RegistryError, isRegistryError } from '../errors.js';

const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);

/**
 * Decoded HTTP response.
 */
export interface HttpResponse {
  /** Response status code. */
  status: number;
  /** Response headers, lowercase names. */
  headers: Record<string, string>;
  /** Body after content decoding. */
  body: Buffer;
  /** URL that produced the response, after redirects. */
  url: string;
}

/**
 * Transport options.
 */
export interface HttpTransportOptions {
  /** Request timeout in milliseconds. */
  timeout?: number;
  /**
   * Accept any TLS certificate. Ignored when a dispatcher is given.
   * The transport then owns a connection pool; release it with {@link HttpTransport.close}.
   */
  insecureSkipVerify?: boolean;
  /** Dispatcher to send requests through. */
  dispatcher?: Dispatcher;
  /** User-Agent header. */
  userAgent?: string;
  /** Headers sent with every request. */
  headers?: Record<string, string>;
  /** Logger. */
  logger?: Logger;
}

/**
 * GET-only HTTP transport used by the registry client.
 */
export class HttpTransport {
  private readonly timeout: number;
  private readonly dispatcher?: Dispatcher;
  private readonly defaultHeaders: Record<string, string>;
  private readonly logger: Logger;
  private ownedAgent?: Agent;

  constructor(options: HttpTransportOptions = {}) {
    this.timeout = options.timeout ?? DEFAULT_TIMEOUT;
    this.logger = options.logger ?? new NoopLogger();
    if (options.dispatcher === undefined && options.insecureSkipVerify) {
      this.ownedAgent = new Agent({ connect: { rejectUnauthorized: false } });
    }
    this.dispatcher = options.dispatcher ?? this.ownedAgent;
    this.defaultHeaders = lowercaseKeys({
      'user-agent': options.userAgent ?? DEFAULT_USER_AGENT,
      ...options.headers,
    });
  }

  /**
   * Issues a GET request and returns the decoded response.
   * Redirects are followed; any other status is returned to the caller.
   *
   * @throws {RegistryError} On network failure, timeout, redirect overflow or a corrupt gzip body.
   */
  async get(url: string, headers: Record<string, string> = {}): Promise<HttpResponse> {
    let currentUrl = url;
    let currentHeaders = { ...this.defaultHeaders, ...lowercaseKeys(headers) };

    for (let redirects = 0; ; redirects++) {
      const response = await this.send(currentUrl, currentHeaders);
      const location = response.headers['location'];

      if (!REDIRECT_STATUSES.has(response.status) || !location) {
        return response;
      }

      if (redirects >= MAX_REDIRECTS) {
        throw RegistryError.network(url, new Error(`stopped after ${MAX_REDIRECTS} redirects`));
      }

      const next = new URL(location, currentUrl);
      if (next.origin !== new URL(currentUrl).origin) {
        currentHeaders = Object.fromEntries(
          Object.entries(currentHeaders).filter(([name]) => name !== 'authorization')
        );
      }
      this.logger.debug('following redirect', { from: currentUrl, to: next.toString(), status: response.status });
      currentUrl = next.toString();
    }
  }

  /**
   * Closes the connection pool this transport created, if any.
   * A dispatcher passed in by the caller is left open.
   */
  async close(): Promise<void> {
    const agent = this.ownedAgent;
    this.ownedAgent = undefined;
    if (agent) {
      await agent.close();
    }
  }

  private async send(url: string, headers: Record<string, string>): Promise<HttpResponse> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);

    try {
      const response = await request(url, {
        method: 'GET',
        headers,
        signal: controller.signal,
        ...(this.dispatcher ? { dispatcher: this.dispatcher } : {}),
      });
      const raw = Buffer.from(await response.body.arrayBuffer());
      const responseHeaders = flattenHeaders(response.headers);

      this.logger.debug('registry response', { url, status: response.statusCode });

      return {
        status: response.statusCode,
        headers: responseHeaders,
        body: decodeBody(raw, responseHeaders['content-encoding']),
        url,
      };
    } catch (error) {
      if (isRegistryError(error)) {
        throw error;
      }
      if (controller.signal.aborted) {
        throw RegistryError.timeout(url, this.timeout);
      }
      throw RegistryError.network(url, error);
    } finally {
      clearTimeout(timeoutId);
    }
  }
}

/**
 * Decompresses a gzip body; other encodings are returned as-is.
 *
 * @throws {RegistryError} If the gzip stream is corrupt.
 */
export function decodeBody(body: Buffer, contentEncoding: string | undefined): Buffer {
  if (contentEncoding?.trim().toLowerCase() !== 'gzip') {
    return body;
  }
  try {
    return gunzipSync(body);
  } catch (error) {
    throw RegistryError.deserialization('Failed to decompress gzip response body', error);
  }
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

function lowercaseKeys(headers: Record<string, string>): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    result[name.toLowerCase()] = value;
  }
  return result;
}
