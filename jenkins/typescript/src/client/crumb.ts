/**
 * Crumb/CSRF handling for Jenkins API.
 *
 * Jenkins uses CSRF protection via a crumb issuer. This module handles:
 * - Fetching crumbs from /crumbIssuer/api/json
 * - Caching crumbs with TTL
 * - Remembering when the crumb issuer is disabled
 *
 * @module client/crumb
 */

import { z } from 'zod';
import { JenkinsError, JenkinsErrorKind } from '../errors.js';

/** Path of the crumb issuer endpoint. */
export const CRUMB_ISSUER_PATH = '/crumbIssuer/api/json';

/**
 * Crumb token with metadata.
 */
export interface Crumb {
  /** Crumb header field name (e.g., "Jenkins-Crumb") */
  field: string;
  /** Crumb token value */
  value: string;
  /** Timestamp when the crumb expires (milliseconds since epoch) */
  expiresAt: number;
}

/**
 * Raw crumb issuer reply: status and body text.
 */
export interface CrumbIssuerResponse {
  status: number;
  body: string;
}

const crumbResponseSchema = z.object({
  crumb: z.string(),
  crumbRequestField: z.string(),
});

/**
 * Manages Jenkins crumb tokens with caching.
 */
export class CrumbManager {
  private cachedCrumb: Crumb | null = null;
  private fetchPromise: Promise<Crumb | null> | null = null;
  private issuerDisabled = false;

  /**
   * @param issue - Sends GET /crumbIssuer/api/json with the client's credentials
   * @param enabled - Whether crumb handling is enabled
   * @param ttlMs - Time to live for a cached crumb
   */
  constructor(
    private readonly issue: () => Promise<CrumbIssuerResponse>,
    private readonly enabled: boolean = true,
    private readonly ttlMs: number = 5 * 60 * 1000
  ) {}

  /**
   * Get a valid crumb, fetching a new one if necessary.
   * Returns null if crumbs are disabled locally or by the server.
   *
   * @throws {JenkinsError} If the crumb issuer fails
   */
  async getOrFetch(): Promise<Crumb | null> {
    if (!this.enabled || this.issuerDisabled) {
      return null;
    }

    if (this.cachedCrumb && Date.now() < this.cachedCrumb.expiresAt) {
      return this.cachedCrumb;
    }

    // Concurrent callers share one fetch
    if (this.fetchPromise) {
      return this.fetchPromise;
    }

    this.fetchPromise = this.fetchCrumb().finally(() => {
      this.fetchPromise = null;
    });

    return this.fetchPromise;
  }

  /**
   * Invalidate the cached crumb, forcing a refresh on next request.
   */
  invalidate(): void {
    this.cachedCrumb = null;
  }

  private async fetchCrumb(): Promise<Crumb | null> {
    const response = await this.issue();

    if (response.status === 404) {
      this.issuerDisabled = true;
      return null;
    }

    if (response.status !== 200) {
      throw new JenkinsError(
        JenkinsErrorKind.CrumbFetchFailed,
        `Failed to fetch crumb: HTTP ${response.status}`,
        { statusCode: response.status }
      );
    }

    let data: z.infer<typeof crumbResponseSchema>;
    try {
      data = crumbResponseSchema.parse(JSON.parse(response.body));
    } catch (error) {
      throw new JenkinsError(JenkinsErrorKind.CrumbFetchFailed, 'Failed to parse crumb response', {
        cause: error,
      });
    }

    const crumb: Crumb = {
      field: data.crumbRequestField,
      value: data.crumb,
      expiresAt: Date.now() + this.ttlMs,
    };

    this.cachedCrumb = crumb;
    return crumb;
  }
}
