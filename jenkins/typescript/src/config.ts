/**
 * Configuration types for the Jenkins client.
 * @module config
 */

import { z } from 'zod';
import { JenkinsError } from './errors.js';

/** Default request timeout in milliseconds (30 seconds). */
export const DEFAULT_TIMEOUT = 30000;

/** Default number of requests allowed in flight at once. */
export const DEFAULT_MAX_CONNECTIONS = 10;

/** Default CSRF crumb TTL in milliseconds (5 minutes). */
export const DEFAULT_CRUMB_TTL = 300000;

/** Default User-Agent header. */
export const DEFAULT_USER_AGENT = 'devops-console-jenkins/0.1.0';

/**
 * Jenkins client configuration.
 */
export interface JenkinsConfig {
  /** Jenkins base URL (e.g., "https://jenkins.example.com"), no trailing slash. */
  baseUrl: string;
  /** Request timeout in milliseconds. */
  timeout: number;
  /** Maximum concurrent requests. */
  maxConnections: number;
  /** Enable CSRF crumb support. */
  crumbEnabled: boolean;
  /** CSRF crumb cache TTL in milliseconds. */
  crumbTtl: number;
  /** User-Agent header. */
  userAgent: string;
}

const configSchema = z.object({
  baseUrl: z
    .string()
    .min(1, 'Base URL cannot be empty')
    .url('Invalid base URL format')
    .regex(/^https?:\/\//, 'Base URL must start with http:// or https://'),
  timeout: z.number().int().positive('Timeout must be greater than 0'),
  maxConnections: z.number().int().min(1, 'Max connections must be at least 1'),
  crumbEnabled: z.boolean(),
  crumbTtl: z.number().int().positive('Crumb TTL must be greater than 0'),
  userAgent: z.string().trim().min(1, 'User-Agent cannot be empty'),
});

/**
 * Creates a default Jenkins configuration. The base URL must still be set.
 */
export function createDefaultConfig(): JenkinsConfig {
  return {
    baseUrl: '',
    timeout: DEFAULT_TIMEOUT,
    maxConnections: DEFAULT_MAX_CONNECTIONS,
    crumbEnabled: true,
    crumbTtl: DEFAULT_CRUMB_TTL,
    userAgent: DEFAULT_USER_AGENT,
  };
}

/**
 * Validates a Jenkins configuration.
 * @throws {JenkinsError} If the configuration is invalid.
 */
export function validateConfig(config: JenkinsConfig): void {
  const result = configSchema.safeParse(config);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw JenkinsError.configuration(`Invalid Jenkins configuration: ${issue.path.join('.')}: ${issue.message}`);
  }
}

/**
 * Builder for JenkinsConfig.
 */
export class JenkinsConfigBuilder {
  private config: JenkinsConfig;

  constructor() {
    this.config = createDefaultConfig();
  }

  /**
   * Sets the base URL. Trailing slashes are removed.
   */
  baseUrl(url: string): this {
    this.config.baseUrl = url.replace(/\/+$/, '');
    return this;
  }

  /**
   * Sets the request timeout in milliseconds.
   */
  timeout(timeout: number): this {
    this.config.timeout = timeout;
    return this;
  }

  /**
   * Sets how many requests may be in flight at once.
   */
  maxConnections(maxConnections: number): this {
    this.config.maxConnections = maxConnections;
    return this;
  }

  /**
   * Enables or disables CSRF crumb support.
   */
  crumbEnabled(enabled: boolean): this {
    this.config.crumbEnabled = enabled;
    return this;
  }

  /**
   * Sets the CSRF crumb cache TTL in milliseconds.
   */
  crumbTtl(ttl: number): this {
    this.config.crumbTtl = ttl;
    return this;
  }

  /**
   * Sets the User-Agent header.
   */
  userAgent(userAgent: string): this {
    this.config.userAgent = userAgent;
    return this;
  }

  /**
   * Builds and validates the configuration.
   * @throws {JenkinsError} If the configuration is invalid.
   */
  build(): JenkinsConfig {
    validateConfig(this.config);
    return { ...this.config };
  }
}

function parseIntVar(value: string | undefined): number | undefined {
  if (!value) {
    return undefined;
  }
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? undefined : parsed;
}

/**
 * Creates a Jenkins configuration builder from environment variables.
 *
 * Environment variables:
 * - JENKINS_URL: Base URL (required)
 * - JENKINS_TIMEOUT_SECS: Request timeout in seconds
 * - JENKINS_MAX_CONNECTIONS: Concurrent request limit
 * - JENKINS_CRUMB_ENABLED: Enable CSRF crumb support (true/false)
 * - JENKINS_CRUMB_TTL_SECS: CSRF crumb TTL in seconds
 * - JENKINS_USER_AGENT: Custom User-Agent string
 */
export function createConfigFromEnv(env: NodeJS.ProcessEnv = process.env): JenkinsConfigBuilder {
  const builder = new JenkinsConfigBuilder();

  if (env.JENKINS_URL) {
    builder.baseUrl(env.JENKINS_URL);
  }

  const timeoutSecs = parseIntVar(env.JENKINS_TIMEOUT_SECS);
  if (timeoutSecs !== undefined) {
    builder.timeout(timeoutSecs * 1000);
  }

  const maxConnections = parseIntVar(env.JENKINS_MAX_CONNECTIONS);
  if (maxConnections !== undefined) {
    builder.maxConnections(maxConnections);
  }

  if (env.JENKINS_CRUMB_ENABLED !== undefined) {
    builder.crumbEnabled(env.JENKINS_CRUMB_ENABLED.toLowerCase() === 'true');
  }

  const crumbTtlSecs = parseIntVar(env.JENKINS_CRUMB_TTL_SECS);
  if (crumbTtlSecs !== undefined) {
    builder.crumbTtl(crumbTtlSecs * 1000);
  }

  if (env.JENKINS_USER_AGENT) {
    builder.userAgent(env.JENKINS_USER_AGENT);
  }

  return builder;
}
