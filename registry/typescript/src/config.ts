/**
 * Configuration for the registry client.
 * @module config
 */

import { z } from 'zod';
import { RegistryError } from './errors.js';

/** Canonical Docker Hub registry address. */
export const DEFAULT_DOCKER_REGISTRY = 'https://registry-1.docker.io';

/** Default request timeout in milliseconds (30 seconds). */
export const DEFAULT_TIMEOUT = 30000;

/** Redirects followed before a request fails. */
export const MAX_REDIRECTS = 5;

/** Default User-Agent header. */
export const DEFAULT_USER_AGENT = 'devops-console-registry/0.1.0';

/**
 * Per-registry options.
 */
export interface RegistryOptions {
  /** Registry domain; empty or "docker.io" falls back to the auth server address. */
  domain: string;
  /** Request timeout in milliseconds. */
  timeout: number;
  /** Scheme for addresses given without one: https when true, http otherwise. */
  useSSL: boolean;
  /** Accept any TLS certificate. */
  insecureSkipVerify: boolean;
  /** Extra headers sent with every request. */
  headers: Record<string, string>;
  /** User-Agent header. */
  userAgent: string;
}

/**
 * Default registry options.
 */
export const DEFAULT_REGISTRY_OPTIONS: RegistryOptions = {
  domain: '',
  timeout: DEFAULT_TIMEOUT,
  useSSL: true,
  insecureSkipVerify: false,
  headers: {},
  userAgent: DEFAULT_USER_AGENT,
};

const registryOptionsSchema = z.object({
  domain: z.string(),
  timeout: z.number().int().positive(),
  useSSL: z.boolean(),
  insecureSkipVerify: z.boolean(),
  headers: z.record(z.string()),
  userAgent: z.string().min(1),
});

/**
 * Merges options over the defaults and validates the result.
 * @throws {RegistryError} If the options are invalid.
 */
export function resolveRegistryOptions(options: Partial<RegistryOptions> = {}): RegistryOptions {
  const result = registryOptionsSchema.safeParse({ ...DEFAULT_REGISTRY_OPTIONS, ...options });
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw RegistryError.configuration(`Invalid registry options: ${issues.join('; ')}`);
  }
  return result.data;
}

/**
 * Registry connection settings read from the environment.
 */
export interface RegistryEnvConfig {
  authUrl: string;
  username: string;
  password: string;
  options: Partial<RegistryOptions>;
}

/**
 * Reads registry settings from environment variables.
 *
 * Environment variables:
 * - REGISTRY_DOMAIN: Registry domain
 * - REGISTRY_AUTH_URL: Auth server address (defaults to the domain)
 * - REGISTRY_USERNAME / REGISTRY_PASSWORD: Credentials
 * - REGISTRY_TIMEOUT_SECS: Request timeout in seconds
 * - REGISTRY_USE_SSL: Scheme for bare hosts (true/false)
 * - REGISTRY_INSECURE_SKIP_VERIFY: Skip TLS verification (true/false)
 * - REGISTRY_USER_AGENT: Custom User-Agent string
 */
export function registryConfigFromEnv(env: NodeJS.ProcessEnv = process.env): RegistryEnvConfig {
  const options: Partial<RegistryOptions> = {};

  if (env.REGISTRY_DOMAIN) {
    options.domain = env.REGISTRY_DOMAIN;
  }

  const timeoutSecs = env.REGISTRY_TIMEOUT_SECS;
  if (timeoutSecs) {
    const timeout = parseInt(timeoutSecs, 10);
    if (!isNaN(timeout)) {
      options.timeout = timeout * 1000;
    }
  }

  if (env.REGISTRY_USE_SSL !== undefined) {
    options.useSSL = env.REGISTRY_USE_SSL.toLowerCase() === 'true';
  }

  if (env.REGISTRY_INSECURE_SKIP_VERIFY !== undefined) {
    options.insecureSkipVerify = env.REGISTRY_INSECURE_SKIP_VERIFY.toLowerCase() === 'true';
  }

  if (env.REGISTRY_USER_AGENT) {
    options.userAgent = env.REGISTRY_USER_AGENT;
  }

  return {
    authUrl: env.REGISTRY_AUTH_URL ?? '',
    username: env.REGISTRY_USERNAME ?? '',
    password: env.REGISTRY_PASSWORD ?? '',
    options,
  };
}
