/**
 * Registry credentials from Kubernetes pull secrets.
 * @module credentials/docker-config
 */

import { z } from 'zod';
import type { DockerConfigEntry, KubernetesSecret } from '../types/index.js';
import { RegistryError, RegistryErrorKind } from '../errors.js';

/** Secret type carrying a docker config file. */
export const DOCKER_CONFIG_JSON_SECRET_TYPE = 'kubernetes.io/dockerconfigjson';

/** Data key holding the docker config file. */
export const DOCKER_CONFIG_JSON_KEY = '.dockerconfigjson';

const dockerConfigEntrySchema = z.object({
  username: z.string().default(''),
  password: z.string().default(''),
  email: z.string().default(''),
  auth: z.string().optional(),
});

const dockerConfigJsonSchema = z.object({
  auths: z.record(dockerConfigEntrySchema).default({}),
});

/**
 * Parsed docker config file.
 */
export type DockerConfigJson = z.infer<typeof dockerConfigJsonSchema>;

/**
 * Reads the registry entry of a pull secret.
 *
 * A secret without a type yields anonymous credentials. Otherwise the secret
 * must be a `kubernetes.io/dockerconfigjson` secret with at least one entry;
 * the first entry is returned with `serverAddress` set to its key.
 *
 * @throws {RegistryError} If the secret is of the wrong type or malformed.
 */
export function dockerEntryFromSecret(secret: KubernetesSecret): DockerConfigEntry {
  if (!secret.type) {
    return { username: '', password: '', email: '' };
  }

  const name = secret.metadata?.name ?? '';
  const namespace = secret.metadata?.namespace ?? '';

  if (secret.type !== DOCKER_CONFIG_JSON_SECRET_TYPE) {
    throw RegistryError.invalidSecret(
      `secret ${name} in ns ${namespace} type should be ${DOCKER_CONFIG_JSON_SECRET_TYPE}`
    );
  }

  const encoded = secret.data?.[DOCKER_CONFIG_JSON_KEY];
  if (encoded === undefined) {
    throw RegistryError.invalidSecret(`could not get data ${DOCKER_CONFIG_JSON_KEY}`);
  }

  const config = parseDockerConfigJson(Buffer.from(encoded, 'base64').toString('utf8'));
  const first = Object.entries(config.auths)[0];
  if (!first) {
    throw RegistryError.invalidSecret('docker config auth len should not be 0');
  }

  const [serverAddress, entry] = first;
  const { username, password } = entry.username || entry.password ? entry : decodeAuthField(entry.auth);
  return { username, password, email: entry.email, serverAddress };
}

/**
 * Parses and validates a docker config file.
 *
 * @throws {RegistryError} If the text is not a valid docker config.
 */
export function parseDockerConfigJson(text: string): DockerConfigJson {
  let payload: unknown;
  try {
    payload = JSON.parse(text);
  } catch (error) {
    throw new RegistryError(RegistryErrorKind.InvalidSecret, 'docker config is not valid JSON', { cause: error });
  }

  const parsed = dockerConfigJsonSchema.safeParse(payload);
  if (!parsed.success) {
    throw RegistryError.invalidSecret(`docker config has an unexpected shape: ${parsed.error.message}`);
  }
  return parsed.data;
}

function decodeAuthField(auth: string | undefined): { username: string; password: string } {
  if (!auth) {
    return { username: '', password: '' };
  }
  const decoded = Buffer.from(auth, 'base64').toString('utf8');
  const separator = decoded.indexOf(':');
  if (separator === -1) {
    throw RegistryError.invalidSecret('docker config auth field is not base64 "user:password"');
  }
  return { username: decoded.slice(0, separator), password: decoded.slice(separator + 1) };
}
