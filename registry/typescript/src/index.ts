/**
 * Docker Registry HTTP API v2 client.
 *
 * Resolves image digests and config blobs from anonymous and authenticated
 * registries, reads credentials from Kubernetes pull secrets and verifies
 * registry logins.
 *
 * @example
 * ```typescript
 * import { createRegistryClient, parseImage } from '@devops-console/registry';
 *
 * const image = parseImage('alpine:3.20');
 * const registry = createRegistryClient({ domain: image.domain });
 * const token = await registry.token(registry.digestUrl(image));
 * const digest = await registry.digest(image, token);
 * ```
 *
 * @module @devops-console/registry
 */

export * from './types/index.js';
export * from './errors.js';
export * from './config.js';
export { HttpTransport, decodeBody } from './transport/http.js';
export type { HttpResponse, HttpTransportOptions } from './transport/http.js';
export { challengeScheme, parseAuthChallenge, parseAuthParams, splitChallenges } from './auth/challenge.js';
export type { ChallengeScheme } from './auth/challenge.js';
export { TokenNegotiator } from './auth/token.js';
export { SecretString, basicAuthorization } from './auth/secret.js';
export type { RegistryCredentials } from './auth/secret.js';
export {
  Registry,
  createRegistryClient,
  getAuthConfig,
  normalizeServerAddress,
  withScheme,
} from './client.js';
export type { AuthConfig, CreateRegistryClientParams, RegistryDeps } from './client.js';
export { ManifestService, MANIFEST_MEDIA_TYPES, decodeManifest } from './services/manifest.js';
export type { RegistryRequester } from './services/manifest.js';
export { BlobService, decodeImageBlob } from './services/blob.js';
export { resolveImageBlob } from './services/image-blob.js';
export type { ImageBlobDeps } from './services/image-blob.js';
export { verifyRegistryLogin, LOGIN_SUCCEEDED } from './services/login.js';
export type { LoginDeps } from './services/login.js';
export { parseImage, formatImage, DEFAULT_DOMAIN, DEFAULT_TAG } from './reference.js';
export {
  dockerEntryFromSecret,
  parseDockerConfigJson,
  DOCKER_CONFIG_JSON_KEY,
  DOCKER_CONFIG_JSON_SECRET_TYPE,
} from './credentials/docker-config.js';
export type { DockerConfigJson } from './credentials/docker-config.js';
