/**
 * Image config lookup from an image name and its pull secret.
 * @module services/image-blob
 */

import type { Logger } from '@devops-console/logging';
import { NoopLogger } from '@devops-console/logging';
import type { RegistryOptions } from '../config.js';
import { createRegistryClient, type Registry, type RegistryDeps } from '../client.js';
import { dockerEntryFromSecret } from '../credentials/docker-config.js';
import { parseImage } from '../reference.js';
import type { ImageBlobInfo, ImageNameAndSecret } from '../types/index.js';
import { RegistryError } from '../errors.js';
import { decodeImageBlob } from './blob.js';

/**
 * Collaborators of {@link resolveImageBlob}.
 */
export interface ImageBlobDeps extends RegistryDeps {
  options?: Partial<RegistryOptions>;
}

/**
 * Resolves the image config blob of `imageName`.
 *
 * Credentials come from the pull secret, the registry from the image domain.
 * Failures are logged and reported as `{ status: 'failed' }`; the returned
 * promise never rejects.
 */
export async function resolveImageBlob(
  { imageName, secret }: ImageNameAndSecret,
  deps: ImageBlobDeps = {}
): Promise<ImageBlobInfo> {
  const logger: Logger = deps.logger ?? new NoopLogger();

  let registry: Registry | undefined;
  try {
    const entry = dockerEntryFromSecret(secret);
    const image = parseImage(imageName);
    registry = createRegistryClient(
      { username: entry.username, password: entry.password, domain: image.domain },
      deps.options,
      { ...deps, logger }
    );

    const token = await registry.token(registry.digestUrl(image));
    const digest = await registry.digest(image, token);
    if (digest === '') {
      throw RegistryError.deserialization(`No config digest found for ${imageName}`);
    }

    const blob = await registry.blob({ ...image, digest }, token);
    return { status: 'succeeded', imageBlob: decodeImageBlob(blob) };
  } catch (error) {
    logger.error('image blob lookup failed', { image: imageName, error });
    return { status: 'failed' };
  } finally {
    await registry?.close();
  }
}
