/**
 * Blob Service for the Docker Registry HTTP API v2
 *
 * - GET /v2/{path}/blobs/{digest}
 *
 * @module services/blob
 */

import { z } from 'zod';
import type { Image, ImageBlob, Token } from '../types/index.js';
import { RegistryError } from '../errors.js';
import type { RegistryRequester } from './manifest.js';

/**
 * Blob operations against a registry.
 */
export class BlobService {
  constructor(private readonly client: RegistryRequester) {}

  /**
   * Returns the decoded (gzip-aware) body of the blob `image.digest`.
   * A 404 is accepted and yields whatever body the registry sent.
   *
   * @throws {RegistryError} On any status other than 200 or 404.
   */
  async get(image: Image, token: Token): Promise<Buffer> {
    const url = this.client.blobUrl(image);
    this.client.logger.info('registry.blobs.get', { url });

    const response = await this.client.getWithToken(url, token);
    if (response.status !== 200 && response.status !== 404) {
      this.client.logger.info('unexpected blob status', { url, status: response.status });
      throw RegistryError.unexpectedStatus(response.status, url);
    }
    return response.body;
  }
}

// Registries write `null` for unset lists and strings; read it as absent.
function optional<T extends z.ZodTypeAny>(schema: T) {
  return schema.nullish().transform((value) => value ?? undefined);
}

const containerConfigSchema = z.object({
  Hostname: optional(z.string()),
  Domainname: optional(z.string()),
  User: optional(z.string()),
  AttachStdin: optional(z.boolean()),
  AttachStdout: optional(z.boolean()),
  AttachStderr: optional(z.boolean()),
  ExposedPorts: optional(z.record(z.unknown())),
  Tty: optional(z.boolean()),
  OpenStdin: optional(z.boolean()),
  StdinOnce: optional(z.boolean()),
  Env: optional(z.array(z.string())),
  Cmd: optional(z.array(z.string())),
  ArgsEscaped: optional(z.boolean()),
  Image: optional(z.string()),
  Volumes: z.unknown(),
  WorkingDir: optional(z.string()),
  Entrypoint: z.unknown(),
  OnBuild: z.unknown(),
  Labels: z.record(z.string()).nullable().optional(),
  StopSignal: optional(z.string()),
});

const historyEntrySchema = z.object({
  created: optional(z.string()),
  created_by: optional(z.string()),
  empty_layer: optional(z.boolean()),
});

const imageBlobSchema = z.object({
  architecture: optional(z.string()),
  config: optional(containerConfigSchema),
  container: optional(z.string()),
  container_config: optional(containerConfigSchema),
  created: optional(z.string()),
  docker_version: optional(z.string()),
  history: optional(z.array(historyEntrySchema)),
  os: optional(z.string()),
  rootfs: optional(
    z.object({
      type: optional(z.string()),
      diff_ids: optional(z.array(z.string())),
    })
  ),
});

/**
 * Decodes an image config blob. Unknown fields are dropped.
 *
 * @throws {RegistryError} If the body is not JSON or a known field has the wrong type.
 */
export function decodeImageBlob(body: Buffer): ImageBlob {
  let payload: unknown;
  try {
    payload = JSON.parse(body.toString('utf8'));
  } catch (error) {
    throw RegistryError.deserialization('Image config blob is not valid JSON', error);
  }

  const parsed = imageBlobSchema.safeParse(payload);
  if (!parsed.success) {
    throw RegistryError.deserialization(`Image config blob has an unexpected shape: ${parsed.error.message}`);
  }
  return parsed.data;
}
