/**
 * Manifest Service for the Docker Registry HTTP API v2
 *
 * Resolves image digests from schema2 manifests:
 * - GET /v2/{path}/manifests/{tag}
 *
 * A 404 on the manifest is a valid outcome ("no digest"), not a failure.
 *
 * @module services/manifest
 */

import { z } from 'zod';
import type { Logger } from '@devops-console/logging';
import type { HttpResponse } from '../transport/http.js';
import type { Image, ImageManifest, Token } from '../types/index.js';
import { RegistryError } from '../errors.js';

/**
 * Supported manifest media types.
 */
export const MANIFEST_MEDIA_TYPES = {
  /** Docker Manifest V2 Schema 2 */
  DOCKER_V2: 'application/vnd.docker.distribution.manifest.v2+json',
} as const;

/**
 * Minimal client interface required by the manifest and blob services.
 */
export interface RegistryRequester {
  readonly logger: Logger;

  digestUrl(image: Image): string;

  blobUrl(image: Image): string;

  /**
   * GETs `url` with the manifest Accept header and, when `token` is
   * non-empty, a Bearer `Authorization` header.
   */
  getWithToken(url: string, token: Token): Promise<HttpResponse>;
}

const descriptorSchema = z.object({
  mediaType: z.string().default(''),
  size: z.number().default(0),
  digest: z.string().default(''),
});

const manifestSchema = z.object({
  schemaVersion: z.number().default(0),
  mediaType: z.string().default(''),
  config: descriptorSchema.default({}),
  layers: z.array(descriptorSchema).default([]),
});

/**
 * Decodes a manifest body.
 *
 * @throws {RegistryError} If the body is not a JSON object.
 */
export function decodeManifest(body: Buffer): ImageManifest {
  let payload: unknown;
  try {
    payload = JSON.parse(body.toString('utf8'));
  } catch (error) {
    throw RegistryError.deserialization('Manifest body is not valid JSON', error);
  }

  const parsed = manifestSchema.safeParse(payload);
  if (!parsed.success) {
    throw RegistryError.deserialization(`Manifest body has an unexpected shape: ${parsed.error.message}`);
  }
  return parsed.data;
}

/**
 * Manifest operations against a registry.
 */
export class ManifestService {
  constructor(private readonly client: RegistryRequester) {}

  /**
   * Returns the config digest of an image.
   *
   * A non-empty `image.digest` is returned unchanged without a request.
   * A 404 yields `''`.
   *
   * @throws {RegistryError} On any status other than 200 or 404, or an undecodable body.
   */
  async digest(image: Image, token: Token): Promise<string> {
    if (image.digest) {
      return image.digest;
    }

    const response = await this.fetch(image, token);
    if (response.status === 404) {
      return '';
    }
    return decodeManifest(response.body).config.digest;
  }

  /**
   * Returns the parsed schema2 manifest, or `null` on 404.
   *
   * @throws {RegistryError} On any status other than 200 or 404, or an undecodable body.
   */
  async get(image: Image, token: Token): Promise<ImageManifest | null> {
    const response = await this.fetch(image, token);
    if (response.status === 404) {
      return null;
    }
    return decodeManifest(response.body);
  }

  private async fetch(image: Image, token: Token): Promise<HttpResponse> {
    const url = this.client.digestUrl(image);
    this.client.logger.info('registry.manifests.get', { url });

    const response = await this.client.getWithToken(url, token);
    if (response.status !== 200 && response.status !== 404) {
      throw RegistryError.unexpectedStatus(response.status, url);
    }
    return response;
  }
}
