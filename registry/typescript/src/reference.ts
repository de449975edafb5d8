/**
 * Image reference parsing.
 *
 * Supports formats:
 * - repository
 * - repository:tag
 * - namespace/repository:tag
 * - registry[:port]/namespace/repository:tag
 * - any of the above followed by @algorithm:hex
 *
 * @module reference
 */

import type { Image } from './types/index.js';
import { RegistryError } from './errors.js';

/** Domain assumed when a reference names none. */
export const DEFAULT_DOMAIN = 'docker.io';

/** Tag assumed when a reference names none. */
export const DEFAULT_TAG = 'latest';

const LEGACY_DEFAULT_DOMAIN = 'index.docker.io';
const OFFICIAL_NAMESPACE = 'library';

const PATH_COMPONENT_PATTERN = /^[a-z0-9]+(?:(?:[._]|__|-+)[a-z0-9]+)*$/;
const TAG_PATTERN = /^[\w][\w.-]{0,127}$/;
const DIGEST_PATTERN = /^[A-Za-z][A-Za-z0-9]*(?:[-_+.][A-Za-z][A-Za-z0-9]*)*:[0-9A-Fa-f]{32,}$/;

/**
 * Parses an image name into domain, path, tag and digest.
 *
 * @example
 * parseImage('alpine');
 * // { domain: 'docker.io', path: 'library/alpine', tag: 'latest' }
 *
 * parseImage('harbor.example.com:8443/team/app:1.2@sha256:...');
 * // { domain: 'harbor.example.com:8443', path: 'team/app', tag: '1.2', digest: 'sha256:...' }
 *
 * @throws {RegistryError} If the name is empty or malformed.
 */
export function parseImage(name: string): Image {
  const input = name.trim();
  if (input === '') {
    throw RegistryError.invalidReference(name, 'name is empty');
  }

  let remainder = input;
  let digest: string | undefined;
  const at = remainder.indexOf('@');
  if (at !== -1) {
    digest = remainder.slice(at + 1);
    remainder = remainder.slice(0, at);
    if (!DIGEST_PATTERN.test(digest)) {
      throw RegistryError.invalidReference(name, `invalid digest "${digest}"`);
    }
  }

  let tag = DEFAULT_TAG;
  const colon = remainder.lastIndexOf(':');
  if (colon > remainder.lastIndexOf('/')) {
    tag = remainder.slice(colon + 1);
    remainder = remainder.slice(0, colon);
    if (!TAG_PATTERN.test(tag)) {
      throw RegistryError.invalidReference(name, `invalid tag "${tag}"`);
    }
  }

  const components = remainder.split('/');
  let domain = DEFAULT_DOMAIN;
  if (components.length > 1 && isDomain(components[0])) {
    domain = components[0];
    components.shift();
  }
  if (domain === LEGACY_DEFAULT_DOMAIN) {
    domain = DEFAULT_DOMAIN;
  }

  for (const component of components) {
    if (!PATH_COMPONENT_PATTERN.test(component)) {
      throw RegistryError.invalidReference(name, `invalid path component "${component}"`);
    }
  }

  if (domain === DEFAULT_DOMAIN && components.length === 1) {
    components.unshift(OFFICIAL_NAMESPACE);
  }

  const image: Image = { domain, path: components.join('/'), tag };
  if (digest !== undefined) {
    image.digest = digest;
  }
  return image;
}

/**
 * Formats an image back into its canonical reference string.
 */
export function formatImage(image: Image): string {
  const base = `${image.domain}/${image.path}:${image.tag}`;
  return image.digest ? `${base}@${image.digest}` : base;
}

function isDomain(component: string): boolean {
  return component.includes('.') || component.includes(':') || component === 'localhost';
}
