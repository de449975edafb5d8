/**
 * `WWW-Authenticate` challenge parsing.
 * @module auth/challenge
 */

import type { AuthChallenge } from '../types/index.js';
import { BasicAuthRequiredError, RegistryError, RegistryErrorKind } from '../errors.js';

const BEARER_PATTERN = /^\s*Bearer\s+(.*)$/;
const BASIC_PATTERN = /^\s*Basic\s+.*$/;

// an auth-scheme token not followed by `=`, so not the name of a parameter
const SCHEME_START = /^\s*[A-Za-z][A-Za-z0-9!#$%&'*+.^_`|~-]*(?!\s*=)(?:\s|$)/;

// key=value or key="quoted \"value\"", optionally followed by a comma
const PARAM_SOURCE = String.raw`\s*([A-Za-z][A-Za-z0-9_-]*)\s*=\s*(?:"((?:[^"\\]|\\.)*)"|([^,\s]*))\s*,?`;

/**
 * Scheme of a `WWW-Authenticate` header value.
 */
export type ChallengeScheme = 'bearer' | 'basic' | 'unknown';

/**
 * Classifies a `WWW-Authenticate` header value.
 */
export function challengeScheme(header: string | undefined): ChallengeScheme {
  if (header === undefined) {
    return 'unknown';
  }
  const challenges = splitChallenges(header);
  if (challenges.some((challenge) => BEARER_PATTERN.test(challenge))) {
    return 'bearer';
  }
  if (challenges.some((challenge) => BASIC_PATTERN.test(challenge))) {
    return 'basic';
  }
  return 'unknown';
}

/**
 * Splits a header value into its challenges.
 *
 * Several `WWW-Authenticate` headers arrive joined by commas, e.g.
 * `Basic realm="r", Bearer realm="t",service="s"` becomes
 * `['Basic realm="r"', 'Bearer realm="t",service="s"']`.
 * Commas inside quoted values do not split.
 */
export function splitChallenges(header: string): string[] {
  const segments: string[] = [];
  let current = '';
  let quoted = false;

  for (let i = 0; i < header.length; i++) {
    const char = header[i];
    if (quoted) {
      current += char;
      if (char === '\\' && i + 1 < header.length) {
        current += header[++i];
      } else if (char === '"') {
        quoted = false;
      }
      continue;
    }
    if (char === ',') {
      segments.push(current);
      current = '';
      continue;
    }
    if (char === '"') {
      quoted = true;
    }
    current += char;
  }
  segments.push(current);

  const challenges: string[] = [];
  for (const segment of segments) {
    if (segment.trim() === '') {
      continue;
    }
    if (challenges.length === 0 || SCHEME_START.test(segment)) {
      challenges.push(segment.trim());
    } else {
      challenges[challenges.length - 1] += `,${segment}`;
    }
  }
  return challenges;
}

/**
 * Splits an auth-param list into name/value pairs.
 * Names are lowercased, quoted values unescaped; repeated names are kept.
 *
 * @throws {RegistryError} If the list is not well formed.
 */
export function parseAuthParams(input: string): Array<[string, string]> {
  const pattern = new RegExp(PARAM_SOURCE, 'y');
  const params: Array<[string, string]> = [];
  const trimmed = input.trimEnd();
  let offset = 0;

  while (offset < trimmed.length) {
    pattern.lastIndex = offset;
    const match = pattern.exec(trimmed);
    if (!match || pattern.lastIndex === offset) {
      throw RegistryError.challengeInvalid(`Malformed auth parameters at offset ${offset}: ${input}`);
    }
    const quoted = match[2];
    const value = quoted !== undefined ? quoted.replace(/\\(.)/g, '$1') : match[3];
    params.push([match[1].toLowerCase(), value]);
    offset = pattern.lastIndex;
  }

  return params;
}

/**
 * Parses a Bearer challenge into realm, service and scopes.
 * When the header offers several challenges, the first Bearer one wins.
 *
 * @param header - The `WWW-Authenticate` header value of a 401 response.
 * @throws {BasicAuthRequiredError} If the registry asks for Basic auth.
 * @throws {RegistryError} If the header is missing or unusable.
 */
export function parseAuthChallenge(header: string | undefined, url?: string): AuthChallenge {
  if (header === undefined || header.trim() === '') {
    throw RegistryError.challengeInvalid('401 response without WWW-Authenticate header');
  }

  const challenges = splitChallenges(header);
  let bearer: RegExpExecArray | null = null;
  for (const challenge of challenges) {
    bearer = BEARER_PATTERN.exec(challenge);
    if (bearer) {
      break;
    }
  }
  if (!bearer) {
    if (challenges.some((challenge) => BASIC_PATTERN.test(challenge))) {
      throw new BasicAuthRequiredError(url);
    }
    throw RegistryError.challengeInvalid(`Unsupported WWW-Authenticate challenge: ${header}`);
  }

  let realm = '';
  let service = '';
  const scope: string[] = [];

  for (const [name, value] of parseAuthParams(bearer[1])) {
    switch (name) {
      case 'realm':
        realm = value;
        break;
      case 'service':
        service = value;
        break;
      case 'scope':
        scope.push(value);
        break;
    }
  }

  if (!realm) {
    throw RegistryError.challengeInvalid(`Bearer challenge without realm: ${header}`);
  }

  let realmUrl: URL;
  try {
    realmUrl = new URL(realm);
  } catch (error) {
    throw new RegistryError(RegistryErrorKind.ChallengeInvalid, `Bearer realm is not a URL: ${realm}`, {
      statusCode: 401,
      cause: error,
    });
  }

  return { realm: realmUrl, service, scope };
}
