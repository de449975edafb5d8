import { describe, it, expect } from 'vitest';
import { challengeScheme, parseAuthChallenge, parseAuthParams, splitChallenges } from '../auth/challenge.js';
import { BasicAuthRequiredError, RegistryError, RegistryErrorKind } from '../errors.js';

describe('parseAuthChallenge', () => {
  it('should parse realm, service and scope', () => {
    const challenge = parseAuthChallenge(
      'Bearer realm="https://auth.example.com/token",service="registry.example.com",scope="repository:library/alpine:pull"'
    );

    expect(challenge.realm.toString()).toBe('https://auth.example.com/token');
    expect(challenge.service).toBe('registry.example.com');
    expect(challenge.scope).toEqual(['repository:library/alpine:pull']);
  });

  it('should keep commas and escaped quotes inside quoted values', () => {
    const challenge = parseAuthChallenge(
      'Bearer realm="https://auth.example.com/token", scope="repository:team/app:pull,push", service="svc \\"a\\""'
    );

    expect(challenge.scope).toEqual(['repository:team/app:pull,push']);
    expect(challenge.service).toBe('svc "a"');
  });

  it('should accumulate repeated scope parameters', () => {
    const challenge = parseAuthChallenge(
      'Bearer realm="https://auth.example.com/token",scope="repository:a/b:pull",scope="repository:c/d:pull"'
    );

    expect(challenge.scope).toEqual(['repository:a/b:pull', 'repository:c/d:pull']);
    expect(challenge.service).toBe('');
  });

  it('should accept unquoted values and leading whitespace', () => {
    const challenge = parseAuthChallenge('  Bearer realm=https://auth.example.com/token,service=registry');

    expect(challenge.realm.host).toBe('auth.example.com');
    expect(challenge.service).toBe('registry');
  });

  it('should throw the basic-auth sentinel for Basic challenges', () => {
    expect(() => parseAuthChallenge('Basic realm="Registry Realm"')).toThrow(BasicAuthRequiredError);
    expect(() => parseAuthChallenge('Basic realm="Registry Realm"')).toThrow('basic auth required');
  });

  it('should reject a missing header', () => {
    try {
      parseAuthChallenge(undefined);
      expect.fail('expected parseAuthChallenge to throw');
    } catch (error) {
      expect(error).toBeInstanceOf(RegistryError);
      expect(error).toMatchObject({ kind: RegistryErrorKind.ChallengeInvalid, statusCode: 401 });
    }
  });

  it('should reject a challenge without realm', () => {
    expect(() => parseAuthChallenge('Bearer service="registry"')).toThrow('Bearer challenge without realm');
  });

  it('should reject a realm that is not a URL', () => {
    expect(() => parseAuthChallenge('Bearer realm="not a url"')).toThrow('Bearer realm is not a URL: not a url');
  });

  it('should pick the Bearer challenge when Basic is offered first', () => {
    const challenge = parseAuthChallenge(
      'Basic realm="Registry Realm", Bearer realm="https://auth.example.com/token",service="registry.example.com"'
    );

    expect(challenge.realm.toString()).toBe('https://auth.example.com/token');
    expect(challenge.service).toBe('registry.example.com');
  });

  it('should stop a Bearer challenge at the next scheme', () => {
    const challenge = parseAuthChallenge('Bearer realm="https://auth.example.com/token", Basic realm="Registry Realm"');

    expect(challenge.realm.toString()).toBe('https://auth.example.com/token');
    expect(challenge.scope).toEqual([]);
  });

  it('should reject unknown schemes', () => {
    expect(() => parseAuthChallenge('Negotiate abc')).toThrow('Unsupported WWW-Authenticate challenge');
  });
});

describe('parseAuthParams', () => {
  it('should lowercase names and keep order', () => {
    expect(parseAuthParams('Realm="r", SERVICE=s')).toEqual([
      ['realm', 'r'],
      ['service', 's'],
    ]);
  });

  it('should reject malformed lists', () => {
    expect(() => parseAuthParams('realm')).toThrow(RegistryError);
  });
});

describe('challengeScheme', () => {
  it('should classify header values', () => {
    expect(challengeScheme('Bearer realm="x"')).toBe('bearer');
    expect(challengeScheme('Basic realm="x"')).toBe('basic');
    expect(challengeScheme('Digest realm="x"')).toBe('unknown');
    expect(challengeScheme(undefined)).toBe('unknown');
  });

  it('should prefer Bearer among joined challenges', () => {
    expect(challengeScheme('Basic realm="x", Bearer realm="y"')).toBe('bearer');
    expect(challengeScheme('Digest realm="x", Basic realm="y"')).toBe('basic');
  });
});

describe('splitChallenges', () => {
  it('should split at each scheme and keep parameter lists whole', () => {
    expect(splitChallenges('Basic realm="r", Bearer realm="t",service="s"')).toEqual([
      'Basic realm="r"',
      'Bearer realm="t",service="s"',
    ]);
  });

  it('should not split inside quoted values', () => {
    expect(splitChallenges('Bearer realm="t", scope="repository:a/b:pull,push"')).toEqual([
      'Bearer realm="t", scope="repository:a/b:pull,push"',
    ]);
  });
});
