import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { MockAgent } from 'undici';
import { gzipSync } from 'zlib';
import { HttpTransport, decodeBody } from '../transport/http.js';
import { RegistryError, RegistryErrorKind } from '../errors.js';

const REGISTRY = 'https://registry.example.com';
const STORAGE = 'https://storage.example.com';

describe('HttpTransport', () => {
  let agent: MockAgent;

  beforeEach(() => {
    agent = new MockAgent();
    agent.disableNetConnect();
  });

  afterEach(async () => {
    agent.assertNoPendingInterceptors();
    await agent.close();
  });

  it('should send the user agent and lowercase header names', async () => {
    agent
      .get(REGISTRY)
      .intercept({
        path: '/v2/',
        method: 'GET',
        headers: { 'user-agent': 'console-test/1.0', 'x-request-id': 'abc' },
      })
      .reply(200, 'ok', { headers: { 'Docker-Distribution-Api-Version': 'registry/2.0' } });

    const transport = new HttpTransport({ dispatcher: agent, userAgent: 'console-test/1.0' });
    const response = await transport.get(`${REGISTRY}/v2/`, { 'X-Request-Id': 'abc' });

    expect(response.status).toBe(200);
    expect(response.body.toString('utf8')).toBe('ok');
    expect(response.headers['docker-distribution-api-version']).toBe('registry/2.0');
    expect(response.url).toBe(`${REGISTRY}/v2/`);
  });

  it('should follow same-origin redirects with the authorization header', async () => {
    agent
      .get(REGISTRY)
      .intercept({ path: '/v2/a/blobs/sha256:1', method: 'GET', headers: { authorization: 'Bearer t' } })
      .reply(307, '', { headers: { location: '/v2/a/blobs/sha256:1/data' } });
    agent
      .get(REGISTRY)
      .intercept({ path: '/v2/a/blobs/sha256:1/data', method: 'GET', headers: { authorization: 'Bearer t' } })
      .reply(200, 'blob');

    const transport = new HttpTransport({ dispatcher: agent });
    const response = await transport.get(`${REGISTRY}/v2/a/blobs/sha256:1`, { Authorization: 'Bearer t' });

    expect(response.body.toString('utf8')).toBe('blob');
    expect(response.url).toBe(`${REGISTRY}/v2/a/blobs/sha256:1/data`);
  });

  it('should drop the authorization header on cross-origin redirects', async () => {
    agent
      .get(REGISTRY)
      .intercept({ path: '/v2/a/blobs/sha256:1', method: 'GET' })
      .reply(302, '', { headers: { location: `${STORAGE}/objects/1?sig=xyz` } });
    agent
      .get(STORAGE)
      .intercept({
        path: '/objects/1?sig=xyz',
        method: 'GET',
        headers: (headers) => headers.authorization === undefined,
      })
      .reply(200, 'blob');

    const transport = new HttpTransport({ dispatcher: agent });
    const response = await transport.get(`${REGISTRY}/v2/a/blobs/sha256:1`, { authorization: 'Bearer t' });

    expect(response.body.toString('utf8')).toBe('blob');
  });

  it('should stop after five redirects', async () => {
    agent
      .get(REGISTRY)
      .intercept({ path: '/loop', method: 'GET' })
      .reply(302, '', { headers: { location: '/loop' } })
      .times(6);

    const transport = new HttpTransport({ dispatcher: agent });

    await expect(transport.get(`${REGISTRY}/loop`)).rejects.toMatchObject({
      kind: RegistryErrorKind.NetworkError,
    });
  });

  it('should return a redirect without location as-is', async () => {
    agent.get(REGISTRY).intercept({ path: '/moved', method: 'GET' }).reply(301, '');

    const response = await new HttpTransport({ dispatcher: agent }).get(`${REGISTRY}/moved`);
    expect(response.status).toBe(301);
  });

  it('should wrap connection failures as network errors', async () => {
    const transport = new HttpTransport({ dispatcher: agent });

    const error = await transport.get(`${REGISTRY}/unmatched`).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(RegistryError);
    expect(error).toMatchObject({ kind: RegistryErrorKind.NetworkError, url: `${REGISTRY}/unmatched` });
  });

  it('should close the pool it created for insecure TLS', async () => {
    const transport = new HttpTransport({ insecureSkipVerify: true });

    await transport.close();
    await transport.close();

    await expect(transport.get(`${REGISTRY}/v2/`)).rejects.toMatchObject({ kind: RegistryErrorKind.NetworkError });
  });

  it('should leave a caller dispatcher open on close', async () => {
    agent.get(REGISTRY).intercept({ path: '/v2/', method: 'GET' }).reply(200, '');
    const transport = new HttpTransport({ dispatcher: agent, insecureSkipVerify: true });

    await transport.close();

    await expect(transport.get(`${REGISTRY}/v2/`)).resolves.toMatchObject({ status: 200 });
  });

  it('should log followed redirects at debug', async () => {
    agent
      .get(REGISTRY)
      .intercept({ path: '/old', method: 'GET' })
      .reply(308, '', { headers: { location: '/new' } });
    agent.get(REGISTRY).intercept({ path: '/new', method: 'GET' }).reply(200, '');
    const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };

    await new HttpTransport({ dispatcher: agent, logger }).get(`${REGISTRY}/old`);

    expect(logger.debug).toHaveBeenCalledWith('following redirect', {
      from: `${REGISTRY}/old`,
      to: `${REGISTRY}/new`,
      status: 308,
    });
  });
});

describe('decodeBody', () => {
  it('should pass through bodies without gzip encoding', () => {
    const body = Buffer.from('plain');
    expect(decodeBody(body, undefined)).toBe(body);
    expect(decodeBody(body, 'identity')).toBe(body);
  });

  it('should gunzip gzip bodies', () => {
    expect(decodeBody(gzipSync(Buffer.from('payload')), 'gzip').toString('utf8')).toBe('payload');
  });

  it('should reject corrupt gzip streams', () => {
    expect(() => decodeBody(Buffer.from('garbage'), 'gzip')).toThrow('Failed to decompress gzip response body');
  });
});
