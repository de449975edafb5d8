import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { MockAgent } from 'undici';
import { JenkinsClient } from '../client/index.js';
import { JenkinsConfigBuilder, createDefaultConfig } from '../config.js';
import { StaticCredentialProvider, EnvCredentialProvider } from '../auth/index.js';
import { JenkinsErrorKind } from '../errors.js';
import { jobSchema } from '../types/resources.js';

const JENKINS = 'https://ci.example.com';
const BASIC = `Basic ${Buffer.from('admin:test-secret').toString('base64')}`;
const CRUMB_PATH = '/crumbIssuer/api/json';

function crumbReply(value: string): { crumb: string; crumbRequestField: string } {
  return { crumb: value, crumbRequestField: 'Jenkins-Crumb' };
}

function recordingLogger() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe('JenkinsClient', () => {
  let agent: MockAgent;

  beforeEach(() => {
    agent = new MockAgent();
    agent.disableNetConnect();
  });

  afterEach(async () => {
    agent.assertNoPendingInterceptors();
    await agent.close();
  });

  function client(builder: JenkinsConfigBuilder = new JenkinsConfigBuilder()) {
    return new JenkinsClient(builder.baseUrl(JENKINS).userAgent('console-test/1.0').build(), {
      dispatcher: agent,
      credentials: new StaticCredentialProvider('admin', 'test-secret'),
    });
  }

  it('should send basic auth and the user agent on GET', async () => {
    agent
      .get(JENKINS)
      .intercept({
        path: '/api/json',
        method: 'GET',
        headers: { authorization: BASIC, 'user-agent': 'console-test/1.0' },
      })
      .reply(200, '{"mode":"NORMAL"}', { headers: { 'X-Jenkins': '2.440' } });

    const response = await client().get('/api/json');

    expect(response.status).toBe(200);
    expect(response.body).toBe('{"mode":"NORMAL"}');
    expect(response.headers['x-jenkins']).toBe('2.440');
    expect(response.url).toBe(`${JENKINS}/api/json`);
  });

  it('should trim trailing slashes from the base URL', async () => {
    agent.get(JENKINS).intercept({ path: '/api/json', method: 'GET' }).reply(200, '{}');
    const config = { ...new JenkinsConfigBuilder().baseUrl(JENKINS).build(), baseUrl: `${JENKINS}//` };

    const response = await new JenkinsClient(config, { dispatcher: agent }).get('api/json');

    expect(response.url).toBe(`${JENKINS}/api/json`);
  });

  it('should reject a config without connections before any request', () => {
    const config = { ...createDefaultConfig(), baseUrl: JENKINS, maxConnections: 0 };

    expect(() => new JenkinsClient(config, { dispatcher: agent })).toThrow(
      'Invalid Jenkins configuration: maxConnections: Max connections must be at least 1'
    );
  });

  it('should reject a hand-built config with an invalid base URL', () => {
    try {
      new JenkinsClient({ ...createDefaultConfig(), baseUrl: 'ftp://ci.example.com' }, { dispatcher: agent });
      expect.fail('expected the constructor to throw');
    } catch (error) {
      expect(error).toMatchObject({ kind: JenkinsErrorKind.InvalidConfiguration });
    }
  });

  it('should append query parameters and skip undefined values', async () => {
    agent
      .get(JENKINS)
      .intercept({ path: '/job/api/api/json', method: 'GET', query: { depth: '1', tree: 'jobs[name]' } })
      .reply(200, '{}');

    const response = await client().get('/job/api/api/json', {
      query: { depth: 1, tree: 'jobs[name]', missing: undefined },
    });

    expect(response.url).toBe(`${JENKINS}/job/api/api/json?depth=1&tree=jobs%5Bname%5D`);
  });

  it('should fetch a crumb once and attach it to every POST', async () => {
    const pool = agent.get(JENKINS);
    pool.intercept({ path: CRUMB_PATH, method: 'GET', headers: { authorization: BASIC } }).reply(200, crumbReply('c1'));
    pool
      .intercept({ path: '/job/api/doDelete', method: 'POST', headers: { 'jenkins-crumb': 'c1' } })
      .reply(302, '', { headers: { location: `${JENKINS}/` } })
      .times(2);

    const jenkins = client();
    await jenkins.post('/job/api/doDelete');
    const second = await jenkins.post('/job/api/doDelete');

    expect(second.status).toBe(302);
  });

  it('should stop asking for crumbs once the issuer answers 404', async () => {
    const pool = agent.get(JENKINS);
    pool.intercept({ path: CRUMB_PATH, method: 'GET' }).reply(404, '');
    pool
      .intercept({
        path: '/scriptText',
        method: 'POST',
        headers: (headers) => headers['jenkins-crumb'] === undefined,
      })
      .reply(200, '')
      .times(2);

    const jenkins = client();
    await jenkins.postForm('/scriptText', { script: 'println 1' });
    await jenkins.postForm('/scriptText', { script: 'println 2' });
  });

  it('should skip the crumb issuer when crumbs are disabled', async () => {
    agent.get(JENKINS).intercept({ path: '/scriptText', method: 'POST' }).reply(200, '');

    await client(new JenkinsConfigBuilder().crumbEnabled(false)).postForm('/scriptText', { script: '' });
  });

  it('should re-issue a POST once with a fresh crumb after a 403', async () => {
    const pool = agent.get(JENKINS);
    pool.intercept({ path: CRUMB_PATH, method: 'GET' }).reply(200, crumbReply('stale'));
    pool.intercept({ path: CRUMB_PATH, method: 'GET' }).reply(200, crumbReply('fresh'));
    pool
      .intercept({ path: '/job/api/build', method: 'POST', headers: { 'jenkins-crumb': 'stale' } })
      .reply(403, 'No valid crumb was included in the request');
    pool
      .intercept({ path: '/job/api/build', method: 'POST', headers: { 'jenkins-crumb': 'fresh' } })
      .reply(201, '', { headers: { location: `${JENKINS}/queue/item/7/` } });
    const logger = recordingLogger();

    const jenkins = new JenkinsClient(new JenkinsConfigBuilder().baseUrl(JENKINS).build(), {
      dispatcher: agent,
      logger,
    });
    const response = await jenkins.post('/job/api/build');

    expect(response.status).toBe(201);
    expect(logger.warn).toHaveBeenCalledWith('crumb rejected, re-issuing request', {
      url: `${JENKINS}/job/api/build`,
    });
  });

  it('should surface a second 403 as forbidden', async () => {
    const pool = agent.get(JENKINS);
    pool.intercept({ path: CRUMB_PATH, method: 'GET' }).reply(200, crumbReply('c1')).times(2);
    pool.intercept({ path: '/job/api/build', method: 'POST' }).reply(403, '').times(2);

    await expect(client().post('/job/api/build')).rejects.toMatchObject({
      kind: JenkinsErrorKind.Forbidden,
      statusCode: 403,
      url: `${JENKINS}/job/api/build`,
    });
  });

  it('should not re-issue a 403 POST sent without a crumb', async () => {
    const pool = agent.get(JENKINS);
    pool.intercept({ path: CRUMB_PATH, method: 'GET' }).reply(404, '');
    pool.intercept({ path: '/job/api/build', method: 'POST' }).reply(403, '');

    await expect(client().post('/job/api/build')).rejects.toMatchObject({ kind: JenkinsErrorKind.Forbidden });
  });

  it('should fail the POST when the crumb issuer errors', async () => {
    agent.get(JENKINS).intercept({ path: CRUMB_PATH, method: 'GET' }).reply(500, '');

    await expect(client().post('/job/api/build')).rejects.toMatchObject({
      kind: JenkinsErrorKind.CrumbFetchFailed,
      statusCode: 500,
    });
  });

  it.each([
    [400, JenkinsErrorKind.BadRequest],
    [401, JenkinsErrorKind.Unauthorized],
    [404, JenkinsErrorKind.NotFound],
    [409, JenkinsErrorKind.Conflict],
    [500, JenkinsErrorKind.InternalError],
    [503, JenkinsErrorKind.ServiceUnavailable],
    [418, JenkinsErrorKind.UnexpectedStatus],
  ])('should map HTTP %i to %s', async (status, kind) => {
    agent.get(JENKINS).intercept({ path: '/api/json', method: 'GET' }).reply(status, '<html/>');

    await expect(client().get('/api/json')).rejects.toMatchObject({ kind, statusCode: status });
  });

  it('should return error statuses when asked to', async () => {
    agent.get(JENKINS).intercept({ path: '/api/json', method: 'GET' }).reply(503, '');

    const response = await client().get('/api/json', { allowErrorStatus: true });

    expect(response.status).toBe(503);
  });

  it('should decode JSON bodies with a schema', async () => {
    agent
      .get(JENKINS)
      .intercept({ path: '/job/api/api/json', method: 'GET' })
      .reply(200, { name: 'api', url: `${JENKINS}/job/api/`, color: 'blue', extra: true });

    const job = await client().getJson('/job/api/api/json', jobSchema);

    expect(job).toEqual({ name: 'api', url: `${JENKINS}/job/api/`, color: 'blue', builds: [] });
  });

  it('should report non-JSON bodies as deserialization errors', async () => {
    agent.get(JENKINS).intercept({ path: '/job/api/api/json', method: 'GET' }).reply(200, '<html/>');

    await expect(client().getJson('/job/api/api/json', jobSchema)).rejects.toMatchObject({
      kind: JenkinsErrorKind.Deserialization,
    });
  });

  it('should wrap connection failures as network errors', async () => {
    await expect(client().get('/unmatched')).rejects.toMatchObject({
      kind: JenkinsErrorKind.Network,
      url: `${JENKINS}/unmatched`,
    });
  });

  it('should fail before sending when credentials are unavailable', async () => {
    const jenkins = new JenkinsClient(new JenkinsConfigBuilder().baseUrl(JENKINS).build(), {
      dispatcher: agent,
      credentials: new EnvCredentialProvider('JENKINS_USERNAME', 'JENKINS_TOKEN', {}),
    });

    await expect(jenkins.get('/api/json')).rejects.toMatchObject({
      kind: JenkinsErrorKind.CredentialsUnavailable,
      message: 'Failed to get credentials: Environment variable JENKINS_USERNAME not set',
    });
  });

  it('should keep in-flight requests within maxConnections', async () => {
    agent.get(JENKINS).intercept({ path: '/api/json', method: 'GET' }).reply(200, '{}').delay(10).times(5);
    let inFlight = 0;
    let peak = 0;
    const logger = {
      ...recordingLogger(),
      debug: (message: string) => {
        if (message === 'jenkins request') {
          inFlight++;
          peak = Math.max(peak, inFlight);
        } else if (message === 'jenkins response') {
          inFlight--;
        }
      },
    };
    const jenkins = new JenkinsClient(new JenkinsConfigBuilder().baseUrl(JENKINS).maxConnections(2).build(), {
      dispatcher: agent,
      logger,
    });

    const responses = await Promise.all(Array.from({ length: 5 }, () => jenkins.get('/api/json')));

    expect(responses.map((response) => response.status)).toEqual([200, 200, 200, 200, 200]);
    expect(peak).toBe(2);
  });

  it('should not deadlock a POST and its crumb fetch on a single connection', async () => {
    const pool = agent.get(JENKINS);
    pool.intercept({ path: CRUMB_PATH, method: 'GET' }).reply(200, crumbReply('c1'));
    pool.intercept({ path: '/job/api/doDelete', method: 'POST' }).reply(302, '');

    const jenkins = client(new JenkinsConfigBuilder().maxConnections(1));

    await expect(jenkins.post('/job/api/doDelete')).resolves.toMatchObject({ status: 302 });
  });
});
