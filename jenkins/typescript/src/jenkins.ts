/**
 * Entry point tying the requester and services to one Jenkins controller.
 * @module jenkins
 */

import type { Logger } from '@devops-console/logging';
import { NoopLogger } from '@devops-console/logging';
import { JenkinsClient, decodeJson, type JenkinsClientDeps } from './client/index.js';
import { createConfigFromEnv, type JenkinsConfig } from './config.js';
import { EnvCredentialProvider } from './auth/index.js';
import { createServices, type JenkinsServices } from './services/index.js';
import { serverInfoSchema, type ServerInfo } from './types/resources.js';
import { JenkinsError } from './errors.js';

/**
 * A Jenkins controller.
 *
 * @example
 * const jenkins = await new Jenkins(config, { credentials }).init();
 * const queueId = await jenkins.jobs.buildJob('api', { parameters: { BRANCH: 'main' } });
 */
export class Jenkins implements JenkinsServices {
  readonly client: JenkinsClient;
  readonly jobs: JenkinsServices['jobs'];
  readonly builds: JenkinsServices['builds'];
  readonly folders: JenkinsServices['folders'];
  readonly credentials: JenkinsServices['credentials'];
  readonly roles: JenkinsServices['roles'];
  readonly scripts: JenkinsServices['scripts'];

  /** Value of the `X-Jenkins` header seen by `init()`. */
  version = '';
  /** Server summary seen by `init()`. */
  info: ServerInfo | null = null;

  private readonly logger: Logger;

  constructor(config: JenkinsConfig, deps: JenkinsClientDeps = {}) {
    this.logger = deps.logger ?? new NoopLogger();
    this.client = new JenkinsClient(config, deps);
    const services = createServices(this.client, this.logger);
    this.jobs = services.jobs;
    this.builds = services.builds;
    this.folders = services.folders;
    this.credentials = services.credentials;
    this.roles = services.roles;
    this.scripts = services.scripts;
  }

  /**
   * Checks the connection and records the server version.
   *
   * @throws {JenkinsError} When the controller is unreachable or the reply is not Jenkins JSON
   */
  async init(): Promise<this> {
    const response = await this.client.get('/api/json');
    try {
      this.info = decodeJson(response, serverInfoSchema);
    } catch (error) {
      throw JenkinsError.deserialization(
        'Connection failed, please verify that the host and credentials are correct',
        error
      );
    }
    this.version = response.headers['x-jenkins'] ?? '';
    this.logger.info('connected to jenkins', { url: this.client.getConfig().baseUrl, version: this.version });
    return this;
  }

  /**
   * Status code of `/api/json`; error statuses are returned, not thrown.
   */
  async poll(): Promise<number> {
    const response = await this.client.get('/api/json', { allowErrorStatus: true });
    return response.status;
  }
}

/**
 * Creates a Jenkins controller handle from `JENKINS_*` environment variables,
 * with credentials from JENKINS_USERNAME and JENKINS_TOKEN.
 *
 * @throws {JenkinsError} If the configuration is invalid
 */
export function createJenkinsFromEnv(
  deps: Omit<JenkinsClientDeps, 'credentials'> = {},
  env: NodeJS.ProcessEnv = process.env
): Jenkins {
  const config = createConfigFromEnv(env).build();
  return new Jenkins(config, {
    ...deps,
    credentials: new EnvCredentialProvider('JENKINS_USERNAME', 'JENKINS_TOKEN', env),
  });
}
