/**
 * Jenkins services module.
 */

import type { Logger } from '@devops-console/logging';
import type { JenkinsClient } from '../client/index.js';
import { JobService } from './jobs.js';
import { BuildService } from './builds.js';
import { FolderService } from './folders.js';
import { CredentialService } from './credentials.js';
import { RoleService } from './roles.js';
import { ScriptService } from './script.js';

export { JobService } from './jobs.js';
export type { CreateJobOptions, BuildJobOptions } from './jobs.js';
export { BuildService } from './builds.js';
export { FolderService, FOLDER_MODE } from './folders.js';
export { CredentialService, credentialDomainPath } from './credentials.js';
export { RoleService } from './roles.js';
export { ScriptService, groovyString, renderMailServerScript } from './script.js';
export type { MailServerConfig, ExecutesResult } from './script.js';

/**
 * Container for all Jenkins services.
 */
export interface JenkinsServices {
  jobs: JobService;
  builds: BuildService;
  folders: FolderService;
  credentials: CredentialService;
  roles: RoleService;
  scripts: ScriptService;
}

/**
 * Creates all Jenkins services with a shared client.
 */
export function createServices(client: JenkinsClient, logger?: Logger): JenkinsServices {
  return {
    jobs: new JobService(client),
    builds: new BuildService(client),
    folders: new FolderService(client),
    credentials: new CredentialService(client),
    roles: new RoleService(client),
    scripts: new ScriptService(client, logger),
  };
}
