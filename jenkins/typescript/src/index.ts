/**
 * @devops-console/jenkins - Jenkins API client
 *
 * - Folder, job and build management
 * - Credentials in the system and folder stores
 * - Role-strategy roles with a static permission table
 * - Script console and mail server setup
 * - CSRF/crumb protection and a bounded number of in-flight requests
 *
 * @module @devops-console/jenkins
 */

// Paths
export { folderPath, jobPath, buildPath, queueIdFromLocation } from './types/refs.js';

// Resources
export type { Job, JobSummary, Folder, Build, BuildSummary, ServerInfo } from './types/resources.js';
export { jobSchema, folderSchema, buildSchema, serverInfoSchema } from './types/resources.js';

// Credentials
export type {
  Credential,
  CredentialScope,
  CredentialStore,
  SshCredential,
  UsernamePasswordCredential,
  SecretTextCredential,
  KubeconfigCredential,
} from './types/credentials.js';
export { credentialPayload, CREDENTIAL_CLASSES, DEFAULT_CREDENTIAL_DOMAIN } from './types/credentials.js';

// Roles
export type {
  GlobalPermission,
  ProjectPermission,
  GlobalPermissions,
  ProjectPermissions,
  GlobalRole,
  ProjectRole,
  RoleType,
  PermissionTable,
} from './types/roles.js';
export {
  GLOBAL_PERMISSION_TABLE,
  PROJECT_PERMISSION_TABLE,
  ROLE_TYPES,
  permissionIds,
  permissionFlags,
} from './types/roles.js';

// Errors
export { JenkinsErrorKind, JenkinsError, isJenkinsError } from './errors.js';

// Config
export type { JenkinsConfig } from './config.js';
export {
  DEFAULT_TIMEOUT,
  DEFAULT_MAX_CONNECTIONS,
  DEFAULT_CRUMB_TTL,
  DEFAULT_USER_AGENT,
  JenkinsConfigBuilder,
  createConfigFromEnv,
  createDefaultConfig,
  validateConfig,
} from './config.js';

// Auth
export type { JenkinsCredentials, CredentialProvider } from './auth/index.js';
export { SecretString, StaticCredentialProvider, EnvCredentialProvider, basicAuthorization } from './auth/index.js';

// Client
export type { Crumb, CrumbIssuerResponse } from './client/crumb.js';
export { CrumbManager, CRUMB_ISSUER_PATH } from './client/crumb.js';
export { Semaphore } from './client/semaphore.js';
export type {
  HttpMethod,
  QueryParams,
  RequestOptions,
  RequestBody,
  JenkinsResponse,
  JenkinsClientDeps,
} from './client/index.js';
export { JenkinsClient, decodeJson } from './client/index.js';

// Services
export {
  JobService,
  BuildService,
  FolderService,
  FOLDER_MODE,
  CredentialService,
  credentialDomainPath,
  RoleService,
  ScriptService,
  groovyString,
  renderMailServerScript,
  createServices,
} from './services/index.js';
export type {
  CreateJobOptions,
  BuildJobOptions,
  MailServerConfig,
  ExecutesResult,
  JenkinsServices,
} from './services/index.js';

// Entry point
export { Jenkins, createJenkinsFromEnv } from './jenkins.js';
