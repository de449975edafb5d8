/**
 * Role-strategy plugin types and the static permission tables.
 *
 * Permission flags are mapped to Jenkins permission ids by walking the
 * tables in order, so the id list sent to the server is stable.
 *
 * @module roles
 */

/** Wire value of the `type` parameter for each role kind. */
export const ROLE_TYPES = {
  global: 'globalRoles',
  project: 'projectRoles',
} as const;

export type RoleType = (typeof ROLE_TYPES)[keyof typeof ROLE_TYPES];

/**
 * Ordered pairs of flag name and permission id.
 */
export type PermissionTable<K extends string> = ReadonlyArray<readonly [K, string]>;

export const GLOBAL_PERMISSION_TABLE = [
  ['administer', 'hudson.model.Hudson.Administer'],
  ['globalRead', 'hudson.model.Hudson.Read'],
  ['credentialCreate', 'com.cloudbees.plugins.credentials.CredentialsProvider.Create'],
  ['credentialUpdate', 'com.cloudbees.plugins.credentials.CredentialsProvider.Update'],
  ['credentialView', 'com.cloudbees.plugins.credentials.CredentialsProvider.View'],
  ['credentialDelete', 'com.cloudbees.plugins.credentials.CredentialsProvider.Delete'],
  ['credentialManageDomains', 'com.cloudbees.plugins.credentials.CredentialsProvider.ManageDomains'],
  ['slaveCreate', 'hudson.model.Computer.Create'],
  ['slaveConfigure', 'hudson.model.Computer.Configure'],
  ['slaveDelete', 'hudson.model.Computer.Delete'],
  ['slaveBuild', 'hudson.model.Computer.Build'],
  ['slaveConnect', 'hudson.model.Computer.Connect'],
  ['slaveDisconnect', 'hudson.model.Computer.Disconnect'],
  ['itemBuild', 'hudson.model.Item.Build'],
  ['itemCreate', 'hudson.model.Item.Create'],
  ['itemRead', 'hudson.model.Item.Read'],
  ['itemConfigure', 'hudson.model.Item.Configure'],
  ['itemCancel', 'hudson.model.Item.Cancel'],
  ['itemMove', 'hudson.model.Item.Move'],
  ['itemDiscover', 'hudson.model.Item.Discover'],
  ['itemWorkspace', 'hudson.model.Item.Workspace'],
  ['itemDelete', 'hudson.model.Item.Delete'],
  ['runUpdate', 'hudson.model.Run.Update'],
  ['runDelete', 'hudson.model.Run.Delete'],
  ['viewCreate', 'hudson.model.View.Create'],
  ['viewConfigure', 'hudson.model.View.Configure'],
  ['viewRead', 'hudson.model.View.Read'],
  ['viewDelete', 'hudson.model.View.Delete'],
  ['scmTag', 'hudson.scm.SCM.Tag'],
] as const;

export const PROJECT_PERMISSION_TABLE = [
  ['credentialCreate', 'com.cloudbees.plugins.credentials.CredentialsProvider.Create'],
  ['credentialUpdate', 'com.cloudbees.plugins.credentials.CredentialsProvider.Update'],
  ['credentialView', 'com.cloudbees.plugins.credentials.CredentialsProvider.View'],
  ['credentialDelete', 'com.cloudbees.plugins.credentials.CredentialsProvider.Delete'],
  ['credentialManageDomains', 'com.cloudbees.plugins.credentials.CredentialsProvider.ManageDomains'],
  ['itemBuild', 'hudson.model.Item.Build'],
  ['itemCreate', 'hudson.model.Item.Create'],
  ['itemRead', 'hudson.model.Item.Read'],
  ['itemConfigure', 'hudson.model.Item.Configure'],
  ['itemCancel', 'hudson.model.Item.Cancel'],
  ['itemMove', 'hudson.model.Item.Move'],
  ['itemDiscover', 'hudson.model.Item.Discover'],
  ['itemWorkspace', 'hudson.model.Item.Workspace'],
  ['itemDelete', 'hudson.model.Item.Delete'],
  ['runUpdate', 'hudson.model.Run.Update'],
  ['runDelete', 'hudson.model.Run.Delete'],
  ['runReplay', 'hudson.model.Run.Replay'],
  ['scmTag', 'hudson.scm.SCM.Tag'],
] as const;

export type GlobalPermission = (typeof GLOBAL_PERMISSION_TABLE)[number][0];
export type ProjectPermission = (typeof PROJECT_PERMISSION_TABLE)[number][0];

export type GlobalPermissions = Partial<Record<GlobalPermission, boolean>>;
export type ProjectPermissions = Partial<Record<ProjectPermission, boolean>>;

export interface GlobalRole {
  roleName: string;
  permissions: GlobalPermissions;
  /** Users and groups assigned to the role. */
  sids: string[];
}

export interface ProjectRole {
  roleName: string;
  /** Regular expression over item names the role applies to. */
  pattern: string;
  permissions: ProjectPermissions;
  sids: string[];
}

/**
 * Permission ids of the set flags, in table order.
 */
export function permissionIds<K extends string>(
  table: PermissionTable<K>,
  flags: Partial<Record<K, boolean>>
): string[] {
  return table.filter(([name]) => flags[name] === true).map(([, id]) => id);
}

/**
 * Flags for the granted ids; ids missing from the table are ignored.
 */
export function permissionFlags<K extends string>(
  table: PermissionTable<K>,
  granted: Record<string, boolean>
): Partial<Record<K, boolean>> {
  const flags: Partial<Record<K, boolean>> = {};
  for (const [name, id] of table) {
    if (granted[id] === true) {
      flags[name] = true;
    }
  }
  return flags;
}
