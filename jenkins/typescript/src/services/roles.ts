/**
 * Jenkins Role Service (role-strategy plugin).
 */

import { z } from 'zod';
import type { JenkinsClient } from '../client/index.js';
import { decodeJson } from '../client/index.js';
import {
  GLOBAL_PERMISSION_TABLE,
  PROJECT_PERMISSION_TABLE,
  ROLE_TYPES,
  permissionFlags,
  permissionIds,
  type GlobalPermissions,
  type GlobalRole,
  type ProjectPermissions,
  type ProjectRole,
  type RoleType,
} from '../types/roles.js';
import { JenkinsError } from '../errors.js';

const STRATEGY_PATH = '/role-strategy/strategy';

const roleResponseSchema = z.object({
  permissionIds: z.record(z.boolean()).default({}),
  // Newer plugin releases report sids as objects
  sids: z
    .array(z.union([z.string(), z.object({ sid: z.string() }).transform((entry) => entry.sid)]))
    .default([]),
  pattern: z.string().optional(),
});
type RoleResponse = z.infer<typeof roleResponseSchema>;

export class RoleService {
  constructor(private readonly client: JenkinsClient) {}

  /**
   * Returns the global role, or null when it does not exist.
   */
  async getGlobalRole(roleName: string): Promise<GlobalRole | null> {
    const raw = await this.getRole(roleName, ROLE_TYPES.global);
    if (!raw) {
      return null;
    }
    return {
      roleName,
      permissions: permissionFlags(GLOBAL_PERMISSION_TABLE, raw.permissionIds),
      sids: raw.sids,
    };
  }

  /**
   * Returns the project role, or null when it does not exist.
   */
  async getProjectRole(roleName: string): Promise<ProjectRole | null> {
    const raw = await this.getRole(roleName, ROLE_TYPES.project);
    if (!raw) {
      return null;
    }
    return {
      roleName,
      pattern: raw.pattern ?? '',
      permissions: permissionFlags(PROJECT_PERMISSION_TABLE, raw.permissionIds),
      sids: raw.sids,
    };
  }

  async addGlobalRole(roleName: string, permissions: GlobalPermissions, overwrite: boolean): Promise<GlobalRole> {
    await this.client.postForm(`${STRATEGY_PATH}/addRole`, {
      type: ROLE_TYPES.global,
      roleName,
      permissionIds: permissionIds(GLOBAL_PERMISSION_TABLE, permissions).join(','),
      overwrite: String(overwrite),
    });
    return { roleName, permissions, sids: [] };
  }

  async addProjectRole(
    roleName: string,
    pattern: string,
    permissions: ProjectPermissions,
    overwrite: boolean
  ): Promise<ProjectRole> {
    await this.client.postForm(`${STRATEGY_PATH}/addRole`, {
      type: ROLE_TYPES.project,
      roleName,
      permissionIds: permissionIds(PROJECT_PERMISSION_TABLE, permissions).join(','),
      overwrite: String(overwrite),
      pattern,
    });
    return { roleName, pattern, permissions, sids: [] };
  }

  async deleteProjectRoles(roleNames: string[]): Promise<void> {
    if (roleNames.length === 0) {
      throw JenkinsError.missingParameter('at least one role name is required');
    }
    await this.client.postForm(`${STRATEGY_PATH}/removeRoles`, {
      type: ROLE_TYPES.project,
      roleNames: roleNames.join(','),
    });
  }

  /**
   * Removes a user from every project role.
   */
  async deleteUserInProject(username: string): Promise<void> {
    await this.client.postForm(`${STRATEGY_PATH}/deleteSid`, {
      type: ROLE_TYPES.project,
      sid: username,
    });
  }

  async assignGlobalRole(roleName: string, sid: string): Promise<void> {
    await this.assignRole(ROLE_TYPES.global, roleName, sid);
  }

  async assignProjectRole(roleName: string, sid: string): Promise<void> {
    await this.assignRole(ROLE_TYPES.project, roleName, sid);
  }

  private async assignRole(type: RoleType, roleName: string, sid: string): Promise<void> {
    await this.client.postForm(`${STRATEGY_PATH}/assignRole`, { type, roleName, sid });
  }

  private async getRole(roleName: string, type: RoleType): Promise<RoleResponse | null> {
    const response = await this.client.get(`${STRATEGY_PATH}/getRole`, {
      query: { roleName, type },
    });
    if (response.body.trim() === '{}') {
      return null;
    }
    return decodeJson(response, roleResponseSchema);
  }
}
