import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { MockAgent } from 'undici';
import { JenkinsClient } from '../client/index.js';
import { JenkinsConfigBuilder } from '../config.js';
import { RoleService } from '../services/roles.js';
import {
  GLOBAL_PERMISSION_TABLE,
  PROJECT_PERMISSION_TABLE,
  permissionFlags,
  permissionIds,
} from '../types/roles.js';
import { JenkinsErrorKind } from '../errors.js';

const JENKINS = 'https://ci.example.com';
const STRATEGY = '/role-strategy/strategy';

function form(expected: Record<string, string>): (body: string) => boolean {
  return (body) => {
    const actual = Object.fromEntries(new URLSearchParams(body));
    return JSON.stringify(Object.entries(actual).sort()) === JSON.stringify(Object.entries(expected).sort());
  };
}

describe('permission tables', () => {
  it('should emit ids in table order whatever the flag order', () => {
    const ids = permissionIds(GLOBAL_PERMISSION_TABLE, {
      scmTag: true,
      itemBuild: true,
      viewRead: false,
      administer: true,
    });

    expect(ids).toEqual(['hudson.model.Hudson.Administer', 'hudson.model.Item.Build', 'hudson.scm.SCM.Tag']);
  });

  it('should start with the administer and read permissions', () => {
    expect(GLOBAL_PERMISSION_TABLE[0]).toEqual(['administer', 'hudson.model.Hudson.Administer']);
    expect(GLOBAL_PERMISSION_TABLE[1]).toEqual(['globalRead', 'hudson.model.Hudson.Read']);
  });

  it('should map project flags', () => {
    expect(permissionIds(PROJECT_PERMISSION_TABLE, { runReplay: true, itemRead: true })).toEqual([
      'hudson.model.Item.Read',
      'hudson.model.Run.Replay',
    ]);
  });

  it('should ignore ids missing from the table', () => {
    expect(
      permissionFlags(PROJECT_PERMISSION_TABLE, {
        'hudson.model.Item.Read': true,
        'hudson.model.Item.Delete': false,
        'hudson.model.Hudson.Administer': true,
      })
    ).toEqual({ itemRead: true });
  });
});

describe('RoleService', () => {
  let agent: MockAgent;
  let roles: RoleService;

  beforeEach(() => {
    agent = new MockAgent();
    agent.disableNetConnect();
    const client = new JenkinsClient(new JenkinsConfigBuilder().baseUrl(JENKINS).crumbEnabled(false).build(), {
      dispatcher: agent,
    });
    roles = new RoleService(client);
  });

  afterEach(async () => {
    agent.assertNoPendingInterceptors();
    await agent.close();
  });

  it('should read a global role', async () => {
    agent
      .get(JENKINS)
      .intercept({ path: `${STRATEGY}/getRole`, method: 'GET', query: { roleName: 'admin', type: 'globalRoles' } })
      .reply(200, {
        permissionIds: {
          'hudson.model.Hudson.Administer': true,
          'hudson.model.Hudson.Read': true,
          'hudson.model.Item.Build': false,
        },
        sids: ['alice'],
      });

    await expect(roles.getGlobalRole('admin')).resolves.toEqual({
      roleName: 'admin',
      permissions: { administer: true, globalRead: true },
      sids: ['alice'],
    });
  });

  it('should read a project role with object sids', async () => {
    agent
      .get(JENKINS)
      .intercept({ path: `${STRATEGY}/getRole`, method: 'GET', query: { roleName: 'team-viewer', type: 'projectRoles' } })
      .reply(200, {
        permissionIds: { 'hudson.model.Item.Read': true },
        sids: [{ type: 'USER', sid: 'bob' }],
        pattern: 'team-.*',
      });

    await expect(roles.getProjectRole('team-viewer')).resolves.toEqual({
      roleName: 'team-viewer',
      pattern: 'team-.*',
      permissions: { itemRead: true },
      sids: ['bob'],
    });
  });

  it('should return null for an unknown role', async () => {
    agent
      .get(JENKINS)
      .intercept({ path: `${STRATEGY}/getRole`, method: 'GET', query: { roleName: 'ghost', type: 'globalRoles' } })
      .reply(200, '{}');

    await expect(roles.getGlobalRole('ghost')).resolves.toBeNull();
  });

  it('should add a global role with its permission ids', async () => {
    agent
      .get(JENKINS)
      .intercept({
        path: `${STRATEGY}/addRole`,
        method: 'POST',
        body: form({
          type: 'globalRoles',
          roleName: 'ops',
          permissionIds: 'hudson.model.Hudson.Read,hudson.model.Item.Build',
          overwrite: 'true',
        }),
      })
      .reply(200, '');

    const role = await roles.addGlobalRole('ops', { itemBuild: true, globalRead: true }, true);

    expect(role).toEqual({ roleName: 'ops', permissions: { itemBuild: true, globalRead: true }, sids: [] });
  });

  it('should add a project role with its pattern', async () => {
    agent
      .get(JENKINS)
      .intercept({
        path: `${STRATEGY}/addRole`,
        method: 'POST',
        body: form({
          type: 'projectRoles',
          roleName: 'team-dev',
          permissionIds: 'hudson.model.Item.Build,hudson.model.Item.Read',
          overwrite: 'false',
          pattern: 'team-.*',
        }),
      })
      .reply(200, '');

    const role = await roles.addProjectRole('team-dev', 'team-.*', { itemRead: true, itemBuild: true }, false);

    expect(role.pattern).toBe('team-.*');
  });

  it('should delete project roles', async () => {
    agent
      .get(JENKINS)
      .intercept({
        path: `${STRATEGY}/removeRoles`,
        method: 'POST',
        body: form({ type: 'projectRoles', roleNames: 'team-dev,team-viewer' }),
      })
      .reply(200, '');

    await roles.deleteProjectRoles(['team-dev', 'team-viewer']);
  });

  it('should require at least one role to delete', async () => {
    await expect(roles.deleteProjectRoles([])).rejects.toMatchObject({ kind: JenkinsErrorKind.MissingParameter });
  });

  it('should remove a user from project roles', async () => {
    agent
      .get(JENKINS)
      .intercept({ path: `${STRATEGY}/deleteSid`, method: 'POST', body: form({ type: 'projectRoles', sid: 'alice' }) })
      .reply(200, '');

    await roles.deleteUserInProject('alice');
  });

  it('should assign global and project roles', async () => {
    const pool = agent.get(JENKINS);
    pool
      .intercept({
        path: `${STRATEGY}/assignRole`,
        method: 'POST',
        body: form({ type: 'globalRoles', roleName: 'ops', sid: 'alice' }),
      })
      .reply(200, '');
    pool
      .intercept({
        path: `${STRATEGY}/assignRole`,
        method: 'POST',
        body: form({ type: 'projectRoles', roleName: 'team-dev', sid: 'bob' }),
      })
      .reply(200, '');

    await roles.assignGlobalRole('ops', 'alice');
    await roles.assignProjectRole('team-dev', 'bob');
  });
});
