import type { Knex } from 'knex';
import { getKnex } from '../db/client.js';
import { CORE_TABLES } from '../db/schema.js';
import { NotFoundError, RepositoryError } from './errors.js';
import type { Permission, PermissionGroup } from '../core/types.js';

interface GroupRow {
  id: number;
  name: string;
}

interface PermissionRow {
  resource: string;
  action: string;
}

function mapPermission(row: PermissionRow): Permission {
  return { resource: row.resource, action: row.action };
}

/** Direct credential permissions, permission groups and group membership. */
export class GrantRepository {
  constructor(private readonly db: Knex = getKnex()) {}

  async grantToCredential(credentialId: string, permission: Permission): Promise<void> {
    try {
      await this.db(CORE_TABLES.credentialPermissions)
        .insert({ credential_id: credentialId, resource: permission.resource, action: permission.action })
        .onConflict(['credential_id', 'resource', 'action'])
        .ignore();
    } catch (err) {
      throw new RepositoryError(`Failed to grant permission to credential ${credentialId}`, err);
    }
  }

  async listForCredential(credentialId: string): Promise<Permission[]> {
    try {
      const rows: PermissionRow[] = await this.db(CORE_TABLES.credentialPermissions)
        .where({ credential_id: credentialId })
        .select('resource', 'action')
        .orderBy(['resource', 'action']);
      return rows.map(mapPermission);
    } catch (err) {
      throw new RepositoryError(`Failed to list permissions of credential ${credentialId}`, err);
    }
  }

  /** Creates the group if needed and adds the permissions it does not hold yet. */
  async upsertGroup(name: string, permissions: Permission[]): Promise<PermissionGroup> {
    try {
      await this.db(CORE_TABLES.groups).insert({ name }).onConflict('name').ignore();
      const group = await this.findGroup(name);
      if (!group) throw new NotFoundError(`Group ${name} not found`);
      for (const p of permissions) {
        await this.db(CORE_TABLES.groupPermissions)
          .insert({ group_id: group.id, resource: p.resource, action: p.action })
          .onConflict(['group_id', 'resource', 'action'])
          .ignore();
      }
      return { name, permissions: await this.groupPermissions(group.id) };
    } catch (err) {
      if (err instanceof NotFoundError) throw err;
      throw new RepositoryError(`Failed to save group ${name}`, err);
    }
  }

  async addMember(credentialId: string, groupName: string): Promise<void> {
    try {
      const group = await this.findGroup(groupName);
      if (!group) throw new NotFoundError(`Group ${groupName} not found`);
      await this.db(CORE_TABLES.credentialGroups)
        .insert({ credential_id: credentialId, group_id: group.id })
        .onConflict(['credential_id', 'group_id'])
        .ignore();
    } catch (err) {
      if (err instanceof NotFoundError) throw err;
      throw new RepositoryError(`Failed to add credential ${credentialId} to group ${groupName}`, err);
    }
  }

  async listGroupsForCredential(credentialId: string): Promise<PermissionGroup[]> {
    try {
      const groups: GroupRow[] = await this.db(CORE_TABLES.groups)
        .join(CORE_TABLES.credentialGroups, `${CORE_TABLES.groups}.id`, `${CORE_TABLES.credentialGroups}.group_id`)
        .where(`${CORE_TABLES.credentialGroups}.credential_id`, credentialId)
        .select(`${CORE_TABLES.groups}.id`, `${CORE_TABLES.groups}.name`)
        .orderBy(`${CORE_TABLES.groups}.name`);
      const out: PermissionGroup[] = [];
      for (const g of groups) {
        out.push({ name: g.name, permissions: await this.groupPermissions(g.id) });
      }
      return out;
    } catch (err) {
      throw new RepositoryError(`Failed to list groups of credential ${credentialId}`, err);
    }
  }

  private async findGroup(name: string): Promise<GroupRow | undefined> {
    const row: GroupRow | undefined = await this.db(CORE_TABLES.groups).where({ name }).first('id', 'name');
    return row;
  }

  private async groupPermissions(groupId: number): Promise<Permission[]> {
    const rows: PermissionRow[] = await this.db(CORE_TABLES.groupPermissions)
      .where({ group_id: groupId })
      .select('resource', 'action')
      .orderBy(['resource', 'action']);
    return rows.map(mapPermission);
  }
}
