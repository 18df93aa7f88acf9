import type { Knex } from 'knex';

export const CORE_TABLES = {
  credentials: 'credentials',
  groups: 'permission_groups',
  groupPermissions: 'group_permissions',
  credentialPermissions: 'credential_permissions',
  credentialGroups: 'credential_groups',
  auditLog: 'audit_log',
} as const;

/** Creates the credential, grant and audit tables when they are missing. Safe to run repeatedly. */
export async function ensureCoreSchema(db: Knex): Promise<void> {
  if (!(await db.schema.hasTable(CORE_TABLES.credentials))) {
    await db.schema.createTable(CORE_TABLES.credentials, (t) => {
      t.string('id', 36).primary();
      t.string('name', 200).notNullable();
      t.string('token_key', 32).notNullable().unique();
      t.string('token_hash', 64).notNullable();
      t.string('salt', 64).notNullable();
      t.string('owner_id', 100).notNullable();
      t.boolean('is_active').notNullable().defaultTo(true);
      t.string('created_at', 30).notNullable();
      t.string('expires_at', 30).nullable();
      t.string('last_used_at', 30).nullable();
    });
  }

  if (!(await db.schema.hasTable(CORE_TABLES.groups))) {
    await db.schema.createTable(CORE_TABLES.groups, (t) => {
      t.increments('id');
      t.string('name', 150).notNullable().unique();
    });
  }

  if (!(await db.schema.hasTable(CORE_TABLES.groupPermissions))) {
    await db.schema.createTable(CORE_TABLES.groupPermissions, (t) => {
      t.integer('group_id').notNullable().references('id').inTable(CORE_TABLES.groups).onDelete('CASCADE');
      t.string('resource', 100).notNullable();
      t.string('action', 100).notNullable();
      t.primary(['group_id', 'resource', 'action']);
    });
  }

  if (!(await db.schema.hasTable(CORE_TABLES.credentialPermissions))) {
    await db.schema.createTable(CORE_TABLES.credentialPermissions, (t) => {
      t.string('credential_id', 36)
        .notNullable()
        .references('id')
        .inTable(CORE_TABLES.credentials)
        .onDelete('CASCADE');
      t.string('resource', 100).notNullable();
      t.string('action', 100).notNullable();
      t.primary(['credential_id', 'resource', 'action']);
    });
  }

  if (!(await db.schema.hasTable(CORE_TABLES.credentialGroups))) {
    await db.schema.createTable(CORE_TABLES.credentialGroups, (t) => {
      t.string('credential_id', 36)
        .notNullable()
        .references('id')
        .inTable(CORE_TABLES.credentials)
        .onDelete('CASCADE');
      t.integer('group_id').notNullable().references('id').inTable(CORE_TABLES.groups).onDelete('CASCADE');
      t.primary(['credential_id', 'group_id']);
    });
  }

  if (!(await db.schema.hasTable(CORE_TABLES.auditLog))) {
    await db.schema.createTable(CORE_TABLES.auditLog, (t) => {
      t.increments('id');
      t.string('principal_id', 100).notNullable();
      t.string('resource', 100).notNullable();
      t.string('object_id', 100).notNullable();
      t.string('object_repr', 200).notNullable();
      t.string('action', 10).notNullable();
      t.text('change_message').notNullable();
      t.string('action_time', 30).notNullable();
      t.index(['resource', 'object_id']);
    });
  }
}
