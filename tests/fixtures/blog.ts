import type { Knex } from 'knex';
import { defineResource } from '../../src/resources/modelResource.js';
import { ResourceRegistry } from '../../src/resources/registry.js';
import { parsePermission } from '../../src/core/permissions.js';
import type { Principal } from '../../src/core/types.js';
import type { ResourceAction } from '../../src/resources/descriptor.js';

export async function createBlogSchema(db: Knex): Promise<void> {
  await db.schema.createTable('authors', (t) => {
    t.increments('id');
    t.string('name', 100).notNullable();
    t.string('email', 254).notNullable().unique();
    t.text('bio').nullable();
  });
  await db.schema.createTable('articles', (t) => {
    t.increments('id');
    t.string('title', 200).notNullable();
    t.text('content').notNullable().defaultTo('');
    t.integer('author_id').notNullable().references('id').inTable('authors');
    t.string('published_at', 30).nullable();
    t.boolean('is_published').notNullable().defaultTo(false);
  });
  await db.schema.createTable('tags', (t) => {
    t.string('slug', 50).primary();
    t.string('label', 100).notNullable();
  });
}

const publish: ResourceAction = {
  name: 'publish',
  description: 'Mark selected articles as published',
  async run({ store, resource, rows }) {
    const table = store.table(resource.table, resource.primaryKey);
    for (const row of rows) {
      await table.update(Number(row.id), { is_published: true, published_at: '2024-05-01T00:00:00.000Z' });
    }
    return { message: `Published ${rows.length} articles` };
  },
};

export function buildBlogRegistry(): ResourceRegistry {
  const registry = new ResourceRegistry();
  registry.register(
    defineResource({
      name: 'author',
      table: 'authors',
      fields: {
        name: { type: 'string', maxLength: 100 },
        email: { type: 'email', maxLength: 254, unique: true },
        bio: { type: 'text', nullable: true },
      },
      searchFields: ['name', 'email'],
      ordering: ['name'],
      children: [{ resource: 'article', field: 'author' }],
      repr: 'name',
    }),
  );
  registry.register(
    defineResource({
      name: 'article',
      table: 'articles',
      fields: {
        title: { type: 'string', maxLength: 200 },
        content: { type: 'text', default: '' },
        author: { type: 'relation', target: 'author', relatedName: 'articles' },
        published_at: { type: 'datetime', nullable: true },
        is_published: { type: 'boolean', default: false },
      },
      searchFields: ['title'],
      ordering: ['title'],
      readonlyFields: ['published_at'],
      actions: [publish],
      repr: 'title',
    }),
  );
  registry.register(
    defineResource({
      name: 'tag',
      table: 'tags',
      primaryKey: 'slug',
      fields: {
        slug: { type: 'string', primaryKey: true, editable: true, maxLength: 50 },
        label: { type: 'string', maxLength: 100 },
      },
      repr: 'label',
      permission: false,
    }),
  );
  return registry;
}

export function principal(permissions: string[], groups: Record<string, string[]> = {}): Principal {
  return {
    id: 'cred-1',
    name: 'test credential',
    auditId: 'owner-1',
    permissions: permissions.map(parsePermission),
    groups: Object.entries(groups).map(([name, perms]) => ({ name, permissions: perms.map(parsePermission) })),
  };
}

export const ALL_BLOG_PERMISSIONS = ['author', 'article'].flatMap((r) =>
  ['view', 'add', 'change', 'delete'].map((a) => `${r}:${a}`),
);
