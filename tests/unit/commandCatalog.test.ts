import { describe, it, expect } from 'vitest';
import { listCommands, dataSchema } from '../../src/dispatcher/commandCatalog.js';
import { buildBlogRegistry } from '../fixtures/blog.js';

describe('command catalog', () => {
  const registry = buildBlogRegistry();
  const commands = listCommands(registry);

  it('lists find_resources and twelve commands per resource', () => {
    expect(commands).toHaveLength(1 + 12 * 3);
    expect(commands[0]?.name).toBe('find_resources');
    expect(commands.filter((c) => c.resource === 'author').map((c) => c.name)).toEqual([
      'list_author',
      'get_author',
      'create_author',
      'update_author',
      'delete_author',
      'describe_author',
      'actions_author',
      'action_author',
      'bulk_author',
      'related_author',
      'history_author',
      'autocomplete_author',
    ]);
  });

  it('describes commands with the resource labels', () => {
    const byName = new Map(commands.map((c) => [c.name, c]));
    expect(byName.get('list_article')?.description).toBe(
      'List articles with filters, search, ordering and pagination',
    );
    expect(byName.get('get_author')?.description).toBe('Get one author by id');
  });

  it('builds the create schema from writable fields', () => {
    const author = registry.get('author');
    if (!author) throw new Error('author');
    expect(dataSchema(author, true)).toEqual({
      type: 'object',
      properties: {
        name: { type: 'string', maxLength: 100 },
        email: { type: 'string', format: 'email', maxLength: 254 },
        bio: { type: 'string', nullable: true },
      },
      additionalProperties: false,
      required: ['name', 'email'],
    });
  });

  it('omits read-only fields and includes defaults', () => {
    const article = registry.get('article');
    if (!article) throw new Error('article');
    const schema = dataSchema(article, false);
    const properties = schema.properties;
    expect(properties && typeof properties === 'object' ? Object.keys(properties) : []).toEqual(['title', 'content', 'author', 'is_published']);
    expect(schema.required).toBeUndefined();
  });

  it('lists custom actions in the action command schema', () => {
    const action = commands.find((c) => c.name === 'action_article');
    expect(action?.inputSchema).toMatchObject({
      properties: { action: { type: 'string', enum: ['delete_selected', 'publish'] } },
      required: ['action', 'ids'],
    });
  });

  it('describes child collections on update', () => {
    const update = commands.find((c) => c.name === 'update_author');
    expect(update?.inputSchema).toMatchObject({
      properties: { children: { type: 'object', properties: { article: { type: 'array' } } } },
    });
  });
});
