import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createTestGateway, payloadOf, type TestGateway } from '../utils/gateway.js';
import { ALL_BLOG_PERMISSIONS, principal } from '../fixtures/blog.js';
import { __enableTestLogCollector, __resetLoggerForTests } from '../../src/utils/logging.js';

const admin = principal(ALL_BLOG_PERMISSIONS);

describe('CRUD commands', () => {
  let t: TestGateway;

  const call = (name: string, args: unknown = {}) => t.gateway.call(admin, name, args);

  beforeEach(async () => {
    t = await createTestGateway();
  });

  afterEach(async () => {
    await t.db.destroy();
  });

  async function seedAuthors() {
    await call('create_author', { data: { name: 'Ada Lovelace', email: 'ada@example.com' } });
    await call('create_author', { data: { name: 'Grace Hopper', email: 'grace@example.com', bio: 'Compilers' } });
    await call('create_author', { data: { name: 'Alan Turing', email: 'alan@example.com' } });
  }

  it('creates an object and returns its public form', async () => {
    const result = await call('create_author', { data: { name: 'Ada', email: 'ada@example.com' } });
    expect(result).toEqual({
      success: true,
      payload: { id: 1, object: { id: 1, name: 'Ada', email: 'ada@example.com', bio: null } },
    });
  });

  it('fills defaults and accepts the relation column name', async () => {
    await call('create_author', { data: { name: 'Ada', email: 'ada@example.com' } });
    const result = await call('create_article', { data: { title: 'Intro', author_id: 1 } });
    expect(payloadOf(result)).toEqual({
      id: 1,
      object: { id: 1, title: 'Intro', content: '', author: 1, published_at: null, is_published: false },
    });
  });

  it('reports field validation errors', async () => {
    const result = await call('create_author', { data: { name: '' } });
    expect(result).toEqual({
      success: false,
      error: {
        code: 'validation_error',
        message: 'Validation failed',
        details: {
          errors: [
            { field: 'name', messages: ['This field is required.'] },
            { field: 'email', messages: ['This field is required.'] },
          ],
          errorCount: 2,
          fieldsWithErrors: ['name', 'email'],
        },
      },
    });
  });

  it('maps a missing referenced object to invalid_reference', async () => {
    const result = await call('create_article', { data: { title: 'Orphan', author: 99 } });
    expect(result).toEqual({
      success: false,
      error: { code: 'invalid_reference', message: 'A referenced object does not exist or is still referenced' },
    });
  });

  it('maps unique violations to duplicate_entry without leaking driver text', async () => {
    const original = process.env.LOG_LEVEL;
    process.env.LOG_LEVEL = 'warn';
    const logs = __enableTestLogCollector();
    try {
      await call('create_author', { data: { name: 'Ada', email: 'ada@example.com' } });
      const result = await call('create_author', { data: { name: 'Other', email: 'ada@example.com' } });
      expect(result).toEqual({
        success: false,
        error: { code: 'duplicate_entry', message: 'An object with the same unique value already exists' },
      });
      const entries = logs.map((line) => JSON.parse(line));
      const storage = entries.find((e) => e.msg === 'Storage error during create_author');
      expect(storage?.code).toBe('duplicate_entry');
      expect(storage?.level).toBe(40);
      const records = await t.gateway.engine.deps.audit.listForResource('author');
      expect(records.map((r) => [r.kind, r.objectId])).toEqual([['create', '1']]);
      expect(payloadOf(await call('list_author'))).toMatchObject({ totalCount: 1 });
    } finally {
      process.env.LOG_LEVEL = original;
      __resetLoggerForTests();
    }
  });

  it('lists with ordering, search, filters and pagination', async () => {
    await seedAuthors();
    const page = await call('list_author', { limit: 2, offset: 1 });
    expect(payloadOf(page)).toEqual({
      count: 2,
      totalCount: 3,
      results: [
        { id: 3, name: 'Alan Turing', email: 'alan@example.com', bio: null },
        { id: 2, name: 'Grace Hopper', email: 'grace@example.com', bio: 'Compilers' },
      ],
    });

    const search = payloadOf(await call('list_author', { search: 'GRACE' }));
    expect(search).toMatchObject({ count: 1, totalCount: 1, results: [{ id: 2 }] });

    const filtered = payloadOf(await call('list_author', { filters: { name__startswith: 'A', unknown: 1 }, orderBy: ['-name'] }));
    expect(filtered).toMatchObject({ count: 2, results: [{ name: 'Alan Turing' }, { name: 'Ada Lovelace' }] });
  });

  it('gets an object with its children and related objects', async () => {
    await seedAuthors();
    await call('create_article', { data: { title: 'Notes', author: 1 } });
    const result = await call('get_author', { id: '1', includeChildren: true, includeRelated: true });
    const article = { id: 1, title: 'Notes', content: '', author: 1, published_at: null, is_published: false };
    expect(payloadOf(result)).toEqual({
      id: 1,
      name: 'Ada Lovelace',
      email: 'ada@example.com',
      bio: null,
      _children: { article: [article] },
      _related: { articles: [article] },
    });
  });

  it('omits children the principal may not view', async () => {
    await seedAuthors();
    await call('create_article', { data: { title: 'Notes', author: 1 } });
    const result = await t.gateway.call(principal(['author:view']), 'get_author', { id: 1, includeChildren: true });
    expect(payloadOf(result)).toMatchObject({ _children: {} });
  });

  it('returns not_found for a missing object', async () => {
    expect(await call('get_author', { id: 42 })).toEqual({
      success: false,
      error: { code: 'not_found', message: 'Author 42 not found' },
    });
  });

  it('updates fields and records the change', async () => {
    await call('create_author', { data: { name: 'Ada', email: 'ada@example.com' } });
    const result = await call('update_author', { id: 1, data: { bio: 'Math' } });
    expect(result).toEqual({
      success: true,
      payload: { object: { id: 1, name: 'Ada', email: 'ada@example.com', bio: 'Math' } },
    });
    const records = await t.gateway.engine.deps.audit.listForResource('author');
    expect(records.map((r) => [r.kind, r.message, r.principalId])).toEqual([
      ['create', 'Created: {"email":"ada@example.com","name":"Ada"}', 'owner-1'],
      ['change', 'Changed: {"bio":"Math"}', 'owner-1'],
    ]);
  });

  it('rejects read-only fields without changing anything', async () => {
    await call('create_author', { data: { name: 'Ada', email: 'ada@example.com' } });
    await call('create_article', { data: { title: 'Intro', author: 1 } });
    const result = await call('update_article', { id: 1, data: { title: 'Changed', published_at: '2024-01-01T00:00:00Z' } });
    expect(result).toEqual({
      success: false,
      error: {
        code: 'invalid_field',
        message: 'Cannot update readonly fields: published_at',
        details: { readonlyFields: ['published_at'] },
      },
    });
    expect(payloadOf(await call('get_article', { id: 1 }))).toMatchObject({ title: 'Intro', published_at: null });
  });

  it('applies child changes independently inside the parent update', async () => {
    await seedAuthors();
    await call('create_article', { data: { title: 'First', author: 1 } });
    await call('create_article', { data: { title: 'Elsewhere', author: 2 } });

    const result = await call('update_author', {
      id: 1,
      children: {
        article: [
          { data: { title: 'Second' } },
          { id: 1, data: { title: 'First, revised' } },
          { data: {} },
          { id: 2, data: { title: 'Not mine' } },
        ],
      },
    });

    expect(payloadOf(result)).toEqual({
      object: { id: 1, name: 'Ada Lovelace', email: 'ada@example.com', bio: null },
      children: {
        created: [{ resource: 'article', id: 3 }],
        updated: [{ resource: 'article', id: 1 }],
        deleted: [],
        errors: [
          {
            resource: 'article',
            index: 2,
            error: {
              code: 'validation_error',
              message: 'Validation failed',
              details: {
                errors: [{ field: 'title', messages: ['This field is required.'] }],
                errorCount: 1,
                fieldsWithErrors: ['title'],
              },
            },
          },
          { resource: 'article', index: 3, id: 2, error: { code: 'not_found', message: 'Article 2 not found' } },
        ],
      },
    });
    expect(payloadOf(await call('get_article', { id: 2 }))).toMatchObject({ title: 'Elsewhere' });
    const authorAudit = await t.gateway.engine.deps.audit.listForObject('author', '1', 10);
    expect(authorAudit[0]?.message).toBe('Updated children: article');
  });

  it('deletes child objects and rejects unknown child collections', async () => {
    await seedAuthors();
    await call('create_article', { data: { title: 'First', author: 1 } });
    const removed = await call('update_author', { id: 1, children: { article: [{ id: 1, delete: true }] } });
    expect(payloadOf(removed)).toMatchObject({ children: { deleted: [{ resource: 'article', id: 1 }], errors: [] } });

    const unknown = await call('update_author', { id: 1, children: { comment: [] } });
    expect(unknown).toEqual({
      success: false,
      error: { code: 'invalid_field', message: 'Unknown child resource: comment', details: { children: ['article'] } },
    });
  });

  it('deletes an object and keeps its audit trail', async () => {
    await call('create_author', { data: { name: 'Ada', email: 'ada@example.com' } });
    await call('create_article', { data: { title: 'Intro', author: 1 } });
    expect(await call('delete_article', { id: 1 })).toEqual({
      success: true,
      payload: { id: 1, message: 'Article 1 deleted successfully' },
    });
    expect((await call('get_article', { id: 1 })).success).toBe(false);
    const records = await t.gateway.engine.deps.audit.listForResource('article');
    expect(records.map((r) => [r.kind, r.objectId, r.objectRepr])).toEqual([
      ['create', '1', 'Intro'],
      ['delete', '1', 'Intro'],
    ]);
  });

  it('rolls back the audit record when a delete is blocked by references', async () => {
    await call('create_author', { data: { name: 'Ada', email: 'ada@example.com' } });
    await call('create_article', { data: { title: 'Intro', author: 1 } });
    expect(await call('delete_author', { id: 1 })).toEqual({
      success: false,
      error: { code: 'invalid_reference', message: 'A referenced object does not exist or is still referenced' },
    });
    const records = await t.gateway.engine.deps.audit.listForResource('author');
    expect(records.map((r) => r.kind)).toEqual(['create']);
  });

  it('supports resources with a string primary key', async () => {
    expect(payloadOf(await call('create_tag', { data: { slug: 'ts', label: 'TypeScript' } }))).toEqual({
      id: 'ts',
      object: { slug: 'ts', label: 'TypeScript' },
    });
    expect(payloadOf(await call('get_tag', { id: 'ts' }))).toEqual({ slug: 'ts', label: 'TypeScript' });
  });

  it('reloads an object whose editable primary key was changed', async () => {
    await call('create_tag', { data: { slug: 'ts', label: 'TypeScript' } });
    expect(await call('update_tag', { id: 'ts', data: { slug: 'typescript', label: 'TS' } })).toEqual({
      success: true,
      payload: { object: { slug: 'typescript', label: 'TS' } },
    });
    expect(payloadOf(await call('list_tag'))).toEqual({
      count: 1,
      totalCount: 1,
      results: [{ slug: 'typescript', label: 'TS' }],
    });
    expect(await call('get_tag', { id: 'ts' })).toEqual({
      success: false,
      error: { code: 'not_found', message: 'Tag ts not found' },
    });
    const records = await t.gateway.engine.deps.audit.listForResource('tag');
    expect(records.map((r) => [r.kind, r.objectId])).toEqual([
      ['create', 'ts'],
      ['change', 'typescript'],
    ]);
  });

  it('rejects a child delete that names no id', async () => {
    await seedAuthors();
    const result = await call('update_author', {
      id: 1,
      children: { article: [{ delete: true, data: { title: 'Ghost' } }] },
    });
    expect(payloadOf(result)).toEqual({
      object: { id: 1, name: 'Ada Lovelace', email: 'ada@example.com', bio: null },
      children: {
        created: [],
        updated: [],
        deleted: [],
        errors: [
          {
            resource: 'article',
            index: 0,
            error: { code: 'invalid_input', message: 'Child article delete requires an id' },
          },
        ],
      },
    });
    expect(payloadOf(await call('list_article'))).toMatchObject({ totalCount: 0 });
  });

  it('skips the audit trail for anonymous callers', async () => {
    await t.gateway.call(null, 'create_author', { data: { name: 'Ada', email: 'ada@example.com' } });
    expect(await t.gateway.engine.deps.audit.listForResource('author')).toEqual([]);
  });
});
