import { describe, it, expect } from 'vitest';
import { clampLimit, resolveFilters, resolveOrdering, resolveSearch } from '../../src/engine/query.js';
import { buildBlogRegistry } from '../fixtures/blog.js';
import type { ResourceDescriptor } from '../../src/resources/descriptor.js';

const registry = buildBlogRegistry();

function descriptor(name: string): ResourceDescriptor {
  const d = registry.get(name);
  if (!d) throw new Error(`missing fixture resource ${name}`);
  return d;
}

describe('resolveFilters', () => {
  it('maps fields and lookups to columns', () => {
    expect(
      resolveFilters(descriptor('article'), {
        title__icontains: 'intro',
        author: '2',
        is_published: 'true',
        id__in: ['1', '3'],
        published_at__isnull: 'true',
      }),
    ).toEqual([
      { column: 'title', op: 'icontains', value: 'intro' },
      { column: 'author_id', op: 'exact', value: '2' },
      { column: 'is_published', op: 'exact', value: true },
      { column: 'id', op: 'in', value: [1, 3] },
      { column: 'published_at', op: 'isnull', value: true },
    ]);
  });

  it('accepts relation columns as field names', () => {
    expect(resolveFilters(descriptor('article'), { author_id__gte: 2 })).toEqual([
      { column: 'author_id', op: 'gte', value: 2 },
    ]);
  });

  it('drops unknown fields, lookups and deep paths', () => {
    expect(
      resolveFilters(descriptor('article'), { nope: 1, title__regex: 'x', author__name__exact: 'Ada' }),
    ).toEqual([]);
  });
});

describe('resolveSearch', () => {
  it('uses the searchable columns', () => {
    expect(resolveSearch(descriptor('author'), 'ada')).toEqual({ columns: ['name', 'email'], term: 'ada' });
  });

  it('returns undefined without a term or searchable fields', () => {
    expect(resolveSearch(descriptor('author'), '')).toBeUndefined();
    expect(resolveSearch(descriptor('tag'), 'ts')).toBeUndefined();
  });
});

describe('resolveOrdering', () => {
  it('honours requested ordering and skips unknown fields', () => {
    expect(resolveOrdering(descriptor('article'), ['-title', 'bogus', 'author'])).toEqual([
      { column: 'title', direction: 'desc' },
      { column: 'author_id', direction: 'asc' },
    ]);
  });

  it('falls back to the default ordering and then the primary key', () => {
    expect(resolveOrdering(descriptor('author'), undefined)).toEqual([{ column: 'name', direction: 'asc' }]);
    expect(resolveOrdering(descriptor('tag'), [])).toEqual([{ column: 'slug', direction: 'asc' }]);
    expect(resolveOrdering(descriptor('author'), ['bogus'])).toEqual([{ column: 'id', direction: 'asc' }]);
  });
});

describe('clampLimit', () => {
  it('applies the default and the maximum', () => {
    expect(clampLimit(undefined, 100, 1000)).toBe(100);
    expect(clampLimit(50, 100, 1000)).toBe(50);
    expect(clampLimit(5000, 100, 1000)).toBe(1000);
  });
});
