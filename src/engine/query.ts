import { findField, primaryKeyField } from './fields.js';
import type { FieldMeta, ResourceDescriptor } from '../resources/descriptor.js';
import type { ColumnFilter, ColumnOrder, ColumnSearch, FilterOperator } from '../persistence/types.js';

const OPERATORS: readonly FilterOperator[] = [
  'exact',
  'iexact',
  'contains',
  'icontains',
  'startswith',
  'istartswith',
  'endswith',
  'iendswith',
  'gt',
  'gte',
  'lt',
  'lte',
  'in',
  'isnull',
];

function toOperator(value: string): FilterOperator | undefined {
  return OPERATORS.find((op) => op === value);
}

function coerce(f: FieldMeta, value: unknown): unknown {
  if (f.type === 'boolean') {
    if (value === 'true' || value === '1') return true;
    if (value === 'false' || value === '0') return false;
  }
  if ((f.type === 'integer' || f.type === 'number') && typeof value === 'string' && value.trim() !== '') {
    const n = Number(value);
    return Number.isNaN(n) ? value : n;
  }
  return value;
}

/**
 * `field` or `field__lookup` keys to column filters. Keys naming an unknown
 * field or lookup are dropped.
 */
export function resolveFilters(d: ResourceDescriptor, filters: Record<string, unknown>): ColumnFilter[] {
  const out: ColumnFilter[] = [];
  for (const [key, value] of Object.entries(filters)) {
    const parts = key.split('__');
    if (parts.length > 2) continue;
    const [fieldName, lookup = 'exact'] = parts;
    const field = fieldName ? findField(d, fieldName) : undefined;
    const op = toOperator(lookup);
    if (!field || !op) continue;
    let v: unknown;
    if (op === 'in') v = (Array.isArray(value) ? value : [value]).map((item) => coerce(field, item));
    else if (op === 'isnull') v = value === true || value === 'true' || value === 1;
    else v = coerce(field, value);
    out.push({ column: field.column, op, value: v });
  }
  return out;
}

export function resolveSearch(d: ResourceDescriptor, term: string | undefined): ColumnSearch | undefined {
  if (!term) return undefined;
  const columns: string[] = [];
  for (const name of d.getSearchableFields()) {
    const field = d.getFields().find((f) => f.name === name);
    if (field) columns.push(field.column);
  }
  return columns.length > 0 ? { columns, term } : undefined;
}

/**
 * Requested ordering (or the default one) filtered against `f` / `-f` for
 * declared fields. Falls back to the primary key ascending.
 */
export function resolveOrdering(d: ResourceDescriptor, requested: string[] | undefined): ColumnOrder[] {
  const source = requested && requested.length > 0 ? requested : d.getDefaultOrdering();
  const out: ColumnOrder[] = [];
  for (const entry of source) {
    const descending = entry.startsWith('-');
    const name = descending ? entry.slice(1) : entry;
    const field = d.getFields().find((f) => f.name === name);
    if (field) out.push({ column: field.column, direction: descending ? 'desc' : 'asc' });
  }
  if (out.length === 0) out.push({ column: primaryKeyField(d).column, direction: 'asc' });
  return out;
}

export function clampLimit(limit: number | undefined, fallback: number, max: number): number {
  return Math.min(limit ?? fallback, max);
}
