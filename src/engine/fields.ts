import { z } from 'zod';
import { invalidField, validationFailed, type FieldErrors } from '../core/errors.js';
import type { FieldMeta, ResourceDescriptor } from '../resources/descriptor.js';
import type { PrimaryKey, Row } from '../persistence/types.js';

export type WriteMode = 'create' | 'update';

const TEXTUAL = new Set(['string', 'text', 'email']);

export function primaryKeyField(d: ResourceDescriptor): FieldMeta {
  const field = d.getFields().find((f) => f.name === d.primaryKey);
  if (!field) throw new Error(`Resource ${d.name} does not declare its primary key ${d.primaryKey}`);
  return field;
}

/** Integer primary keys arrive as numbers or numeric strings; both address the same row. */
export function normalizeId(d: ResourceDescriptor, id: PrimaryKey): PrimaryKey {
  const pk = primaryKeyField(d);
  if ((pk.type === 'integer' || pk.type === 'relation') && typeof id === 'string' && /^-?\d+$/.test(id)) {
    return Number(id);
  }
  return id;
}

export function findField(d: ResourceDescriptor, name: string): FieldMeta | undefined {
  return d.getFields().find((f) => f.name === name || (f.relation !== undefined && f.column === name));
}

/** Renames `<relation>_id` keys to the relation field's name. */
export function normalizeRelationKeys(d: ResourceDescriptor, data: Record<string, unknown>): Record<string, unknown> {
  const byColumn = new Map<string, string>();
  for (const f of d.getFields()) if (f.relation) byColumn.set(f.column, f.name);
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(data)) out[byColumn.get(key) ?? key] = value;
  return out;
}

export function writableFields(d: ResourceDescriptor): FieldMeta[] {
  const readonly = new Set(d.getReadonlyFields());
  return d.getFields().filter((f) => f.editable && !readonly.has(f.name));
}

/** Rejects the whole payload when any key is undeclared or read-only. */
export function assertWritableKeys(d: ResourceDescriptor, data: Record<string, unknown>): void {
  const keys = Object.keys(data);
  const declared = new Set(d.getFields().map((f) => f.name));
  const unknown = keys.filter((k) => !declared.has(k));
  if (unknown.length > 0) {
    throw invalidField(`Invalid field: ${unknown.join(', ')}`, { fields: unknown });
  }
  const writable = new Set(writableFields(d).map((f) => f.name));
  const readonly = keys.filter((k) => !writable.has(k));
  if (readonly.length > 0) {
    throw invalidField(`Cannot update readonly fields: ${readonly.join(', ')}`, { readonlyFields: readonly });
  }
}

function numeric(value: unknown): unknown {
  if (typeof value === 'string' && value.trim() !== '' && !Number.isNaN(Number(value))) return Number(value);
  return value;
}

function booleanish(value: unknown): unknown {
  if (value === 'true' || value === 1) return true;
  if (value === 'false' || value === 0) return false;
  return value;
}

function dateish(value: unknown): unknown {
  return typeof value === 'string' || typeof value === 'number' ? new Date(value) : value;
}

function withLength(schema: z.ZodString, f: FieldMeta): z.ZodString {
  return f.maxLength ? schema.max(f.maxLength, `Ensure this value has at most ${f.maxLength} characters.`) : schema;
}

function baseSchema(f: FieldMeta): z.ZodTypeAny {
  switch (f.type) {
    case 'string':
    case 'text':
      return withLength(z.string({ invalid_type_error: 'Enter a text value.' }), f);
    case 'email':
      return withLength(z.string({ invalid_type_error: 'Enter a text value.' }).email('Enter a valid email address.'), f);
    case 'integer':
      return z.preprocess(numeric, z.number({ invalid_type_error: 'Enter a whole number.' }).int('Enter a whole number.'));
    case 'number':
      return z.preprocess(numeric, z.number({ invalid_type_error: 'Enter a number.' }));
    case 'boolean':
      return z.preprocess(booleanish, z.boolean({ invalid_type_error: 'Enter true or false.' }));
    case 'datetime':
      return z.preprocess(dateish, z.date({ invalid_type_error: 'Enter a valid date/time.' }));
    case 'json':
      return z.unknown();
    case 'relation':
      return z.preprocess(
        numeric,
        z.union([z.number().int(), z.string().min(1)], {
          errorMap: () => ({ message: 'Enter a valid reference.' }),
        }),
      );
  }
}

export function fieldSchema(f: FieldMeta): z.ZodTypeAny {
  const base = baseSchema(f);
  const choices = f.choices;
  if (!choices || choices.length === 0) return base;
  return base.refine((v) => choices.some((c) => c.value === v), {
    message: 'Select a valid choice.',
  });
}

function isBlank(f: FieldMeta, value: unknown): boolean {
  return value === null || (value === '' && TEXTUAL.has(f.type));
}

/**
 * Validates the writable fields present in `data` (keyed by field name).
 * Create also enforces required fields and fills declared defaults.
 */
export function validateWrite(d: ResourceDescriptor, data: Record<string, unknown>, mode: WriteMode): Row {
  const errors: FieldErrors[] = [];
  const out: Row = {};
  for (const f of writableFields(d)) {
    const value = data[f.name];
    if (value === undefined) {
      if (mode === 'create') {
        if (f.defaultValue !== undefined) out[f.name] = f.defaultValue;
        else if (f.required) errors.push({ field: f.name, messages: ['This field is required.'] });
      }
      continue;
    }
    if (isBlank(f, value)) {
      if (f.required) errors.push({ field: f.name, messages: ['This field is required.'] });
      else if (value === null && !f.nullable) errors.push({ field: f.name, messages: ['This field cannot be null.'] });
      else out[f.name] = value;
      continue;
    }
    const parsed = fieldSchema(f).safeParse(value);
    if (parsed.success) out[f.name] = parsed.data;
    else errors.push({ field: f.name, messages: parsed.error.issues.map((i) => i.message) });
  }
  if (errors.length > 0) throw validationFailed(errors);
  return out;
}

/** Normalize, reject, validate: the full write pipeline for one payload. */
export function prepareWrite(d: ResourceDescriptor, data: Record<string, unknown>, mode: WriteMode): Row {
  const normalized = normalizeRelationKeys(d, data);
  assertWritableKeys(d, normalized);
  return validateWrite(d, normalized, mode);
}

export function toColumns(d: ResourceDescriptor, values: Row): Row {
  const out: Row = {};
  for (const f of d.getFields()) {
    if (!(f.name in values)) continue;
    const value = values[f.name];
    // json columns always hold JSON text, so decodeValue can parse it back.
    out[f.column] = f.type === 'json' && value !== null && value !== undefined ? JSON.stringify(value) : value;
  }
  return out;
}

/** The primary key a row has after `values` were written to the row addressed by `id`. */
export function keyAfterWrite(d: ResourceDescriptor, id: PrimaryKey, values: Row): PrimaryKey {
  const next = values[primaryKeyField(d).name];
  return typeof next === 'string' || typeof next === 'number' ? normalizeId(d, next) : id;
}

export function decodeValue(f: FieldMeta, raw: unknown): unknown {
  if (raw === undefined || raw === null) return null;
  switch (f.type) {
    case 'boolean':
      return raw === true || raw === 1 || raw === '1' || raw === 'true';
    case 'integer':
    case 'number':
      return typeof raw === 'string' && raw.trim() !== '' ? Number(raw) : raw;
    case 'datetime':
      return raw instanceof Date ? raw.toISOString() : raw;
    case 'json':
      if (typeof raw !== 'string') return raw;
      try {
        return JSON.parse(raw);
      } catch {
        return raw;
      }
    default:
      return raw;
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
