import { decodeValue, primaryKeyField } from './fields.js';
import type { FieldMeta, ResourceDescriptor } from '../resources/descriptor.js';
import type { PrimaryKey, Row } from '../persistence/types.js';

/**
 * Row (keyed by column) to public object (keyed by field name).
 * Only visible fields are emitted; the primary key always is.
 * Relation fields carry the referenced id.
 */
export function serializeRow(d: ResourceDescriptor, row: Row): Row {
  const visible = new Set(d.getVisibleFields());
  const out: Row = {};
  for (const f of d.getFields()) {
    if (f.primaryKey || visible.has(f.name)) out[f.name] = decodeValue(f, row[f.column]);
  }
  return out;
}

export function rowId(d: ResourceDescriptor, row: Row): PrimaryKey {
  const value = row[primaryKeyField(d).column];
  if (typeof value === 'number' || typeof value === 'string') return value;
  throw new Error(`Row of ${d.name} has no usable primary key`);
}

export function describeField(f: FieldMeta): Row {
  const out: Row = {
    name: f.name,
    type: f.type,
    label: f.label,
    required: f.required,
    nullable: f.nullable,
    editable: f.editable,
  };
  if (f.primaryKey) out.primaryKey = true;
  if (f.unique) out.unique = true;
  if (f.maxLength !== undefined) out.maxLength = f.maxLength;
  if (f.helpText) out.helpText = f.helpText;
  if (f.choices) out.choices = f.choices;
  if (f.defaultValue !== undefined) out.default = f.defaultValue;
  if (f.relation) {
    out.column = f.column;
    out.target = f.relation.target;
    out.relatedName = f.relation.relatedName;
  }
  return out;
}
