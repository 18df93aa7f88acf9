import { CORE_TABLES } from '../db/schema.js';
import { truncate } from '../utils/canonical.js';
import { RepositoryError } from './errors.js';
import type { PrimaryKey, Row, Store } from '../persistence/types.js';
import type { AuditEntryInput, AuditKind, AuditRecord } from '../core/types.js';

const KINDS: readonly AuditKind[] = ['create', 'change', 'delete'];
const REPR_LENGTH = 200;

function toKind(value: unknown): AuditKind {
  const kind = KINDS.find((k) => k === value);
  if (!kind) throw new RepositoryError(`Unknown audit action ${String(value)}`);
  return kind;
}

function map(row: Row): AuditRecord {
  return {
    id: Number(row.id),
    principalId: String(row.principal_id),
    resource: String(row.resource),
    objectId: String(row.object_id),
    objectRepr: String(row.object_repr),
    kind: toKind(row.action),
    message: String(row.change_message),
    actionTime: new Date(String(row.action_time)),
  };
}

/**
 * Append-only audit sink. `append` writes through the caller's store so the
 * record commits or rolls back with the mutation it documents.
 */
export class AuditRepository {
  constructor(private readonly store: Store) {}

  async append(store: Store, entry: AuditEntryInput): Promise<number> {
    const id: PrimaryKey = await store.table(CORE_TABLES.auditLog, 'id').insert({
      principal_id: entry.principalId,
      resource: entry.resource,
      object_id: entry.objectId,
      object_repr: truncate(entry.objectRepr, REPR_LENGTH),
      action: entry.kind,
      change_message: entry.message,
      action_time: new Date().toISOString(),
    });
    return Number(id);
  }

  /** Newest first. */
  async listForObject(resource: string, objectId: string, limit: number): Promise<AuditRecord[]> {
    const rows = await this.store.table(CORE_TABLES.auditLog, 'id').findMany({
      filters: [
        { column: 'resource', op: 'exact', value: resource },
        { column: 'object_id', op: 'exact', value: objectId },
      ],
      ordering: [
        { column: 'action_time', direction: 'desc' },
        { column: 'id', direction: 'desc' },
      ],
      limit,
    });
    return rows.map(map);
  }

  async listForResource(resource: string): Promise<AuditRecord[]> {
    const rows = await this.store.table(CORE_TABLES.auditLog, 'id').findMany({
      filters: [{ column: 'resource', op: 'exact', value: resource }],
      ordering: [{ column: 'id', direction: 'asc' }],
    });
    return rows.map(map);
  }
}
