import { invalidField } from '../core/errors.js';
import { describeField, rowId, serializeRow } from './serialize.js';
import { clampLimit, resolveOrdering, resolveSearch } from './query.js';
import type { AuditKind, Principal } from '../core/types.js';
import type { PrimaryKey, QuerySpec, Row } from '../persistence/types.js';
import type { ResourceRegistry } from '../resources/registry.js';
import type { PermissionGate } from '../services/permissionGate.js';
import type { AutocompleteArgs, HistoryArgs, RelatedArgs } from '../dispatcher/schemas.js';
import type { ExecutionEngine, Invocation } from './executionEngine.js';

export interface DescribePayload {
  name: string;
  label: string;
  pluralLabel: string;
  primaryKey: string;
  fields: Row[];
  relationships: Row[];
  config: {
    searchFields: string[];
    ordering: string[];
    readonlyFields: string[];
    visibleFields: string[];
    children: { resource: string; field: string }[];
    actions: string[];
  };
}

export interface ResourceSummary {
  name: string;
  label: string;
  pluralLabel: string;
}

export interface FindResourcesPayload {
  count: number;
  resources: ResourceSummary[];
}

export interface HistoryEntry {
  id: number;
  action: 'created' | 'changed' | 'deleted';
  actionTime: string;
  user: string;
  objectRepr: string;
  changeMessage: string;
}

export interface HistoryPayload {
  resource: string;
  id: PrimaryKey;
  count: number;
  history: HistoryEntry[];
}

export type RelatedPayload =
  | { type: 'one'; relation: string; result: Row | null }
  | { type: 'many'; relation: string; count: number; totalCount: number; results: Row[] };

export interface AutocompletePayload {
  resource: string;
  term: string;
  count: number;
  results: { id: PrimaryKey; text: string }[];
}

const HISTORY_ACTIONS: Record<AuditKind, HistoryEntry['action']> = {
  create: 'created',
  change: 'changed',
  delete: 'deleted',
};

export function describeResource(engine: ExecutionEngine, inv: Invocation): DescribePayload {
  const d = inv.descriptor;
  const fields = d.getFields();
  const reverse = engine.deps.registry.reverseRelations(d.name).map((r) => ({
    name: r.relatedName,
    type: 'reverse',
    source: r.resource,
    field: r.field.name,
  }));
  return {
    name: d.name,
    label: d.label,
    pluralLabel: d.pluralLabel,
    primaryKey: d.primaryKey,
    fields: fields.filter((f) => !f.relation).map(describeField),
    relationships: [...fields.filter((f) => f.relation).map(describeField), ...reverse],
    config: {
      searchFields: d.getSearchableFields(),
      ordering: d.getDefaultOrdering(),
      readonlyFields: d.getReadonlyFields(),
      visibleFields: d.getVisibleFields(),
      children: d.getChildDescriptors().map((c) => ({ resource: c.resource, field: c.field })),
      actions: d.getActions().map((a) => a.name),
    },
  };
}

function matchesQuery(query: string | undefined, ...candidates: string[]): boolean {
  if (!query) return true;
  const q = query.toLowerCase();
  return candidates.some((c) => c.toLowerCase().includes(q));
}

/** Registered resources the principal may view, optionally filtered by name or label. */
export function findResources(
  registry: ResourceRegistry,
  gate: PermissionGate,
  principal: Principal | null,
  query?: string,
): FindResourcesPayload {
  const resources = registry
    .list()
    .filter((d) => matchesQuery(query, d.name, d.label))
    .filter((d) => gate.check(principal, d, 'view'))
    .map((d) => ({ name: d.name, label: d.label, pluralLabel: d.pluralLabel }));
  return { count: resources.length, resources };
}

export async function history(engine: ExecutionEngine, inv: Invocation, args: HistoryArgs): Promise<HistoryPayload> {
  const d = inv.descriptor;
  const { store, audit, limits } = engine.deps;
  const id = rowId(d, await engine.loadOrFail(store, d, args.id));
  const records = await audit.listForObject(d.name, String(id), args.limit ?? limits.historyDefault);
  return {
    resource: d.name,
    id,
    count: records.length,
    history: records.map((r) => ({
      id: r.id,
      action: HISTORY_ACTIONS[r.kind],
      actionTime: r.actionTime.toISOString(),
      user: r.principalId,
      objectRepr: r.objectRepr,
      changeMessage: r.message,
    })),
  };
}

/**
 * Follows a forward relation field to its single target, or a reverse
 * relation (by related name) to the page of objects pointing here.
 */
export async function related(engine: ExecutionEngine, inv: Invocation, args: RelatedArgs): Promise<RelatedPayload> {
  const d = inv.descriptor;
  const { store, registry, gate, limits } = engine.deps;
  const row = await engine.loadOrFail(store, d, args.id);

  const forward = d.getFields().find((f) => f.relation && f.name === args.relation);
  if (forward?.relation) {
    const target = registry.get(forward.relation.target);
    if (!target) throw new Error(`Relation ${d.name}.${forward.name} targets unregistered ${forward.relation.target}`);
    gate.require(inv.principal, target, 'view');
    const ref = row[forward.column];
    if (typeof ref !== 'number' && typeof ref !== 'string') return { type: 'one', relation: args.relation, result: null };
    const targetRow = await engine.tableFor(store, target).findById(ref);
    return { type: 'one', relation: args.relation, result: targetRow ? serializeRow(target, targetRow) : null };
  }

  const reverses = registry.reverseRelations(d.name);
  const reverse = reverses.find((r) => r.relatedName === args.relation);
  const source = reverse ? registry.get(reverse.resource) : undefined;
  if (!reverse || !source) {
    const available = [
      ...d.getFields().filter((f) => f.relation).map((f) => f.name),
      ...reverses.map((r) => r.relatedName),
    ];
    throw invalidField(`Unknown relation: ${args.relation}`, { relation: args.relation, available });
  }
  gate.require(inv.principal, source, 'view');
  const table = engine.tableFor(store, source);
  const spec: QuerySpec = { filters: [{ column: reverse.field.column, op: 'exact', value: rowId(d, row) }] };
  const totalCount = await table.count(spec);
  const rows = await table.findMany({
    ...spec,
    ordering: resolveOrdering(source, undefined),
    limit: clampLimit(args.limit, limits.listDefault, limits.listMax),
    offset: args.offset,
  });
  return {
    type: 'many',
    relation: args.relation,
    count: rows.length,
    totalCount,
    results: rows.map((r) => serializeRow(source, r)),
  };
}

export async function autocomplete(
  engine: ExecutionEngine,
  inv: Invocation,
  args: AutocompleteArgs,
): Promise<AutocompletePayload> {
  const d = inv.descriptor;
  const { store, limits } = engine.deps;
  const rows = await engine.tableFor(store, d).findMany({
    filters: [],
    search: resolveSearch(d, args.term),
    ordering: resolveOrdering(d, undefined),
    limit: clampLimit(args.limit, limits.autocompleteDefault, limits.listMax),
  });
  const results = rows.map((r) => ({ id: rowId(d, r), text: d.describeInstance(r) }));
  return { resource: d.name, term: args.term, count: results.length, results };
}
