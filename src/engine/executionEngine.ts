import { invalidField, invalidInput, notFound, toCommandError, type ErrorPayload } from '../core/errors.js';
import { getLogger } from '../utils/logging.js';
import { buildCanonicalPayload, truncate } from '../utils/canonical.js';
import { keyAfterWrite, normalizeId, normalizeRelationKeys, prepareWrite, primaryKeyField, toColumns } from './fields.js';
import { clampLimit, resolveFilters, resolveOrdering, resolveSearch } from './query.js';
import { rowId, serializeRow } from './serialize.js';
import { runBulk, type BulkPayload } from './bulk.js';
import { listActions, runAction, type ActionPayload, type ActionsPayload } from './actions.js';
import {
  autocomplete,
  describeResource,
  history,
  related,
  type AutocompletePayload,
  type DescribePayload,
  type HistoryPayload,
  type RelatedPayload,
} from './meta.js';
import type { LimitsConfig } from '../config/index.js';
import type { AuditKind, Principal } from '../core/types.js';
import type { PermissionGate } from '../services/permissionGate.js';
import type { AuditRepository } from '../repositories/auditRepository.js';
import type { ResourceRegistry } from '../resources/registry.js';
import type { ChildRelation, FieldMeta, ResourceDescriptor } from '../resources/descriptor.js';
import type { PrimaryKey, QuerySpec, Row, Store, TableGateway } from '../persistence/types.js';
import type {
  ActionArgs,
  AutocompleteArgs,
  BulkArgs,
  ChildItem,
  CreateArgs,
  DeleteArgs,
  GetArgs,
  HistoryArgs,
  ListArgs,
  RelatedArgs,
  UpdateArgs,
} from '../dispatcher/schemas.js';

export interface EngineDeps {
  store: Store;
  registry: ResourceRegistry;
  gate: PermissionGate;
  audit: AuditRepository;
  limits: LimitsConfig;
}

/** The resolved target of one command. */
export interface Invocation {
  descriptor: ResourceDescriptor;
  principal: Principal | null;
}

export interface ListPayload {
  count: number;
  totalCount: number;
  results: Row[];
}

export interface CreatePayload {
  id: PrimaryKey;
  object: Row;
}

export interface ChildRef {
  resource: string;
  id: PrimaryKey;
}

export interface ChildError {
  resource: string;
  index: number;
  id?: PrimaryKey;
  error: ErrorPayload;
}

export interface ChildResults {
  created: ChildRef[];
  updated: ChildRef[];
  deleted: ChildRef[];
  errors: ChildError[];
}

export interface UpdatePayload {
  object: Row;
  children?: ChildResults;
}

export interface DeletePayload {
  id: PrimaryKey;
  message: string;
}

interface ChildSpec {
  relation: ChildRelation;
  descriptor: ResourceDescriptor;
  field: FieldMeta;
  items: ChildItem[];
}

type ChildOutcome = { kind: 'created' | 'updated' | 'deleted'; ref: ChildRef };

export class ExecutionEngine {
  constructor(readonly deps: EngineDeps) {}

  tableFor(store: Store, d: ResourceDescriptor): TableGateway {
    return store.table(d.table, primaryKeyField(d).column);
  }

  async loadOrFail(store: Store, d: ResourceDescriptor, id: PrimaryKey): Promise<Row> {
    const row = await this.tableFor(store, d).findById(normalizeId(d, id));
    if (!row) throw notFound(d.name, id);
    return row;
  }

  /** Appends one audit record through `store`. Skipped when the principal is unknown. */
  async recordAudit(
    store: Store,
    principal: Principal | null,
    d: ResourceDescriptor,
    row: Row,
    kind: AuditKind,
    message: string,
  ): Promise<void> {
    if (!principal) return;
    await this.deps.audit.append(store, {
      principalId: principal.auditId ?? principal.id,
      resource: d.name,
      objectId: String(rowId(d, row)),
      objectRepr: d.describeInstance(row),
      kind,
      message: truncate(message, this.deps.limits.auditMessageLength),
    });
  }

  describeChange(verb: string, values: Row): string {
    return `${verb}: ${buildCanonicalPayload(values)}`;
  }

  async list(inv: Invocation, args: ListArgs): Promise<ListPayload> {
    const d = inv.descriptor;
    const { limits } = this.deps;
    const spec: QuerySpec = { filters: resolveFilters(d, args.filters), search: resolveSearch(d, args.search) };
    const table = this.tableFor(this.deps.store, d);
    const totalCount = await table.count(spec);
    const rows = await table.findMany({
      ...spec,
      ordering: resolveOrdering(d, args.orderBy),
      limit: clampLimit(args.limit, limits.listDefault, limits.listMax),
      offset: args.offset,
    });
    return { count: rows.length, totalCount, results: rows.map((r) => serializeRow(d, r)) };
  }

  async get(inv: Invocation, args: GetArgs): Promise<Row> {
    const d = inv.descriptor;
    const { store, registry, gate, limits } = this.deps;
    const row = await this.loadOrFail(store, d, args.id);
    const id = rowId(d, row);
    const result = serializeRow(d, row);

    if (args.includeChildren) {
      const children: Record<string, Row[]> = {};
      for (const relation of d.getChildDescriptors()) {
        const spec = this.childSpec(d, relation, []);
        if (!gate.check(inv.principal, spec.descriptor, 'view')) continue;
        const rows = await this.tableFor(store, spec.descriptor).findMany({
          filters: [{ column: spec.field.column, op: 'exact', value: id }],
          ordering: resolveOrdering(spec.descriptor, undefined),
          limit: limits.childItems,
        });
        children[relation.resource] = rows.map((r) => serializeRow(spec.descriptor, r));
      }
      result._children = children;
    }

    if (args.includeRelated) {
      const relatedRows: Record<string, Row[]> = {};
      for (const reverse of registry.reverseRelations(d.name)) {
        const source = registry.get(reverse.resource);
        if (!source || !gate.check(inv.principal, source, 'view')) continue;
        const rows = await this.tableFor(store, source).findMany({
          filters: [{ column: reverse.field.column, op: 'exact', value: id }],
          ordering: resolveOrdering(source, undefined),
          limit: limits.relatedPreview,
        });
        relatedRows[reverse.relatedName] = rows.map((r) => serializeRow(source, r));
      }
      result._related = relatedRows;
    }
    return result;
  }

  async create(inv: Invocation, args: CreateArgs): Promise<CreatePayload> {
    const d = inv.descriptor;
    const values = prepareWrite(d, args.data, 'create');
    return this.deps.store.transaction((tx) => this.insertRow(tx, inv.principal, d, values));
  }

  private async insertRow(
    store: Store,
    principal: Principal | null,
    d: ResourceDescriptor,
    values: Row,
  ): Promise<CreatePayload> {
    const insertedId = await this.tableFor(store, d).insert(toColumns(d, values));
    const row = await this.loadOrFail(store, d, insertedId);
    await this.recordAudit(store, principal, d, row, 'create', this.describeChange('Created', values));
    return { id: rowId(d, row), object: serializeRow(d, row) };
  }

  async update(inv: Invocation, args: UpdateArgs): Promise<UpdatePayload> {
    const d = inv.descriptor;
    const values = prepareWrite(d, args.data, 'update');
    const specs = args.children
      ? Object.entries(args.children).map(([name, items]) => this.childSpec(d, this.childRelation(d, name), items))
      : undefined;

    return this.deps.store.transaction(async (tx) => {
      const current = rowId(d, await this.loadOrFail(tx, d, args.id));
      if (Object.keys(values).length > 0) {
        await this.tableFor(tx, d).update(current, toColumns(d, values));
      }
      const id = keyAfterWrite(d, current, values);
      const children = specs ? await this.applyChildren(tx, inv.principal, id, specs) : undefined;
      const row = await this.loadOrFail(tx, d, id);

      const parts: string[] = [];
      if (Object.keys(values).length > 0) parts.push(this.describeChange('Changed', values));
      if (specs && specs.length > 0) parts.push(`Updated children: ${specs.map((s) => s.relation.resource).join(', ')}`);
      await this.recordAudit(tx, inv.principal, d, row, 'change', parts.length > 0 ? parts.join(' | ') : 'No fields changed');

      const payload: UpdatePayload = { object: serializeRow(d, row) };
      if (children) payload.children = children;
      return payload;
    });
  }

  async delete(inv: Invocation, args: DeleteArgs): Promise<DeletePayload> {
    const d = inv.descriptor;
    return this.deps.store.transaction(async (tx) => {
      const row = await this.loadOrFail(tx, d, args.id);
      const id = rowId(d, row);
      // Written first so the record still describes the object.
      await this.recordAudit(tx, inv.principal, d, row, 'delete', 'Deleted');
      await this.tableFor(tx, d).delete(id);
      return { id, message: `${d.label} ${String(id)} deleted successfully` };
    });
  }

  bulk(inv: Invocation, args: BulkArgs): Promise<BulkPayload> {
    return runBulk(this, inv, args);
  }

  actions(inv: Invocation): ActionsPayload {
    return listActions(this, inv);
  }

  action(inv: Invocation, args: ActionArgs): Promise<ActionPayload> {
    return runAction(this, inv, args);
  }

  describe(inv: Invocation): DescribePayload {
    return describeResource(this, inv);
  }

  related(inv: Invocation, args: RelatedArgs): Promise<RelatedPayload> {
    return related(this, inv, args);
  }

  history(inv: Invocation, args: HistoryArgs): Promise<HistoryPayload> {
    return history(this, inv, args);
  }

  autocomplete(inv: Invocation, args: AutocompleteArgs): Promise<AutocompletePayload> {
    return autocomplete(this, inv, args);
  }

  private childRelation(d: ResourceDescriptor, name: string): ChildRelation {
    const declared = d.getChildDescriptors();
    const relation = declared.find((c) => c.resource === name);
    if (!relation) {
      throw invalidField(`Unknown child resource: ${name}`, { children: declared.map((c) => c.resource) });
    }
    return relation;
  }

  private childSpec(d: ResourceDescriptor, relation: ChildRelation, items: ChildItem[]): ChildSpec {
    const descriptor = this.deps.registry.get(relation.resource);
    const field = descriptor?.getFields().find((f) => f.name === relation.field && f.relation?.target === d.name);
    if (!descriptor || !field) {
      throw new Error(`Child ${relation.resource}.${relation.field} of ${d.name} is not a registered relation`);
    }
    return { relation, descriptor, field, items };
  }

  private async applyChildren(
    tx: Store,
    principal: Principal | null,
    parentId: PrimaryKey,
    specs: ChildSpec[],
  ): Promise<ChildResults> {
    const results: ChildResults = { created: [], updated: [], deleted: [], errors: [] };
    for (const spec of specs) {
      for (const [index, item] of spec.items.entries()) {
        try {
          // Savepoint: a failing child rolls back alone.
          const outcome = await tx.transaction((sp) => this.applyChild(sp, principal, parentId, spec, item));
          results[outcome.kind].push(outcome.ref);
        } catch (err) {
          const error = toCommandError(err, getLogger(), `update ${spec.relation.resource} child`);
          const failure: ChildError = { resource: spec.relation.resource, index, error: error.toPayload() };
          if (item.id !== undefined) failure.id = item.id;
          results.errors.push(failure);
        }
      }
    }
    return results;
  }

  private async applyChild(
    sp: Store,
    principal: Principal | null,
    parentId: PrimaryKey,
    spec: ChildSpec,
    item: ChildItem,
  ): Promise<ChildOutcome> {
    const cd = spec.descriptor;
    const { gate } = this.deps;
    const table = this.tableFor(sp, cd);

    if (item.delete) {
      if (item.id === undefined) {
        throw invalidInput(`Child ${cd.name} delete requires an id`);
      }
      gate.require(principal, cd, 'delete');
      const row = await this.loadChild(sp, spec, item.id, parentId);
      const id = rowId(cd, row);
      await this.recordAudit(sp, principal, cd, row, 'delete', 'Deleted');
      await table.delete(id);
      return { kind: 'deleted', ref: { resource: cd.name, id } };
    }

    if (item.id !== undefined) {
      gate.require(principal, cd, 'change');
      const values = prepareWrite(cd, item.data ?? {}, 'update');
      const current = rowId(cd, await this.loadChild(sp, spec, item.id, parentId));
      if (Object.keys(values).length > 0) await table.update(current, toColumns(cd, values));
      const id = keyAfterWrite(cd, current, values);
      const row = await this.loadOrFail(sp, cd, id);
      await this.recordAudit(sp, principal, cd, row, 'change', this.describeChange('Changed', values));
      return { kind: 'updated', ref: { resource: cd.name, id } };
    }

    gate.require(principal, cd, 'add');
    const data = { ...normalizeRelationKeys(cd, item.data ?? {}), [spec.field.name]: parentId };
    const created = await this.insertRow(sp, principal, cd, prepareWrite(cd, data, 'create'));
    return { kind: 'created', ref: { resource: cd.name, id: created.id } };
  }

  private async loadChild(sp: Store, spec: ChildSpec, id: PrimaryKey, parentId: PrimaryKey): Promise<Row> {
    const row = await this.loadOrFail(sp, spec.descriptor, id);
    if (String(row[spec.field.column]) !== String(parentId)) throw notFound(spec.descriptor.name, id);
    return row;
  }
}
