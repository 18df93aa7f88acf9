import { CommandError, invalidInput } from '../core/errors.js';
import { getLogger } from '../utils/logging.js';
import { normalizeId, primaryKeyField } from './fields.js';
import { resolveOrdering } from './query.js';
import { rowId } from './serialize.js';
import type { ActionArgs } from '../dispatcher/schemas.js';
import type { ExecutionEngine, Invocation } from './executionEngine.js';

export const DELETE_SELECTED = 'delete_selected';

export interface ActionInfo {
  name: string;
  description: string;
}

export interface ActionsPayload {
  resource: string;
  count: number;
  actions: ActionInfo[];
}

export interface ActionPayload {
  action: string;
  affectedCount: number;
  message: string;
  result?: unknown;
}

export function listActions(engine: ExecutionEngine, inv: Invocation): ActionsPayload {
  const { gate } = engine.deps;
  const d = inv.descriptor;
  const actions: ActionInfo[] = [];
  if (gate.check(inv.principal, d, 'delete')) {
    actions.push({ name: DELETE_SELECTED, description: `Delete selected ${d.pluralLabel.toLowerCase()}` });
  }
  for (const action of d.getActions()) {
    if (!gate.check(inv.principal, d, action.requires ?? 'change')) continue;
    actions.push({ name: action.name, description: action.description });
  }
  return { resource: d.name, count: actions.length, actions };
}

/** Runs a named action over the selected objects inside one transaction. */
export async function runAction(engine: ExecutionEngine, inv: Invocation, args: ActionArgs): Promise<ActionPayload> {
  const { gate, store } = engine.deps;
  const d = inv.descriptor;
  const custom = args.action === DELETE_SELECTED ? undefined : d.getActions().find((a) => a.name === args.action);
  if (args.action !== DELETE_SELECTED && !custom) {
    throw invalidInput(`Action '${args.action}' not found`, { action: args.action });
  }
  gate.require(inv.principal, d, custom ? custom.requires ?? 'change' : 'delete');

  return store.transaction(async (tx) => {
    const table = engine.tableFor(tx, d);
    const rows = await table.findMany({
      filters: [{ column: primaryKeyField(d).column, op: 'in', value: args.ids.map((id) => normalizeId(d, id)) }],
      ordering: resolveOrdering(d, undefined),
    });
    if (rows.length === 0) throw new CommandError('not_found', 'No objects found with the provided IDs');

    if (!custom) {
      for (const row of rows) {
        await engine.recordAudit(tx, inv.principal, d, row, 'delete', `Deleted via action ${DELETE_SELECTED}`);
        await table.delete(rowId(d, row));
      }
      getLogger().info({ resource: d.name, count: rows.length }, 'Selected objects deleted');
      return {
        action: args.action,
        affectedCount: rows.length,
        message: `Deleted ${rows.length} ${d.pluralLabel.toLowerCase()}`,
      };
    }

    const outcome = await custom.run({ store: tx, principal: inv.principal, resource: d, rows });
    const payload: ActionPayload = {
      action: args.action,
      affectedCount: rows.length,
      message: outcome?.message ?? `Executed ${args.action} on ${rows.length} objects`,
    };
    if (outcome?.result !== undefined) payload.result = outcome.result;
    return payload;
  });
}
