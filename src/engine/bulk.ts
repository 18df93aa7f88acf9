import { invalidInput, toCommandError, type ErrorPayload } from '../core/errors.js';
import { bulkItemsTotal } from '../metrics/index.js';
import { getLogger } from '../utils/logging.js';
import { BulkUpdateItem, ObjectId, type BulkArgs } from '../dispatcher/schemas.js';
import { isRecord } from './fields.js';
import type { BulkOperation } from '../core/types.js';
import type { PrimaryKey } from '../persistence/types.js';
import type { ExecutionEngine, Invocation } from './executionEngine.js';

export interface BulkItemResult {
  index: number;
  success: boolean;
  id?: PrimaryKey;
  error?: ErrorPayload;
}

export interface BulkPayload {
  operation: BulkOperation;
  totalItems: number;
  successCount: number;
  errorCount: number;
  results: BulkItemResult[];
}

async function runItem(engine: ExecutionEngine, inv: Invocation, operation: BulkOperation, item: unknown) {
  switch (operation) {
    case 'create': {
      if (!isRecord(item)) throw invalidInput('Each create item must be an object of field values');
      return (await engine.create(inv, { data: item })).id;
    }
    case 'update': {
      const parsed = BulkUpdateItem.safeParse(item);
      if (!parsed.success) throw invalidInput('Each update item needs an id and a data object');
      const { object } = await engine.update(inv, parsed.data);
      const id = object[inv.descriptor.primaryKey];
      return typeof id === 'number' || typeof id === 'string' ? id : parsed.data.id;
    }
    case 'delete': {
      const parsed = ObjectId.safeParse(item);
      if (!parsed.success) throw invalidInput('Each delete item must be an id');
      return (await engine.delete(inv, { id: parsed.data })).id;
    }
  }
}

/**
 * Runs every item through the single-item path, each in its own transaction.
 * A failing item is reported at its index and does not affect the others.
 */
export async function runBulk(engine: ExecutionEngine, inv: Invocation, args: BulkArgs): Promise<BulkPayload> {
  const { operation, items } = args;
  const max = engine.deps.limits.bulkMax;
  if (items.length === 0) throw invalidInput('items must contain at least one entry');
  if (items.length > max) {
    throw invalidInput(`A batch may contain at most ${max} items`, { maxItems: max, received: items.length });
  }

  const log = getLogger();
  const results: BulkItemResult[] = [];
  for (const [index, item] of items.entries()) {
    try {
      const id = await runItem(engine, inv, operation, item);
      results.push({ index, success: true, id });
      bulkItemsTotal.inc({ operation, result: 'success' });
    } catch (err) {
      const error = toCommandError(err, log, `bulk ${operation} ${inv.descriptor.name}`);
      results.push({ index, success: false, error: error.toPayload() });
      bulkItemsTotal.inc({ operation, result: 'failure' });
    }
  }
  const successCount = results.filter((r) => r.success).length;
  log.info(
    { resource: inv.descriptor.name, operation, total: items.length, successCount },
    'Bulk operation finished',
  );
  return { operation, totalItems: items.length, successCount, errorCount: items.length - successCount, results };
}
