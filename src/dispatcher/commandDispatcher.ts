import type { z } from 'zod';
import { CommandError, invalidInput, toCommandError, type ErrorPayload } from '../core/errors.js';
import { commandLatencySeconds, commandsTotal } from '../metrics/index.js';
import { getLogger } from '../utils/logging.js';
import { findResources } from '../engine/meta.js';
import { isRecord } from '../engine/fields.js';
import { parseCommand } from './commandParser.js';
import {
  ActionArgs,
  AutocompleteArgs,
  BulkArgs,
  BulkOperationSchema,
  CreateArgs,
  DeleteArgs,
  EmptyArgs,
  FindResourcesArgs,
  GetArgs,
  HistoryArgs,
  ListArgs,
  RelatedArgs,
  UpdateArgs,
} from './schemas.js';
import type { Action, BulkOperation, Operation, Principal } from '../core/types.js';
import type { ExecutionEngine, Invocation } from '../engine/executionEngine.js';
import type { ResourceRegistry } from '../resources/registry.js';
import type { PermissionGate } from '../services/permissionGate.js';

export type OperationResult = { success: true; payload: unknown } | { success: false; error: ErrorPayload };

const OPERATION_ACTIONS: Record<Exclude<Operation, 'bulk'>, Action> = {
  list: 'view',
  get: 'view',
  describe: 'view',
  related: 'view',
  history: 'view',
  autocomplete: 'view',
  actions: 'view',
  create: 'add',
  update: 'change',
  delete: 'delete',
  action: 'change',
};

const BULK_ACTIONS: Record<BulkOperation, Action> = {
  create: 'add',
  update: 'change',
  delete: 'delete',
};

function parseArgs<S extends z.ZodTypeAny>(schema: S, args: Record<string, unknown>): z.output<S> {
  const parsed = schema.safeParse(args);
  if (!parsed.success) {
    throw invalidInput('Invalid arguments', {
      errors: parsed.error.issues.map((i) => ({ path: i.path.join('.'), message: i.message })),
    });
  }
  return parsed.data;
}

/** Action a command must be authorized for. Bulk takes its sub-operation's action. */
export function requiredAction(operation: Operation, args: Record<string, unknown>): Action {
  if (operation !== 'bulk') return OPERATION_ACTIONS[operation];
  const sub = BulkOperationSchema.safeParse(args.operation);
  if (!sub.success) throw invalidInput("operation must be 'create', 'update', or 'delete'");
  return BULK_ACTIONS[sub.data];
}

export class CommandDispatcher {
  constructor(
    private readonly registry: ResourceRegistry,
    private readonly gate: PermissionGate,
    private readonly engine: ExecutionEngine,
  ) {}

  /** Never throws: every failure comes back as an error result. */
  async dispatch(principal: Principal | null, name: string, args: unknown = {}): Promise<OperationResult> {
    const log = getLogger();
    const started = Date.now();
    let operation = 'unknown';
    try {
      if (!isRecord(args)) throw invalidInput('Arguments must be an object');
      const command = parseCommand(name);
      if (command.kind === 'find_resources') {
        operation = 'find_resources';
        const { query } = parseArgs(FindResourcesArgs, args);
        return this.succeed(operation, findResources(this.registry, this.gate, principal, query));
      }
      operation = command.operation;
      const descriptor = this.registry.get(command.resource);
      if (!descriptor) throw new CommandError('not_found', `Resource '${command.resource}' is not registered`);
      this.gate.require(principal, descriptor, requiredAction(command.operation, args));
      const payload = await this.execute(command.operation, { descriptor, principal }, args);
      return this.succeed(operation, payload);
    } catch (err) {
      const error = toCommandError(err, log, name);
      commandsTotal.inc({ operation, outcome: error.code });
      return { success: false, error: error.toPayload() };
    } finally {
      commandLatencySeconds.observe({ operation }, (Date.now() - started) / 1000);
    }
  }

  private succeed(operation: string, payload: unknown): OperationResult {
    commandsTotal.inc({ operation, outcome: 'success' });
    return { success: true, payload };
  }

  private async execute(operation: Operation, inv: Invocation, args: Record<string, unknown>): Promise<unknown> {
    const engine = this.engine;
    switch (operation) {
      case 'list':
        return engine.list(inv, parseArgs(ListArgs, args));
      case 'get':
        return engine.get(inv, parseArgs(GetArgs, args));
      case 'create':
        return engine.create(inv, parseArgs(CreateArgs, args));
      case 'update':
        return engine.update(inv, parseArgs(UpdateArgs, args));
      case 'delete':
        return engine.delete(inv, parseArgs(DeleteArgs, args));
      case 'describe':
        parseArgs(EmptyArgs, args);
        return engine.describe(inv);
      case 'actions':
        parseArgs(EmptyArgs, args);
        return engine.actions(inv);
      case 'action':
        return engine.action(inv, parseArgs(ActionArgs, args));
      case 'bulk':
        return engine.bulk(inv, parseArgs(BulkArgs, args));
      case 'related':
        return engine.related(inv, parseArgs(RelatedArgs, args));
      case 'history':
        return engine.history(inv, parseArgs(HistoryArgs, args));
      case 'autocomplete':
        return engine.autocomplete(inv, parseArgs(AutocompleteArgs, args));
    }
  }
}
