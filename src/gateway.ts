import type { Knex } from 'knex';
import { loadConfig, type AppConfig } from './config/index.js';
import { KnexStore } from './persistence/knexStore.js';
import { AuditRepository } from './repositories/auditRepository.js';
import { CredentialRepository } from './repositories/credentialRepository.js';
import { GrantRepository } from './repositories/grantRepository.js';
import { CredentialService } from './services/credentialService.js';
import { PermissionGate } from './services/permissionGate.js';
import { ExecutionEngine } from './engine/executionEngine.js';
import { CommandDispatcher, type OperationResult } from './dispatcher/commandDispatcher.js';
import { listCommands, type CommandDefinition } from './dispatcher/commandCatalog.js';
import type { Principal } from './core/types.js';
import type { Store } from './persistence/types.js';
import type { ResourceRegistry } from './resources/registry.js';

export interface GatewayOptions {
  registry: ResourceRegistry;
  store: Store;
  credentials: CredentialService;
  config?: AppConfig;
  gate?: PermissionGate;
  audit?: AuditRepository;
}

function authFailed(): OperationResult {
  return { success: false, error: { code: 'permission_denied', message: 'Authentication failed' } };
}

/**
 * Transport-facing entry point. A transport hands over either an
 * authenticated principal or the presented bearer token, plus the command
 * name and its argument object.
 */
export class Gateway {
  readonly registry: ResourceRegistry;
  readonly gate: PermissionGate;
  readonly engine: ExecutionEngine;
  readonly dispatcher: CommandDispatcher;
  private readonly credentials: CredentialService;

  constructor(opts: GatewayOptions) {
    const config = opts.config ?? loadConfig();
    this.registry = opts.registry.isFrozen ? opts.registry : opts.registry.freeze();
    this.credentials = opts.credentials;
    this.gate = opts.gate ?? new PermissionGate(config.permissions);
    this.engine = new ExecutionEngine({
      store: opts.store,
      registry: this.registry,
      gate: this.gate,
      audit: opts.audit ?? new AuditRepository(opts.store),
      limits: config.limits,
    });
    this.dispatcher = new CommandDispatcher(this.registry, this.gate, this.engine);
  }

  call(principal: Principal | null, name: string, args: unknown = {}): Promise<OperationResult> {
    return this.dispatcher.dispatch(principal, name, args);
  }

  async callWithToken(token: string | null | undefined, name: string, args: unknown = {}): Promise<OperationResult> {
    const principal = token ? await this.credentials.authenticate(token) : null;
    if (!principal) return authFailed();
    return this.call(principal, name, args);
  }

  listCommands(): CommandDefinition[] {
    return listCommands(this.registry);
  }
}

/** Wires a gateway over a knex connection whose core schema is in place. */
export function createGateway(db: Knex, registry: ResourceRegistry, config: AppConfig = loadConfig()): Gateway {
  return new Gateway({
    registry,
    store: new KnexStore(db),
    credentials: new CredentialService(new CredentialRepository(db), new GrantRepository(db), config.credentials),
    config,
  });
}
