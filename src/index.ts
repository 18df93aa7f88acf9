export { Gateway, createGateway, type GatewayOptions } from './gateway.js';
export { loadConfig, type AppConfig, type LimitsConfig, type PermissionPolicyConfig } from './config/index.js';
export { getLogger } from './utils/logging.js';
export { registry as metricsRegistry, metricsSummary } from './metrics/index.js';

export { createKnex, getKnex, closeKnex } from './db/client.js';
export { ensureCoreSchema, CORE_TABLES } from './db/schema.js';
export { KnexStore } from './persistence/knexStore.js';
export { classifyStorageError } from './persistence/storageErrors.js';
export type {
  ColumnFilter,
  ColumnOrder,
  ColumnSearch,
  FilterOperator,
  PrimaryKey,
  QuerySpec,
  Row,
  Store,
  TableGateway,
} from './persistence/types.js';

export { CommandError, type ErrorCode, type ErrorPayload, type FieldErrors } from './core/errors.js';
export { effectivePermissions, hasPermission, parsePermission } from './core/permissions.js';
export type * from './core/types.js';
export { OPERATIONS, STANDARD_ACTIONS } from './core/types.js';

export { ResourceRegistry, type ReverseRelation } from './resources/registry.js';
export { ModelResource, defineResource, modelPermissionPolicy } from './resources/modelResource.js';
export type { FieldConfig, ModelResourceConfig, PermissionPolicy } from './resources/modelResource.js';
export type {
  ActionContext,
  ActionOutcome,
  ChildRelation,
  FieldChoice,
  FieldMeta,
  FieldType,
  RelationMeta,
  ResourceAction,
  ResourceDescriptor,
} from './resources/descriptor.js';

export {
  CredentialService,
  isExpired,
  isValid,
  toPublicCredential,
  type GenerateCredentialRequest,
  type IssuedCredential,
  type PublicCredential,
} from './services/credentialService.js';
export { PermissionGate } from './services/permissionGate.js';
export { CredentialRepository } from './repositories/credentialRepository.js';
export { GrantRepository } from './repositories/grantRepository.js';
export { AuditRepository } from './repositories/auditRepository.js';
export { BearerTokenGenerator } from './tokens/bearerToken.js';

export { CommandDispatcher, type OperationResult } from './dispatcher/commandDispatcher.js';
export { listCommands, type CommandDefinition } from './dispatcher/commandCatalog.js';
export { parseCommand, FIND_RESOURCES } from './dispatcher/commandParser.js';
export { ExecutionEngine } from './engine/executionEngine.js';
