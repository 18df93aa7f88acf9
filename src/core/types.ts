// Domain model interfaces shared by the credential store, gate, dispatcher and engine

export type StandardAction = 'view' | 'add' | 'change' | 'delete';
// Descriptors may declare further actions; the gate applies the unknown-action policy to them.
export type Action = StandardAction | (string & {});

export const STANDARD_ACTIONS: readonly StandardAction[] = ['view', 'add', 'change', 'delete'];

export interface Permission {
  resource: string;
  action: Action;
}

export interface PermissionGroup {
  name: string;
  permissions: Permission[];
}

export interface Principal {
  id: string;
  name: string;
  // Identity audit records are attributed to (the credential owner); null falls back to id.
  auditId: string | null;
  permissions: Permission[];
  groups: PermissionGroup[];
}

export interface Credential {
  id: string;
  name: string;
  key: string;
  secretHash: string;
  salt: string;
  ownerId: string;
  active: boolean;
  createdAt: Date;
  expiresAt: Date | null;
  lastUsedAt: Date | null;
}

export type Operation =
  | 'list'
  | 'get'
  | 'create'
  | 'update'
  | 'delete'
  | 'describe'
  | 'actions'
  | 'action'
  | 'bulk'
  | 'related'
  | 'history'
  | 'autocomplete';

export const OPERATIONS: readonly Operation[] = [
  'list',
  'get',
  'create',
  'update',
  'delete',
  'describe',
  'actions',
  'action',
  'bulk',
  'related',
  'history',
  'autocomplete',
];

export type BulkOperation = 'create' | 'update' | 'delete';

export type CommandArguments = Record<string, unknown>;

export interface CommandInvocation {
  operation: Operation;
  resource: string;
  arguments: CommandArguments;
  principal: Principal | null;
}

export type AuditKind = 'create' | 'change' | 'delete';

export interface AuditRecord {
  id: number;
  principalId: string;
  resource: string;
  objectId: string;
  objectRepr: string;
  kind: AuditKind;
  message: string;
  actionTime: Date;
}

export type AuditEntryInput = Omit<AuditRecord, 'id' | 'actionTime'>;
