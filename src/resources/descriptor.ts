import type { Action, Principal } from '../core/types.js';
import type { Row, Store } from '../persistence/types.js';

export type FieldType = 'string' | 'text' | 'email' | 'integer' | 'number' | 'boolean' | 'datetime' | 'json' | 'relation';

export interface FieldChoice {
  value: string | number;
  label: string;
}

export interface RelationMeta {
  // Name of the registered resource the field points at.
  target: string;
  // Name of the reverse accessor on the target, e.g. "articles".
  relatedName: string;
}

export interface FieldMeta {
  name: string;
  type: FieldType;
  column: string;
  label: string;
  primaryKey: boolean;
  nullable: boolean;
  required: boolean;
  unique: boolean;
  editable: boolean;
  defaultValue?: unknown;
  choices?: FieldChoice[];
  maxLength?: number;
  helpText?: string;
  relation?: RelationMeta;
}

/** An editable child resource nested under its parent, linked through `field` on the child. */
export interface ChildRelation {
  resource: string;
  field: string;
}

export interface ActionContext {
  store: Store;
  principal: Principal | null;
  resource: ResourceDescriptor;
  rows: Row[];
}

export interface ActionOutcome {
  message?: string;
  result?: unknown;
}

export interface ResourceAction {
  name: string;
  description: string;
  // Permission needed to list and run the action; `change` when absent.
  requires?: Action;
  run(ctx: ActionContext): Promise<ActionOutcome | undefined>;
}

export interface ResourceDescriptor {
  readonly name: string;
  readonly label: string;
  readonly pluralLabel: string;
  readonly table: string;
  readonly primaryKey: string;
  getFields(): FieldMeta[];
  // Absent: the gate applies the undeclared-policy setting.
  getPermission?(principal: Principal, action: Action): boolean;
  getSearchableFields(): string[];
  getDefaultOrdering(): string[];
  getReadonlyFields(): string[];
  getVisibleFields(): string[];
  getChildDescriptors(): ChildRelation[];
  getActions(): ResourceAction[];
  describeInstance(row: Row): string;
}
