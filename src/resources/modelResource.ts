import { effectivePermissions } from '../core/permissions.js';
import type { Action, Principal } from '../core/types.js';
import type { Row } from '../persistence/types.js';
import type {
  ChildRelation,
  FieldChoice,
  FieldMeta,
  FieldType,
  ResourceAction,
  ResourceDescriptor,
} from './descriptor.js';

export interface FieldConfig {
  type: FieldType;
  column?: string;
  label?: string;
  primaryKey?: boolean;
  nullable?: boolean;
  required?: boolean;
  unique?: boolean;
  editable?: boolean;
  default?: unknown;
  choices?: FieldChoice[];
  maxLength?: number;
  helpText?: string;
  // Relation fields only.
  target?: string;
  relatedName?: string;
}

export type PermissionPolicy = (principal: Principal, action: Action, resource: string) => boolean;

export interface ModelResourceConfig {
  name: string;
  label?: string;
  pluralLabel?: string;
  table?: string;
  primaryKey?: string;
  fields: Record<string, FieldConfig>;
  searchFields?: string[];
  ordering?: string[];
  readonlyFields?: string[];
  visibleFields?: string[];
  children?: ChildRelation[];
  actions?: ResourceAction[];
  // A field name or a function producing the object description.
  repr?: string | ((row: Row) => string);
  // false leaves the policy undeclared.
  permission?: PermissionPolicy | false;
}

/**
 * Grants `action` when the principal's effective permissions contain it for
 * the resource. `view` is also granted by `change`.
 */
export const modelPermissionPolicy: PermissionPolicy = (principal, action, resource) => {
  const perms = effectivePermissions(principal).filter((p) => p.resource === resource);
  if (perms.some((p) => p.action === action)) return true;
  return action === 'view' && perms.some((p) => p.action === 'change');
};

function humanize(name: string): string {
  const words = name.replace(/_/g, ' ');
  return words.charAt(0).toUpperCase() + words.slice(1);
}

function buildField(name: string, cfg: FieldConfig, pk: string): FieldMeta {
  const primaryKey = cfg.primaryKey ?? name === pk;
  const nullable = cfg.nullable ?? false;
  const editable = cfg.editable ?? !primaryKey;
  const meta: FieldMeta = {
    name,
    type: cfg.type,
    column: cfg.column ?? (cfg.type === 'relation' ? `${name}_id` : name),
    label: cfg.label ?? humanize(name),
    primaryKey,
    nullable,
    required: cfg.required ?? (editable && !nullable && cfg.default === undefined),
    unique: cfg.unique ?? primaryKey,
    editable,
  };
  if (cfg.default !== undefined) meta.defaultValue = cfg.default;
  if (cfg.choices) meta.choices = cfg.choices;
  if (cfg.maxLength !== undefined) meta.maxLength = cfg.maxLength;
  if (cfg.helpText) meta.helpText = cfg.helpText;
  if (cfg.type === 'relation') {
    if (!cfg.target) throw new Error(`Relation field ${name} needs a target resource`);
    meta.relation = { target: cfg.target, relatedName: cfg.relatedName ?? `${name}_set` };
  }
  return meta;
}

/** Descriptor built from a declarative field map, the usual way to expose a table. */
export class ModelResource implements ResourceDescriptor {
  readonly name: string;
  readonly label: string;
  readonly pluralLabel: string;
  readonly table: string;
  readonly primaryKey: string;
  readonly getPermission?: (principal: Principal, action: Action) => boolean;
  private readonly fields: FieldMeta[];

  constructor(private readonly config: ModelResourceConfig) {
    this.name = config.name;
    this.label = config.label ?? humanize(config.name);
    this.pluralLabel = config.pluralLabel ?? `${this.label}s`;
    this.table = config.table ?? config.name;
    this.primaryKey = config.primaryKey ?? 'id';
    const declared = Object.entries(config.fields).map(([name, cfg]) => buildField(name, cfg, this.primaryKey));
    this.fields = declared.some((f) => f.primaryKey)
      ? declared
      : [buildField(this.primaryKey, { type: 'integer', primaryKey: true }, this.primaryKey), ...declared];

    const policy = config.permission === undefined ? modelPermissionPolicy : config.permission;
    if (policy) {
      this.getPermission = (principal, action) => policy(principal, action, this.name);
    }
  }

  getFields(): FieldMeta[] {
    return this.fields;
  }

  getSearchableFields(): string[] {
    return this.config.searchFields ?? [];
  }

  getDefaultOrdering(): string[] {
    return this.config.ordering ?? [];
  }

  getReadonlyFields(): string[] {
    return this.config.readonlyFields ?? [];
  }

  getVisibleFields(): string[] {
    return this.config.visibleFields ?? this.fields.map((f) => f.name);
  }

  getChildDescriptors(): ChildRelation[] {
    return this.config.children ?? [];
  }

  getActions(): ResourceAction[] {
    return this.config.actions ?? [];
  }

  describeInstance(row: Row): string {
    const repr = this.config.repr;
    if (typeof repr === 'function') return repr(row);
    if (repr && row[repr] !== undefined && row[repr] !== null) return String(row[repr]);
    return `${this.label} ${String(row[this.primaryKey])}`;
  }
}

export function defineResource(config: ModelResourceConfig): ModelResource {
  return new ModelResource(config);
}
