import { writableFields } from '../engine/fields.js';
import { OPERATIONS, type Operation } from '../core/types.js';
import { FIND_RESOURCES } from './commandParser.js';
import type { FieldMeta, ResourceDescriptor } from '../resources/descriptor.js';
import type { ResourceRegistry } from '../resources/registry.js';

export type JsonSchema = Record<string, unknown>;

export interface CommandDefinition {
  name: string;
  description: string;
  operation: Operation | typeof FIND_RESOURCES;
  resource: string | null;
  inputSchema: JsonSchema;
}

const ID: JsonSchema = { type: ['integer', 'string'], description: 'Primary key' };
const LIMIT: JsonSchema = { type: 'integer', minimum: 0 };
const OFFSET: JsonSchema = { type: 'integer', minimum: 0, default: 0 };

function baseType(f: FieldMeta): JsonSchema {
  switch (f.type) {
    case 'string':
    case 'text':
      return f.maxLength ? { type: 'string', maxLength: f.maxLength } : { type: 'string' };
    case 'email':
      return { type: 'string', format: 'email', ...(f.maxLength ? { maxLength: f.maxLength } : {}) };
    case 'integer':
      return { type: 'integer' };
    case 'number':
      return { type: 'number' };
    case 'boolean':
      return { type: 'boolean' };
    case 'datetime':
      return { type: 'string', format: 'date-time' };
    case 'json':
      return {};
    case 'relation':
      return { type: ['integer', 'string'], description: `Id of the related ${f.relation?.target ?? 'object'}` };
  }
}

function fieldSchema(f: FieldMeta): JsonSchema {
  const schema = { ...baseType(f) };
  if (f.choices) schema.enum = f.choices.map((c) => c.value);
  if (f.helpText && schema.description === undefined) schema.description = f.helpText;
  if (f.defaultValue !== undefined) schema.default = f.defaultValue;
  if (f.nullable) schema.nullable = true;
  return schema;
}

/** JSON schema of the writable fields; `forCreate` lists the required ones. */
export function dataSchema(d: ResourceDescriptor, forCreate: boolean): JsonSchema {
  const fields = writableFields(d);
  const properties: Record<string, JsonSchema> = {};
  for (const f of fields) properties[f.name] = fieldSchema(f);
  const schema: JsonSchema = { type: 'object', properties, additionalProperties: false };
  if (forCreate) {
    const required = fields.filter((f) => f.required).map((f) => f.name);
    if (required.length > 0) schema.required = required;
  }
  return schema;
}

function object(properties: Record<string, JsonSchema>, required: string[] = []): JsonSchema {
  return required.length > 0 ? { type: 'object', properties, required } : { type: 'object', properties };
}

function inputSchema(operation: Operation, d: ResourceDescriptor): JsonSchema {
  const fieldNames = d.getFields().map((f) => f.name);
  switch (operation) {
    case 'list':
      return object({
        filters: { type: 'object', description: `Keys are field or field__lookup over: ${fieldNames.join(', ')}` },
        search: { type: 'string' },
        orderBy: { type: 'array', items: { type: 'string', enum: fieldNames.flatMap((n) => [n, `-${n}`]) } },
        limit: LIMIT,
        offset: OFFSET,
      });
    case 'get':
      return object(
        { id: ID, includeChildren: { type: 'boolean', default: false }, includeRelated: { type: 'boolean', default: false } },
        ['id'],
      );
    case 'create':
      return object({ data: dataSchema(d, true) }, ['data']);
    case 'update': {
      const children: Record<string, JsonSchema> = {};
      for (const c of d.getChildDescriptors()) {
        children[c.resource] = {
          type: 'array',
          items: object({ id: ID, data: { type: 'object' }, delete: { type: 'boolean' } }),
        };
      }
      return object({ id: ID, data: dataSchema(d, false), children: object(children) }, ['id']);
    }
    case 'delete':
      return object({ id: ID }, ['id']);
    case 'describe':
    case 'actions':
      return object({});
    case 'action':
      return object(
        {
          action: { type: 'string', enum: ['delete_selected', ...d.getActions().map((a) => a.name)] },
          ids: { type: 'array', items: ID, minItems: 1 },
        },
        ['action', 'ids'],
      );
    case 'bulk':
      return object(
        {
          operation: { type: 'string', enum: ['create', 'update', 'delete'] },
          items: { type: 'array', minItems: 1 },
        },
        ['operation', 'items'],
      );
    case 'related':
      return object({ id: ID, relation: { type: 'string' }, limit: LIMIT, offset: OFFSET }, ['id', 'relation']);
    case 'history':
      return object({ id: ID, limit: LIMIT }, ['id']);
    case 'autocomplete':
      return object({ term: { type: 'string' }, limit: LIMIT });
  }
}

const DESCRIPTIONS: Record<Operation, (label: string, plural: string) => string> = {
  list: (_l, p) => `List ${p} with filters, search, ordering and pagination`,
  get: (l) => `Get one ${l} by id`,
  create: (l) => `Create a ${l}`,
  update: (l) => `Update a ${l} and optionally its child objects`,
  delete: (l) => `Delete a ${l}`,
  describe: (l) => `Describe the fields and configuration of ${l}`,
  actions: (l) => `List actions available on ${l}`,
  action: (_l, p) => `Run an action on selected ${p}`,
  bulk: (_l, p) => `Create, update or delete many ${p}`,
  related: (l) => `Navigate a relation of a ${l}`,
  history: (l) => `Change history of a ${l}`,
  autocomplete: (_l, p) => `Suggest ${p} matching a term`,
};

export function listCommands(registry: ResourceRegistry): CommandDefinition[] {
  const commands: CommandDefinition[] = [
    {
      name: FIND_RESOURCES,
      description: 'Find registered resources by name or label',
      operation: FIND_RESOURCES,
      resource: null,
      inputSchema: object({ query: { type: 'string' } }),
    },
  ];
  for (const d of registry.list()) {
    const label = d.label.toLowerCase();
    const plural = d.pluralLabel.toLowerCase();
    for (const operation of OPERATIONS) {
      commands.push({
        name: `${operation}_${d.name}`,
        description: DESCRIPTIONS[operation](label, plural),
        operation,
        resource: d.name,
        inputSchema: inputSchema(operation, d),
      });
    }
  }
  return commands;
}
