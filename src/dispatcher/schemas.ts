import { z } from 'zod';

// Argument schemas per operation. Unknown keys are stripped.

export const ObjectId = z.union([z.number().int(), z.string().min(1)]);
const Data = z.record(z.unknown());
const Limit = z.number().int().min(0);
const Offset = z.number().int().min(0).default(0);

export const ListArgs = z.object({
  filters: z.record(z.unknown()).default({}),
  search: z.string().default(''),
  orderBy: z.array(z.string()).default([]),
  limit: Limit.optional(),
  offset: Offset,
});

export const GetArgs = z.object({
  id: ObjectId,
  includeChildren: z.boolean().default(false),
  includeRelated: z.boolean().default(false),
});

export const CreateArgs = z.object({
  data: Data,
});

export const ChildItem = z.object({
  id: ObjectId.optional(),
  data: Data.optional(),
  delete: z.boolean().optional(),
});

export const UpdateArgs = z.object({
  id: ObjectId,
  data: Data.default({}),
  children: z.record(z.array(ChildItem)).optional(),
});

export const DeleteArgs = z.object({
  id: ObjectId,
});

export const EmptyArgs = z.object({});

export const ActionArgs = z.object({
  action: z.string().min(1),
  ids: z.array(ObjectId).min(1),
});

export const BulkOperationSchema = z.enum(['create', 'update', 'delete']);

export const BulkArgs = z.object({
  operation: BulkOperationSchema,
  items: z.array(z.unknown()),
});

export const BulkUpdateItem = z.object({
  id: ObjectId,
  data: Data.default({}),
});

export const RelatedArgs = z.object({
  id: ObjectId,
  relation: z.string().min(1),
  limit: Limit.optional(),
  offset: Offset,
});

export const HistoryArgs = z.object({
  id: ObjectId,
  limit: Limit.optional(),
});

export const AutocompleteArgs = z.object({
  term: z.string().default(''),
  limit: Limit.optional(),
});

export const FindResourcesArgs = z.object({
  query: z.string().optional(),
});

export type ListArgs = z.infer<typeof ListArgs>;
export type GetArgs = z.infer<typeof GetArgs>;
export type CreateArgs = z.infer<typeof CreateArgs>;
export type ChildItem = z.infer<typeof ChildItem>;
export type UpdateArgs = z.infer<typeof UpdateArgs>;
export type DeleteArgs = z.infer<typeof DeleteArgs>;
export type ActionArgs = z.infer<typeof ActionArgs>;
export type BulkArgs = z.infer<typeof BulkArgs>;
export type RelatedArgs = z.infer<typeof RelatedArgs>;
export type HistoryArgs = z.infer<typeof HistoryArgs>;
export type AutocompleteArgs = z.infer<typeof AutocompleteArgs>;
export type FindResourcesArgs = z.infer<typeof FindResourcesArgs>;

