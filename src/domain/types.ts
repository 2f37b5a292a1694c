import { z } from "zod";

export const commandOrder = ["apply", "update", "relocate", "writeback"] as const;

export type CommandName = (typeof commandOrder)[number];

// An absent new_description removes the description, same as null.
export const columnChangeSchema = z.object({
  column_name: z.string(),
  new_description: z.string().nullable().optional(),
});

export type ColumnChangeInput = z.infer<typeof columnChangeSchema>;

export const modelUpdateSchema = z.object({
  model_name: z.string().min(1),
  column_changes: z.array(columnChangeSchema).default([]),
  model_description: z.string().nullable().optional(),
});

export type ModelUpdateInput = z.infer<typeof modelUpdateSchema>;

export const batchUpdateRequestSchema = z.object({
  patch_path: z.string().min(1),
  models: z.array(modelUpdateSchema).default([]),
});

export type BatchUpdateRequest = z.infer<typeof batchUpdateRequestSchema>;

export const singleUpdateRequestSchema = modelUpdateSchema.extend({
  patch_path: z.string().min(1),
});

export type SingleUpdateRequest = z.infer<typeof singleUpdateRequestSchema>;

export const relocateRequestSchema = z.object({
  current_patch: z.string().min(1),
  expected_patch: z.string().min(1),
  model_name: z.string().min(1),
});

export type RelocateRequest = z.infer<typeof relocateRequestSchema>;

export const writebackChangeSchema = z.object({
  model_id: z.string().min(1),
  patch_path: z.string().min(1),
  new_patch_path: z.string().min(1).optional(),
  column_changes: z.array(columnChangeSchema).default([]),
  model_description: z.string().nullable().optional(),
});

export type WritebackChangeInput = z.infer<typeof writebackChangeSchema>;

export const writebackRequestSchema = z.object({
  project_root: z.string().min(1).optional(),
  changes: z.array(writebackChangeSchema).default([]),
});

export type WritebackRequest = z.infer<typeof writebackRequestSchema>;

export interface BatchUpdateResponse {
  results: Record<string, string[]>;
}

export interface SingleUpdateResponse {
  updated_columns: string[];
}

export interface RelocateResponse {
  mutated: boolean;
}

export interface WritebackResponse {
  results: Record<string, string[]>;
}

export interface ColumnChange {
  columnName: string;
  newDescription: string | null;
}

/**
 * Description edits for one model. `modelDescription` is `undefined` when the
 * request carried no model-level edit; `null` asks for removal.
 */
export interface ModelUpdate {
  modelName: string;
  columnChanges: ColumnChange[];
  modelDescription?: string | null;
}

export function toColumnChange(input: ColumnChangeInput): ColumnChange {
  return {
    columnName: input.column_name,
    newDescription: input.new_description ?? null,
  };
}

export function toModelUpdate(input: {
  model_name: string;
  column_changes: ColumnChangeInput[];
  model_description?: string | null;
}): ModelUpdate {
  const update: ModelUpdate = {
    modelName: input.model_name,
    columnChanges: input.column_changes.map(toColumnChange),
  };
  if (input.model_description !== undefined) {
    update.modelDescription = input.model_description;
  }
  return update;
}

/** An update with no column edits and no model description edit does nothing. */
export function isActionableUpdate(update: ModelUpdate): boolean {
  return update.columnChanges.length > 0 || update.modelDescription !== undefined;
}

export interface WritebackChange {
  modelId: string;
  patchPath: string;
  newPatchPath?: string;
  columnChanges: ColumnChange[];
  modelDescription?: string | null;
}

export function toWritebackChange(input: WritebackChangeInput): WritebackChange {
  const change: WritebackChange = {
    modelId: input.model_id,
    patchPath: input.patch_path,
    columnChanges: input.column_changes.map(toColumnChange),
  };
  if (input.new_patch_path !== undefined) {
    change.newPatchPath = input.new_patch_path;
  }
  if (input.model_description !== undefined) {
    change.modelDescription = input.model_description;
  }
  return change;
}
