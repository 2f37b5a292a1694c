import { readPropertiesFile, writePropertiesFile } from "../adapters/propertiesFile";
import { NotFoundError } from "../domain/errors";
import { COLUMNS_KEY, MODELS_KEY } from "../domain/format";
import {
  applyDescription,
  ensureNamedRecord,
  ensureSequence,
  findNamedRecord,
  readSequence,
  type YamlRecord,
} from "../domain/records";
import { isActionableUpdate, type ModelUpdate } from "../domain/types";

export interface PatchServiceDeps {
  log?: (message: string) => void;
}

export interface ModelUpdateOutcome {
  modelName: string;
  updatedColumns: string[];
  descriptionChanged: boolean;
}

export interface BatchUpdateOptions {
  patchPath: string;
  models: ModelUpdate[];
  dryRun?: boolean;
}

export interface BatchUpdateResult {
  patchPath: string;
  /** Only models where something changed, in request order. */
  outcomes: ModelUpdateOutcome[];
  written: boolean;
  dryRun: boolean;
}

export interface SingleUpdateOptions {
  patchPath: string;
  update: ModelUpdate;
  dryRun?: boolean;
}

export function hasChanges(outcome: ModelUpdateOutcome): boolean {
  return outcome.updatedColumns.length > 0 || outcome.descriptionChanged;
}

/**
 * Applies one model's description edits to an already loaded document.
 * Mutates `root` in place; nothing is written here.
 */
export function applyModelUpdate(
  root: YamlRecord,
  update: ModelUpdate,
  source = "YAML",
): ModelUpdateOutcome {
  const models = readSequence(root, MODELS_KEY);
  const match = models ? findNamedRecord(models, update.modelName) : undefined;
  if (!match) {
    throw new NotFoundError(`Model \`${update.modelName}\` not found in ${source}`);
  }
  const model = match.record;

  const columnChanges = update.columnChanges.filter((change) => change.columnName.length > 0);
  const columns =
    columnChanges.length > 0 ? ensureSequence(model, COLUMNS_KEY) : readSequence(model, COLUMNS_KEY);

  const descriptionChanged =
    update.modelDescription !== undefined
      ? applyDescription(model, update.modelDescription)
      : false;

  const updatedColumns: string[] = [];
  if (columns) {
    for (const change of columnChanges) {
      const { record } = ensureNamedRecord(columns, change.columnName);
      if (applyDescription(record, change.newDescription)) {
        updatedColumns.push(change.columnName);
      }
    }
  }

  return { modelName: update.modelName, updatedColumns, descriptionChanged };
}

export class DescriptionService {
  constructor(private readonly deps: PatchServiceDeps = {}) {}

  async applyBatch(options: BatchUpdateOptions): Promise<BatchUpdateResult> {
    const dryRun = options.dryRun ?? false;
    const result: BatchUpdateResult = {
      patchPath: options.patchPath,
      outcomes: [],
      written: false,
      dryRun,
    };
    if (options.models.length === 0) {
      return result;
    }

    const file = await readPropertiesFile(options.patchPath);
    for (const update of options.models) {
      if (!isActionableUpdate(update)) {
        continue;
      }
      const outcome = applyModelUpdate(file.root, update, `\`${options.patchPath}\``);
      if (hasChanges(outcome)) {
        result.outcomes.push(outcome);
      }
    }

    if (result.outcomes.length === 0) {
      this.log(`unchanged ${options.patchPath}`);
      return result;
    }
    if (dryRun) {
      this.log(`would write ${options.patchPath}`);
      return result;
    }

    await writePropertiesFile(file);
    result.written = true;
    this.log(`wrote ${options.patchPath}`);
    return result;
  }

  async updateModel(options: SingleUpdateOptions): Promise<string[]> {
    const result = await this.applyBatch({
      patchPath: options.patchPath,
      models: [options.update],
      dryRun: options.dryRun,
    });
    return result.outcomes[0]?.updatedColumns ?? [];
  }

  private log(message: string): void {
    this.deps.log?.(message);
  }
}

export function toResultsRecord(outcomes: ModelUpdateOutcome[]): Record<string, string[]> {
  const results: Record<string, string[]> = {};
  for (const outcome of outcomes) {
    const existing = results[outcome.modelName] ?? [];
    for (const column of outcome.updatedColumns) {
      if (!existing.includes(column)) {
        existing.push(column);
      }
    }
    results[outcome.modelName] = existing;
  }
  return results;
}
