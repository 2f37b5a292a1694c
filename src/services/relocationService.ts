import fs from "fs-extra";

import {
  type PropertiesFile,
  readPropertiesFile,
  removePropertiesFile,
  serializePropertiesFile,
  writePropertiesFile,
} from "../adapters/propertiesFile";
import { NotFoundError } from "../domain/errors";
import { MODELS_KEY } from "../domain/format";
import { isSamePath } from "../domain/paths";
import {
  detachRecord,
  ensureSequence,
  findNamedRecord,
  isDocumentEmpty,
  readSequence,
  type YamlRecord,
} from "../domain/records";
import type { PatchServiceDeps } from "./descriptionService";

export interface RelocateOptions {
  currentPath: string;
  expectedPath: string;
  modelName: string;
  dryRun?: boolean;
}

export type FileEffectAction = "written" | "deleted" | "untouched";

export interface FileEffect {
  path: string;
  action: FileEffectAction;
}

export interface RelocateResult {
  mutated: boolean;
  dryRun: boolean;
  effects: FileEffect[];
}

/** Takes a model out of `file`, with any aliases crossing its boundary inlined. */
export function removeModel(file: PropertiesFile, modelName: string): YamlRecord {
  const models = readSequence(file.root, MODELS_KEY);
  const match = models ? findNamedRecord(models, modelName) : undefined;
  if (!models || !match) {
    throw new NotFoundError(`Model \`${modelName}\` not found in \`${file.path}\``);
  }
  detachRecord(file.document, match.record);
  models.items.splice(match.index, 1);
  if (models.items.length === 0) {
    file.root.delete(MODELS_KEY);
  }
  return match.record;
}

/** Replaces a same-named model in place, otherwise appends. */
export function upsertModel(file: PropertiesFile, model: YamlRecord, modelName: string): void {
  const models = ensureSequence(file.root, MODELS_KEY);
  const match = findNamedRecord(models, modelName);
  if (match) {
    detachRecord(file.document, match.record);
    models.items[match.index] = model;
    return;
  }
  models.add(model);
}

export class RelocationService {
  constructor(private readonly deps: PatchServiceDeps = {}) {}

  async relocate(options: RelocateOptions): Promise<RelocateResult> {
    const dryRun = options.dryRun ?? false;
    if (!(await fs.pathExists(options.currentPath))) {
      throw new NotFoundError(`YAML file \`${options.currentPath}\` not found`);
    }
    if (isSamePath(options.currentPath, options.expectedPath)) {
      return { mutated: false, dryRun, effects: [] };
    }

    const source = await readPropertiesFile(options.currentPath);
    const model = removeModel(source, options.modelName);

    const target = await readPropertiesFile(options.expectedPath, { allowMissing: true });
    upsertModel(target, model, options.modelName);

    // Both files are rendered before either is touched on disk.
    const sourceContent = isDocumentEmpty(source.root) ? undefined : serializePropertiesFile(source);
    const targetContent = serializePropertiesFile(target);

    if (dryRun) {
      this.log(`would move ${options.modelName}: ${options.currentPath} -> ${options.expectedPath}`);
      return { mutated: true, dryRun, effects: [] };
    }

    const effects = [
      await this.persist(source, sourceContent),
      await this.persist(target, targetContent),
    ];
    this.log(`moved ${options.modelName}: ${options.currentPath} -> ${options.expectedPath}`);
    return { mutated: true, dryRun, effects };
  }

  private async persist(file: PropertiesFile, content: string | undefined): Promise<FileEffect> {
    if (content === undefined) {
      const removed = await removePropertiesFile(file.path);
      if (removed) {
        this.log(`deleted ${file.path}`);
      }
      return { path: file.path, action: removed ? "deleted" : "untouched" };
    }
    await writePropertiesFile(file, content);
    this.log(`wrote ${file.path}`);
    return { path: file.path, action: "written" };
  }

  private log(message: string): void {
    this.deps.log?.(message);
  }
}
