import { extractModelName, isSamePath, resolvePatchPath } from "../domain/paths";
import { isActionableUpdate, type ModelUpdate, type WritebackChange } from "../domain/types";
import { DescriptionService, type PatchServiceDeps } from "./descriptionService";
import { RelocationService } from "./relocationService";

export interface WritebackServiceDeps extends PatchServiceDeps {
  projectRoot: string;
  descriptions?: DescriptionService;
  relocation?: RelocationService;
}

export interface WritebackOutcome {
  modelId: string;
  updatedColumns: string[];
}

interface PendingUpdate {
  modelId: string;
  update: ModelUpdate;
}

export class WritebackService {
  private readonly descriptions: DescriptionService;
  private readonly relocation: RelocationService;

  constructor(private readonly deps: WritebackServiceDeps) {
    this.descriptions = deps.descriptions ?? new DescriptionService({ log: deps.log });
    this.relocation = deps.relocation ?? new RelocationService({ log: deps.log });
  }

  /**
   * Moves models whose patch path changed, then applies description edits
   * with one batch per target file. Returns an entry for every change that
   * moved a model or edited something.
   */
  async apply(changes: WritebackChange[]): Promise<WritebackOutcome[]> {
    const results = new Map<string, string[]>();
    const groups = new Map<string, PendingUpdate[]>();

    for (const change of changes) {
      const modelName = extractModelName(change.modelId);
      let targetPath = resolvePatchPath(this.deps.projectRoot, change.patchPath);

      if (change.newPatchPath !== undefined) {
        const expectedPath = resolvePatchPath(this.deps.projectRoot, change.newPatchPath);
        if (!isSamePath(targetPath, expectedPath)) {
          const { mutated } = await this.relocation.relocate({
            currentPath: targetPath,
            expectedPath,
            modelName,
          });
          if (mutated) {
            results.set(change.modelId, results.get(change.modelId) ?? []);
          }
        }
        targetPath = expectedPath;
      }

      const update: ModelUpdate = { modelName, columnChanges: change.columnChanges };
      if (change.modelDescription !== undefined) {
        update.modelDescription = change.modelDescription;
      }
      if (!isActionableUpdate(update)) {
        continue;
      }
      const pending = groups.get(targetPath) ?? [];
      pending.push({ modelId: change.modelId, update });
      groups.set(targetPath, pending);
    }

    for (const [patchPath, pending] of groups) {
      const batch = await this.descriptions.applyBatch({
        patchPath,
        models: pending.map((entry) => entry.update),
      });
      for (const entry of pending) {
        const outcome = batch.outcomes.find(
          (candidate) => candidate.modelName === entry.update.modelName,
        );
        if (!outcome) {
          continue;
        }
        const existing = results.get(entry.modelId) ?? [];
        for (const column of outcome.updatedColumns) {
          if (!existing.includes(column)) {
            existing.push(column);
          }
        }
        results.set(entry.modelId, existing);
      }
    }

    return Array.from(results, ([modelId, updatedColumns]) => ({ modelId, updatedColumns }));
  }
}
