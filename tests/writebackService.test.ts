import path from "node:path";
import fs from "fs-extra";
import { afterAll, describe, expect, it } from "vitest";

import { NotFoundError } from "../src/domain/errors";
import type { WritebackChange } from "../src/domain/types";
import { WritebackService } from "../src/services/writebackService";
import { cleanupWorkspaces, collectLog, makeWorkspace, writeFixture, yamlLines } from "./helpers/workspace";

afterAll(async () => {
  await cleanupWorkspaces();
});

const STAGING = yamlLines(
  "models:",
  "  - name: stg_customers",
  "    columns:",
  "      - name: customer_id",
  "  - name: stg_orders",
  "    columns:",
  "      - name: id",
  "        description: old",
);

async function stagingProject() {
  const root = await makeWorkspace();
  const stagingPath = await writeFixture(root, "models/staging/_stg__models.yml", STAGING);
  return { root, stagingPath, martsPath: path.join(root, "models/marts/_marts__models.yml") };
}

describe("WritebackService.apply", () => {
  it("moves a model before editing it and batches edits per file", async () => {
    const { root, stagingPath, martsPath } = await stagingProject();
    const { lines, log } = collectLog();
    const service = new WritebackService({ projectRoot: root, log });

    const outcomes = await service.apply([
      {
        modelId: "model.shop.stg_orders",
        patchPath: "models/staging/_stg__models.yml",
        newPatchPath: "models/marts/_marts__models.yml",
        columnChanges: [{ columnName: "id", newDescription: "Order key" }],
      },
      {
        modelId: "model.shop.stg_customers",
        patchPath: "models/staging/_stg__models.yml",
        columnChanges: [{ columnName: "customer_id", newDescription: "Customer key" }],
      },
    ]);

    expect(outcomes).toEqual([
      { modelId: "model.shop.stg_orders", updatedColumns: ["id"] },
      { modelId: "model.shop.stg_customers", updatedColumns: ["customer_id"] },
    ]);
    expect(await fs.readFile(martsPath, "utf8")).toBe(
      yamlLines(
        "models:",
        "  - name: stg_orders",
        "    columns:",
        "      - name: id",
        "        description: Order key",
      ),
    );
    expect(await fs.readFile(stagingPath, "utf8")).toBe(
      yamlLines(
        "models:",
        "  - name: stg_customers",
        "    columns:",
        "      - name: customer_id",
        "        description: Customer key",
      ),
    );
    expect(lines).toEqual([
      `wrote ${stagingPath}`,
      `wrote ${martsPath}`,
      `moved stg_orders: ${stagingPath} -> ${martsPath}`,
      `wrote ${martsPath}`,
      `wrote ${stagingPath}`,
    ]);
  });

  it("reports a moved model with no description edits", async () => {
    const { root, martsPath } = await stagingProject();
    const service = new WritebackService({ projectRoot: root });

    const outcomes = await service.apply([
      {
        modelId: "model.shop.stg_orders",
        patchPath: "models/staging/_stg__models.yml",
        newPatchPath: martsPath,
        columnChanges: [],
      },
    ]);

    expect(outcomes).toEqual([{ modelId: "model.shop.stg_orders", updatedColumns: [] }]);
    expect(await fs.pathExists(martsPath)).toBe(true);
  });

  it("skips changes that neither move nor edit anything", async () => {
    const { root, stagingPath } = await stagingProject();
    const service = new WritebackService({ projectRoot: root });
    const changes: WritebackChange[] = [
      {
        modelId: "model.shop.stg_orders",
        patchPath: "models/staging/_stg__models.yml",
        newPatchPath: "models/staging/../staging/_stg__models.yml",
        columnChanges: [],
      },
      {
        modelId: "model.shop.stg_customers",
        patchPath: stagingPath,
        columnChanges: [{ columnName: "customer_id", newDescription: null }],
      },
    ];

    expect(await service.apply(changes)).toEqual([]);
    expect(await fs.readFile(stagingPath, "utf8")).toBe(STAGING);
  });

  it("sets a model description addressed by unique id", async () => {
    const { root, stagingPath } = await stagingProject();
    const service = new WritebackService({ projectRoot: root });

    const outcomes = await service.apply([
      {
        modelId: "model.shop.stg_customers",
        patchPath: "models/staging/_stg__models.yml",
        columnChanges: [],
        modelDescription: "Customers",
      },
    ]);

    expect(outcomes).toEqual([{ modelId: "model.shop.stg_customers", updatedColumns: [] }]);
    expect(await fs.readFile(stagingPath, "utf8")).toBe(
      yamlLines(
        "models:",
        "  - name: stg_customers",
        "    columns:",
        "      - name: customer_id",
        "    description: Customers",
        "  - name: stg_orders",
        "    columns:",
        "      - name: id",
        "        description: old",
      ),
    );
  });

  it("fails with NotFoundError for a model missing from its patch file", async () => {
    const { root } = await stagingProject();
    const service = new WritebackService({ projectRoot: root });

    await expect(
      service.apply([
        {
          modelId: "model.shop.stg_payments",
          patchPath: "models/staging/_stg__models.yml",
          columnChanges: [{ columnName: "id", newDescription: "Payment key" }],
        },
      ]),
    ).rejects.toBeInstanceOf(NotFoundError);
  });
});
