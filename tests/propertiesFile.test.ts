import path from "node:path";
import fs from "fs-extra";
import { afterAll, describe, expect, it } from "vitest";
import { Alias } from "yaml";

import {
  createPropertiesFile,
  parsePropertiesFile,
  readPropertiesFile,
  removePropertiesFile,
  serializePropertiesFile,
  writePropertiesFile,
} from "../src/adapters/propertiesFile";
import { NotFoundError, StructureError } from "../src/domain/errors";
import { ensureSequence } from "../src/domain/records";
import { cleanupWorkspaces, makeWorkspace, SHOP_YAML, writeFixture, yamlLines } from "./helpers/workspace";

afterAll(async () => {
  await cleanupWorkspaces();
});

describe("parsePropertiesFile", () => {
  it("serializes an untouched canonical document byte for byte", () => {
    const file = parsePropertiesFile("schema.yml", SHOP_YAML);
    expect(file.existed).toBe(true);
    expect(serializePropertiesFile(file)).toBe(SHOP_YAML);
  });

  it("treats an empty file as an empty mapping", () => {
    const file = parsePropertiesFile("schema.yml", "");
    expect(file.root.items).toHaveLength(0);
  });

  it("rejects documents that are not mappings", () => {
    expect(() => parsePropertiesFile("list.yml", yamlLines("- a", "- b"))).toThrow(
      new StructureError("YAML document `list.yml` is not a mapping"),
    );
  });

  it("rejects YAML that does not parse", () => {
    expect(() => parsePropertiesFile("broken.yml", yamlLines("models: [", "  - oops"))).toThrow(
      StructureError,
    );
    expect(() => parsePropertiesFile("broken.yml", yamlLines("models: [", "  - oops"))).toThrow(
      /^Failed to parse `broken\.yml`: /,
    );
  });
});

describe("serializePropertiesFile", () => {
  it("reports an alias without an anchor as a StructureError", () => {
    const file = parsePropertiesFile("a.yml", yamlLines("models:", "  - name: orders"));
    file.root.set("description", new Alias("missing"));

    expect(() => serializePropertiesFile(file)).toThrow(StructureError);
    expect(() => serializePropertiesFile(file)).toThrow(/^Failed to serialize `a\.yml`: Unresolved alias/);
  });
});

describe("readPropertiesFile", () => {
  it("fails with NotFoundError for a missing file", async () => {
    const dir = await makeWorkspace();
    const missing = path.join(dir, "missing.yml");
    await expect(readPropertiesFile(missing)).rejects.toThrow(NotFoundError);
  });

  it("returns a fresh mapping for a missing file when allowed", async () => {
    const dir = await makeWorkspace();
    const missing = path.join(dir, "missing.yml");
    const file = await readPropertiesFile(missing, { allowMissing: true });
    expect(file.existed).toBe(false);
    expect(file.root.items).toHaveLength(0);
  });
});

describe("writePropertiesFile", () => {
  it("creates parent directories and leaves no temp file behind", async () => {
    const dir = await makeWorkspace();
    const target = path.join(dir, "models", "marts", "_marts__models.yml");
    const file = createPropertiesFile(target);
    ensureSequence(file.root, "models").add(file.document.createNode({ name: "orders" }));

    await writePropertiesFile(file);

    expect(await fs.readFile(target, "utf8")).toBe(yamlLines("models:", "  - name: orders"));
    expect(await fs.readdir(path.dirname(target))).toEqual(["_marts__models.yml"]);
  });

  it("leaves a sibling file named like a temp file alone", async () => {
    const dir = await makeWorkspace();
    const target = await writeFixture(dir, "schema.yml", "version: 1\n");
    const sibling = await writeFixture(dir, "schema.yml.tmp", "keep me\n");
    const file = await readPropertiesFile(target);
    file.root.set("version", 2);

    await writePropertiesFile(file);

    expect(await fs.readFile(sibling, "utf8")).toBe("keep me\n");
    expect((await fs.readdir(dir)).sort()).toEqual(["schema.yml", "schema.yml.tmp"]);
  });

  it("writes nothing when the document cannot be serialized", async () => {
    const dir = await makeWorkspace();
    const target = await writeFixture(dir, "schema.yml", "version: 1\n");
    const file = await readPropertiesFile(target);
    file.root.set("description", new Alias("missing"));

    await expect(writePropertiesFile(file)).rejects.toThrow(StructureError);
    expect(await fs.readFile(target, "utf8")).toBe("version: 1\n");
    expect(await fs.readdir(dir)).toEqual(["schema.yml"]);
  });

  it("overwrites an existing file", async () => {
    const dir = await makeWorkspace();
    const target = await writeFixture(dir, "schema.yml", "version: 1\n");
    const file = await readPropertiesFile(target);
    file.root.set("version", 2);

    await writePropertiesFile(file);

    expect(await fs.readFile(target, "utf8")).toBe("version: 2\n");
  });
});

describe("removePropertiesFile", () => {
  it("reports whether a file was removed", async () => {
    const dir = await makeWorkspace();
    const target = await writeFixture(dir, "schema.yml", "version: 2\n");
    expect(await removePropertiesFile(target)).toBe(true);
    expect(await fs.pathExists(target)).toBe(false);
    expect(await removePropertiesFile(target)).toBe(false);
  });
});
