import path from "node:path";
import { describe, expect, it } from "vitest";

import { extractModelName, isSamePath, resolvePatchPath } from "../src/domain/paths";

describe("resolvePatchPath", () => {
  it("joins relative patch paths onto the project root", () => {
    expect(resolvePatchPath("/work/shop", "models/staging/_stg.yml")).toBe(
      path.join("/work/shop", "models/staging/_stg.yml"),
    );
  });

  it("keeps absolute patch paths", () => {
    expect(resolvePatchPath("/work/shop", "/elsewhere/../schema.yml")).toBe(
      path.normalize("/schema.yml"),
    );
  });
});

describe("isSamePath", () => {
  it("compares resolved paths", () => {
    expect(isSamePath("/work/a/../b.yml", "/work/b.yml")).toBe(true);
    expect(isSamePath("/work/a.yml", "/work/b.yml")).toBe(false);
  });
});

describe("extractModelName", () => {
  it.each([
    ["model.shop.orders", "orders"],
    ["model.shop.v2_orders", "v2_orders"],
    ["orders", "orders"],
  ])("maps %s to %s", (uniqueId, expected) => {
    expect(extractModelName(uniqueId)).toBe(expected);
  });
});
