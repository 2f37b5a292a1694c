import path from "node:path";

export function resolvePatchPath(projectRoot: string, patchPath: string): string {
  return path.isAbsolute(patchPath) ? path.normalize(patchPath) : path.join(projectRoot, patchPath);
}

export function isSamePath(left: string, right: string): boolean {
  return path.resolve(left) === path.resolve(right);
}

/** `model.jaffle_shop.orders` -> `orders`; ids without dots are returned as-is. */
export function extractModelName(uniqueId: string): string {
  const segments = uniqueId.split(".");
  return segments[segments.length - 1] ?? uniqueId;
}
