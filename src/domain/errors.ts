export type PatchErrorCode = "structure" | "not_found" | "payload" | "dependency_missing";

export class PatchError extends Error {
  constructor(
    public readonly code: PatchErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "PatchError";
  }
}

/** A node has the wrong YAML shape, or the file is not a YAML mapping at all. */
export class StructureError extends PatchError {
  constructor(message: string) {
    super("structure", message);
    this.name = "StructureError";
  }
}

export class NotFoundError extends PatchError {
  constructor(message: string) {
    super("not_found", message);
    this.name = "NotFoundError";
  }
}

export class PayloadError extends PatchError {
  constructor(message: string) {
    super("payload", message);
    this.name = "PayloadError";
  }
}

export class DependencyMissingError extends PatchError {
  constructor(
    public readonly dependency: string,
    message: string,
  ) {
    super("dependency_missing", message);
    this.name = "DependencyMissingError";
  }
}

export function isPatchError(error: unknown): error is PatchError {
  return error instanceof PatchError;
}

export function formatErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
