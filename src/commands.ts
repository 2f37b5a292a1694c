import type { ZodType, ZodTypeDef } from "zod";

import { formatErrorMessage, isPatchError, PayloadError } from "./domain/errors";
import {
  type BatchUpdateResponse,
  batchUpdateRequestSchema,
  type CommandName,
  type RelocateResponse,
  relocateRequestSchema,
  type SingleUpdateResponse,
  singleUpdateRequestSchema,
  toModelUpdate,
  toWritebackChange,
  type WritebackResponse,
  writebackRequestSchema,
} from "./domain/types";
import { DescriptionService, toResultsRecord } from "./services/descriptionService";
import { RelocationService } from "./services/relocationService";
import { WritebackService } from "./services/writebackService";
import { colors, formatNote } from "./utils/cliUi";

export interface TextSink {
  write(chunk: string): unknown;
}

export interface CommandIo {
  stdout: TextSink;
  stderr: TextSink;
}

export interface CommandOptions {
  dryRun?: boolean;
  verbose?: boolean;
  /** Fallback for `writeback` requests that carry no `project_root`. */
  projectRoot?: string;
}

export type CommandResponse =
  | BatchUpdateResponse
  | SingleUpdateResponse
  | RelocateResponse
  | WritebackResponse;

interface CommandContext extends CommandOptions {
  log?: (message: string) => void;
}

export function parsePayload<T>(raw: string, schema: ZodType<T, ZodTypeDef, unknown>): T {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new PayloadError(`Invalid JSON payload: ${formatErrorMessage(error)}`);
  }
  const result = schema.safeParse(parsed);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "payload"}: ${issue.message}`)
      .join("; ");
    throw new PayloadError(`Invalid request: ${details}`);
  }
  return result.data;
}

export async function executeCommand(
  command: CommandName,
  raw: string,
  context: CommandContext = {},
): Promise<CommandResponse> {
  const deps = { log: context.log };
  switch (command) {
    case "apply": {
      const request = parsePayload(raw, batchUpdateRequestSchema);
      const result = await new DescriptionService(deps).applyBatch({
        patchPath: request.patch_path,
        models: request.models.map(toModelUpdate),
        dryRun: context.dryRun,
      });
      return { results: toResultsRecord(result.outcomes) };
    }
    case "update": {
      const request = parsePayload(raw, singleUpdateRequestSchema);
      const updatedColumns = await new DescriptionService(deps).updateModel({
        patchPath: request.patch_path,
        update: toModelUpdate(request),
        dryRun: context.dryRun,
      });
      return { updated_columns: updatedColumns };
    }
    case "relocate": {
      const request = parsePayload(raw, relocateRequestSchema);
      const result = await new RelocationService(deps).relocate({
        currentPath: request.current_patch,
        expectedPath: request.expected_patch,
        modelName: request.model_name,
        dryRun: context.dryRun,
      });
      return { mutated: result.mutated };
    }
    case "writeback": {
      const request = parsePayload(raw, writebackRequestSchema);
      const projectRoot = request.project_root ?? context.projectRoot ?? process.cwd();
      const outcomes = await new WritebackService({ ...deps, projectRoot }).apply(
        request.changes.map(toWritebackChange),
      );
      const results: Record<string, string[]> = {};
      for (const outcome of outcomes) {
        results[outcome.modelId] = outcome.updatedColumns;
      }
      return { results };
    }
  }
}

/**
 * Runs one command against a raw JSON request and returns the exit code.
 * Recognized errors become a single stderr line and exit code 1; anything
 * else is rethrown to the caller.
 */
export async function runCommand(
  command: CommandName,
  raw: string,
  io: CommandIo,
  options: CommandOptions = {},
): Promise<number> {
  const log = options.verbose
    ? (message: string) => {
        io.stderr.write(`${formatNote(message)}\n`);
      }
    : undefined;

  try {
    const response = await executeCommand(command, raw, { ...options, log });
    io.stdout.write(`${JSON.stringify(response)}\n`);
    return 0;
  } catch (error) {
    if (isPatchError(error)) {
      io.stderr.write(`${colors.red(error.message)}\n`);
      return 1;
    }
    throw error;
  }
}
