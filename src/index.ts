export {
  createPropertiesFile,
  type PropertiesFile,
  parsePropertiesFile,
  readPropertiesFile,
  removePropertiesFile,
  serializePropertiesFile,
  writePropertiesFile,
} from "./adapters/propertiesFile";
export { type CommandIo, type CommandOptions, executeCommand, runCommand } from "./commands";
export {
  DependencyMissingError,
  NotFoundError,
  PatchError,
  type PatchErrorCode,
  PayloadError,
  StructureError,
} from "./domain/errors";
export { YAML_OUTPUT_OPTIONS } from "./domain/format";
export { extractModelName, resolvePatchPath } from "./domain/paths";
export { isDocumentEmpty } from "./domain/records";
export type {
  BatchUpdateRequest,
  BatchUpdateResponse,
  ColumnChange,
  ModelUpdate,
  RelocateRequest,
  RelocateResponse,
  SingleUpdateRequest,
  SingleUpdateResponse,
  WritebackChange,
  WritebackRequest,
  WritebackResponse,
} from "./domain/types";
export {
  applyModelUpdate,
  type BatchUpdateResult,
  DescriptionService,
  type ModelUpdateOutcome,
} from "./services/descriptionService";
export { type RelocateResult, RelocationService } from "./services/relocationService";
export { type WritebackOutcome, WritebackService } from "./services/writebackService";
