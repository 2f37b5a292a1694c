import fs from "fs-extra";
import { Document, isMap, isScalar, parseDocument, YAMLMap } from "yaml";

import { formatErrorMessage, NotFoundError, StructureError } from "../domain/errors";
import { YAML_OUTPUT_OPTIONS } from "../domain/format";
import type { YamlRecord } from "../domain/records";

export interface PropertiesFile {
  path: string;
  document: Document;
  root: YamlRecord;
  existed: boolean;
}

export interface ReadPropertiesOptions {
  /** Treat a missing file as an empty mapping instead of failing. */
  allowMissing?: boolean;
}

export function createPropertiesFile(filePath: string): PropertiesFile {
  const document = new Document();
  const root = new YAMLMap<unknown, unknown>();
  document.contents = root;
  return { path: filePath, document, root, existed: false };
}

export function parsePropertiesFile(filePath: string, raw: string): PropertiesFile {
  const document: Document = parseDocument(raw);
  const [firstError] = document.errors;
  if (firstError) {
    throw new StructureError(`Failed to parse \`${filePath}\`: ${firstError.message}`);
  }

  const contents: unknown = document.contents;
  if (contents === null || (isScalar(contents) && contents.value === null)) {
    const root = new YAMLMap<unknown, unknown>();
    document.contents = root;
    return { path: filePath, document, root, existed: true };
  }
  if (!isMap(contents)) {
    throw new StructureError(`YAML document \`${filePath}\` is not a mapping`);
  }
  return { path: filePath, document, root: contents, existed: true };
}

export async function readPropertiesFile(
  filePath: string,
  options: ReadPropertiesOptions = {},
): Promise<PropertiesFile> {
  if (!(await fs.pathExists(filePath))) {
    if (options.allowMissing) {
      return createPropertiesFile(filePath);
    }
    throw new NotFoundError(`YAML file \`${filePath}\` not found`);
  }
  const raw = await fs.readFile(filePath, "utf8");
  return parsePropertiesFile(filePath, raw);
}

export function serializePropertiesFile(file: PropertiesFile): string {
  try {
    return file.document.toString(YAML_OUTPUT_OPTIONS);
  } catch (error) {
    throw new StructureError(`Failed to serialize \`${file.path}\`: ${formatErrorMessage(error)}`);
  }
}

let tempCounter = 0;

/** Writes to a sibling temp file, then renames it over the target. */
export async function writePropertiesFile(
  file: PropertiesFile,
  content: string = serializePropertiesFile(file),
): Promise<void> {
  tempCounter += 1;
  const tempPath = `${file.path}.${process.pid}.${tempCounter}.tmp`;
  try {
    await fs.outputFile(tempPath, content, "utf8");
    await fs.move(tempPath, file.path, { overwrite: true });
  } catch (error) {
    await fs.remove(tempPath);
    throw error;
  }
}

export async function removePropertiesFile(filePath: string): Promise<boolean> {
  if (!(await fs.pathExists(filePath))) {
    return false;
  }
  await fs.remove(filePath);
  return true;
}
