import {
  type Alias,
  type Document,
  isAlias,
  isCollection,
  isMap,
  isNode,
  isScalar,
  isSeq,
  type Node,
  visit,
  YAMLMap,
  YAMLSeq,
} from "yaml";

import { StructureError } from "./errors";
import { DESCRIPTION_KEY, MODELS_KEY, NAME_KEY, SOURCES_KEY } from "./format";

export type YamlRecord = YAMLMap<unknown, unknown>;
export type YamlSequence = YAMLSeq<unknown>;

export interface NamedRecordMatch {
  index: number;
  record: YamlRecord;
}

export function describeNode(node: unknown): string {
  if (isMap(node)) {
    return "mapping";
  }
  if (isSeq(node)) {
    return "sequence";
  }
  if (isScalar(node)) {
    return node.value === null ? "null" : typeof node.value;
  }
  return node === null ? "null" : typeof node;
}

function isNullish(node: unknown): boolean {
  if (node === undefined || node === null) {
    return true;
  }
  return isScalar(node) && (node.value === null || node.value === undefined);
}

/**
 * Returns the sequence stored under `key`, or `undefined` when the key is
 * absent or holds an empty value (`columns:` with nothing after it).
 */
export function readSequence(map: YamlRecord, key: string): YamlSequence | undefined {
  const node: unknown = map.get(key, true);
  if (isNullish(node)) {
    return undefined;
  }
  if (isSeq(node)) {
    return node;
  }
  throw new StructureError(`Expected \`${key}\` to be a sequence, found ${describeNode(node)}`);
}

export function ensureSequence(map: YamlRecord, key: string): YamlSequence {
  const existing = readSequence(map, key);
  if (existing) {
    return existing;
  }
  const created = new YAMLSeq<unknown>();
  map.set(key, created);
  return created;
}

export function findNamedRecord(sequence: YamlSequence, name: string): NamedRecordMatch | undefined {
  for (const [index, item] of sequence.items.entries()) {
    if (isMap(item) && item.get(NAME_KEY) === name) {
      return { index, record: item };
    }
  }
  return undefined;
}

export function ensureNamedRecord(
  sequence: YamlSequence,
  name: string,
): { record: YamlRecord; created: boolean } {
  const match = findNamedRecord(sequence, name);
  if (match) {
    return { record: match.record, created: false };
  }
  const record = new YAMLMap<unknown, unknown>();
  record.set(NAME_KEY, name);
  sequence.add(record);
  return { record, created: true };
}

/**
 * Sets or removes `description` on a record. Returns whether the record
 * changed. Existing scalar nodes are updated in place so their quote style
 * and comments survive the write.
 */
export function applyDescription(record: YamlRecord, next: string | null): boolean {
  if (next === null) {
    if (!record.has(DESCRIPTION_KEY)) {
      return false;
    }
    record.delete(DESCRIPTION_KEY);
    return true;
  }

  const current: unknown = record.get(DESCRIPTION_KEY, true);
  if (isScalar(current)) {
    if (current.value === next) {
      return false;
    }
    current.value = next;
    return true;
  }
  if (current === next) {
    return false;
  }
  record.set(DESCRIPTION_KEY, next);
  return true;
}

function isEmptyValue(node: unknown): boolean {
  if (isCollection(node)) {
    return node.items.length === 0;
  }
  if (isScalar(node)) {
    return !node.value;
  }
  return !node;
}

/** A document is empty once it holds no models, no sources and no other keys. */
export function isDocumentEmpty(root: YamlRecord): boolean {
  for (const pair of root.items) {
    const key: unknown = isScalar(pair.key) ? pair.key.value : pair.key;
    if (key === MODELS_KEY || key === SOURCES_KEY) {
      if (!isEmptyValue(pair.value)) {
        return false;
      }
      continue;
    }
    return false;
  }
  return true;
}

function collectAnchors(node: Node): Set<string> {
  const anchors = new Set<string>();
  visit(node, {
    Node(_, child) {
      if (!isAlias(child) && child.anchor) {
        anchors.add(child.anchor);
      }
    },
  });
  return anchors;
}

function detachedCopy(alias: Alias, document: Document): Node {
  const copy: unknown = alias.resolve(document)?.clone();
  if (!isNode(copy)) {
    throw new StructureError(`Alias \`*${alias.source}\` has no matching anchor`);
  }
  visit(copy, {
    Node(_, child) {
      if (!isAlias(child)) {
        child.anchor = undefined;
      }
    },
  });
  return copy;
}

/**
 * Inlines every alias that crosses the boundary of `record`: aliases inside it
 * that point elsewhere in `document`, and aliases elsewhere that point into it.
 * Afterwards the record can be moved to another document, and `document`
 * still serializes without it.
 */
export function detachRecord(document: Document, record: YamlRecord): void {
  const internal = collectAnchors(record);
  visit(record, {
    Alias: (_, alias) => (internal.has(alias.source) ? undefined : detachedCopy(alias, document)),
  });
  if (internal.size === 0) {
    return;
  }
  visit(document, {
    Map: (_, node) => (node === record ? visit.SKIP : undefined),
    Alias: (_, alias) => (internal.has(alias.source) ? detachedCopy(alias, document) : undefined),
  });
}
