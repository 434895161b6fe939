import { existsSync, readFileSync, readdirSync, statSync } from "node:fs";
import { join } from "node:path";

import { formatLocation, parseRustItem } from "@ffistub/engine";
import type { RustItem, SourcedItem, SourceLocation } from "@ffistub/engine";

export const CRATE_NAME_FILE = "crate_name.txt";

const JSONL_EXTENSION = ".jsonl";

export type RecordKind = "struct" | "enum" | "union" | "function" | "typealias" | "const";

const ITEM_KINDS: Readonly<Record<RecordKind, RustItem["kind"]>> = {
  struct: "struct",
  enum: "enum",
  union: "union",
  function: "fn",
  typealias: "type_alias",
  const: "const",
};

function isRecordKind(value: unknown): value is RecordKind {
  return typeof value === "string" && Object.hasOwn(ITEM_KINDS, value);
}

/** One captured declaration, as written by the exporting crate's build. */
export type DeclarationRecord = {
  readonly kind: RecordKind;
  readonly name: string;
  readonly content: string;
  readonly location: SourceLocation;
};

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isInteger(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value);
}

function parseLocation(value: unknown, label: string): SourceLocation {
  if (!isObject(value)) {
    throw new Error(`${label}: 'source_location' must be an object.`);
  }
  const { file, line, column } = value;
  if (typeof file !== "string" || !isInteger(line) || !isInteger(column)) {
    throw new Error(`${label}: 'source_location' must have a string 'file' and integer 'line' and 'column'.`);
  }
  return { file, line, column };
}

export function parseRecord(value: unknown, label: string): DeclarationRecord {
  if (!isObject(value)) {
    throw new Error(`${label}: record must be a JSON object.`);
  }
  const { kind, name, content } = value;
  if (!isRecordKind(kind)) {
    throw new Error(`${label}: unknown record kind '${String(kind)}'.`);
  }
  if (typeof name !== "string" || name.length === 0) {
    throw new Error(`${label}: 'name' must be a non-empty string.`);
  }
  if (typeof content !== "string") {
    throw new Error(`${label}: 'content' must be a string.`);
  }
  return { kind, name, content, location: parseLocation(value.source_location, label) };
}

function readJsonLines(path: string): DeclarationRecord[] {
  const out: DeclarationRecord[] = [];
  const lines = readFileSync(path, "utf-8").split("\n");
  lines.forEach((line, index) => {
    if (line.trim().length === 0) return;
    const label = `${path}:${index + 1}`;
    let value: unknown;
    try {
      value = JSON.parse(line) as unknown;
    } catch (err: unknown) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new Error(`${label}: invalid JSON (${reason}).`);
    }
    out.push(parseRecord(value, label));
  });
  return out;
}

function recordFiles(inputDir: string): readonly string[] {
  return readdirSync(inputDir)
    .filter((name) => name.endsWith(JSONL_EXTENSION) && name.includes("_"))
    .sort((a, b) => a.localeCompare(b));
}

/** Group names are file-name prefixes up to the first `_`. */
export function discoverGroups(inputDir: string): readonly string[] {
  const groups = new Set<string>();
  for (const name of recordFiles(inputDir)) groups.add(name.slice(0, name.indexOf("_")));
  return [...groups].sort((a, b) => a.localeCompare(b));
}

/** Reads every `<group>_*.jsonl` file; a later record replaces an earlier one of the same name. */
export function readGroup(inputDir: string, group: string): readonly DeclarationRecord[] {
  const byName = new Map<string, DeclarationRecord>();
  for (const name of recordFiles(inputDir)) {
    if (!name.startsWith(`${group}_`)) continue;
    for (const record of readJsonLines(join(inputDir, name))) byName.set(record.name, record);
  }
  return [...byName.values()];
}

export function readCrateName(inputDir: string): string {
  const path = join(inputDir, CRATE_NAME_FILE);
  if (!existsSync(path)) {
    throw new Error(`${inputDir} holds no ${CRATE_NAME_FILE}; it was not written by a declaration export.`);
  }
  const name = readFileSync(path, "utf-8").trim();
  if (name.length === 0) throw new Error(`${path} is empty.`);
  return name;
}

/** Parses a record's content and checks it declares what the record says. */
export function recordItem(record: DeclarationRecord): SourcedItem {
  const item = parseRustItem(record.content, record.location);
  const expected = ITEM_KINDS[record.kind];
  if (item.kind !== expected || item.name !== record.name) {
    throw new Error(
      `record '${record.name}' (${record.kind}) holds ${item.kind} '${item.name}' (at ${formatLocation(record.location)}).`
    );
  }
  return [item, record.location];
}

export function loadRecordItems(inputDir: string, groups?: readonly string[]): SourcedItem[] {
  if (!existsSync(inputDir) || !statSync(inputDir).isDirectory()) {
    throw new Error(`Input directory ${inputDir} does not exist or is not a directory.`);
  }
  const selected = groups ?? discoverGroups(inputDir);
  return selected.flatMap((group) => readGroup(inputDir, group).map(recordItem));
}
