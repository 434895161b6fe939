import { existsSync, readFileSync } from "node:fs";
import { dirname, join, resolve } from "node:path";

import { TARGET_AXES } from "@ffistub/engine";
import type { CfgRulesInit, PredefinedFeatures, RustEdition, TargetAxis, TargetSelection } from "@ffistub/engine";

export const CONFIG_FILE = "ffistub.json";

export type FfiOptionsConfig = {
  readonly allowedPrefixes: readonly string[];
  readonly transparentWrappers: readonly string[];
  readonly prefixedExportedTypes: readonly string[];
};

export type CfgConfig = CfgRulesInit & {
  /** The exact feature set of the source crate; excludes enable, disable and rename. */
  readonly predefinedFeatures?: PredefinedFeatures;
};

export type GeneratorConfig = {
  readonly schema: 1;
  /** Overrides the crate name stored next to the records. */
  readonly crate?: string;
  readonly edition: RustEdition;
  /** Record groups to read; all groups when absent. */
  readonly groups?: readonly string[];
  readonly cfg: CfgConfig;
  readonly ffi: FfiOptionsConfig;
  readonly stripDerives: readonly string[];
  readonly stripMacros: readonly string[];
  readonly replacePaths: Readonly<Record<string, string>>;
};

export const DEFAULT_GENERATOR_CONFIG: GeneratorConfig = {
  schema: 1,
  edition: "2021",
  cfg: {},
  ffi: { allowedPrefixes: [], transparentWrappers: [], prefixedExportedTypes: [] },
  stripDerives: [],
  stripMacros: [],
  replacePaths: {},
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function asRecord(value: unknown, label: string): Record<string, unknown> {
  if (!isRecord(value)) {
    throw new Error(`${label} must be a JSON object.`);
  }
  return value;
}

function assertKnownKeys(value: Record<string, unknown>, allowed: readonly string[], label: string): void {
  for (const key of Object.keys(value)) {
    if (!allowed.includes(key)) {
      throw new Error(`${label}: unknown key '${key}'.`);
    }
  }
}

function asString(value: unknown, label: string): string {
  if (typeof value !== "string" || value.length === 0) {
    throw new Error(`${label} must be a non-empty string.`);
  }
  return value;
}

function asBoolean(value: unknown, label: string): boolean {
  if (typeof value !== "boolean") {
    throw new Error(`${label} must be a boolean.`);
  }
  return value;
}

function asStringArray(value: unknown, label: string): readonly string[] {
  if (!Array.isArray(value)) {
    throw new Error(`${label} must be an array of non-empty strings.`);
  }
  return value.map((entry) => asString(entry, `${label} entries`));
}

function asStringMap(value: unknown, label: string): Readonly<Record<string, string>> {
  const raw = asRecord(value, label);
  const out: Record<string, string> = {};
  for (const [key, entry] of Object.entries(raw)) {
    out[key] = asString(entry, `${label}: '${key}'`);
  }
  return out;
}

function optional<T>(value: unknown, parse: (value: unknown) => T): T | undefined {
  return value === undefined ? undefined : parse(value);
}

function parseTarget(value: unknown): TargetSelection {
  const label = `${CONFIG_FILE}: 'cfg.target'`;
  const raw = asRecord(value, label);
  assertKnownKeys(raw, TARGET_AXES, label);
  const target: { [axis in TargetAxis]?: string } = {};
  for (const axis of TARGET_AXES) {
    const selected = raw[axis];
    if (selected !== undefined) target[axis] = asString(selected, `${CONFIG_FILE}: 'cfg.target.${axis}'`);
  }
  return target;
}

function parsePredefinedFeatures(value: unknown): PredefinedFeatures {
  const label = `${CONFIG_FILE}: 'cfg.predefinedFeatures'`;
  const raw = asRecord(value, label);
  assertKnownKeys(raw, ["constant", "features"], label);
  return {
    constant: asString(raw.constant, `${CONFIG_FILE}: 'cfg.predefinedFeatures.constant'`),
    features: asStringArray(raw.features, `${CONFIG_FILE}: 'cfg.predefinedFeatures.features'`),
  };
}

function parseCfg(value: unknown): CfgConfig {
  const label = `${CONFIG_FILE}: 'cfg'`;
  const raw = asRecord(value, label);
  assertKnownKeys(raw, ["enable", "disable", "rename", "disableUnknownFeatures", "target", "predefinedFeatures"], label);

  const predefinedFeatures = optional(raw.predefinedFeatures, parsePredefinedFeatures);
  if (predefinedFeatures && (raw.enable !== undefined || raw.disable !== undefined || raw.rename !== undefined)) {
    throw new Error(`${label}: 'predefinedFeatures' cannot be combined with 'enable', 'disable' or 'rename'.`);
  }

  const enable = optional(raw.enable, (v) => asStringArray(v, `${CONFIG_FILE}: 'cfg.enable'`)) ?? [];
  const disable = optional(raw.disable, (v) => asStringArray(v, `${CONFIG_FILE}: 'cfg.disable'`)) ?? [];
  const both = enable.filter((feature) => disable.includes(feature));
  if (both.length > 0) {
    throw new Error(`${label}: feature '${both[0]}' is both enabled and disabled.`);
  }

  return {
    enable,
    disable,
    rename: optional(raw.rename, (v) => asStringMap(v, `${CONFIG_FILE}: 'cfg.rename'`)) ?? {},
    disableUnknownFeatures:
      optional(raw.disableUnknownFeatures, (v) => asBoolean(v, `${CONFIG_FILE}: 'cfg.disableUnknownFeatures'`)) ?? false,
    target: optional(raw.target, parseTarget) ?? {},
    ...(predefinedFeatures ? { predefinedFeatures } : {}),
  };
}

function parseFfi(value: unknown): FfiOptionsConfig {
  const label = `${CONFIG_FILE}: 'ffi'`;
  const raw = asRecord(value, label);
  assertKnownKeys(raw, ["allowedPrefixes", "transparentWrappers", "prefixedExportedTypes"], label);
  return {
    allowedPrefixes: optional(raw.allowedPrefixes, (v) => asStringArray(v, `${CONFIG_FILE}: 'ffi.allowedPrefixes'`)) ?? [],
    transparentWrappers: optional(raw.transparentWrappers, (v) => asStringArray(v, `${CONFIG_FILE}: 'ffi.transparentWrappers'`)) ?? [],
    prefixedExportedTypes:
      optional(raw.prefixedExportedTypes, (v) => asStringArray(v, `${CONFIG_FILE}: 'ffi.prefixedExportedTypes'`)) ?? [],
  };
}

export function parseGeneratorConfig(value: unknown): GeneratorConfig {
  const root = asRecord(value, CONFIG_FILE);
  assertKnownKeys(
    root,
    ["schema", "crate", "edition", "groups", "cfg", "ffi", "stripDerives", "stripMacros", "replacePaths"],
    CONFIG_FILE
  );

  if (root.schema !== 1) {
    throw new Error(`Unsupported ${CONFIG_FILE} schema.`);
  }

  const edition = root.edition;
  if (edition !== "2021" && edition !== "2024") {
    throw new Error(`${CONFIG_FILE}: 'edition' must be '2021' or '2024'.`);
  }

  return {
    schema: 1,
    crate: optional(root.crate, (v) => asString(v, `${CONFIG_FILE}: 'crate'`)),
    edition,
    groups: optional(root.groups, (v) => asStringArray(v, `${CONFIG_FILE}: 'groups'`)),
    cfg: optional(root.cfg, parseCfg) ?? {},
    ffi: optional(root.ffi, parseFfi) ?? DEFAULT_GENERATOR_CONFIG.ffi,
    stripDerives: optional(root.stripDerives, (v) => asStringArray(v, `${CONFIG_FILE}: 'stripDerives'`)) ?? [],
    stripMacros: optional(root.stripMacros, (v) => asStringArray(v, `${CONFIG_FILE}: 'stripMacros'`)) ?? [],
    replacePaths: optional(root.replacePaths, (v) => asStringMap(v, `${CONFIG_FILE}: 'replacePaths'`)) ?? {},
  };
}

function readJson(path: string): unknown {
  const raw = readFileSync(path, "utf-8");
  try {
    return JSON.parse(raw) as unknown;
  } catch (err: unknown) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new Error(`${path}: invalid JSON (${reason}).`);
  }
}

/** Nearest directory at or above `fromDir` holding an `ffistub.json`. */
export function findConfigRoot(fromDir: string): string | undefined {
  let cur = resolve(fromDir);
  while (true) {
    if (existsSync(join(cur, CONFIG_FILE))) return cur;
    const parent = dirname(cur);
    if (parent === cur) return undefined;
    cur = parent;
  }
}

export function loadGeneratorConfig(path: string): GeneratorConfig {
  return parseGeneratorConfig(readJson(path));
}
