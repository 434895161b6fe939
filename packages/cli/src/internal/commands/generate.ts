import { mkdirSync, writeFileSync } from "node:fs";
import { dirname, join, resolve } from "node:path";

import {
  CfgFilter,
  DEFAULT_ALLOWED_PREFIXES,
  batching,
  cfgRules,
  convertItems,
  mapItems,
  pathReplacements,
  replacePaths,
  stripDerives,
  stripMacros,
  writeRustFile,
} from "@ffistub/engine";
import type { SourcedItem } from "@ffistub/engine";

import { CONFIG_FILE, DEFAULT_GENERATOR_CONFIG, findConfigRoot, loadGeneratorConfig } from "../config.js";
import type { GeneratorConfig } from "../config.js";
import { loadRecordItems, readCrateName } from "../records.js";

export type GenerateArgs = {
  readonly dir: string;
  readonly argv: readonly string[];
};

export type GenerateParsed = {
  readonly inputDir: string;
  readonly outFile: string;
  readonly configPath?: string;
};

export const GENERATE_USAGE = "Usage: ffistub generate --input <dir> --out <file.rs> [--config <ffistub.json>]";

export function parseGenerateArgs(args: GenerateArgs): GenerateParsed {
  let inputDir: string | undefined;
  let outFile: string | undefined;
  let configPath: string | undefined;

  const it = args.argv[Symbol.iterator]();
  while (true) {
    const next = it.next();
    if (next.done) break;
    const a = next.value;
    switch (a) {
      case "--input": {
        const v = it.next();
        if (v.done) throw new Error("generate: --input requires a value");
        inputDir = resolve(args.dir, v.value);
        break;
      }
      case "--out": {
        const v = it.next();
        if (v.done) throw new Error("generate: --out requires a value");
        outFile = resolve(args.dir, v.value);
        break;
      }
      case "--config": {
        const v = it.next();
        if (v.done) throw new Error("generate: --config requires a value");
        configPath = resolve(args.dir, v.value);
        break;
      }
      case "--help":
      case "-h":
        throw new Error(GENERATE_USAGE);
      default:
        throw new Error(`generate: unknown arg: ${a}`);
    }
  }

  if (!inputDir) {
    throw new Error("generate: missing required --input <dir>");
  }
  if (!outFile) {
    throw new Error("generate: missing required --out <file.rs>");
  }

  return { inputDir, outFile, configPath };
}

/** An explicit `--config`, else the nearest `ffistub.json` above the invocation directory, else defaults. */
export function resolveGeneratorConfig(dir: string, configPath: string | undefined): GeneratorConfig {
  if (configPath) return loadGeneratorConfig(configPath);
  const root = findConfigRoot(dir);
  return root ? loadGeneratorConfig(join(root, CONFIG_FILE)) : DEFAULT_GENERATOR_CONFIG;
}

export type GeneratedBindings = {
  readonly crateName: string;
  readonly items: readonly SourcedItem[];
  readonly text: string;
};

/** Runs records through the item stages and the converter and renders one Rust file. */
export function generateBindings(inputDir: string, config: GeneratorConfig): GeneratedBindings {
  const crateName = config.crate ?? readCrateName(inputDir);
  const replacements = pathReplacements(config.replacePaths);

  const cfgFilter = new CfgFilter(cfgRules(config.cfg), { predefinedFeatures: config.cfg.predefinedFeatures });
  const filtered = batching(loadRecordItems(inputDir, config.groups), cfgFilter);
  const prepared = mapItems(filtered, ([item, location]): SourcedItem => {
    const stripped = stripMacros(stripDerives(item, config.stripDerives), config.stripMacros);
    return [replacePaths(stripped, replacements), location];
  });
  const items = [
    ...convertItems(prepared, {
      crateName,
      edition: config.edition,
      allowedPrefixes: [...DEFAULT_ALLOWED_PREFIXES, ...config.ffi.allowedPrefixes],
      transparentWrappers: config.ffi.transparentWrappers,
      prefixedExportedTypes: config.ffi.prefixedExportedTypes,
    }),
  ];

  const header = [`// Generated by ffistub from the declarations of crate '${crateName}'. Do not edit.`];
  return { crateName, items, text: writeRustFile(items.map(([item]) => item), { header }) };
}

export async function runGenerate(args: GenerateArgs): Promise<void> {
  const parsed = parseGenerateArgs(args);
  const config = resolveGeneratorConfig(args.dir, parsed.configPath);
  const generated = generateBindings(parsed.inputDir, config);

  mkdirSync(dirname(parsed.outFile), { recursive: true });
  writeFileSync(parsed.outFile, generated.text, "utf-8");
  console.log(`ffistub: wrote ${generated.items.length} items for crate '${generated.crateName}' to ${parsed.outFile}`);
}
