#!/usr/bin/env -S node --import tsx
import { argv, cwd, exit } from "node:process";
import { pathToFileURL } from "node:url";

import { FfiError } from "@ffistub/engine";

import { GENERATE_USAGE, runGenerate } from "./internal/commands/generate.js";

export type Cmd = "generate" | "help";

function usage(): void {
  console.log(
    [
      "ffistub",
      "",
      "Usage:",
      `  ${GENERATE_USAGE.replace(/^Usage: /, "")}`,
      "",
      "Reads <group>_*.jsonl declaration records and crate_name.txt from --input and",
      "writes an extern \"C\" stub crate source to --out. Settings come from --config,",
      "or the nearest ffistub.json above the current directory.",
      "",
    ].join("\n")
  );
}

export function parseCommand(args: readonly string[]): Cmd {
  const [cmd] = args;
  if (cmd === "generate") return cmd;
  return "help";
}

/** One line per failure; engine errors carry their code and declaration location. */
export function formatFailure(err: unknown): string {
  if (err instanceof FfiError) return `${err.code}: ${err.message}`;
  if (err instanceof Error) return err.message;
  return String(err);
}

async function main(): Promise<void> {
  try {
    const cmd = parseCommand(argv.slice(2));
    switch (cmd) {
      case "generate":
        await runGenerate({ dir: cwd(), argv: argv.slice(3) });
        return;
      default:
        usage();
        exit(1);
    }
  } catch (err: unknown) {
    console.error(formatFailure(err));
    exit(1);
  }
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  void main();
}
