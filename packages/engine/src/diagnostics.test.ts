import { expect } from "chai";
import { readFileSync, readdirSync, statSync } from "node:fs";
import { dirname, join, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import ts from "typescript";

import {
  assertEngineDiagnosticCode,
  ENGINE_DIAGNOSTIC_CODES,
  engineDiagnosticDomain,
  FfiError,
} from "./diagnostics.js";

describe("@ffistub/engine diagnostics registry", () => {
  function repoRoot(): string {
    const here = fileURLToPath(import.meta.url);
    return resolve(dirname(here), "../../..");
  }

  function registryFile(): string {
    return join(repoRoot(), "packages", "engine", "src", "diagnostics.ts");
  }

  function engineSourceFiles(): readonly string[] {
    const root = join(repoRoot(), "packages", "engine", "src");
    const out: string[] = [];
    const walk = (dir: string): void => {
      for (const entry of readdirSync(dir)) {
        const abs = join(dir, entry);
        const st = statSync(abs);
        if (st.isDirectory()) {
          walk(abs);
          continue;
        }
        if (!abs.endsWith(".ts")) continue;
        if (abs.endsWith(".test.ts")) continue;
        out.push(abs);
      }
    };
    walk(root);
    return out.sort((a, b) => a.localeCompare(b));
  }

  // Codes raised somewhere other than the registry itself.
  function extractUsedCodes(): readonly string[] {
    const matches = new Set<string>();
    for (const file of engineSourceFiles()) {
      if (file === registryFile()) continue;
      const source = readFileSync(file, "utf-8");
      for (const code of source.match(/\bFFI\d{4}\b/g) ?? []) {
        matches.add(code);
      }
    }
    return [...matches].sort((a, b) => a.localeCompare(b));
  }

  it("keeps engine diagnostic codes normalized and unique", () => {
    const values = [...ENGINE_DIAGNOSTIC_CODES];
    const unique = new Set(values);
    expect(unique.size).to.equal(values.length);
    for (const code of values) {
      expect(code).to.match(/^FFI\d{4}$/);
    }
  });

  it("keeps engine diagnostic usage synchronized with the registry", () => {
    const fromRegistry = [...ENGINE_DIAGNOSTIC_CODES].sort((a, b) => a.localeCompare(b));
    expect(extractUsedCodes()).to.deep.equal(fromRegistry);
  });

  it("rejects unknown diagnostic codes", () => {
    expect(() => assertEngineDiagnosticCode("FFI9999")).to.throw("Unknown engine diagnostic code");
  });

  it("maps each registered diagnostic code into a known domain", () => {
    for (const code of ENGINE_DIAGNOSTIC_CODES) {
      expect(engineDiagnosticDomain(code)).to.not.equal("other");
    }
    expect(engineDiagnosticDomain("FFI1001")).to.equal("config");
    expect(engineDiagnosticDomain("FFI2003")).to.equal("shape");
    expect(engineDiagnosticDomain("FFI3001")).to.equal("parse");
    expect(engineDiagnosticDomain("FFI4001")).to.equal("other");
  });

  it("appends the declaration location to the message", () => {
    const err = new FfiError("FFI2001", "unsupported type shape '[u8]'", { file: "src/io.rs", line: 4, column: 9 });
    expect(err.message).to.equal("unsupported type shape '[u8]' (at src/io.rs:4:9)");
    expect(err.name).to.equal("FfiError");
    expect(new FfiError("FFI1002", "invalid crate name '1x'").message).to.equal("invalid crate name '1x'");
  });

  it("keeps user-facing engine paths free of raw Error throws", () => {
    const offenders: string[] = [];
    for (const file of engineSourceFiles()) {
      const src = readFileSync(file, "utf-8");
      if (!src.includes("throw new Error(")) continue;
      if (file === registryFile()) continue;
      offenders.push(file);
    }
    expect(offenders).to.deep.equal([]);
  });

  it("keeps direct fail(...) calls location-annotated", () => {
    const offenders: string[] = [];
    for (const file of engineSourceFiles()) {
      const src = readFileSync(file, "utf-8");
      const sf = ts.createSourceFile(file, src, ts.ScriptTarget.Latest, true, ts.ScriptKind.TS);

      const walk = (node: ts.Node): void => {
        if (ts.isCallExpression(node) && ts.isIdentifier(node.expression) && node.expression.text === "fail") {
          if (node.arguments.length < 3) {
            const { line, character } = sf.getLineAndCharacterOfPosition(node.getStart(sf));
            offenders.push(`${file}:${line + 1}:${character + 1}`);
          }
        }
        ts.forEachChild(node, walk);
      };
      walk(sf);
    }
    expect(offenders).to.deep.equal([]);
  });
});
