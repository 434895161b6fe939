import { unitType } from "../rust/ir.js";
import type { RustExpr, RustItem, RustType, SourcedItem } from "../rust/ir.js";
import type { EquivalencePair } from "./pairs.js";

export const SIZE_MISMATCH_MESSAGE = "Size mismatch between stub parameter type and source crate type";
export const ALIGN_MISMATCH_MESSAGE = "Alignment mismatch between stub parameter type and source crate type";

function memQuery(fnName: "size_of" | "align_of", ty: RustType): RustExpr {
  return {
    kind: "path_call",
    path: {
      global: false,
      segments: [
        { name: "std", args: [] },
        { name: "mem", args: [] },
        { name: fnName, args: [{ kind: "type", type: ty }] },
      ],
    },
    args: [],
  };
}

function staticAssertion(fnName: "size_of" | "align_of", pair: EquivalencePair, message: string): RustItem {
  return {
    kind: "const",
    attrs: [],
    vis: "private",
    name: "_",
    type: unitType(),
    value: {
      kind: "macro_call",
      name: "assert",
      args: [
        { kind: "binary", op: "==", left: memQuery(fnName, pair.local), right: memQuery(fnName, pair.origin) },
        { kind: "string", value: message },
      ],
    },
  };
}

/** Two `const _: () = assert!(...)` items per pair; bare function pairs are skipped. */
export function emitAssertions(pairs: readonly EquivalencePair[]): SourcedItem[] {
  const out: SourcedItem[] = [];
  for (const pair of pairs) {
    if (pair.bareFunction) continue;
    out.push([staticAssertion("size_of", pair, SIZE_MISMATCH_MESSAGE), pair.location]);
    out.push([staticAssertion("align_of", pair, ALIGN_MISMATCH_MESSAGE), pair.location]);
  }
  return out;
}
