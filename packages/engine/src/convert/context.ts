import defaultAllowedPrefixes from "../data/allowed-prefixes.json" with { type: "json" };

import { FfiError, fail } from "../diagnostics.js";
import type { RustPath } from "../rust/ir.js";
import { parseRustPath } from "../rust/parse.js";
import { ExportedTypeIndex, PrimitiveTable } from "./exported-types.js";
import { EquivalencePairs } from "./pairs.js";

export type RustEdition = "2021" | "2024";

export const DEFAULT_ALLOWED_PREFIXES: readonly string[] = Object.freeze([...defaultAllowedPrefixes]);

export type ConverterOptions = {
  /** Package name of the source crate; `-` becomes `_` in paths. */
  readonly crateName: string;
  readonly edition?: RustEdition;
  /** Replaces {@link DEFAULT_ALLOWED_PREFIXES} when given. */
  readonly allowedPrefixes?: readonly string[];
  /** Single-field wrappers such as `std::mem::ManuallyDrop`, stripped to their type argument. */
  readonly transparentWrappers?: readonly string[];
  /** Exported types referred to by a module path, e.g. `ffi::Handle`. */
  readonly prefixedExportedTypes?: readonly string[];
};

export type ConversionContext = {
  readonly crateIdent: string;
  readonly exportedTypes: ExportedTypeIndex;
  readonly primitives: PrimitiveTable;
  readonly allowedPrefixes: readonly RustPath[];
  readonly transparentWrappers: readonly RustPath[];
  readonly prefixedExportedTypes: readonly RustPath[];
  readonly pairs: EquivalencePairs;
};

export function crateIdent(crateName: string): string {
  const ident = crateName.replaceAll("-", "_");
  if (!/^[A-Za-z_][A-Za-z0-9_]*$/.test(ident)) {
    return fail("FFI1002", `invalid crate name '${crateName}'`, undefined);
  }
  return ident;
}

export function configuredPath(text: string, option: string): RustPath {
  try {
    return parseRustPath(text);
  } catch (err: unknown) {
    if (err instanceof FfiError) {
      return fail("FFI1002", `invalid path '${text}' in ${option}: ${err.message}`, undefined);
    }
    throw err;
  }
}

export function createConversionContext(options: ConverterOptions): ConversionContext {
  const paths = (texts: readonly string[] | undefined, option: string): readonly RustPath[] =>
    Object.freeze((texts ?? []).map((t) => configuredPath(t, option)));
  return {
    crateIdent: crateIdent(options.crateName),
    exportedTypes: new ExportedTypeIndex(),
    primitives: new PrimitiveTable(),
    allowedPrefixes: paths(options.allowedPrefixes ?? DEFAULT_ALLOWED_PREFIXES, "allowed prefixes"),
    transparentWrappers: paths(options.transparentWrappers, "transparent wrappers"),
    prefixedExportedTypes: paths(options.prefixedExportedTypes, "prefixed exported types"),
    pairs: new EquivalencePairs(),
  };
}
