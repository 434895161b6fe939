import type { Predicate } from "../cfg/predicate.js";
import type { SourceLocation } from "../diagnostics.js";

export type RustGenericArg =
  | { readonly kind: "type"; readonly type: RustType }
  | { readonly kind: "lifetime"; readonly name: string }
  | { readonly kind: "const"; readonly text: string }
  | { readonly kind: "binding"; readonly name: string; readonly type: RustType };

export type RustPathSegment = {
  readonly name: string;
  readonly args: readonly RustGenericArg[];
};

export type RustPath = {
  /** Leading `::`. */
  readonly global: boolean;
  readonly segments: readonly RustPathSegment[];
};

export type RustType =
  | { readonly kind: "path"; readonly path: RustPath }
  | { readonly kind: "ref"; readonly mut: boolean; readonly lifetime?: string; readonly inner: RustType }
  | { readonly kind: "ptr"; readonly mut: boolean; readonly inner: RustType }
  | { readonly kind: "array"; readonly inner: RustType; readonly len: string }
  | { readonly kind: "slice"; readonly inner: RustType }
  | { readonly kind: "tuple"; readonly elems: readonly RustType[] }
  | {
      readonly kind: "fn";
      readonly unsafe: boolean;
      readonly abi?: string;
      readonly params: readonly RustType[];
      readonly ret?: RustType;
    }
  | { readonly kind: "never" }
  | { readonly kind: "infer" }
  // `dyn Trait`, `impl Trait`, qualified paths and macro invocations, kept as written.
  | { readonly kind: "opaque"; readonly text: string };

export type RustAttribute =
  | { readonly kind: "cfg"; readonly predicate: Predicate }
  // Everything between `#[` and `]`, e.g. `repr(C)` or `doc = " text"`.
  | { readonly kind: "other"; readonly text: string };

export type RustVisibility = "private" | "pub" | "pub(crate)" | "pub(super)" | "pub(self)";

export type RustField = {
  readonly attrs: readonly RustAttribute[];
  readonly vis: RustVisibility;
  /** Absent for tuple fields. */
  readonly name?: string;
  readonly type: RustType;
};

export type RustFields =
  | { readonly kind: "named"; readonly fields: readonly RustField[] }
  | { readonly kind: "tuple"; readonly fields: readonly RustField[] }
  | { readonly kind: "unit" };

export type RustVariant = {
  readonly attrs: readonly RustAttribute[];
  readonly name: string;
  readonly fields: RustFields;
  readonly discriminant?: string;
};

export type RustPattern =
  | { readonly kind: "ident"; readonly name: string; readonly mut: boolean }
  | { readonly kind: "wild" }
  | { readonly kind: "other"; readonly text: string };

export type RustParam =
  | { readonly kind: "receiver"; readonly text: string }
  | { readonly kind: "typed"; readonly pattern: RustPattern; readonly type: RustType };

export type RustExpr =
  | { readonly kind: "ident"; readonly name: string }
  | { readonly kind: "path_call"; readonly path: RustPath; readonly args: readonly RustExpr[] }
  | { readonly kind: "macro_call"; readonly name: string; readonly args: readonly RustExpr[] }
  | { readonly kind: "borrow"; readonly mut: boolean; readonly expr: RustExpr }
  | { readonly kind: "deref"; readonly expr: RustExpr }
  | { readonly kind: "unsafe"; readonly expr: RustExpr }
  | { readonly kind: "block"; readonly stmts: readonly RustExpr[] }
  | { readonly kind: "binary"; readonly op: string; readonly left: RustExpr; readonly right: RustExpr }
  | { readonly kind: "string"; readonly value: string }
  | { readonly kind: "verbatim"; readonly text: string };

export type RustStmt = {
  readonly kind: "let";
  readonly name: string;
  readonly init: RustExpr;
};

export type RustBlock = {
  readonly stmts: readonly RustStmt[];
  readonly tail?: RustExpr;
};

type ItemBase = {
  readonly attrs: readonly RustAttribute[];
  readonly vis: RustVisibility;
  readonly name: string;
};

export type RustStructItem = ItemBase & {
  readonly kind: "struct";
  /** `<...>` including the brackets, as written. */
  readonly generics?: string;
  readonly whereClause?: string;
  readonly fields: RustFields;
};

export type RustEnumItem = ItemBase & {
  readonly kind: "enum";
  readonly generics?: string;
  readonly whereClause?: string;
  readonly variants: readonly RustVariant[];
};

export type RustUnionItem = ItemBase & {
  readonly kind: "union";
  readonly generics?: string;
  readonly whereClause?: string;
  readonly fields: readonly RustField[];
};

export type RustTypeAliasItem = ItemBase & {
  readonly kind: "type_alias";
  readonly generics?: string;
  readonly type: RustType;
};

export type RustConstItem = ItemBase & {
  readonly kind: "const";
  readonly type: RustType;
  readonly value: RustExpr;
};

export type RustFnItem = ItemBase & {
  readonly kind: "fn";
  readonly generics?: string;
  readonly whereClause?: string;
  readonly const: boolean;
  readonly unsafe: boolean;
  readonly abi?: string;
  readonly params: readonly RustParam[];
  readonly ret?: RustType;
  /** Absent for declarations read from records; bodies are never kept. */
  readonly body?: RustBlock;
};

export type RustItem =
  | RustStructItem
  | RustEnumItem
  | RustUnionItem
  | RustTypeAliasItem
  | RustConstItem
  | RustFnItem;

/** A declaration together with where it was captured; the unit of every stream. */
export type SourcedItem = readonly [item: RustItem, location: SourceLocation];

export type RustTypeItem = RustStructItem | RustEnumItem | RustUnionItem | RustTypeAliasItem;

export function isTypeItem(item: RustItem): item is RustTypeItem {
  return item.kind === "struct" || item.kind === "enum" || item.kind === "union" || item.kind === "type_alias";
}

export function pathOf(names: readonly string[], global = false): RustPath {
  return { global, segments: names.map((name) => ({ name, args: [] })) };
}

export function pathType(names: readonly string[], args: readonly RustType[] = []): RustType {
  const path = pathOf(names);
  const last = path.segments[path.segments.length - 1];
  if (!last || args.length === 0) return { kind: "path", path };
  return {
    kind: "path",
    path: {
      global: false,
      segments: [
        ...path.segments.slice(0, -1),
        { name: last.name, args: args.map((type): RustGenericArg => ({ kind: "type", type })) },
      ],
    },
  };
}

export function unitType(): RustType {
  return { kind: "tuple", elems: [] };
}

export function identExpr(name: string): RustExpr {
  return { kind: "ident", name };
}

export function cfgAttribute(predicate: Predicate): RustAttribute {
  return { kind: "cfg", predicate };
}

export function otherAttribute(text: string): RustAttribute {
  return { kind: "other", text };
}
