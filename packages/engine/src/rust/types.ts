import type { RustField, RustFields, RustGenericArg, RustItem, RustPath, RustType } from "./ir.js";

function mapArg(arg: RustGenericArg, f: (t: RustType) => RustType): RustGenericArg {
  switch (arg.kind) {
    case "type":
      return { kind: "type", type: f(arg.type) };
    case "binding":
      return { kind: "binding", name: arg.name, type: f(arg.type) };
    case "lifetime":
    case "const":
      return arg;
  }
}

export function mapPathArgs(path: RustPath, f: (t: RustType) => RustType): RustPath {
  return {
    global: path.global,
    segments: path.segments.map((seg) => ({ name: seg.name, args: seg.args.map((a) => mapArg(a, f)) })),
  };
}

/** Applies `f` to the direct children of `ty`, generic arguments included. */
export function mapTypeChildren(ty: RustType, f: (t: RustType) => RustType): RustType {
  switch (ty.kind) {
    case "path":
      return { kind: "path", path: mapPathArgs(ty.path, f) };
    case "ref":
      return { ...ty, inner: f(ty.inner) };
    case "ptr":
    case "array":
    case "slice":
      return { ...ty, inner: f(ty.inner) };
    case "tuple":
      return { kind: "tuple", elems: ty.elems.map(f) };
    case "fn":
      return { ...ty, params: ty.params.map(f), ret: ty.ret ? f(ty.ret) : undefined };
    case "never":
    case "infer":
    case "opaque":
      return ty;
  }
}

/** Bottom-up rewrite: children first, then `f` on the rebuilt node. */
export function transformType(ty: RustType, f: (t: RustType) => RustType): RustType {
  return f(mapTypeChildren(ty, (child) => transformType(child, f)));
}

/** Replaces every written lifetime with `'static`. */
export function staticizeLifetimes(ty: RustType): RustType {
  return transformType(ty, (t) => {
    if (t.kind === "ref" && t.lifetime !== undefined) return { ...t, lifetime: "static" };
    if (t.kind !== "path") return t;
    return {
      kind: "path",
      path: {
        global: t.path.global,
        segments: t.path.segments.map((seg) => ({
          name: seg.name,
          args: seg.args.map((a): RustGenericArg => (a.kind === "lifetime" ? { kind: "lifetime", name: "static" } : a)),
        })),
      },
    };
  });
}

/** Compares segment names only; generic arguments are ignored. */
export function pathNamesEqual(a: RustPath, b: RustPath): boolean {
  if (a.global !== b.global || a.segments.length !== b.segments.length) return false;
  return a.segments.every((seg, i) => seg.name === b.segments[i]?.name);
}

export function pathHasPrefix(path: RustPath, prefix: RustPath): boolean {
  if (prefix.segments.length > path.segments.length) return false;
  return prefix.segments.every((seg, i) => seg.name === path.segments[i]?.name);
}

export function firstTypeArg(path: RustPath): RustType | undefined {
  const last = path.segments[path.segments.length - 1];
  for (const arg of last?.args ?? []) {
    if (arg.kind === "type") return arg.type;
  }
  return undefined;
}

export function hasGenericArgs(path: RustPath): boolean {
  return path.segments.some((s) => s.args.length > 0);
}

function mapFieldTypes(fields: readonly RustField[], f: (t: RustType) => RustType): RustField[] {
  return fields.map((field) => ({ ...field, type: f(field.type) }));
}

function mapFieldSetTypes(fields: RustFields, f: (t: RustType) => RustType): RustFields {
  return fields.kind === "unit" ? fields : { ...fields, fields: mapFieldTypes(fields.fields, f) };
}

/** Applies `f` to every top-level type written in a declaration. */
export function mapItemTypes(item: RustItem, f: (t: RustType) => RustType): RustItem {
  switch (item.kind) {
    case "struct":
      return { ...item, fields: mapFieldSetTypes(item.fields, f) };
    case "union":
      return { ...item, fields: mapFieldTypes(item.fields, f) };
    case "enum":
      return { ...item, variants: item.variants.map((v) => ({ ...v, fields: mapFieldSetTypes(v.fields, f) })) };
    case "type_alias":
    case "const":
      return { ...item, type: f(item.type) };
    case "fn":
      return {
        ...item,
        params: item.params.map((p) => (p.kind === "typed" ? { ...p, type: f(p.type) } : p)),
        ret: item.ret ? f(item.ret) : undefined,
      };
  }
}
