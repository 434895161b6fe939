import { fail } from "../diagnostics.js";
import type { SourceLocation } from "../diagnostics.js";
import type { RustField, RustFields, RustItem, RustPath, RustType } from "../rust/ir.js";
import {
  firstTypeArg,
  hasGenericArgs,
  pathHasPrefix,
  pathNamesEqual,
  staticizeLifetimes,
  transformType,
} from "../rust/types.js";
import { emitPath, emitType } from "../rust/write.js";
import type { ConversionContext } from "./context.js";

export type RewriteResult = {
  /** The FFI-stable form used in the generated crate. */
  readonly type: RustType;
  /** Local and origin forms differ, so values must be bit-reinterpreted. */
  readonly changed: boolean;
  /** A transparent wrapper or a module prefix was removed. */
  readonly stripped: boolean;
};

type Layer = Extract<RustType, { readonly kind: "ref" | "ptr" | "array" }>;
type BareFnType = Extract<RustType, { readonly kind: "fn" }>;

function isLayer(ty: RustType): ty is Layer {
  return ty.kind === "ref" || ty.kind === "ptr" || ty.kind === "array";
}

function matchesAny(path: RustPath, candidates: readonly RustPath[]): boolean {
  return candidates.some((c) => pathNamesEqual(path, c));
}

function stripWrappers(ty: RustType, ctx: ConversionContext): { readonly type: RustType; readonly stripped: boolean } {
  switch (ty.kind) {
    case "path": {
      if (matchesAny(ty.path, ctx.transparentWrappers)) {
        const inner = firstTypeArg(ty.path);
        if (inner) return { type: stripWrappers(inner, ctx).type, stripped: true };
      }
      const last = ty.path.segments[ty.path.segments.length - 1];
      if (last && ty.path.segments.length > 1 && matchesAny(ty.path, ctx.prefixedExportedTypes)) {
        return { type: { kind: "path", path: { global: false, segments: [last] } }, stripped: true };
      }
      return { type: ty, stripped: false };
    }
    case "ref":
    case "ptr":
    case "array": {
      const inner = stripWrappers(ty.inner, ctx);
      return { type: { ...ty, inner: inner.type }, stripped: inner.stripped };
    }
    default:
      return { type: ty, stripped: false };
  }
}

function validatePath(path: RustPath, ctx: ConversionContext, site: string, location: SourceLocation): void {
  const [only] = path.segments;
  const allowed =
    path.global ||
    ctx.allowedPrefixes.some((prefix) => pathHasPrefix(path, prefix)) ||
    (path.segments.length === 1 && only !== undefined && ctx.exportedTypes.has(only.name)) ||
    matchesAny(path, ctx.prefixedExportedTypes);
  if (!allowed) {
    fail(
      "FFI2003",
      `type '${emitPath(path)}' in ${site} is not valid for FFI: it is neither absolute, under an allowed prefix, nor an exported type`,
      location
    );
  }
  for (const seg of path.segments) {
    for (const arg of seg.args) {
      if (arg.kind === "type" || arg.kind === "binding") {
        validateType(arg.type, ctx, `generic argument of '${emitPath(path)}' in ${site}`, location);
      }
    }
  }
}

function validateBareFn(ty: BareFnType, site: string, location: SourceLocation): void {
  if (ty.abi !== "C") {
    fail("FFI2002", `function type '${emitType(ty)}' in ${site} must use extern "C"`, location);
  }
}

function validateType(ty: RustType, ctx: ConversionContext, site: string, location: SourceLocation): void {
  switch (ty.kind) {
    case "ref":
    case "ptr":
    case "array":
      validateType(ty.inner, ctx, site, location);
      return;
    case "path":
      validatePath(ty.path, ctx, site, location);
      return;
    case "fn":
      validateBareFn(ty, site, location);
      ty.params.forEach((p, i) => validateType(p, ctx, `parameter ${i} of function type in ${site}`, location));
      if (ty.ret) validateType(ty.ret, ctx, `return type of function type in ${site}`, location);
      return;
    case "tuple":
      if (ty.elems.length === 0) return;
      break;
    case "never":
      return;
    case "slice":
    case "infer":
    case "opaque":
      break;
  }
  fail("FFI2001", `unsupported type shape '${emitType(ty)}' in ${site}`, location);
}

function lowerFn(
  ty: BareFnType,
  ctx: ConversionContext,
  site: string,
  location: SourceLocation
): RustType {
  validateBareFn(ty, site, location);
  const params = ty.params.map((p, i) => toLocal(p, ctx, `parameter ${i} of function type in ${site}`, location));
  const ret = ty.ret ? toLocal(ty.ret, ctx, `return type of function type in ${site}`, location) : undefined;
  return { ...ty, params, ret };
}

// References become raw pointers of the same mutability; arrays and pointers stay.
function lower(ty: RustType, ctx: ConversionContext, site: string, location: SourceLocation): RustType {
  if (ty.kind === "fn") return lowerFn(ty, ctx, site, location);
  const layers: Layer[] = [];
  let core: RustType = ty;
  while (isLayer(core)) {
    layers.push(core);
    core = core.inner;
  }
  let out: RustType;
  if (core.kind === "fn") {
    out = lowerFn(core, ctx, site, location);
  } else {
    validateType(core, ctx, site, location);
    out = core;
  }
  for (const layer of [...layers].reverse()) {
    out = layer.kind === "array" ? { kind: "array", inner: out, len: layer.len } : { kind: "ptr", mut: layer.mut, inner: out };
  }
  return out;
}

function toLocal(ty: RustType, ctx: ConversionContext, site: string, location: SourceLocation): RustType {
  return lower(stripWrappers(ty, ctx).type, ctx, site, location);
}

/** Qualifies exported names with the crate, the way the source crate spells them. */
export function qualifyOrigin(ty: RustType, ctx: ConversionContext): RustType {
  const crate = { name: ctx.crateIdent, args: [] };
  return transformType(ty, (t) => {
    if (t.kind !== "path" || t.path.global) return t;
    const [only] = t.path.segments;
    const exported = t.path.segments.length === 1 && only !== undefined && ctx.exportedTypes.has(only.name);
    if (exported || matchesAny(t.path, ctx.prefixedExportedTypes)) {
      return { kind: "path", path: { global: false, segments: [crate, ...t.path.segments] } };
    }
    return t;
  });
}

function stripMatchingLayers(local: RustType, origin: RustType): readonly [RustType, RustType] {
  let l = local;
  let o = origin;
  for (;;) {
    if ((l.kind === "ptr" || l.kind === "ref") && (o.kind === "ptr" || o.kind === "ref")) {
      l = l.inner;
      o = o.inner;
    } else if (l.kind === "array" && o.kind === "array" && l.len === o.len) {
      l = l.inner;
      o = o.inner;
    } else {
      return [l, o];
    }
  }
}

export function typesEquivalent(a: RustType, b: RustType, ctx: ConversionContext): boolean {
  if (emitType(a) === emitType(b)) return true;
  if (a.kind === "path" && b.kind === "path") {
    if (hasGenericArgs(a.path) || hasGenericArgs(b.path)) return false;
    const pa = ctx.primitives.resolve(emitPath(a.path));
    return pa !== undefined && pa === ctx.primitives.resolve(emitPath(b.path));
  }
  if (a.kind === "array" && b.kind === "array") return a.len === b.len && typesEquivalent(a.inner, b.inner, ctx);
  if ((a.kind === "ref" && b.kind === "ref") || (a.kind === "ptr" && b.kind === "ptr")) {
    return a.mut === b.mut && typesEquivalent(a.inner, b.inner, ctx);
  }
  if (a.kind === "slice" && b.kind === "slice") return typesEquivalent(a.inner, b.inner, ctx);
  return false;
}

/**
 * Rewrites one type into its FFI-stable form. When the result cannot be used
 * where the source type is expected without a bit-reinterpretation, the
 * (local, origin) pair is queued on `ctx.pairs`.
 *
 * `site` names the position for error messages, e.g. "parameter 0 of function 'open'".
 */
export function rewriteType(ty: RustType, ctx: ConversionContext, site: string, location: SourceLocation): RewriteResult {
  const originSource = staticizeLifetimes(ty);
  const { type: stripped, stripped: wasStripped } = stripWrappers(ty, ctx);
  const local = lower(stripped, ctx, site, location);
  const origin = qualifyOrigin(originSource, ctx);

  const bareFunction = stripped.kind === "fn";
  const [pairLocal, pairOrigin] = bareFunction
    ? [staticizeLifetimes(local), origin]
    : stripMatchingLayers(staticizeLifetimes(local), origin);

  const changed = !typesEquivalent(pairLocal, pairOrigin, ctx);
  if (changed) ctx.pairs.add({ local: pairLocal, origin: pairOrigin, bareFunction, location });
  return { type: local, changed, stripped: wasStripped };
}

function rewriteFields(fields: RustFields, ctx: ConversionContext, owner: string, location: SourceLocation): RustFields {
  switch (fields.kind) {
    case "unit":
      return fields;
    case "named":
    case "tuple":
      return { ...fields, fields: rewriteFieldList(fields.fields, ctx, owner, location) };
  }
}

function rewriteFieldList(
  fields: readonly RustField[],
  ctx: ConversionContext,
  owner: string,
  location: SourceLocation
): RustField[] {
  return fields.map((f, i) => {
    const site = f.name !== undefined ? `field '${f.name}' of ${owner}` : `field ${i} of ${owner}`;
    return { ...f, type: rewriteType(f.type, ctx, site, location).type };
  });
}

/** Rewrites every field, variant, alias target or constant type of a non-function declaration. */
export function rewriteTypeDeclaration(item: RustItem, ctx: ConversionContext, location: SourceLocation): RustItem {
  switch (item.kind) {
    case "struct":
      return { ...item, fields: rewriteFields(item.fields, ctx, `struct '${item.name}'`, location) };
    case "union":
      return { ...item, fields: rewriteFieldList(item.fields, ctx, `union '${item.name}'`, location) };
    case "enum":
      return {
        ...item,
        variants: item.variants.map((v) => ({
          ...v,
          fields: rewriteFields(v.fields, ctx, `variant '${item.name}::${v.name}'`, location),
        })),
      };
    case "type_alias":
      return { ...item, type: rewriteType(item.type, ctx, `type alias '${item.name}'`, location).type };
    case "const":
      return { ...item, type: rewriteType(item.type, ctx, `constant '${item.name}'`, location).type };
    case "fn":
      return item;
  }
}
