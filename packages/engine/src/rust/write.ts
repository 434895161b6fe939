import { renderPredicate } from "../cfg/predicate.js";
import type {
  RustAttribute,
  RustBlock,
  RustExpr,
  RustField,
  RustFields,
  RustGenericArg,
  RustItem,
  RustParam,
  RustPath,
  RustPattern,
  RustType,
  RustVisibility,
} from "./ir.js";

function emitGenericArg(arg: RustGenericArg): string {
  switch (arg.kind) {
    case "type":
      return emitType(arg.type);
    case "lifetime":
      return `'${arg.name}`;
    case "const":
      return arg.text;
    case "binding":
      return `${arg.name} = ${emitType(arg.type)}`;
  }
}

/** Expression position needs `::<...>` before generic arguments. */
export function emitPath(path: RustPath, opts?: { readonly turbofish?: boolean }): string {
  const sep = opts?.turbofish ? "::<" : "<";
  const segments = path.segments.map((seg) =>
    seg.args.length === 0 ? seg.name : `${seg.name}${sep}${seg.args.map(emitGenericArg).join(", ")}>`
  );
  return `${path.global ? "::" : ""}${segments.join("::")}`;
}

export function emitType(ty: RustType): string {
  switch (ty.kind) {
    case "path":
      return emitPath(ty.path);
    case "ref": {
      const lt = ty.lifetime ? `'${ty.lifetime} ` : "";
      const mut = ty.mut ? "mut " : "";
      return `&${lt}${mut}${emitType(ty.inner)}`;
    }
    case "ptr":
      return `*${ty.mut ? "mut" : "const"} ${emitType(ty.inner)}`;
    case "array":
      return `[${emitType(ty.inner)}; ${ty.len}]`;
    case "slice":
      return `[${emitType(ty.inner)}]`;
    case "tuple":
      if (ty.elems.length === 1 && ty.elems[0]) return `(${emitType(ty.elems[0])},)`;
      return `(${ty.elems.map(emitType).join(", ")})`;
    case "fn": {
      const unsafe = ty.unsafe ? "unsafe " : "";
      const abi = ty.abi !== undefined ? `extern ${JSON.stringify(ty.abi)} ` : "";
      const ret = ty.ret ? ` -> ${emitType(ty.ret)}` : "";
      return `${unsafe}${abi}fn(${ty.params.map(emitType).join(", ")})${ret}`;
    }
    case "never":
      return "!";
    case "infer":
      return "_";
    case "opaque":
      return ty.text;
  }
}

export function emitAttribute(attr: RustAttribute): string {
  return attr.kind === "cfg" ? `cfg(${renderPredicate(attr.predicate)})` : attr.text;
}

export function emitExpr(expr: RustExpr): string {
  switch (expr.kind) {
    case "ident":
      return expr.name;
    case "path_call":
      return `${emitPath(expr.path, { turbofish: true })}(${expr.args.map(emitExpr).join(", ")})`;
    case "macro_call":
      return `${expr.name}!(${expr.args.map(emitExpr).join(", ")})`;
    case "borrow":
      return `&${expr.mut ? "mut " : ""}${emitExpr(expr.expr)}`;
    case "deref":
      return `*${emitExpr(expr.expr)}`;
    case "unsafe":
      return `unsafe { ${emitExpr(expr.expr)} }`;
    case "block":
      return `{ ${expr.stmts.map((stmt) => `${emitExpr(stmt)};`).join(" ")} }`;
    case "binary":
      return `${emitExpr(expr.left)} ${expr.op} ${emitExpr(expr.right)}`;
    case "string":
      return JSON.stringify(expr.value);
    case "verbatim":
      return expr.text;
  }
}

function emitVis(vis: RustVisibility): string {
  return vis === "private" ? "" : `${vis} `;
}

function emitPattern(p: RustPattern): string {
  switch (p.kind) {
    case "ident":
      return p.mut ? `mut ${p.name}` : p.name;
    case "wild":
      return "_";
    case "other":
      return p.text;
  }
}

function emitParam(p: RustParam): string {
  return p.kind === "receiver" ? p.text : `${emitPattern(p.pattern)}: ${emitType(p.type)}`;
}

function emitAttrLines(attrs: readonly RustAttribute[], indent: string): string[] {
  return attrs.map((a) => `${indent}#[${emitAttribute(a)}]`);
}

function emitInlineAttrs(attrs: readonly RustAttribute[]): string {
  return attrs.map((a) => `#[${emitAttribute(a)}] `).join("");
}

function emitTupleField(f: RustField): string {
  return `${emitInlineAttrs(f.attrs)}${emitVis(f.vis)}${emitType(f.type)}`;
}

function emitNamedFields(fields: readonly RustField[], indent: string): string[] {
  const out: string[] = [];
  for (const f of fields) {
    out.push(...emitAttrLines(f.attrs, indent));
    out.push(`${indent}${emitVis(f.vis)}${f.name ?? "_"}: ${emitType(f.type)},`);
  }
  return out;
}

function emitWhere(whereClause: string | undefined): string {
  return whereClause ? ` ${whereClause}` : "";
}

function emitStructBody(head: string, fields: RustFields, whereClause: string | undefined, indent: string): string[] {
  switch (fields.kind) {
    case "unit":
      return [`${indent}${head}${emitWhere(whereClause)};`];
    case "tuple":
      return [`${indent}${head}(${fields.fields.map(emitTupleField).join(", ")})${emitWhere(whereClause)};`];
    case "named":
      return [`${indent}${head}${emitWhere(whereClause)} {`, ...emitNamedFields(fields.fields, `${indent}  `), `${indent}}`];
  }
}

function emitBlock(block: RustBlock, indent: string): string[] {
  const out: string[] = [];
  for (const st of block.stmts) out.push(`${indent}let ${st.name} = ${emitExpr(st.init)};`);
  if (block.tail) out.push(`${indent}${emitExpr(block.tail)}`);
  return out;
}

function emitItem(item: RustItem, indent: string): string[] {
  const out = emitAttrLines(item.attrs, indent);
  const vis = emitVis(item.vis);
  switch (item.kind) {
    case "struct":
      out.push(...emitStructBody(`${vis}struct ${item.name}${item.generics ?? ""}`, item.fields, item.whereClause, indent));
      return out;
    case "union":
      out.push(
        ...emitStructBody(
          `${vis}union ${item.name}${item.generics ?? ""}`,
          { kind: "named", fields: item.fields },
          item.whereClause,
          indent
        )
      );
      return out;
    case "enum": {
      out.push(`${indent}${vis}enum ${item.name}${item.generics ?? ""}${emitWhere(item.whereClause)} {`);
      const inner = `${indent}  `;
      for (const v of item.variants) {
        out.push(...emitAttrLines(v.attrs, inner));
        const discriminant = v.discriminant !== undefined ? ` = ${v.discriminant}` : "";
        switch (v.fields.kind) {
          case "unit":
            out.push(`${inner}${v.name}${discriminant},`);
            break;
          case "tuple":
            out.push(`${inner}${v.name}(${v.fields.fields.map(emitTupleField).join(", ")})${discriminant},`);
            break;
          case "named":
            out.push(`${inner}${v.name} {`, ...emitNamedFields(v.fields.fields, `${inner}  `), `${inner}}${discriminant},`);
            break;
        }
      }
      out.push(`${indent}}`);
      return out;
    }
    case "type_alias":
      out.push(`${indent}${vis}type ${item.name}${item.generics ?? ""} = ${emitType(item.type)};`);
      return out;
    case "const":
      out.push(`${indent}${vis}const ${item.name}: ${emitType(item.type)} = ${emitExpr(item.value)};`);
      return out;
    case "fn": {
      const qualifiers = [
        item.const ? "const " : "",
        item.unsafe ? "unsafe " : "",
        item.abi !== undefined ? `extern ${JSON.stringify(item.abi)} ` : "",
      ].join("");
      const ret = item.ret ? ` -> ${emitType(item.ret)}` : "";
      const head = `${indent}${vis}${qualifiers}fn ${item.name}${item.generics ?? ""}(${item.params.map(emitParam).join(", ")})${ret}${emitWhere(item.whereClause)}`;
      if (!item.body) {
        out.push(`${head};`);
        return out;
      }
      out.push(`${head} {`, ...emitBlock(item.body, `${indent}  `), `${indent}}`);
      return out;
    }
  }
}

export function writeRustItem(item: RustItem): string {
  return emitItem(item, "").join("\n");
}

/** Renders one compilation unit; items are separated by a blank line. */
export function writeRustFile(items: readonly RustItem[], opts?: { readonly header?: readonly string[] }): string {
  const parts: string[] = [];
  for (const h of opts?.header ?? []) parts.push(h);
  for (const item of items) {
    if (parts.length > 0) parts.push("");
    parts.push(...emitItem(item, ""));
  }
  parts.push("");
  return parts.join("\n");
}
