import type { RustAttribute, RustField, RustFields, RustItem } from "../rust/ir.js";

// `serde(rename = "x")` -> ["serde"], `foo::bar` -> ["foo", "bar"].
function attributePath(attr: RustAttribute): readonly string[] {
  if (attr.kind === "cfg") return ["cfg"];
  const m = /^[A-Za-z_][A-Za-z0-9_]*(?:\s*::\s*[A-Za-z_][A-Za-z0-9_]*)*/.exec(attr.text);
  return m ? m[0].split("::").map((s) => s.trim()) : [];
}

function keepAttrs(attrs: readonly RustAttribute[], names: ReadonlySet<string>): RustAttribute[] {
  return attrs.filter((a) => !attributePath(a).some((segment) => names.has(segment)));
}

function stripFields(fields: readonly RustField[], names: ReadonlySet<string>): RustField[] {
  return fields.map((f) => ({ ...f, attrs: keepAttrs(f.attrs, names) }));
}

function stripFieldSet(fields: RustFields, names: ReadonlySet<string>): RustFields {
  return fields.kind === "unit" ? fields : { ...fields, fields: stripFields(fields.fields, names) };
}

/**
 * Removes attribute macros (`#[serde(...)]`, `#[my_crate::exported]`) whose
 * path contains one of `names`, on the item, its variants and its fields.
 */
export function stripMacros(item: RustItem, names: readonly string[]): RustItem {
  const set = new Set(names);
  const attrs = keepAttrs(item.attrs, set);
  switch (item.kind) {
    case "struct":
      return { ...item, attrs, fields: stripFieldSet(item.fields, set) };
    case "union":
      return { ...item, attrs, fields: stripFields(item.fields, set) };
    case "enum":
      return {
        ...item,
        attrs,
        variants: item.variants.map((v) => ({ ...v, attrs: keepAttrs(v.attrs, set), fields: stripFieldSet(v.fields, set) })),
      };
    case "type_alias":
    case "const":
    case "fn":
      return { ...item, attrs };
  }
}
