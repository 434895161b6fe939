import type { SourceLocation } from "../diagnostics.js";
import type { RustAttribute, RustField, RustFields, RustItem, RustVariant } from "../rust/ir.js";
import { applyPredicate } from "./predicate.js";
import type { CfgRules } from "./predicate.js";

/**
 * Resolves every `cfg` attribute in `attrs`. Returns `undefined` when one of
 * them is false, otherwise a new list with true guards removed and the rest
 * replaced by their residuals.
 */
export function rewriteCfgAttributes(
  attrs: readonly RustAttribute[],
  rules: CfgRules,
  location?: SourceLocation
): RustAttribute[] | undefined {
  const out: RustAttribute[] = [];
  for (const attr of attrs) {
    if (attr.kind !== "cfg") {
      out.push(attr);
      continue;
    }
    const residual = applyPredicate(attr.predicate, rules, location);
    if (residual === undefined) continue;
    if (residual.kind === "false") return undefined;
    out.push({ kind: "cfg", predicate: residual });
  }
  return out;
}

function filterFields(fields: readonly RustField[], rules: CfgRules, location?: SourceLocation): RustField[] {
  const out: RustField[] = [];
  for (const field of fields) {
    const attrs = rewriteCfgAttributes(field.attrs, rules, location);
    if (attrs) out.push({ ...field, attrs });
  }
  return out;
}

function filterFieldSet(fields: RustFields, rules: CfgRules, location?: SourceLocation): RustFields {
  if (fields.kind === "unit") return fields;
  return { ...fields, fields: filterFields(fields.fields, rules, location) };
}

function filterVariants(variants: readonly RustVariant[], rules: CfgRules, location?: SourceLocation): RustVariant[] {
  const out: RustVariant[] = [];
  for (const variant of variants) {
    const attrs = rewriteCfgAttributes(variant.attrs, rules, location);
    if (attrs) out.push({ ...variant, attrs, fields: filterFieldSet(variant.fields, rules, location) });
  }
  return out;
}

/**
 * Applies `rules` to a declaration and to its fields and variants. Returns
 * `undefined` when the declaration itself is compiled out.
 */
export function applyCfgRules(item: RustItem, rules: CfgRules, location?: SourceLocation): RustItem | undefined {
  const attrs = rewriteCfgAttributes(item.attrs, rules, location);
  if (!attrs) return undefined;
  switch (item.kind) {
    case "struct":
      return { ...item, attrs, fields: filterFieldSet(item.fields, rules, location) };
    case "union":
      return { ...item, attrs, fields: filterFields(item.fields, rules, location) };
    case "enum":
      return { ...item, attrs, variants: filterVariants(item.variants, rules, location) };
    case "type_alias":
    case "const":
    case "fn":
      return { ...item, attrs };
  }
}
