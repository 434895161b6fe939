import { splitTopLevel } from "../cfg/predicate.js";
import type { RustAttribute, RustItem } from "../rust/ir.js";

const DERIVE = /^derive\s*\(([\s\S]*)\)$/;

function lastSegment(path: string): string {
  const parts = path.split("::");
  return (parts[parts.length - 1] ?? path).trim();
}

function stripFromAttribute(attr: RustAttribute, traits: ReadonlySet<string>): RustAttribute | undefined {
  if (attr.kind !== "other") return attr;
  const m = DERIVE.exec(attr.text);
  if (!m || m[1] === undefined) return attr;
  const kept = splitTopLevel(m[1]).filter((name) => !traits.has(name) && !traits.has(lastSegment(name)));
  if (kept.length === 0) return undefined;
  return { kind: "other", text: `derive(${kept.join(", ")})` };
}

/**
 * Removes the given traits from `#[derive(...)]` on structs, enums and unions.
 * A derive left empty is removed.
 */
export function stripDerives(item: RustItem, traits: readonly string[]): RustItem {
  if (item.kind !== "struct" && item.kind !== "enum" && item.kind !== "union") return item;
  const set = new Set(traits);
  const attrs: RustAttribute[] = [];
  for (const attr of item.attrs) {
    const kept = stripFromAttribute(attr, set);
    if (kept) attrs.push(kept);
  }
  return { ...item, attrs };
}
