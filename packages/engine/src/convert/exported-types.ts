import type { RustAttribute } from "../rust/ir.js";
import { emitAttribute } from "../rust/write.js";

/**
 * Tracking key of a declaration: its name, plus the `cfg` attributes attached
 * directly to it, so that differently-guarded variants of one name are kept
 * apart (`Handle#cfg(unix)|cfg(feature = "x")`).
 */
export function exportedTypeKey(name: string, attrs: readonly RustAttribute[]): string {
  const guards = attrs.filter((a) => a.kind === "cfg").map(emitAttribute);
  return guards.length === 0 ? name : `${name}#${guards.join("|")}`;
}

/**
 * Names of the type declarations copied into the generated crate.
 *
 * Conversion only asks `has(name)`. The name+cfg keys are informational: they
 * let callers see how many differently-guarded variants a name was declared
 * with, and do not change how any type is rewritten.
 */
export class ExportedTypeIndex {
  private readonly keys = new Set<string>();
  private readonly variants = new Map<string, number>();

  add(name: string, attrs: readonly RustAttribute[]): string {
    const key = exportedTypeKey(name, attrs);
    if (!this.keys.has(key)) {
      this.keys.add(key);
      this.variants.set(name, (this.variants.get(name) ?? 0) + 1);
    }
    return key;
  }

  has(name: string): boolean {
    return this.variants.has(name);
  }

  hasKey(key: string): boolean {
    return this.keys.has(key);
  }

  variantCount(name: string): number {
    return this.variants.get(name) ?? 0;
  }

  get size(): number {
    return this.keys.size;
  }
}

export const PRIMITIVE_TYPES: readonly string[] = [
  "bool",
  "char",
  "i8",
  "i16",
  "i32",
  "i64",
  "i128",
  "isize",
  "u8",
  "u16",
  "u32",
  "u64",
  "u128",
  "usize",
  "f32",
  "f64",
  "str",
];

/** Maps type names (plain or crate-qualified aliases) to the primitive they rename. */
export class PrimitiveTable {
  private readonly table = new Map<string, string>();

  constructor() {
    for (const p of PRIMITIVE_TYPES) this.table.set(p, p);
  }

  resolve(name: string): string | undefined {
    return this.table.get(name);
  }

  alias(name: string, primitive: string): void {
    this.table.set(name, primitive);
  }
}
