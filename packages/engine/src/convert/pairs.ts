import type { SourceLocation } from "../diagnostics.js";
import type { RustType } from "../rust/ir.js";
import { emitType } from "../rust/write.js";

/**
 * A local type that is bit-reinterpreted as its origin type somewhere in the
 * generated crate, and so must share its size and alignment.
 */
export type EquivalencePair = {
  readonly local: RustType;
  readonly origin: RustType;
  /** Bare function pairs are validated by shape instead of by assertion. */
  readonly bareFunction: boolean;
  readonly location: SourceLocation;
};

export function equivalencePairKey(local: RustType, origin: RustType): string {
  return `${emitType(local)} == ${emitType(origin)}`;
}

export class EquivalencePairs {
  private readonly pairs = new Map<string, EquivalencePair>();

  /** First writer wins; returns false for a pair that was already queued. */
  add(pair: EquivalencePair): boolean {
    const key = equivalencePairKey(pair.local, pair.origin);
    if (this.pairs.has(key)) return false;
    this.pairs.set(key, pair);
    return true;
  }

  get size(): number {
    return this.pairs.size;
  }

  values(): readonly EquivalencePair[] {
    return [...this.pairs.values()];
  }

  drain(): readonly EquivalencePair[] {
    const out = this.values();
    this.pairs.clear();
    return out;
  }
}
