import { evaluatePredicate } from "../cfg/predicate.js";
import type { PredicateQuery } from "../cfg/predicate.js";
import type { RustItem, SourcedItem } from "../rust/ir.js";
import type { BatchingStep } from "./batching.js";

export function isDefinitelyDisabled(item: RustItem, query: PredicateQuery): boolean {
  return item.attrs.some((a) => a.kind === "cfg" && evaluatePredicate(a.predicate, query) === "false");
}

/**
 * Drops declarations whose guards are known to be false and passes the rest
 * through untouched; attributes are never rewritten.
 */
export class FeatureFilter implements BatchingStep<SourcedItem, SourcedItem> {
  constructor(private readonly query: PredicateQuery) {}

  call(source: Iterator<SourcedItem>): SourcedItem | undefined {
    for (let next = source.next(); !next.done; next = source.next()) {
      if (!isDefinitelyDisabled(next.value[0], this.query)) return next.value;
    }
    return undefined;
  }
}
