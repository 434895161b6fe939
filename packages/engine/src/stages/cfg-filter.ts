import { applyCfgRules } from "../cfg/attributes.js";
import { predefinedFeatureRules } from "../cfg/predicate.js";
import type { CfgRules } from "../cfg/predicate.js";
import { configuredPath } from "../convert/context.js";
import { UNKNOWN_LOCATION } from "../diagnostics.js";
import { unitType } from "../rust/ir.js";
import type { RustItem, SourcedItem } from "../rust/ir.js";
import { emitPath } from "../rust/write.js";
import type { BatchingStep } from "./batching.js";

/** The feature set the source crate was built with, as its own constant spells it. */
export type PredefinedFeatures = {
  /** Path of the source crate's feature-list constant, e.g. `example_ffi::FEATURES`. */
  readonly constant: string;
  /** `crate/feature` entries, in the order the constant lists them. */
  readonly features: readonly string[];
};

export type CfgFilterOptions = {
  /** Replaces the enable, disable and rename rules; the target selection is kept. */
  readonly predefinedFeatures?: PredefinedFeatures;
};

export const FEATURES_MISMATCH_MESSAGE =
  "ffistub: features mismatch between the source crate and the generated file. The source crate is built with a different feature set as a build dependency than as a library dependency; set the needed features explicitly.";

/** `const _: () = { konst::assertc_eq!(<constant>, "<features>", ...); };` */
export function featuresAssertion(predefined: PredefinedFeatures): RustItem {
  const constant = configuredPath(predefined.constant, "predefined features constant");
  return {
    kind: "const",
    attrs: [],
    vis: "private",
    name: "_",
    type: unitType(),
    value: {
      kind: "block",
      stmts: [
        {
          kind: "macro_call",
          name: "konst::assertc_eq",
          args: [
            { kind: "verbatim", text: emitPath(constant) },
            { kind: "string", value: predefined.features.join(" ") },
            { kind: "string", value: FEATURES_MISMATCH_MESSAGE },
          ],
        },
      ],
    },
  };
}

/**
 * Resolves `cfg` attributes and skips declarations that are compiled out.
 * With predefined features, the features assertion is emitted once, first.
 */
export class CfgFilter implements BatchingStep<SourcedItem, SourcedItem> {
  readonly rules: CfgRules;
  private prelude: SourcedItem | undefined;

  constructor(rules: CfgRules, options: CfgFilterOptions = {}) {
    const predefined = options.predefinedFeatures;
    this.rules = predefined ? predefinedFeatureRules(predefined.features, rules.target) : rules;
    this.prelude = predefined ? [featuresAssertion(predefined), UNKNOWN_LOCATION] : undefined;
  }

  call(source: Iterator<SourcedItem>): SourcedItem | undefined {
    const prelude = this.prelude;
    if (prelude) {
      this.prelude = undefined;
      return prelude;
    }
    for (let next = source.next(); !next.done; next = source.next()) {
      const [item, location] = next.value;
      const kept = applyCfgRules(item, this.rules, location);
      if (kept) return [kept, location];
    }
    return undefined;
  }
}
