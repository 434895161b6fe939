import { fail } from "../diagnostics.js";
import type { SourceLocation } from "../diagnostics.js";

export type TargetAxis = "arch" | "vendor" | "os" | "env";

export const TARGET_AXES: readonly TargetAxis[] = ["arch", "vendor", "os", "env"];

/**
 * A `#[cfg(...)]` expression. `other` keeps predicates this module does not
 * model verbatim; `false` is the constant that drops whatever it guards.
 */
export type Predicate =
  | { readonly kind: "feature"; readonly name: string }
  | { readonly kind: "target"; readonly axis: TargetAxis; readonly value: string }
  | { readonly kind: "not"; readonly operand: Predicate }
  | { readonly kind: "all"; readonly operands: readonly Predicate[] }
  | { readonly kind: "any"; readonly operands: readonly Predicate[] }
  | { readonly kind: "false" }
  | { readonly kind: "other"; readonly text: string };

export type TargetSelection = { readonly [axis in TargetAxis]?: string };

export type CfgRules = {
  readonly enabledFeatures: ReadonlySet<string>;
  readonly disabledFeatures: ReadonlySet<string>;
  readonly featureRenames: ReadonlyMap<string, string>;
  readonly disableUnknownFeatures: boolean;
  readonly target: TargetSelection;
};

export type CfgRulesInit = {
  readonly enable?: readonly string[];
  readonly disable?: readonly string[];
  readonly rename?: Readonly<Record<string, string>>;
  readonly disableUnknownFeatures?: boolean;
  readonly target?: TargetSelection;
};

export function cfgRules(init: CfgRulesInit = {}): CfgRules {
  return Object.freeze({
    enabledFeatures: new Set(init.enable ?? []),
    disabledFeatures: new Set(init.disable ?? []),
    featureRenames: new Map(Object.entries(init.rename ?? {})),
    disableUnknownFeatures: init.disableUnknownFeatures ?? false,
    target: Object.freeze({ ...init.target }),
  });
}

/**
 * Rules for a source crate built with exactly `features`. Entries may carry a
 * `crate/` prefix, which is dropped; every other feature counts as disabled.
 */
export function predefinedFeatureRules(features: readonly string[], target?: TargetSelection): CfgRules {
  return cfgRules({
    enable: features.map((f) => f.slice(f.lastIndexOf("/") + 1)),
    disableUnknownFeatures: true,
    target,
  });
}

const FALSE: Predicate = Object.freeze({ kind: "false" });

// Splits on commas outside string literals and parentheses.
export function splitTopLevel(text: string): string[] {
  const parts: string[] = [];
  let depth = 0;
  let inString = false;
  let start = 0;
  for (let i = 0; i < text.length; i++) {
    const ch = text.charAt(i);
    if (inString) {
      if (ch === "\\") i++;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') inString = true;
    else if (ch === "(") depth++;
    else if (ch === ")") depth--;
    else if (ch === "," && depth === 0) {
      parts.push(text.slice(start, i));
      start = i + 1;
    }
  }
  parts.push(text.slice(start));
  return parts.map((p) => p.trim()).filter((p) => p.length > 0);
}

function closingParen(text: string, open: number): number {
  let depth = 0;
  let inString = false;
  for (let i = open; i < text.length; i++) {
    const ch = text.charAt(i);
    if (inString) {
      if (ch === "\\") i++;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') inString = true;
    else if (ch === "(") depth++;
    else if (ch === ")") {
      depth--;
      if (depth === 0) return i;
    }
  }
  return -1;
}

function callArguments(text: string, name: string): string | undefined {
  const m = new RegExp(`^${name}\\s*\\(`).exec(text);
  if (!m) return undefined;
  const open = m[0].length - 1;
  if (closingParen(text, open) !== text.length - 1) return undefined;
  return text.slice(open + 1, -1);
}

const ATOMS: readonly { readonly pattern: RegExp; readonly build: (value: string) => Predicate }[] = [
  { pattern: /^feature\s*=\s*"([^"]*)"$/, build: (name) => ({ kind: "feature", name }) },
  ...TARGET_AXES.map((axis) => ({
    pattern: new RegExp(`^target_${axis}\\s*=\\s*"([^"]*)"$`),
    build: (value: string): Predicate => ({ kind: "target", axis, value }),
  })),
];

/** Never throws: anything unrecognized becomes an `other` atom. */
export function parsePredicate(text: string): Predicate {
  const trimmed = text.trim();

  const notArgs = callArguments(trimmed, "not");
  if (notArgs !== undefined) {
    const operands = splitTopLevel(notArgs);
    const [operand] = operands;
    if (operands.length === 1 && operand !== undefined) {
      return { kind: "not", operand: parsePredicate(operand) };
    }
    return { kind: "other", text: trimmed };
  }

  for (const kind of ["all", "any"] as const) {
    const args = callArguments(trimmed, kind);
    if (args !== undefined) {
      return { kind, operands: splitTopLevel(args).map(parsePredicate) };
    }
  }

  for (const atom of ATOMS) {
    const m = atom.pattern.exec(trimmed);
    if (m && m[1] !== undefined) return atom.build(m[1]);
  }
  return { kind: "other", text: trimmed };
}

export function renderPredicate(predicate: Predicate): string {
  switch (predicate.kind) {
    case "feature":
      return `feature = ${JSON.stringify(predicate.name)}`;
    case "target":
      return `target_${predicate.axis} = ${JSON.stringify(predicate.value)}`;
    case "not":
      return `not(${renderPredicate(predicate.operand)})`;
    case "all":
      return `all(${predicate.operands.map(renderPredicate).join(", ")})`;
    case "any":
      return `any(${predicate.operands.map(renderPredicate).join(", ")})`;
    case "false":
      return "any()";
    case "other":
      return predicate.text;
  }
}

/**
 * Resolves `predicate` against `rules`.
 *
 * `undefined` means the predicate always holds and its guard can be removed.
 * A `false` predicate means the guarded declaration must be dropped. Anything
 * else is the residual guard to keep in place of the original.
 *
 * `all` and `any` stop at the first child that decides them, so later children
 * are never resolved (and cannot fail).
 */
export function applyPredicate(
  predicate: Predicate,
  rules: CfgRules,
  location?: SourceLocation
): Predicate | undefined {
  switch (predicate.kind) {
    case "feature": {
      if (rules.enabledFeatures.has(predicate.name)) return undefined;
      if (rules.disabledFeatures.has(predicate.name)) return FALSE;
      const renamed = rules.featureRenames.get(predicate.name);
      if (renamed !== undefined) return { kind: "feature", name: renamed };
      if (rules.disableUnknownFeatures) return FALSE;
      return fail("FFI1001", `unmapped feature: ${predicate.name}`, location);
    }
    case "target": {
      const selected = rules.target[predicate.axis];
      if (selected === undefined) return predicate;
      return selected === predicate.value ? undefined : FALSE;
    }
    case "all": {
      const residual: Predicate[] = [];
      for (const operand of predicate.operands) {
        const resolved = applyPredicate(operand, rules, location);
        if (resolved === undefined) continue;
        if (resolved.kind === "false") return FALSE;
        residual.push(resolved);
      }
      const [only] = residual;
      if (only === undefined) return undefined;
      return residual.length === 1 ? only : { kind: "all", operands: residual };
    }
    case "any": {
      const residual: Predicate[] = [];
      for (const operand of predicate.operands) {
        const resolved = applyPredicate(operand, rules, location);
        if (resolved === undefined) return undefined;
        if (resolved.kind === "false") continue;
        residual.push(resolved);
      }
      const [only] = residual;
      if (only === undefined) return FALSE;
      return residual.length === 1 ? only : { kind: "any", operands: residual };
    }
    case "not": {
      const resolved = applyPredicate(predicate.operand, rules, location);
      if (resolved === undefined) return FALSE;
      if (resolved.kind === "false") return undefined;
      return { kind: "not", operand: resolved };
    }
    case "false":
      return FALSE;
    case "other":
      return predicate;
  }
}

export type Tristate = "true" | "false" | "unknown";

export type PredicateQuery = {
  readonly enabledFeatures: ReadonlySet<string>;
  readonly disabledFeatures?: ReadonlySet<string>;
  /** How features outside both sets, and unmodelled predicates, resolve. */
  readonly unknown: "enabled" | "disabled" | "unknown";
  readonly target?: TargetSelection;
};

function unknownAs(query: PredicateQuery): Tristate {
  switch (query.unknown) {
    case "enabled":
      return "true";
    case "disabled":
      return "false";
    case "unknown":
      return "unknown";
  }
}

/** Read-only three-valued evaluation used to filter without rewriting attributes. */
export function evaluatePredicate(predicate: Predicate, query: PredicateQuery): Tristate {
  switch (predicate.kind) {
    case "feature":
      if (query.enabledFeatures.has(predicate.name)) return "true";
      if (query.disabledFeatures?.has(predicate.name)) return "false";
      return unknownAs(query);
    case "target": {
      const selected = query.target?.[predicate.axis];
      if (selected === undefined) return "unknown";
      return selected === predicate.value ? "true" : "false";
    }
    case "all": {
      let result: Tristate = "true";
      for (const operand of predicate.operands) {
        const value = evaluatePredicate(operand, query);
        if (value === "false") return "false";
        if (value === "unknown") result = "unknown";
      }
      return result;
    }
    case "any": {
      let result: Tristate = "false";
      for (const operand of predicate.operands) {
        const value = evaluatePredicate(operand, query);
        if (value === "true") return "true";
        if (value === "unknown") result = "unknown";
      }
      return result;
    }
    case "not": {
      const value = evaluatePredicate(predicate.operand, query);
      if (value === "unknown") return value;
      return value === "true" ? "false" : "true";
    }
    case "false":
      return "false";
    case "other":
      return unknownAs(query);
  }
}
