export {
  ENGINE_DIAGNOSTIC_CODES,
  FfiError,
  UNKNOWN_LOCATION,
  assertEngineDiagnosticCode,
  engineDiagnosticDomain,
  formatLocation,
  isEngineDiagnosticCode,
} from "./diagnostics.js";
export type { EngineDiagnosticCode, EngineDiagnosticDomain, SourceLocation } from "./diagnostics.js";

export {
  TARGET_AXES,
  applyPredicate,
  cfgRules,
  evaluatePredicate,
  parsePredicate,
  predefinedFeatureRules,
  renderPredicate,
} from "./cfg/predicate.js";
export type { CfgRules, CfgRulesInit, Predicate, PredicateQuery, TargetAxis, TargetSelection, Tristate } from "./cfg/predicate.js";
export { applyCfgRules, rewriteCfgAttributes } from "./cfg/attributes.js";

export type {
  RustAttribute,
  RustExpr,
  RustField,
  RustFields,
  RustFnItem,
  RustItem,
  RustPath,
  RustType,
  RustVariant,
  SourcedItem,
} from "./rust/ir.js";
export { parseRustItem, parseRustItems, parseRustPath, parseRustType } from "./rust/parse.js";
export { emitType, writeRustFile, writeRustItem } from "./rust/write.js";

export { DEFAULT_ALLOWED_PREFIXES, crateIdent } from "./convert/context.js";
export type { ConverterOptions, RustEdition } from "./convert/context.js";
export { FfiConverter, convertItems } from "./convert/converter.js";
export type { ConverterPhase } from "./convert/converter.js";
export type { EquivalencePair } from "./convert/pairs.js";

export { batching, mapItems } from "./stages/batching.js";
export type { BatchingStep } from "./stages/batching.js";
export { CfgFilter, FEATURES_MISMATCH_MESSAGE, featuresAssertion } from "./stages/cfg-filter.js";
export type { CfgFilterOptions, PredefinedFeatures } from "./stages/cfg-filter.js";
export { FeatureFilter } from "./stages/feature-filter.js";
export { stripDerives } from "./stages/strip-derives.js";
export { stripMacros } from "./stages/strip-macros.js";
export { pathReplacements, replacePaths } from "./stages/replace-paths.js";
export type { PathReplacement } from "./stages/replace-paths.js";
