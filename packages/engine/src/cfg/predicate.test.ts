import { expect } from "chai";

import { FfiError } from "../diagnostics.js";
import {
  applyPredicate,
  cfgRules,
  evaluatePredicate,
  parsePredicate,
  renderPredicate,
  splitTopLevel,
} from "./predicate.js";
import type { Predicate } from "./predicate.js";

const at = { file: "src/lib.rs", line: 12, column: 1 };

describe("@ffistub/engine cfg predicates", () => {
  describe("parsing", () => {
    it("parses feature and target atoms", () => {
      expect(parsePredicate('feature = "serde"')).to.deep.equal({ kind: "feature", name: "serde" });
      expect(parsePredicate('target_arch="x86_64"')).to.deep.equal({ kind: "target", axis: "arch", value: "x86_64" });
      expect(parsePredicate(' target_os = "linux" ')).to.deep.equal({ kind: "target", axis: "os", value: "linux" });
      expect(parsePredicate('target_vendor = "apple"')).to.deep.equal({ kind: "target", axis: "vendor", value: "apple" });
      expect(parsePredicate('target_env = "gnu"')).to.deep.equal({ kind: "target", axis: "env", value: "gnu" });
    });

    it("parses nested combinators, with or without a space before the parenthesis", () => {
      expect(parsePredicate('all (feature = "a", not(feature = "b"))')).to.deep.equal({
        kind: "all",
        operands: [
          { kind: "feature", name: "a" },
          { kind: "not", operand: { kind: "feature", name: "b" } },
        ],
      });
      expect(parsePredicate('any(feature = "a,b", unix)')).to.deep.equal({
        kind: "any",
        operands: [
          { kind: "feature", name: "a,b" },
          { kind: "other", text: "unix" },
        ],
      });
    });

    it("keeps unrecognized predicates verbatim instead of failing", () => {
      expect(parsePredicate("test")).to.deep.equal({ kind: "other", text: "test" });
      expect(parsePredicate('target_pointer_width = "64"')).to.deep.equal({
        kind: "other",
        text: 'target_pointer_width = "64"',
      });
      expect(parsePredicate("not(a, b)")).to.deep.equal({ kind: "other", text: "not(a, b)" });
      expect(parsePredicate("all(a), any(b)")).to.deep.equal({ kind: "other", text: "all(a), any(b)" });
    });

    it("splits only on top-level commas", () => {
      expect(splitTopLevel('a, any(b, c), feature = "d,e"')).to.deep.equal(["a", "any(b, c)", 'feature = "d,e"']);
    });

    it("renders predicates back to cfg syntax", () => {
      const text = 'all(feature = "a", not(target_os = "windows"), unix)';
      expect(renderPredicate(parsePredicate(text))).to.equal(text);
      expect(renderPredicate({ kind: "false" })).to.equal("any()");
    });
  });

  describe("resolution", () => {
    const rules = cfgRules({
      enable: ["std", "a"],
      disable: ["x", "legacy"],
      rename: { unstable: "nightly" },
      target: { os: "linux" },
    });

    it("removes the guard of an enabled feature", () => {
      expect(applyPredicate({ kind: "feature", name: "std" }, rules)).to.equal(undefined);
    });

    it("resolves a disabled feature to false", () => {
      expect(applyPredicate({ kind: "feature", name: "legacy" }, rules)).to.deep.equal({ kind: "false" });
    });

    it("renames mapped features", () => {
      expect(applyPredicate({ kind: "feature", name: "unstable" }, rules)).to.deep.equal({
        kind: "feature",
        name: "nightly",
      });
    });

    it("fails on an unmapped feature with its location", () => {
      expect(() => applyPredicate({ kind: "feature", name: "gpu" }, rules, at))
        .to.throw(FfiError, "unmapped feature: gpu (at src/lib.rs:12:1)")
        .with.property("code", "FFI1001");
    });

    it("treats unmapped features as disabled when configured to", () => {
      const lenient = cfgRules({ disableUnknownFeatures: true });
      expect(applyPredicate({ kind: "feature", name: "gpu" }, lenient)).to.deep.equal({ kind: "false" });
    });

    it("matches selected targets exactly and keeps unselected axes", () => {
      expect(applyPredicate(parsePredicate('target_os = "linux"'), rules)).to.equal(undefined);
      expect(applyPredicate(parsePredicate('target_os = "macos"'), rules)).to.deep.equal({ kind: "false" });
      expect(applyPredicate(parsePredicate('target_arch = "aarch64"'), rules)).to.deep.equal({
        kind: "target",
        axis: "arch",
        value: "aarch64",
      });
    });

    it("reduces all() and any()", () => {
      expect(applyPredicate(parsePredicate('all(feature = "std", unix)'), rules)).to.deep.equal({
        kind: "other",
        text: "unix",
      });
      expect(applyPredicate(parsePredicate('all(feature = "std", feature = "a")'), rules)).to.equal(undefined);
      expect(applyPredicate(parsePredicate('all(unix, feature = "x")'), rules)).to.deep.equal({ kind: "false" });
      expect(applyPredicate(parsePredicate('any(feature = "x", unix, windows)'), rules)).to.deep.equal({
        kind: "any",
        operands: [
          { kind: "other", text: "unix" },
          { kind: "other", text: "windows" },
        ],
      });
      expect(applyPredicate(parsePredicate('any(feature = "x", feature = "legacy")'), rules)).to.deep.equal({
        kind: "false",
      });
      expect(applyPredicate(parsePredicate("any()"), rules)).to.deep.equal({ kind: "false" });
      expect(applyPredicate(parsePredicate("all()"), rules)).to.equal(undefined);
    });

    it("collapses negation through resolved operands", () => {
      expect(applyPredicate(parsePredicate('not(feature = "std")'), rules)).to.deep.equal({ kind: "false" });
      expect(applyPredicate(parsePredicate("not(unix)"), rules)).to.deep.equal({
        kind: "not",
        operand: { kind: "other", text: "unix" },
      });
    });

    it("removes the guard of not(disabled feature)", () => {
      const onlyX = cfgRules({ disable: ["x"] });
      expect(applyPredicate(parsePredicate('not(feature = "x")'), onlyX)).to.equal(undefined);
    });

    it("short-circuits any() on an enabled feature before an unmapped one", () => {
      const strict = cfgRules({ enable: ["a"], disableUnknownFeatures: false });
      expect(applyPredicate(parsePredicate('any(feature = "a", feature = "b")'), strict)).to.equal(undefined);
      const lenient = cfgRules({ enable: ["a"], disableUnknownFeatures: true });
      expect(applyPredicate(parsePredicate('any(feature = "a", feature = "b")'), lenient)).to.equal(undefined);
    });

    it("short-circuits all() on a disabled feature before an unmapped one", () => {
      const strict = cfgRules({ disable: ["a"] });
      expect(applyPredicate(parsePredicate('all(feature = "a", feature = "b")'), strict)).to.deep.equal({
        kind: "false",
      });
    });

    it("reaches a fixed point after one pass when no feature is renamed", () => {
      const fixed = cfgRules({ enable: ["a"], disable: ["b"], target: { arch: "x86_64" } });
      const inputs: readonly string[] = [
        'all(feature = "a", unix)',
        'any(feature = "b", target_os = "linux", not(windows))',
        'not(all(feature = "b", unix))',
        'all(target_arch = "x86_64", any(feature = "b", target_env = "musl"))',
        'not(any(feature = "a", unix))',
      ];
      for (const text of inputs) {
        const once = applyPredicate(parsePredicate(text), fixed);
        const asPredicate: Predicate = once ?? { kind: "all", operands: [] };
        const twice = applyPredicate(asPredicate, fixed);
        if (once === undefined) expect(twice, text).to.equal(undefined);
        else expect(twice, text).to.deep.equal(once);
      }
    });

    it("does not re-resolve a renamed feature on a second pass", () => {
      const renaming = cfgRules({ rename: { a: "b" } });
      const once = applyPredicate(parsePredicate('feature = "a"'), renaming);
      expect(once).to.deep.equal({ kind: "feature", name: "b" });
      expect(() => applyPredicate(once ?? { kind: "false" }, renaming)).to.throw("unmapped feature: b");
    });
  });

  describe("read-only evaluation", () => {
    const query = {
      enabledFeatures: new Set(["std"]),
      disabledFeatures: new Set(["legacy"]),
      unknown: "unknown",
      target: { os: "linux" },
    } as const;

    it("uses three-valued logic", () => {
      expect(evaluatePredicate(parsePredicate('feature = "std"'), query)).to.equal("true");
      expect(evaluatePredicate(parsePredicate('feature = "legacy"'), query)).to.equal("false");
      expect(evaluatePredicate(parsePredicate('feature = "gpu"'), query)).to.equal("unknown");
      expect(evaluatePredicate(parsePredicate('all(feature = "std", feature = "gpu")'), query)).to.equal("unknown");
      expect(evaluatePredicate(parsePredicate('all(feature = "legacy", feature = "gpu")'), query)).to.equal("false");
      expect(evaluatePredicate(parsePredicate('any(feature = "gpu", feature = "std")'), query)).to.equal("true");
      expect(evaluatePredicate(parsePredicate('not(feature = "gpu")'), query)).to.equal("unknown");
      expect(evaluatePredicate(parsePredicate('not(target_os = "linux")'), query)).to.equal("false");
      expect(evaluatePredicate(parsePredicate('target_arch = "arm"'), query)).to.equal("unknown");
    });

    it("resolves unknown features and opaque atoms per policy", () => {
      const enabled = { ...query, unknown: "enabled" } as const;
      const disabled = { ...query, unknown: "disabled" } as const;
      expect(evaluatePredicate(parsePredicate('feature = "gpu"'), enabled)).to.equal("true");
      expect(evaluatePredicate(parsePredicate("unix"), enabled)).to.equal("true");
      expect(evaluatePredicate(parsePredicate('feature = "gpu"'), disabled)).to.equal("false");
      expect(evaluatePredicate(parsePredicate("not(unix)"), disabled)).to.equal("true");
    });
  });
});
