import { configuredPath } from "../convert/context.js";
import type { RustItem, RustPath, RustType } from "../rust/ir.js";
import { mapItemTypes, pathNamesEqual, transformType } from "../rust/types.js";

export type PathReplacement = {
  readonly from: RustPath;
  readonly to: RustPath;
};

/** Parses `{ "MaybeUninit": "std::mem::MaybeUninit" }`-style configuration. */
export function pathReplacements(map: Readonly<Record<string, string>>): readonly PathReplacement[] {
  return Object.entries(map).map(([from, to]) => ({
    from: configuredPath(from, "path replacements"),
    to: configuredPath(to, "path replacements"),
  }));
}

// Generic arguments written on the replaced path move to the replacement's last segment.
function replacePath(path: RustPath, replacement: PathReplacement): RustPath {
  const args = path.segments[path.segments.length - 1]?.args ?? [];
  const segments = replacement.to.segments.map((seg, i, all) => (i === all.length - 1 ? { name: seg.name, args } : seg));
  return { global: replacement.to.global, segments };
}

export function replaceTypePaths(ty: RustType, replacements: readonly PathReplacement[]): RustType {
  return transformType(ty, (t) => {
    if (t.kind !== "path") return t;
    const hit = replacements.find((r) => pathNamesEqual(t.path, r.from));
    return hit ? { kind: "path", path: replacePath(t.path, hit) } : t;
  });
}

export function replacePaths(item: RustItem, replacements: readonly PathReplacement[]): RustItem {
  if (replacements.length === 0) return item;
  return mapItemTypes(item, (t) => replaceTypePaths(t, replacements));
}
