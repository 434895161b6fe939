import { expect } from "chai";

import { FfiError } from "../diagnostics.js";
import type { SourcedItem } from "../rust/ir.js";
import { parseRustItem } from "../rust/parse.js";
import { writeRustFile } from "../rust/write.js";
import { FfiConverter, convertItems } from "./converter.js";

function sourced(text: string, line: number): SourcedItem {
  const location = { file: "src/lib.rs", line, column: 1 };
  return [parseRustItem(text, location), location];
}

const INPUT: readonly SourcedItem[] = [
  sourced("pub type Len = usize;", 1),
  sourced("#[repr(C)]\npub struct Foo { pub len: Len }", 3),
  sourced("pub fn inspect(x: &Foo) -> Len { x.len }", 8),
];

describe("@ffistub/engine converter", () => {
  it("emits stubs, rewritten declarations and assertions in reverse order", () => {
    const out = [...convertItems(INPUT, { crateName: "example-ffi" })];
    expect(out.map(([, location]) => location.line)).to.deep.equal([8, 3, 1, 8, 8]);
    expect(writeRustFile(out.map(([item]) => item))).to.equal(
      [
        "#[no_mangle]",
        'pub unsafe extern "C" fn inspect(x: *const Foo) -> Len {',
        "  example_ffi::inspect(unsafe { std::mem::transmute(&*x) })",
        "}",
        "",
        "#[repr(C)]",
        "pub struct Foo {",
        "  pub len: Len,",
        "}",
        "",
        "pub type Len = usize;",
        "",
        'const _: () = assert!(std::mem::align_of::<Foo>() == std::mem::align_of::<example_ffi::Foo>(), "Alignment mismatch between stub parameter type and source crate type");',
        "",
        'const _: () = assert!(std::mem::size_of::<Foo>() == std::mem::size_of::<example_ffi::Foo>(), "Size mismatch between stub parameter type and source crate type");',
        "",
      ].join("\n")
    );
  });

  it("moves through collect, convert and followup", () => {
    const converter = new FfiConverter({ crateName: "example-ffi" });
    const source = INPUT[Symbol.iterator]();
    expect(converter.phase).to.equal("collect");

    const first = converter.call(source);
    expect(first?.[0].name).to.equal("inspect");
    expect(converter.phase).to.equal("convert");
    expect(converter.exportedTypes.has("Foo")).to.equal(true);
    expect(converter.exportedTypes.has("inspect")).to.equal(false);
    expect(converter.primitives.resolve("example_ffi::Len")).to.equal("usize");
    expect(converter.pendingPairs).to.have.length(1);

    expect(converter.call(source)?.[0].name).to.equal("Foo");
    expect(converter.call(source)?.[0].name).to.equal("Len");
    expect(converter.call(source)?.[0].name).to.equal("_");
    expect(converter.phase).to.equal("followup");
    expect(converter.pendingPairs).to.have.length(0);
    expect(converter.call(source)?.[0].name).to.equal("_");
    expect(converter.call(source)).to.equal(undefined);
    expect(converter.call(source)).to.equal(undefined);
  });

  it("keys differently-guarded declarations of one name apart", () => {
    const converter = new FfiConverter({ crateName: "example-ffi" });
    const items = [
      sourced("#[cfg(unix)]\npub struct Handle(u32);", 1),
      sourced("#[cfg(windows)]\npub struct Handle(u64);", 2),
    ];
    converter.call(items[Symbol.iterator]());
    expect(converter.exportedTypes.variantCount("Handle")).to.equal(2);
    expect(converter.exportedTypes.hasKey("Handle#cfg(unix)")).to.equal(true);
  });

  it("produces nothing for an empty stream", () => {
    expect([...convertItems([], { crateName: "example-ffi" })]).to.deep.equal([]);
  });

  it("rejects crate names that are not identifiers", () => {
    expect(() => new FfiConverter({ crateName: "1-bad" }))
      .to.throw(FfiError, "invalid crate name '1-bad'")
      .with.property("code", "FFI1002");
  });

  it("rejects configured paths that do not parse", () => {
    expect(() => new FfiConverter({ crateName: "example-ffi", transparentWrappers: ["std::mem::"] }))
      .to.throw(FfiError, "invalid path 'std::mem::' in transparent wrappers: unexpected trailing input after path 'std::mem::'")
      .with.property("code", "FFI1002");
  });

  it("stops at the first declaration that cannot be converted", () => {
    const items = [sourced("pub fn ok(n: u8);", 1), sourced("pub fn bad(s: &[u8]);", 2)];
    expect(() => [...convertItems(items, { crateName: "example-ffi" })])
      .to.throw(FfiError, "unsupported type shape")
      .with.property("code", "FFI2001");
  });
});
