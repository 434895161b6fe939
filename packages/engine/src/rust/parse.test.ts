import { expect } from "chai";

import { FfiError } from "../diagnostics.js";
import { parseRustItem, parseRustItems, parseRustPath, parseRustType } from "./parse.js";
import { emitPath, emitType, writeRustItem } from "./write.js";

function roundTrip(text: string): string {
  return writeRustItem(parseRustItem(text));
}

describe("@ffistub/engine declaration parser", () => {
  it("parses a repr(C) struct with named fields", () => {
    const item = parseRustItem("#[repr(C)]\n#[derive(Clone, Copy)]\npub struct Point { pub x: f64, pub y: f64 }");
    expect(item.kind).to.equal("struct");
    expect(item.attrs).to.deep.equal([
      { kind: "other", text: "repr(C)" },
      { kind: "other", text: "derive(Clone, Copy)" },
    ]);
    expect(writeRustItem(item)).to.equal(
      ["#[repr(C)]", "#[derive(Clone, Copy)]", "pub struct Point {", "  pub x: f64,", "  pub y: f64,", "}"].join("\n")
    );
  });

  it("parses tuple and unit structs", () => {
    expect(roundTrip("pub struct Handle(pub *mut c_void, u8);")).to.equal("pub struct Handle(pub *mut c_void, u8);");
    expect(roundTrip("pub(crate) struct Marker;")).to.equal("pub(crate) struct Marker;");
  });

  it("parses enums with discriminants, payloads and guarded variants", () => {
    const text = 'pub enum Mode<\'a> { A = 1, #[cfg(feature = "b")] B(u32), C { x: &\'a str } }';
    expect(roundTrip(text)).to.equal(
      [
        "pub enum Mode<'a> {",
        "  A = 1,",
        '  #[cfg(feature = "b")]',
        "  B(u32),",
        "  C {",
        "    x: &'a str,",
        "  },",
        "}",
      ].join("\n")
    );
  });

  it("parses unions, aliases and constants", () => {
    expect(roundTrip("#[repr(C)] pub union Bits { i: u32, f: f32 }")).to.equal(
      ["#[repr(C)]", "pub union Bits {", "  i: u32,", "  f: f32,", "}"].join("\n")
    );
    expect(roundTrip("pub type Callback<T> = Option<fn(T)>;")).to.equal("pub type Callback<T> = Option<fn(T)>;");
    expect(roundTrip("pub const MAX_LEN: usize = 1 << 4;")).to.equal("pub const MAX_LEN: usize = 1 << 4;");
  });

  it("turns doc comments into doc attributes and drops function bodies", () => {
    const item = parseRustItem("/// Adds two numbers.\npub fn add(a: i32, b: i32) -> i32 { a + b }");
    expect(item.attrs).to.deep.equal([{ kind: "other", text: 'doc = " Adds two numbers."' }]);
    expect(writeRustItem(item)).to.equal('#[doc = " Adds two numbers."]\npub fn add(a: i32, b: i32) -> i32;');
  });

  it("reads cfg attributes as predicates", () => {
    const item = parseRustItem('#[cfg(all(unix, feature = "std"))]\nfn f();');
    expect(item.attrs).to.deep.equal([
      {
        kind: "cfg",
        predicate: {
          kind: "all",
          operands: [
            { kind: "other", text: "unix" },
            { kind: "feature", name: "std" },
          ],
        },
      },
    ]);
    expect(parseRustItem("#[cfg_attr(test, derive(Debug))]\nfn g();").attrs).to.deep.equal([
      { kind: "other", text: "cfg_attr(test, derive(Debug))" },
    ]);
  });

  it("parses function qualifiers, receivers and parameter patterns", () => {
    expect(roundTrip('pub unsafe extern "C" fn cb(f: extern "C" fn(i32) -> i32, _: usize);')).to.equal(
      'pub unsafe extern "C" fn cb(f: extern "C" fn(i32) -> i32, _: usize);'
    );
    expect(roundTrip("extern fn bare();")).to.equal('extern "C" fn bare();');
    expect(roundTrip("pub const fn zero() -> u8 { 0 }")).to.equal("pub const fn zero() -> u8;");
    expect(roundTrip("fn len(&'a self) -> usize;")).to.equal("fn len(&'a self) -> usize;");
    expect(roundTrip("fn take(mut n: u8, (a, b): (u8, u8));")).to.equal("fn take(mut n: u8, (a, b): (u8, u8));");
  });

  it("keeps generics and where clauses verbatim", () => {
    expect(roundTrip("pub fn first<T: Copy>(xs: *const T) -> T where T: Default { todo!() }")).to.equal(
      "pub fn first<T: Copy>(xs: *const T) -> T where T: Default;"
    );
  });

  it("skips comments and inner attributes", () => {
    const items = parseRustItems("#![allow(dead_code)]\n// a comment\n/* block /* nested */ */\nstruct A;\nstruct B;");
    expect(items.map((i) => i.name)).to.deep.equal(["A", "B"]);
  });

  it("parses types", () => {
    expect(emitType(parseRustType("&'static mut [u8; 4]"))).to.equal("&'static mut [u8; 4]");
    expect(emitType(parseRustType("(u8,)"))).to.equal("(u8,)");
    expect(emitType(parseRustType("(u8)"))).to.equal("u8");
    expect(emitType(parseRustType("()"))).to.equal("()");
    expect(emitType(parseRustType("Foo<'a, 3, -1, {N + 1}, Item = u8>"))).to.equal("Foo<'a, 3, -1, {N + 1}, Item = u8>");
    expect(emitType(parseRustType("for<'a> fn(&'a u8)"))).to.equal("fn(&'a u8)");
    expect(emitType(parseRustType("unsafe extern \"system\" fn(x: u32) -> !"))).to.equal(
      'unsafe extern "system" fn(u32) -> !'
    );
    expect(parseRustType("dyn Fn(u8) -> u8 + Send")).to.deep.equal({ kind: "opaque", text: "dyn Fn(u8) -> u8 + Send" });
    expect(parseRustType("<T as Iterator>::Item")).to.deep.equal({ kind: "opaque", text: "<T as Iterator>::Item" });
    expect(parseRustType("[T]").kind).to.equal("slice");
    expect(parseRustType("_").kind).to.equal("infer");
  });

  it("parses paths", () => {
    const path = parseRustPath("::std::ffi::c_char");
    expect(path.global).to.equal(true);
    expect(path.segments.map((s) => s.name)).to.deep.equal(["std", "ffi", "c_char"]);
    expect(emitPath(parseRustPath("Vec::<u8>"))).to.equal("Vec<u8>");
  });

  describe("errors", () => {
    const at = { file: "src/lib.rs", line: 3, column: 1 };

    it("rejects pub(in path) visibility", () => {
      expect(() => parseRustItem("pub(in crate::x) struct S;", at))
        .to.throw(FfiError, "unsupported visibility restriction 'pub(in ...)', found 'in' (declaration line 1, column 5)")
        .with.property("code", "FFI3001");
    });

    it("requires exactly one declaration per record", () => {
      expect(() => parseRustItem("struct A; struct B;")).to.throw(FfiError, "expected exactly one declaration, found 2");
      expect(() => parseRustItem("")).to.throw(FfiError, "expected exactly one declaration, found 0");
    });

    it("rejects parameter attributes and variadic function types", () => {
      expect(() => parseRustItem("fn f(#[unused] x: u8);")).to.throw(FfiError, "attributes on parameters are not supported");
      expect(() => parseRustType('extern "C" fn(u8, ...)')).to.throw(
        FfiError,
        "variadic function types are not supported"
      );
    });

    it("reports unterminated literals with their position", () => {
      expect(() => parseRustItem('const S: &str = "abc;', at)).to.throw(
        FfiError,
        "unterminated literal (declaration line 1, column 17) (at src/lib.rs:3:1)"
      );
    });

    it("rejects trailing input", () => {
      expect(() => parseRustType("u8 u16")).to.throw(FfiError, "unexpected trailing input after type 'u8 u16'");
      expect(() => parseRustPath("a::b c")).to.throw(FfiError, "unexpected trailing input after path 'a::b c'");
    });

    it("rejects unknown items", () => {
      expect(() => parseRustItem("impl Foo {}")).to.throw(
        FfiError,
        "expected a declaration (struct, enum, union, type, const or fn), found 'impl'"
      );
    });
  });
});
