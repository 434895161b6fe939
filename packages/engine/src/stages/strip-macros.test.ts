import { expect } from "chai";

import { parseRustItem } from "../rust/parse.js";
import { writeRustItem } from "../rust/write.js";
import { stripMacros } from "./strip-macros.js";

describe("@ffistub/engine strip macros stage", () => {
  it("removes attribute macros on items, variants and fields", () => {
    const item = parseRustItem(
      [
        "#[serde(rename_all = \"camelCase\")]",
        "#[repr(C)]",
        "pub enum E {",
        "  #[serde(skip)] A,",
        "  B { #[serde(default)] #[doc = \"x\"] x: u8 },",
        "}",
      ].join("\n")
    );
    expect(writeRustItem(stripMacros(item, ["serde"]))).to.equal(
      ["#[repr(C)]", "pub enum E {", "  A,", "  B {", '    #[doc = "x"]', "    x: u8,", "  },", "}"].join("\n")
    );
  });

  it("matches any segment of a macro path", () => {
    const item = parseRustItem("#[my_tool::exported]\n#[inline]\npub fn f();");
    expect(writeRustItem(stripMacros(item, ["my_tool"]))).to.equal("#[inline]\npub fn f();");
  });
});
