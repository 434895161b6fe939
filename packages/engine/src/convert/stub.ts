import { fail } from "../diagnostics.js";
import type { SourceLocation } from "../diagnostics.js";
import { identExpr, pathOf } from "../rust/ir.js";
import type { RustAttribute, RustBlock, RustExpr, RustFnItem, RustParam, RustType } from "../rust/ir.js";
import { staticizeLifetimes } from "../rust/types.js";
import type { ConversionContext, RustEdition } from "./context.js";
import { rewriteType } from "./type-rewriter.js";

export const RECEIVER_MESSAGE =
  "FFI functions cannot have receiver arguments (like 'self'). All parameters must be typed arguments for C compatibility.";

const TRANSMUTE = pathOf(["std", "mem", "transmute"]);

export function noMangleAttribute(edition: RustEdition): RustAttribute {
  return { kind: "other", text: edition === "2024" ? "unsafe(no_mangle)" : "no_mangle" };
}

function transmute(expr: RustExpr): RustExpr {
  return { kind: "unsafe", expr: { kind: "path_call", path: TRANSMUTE, args: [expr] } };
}

function keptOnStub(attr: RustAttribute): boolean {
  return attr.kind === "cfg" || /^doc\b/.test(attr.text);
}

/**
 * Builds the `extern "C"` function that forwards to `fn` in the source crate.
 *
 * Reference parameters become raw pointers and are re-borrowed for the call.
 * Arguments and results whose types differ from the source crate's are
 * passed through `std::mem::transmute`. Generic parameters are dropped, so
 * lifetimes left in the signature become `'static`.
 */
export function synthesizeStub(
  fn: RustFnItem,
  ctx: ConversionContext,
  edition: RustEdition,
  location: SourceLocation
): RustFnItem {
  const params: RustParam[] = [];
  const args: RustExpr[] = [];
  let needsUnsafe = fn.unsafe;

  fn.params.forEach((param, index) => {
    if (param.kind === "receiver") {
      fail("FFI2004", `${RECEIVER_MESSAGE} Function '${fn.name}' takes '${param.text}'.`, location);
    }
    const pattern = param.pattern;
    if (pattern.kind !== "ident") {
      const text = pattern.kind === "wild" ? "_" : pattern.text;
      fail(
        "FFI2005",
        `parameter ${index} of function '${fn.name}' binds pattern '${text}'; only plain identifiers are supported`,
        location
      );
    }

    const rewritten = rewriteType(param.type, ctx, `parameter ${index} of function '${fn.name}'`, location);
    params.push({
      kind: "typed",
      pattern: { kind: "ident", name: pattern.name, mut: false },
      type: staticizeLifetimes(rewritten.type),
    });

    let arg = identExpr(pattern.name);
    if (param.type.kind === "ref") {
      arg = { kind: "borrow", mut: param.type.mut, expr: { kind: "deref", expr: arg } };
      needsUnsafe = true;
    }
    if (rewritten.changed) {
      arg = transmute(arg);
      needsUnsafe = true;
    }
    args.push(arg);
  });

  const call: RustExpr = { kind: "path_call", path: pathOf([ctx.crateIdent, fn.name]), args };
  let ret: RustType | undefined;
  let body: RustBlock = { stmts: [], tail: call };
  if (fn.ret) {
    const rewritten = rewriteType(fn.ret, ctx, `return type of function '${fn.name}'`, location);
    ret = staticizeLifetimes(rewritten.type);
    if (rewritten.changed) {
      body = { stmts: [{ kind: "let", name: "result", init: call }], tail: transmute(identExpr("result")) };
      needsUnsafe = true;
    }
  }

  return {
    kind: "fn",
    attrs: [...fn.attrs.filter(keptOnStub), noMangleAttribute(edition)],
    vis: "pub",
    name: fn.name,
    const: false,
    unsafe: needsUnsafe,
    abi: "C",
    params,
    ret,
    body,
  };
}
