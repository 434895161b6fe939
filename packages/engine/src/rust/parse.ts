import { parsePredicate } from "../cfg/predicate.js";
import { fail } from "../diagnostics.js";
import type { SourceLocation } from "../diagnostics.js";
import type {
  RustAttribute,
  RustField,
  RustFields,
  RustGenericArg,
  RustItem,
  RustParam,
  RustPath,
  RustPathSegment,
  RustPattern,
  RustType,
  RustVariant,
  RustVisibility,
} from "./ir.js";

type TokenKind = "ident" | "lifetime" | "literal" | "punct" | "doc" | "eof";

type Token = {
  readonly kind: TokenKind;
  readonly text: string;
  readonly start: number;
  readonly end: number;
};

const MERGED_PUNCT = ["::", "->", "=>"] as const;

function isIdentStart(ch: string): boolean {
  return /[A-Za-z_]/.test(ch);
}

function isIdentPart(ch: string): boolean {
  return /[A-Za-z0-9_]/.test(ch);
}

function lineColumn(text: string, pos: number): string {
  let line = 1;
  let col = 1;
  for (let i = 0; i < pos && i < text.length; i++) {
    if (text.charCodeAt(i) === 10 /* \n */) {
      line++;
      col = 1;
    } else {
      col++;
    }
  }
  return `declaration line ${line}, column ${col}`;
}

function tokenize(src: string, location: SourceLocation | undefined): Token[] {
  const tokens: Token[] = [];
  function err(message: string, pos: number): never {
    return fail("FFI3001", `${message} (${lineColumn(src, pos)})`, location);
  }

  const readQuoted = (start: number, quote: string): number => {
    let i = start + 1;
    while (i < src.length) {
      const ch = src.charAt(i);
      if (ch === "\\") {
        i += 2;
        continue;
      }
      if (ch === quote) return i + 1;
      i++;
    }
    return err("unterminated literal", start);
  };

  let i = 0;
  while (i < src.length) {
    const ch = src.charAt(i);
    const next = src.charAt(i + 1);

    if (/\s/.test(ch)) {
      i++;
      continue;
    }

    if (ch === "/" && next === "/") {
      const eol = src.indexOf("\n", i);
      const end = eol === -1 ? src.length : eol;
      const isDoc = src.startsWith("///", i) && !src.startsWith("////", i);
      if (isDoc) tokens.push({ kind: "doc", text: src.slice(i + 3, end).replace(/\r$/, ""), start: i, end });
      i = end;
      continue;
    }

    if (ch === "/" && next === "*") {
      const start = i;
      let depth = 0;
      while (i < src.length) {
        if (src.startsWith("/*", i)) {
          depth++;
          i += 2;
        } else if (src.startsWith("*/", i)) {
          depth--;
          i += 2;
          if (depth === 0) break;
        } else {
          i++;
        }
      }
      if (depth !== 0) err("unterminated block comment", start);
      const isDoc = src.startsWith("/**", start) && !src.startsWith("/***", start) && !src.startsWith("/**/", start);
      if (isDoc) tokens.push({ kind: "doc", text: src.slice(start + 3, i - 2), start, end: i });
      continue;
    }

    // Raw and byte strings: r"..", r#".."#, b"..", br"..".
    const raw = /^b?r(#*)"/.exec(src.slice(i, i + 260));
    if (raw) {
      const hashes = raw[1] ?? "";
      const close = src.indexOf(`"${hashes}`, i + raw[0].length);
      if (close === -1) err("unterminated raw string", i);
      const end = close + 1 + hashes.length;
      tokens.push({ kind: "literal", text: src.slice(i, end), start: i, end });
      i = end;
      continue;
    }
    if (ch === "b" && (next === '"' || next === "'")) {
      const end = readQuoted(i + 1, next);
      tokens.push({ kind: "literal", text: src.slice(i, end), start: i, end });
      i = end;
      continue;
    }

    if (isIdentStart(ch) || (ch === "r" && next === "#" && isIdentStart(src.charAt(i + 2)))) {
      let j = ch === "r" && next === "#" ? i + 2 : i;
      while (j < src.length && isIdentPart(src.charAt(j))) j++;
      tokens.push({ kind: "ident", text: src.slice(i, j), start: i, end: j });
      i = j;
      continue;
    }

    if (ch === "'") {
      if (isIdentStart(next) && src.charAt(i + 2) !== "'") {
        let j = i + 1;
        while (j < src.length && isIdentPart(src.charAt(j))) j++;
        tokens.push({ kind: "lifetime", text: src.slice(i + 1, j), start: i, end: j });
        i = j;
        continue;
      }
      const end = readQuoted(i, "'");
      tokens.push({ kind: "literal", text: src.slice(i, end), start: i, end });
      i = end;
      continue;
    }

    if (ch === '"') {
      const end = readQuoted(i, '"');
      tokens.push({ kind: "literal", text: src.slice(i, end), start: i, end });
      i = end;
      continue;
    }

    if (/[0-9]/.test(ch)) {
      let j = i + 1;
      while (j < src.length) {
        const c = src.charAt(j);
        if (isIdentPart(c) || (c === "." && /[0-9]/.test(src.charAt(j + 1)))) j++;
        else break;
      }
      tokens.push({ kind: "literal", text: src.slice(i, j), start: i, end: j });
      i = j;
      continue;
    }

    const merged = MERGED_PUNCT.find((p) => src.startsWith(p, i));
    const text = merged ?? ch;
    tokens.push({ kind: "punct", text, start: i, end: i + text.length });
    i += text.length;
  }
  tokens.push({ kind: "eof", text: "", start: src.length, end: src.length });
  return tokens;
}

const OPENERS: ReadonlySet<string> = new Set(["(", "[", "{"]);
const CLOSERS: ReadonlySet<string> = new Set([")", "]", "}"]);

class DeclarationParser {
  private pos = 0;

  constructor(
    private readonly source: string,
    private readonly tokens: readonly Token[],
    private readonly location: SourceLocation | undefined
  ) {}

  private peek(offset = 0): Token {
    const last = this.tokens[this.tokens.length - 1];
    const tok = this.tokens[this.pos + offset] ?? last;
    if (!tok) return { kind: "eof", text: "", start: this.source.length, end: this.source.length };
    return tok;
  }

  private next(): Token {
    const tok = this.peek();
    if (tok.kind !== "eof") this.pos++;
    return tok;
  }

  atEnd(): boolean {
    return this.peek().kind === "eof";
  }

  private isPunct(text: string, offset = 0): boolean {
    const tok = this.peek(offset);
    return tok.kind === "punct" && tok.text === text;
  }

  private isIdent(text: string, offset = 0): boolean {
    const tok = this.peek(offset);
    return tok.kind === "ident" && tok.text === text;
  }

  private eatPunct(text: string): boolean {
    if (!this.isPunct(text)) return false;
    this.pos++;
    return true;
  }

  private eatIdent(text: string): boolean {
    if (!this.isIdent(text)) return false;
    this.pos++;
    return true;
  }

  private error(message: string, tok: Token = this.peek()): never {
    const found = tok.kind === "eof" ? "end of input" : `'${tok.text}'`;
    return fail("FFI3001", `${message}, found ${found} (${lineColumn(this.source, tok.start)})`, this.location);
  }

  private expectPunct(text: string): void {
    if (!this.eatPunct(text)) this.error(`expected '${text}'`);
  }

  private expectIdent(what: string): string {
    const tok = this.peek();
    if (tok.kind !== "ident") return this.error(`expected ${what}`);
    this.pos++;
    return tok.text;
  }

  private sliceFrom(startIndex: number): string {
    const first = this.tokens[startIndex];
    const last = this.tokens[this.pos - 1];
    if (!first || !last || this.pos <= startIndex) return "";
    return this.source.slice(first.start, last.end);
  }

  // Index of the delimiter closing the one at `index`.
  private matching(index: number): number {
    let depth = 0;
    for (let i = index; i < this.tokens.length; i++) {
      const tok = this.tokens[i];
      if (!tok || tok.kind === "eof") break;
      if (tok.kind !== "punct") continue;
      if (OPENERS.has(tok.text)) depth++;
      else if (CLOSERS.has(tok.text)) {
        depth--;
        if (depth === 0) return i;
      }
    }
    return this.error("unbalanced delimiter", this.tokens[index]);
  }

  private skipDelimited(): void {
    this.pos = this.matching(this.pos) + 1;
  }

  private skipAngles(): void {
    let depth = 0;
    do {
      const tok = this.next();
      if (tok.kind === "eof") this.error("unbalanced '<'", tok);
      if (tok.kind !== "punct") continue;
      if (tok.text === "<") depth++;
      else if (tok.text === ">") depth--;
      else if (OPENERS.has(tok.text)) this.pos = this.matching(this.pos - 1) + 1;
    } while (depth > 0);
  }

  // Verbatim expression text up to (not including) one of `stops` at depth 0.
  private verbatimUntil(stops: readonly string[], what: string): string {
    const start = this.pos;
    while (!this.atEnd()) {
      const tok = this.peek();
      if (tok.kind === "punct" && stops.includes(tok.text)) break;
      if (tok.kind === "punct" && OPENERS.has(tok.text)) {
        this.skipDelimited();
        continue;
      }
      this.pos++;
    }
    const text = this.sliceFrom(start);
    if (text.length === 0) this.error(`expected ${what}`);
    return text;
  }

  parseItem(): RustItem {
    const attrs = this.parseAttributes();
    const vis = this.parseVisibility();

    if (this.eatIdent("struct")) {
      const name = this.expectIdent("a struct name");
      const generics = this.parseGenerics();
      if (this.isPunct("(")) {
        const fields = this.parseTupleFields();
        const whereClause = this.parseWhere();
        this.expectPunct(";");
        return { kind: "struct", attrs, vis, name, generics, whereClause, fields };
      }
      const whereClause = this.parseWhere();
      if (this.eatPunct(";")) return { kind: "struct", attrs, vis, name, generics, whereClause, fields: { kind: "unit" } };
      return { kind: "struct", attrs, vis, name, generics, whereClause, fields: this.parseNamedFields() };
    }

    if (this.eatIdent("enum")) {
      const name = this.expectIdent("an enum name");
      const generics = this.parseGenerics();
      const whereClause = this.parseWhere();
      return { kind: "enum", attrs, vis, name, generics, whereClause, variants: this.parseVariants() };
    }

    if (this.isIdent("union") && this.peek(1).kind === "ident") {
      this.next();
      const name = this.expectIdent("a union name");
      const generics = this.parseGenerics();
      const whereClause = this.parseWhere();
      const fields = this.parseNamedFields();
      return { kind: "union", attrs, vis, name, generics, whereClause, fields: fields.fields };
    }

    if (this.eatIdent("type")) {
      const name = this.expectIdent("a type alias name");
      const generics = this.parseGenerics();
      this.expectPunct("=");
      const type = this.parseType();
      this.expectPunct(";");
      return { kind: "type_alias", attrs, vis, name, generics, type };
    }

    if (this.isIdent("const") && this.peek(1).kind === "ident" && this.isPunct(":", 2)) {
      this.next();
      const name = this.expectIdent("a constant name");
      this.expectPunct(":");
      const type = this.parseType();
      this.expectPunct("=");
      const value = this.verbatimUntil([";"], "a constant value");
      this.expectPunct(";");
      return { kind: "const", attrs, vis, name, type, value: { kind: "verbatim", text: value } };
    }

    return this.parseFn(attrs, vis);
  }

  private parseFn(attrs: readonly RustAttribute[], vis: RustVisibility): RustItem {
    let isConst = false;
    let isUnsafe = false;
    let abi: string | undefined;
    for (;;) {
      if (this.eatIdent("const")) isConst = true;
      else if (this.eatIdent("async")) continue;
      else if (this.eatIdent("unsafe")) isUnsafe = true;
      else if (this.eatIdent("extern")) abi = this.parseAbi();
      else break;
    }
    if (!this.eatIdent("fn")) this.error("expected a declaration (struct, enum, union, type, const or fn)");
    const name = this.expectIdent("a function name");
    const generics = this.parseGenerics();
    const params = this.parseParams();
    const ret = this.eatPunct("->") ? this.parseType() : undefined;
    const whereClause = this.parseWhere();
    if (this.isPunct("{")) this.skipDelimited();
    else this.expectPunct(";");
    return { kind: "fn", attrs, vis, name, generics, whereClause, const: isConst, unsafe: isUnsafe, abi, params, ret };
  }

  private parseAbi(): string {
    const tok = this.peek();
    if (tok.kind === "literal" && tok.text.startsWith('"')) {
      this.next();
      return tok.text.slice(1, -1);
    }
    return "C";
  }

  private parseAttributes(): RustAttribute[] {
    const attrs: RustAttribute[] = [];
    for (;;) {
      const tok = this.peek();
      if (tok.kind === "doc") {
        this.next();
        attrs.push({ kind: "other", text: `doc = ${JSON.stringify(tok.text)}` });
        continue;
      }
      if (!this.isPunct("#")) return attrs;
      const inner = this.isPunct("!", 1);
      this.next();
      if (inner) this.next();
      if (!this.isPunct("[")) this.error("expected '[' after '#'");
      const open = this.pos;
      const close = this.matching(open);
      const attr = this.attributeBetween(open, close);
      this.pos = close + 1;
      if (!inner) attrs.push(attr);
    }
  }

  private attributeBetween(open: number, close: number): RustAttribute {
    const openTok = this.tokens[open];
    const closeTok = this.tokens[close];
    if (!openTok || !closeTok) return this.error("unterminated attribute");
    const text = this.source.slice(openTok.end, closeTok.start).trim();
    const head = this.tokens[open + 1];
    const paren = this.tokens[open + 2];
    if (head?.kind === "ident" && head.text === "cfg" && paren?.kind === "punct" && paren.text === "(") {
      const parenClose = this.matching(open + 2);
      const parenCloseTok = this.tokens[parenClose];
      if (parenClose === close - 1 && parenCloseTok) {
        return { kind: "cfg", predicate: parsePredicate(this.source.slice(paren.end, parenCloseTok.start)) };
      }
    }
    return { kind: "other", text };
  }

  private parseVisibility(): RustVisibility {
    if (!this.eatIdent("pub")) return "private";
    if (!this.isPunct("(")) return "pub";
    const scope = this.peek(1);
    if (scope.kind === "ident" && this.isPunct(")", 2)) {
      switch (scope.text) {
        case "crate":
        case "super":
        case "self":
          this.pos += 3;
          return `pub(${scope.text})`;
      }
    }
    if (scope.kind === "ident" && scope.text === "in") this.error("unsupported visibility restriction 'pub(in ...)'", scope);
    return "pub";
  }

  private parseGenerics(): string | undefined {
    if (!this.isPunct("<")) return undefined;
    const start = this.pos;
    this.skipAngles();
    return this.sliceFrom(start);
  }

  private parseWhere(): string | undefined {
    if (!this.isIdent("where")) return undefined;
    const start = this.pos;
    let angles = 0;
    while (!this.atEnd()) {
      const tok = this.peek();
      if (tok.kind === "punct") {
        if (angles === 0 && (tok.text === "{" || tok.text === ";" || tok.text === "=")) break;
        if (tok.text === "<") angles++;
        else if (tok.text === ">") angles--;
        else if (tok.text === "(" || tok.text === "[") {
          this.skipDelimited();
          continue;
        }
      }
      this.pos++;
    }
    return this.sliceFrom(start);
  }

  private parseNamedFields(): RustFields & { readonly kind: "named" } {
    this.expectPunct("{");
    const fields: RustField[] = [];
    while (!this.eatPunct("}")) {
      const attrs = this.parseAttributes();
      const vis = this.parseVisibility();
      const name = this.expectIdent("a field name");
      this.expectPunct(":");
      fields.push({ attrs, vis, name, type: this.parseType() });
      if (!this.eatPunct(",") && !this.isPunct("}")) this.error("expected ',' or '}' after field");
    }
    return { kind: "named", fields };
  }

  private parseTupleFields(): RustFields & { readonly kind: "tuple" } {
    this.expectPunct("(");
    const fields: RustField[] = [];
    while (!this.eatPunct(")")) {
      const attrs = this.parseAttributes();
      const vis = this.parseVisibility();
      fields.push({ attrs, vis, type: this.parseType() });
      if (!this.eatPunct(",") && !this.isPunct(")")) this.error("expected ',' or ')' after field");
    }
    return { kind: "tuple", fields };
  }

  private parseVariants(): RustVariant[] {
    this.expectPunct("{");
    const variants: RustVariant[] = [];
    while (!this.eatPunct("}")) {
      const attrs = this.parseAttributes();
      const name = this.expectIdent("a variant name");
      let fields: RustFields = { kind: "unit" };
      if (this.isPunct("(")) fields = this.parseTupleFields();
      else if (this.isPunct("{")) fields = this.parseNamedFields();
      const discriminant = this.eatPunct("=") ? this.verbatimUntil([",", "}"], "a discriminant") : undefined;
      variants.push({ attrs, name, fields, discriminant });
      if (!this.eatPunct(",") && !this.isPunct("}")) this.error("expected ',' or '}' after variant");
    }
    return variants;
  }

  private isReceiver(): boolean {
    let i = 0;
    if (this.isPunct("&", i)) {
      i++;
      if (this.peek(i).kind === "lifetime") i++;
    }
    if (this.isIdent("mut", i)) i++;
    return this.isIdent("self", i);
  }

  private parseParams(): RustParam[] {
    this.expectPunct("(");
    const params: RustParam[] = [];
    while (!this.eatPunct(")")) {
      if (this.isPunct("#")) this.error("attributes on parameters are not supported");
      const start = this.pos;
      if (this.isReceiver()) {
        while (!this.isIdent("self")) this.next();
        this.next();
        if (this.eatPunct(":")) this.parseType();
        params.push({ kind: "receiver", text: this.sliceFrom(start) });
      } else {
        const pattern = this.parsePattern();
        this.expectPunct(":");
        params.push({ kind: "typed", pattern, type: this.parseType() });
      }
      if (!this.eatPunct(",") && !this.isPunct(")")) this.error("expected ',' or ')' after parameter");
    }
    return params;
  }

  private parsePattern(): RustPattern {
    if (this.isIdent("_") && this.isPunct(":", 1)) {
      this.next();
      return { kind: "wild" };
    }
    const mut = this.isIdent("mut") && this.peek(1).kind === "ident" && this.isPunct(":", 2);
    if (mut) this.next();
    const tok = this.peek();
    if (tok.kind === "ident" && this.isPunct(":", 1)) {
      this.next();
      return { kind: "ident", name: tok.text, mut };
    }
    return { kind: "other", text: this.verbatimUntil([":"], "a parameter pattern") };
  }

  parseType(): RustType {
    const tok = this.peek();
    if (tok.kind === "punct") {
      switch (tok.text) {
        case "&": {
          this.next();
          const lifetimeTok = this.peek();
          const lifetime = lifetimeTok.kind === "lifetime" ? this.next().text : undefined;
          const mut = this.eatIdent("mut");
          const inner = this.parseType();
          return lifetime === undefined ? { kind: "ref", mut, inner } : { kind: "ref", mut, lifetime, inner };
        }
        case "*": {
          this.next();
          if (this.eatIdent("const")) return { kind: "ptr", mut: false, inner: this.parseType() };
          if (this.eatIdent("mut")) return { kind: "ptr", mut: true, inner: this.parseType() };
          return this.error("expected 'const' or 'mut' after '*'");
        }
        case "[": {
          this.next();
          const inner = this.parseType();
          if (this.eatPunct(";")) {
            const len = this.verbatimUntil(["]"], "an array length");
            this.expectPunct("]");
            return { kind: "array", inner, len };
          }
          this.expectPunct("]");
          return { kind: "slice", inner };
        }
        case "(": {
          this.next();
          const elems: RustType[] = [];
          let trailingComma = false;
          while (!this.isPunct(")")) {
            elems.push(this.parseType());
            trailingComma = this.eatPunct(",");
            if (!trailingComma) break;
          }
          this.expectPunct(")");
          const [only] = elems;
          if (elems.length === 1 && only && !trailingComma) return only;
          return { kind: "tuple", elems };
        }
        case "!":
          this.next();
          return { kind: "never" };
        case "<": {
          const start = this.pos;
          this.skipAngles();
          while (this.isPunct("::") && this.peek(1).kind === "ident") {
            this.pos += 2;
            if (this.isPunct("<")) this.skipAngles();
          }
          return { kind: "opaque", text: this.sliceFrom(start) };
        }
        case "::":
          return this.parsePathType();
      }
      return this.error("expected a type");
    }
    if (tok.kind !== "ident") return this.error("expected a type");

    switch (tok.text) {
      case "_":
        this.next();
        return { kind: "infer" };
      case "for":
        this.next();
        if (this.isPunct("<")) this.skipAngles();
        return this.parseType();
      case "unsafe":
      case "extern":
      case "fn":
        return this.parseBareFn();
      case "dyn":
      case "impl":
        return this.parseBounds();
    }
    return this.parsePathType();
  }

  private parseBareFn(): RustType {
    const isUnsafe = this.eatIdent("unsafe");
    const abi = this.eatIdent("extern") ? this.parseAbi() : undefined;
    if (!this.eatIdent("fn")) this.error("expected 'fn'");
    this.expectPunct("(");
    const params: RustType[] = [];
    while (!this.eatPunct(")")) {
      if (this.isPunct(".")) this.error("variadic function types are not supported");
      if ((this.peek().kind === "ident" || this.isIdent("_")) && this.isPunct(":", 1)) this.pos += 2;
      params.push(this.parseType());
      if (!this.eatPunct(",") && !this.isPunct(")")) this.error("expected ',' or ')' in function type");
    }
    const ret = this.eatPunct("->") ? this.parseType() : undefined;
    return abi === undefined ? { kind: "fn", unsafe: isUnsafe, params, ret } : { kind: "fn", unsafe: isUnsafe, abi, params, ret };
  }

  private parseBounds(): RustType {
    const start = this.pos;
    let angles = 0;
    while (!this.atEnd()) {
      const tok = this.peek();
      if (tok.kind === "punct") {
        if (tok.text === "<") angles++;
        else if (tok.text === ">") {
          if (angles === 0) break;
          angles--;
        } else if (tok.text === "(" || tok.text === "[") {
          this.skipDelimited();
          continue;
        } else if (angles === 0 && tok.text !== "+" && tok.text !== "::" && tok.text !== "->" && tok.text !== "?") {
          break;
        }
      }
      this.pos++;
    }
    return { kind: "opaque", text: this.sliceFrom(start) };
  }

  private parsePathType(): RustType {
    const start = this.pos;
    const path = this.parsePath();
    if (this.isPunct("!")) {
      this.next();
      if (!this.isPunct("(") && !this.isPunct("[") && !this.isPunct("{")) this.error("expected macro arguments");
      this.skipDelimited();
      return { kind: "opaque", text: this.sliceFrom(start) };
    }
    if (this.isPunct("(")) {
      // Fn(A) -> B sugar.
      this.skipDelimited();
      if (this.eatPunct("->")) this.parseType();
      return { kind: "opaque", text: this.sliceFrom(start) };
    }
    return { kind: "path", path };
  }

  parsePath(): RustPath {
    const global = this.eatPunct("::");
    const segments: RustPathSegment[] = [];
    for (;;) {
      const name = this.expectIdent("a path segment");
      let args: readonly RustGenericArg[] = [];
      if (this.isPunct("<")) args = this.parseGenericArgs();
      else if (this.isPunct("::") && this.isPunct("<", 1)) {
        this.next();
        args = this.parseGenericArgs();
      }
      segments.push({ name, args });
      if (this.isPunct("::") && this.peek(1).kind === "ident") {
        this.next();
        continue;
      }
      return { global, segments };
    }
  }

  private parseGenericArgs(): RustGenericArg[] {
    this.expectPunct("<");
    const args: RustGenericArg[] = [];
    while (!this.eatPunct(">")) {
      const tok = this.peek();
      if (tok.kind === "lifetime") {
        this.next();
        args.push({ kind: "lifetime", name: tok.text });
      } else if (tok.kind === "ident" && this.isPunct("=", 1)) {
        this.pos += 2;
        args.push({ kind: "binding", name: tok.text, type: this.parseType() });
      } else if (tok.kind === "literal") {
        this.next();
        args.push({ kind: "const", text: tok.text });
      } else if (this.isPunct("-") && this.peek(1).kind === "literal") {
        const start = this.pos;
        this.pos += 2;
        args.push({ kind: "const", text: this.sliceFrom(start) });
      } else if (this.isPunct("{")) {
        const start = this.pos;
        this.skipDelimited();
        args.push({ kind: "const", text: this.sliceFrom(start) });
      } else {
        args.push({ kind: "type", type: this.parseType() });
      }
      if (!this.eatPunct(",") && !this.isPunct(">")) this.error("expected ',' or '>' in generic arguments");
    }
    return args;
  }
}

function parserFor(text: string, location: SourceLocation | undefined): DeclarationParser {
  return new DeclarationParser(text, tokenize(text, location), location);
}

export function parseRustItems(text: string, location?: SourceLocation): RustItem[] {
  const parser = parserFor(text, location);
  const items: RustItem[] = [];
  while (!parser.atEnd()) items.push(parser.parseItem());
  return items;
}

/** Parses a record's content, which holds exactly one declaration. */
export function parseRustItem(text: string, location?: SourceLocation): RustItem {
  const items = parseRustItems(text, location);
  const [item] = items;
  if (!item || items.length !== 1) {
    return fail("FFI3001", `expected exactly one declaration, found ${items.length}`, location);
  }
  return item;
}

export function parseRustType(text: string, location?: SourceLocation): RustType {
  const parser = parserFor(text, location);
  const type = parser.parseType();
  if (!parser.atEnd()) fail("FFI3001", `unexpected trailing input after type '${text}'`, location);
  return type;
}

export function parseRustPath(text: string, location?: SourceLocation): RustPath {
  const parser = parserFor(text, location);
  const path = parser.parsePath();
  if (!parser.atEnd()) fail("FFI3001", `unexpected trailing input after path '${text}'`, location);
  return path;
}
