import { isTypeItem } from "../rust/ir.js";
import type { SourcedItem } from "../rust/ir.js";
import { hasGenericArgs } from "../rust/types.js";
import { batching } from "../stages/batching.js";
import type { BatchingStep } from "../stages/batching.js";
import { emitAssertions } from "./assertions.js";
import { createConversionContext } from "./context.js";
import type { ConversionContext, ConverterOptions, RustEdition } from "./context.js";
import type { ExportedTypeIndex, PrimitiveTable } from "./exported-types.js";
import type { EquivalencePair } from "./pairs.js";
import { synthesizeStub } from "./stub.js";
import { rewriteTypeDeclaration } from "./type-rewriter.js";

export type ConverterPhase = "collect" | "convert" | "followup";

/**
 * Three-phase state machine over a declaration stream.
 *
 * - collect: reads the whole input once, indexing type names.
 * - convert: emits one rewritten declaration or stub per call.
 * - followup: emits the size and alignment assertions.
 *
 * Both emitting phases pop from the end, so output order is the reverse of
 * input order and must not be relied on. A converter is single-use.
 */
export class FfiConverter implements BatchingStep<SourcedItem, SourcedItem> {
  private state: ConverterPhase = "collect";
  private readonly ctx: ConversionContext;
  private readonly edition: RustEdition;
  private readonly collected: SourcedItem[] = [];
  private assertions: SourcedItem[] = [];

  constructor(options: ConverterOptions) {
    this.ctx = createConversionContext(options);
    this.edition = options.edition ?? "2021";
  }

  get phase(): ConverterPhase {
    return this.state;
  }

  get exportedTypes(): ExportedTypeIndex {
    return this.ctx.exportedTypes;
  }

  get primitives(): PrimitiveTable {
    return this.ctx.primitives;
  }

  get pendingPairs(): readonly EquivalencePair[] {
    return this.ctx.pairs.values();
  }

  call(source: Iterator<SourcedItem>): SourcedItem | undefined {
    for (;;) {
      switch (this.state) {
        case "collect":
          for (let next = source.next(); !next.done; next = source.next()) this.collect(next.value);
          this.state = "convert";
          break;
        case "convert": {
          const entry = this.collected.pop();
          if (entry) return this.convert(entry);
          this.assertions = emitAssertions(this.ctx.pairs.drain());
          this.state = "followup";
          break;
        }
        case "followup":
          return this.assertions.pop();
      }
    }
  }

  private collect(entry: SourcedItem): void {
    this.collected.push(entry);
    const [item] = entry;
    if (!isTypeItem(item)) return;
    this.ctx.exportedTypes.add(item.name, item.attrs);

    if (item.kind !== "type_alias" || item.type.kind !== "path" || hasGenericArgs(item.type.path)) return;
    const target = item.type.path.segments[item.type.path.segments.length - 1];
    const primitive = target ? this.ctx.primitives.resolve(target.name) : undefined;
    if (primitive === undefined) return;
    this.ctx.primitives.alias(item.name, primitive);
    this.ctx.primitives.alias(`${this.ctx.crateIdent}::${item.name}`, primitive);
  }

  private convert(entry: SourcedItem): SourcedItem {
    const [item, location] = entry;
    if (item.kind === "fn") return [synthesizeStub(item, this.ctx, this.edition, location), location];
    return [rewriteTypeDeclaration(item, this.ctx, location), location];
  }
}

export function convertItems(source: Iterable<SourcedItem>, options: ConverterOptions): Generator<SourcedItem, void, undefined> {
  return batching(source, new FfiConverter(options));
}
