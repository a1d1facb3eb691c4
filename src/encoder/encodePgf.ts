import { profileForVersion } from "../binary/profile.js";
import type { PgfFormatVersion } from "../binary/profile.js";
import { ByteWriter } from "../binary/writer.js";
import { ParameterTag, SymbolTag } from "../decoder/concreteSyntax.js";
import { LiteralTag } from "../decoder/flags.js";
import type { Grammar } from "../grammar/grammar.js";
import type {
  AbstractSyntax,
  ConcreteSyntax,
  FlagValue,
  Flags,
  ParameterValue,
  PgfSymbol,
  PmcfgRule,
} from "../grammar/types.js";

export interface EncodeOptions {
  /** Wire format to write. Defaults to the stable 1.0 layout. */
  readonly version?: PgfFormatVersion;
}

/** Serializes a grammar into the binary layout `decodePgf` reads. */
export function encodePgf(grammar: Grammar, options: EncodeOptions = {}): Uint8Array {
  const profile = profileForVersion(options.version ?? "1.0");
  const writer = new ByteWriter(profile);
  writer.writeU16(profile.major);
  writer.writeU16(profile.minor);
  writeAbstract(writer, grammar.abstract);

  const concretes = [...grammar.concretes.values()];
  writer.writeLength(concretes.length);
  for (const concrete of concretes) {
    const block = new ByteWriter(profile);
    writeConcrete(block, concrete);
    writer.writeLength(block.byteLength);
    writer.writeBytes(block.toBytes());
  }
  return writer.toBytes();
}

function writeAbstract(writer: ByteWriter, abstract: AbstractSyntax): void {
  writer.writeString(abstract.name);
  writer.writeString(abstract.startCategory);
  writeFlags(writer, abstract.flags);
  writer.writeList(abstract.categories, (out, category) => out.writeString(category));
  writer.writeList([...abstract.functions.values()], (out, signature) => {
    out.writeString(signature.name);
    out.writeLength(signature.args.length);
    out.writeList(signature.args, (inner, arg) => inner.writeString(arg));
    out.writeString(signature.result);
    out.writeF64(signature.probability);
  });
}

function writeConcrete(writer: ByteWriter, concrete: ConcreteSyntax): void {
  writer.writeString(concrete.language);
  writeFlags(writer, concrete.flags);
  writer.writeList([...concrete.printNames], (out, [name, text]) => {
    out.writeString(name);
    out.writeString(text);
  });
  writer.writeList(concrete.literals, (out, literal) => out.writeString(literal));
  writer.writeList(concrete.sequences, (out, sequence) => {
    out.writeList(sequence, writeSymbol);
  });
  writer.writeList([...concrete.productions], (out, [category, rules]) => {
    out.writeString(category);
    out.writeList(rules, writeRule);
  });
}

function writeFlags(writer: ByteWriter, flags: Flags): void {
  writer.writeList([...flags], (out, [key, value]) => {
    out.writeString(key);
    writeLiteral(out, value);
  });
}

function writeLiteral(writer: ByteWriter, value: FlagValue): void {
  if (typeof value === "string") {
    writer.writeU8(LiteralTag.String);
    writer.writeString(value);
  } else if (Number.isInteger(value) && value >= -0x80000000 && value <= 0x7fffffff) {
    writer.writeU8(LiteralTag.Int);
    writer.writeI32(value);
  } else {
    writer.writeU8(LiteralTag.Float);
    writer.writeF64(value);
  }
}

function writeSymbol(writer: ByteWriter, symbol: PgfSymbol): void {
  switch (symbol.kind) {
    case "literal":
      writer.writeU8(SymbolTag.Literal);
      writer.writeLength(symbol.index);
      return;
    case "argument":
      writer.writeU8(SymbolTag.Argument);
      writer.writeLength(symbol.argument);
      writer.writeLength(symbol.field);
      return;
    case "choice":
      writer.writeU8(SymbolTag.Choice);
      writer.writeLength(symbol.argument);
      writer.writeLength(symbol.parameter);
      writer.writeList(symbol.alternatives, (out, alternative) => {
        out.writeList(alternative, writeSymbol);
      });
      return;
  }
}

function writeRule(writer: ByteWriter, rule: PmcfgRule): void {
  writer.writeString(rule.function);
  writer.writeList(rule.args, (out, arg) => out.writeString(arg));
  writer.writeList(rule.fields, (out, field) => out.writeLength(field));
  writer.writeList(rule.parameters, writeParameter);
}

function writeParameter(writer: ByteWriter, parameter: ParameterValue): void {
  if (parameter.kind === "constant") {
    writer.writeU8(ParameterTag.Constant);
    writer.writeLength(parameter.value);
  } else {
    writer.writeU8(ParameterTag.Inherit);
    writer.writeLength(parameter.argument);
    writer.writeLength(parameter.slot);
  }
}
