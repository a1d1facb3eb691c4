import { PgfDecodeError, PgfErrorCode } from "../errors.js";
import type { ByteCursor } from "../binary/cursor.js";
import type {
  AbstractSyntax,
  ConcreteSyntax,
  ParameterValue,
  PgfSymbol,
  PmcfgRule,
  Sequence,
  SimpleSymbol,
} from "../grammar/types.js";
import { readFlags } from "./flags.js";
import { indexConcreteSyntax } from "./validateConcrete.js";
import type { RuleRecord } from "./validateConcrete.js";

const MALFORMED = PgfErrorCode.MalformedConcreteSyntax;

export enum SymbolTag {
  Literal = 0,
  Argument = 1,
  Choice = 2,
}

export enum ParameterTag {
  Constant = 0,
  Inherit = 1,
}

/**
 * Decodes one language block. The cursor must be bounded to exactly the
 * block payload; bytes left over after the production table are an error.
 */
export function decodeConcreteSyntax(
  cursor: ByteCursor,
  abstract: AbstractSyntax,
  onLanguage?: (language: string) => void
): ConcreteSyntax {
  const languageOffset = cursor.offset;
  const language = cursor.readString();
  if (!language) {
    throw new PgfDecodeError(MALFORMED, "Language identifier must be non-empty", languageOffset);
  }
  onLanguage?.(language);

  const flags = readFlags(cursor, MALFORMED);
  const printNames = readPrintNames(cursor, abstract);
  const literals = cursor.readList((reader) => reader.readString());
  const sequences = cursor.readList((reader) => readSequence(reader, literals));
  const records = readProductions(cursor, abstract, sequences);

  if (!cursor.atEnd) {
    throw new PgfDecodeError(
      MALFORMED,
      `${cursor.remaining} unread byte(s) at the end of language block "${language}"`,
      cursor.offset
    );
  }

  return indexConcreteSyntax({ language, flags, printNames, literals, sequences }, records);
}

function readPrintNames(cursor: ByteCursor, abstract: AbstractSyntax): Map<string, string> {
  const printNames = new Map<string, string>();
  cursor.readList((reader) => {
    const offset = reader.offset;
    const name = reader.readString();
    const text = reader.readString();
    if (!abstract.functions.has(name) && !abstract.categories.includes(name)) {
      throw new PgfDecodeError(MALFORMED, `Print name for unknown identifier "${name}"`, offset);
    }
    printNames.set(name, text);
  });
  return printNames;
}

function readSequence(cursor: ByteCursor, literals: readonly string[]): Sequence {
  return cursor.readList((reader) => readSymbol(reader, literals));
}

function readSymbol(cursor: ByteCursor, literals: readonly string[]): PgfSymbol {
  const offset = cursor.offset;
  const tag = cursor.readU8();
  if (tag === SymbolTag.Choice) {
    const argument = cursor.readLength();
    const parameter = cursor.readLength();
    const alternatives = cursor.readList((reader) =>
      reader.readList((inner) => readSimpleSymbol(inner, literals))
    );
    if (alternatives.length === 0) {
      throw new PgfDecodeError(MALFORMED, "Parameter choice has no alternatives", offset);
    }
    return { kind: "choice", argument, parameter, alternatives };
  }
  return readTaggedSimpleSymbol(cursor, tag, offset, literals);
}

function readSimpleSymbol(cursor: ByteCursor, literals: readonly string[]): SimpleSymbol {
  const offset = cursor.offset;
  const tag = cursor.readU8();
  return readTaggedSimpleSymbol(cursor, tag, offset, literals);
}

function readTaggedSimpleSymbol(
  cursor: ByteCursor,
  tag: number,
  offset: number,
  literals: readonly string[]
): SimpleSymbol {
  switch (tag) {
    case SymbolTag.Literal: {
      const index = cursor.readLength();
      const token = literals[index];
      if (token === undefined) {
        throw new PgfDecodeError(
          MALFORMED,
          `Literal index ${index} is outside the literal table of ${literals.length} entr${literals.length === 1 ? "y" : "ies"}`,
          offset
        );
      }
      return { kind: "literal", index, token };
    }
    case SymbolTag.Argument: {
      const argument = cursor.readLength();
      const field = cursor.readLength();
      return { kind: "argument", argument, field };
    }
    case SymbolTag.Choice:
      throw new PgfDecodeError(MALFORMED, "Parameter choices cannot be nested", offset);
    default:
      throw new PgfDecodeError(MALFORMED, `Unknown symbol tag ${tag}`, offset);
  }
}

function readProductions(
  cursor: ByteCursor,
  abstract: AbstractSyntax,
  sequences: readonly Sequence[]
): RuleRecord[] {
  const records: RuleRecord[] = [];
  const seen = new Set<string>();
  cursor.readList((reader) => {
    const offset = reader.offset;
    const category = reader.readString();
    if (!abstract.categories.includes(category)) {
      throw new PgfDecodeError(MALFORMED, `Productions for unknown category "${category}"`, offset);
    }
    if (seen.has(category)) {
      throw new PgfDecodeError(MALFORMED, `Duplicate production table for "${category}"`, offset);
    }
    seen.add(category);
    reader.readList((ruleReader) => {
      records.push(readRule(ruleReader, category, abstract, sequences));
    });
  });
  return records;
}

function readRule(
  cursor: ByteCursor,
  category: string,
  abstract: AbstractSyntax,
  sequences: readonly Sequence[]
): RuleRecord {
  const offset = cursor.offset;
  const name = cursor.readString();
  const signature = abstract.functions.get(name);
  if (!signature) {
    throw new PgfDecodeError(MALFORMED, `Rule for unknown function "${name}"`, offset);
  }
  if (signature.result !== category) {
    throw new PgfDecodeError(
      MALFORMED,
      `Function "${name}" returns "${signature.result}" but is listed under "${category}"`,
      offset
    );
  }

  const args = cursor.readList((reader) => reader.readString());
  const argsMatch =
    args.length === signature.args.length &&
    args.every((arg, index) => arg === signature.args[index]);
  if (!argsMatch) {
    throw new PgfDecodeError(
      MALFORMED,
      `Rule arguments (${args.join(", ")}) do not match the signature of "${name}" (${signature.args.join(", ")})`,
      offset
    );
  }

  const fields = cursor.readList((reader) => {
    const fieldOffset = reader.offset;
    const index = reader.readLength();
    if (index >= sequences.length) {
      throw new PgfDecodeError(
        MALFORMED,
        `Sequence index ${index} is outside the sequence table of ${sequences.length} entr${sequences.length === 1 ? "y" : "ies"}`,
        fieldOffset
      );
    }
    return index;
  });

  const parameters = cursor.readList(readParameter);
  const rule: PmcfgRule = { category, function: name, args, fields, parameters };
  return { offset, rule };
}

function readParameter(cursor: ByteCursor): ParameterValue {
  const offset = cursor.offset;
  const tag = cursor.readU8();
  switch (tag) {
    case ParameterTag.Constant:
      return { kind: "constant", value: cursor.readLength() };
    case ParameterTag.Inherit: {
      const argument = cursor.readLength();
      const slot = cursor.readLength();
      return { kind: "inherit", argument, slot };
    }
    default:
      throw new PgfDecodeError(MALFORMED, `Unknown parameter tag ${tag}`, offset);
  }
}
