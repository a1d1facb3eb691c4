import { PgfDecodeError, PgfErrorCode } from "../errors.js";
import type { ByteCursor } from "../binary/cursor.js";
import type { AbstractSyntax, FunctionSignature } from "../grammar/types.js";
import { readFlags } from "./flags.js";

const MALFORMED = PgfErrorCode.MalformedAbstractSyntax;

interface FunctionRecord {
  readonly offset: number;
  readonly signature: FunctionSignature;
}

/**
 * Decodes the abstract syntax section. Every failure is fatal: nothing that
 * follows can be interpreted without the category set and function table.
 */
export function decodeAbstractSyntax(cursor: ByteCursor): AbstractSyntax {
  const nameOffset = cursor.offset;
  const name = cursor.readString();
  if (!name) {
    throw new PgfDecodeError(MALFORMED, "Abstract syntax name must be non-empty", nameOffset);
  }

  const startOffset = cursor.offset;
  const startCategory = cursor.readString();
  const flags = readFlags(cursor, MALFORMED);

  const categories: string[] = [];
  const categorySet = new Set<string>();
  cursor.readList((reader) => {
    const offset = reader.offset;
    const category = reader.readString();
    if (!category) {
      throw new PgfDecodeError(MALFORMED, "Category name must be non-empty", offset);
    }
    if (categorySet.has(category)) {
      throw new PgfDecodeError(MALFORMED, `Duplicate category "${category}"`, offset);
    }
    categorySet.add(category);
    categories.push(category);
  });

  if (!categorySet.has(startCategory)) {
    throw new PgfDecodeError(
      MALFORMED,
      `Start category "${startCategory}" is not a declared category`,
      startOffset
    );
  }

  const functions = new Map<string, FunctionSignature>();
  for (const { offset, signature } of cursor.readList(readFunction)) {
    if (functions.has(signature.name)) {
      throw new PgfDecodeError(MALFORMED, `Duplicate function "${signature.name}"`, offset);
    }
    for (const category of [...signature.args, signature.result]) {
      if (!categorySet.has(category)) {
        throw new PgfDecodeError(
          MALFORMED,
          `Function "${signature.name}" refers to unknown category "${category}"`,
          offset
        );
      }
    }
    functions.set(signature.name, signature);
  }

  return { name, startCategory, flags, categories, functions };
}

function readFunction(cursor: ByteCursor): FunctionRecord {
  const offset = cursor.offset;
  const name = cursor.readString();
  if (!name) {
    throw new PgfDecodeError(MALFORMED, "Function name must be non-empty", offset);
  }
  const arity = cursor.readLength();
  const args = cursor.readList((reader) => reader.readString());
  if (args.length !== arity) {
    throw new PgfDecodeError(
      MALFORMED,
      `Function "${name}" declares arity ${arity} but lists ${args.length} argument(s)`,
      offset
    );
  }
  const result = cursor.readString();
  const probability = cursor.readF64();
  return { offset, signature: { name, args, result, probability } };
}
