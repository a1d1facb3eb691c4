import { PgfDecodeError } from "../errors.js";
import type { PgfErrorCode } from "../errors.js";
import type { ByteCursor } from "../binary/cursor.js";
import type { FlagValue } from "../grammar/types.js";

export enum LiteralTag {
  String = 0,
  Int = 1,
  Float = 2,
}

export function readLiteral(cursor: ByteCursor, malformed: PgfErrorCode): FlagValue {
  const start = cursor.offset;
  const tag = cursor.readU8();
  switch (tag) {
    case LiteralTag.String:
      return cursor.readString();
    case LiteralTag.Int:
      return cursor.readI32();
    case LiteralTag.Float:
      return cursor.readF64();
    default:
      throw new PgfDecodeError(malformed, `Unknown literal tag ${tag}`, start);
  }
}

/** A repeated key keeps its first position and takes the last value. */
export function readFlags(cursor: ByteCursor, malformed: PgfErrorCode): Map<string, FlagValue> {
  const flags = new Map<string, FlagValue>();
  cursor.readList((reader) => {
    const start = reader.offset;
    const key = reader.readString();
    if (!key) {
      throw new PgfDecodeError(malformed, "Flag name must be non-empty", start);
    }
    flags.set(key, readLiteral(reader, malformed));
  });
  return flags;
}
