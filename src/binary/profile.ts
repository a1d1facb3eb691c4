import { PgfDecodeError, PgfErrorCode } from "../errors.js";

export type PgfFormatVersion = "1.0" | "2.1";

/** Minimal byte source a length encoding reads from. */
export interface LengthSource {
  readonly offset: number;
  readU8(): number;
  readU32(): number;
}

/** Minimal byte sink a length encoding writes to. */
export interface LengthSink {
  writeU8(value: number): void;
  writeU32(value: number): void;
}

/**
 * Version-specific wire choices, selected once from the file header and carried
 * by every cursor and writer that touches version-sensitive data.
 */
export interface FormatProfile {
  readonly version: PgfFormatVersion;
  readonly major: number;
  readonly minor: number;
  readLength(source: LengthSource): number;
  writeLength(sink: LengthSink, value: number): void;
}

const MAX_LENGTH = 0xffffffff;
const MAX_LEB128_BYTES = 5;

function assertLength(value: number): void {
  if (!Number.isInteger(value) || value < 0 || value > MAX_LENGTH) {
    throw new RangeError(`Length must be an integer between 0 and ${MAX_LENGTH}`);
  }
}

function readLeb128(source: LengthSource): number {
  const start = source.offset;
  let result = 0;
  let scale = 1;
  for (let index = 0; index < MAX_LEB128_BYTES; index += 1) {
    const byte = source.readU8();
    result += (byte & 0x7f) * scale;
    if ((byte & 0x80) === 0) {
      if (result > MAX_LENGTH) {
        throw new PgfDecodeError(
          PgfErrorCode.MalformedLength,
          `Variable-length value ${result} exceeds 32 bits`,
          start
        );
      }
      return result;
    }
    scale *= 0x80;
  }
  throw new PgfDecodeError(
    PgfErrorCode.MalformedLength,
    `Variable-length value is longer than ${MAX_LEB128_BYTES} bytes`,
    start
  );
}

function writeLeb128(sink: LengthSink, value: number): void {
  assertLength(value);
  let remaining = value;
  do {
    let byte = remaining % 0x80;
    remaining = Math.floor(remaining / 0x80);
    if (remaining > 0) {
      byte |= 0x80;
    }
    sink.writeU8(byte);
  } while (remaining > 0);
}

export const PROFILE_1_0: FormatProfile = {
  version: "1.0",
  major: 1,
  minor: 0,
  readLength: readLeb128,
  writeLength: writeLeb128,
};

/** Experimental layout: every length is a fixed big-endian u32. */
export const PROFILE_2_1: FormatProfile = {
  version: "2.1",
  major: 2,
  minor: 1,
  readLength: (source: LengthSource) => source.readU32(),
  writeLength: (sink: LengthSink, value: number) => {
    assertLength(value);
    sink.writeU32(value);
  },
};

const PROFILES: readonly FormatProfile[] = [PROFILE_1_0, PROFILE_2_1];

export function profileForHeader(major: number, minor: number): FormatProfile | undefined {
  return PROFILES.find((profile) => profile.major === major && profile.minor === minor);
}

export function profileForVersion(version: PgfFormatVersion): FormatProfile {
  return version === "2.1" ? PROFILE_2_1 : PROFILE_1_0;
}
