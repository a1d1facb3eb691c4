import { PgfDecodeError, PgfErrorCode } from "../errors.js";
import { profileForHeader } from "../binary/profile.js";
import type { FormatProfile } from "../binary/profile.js";

export const HEADER_SIZE = 4;

export interface PgfHeader {
  readonly major: number;
  readonly minor: number;
  readonly profile: FormatProfile;
}

/** Reads the two big-endian u16 version fields that open every PGF file. */
export function decodeHeader(bytes: Uint8Array): PgfHeader {
  if (bytes.length < HEADER_SIZE) {
    throw new PgfDecodeError(
      PgfErrorCode.MalformedHeader,
      `Input of ${bytes.length} byte(s) is too short for a PGF header`,
      0
    );
  }
  const view = new DataView(bytes.buffer, bytes.byteOffset, HEADER_SIZE);
  const major = view.getUint16(0, false);
  const minor = view.getUint16(2, false);
  const profile = profileForHeader(major, minor);
  if (!profile) {
    throw new PgfDecodeError(
      PgfErrorCode.UnsupportedVersion,
      `Unsupported PGF format version ${major}.${minor}`,
      0
    );
  }
  return { major, minor, profile };
}
