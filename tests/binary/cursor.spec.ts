import { describe, expect, it } from "vitest";

import {
  ByteCursor,
  ByteWriter,
  PROFILE_1_0,
  PROFILE_2_1,
  PgfDecodeError,
  PgfErrorCode,
} from "../../src/index.js";
import { catchError } from "../fixtures/grammars/index.js";

const cursor = (bytes: number[], profile = PROFILE_1_0) =>
  new ByteCursor(Uint8Array.from(bytes), profile);

describe("ByteCursor", () => {
  it("reads big-endian fixed-width values", () => {
    const reader = cursor([0x01, 0x02, 0x00, 0x00, 0x01, 0x2c, 0xff, 0xff, 0xff, 0xfe]);

    expect(reader.readU16()).toBe(0x0102);
    expect(reader.readU32()).toBe(300);
    expect(reader.readI32()).toBe(-2);
    expect(reader.atEnd).toBe(true);
  });

  it("reads the same length from LEB128 and u32 encodings", () => {
    expect(cursor([0xac, 0x02]).readLength()).toBe(300);
    expect(cursor([0x00, 0x00, 0x01, 0x2c], PROFILE_2_1).readLength()).toBe(300);
    expect(cursor([0xff, 0xff, 0xff, 0xff, 0x0f]).readLength()).toBe(0xffffffff);
  });

  it("rejects variable-length values longer than five bytes", () => {
    const error = catchError(() => cursor([0x80, 0x80, 0x80, 0x80, 0x80, 0x01]).readLength());

    expect(error).toBeInstanceOf(PgfDecodeError);
    expect(error).toMatchObject({ code: PgfErrorCode.MalformedLength, offset: 0 });
  });

  it("rejects variable-length values above 32 bits", () => {
    const error = catchError(() => cursor([0xff, 0xff, 0xff, 0xff, 0x1f]).readLength());

    expect(error).toMatchObject({ code: PgfErrorCode.MalformedLength, offset: 0 });
  });

  it("reports the offset of a read past the end", () => {
    const reader = cursor([0x01, 0x02, 0x03]);
    reader.readU8();
    const error = catchError(() => reader.readU32());

    expect(error).toBeInstanceOf(PgfDecodeError);
    expect(error).toMatchObject({ code: PgfErrorCode.UnexpectedEof, offset: 1 });
    expect(reader.offset).toBe(1);
  });

  it("decodes UTF-8 strings and falls back to Latin-1", () => {
    expect(cursor([0x02, 0xc3, 0xa9]).readString()).toBe("é");
    expect(cursor([0x02, 0xe9, 0x74]).readString()).toBe("ét");
  });

  it("keeps a leading byte order mark", () => {
    const writer = new ByteWriter(PROFILE_1_0);
    writer.writeString("\uFEFFabc");
    const text = new ByteCursor(writer.toBytes(), PROFILE_1_0).readString();

    expect(text).toBe("\uFEFFabc");
    expect(text).toHaveLength(4);
  });

  it("rejects counts that cannot fit in the remaining bytes", () => {
    const error = catchError(() => cursor([0x05, 0x01, 0x02]).readCount());

    expect(error).toMatchObject({ code: PgfErrorCode.ImplausibleLength, offset: 0 });
    expect(cursor([0x02, 0x01, 0x02]).readCount()).toBe(2);
    expect(catchError(() => cursor([0x02, 0x01, 0x02, 0x03]).readCount(2))).toMatchObject({
      code: PgfErrorCode.ImplausibleLength,
    });
  });

  it("reads lists element by element", () => {
    const reader = cursor([0x02, 0x01, 0x61, 0x02, 0x62, 0x63]);

    expect(reader.readList((inner) => inner.readString())).toEqual(["a", "bc"]);
    expect(reader.atEnd).toBe(true);
  });

  it("bounds slices and keeps absolute offsets", () => {
    const reader = cursor([0x01, 0x02, 0x03, 0x04, 0x05]);
    reader.readU8();
    const slice = reader.slice(2);

    expect(reader.offset).toBe(3);
    expect(slice.offset).toBe(1);
    expect(slice.readU16()).toBe(0x0203);
    expect(slice.atEnd).toBe(true);
    expect(catchError(() => slice.readU8())).toMatchObject({
      code: PgfErrorCode.UnexpectedEof,
      offset: 3,
    });
    expect(reader.readU8()).toBe(0x04);
  });
});
