import { PgfDecodeError, PgfErrorCode } from "../errors.js";
import type { FormatProfile, LengthSource } from "./profile.js";

const LITTLE_ENDIAN = false;

const utf8 = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true });

export interface ByteCursorOptions {
  /** First readable byte (inclusive). Defaults to 0. */
  start?: number;
  /** End of the readable window (exclusive). Defaults to the buffer length. */
  end?: number;
  /**
   * Smallest encoded size of one list element, used to reject element counts
   * that cannot fit in the remaining bytes. Defaults to 1.
   */
  minElementSize?: number;
}

export type ElementReader<T> = (cursor: ByteCursor, index: number) => T;

/**
 * Forward-only reader over an immutable byte buffer. Offsets reported in
 * errors are absolute positions in the underlying buffer, so sub-cursors
 * created with {@link ByteCursor.slice} still point at the original input.
 */
export class ByteCursor implements LengthSource {
  readonly profile: FormatProfile;
  private readonly bytes: Uint8Array;
  private readonly view: DataView;
  private readonly end: number;
  private readonly minElementSize: number;
  private position: number;

  constructor(bytes: Uint8Array, profile: FormatProfile, options: ByteCursorOptions = {}) {
    const start = options.start ?? 0;
    const end = options.end ?? bytes.length;
    if (!Number.isInteger(start) || start < 0 || start > bytes.length) {
      throw new RangeError(`Cursor start ${start} is outside the buffer`);
    }
    if (!Number.isInteger(end) || end < start || end > bytes.length) {
      throw new RangeError(`Cursor end ${end} is outside the buffer`);
    }
    this.bytes = bytes;
    this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
    this.profile = profile;
    this.position = start;
    this.end = end;
    this.minElementSize = Math.max(1, options.minElementSize ?? 1);
  }

  get offset(): number {
    return this.position;
  }

  get remaining(): number {
    return this.end - this.position;
  }

  get atEnd(): boolean {
    return this.position >= this.end;
  }

  readU8(): number {
    this.assertAvailable(1);
    const value = this.view.getUint8(this.position);
    this.position += 1;
    return value;
  }

  readU16(): number {
    this.assertAvailable(2);
    const value = this.view.getUint16(this.position, LITTLE_ENDIAN);
    this.position += 2;
    return value;
  }

  readU32(): number {
    this.assertAvailable(4);
    const value = this.view.getUint32(this.position, LITTLE_ENDIAN);
    this.position += 4;
    return value;
  }

  readI32(): number {
    this.assertAvailable(4);
    const value = this.view.getInt32(this.position, LITTLE_ENDIAN);
    this.position += 4;
    return value;
  }

  readF64(): number {
    this.assertAvailable(8);
    const value = this.view.getFloat64(this.position, LITTLE_ENDIAN);
    this.position += 8;
    return value;
  }

  readBytes(length: number): Uint8Array {
    this.assertAvailable(length);
    const value = this.bytes.subarray(this.position, this.position + length);
    this.position += length;
    return value;
  }

  /** Reads a length using the encoding of the active format profile. */
  readLength(): number {
    return this.profile.readLength(this);
  }

  /**
   * Reads a length-prefixed string. Bytes that are not valid UTF-8 are mapped
   * one byte per code point (Latin-1) instead of failing.
   */
  readString(): string {
    const length = this.readLength();
    const raw = this.readBytes(length);
    try {
      return utf8.decode(raw);
    } catch (error) {
      if (!(error instanceof TypeError)) {
        throw error;
      }
      return decodeLatin1(raw);
    }
  }

  /**
   * Reads an element count and rejects it when that many elements of at least
   * `minElementSize` bytes cannot fit in what is left of the window.
   */
  readCount(minElementSize = this.minElementSize): number {
    const start = this.position;
    const count = this.readLength();
    const ceiling = Math.floor(this.remaining / Math.max(1, minElementSize));
    if (count > ceiling) {
      throw new PgfDecodeError(
        PgfErrorCode.ImplausibleLength,
        `Count of ${count} element(s) cannot fit in the ${this.remaining} byte(s) remaining`,
        start
      );
    }
    return count;
  }

  readList<T>(readElement: ElementReader<T>, minElementSize = this.minElementSize): T[] {
    const count = this.readCount(minElementSize);
    const items: T[] = [];
    for (let index = 0; index < count; index += 1) {
      items.push(readElement(this, index));
    }
    return items;
  }

  /**
   * Returns a cursor bounded to the next `length` bytes and advances past them,
   * whether or not the caller finishes reading the slice.
   */
  slice(length: number): ByteCursor {
    this.assertAvailable(length);
    const start = this.position;
    this.position += length;
    return new ByteCursor(this.bytes, this.profile, {
      start,
      end: start + length,
      minElementSize: this.minElementSize,
    });
  }

  private assertAvailable(length: number): void {
    if (!Number.isInteger(length) || length < 0) {
      throw new RangeError(`Read length must be a non-negative integer, got ${length}`);
    }
    if (length > this.remaining) {
      throw new PgfDecodeError(
        PgfErrorCode.UnexpectedEof,
        `Read of ${length} byte(s) exceeds the ${this.remaining} byte(s) remaining`,
        this.position
      );
    }
  }
}

function decodeLatin1(raw: Uint8Array): string {
  let text = "";
  for (const byte of raw) {
    text += String.fromCharCode(byte);
  }
  return text;
}
