import type { FormatProfile, LengthSink } from "./profile.js";

const LITTLE_ENDIAN = false;
const INITIAL_CAPACITY = 256;

const utf8 = new TextEncoder();

export type ElementWriter<T> = (writer: ByteWriter, item: T, index: number) => void;

/** Growable big-endian byte buffer, the write-side counterpart of ByteCursor. */
export class ByteWriter implements LengthSink {
  readonly profile: FormatProfile;
  private buffer: Uint8Array;
  private view: DataView;
  private length = 0;

  constructor(profile: FormatProfile) {
    this.profile = profile;
    this.buffer = new Uint8Array(INITIAL_CAPACITY);
    this.view = new DataView(this.buffer.buffer);
  }

  get byteLength(): number {
    return this.length;
  }

  writeU8(value: number): void {
    this.assertRange(value, 0, 0xff, "u8");
    this.reserve(1);
    this.view.setUint8(this.length, value);
    this.length += 1;
  }

  writeU16(value: number): void {
    this.assertRange(value, 0, 0xffff, "u16");
    this.reserve(2);
    this.view.setUint16(this.length, value, LITTLE_ENDIAN);
    this.length += 2;
  }

  writeU32(value: number): void {
    this.assertRange(value, 0, 0xffffffff, "u32");
    this.reserve(4);
    this.view.setUint32(this.length, value, LITTLE_ENDIAN);
    this.length += 4;
  }

  writeI32(value: number): void {
    this.assertRange(value, -0x80000000, 0x7fffffff, "i32");
    this.reserve(4);
    this.view.setInt32(this.length, value, LITTLE_ENDIAN);
    this.length += 4;
  }

  writeF64(value: number): void {
    this.reserve(8);
    this.view.setFloat64(this.length, value, LITTLE_ENDIAN);
    this.length += 8;
  }

  writeBytes(source: Uint8Array): void {
    this.reserve(source.length);
    this.buffer.set(source, this.length);
    this.length += source.length;
  }

  writeLength(value: number): void {
    this.profile.writeLength(this, value);
  }

  writeString(value: string): void {
    const encoded = utf8.encode(value);
    this.writeLength(encoded.length);
    this.writeBytes(encoded);
  }

  writeList<T>(items: readonly T[], writeElement: ElementWriter<T>): void {
    this.writeLength(items.length);
    items.forEach((item, index) => writeElement(this, item, index));
  }

  toBytes(): Uint8Array {
    return this.buffer.slice(0, this.length);
  }

  private reserve(extra: number): void {
    const required = this.length + extra;
    if (required <= this.buffer.length) {
      return;
    }
    let capacity = this.buffer.length * 2;
    while (capacity < required) {
      capacity *= 2;
    }
    const next = new Uint8Array(capacity);
    next.set(this.buffer.subarray(0, this.length));
    this.buffer = next;
    this.view = new DataView(next.buffer);
  }

  private assertRange(value: number, min: number, max: number, label: string): void {
    if (!Number.isInteger(value) || value < min || value > max) {
      throw new RangeError(`${label} value must be an integer between ${min} and ${max}, got ${value}`);
    }
  }
}
