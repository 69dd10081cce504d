import { VariantError, type VariantSection } from "./errors.js";
import type { ByteWidth } from "./format.js";

const INITIAL_CAPACITY = 256;

/**
 * Growable little-endian write buffer. `view()` results are only valid until
 * the next write, since growing reallocates the backing buffer.
 */
export class ByteSink {
  private buffer: Buffer;
  private cursor = 0;

  constructor(capacity = INITIAL_CAPACITY) {
    this.buffer = Buffer.allocUnsafe(capacity);
  }

  get length(): number {
    return this.cursor;
  }

  writeUInt8(value: number): void {
    this.ensureSpace(1);
    this.buffer.writeUInt8(value, this.cursor);
    this.cursor += 1;
  }

  writeUnsigned(value: number, width: ByteWidth): void {
    this.ensureSpace(width);
    this.buffer.writeUIntLE(value, this.cursor, width);
    this.cursor += width;
  }

  writeInt8(value: number): void {
    this.ensureSpace(1);
    this.buffer.writeInt8(value, this.cursor);
    this.cursor += 1;
  }

  writeInt16(value: number): void {
    this.ensureSpace(2);
    this.buffer.writeInt16LE(value, this.cursor);
    this.cursor += 2;
  }

  writeInt32(value: number): void {
    this.ensureSpace(4);
    this.buffer.writeInt32LE(value, this.cursor);
    this.cursor += 4;
  }

  writeBigInt64(value: bigint): void {
    this.ensureSpace(8);
    this.buffer.writeBigInt64LE(value, this.cursor);
    this.cursor += 8;
  }

  writeBigUInt64(value: bigint): void {
    this.ensureSpace(8);
    this.buffer.writeBigUInt64LE(value, this.cursor);
    this.cursor += 8;
  }

  writeFloat(value: number): void {
    this.ensureSpace(4);
    this.buffer.writeFloatLE(value, this.cursor);
    this.cursor += 4;
  }

  writeDouble(value: number): void {
    this.ensureSpace(8);
    this.buffer.writeDoubleLE(value, this.cursor);
    this.cursor += 8;
  }

  writeBytes(bytes: Uint8Array): void {
    this.ensureSpace(bytes.length);
    this.buffer.set(bytes, this.cursor);
    this.cursor += bytes.length;
  }

  view(start = 0, end = this.cursor): Buffer {
    return this.buffer.subarray(start, end);
  }

  /** Copies the written bytes into an exactly sized buffer. */
  toBuffer(): Buffer {
    const out = Buffer.allocUnsafe(this.cursor);
    this.buffer.copy(out, 0, 0, this.cursor);
    return out;
  }

  private ensureSpace(size: number): void {
    if (this.cursor + size <= this.buffer.length) {
      return;
    }
    const next = Buffer.allocUnsafe(Math.max(this.buffer.length * 2, this.cursor + size));
    this.buffer.copy(next, 0, 0, this.cursor);
    this.buffer = next;
  }
}

/** Wraps any byte array as a Buffer over the same memory. */
export const asBuffer = (bytes: Uint8Array): Buffer =>
  Buffer.isBuffer(bytes) ? bytes : Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);

export const checkRange = (
  buffer: Buffer,
  offset: number,
  length: number,
  section: VariantSection,
  what: string
): void => {
  if (offset < 0 || length < 0 || offset + length > buffer.length) {
    throw new VariantError(
      "OffsetOutOfBounds",
      `${what} needs ${length} bytes but only ${Math.max(buffer.length - offset, 0)} remain`,
      { offset, section }
    );
  }
};

export const readUnsigned = (
  buffer: Buffer,
  offset: number,
  width: ByteWidth,
  section: VariantSection = "value"
): number => {
  checkRange(buffer, offset, width, section, "Unsigned integer");
  return buffer.readUIntLE(offset, width);
};

export const utf8ByteLength = (value: string): number => Buffer.byteLength(value, "utf8");
