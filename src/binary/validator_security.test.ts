import { describe, expect, it } from "vitest";
import { catchError } from "../testing/catchError.js";
import { Variant } from "./reader.js";
import { isValidVariant, validateVariant } from "./validator.js";

const EMPTY_METADATA = Buffer.from([0x11, 0x00, 0x00]);
const LEVEL_BYTES = 10;

// Arrays of one element nested `depth` times around a null, with 4-byte offsets.
const craftNestedArrays = (depth: number): Buffer => {
  const total = depth * LEVEL_BYTES + 1;
  const bytes = Buffer.alloc(total);
  for (let level = 0; level < depth; level += 1) {
    const pos = level * LEVEL_BYTES;
    bytes[pos] = (3 << 2) | 3;
    bytes[pos + 1] = 1;
    bytes.writeUInt32LE(0, pos + 2);
    bytes.writeUInt32LE(total - pos - LEVEL_BYTES, pos + 6);
  }
  return bytes;
};

describe("validateVariant Security", () => {
  it("rejects an object claiming four billion fields without allocating for them", () => {
    const value = Buffer.from([(0x10 << 2) | 2, 0xff, 0xff, 0xff, 0xff]);
    expect(catchError(() => validateVariant(EMPTY_METADATA, value))).toMatchObject({
      kind: "OffsetOutOfBounds",
      offset: 0,
    });
  });

  it("rejects an array claiming four billion elements", () => {
    const value = Buffer.from([(0x04 << 2) | 3, 0xff, 0xff, 0xff, 0xff]);
    expect(isValidVariant(EMPTY_METADATA, value)).toBe(false);
  });

  it("rejects a dictionary claiming four billion entries", () => {
    const metadata = Buffer.from([0x11 | (3 << 6), 0xff, 0xff, 0xff, 0xff, 0x00, 0x00, 0x00, 0x00]);
    expect(catchError(() => validateVariant(metadata, Buffer.from([0x00])))).toMatchObject({
      kind: "OffsetOutOfBounds",
      section: "metadata",
    });
  });

  it("stops at the depth limit on deeply nested input", () => {
    const value = craftNestedArrays(100_000);
    expect(catchError(() => validateVariant(EMPTY_METADATA, value))).toMatchObject({
      kind: "RecursionLimitExceeded",
      offset: 128 * LEVEL_BYTES,
    });
  });

  it("accepts the same crafted layout within the limit", () => {
    const value = craftNestedArrays(3);
    validateVariant(EMPTY_METADATA, value);
    expect(Variant.fromBytes(EMPTY_METADATA, value).getPath("[0][0][0]")?.isNull()).toBe(true);
  });

  it("rejects a value header with a missing count byte", () => {
    expect(isValidVariant(EMPTY_METADATA, Buffer.from([0x02]))).toBe(false);
  });

  it("never throws anything but VariantError on corrupted bytes", () => {
    const base = craftNestedArrays(4);
    for (let index = 0; index < base.length; index += 1) {
      for (const replacement of [0x00, 0x7f, 0xff]) {
        const corrupted = Buffer.from(base);
        corrupted[index] = replacement;
        expect(() => isValidVariant(EMPTY_METADATA, corrupted)).not.toThrow();
      }
    }
  });
});
