import { isUtf8 } from "node:buffer";
import { asBuffer } from "./bytes.js";
import { isVariantError, VariantError } from "./errors.js";
import {
  BasicType,
  DECIMAL_MAX_PRECISION,
  isDecimalType,
  isPrimitiveType,
  PRIMITIVE_PAYLOAD_SIZE,
  PrimitiveType,
} from "./format.js";
import { basicTypeOf, containerFieldId, containerOffset, readContainerLayout, typeInfoOf } from "./layout.js";
import { VariantMetadata } from "./metadata.js";

export const DEFAULT_MAX_DEPTH = 128;

export type ValidatorOptions = {
  /** Deepest allowed nesting of objects and arrays; a composite root is level 1. */
  maxDepth?: number;
};

const MICROS_PER_DAY = 86_400_000_000n;

type Context = {
  buffer: Buffer;
  metadata: VariantMetadata;
  maxDepth: number;
};

const outOfBounds = (message: string, offset: number): VariantError =>
  new VariantError("OffsetOutOfBounds", message, { offset });

const within = (offset: number, length: number, limit: number, what: string): void => {
  if (offset + length > limit) {
    throw outOfBounds(`${what} needs ${length} bytes but only ${Math.max(limit - offset, 0)} remain`, offset);
  }
};

const checkSortedDictionary = (metadata: VariantMetadata): void => {
  for (let id = 1; id < metadata.length; id += 1) {
    const cmp = Buffer.compare(metadata.entryBytes(id - 1), metadata.entryBytes(id));
    if (cmp >= 0) {
      throw new VariantError(
        "UnsortedDictionary",
        `Dictionary is flagged sorted but entry ${id} ${cmp === 0 ? "repeats" : "precedes"} entry ${id - 1}`,
        { offset: metadata.entryOffset(id), section: "metadata" }
      );
    }
  }
};

const validateDecimal = (ctx: Context, pos: number, type: PrimitiveType): void => {
  if (!isDecimalType(type)) return;
  const precision = DECIMAL_MAX_PRECISION[type];
  const scale = ctx.buffer[pos + 1];
  if (scale > precision) {
    throw new VariantError("InvalidDecimal", `Decimal scale ${scale} exceeds precision ${precision}`, {
      offset: pos + 1,
    });
  }

  let unscaled: bigint;
  if (type === PrimitiveType.Decimal4) {
    unscaled = BigInt(ctx.buffer.readInt32LE(pos + 2));
  } else if (type === PrimitiveType.Decimal8) {
    unscaled = ctx.buffer.readBigInt64LE(pos + 2);
  } else {
    unscaled = (ctx.buffer.readBigInt64LE(pos + 10) << 64n) | ctx.buffer.readBigUInt64LE(pos + 2);
  }
  const magnitude = unscaled < 0n ? -unscaled : unscaled;
  if (magnitude >= 10n ** BigInt(precision)) {
    throw new VariantError("InvalidDecimal", `Decimal value ${unscaled} exceeds precision ${precision}`, {
      offset: pos + 2,
    });
  }
};

const validatePrimitive = (ctx: Context, pos: number, limit: number): number => {
  const type = typeInfoOf(ctx.buffer[pos]);
  if (!isPrimitiveType(type)) {
    throw new VariantError("UnknownType", `Unknown primitive type id ${type}`, { offset: pos });
  }

  const fixed = PRIMITIVE_PAYLOAD_SIZE[type];
  if (fixed >= 0) {
    within(pos + 1, fixed, limit, "Primitive payload");
    validateDecimal(ctx, pos, type);
    if (type === PrimitiveType.TimeNtz) {
      const micros = ctx.buffer.readBigInt64LE(pos + 1);
      if (micros < 0n || micros >= MICROS_PER_DAY) {
        throw new VariantError("InvalidValue", `Time of day ${micros} is outside one day`, { offset: pos + 1 });
      }
    }
    return 1 + fixed;
  }

  within(pos + 1, 4, limit, "Length prefix");
  const length = ctx.buffer.readUInt32LE(pos + 1);
  within(pos + 5, length, limit, type === PrimitiveType.String ? "String" : "Binary");
  if (type === PrimitiveType.String && !isUtf8(ctx.buffer.subarray(pos + 5, pos + 5 + length))) {
    throw new VariantError("InvalidUtf8", "String value is not valid UTF-8", { offset: pos + 5 });
  }
  return 5 + length;
};

const validateObject = (ctx: Context, pos: number, limit: number, level: number): number => {
  const layout = readContainerLayout(ctx.buffer, pos);
  within(pos, layout.dataStart - pos, limit, "Object header");

  const dataEnd = layout.dataStart + containerOffset(ctx.buffer, layout, layout.count);
  if (dataEnd > limit) {
    throw outOfBounds("Object data ends past its container", layout.offsetsStart + layout.count * layout.offsetSize);
  }

  let previous: Buffer | undefined;
  const spans: Array<[number, number]> = [];
  for (let index = 0; index < layout.count; index += 1) {
    const idAt = layout.idsStart + index * layout.idSize;
    const id = containerFieldId(ctx.buffer, layout, index);
    if (id >= ctx.metadata.length) {
      throw outOfBounds(`Field id ${id} is out of range for a dictionary of ${ctx.metadata.length} entries`, idAt);
    }
    const name = ctx.metadata.entryBytes(id);
    if (previous) {
      const cmp = Buffer.compare(previous, name);
      if (cmp === 0) {
        throw new VariantError("DuplicateField", `Duplicate field "${ctx.metadata.get(id)}"`, { offset: idAt });
      }
      if (cmp > 0) {
        throw new VariantError("UnsortedDictionary", `Field "${ctx.metadata.get(id)}" is out of name order`, {
          offset: idAt,
        });
      }
    }
    previous = name;

    const start = layout.dataStart + containerOffset(ctx.buffer, layout, index);
    if (start >= dataEnd) {
      throw outOfBounds(`Field ${index} starts past the object data`, layout.offsetsStart + index * layout.offsetSize);
    }
    spans.push([start, start + validateValue(ctx, start, dataEnd, level)]);
  }

  // Children may sit in any order but must tile the data region.
  spans.sort((a, b) => a[0] - b[0]);
  let covered = layout.dataStart;
  for (const [start, end] of spans) {
    if (start !== covered) {
      throw outOfBounds(
        start < covered ? "Object fields overlap" : "Object data holds bytes no field uses",
        Math.min(start, covered)
      );
    }
    covered = end;
  }
  if (covered !== dataEnd) {
    throw outOfBounds("Object data holds bytes no field uses", covered);
  }

  return dataEnd - pos;
};

const validateArray = (ctx: Context, pos: number, limit: number, level: number): number => {
  const layout = readContainerLayout(ctx.buffer, pos);
  within(pos, layout.dataStart - pos, limit, "Array header");

  if (containerOffset(ctx.buffer, layout, 0) !== 0) {
    throw outOfBounds("First array offset must be 0", layout.offsetsStart);
  }
  for (let index = 0; index < layout.count; index += 1) {
    const offsetAt = layout.offsetsStart + (index + 1) * layout.offsetSize;
    const start = layout.dataStart + containerOffset(ctx.buffer, layout, index);
    const end = layout.dataStart + containerOffset(ctx.buffer, layout, index + 1);
    if (end < start) {
      throw outOfBounds(`Array offsets decrease at element ${index}`, offsetAt);
    }
    if (end > limit) {
      throw outOfBounds(`Element ${index} ends past its container`, offsetAt);
    }
    const size = validateValue(ctx, start, end, level);
    if (size !== end - start) {
      throw outOfBounds(`Element ${index} occupies ${size} of its ${end - start} bytes`, start);
    }
  }

  return layout.dataStart - pos + containerOffset(ctx.buffer, layout, layout.count);
};

/** Validates the value at `pos`, which must end at or before `limit`; returns its size. */
const validateValue = (ctx: Context, pos: number, limit: number, depth: number): number => {
  if (pos >= limit) {
    throw outOfBounds("Value starts past its container", pos);
  }
  const header = ctx.buffer[pos];
  switch (basicTypeOf(header)) {
    case BasicType.Primitive:
      return validatePrimitive(ctx, pos, limit);
    case BasicType.ShortString: {
      const length = typeInfoOf(header);
      within(pos + 1, length, limit, "Short string");
      if (!isUtf8(ctx.buffer.subarray(pos + 1, pos + 1 + length))) {
        throw new VariantError("InvalidUtf8", "Short string is not valid UTF-8", { offset: pos + 1 });
      }
      return 1 + length;
    }
    case BasicType.Object:
    case BasicType.Array: {
      const level = depth + 1;
      if (level > ctx.maxDepth) {
        throw new VariantError("RecursionLimitExceeded", `Nesting exceeds ${ctx.maxDepth} levels`, { offset: pos });
      }
      return basicTypeOf(header) === BasicType.Object
        ? validateObject(ctx, pos, limit, level)
        : validateArray(ctx, pos, limit, level);
    }
  }
};

/**
 * Full structural check of a metadata/value pair. Every offset, id and
 * length is checked against its enclosing region, so a pair that passes can
 * be read without any access landing outside the buffers.
 */
export const validateVariant = (
  metadata: Uint8Array | VariantMetadata,
  value: Uint8Array,
  options: ValidatorOptions = {}
): void => {
  const dictionary = metadata instanceof VariantMetadata ? metadata : new VariantMetadata(metadata);
  if (dictionary.isSorted) {
    checkSortedDictionary(dictionary);
  }

  const buffer = asBuffer(value);
  const ctx: Context = { buffer, metadata: dictionary, maxDepth: options.maxDepth ?? DEFAULT_MAX_DEPTH };
  const size = validateValue(ctx, 0, buffer.length, 0);
  if (size !== buffer.length) {
    throw outOfBounds(`Value occupies ${size} of ${buffer.length} bytes`, size);
  }
};

export const isValidVariant = (
  metadata: Uint8Array | VariantMetadata,
  value: Uint8Array,
  options?: ValidatorOptions
): boolean => {
  try {
    validateVariant(metadata, value, options);
    return true;
  } catch (error) {
    if (isVariantError(error)) {
      return false;
    }
    throw error;
  }
};
