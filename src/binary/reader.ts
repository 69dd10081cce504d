import { asBuffer, checkRange, readUnsigned } from "./bytes.js";
import { VariantError } from "./errors.js";
import {
  BasicType,
  DECIMAL_MAX_PRECISION,
  isPrimitiveType,
  PRIMITIVE_KINDS,
  PrimitiveType,
  type ValueKind,
} from "./format.js";
import {
  basicTypeOf,
  containerFieldId,
  containerOffset,
  readContainerLayout,
  typeInfoOf,
  valueSize,
  type ContainerLayout,
} from "./layout.js";
import { VariantMetadata } from "./metadata.js";
import { getPath, type VariantPath } from "./path.js";
import { validateVariant, type ValidatorOptions } from "./validator.js";

export type VariantDecimal = {
  unscaled: bigint;
  scale: number;
  /** Maximum precision of the stored width; precision itself is not encoded. */
  precision: number;
};

export type VariantTimestamp = {
  value: bigint;
  unit: "micros" | "nanos";
  utcAdjusted: boolean;
};

const TIMESTAMP_TYPES = new Map<PrimitiveType, Omit<VariantTimestamp, "value">>([
  [PrimitiveType.Timestamp, { unit: "micros", utcAdjusted: true }],
  [PrimitiveType.TimestampNtz, { unit: "micros", utcAdjusted: false }],
  [PrimitiveType.TimestampNanos, { unit: "nanos", utcAdjusted: true }],
  [PrimitiveType.TimestampNtzNanos, { unit: "nanos", utcAdjusted: false }],
]);

const toMetadata = (metadata: Uint8Array | VariantMetadata): VariantMetadata =>
  metadata instanceof VariantMetadata ? metadata : new VariantMetadata(metadata);

/**
 * Lazy view over one encoded value. Nothing is copied: accessors read the
 * borrowed bytes, and nested values are views over sub-ranges of them.
 *
 * The view trusts the layout it is given. Buffers that crossed a trust
 * boundary should go through `Variant.tryNew`, which validates first.
 */
export class Variant {
  private constructor(
    readonly metadata: VariantMetadata,
    readonly bytes: Buffer
  ) {}

  static fromBytes(metadata: Uint8Array | VariantMetadata, value: Uint8Array): Variant {
    return new Variant(toMetadata(metadata), asBuffer(value));
  }

  static tryNew(metadata: Uint8Array, value: Uint8Array, options?: ValidatorOptions): Variant {
    validateVariant(metadata, value, options);
    return Variant.fromBytes(metadata, value);
  }

  get byteLength(): number {
    return valueSize(this.bytes, 0);
  }

  kind(): ValueKind {
    const header = this.header();
    switch (basicTypeOf(header)) {
      case BasicType.Primitive: {
        const type = typeInfoOf(header);
        if (!isPrimitiveType(type)) {
          throw new VariantError("UnknownType", `Unknown primitive type id ${type}`, { offset: 0 });
        }
        return PRIMITIVE_KINDS[type];
      }
      case BasicType.ShortString:
        return "shortString";
      case BasicType.Object:
        return "object";
      case BasicType.Array:
        return "array";
    }
  }

  isNull(): boolean {
    return this.primitiveType() === PrimitiveType.Null;
  }

  asBoolean(): boolean {
    switch (this.primitiveType()) {
      case PrimitiveType.True:
        return true;
      case PrimitiveType.False:
        return false;
      default:
        throw this.mismatch("boolean");
    }
  }

  /** Any integer width, as a number; int64 values must be safe integers. */
  asInt(): number {
    const type = this.primitiveType();
    if (type === PrimitiveType.Int64) {
      const value = this.asBigInt();
      if (value > BigInt(Number.MAX_SAFE_INTEGER) || value < BigInt(Number.MIN_SAFE_INTEGER)) {
        throw new VariantError("InvalidValue", `Integer ${value} exceeds the safe integer range; use asBigInt()`);
      }
      return Number(value);
    }
    switch (type) {
      case PrimitiveType.Int8:
        this.payload(1);
        return this.bytes.readInt8(1);
      case PrimitiveType.Int16:
        this.payload(2);
        return this.bytes.readInt16LE(1);
      case PrimitiveType.Int32:
        this.payload(4);
        return this.bytes.readInt32LE(1);
      default:
        throw this.mismatch("integer");
    }
  }

  asBigInt(): bigint {
    if (this.primitiveType() === PrimitiveType.Int64) {
      this.payload(8);
      return this.bytes.readBigInt64LE(1);
    }
    return BigInt(this.asInt());
  }

  asFloat(): number {
    if (this.primitiveType() !== PrimitiveType.Float) {
      throw this.mismatch("float");
    }
    this.payload(4);
    return this.bytes.readFloatLE(1);
  }

  /** Double, or a float widened to double. */
  asDouble(): number {
    switch (this.primitiveType()) {
      case PrimitiveType.Double:
        this.payload(8);
        return this.bytes.readDoubleLE(1);
      case PrimitiveType.Float:
        return this.asFloat();
      default:
        throw this.mismatch("double");
    }
  }

  asDecimal(): VariantDecimal {
    const type = this.primitiveType();
    switch (type) {
      case PrimitiveType.Decimal4:
        this.payload(5);
        return { unscaled: BigInt(this.bytes.readInt32LE(2)), scale: this.bytes[1], precision: DECIMAL_MAX_PRECISION[type] };
      case PrimitiveType.Decimal8:
        this.payload(9);
        return { unscaled: this.bytes.readBigInt64LE(2), scale: this.bytes[1], precision: DECIMAL_MAX_PRECISION[type] };
      case PrimitiveType.Decimal16: {
        this.payload(17);
        const low = this.bytes.readBigUInt64LE(2);
        const high = this.bytes.readBigInt64LE(10);
        return { unscaled: (high << 64n) | low, scale: this.bytes[1], precision: DECIMAL_MAX_PRECISION[type] };
      }
      default:
        throw this.mismatch("decimal");
    }
  }

  /** Days since 1970-01-01. */
  asDate(): number {
    if (this.primitiveType() !== PrimitiveType.Date) {
      throw this.mismatch("date");
    }
    this.payload(4);
    return this.bytes.readInt32LE(1);
  }

  asTimestamp(): VariantTimestamp {
    const type = this.primitiveType();
    const shape = type === undefined ? undefined : TIMESTAMP_TYPES.get(type);
    if (!shape) {
      throw this.mismatch("timestamp");
    }
    this.payload(8);
    return { value: this.bytes.readBigInt64LE(1), ...shape };
  }

  /** Microseconds since midnight. */
  asTime(): bigint {
    if (this.primitiveType() !== PrimitiveType.TimeNtz) {
      throw this.mismatch("time");
    }
    this.payload(8);
    return this.bytes.readBigInt64LE(1);
  }

  asUuid(): string {
    if (this.primitiveType() !== PrimitiveType.Uuid) {
      throw this.mismatch("uuid");
    }
    this.payload(16);
    const hex = this.bytes.toString("hex", 1, 17);
    return `${hex.slice(0, 8)}-${hex.slice(8, 12)}-${hex.slice(12, 16)}-${hex.slice(16, 20)}-${hex.slice(20)}`;
  }

  /** The binary payload, sharing memory with the value buffer. */
  asBinary(): Buffer {
    if (this.primitiveType() !== PrimitiveType.Binary) {
      throw this.mismatch("binary");
    }
    const length = readUnsigned(this.bytes, 1, 4);
    this.payload(4 + length);
    return this.bytes.subarray(5, 5 + length);
  }

  asString(): string {
    const header = this.header();
    if (basicTypeOf(header) === BasicType.ShortString) {
      const length = typeInfoOf(header);
      this.payload(length);
      return this.bytes.toString("utf8", 1, 1 + length);
    }
    if (this.primitiveType() !== PrimitiveType.String) {
      throw this.mismatch("string");
    }
    const length = readUnsigned(this.bytes, 1, 4);
    this.payload(4 + length);
    return this.bytes.toString("utf8", 5, 5 + length);
  }

  asObject(): VariantObject {
    if (basicTypeOf(this.header()) !== BasicType.Object) {
      throw this.mismatch("object");
    }
    return new VariantObject(this.metadata, this.bytes, readContainerLayout(this.bytes, 0));
  }

  asArray(): VariantList {
    if (basicTypeOf(this.header()) !== BasicType.Array) {
      throw this.mismatch("array");
    }
    return new VariantList(this.metadata, this.bytes, readContainerLayout(this.bytes, 0));
  }

  /** Follows `path` (e.g. `"a.b[0]"`); undefined when a step does not exist. */
  getPath(path: VariantPath | string): Variant | undefined {
    return getPath(this, path);
  }

  private header(): number {
    return readUnsigned(this.bytes, 0, 1);
  }

  private primitiveType(): PrimitiveType | undefined {
    const header = this.header();
    if (basicTypeOf(header) !== BasicType.Primitive) {
      return undefined;
    }
    const type = typeInfoOf(header);
    return isPrimitiveType(type) ? type : undefined;
  }

  private payload(length: number): void {
    checkRange(this.bytes, 1, length, "value", `${this.kind()} payload`);
  }

  private mismatch(expected: string): VariantError {
    return new VariantError("TypeMismatch", `Expected ${expected} but found ${this.kind()}`);
  }
}

export class VariantObject implements Iterable<[string, Variant]> {
  /** @internal use `Variant.asObject()` */
  constructor(
    private readonly metadata: VariantMetadata,
    private readonly bytes: Buffer,
    private readonly layout: ContainerLayout
  ) {}

  get fieldCount(): number {
    return this.layout.count;
  }

  fieldId(index: number): number {
    return containerFieldId(this.bytes, this.layout, index);
  }

  fieldName(index: number): string {
    return this.metadata.get(this.fieldId(index));
  }

  fieldAt(index: number): Variant | undefined {
    if (!Number.isInteger(index) || index < 0 || index >= this.layout.count) {
      return undefined;
    }
    return this.child(index);
  }

  get(name: string): Variant | undefined {
    const index = this.indexOf(name);
    return index < 0 ? undefined : this.child(index);
  }

  has(name: string): boolean {
    return this.indexOf(name) >= 0;
  }

  /**
   * Binary search for `name`. With a sorted dictionary the ids themselves are
   * in name order, so only ids are compared; otherwise each probe compares the
   * resolved name bytes.
   */
  indexOf(name: string): number {
    let low = 0;
    let high = this.layout.count - 1;

    if (this.metadata.isSorted) {
      const id = this.metadata.find(name);
      if (id === undefined) return -1;
      while (low <= high) {
        const mid = (low + high) >>> 1;
        const probe = this.fieldId(mid);
        if (probe === id) return mid;
        if (probe < id) low = mid + 1;
        else high = mid - 1;
      }
      return -1;
    }

    const target = Buffer.from(name, "utf8");
    while (low <= high) {
      const mid = (low + high) >>> 1;
      const cmp = this.metadata.compareEntry(this.fieldId(mid), target);
      if (cmp === 0) return mid;
      if (cmp < 0) low = mid + 1;
      else high = mid - 1;
    }
    return -1;
  }

  keys(): Iterable<string> {
    return {
      [Symbol.iterator]: () => this.walkKeys(),
    };
  }

  /** Fields in stored (name) order; each iteration re-walks the tables. */
  fields(): Iterable<[string, Variant]> {
    return {
      [Symbol.iterator]: () => this.walk(),
    };
  }

  [Symbol.iterator](): Iterator<[string, Variant]> {
    return this.walk();
  }

  private *walk(): Generator<[string, Variant]> {
    for (let index = 0; index < this.layout.count; index += 1) {
      yield [this.fieldName(index), this.child(index)];
    }
  }

  private *walkKeys(): Generator<string> {
    for (let index = 0; index < this.layout.count; index += 1) {
      yield this.fieldName(index);
    }
  }

  private child(index: number): Variant {
    const dataEnd = this.layout.dataStart + containerOffset(this.bytes, this.layout, this.layout.count);
    const start = this.layout.dataStart + containerOffset(this.bytes, this.layout, index);
    if (start >= dataEnd) {
      throw new VariantError("OffsetOutOfBounds", `Field ${index} starts past the object data`, { offset: start });
    }
    const end = start + valueSize(this.bytes, start);
    if (end > dataEnd || end > this.bytes.length) {
      throw new VariantError("OffsetOutOfBounds", `Field ${index} ends past the object data`, { offset: start });
    }
    return Variant.fromBytes(this.metadata, this.bytes.subarray(start, end));
  }
}

export class VariantList implements Iterable<Variant> {
  /** @internal use `Variant.asArray()` */
  constructor(
    private readonly metadata: VariantMetadata,
    private readonly bytes: Buffer,
    private readonly layout: ContainerLayout
  ) {}

  get length(): number {
    return this.layout.count;
  }

  get(index: number): Variant | undefined {
    if (!Number.isInteger(index) || index < 0 || index >= this.layout.count) {
      return undefined;
    }
    const start = this.layout.dataStart + containerOffset(this.bytes, this.layout, index);
    const end = this.layout.dataStart + containerOffset(this.bytes, this.layout, index + 1);
    if (end <= start || end > this.bytes.length) {
      throw new VariantError("OffsetOutOfBounds", `Element ${index} spans outside the array data`, { offset: start });
    }
    return Variant.fromBytes(this.metadata, this.bytes.subarray(start, end));
  }

  iter(): Iterable<Variant> {
    return {
      [Symbol.iterator]: () => this.walk(),
    };
  }

  [Symbol.iterator](): Iterator<Variant> {
    return this.walk();
  }

  private *walk(): Generator<Variant> {
    for (let index = 0; index < this.layout.count; index += 1) {
      const element = this.get(index);
      if (element) yield element;
    }
  }
}
