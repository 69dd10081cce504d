import { ByteSink, utf8ByteLength } from "./bytes.js";
import { VariantError } from "./errors.js";
import {
  arrayHeader,
  BasicType,
  byteWidthFor,
  DECIMAL_MAX_PRECISION,
  MAX_SHORT_STRING_BYTES,
  MAX_U32,
  objectHeader,
  PrimitiveType,
  primitiveHeader,
  shortStringHeader,
} from "./format.js";
import { basicTypeOf, containerFieldId, containerOffset, readContainerLayout, valueSize } from "./layout.js";
import { MetadataBuilder } from "./metadata.js";

/** Plain JavaScript values accepted by `appendValue`. */
export type VariantInput =
  | null
  | boolean
  | number
  | bigint
  | string
  | Uint8Array
  | Date
  | readonly VariantInput[]
  | { readonly [key: string]: VariantInput | undefined };

export type EncodedVariant = {
  metadata: Buffer;
  value: Buffer;
};

export type TimestampOptions = {
  /** Instant in UTC (true, the default) or a wall-clock time without zone. */
  utcAdjusted?: boolean;
  unit?: "micros" | "nanos";
};

export type VariantBuilderOptions = {
  sortedDictionary?: boolean;
  fieldNames?: Iterable<string>;
  maxFieldNames?: number;
  maxDictionaryBytes?: number;
};

const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;
const MICROS_PER_DAY = 86_400_000_000n;
const MILLIS_PER_DAY = 86_400_000;
const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

const invalid = (message: string): VariantError => new VariantError("InvalidValue", message);

const toInt64 = (value: bigint | number, label: string): bigint => {
  if (typeof value === "number" && !Number.isSafeInteger(value)) {
    throw invalid(`${label} must be a safe integer, got ${value}`);
  }
  const big = BigInt(value);
  if (big < INT64_MIN || big > INT64_MAX) {
    throw invalid(`${label} ${big} does not fit in 64 bits`);
  }
  return big;
};

const decimalTypeFor = (precision: number): PrimitiveType.Decimal4 | PrimitiveType.Decimal8 | PrimitiveType.Decimal16 => {
  if (precision <= DECIMAL_MAX_PRECISION[PrimitiveType.Decimal4]) return PrimitiveType.Decimal4;
  if (precision <= DECIMAL_MAX_PRECISION[PrimitiveType.Decimal8]) return PrimitiveType.Decimal8;
  return PrimitiveType.Decimal16;
};

/** Link from a nested scope back to the scope that will receive its bytes. */
export type ParentScope = {
  commit(encode: (sink: ByteSink) => void): void;
  release(): void;
};

/**
 * Appenders shared by the root builder and nested object/array scopes. Each
 * scope stages its children in its own sink; nothing reaches the parent until
 * the scope ends.
 */
export abstract class ValueAppender {
  protected readonly sink = new ByteSink();
  private openChild: ParentScope | undefined;

  protected constructor(protected readonly dictionary: MetadataBuilder) {}

  /** Throws when this scope can no longer accept writes. */
  protected abstract ensureOpen(): void;
  protected abstract beforeValue(): void;
  protected abstract afterValue(start: number): void;

  /** Called when a child scope opened here is aborted. */
  protected afterAbort(): void {}

  appendNull(): this {
    return this.write((sink) => sink.writeUInt8(primitiveHeader(PrimitiveType.Null)));
  }

  appendBoolean(value: boolean): this {
    return this.write((sink) =>
      sink.writeUInt8(primitiveHeader(value ? PrimitiveType.True : PrimitiveType.False))
    );
  }

  /** Writes the narrowest of int8, int16, int32 and int64 that holds `value`. */
  appendInt(value: number | bigint): this {
    const big = toInt64(value, "Integer");
    if (big >= -128n && big <= 127n) {
      return this.write((sink) => {
        sink.writeUInt8(primitiveHeader(PrimitiveType.Int8));
        sink.writeInt8(Number(big));
      });
    }
    if (big >= -32_768n && big <= 32_767n) {
      return this.write((sink) => {
        sink.writeUInt8(primitiveHeader(PrimitiveType.Int16));
        sink.writeInt16(Number(big));
      });
    }
    if (big >= -2_147_483_648n && big <= 2_147_483_647n) {
      return this.write((sink) => {
        sink.writeUInt8(primitiveHeader(PrimitiveType.Int32));
        sink.writeInt32(Number(big));
      });
    }
    return this.write((sink) => {
      sink.writeUInt8(primitiveHeader(PrimitiveType.Int64));
      sink.writeBigInt64(big);
    });
  }

  appendFloat(value: number): this {
    return this.write((sink) => {
      sink.writeUInt8(primitiveHeader(PrimitiveType.Float));
      sink.writeFloat(value);
    });
  }

  appendDouble(value: number): this {
    return this.write((sink) => {
      sink.writeUInt8(primitiveHeader(PrimitiveType.Double));
      sink.writeDouble(value);
    });
  }

  /**
   * Writes `unscaled * 10^-scale` using the smallest decimal width whose
   * maximum precision covers `precision`.
   */
  appendDecimal(unscaled: bigint | number, precision: number, scale: number): this {
    if (!Number.isInteger(precision) || precision < 1 || precision > DECIMAL_MAX_PRECISION[PrimitiveType.Decimal16]) {
      throw new VariantError("InvalidDecimal", `Decimal precision must be between 1 and 38, got ${precision}`);
    }
    if (!Number.isInteger(scale) || scale < 0 || scale > precision) {
      throw new VariantError("InvalidDecimal", `Decimal scale must be between 0 and ${precision}, got ${scale}`);
    }
    if (typeof unscaled === "number" && !Number.isSafeInteger(unscaled)) {
      throw new VariantError("InvalidDecimal", `Unscaled decimal value must be a safe integer, got ${unscaled}`);
    }
    const big = BigInt(unscaled);
    const digits = (big < 0n ? -big : big).toString().length;
    if (digits > precision) {
      throw new VariantError(
        "InvalidDecimal",
        `Unscaled value ${big} has ${digits} digits, more than precision ${precision}`
      );
    }

    const type = decimalTypeFor(precision);
    return this.write((sink) => {
      sink.writeUInt8(primitiveHeader(type));
      sink.writeUInt8(scale);
      switch (type) {
        case PrimitiveType.Decimal4:
          sink.writeInt32(Number(big));
          break;
        case PrimitiveType.Decimal8:
          sink.writeBigInt64(big);
          break;
        case PrimitiveType.Decimal16:
          sink.writeBigUInt64(BigInt.asUintN(64, big));
          sink.writeBigInt64(BigInt.asIntN(64, big >> 64n));
          break;
      }
    });
  }

  /** Days since 1970-01-01, or the UTC calendar day of a Date. */
  appendDate(value: number | Date): this {
    const days = value instanceof Date ? Math.floor(value.getTime() / MILLIS_PER_DAY) : value;
    if (!Number.isInteger(days) || days < -2_147_483_648 || days > 2_147_483_647) {
      throw invalid(`Date must be a 32-bit day count, got ${days}`);
    }
    return this.write((sink) => {
      sink.writeUInt8(primitiveHeader(PrimitiveType.Date));
      sink.writeInt32(days);
    });
  }

  /** `value` counts `unit`s since the epoch; a Date is converted exactly. */
  appendTimestamp(value: bigint | Date, options: TimestampOptions = {}): this {
    const unit = options.unit ?? "micros";
    const utcAdjusted = options.utcAdjusted ?? true;
    if (value instanceof Date && Number.isNaN(value.getTime())) {
      throw invalid("Timestamp is an invalid Date");
    }
    const raw =
      value instanceof Date
        ? BigInt(value.getTime()) * (unit === "micros" ? 1_000n : 1_000_000n)
        : value;
    const ticks = toInt64(raw, "Timestamp");
    const type =
      unit === "micros"
        ? utcAdjusted
          ? PrimitiveType.Timestamp
          : PrimitiveType.TimestampNtz
        : utcAdjusted
          ? PrimitiveType.TimestampNanos
          : PrimitiveType.TimestampNtzNanos;
    return this.write((sink) => {
      sink.writeUInt8(primitiveHeader(type));
      sink.writeBigInt64(ticks);
    });
  }

  /** Microseconds since midnight, without time zone. */
  appendTime(micros: bigint | number): this {
    const ticks = toInt64(micros, "Time");
    if (ticks < 0n || ticks >= MICROS_PER_DAY) {
      throw invalid(`Time must be within one day of microseconds, got ${ticks}`);
    }
    return this.write((sink) => {
      sink.writeUInt8(primitiveHeader(PrimitiveType.TimeNtz));
      sink.writeBigInt64(ticks);
    });
  }

  appendUuid(value: string): this {
    if (!UUID_PATTERN.test(value)) {
      throw invalid(`Not a UUID: ${value}`);
    }
    const bytes = Buffer.from(value.replace(/-/g, ""), "hex");
    return this.write((sink) => {
      sink.writeUInt8(primitiveHeader(PrimitiveType.Uuid));
      sink.writeBytes(bytes);
    });
  }

  appendBinary(bytes: Uint8Array): this {
    if (bytes.length > MAX_U32) {
      throw new VariantError("CapacityExceeded", `Binary value of ${bytes.length} bytes exceeds the 32-bit length`);
    }
    return this.write((sink) => {
      sink.writeUInt8(primitiveHeader(PrimitiveType.Binary));
      sink.writeUnsigned(bytes.length, 4);
      sink.writeBytes(bytes);
    });
  }

  /** Short string up to 63 UTF-8 bytes, long string above. */
  appendString(value: string): this {
    const byteLength = utf8ByteLength(value);
    if (byteLength > MAX_U32) {
      throw new VariantError("CapacityExceeded", `String of ${byteLength} bytes exceeds the 32-bit length`);
    }
    const bytes = Buffer.from(value, "utf8");
    if (byteLength <= MAX_SHORT_STRING_BYTES) {
      return this.write((sink) => {
        sink.writeUInt8(shortStringHeader(byteLength));
        sink.writeBytes(bytes);
      });
    }
    return this.write((sink) => {
      sink.writeUInt8(primitiveHeader(PrimitiveType.String));
      sink.writeUnsigned(byteLength, 4);
      sink.writeBytes(bytes);
    });
  }

  /** Maps a plain JavaScript value, recursing into arrays and objects. */
  appendValue(value: VariantInput): this {
    if (value === null) {
      return this.appendNull();
    }
    if (typeof value === "boolean") {
      return this.appendBoolean(value);
    }
    if (typeof value === "number") {
      return Number.isSafeInteger(value) && !Object.is(value, -0)
        ? this.appendInt(value)
        : this.appendDouble(value);
    }
    if (typeof value === "bigint") {
      return this.appendInt(value);
    }
    if (typeof value === "string") {
      return this.appendString(value);
    }
    if (value instanceof Date) {
      return this.appendTimestamp(value);
    }
    if (value instanceof Uint8Array) {
      return this.appendBinary(value);
    }
    if (Array.isArray(value)) {
      const items: readonly VariantInput[] = value;
      return this.appendArray((list) => {
        for (const item of items) list.appendValue(item);
      });
    }
    const entries = Object.entries(value);
    return this.appendObject((object) => {
      for (const [name, item] of entries) {
        if (item !== undefined) object.insert(name, item);
      }
    });
  }

  startObject(): ObjectBuilder {
    return new ObjectBuilder(this.dictionary, this.openScope());
  }

  startArray(): ListBuilder {
    return new ListBuilder(this.dictionary, this.openScope());
  }

  /** Builds a nested object; it is committed when `build` returns and discarded if it throws. */
  appendObject(build: (object: ObjectBuilder) => void): this {
    const object = this.startObject();
    try {
      build(object);
      object.end();
    } catch (error) {
      object.abort();
      throw error;
    }
    return this;
  }

  appendArray(build: (list: ListBuilder) => void): this {
    const list = this.startArray();
    try {
      build(list);
      list.end();
    } catch (error) {
      list.abort();
      throw error;
    }
    return this;
  }

  protected assertWritable(): void {
    this.ensureOpen();
    if (this.openChild) {
      throw new VariantError(
        "InvalidBuilderState",
        "A nested object or array is still open; end or abort it first"
      );
    }
  }

  private write(encode: (sink: ByteSink) => void): this {
    this.assertWritable();
    this.beforeValue();
    const start = this.sink.length;
    encode(this.sink);
    this.afterValue(start);
    return this;
  }

  private openScope(): ParentScope {
    this.assertWritable();
    this.beforeValue();
    const scope: ParentScope = {
      commit: (encode) => {
        if (this.openChild !== scope) {
          throw new VariantError("InvalidBuilderState", "Nested scope is no longer attached to its parent");
        }
        this.openChild = undefined;
        const start = this.sink.length;
        encode(this.sink);
        this.afterValue(start);
      },
      release: () => {
        if (this.openChild === scope) {
          this.openChild = undefined;
          this.afterAbort();
        }
      },
    };
    this.openChild = scope;
    return scope;
  }
}

type ScopeState = "open" | "ended" | "aborted";

abstract class CompositeBuilder extends ValueAppender {
  private state: ScopeState = "open";

  protected constructor(dictionary: MetadataBuilder, private readonly scope: ParentScope) {
    super(dictionary);
  }

  /** Discards everything staged in this scope; the parent accepts writes again. */
  abort(): void {
    if (this.state !== "open") {
      return;
    }
    this.state = "aborted";
    this.scope.release();
  }

  protected ensureOpen(): void {
    if (this.state !== "open") {
      throw new VariantError("InvalidBuilderState", `Cannot write to a ${this.state} scope`);
    }
  }

  protected commit(encode: (sink: ByteSink) => void): void {
    this.state = "ended";
    this.scope.commit(encode);
  }
}

type FieldSpan = {
  id: number;
  start: number;
  end: number;
};

export class ObjectBuilder extends CompositeBuilder {
  private readonly fields: FieldSpan[] = [];
  private readonly seen = new Set<number>();
  private pendingId: number | undefined;

  /** @internal use `startObject()` */
  constructor(dictionary: MetadataBuilder, scope: ParentScope) {
    super(dictionary, scope);
  }

  get fieldCount(): number {
    return this.fields.length;
  }

  /** Selects the field that the next appended value belongs to. */
  key(name: string): this {
    this.assertWritable();
    if (this.pendingId !== undefined) {
      throw new VariantError(
        "InvalidBuilderState",
        `Field "${this.dictionary.nameOf(this.pendingId)}" has no value yet`
      );
    }
    const id = this.dictionary.addKey(name);
    if (this.seen.has(id)) {
      throw new VariantError("DuplicateField", `Duplicate field "${name}"`);
    }
    this.pendingId = id;
    return this;
  }

  insert(name: string, value: VariantInput): this {
    return this.field(name, (field) => {
      field.appendValue(value);
    });
  }

  /** `build` must append exactly one value, which becomes field `name`. */
  field(name: string, build: (field: this) => void): this {
    this.key(name);
    try {
      build(this);
    } catch (error) {
      this.pendingId = undefined;
      throw error;
    }
    if (this.pendingId !== undefined) {
      this.pendingId = undefined;
      throw new VariantError("InvalidBuilderState", `No value was appended for field "${name}"`);
    }
    return this;
  }

  end(): void {
    this.assertWritable();
    if (this.pendingId !== undefined) {
      throw new VariantError(
        "InvalidBuilderState",
        `Field "${this.dictionary.nameOf(this.pendingId)}" has no value`
      );
    }

    const count = this.fields.length;
    const dataSize = this.sink.length;
    if (dataSize > MAX_U32) {
      throw new VariantError("CapacityExceeded", `Object data of ${dataSize} bytes exceeds the 32-bit offset range`);
    }
    const sorted = [...this.fields].sort((a, b) =>
      Buffer.compare(this.dictionary.keyBytes(a.id), this.dictionary.keyBytes(b.id))
    );
    const maxId = sorted.reduce((max, field) => Math.max(max, field.id), 0);
    const idSize = byteWidthFor(maxId);
    const offsetSize = byteWidthFor(dataSize);
    const isLarge = count > 0xff;
    const data = this.sink.view();

    this.commit((out) => {
      out.writeUInt8(objectHeader(isLarge, idSize, offsetSize));
      out.writeUnsigned(count, isLarge ? 4 : 1);
      for (const field of sorted) {
        out.writeUnsigned(field.id, idSize);
      }
      let offset = 0;
      for (const field of sorted) {
        out.writeUnsigned(offset, offsetSize);
        offset += field.end - field.start;
      }
      out.writeUnsigned(offset, offsetSize);
      for (const field of sorted) {
        out.writeBytes(data.subarray(field.start, field.end));
      }
    });
  }

  protected beforeValue(): void {
    if (this.pendingId === undefined) {
      throw new VariantError("InvalidBuilderState", "Call key() before appending an object field value");
    }
  }

  protected afterValue(start: number): void {
    if (this.pendingId === undefined) {
      return;
    }
    this.fields.push({ id: this.pendingId, start, end: this.sink.length });
    this.seen.add(this.pendingId);
    this.pendingId = undefined;
  }

  // An aborted child leaves its field unset.
  protected afterAbort(): void {
    this.pendingId = undefined;
  }
}

export class ListBuilder extends CompositeBuilder {
  private readonly starts: number[] = [];

  /** @internal use `startArray()` */
  constructor(dictionary: MetadataBuilder, scope: ParentScope) {
    super(dictionary, scope);
  }

  get length(): number {
    return this.starts.length;
  }

  end(): void {
    this.assertWritable();
    const count = this.starts.length;
    const dataSize = this.sink.length;
    if (dataSize > MAX_U32) {
      throw new VariantError("CapacityExceeded", `Array data of ${dataSize} bytes exceeds the 32-bit offset range`);
    }
    const offsetSize = byteWidthFor(dataSize);
    const isLarge = count > 0xff;
    const data = this.sink.view();

    this.commit((out) => {
      out.writeUInt8(arrayHeader(isLarge, offsetSize));
      out.writeUnsigned(count, isLarge ? 4 : 1);
      for (const start of this.starts) {
        out.writeUnsigned(start, offsetSize);
      }
      out.writeUnsigned(dataSize, offsetSize);
      out.writeBytes(data);
    });
  }

  protected beforeValue(): void {}

  protected afterValue(start: number): void {
    this.starts.push(start);
  }
}

/**
 * Builds one document: a single root value plus the dictionary of every
 * field name its objects use.
 */
export class VariantBuilder extends ValueAppender {
  private hasRoot = false;
  private finished = false;

  constructor(options: VariantBuilderOptions = {}) {
    super(
      new MetadataBuilder({
        sorted: options.sortedDictionary,
        fieldNames: options.fieldNames,
        maxFieldNames: options.maxFieldNames,
        maxDictionaryBytes: options.maxDictionaryBytes,
      })
    );
  }

  /** Registers a field name ahead of use and returns its insertion id. */
  addFieldName(name: string): number {
    return this.dictionary.addKey(name);
  }

  finish(): EncodedVariant {
    this.assertWritable();
    if (!this.hasRoot) {
      throw new VariantError("InvalidBuilderState", "No value was appended");
    }
    this.finished = true;

    const { bytes, remap, identity } = this.dictionary.finish();
    const value = this.sink.toBuffer();
    return { metadata: bytes, value: identity ? value : remapFieldIds(value, remap) };
  }

  protected ensureOpen(): void {
    if (this.finished) {
      throw new VariantError("InvalidBuilderState", "Builder has already finished");
    }
  }

  protected beforeValue(): void {
    if (this.hasRoot) {
      throw new VariantError("InvalidBuilderState", "A variant holds exactly one root value");
    }
  }

  protected afterValue(): void {
    this.hasRoot = true;
  }
}

/** Encodes a plain JavaScript value in one call. */
export const encodeVariant = (value: VariantInput, options: VariantBuilderOptions = {}): EncodedVariant =>
  new VariantBuilder(options).appendValue(value).finish();

/**
 * Rewrites object field ids from insertion order to dictionary order. Id
 * widths and therefore container sizes can change, so every container on the
 * way is re-encoded.
 */
const remapFieldIds = (value: Buffer, remap: Uint32Array): Buffer => {
  const out = new ByteSink(value.length);
  rewriteValue(value, 0, remap, out);
  return out.toBuffer();
};

const rewriteValue = (source: Buffer, pos: number, remap: Uint32Array, out: ByteSink): void => {
  const basicType = basicTypeOf(source[pos]);
  if (basicType !== BasicType.Object && basicType !== BasicType.Array) {
    out.writeBytes(source.subarray(pos, pos + valueSize(source, pos)));
    return;
  }

  const layout = readContainerLayout(source, pos);
  const children = new ByteSink();
  const offsets: number[] = [];
  for (let index = 0; index < layout.count; index += 1) {
    offsets.push(children.length);
    rewriteValue(source, layout.dataStart + containerOffset(source, layout, index), remap, children);
  }
  offsets.push(children.length);

  const isLarge = layout.count > 0xff;
  const offsetSize = byteWidthFor(children.length);
  if (basicType === BasicType.Object) {
    const ids: number[] = [];
    for (let index = 0; index < layout.count; index += 1) {
      ids.push(remap[containerFieldId(source, layout, index)]);
    }
    const idSize = byteWidthFor(ids.reduce((max, id) => Math.max(max, id), 0));
    out.writeUInt8(objectHeader(isLarge, idSize, offsetSize));
    out.writeUnsigned(layout.count, isLarge ? 4 : 1);
    for (const id of ids) out.writeUnsigned(id, idSize);
  } else {
    out.writeUInt8(arrayHeader(isLarge, offsetSize));
    out.writeUnsigned(layout.count, isLarge ? 4 : 1);
  }
  for (const offset of offsets) out.writeUnsigned(offset, offsetSize);
  out.writeBytes(children.view());
};
