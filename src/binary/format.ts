/**
 * Variant binary format (v1)
 *
 * A document is a pair of buffers. All integers are little-endian.
 *
 * [Metadata buffer]
 *   - header: u8
 *       bits 0-3  version (1)
 *       bit  4    sorted_strings
 *       bits 6-7  offset_size - 1
 *   - dictionary_size: offset_size bytes
 *   - offsets: (dictionary_size + 1) * offset_size bytes
 *   - bytes: concatenated UTF-8 field names
 *
 * [Value buffer]
 *   - header: u8
 *       bits 0-1  basic type (see BasicType)
 *       bits 2-7  type info
 *   - primitive:    type info is a PrimitiveType, payload follows
 *   - short string: type info is the byte length, bytes follow
 *   - object:       type info = is_large << 4 | (id_size - 1) << 2 | (offset_size - 1)
 *                   num_elements (u8, or u32 when is_large)
 *                   field ids, num_elements + 1 offsets, field values
 *   - array:        type info = is_large << 2 | (offset_size - 1)
 *                   num_elements (u8, or u32 when is_large)
 *                   num_elements + 1 offsets, element values
 */

export const FORMAT_VERSION = 1;

export const METADATA_VERSION_MASK = 0x0f;
export const METADATA_SORTED_FLAG = 0x10;
export const METADATA_OFFSET_SIZE_SHIFT = 6;

export const BASIC_TYPE_MASK = 0x03;
export const TYPE_INFO_SHIFT = 2;

export const MAX_SHORT_STRING_BYTES = 63;
export const MAX_U32 = 0xffffffff;

export enum BasicType {
  Primitive = 0,
  ShortString = 1,
  Object = 2,
  Array = 3,
}

export enum PrimitiveType {
  Null = 0,
  True = 1,
  False = 2,
  Int8 = 3,
  Int16 = 4,
  Int32 = 5,
  Int64 = 6,
  Double = 7,
  Decimal4 = 8,
  Decimal8 = 9,
  Decimal16 = 10,
  Date = 11,
  Timestamp = 12,
  TimestampNtz = 13,
  Float = 14,
  Binary = 15,
  String = 16,
  TimeNtz = 17,
  TimestampNanos = 18,
  TimestampNtzNanos = 19,
  Uuid = 20,
}

export type ByteWidth = 1 | 2 | 3 | 4;

export type ValueKind =
  | "null"
  | "boolean"
  | "int8"
  | "int16"
  | "int32"
  | "int64"
  | "float"
  | "double"
  | "decimal4"
  | "decimal8"
  | "decimal16"
  | "date"
  | "timestamp"
  | "timestampNtz"
  | "timestampNanos"
  | "timestampNtzNanos"
  | "time"
  | "binary"
  | "shortString"
  | "string"
  | "uuid"
  | "object"
  | "array";

export const PRIMITIVE_KINDS: Readonly<Record<PrimitiveType, ValueKind>> = {
  [PrimitiveType.Null]: "null",
  [PrimitiveType.True]: "boolean",
  [PrimitiveType.False]: "boolean",
  [PrimitiveType.Int8]: "int8",
  [PrimitiveType.Int16]: "int16",
  [PrimitiveType.Int32]: "int32",
  [PrimitiveType.Int64]: "int64",
  [PrimitiveType.Double]: "double",
  [PrimitiveType.Decimal4]: "decimal4",
  [PrimitiveType.Decimal8]: "decimal8",
  [PrimitiveType.Decimal16]: "decimal16",
  [PrimitiveType.Date]: "date",
  [PrimitiveType.Timestamp]: "timestamp",
  [PrimitiveType.TimestampNtz]: "timestampNtz",
  [PrimitiveType.Float]: "float",
  [PrimitiveType.Binary]: "binary",
  [PrimitiveType.String]: "string",
  [PrimitiveType.TimeNtz]: "time",
  [PrimitiveType.TimestampNanos]: "timestampNanos",
  [PrimitiveType.TimestampNtzNanos]: "timestampNtzNanos",
  [PrimitiveType.Uuid]: "uuid",
};

// Payload size after the header byte; -1 marks a u32 length-prefixed payload.
export const PRIMITIVE_PAYLOAD_SIZE: Readonly<Record<PrimitiveType, number>> = {
  [PrimitiveType.Null]: 0,
  [PrimitiveType.True]: 0,
  [PrimitiveType.False]: 0,
  [PrimitiveType.Int8]: 1,
  [PrimitiveType.Int16]: 2,
  [PrimitiveType.Int32]: 4,
  [PrimitiveType.Int64]: 8,
  [PrimitiveType.Double]: 8,
  [PrimitiveType.Decimal4]: 5,
  [PrimitiveType.Decimal8]: 9,
  [PrimitiveType.Decimal16]: 17,
  [PrimitiveType.Date]: 4,
  [PrimitiveType.Timestamp]: 8,
  [PrimitiveType.TimestampNtz]: 8,
  [PrimitiveType.Float]: 4,
  [PrimitiveType.Binary]: -1,
  [PrimitiveType.String]: -1,
  [PrimitiveType.TimeNtz]: 8,
  [PrimitiveType.TimestampNanos]: 8,
  [PrimitiveType.TimestampNtzNanos]: 8,
  [PrimitiveType.Uuid]: 16,
};

export const DECIMAL_MAX_PRECISION = {
  [PrimitiveType.Decimal4]: 9,
  [PrimitiveType.Decimal8]: 18,
  [PrimitiveType.Decimal16]: 38,
} as const;

export type DecimalType = keyof typeof DECIMAL_MAX_PRECISION;

export const isPrimitiveType = (value: number): value is PrimitiveType =>
  value >= PrimitiveType.Null && value <= PrimitiveType.Uuid;

export const isDecimalType = (type: PrimitiveType): type is DecimalType =>
  type === PrimitiveType.Decimal4 || type === PrimitiveType.Decimal8 || type === PrimitiveType.Decimal16;

/** Smallest little-endian width that can hold `max`. */
export const byteWidthFor = (max: number): ByteWidth => {
  if (max <= 0xff) return 1;
  if (max <= 0xffff) return 2;
  if (max <= 0xffffff) return 3;
  return 4;
};

export const primitiveHeader = (type: PrimitiveType): number =>
  (type << TYPE_INFO_SHIFT) | BasicType.Primitive;

export const shortStringHeader = (byteLength: number): number =>
  (byteLength << TYPE_INFO_SHIFT) | BasicType.ShortString;

export const objectHeader = (isLarge: boolean, idSize: ByteWidth, offsetSize: ByteWidth): number =>
  (((isLarge ? 1 : 0) << 4) | ((idSize - 1) << 2) | (offsetSize - 1)) << TYPE_INFO_SHIFT | BasicType.Object;

export const arrayHeader = (isLarge: boolean, offsetSize: ByteWidth): number =>
  (((isLarge ? 1 : 0) << 2) | (offsetSize - 1)) << TYPE_INFO_SHIFT | BasicType.Array;

export const metadataHeader = (sorted: boolean, offsetSize: ByteWidth): number =>
  FORMAT_VERSION | (sorted ? METADATA_SORTED_FLAG : 0) | ((offsetSize - 1) << METADATA_OFFSET_SIZE_SHIFT);

export type ContainerHeader = {
  isLarge: boolean;
  idSize: ByteWidth;
  offsetSize: ByteWidth;
};

const toWidth = (bits: number): ByteWidth => {
  switch (bits & 0x03) {
    case 0:
      return 1;
    case 1:
      return 2;
    case 2:
      return 3;
    default:
      return 4;
  }
};

export const decodeObjectHeader = (header: number): ContainerHeader => {
  const info = header >> TYPE_INFO_SHIFT;
  return {
    isLarge: (info & 0x10) !== 0,
    idSize: toWidth(info >> 2),
    offsetSize: toWidth(info),
  };
};

export const decodeArrayHeader = (header: number): ContainerHeader => {
  const info = header >> TYPE_INFO_SHIFT;
  return {
    isLarge: (info & 0x04) !== 0,
    idSize: 1,
    offsetSize: toWidth(info),
  };
};

export const decodeMetadataOffsetSize = (header: number): ByteWidth =>
  toWidth(header >> METADATA_OFFSET_SIZE_SHIFT);
