import { readUnsigned } from "./bytes.js";
import { VariantError } from "./errors.js";
import {
  BASIC_TYPE_MASK,
  BasicType,
  decodeArrayHeader,
  decodeObjectHeader,
  isPrimitiveType,
  PRIMITIVE_PAYLOAD_SIZE,
  TYPE_INFO_SHIFT,
  type ByteWidth,
} from "./format.js";

/** Positions of the tables inside an object or array value. */
export type ContainerLayout = {
  basicType: BasicType.Object | BasicType.Array;
  count: number;
  idSize: ByteWidth;
  offsetSize: ByteWidth;
  idsStart: number;
  offsetsStart: number;
  dataStart: number;
};

export const basicTypeOf = (header: number): BasicType => header & BASIC_TYPE_MASK;

export const typeInfoOf = (header: number): number => header >> TYPE_INFO_SHIFT;

export const readContainerLayout = (buffer: Buffer, pos: number): ContainerLayout => {
  const header = readUnsigned(buffer, pos, 1);
  const basicType = basicTypeOf(header);
  if (basicType !== BasicType.Object && basicType !== BasicType.Array) {
    throw new VariantError("TypeMismatch", "Value is not an object or array", { offset: pos });
  }

  const { isLarge, idSize, offsetSize } =
    basicType === BasicType.Object ? decodeObjectHeader(header) : decodeArrayHeader(header);
  const countSize = isLarge ? 4 : 1;
  const count = readUnsigned(buffer, pos + 1, countSize);
  const idsStart = pos + 1 + countSize;
  const offsetsStart = basicType === BasicType.Object ? idsStart + count * idSize : idsStart;
  const dataStart = offsetsStart + (count + 1) * offsetSize;

  return { basicType, count, idSize, offsetSize, idsStart, offsetsStart, dataStart };
};

export const containerOffset = (buffer: Buffer, layout: ContainerLayout, index: number): number =>
  readUnsigned(buffer, layout.offsetsStart + index * layout.offsetSize, layout.offsetSize);

export const containerFieldId = (buffer: Buffer, layout: ContainerLayout, index: number): number =>
  readUnsigned(buffer, layout.idsStart + index * layout.idSize, layout.idSize);

/** Total encoded size of the value starting at `pos`, header included. */
export const valueSize = (buffer: Buffer, pos: number): number => {
  const header = readUnsigned(buffer, pos, 1);
  switch (basicTypeOf(header)) {
    case BasicType.Primitive: {
      const type = typeInfoOf(header);
      if (!isPrimitiveType(type)) {
        throw new VariantError("UnknownType", `Unknown primitive type id ${type}`, { offset: pos });
      }
      const payload = PRIMITIVE_PAYLOAD_SIZE[type];
      return payload >= 0 ? 1 + payload : 5 + readUnsigned(buffer, pos + 1, 4);
    }
    case BasicType.ShortString:
      return 1 + typeInfoOf(header);
    case BasicType.Object:
    case BasicType.Array: {
      const layout = readContainerLayout(buffer, pos);
      return layout.dataStart - pos + containerOffset(buffer, layout, layout.count);
    }
  }
};
