import { describe, expect, it } from "vitest";
import { catchError } from "../testing/catchError.js";
import { encodeVariant, VariantBuilder } from "./builder.js";
import { Variant } from "./reader.js";
import { isValidVariant } from "./validator.js";

describe("VariantBuilder", () => {
  it("encodes a two-field object byte for byte", () => {
    const { metadata, value } = encodeVariant({ a: 1, b: "x" });

    expect([...metadata]).toEqual([0x11, 0x02, 0x00, 0x01, 0x02, 0x61, 0x62]);
    expect([...value]).toEqual([
      0x02, // object, 1-byte ids and offsets
      0x02, // two fields
      0x00, 0x01, // ids: a, b
      0x00, 0x02, 0x04, // offsets
      0x0c, 0x01, // int8 1
      0x05, 0x78, // short string "x"
    ]);
  });

  it("encodes a mixed array byte for byte", () => {
    const { metadata, value } = new VariantBuilder()
      .appendArray((list) => {
        list.appendInt(1).appendDouble(2.5).appendNull();
      })
      .finish();

    expect([...metadata]).toEqual([0x11, 0x00, 0x00]);
    expect([...value]).toEqual([
      0x03, 0x03, 0x00, 0x02, 0x0b, 0x0c, 0x0c, 0x01, 0x1c, 0x00, 0x00, 0x00, 0x00, 0x00, 0x00, 0x04, 0x40,
      0x00,
    ]);
  });

  it("remaps ids when fields arrive out of name order", () => {
    const { metadata, value } = encodeVariant({ b: 1, a: 2 });

    expect([...metadata]).toEqual([0x11, 0x02, 0x00, 0x01, 0x02, 0x61, 0x62]);
    expect([...value]).toEqual([0x02, 0x02, 0x00, 0x01, 0x00, 0x02, 0x04, 0x0c, 0x02, 0x0c, 0x01]);
  });

  it("keeps insertion ids with an unsorted dictionary", () => {
    const { metadata, value } = encodeVariant({ b: 1, a: 2 }, { sortedDictionary: false });

    expect([...metadata]).toEqual([0x01, 0x02, 0x00, 0x01, 0x02, 0x62, 0x61]);
    expect([...value]).toEqual([0x02, 0x02, 0x01, 0x00, 0x00, 0x02, 0x04, 0x0c, 0x02, 0x0c, 0x01]);
    expect(Variant.fromBytes(metadata, value).asObject().get("a")?.asInt()).toBe(2);
  });

  it("remaps ids inside nested objects and arrays", () => {
    const { metadata, value } = encodeVariant({ zeta: [{ mid: 1, alpha: true }], beta: { zeta: null } });
    const root = Variant.fromBytes(metadata, value);

    expect(isValidVariant(metadata, value)).toBe(true);
    expect([...root.metadata]).toEqual(["alpha", "beta", "mid", "zeta"]);
    expect(root.getPath("zeta[0].alpha")?.asBoolean()).toBe(true);
    expect(root.getPath("beta.zeta")?.isNull()).toBe(true);
  });

  it("places the 63/64 byte short string boundary exactly", () => {
    const short = encodeVariant("x".repeat(63)).value;
    expect(short[0]).toBe((63 << 2) | 1);
    expect(short.length).toBe(64);

    const long = encodeVariant("x".repeat(64)).value;
    expect(long[0]).toBe(16 << 2);
    expect(long.readUInt32LE(1)).toBe(64);
    expect(long.length).toBe(69);
  });

  it("picks the narrowest integer width", () => {
    const header = (input: number | bigint) => encodeVariant(input).value[0] >> 2;
    expect(header(127)).toBe(3);
    expect(header(-129)).toBe(4);
    expect(header(40_000)).toBe(5);
    expect(header(2 ** 40)).toBe(6);
    expect(header(-(2n ** 63n))).toBe(6);
  });

  it("stores non-integral and negative zero numbers as doubles", () => {
    expect(encodeVariant(1.5).value[0] >> 2).toBe(7);
    expect(encodeVariant(-0).value[0] >> 2).toBe(7);
    expect(encodeVariant(Number.MAX_SAFE_INTEGER + 1).value[0] >> 2).toBe(7);
  });

  it("rejects integers outside 64 bits", () => {
    expect(catchError(() => encodeVariant(2n ** 63n))).toMatchObject({ kind: "InvalidValue" });
  });

  it("writes decimals in the smallest width for the precision", () => {
    const small = new VariantBuilder().appendDecimal(12345n, 5, 2).finish().value;
    expect([...small]).toEqual([0x20, 0x02, 0x39, 0x30, 0x00, 0x00]);

    const medium = new VariantBuilder().appendDecimal(-1, 10, 0).finish().value;
    expect(medium[0] >> 2).toBe(9);
    expect(medium.length).toBe(10);

    const large = new VariantBuilder().appendDecimal(-(10n ** 30n), 38, 4).finish();
    expect(large.value[0] >> 2).toBe(10);
    expect(Variant.fromBytes(large.metadata, large.value).asDecimal()).toEqual({
      unscaled: -(10n ** 30n),
      scale: 4,
      precision: 38,
    });
  });

  it("rejects decimals that do not fit their precision", () => {
    expect(catchError(() => new VariantBuilder().appendDecimal(1000n, 3, 0))).toMatchObject({
      kind: "InvalidDecimal",
    });
    expect(catchError(() => new VariantBuilder().appendDecimal(1n, 5, 6))).toMatchObject({
      kind: "InvalidDecimal",
    });
    expect(catchError(() => new VariantBuilder().appendDecimal(1n, 39, 0))).toMatchObject({
      kind: "InvalidDecimal",
    });
  });

  it("encodes dates, times, timestamps and uuids", () => {
    const at = new Date(Date.UTC(2024, 0, 2, 3, 4, 5, 678));
    const { metadata, value } = new VariantBuilder()
      .appendArray((list) => {
        list
          .appendDate(at)
          .appendTimestamp(at)
          .appendTimestamp(123n, { utcAdjusted: false, unit: "nanos" })
          .appendTime(3_723_000_042n)
          .appendUuid("123E4567-E89B-12D3-A456-426614174000");
      })
      .finish();
    const list = Variant.fromBytes(metadata, value).asArray();

    expect(list.get(0)?.asDate()).toBe(19724);
    expect(list.get(1)?.asTimestamp()).toEqual({
      value: BigInt(at.getTime()) * 1000n,
      unit: "micros",
      utcAdjusted: true,
    });
    expect(list.get(2)?.kind()).toBe("timestampNtzNanos");
    expect(list.get(3)?.asTime()).toBe(3_723_000_042n);
    expect(list.get(4)?.asUuid()).toBe("123e4567-e89b-12d3-a456-426614174000");
  });

  it("rejects out of range temporal values", () => {
    const builder = new VariantBuilder();
    expect(catchError(() => builder.appendTime(86_400_000_000n))).toMatchObject({ kind: "InvalidValue" });
    expect(catchError(() => builder.appendTimestamp(new Date(Number.NaN)))).toMatchObject({ kind: "InvalidValue" });
    expect(catchError(() => builder.appendUuid("not-a-uuid"))).toMatchObject({ kind: "InvalidValue" });
  });

  it("requires exactly one root value", () => {
    expect(catchError(() => new VariantBuilder().finish())).toMatchObject({ kind: "InvalidBuilderState" });
    expect(catchError(() => new VariantBuilder().appendNull().appendNull())).toMatchObject({
      kind: "InvalidBuilderState",
    });
  });

  it("cannot be used after finish", () => {
    const builder = new VariantBuilder().appendInt(1);
    builder.finish();
    expect(catchError(() => builder.finish())).toMatchObject({ kind: "InvalidBuilderState" });
  });

  it("skips undefined object members", () => {
    const { metadata, value } = encodeVariant({ kept: 1, dropped: undefined });
    expect([...Variant.fromBytes(metadata, value).asObject().keys()]).toEqual(["kept"]);
    expect([...Variant.fromBytes(metadata, value).metadata]).toEqual(["kept"]);
  });
});

describe("ObjectBuilder", () => {
  it("throws on a duplicate field and keeps the first value", () => {
    const builder = new VariantBuilder();
    const object = builder.startObject();
    object.insert("a", 1);

    expect(catchError(() => object.insert("a", 2))).toMatchObject({ kind: "DuplicateField" });

    object.insert("b", 2);
    object.end();
    const { metadata, value } = builder.finish();
    const decoded = Variant.fromBytes(metadata, value).asObject();
    expect(decoded.fieldCount).toBe(2);
    expect(decoded.get("a")?.asInt()).toBe(1);
  });

  it("refuses parent writes while a child scope is open", () => {
    const builder = new VariantBuilder();
    const object = builder.startObject();
    const child = object.key("list").startArray();

    expect(catchError(() => object.insert("other", 1))).toMatchObject({ kind: "InvalidBuilderState" });
    expect(catchError(() => object.end())).toMatchObject({ kind: "InvalidBuilderState" });

    child.appendInt(7).end();
    object.end();
    const { metadata, value } = builder.finish();
    expect(Variant.fromBytes(metadata, value).getPath("list[0]")?.asInt()).toBe(7);
  });

  it("discards an aborted child", () => {
    const builder = new VariantBuilder();
    const object = builder.startObject();
    const child = object.key("nested").startObject();
    child.insert("lost", true);
    child.abort();

    object.insert("nested", "replacement");
    object.end();
    const { metadata, value } = builder.finish();
    const root = Variant.fromBytes(metadata, value);

    expect(root.getPath("nested")?.asString()).toBe("replacement");
    expect(catchError(() => child.insert("late", 1))).toMatchObject({ kind: "InvalidBuilderState" });
  });

  it("aborts a closure scope that throws", () => {
    const builder = new VariantBuilder();
    const failure = catchError(() =>
      builder.appendObject((object) => {
        object.insert("a", 1);
        object.insert("a", 2);
      })
    );
    expect(failure).toMatchObject({ kind: "DuplicateField" });

    const { metadata, value } = builder.appendArray(() => {}).finish();
    expect(Variant.fromBytes(metadata, value).asArray().length).toBe(0);
  });

  it("requires a key before each value", () => {
    const object = new VariantBuilder().startObject();
    expect(catchError(() => object.appendInt(1))).toMatchObject({ kind: "InvalidBuilderState" });
    object.key("a");
    expect(catchError(() => object.key("b"))).toMatchObject({ kind: "InvalidBuilderState" });
  });

  it("rejects a field closure that appends nothing", () => {
    const object = new VariantBuilder().startObject();
    expect(catchError(() => object.field("a", () => {}))).toMatchObject({ kind: "InvalidBuilderState" });
    object.field("a", (field) => {
      field.appendString("ok");
    });
    expect(object.fieldCount).toBe(1);
  });

  it("uses large headers past 255 fields", () => {
    const input: Record<string, number> = {};
    for (let index = 0; index < 300; index += 1) {
      input[`field${String(index).padStart(3, "0")}`] = index;
    }
    const { metadata, value } = encodeVariant(input);
    const object = Variant.fromBytes(metadata, value).asObject();

    expect((value[0] >> 2) & 0x10).toBe(0x10);
    expect(object.fieldCount).toBe(300);
    expect(object.get("field299")?.asInt()).toBe(299);
    expect(isValidVariant(metadata, value)).toBe(true);
  });
});
