import fc from "fast-check";
import { describe, expect, it } from "vitest";
import { JsonParseError } from "../binary/errors.js";
import { Variant } from "../binary/reader.js";
import { isValidVariant } from "../binary/validator.js";
import { fromJson, VariantJsonWriter } from "./fromJson.js";
import { toJson } from "./toJson.js";

const roundTrip = async (text: string, options?: Parameters<typeof fromJson>[1]): Promise<string> => {
  const { metadata, value } = await fromJson(text, options);
  return toJson(metadata, value);
};

describe("fromJson", () => {
  it("encodes a document whose keys come back in sorted order", async () => {
    const { metadata, value } = await fromJson('{"b":1,"a":[true,null,"x"]}');

    expect(isValidVariant(metadata, value)).toBe(true);
    expect([...Variant.fromBytes(metadata, value).metadata]).toEqual(["a", "b"]);
    expect(toJson(metadata, value)).toBe('{"a":[true,null,"x"],"b":1}');
  });

  it("keeps insertion order in an unsorted dictionary", async () => {
    const { metadata, value } = await fromJson('{"b":1,"a":2}', { sortedDictionary: false });
    const root = Variant.fromBytes(metadata, value);

    expect(root.metadata.isSorted).toBe(false);
    expect([...root.metadata]).toEqual(["b", "a"]);
    expect(toJson(metadata, value)).toBe('{"a":2,"b":1}');
  });

  it("encodes scalars at the root", async () => {
    expect(await roundTrip("null")).toBe("null");
    expect(await roundTrip(' "hi" ')).toBe('"hi"');
    expect(await roundTrip("false")).toBe("false");
  });

  it("picks the narrowest integer width", async () => {
    const kinds = async (text: string) => {
      const { metadata, value } = await fromJson(text);
      return [...Variant.fromBytes(metadata, value).asArray()].map((element) => element.kind());
    };

    expect(await kinds("[127,-129,70000,9223372036854775807]")).toEqual(["int8", "int16", "int32", "int64"]);
    expect(await roundTrip("[9223372036854775807,-9223372036854775808]")).toBe(
      "[9223372036854775807,-9223372036854775808]"
    );
  });

  it("encodes literals with a fraction or exponent as doubles", async () => {
    const { metadata, value } = await fromJson("[1.0,2e2,-0.5]");
    const list = Variant.fromBytes(metadata, value).asArray();

    expect([...list].map((element) => element.kind())).toEqual(["double", "double", "double"]);
    expect(toJson(metadata, value)).toBe("[1,200,-0.5]");
  });

  it("handles integers past 64 bits according to largeIntegers", async () => {
    await expect(fromJson("18446744073709551616")).rejects.toMatchObject({
      kind: "InvalidValue",
      message: "Integer 18446744073709551616 does not fit in 64 bits",
    });

    const decimal = await fromJson("18446744073709551616", { largeIntegers: "decimal" });
    expect(Variant.fromBytes(decimal.metadata, decimal.value).kind()).toBe("decimal16");
    expect(toJson(decimal.metadata, decimal.value)).toBe("18446744073709551616");

    expect(await roundTrip("18446744073709551616", { largeIntegers: "double" })).toBe("18446744073709552000");
  });

  it("round-trips arbitrary JSON documents", async () => {
    await fc.assert(
      fc.asyncProperty(fc.json(), async (text) => {
        // Doubles such as 1e20 print without an exponent and overflow int64.
        const rendered = await roundTrip(text, { largeIntegers: "double" });
        const expected: unknown = JSON.parse(text);
        const actual: unknown = JSON.parse(rendered);
        expect(actual).toEqual(expected);
      })
    );
  });

  it("rejects duplicate keys", async () => {
    await expect(fromJson('{"a":1,"a":2}')).rejects.toMatchObject({ kind: "DuplicateField" });
  });

  it("limits nesting depth", async () => {
    await expect(fromJson("[[1]]", { maxDepth: 1 })).rejects.toMatchObject({ kind: "RecursionLimitExceeded" });
    expect(await roundTrip("[[1]]", { maxDepth: 2 })).toBe("[[1]]");
  });

  it("reports malformed JSON with a position", async () => {
    const error: unknown = await fromJson("[1,2").catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(JsonParseError);
    expect(error).toMatchObject({
      kind: "JsonParseError",
      position: 4,
      message: expect.stringMatching(/^Invalid JSON at or before position 4: /),
    });
  });

  it("reports a missing value at the end of the text", async () => {
    await expect(fromJson('{"a":}')).rejects.toMatchObject({ kind: "JsonParseError", position: 6 });
  });

  it("rejects empty input", async () => {
    await expect(fromJson("")).rejects.toMatchObject({ kind: "JsonParseError", position: 0 });
  });
});

describe("VariantJsonWriter", () => {
  it("builds from events written directly", () => {
    const writer = new VariantJsonWriter();
    writer.writeStartObject();
    writer.writeKey("n");
    writer.writeNumber("-7");
    writer.writeEndObject();

    expect(writer.isComplete).toBe(true);
    const { metadata, value } = writer.finish();
    expect(toJson(metadata, value)).toBe('{"n":-7}');
  });

  it("refuses to finish an open document", () => {
    const writer = new VariantJsonWriter();
    writer.writeStartArray();

    expect(writer.isComplete).toBe(false);
    expect(() => writer.finish()).toThrow("JSON input ended before a complete value");
  });

  it("rejects mismatched ends and keys outside objects", () => {
    const writer = new VariantJsonWriter();
    writer.writeStartArray();

    expect(() => writer.writeKey("k")).toThrow('Key "k" outside an object');
    expect(() => writer.writeEndObject()).toThrow("Object end without a matching start");
  });
});
