import { describe, expect, it } from "vitest";
import { catchError } from "../testing/catchError.js";
import { MetadataBuilder, VariantMetadata } from "./metadata.js";

describe("MetadataBuilder", () => {
  it("returns the same id for a repeated name", () => {
    const builder = new MetadataBuilder();
    const first = builder.addKey("x");
    builder.addKey("y");
    expect(builder.addKey("x")).toBe(first);
    expect(builder.size).toBe(2);
  });

  it("writes an empty sorted dictionary", () => {
    const { bytes, identity } = new MetadataBuilder().finish();
    expect([...bytes]).toEqual([0x11, 0x00, 0x00]);
    expect(identity).toBe(true);
  });

  it("sorts names by UTF-8 bytes and reports the remap", () => {
    const builder = new MetadataBuilder();
    builder.addKey("b");
    builder.addKey("a");
    const { bytes, remap, identity } = builder.finish();

    expect([...bytes]).toEqual([0x11, 0x02, 0x00, 0x01, 0x02, 0x61, 0x62]);
    expect([...remap]).toEqual([1, 0]);
    expect(identity).toBe(false);
  });

  it("keeps insertion order when unsorted", () => {
    const builder = new MetadataBuilder({ sorted: false });
    builder.addKey("b");
    builder.addKey("a");
    const { bytes, identity } = builder.finish();

    expect([...bytes]).toEqual([0x01, 0x02, 0x00, 0x01, 0x02, 0x62, 0x61]);
    expect(identity).toBe(true);
  });

  it("orders by bytes rather than UTF-16 code units", () => {
    // U+1F600 sorts before U+FF5E in UTF-16 but after it in UTF-8.
    const builder = new MetadataBuilder({ fieldNames: ["\u{1F600}", "～"] });
    const metadata = new VariantMetadata(builder.finish().bytes);
    expect([...metadata]).toEqual(["～", "\u{1F600}"]);
  });

  it("widens offsets past 255 bytes of names", () => {
    const builder = new MetadataBuilder({ fieldNames: ["a".repeat(200), "b".repeat(100)] });
    const { bytes } = builder.finish();
    expect(bytes[0]).toBe(0x11 | (1 << 6));
    expect(new VariantMetadata(bytes).offsetSize).toBe(2);
  });
});

describe("VariantMetadata", () => {
  const sorted = (...names: string[]): VariantMetadata =>
    new VariantMetadata(new MetadataBuilder({ fieldNames: names }).finish().bytes);

  it("reads entries back", () => {
    const metadata = sorted("name", "age", "city");
    expect(metadata.length).toBe(3);
    expect(metadata.isSorted).toBe(true);
    expect(metadata.get(0)).toBe("age");
    expect(metadata.get(2)).toBe("name");
  });

  it("finds names by binary search in agreement with a scan", () => {
    const names = ["delta", "alpha", "echo", "charlie", "bravo"];
    const metadata = sorted(...names);
    for (const name of names) {
      expect(metadata.find(name)).toBe(metadata.scan(name));
    }
    expect(metadata.find("zulu")).toBeUndefined();
  });

  it("refuses sorted lookup on an unsorted dictionary", () => {
    const bytes = new MetadataBuilder({ sorted: false, fieldNames: ["b", "a"] }).finish().bytes;
    const metadata = new VariantMetadata(bytes);
    expect(catchError(() => metadata.find("a"))).toMatchObject({ kind: "UnsortedDictionary" });
    expect(metadata.scan("a")).toBe(1);
  });

  it("bounds-checks ids", () => {
    const metadata = sorted("a");
    expect(catchError(() => metadata.get(1))).toMatchObject({ kind: "OffsetOutOfBounds" });
    expect(catchError(() => metadata.get(-1))).toMatchObject({ kind: "OffsetOutOfBounds" });
  });

  it("rejects an unknown version", () => {
    expect(catchError(() => new VariantMetadata(Buffer.from([0x12, 0x00, 0x00])))).toMatchObject({
      kind: "UnsupportedVersion",
      section: "metadata",
      offset: 0,
    });
  });

  it("rejects offsets past the buffer", () => {
    expect(catchError(() => new VariantMetadata(Buffer.from([0x11, 0x01, 0x00, 0x05, 0x61])))).toMatchObject({
      kind: "OffsetOutOfBounds",
      section: "metadata",
      offset: 3,
    });
  });

  it("rejects invalid UTF-8 entries", () => {
    expect(catchError(() => new VariantMetadata(Buffer.from([0x11, 0x01, 0x00, 0x01, 0xff])))).toMatchObject({
      kind: "InvalidUtf8",
      offset: 4,
    });
  });

  it("rejects a truncated header", () => {
    expect(catchError(() => new VariantMetadata(Buffer.alloc(0)))).toMatchObject({ kind: "OffsetOutOfBounds" });
  });
});
