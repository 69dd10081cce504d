import { isUtf8 } from "node:buffer";
import { asBuffer, ByteSink, checkRange, readUnsigned } from "./bytes.js";
import { VariantError } from "./errors.js";
import {
  byteWidthFor,
  decodeMetadataOffsetSize,
  FORMAT_VERSION,
  MAX_U32,
  METADATA_SORTED_FLAG,
  METADATA_VERSION_MASK,
  metadataHeader,
  type ByteWidth,
} from "./format.js";

export type MetadataBuilderOptions = {
  /** Write names in UTF-8 byte order and set the sorted flag. Defaults to true. */
  sorted?: boolean;
  /** Names registered up front, in this insertion order. */
  fieldNames?: Iterable<string>;
  maxFieldNames?: number;
  maxDictionaryBytes?: number;
};

export type FinishedMetadata = {
  bytes: Buffer;
  /** remap[insertionId] is the name's position in the written dictionary. */
  remap: Uint32Array;
  /** Whether every insertion id kept its position. */
  identity: boolean;
};

export class MetadataBuilder {
  private readonly names: string[] = [];
  private readonly encoded: Buffer[] = [];
  private readonly ids = new Map<string, number>();
  private byteLength = 0;
  readonly sorted: boolean;

  constructor(private readonly options: MetadataBuilderOptions = {}) {
    this.sorted = options.sorted ?? true;
    for (const name of options.fieldNames ?? []) {
      this.addKey(name);
    }
  }

  get size(): number {
    return this.names.length;
  }

  addKey(name: string): number {
    const existing = this.ids.get(name);
    if (existing !== undefined) {
      return existing;
    }

    const bytes = Buffer.from(name, "utf8");
    const { maxFieldNames, maxDictionaryBytes } = this.options;
    if (maxFieldNames !== undefined && this.names.length >= maxFieldNames) {
      throw new VariantError("CapacityExceeded", `Field name limit exceeded (${maxFieldNames})`);
    }
    if (maxDictionaryBytes !== undefined && this.byteLength + bytes.length > maxDictionaryBytes) {
      throw new VariantError(
        "CapacityExceeded",
        `Dictionary size limit exceeded (${maxDictionaryBytes} bytes)`
      );
    }
    if (this.names.length >= MAX_U32 || this.byteLength + bytes.length > MAX_U32) {
      throw new VariantError("CapacityExceeded", "Dictionary exceeds the 32-bit offset range");
    }

    const id = this.names.length;
    this.names.push(name);
    this.encoded.push(bytes);
    this.ids.set(name, id);
    this.byteLength += bytes.length;
    return id;
  }

  nameOf(id: number): string {
    const name = this.names[id];
    if (name === undefined) {
      throw new VariantError("OffsetOutOfBounds", `Unknown field id ${id}`);
    }
    return name;
  }

  keyBytes(id: number): Buffer {
    const bytes = this.encoded[id];
    if (bytes === undefined) {
      throw new VariantError("OffsetOutOfBounds", `Unknown field id ${id}`);
    }
    return bytes;
  }

  finish(): FinishedMetadata {
    const count = this.names.length;
    const order = this.names.map((_, id) => id);
    if (this.sorted) {
      order.sort((a, b) => Buffer.compare(this.encoded[a], this.encoded[b]));
    }

    const remap = new Uint32Array(count);
    let identity = true;
    order.forEach((id, position) => {
      remap[id] = position;
      if (id !== position) identity = false;
    });

    const offsetSize = byteWidthFor(Math.max(count, this.byteLength));
    const sink = new ByteSink(1 + offsetSize * (count + 2) + this.byteLength);
    sink.writeUInt8(metadataHeader(this.sorted, offsetSize));
    sink.writeUnsigned(count, offsetSize);

    let offset = 0;
    sink.writeUnsigned(offset, offsetSize);
    for (const id of order) {
      offset += this.encoded[id].length;
      sink.writeUnsigned(offset, offsetSize);
    }
    for (const id of order) {
      sink.writeBytes(this.encoded[id]);
    }

    return { bytes: sink.toBuffer(), remap, identity };
  }
}

/**
 * Read view over a metadata buffer. Construction checks the version, the
 * offset table and the UTF-8 of every entry; names are decoded on first use.
 */
export class VariantMetadata implements Iterable<string> {
  readonly bytes: Buffer;
  readonly isSorted: boolean;
  readonly offsetSize: ByteWidth;
  readonly length: number;
  private readonly offsetsStart: number;
  private readonly stringsStart: number;
  private readonly cache: Array<string | undefined>;

  constructor(bytes: Uint8Array) {
    const buffer = asBuffer(bytes);
    checkRange(buffer, 0, 1, "metadata", "Metadata header");

    const header = buffer[0];
    const version = header & METADATA_VERSION_MASK;
    if (version !== FORMAT_VERSION) {
      throw new VariantError("UnsupportedVersion", `Unsupported metadata version: ${version}`, {
        offset: 0,
        section: "metadata",
      });
    }

    this.bytes = buffer;
    this.isSorted = (header & METADATA_SORTED_FLAG) !== 0;
    this.offsetSize = decodeMetadataOffsetSize(header);
    this.length = readUnsigned(buffer, 1, this.offsetSize, "metadata");
    this.offsetsStart = 1 + this.offsetSize;
    this.stringsStart = this.offsetsStart + (this.length + 1) * this.offsetSize;
    checkRange(buffer, this.offsetsStart, this.stringsStart - this.offsetsStart, "metadata", "Dictionary offsets");

    let previous = this.offsetAt(0);
    for (let id = 0; id < this.length; id += 1) {
      const next = this.offsetAt(id + 1);
      const at = this.offsetsStart + (id + 1) * this.offsetSize;
      if (next < previous) {
        throw new VariantError("OffsetOutOfBounds", `Dictionary offsets decrease at entry ${id}`, {
          offset: at,
          section: "metadata",
        });
      }
      if (this.stringsStart + next > buffer.length) {
        throw new VariantError("OffsetOutOfBounds", `Dictionary entry ${id} ends past the buffer`, {
          offset: at,
          section: "metadata",
        });
      }
      if (!isUtf8(buffer.subarray(this.stringsStart + previous, this.stringsStart + next))) {
        throw new VariantError("InvalidUtf8", `Dictionary entry ${id} is not valid UTF-8`, {
          offset: this.stringsStart + previous,
          section: "metadata",
        });
      }
      previous = next;
    }

    this.cache = new Array<string | undefined>(this.length);
  }

  get(id: number): string {
    this.checkId(id);
    const cached = this.cache[id];
    if (cached !== undefined) {
      return cached;
    }
    const [start, end] = this.span(id);
    const name = this.bytes.toString("utf8", start, end);
    this.cache[id] = name;
    return name;
  }

  /** Raw UTF-8 bytes of entry `id`, without copying. */
  entryBytes(id: number): Buffer {
    this.checkId(id);
    const [start, end] = this.span(id);
    return this.bytes.subarray(start, end);
  }

  /** Byte position of entry `id` within the metadata buffer. */
  entryOffset(id: number): number {
    this.checkId(id);
    return this.span(id)[0];
  }

  /** Sign of entry `id` compared to `target` in UTF-8 byte order. */
  compareEntry(id: number, target: Buffer): number {
    const [start, end] = this.span(id);
    return this.bytes.compare(target, 0, target.length, start, end);
  }

  /** Binary search for `name`; requires a sorted dictionary. */
  find(name: string): number | undefined {
    if (!this.isSorted) {
      throw new VariantError("UnsortedDictionary", "Sorted lookup requested on an unsorted dictionary");
    }
    const target = Buffer.from(name, "utf8");
    let low = 0;
    let high = this.length - 1;
    while (low <= high) {
      const mid = (low + high) >>> 1;
      const cmp = this.compareEntry(mid, target);
      if (cmp === 0) return mid;
      if (cmp < 0) low = mid + 1;
      else high = mid - 1;
    }
    return undefined;
  }

  /** Linear lookup; works for sorted and unsorted dictionaries. */
  scan(name: string): number | undefined {
    const target = Buffer.from(name, "utf8");
    for (let id = 0; id < this.length; id += 1) {
      if (this.compareEntry(id, target) === 0) return id;
    }
    return undefined;
  }

  *[Symbol.iterator](): Iterator<string> {
    for (let id = 0; id < this.length; id += 1) {
      yield this.get(id);
    }
  }

  private checkId(id: number): void {
    if (!Number.isInteger(id) || id < 0 || id >= this.length) {
      throw new VariantError(
        "OffsetOutOfBounds",
        `Field id ${id} is out of range for a dictionary of ${this.length} entries`
      );
    }
  }

  private offsetAt(index: number): number {
    return this.bytes.readUIntLE(this.offsetsStart + index * this.offsetSize, this.offsetSize);
  }

  private span(id: number): [number, number] {
    return [this.stringsStart + this.offsetAt(id), this.stringsStart + this.offsetAt(id + 1)];
  }
}
