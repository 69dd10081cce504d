import type { ValueKind } from "./format.js";
import { VariantPath } from "./path.js";
import type { Variant } from "./reader.js";

export type VariantReport = {
  metadataBytes: number;
  valueBytes: number;
  dictionary: {
    entries: number;
    sorted: boolean;
    offsetSize: number;
  };
  kinds: Map<ValueKind, number>;
  objects: number;
  arrays: number;
  /** Deepest composite level; a scalar root has depth 0. */
  maxDepth: number;
  fieldNames: {
    uniqueCount: number;
    totalCount: number;
    uniqueBytes: number;
    totalBytes: number;
  };
  strings: {
    count: number;
    shortCount: number;
    bytes: number;
  };
  largestArray?: {
    path: string;
    length: number;
  };
};

type PendingValue = {
  variant: Variant;
  depth: number;
  path: VariantPath;
};

/**
 * Walks a value tree once and collects size and shape statistics. Uses an
 * explicit stack, so depth is bounded only by memory.
 */
export class VariantAnalyzer {
  private readonly kinds = new Map<ValueKind, number>();
  private readonly fieldUses = { totalCount: 0, totalBytes: 0 };
  private readonly strings = { count: 0, shortCount: 0, bytes: 0 };
  private objects = 0;
  private arrays = 0;
  private maxDepth = 0;
  private largestArray: VariantReport["largestArray"];
  private walked = false;

  constructor(private readonly root: Variant) {}

  getReport(): VariantReport {
    if (!this.walked) {
      this.walk();
      this.walked = true;
    }
    const { metadata } = this.root;
    let uniqueBytes = 0;
    for (let id = 0; id < metadata.length; id += 1) {
      uniqueBytes += metadata.entryBytes(id).length;
    }

    return {
      metadataBytes: metadata.bytes.length,
      valueBytes: this.root.bytes.length,
      dictionary: { entries: metadata.length, sorted: metadata.isSorted, offsetSize: metadata.offsetSize },
      kinds: this.kinds,
      objects: this.objects,
      arrays: this.arrays,
      maxDepth: this.maxDepth,
      fieldNames: { uniqueCount: metadata.length, uniqueBytes, ...this.fieldUses },
      strings: this.strings,
      largestArray: this.largestArray,
    };
  }

  private walk(): void {
    const pending: PendingValue[] = [{ variant: this.root, depth: 0, path: new VariantPath([]) }];

    for (let next = pending.pop(); next; next = pending.pop()) {
      const { variant, depth, path } = next;
      const kind = variant.kind();
      this.kinds.set(kind, (this.kinds.get(kind) ?? 0) + 1);

      if (kind === "object") {
        this.objects += 1;
        this.maxDepth = Math.max(this.maxDepth, depth + 1);
        const object = variant.asObject();
        for (let index = object.fieldCount - 1; index >= 0; index -= 1) {
          const name = object.fieldName(index);
          const field = object.fieldAt(index);
          this.fieldUses.totalCount += 1;
          this.fieldUses.totalBytes += Buffer.byteLength(name, "utf8");
          if (field) {
            pending.push({ variant: field, depth: depth + 1, path: path.field(name) });
          }
        }
      } else if (kind === "array") {
        this.arrays += 1;
        this.maxDepth = Math.max(this.maxDepth, depth + 1);
        const list = variant.asArray();
        if (!this.largestArray || list.length > this.largestArray.length) {
          this.largestArray = { path: path.toString(), length: list.length };
        }
        for (let index = list.length - 1; index >= 0; index -= 1) {
          const element = list.get(index);
          if (element) {
            pending.push({ variant: element, depth: depth + 1, path: path.index(index) });
          }
        }
      } else if (kind === "shortString" || kind === "string") {
        this.strings.count += 1;
        if (kind === "shortString") this.strings.shortCount += 1;
        this.strings.bytes += Buffer.byteLength(variant.asString(), "utf8");
      }
    }
  }
}

export const analyzeVariant = (variant: Variant): VariantReport => new VariantAnalyzer(variant).getReport();
