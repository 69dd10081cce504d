import { Readable } from "node:stream";
import {
  ListBuilder,
  ObjectBuilder,
  VariantBuilder,
  type EncodedVariant,
  type ValueAppender,
  type VariantBuilderOptions,
} from "../binary/builder.js";
import { isVariantError, JsonParseError, VariantError } from "../binary/errors.js";
import { DEFAULT_MAX_DEPTH } from "../binary/validator.js";
import { locateParseError, parseJsonStream, type JsonEventSink } from "../parser/streamParser.js";

/** What to do with an integer literal outside the int64 range. */
export type LargeIntegerMode = "error" | "decimal" | "double";

export type FromJsonOptions = VariantBuilderOptions & {
  largeIntegers?: LargeIntegerMode;
  /** Deepest allowed nesting of arrays and objects. */
  maxDepth?: number;
};

const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;
const DECIMAL16_PRECISION = 38;

/** Drives a `VariantBuilder` from JSON parser events. */
export class VariantJsonWriter implements JsonEventSink {
  private readonly builder: VariantBuilder;
  private readonly scopes: Array<ObjectBuilder | ListBuilder> = [];
  private readonly largeIntegers: LargeIntegerMode;
  private readonly maxDepth: number;
  private hasRoot = false;

  constructor(options: FromJsonOptions = {}) {
    const { largeIntegers = "error", maxDepth = DEFAULT_MAX_DEPTH, ...builderOptions } = options;
    this.builder = new VariantBuilder(builderOptions);
    this.largeIntegers = largeIntegers;
    this.maxDepth = maxDepth;
  }

  /** A whole value was written and every object and array is closed. */
  get isComplete(): boolean {
    return this.hasRoot && this.scopes.length === 0;
  }

  writeStartObject(): void {
    this.enter(this.target().startObject());
  }

  writeEndObject(): void {
    const scope = this.scopes.pop();
    if (!(scope instanceof ObjectBuilder)) {
      throw new VariantError("InvalidBuilderState", "Object end without a matching start");
    }
    scope.end();
    this.afterValue();
  }

  writeStartArray(): void {
    this.enter(this.target().startArray());
  }

  writeEndArray(): void {
    const scope = this.scopes.pop();
    if (!(scope instanceof ListBuilder)) {
      throw new VariantError("InvalidBuilderState", "Array end without a matching start");
    }
    scope.end();
    this.afterValue();
  }

  writeKey(key: string): void {
    const scope = this.scopes.at(-1);
    if (!(scope instanceof ObjectBuilder)) {
      throw new VariantError("InvalidBuilderState", `Key "${key}" outside an object`);
    }
    scope.key(key);
  }

  writeString(value: string): void {
    this.target().appendString(value);
    this.afterValue();
  }

  /**
   * Literals with a fraction or exponent become doubles; integers take the
   * narrowest integer width, and past int64 follow `largeIntegers`.
   */
  writeNumber(raw: string): void {
    const target = this.target();
    if (/[.eE]/.test(raw)) {
      target.appendDouble(Number(raw));
    } else {
      const value = BigInt(raw);
      if (value >= INT64_MIN && value <= INT64_MAX) {
        target.appendInt(value);
      } else if (this.largeIntegers === "decimal") {
        target.appendDecimal(value, DECIMAL16_PRECISION, 0);
      } else if (this.largeIntegers === "double") {
        target.appendDouble(Number(raw));
      } else {
        throw new VariantError("InvalidValue", `Integer ${raw} does not fit in 64 bits`);
      }
    }
    this.afterValue();
  }

  writeBoolean(value: boolean): void {
    this.target().appendBoolean(value);
    this.afterValue();
  }

  writeNull(): void {
    this.target().appendNull();
    this.afterValue();
  }

  finish(): EncodedVariant {
    if (!this.isComplete) {
      throw new VariantError("InvalidBuilderState", "JSON input ended before a complete value");
    }
    return this.builder.finish();
  }

  private target(): ValueAppender {
    return this.scopes.at(-1) ?? this.builder;
  }

  private enter(scope: ObjectBuilder | ListBuilder): void {
    if (this.scopes.length >= this.maxDepth) {
      scope.abort();
      throw new VariantError("RecursionLimitExceeded", `JSON nesting exceeds ${this.maxDepth} levels`);
    }
    this.scopes.push(scope);
  }

  private afterValue(): void {
    if (this.scopes.length === 0) {
      this.hasRoot = true;
    }
  }
}

/**
 * Parses JSON text into a metadata/value pair. Object keys go through the
 * dictionary, which is sorted once the whole tree is built.
 */
export const fromJson = async (text: string, options: FromJsonOptions = {}): Promise<EncodedVariant> => {
  const writer = new VariantJsonWriter(options);
  try {
    await parseJsonStream(Readable.from([text]), writer);
  } catch (error) {
    if (isVariantError(error)) {
      throw error;
    }
    const message = error instanceof Error ? error.message : String(error);
    throw new JsonParseError(await locateParseError(text), message);
  }
  if (!writer.isComplete) {
    throw new JsonParseError(text.length, "Unexpected end of input");
  }
  return writer.finish();
};
