export type VariantErrorKind =
  | "UnsupportedVersion"
  | "OffsetOutOfBounds"
  | "InvalidUtf8"
  | "DuplicateField"
  | "TypeMismatch"
  | "UnsortedDictionary"
  | "RecursionLimitExceeded"
  | "JsonParseError"
  | "UnknownType"
  | "InvalidDecimal"
  | "CapacityExceeded"
  | "InvalidBuilderState"
  | "InvalidValue";

/** Which buffer of the pair an error offset points into. */
export type VariantSection = "metadata" | "value";

export type VariantErrorDetails = {
  offset?: number;
  section?: VariantSection;
};

export class VariantError extends Error {
  readonly kind: VariantErrorKind;
  readonly offset?: number;
  readonly section?: VariantSection;

  /** `section` defaults to "value" when an offset is given. */
  constructor(kind: VariantErrorKind, message: string, details: VariantErrorDetails = {}) {
    const section = details.section ?? (details.offset === undefined ? undefined : "value");
    super(details.offset === undefined ? message : `${message} (${section} offset ${details.offset})`);
    this.name = "VariantError";
    this.kind = kind;
    this.offset = details.offset;
    this.section = section;
  }
}

/**
 * `position` is where the tokenizer gave up. Lookahead means the fault can sit
 * up to 16 characters before it.
 */
export class JsonParseError extends VariantError {
  readonly position: number;

  constructor(position: number, message: string) {
    super("JsonParseError", `Invalid JSON at or before position ${position}: ${message}`);
    this.name = "JsonParseError";
    this.position = position;
  }
}

export const isVariantError = (error: unknown): error is VariantError =>
  error instanceof VariantError;
