export { createStreamParser, locateParseError, parseJsonStream } from "./parser/streamParser.js";
export type { JsonEventSink } from "./parser/streamParser.js";
export { MetadataBuilder, VariantMetadata } from "./binary/metadata.js";
export type { FinishedMetadata, MetadataBuilderOptions } from "./binary/metadata.js";
export { encodeVariant, ListBuilder, ObjectBuilder, ValueAppender, VariantBuilder } from "./binary/builder.js";
export type { EncodedVariant, TimestampOptions, VariantBuilderOptions, VariantInput } from "./binary/builder.js";
export { Variant, VariantList, VariantObject } from "./binary/reader.js";
export type { VariantDecimal, VariantTimestamp } from "./binary/reader.js";
export { getPath, VariantPath } from "./binary/path.js";
export type { PathElement } from "./binary/path.js";
export { DEFAULT_MAX_DEPTH, isValidVariant, validateVariant } from "./binary/validator.js";
export type { ValidatorOptions } from "./binary/validator.js";
export { analyzeVariant, VariantAnalyzer } from "./binary/analyzer.js";
export type { VariantReport } from "./binary/analyzer.js";
export { isVariantError, JsonParseError, VariantError } from "./binary/errors.js";
export type { VariantErrorKind, VariantSection } from "./binary/errors.js";
export { BasicType, DECIMAL_MAX_PRECISION, FORMAT_VERSION, PrimitiveType } from "./binary/format.js";
export type { ValueKind } from "./binary/format.js";
export { fromJson, VariantJsonWriter } from "./json/fromJson.js";
export type { FromJsonOptions, LargeIntegerMode } from "./json/fromJson.js";
export { formatDate, formatDecimal, formatTime, formatTimestamp, renderJson, toJson, variantToJs } from "./json/toJson.js";
export type { JsValue } from "./json/toJson.js";
