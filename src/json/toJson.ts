import { VariantError } from "../binary/errors.js";
import { Variant, type VariantDecimal, type VariantTimestamp } from "../binary/reader.js";

/** Plain JavaScript form of a decoded value. */
export type JsValue = null | boolean | number | bigint | string | Buffer | JsValue[] | { [key: string]: JsValue };

const MILLIS_PER_DAY = 86_400_000;
// Date supports +/-100,000,000 days around the epoch.
const MAX_DATE_DAYS = 100_000_000;

export const formatDecimal = ({ unscaled, scale }: VariantDecimal): string => {
  const sign = unscaled < 0n ? "-" : "";
  const digits = (unscaled < 0n ? -unscaled : unscaled).toString();
  if (scale === 0) {
    return `${sign}${digits}`;
  }
  const padded = digits.padStart(scale + 1, "0");
  return `${sign}${padded.slice(0, -scale)}.${padded.slice(-scale)}`;
};

const isoInstant = (millis: bigint): string => {
  if (millis > BigInt(MAX_DATE_DAYS * MILLIS_PER_DAY) || millis < BigInt(-MAX_DATE_DAYS * MILLIS_PER_DAY)) {
    throw new VariantError("InvalidValue", `Instant ${millis}ms is outside the representable date range`);
  }
  return new Date(Number(millis)).toISOString();
};

/** `YYYY-MM-DD` for a day count since 1970-01-01. */
export const formatDate = (days: number): string => {
  const iso = isoInstant(BigInt(days) * BigInt(MILLIS_PER_DAY));
  return iso.slice(0, iso.indexOf("T"));
};

/** ISO-8601 with all stored fraction digits; `Z` only for UTC-adjusted values. */
export const formatTimestamp = ({ value, unit, utcAdjusted }: VariantTimestamp): string => {
  const perMilli = unit === "micros" ? 1_000n : 1_000_000n;
  let millis = value / perMilli;
  let rest = value % perMilli;
  if (rest < 0n) {
    rest += perMilli;
    millis -= 1n;
  }
  const iso = isoInstant(millis);
  const dot = iso.lastIndexOf(".");
  const fraction = `${iso.slice(dot + 1, dot + 4)}${rest.toString().padStart(unit === "micros" ? 3 : 6, "0")}`;
  return `${iso.slice(0, dot)}.${fraction}${utcAdjusted ? "Z" : ""}`;
};

/** `HH:MM:SS.ffffff` for microseconds since midnight. */
export const formatTime = (micros: bigint): string => {
  const pad = (value: bigint, width: number): string => value.toString().padStart(width, "0");
  const seconds = micros / 1_000_000n;
  return `${pad(seconds / 3600n, 2)}:${pad((seconds / 60n) % 60n, 2)}:${pad(seconds % 60n, 2)}.${pad(micros % 1_000_000n, 6)}`;
};

const renderScalar = (variant: Variant): string => {
  switch (variant.kind()) {
    case "null":
      return "null";
    case "boolean":
      return variant.asBoolean() ? "true" : "false";
    case "int8":
    case "int16":
    case "int32":
    case "int64":
      return variant.asBigInt().toString();
    case "float":
    case "double":
      return JSON.stringify(variant.asDouble());
    case "decimal4":
    case "decimal8":
    case "decimal16":
      return formatDecimal(variant.asDecimal());
    case "date":
      return JSON.stringify(formatDate(variant.asDate()));
    case "timestamp":
    case "timestampNtz":
    case "timestampNanos":
    case "timestampNtzNanos":
      return JSON.stringify(formatTimestamp(variant.asTimestamp()));
    case "time":
      return JSON.stringify(formatTime(variant.asTime()));
    case "binary":
      return JSON.stringify(variant.asBinary().toString("base64"));
    case "uuid":
      return JSON.stringify(variant.asUuid());
    case "shortString":
    case "string":
      return JSON.stringify(variant.asString());
    case "object":
    case "array":
      return renderJson(variant);
  }
};

/** Renders one value as compact JSON text; object fields come out in stored order. */
export const renderJson = (variant: Variant): string => {
  const kind = variant.kind();
  if (kind === "object") {
    const parts: string[] = [];
    for (const [name, field] of variant.asObject().fields()) {
      parts.push(`${JSON.stringify(name)}:${renderJson(field)}`);
    }
    return `{${parts.join(",")}}`;
  }
  if (kind === "array") {
    const parts: string[] = [];
    for (const element of variant.asArray()) {
      parts.push(renderJson(element));
    }
    return `[${parts.join(",")}]`;
  }
  return renderScalar(variant);
};

export const toJson = (metadata: Uint8Array, value: Uint8Array): string =>
  renderJson(Variant.fromBytes(metadata, value));

/**
 * Materializes a value as plain JavaScript. Integers outside the safe range
 * come back as bigint; decimals and temporal kinds as the strings `toJson`
 * prints; binary as a Buffer sharing the value's memory.
 */
export const variantToJs = (variant: Variant): JsValue => {
  switch (variant.kind()) {
    case "null":
      return null;
    case "boolean":
      return variant.asBoolean();
    case "int8":
    case "int16":
    case "int32":
      return variant.asInt();
    case "int64": {
      const value = variant.asBigInt();
      return value <= BigInt(Number.MAX_SAFE_INTEGER) && value >= BigInt(Number.MIN_SAFE_INTEGER)
        ? Number(value)
        : value;
    }
    case "float":
    case "double":
      return variant.asDouble();
    case "decimal4":
    case "decimal8":
    case "decimal16":
      return formatDecimal(variant.asDecimal());
    case "date":
      return formatDate(variant.asDate());
    case "timestamp":
    case "timestampNtz":
    case "timestampNanos":
    case "timestampNtzNanos":
      return formatTimestamp(variant.asTimestamp());
    case "time":
      return formatTime(variant.asTime());
    case "binary":
      return variant.asBinary();
    case "uuid":
      return variant.asUuid();
    case "shortString":
    case "string":
      return variant.asString();
    case "object":
      return Object.fromEntries(
        Array.from(variant.asObject().fields(), ([name, field]): [string, JsValue] => [name, variantToJs(field)])
      );
    case "array":
      return Array.from(variant.asArray(), (element) => variantToJs(element));
  }
};
