/**
 * Canonical JSON form of call payloads.
 *
 * Requests and results are stored as plain JSON. Values JSON cannot carry
 * (dates, byte arrays, bigints, maps, sets, non-finite numbers) are written as
 * a tagged object `{ "$type": <tag>, "value": <payload> }` so that
 * `decodeValue(encodeValue(x))` yields an equivalent `x`. A plain object whose
 * own keys are exactly `$type` and `value` is escaped as an `object` tag so it
 * never reads back as one of the others.
 */

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;
export interface JsonObject {
  [key: string]: JsonValue;
}

const TAGS = ["date", "bytes", "bigint", "map", "set", "number", "object", "message"] as const;
export type Tag = (typeof TAGS)[number];

export interface TaggedValue {
  $type: Tag;
  value: JsonValue;
}

const NUMBER_PATTERN = /^-?\d+$/;
const NON_FINITE = ["NaN", "Infinity", "-Infinity"];
const TAG_NAMES: ReadonlySet<string> = new Set(TAGS);
const INVALID = Symbol("invalid");

export function isJsonObject(value: unknown): value is JsonObject {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

export function tagged(tag: Tag, value: JsonValue): JsonObject {
  return { $type: tag, value };
}

function hasTagShape(value: JsonObject): boolean {
  const keys = Object.keys(value);
  return keys.length === 2 && Object.hasOwn(value, "$type") && Object.hasOwn(value, "value");
}

function hasToJSON(value: object): value is { toJSON(): unknown } {
  return "toJSON" in value && typeof value.toJSON === "function";
}

/**
 * Encode an arbitrary value into its canonical JSON form.
 *
 * Object keys come out sorted, `undefined` fields and functions are dropped,
 * and objects exposing `toJSON` (protobuf messages, for instance) are encoded
 * through it.
 */
export function encodeValue(value: unknown): JsonValue {
  return encode(value, new Set());
}

function encode(value: unknown, ancestors: Set<object>): JsonValue {
  switch (typeof value) {
    case "string":
    case "boolean":
      return value;
    case "number":
      return Number.isFinite(value) ? value : tagged("number", String(value));
    case "bigint":
      return tagged("bigint", value.toString());
    case "undefined":
    case "function":
    case "symbol":
      return null;
  }

  if (value === null || typeof value !== "object") {
    return null;
  }

  if (value instanceof Date) {
    return tagged("date", Number.isNaN(value.getTime()) ? null : value.toISOString());
  }
  if (value instanceof Uint8Array) {
    return tagged(
      "bytes",
      Buffer.from(value.buffer, value.byteOffset, value.byteLength).toString("base64")
    );
  }

  if (ancestors.has(value)) {
    throw new TypeError("Cannot encode a circular structure");
  }
  ancestors.add(value);
  try {
    if (Array.isArray(value)) {
      return value.map((item) => encode(item, ancestors));
    }
    if (value instanceof Map) {
      return tagged(
        "map",
        Array.from(value.entries(), ([k, v]) => [encode(k, ancestors), encode(v, ancestors)])
      );
    }
    if (value instanceof Set) {
      return tagged("set", Array.from(value, (item) => encode(item, ancestors)));
    }
    if (hasToJSON(value)) {
      return encode(value.toJSON(), ancestors);
    }

    const fields = Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    const result: JsonObject = {};
    for (const [key, field] of fields) {
      if (field === undefined || typeof field === "function" || typeof field === "symbol") {
        continue;
      }
      result[key] = encode(field, ancestors);
    }
    return hasTagShape(result) ? tagged("object", result) : result;
  } finally {
    ancestors.delete(value);
  }
}

export function isTagged(value: JsonValue): value is JsonObject & TaggedValue {
  return (
    isJsonObject(value) &&
    hasTagShape(value) &&
    typeof value.$type === "string" &&
    TAG_NAMES.has(value.$type)
  );
}

/**
 * Rebuild a value from its canonical JSON form. A tag whose payload does not
 * fit it is left as the plain object it is.
 */
export function decodeValue(value: JsonValue): unknown {
  if (Array.isArray(value)) {
    return value.map(decodeValue);
  }
  if (!isJsonObject(value)) {
    return value;
  }
  if (isTagged(value)) {
    const revived = revive(value.$type, value.value);
    if (revived !== INVALID) return revived;
  }
  return decodeFields(value);
}

function decodeFields(value: JsonObject): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, field] of Object.entries(value)) {
    result[key] = decodeValue(field);
  }
  return result;
}

function revive(tag: Tag, payload: JsonValue): unknown {
  switch (tag) {
    case "date":
      if (payload === null) return new Date(Number.NaN);
      return typeof payload === "string" && !Number.isNaN(Date.parse(payload))
        ? new Date(payload)
        : INVALID;
    case "bytes":
      return typeof payload === "string" ? Buffer.from(payload, "base64") : INVALID;
    case "bigint":
      return typeof payload === "string" && NUMBER_PATTERN.test(payload)
        ? BigInt(payload)
        : INVALID;
    case "number":
      return typeof payload === "string" && NON_FINITE.includes(payload)
        ? Number(payload)
        : INVALID;
    case "map": {
      if (!Array.isArray(payload)) return INVALID;
      const map = new Map<unknown, unknown>();
      for (const entry of payload) {
        if (!Array.isArray(entry) || entry.length !== 2) return INVALID;
        map.set(decodeValue(entry[0]), decodeValue(entry[1]));
      }
      return map;
    }
    case "set":
      return Array.isArray(payload) ? new Set(payload.map(decodeValue)) : INVALID;
    case "object":
      return isJsonObject(payload) ? decodeFields(payload) : INVALID;
    case "message":
      return decodeValue(payload);
  }
}
