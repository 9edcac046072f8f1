/**
 * Built-in codecs for structured text, plain text and raw binary items.
 */

import { createHash } from "node:crypto";
import type { Codec, JsonValue } from "./types.js";

const encoder = new TextEncoder();
const decoder = new TextDecoder("utf-8", { fatal: true });

/**
 * Check that a value survives a JSON round trip unchanged.
 */
export function isJsonValue(value: unknown): value is JsonValue {
  if (value === null || typeof value === "string" || typeof value === "boolean") {
    return true;
  }
  if (typeof value === "number") {
    return Number.isFinite(value);
  }
  if (Array.isArray(value)) {
    return value.every(isJsonValue);
  }
  if (typeof value === "object") {
    const proto: unknown = Object.getPrototypeOf(value);
    if (proto !== Object.prototype && proto !== null) {
      return false;
    }
    return Object.values(value).every(isJsonValue);
  }
  return false;
}

/**
 * Serialize JSON with object keys sorted at every level.
 */
export function canonicalJson(value: JsonValue): string {
  if (Array.isArray(value)) {
    return `[${value.map(canonicalJson).join(",")}]`;
  }
  if (value !== null && typeof value === "object") {
    const keys = Object.keys(value).sort();
    return `{${keys.map((k) => `${JSON.stringify(k)}:${canonicalJson(value[k])}`).join(",")}}`;
  }
  return JSON.stringify(value);
}

export function sha256Hex(data: Uint8Array | string): string {
  return createHash("sha256").update(data).digest("hex");
}

function decodeJson(bytes: Uint8Array): JsonValue {
  const parsed: unknown = JSON.parse(decoder.decode(bytes));
  if (!isJsonValue(parsed)) {
    throw new Error("decoded value is not plain JSON");
  }
  return parsed;
}

export const jsonCodec: Codec<JsonValue> = {
  label: "json",
  accepts: isJsonValue,
  encode: (value) => encoder.encode(JSON.stringify(value, null, 2)),
  decode: decodeJson,
  // Key order and whitespace must not change the digest
  hash: (bytes) => sha256Hex(canonicalJson(decodeJson(bytes))),
};

export const textCodec: Codec<string> = {
  label: "text",
  accepts: (value): value is string => typeof value === "string",
  encode: (value) => encoder.encode(value),
  decode: (bytes) => decoder.decode(bytes),
};

export const binaryCodec: Codec<Uint8Array> = {
  label: "binary",
  accepts: (value): value is Uint8Array => value instanceof Uint8Array,
  encode: (value) => value,
  decode: (bytes) => bytes,
};
