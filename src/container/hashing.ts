/**
 * Content hash over a container's items.
 *
 * The digest covers payload only. Every name is fed to one SHA-256 in
 * canonical order as
 *
 *   <name> "\n" <length of hash input> "\n" <hash input>
 *
 * where the hash input is the codec's own digest when it defines one,
 * else the encoded bytes. content.json contributes only the fields that
 * describe what the data is (containerType, usedSoftware); identity,
 * lifecycle flags and all timestamps are bookkeeping and stay out, so
 * independently built copies of the same data hash alike.
 */

import { createHash } from "node:crypto";
import type { CodecRegistry } from "../codecs/registry.js";
import { canonicalJson } from "../codecs/builtin.js";
import type { JsonValue } from "../codecs/types.js";
import { CONTENT_ITEM, parseItemName, sortItemNames } from "./names.js";
import type { ContentAttributes } from "./schema.js";

const encoder = new TextEncoder();

export interface EncodedItem {
  name: string;
  bytes: Uint8Array;
}

function definedFields(record: Record<string, string | undefined>): { [key: string]: JsonValue } {
  const result: { [key: string]: JsonValue } = {};
  for (const [key, value] of Object.entries(record)) {
    if (value !== undefined) {
      result[key] = value;
    }
  }
  return result;
}

/**
 * Part of content.json that describes the payload.
 */
export function hashedContentProjection(content: ContentAttributes): JsonValue {
  return {
    containerType: definedFields(content.containerType),
    usedSoftware: content.usedSoftware.map(definedFields),
  };
}

/**
 * Hash encoded items. content.json, if present, must already be reduced
 * to its projection.
 */
export function digestItems(items: EncodedItem[], registry: CodecRegistry): string {
  const byName = new Map(items.map((item) => [item.name, item.bytes]));
  const digest = createHash("sha256");

  for (const name of sortItemNames(byName.keys())) {
    const bytes = byName.get(name) ?? new Uint8Array();
    const input = registry.hashInput(parseItemName(name).extension, bytes);
    digest.update(encoder.encode(`${name}\n${input.length}\n`));
    digest.update(input);
  }

  return digest.digest("hex");
}

/**
 * Hash a container given its content record and its other encoded items
 * (meta.json included).
 */
export function computeContentHash(
  content: ContentAttributes,
  items: EncodedItem[],
  registry: CodecRegistry
): string {
  const projection: EncodedItem = {
    name: CONTENT_ITEM,
    bytes: encoder.encode(canonicalJson(hashedContentProjection(content))),
  };
  return digestItems(
    [projection, ...items.filter((item) => item.name !== CONTENT_ITEM)],
    registry
  );
}
