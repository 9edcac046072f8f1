/**
 * Qualified item names: "[part/]name.ext".
 *
 * The part is a path-like grouping prefix (possibly nested, "a/b"); the
 * root part is the empty string. Names are archive entry paths, so anything
 * that could escape the package or alias another entry is rejected.
 */

import { InvalidNameError } from "./errors.js";

export const CONTENT_ITEM = "content.json";
export const META_ITEM = "meta.json";
export const LICENSE_ITEM = "license.txt";

/** Root items holding the attribute records */
export const RESERVED_ITEMS: ReadonlySet<string> = new Set([CONTENT_ITEM, META_ITEM]);

export interface ItemName {
  /** Full qualified name as given */
  readonly qualified: string;
  /** Part prefix without trailing slash; "" for the root part */
  readonly part: string;
  /** Final segment, including the extension */
  readonly name: string;
  /** Extension without the dot */
  readonly extension: string;
}

/**
 * Parse and validate a qualified item name.
 *
 * @throws InvalidNameError if the name is empty, absolute, contains
 *   backslashes, empty, "." or ".." segments, or lacks an extension
 */
export function parseItemName(qualified: string): ItemName {
  if (qualified.length === 0) {
    throw new InvalidNameError(qualified, "name is empty");
  }
  if (qualified.includes("\\")) {
    throw new InvalidNameError(qualified, "backslashes are not allowed");
  }
  if (qualified.startsWith("/") || qualified.endsWith("/")) {
    throw new InvalidNameError(qualified, "leading or trailing slash");
  }

  const segments = qualified.split("/");
  for (const segment of segments) {
    if (segment === "" || segment === "." || segment === "..") {
      throw new InvalidNameError(qualified, `illegal path segment "${segment}"`);
    }
  }

  const name = segments[segments.length - 1];
  const dot = name.lastIndexOf(".");
  if (dot <= 0 || dot === name.length - 1) {
    throw new InvalidNameError(qualified, "missing file extension");
  }

  return {
    qualified,
    part: segments.slice(0, -1).join("/"),
    name,
    extension: name.slice(dot + 1),
  };
}

export function isReservedItem(qualified: string): boolean {
  return RESERVED_ITEMS.has(qualified);
}

/**
 * Order names by part, then by name, with the root part first.
 */
export function compareItemNames(a: ItemName, b: ItemName): number {
  if (a.part !== b.part) {
    if (a.part === "") return -1;
    if (b.part === "") return 1;
    return a.part < b.part ? -1 : 1;
  }
  if (a.name === b.name) return 0;
  return a.name < b.name ? -1 : 1;
}

/**
 * Sort qualified names in canonical order.
 */
export function sortItemNames(names: Iterable<string>): string[] {
  return [...names]
    .map(parseItemName)
    .sort(compareItemNames)
    .map((n) => n.qualified);
}
