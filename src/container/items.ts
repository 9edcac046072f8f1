/**
 * Item map addressed by qualified name.
 *
 * Holds decoded values for every non-reserved item. Values are copied on
 * the way in, so a caller's buffer is never shared with the container.
 * lock() copies them once more and freezes the copies, which cuts off any
 * reference handed out while the container was mutable. Byte arrays cannot
 * be frozen; once locked, values holding them are handed out as copies.
 */

import { NotFoundError, UnsupportedFormatError, InvalidNameError } from "./errors.js";
import type { Lifecycle } from "./lifecycle.js";
import { isReservedItem, parseItemName, sortItemNames, type ItemName } from "./names.js";

/**
 * Deep freeze an object and all nested objects.
 */
export function deepFreeze<T>(value: T): T {
  if (value === null || typeof value !== "object" || ArrayBuffer.isView(value)) {
    return value;
  }
  if (Object.isFrozen(value)) {
    return value;
  }
  for (const key of Reflect.ownKeys(value)) {
    deepFreeze(Reflect.get(value, key));
  }
  Object.freeze(value);
  return value;
}

/**
 * Whether a value is, or contains, a typed array view.
 */
function holdsBytes(value: unknown): boolean {
  if (ArrayBuffer.isView(value)) {
    return true;
  }
  if (value === null || typeof value !== "object") {
    return false;
  }
  return Reflect.ownKeys(value).some((key) => holdsBytes(Reflect.get(value, key)));
}

/**
 * Structured copy of an item value, detached from the original.
 *
 * @throws UnsupportedFormatError if the value cannot be copied (functions,
 *   symbols, class instances with private state)
 */
export function copyValue<T>(value: T, itemName: string): T {
  try {
    return structuredClone(value);
  } catch (err) {
    throw new UnsupportedFormatError(
      `Value for ${itemName} cannot be stored: ${err instanceof Error ? err.message : String(err)}`
    );
  }
}

export class ItemStore {
  private readonly values = new Map<string, unknown>();
  private readonly lifecycle: Lifecycle;

  constructor(lifecycle: Lifecycle) {
    this.lifecycle = lifecycle;
  }

  has(qualified: string): boolean {
    return this.values.has(qualified);
  }

  /**
   * @throws NotFoundError if no item has this name
   */
  get(qualified: string): unknown {
    if (!this.values.has(qualified)) {
      throw new NotFoundError(`No item named ${qualified}`);
    }
    const value = this.values.get(qualified);
    if (!this.lifecycle.isMutable && holdsBytes(value)) {
      return copyValue(value, qualified);
    }
    return value;
  }

  /**
   * Store a value. Encoding happens when the container is serialized.
   */
  set(qualified: string, value: unknown): ItemName {
    this.lifecycle.assertMutable(`set ${qualified}`);
    const parsed = this.parseWritable(qualified);
    if (value === undefined) {
      throw new UnsupportedFormatError(`Value for ${qualified} is undefined`);
    }
    this.values.set(qualified, copyValue(value, qualified));
    return parsed;
  }

  delete(qualified: string): void {
    this.lifecycle.assertMutable(`delete ${qualified}`);
    this.parseWritable(qualified);
    if (!this.values.delete(qualified)) {
      throw new NotFoundError(`No item named ${qualified}`);
    }
  }

  /**
   * Qualified names in canonical order (part, then name).
   */
  names(): string[] {
    return sortItemNames(this.values.keys());
  }

  /**
   * Raw entries for serialization and hashing. Values are not copied.
   */
  entries(): Array<[string, unknown]> {
    return this.names().map((name) => [name, this.values.get(name)]);
  }

  /**
   * Insert a value decoded from an archive, bypassing the mutability guard.
   */
  load(qualified: string, value: unknown): void {
    this.values.set(this.parseWritable(qualified).qualified, value);
  }

  /**
   * Replace every value with a detached, unfrozen copy.
   */
  detach(): void {
    for (const [name, value] of this.values) {
      this.values.set(name, copyValue(value, name));
    }
  }

  clear(): void {
    this.values.clear();
  }

  /**
   * Replace every value with a frozen copy.
   */
  lock(): void {
    for (const [name, value] of this.values) {
      this.values.set(name, deepFreeze(copyValue(value, name)));
    }
  }

  private parseWritable(qualified: string): ItemName {
    const parsed = parseItemName(qualified);
    if (isReservedItem(parsed.qualified)) {
      throw new InvalidNameError(qualified, "reserved for container attributes");
    }
    return parsed;
  }
}
