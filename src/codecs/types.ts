/**
 * Codec contract shared by the registry and item serialization.
 */

/**
 * Kind of an in-memory item value. Each kind may have one default codec,
 * consulted when a value is stored under an extension nobody registered.
 */
export type ValueKind = "json" | "text" | "bytes";

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

/**
 * Bidirectional converter between an in-memory value and bytes.
 */
export interface Codec<V = unknown> {
  /** Short label used in log and error messages */
  readonly label: string;

  /** Whether this codec can encode the given value */
  accepts(value: unknown): value is V;

  encode(value: V): Uint8Array;

  decode(bytes: Uint8Array): V;

  /**
   * Digest of semantically equivalent content. When present, it replaces
   * the raw bytes as the item's contribution to the container hash.
   */
  hash?(bytes: Uint8Array): string;
}
