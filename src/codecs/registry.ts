/**
 * Codec registry mapping item file extensions to codecs.
 *
 * Lookup happens in two tables:
 *
 * 1. BY EXTENSION: "json", "txt", "bin", ... each map to exactly one codec.
 *    Aliases share the codec of the extension they point to.
 *
 * 2. BY VALUE KIND: one default codec per kind, used when a value is stored
 *    under an extension without a codec. After the default, every known
 *    codec that accepts the value is tried in registration order.
 *
 * Codecs whose package is an optional dependency (PNG images through
 * pngjs) are registered only when that package loads at startup; without
 * it the extension is simply absent from the table.
 *
 * The registry is populated at startup and read-mostly afterwards. Node runs
 * registrations and lookups on one thread, so a register() call never
 * interleaves with a lookup.
 *
 * @example
 *   const registry = createDefaultRegistry();
 *   registry.register("csv", "txt");
 *   const bytes = registry.encode("csv", "a,b\n1,2\n");
 */

import { UnsupportedFormatError, describeError } from "../container/errors.js";
import { getDefaultLogger, type Logger } from "../logging/index.js";
import { binaryCodec, isJsonValue, jsonCodec, textCodec } from "./builtin.js";
import { createPngCodec } from "./png.js";
import type { Codec, ValueKind } from "./types.js";

const EXTENSION_PATTERN = /^[A-Za-z0-9_-]+$/;

/**
 * Classify an in-memory value. Returns undefined for values no built-in
 * kind covers (functions, class instances, undefined).
 */
export function kindOf(value: unknown): ValueKind | undefined {
  if (value instanceof Uint8Array) {
    return "bytes";
  }
  if (typeof value === "string") {
    return "text";
  }
  return isJsonValue(value) ? "json" : undefined;
}

export class CodecRegistry {
  private readonly byExtension = new Map<string, Codec>();
  private readonly byKind = new Map<ValueKind, Codec>();
  /** Every distinct codec, in registration order */
  private readonly formats: Codec[] = [];

  /**
   * Register a codec for an extension.
   *
   * @param extension - Extension without the leading dot
   * @param codec - A codec, or the name of a known extension to alias
   * @param kind - Make the codec the default for this value kind
   */
  register(extension: string, codec: Codec | string, kind?: ValueKind): void {
    if (!EXTENSION_PATTERN.test(extension)) {
      throw new UnsupportedFormatError(`Invalid extension "${extension}"`);
    }

    let resolved: Codec;
    if (typeof codec === "string") {
      if (kind !== undefined) {
        throw new UnsupportedFormatError(
          `Alias ${extension}:${codec} cannot be a default for kind "${kind}"`
        );
      }
      const target = this.byExtension.get(codec);
      if (!target) {
        throw new UnsupportedFormatError(`Alias ${extension}:${codec} targets an unknown extension`);
      }
      resolved = target;
    } else {
      resolved = codec;
    }

    this.byExtension.set(extension, resolved);
    if (kind !== undefined) {
      this.byKind.set(kind, resolved);
    }
    if (!this.formats.includes(resolved)) {
      this.formats.push(resolved);
    }
  }

  has(extension: string): boolean {
    return this.byExtension.has(extension);
  }

  /**
   * Registered extensions, sorted.
   */
  extensions(): string[] {
    return [...this.byExtension.keys()].sort();
  }

  /**
   * Default codec for a value kind, if any.
   */
  defaultFor(kind: ValueKind): Codec | undefined {
    return this.byKind.get(kind);
  }

  /**
   * Encode a value for storage under the given extension.
   *
   * @throws UnsupportedFormatError if no codec can encode the value
   */
  encode(extension: string, value: unknown): Uint8Array {
    const codec = this.byExtension.get(extension);
    if (codec) {
      if (!codec.accepts(value)) {
        throw new UnsupportedFormatError(
          `The .${extension} codec (${codec.label}) cannot encode a ${describeValue(value)}`
        );
      }
      return codec.encode(value);
    }

    const kind = kindOf(value);
    const fallback = kind === undefined ? undefined : this.byKind.get(kind);
    const candidates = fallback
      ? [fallback, ...this.formats.filter((c) => c !== fallback)]
      : this.formats;

    const failures: string[] = [];
    for (const candidate of candidates) {
      if (!candidate.accepts(value)) {
        continue;
      }
      try {
        return candidate.encode(value);
      } catch (err) {
        failures.push(`${candidate.label}: ${describeError(err)}`);
      }
    }

    const detail = failures.length > 0 ? ` (${failures.join("; ")})` : "";
    throw new UnsupportedFormatError(
      `No codec for .${extension} can encode a ${describeValue(value)}${detail}`
    );
  }

  /**
   * Decode bytes stored under the given extension. Unknown extensions
   * decode as raw bytes, whatever codec encoded them.
   */
  decode(extension: string, bytes: Uint8Array): unknown {
    const codec = this.byExtension.get(extension) ?? binaryCodec;
    return codec.decode(bytes);
  }

  /**
   * Bytes an item contributes to the container hash.
   */
  hashInput(extension: string, bytes: Uint8Array): Uint8Array {
    const codec = this.byExtension.get(extension);
    if (codec?.hash) {
      return new TextEncoder().encode(codec.hash(bytes));
    }
    return bytes;
  }
}

function describeValue(value: unknown): string {
  if (value instanceof Uint8Array) {
    return "byte array";
  }
  if (Array.isArray(value)) {
    return "array";
  }
  return value === null ? "null" : typeof value;
}

/**
 * Create a registry with the built-in codecs.
 */
export function createDefaultRegistry(): CodecRegistry {
  const registry = new CodecRegistry();
  registry.register("json", jsonCodec, "json");
  registry.register("txt", textCodec, "text");
  registry.register("log", "txt");
  registry.register("pgm", "txt");
  registry.register("bin", binaryCodec, "bytes");
  return registry;
}

/**
 * A codec whose supporting package may be missing.
 */
export interface OptionalCodec {
  extension: string;
  /** Resolve the codec; rejects when the package cannot be loaded */
  load(): Promise<Codec>;
}

export const OPTIONAL_CODECS: readonly OptionalCodec[] = [
  {
    extension: "png",
    load: async () => createPngCodec((await import("pngjs")).default.PNG),
  },
];

/**
 * Register every optional codec whose package loads.
 *
 * @returns The extensions that were registered
 */
export async function registerOptionalCodecs(
  registry: CodecRegistry,
  codecs: readonly OptionalCodec[] = OPTIONAL_CODECS,
  logger: Logger = getDefaultLogger()
): Promise<string[]> {
  const registered: string[] = [];
  for (const optional of codecs) {
    let codec: Codec;
    try {
      codec = await optional.load();
    } catch (err) {
      logger.debug("Optional codec unavailable", {
        extension: optional.extension,
        reason: describeError(err),
      });
      continue;
    }
    registry.register(optional.extension, codec);
    registered.push(optional.extension);
  }
  return registered;
}

/** Process-wide registry used when none is injected */
export const defaultRegistry: CodecRegistry = createDefaultRegistry();

await registerOptionalCodecs(defaultRegistry);
