/**
 * Item codecs and the extension registry.
 */

export type { Codec, JsonValue, ValueKind } from "./types.js";
export { jsonCodec, textCodec, binaryCodec, canonicalJson, isJsonValue, sha256Hex } from "./builtin.js";
export {
  CodecRegistry,
  createDefaultRegistry,
  defaultRegistry,
  kindOf,
  registerOptionalCodecs,
  OPTIONAL_CODECS,
  type OptionalCodec,
} from "./registry.js";
export { createPngCodec, isRasterImage, type RasterImage, type PngClass } from "./png.js";
