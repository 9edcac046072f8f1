/**
 * PNG images backed by the optional pngjs package.
 *
 * Images are held as 8-bit RGBA rasters. The codec is only registered
 * when pngjs can be loaded; see registerOptionalCodecs().
 */

import type { PNG } from "pngjs";
import type { Codec } from "./types.js";

export interface RasterImage {
  width: number;
  height: number;
  /** RGBA samples, row by row, 4 bytes per pixel */
  data: Uint8Array;
}

/** The PNG class exported by pngjs */
export type PngClass = typeof PNG;

function isDimension(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value > 0;
}

export function isRasterImage(value: unknown): value is RasterImage {
  if (value === null || typeof value !== "object") {
    return false;
  }
  if (!("width" in value && "height" in value && "data" in value)) {
    return false;
  }
  const { width, height, data } = value;
  return (
    isDimension(width) &&
    isDimension(height) &&
    data instanceof Uint8Array &&
    data.length === width * height * 4
  );
}

export function createPngCodec(png: PngClass): Codec<RasterImage> {
  return {
    label: "png",
    accepts: isRasterImage,
    encode(image) {
      const out = new png({ width: image.width, height: image.height });
      out.data = Buffer.from(image.data);
      return new Uint8Array(png.sync.write(out));
    },
    decode(bytes) {
      const decoded = png.sync.read(Buffer.from(bytes));
      return {
        width: decoded.width,
        height: decoded.height,
        data: new Uint8Array(decoded.data),
      };
    },
  };
}
