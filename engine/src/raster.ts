import sharp from "sharp";
import type { RasterCanvas, VectorCanvas } from "./types.js";
import { RenderError, extractErrorMessage } from "./errors.js";

export type Sharp = sharp.Sharp;

/** Open a raster canvas as a sharp pipeline over its raw RGB pixels. */
export function fromRaster(canvas: RasterCanvas): Sharp {
  return sharp(canvas.data, { raw: { width: canvas.width, height: canvas.height, channels: canvas.channels } });
}

/** Run a sharp pipeline to raw RGB pixels at the given size. */
export async function toRaster(pipeline: Sharp, width: number, height: number): Promise<RasterCanvas> {
  const { data, info } = await pipeline
    .resize(width, height, { fit: "fill" })
    .flatten({ background: "#FFFFFF" })
    .removeAlpha()
    .toColourspace("srgb")
    .raw()
    .toBuffer({ resolveWithObject: true });
  if (info.channels !== 3 || info.width !== width || info.height !== height) {
    throw new RenderError(`Expected ${width}x${height} RGB pixels, got ${info.width}x${info.height}x${info.channels}`);
  }
  return { kind: "raster", width, height, channels: 3, data };
}

/** Rasterize the SVG at exactly the canvas pixel size. */
export async function rasterize(canvas: VectorCanvas): Promise<RasterCanvas> {
  try {
    return await toRaster(sharp(Buffer.from(canvas.svg, "utf8"), { density: 72 }), canvas.width, canvas.height);
  } catch (error) {
    if (error instanceof RenderError) throw error;
    throw new RenderError(`Rasterizing the poster failed: ${extractErrorMessage(error)}`, { cause: error });
  }
}
