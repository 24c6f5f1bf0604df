import sharp from "sharp";
import type { ArtisticEffect, RasterCanvas } from "../types.js";
import { fromRaster, toRaster } from "../raster.js";
import { mixWithIdentity, recombine, type Matrix3 } from "./adjust.js";

export type EffectStrategy = (canvas: RasterCanvas) => Promise<RasterCanvas>;

const SEPIA: Matrix3 = [
  [0.393, 0.769, 0.189],
  [0.349, 0.686, 0.168],
  [0.272, 0.534, 0.131],
];

/** Blur radius grows with the canvas so effects look alike across DPIs. */
function sigmaFor(canvas: RasterCanvas, atReference: number): number {
  return Math.max(0.3, (atReference * canvas.width) / 3600);
}

function medianSize(canvas: RasterCanvas, atReference: number): number {
  const size = Math.round((atReference * canvas.width) / 3600);
  return Math.max(3, size % 2 === 0 ? size + 1 : size);
}

async function watercolor(canvas: RasterCanvas): Promise<RasterCanvas> {
  const smoothed = await toRaster(fromRaster(canvas).median(medianSize(canvas, 5)), canvas.width, canvas.height);
  return toRaster(
    fromRaster(smoothed).blur(sigmaFor(canvas, 1.5)).modulate({ saturation: 1.1 }),
    canvas.width,
    canvas.height
  );
}

/** Grey colour-dodge of the image against its own blurred negative. */
async function pencilSketch(canvas: RasterCanvas): Promise<RasterCanvas> {
  const { width, height } = canvas;
  const gray = await fromRaster(canvas).toColourspace("b-w").raw().toBuffer();
  const blurredNegative = await sharp(gray, { raw: { width, height, channels: 1 } })
    .negate()
    .blur(sigmaFor(canvas, 8))
    .toColourspace("b-w")
    .raw()
    .toBuffer();
  const out = Buffer.alloc(width * height * 3);
  for (let i = 0; i < width * height; i++) {
    const base = gray[i];
    const blend = blurredNegative[i];
    const value = blend >= 255 ? 255 : Math.min(255, Math.round((base * 255) / (255 - blend)));
    out[i * 3] = value;
    out[i * 3 + 1] = value;
    out[i * 3 + 2] = value;
  }
  return { kind: "raster", width, height, channels: 3, data: out };
}

async function oilPainting(canvas: RasterCanvas): Promise<RasterCanvas> {
  const smoothed = await toRaster(fromRaster(canvas).median(medianSize(canvas, 7)), canvas.width, canvas.height);
  return toRaster(fromRaster(smoothed).modulate({ saturation: 1.2 }).sharpen(), canvas.width, canvas.height);
}

function vignetteSvg(width: number, height: number): Buffer {
  return Buffer.from(
    `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}">` +
      `<defs><radialGradient id="v" cx="50%" cy="50%" r="75%">` +
      `<stop offset="0.55" stop-color="#FFFFFF"/><stop offset="1" stop-color="#5A5A5A"/>` +
      `</radialGradient></defs><rect width="${width}" height="${height}" fill="url(#v)"/></svg>`,
    "utf8"
  );
}

async function vintage(canvas: RasterCanvas): Promise<RasterCanvas> {
  const toned = await recombine(canvas, mixWithIdentity(SEPIA, 0.2));
  return toRaster(
    fromRaster(toned).composite([{ input: vignetteSvg(canvas.width, canvas.height), blend: "multiply" }]),
    canvas.width,
    canvas.height
  );
}

export const artisticEffects: Record<ArtisticEffect, EffectStrategy> = {
  watercolor,
  pencil_sketch: pencilSketch,
  oil_painting: oilPainting,
  vintage,
};
