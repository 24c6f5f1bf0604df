import type { RasterCanvas } from "../types.js";
import { fromRaster, toRaster } from "../raster.js";

export type Matrix3 = [[number, number, number], [number, number, number], [number, number, number]];

/** Rec. 601 luma of the canvas mean color, rounded to an integer level. */
export async function meanLuma(canvas: RasterCanvas): Promise<number> {
  const { channels } = await fromRaster(canvas).stats();
  const [r, g, b] = channels;
  return Math.round(0.299 * r.mean + 0.587 * g.mean + 0.114 * b.mean);
}

/** Stretch every channel around the mean gray level. */
export async function adjustContrast(canvas: RasterCanvas, factor: number): Promise<RasterCanvas> {
  const mean = await meanLuma(canvas);
  return toRaster(fromRaster(canvas).linear(factor, mean * (1 - factor)), canvas.width, canvas.height);
}

export async function adjustBrightness(canvas: RasterCanvas, factor: number): Promise<RasterCanvas> {
  return toRaster(fromRaster(canvas).linear(factor, 0), canvas.width, canvas.height);
}

export async function recombine(canvas: RasterCanvas, matrix: Matrix3): Promise<RasterCanvas> {
  return toRaster(fromRaster(canvas).recomb(matrix), canvas.width, canvas.height);
}

export function diagonal(r: number, g: number, b: number): Matrix3 {
  return [
    [r, 0, 0],
    [0, g, 0],
    [0, 0, b],
  ];
}

/** `identity × (1 − amount) + matrix × amount` */
export function mixWithIdentity(matrix: Matrix3, amount: number): Matrix3 {
  const row = (i: 0 | 1 | 2): [number, number, number] => [
    (i === 0 ? 1 - amount : 0) + matrix[i][0] * amount,
    (i === 1 ? 1 - amount : 0) + matrix[i][1] * amount,
    (i === 2 ? 1 - amount : 0) + matrix[i][2] * amount,
  ];
  return [row(0), row(1), row(2)];
}
