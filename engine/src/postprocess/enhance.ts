import type { ColorEnhancement, RasterCanvas } from "../types.js";
import { fromRaster, toRaster } from "../raster.js";
import { adjustBrightness, adjustContrast, diagonal, recombine, type Matrix3 } from "./adjust.js";
import type { EffectStrategy } from "./effects.js";

async function intelligentPalette(canvas: RasterCanvas): Promise<RasterCanvas> {
  return toRaster(fromRaster(canvas).normalise({ lower: 1, upper: 99 }), canvas.width, canvas.height);
}

async function geographicColors(canvas: RasterCanvas): Promise<RasterCanvas> {
  const saturated = await toRaster(fromRaster(canvas).modulate({ saturation: 1.4 }), canvas.width, canvas.height);
  return adjustContrast(saturated, 1.1);
}

/** Blue lift, then 30% of the way toward gray. */
function winterMatrix(): Matrix3 {
  const luma = [0.299, 0.587, 0.114 * 1.2];
  const row = (own: number): [number, number, number] => [
    0.3 * luma[0] + (own === 0 ? 0.7 : 0),
    0.3 * luma[1] + (own === 1 ? 0.7 : 0),
    0.3 * luma[2] + (own === 2 ? 0.7 * 1.2 : 0),
  ];
  return [row(0), row(1), row(2)];
}

export const colorEnhancements: Record<ColorEnhancement, EffectStrategy> = {
  intelligent_palette: intelligentPalette,
  geographic_colors: geographicColors,
  seasonal_spring: (canvas) => recombine(canvas, diagonal(1, 1.15, 1.05)),
  seasonal_summer: (canvas) => adjustBrightness(canvas, 1.1),
  seasonal_autumn: (canvas) => recombine(canvas, diagonal(1.2, 0.9, 1)),
  seasonal_winter: (canvas) => recombine(canvas, winterMatrix()),
};
