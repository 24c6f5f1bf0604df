import type { ArtisticEffect, ColorEnhancement, PipelineWarning, RasterCanvas } from "../types.js";
import { AssetMissingError, RenderError, extractErrorMessage, PosterError } from "../errors.js";
import { logger as rootLogger, type Logger } from "../logger.js";
import { applyTexture } from "./texture.js";
import { artisticEffects } from "./effects.js";
import { colorEnhancements } from "./enhance.js";

export { applyTexture, findTexture } from "./texture.js";
export { artisticEffects, type EffectStrategy } from "./effects.js";
export { colorEnhancements } from "./enhance.js";

export interface PostProcessOptions {
  texture: string | null;
  textureIntensity: number;
  artisticEffect: ArtisticEffect | null;
  colorEnhancement: ColorEnhancement | null;
  texturesDir: string;
  logger?: Logger;
}

export interface PostProcessResult {
  canvas: RasterCanvas;
  warnings: PipelineWarning[];
  /** Stages that ran, in order. */
  applied: string[];
}

async function runStage(name: string, stage: () => Promise<RasterCanvas>): Promise<RasterCanvas> {
  try {
    return await stage();
  } catch (error) {
    if (error instanceof PosterError) throw error;
    throw new RenderError(`Post-processing stage ${name} failed: ${extractErrorMessage(error)}`, { cause: error });
  }
}

/**
 * Texture overlay, artistic effect, then color enhancement. Each stage is
 * optional; a missing texture skips its stage with a warning.
 */
export async function postProcess(input: RasterCanvas, options: PostProcessOptions): Promise<PostProcessResult> {
  const log = options.logger ?? rootLogger;
  const warnings: PipelineWarning[] = [];
  const applied: string[] = [];
  let canvas = input;

  if (options.texture) {
    const texture = options.texture;
    try {
      canvas = await runStage(`texture:${texture}`, () =>
        applyTexture(canvas, texture, options.textureIntensity, options.texturesDir)
      );
      applied.push(`texture:${texture}`);
    } catch (error) {
      if (!(error instanceof AssetMissingError)) throw error;
      log.warn({ texture, err: error.message }, "texture unavailable, skipping overlay");
      warnings.push({ kind: "AssetMissing", message: error.message });
    }
  }

  if (options.artisticEffect) {
    const effect = options.artisticEffect;
    canvas = await runStage(`effect:${effect}`, () => artisticEffects[effect](canvas));
    applied.push(`effect:${effect}`);
  }

  if (options.colorEnhancement) {
    const enhancement = options.colorEnhancement;
    canvas = await runStage(`enhance:${enhancement}`, () => colorEnhancements[enhancement](canvas));
    applied.push(`enhance:${enhancement}`);
  }

  return { canvas, warnings, applied };
}
