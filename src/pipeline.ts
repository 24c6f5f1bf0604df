import {
  DEFAULT_TEXTURE_INTENSITY,
  classify,
  createScopedLogger,
  detectGeographicContext,
  exportPoster,
  extractErrorMessage,
  layoutLabels,
  loadFontFace,
  loadTheme,
  postProcess,
  rasterize,
  rasterizeLabels,
  renderPoster,
  resolveFontFamily,
  resolveTheme,
  toFailure,
  type Canvas,
  type Coordinate,
  type FailureInfo,
  type GeographicDataset,
  type LocationQuery,
  type Logger,
  type PipelineWarning,
  type PosterConfig,
  type PosterLabels,
  type PosterMetadata,
  type PosterSpec,
  type ProgressEvent,
  type ProgressStage,
  type RenderOptions,
  type ResolvedCoordinate,
  type TextRenderer,
} from "poster-engine";
import { parseGenerationRequest, type GenerationRequest } from "./request.js";

export const SOFTWARE_ID = "city-poster 0.1.0";
export const DEFAULT_ARTIST = "City Poster";

/** Anything that turns a location query into coordinates. */
export interface CoordinateResolver {
  resolve(query: LocationQuery): Promise<ResolvedCoordinate>;
}

/** Anything that returns the geographic dataset around a center. */
export interface DatasetSource {
  fetch(center: Coordinate, radius: number): Promise<GeographicDataset>;
}

export type PipelineConfig = Pick<PosterConfig, "themesDir" | "fontsDir" | "texturesDir" | "postersDir" | "posterDpi">;

export interface PipelineDeps {
  resolver: CoordinateResolver;
  fetcher: DatasetSource;
  config: PipelineConfig;
  logger?: Logger;
  onProgress?: (event: ProgressEvent) => void;
  now?: () => Date;
  artist?: string;
  /** Draws label lines with a font file; defaults to sharp's Pango text renderer. */
  renderText?: TextRenderer;
}

export type GenerationResult =
  | { ok: true; path: string; coordinate: ResolvedCoordinate; warnings: PipelineWarning[] }
  | { ok: false; error: FailureInfo; warnings: PipelineWarning[] };

export function buildPosterSpec(request: GenerationRequest, defaultDpi: number): PosterSpec {
  return {
    widthInches: request.posterWidth,
    heightInches: request.posterHeight,
    dpi: request.dpi ?? defaultDpi,
    format: request.outputFormat,
    font: request.font,
    shape: request.mapShape,
    texture: request.texture,
    textureIntensity: request.textureIntensity ?? DEFAULT_TEXTURE_INTENSITY,
    artisticEffect: request.artisticEffect,
    colorEnhancement: request.colorEnhancement,
  };
}

function locationOf(request: GenerationRequest): LocationQuery {
  const query: LocationQuery = { city: request.location.city, country: request.location.country };
  if (request.location.state) query.state = request.location.state;
  return query;
}

/**
 * Run one request end to end: validate, resolve, fetch, classify, style,
 * render, post-process and export. Terminal failures come back as a single
 * `{kind, message}`; recoverable ones as warnings next to the written path.
 */
export async function generatePoster(input: unknown, deps: PipelineDeps): Promise<GenerationResult> {
  const log = createScopedLogger({ component: "pipeline" }, deps.logger);
  const warnings: PipelineWarning[] = [];
  const emit = (stage: ProgressStage, message: string) => {
    log.info({ stage }, message);
    deps.onProgress?.({ stage, message });
  };
  const warn = (warning: PipelineWarning) => {
    log.warn({ kind: warning.kind }, warning.message);
    warnings.push(warning);
  };

  try {
    const request = parseGenerationRequest(input);
    const query = locationOf(request);

    emit("fetch-start", `Looking up ${request.location.city}`);
    const coordinate = await deps.resolver.resolve(query);
    const dataset = await deps.fetcher.fetch(coordinate, request.distanceRadius);
    for (const category of dataset.missingCategories) {
      warn({ kind: "DataFetchPartial", message: `No ${category} data could be fetched; the layer is left empty` });
    }
    emit("data-downloaded", "Geographic data ready");

    emit("processing", `Applying theme ${request.theme}`);
    const theme = await loadTheme(request.theme, deps.config.themesDir);
    const layers = classify(dataset);
    const context = detectGeographicContext(layers, request.geographicContext);
    const resolved = resolveTheme(theme, layers, context, request.perLayerStyleOverrides);
    const spec = buildPosterSpec(request, deps.config.posterDpi);

    emit("rendering", "Rendering map layers");
    const font = await resolveFontFamily(spec.font, deps.config.fontsDir);
    if (font.warning) warn(font.warning);
    const labels: PosterLabels = {
      city: request.location.city,
      country: request.countryLabel ?? request.location.country,
      coordinate,
    };
    const renderOptions: RenderOptions = { fontFamily: font.family };
    if (font.file) {
      try {
        if (spec.format === "svg") {
          renderOptions.fontFace = await loadFontFace(font.family, font.file);
        } else {
          const layout = layoutLabels(resolved, spec, labels);
          renderOptions.labelImages = await rasterizeLabels(
            layout,
            { family: font.family, file: font.file },
            spec.dpi,
            deps.renderText
          );
        }
      } catch (error) {
        warn({
          kind: "AssetMissing",
          message: `Font file ${font.file} could not be used (${extractErrorMessage(error)}); labels fall back to the system font`,
        });
      }
    }
    const vector = renderPoster(resolved, spec, { center: coordinate, radius: request.distanceRadius, labels }, renderOptions);

    const texture = spec.texture ?? resolved.texture ?? null;
    const artisticEffect = spec.artisticEffect ?? resolved.artisticEffect ?? null;
    const colorEnhancement = spec.colorEnhancement ?? resolved.colorEnhancement ?? null;
    let canvas: Canvas = vector;
    if (spec.format === "svg") {
      const skipped = [texture, artisticEffect, colorEnhancement].filter((stage) => stage !== null);
      if (skipped.length > 0) {
        warn({ kind: "StageSkipped", message: `Raster post-processing (${skipped.join(", ")}) does not apply to svg output` });
      }
    } else {
      const processed = await postProcess(await rasterize(vector), {
        texture,
        textureIntensity: request.textureIntensity ?? resolved.textureIntensity ?? spec.textureIntensity,
        artisticEffect,
        colorEnhancement,
        texturesDir: deps.config.texturesDir,
        logger: log,
      });
      processed.warnings.forEach(warn);
      canvas = processed.canvas;
    }

    emit("saving", `Saving ${spec.format.toUpperCase()} poster`);
    const metadata: PosterMetadata = {
      city: request.location.city,
      country: request.location.country,
      theme: request.theme,
      coordinate: { latitude: coordinate.latitude, longitude: coordinate.longitude },
      createdAt: deps.now ? deps.now() : new Date(),
      artist: deps.artist ?? DEFAULT_ARTIST,
      software: SOFTWARE_ID,
    };
    if (request.location.state) metadata.state = request.location.state;
    const path = await exportPoster(canvas, spec, metadata, { outputDir: deps.config.postersDir });

    emit("done", `Poster saved to ${path}`);
    return { ok: true, path, coordinate, warnings };
  } catch (error) {
    const failure = toFailure(error);
    log.error({ kind: failure.kind, err: failure.message }, "poster generation failed");
    deps.onProgress?.({ stage: "failed", message: failure.message });
    return { ok: false, error: failure, warnings };
  }
}
