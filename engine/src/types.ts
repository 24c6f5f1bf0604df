import { z } from "zod";
import type { Feature, FeatureCollection, Geometry } from "geojson";

export const FeatureCategory = z.enum(["roads", "water", "parks", "buildings", "rail"]);
export type FeatureCategory = z.infer<typeof FeatureCategory>;
export const FEATURE_CATEGORIES: readonly FeatureCategory[] = FeatureCategory.options;

export const OutputFormat = z.enum(["png", "jpg", "jpeg", "svg", "pdf"]);
export type OutputFormat = z.infer<typeof OutputFormat>;

export const MapShape = z.enum(["rectangle", "circle", "triangle"]);
export type MapShape = z.infer<typeof MapShape>;

export const ArtisticEffect = z.enum(["watercolor", "pencil_sketch", "oil_painting", "vintage"]);
export type ArtisticEffect = z.infer<typeof ArtisticEffect>;

export const ColorEnhancement = z.enum([
  "intelligent_palette",
  "geographic_colors",
  "seasonal_spring",
  "seasonal_summer",
  "seasonal_autumn",
  "seasonal_winter",
]);
export type ColorEnhancement = z.infer<typeof ColorEnhancement>;

export const TerrainType = z.enum(["mountain", "coastal", "desert", "forest", "urban"]);
export type TerrainType = z.infer<typeof TerrainType>;

export const Season = z.enum(["spring", "summer", "autumn", "winter"]);
export type Season = z.infer<typeof Season>;

export interface GeographicContext {
  terrain: TerrainType;
  season?: Season;
}

/** OpenStreetMap-style tags carried as feature properties. */
export type OsmTags = Record<string, string>;
export type TaggedFeature = Feature<Geometry, OsmTags>;
export type TaggedFeatureCollection = FeatureCollection<Geometry, OsmTags>;

export interface LocationQuery {
  city: string;
  country: string;
  state?: string;
}

export interface Coordinate {
  latitude: number;
  longitude: number;
}

export type CoordinateSource = "cache" | "service";

export interface ResolvedCoordinate extends Coordinate {
  source: CoordinateSource;
  resolvedAt: string;
  displayName?: string;
}

export interface GeographicDataset {
  center: Coordinate;
  radius: number;
  collections: Record<FeatureCategory, TaggedFeatureCollection>;
  /** Categories whose retrieval failed and were substituted with empty collections. */
  missingCategories: FeatureCategory[];
  fetchedAt: string;
}

export type LayerCategory = "water" | "parks" | "land" | "roads" | "rail" | "labels";

export const LAYER_KEYS = [
  "water",
  "parks",
  "land",
  "buildings",
  "road_motorway",
  "road_primary",
  "road_secondary",
  "road_tertiary",
  "road_residential",
  "road_default",
  "rail",
  "labels",
] as const;
export type LayerKey = (typeof LAYER_KEYS)[number];

export interface RenderLayer {
  category: LayerCategory;
  subtype: string;
  /** Style key the layer resolves its paint from. */
  key: LayerKey;
  zIndex: number;
  /** Multiplier applied to the resolved stroke width for this subtype. */
  widthScale: number;
  features: TaggedFeature[];
}

export interface LayerStyle {
  color: string;
  /** Stroke width in points. */
  width: number;
  opacity: number;
}

export interface StyledLayer extends RenderLayer {
  style: LayerStyle;
}

export interface Palette {
  background: string;
  text: string;
  gradient: string;
}

export interface PosterSpec {
  widthInches: number;
  heightInches: number;
  dpi: number;
  format: OutputFormat;
  font: string;
  shape: MapShape;
  texture: string | null;
  textureIntensity: number;
  artisticEffect: ArtisticEffect | null;
  colorEnhancement: ColorEnhancement | null;
}

export interface PosterLabels {
  city: string;
  country: string;
  coordinate: Coordinate;
  attribution?: string;
}

export interface PosterMetadata {
  city: string;
  country: string;
  state?: string;
  theme: string;
  coordinate: Coordinate;
  createdAt: Date;
  artist: string;
  software: string;
}

export interface VectorCanvas {
  kind: "vector";
  width: number;
  height: number;
  svg: string;
}

export interface RasterCanvas {
  kind: "raster";
  width: number;
  height: number;
  channels: 3;
  data: Buffer;
}

export type Canvas = VectorCanvas | RasterCanvas;

export type WarningKind = "DataFetchPartial" | "AssetMissing" | "StageSkipped";

export interface PipelineWarning {
  kind: WarningKind;
  message: string;
}

export type ProgressStage = "fetch-start" | "data-downloaded" | "processing" | "rendering" | "saving" | "done" | "failed";

export interface ProgressEvent {
  stage: ProgressStage;
  message: string;
}

export function pixelSize(spec: Pick<PosterSpec, "widthInches" | "heightInches" | "dpi">): { width: number; height: number } {
  return {
    width: Math.round(spec.widthInches * spec.dpi),
    height: Math.round(spec.heightInches * spec.dpi),
  };
}
