import type { GeographicContext, RenderLayer, Season, TerrainType } from "./types.js";

export interface TerrainThresholds {
  rockShare: number;
  waterShare: number;
  sandShare: number;
  forestShare: number;
}

export const DEFAULT_TERRAIN_THRESHOLDS: TerrainThresholds = {
  rockShare: 0.02,
  waterShare: 0.2,
  sandShare: 0.1,
  forestShare: 0.15,
};

function count(layers: RenderLayer[], category: string, subtype?: string): number {
  let total = 0;
  for (const layer of layers) {
    if (layer.category !== category) continue;
    if (subtype !== undefined && layer.subtype !== subtype) continue;
    total += layer.features.length;
  }
  return total;
}

/**
 * Coarse terrain classification from feature counts. Checked in priority
 * order mountain, coastal, desert, forest; anything else is urban.
 */
export function detectTerrain(layers: RenderLayer[], thresholds: TerrainThresholds = DEFAULT_TERRAIN_THRESHOLDS): TerrainType {
  const total = layers.filter((l) => l.category !== "labels").reduce((sum, l) => sum + l.features.length, 0);
  if (total === 0) return "urban";
  const rock = count(layers, "land", "rock");
  const coastline = count(layers, "water", "coastline");
  const water = count(layers, "water");
  const sand = count(layers, "land", "sand");
  const forest = count(layers, "parks", "forest");

  if (rock > 0 && rock / total >= thresholds.rockShare) return "mountain";
  if (coastline > 0 || water / total >= thresholds.waterShare) return "coastal";
  if (sand / total >= thresholds.sandShare) return "desert";
  if (forest / total >= thresholds.forestShare) return "forest";
  return "urban";
}

/** Detected terrain unless the caller pins one; season only ever comes from the caller. */
export function detectGeographicContext(
  layers: RenderLayer[],
  requested: { terrain?: TerrainType; season?: Season } = {}
): GeographicContext {
  const terrain = requested.terrain ?? detectTerrain(layers);
  return requested.season ? { terrain, season: requested.season } : { terrain };
}
