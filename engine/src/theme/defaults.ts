import type { LayerKey, LayerStyle, Palette } from "../types.js";

export const DEFAULT_PALETTE: Palette = {
  background: "#FFFFFF",
  text: "#000000",
  gradient: "#FFFFFF",
};

export const DEFAULT_LAYER_STYLES: Record<LayerKey, LayerStyle> = {
  water: { color: "#C0C0C0", width: 0.8, opacity: 1 },
  parks: { color: "#F0F0F0", width: 0.5, opacity: 1 },
  land: { color: "#F5F5F5", width: 0.4, opacity: 1 },
  buildings: { color: "#E4E4E4", width: 0.3, opacity: 0.9 },
  road_motorway: { color: "#0A0A0A", width: 1.2, opacity: 1 },
  road_primary: { color: "#1A1A1A", width: 1.0, opacity: 1 },
  road_secondary: { color: "#2A2A2A", width: 0.8, opacity: 1 },
  road_tertiary: { color: "#3A3A3A", width: 0.6, opacity: 1 },
  road_residential: { color: "#4A4A4A", width: 0.4, opacity: 1 },
  road_default: { color: "#3A3A3A", width: 0.4, opacity: 1 },
  rail: { color: "#5A5A5A", width: 1.2, opacity: 1 },
  labels: { color: "#000000", width: 1, opacity: 1 },
};

export const DEFAULT_TEXTURE_INTENSITY = 0.3;

/** Build a style for every canonical layer key. */
export function mapLayerStyles(build: (key: LayerKey) => LayerStyle): Record<LayerKey, LayerStyle> {
  return {
    water: build("water"),
    parks: build("parks"),
    land: build("land"),
    buildings: build("buildings"),
    road_motorway: build("road_motorway"),
    road_primary: build("road_primary"),
    road_secondary: build("road_secondary"),
    road_tertiary: build("road_tertiary"),
    road_residential: build("road_residential"),
    road_default: build("road_default"),
    rail: build("rail"),
    labels: build("labels"),
  };
}
