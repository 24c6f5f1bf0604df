import type {
  ArtisticEffect,
  ColorEnhancement,
  GeographicContext,
  LayerKey,
  LayerStyle,
  Palette,
  RenderLayer,
  StyledLayer,
} from "../types.js";
import { mapLayerStyles } from "./defaults.js";
import { applyLayerValue, pickColor, type ThemeDefinition } from "./load.js";
import type { StyleOverrides, ThemeVariant } from "./schema.js";

export interface ResolvedTheme {
  name: string;
  palette: Palette;
  styles: Record<LayerKey, LayerStyle>;
  layers: StyledLayer[];
  context: GeographicContext;
  texture?: string;
  textureIntensity?: number;
  artisticEffect?: ArtisticEffect;
  colorEnhancement?: ColorEnhancement;
}

const ROAD_KEYS: readonly LayerKey[] = [
  "road_motorway",
  "road_primary",
  "road_secondary",
  "road_tertiary",
  "road_residential",
  "road_default",
];

/** Variant keys that apply to a context, least specific first. */
export function variantKeysFor(context: GeographicContext): string[] {
  const keys: string[] = [context.terrain];
  if (context.season) keys.push(context.season, `${context.terrain}_${context.season}`);
  return keys;
}

interface StyleState {
  palette: Palette;
  styles: Record<LayerKey, LayerStyle>;
}

function applyVariant(state: StyleState, variant: ThemeVariant): StyleState {
  const palette: Palette = {
    background: variant.bg ? pickColor(variant.bg) : state.palette.background,
    text: variant.text ? pickColor(variant.text) : state.palette.text,
    gradient: variant.gradient_color ? pickColor(variant.gradient_color) : state.palette.gradient,
  };
  const styles = mapLayerStyles((key) => {
    const current = state.styles[key];
    if (key === "labels" && variant.labels === undefined && variant.text !== undefined) {
      return { ...current, color: palette.text };
    }
    return applyLayerValue(current, variant[key]);
  });
  return { palette, styles };
}

function expandOverrides(overrides: StyleOverrides): ThemeVariant {
  const { roads, ...rest } = overrides;
  if (roads === undefined) return rest;
  const expanded: ThemeVariant = { ...rest };
  for (const key of ROAD_KEYS) {
    if (expanded[key] === undefined) expanded[key] = roads;
  }
  return expanded;
}

/**
 * Final per-layer styles. Precedence, highest first: request override,
 * context variant (combined over season over terrain), theme base, engine
 * default. The last two are already merged in the theme definition.
 */
export function resolveTheme(
  theme: ThemeDefinition,
  layers: RenderLayer[],
  context: GeographicContext,
  overrides?: StyleOverrides
): ResolvedTheme {
  let state: StyleState = { palette: { ...theme.palette }, styles: { ...theme.layers } };
  for (const key of variantKeysFor(context)) {
    const variant = theme.variants[key];
    if (variant) state = applyVariant(state, variant);
  }
  if (overrides) state = applyVariant(state, expandOverrides(overrides));

  const resolved: ResolvedTheme = {
    name: theme.name,
    palette: state.palette,
    styles: state.styles,
    layers: layers.map((layer) => ({ ...layer, style: state.styles[layer.key] })),
    context,
  };
  if (theme.texture !== undefined) resolved.texture = theme.texture;
  if (theme.textureIntensity !== undefined) resolved.textureIntensity = theme.textureIntensity;
  if (theme.artisticEffect !== undefined) resolved.artisticEffect = theme.artisticEffect;
  if (theme.colorEnhancement !== undefined) resolved.colorEnhancement = theme.colorEnhancement;
  return resolved;
}
