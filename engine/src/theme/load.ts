import { readdir, readFile } from "fs/promises";
import path from "path";
import type { ArtisticEffect, ColorEnhancement, LayerKey, LayerStyle, Palette } from "../types.js";
import { ThemeLoadError, extractErrorMessage } from "../errors.js";
import { DEFAULT_LAYER_STYLES, DEFAULT_PALETTE, mapLayerStyles } from "./defaults.js";
import { ThemeDocument, type ColorValue, type LayerValue, type ThemeVariant } from "./schema.js";

export interface ThemeDefinition {
  name: string;
  description?: string;
  palette: Palette;
  layers: Record<LayerKey, LayerStyle>;
  variants: Record<string, ThemeVariant>;
  texture?: string;
  textureIntensity?: number;
  artisticEffect?: ArtisticEffect;
  colorEnhancement?: ColorEnhancement;
}

export interface ThemeSummary {
  name: string;
  description?: string;
}

const THEME_NAME = /^[A-Za-z0-9][A-Za-z0-9_-]*$/;

export function pickColor(value: ColorValue): string {
  return typeof value === "string" ? value : value[0];
}

/** Apply the fields a layer value sets on top of `base`; the rest carry over. */
export function applyLayerValue(base: LayerStyle, value: LayerValue | undefined): LayerStyle {
  if (value === undefined) return base;
  if (typeof value === "string" || Array.isArray(value)) return { ...base, color: pickColor(value) };
  const merged: LayerStyle = { ...base, color: pickColor(value.color) };
  if (value.width !== undefined) merged.width = value.width;
  if (value.opacity !== undefined) merged.opacity = value.opacity;
  return merged;
}

/**
 * Fill every palette entry and canonical layer from the engine defaults. The
 * labels layer follows the theme's text color unless set explicitly.
 */
export function mergeThemeDefaults(document: ThemeDocument, fallbackName: string): ThemeDefinition {
  const palette: Palette = {
    background: document.bg ? pickColor(document.bg) : DEFAULT_PALETTE.background,
    text: document.text ? pickColor(document.text) : DEFAULT_PALETTE.text,
    gradient: document.gradient_color ? pickColor(document.gradient_color) : DEFAULT_PALETTE.gradient,
  };
  const layers = mapLayerStyles((key) => {
    const base = key === "labels" ? { ...DEFAULT_LAYER_STYLES.labels, color: palette.text } : DEFAULT_LAYER_STYLES[key];
    return applyLayerValue(base, document[key]);
  });
  const theme: ThemeDefinition = {
    name: document.name ?? fallbackName,
    palette,
    layers,
    variants: document.variants ?? {},
  };
  if (document.description !== undefined) theme.description = document.description;
  if (document.texture !== undefined) theme.texture = document.texture;
  if (document.texture_intensity !== undefined) theme.textureIntensity = document.texture_intensity;
  if (document.artistic_effect !== undefined) theme.artisticEffect = document.artistic_effect;
  if (document.color_enhancement !== undefined) theme.colorEnhancement = document.color_enhancement;
  return theme;
}

/** Validate a parsed theme document. Unknown keys and malformed colors are rejected. */
export function parseTheme(raw: unknown, name: string): ThemeDefinition {
  const parsed = ThemeDocument.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`).join("; ");
    throw new ThemeLoadError(`Theme "${name}" is invalid: ${details}`);
  }
  return mergeThemeDefaults(parsed.data, name);
}

export async function loadTheme(name: string, themesDir: string): Promise<ThemeDefinition> {
  if (!THEME_NAME.test(name)) {
    throw new ThemeLoadError(`Theme name "${name}" may only contain letters, digits, "_" and "-"`);
  }
  const file = path.join(themesDir, `${name}.json`);
  let text: string;
  try {
    text = await readFile(file, "utf8");
  } catch (error) {
    throw new ThemeLoadError(`Theme "${name}" not found in ${themesDir}`, { cause: error });
  }
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ThemeLoadError(`Theme "${name}" is not valid JSON: ${extractErrorMessage(error)}`, { cause: error });
  }
  return parseTheme(raw, name);
}

/** Every theme file in the directory, sorted by name. Files that fail to load are skipped. */
export async function listThemes(themesDir: string): Promise<ThemeSummary[]> {
  let entries: string[];
  try {
    entries = await readdir(themesDir);
  } catch (error) {
    throw new ThemeLoadError(`Theme directory ${themesDir} cannot be read`, { cause: error });
  }
  const names = entries
    .filter((entry) => entry.endsWith(".json"))
    .map((entry) => entry.slice(0, -".json".length))
    .filter((name) => THEME_NAME.test(name))
    .sort();
  const summaries: ThemeSummary[] = [];
  for (const name of names) {
    const theme = await loadTheme(name, themesDir).catch((error: unknown) => {
      if (error instanceof ThemeLoadError) return null;
      throw error;
    });
    if (!theme) continue;
    summaries.push(theme.description !== undefined ? { name, description: theme.description } : { name });
  }
  return summaries;
}
