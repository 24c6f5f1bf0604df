import { z } from "zod";
import { ArtisticEffect, ColorEnhancement, Season, TerrainType } from "../types.js";

export const HexColor = z
  .string()
  .regex(/^#(?:[0-9a-fA-F]{3}|[0-9a-fA-F]{6})$/, "expected a hex color such as #1A2B3C");

/** A single color, or a list whose first entry is used. */
export const ColorValue = z.union([HexColor, z.array(HexColor).nonempty()]);
export type ColorValue = z.infer<typeof ColorValue>;

export const LayerStyleInput = z
  .object({
    color: ColorValue,
    width: z.number().positive().max(50).optional(),
    opacity: z.number().min(0).max(1).optional(),
  })
  .strict();

export const LayerValue = z.union([ColorValue, LayerStyleInput]);
export type LayerValue = z.infer<typeof LayerValue>;

const styleFields = {
  bg: ColorValue.optional(),
  text: ColorValue.optional(),
  gradient_color: ColorValue.optional(),
  water: LayerValue.optional(),
  parks: LayerValue.optional(),
  land: LayerValue.optional(),
  buildings: LayerValue.optional(),
  road_motorway: LayerValue.optional(),
  road_primary: LayerValue.optional(),
  road_secondary: LayerValue.optional(),
  road_tertiary: LayerValue.optional(),
  road_residential: LayerValue.optional(),
  road_default: LayerValue.optional(),
  rail: LayerValue.optional(),
  labels: LayerValue.optional(),
};

export const ThemeVariant = z.object(styleFields).strict();
export type ThemeVariant = z.infer<typeof ThemeVariant>;

const variantKeys = new Set<string>([
  ...TerrainType.options,
  ...Season.options,
  ...TerrainType.options.flatMap((terrain) => Season.options.map((season) => `${terrain}_${season}`)),
]);

export const VariantKey = z.string().refine((key) => variantKeys.has(key), {
  message: "variant keys must be a terrain, a season, or <terrain>_<season>",
});

export const ThemeDocument = z
  .object({
    name: z.string().min(1).optional(),
    description: z.string().optional(),
    ...styleFields,
    variants: z.record(VariantKey, ThemeVariant).optional(),
    texture: z.string().min(1).optional(),
    texture_intensity: z.number().min(0).max(1).optional(),
    artistic_effect: ArtisticEffect.optional(),
    color_enhancement: ColorEnhancement.optional(),
  })
  .strict();
export type ThemeDocument = z.infer<typeof ThemeDocument>;

/** Per-request overrides. `roads` applies to every road class. */
export const StyleOverrides = z
  .object({
    ...styleFields,
    roads: LayerValue.optional(),
  })
  .strict();
export type StyleOverrides = z.infer<typeof StyleOverrides>;
