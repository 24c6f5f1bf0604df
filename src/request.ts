import { z } from "zod";
import {
  ArtisticEffect,
  ColorEnhancement,
  InvalidRequestError,
  MapShape,
  OutputFormat,
  Season,
  StyleOverrides,
  TerrainType,
} from "poster-engine";

const FORBIDDEN_NAME_CHARS = /[\u0000-\u001f<>:"/\\|?*]/;

const placeName = (max: number) =>
  z
    .string()
    .trim()
    .max(max, `must be at most ${max} characters`)
    .refine((value) => !FORBIDDEN_NAME_CHARS.test(value), "contains characters that are not allowed in a place name");

const ASSET_NAME = /^[A-Za-z0-9][A-Za-z0-9_-]*$/;

export const MIN_DISTANCE_M = 1000;
export const MAX_DISTANCE_M = 500_000;
export const MIN_POSTER_INCHES = 4;
export const MAX_POSTER_INCHES = 48;
export const MAX_POSTER_AREA_SQ_IN = 1000;

export const GenerationRequestSchema = z
  .object({
    location: z
      .object({
        city: placeName(100).pipe(z.string().min(1, "city is required")),
        country: placeName(100).default(""),
        state: placeName(50).optional(),
      })
      .strict(),
    theme: z
      .string()
      .trim()
      .regex(ASSET_NAME, "theme names may only contain letters, digits, '_' and '-'")
      .default("feature_based"),
    distanceRadius: z.number().finite().min(MIN_DISTANCE_M).max(MAX_DISTANCE_M).default(12000),
    posterWidth: z.number().finite().min(MIN_POSTER_INCHES).max(MAX_POSTER_INCHES).default(12),
    posterHeight: z.number().finite().min(MIN_POSTER_INCHES).max(MAX_POSTER_INCHES).default(16),
    outputFormat: z
      .string()
      .transform((value) => value.trim().toLowerCase().replace(/^\./, ""))
      .pipe(OutputFormat)
      .default("png"),
    font: z.string().trim().min(1).max(64).default("Roboto"),
    texture: z
      .string()
      .trim()
      .max(64)
      .regex(ASSET_NAME, "texture names may only contain letters, digits, '_' and '-'")
      .default("none")
      .transform((value) => (value === "none" ? null : value)),
    mapShape: MapShape.default("rectangle"),
    artisticEffect: z
      .union([z.literal("none"), ArtisticEffect])
      .default("none")
      .transform((value) => (value === "none" ? null : value)),
    colorEnhancement: z
      .union([z.literal("none"), ColorEnhancement])
      .default("none")
      .transform((value) => (value === "none" ? null : value)),
    perLayerStyleOverrides: StyleOverrides.optional(),
    dpi: z.number().int().min(36).max(600).optional(),
    textureIntensity: z.number().min(0).max(1).optional(),
    countryLabel: z.string().trim().max(100).optional(),
    geographicContext: z.object({ terrain: TerrainType.optional(), season: Season.optional() }).strict().optional(),
  })
  .strict()
  .superRefine((request, ctx) => {
    const area = request.posterWidth * request.posterHeight;
    if (area > MAX_POSTER_AREA_SQ_IN) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["posterWidth"],
        message: `poster area ${area} sq in exceeds ${MAX_POSTER_AREA_SQ_IN} sq in`,
      });
    }
  });

export type GenerationRequestInput = z.input<typeof GenerationRequestSchema>;
export type GenerationRequest = z.output<typeof GenerationRequestSchema>;

/** Validate and normalize a request; any violation is an InvalidRequest failure. */
export function parseGenerationRequest(input: unknown): GenerationRequest {
  const parsed = GenerationRequestSchema.safeParse(input);
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join(".") || "request"}: ${issue.message}`).join("; ");
    throw new InvalidRequestError(`Invalid generation request: ${details}`);
  }
  return parsed.data;
}
