import { config as loadDotenv } from "dotenv";
import path from "path";
import { fileURLToPath } from "url";
import { z } from "zod";
import { LOG_LEVELS, type LogLevel } from "./logger.js";

/** Repository root: engine/src/config.ts sits two levels below it. */
export const PROJECT_ROOT = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "..", "..");

const intFromEnv = (fallback: number, min = 0) => z.coerce.number().int().min(min).default(fallback);

const EnvSchema = z.object({
  CACHE_DIR: z.string().min(1).default(".cache"),
  THEMES_DIR: z.string().min(1).default(path.join(PROJECT_ROOT, "themes")),
  FONTS_DIR: z.string().min(1).default(path.join(PROJECT_ROOT, "assets", "fonts")),
  TEXTURES_DIR: z.string().min(1).default(path.join(PROJECT_ROOT, "assets", "textures")),
  POSTERS_DIR: z.string().min(1).default("posters"),
  NOMINATIM_URL: z.string().url().default("https://nominatim.openstreetmap.org"),
  OVERPASS_URL: z.string().url().default("https://overpass-api.de/api/interpreter"),
  GEOCODE_USER_AGENT: z.string().min(1).default("city-poster/0.1"),
  GEOCODE_MIN_INTERVAL_MS: intFromEnv(1000),
  GEOCODE_MAX_ATTEMPTS: intFromEnv(3, 1),
  RETRY_BASE_DELAY_MS: intFromEnv(1000),
  RATE_LIMIT_PENALTY_MS: intFromEnv(5000),
  REQUEST_TIMEOUT_MS: intFromEnv(15000, 1),
  OVERPASS_TIMEOUT_MS: intFromEnv(60000, 1),
  POSTER_DPI: intFromEnv(300, 36),
  LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
  LOG_PRETTY: z
    .enum(["0", "1", "false", "true"])
    .default("0")
    .transform((value) => value === "1" || value === "true"),
});

export interface PosterConfig {
  cacheDir: string;
  themesDir: string;
  fontsDir: string;
  texturesDir: string;
  postersDir: string;
  nominatimUrl: string;
  overpassUrl: string;
  geocodeUserAgent: string;
  geocodeMinIntervalMs: number;
  geocodeMaxAttempts: number;
  retryBaseDelayMs: number;
  rateLimitPenaltyMs: number;
  requestTimeoutMs: number;
  overpassTimeoutMs: number;
  posterDpi: number;
  logLevel: LogLevel;
  logPretty: boolean;
}

/** Validate an environment map into a typed configuration. Blank values fall back to defaults. */
export function loadConfig(env: Record<string, string | undefined> = process.env): PosterConfig {
  const present = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value !== ""));
  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
    throw new Error(`Invalid poster configuration: ${details}`);
  }
  const e = parsed.data;
  return {
    cacheDir: path.resolve(e.CACHE_DIR),
    themesDir: path.resolve(e.THEMES_DIR),
    fontsDir: path.resolve(e.FONTS_DIR),
    texturesDir: path.resolve(e.TEXTURES_DIR),
    postersDir: path.resolve(e.POSTERS_DIR),
    nominatimUrl: e.NOMINATIM_URL,
    overpassUrl: e.OVERPASS_URL,
    geocodeUserAgent: e.GEOCODE_USER_AGENT,
    geocodeMinIntervalMs: e.GEOCODE_MIN_INTERVAL_MS,
    geocodeMaxAttempts: e.GEOCODE_MAX_ATTEMPTS,
    retryBaseDelayMs: e.RETRY_BASE_DELAY_MS,
    rateLimitPenaltyMs: e.RATE_LIMIT_PENALTY_MS,
    requestTimeoutMs: e.REQUEST_TIMEOUT_MS,
    overpassTimeoutMs: e.OVERPASS_TIMEOUT_MS,
    posterDpi: e.POSTER_DPI,
    logLevel: e.LOG_LEVEL,
    logPretty: e.LOG_PRETTY,
  };
}

/** Configuration from `.env` merged over the process environment. */
export function loadConfigFromEnv(): PosterConfig {
  loadDotenv();
  return loadConfig(process.env);
}
