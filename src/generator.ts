import { createLogger, listThemes, loadConfigFromEnv, type Logger, type PosterConfig, type ProgressEvent, type ThemeSummary } from "poster-engine";
import {
  CacheManager,
  GeoDataFetcher,
  LocationResolver,
  NominatimGeocoder,
  OverpassFeatureSource,
  sharedGeocodeLimiter,
} from "poster-ingestion";
import { generatePoster, type GenerationResult } from "./pipeline.js";

export interface PosterGenerator {
  config: PosterConfig;
  logger: Logger;
  cache: CacheManager;
  resolver: LocationResolver;
  fetcher: GeoDataFetcher;
  generate(request: unknown, options?: { onProgress?: (event: ProgressEvent) => void }): Promise<GenerationResult>;
  listThemes(): Promise<ThemeSummary[]>;
}

/**
 * Wire the default Nominatim and Overpass capabilities behind the shared cache
 * and rate limiter. Without a logger, one is built from the configured level
 * and format.
 */
export function createPosterGenerator(
  config: PosterConfig = loadConfigFromEnv(),
  logger: Logger = createLogger({ level: config.logLevel, pretty: config.logPretty })
): PosterGenerator {
  const retry = { maxAttempts: config.geocodeMaxAttempts, baseDelayMs: config.retryBaseDelayMs };
  const cache = new CacheManager(config.cacheDir, { logger: logger.child({ component: "cache" }) });
  const resolver = new LocationResolver({
    geocoder: new NominatimGeocoder({
      baseUrl: config.nominatimUrl,
      userAgent: config.geocodeUserAgent,
      timeoutMs: config.requestTimeoutMs,
    }),
    cache,
    limiter: sharedGeocodeLimiter(config.geocodeMinIntervalMs),
    retry,
    rateLimitPenaltyMs: config.rateLimitPenaltyMs,
    logger: logger.child({ component: "location-resolver" }),
  });
  const fetcher = new GeoDataFetcher({
    source: new OverpassFeatureSource({
      url: config.overpassUrl,
      userAgent: config.geocodeUserAgent,
      timeoutMs: config.overpassTimeoutMs,
    }),
    cache,
    retry,
    logger: logger.child({ component: "geo-data-fetcher" }),
  });

  return {
    config,
    logger,
    cache,
    resolver,
    fetcher,
    generate: (request, options = {}) =>
      generatePoster(request, { resolver, fetcher, config, logger, onProgress: options.onProgress }),
    listThemes: () => listThemes(config.themesDir),
  };
}
