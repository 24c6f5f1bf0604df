import { z } from "zod";
import {
  FEATURE_CATEGORIES,
  createScopedLogger,
  extractErrorMessage,
  type Coordinate,
  type FeatureCategory,
  type GeographicDataset,
  type Logger,
  type TaggedFeatureCollection,
} from "poster-engine";
import type { CacheStore } from "./cache.js";
import { systemClock, type Clock } from "./clock.js";
import { FeatureSourceError, type FeatureSource } from "./overpass.js";
import { withRetry, type RetryConfig } from "./retry.js";

const Position = z.array(z.number()).min(2);

const CachedGeometry = z.discriminatedUnion("type", [
  z.object({ type: z.literal("Point"), coordinates: Position }),
  z.object({ type: z.literal("MultiPoint"), coordinates: z.array(Position) }),
  z.object({ type: z.literal("LineString"), coordinates: z.array(Position) }),
  z.object({ type: z.literal("MultiLineString"), coordinates: z.array(z.array(Position)) }),
  z.object({ type: z.literal("Polygon"), coordinates: z.array(z.array(Position)) }),
  z.object({ type: z.literal("MultiPolygon"), coordinates: z.array(z.array(z.array(Position))) }),
]);

const CachedCollection = z.object({
  type: z.literal("FeatureCollection"),
  features: z.array(
    z.object({
      type: z.literal("Feature"),
      id: z.union([z.string(), z.number()]).optional(),
      geometry: CachedGeometry,
      properties: z.record(z.string(), z.string()),
    })
  ),
});

export interface GeoDataFetcherOptions {
  source: FeatureSource;
  cache: CacheStore;
  clock?: Clock;
  retry?: Partial<RetryConfig>;
  logger?: Logger;
}

interface CategoryResult {
  category: FeatureCategory;
  collection: TaggedFeatureCollection;
  failed: boolean;
}

/** Cache key for one category around a center; a different radius is a different entry. */
export function featureCacheKey(category: FeatureCategory, center: Coordinate, radius: number): string {
  return `features_${category}_${center.latitude.toFixed(6)}_${center.longitude.toFixed(6)}_${Math.round(radius)}`;
}

const emptyCollection = (): TaggedFeatureCollection => ({ type: "FeatureCollection", features: [] });

export class GeoDataFetcher {
  private readonly source: FeatureSource;
  private readonly cache: CacheStore;
  private readonly clock: Clock;
  private readonly retry: Partial<RetryConfig>;
  private readonly log: Logger;
  private readonly inflight = new Map<string, Promise<CategoryResult>>();

  constructor(options: GeoDataFetcherOptions) {
    this.source = options.source;
    this.cache = options.cache;
    this.clock = options.clock ?? systemClock;
    this.retry = options.retry ?? {};
    this.log = options.logger ?? createScopedLogger({ component: "geo-data-fetcher" });
  }

  /**
   * Every category is requested independently. A category that fails after
   * retries comes back empty and is listed in `missingCategories`.
   */
  async fetch(center: Coordinate, radius: number): Promise<GeographicDataset> {
    const results = await Promise.all(FEATURE_CATEGORIES.map((category) => this.category(category, center, radius)));
    const collections: Record<FeatureCategory, TaggedFeatureCollection> = {
      roads: emptyCollection(),
      water: emptyCollection(),
      parks: emptyCollection(),
      buildings: emptyCollection(),
      rail: emptyCollection(),
    };
    const missingCategories: FeatureCategory[] = [];
    for (const result of results) {
      collections[result.category] = result.collection;
      if (result.failed) missingCategories.push(result.category);
    }
    const featureCount = results.reduce((sum, r) => sum + r.collection.features.length, 0);
    this.log.info({ radius, featureCount, missingCategories }, "geographic data ready");
    return Object.freeze({
      center: { latitude: center.latitude, longitude: center.longitude },
      radius,
      collections,
      missingCategories,
      fetchedAt: new Date(this.clock.now()).toISOString(),
    });
  }

  /** Identical concurrent requests share one in-flight load. */
  private category(category: FeatureCategory, center: Coordinate, radius: number): Promise<CategoryResult> {
    const key = featureCacheKey(category, center, radius);
    const pending = this.inflight.get(key);
    if (pending) return pending;
    const load = this.load(category, center, radius, key).finally(() => this.inflight.delete(key));
    this.inflight.set(key, load);
    return load;
  }

  private async load(category: FeatureCategory, center: Coordinate, radius: number, key: string): Promise<CategoryResult> {
    const cached = await this.cache.get(key, CachedCollection);
    if (cached) {
      this.log.debug({ category, key }, "features served from cache");
      return { category, collection: cached, failed: false };
    }

    let collection: TaggedFeatureCollection;
    try {
      collection = await withRetry(
        () => this.source.fetchCategory(category, center, radius),
        (error) =>
          error instanceof FeatureSourceError && error.reason !== "rejected" ? { retry: true } : { retry: false },
        { config: this.retry, clock: this.clock, logger: this.log, label: `fetching ${category}` }
      );
    } catch (error) {
      this.log.warn({ category, err: extractErrorMessage(error) }, "feature category unavailable, substituting empty layer");
      return { category, collection: emptyCollection(), failed: true };
    }

    try {
      await this.cache.put(key, collection);
    } catch (error) {
      this.log.warn({ category, key, err: extractErrorMessage(error) }, "could not cache features");
    }
    return { category, collection, failed: false };
  }
}
