import { z } from "zod";
import {
  LocationNotFoundError,
  ServiceUnavailableError,
  createScopedLogger,
  extractErrorMessage,
  type Logger,
  type LocationQuery,
  type ResolvedCoordinate,
} from "poster-engine";
import type { CacheStore } from "./cache.js";
import { systemClock, type Clock } from "./clock.js";
import { GeocodeServiceError, type GeocodeHit, type Geocoder } from "./geocode.js";
import type { RateLimiter } from "./rateLimiter.js";
import { RetryExhaustedError, withRetry, type RetryConfig } from "./retry.js";

const CachedCoordinate = z.object({
  latitude: z.number().min(-90).max(90),
  longitude: z.number().min(-180).max(180),
  resolvedAt: z.string(),
  displayName: z.string().optional(),
});

export interface LocationResolverOptions {
  geocoder: Geocoder;
  cache: CacheStore;
  limiter: RateLimiter;
  clock?: Clock;
  retry?: Partial<RetryConfig>;
  /** Added on top of the backoff after a rate-limited answer. */
  rateLimitPenaltyMs?: number;
  logger?: Logger;
}

export interface ResolveOptions {
  /** Skip the cache and overwrite its entry with a fresh resolution. */
  refresh?: boolean;
}

const normalize = (value: string | undefined) => (value ?? "").trim().replace(/\s+/g, " ").toLowerCase();

/** Identity of a location query: normalized lowercase (city, country, state). */
export function locationCacheKey(query: LocationQuery): string {
  return `coords_${normalize(query.city)}_${normalize(query.country)}_${normalize(query.state)}`;
}

function describe(query: LocationQuery): string {
  return [query.city, query.state, query.country].filter((part) => part && part.trim().length > 0).join(", ");
}

export class LocationResolver {
  private readonly geocoder: Geocoder;
  private readonly cache: CacheStore;
  private readonly limiter: RateLimiter;
  private readonly clock: Clock;
  private readonly retry: Partial<RetryConfig>;
  private readonly rateLimitPenaltyMs: number;
  private readonly log: Logger;

  constructor(options: LocationResolverOptions) {
    this.geocoder = options.geocoder;
    this.cache = options.cache;
    this.limiter = options.limiter;
    this.clock = options.clock ?? systemClock;
    this.retry = options.retry ?? {};
    this.rateLimitPenaltyMs = options.rateLimitPenaltyMs ?? 0;
    this.log = options.logger ?? createScopedLogger({ component: "location-resolver" });
  }

  async resolve(query: LocationQuery, options: ResolveOptions = {}): Promise<ResolvedCoordinate> {
    const key = locationCacheKey(query);
    if (!options.refresh) {
      const cached = await this.cache.get(key, CachedCoordinate);
      if (cached) {
        this.log.debug({ key }, "coordinate served from cache");
        return Object.freeze({ ...cached, source: "cache" as const });
      }
    }

    const label = describe(query);
    let hit: GeocodeHit | null;
    try {
      hit = await withRetry(
        () => this.limiter.schedule(() => this.geocoder.geocode(query)),
        (error) => {
          if (!(error instanceof GeocodeServiceError) || error.reason === "rejected") return { retry: false };
          return error.reason === "rate_limited"
            ? { retry: true, extraDelayMs: this.rateLimitPenaltyMs }
            : { retry: true };
        },
        { config: this.retry, clock: this.clock, logger: this.log, label: `geocoding ${label}` }
      );
    } catch (error) {
      if (error instanceof RetryExhaustedError) {
        throw new ServiceUnavailableError(`Geocoding ${label} failed after ${error.attempts} attempts`, error.attempts, {
          cause: error,
        });
      }
      throw new ServiceUnavailableError(`Geocoding ${label} failed: ${extractErrorMessage(error)}`, 1, { cause: error });
    }

    if (!hit) throw new LocationNotFoundError(`Could not find coordinates for ${label}`);

    const payload: z.infer<typeof CachedCoordinate> = {
      latitude: hit.latitude,
      longitude: hit.longitude,
      resolvedAt: new Date(this.clock.now()).toISOString(),
    };
    if (hit.displayName !== undefined) payload.displayName = hit.displayName;
    try {
      await this.cache.put(key, payload);
    } catch (error) {
      this.log.warn({ key, err: extractErrorMessage(error) }, "could not cache resolved coordinate");
    }
    this.log.info({ location: label, latitude: hit.latitude, longitude: hit.longitude }, "location resolved");
    return Object.freeze({ ...payload, source: "service" as const });
  }
}
