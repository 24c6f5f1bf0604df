import { z } from "zod";
import { extractErrorMessage, type LocationQuery } from "poster-engine";

export type GeocodeFailureReason = "rate_limited" | "transient" | "rejected";

/** A geocoding call that failed for a reason other than "no such place". */
export class GeocodeServiceError extends Error {
  readonly reason: GeocodeFailureReason;
  readonly status?: number;

  constructor(reason: GeocodeFailureReason, message: string, options: { status?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = "GeocodeServiceError";
    this.reason = reason;
    if (options.status !== undefined) this.status = options.status;
  }
}

export interface GeocodeHit {
  latitude: number;
  longitude: number;
  displayName?: string;
}

/** Narrow capability the location resolver depends on. `null` means the place does not exist. */
export interface Geocoder {
  geocode(query: LocationQuery): Promise<GeocodeHit | null>;
}

const NominatimResults = z.array(
  z.object({
    lat: z.coerce.number().min(-90).max(90),
    lon: z.coerce.number().min(-180).max(180),
    display_name: z.string().optional(),
  })
);

export interface NominatimOptions {
  baseUrl: string;
  userAgent: string;
  timeoutMs: number;
  fetcher?: typeof fetch;
}

/** Keep only the part of a city string before the first comma. */
export function cleanCityName(city: string): string {
  return city.split(",")[0].trim();
}

export function buildNominatimUrl(baseUrl: string, query: LocationQuery): URL {
  const url = new URL("search", baseUrl.endsWith("/") ? baseUrl : `${baseUrl}/`);
  url.searchParams.set("format", "json");
  url.searchParams.set("limit", "1");
  url.searchParams.set("city", cleanCityName(query.city));
  if (query.state) url.searchParams.set("state", query.state.trim());
  if (query.country) url.searchParams.set("country", query.country.trim());
  return url;
}

export class NominatimGeocoder implements Geocoder {
  private readonly options: NominatimOptions;

  constructor(options: NominatimOptions) {
    this.options = options;
  }

  async geocode(query: LocationQuery): Promise<GeocodeHit | null> {
    const fetcher = this.options.fetcher ?? fetch;
    const url = buildNominatimUrl(this.options.baseUrl, query);
    let response: Response;
    try {
      response = await fetcher(url.toString(), {
        headers: { "User-Agent": this.options.userAgent, Accept: "application/json" },
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });
    } catch (error) {
      throw new GeocodeServiceError("transient", `Geocoding request failed: ${extractErrorMessage(error)}`, {
        cause: error,
      });
    }
    if (response.status === 429) {
      throw new GeocodeServiceError("rate_limited", "Geocoding service rate limit hit", { status: 429 });
    }
    if (response.status >= 500) {
      throw new GeocodeServiceError("transient", `Geocoding service returned ${response.status}`, {
        status: response.status,
      });
    }
    if (!response.ok) {
      throw new GeocodeServiceError("rejected", `Geocoding service rejected the request (${response.status})`, {
        status: response.status,
      });
    }
    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new GeocodeServiceError("transient", "Geocoding service returned malformed JSON", { cause: error });
    }
    const parsed = NominatimResults.safeParse(body);
    if (!parsed.success) {
      throw new GeocodeServiceError("transient", "Geocoding service returned an unexpected payload");
    }
    const first = parsed.data[0];
    if (!first) return null;
    const hit: GeocodeHit = { latitude: first.lat, longitude: first.lon };
    if (first.display_name !== undefined) hit.displayName = first.display_name;
    return hit;
  }
}
