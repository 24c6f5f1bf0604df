import { z } from "zod";
import type { Geometry, Position } from "geojson";
import {
  extractErrorMessage,
  type Coordinate,
  type FeatureCategory,
  type OsmTags,
  type TaggedFeature,
  type TaggedFeatureCollection,
} from "poster-engine";

export type FeatureSourceFailureReason = "rate_limited" | "transient" | "rejected";

export class FeatureSourceError extends Error {
  readonly reason: FeatureSourceFailureReason;
  readonly status?: number;

  constructor(reason: FeatureSourceFailureReason, message: string, options: { status?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = "FeatureSourceError";
    this.reason = reason;
    if (options.status !== undefined) this.status = options.status;
  }
}

/** Narrow capability the data fetcher depends on: one feature category around a point. */
export interface FeatureSource {
  fetchCategory(category: FeatureCategory, center: Coordinate, radius: number): Promise<TaggedFeatureCollection>;
}

/**
 * Overpass selectors per category. `buildings` also carries bare-ground land
 * cover (sand, rock, glaciers) so terrain can be detected from it.
 */
export const CATEGORY_SELECTORS: Record<FeatureCategory, string[]> = {
  roads: ['way["highway"]'],
  water: [
    'way["natural"~"^(water|bay|wetland|coastline)$"]',
    'way["waterway"~"^(river|canal|stream|drain|ditch|riverbank|dock)$"]',
    'way["landuse"~"^(reservoir|basin)$"]',
    'relation["type"="multipolygon"]["natural"="water"]',
    'relation["type"="multipolygon"]["waterway"="riverbank"]',
  ],
  parks: [
    'way["leisure"~"^(park|garden|nature_reserve|playground)$"]',
    'way["landuse"~"^(grass|meadow|village_green|forest|recreation_ground|cemetery)$"]',
    'way["natural"~"^(wood|grassland)$"]',
    'relation["type"="multipolygon"]["leisure"="park"]',
    'relation["type"="multipolygon"]["landuse"="forest"]',
    'relation["type"="multipolygon"]["natural"="wood"]',
  ],
  buildings: ['way["building"]', 'way["natural"~"^(sand|beach|dune|bare_rock|scree|cliff|glacier)$"]'],
  rail: [
    'way["railway"~"^(rail|subway|tram|light_rail|monorail|funicular|narrow_gauge|preserved)$"]',
    'node["railway"~"^(station|halt|tram_stop)$"]',
  ],
};

export function buildOverpassQuery(category: FeatureCategory, center: Coordinate, radius: number, timeoutSeconds: number): string {
  const around = `(around:${Math.round(radius)},${center.latitude},${center.longitude})`;
  const parts = CATEGORY_SELECTORS[category].map((selector) => `${selector}${around};`).join("");
  return `[out:json][timeout:${timeoutSeconds}];(${parts});out geom;`;
}

const Tags = z.record(z.string(), z.string());
const LatLon = z.object({ lat: z.number(), lon: z.number() });
const GeometryList = z.array(LatLon.nullable());

const OverpassElement = z.discriminatedUnion("type", [
  z.object({ type: z.literal("node"), id: z.number(), lat: z.number(), lon: z.number(), tags: Tags.optional() }),
  z.object({ type: z.literal("way"), id: z.number(), geometry: GeometryList.optional(), tags: Tags.optional() }),
  z.object({
    type: z.literal("relation"),
    id: z.number(),
    members: z
      .array(z.object({ type: z.string(), ref: z.number(), role: z.string(), geometry: GeometryList.optional() }))
      .optional(),
    tags: Tags.optional(),
  }),
]);
type OverpassElement = z.infer<typeof OverpassElement>;

const OverpassResponse = z.object({ elements: z.array(z.unknown()) });

function toPositions(geometry: z.infer<typeof GeometryList> | undefined): Position[] {
  const positions: Position[] = [];
  for (const point of geometry ?? []) {
    if (point) positions.push([point.lon, point.lat]);
  }
  return positions;
}

const samePosition = (a: Position, b: Position) => a[0] === b[0] && a[1] === b[1];

function isClosed(ring: Position[]): boolean {
  return ring.length >= 4 && samePosition(ring[0], ring[ring.length - 1]);
}

const AREA_KEYS = ["building", "landuse", "leisure", "amenity"];
const LINEAR_NATURAL = new Set(["coastline", "cliff", "ridge", "tree_row"]);

/** Whether a closed way describes an area rather than a loop of line. */
export function isAreaWay(tags: OsmTags): boolean {
  if (tags.area === "yes") return true;
  if (tags.area === "no") return false;
  if (tags.highway !== undefined || tags.railway !== undefined || tags.barrier !== undefined) return false;
  if (AREA_KEYS.some((key) => tags[key] !== undefined)) return true;
  if (tags.natural !== undefined) return !LINEAR_NATURAL.has(tags.natural);
  if (tags.waterway !== undefined) return tags.waterway === "riverbank" || tags.waterway === "dock";
  return false;
}

export function pointInRing(point: Position, ring: Position[]): boolean {
  let inside = false;
  for (let i = 0, j = ring.length - 1; i < ring.length; j = i++) {
    const xi = ring[i][0], yi = ring[i][1];
    const xj = ring[j][0], yj = ring[j][1];
    const intersect = yi > point[1] !== yj > point[1] && point[0] < ((xj - xi) * (point[1] - yi)) / (yj - yi + Number.EPSILON) + xi;
    if (intersect) inside = !inside;
  }
  return inside;
}

/** Join open member ways end to end into closed rings. Open leftovers are dropped. */
export function stitchRings(segments: Position[][]): Position[][] {
  const pending = segments.filter((segment) => segment.length >= 2).map((segment) => [...segment]);
  const rings: Position[][] = [];
  while (pending.length > 0) {
    const ring = pending.shift() ?? [];
    while (!isClosed(ring)) {
      const end = ring[ring.length - 1];
      const index = pending.findIndex(
        (segment) => samePosition(segment[0], end) || samePosition(segment[segment.length - 1], end)
      );
      if (index < 0) break;
      const [next] = pending.splice(index, 1);
      const oriented = samePosition(next[0], end) ? next : [...next].reverse();
      ring.push(...oriented.slice(1));
    }
    if (isClosed(ring)) rings.push(ring);
  }
  return rings;
}

function relationGeometry(element: Extract<OverpassElement, { type: "relation" }>): Geometry | null {
  const members = element.members ?? [];
  const outer = stitchRings(members.filter((m) => m.type === "way" && m.role !== "inner").map((m) => toPositions(m.geometry)));
  const inner = stitchRings(members.filter((m) => m.type === "way" && m.role === "inner").map((m) => toPositions(m.geometry)));
  if (outer.length === 0) return null;
  const polygons: Position[][][] = outer.map((ring) => [ring]);
  for (const hole of inner) {
    const owner = polygons.find((polygon) => pointInRing(hole[0], polygon[0]));
    if (owner) owner.push(hole);
  }
  return polygons.length === 1 ? { type: "Polygon", coordinates: polygons[0] } : { type: "MultiPolygon", coordinates: polygons };
}

function elementGeometry(element: OverpassElement): Geometry | null {
  switch (element.type) {
    case "node":
      return { type: "Point", coordinates: [element.lon, element.lat] };
    case "way": {
      const positions = toPositions(element.geometry);
      if (positions.length < 2) return null;
      if (isClosed(positions) && isAreaWay(element.tags ?? {})) return { type: "Polygon", coordinates: [positions] };
      return { type: "LineString", coordinates: positions };
    }
    case "relation":
      return relationGeometry(element);
  }
}

/** Convert an Overpass `out geom` payload into tagged GeoJSON features, in response order. */
export function overpassToFeatures(payload: unknown): TaggedFeatureCollection {
  const parsed = OverpassResponse.safeParse(payload);
  if (!parsed.success) throw new FeatureSourceError("transient", "Overpass returned an unexpected payload");
  const features: TaggedFeature[] = [];
  for (const raw of parsed.data.elements) {
    const element = OverpassElement.safeParse(raw);
    if (!element.success) continue;
    const geometry = elementGeometry(element.data);
    if (!geometry) continue;
    features.push({
      type: "Feature",
      id: `${element.data.type}/${element.data.id}`,
      geometry,
      properties: element.data.tags ?? {},
    });
  }
  return { type: "FeatureCollection", features };
}

export interface OverpassOptions {
  url: string;
  userAgent: string;
  timeoutMs: number;
  fetcher?: typeof fetch;
}

export class OverpassFeatureSource implements FeatureSource {
  private readonly options: OverpassOptions;

  constructor(options: OverpassOptions) {
    this.options = options;
  }

  async fetchCategory(category: FeatureCategory, center: Coordinate, radius: number): Promise<TaggedFeatureCollection> {
    const fetcher = this.options.fetcher ?? fetch;
    const query = buildOverpassQuery(category, center, radius, Math.ceil(this.options.timeoutMs / 1000));
    let response: Response;
    try {
      response = await fetcher(this.options.url, {
        method: "POST",
        headers: {
          "Content-Type": "application/x-www-form-urlencoded",
          "User-Agent": this.options.userAgent,
        },
        body: new URLSearchParams({ data: query }).toString(),
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });
    } catch (error) {
      throw new FeatureSourceError("transient", `Overpass request for ${category} failed: ${extractErrorMessage(error)}`, {
        cause: error,
      });
    }
    if (response.status === 429) {
      throw new FeatureSourceError("rate_limited", `Overpass rate limit hit while fetching ${category}`, { status: 429 });
    }
    if (response.status >= 500) {
      throw new FeatureSourceError("transient", `Overpass returned ${response.status} for ${category}`, {
        status: response.status,
      });
    }
    if (!response.ok) {
      throw new FeatureSourceError("rejected", `Overpass rejected the ${category} query (${response.status})`, {
        status: response.status,
      });
    }
    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new FeatureSourceError("transient", `Overpass returned malformed JSON for ${category}`, { cause: error });
    }
    return overpassToFeatures(body);
  }
}
