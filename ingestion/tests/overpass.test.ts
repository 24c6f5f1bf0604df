import { describe, expect, it, vi } from "vitest";
import {
  FeatureSourceError,
  OverpassFeatureSource,
  buildOverpassQuery,
  isAreaWay,
  overpassToFeatures,
  pointInRing,
  stitchRings,
} from "poster-ingestion";

const pt = (lon: number, lat: number) => ({ lat, lon });

describe("buildOverpassQuery", () => {
  it("wraps each selector in an around filter", () => {
    expect(buildOverpassQuery("rail", { latitude: 40, longitude: -89 }, 5000.4, 60)).toBe(
      '[out:json][timeout:60];(way["railway"~"^(rail|subway|tram|light_rail|monorail|funicular|narrow_gauge|preserved)$"](around:5000,40,-89);node["railway"~"^(station|halt|tram_stop)$"](around:5000,40,-89););out geom;'
    );
  });
});

describe("geometry helpers", () => {
  it("tells area ways from closed lines", () => {
    expect(isAreaWay({ building: "yes" })).toBe(true);
    expect(isAreaWay({ highway: "residential", junction: "roundabout" })).toBe(false);
    expect(isAreaWay({ natural: "water" })).toBe(true);
    expect(isAreaWay({ natural: "coastline" })).toBe(false);
    expect(isAreaWay({ waterway: "riverbank" })).toBe(true);
    expect(isAreaWay({ waterway: "river" })).toBe(false);
    expect(isAreaWay({ highway: "pedestrian", area: "yes" })).toBe(true);
  });

  it("stitches open segments into closed rings, in either direction", () => {
    const rings = stitchRings([
      [[0, 0], [1, 0], [1, 1]],
      [[0, 0], [0, 1], [1, 1]],
      [[5, 5], [6, 6]],
    ]);
    expect(rings).toEqual([[[0, 0], [1, 0], [1, 1], [0, 1], [0, 0]]]);
  });

  it("tests point containment", () => {
    const square = [[0, 0], [4, 0], [4, 4], [0, 4], [0, 0]];
    expect(pointInRing([2, 2], square)).toBe(true);
    expect(pointInRing([5, 2], square)).toBe(false);
  });
});

describe("overpassToFeatures", () => {
  it("converts nodes, ways and multipolygon relations in response order", () => {
    const collection = overpassToFeatures({
      elements: [
        { type: "way", id: 1, tags: { highway: "primary" }, geometry: [pt(0, 0), pt(1, 0)] },
        { type: "way", id: 2, tags: { building: "yes" }, geometry: [pt(0, 0), pt(1, 0), pt(1, 1), pt(0, 0)] },
        { type: "way", id: 3, tags: { highway: "service" }, geometry: [pt(0, 0), pt(1, 0), pt(1, 1), pt(0, 0)] },
        { type: "node", id: 4, lat: 2, lon: 3, tags: { natural: "peak" } },
        {
          type: "relation",
          id: 5,
          tags: { type: "multipolygon", natural: "water" },
          members: [
            { type: "way", ref: 10, role: "outer", geometry: [pt(0, 0), pt(10, 0), pt(10, 10)] },
            { type: "way", ref: 11, role: "outer", geometry: [pt(0, 0), pt(0, 10), pt(10, 10)] },
            { type: "way", ref: 12, role: "inner", geometry: [pt(2, 2), pt(3, 2), pt(3, 3), pt(2, 2)] },
          ],
        },
        { type: "way", id: 6, tags: { highway: "path" }, geometry: [pt(0, 0)] },
        { type: "area", id: 7 },
      ],
    });

    expect(collection.features.map((f) => f.id)).toEqual(["way/1", "way/2", "way/3", "node/4", "relation/5"]);
    expect(collection.features[0].geometry).toEqual({ type: "LineString", coordinates: [[0, 0], [1, 0]] });
    expect(collection.features[1].geometry.type).toBe("Polygon");
    expect(collection.features[2].geometry.type).toBe("LineString");
    expect(collection.features[3]).toEqual({
      type: "Feature",
      id: "node/4",
      geometry: { type: "Point", coordinates: [3, 2] },
      properties: { natural: "peak" },
    });
    expect(collection.features[4].geometry).toEqual({
      type: "Polygon",
      coordinates: [
        [[0, 0], [10, 0], [10, 10], [0, 10], [0, 0]],
        [[2, 2], [3, 2], [3, 3], [2, 2]],
      ],
    });
    expect(collection.features[4].properties).toEqual({ type: "multipolygon", natural: "water" });
  });

  it("rejects a payload without elements", () => {
    expect(() => overpassToFeatures({ remark: "runtime error" })).toThrow(FeatureSourceError);
  });
});

describe("OverpassFeatureSource", () => {
  const center = { latitude: 40, longitude: -89 };

  function sourceReturning(response: () => Response) {
    const fetcher = vi.fn(async (..._args: Parameters<typeof fetch>) => response());
    const source = new OverpassFeatureSource({
      url: "https://overpass.test/api/interpreter",
      userAgent: "poster-tests/1.0",
      timeoutMs: 30_000,
      fetcher,
    });
    return { source, fetcher };
  }

  it("posts the query as form data", async () => {
    const { source, fetcher } = sourceReturning(() => new Response(JSON.stringify({ elements: [] }), { status: 200 }));
    expect(await source.fetchCategory("roads", center, 1000)).toEqual({ type: "FeatureCollection", features: [] });
    const [url, init] = fetcher.mock.calls[0];
    expect(url).toBe("https://overpass.test/api/interpreter");
    expect(init?.method).toBe("POST");
    expect(init?.body).toBe(
      new URLSearchParams({ data: '[out:json][timeout:30];(way["highway"](around:1000,40,-89););out geom;' }).toString()
    );
  });

  it.each([
    [429, "rate_limited"],
    [504, "transient"],
    [400, "rejected"],
  ])("classifies HTTP %i as %s", async (status, reason) => {
    const { source } = sourceReturning(() => new Response("busy", { status }));
    await expect(source.fetchCategory("water", center, 1000)).rejects.toMatchObject({ reason, status });
  });
});
