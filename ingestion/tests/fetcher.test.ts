import { mkdtemp, rm } from "fs/promises";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { Coordinate, FeatureCategory, TaggedFeatureCollection } from "poster-engine";
import { CacheManager, FeatureSourceError, GeoDataFetcher, ManualClock, featureCacheKey, type FeatureSource } from "poster-ingestion";

function collectionFor(category: FeatureCategory): TaggedFeatureCollection {
  return {
    type: "FeatureCollection",
    features: [
      {
        type: "Feature",
        id: `way/${category}`,
        geometry: { type: "LineString", coordinates: [[-89, 40], [-88.99, 40]] },
        properties: { source: category },
      },
    ],
  };
}

class StubSource implements FeatureSource {
  readonly fetchCategory = vi.fn(
    async (category: FeatureCategory, _center: Coordinate, _radius: number): Promise<TaggedFeatureCollection> =>
      collectionFor(category)
  );
}

const center = { latitude: 40, longitude: -89 };

describe("featureCacheKey", () => {
  it("identifies category, center and rounded radius", () => {
    expect(featureCacheKey("roads", center, 5000.4)).toBe("features_roads_40.000000_-89.000000_5000");
  });
});

describe("GeoDataFetcher", () => {
  let dir: string;
  let source: StubSource;
  let fetcher: GeoDataFetcher;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "poster-fetcher-"));
    source = new StubSource();
    fetcher = new GeoDataFetcher({
      source,
      cache: new CacheManager(dir),
      clock: new ManualClock(Date.UTC(2024, 0, 1)),
      retry: { maxAttempts: 2, baseDelayMs: 10 },
    });
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("fetches every category and caches it per radius", async () => {
    const dataset = await fetcher.fetch(center, 5000);
    expect(dataset.missingCategories).toEqual([]);
    expect(dataset.collections.rail).toEqual(collectionFor("rail"));
    expect(dataset.fetchedAt).toBe("2024-01-01T00:00:00.000Z");
    expect(Object.isFrozen(dataset)).toBe(true);
    expect(source.fetchCategory).toHaveBeenCalledTimes(5);

    expect((await fetcher.fetch(center, 5000)).collections.roads).toEqual(collectionFor("roads"));
    expect(source.fetchCategory).toHaveBeenCalledTimes(5);

    await fetcher.fetch(center, 8000);
    expect(source.fetchCategory).toHaveBeenCalledTimes(10);
  });

  it("shares in-flight requests for the same area", async () => {
    await Promise.all([fetcher.fetch(center, 5000), fetcher.fetch(center, 5000)]);
    expect(source.fetchCategory).toHaveBeenCalledTimes(5);
  });

  it("substitutes an empty layer for a category that keeps failing", async () => {
    source.fetchCategory.mockImplementation(async (category) => {
      if (category === "rail") throw new FeatureSourceError("transient", "gateway timeout", { status: 504 });
      return collectionFor(category);
    });
    const dataset = await fetcher.fetch(center, 5000);
    expect(dataset.missingCategories).toEqual(["rail"]);
    expect(dataset.collections.rail).toEqual({ type: "FeatureCollection", features: [] });
    expect(dataset.collections.roads).toEqual(collectionFor("roads"));
    expect(source.fetchCategory.mock.calls.filter(([category]) => category === "rail")).toHaveLength(2);

    source.fetchCategory.mockImplementation(async (category) => collectionFor(category));
    const retried = await fetcher.fetch(center, 5000);
    expect(retried.missingCategories).toEqual([]);
    expect(source.fetchCategory.mock.calls.filter(([category]) => category === "rail")).toHaveLength(3);
  });

  it("does not retry errors that are not source failures", async () => {
    source.fetchCategory.mockImplementation(async (category) => {
      if (category === "water") throw new Error("unexpected");
      return collectionFor(category);
    });
    const dataset = await fetcher.fetch(center, 5000);
    expect(dataset.missingCategories).toEqual(["water"]);
    expect(source.fetchCategory.mock.calls.filter(([category]) => category === "water")).toHaveLength(1);
  });
});
