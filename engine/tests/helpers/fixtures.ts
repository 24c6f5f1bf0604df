import type { Position } from "geojson";
import type {
  FeatureCategory,
  GeographicDataset,
  OsmTags,
  RasterCanvas,
  TaggedFeature,
  TaggedFeatureCollection,
} from "poster-engine";

let nextId = 1;

export function line(tags: OsmTags, coordinates: Position[] = [[-89.001, 40.0], [-88.999, 40.0]]): TaggedFeature {
  return { type: "Feature", id: `way/${nextId++}`, geometry: { type: "LineString", coordinates }, properties: tags };
}

export function point(tags: OsmTags, lon = -89, lat = 40): TaggedFeature {
  return { type: "Feature", id: `node/${nextId++}`, geometry: { type: "Point", coordinates: [lon, lat] }, properties: tags };
}

export function square(tags: OsmTags, lon = -89, lat = 40, half = 0.001): TaggedFeature {
  const ring: Position[] = [
    [lon - half, lat - half],
    [lon + half, lat - half],
    [lon + half, lat + half],
    [lon - half, lat + half],
    [lon - half, lat - half],
  ];
  return { type: "Feature", id: `way/${nextId++}`, geometry: { type: "Polygon", coordinates: [ring] }, properties: tags };
}

const collection = (features: TaggedFeature[] = []): TaggedFeatureCollection => ({ type: "FeatureCollection", features });

export function dataset(
  features: Partial<Record<FeatureCategory, TaggedFeature[]>> = {},
  missingCategories: FeatureCategory[] = []
): GeographicDataset {
  return {
    center: { latitude: 40, longitude: -89 },
    radius: 5000,
    collections: {
      roads: collection(features.roads),
      water: collection(features.water),
      parks: collection(features.parks),
      buildings: collection(features.buildings),
      rail: collection(features.rail),
    },
    missingCategories,
    fetchedAt: "2024-01-01T00:00:00.000Z",
  };
}

export function solid(width: number, height: number, rgb: [number, number, number]): RasterCanvas {
  const data = Buffer.alloc(width * height * 3);
  for (let i = 0; i < width * height; i++) {
    data[i * 3] = rgb[0];
    data[i * 3 + 1] = rgb[1];
    data[i * 3 + 2] = rgb[2];
  }
  return { kind: "raster", width, height, channels: 3, data };
}

export function pixel(canvas: RasterCanvas, x: number, y: number): [number, number, number] {
  const offset = (y * canvas.width + x) * 3;
  return [canvas.data[offset], canvas.data[offset + 1], canvas.data[offset + 2]];
}
