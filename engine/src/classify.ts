import type {
  FeatureCategory,
  GeographicDataset,
  LayerCategory,
  LayerKey,
  OsmTags,
  RenderLayer,
  TaggedFeature,
} from "./types.js";
import { FEATURE_CATEGORIES } from "./types.js";

export interface LayerDefinition {
  category: LayerCategory;
  subtype: string;
  key: LayerKey;
  widthScale: number;
}

/**
 * Every canonical (category, subtype) pair in global draw order. The order is
 * fixed and does not depend on the theme.
 */
export const LAYER_CATALOG: readonly LayerDefinition[] = [
  { category: "water", subtype: "water", key: "water", widthScale: 1 },
  { category: "water", subtype: "waterway", key: "water", widthScale: 1 },
  { category: "water", subtype: "coastline", key: "water", widthScale: 1 },
  { category: "parks", subtype: "park", key: "parks", widthScale: 1 },
  { category: "parks", subtype: "grass", key: "parks", widthScale: 1 },
  { category: "parks", subtype: "forest", key: "parks", widthScale: 1 },
  { category: "land", subtype: "landuse", key: "land", widthScale: 1 },
  { category: "land", subtype: "sand", key: "land", widthScale: 1 },
  { category: "land", subtype: "rock", key: "land", widthScale: 1 },
  { category: "land", subtype: "other", key: "land", widthScale: 1 },
  { category: "land", subtype: "building", key: "buildings", widthScale: 1 },
  { category: "roads", subtype: "motorway", key: "road_motorway", widthScale: 1 },
  { category: "roads", subtype: "primary", key: "road_primary", widthScale: 1 },
  { category: "roads", subtype: "secondary", key: "road_secondary", widthScale: 1 },
  { category: "roads", subtype: "tertiary", key: "road_tertiary", widthScale: 1 },
  { category: "roads", subtype: "residential", key: "road_residential", widthScale: 1 },
  { category: "roads", subtype: "default", key: "road_default", widthScale: 1 },
  { category: "rail", subtype: "rail", key: "rail", widthScale: 1 },
  { category: "rail", subtype: "subway", key: "rail", widthScale: 0.8 },
  { category: "rail", subtype: "tram", key: "rail", widthScale: 0.65 },
  { category: "rail", subtype: "light_rail", key: "rail", widthScale: 0.65 },
  { category: "rail", subtype: "other", key: "rail", widthScale: 0.5 },
  { category: "rail", subtype: "station", key: "rail", widthScale: 2 },
  { category: "labels", subtype: "labels", key: "labels", widthScale: 1 },
];

export interface Classification {
  category: LayerCategory;
  subtype: string;
}

interface ClassificationRule {
  id: string;
  match: (tags: OsmTags) => boolean;
  category: LayerCategory;
  subtype: string;
}

const tagIn = (key: string, values: readonly string[]) => (tags: OsmTags) => {
  const value = tags[key];
  return value !== undefined && values.includes(value);
};
const hasTag = (key: string) => (tags: OsmTags) => tags[key] !== undefined && tags[key] !== "no";

/** Priority-ordered: the first matching rule wins. */
export const CLASSIFICATION_RULES: readonly ClassificationRule[] = [
  { id: "motorway", match: tagIn("highway", ["motorway", "motorway_link"]), category: "roads", subtype: "motorway" },
  {
    id: "primary",
    match: tagIn("highway", ["trunk", "trunk_link", "primary", "primary_link"]),
    category: "roads",
    subtype: "primary",
  },
  { id: "secondary", match: tagIn("highway", ["secondary", "secondary_link"]), category: "roads", subtype: "secondary" },
  { id: "tertiary", match: tagIn("highway", ["tertiary", "tertiary_link"]), category: "roads", subtype: "tertiary" },
  {
    id: "residential",
    match: tagIn("highway", ["residential", "living_street", "unclassified"]),
    category: "roads",
    subtype: "residential",
  },
  { id: "other-highway", match: hasTag("highway"), category: "roads", subtype: "default" },
  { id: "station", match: tagIn("railway", ["station", "halt", "tram_stop"]), category: "rail", subtype: "station" },
  { id: "subway", match: tagIn("railway", ["subway"]), category: "rail", subtype: "subway" },
  { id: "tram", match: tagIn("railway", ["tram"]), category: "rail", subtype: "tram" },
  { id: "light-rail", match: tagIn("railway", ["light_rail"]), category: "rail", subtype: "light_rail" },
  { id: "rail", match: tagIn("railway", ["rail"]), category: "rail", subtype: "rail" },
  {
    id: "other-railway",
    match: tagIn("railway", ["monorail", "funicular", "narrow_gauge", "preserved"]),
    category: "rail",
    subtype: "other",
  },
  { id: "coastline", match: tagIn("natural", ["coastline"]), category: "water", subtype: "coastline" },
  {
    id: "waterway",
    match: tagIn("waterway", ["river", "canal", "stream", "drain", "ditch"]),
    category: "water",
    subtype: "waterway",
  },
  {
    id: "water-body",
    match: (tags) =>
      tagIn("natural", ["water", "bay", "wetland"])(tags) ||
      tagIn("waterway", ["riverbank", "dock"])(tags) ||
      tagIn("landuse", ["reservoir", "basin"])(tags),
    category: "water",
    subtype: "water",
  },
  {
    id: "park",
    match: (tags) =>
      tagIn("leisure", ["park", "garden", "nature_reserve", "playground"])(tags) ||
      tagIn("landuse", ["recreation_ground", "cemetery"])(tags),
    category: "parks",
    subtype: "park",
  },
  {
    id: "grass",
    match: (tags) => tagIn("landuse", ["grass", "meadow", "village_green"])(tags) || tagIn("natural", ["grassland"])(tags),
    category: "parks",
    subtype: "grass",
  },
  {
    id: "forest",
    match: (tags) => tagIn("landuse", ["forest"])(tags) || tagIn("natural", ["wood"])(tags),
    category: "parks",
    subtype: "forest",
  },
  { id: "building", match: hasTag("building"), category: "land", subtype: "building" },
  { id: "sand", match: tagIn("natural", ["sand", "beach", "dune", "desert"]), category: "land", subtype: "sand" },
  {
    id: "rock",
    match: tagIn("natural", ["bare_rock", "rock", "scree", "cliff", "peak", "glacier", "ridge"]),
    category: "land",
    subtype: "rock",
  },
  { id: "landuse", match: hasTag("landuse"), category: "land", subtype: "landuse" },
];

/** Where a feature lands when no tag rule matches, by the category it was fetched under. */
const ORIGIN_FALLBACK: Partial<Record<FeatureCategory, Classification>> = {
  roads: { category: "roads", subtype: "default" },
  rail: { category: "rail", subtype: "other" },
  water: { category: "water", subtype: "water" },
  parks: { category: "parks", subtype: "park" },
};

export const GENERIC_BUCKET: Classification = { category: "land", subtype: "other" };

export function classifyFeature(tags: OsmTags, origin?: FeatureCategory): Classification {
  for (const rule of CLASSIFICATION_RULES) {
    if (rule.match(tags)) return { category: rule.category, subtype: rule.subtype };
  }
  const fallback = origin ? ORIGIN_FALLBACK[origin] : undefined;
  return fallback ?? GENERIC_BUCKET;
}

function layerId(category: LayerCategory, subtype: string): string {
  return `${category}/${subtype}`;
}

/**
 * Sort a dataset's features into the canonical render layers. Every catalog
 * layer is returned, empty ones included, in draw order. Features keep their
 * dataset order within a layer.
 */
export function classify(dataset: GeographicDataset): RenderLayer[] {
  const buckets = new Map<string, TaggedFeature[]>();
  for (const def of LAYER_CATALOG) buckets.set(layerId(def.category, def.subtype), []);

  for (const origin of FEATURE_CATEGORIES) {
    for (const feature of dataset.collections[origin].features) {
      const { category, subtype } = classifyFeature(feature.properties ?? {}, origin);
      const bucket = buckets.get(layerId(category, subtype));
      if (!bucket) throw new Error(`Classification produced unknown layer ${layerId(category, subtype)}`);
      bucket.push(feature);
    }
  }

  return LAYER_CATALOG.map((def, zIndex) => ({
    category: def.category,
    subtype: def.subtype,
    key: def.key,
    zIndex,
    widthScale: def.widthScale,
    features: buckets.get(layerId(def.category, def.subtype)) ?? [],
  }));
}
