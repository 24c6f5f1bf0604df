import { geoAzimuthalEquidistant, geoPath } from "d3-geo";
import type { Geometry, Position } from "geojson";
import type { Coordinate } from "./types.js";

/** Mean earth radius in meters, matching d3-geo's unit sphere scaling. */
export const EARTH_RADIUS_M = 6371008.8;

export type ProjectionFn = (coords: [number, number]) => [number, number] | null;

export interface PosterViewport {
  width: number;
  height: number;
  /** Ground distance from the centre to the left/right edge, in meters. */
  halfWidthMeters: number;
  halfHeightMeters: number;
  pixelsPerMeter: number;
}

/**
 * Crop a square of side 2 × radius inward so it matches the poster aspect.
 * The radius always covers the longer side.
 */
export function computeViewport(width: number, height: number, radius: number): PosterViewport {
  const aspect = width / height;
  let halfWidthMeters = radius;
  let halfHeightMeters = radius;
  if (aspect > 1) halfHeightMeters = halfWidthMeters / aspect;
  else halfWidthMeters = halfHeightMeters * aspect;
  return {
    width,
    height,
    halfWidthMeters,
    halfHeightMeters,
    pixelsPerMeter: width / (2 * halfWidthMeters),
  };
}

/** Azimuthal equidistant projection centred on the poster location, in poster pixels. */
export function createPosterProjection(center: Coordinate, viewport: PosterViewport): ProjectionFn {
  const projection = geoAzimuthalEquidistant()
    .rotate([-center.longitude, -center.latitude])
    .scale(viewport.pixelsPerMeter * EARTH_RADIUS_M)
    .translate([viewport.width / 2, viewport.height / 2])
    .precision(0);
  return (coords) => projection(coords);
}

const round2 = (value: number) => Math.round(value * 100) / 100;

function projectPosition(position: Position, projection: ProjectionFn): Position | null {
  const projected = projection([position[0], position[1]]);
  if (!projected) return null;
  return [round2(projected[0]), round2(projected[1])];
}

function projectPositions(positions: Position[], projection: ProjectionFn): Position[] | null {
  const out: Position[] = [];
  for (const position of positions) {
    const projected = projectPosition(position, projection);
    if (!projected) return null;
    out.push(projected);
  }
  return out;
}

function projectNested(rings: Position[][], projection: ProjectionFn): Position[][] | null {
  const out: Position[][] = [];
  for (const ring of rings) {
    const projected = projectPositions(ring, projection);
    if (!projected) return null;
    out.push(projected);
  }
  return out;
}

/**
 * Project every coordinate of a geometry into planar poster space. Returns
 * null when any vertex has no projection.
 */
export function projectGeometry(geometry: Geometry, projection: ProjectionFn): Geometry | null {
  switch (geometry.type) {
    case "Point": {
      const coordinates = projectPosition(geometry.coordinates, projection);
      return coordinates ? { type: "Point", coordinates } : null;
    }
    case "MultiPoint": {
      const coordinates = projectPositions(geometry.coordinates, projection);
      return coordinates ? { type: "MultiPoint", coordinates } : null;
    }
    case "LineString": {
      const coordinates = projectPositions(geometry.coordinates, projection);
      return coordinates ? { type: "LineString", coordinates } : null;
    }
    case "MultiLineString": {
      const coordinates = projectNested(geometry.coordinates, projection);
      return coordinates ? { type: "MultiLineString", coordinates } : null;
    }
    case "Polygon": {
      const coordinates = projectNested(geometry.coordinates, projection);
      return coordinates ? { type: "Polygon", coordinates } : null;
    }
    case "MultiPolygon": {
      const coordinates: Position[][][] = [];
      for (const polygon of geometry.coordinates) {
        const projected = projectNested(polygon, projection);
        if (!projected) return null;
        coordinates.push(projected);
      }
      return { type: "MultiPolygon", coordinates };
    }
    case "GeometryCollection": {
      const geometries: Geometry[] = [];
      for (const child of geometry.geometries) {
        const projected = projectGeometry(child, projection);
        if (projected) geometries.push(projected);
      }
      return { type: "GeometryCollection", geometries };
    }
  }
}

export function isAreal(geometry: Geometry): boolean {
  return geometry.type === "Polygon" || geometry.type === "MultiPolygon";
}

export function isLinear(geometry: Geometry): boolean {
  return geometry.type === "LineString" || geometry.type === "MultiLineString";
}

const planarPath = geoPath();

/** SVG path data for an already projected geometry. */
export function toSvgPath(projected: Geometry): string | null {
  const d = planarPath(projected);
  return d && d.length > 0 ? d : null;
}
