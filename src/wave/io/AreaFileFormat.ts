/**
 * Area file format: GeoJSON in, polygon rings out.
 *
 * Accepts a Polygon, MultiPolygon, Feature or FeatureCollection. Only outer
 * rings are kept; holes are ignored. GeoJSON positions are [lng, lat] with a
 * closing vertex, our rings are {lat, lng} and open.
 */

import { readFile } from "fs/promises";
import type {
  Feature,
  FeatureCollection,
  Polygon as GeoJsonPolygon,
  Position as GeoJsonPosition,
} from "geojson";
import { removeConsecutiveDuplicates } from "../../core/util/Geometry";
import { isValidPosition, position, type Polygon, type Position } from "../Position";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function invalid(message: string): Error {
  return new Error(`Invalid area file: ${message}`);
}

function readPosition(value: unknown, where: string): Position {
  if (!Array.isArray(value) || value.length < 2) {
    throw invalid(`${where} must be [lng, lat]`);
  }
  const [lng, lat]: unknown[] = value;
  if (typeof lng !== "number" || typeof lat !== "number") {
    throw invalid(`${where} coordinates must be numbers`);
  }
  const p = position(lat, lng);
  if (!isValidPosition(p)) {
    throw invalid(`${where} is out of range (${lng}, ${lat})`);
  }
  return p;
}

function readRing(value: unknown, where: string): Polygon {
  if (!Array.isArray(value)) {
    throw invalid(`${where} must be an array of positions`);
  }
  const points: unknown[] = value;
  const ring = removeConsecutiveDuplicates(
    points.map((pt, i) => readPosition(pt, `${where} point ${i}`)),
  );
  if (ring.length < 3) {
    throw invalid(`${where} needs at least 3 distinct points`);
  }
  return ring;
}

function readPolygonCoordinates(value: unknown, where: string): Polygon {
  if (!Array.isArray(value) || value.length === 0) {
    throw invalid(`${where} must have at least one ring`);
  }
  const rings: unknown[] = value;
  return readRing(rings[0], `${where} ring 0`);
}

function readGeometry(value: unknown, where: string): Polygon[] {
  if (!isRecord(value)) {
    throw invalid(`${where} is not an object`);
  }

  switch (value.type) {
    case "Polygon":
      return [readPolygonCoordinates(value.coordinates, where)];
    case "MultiPolygon": {
      if (!Array.isArray(value.coordinates)) {
        throw invalid(`${where} coordinates must be an array`);
      }
      const polygons: unknown[] = value.coordinates;
      return polygons.map((p, i) => readPolygonCoordinates(p, `${where} polygon ${i}`));
    }
    default:
      throw invalid(`${where} has unsupported type ${String(value.type)}`);
  }
}

function readFeature(value: unknown, where: string): Polygon[] {
  if (!isRecord(value) || value.type !== "Feature") {
    throw invalid(`${where} is not a Feature`);
  }
  // Features without geometry are allowed and contribute nothing
  if (value.geometry === null) return [];
  return readGeometry(value.geometry, `${where} geometry`);
}

/**
 * Extract the area polygons from parsed GeoJSON.
 * Throws if the structure is invalid or holds no polygon.
 */
export function parseAreaFile(data: unknown): Polygon[] {
  if (!isRecord(data)) {
    throw invalid("expected object");
  }

  let polygons: Polygon[];
  if (data.type === "FeatureCollection") {
    if (!Array.isArray(data.features)) {
      throw invalid("features must be an array");
    }
    const features: unknown[] = data.features;
    polygons = features.flatMap((f, i) => readFeature(f, `feature ${i}`));
  } else if (data.type === "Feature") {
    polygons = readFeature(data, "feature");
  } else {
    polygons = readGeometry(data, "geometry");
  }

  if (polygons.length === 0) {
    throw invalid("no polygons");
  }
  return polygons;
}

export async function loadAreaFile(path: string): Promise<Polygon[]> {
  const text = await readFile(path, "utf8");
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    throw invalid(`${path} is not valid JSON (${error instanceof Error ? error.message : String(error)})`);
  }
  return parseAreaFile(data);
}

function toGeoJsonRing(polygon: Polygon): GeoJsonPosition[] {
  const ring: GeoJsonPosition[] = polygon.map((p) => [p.lng, p.lat]);
  if (polygon.length > 0) ring.push([polygon[0].lng, polygon[0].lat]);
  return ring;
}

/**
 * Write polygons back out as a FeatureCollection with one Polygon feature
 * per ring.
 */
export function areaToGeoJson(
  polygons: readonly Polygon[],
  properties: Record<string, unknown> = {},
): FeatureCollection<GeoJsonPolygon> {
  const features: Feature<GeoJsonPolygon>[] = polygons.map((polygon) => ({
    type: "Feature",
    properties,
    geometry: { type: "Polygon", coordinates: [toGeoJsonRing(polygon)] },
  }));
  return { type: "FeatureCollection", features };
}
