/**
 * Geographic bounds and discovery of the bounds a source file declares.
 */

import fs from "fs-extra";
import type { GeoBounds, SourceFormat } from "../types.js";
import { BOUNDS_SNIFF_BYTES } from "../constants.js";

export function makeBounds(minLon: number, minLat: number, maxLon: number, maxLat: number): GeoBounds | null {
  const values = [minLon, minLat, maxLon, maxLat];
  if (!values.every(Number.isFinite)) return null;
  if (minLon > maxLon || minLat > maxLat) return null;
  if (minLat < -90 || maxLat > 90 || minLon < -180 || maxLon > 180) return null;
  return { minLon, minLat, maxLon, maxLat };
}

export function sourceFormat(filePath: string): SourceFormat {
  const lower = filePath.toLowerCase();
  if (lower.endsWith(".osm") || lower.endsWith(".osm.gz") || lower.endsWith(".osm.bz2")) return "osm";
  if (lower.endsWith(".pbf")) return "pbf";
  if (lower.endsWith(".geojson") || lower.endsWith(".json")) return "geojson";
  if (lower.endsWith(".ibf")) return "ibf";
  return "unknown";
}

function attr(tag: string, name: string): number {
  const match = new RegExp(`\\b${name}\\s*=\\s*["']([^"']*)["']`).exec(tag);
  return match ? Number(match[1]) : Number.NaN;
}

/**
 * Read the <bounds> element of an OSM XML document.
 */
export function boundsFromOsmXml(head: string): GeoBounds | null {
  const tag = /<bounds\b[^>]*>/.exec(head);
  if (!tag) return null;
  return makeBounds(attr(tag[0], "minlon"), attr(tag[0], "minlat"), attr(tag[0], "maxlon"), attr(tag[0], "maxlat"));
}

/**
 * Read the top-level bbox member of a GeoJSON document.
 * Only the 2D form [west, south, east, north] is accepted.
 */
export function boundsFromGeoJson(text: string): GeoBounds | null {
  let doc: unknown;
  try {
    doc = JSON.parse(text);
  } catch {
    return null;
  }
  if (typeof doc !== "object" || doc === null || !("bbox" in doc) || !Array.isArray(doc.bbox)) {
    return null;
  }
  const bbox: unknown[] = doc.bbox;
  if (bbox.length !== 4 || !bbox.every((v): v is number => typeof v === "number")) {
    return null;
  }
  const [west, south, east, north] = bbox;
  return makeBounds(west, south, east, north);
}

async function readHead(filePath: string, bytes: number): Promise<string> {
  const handle = await fs.open(filePath, "r");
  try {
    const buffer = Buffer.alloc(bytes);
    const { bytesRead } = await fs.read(handle, buffer, 0, bytes, 0);
    return buffer.subarray(0, bytesRead).toString("utf8");
  } finally {
    await fs.close(handle);
  }
}

/**
 * Bounds declared inside a source file, or null when the format carries none
 * that can be read without decoding the data.
 */
export async function readDeclaredBounds(filePath: string, format: SourceFormat): Promise<GeoBounds | null> {
  if (format === "osm" && filePath.toLowerCase().endsWith(".osm")) {
    return boundsFromOsmXml(await readHead(filePath, BOUNDS_SNIFF_BYTES));
  }
  if (format === "geojson") {
    return boundsFromGeoJson(await fs.readFile(filePath, "utf8"));
  }
  return null;
}
