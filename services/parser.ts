import { DOMParser } from '@xmldom/xmldom';
import Papa from 'papaparse';
import { config, KML_NAMESPACE } from '../config';
import { CoordinateFormat, GeoPoint } from '../types';
import { parsePointLines } from './lineParser';
import { isValidLatLon, parseCoordinate } from './validation';

const LAT_HEADERS = ['lat', 'latitude', 'y'];
const LON_HEADERS = ['lon', 'lng', 'longitude', 'x'];

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

// Reads a GeoJSON position ([lon, lat, ...]) as a point, if it looks like one.
const readPosition = (value: unknown): GeoPoint | null => {
  if (!Array.isArray(value) || value.length < 2) return null;
  const lon: unknown = value[0];
  const lat: unknown = value[1];
  if (typeof lon !== 'number' || typeof lat !== 'number') return null;
  if (!Number.isFinite(lon) || !Number.isFinite(lat)) return null;
  return { lat, lon };
};

const pushValid = (points: GeoPoint[], point: GeoPoint | null) => {
  if (point && isValidLatLon(point.lat, point.lon)) points.push(point);
};

/**
 * Collects every point in a GeoJSON document, in document order.
 *
 * Points, Features and FeatureCollections are followed by type. Any other
 * object is searched through all of its values, and bare `[lon, lat]`
 * arrays count as points, so nested or foreign wrappers still yield their
 * coordinates. Nodes deeper than `maxDepth` are ignored.
 */
export const extractGeoJsonPoints = (
  content: string,
  maxDepth: number = config.maxGeoJsonDepth
): GeoPoint[] => {
  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch {
    return [];
  }

  const points: GeoPoint[] = [];

  const visit = (node: unknown, depth: number): void => {
    if (depth > maxDepth) return;

    if (Array.isArray(node)) {
      const position = readPosition(node);
      if (position) {
        pushValid(points, position);
        return;
      }
      node.forEach((child: unknown) => visit(child, depth + 1));
      return;
    }

    if (!isRecord(node)) return;

    switch (node.type) {
      case 'Point':
        pushValid(points, readPosition(node.coordinates));
        break;
      case 'Feature':
        visit(node.geometry, depth + 1);
        break;
      case 'FeatureCollection':
        if (Array.isArray(node.features)) {
          node.features.forEach((feature: unknown) => visit(feature, depth + 1));
        }
        break;
      default:
        Object.values(node).forEach(child => visit(child, depth + 1));
    }
  };

  visit(data, 0);
  return points;
};

// Throws on any XML error so callers can treat the document as unreadable.
export const parseXml = (content: string): Document => {
  const parser = new DOMParser({
    errorHandler: {
      warning: () => undefined,
      error: (msg: string) => {
        throw new Error(msg);
      },
      fatalError: (msg: string) => {
        throw new Error(msg);
      },
    },
  });
  return parser.parseFromString(content, 'text/xml');
};

/**
 * Collects the `lon,lat[,alt]` tuples of every KML 2.2 `<coordinates>`
 * element. Unreadable tuples are skipped one by one.
 */
export const extractKmlPoints = (content: string): GeoPoint[] => {
  let xmlDoc: Document;
  try {
    xmlDoc = parseXml(content);
  } catch {
    return [];
  }

  const points: GeoPoint[] = [];
  const nodes = xmlDoc.getElementsByTagNameNS(KML_NAMESPACE, 'coordinates');

  for (let i = 0; i < nodes.length; i++) {
    const text = nodes.item(i)?.textContent?.trim();
    if (!text) continue;

    text.split(/\s+/).forEach(tuple => {
      const parts = tuple.split(',');
      if (parts.length < 2) return;
      const lon = parseCoordinate(parts[0]);
      const lat = parseCoordinate(parts[1]);
      if (lon === null || lat === null) return;
      pushValid(points, { lat, lon });
    });
  }

  return points;
};

export interface CoordinateColumns {
  lat: number;
  lon: number;
}

// First latitude-like and first longitude-like header, compared case-insensitively.
export const findCoordinateColumns = (header: string[]): CoordinateColumns | null => {
  const names = header.map(name => name.trim().toLowerCase());
  const lat = names.findIndex(name => LAT_HEADERS.includes(name));
  const lon = names.findIndex(name => LON_HEADERS.includes(name));
  if (lat === -1 || lon === -1) return null;
  return { lat, lon };
};

export const readCsvRows = (content: string): string[][] =>
  Papa.parse<string[]>(content, { skipEmptyLines: true }).data;

/**
 * Best-effort CSV extraction: rows with a missing or non-numeric
 * coordinate cell are dropped without notice.
 */
export const extractCsvPoints = (content: string): GeoPoint[] => {
  const [header, ...rows] = readCsvRows(content);
  if (!header) return [];

  const columns = findCoordinateColumns(header);
  if (!columns) return [];

  const points: GeoPoint[] = [];
  rows.forEach(row => {
    const lat = parseCoordinate(row[columns.lat]);
    const lon = parseCoordinate(row[columns.lon]);
    if (lat === null || lon === null) return;
    pushValid(points, { lat, lon });
  });
  return points;
};

export const detectFormat = (content: string): CoordinateFormat => {
  const trimmed = content.trim();

  if (trimmed.startsWith('<')) return 'kml';
  if (trimmed.startsWith('{') || trimmed.startsWith('[')) return 'geojson';

  const firstLine = trimmed.split('\n')[0];
  const [header] = readCsvRows(firstLine);
  if (header && findCoordinateColumns(header)) return 'csv';

  return 'pairs';
};

// Sniffs the format and extracts whatever valid points it holds.
export const extractPoints = (content: string): GeoPoint[] => {
  switch (detectFormat(content)) {
    case 'kml':
      return extractKmlPoints(content);
    case 'geojson':
      return extractGeoJsonPoints(content);
    case 'csv':
      return extractCsvPoints(content);
    case 'pairs':
      return parsePointLines(content).valid;
  }
};
