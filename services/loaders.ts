import { kml } from '@tmcw/togeojson';
import type { Feature, FeatureCollection, Geometry, Point } from 'geojson';
import { findCoordinateColumns, parseXml, readCsvRows } from './parser';
import { isValidLatLon, parseCoordinate } from './validation';

const emptyCollection = <G extends Geometry>(): FeatureCollection<G> => ({
  type: 'FeatureCollection',
  features: [],
});

/**
 * Converts KML placemarks to GeoJSON features, keeping their names and
 * other extended data as properties. Placemarks without geometry are dropped.
 */
export const kmlToFeatureCollection = (content: string): FeatureCollection<Geometry> => {
  let xmlDoc: Document;
  try {
    xmlDoc = parseXml(content);
  } catch {
    return emptyCollection();
  }

  const features: Feature<Geometry>[] = [];
  kml(xmlDoc).features.forEach(feature => {
    if (feature.geometry) features.push({ ...feature, geometry: feature.geometry });
  });
  return { type: 'FeatureCollection', features };
};

// One Point feature per usable CSV row; every cell is kept as a string property.
export const csvToFeatureCollection = (content: string): FeatureCollection<Point> => {
  const [header, ...rows] = readCsvRows(content);
  if (!header) return emptyCollection();

  const columns = findCoordinateColumns(header);
  if (!columns) return emptyCollection();

  const features: Feature<Point>[] = [];
  rows.forEach(row => {
    const lat = parseCoordinate(row[columns.lat]);
    const lon = parseCoordinate(row[columns.lon]);
    if (lat === null || lon === null || !isValidLatLon(lat, lon)) return;

    const properties: Record<string, string> = {};
    header.forEach((name, i) => {
      properties[name] = row[i] ?? '';
    });

    features.push({
      type: 'Feature',
      properties,
      geometry: { type: 'Point', coordinates: [lon, lat] },
    });
  });

  return { type: 'FeatureCollection', features };
};
