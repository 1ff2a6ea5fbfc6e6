import { measurePair } from './distance';
import { parseDistanceLines, parsePointLines } from './lineParser';
import { extractCsvPoints, extractGeoJsonPoints, extractKmlPoints, extractPoints } from './parser';
import { renderDistanceTable, renderDmsTable, renderPointTable } from './table';

// Decimal-degree `lat, lon` lines to a DD/DMS table.
export const convertPointsToDms = (text: string): string => {
  const { valid, invalid } = parsePointLines(text);
  return renderDmsTable(valid, invalid);
};

// `lat1, lon1, lat2, lon2` lines to a km/mi distance table.
export const computeDistances = (text: string): string => {
  const { valid, invalid } = parseDistanceLines(text);
  return renderDistanceTable(valid.map(measurePair), invalid);
};

export const parseGeoJson = (text: string): string => renderPointTable(extractGeoJsonPoints(text));

export const parseKml = (text: string): string => renderPointTable(extractKmlPoints(text));

export const parseCsv = (text: string): string => renderPointTable(extractCsvPoints(text));

export const parseAny = (text: string): string => renderPointTable(extractPoints(text));
