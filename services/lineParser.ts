import { CoordinatePair, GeoPoint, InvalidEntry, LineParseResult } from '../types';
import { isValidLatLon, parseCoordinate } from './validation';

const RANGE_HINT = '(-90 <= lat <= 90, -180 <= lon <= 180)';

const splitRecords = (text: string): string[] =>
  text
    .split(/\n|;/)
    .map(segment => segment.trim())
    .filter(segment => segment.length > 0);

const splitFields = (record: string): string[] => record.split(/[,\s]+/);

// Parses the first `count` fields, or returns null if any of them is not a number.
const parseFields = (fields: string[], count: number): number[] | null => {
  const values: number[] = [];
  for (let i = 0; i < count; i++) {
    const value = parseCoordinate(fields[i]);
    if (value === null) return null;
    values.push(value);
  }
  return values;
};

/**
 * Parses newline- or semicolon-delimited `lat, lon` records.
 * Every non-empty record ends up either in `valid` or as one `InvalidEntry`.
 */
export const parsePointLines = (text: string): LineParseResult<GeoPoint> => {
  const valid: GeoPoint[] = [];
  const invalid: InvalidEntry[] = [];

  for (const raw of splitRecords(text)) {
    const fields = splitFields(raw);
    if (fields.length < 2) {
      invalid.push({ raw, reason: 'Missing latitude/longitude pair' });
      continue;
    }
    const values = parseFields(fields, 2);
    if (!values) {
      invalid.push({ raw, reason: 'Not a number' });
      continue;
    }
    const [lat, lon] = values;
    if (!isValidLatLon(lat, lon)) {
      invalid.push({ raw, reason: `Out of range ${RANGE_HINT}` });
      continue;
    }
    valid.push({ lat, lon });
  }

  return { valid, invalid };
};

/**
 * Parses `lat1, lon1, lat2, lon2` records for pairwise distances.
 */
export const parseDistanceLines = (text: string): LineParseResult<CoordinatePair> => {
  const valid: CoordinatePair[] = [];
  const invalid: InvalidEntry[] = [];

  for (const raw of splitRecords(text)) {
    const fields = splitFields(raw);
    if (fields.length < 4) {
      invalid.push({ raw, reason: 'Expected lat1, lon1, lat2, lon2' });
      continue;
    }
    const values = parseFields(fields, 4);
    if (!values) {
      invalid.push({ raw, reason: 'Not a number' });
      continue;
    }
    const [lat1, lon1, lat2, lon2] = values;
    if (!isValidLatLon(lat1, lon1)) {
      invalid.push({ raw, reason: `Point A out of range ${RANGE_HINT}` });
      continue;
    }
    if (!isValidLatLon(lat2, lon2)) {
      invalid.push({ raw, reason: `Point B out of range ${RANGE_HINT}` });
      continue;
    }
    valid.push({ a: { lat: lat1, lon: lon1 }, b: { lat: lat2, lon: lon2 } });
  }

  return { valid, invalid };
};
