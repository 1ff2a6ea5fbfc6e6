const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;

// True if the pair falls within WGS84 bounds (inclusive).
export const isValidLatLon = (lat: number, lon: number): boolean =>
  lat >= -90 && lat <= 90 && lon >= -180 && lon <= 180;

/**
 * Strict decimal parse for a single coordinate field. Unlike `Number()`,
 * blank text and hex literals are not numbers here.
 */
export const parseCoordinate = (token: string | undefined): number | null => {
  if (token === undefined) return null;
  const trimmed = token.trim();
  if (!DECIMAL_PATTERN.test(trimmed)) return null;
  const value = Number(trimmed);
  return Number.isFinite(value) ? value : null;
};
