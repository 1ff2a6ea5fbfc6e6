export interface GeoPoint {
  lat: number;
  lon: number;
}

export type Axis = 'lat' | 'lon';

export interface DmsValue {
  degrees: number; // signed; -0 for values in (-1, 0)
  minutes: number;
  seconds: number;
  sign: 1 | -1;
}

export interface InvalidEntry {
  raw: string;
  reason: string;
}

export interface CoordinatePair {
  a: GeoPoint;
  b: GeoPoint;
}

export interface DistanceRow {
  pair: CoordinatePair;
  km: number;
  miles: number;
}

export interface LineParseResult<T> {
  valid: T[];
  invalid: InvalidEntry[];
}

export type CoordinateFormat = 'geojson' | 'kml' | 'csv' | 'pairs';

export type ToolResult =
  | { ok: true; output: string }
  | { ok: false; error: string };

export interface ToolDefinition {
  name: string;
  description: string;
  parameters: {
    type: 'object';
    properties: Record<string, { type: 'string'; description: string }>;
    required: string[];
  };
}
