import { z } from 'zod';

export const EARTH_RADIUS_KM = 6371.0088;
export const MILES_PER_KM = 0.621371;
export const KML_NAMESPACE = 'http://www.opengis.net/kml/2.2';

// Seconds at or above this display as 60.00 and carry into the minute.
export const SECONDS_ROLLOVER = 59.9995;

const DEFAULT_MAX_GEOJSON_DEPTH = 64;

const envSchema = z.object({
  GEOTABLE_MAX_GEOJSON_DEPTH: z.coerce.number().int().positive().catch(DEFAULT_MAX_GEOJSON_DEPTH),
  GEOTABLE_LOG_TOOL_ERRORS: z
    .enum(['true', 'false'])
    .catch('true')
    .transform(value => value === 'true'),
});

export interface GeoTableConfig {
  maxGeoJsonDepth: number;
  logToolErrors: boolean;
}

export const loadConfig = (env: Record<string, string | undefined>): GeoTableConfig => {
  const parsed = envSchema.parse({
    GEOTABLE_MAX_GEOJSON_DEPTH: env.GEOTABLE_MAX_GEOJSON_DEPTH ?? DEFAULT_MAX_GEOJSON_DEPTH,
    GEOTABLE_LOG_TOOL_ERRORS: env.GEOTABLE_LOG_TOOL_ERRORS ?? 'true',
  });
  return {
    maxGeoJsonDepth: parsed.GEOTABLE_MAX_GEOJSON_DEPTH,
    logToolErrors: parsed.GEOTABLE_LOG_TOOL_ERRORS,
  };
};

export const config: GeoTableConfig = loadConfig(process.env);
