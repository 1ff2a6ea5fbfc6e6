import { z } from 'zod';
import { config } from '../config';
import { ToolDefinition, ToolResult } from '../types';
import { computeDistances, convertPointsToDms, parseCsv, parseGeoJson, parseKml } from './pipeline';

export interface GeoTool {
  name: string;
  description: string;
  parameter: { name: string; description: string };
  run: (input: string) => string;
}

const PAIRS_HINT = 'Newline- or semicolon-delimited';

export const tools: GeoTool[] = [
  {
    name: 'convert_dd_to_dms',
    description: 'Convert decimal-degree coordinates to DMS table',
    parameter: { name: 'coordinates', description: `${PAIRS_HINT} DD lat,lon pairs` },
    run: convertPointsToDms,
  },
  {
    name: 'calculate_distance',
    description: 'Calculate great-circle distances between coordinate pairs',
    parameter: { name: 'coordinates', description: `${PAIRS_HINT} lat1,lon1,lat2,lon2 values` },
    run: computeDistances,
  },
  {
    name: 'load_geojson',
    description: 'Load GeoJSON text and return a coordinate table',
    parameter: { name: 'geojson', description: 'Contents of a GeoJSON file' },
    run: parseGeoJson,
  },
  {
    name: 'load_kml',
    description: 'Load KML text and return a coordinate table',
    parameter: { name: 'kml', description: 'Contents of a KML file' },
    run: parseKml,
  },
  {
    name: 'load_csv',
    description: 'Load CSV text with latitude/longitude columns',
    parameter: { name: 'csv', description: 'Contents of a CSV file' },
    run: parseCsv,
  },
];

export const findTool = (name: string): GeoTool | undefined => tools.find(tool => tool.name === name);

// Function definitions in the shape chat-completion APIs accept.
export const toolDefinitions = (): ToolDefinition[] =>
  tools.map(({ name, description, parameter }): ToolDefinition => ({
    name,
    description,
    parameters: {
      type: 'object',
      properties: { [parameter.name]: { type: 'string', description: parameter.description } },
      required: [parameter.name],
    },
  }));

const decodeArguments = (argumentsJson: string): unknown => {
  try {
    return JSON.parse(argumentsJson);
  } catch {
    return undefined;
  }
};

/**
 * Runs a tool from a function call as a model emits it: a tool name and a
 * JSON object of arguments. Problems come back as `{ ok: false }`.
 */
export const runTool = (
  name: string,
  argumentsJson: string,
  logErrors: boolean = config.logToolErrors
): ToolResult => {
  const fail = (error: string): ToolResult => {
    if (logErrors) console.error(`Tool call rejected (${name}):`, error);
    return { ok: false, error };
  };

  const tool = findTool(name);
  if (!tool) return fail(`Unknown tool: ${name}`);

  const schema = z.object({ [tool.parameter.name]: z.string() });
  const parsed = schema.safeParse(decodeArguments(argumentsJson));
  if (!parsed.success) {
    return fail(`Expected a string argument "${tool.parameter.name}"`);
  }

  return { ok: true, output: tool.run(parsed.data[tool.parameter.name]) };
};
