export * from './types';
export { config, loadConfig, EARTH_RADIUS_KM, MILES_PER_KM, KML_NAMESPACE } from './config';
export type { GeoTableConfig } from './config';
export { isValidLatLon, parseCoordinate } from './services/validation';
export { parsePointLines, parseDistanceLines } from './services/lineParser';
export {
  extractGeoJsonPoints,
  extractKmlPoints,
  extractCsvPoints,
  extractPoints,
  detectFormat,
} from './services/parser';
export { ddToDms, dmsToDd, formatDms } from './services/dms';
export { toFixedHalfEven, formatFloat } from './services/number';
export { haversineKm, kmToMiles, measurePair } from './services/distance';
export { renderPointTable, renderDmsTable, renderDistanceTable, formatInvalidNotes } from './services/table';
export {
  convertPointsToDms,
  computeDistances,
  parseGeoJson,
  parseKml,
  parseCsv,
  parseAny,
} from './services/pipeline';
export { kmlToFeatureCollection, csvToFeatureCollection } from './services/loaders';
export { tools, toolDefinitions, runTool, findTool } from './services/tools';
export type { GeoTool } from './services/tools';
