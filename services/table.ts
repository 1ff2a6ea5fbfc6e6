import { DistanceRow, GeoPoint, InvalidEntry } from '../types';
import { ddToDms, formatDms } from './dms';
import { formatFloat, toFixedHalfEven } from './number';

export const NO_DISTANCE_PAIRS = 'No valid coordinate pairs provided.';

export const formatInvalidNotes = (invalid: InvalidEntry[]): string => {
  if (invalid.length === 0) return '';
  const lines = ['', '', '_Skipped invalid inputs:_'];
  invalid.forEach(entry => lines.push(`- \`${entry.raw}\` (${entry.reason})`));
  return lines.join('\n');
};

export const renderPointTable = (points: GeoPoint[]): string => {
  const lines = ['| Latitude | Longitude |', '|---------:|----------:|'];
  points.forEach(p => lines.push(`| ${formatFloat(p.lat)} | ${formatFloat(p.lon)} |`));
  return lines.join('\n');
};

export const renderDmsTable = (points: GeoPoint[], invalid: InvalidEntry[] = []): string => {
  const lines = [
    '| Latitude (DD) | Longitude (DD) | Latitude (DMS) | Longitude (DMS) |',
    '|--------------:|---------------:|---------------|---------------|',
  ];
  points.forEach(p => {
    const latDms = formatDms(ddToDms(p.lat), 'lat');
    const lonDms = formatDms(ddToDms(p.lon), 'lon');
    lines.push(
      `| ${toFixedHalfEven(p.lat, 6).padStart(14)} | ${toFixedHalfEven(p.lon, 6).padStart(15)} | ${latDms.padEnd(13)} | ${lonDms.padEnd(13)} |`
    );
  });
  return lines.join('\n') + formatInvalidNotes(invalid);
};

export const renderDistanceTable = (rows: DistanceRow[], invalid: InvalidEntry[] = []): string => {
  if (rows.length === 0) return NO_DISTANCE_PAIRS + formatInvalidNotes(invalid);

  const lines = [
    '| Point A Lat | Point A Lon | Point B Lat | Point B Lon | Distance (km) | Distance (mi) |',
    '| --- | --- | --- | --- | --- | --- |',
  ];
  rows.forEach(({ pair: { a, b }, km, miles }) => {
    const cells = [a.lat, a.lon, b.lat, b.lon].map(v => toFixedHalfEven(v, 6));
    cells.push(toFixedHalfEven(km, 2), toFixedHalfEven(miles, 2));
    lines.push(`| ${cells.join(' | ')} |`);
  });
  return lines.join('\n') + formatInvalidNotes(invalid);
};
