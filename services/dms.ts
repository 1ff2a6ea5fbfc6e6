import { SECONDS_ROLLOVER } from '../config';
import { Axis, DmsValue } from '../types';
import { toFixedHalfEven } from './number';

/**
 * Decomposes a decimal-degree value into degrees, minutes and seconds.
 *
 * Seconds that would print as `60.00` carry into the minute, and a
 * minute count of 60 then carries into the degree, so the printed value
 * never shows `60'` or `60.00"`.
 */
export const ddToDms = (dd: number): DmsValue => {
  const sign = dd < 0 ? -1 : 1;
  const totalSeconds = Math.abs(dd) * 3600;

  let degrees = Math.floor(totalSeconds / 3600);
  const remainder = totalSeconds - degrees * 3600;
  let minutes = Math.floor(remainder / 60);
  let seconds = remainder - minutes * 60;

  if (seconds >= SECONDS_ROLLOVER) {
    seconds = 0;
    minutes += 1;
  }
  if (minutes === 60) {
    minutes = 0;
    degrees += 1;
  }

  return { degrees: degrees * sign, minutes, seconds, sign };
};

// Inverse of ddToDms, up to the rounding it applies.
export const dmsToDd = ({ degrees, minutes, seconds, sign }: DmsValue): number =>
  sign * (Math.abs(degrees) + minutes / 60 + seconds / 3600);

const direction = (axis: Axis, sign: 1 | -1): string => {
  if (axis === 'lat') return sign < 0 ? 'S' : 'N';
  return sign < 0 ? 'W' : 'E';
};

export const formatDms = (value: DmsValue, axis: Axis): string => {
  const minutes = String(value.minutes).padStart(2, '0');
  const seconds = toFixedHalfEven(value.seconds, 2).padStart(5, '0');
  return `${Math.abs(value.degrees)}°${minutes}'${seconds}" ${direction(axis, value.sign)}`;
};
