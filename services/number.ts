// toFixed() digits are exact up to 100 places, enough to expose any double below 1e21.
const EXACT_DIGITS = 100;

/**
 * `toFixed` with exact ties rounded half to even. Plain `toFixed` rounds a
 * value lying exactly halfway (such as 0.0078125 at six places) away from
 * zero.
 */
export const toFixedHalfEven = (value: number, digits: number): string => {
  const rounded = value.toFixed(digits);
  if (!Number.isFinite(value) || Math.abs(value) >= 1e21) return rounded;

  const exact = Math.abs(value).toFixed(EXACT_DIGITS);
  const cut = exact.indexOf('.') + (digits === 0 ? 0 : digits + 1);
  if (!/^50*$/.test(exact.slice(cut + (digits === 0 ? 1 : 0)))) return rounded;

  const truncated = exact.slice(0, cut);
  const lastDigit = Number(truncated[truncated.length - 1]);
  if (lastDigit % 2 === 1) return rounded;
  return (value < 0 ? '-' : '') + truncated;
};

// Python-style float text: integral values keep a trailing `.0`.
export const formatFloat = (value: number): string => {
  if (Object.is(value, -0)) return '-0.0';
  return Number.isInteger(value) ? `${value}.0` : String(value);
};
