/**
 * printf-compatible number formatting
 *
 * `Number.prototype.toFixed` and `toExponential` round exact decimal ties
 * away from zero, while C's `printf("%.4f")` rounds them to even (0.03125
 * prints as 0.0312). Reports must match the printf output byte for byte,
 * so ties are detected on the exact decimal expansion and resolved here.
 */

// Enough extra digits to expose any non-zero remainder of a double
const EXACT_DIGITS = 40;
const MAX_DIGITS = 100;

function formatNonFinite(value: number): string {
  if (Number.isNaN(value)) return "nan";
  return value > 0 ? "inf" : "-inf";
}

/**
 * Truncate `exact` (a decimal mantissa, possibly signed) to `digits`
 * fraction digits when the dropped part is exactly one half and the kept
 * last digit is even; otherwise return undefined
 */
function truncateEvenTie(exact: string, digits: number): string | undefined {
  const dot = exact.indexOf(".");
  if (dot === -1) return undefined;

  const fraction = exact.slice(dot + 1);
  const dropped = fraction.slice(digits);
  if (!/^50*$/.test(dropped)) return undefined;

  const kept = digits === 0 ? exact.slice(0, dot) : exact.slice(0, dot + 1 + digits);
  const lastDigit = Number(kept.charAt(kept.length - 1));
  return lastDigit % 2 === 0 ? kept : undefined;
}

function withNegativeZero(value: number, text: string): string {
  return Object.is(value, -0) ? `-${text}` : text;
}

/**
 * Equivalent of `printf("%.<digits>f", value)`
 *
 * @example
 * ```typescript
 * formatFixed(0.03125, 4); // "0.0312"
 * formatFixed(42.125, 2);  // "42.12"
 * ```
 */
export function formatFixed(value: number, digits: number): string {
  if (!Number.isFinite(value)) return formatNonFinite(value);
  // toFixed switches to exponent notation here; such doubles are whole numbers
  if (Math.abs(value) >= 1e21) {
    const whole = BigInt(value).toString();
    return digits > 0 ? `${whole}.${"0".repeat(digits)}` : whole;
  }

  const exact = value.toFixed(Math.min(MAX_DIGITS, digits + EXACT_DIGITS));
  const text = truncateEvenTie(exact, digits) ?? value.toFixed(digits);
  return withNegativeZero(value, text);
}

/**
 * Equivalent of `printf("%.<digits>e", value)`: the exponent always has a
 * sign and at least two digits
 *
 * @example
 * ```typescript
 * formatExponential(1.2e-5, 2); // "1.20e-05"
 * formatExponential(0, 2);      // "0.00e+00"
 * ```
 */
export function formatExponential(value: number, digits: number): string {
  if (!Number.isFinite(value)) return formatNonFinite(value);

  const exact = value.toExponential(Math.min(MAX_DIGITS, digits + EXACT_DIGITS));
  const [exactMantissa = "", exponent = "+0"] = exact.split("e");
  const tie = truncateEvenTie(exactMantissa, digits);
  const text = tie !== undefined ? `${tie}e${exponent}` : value.toExponential(digits);

  const padded = text.replace(
    /e([+-])(\d+)$/,
    (_match, sign: string, magnitude: string) => `e${sign}${magnitude.padStart(2, "0")}`
  );
  return withNegativeZero(value, padded);
}

/**
 * Quote a CSV field when it contains a delimiter, quote or line break
 * (RFC 4180); other fields pass through unchanged
 */
export function escapeCsvField(field: string, delimiter = ","): string {
  const needsQuoting =
    field.includes(delimiter) || field.includes('"') || field.includes("\n") || field.includes("\r");

  if (!needsQuoting) return field;
  return `"${field.replace(/"/g, '""')}"`;
}
