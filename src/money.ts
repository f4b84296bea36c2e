/**
 * Minor-unit money helpers.
 *
 * Amounts are integers in the smallest unit of their currency. Decimal input
 * is parsed digit by digit so that provider strings never pass through a
 * binary float before rounding.
 */

/** ISO 4217 exponents that differ from the usual two decimal places. */
const CURRENCY_EXPONENTS: Record<string, number> = {
  BHD: 3,
  CLP: 0,
  IDR: 2,
  ISK: 0,
  JOD: 3,
  JPY: 0,
  KRW: 0,
  KWD: 3,
  OMR: 3,
  TND: 3,
  UGX: 0,
  VND: 0,
};

export function currencyExponent(currency: string): number {
  const code = currency.toUpperCase();
  return Object.hasOwn(CURRENCY_EXPONENTS, code) ? CURRENCY_EXPONENTS[code] : 2;
}

export function isCurrencyCode(value: string): boolean {
  return /^[A-Z]{3}$/.test(value);
}

/** Round to the nearest integer, ties away from zero. */
export function roundHalfAwayFromZero(value: number): number {
  const rounded = Math.round(Math.abs(value));
  return value < 0 ? -rounded : rounded;
}

const DECIMAL_PATTERN = /^([+-])?(\d*)(?:\.(\d*))?$/;

/**
 * Parse a major-unit decimal ("12.345", "-0.5", 7) into minor units,
 * rounding half away from zero. Returns null for anything unparseable.
 */
export function parseMajorToMinor(value: unknown, currency: string): number | null {
  const exponent = currencyExponent(currency);
  let text: string;

  if (typeof value === "number") {
    if (!Number.isFinite(value)) return null;
    text = value.toFixed(Math.min(20, exponent + 6));
  } else if (typeof value === "string") {
    text = value.trim();
    if (/e/i.test(text)) {
      const n = Number(text);
      if (!Number.isFinite(n)) return null;
      text = n.toFixed(Math.min(20, exponent + 6));
    }
  } else {
    return null;
  }

  const match = DECIMAL_PATTERN.exec(text);
  if (!match) return null;
  const [, sign, intDigits = "", fracDigits = ""] = match;
  if (intDigits === "" && fracDigits === "") return null;

  const padded = fracDigits.padEnd(exponent + 1, "0");
  const kept = padded.slice(0, exponent);
  const roundDigit = padded.charCodeAt(exponent) - 48;

  let magnitude = Number(`${intDigits || "0"}${kept}`);
  if (roundDigit >= 5) magnitude += 1;
  if (magnitude === 0) return 0;
  return sign === "-" ? -magnitude : magnitude;
}

/** Format minor units as a plain major-unit decimal string ("120.00", "-0.05"). */
export function formatMinorUnits(amountMinorUnits: number, currency: string): string {
  const exponent = currencyExponent(currency);
  const negative = amountMinorUnits < 0;
  const digits = String(Math.abs(amountMinorUnits)).padStart(exponent + 1, "0");
  const whole = digits.slice(0, digits.length - exponent);
  const frac = digits.slice(digits.length - exponent);
  const body = exponent > 0 ? `${whole}.${frac}` : whole;
  return negative ? `-${body}` : body;
}

/** Human display form, e.g. "USD 1,234.50". */
export function formatMoney(amountMinorUnits: number, currency: string): string {
  const plain = formatMinorUnits(amountMinorUnits, currency);
  const negative = plain.startsWith("-");
  const [whole = "0", frac] = (negative ? plain.slice(1) : plain).split(".");
  const grouped = whole.replace(/\B(?=(\d{3})+(?!\d))/g, ",");
  const body = frac !== undefined ? `${grouped}.${frac}` : grouped;
  return `${currency} ${negative ? "-" : ""}${body}`;
}

/**
 * Convert minor units between currencies.
 * `rate` is the amount of `to` currency bought by one major unit of `from`.
 */
export function convertMinorUnits(
  amountMinorUnits: number,
  from: string,
  to: string,
  rate: number,
): number {
  const shift = currencyExponent(to) - currencyExponent(from);
  const raw = amountMinorUnits * rate * 10 ** shift;
  // Trim binary noise (13579.500000000002) before rounding the tie.
  return roundHalfAwayFromZero(Number(raw.toFixed(6)));
}
