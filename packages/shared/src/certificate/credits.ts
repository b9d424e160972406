/**
 * Credit Hours
 */

export type CreditParse =
  | { ok: true; value: number }
  | { ok: false; reason: string };

const NUMBER_TOKEN = /-?(?:\d+(?:[.,]\d+)?|[.,]\d+)/g;

/**
 * Parse printed credit hours ("2.0", "$2.0 CPE", "1,5 hrs").
 *
 * The text must hold exactly one number; currency symbols and words around it
 * are ignored. A comma counts as a decimal separator only between digits of
 * that one number, and never before exactly three digits ("1,000"). At most
 * one significant fractional digit is accepted. The sign is kept so that a
 * negative value is rejected by range validation rather than silently flipped.
 */
export function parseCredits(text: string): CreditParse {
  const shown = text.trim();
  const tokens: string[] = shown.match(NUMBER_TOKEN) ?? [];

  if (tokens.length === 0) {
    return { ok: false, reason: `"${shown}" contains no digits` };
  }
  if (tokens.length > 1) {
    return { ok: false, reason: `"${shown}" is not a single number` };
  }

  const [token] = tokens;
  const [whole, fraction = ''] = token.split(/[.,]/);
  if (token.includes(',') && fraction.length === 3) {
    return { ok: false, reason: `"${shown}" uses a thousands separator` };
  }

  const significant = fraction.replace(/0+$/, '');
  if (significant.length > 1) {
    return {
      ok: false,
      reason: `"${shown}" has more than one fractional digit`,
    };
  }

  const sign = whole.startsWith('-') ? '-' : '';
  const digits = whole.replace('-', '') || '0';
  const value = Number(`${sign}${digits}.${significant || '0'}`);
  return { ok: true, value: Object.is(value, -0) ? 0 : value };
}

/**
 * Round half away from zero at `digits` fraction digits (half-up for credits).
 */
export function roundHalfUp(value: number, digits: number): number {
  const factor = 10 ** digits;
  const magnitude = Math.round((Math.abs(value) + Number.EPSILON) * factor) / factor;
  return value < 0 ? -magnitude : magnitude;
}

export function formatCredits(value: number, digits: number): string {
  return roundHalfUp(value, digits).toFixed(digits);
}
