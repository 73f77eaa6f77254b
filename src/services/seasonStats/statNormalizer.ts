/**
 * Stat Normalizer
 *
 * Pure conversions from ESPN stat tokens to the integers and composite
 * fractions stored in the season aggregates.
 */

import { MalformedStatError } from '../../errors';

/** A plain non-negative decimal, optionally with an exponent. Signs are handled by the separator rule. */
const NUMERIC_TOKEN = /^\+?(\d+\.?\d*|\.\d+)(e\+?\d+)?$/i;

/** Separators ESPN uses inside composite tokens such as "22/31" or "3-18". */
const SEPARATORS = ['-', '/'];

export type FractionPair = [left: number | null, right: number | null];

/**
 * Strict token parser. Accepts numbers and numeric strings (thousands
 * separators allowed) and truncates toward zero.
 *
 * @throws MalformedStatError for composite, empty or non-numeric tokens
 */
export function parseStatToken(token: unknown): number {
  if (typeof token === 'number') {
    if (!Number.isFinite(token)) {
      throw new MalformedStatError(token);
    }
    return truncate(token);
  }

  if (typeof token === 'string') {
    const trimmed = token.trim();
    if (SEPARATORS.some((sep) => trimmed.includes(sep))) {
      throw new MalformedStatError(token);
    }
    const cleaned = trimmed.replace(/,/g, '');
    if (!NUMERIC_TOKEN.test(cleaned)) {
      throw new MalformedStatError(token);
    }
    const parsed = Number(cleaned);
    if (!Number.isFinite(parsed)) {
      throw new MalformedStatError(token);
    }
    return truncate(parsed);
  }

  throw new MalformedStatError(token);
}

/**
 * Lenient integer conversion: `null` for absent or malformed tokens.
 *
 * @example
 * toInt('1,234')  // 1234
 * toInt('12.9')   // 12
 * toInt('22/31')  // null
 */
export function toInt(token: unknown): number | null {
  if (token === null || token === undefined) return null;
  try {
    return parseStatToken(token);
  } catch (err) {
    if (err instanceof MalformedStatError) return null;
    throw err;
  }
}

/**
 * Split a composite token into its two halves. A bare number is `(n, null)`.
 * A dash only separates when it follows a digit, so it is never read as a sign.
 */
export function toFraction(value: string | number | null | undefined): FractionPair {
  if (value === null || value === undefined) return [null, null];

  const text = String(value).trim();
  const slash = text.indexOf('/');
  const dash = text.indexOf('-');
  const sepIndex = slash >= 0 ? slash : dash > 0 ? dash : -1;

  if (sepIndex < 0) {
    return [toInt(text), null];
  }
  return [toInt(text.slice(0, sepIndex)), toInt(text.slice(sepIndex + 1))];
}

/**
 * Merge two completions/attempts values by summing each side.
 *
 * The right side is kept whenever either input has one; otherwise the
 * result is the plain left sum.
 *
 * @example
 * mergeFraction('10/15', '5/8') // '15/23'
 * mergeFraction('10/15', '7')   // '17/15'
 * mergeFraction(null, '7/9')    // '7/9'
 * mergeFraction('7', '3')       // '10'
 */
export function mergeFraction(
  existing: string | number | null | undefined,
  incoming: string | number | null | undefined,
): string | null {
  const [existingLeft, existingRight] = toFraction(existing);
  const [incomingLeft, incomingRight] = toFraction(incoming);

  if (existingLeft === null && existingRight === null && incomingLeft === null && incomingRight === null) {
    return null;
  }

  const leftSum = (existingLeft ?? 0) + (incomingLeft ?? 0);

  if (existingRight !== null || incomingRight !== null) {
    const rightSum = (existingRight ?? 0) + (incomingRight ?? 0);
    return `${leftSum}/${rightSum}`;
  }
  return String(leftSum);
}

function truncate(value: number): number {
  const truncated = Math.trunc(value);
  // Math.trunc(-0.4) is -0
  return truncated === 0 ? 0 : truncated;
}
