/**
 * Numeric interpretation and formatting the way the engine performs it.
 */

import { isCanonicNumber } from '../../codec/classifier';

const NUMERIC_PREFIX = /^[+-]*(\d+\.?\d*|\.\d+)(E[+-]?\d+)?/;

/**
 * Numeric value of an arbitrary string: the longest leading numeric
 * prefix, or 0 when there is none (`"12abc"` is 12, `"abc"` is 0).
 */
export function toNumber(value: string): number {
  const match = NUMERIC_PREFIX.exec(value);
  if (!match) {
    return 0;
  }
  const signs = /^[+-]*/.exec(match[0])?.[0] ?? '';
  const negative = (signs.match(/-/g)?.length ?? 0) % 2 === 1;
  const magnitude = Number(match[0].slice(signs.length));
  return negative ? -magnitude : magnitude;
}

/**
 * Canonical text of a number: no leading zero before the decimal point,
 * no exponent, no negative zero.
 *
 * @example
 * ```typescript
 * formatNumber(0.5); // '.5'
 * formatNumber(-0.25); // '-.25'
 * formatNumber(1e21); // '1000000000000000000000'
 * ```
 */
export function formatNumber(value: number): string {
  if (value === 0 || !Number.isFinite(value)) {
    return '0';
  }
  let text = String(value);
  if (/e/i.test(text)) {
    text = Number.isInteger(value)
      ? BigInt(value).toString()
      : value.toFixed(20).replace(/0+$/, '').replace(/\.$/, '');
  }
  return text.replace(/^(-?)0\./, '$1.');
}

/**
 * Canonical form of a value used as a subscript: numeric strings in
 * canonical form are numbers, anything else stays a string.
 */
export function isNumericSubscript(value: string): boolean {
  return isCanonicNumber(value);
}
