import { MAX_NUMERIC_TOKEN_LENGTH } from '../constants';

/**
 * How a token should travel across the bridge.
 */
export type TokenKind = 'number' | 'quoted' | 'already-quoted';

/**
 * `input` is host-to-engine, `output` is engine-to-host.
 */
export type Direction = 'input' | 'output';

const INPUT_NUMBER = /^-?(\d+(\.\d+)?|\.\d+)$/;
const CANONIC_INTEGER = /^-?[1-9]\d*$/;
const CANONIC_DECIMAL = /^-?([1-9]\d*)?\.\d*[1-9]$/;

/**
 * True when `token` is the engine's canonical form of a number: the text a
 * forced numeric coercion would produce (no leading or trailing zeros, no
 * zero before the decimal point, no exponent, no negative zero).
 */
export function isCanonicNumber(token: string): boolean {
  return token === '0' || CANONIC_INTEGER.test(token) || CANONIC_DECIMAL.test(token);
}

/**
 * True when `token` starts and ends with a double quote.
 */
export function isQuoted(token: string): boolean {
  return token.length >= 2 && token.startsWith('"') && token.endsWith('"');
}

/**
 * Classifies a token as a number or a string.
 *
 * The rules apply in order: already quoted, longer than 15 characters,
 * host exponent notation (input only), numeric grammar for the direction.
 * Tokens longer than 15 characters are never numbers, whichever direction,
 * so values beyond the host's precision survive the round trip as text.
 *
 * @example
 * ```typescript
 * classify('123456789012345', 'input'); // 'number'
 * classify('1234567890123456', 'input'); // 'quoted'
 * classify('1e+21', 'input'); // 'quoted'
 * ```
 */
export function classify(token: string, direction: Direction): TokenKind {
  if (isQuoted(token)) {
    return 'already-quoted';
  }
  if (token.length > MAX_NUMERIC_TOKEN_LENGTH) {
    return 'quoted';
  }
  if (direction === 'input') {
    if (token.includes('e+')) {
      return 'quoted';
    }
    return INPUT_NUMBER.test(token) ? 'number' : 'quoted';
  }
  if (/[eE]/.test(token)) {
    return 'quoted';
  }
  return isCanonicNumber(token) ? 'number' : 'quoted';
}
