/**
 * Reference construction with the slot fallback for the indirection limit.
 */

import { INDIRECTION_LIMIT, TEMP_ARGS_NAME } from '../constants';
import { EncodingError } from '../errors';
import { isQuoted } from './classifier';
import { fromStringLiteral } from './escape';
import { isNameToken } from './value';

/**
 * A reference ready for the engine's indirection mechanism.
 */
export interface Reference {
  /**
   * Literal reference text, `name(tok1,tok2)` or `name`.
   */
  text: string;

  /**
   * Values of the temporary slots `%mbrArgs(1..n)` the text refers to.
   * Empty unless the literal form exceeded the indirection limit.
   */
  slots: string[];
}

/**
 * Renders `name(tok1,tok2,...)`, or bare `name` when there are no tokens.
 *
 * When the literal would be longer than `limit`, every literal token is
 * moved into a numbered slot of the temporary array and referenced as
 * `%mbrArgs(i)` instead, so the text no longer grows with the token sizes.
 * By-reference and variable tokens stay in place.
 *
 * @throws EncodingError when even the slotted form exceeds `limit`
 *
 * @example
 * ```typescript
 * buildReference('^orders', ['"east"', '12']).text; // '^orders("east",12)'
 * ```
 */
export function buildReference(name: string, tokens: readonly string[], limit: number = INDIRECTION_LIMIT): Reference {
  const literal = tokens.length === 0 ? name : `${name}(${tokens.join(',')})`;
  if (literal.length <= limit) {
    return { text: literal, slots: [] };
  }

  const slots: string[] = [];
  const placeholders = tokens.map((token) => {
    if (isNameToken(token)) {
      return token;
    }
    slots.push(isQuoted(token) ? fromStringLiteral(token) : token);
    return `${TEMP_ARGS_NAME}(${slots.length})`;
  });

  const text = `${name}(${placeholders.join(',')})`;
  if (text.length > limit) {
    throw EncodingError.referenceTooLong(name, text.length, limit);
  }
  return { text, slots };
}
