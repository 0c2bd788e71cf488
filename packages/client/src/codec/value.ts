/**
 * Value codec: reshapes single tokens between the host's JSON-literal form
 * and the engine's canonical form.
 */

import { classify } from './classifier';
import { escapeForTransport, escapeInput } from './escape';

/**
 * `canonical` infers number-versus-string from the token text; `strict`
 * trusts the caller's explicit typing and performs no numeric inference.
 */
export type Mode = 'strict' | 'canonical';

/**
 * Matches by-reference (`.name`) and variable (`name`) argument tokens, which
 * travel to the engine unquoted.
 */
const NAME_TOKEN = /^\.?%?[A-Za-z][A-Za-z0-9]*$/;

/**
 * True for by-reference and variable argument tokens.
 */
export function isNameToken(token: string): boolean {
  return NAME_TOKEN.test(token);
}

/**
 * Encodes a host token for the engine.
 *
 * Data values come out raw (the value to store); subscripts and arguments
 * come out as engine literals ready for a reference.
 *
 * @example
 * ```typescript
 * encodeInput('0.5', 'canonical', true); // '.5'
 * encodeInput('"abc"', 'canonical', true); // 'abc'
 * encodeInput('"a"b"', 'canonical', false); // '"a""b"'
 * encodeInput('42', 'strict', false); // '"42"'
 * ```
 */
export function encodeInput(token: string, mode: Mode, isDataValue: boolean): string {
  const kind = classify(token, 'input');

  if (kind === 'already-quoted') {
    return isDataValue ? token.slice(1, -1) : escapeInput(token);
  }

  if (kind === 'number' && mode === 'canonical') {
    return token.replace(/^(-?)0\./, '$1.');
  }

  if (isDataValue) {
    return token;
  }

  if (isNameToken(token)) {
    return token;
  }

  return escapeInput(`"${token}"`);
}

/**
 * Decodes an engine value into a JSON literal the host can parse.
 *
 * In canonical mode numbers regain the leading zero the engine omits and
 * everything else becomes a string literal; in strict mode every value is a
 * string literal.
 *
 * @example
 * ```typescript
 * decodeOutput('.5', 'canonical'); // '0.5'
 * decodeOutput('-.5', 'canonical'); // '-0.5'
 * decodeOutput('42', 'strict'); // '"42"'
 * ```
 */
export function decodeOutput(token: string, mode: Mode): string {
  const escaped = escapeForTransport(token);

  if (mode === 'canonical' && classify(escaped, 'output') === 'number') {
    if (escaped.startsWith('.')) {
      return `0${escaped}`;
    }
    if (escaped.startsWith('-.')) {
      return `-0${escaped.slice(1)}`;
    }
    return escaped;
  }

  return `"${escaped}"`;
}

/**
 * Decodes an engine value straight into a host scalar.
 */
export function decodeValue(token: string, mode: Mode): number | string {
  const parsed: unknown = JSON.parse(decodeOutput(token, mode));
  return typeof parsed === 'number' ? parsed : String(parsed);
}
