/**
 * Packed-string wire format: `<byteLength>:<token>` repeated with nothing
 * in between. The length prefix is decimal ASCII and counts bytes in the
 * connection's charset.
 */

import { PACK_DELIMITER } from '../constants';
import { EncodingError } from '../errors';

/**
 * Character set of the engine connection. `m` is one byte per character.
 */
export type Charset = 'utf-8' | 'm';

function bufferEncoding(charset: Charset): BufferEncoding {
  return charset === 'm' ? 'latin1' : 'utf8';
}

const MAX_M_CODE = 0xff;

/**
 * @throws EncodingError when a character has no single-byte form
 */
function assertSingleByte(value: string): void {
  for (let index = 0; index < value.length; index += 1) {
    const code = value.charCodeAt(index);
    if (code > MAX_M_CODE) {
      const hex = code.toString(16).toUpperCase().padStart(4, '0');
      throw EncodingError.invalidToken(value, `U+${hex} at index ${index} is outside the m charset`);
    }
  }
}

/**
 * Number of bytes a string occupies in the given charset.
 *
 * @throws EncodingError under `m` for a character above U+00FF
 */
export function byteLength(value: string, charset: Charset = 'utf-8'): number {
  if (charset === 'm') {
    assertSingleByte(value);
  }
  return Buffer.byteLength(value, bufferEncoding(charset));
}

/**
 * Serializes a token list into one packed string. The empty list packs to
 * the empty string, a single empty token to `0:`.
 *
 * @example
 * ```typescript
 * pack(['"a"', '12']); // '3:"a"2:12'
 * ```
 */
export function pack(tokens: readonly string[], charset: Charset = 'utf-8'): string {
  let out = '';
  for (const token of tokens) {
    out += `${byteLength(token, charset)}${PACK_DELIMITER}${token}`;
  }
  return out;
}

export interface UnpackOptions {
  /**
   * Drop the final element, for callers that replace or strip the last
   * subscript before building a reference.
   */
  dropLast?: boolean;
  charset?: Charset;
}

const DIGIT_0 = 0x30;
const DIGIT_9 = 0x39;
const DELIMITER = PACK_DELIMITER.charCodeAt(0);

/**
 * Parses a packed string back into its token list.
 *
 * @throws EncodingError when a length prefix is missing or not terminated by
 * the delimiter, or a token is shorter than its prefix
 */
export function unpack(packed: string, options: UnpackOptions = {}): string[] {
  const charset = options.charset ?? 'utf-8';
  if (charset === 'm') {
    assertSingleByte(packed);
  }
  const encoding = bufferEncoding(charset);
  const bytes = Buffer.from(packed, encoding);
  const tokens: string[] = [];
  let offset = 0;

  while (offset < bytes.length) {
    let length = 0;
    let cursor = offset;
    while (cursor < bytes.length && bytes[cursor] >= DIGIT_0 && bytes[cursor] <= DIGIT_9) {
      length = length * 10 + (bytes[cursor] - DIGIT_0);
      cursor += 1;
    }
    if (cursor === offset) {
      throw EncodingError.malformedPacked(packed, offset, 'expected a decimal length prefix');
    }
    if (bytes[cursor] !== DELIMITER) {
      throw EncodingError.malformedPacked(packed, cursor, `expected '${PACK_DELIMITER}' after the length prefix`);
    }
    const start = cursor + 1;
    const end = start + length;
    if (end > bytes.length) {
      throw EncodingError.malformedPacked(
        packed,
        start,
        `token declares ${length} bytes but only ${bytes.length - start} remain`
      );
    }
    tokens.push(bytes.toString(encoding, start, end));
    offset = end;
  }

  if (options.dropLast) {
    tokens.pop();
  }
  return tokens;
}
