/**
 * Tests for the packed-string format and reference construction
 */

import { byteLength, pack, unpack } from '../codec/packer';
import { buildReference } from '../codec/reference';
import { EncodingError, ErrorCode } from '../errors';
import { thrown } from './helpers';

describe('pack', () => {
  it('should prefix every token with its byte length', () => {
    expect(pack(['"a"', '12'])).toBe('3:"a"2:12');
    expect(pack(['1:2', ''])).toBe('3:1:20:');
  });

  it('should distinguish the empty list from a list holding one empty token', () => {
    expect(pack([])).toBe('');
    expect(pack([''])).toBe('0:');
    expect(unpack('')).toEqual([]);
    expect(unpack('0:')).toEqual(['']);
  });

  it('should count bytes in the connection charset', () => {
    expect(byteLength('é')).toBe(2);
    expect(byteLength('é', 'm')).toBe(1);
    expect(pack(['é'])).toBe('2:é');
    expect(pack(['é'], 'm')).toBe('1:é');
  });

  it('should refuse characters above U+00FF under the m charset', () => {
    const error = thrown(() => pack(['ok', 'a€b'], 'm'));

    expect(error).toBeInstanceOf(EncodingError);
    expect(error).toMatchObject({
      code: ErrorCode.ENCODING_INVALID_TOKEN,
      message: "Invalid token 'a€b': U+20AC at index 1 is outside the m charset",
    });
    expect(pack(['a€b'])).toBe('5:a€b');
  });
});

describe('unpack', () => {
  it('should split tokens that contain digits and delimiters', () => {
    expect(unpack('3:1:20:')).toEqual(['1:2', '']);
    expect(unpack('2:é1:x')).toEqual(['é', 'x']);
    expect(unpack('1:é', { charset: 'm' })).toEqual(['é']);
  });

  it('should refuse packed text the m charset cannot hold', () => {
    expect(() => unpack('1:€', { charset: 'm' })).toThrow(
      "Invalid token '1:€': U+20AC at index 2 is outside the m charset"
    );
  });

  it('should drop the final element on request', () => {
    expect(unpack('1:a1:b', { dropLast: true })).toEqual(['a']);
    expect(unpack('', { dropLast: true })).toEqual([]);
  });

  it('should reject a missing length prefix', () => {
    const error = thrown(() => unpack('a'));
    expect(error).toBeInstanceOf(EncodingError);
    expect(error).toMatchObject({
      code: ErrorCode.ENCODING_MALFORMED_PACKED,
      message: 'Malformed packed string at offset 0: expected a decimal length prefix',
    });
  });

  it('should reject a missing delimiter', () => {
    expect(() => unpack('3')).toThrow("Malformed packed string at offset 1: expected ':' after the length prefix");
    expect(() => unpack('1:a2x')).toThrow("Malformed packed string at offset 4: expected ':' after the length prefix");
  });

  it('should reject a token shorter than its prefix', () => {
    expect(() => unpack('5:abc')).toThrow(
      'Malformed packed string at offset 2: token declares 5 bytes but only 3 remain'
    );
  });
});

describe('buildReference', () => {
  it('should render literal references', () => {
    expect(buildReference('^orders', [])).toEqual({ text: '^orders', slots: [] });
    expect(buildReference('^orders', ['"east"', '12'])).toEqual({ text: '^orders("east",12)', slots: [] });
  });

  it('should move tokens into slots past the indirection limit', () => {
    const long = 'x'.repeat(9000);
    expect(buildReference('^big', [`"${long}"`])).toEqual({ text: '^big(%mbrArgs(1))', slots: [long] });
  });

  it('should keep reference tokens in place and unquote slotted literals', () => {
    const long = 'y'.repeat(9000);
    const reference = buildReference('add^math', ['.total', `"${long}"`, '"a""b"', '5'], 8180);
    expect(reference.text).toBe('add^math(.total,%mbrArgs(1),%mbrArgs(2),%mbrArgs(3))');
    expect(reference.slots).toEqual([long, 'a"b', '5']);
  });

  it('should stay literal at exactly the limit', () => {
    const reference = buildReference('^x', ['1', '2'], 7);
    expect(reference).toEqual({ text: '^x(1,2)', slots: [] });
  });

  it('should fail when the slotted form is still too long', () => {
    const error = thrown(() => buildReference('^x', ['1', '2'], 5));
    expect(error).toBeInstanceOf(EncodingError);
    expect(error).toMatchObject({
      code: ErrorCode.ENCODING_REFERENCE_TOO_LONG,
      context: { name: '^x', length: 27, limit: 5 },
    });
  });
});
