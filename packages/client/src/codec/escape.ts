/**
 * Quoting and escaping for tokens crossing the bridge.
 *
 * Output tokens are escaped into JSON string-literal bodies; input tokens
 * bound for the engine have their internal quotes doubled.
 */

const NEEDS_TRANSPORT_ESCAPE = /["\\\u0000-\u001f\u007f]/;
const TRANSPORT_ESCAPES = /["\\\u0000-\u001f\u007f]/g;
const TRANSPORT_UNESCAPES = /\\(?:(["\\])|u([0-9a-fA-F]{4}))/g;

/**
 * Escapes an engine value so it can be embedded in a JSON string literal.
 *
 * Quotes and backslashes gain a preceding backslash and single-byte control
 * characters become `\u00hh`. Everything else, multi-byte characters
 * included, is left as is. Tokens without any of these characters are
 * returned unchanged.
 *
 * @example
 * ```typescript
 * escapeForTransport('say "hi"\n'); // 'say \\"hi\\"\\u000a'
 * ```
 */
export function escapeForTransport(token: string): string {
  if (!NEEDS_TRANSPORT_ESCAPE.test(token)) {
    return token;
  }
  return token.replace(TRANSPORT_ESCAPES, (char) => {
    if (char === '"' || char === '\\') {
      return `\\${char}`;
    }
    return `\\u${char.charCodeAt(0).toString(16).padStart(4, '0')}`;
  });
}

/**
 * Inverse of {@link escapeForTransport}.
 */
export function unescapeTransport(token: string): string {
  return token.replace(TRANSPORT_UNESCAPES, (_match, escaped: string | undefined, hex: string | undefined) =>
    escaped ?? String.fromCharCode(parseInt(hex ?? '0', 16))
  );
}

/**
 * Doubles every quote between the first and last character of a quoted
 * token, producing a string literal the engine reads back unchanged.
 *
 * @example
 * ```typescript
 * escapeInput('"a"b"'); // '"a""b"'
 * ```
 */
export function escapeInput(token: string): string {
  if (token.length < 2) {
    return token;
  }
  const body = token.slice(1, -1).replace(/"/g, '""');
  return `${token[0]}${body}${token[token.length - 1]}`;
}

/**
 * Inverse of {@link escapeInput}.
 */
export function unescapeInput(token: string): string {
  if (token.length < 2) {
    return token;
  }
  const body = token.slice(1, -1).replace(/""/g, '"');
  return `${token[0]}${body}${token[token.length - 1]}`;
}

/**
 * Wraps a raw string as an engine string literal.
 */
export function toStringLiteral(value: string): string {
  return escapeInput(`"${value}"`);
}

/**
 * Value of an engine string literal (`"a""b"` is `a"b`).
 */
export function fromStringLiteral(literal: string): string {
  return unescapeInput(literal).slice(1, -1);
}
