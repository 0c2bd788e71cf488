export { classify, isCanonicNumber, isQuoted } from './classifier';
export type { Direction, TokenKind } from './classifier';
export { escapeForTransport, unescapeTransport, escapeInput, unescapeInput, toStringLiteral, fromStringLiteral } from './escape';
export { encodeInput, decodeOutput, decodeValue, isNameToken } from './value';
export type { Mode } from './value';
export { toHostToken, isHostValue } from './host';
export type { HostValue, Scalar, ReferenceArgument, VariableArgument } from './host';
export { pack, unpack, byteLength } from './packer';
export type { Charset, UnpackOptions } from './packer';
export { buildReference } from './reference';
export type { Reference } from './reference';
