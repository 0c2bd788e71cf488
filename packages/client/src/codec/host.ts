/**
 * Host values and their token form.
 */

import { RESERVED_PREFIX } from '../constants';
import { ValidationError } from '../errors';

/**
 * Scalar the engine can store: numbers and strings.
 */
export type Scalar = number | string;

/**
 * Argument passed by reference: the engine binds the named local to the
 * routine's formal parameter.
 */
export interface ReferenceArgument {
  type: 'reference';
  value: string;
}

/**
 * Argument naming a local variable whose value the engine reads.
 */
export interface VariableArgument {
  type: 'variable';
  value: string;
}

/**
 * Anything that may appear as a subscript, data value or call argument.
 * `undefined` and `null` travel as the empty token.
 */
export type HostValue = Scalar | ReferenceArgument | VariableArgument | null | undefined;

const LOCAL_NAME = /^%?[A-Za-z][A-Za-z0-9]*$/;

function describe(value: unknown): string {
  if (value === null) {
    return 'null';
  }
  if (Array.isArray(value)) {
    return 'array';
  }
  return typeof value;
}

function isNamedArgument(value: object): value is ReferenceArgument | VariableArgument {
  return (
    'type' in value &&
    'value' in value &&
    (value.type === 'reference' || value.type === 'variable') &&
    typeof value.value === 'string'
  );
}

/**
 * Renders a host value as a host token: numbers in their JS text form,
 * strings wrapped in one pair of quotes.
 *
 * @throws ValidationError for non-finite numbers, booleans and other objects
 */
export function toHostToken(value: unknown, field: string): string {
  if (value === undefined || value === null) {
    return '';
  }
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      throw ValidationError.invalidType(field, 'a finite number or a string', String(value));
    }
    return String(value);
  }
  if (typeof value === 'string') {
    return `"${value}"`;
  }
  if (typeof value === 'object' && isNamedArgument(value)) {
    if (!LOCAL_NAME.test(value.value) || value.value.startsWith(RESERVED_PREFIX)) {
      throw ValidationError.invalidName(value.value, `not a usable local name for a ${value.type} argument`);
    }
    return value.type === 'reference' ? `.${value.value}` : value.value;
  }
  throw ValidationError.invalidType(field, 'a number, a string or a reference/variable argument', describe(value));
}

/**
 * Whether a value has one of the {@link HostValue} shapes.
 */
export function isHostValue(value: unknown): value is HostValue {
  return (
    value === undefined ||
    value === null ||
    typeof value === 'string' ||
    (typeof value === 'number' && Number.isFinite(value)) ||
    (typeof value === 'object' && isNamedArgument(value))
  );
}
