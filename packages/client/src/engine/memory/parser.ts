/**
 * Parser for the reference text the bridge hands to the engine's
 * indirection mechanism.
 */

import { INDIRECTION_LIMIT, TEMP_ARGS_NAME } from '../../constants';
import { formatNumber } from './numeric';
import { EngineFault } from './status';

export type ReferenceKind = 'global' | 'local' | 'intrinsic' | 'routine';

export type ParsedArgument = { kind: 'value'; value: string } | { kind: 'reference'; name: string };

export interface ParsedReference {
  kind: ReferenceKind;
  name: string;
  args: ParsedArgument[];
}

/**
 * Reads the value of a local variable named as an argument.
 */
export type VariableResolver = (name: string) => string;

const NAME = /^(\$[A-Za-z]+|\^?%?[A-Za-z][A-Za-z0-9]*(\^%?[A-Za-z][A-Za-z0-9]*)?)/;
const LOCAL = /^%?[A-Za-z][A-Za-z0-9]*/;
const NUMBER = /^-?(\d+\.?\d*|\.\d+)/;
const SLOT = new RegExp(`^${TEMP_ARGS_NAME}\\((\\d+)\\)`);

function kindOf(name: string): ReferenceKind {
  if (name.startsWith('$')) {
    return 'intrinsic';
  }
  if (name.indexOf('^', 1) > 0) {
    return 'routine';
  }
  return name.startsWith('^') ? 'global' : 'local';
}

class Scanner {
  offset = 0;

  constructor(readonly text: string) {}

  get rest(): string {
    return this.text.slice(this.offset);
  }

  peek(): string {
    return this.text.charAt(this.offset);
  }

  take(pattern: RegExp): RegExpExecArray | null {
    const match = pattern.exec(this.rest);
    if (match) {
      this.offset += match[0].length;
    }
    return match;
  }

  fail(reason: string): never {
    throw new EngineFault('INVCMD', `${reason} at column ${this.offset + 1} of ${this.text.slice(0, 64)}`);
  }
}

function readString(scanner: Scanner): string {
  let value = '';
  scanner.offset += 1;
  for (;;) {
    const close = scanner.text.indexOf('"', scanner.offset);
    if (close < 0) {
      scanner.fail('unterminated string literal');
    }
    value += scanner.text.slice(scanner.offset, close);
    scanner.offset = close + 1;
    if (scanner.peek() !== '"') {
      return value;
    }
    value += '"';
    scanner.offset += 1;
  }
}

function readArgument(scanner: Scanner, slots: readonly string[], resolve: VariableResolver): ParsedArgument {
  const next = scanner.peek();
  if (next === '"') {
    return { kind: 'value', value: readString(scanner) };
  }
  const number = scanner.take(NUMBER);
  if (number) {
    return { kind: 'value', value: formatNumber(Number(number[0])) };
  }
  const slot = scanner.take(SLOT);
  if (slot) {
    const index = Number(slot[1]);
    if (index < 1 || index > slots.length) {
      throw new EngineFault('LVUNDEF', `${TEMP_ARGS_NAME}(${index})`);
    }
    return { kind: 'value', value: slots[index - 1] };
  }
  if (next === '.') {
    scanner.offset += 1;
    const local = scanner.take(LOCAL);
    if (!local) {
      return scanner.fail('expected a local name after "."');
    }
    return { kind: 'reference', name: local[0] };
  }
  const local = scanner.take(LOCAL);
  if (local) {
    return { kind: 'value', value: resolve(local[0]) };
  }
  return scanner.fail('expected an argument');
}

/**
 * Parses `name` or `name(arg,...)`.
 *
 * @throws EngineFault with INDRMAXLEN when the text is longer than the
 * indirection limit, INVCMD on a syntax error
 */
export function parseReference(
  text: string,
  slots: readonly string[],
  resolve: VariableResolver,
  limit: number = INDIRECTION_LIMIT
): ParsedReference {
  if (text.length > limit) {
    throw new EngineFault('INDRMAXLEN', `${text.length} characters`);
  }
  const scanner = new Scanner(text);
  const name = scanner.take(NAME);
  if (!name) {
    return scanner.fail('expected a name');
  }
  const args: ParsedArgument[] = [];
  if (scanner.peek() === '(') {
    scanner.offset += 1;
    for (;;) {
      args.push(readArgument(scanner, slots, resolve));
      const separator = scanner.peek();
      scanner.offset += 1;
      if (separator === ')') {
        break;
      }
      if (separator !== ',') {
        scanner.fail('expected "," or ")"');
      }
    }
  }
  if (scanner.offset !== text.length) {
    scanner.fail('unexpected trailing text');
  }
  return { kind: kindOf(name[0]), name: name[0], args };
}
