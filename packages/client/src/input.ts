/**
 * Caller input: the object shapes the Database accepts and their
 * validation into commands.
 */

import { MAX_NAME_LENGTH, RESERVED_PREFIX } from './constants';
import { isHostValue, type HostValue, type Scalar } from './codec/host';
import type { Mode } from './codec/value';
import { ValidationError } from './errors';
import type { DirectoryFilter, NodeSpec, RoutineCall } from './runtime/operations';

/**
 * Fields every call accepts.
 */
export interface CallInput {
  /**
   * Overrides the connection's mode for this call only.
   */
  mode?: Mode;
}

export interface GlobalNode extends CallInput {
  /**
   * Global name, with or without its leading `^`.
   */
  global: string;
  subscripts?: Scalar[];
}

export interface LocalNode extends CallInput {
  /**
   * Local variable name, or an intrinsic such as `$ZGBLDIR` where the
   * operation allows one.
   */
  local: string;
  subscripts?: Scalar[];
}

export type NodeInput = GlobalNode | LocalNode;

export type SetInput = NodeInput & { data: HostValue };

export type KillInput = NodeInput & { nodeOnly?: boolean };

export type IncrementInput = NodeInput & { increment?: number };

export type LockInput = NodeInput & {
  /**
   * Seconds to wait; `-1` (the default) waits forever.
   */
  timeout?: number;
};

export interface MergeInput extends CallInput {
  from: NodeInput;
  to: NodeInput;
}

interface RoutineInput extends CallInput {
  arguments?: HostValue[];

  /**
   * Relink the routine before calling it. Defaults to the connection's
   * `autoRelink`.
   */
  autoRelink?: boolean;
}

export interface FunctionInput extends RoutineInput {
  function: string;
}

export interface ProcedureInput extends RoutineInput {
  procedure: string;
}

export interface DirectoryInput extends CallInput {
  /**
   * Most names to return; 0 returns all of them.
   */
  max?: number;
  lo?: string;
  hi?: string;
}

const NAME = /^%?[A-Za-z][A-Za-z0-9]*$/;
const INTRINSIC = /^\$[A-Za-z]+$/;
const ROUTINE = /^(%?[A-Za-z][A-Za-z0-9]*)?\^?%?[A-Za-z][A-Za-z0-9]*$/;

function checkName(name: string, kind: string): void {
  if (name.includes('(') || name.includes(')')) {
    throw ValidationError.invalidName(name, `${kind} names may not carry subscripts; pass them in 'subscripts'`);
  }
  if (!NAME.test(name)) {
    throw ValidationError.invalidName(name, `not a valid ${kind} name`);
  }
  if (name.length > MAX_NAME_LENGTH) {
    throw ValidationError.invalidName(name, `longer than ${MAX_NAME_LENGTH} characters`);
  }
  if (name.startsWith(RESERVED_PREFIX)) {
    throw ValidationError.invalidName(name, `the ${RESERVED_PREFIX} prefix is reserved`);
  }
}

function checkSubscripts(subscripts: unknown, operation: string): Scalar[] {
  if (subscripts === undefined) {
    return [];
  }
  if (!Array.isArray(subscripts)) {
    throw ValidationError.invalidType(`${operation}: subscripts`, 'an array', typeof subscripts);
  }
  return subscripts.map((subscript: unknown, index): Scalar => {
    if (typeof subscript === 'string') {
      return subscript;
    }
    if (typeof subscript === 'number' && Number.isFinite(subscript)) {
      return subscript;
    }
    throw ValidationError.invalidType(
      `${operation}: subscripts[${index}]`,
      'a finite number or a string',
      subscript === null ? 'null' : typeof subscript
    );
  });
}

/**
 * Validates a variable reference.
 *
 * @param allowIntrinsic - accept `$name` in `local` (get and set only);
 * subscripts are then ignored
 */
export function toNodeSpec(input: unknown, operation: string, allowIntrinsic = false): NodeSpec {
  if (typeof input !== 'object' || input === null) {
    throw ValidationError.invalidType(operation, 'an object naming a global or a local', String(input));
  }
  const global = 'global' in input ? input.global : undefined;
  const local = 'local' in input ? input.local : undefined;
  const subscripts = checkSubscripts('subscripts' in input ? input.subscripts : undefined, operation);

  if (global !== undefined && local !== undefined) {
    throw ValidationError.invalidType(operation, "either 'global' or 'local'", 'both');
  }
  if (typeof global === 'string') {
    const name = global.startsWith('^') ? global.slice(1) : global;
    checkName(name, 'global');
    return { kind: 'global', name, engineName: `^${name}`, subscripts };
  }
  if (typeof local === 'string') {
    if (local.startsWith('$')) {
      if (!allowIntrinsic || !INTRINSIC.test(local)) {
        throw ValidationError.invalidName(local, `intrinsic variables are not accepted by ${operation}`);
      }
      return { kind: 'intrinsic', name: local, engineName: local.toUpperCase(), subscripts: [] };
    }
    checkName(local, 'local');
    return { kind: 'local', name: local, engineName: local, subscripts };
  }
  if (global === undefined && local === undefined) {
    throw ValidationError.requiredField('global', operation);
  }
  throw ValidationError.invalidType(`${operation}: name`, 'a string', typeof (global ?? local));
}

/**
 * Like {@link toNodeSpec}, but an input without a name targets everything
 * (kill every local, release every lock).
 */
export function toOptionalNodeSpec(input: unknown, operation: string): NodeSpec | undefined {
  if (input === undefined) {
    return undefined;
  }
  if (typeof input === 'object' && input !== null && !('global' in input) && !('local' in input)) {
    return undefined;
  }
  return toNodeSpec(input, operation);
}

/**
 * Validates a routine call; the routine name travels with `^` added when
 * the caller left it out.
 */
export function toRoutineCall(
  name: unknown,
  args: unknown,
  relink: boolean,
  operation: 'function' | 'procedure'
): RoutineCall {
  if (name === undefined) {
    throw ValidationError.requiredField(operation, operation);
  }
  if (typeof name !== 'string') {
    throw ValidationError.invalidType(operation, 'a string', typeof name);
  }
  if (name.includes('(')) {
    throw ValidationError.invalidName(name, "routine names may not carry arguments; pass them in 'arguments'");
  }
  if (!ROUTINE.test(name)) {
    throw ValidationError.invalidName(name, 'expected label^routine, ^routine or routine');
  }
  if (args === undefined) {
    return { name, args: [], relink };
  }
  if (!Array.isArray(args)) {
    throw ValidationError.invalidType(`${operation}: arguments`, 'an array', typeof args);
  }
  return {
    name,
    args: args.map((arg: unknown, index): HostValue => {
      if (!isHostValue(arg)) {
        throw ValidationError.invalidType(
          `${operation}: arguments[${index}]`,
          'a number, a string or a reference/variable argument',
          arg === null ? 'null' : typeof arg
        );
      }
      return arg;
    }),
    relink,
  };
}

/**
 * Validates directory listing bounds. `lo` and `hi` are inclusive; a
 * leading `^` on a global name is dropped.
 */
export function toDirectoryFilter(input: DirectoryInput, operation: string): DirectoryFilter {
  const max = input.max ?? 0;
  if (!Number.isInteger(max) || max < 0) {
    throw ValidationError.outOfRange(`${operation}: max`, 'must be a non-negative integer', max);
  }
  const bound = (value: string | undefined): string => (value ?? '').replace(/^\^/, '');
  return { max, lo: bound(input.lo), hi: bound(input.hi) };
}

/**
 * Validates a lock timeout: `-1` or a non-negative number of seconds.
 */
export function toTimeout(timeout: unknown): number {
  if (timeout === undefined) {
    return -1;
  }
  if (typeof timeout !== 'number' || !(timeout === -1 || (Number.isFinite(timeout) && timeout >= 0))) {
    throw ValidationError.outOfRange('lock: timeout', 'must be -1 or a non-negative number of seconds', timeout);
  }
  return timeout;
}

export function toIncrement(increment: unknown): number {
  if (increment === undefined) {
    return 1;
  }
  if (typeof increment !== 'number' || !Number.isFinite(increment)) {
    throw ValidationError.invalidType('increment', 'a finite number', String(increment));
  }
  return increment;
}
