/**
 * Operation table
 *
 * Every operation is a typed command matched by name to a handler that
 * knows its engine entry point, how to encode the command into engine
 * arguments and how to decode the engine's packed reply into a result.
 */

import { FUNCTION_INDIRECTION_LIMIT, INDIRECTION_LIMIT } from '../constants';
import type { HostValue, Scalar } from '../codec/host';
import { toHostToken } from '../codec/host';
import { pack, unpack, type Charset } from '../codec/packer';
import { buildReference } from '../codec/reference';
import { decodeValue, encodeInput, type Mode } from '../codec/value';
import type { EngineEntry } from '../engine/channel';
import { EncodingError } from '../errors';

/**
 * A validated variable reference.
 */
export interface NodeSpec {
  kind: 'global' | 'local' | 'intrinsic';

  /**
   * Name as the caller gave it, without the `^` of a global.
   */
  name: string;

  /**
   * Name as the engine reads it (`^orders`, `tmp`, `$ZVERSION`).
   */
  engineName: string;

  subscripts: Scalar[];
}

export interface DirectoryFilter {
  max: number;
  lo: string;
  hi: string;
}

export interface RoutineCall {
  /**
   * `label^routine` or `^routine`.
   */
  name: string;
  args: HostValue[];
  relink: boolean;
}

/**
 * Fields of each command, by operation name.
 */
export interface CommandMap {
  data: { node: NodeSpec };
  get: { node: NodeSpec };
  set: { node: NodeSpec; data: HostValue };
  kill: { node: NodeSpec | undefined; nodeOnly: boolean };
  merge: { to: NodeSpec; from: NodeSpec };
  order: { node: NodeSpec };
  previous: { node: NodeSpec };
  nextNode: { node: NodeSpec };
  previousNode: { node: NodeSpec };
  increment: { node: NodeSpec; increment: number };
  lock: { node: NodeSpec; timeout: number };
  unlock: { node: NodeSpec | undefined };
  function: RoutineCall;
  procedure: RoutineCall;
  globalDirectory: DirectoryFilter;
  localDirectory: DirectoryFilter;
  version: Record<string, never>;
  release: Record<string, never>;
}

export type Operation = keyof CommandMap;

export type Defined = 0 | 1;

export interface NodeResult {
  defined: Defined;
  data?: Scalar;
  subscripts?: Scalar[];
}

/**
 * Result of an operation that returns nothing.
 */
export type EmptyResult = Record<never, never>;

/**
 * Canonical result of each operation, before strict-mode annotation.
 */
export interface ResultMap {
  data: { defined: 0 | 1 | 10 | 11 };
  get: { defined: Defined; data: Scalar };
  set: EmptyResult;
  kill: EmptyResult;
  merge: EmptyResult;
  order: { result: Scalar };
  previous: { result: Scalar };
  nextNode: NodeResult;
  previousNode: NodeResult;
  increment: { data: Scalar };
  lock: { result: Defined };
  unlock: EmptyResult;
  function: { result: Scalar };
  procedure: EmptyResult;
  globalDirectory: string[];
  localDirectory: string[];
  version: string;
  release: string;
}

/**
 * Per-call settings the handlers encode and decode with.
 */
export interface CallContext {
  mode: Mode;
  charset: Charset;
}

export interface OperationHandler<K extends Operation> {
  entry: EngineEntry;
  prepare(command: CommandMap[K], context: CallContext): string[];
  complete(values: string[], command: CommandMap[K], context: CallContext): ResultMap[K];
}

function encodeTokens(values: readonly HostValue[], field: string, mode: Mode): string[] {
  return values.map((value, index) => encodeInput(toHostToken(value, `${field}[${index}]`), mode, false));
}

/**
 * Reference text and packed slot values for a node.
 */
function nodeArgs(node: NodeSpec, context: CallContext): [string, string] {
  const tokens = node.kind === 'intrinsic' ? [] : encodeTokens(node.subscripts, 'subscripts', context.mode);
  const reference = buildReference(node.engineName, tokens, INDIRECTION_LIMIT);
  return [reference.text, pack(reference.slots, context.charset)];
}

function routineArgs(call: RoutineCall, context: CallContext, limit: number): string[] {
  const name = call.name.startsWith('^') || call.name.includes('^') ? call.name : `^${call.name}`;
  const reference = buildReference(name, encodeTokens(call.args, 'arguments', context.mode), limit);
  return [reference.text, pack(reference.slots, context.charset), call.relink ? '1' : '0'];
}

function expect(values: string[], count: number, entry: EngineEntry): void {
  if (values.length < count) {
    throw EncodingError.malformedResult(entry, `expected ${count} value(s), got ${values.length}`);
  }
}

function toDefined(value: string): Defined {
  return value === '1' ? 1 : 0;
}

function toDataFlag(value: string, entry: EngineEntry): 0 | 1 | 10 | 11 {
  switch (value) {
    case '0':
      return 0;
    case '1':
      return 1;
    case '10':
      return 10;
    case '11':
      return 11;
    default:
      throw EncodingError.malformedResult(entry, `'${value}' is not a $data value`);
  }
}

const none = (): EmptyResult => ({});

function nodeWalk<K extends 'nextNode' | 'previousNode'>(entry: EngineEntry): OperationHandler<K> {
  return {
    entry,
    prepare: ({ node }, context) => nodeArgs(node, context),
    complete: (values, _command, { mode }) => {
      expect(values, 1, entry);
      const defined = toDefined(values[0]);
      if (defined === 0) {
        return { defined };
      }
      expect(values, 2, entry);
      const result: NodeResult = { defined, data: decodeValue(values[1], mode) };
      if (values.length > 2) {
        result.subscripts = values.slice(2).map((value) => decodeValue(value, mode));
      }
      return result;
    },
  };
}

function sibling<K extends 'order' | 'previous'>(entry: EngineEntry): OperationHandler<K> {
  return {
    entry,
    prepare: ({ node }, context) => nodeArgs(node, context),
    complete: (values, _command, { mode }) => {
      expect(values, 1, entry);
      return { result: decodeValue(values[0], mode) };
    },
  };
}

function directory<K extends 'globalDirectory' | 'localDirectory'>(entry: EngineEntry): OperationHandler<K> {
  return {
    entry,
    prepare: ({ max, lo, hi }) => [String(max), lo, hi],
    complete: (values) => values,
  };
}

/**
 * Handlers for every operation, keyed by operation name.
 */
export const OPERATIONS: { [K in Operation]: OperationHandler<K> } = {
  data: {
    entry: 'data',
    prepare: ({ node }, context) => nodeArgs(node, context),
    complete: (values) => {
      expect(values, 1, 'data');
      return { defined: toDataFlag(values[0], 'data') };
    },
  },
  get: {
    entry: 'get',
    prepare: ({ node }, context) => nodeArgs(node, context),
    complete: (values, _command, { mode }) => {
      expect(values, 2, 'get');
      return { defined: toDefined(values[0]), data: decodeValue(values[1], mode) };
    },
  },
  set: {
    entry: 'set',
    prepare: ({ node, data }, context) => [
      ...nodeArgs(node, context),
      encodeInput(toHostToken(data, 'data'), context.mode, true),
    ],
    complete: none,
  },
  kill: {
    entry: 'kill',
    prepare: ({ node, nodeOnly }, context) => [...(node ? nodeArgs(node, context) : ['', '']), nodeOnly ? '1' : '0'],
    complete: none,
  },
  merge: {
    entry: 'merge',
    prepare: ({ to, from }, context) => [...nodeArgs(to, context), ...nodeArgs(from, context)],
    complete: none,
  },
  order: sibling<'order'>('order'),
  previous: sibling<'previous'>('previous'),
  nextNode: nodeWalk<'nextNode'>('next_node'),
  previousNode: nodeWalk<'previousNode'>('previous_node'),
  increment: {
    entry: 'increment',
    prepare: ({ node, increment }, context) => [
      ...nodeArgs(node, context),
      encodeInput(toHostToken(increment, 'increment'), context.mode === 'strict' ? 'canonical' : context.mode, true),
    ],
    complete: (values, _command, { mode }) => {
      expect(values, 1, 'increment');
      return { data: decodeValue(values[0], mode) };
    },
  },
  lock: {
    entry: 'lock',
    prepare: ({ node, timeout }, context) => [...nodeArgs(node, context), String(timeout)],
    complete: (values) => {
      expect(values, 1, 'lock');
      return { result: toDefined(values[0]) };
    },
  },
  unlock: {
    entry: 'unlock',
    prepare: ({ node }, context) => (node ? nodeArgs(node, context) : ['', '']),
    complete: none,
  },
  function: {
    entry: 'function',
    prepare: (call, context) => routineArgs(call, context, FUNCTION_INDIRECTION_LIMIT),
    complete: (values, _command, { mode }) => {
      expect(values, 1, 'function');
      return { result: decodeValue(values[0], mode) };
    },
  },
  procedure: {
    entry: 'procedure',
    prepare: (call, context) => routineArgs(call, context, INDIRECTION_LIMIT),
    complete: none,
  },
  globalDirectory: directory<'globalDirectory'>('global_directory'),
  localDirectory: directory<'localDirectory'>('local_directory'),
  version: {
    entry: 'version',
    prepare: () => [],
    complete: (values) => {
      expect(values, 1, 'version');
      return values[0];
    },
  },
  release: {
    entry: 'release',
    prepare: () => [],
    complete: (values) => {
      expect(values, 1, 'release');
      return values[0];
    },
  },
};

/**
 * Splits a packed engine reply into raw values.
 */
export function readReply(packed: string, charset: Charset): string[] {
  return unpack(packed, { charset });
}
