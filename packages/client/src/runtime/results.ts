/**
 * Result shaping: strict-mode annotation and the synthesized results of
 * unsupported features.
 */

import { PREVIOUS_NODE_UNSUPPORTED } from '../constants';
import type { HostValue, Scalar } from '../codec/host';
import type { Mode } from '../codec/value';
import type { NodeSpec, Operation } from './operations';

/**
 * Echo of a variable reference in an annotated result.
 */
export interface NodeEcho {
  global?: string;
  local?: string;
  subscripts?: Scalar[];
}

/**
 * Fields strict mode adds to a result.
 */
export interface Annotation extends NodeEcho {
  ok: 1;
  data?: HostValue;
  result?: Scalar;
  function?: string;
  procedure?: string;
  arguments?: HostValue[];
  from?: NodeEcho;
  to?: NodeEcho;
}

/**
 * Result of `previousNode` on an engine without reverse iteration.
 */
export type UnsupportedResult = { ok: false | 0; status: string };

export function unsupportedPreviousNode(mode: Mode): UnsupportedResult {
  return { ok: mode === 'strict' ? 0 : false, status: PREVIOUS_NODE_UNSUPPORTED };
}

function echo(node: NodeSpec): NodeEcho {
  const base: NodeEcho = node.kind === 'global' ? { global: node.name } : { local: node.name };
  if (node.subscripts.length > 0 && node.kind !== 'intrinsic') {
    base.subscripts = [...node.subscripts];
  }
  return base;
}

function field(command: object, key: string): unknown {
  return key in command ? Reflect.get(command, key) : undefined;
}

/**
 * Builds the strict-mode annotation for a finished command, or undefined
 * for operations whose results are never annotated.
 */
export function annotation(operation: Operation, command: object, result: unknown): Annotation | undefined {
  switch (operation) {
    case 'globalDirectory':
    case 'localDirectory':
    case 'version':
    case 'release':
      return undefined;
    default:
      break;
  }

  const voidResult =
    typeof result === 'object' && result !== null && !Array.isArray(result) && Object.keys(result).length === 0;

  const node = field(command, 'node');
  if (isNodeSpec(node)) {
    const annotated: Annotation = { ok: 1, ...echo(node) };
    if (operation === 'set') {
      annotated.data = toHost(field(command, 'data'));
    }
    if ((operation === 'order' || operation === 'previous') && annotated.subscripts && isSiblingResult(result)) {
      annotated.subscripts = [...annotated.subscripts.slice(0, -1), result.result];
    }
    if (voidResult) {
      annotated.result = 0;
    }
    return annotated;
  }

  const to = field(command, 'to');
  const from = field(command, 'from');
  if (operation === 'merge' && isNodeSpec(to) && isNodeSpec(from)) {
    return { ok: 1, to: echo(to), from: echo(from), result: 0 };
  }

  if (operation === 'function' || operation === 'procedure') {
    const name = String(field(command, 'name') ?? '');
    const args = field(command, 'args');
    const annotated: Annotation = operation === 'function' ? { ok: 1, function: name } : { ok: 1, procedure: name };
    if (Array.isArray(args) && args.length > 0) {
      annotated.arguments = args.map(toHost);
    }
    if (voidResult) {
      annotated.result = 0;
    }
    return annotated;
  }

  // kill and unlock without a target
  return { ok: 1, result: 0 };
}

function isNodeSpec(value: unknown): value is NodeSpec {
  return typeof value === 'object' && value !== null && 'engineName' in value && 'subscripts' in value;
}

function isSiblingResult(value: unknown): value is { result: Scalar } {
  return typeof value === 'object' && value !== null && 'result' in value;
}

function toHost(value: unknown): HostValue {
  if (typeof value === 'number' || typeof value === 'string') {
    return value;
  }
  if (
    typeof value === 'object' &&
    value !== null &&
    'type' in value &&
    'value' in value &&
    (value.type === 'reference' || value.type === 'variable') &&
    typeof value.value === 'string'
  ) {
    return { type: value.type, value: value.value };
  }
  return undefined;
}
