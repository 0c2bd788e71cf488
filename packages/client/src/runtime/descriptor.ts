/**
 * CallDescriptor
 *
 * One request on its way through the dispatcher. Owned by the caller while
 * `created`, by the dispatcher while `queued` and `executing`, and handed
 * back once it reaches `completed` or `failed`. Never reused.
 */

import { ERROR_BUFFER_CAPACITY, INPUT_BUFFER_CAPACITY, RESULT_BUFFER_CAPACITY } from '../constants';
import type { Charset } from '../codec/packer';
import type { Mode } from '../codec/value';
import type { EngineEntry } from '../engine/channel';
import { StateError } from '../errors';
import { FixedBuffer } from './buffer';

export type CallState = 'created' | 'queued' | 'executing' | 'completed' | 'failed';

const TRANSITIONS: Record<CallState, readonly CallState[]> = {
  created: ['queued'],
  queued: ['executing', 'failed'],
  executing: ['completed', 'failed'],
  completed: [],
  failed: [],
};

export interface CallInit {
  /**
   * Operation name the call was issued for, used in traces and errors.
   */
  operation: string;
  entry: EngineEntry;
  args: readonly string[];
  mode: Mode;
  async: boolean;
  charset?: Charset;
}

let nextId = 1;

export class CallDescriptor {
  readonly id: number;
  readonly operation: string;
  readonly entry: EngineEntry;
  readonly args: readonly string[];
  readonly mode: Mode;
  readonly async: boolean;

  /**
   * Encoded arguments, checked against the input ceiling at creation.
   */
  readonly input: FixedBuffer;
  readonly result: FixedBuffer;
  readonly error: FixedBuffer;

  /**
   * Engine status; 0 until a call returns a nonzero one.
   */
  status = 0;

  /**
   * Why the call failed, once it has.
   */
  failure: Error | undefined;

  private current: CallState = 'created';

  /**
   * @throws ConcurrencyError when the encoded arguments exceed the input
   * buffer's capacity
   */
  constructor(init: CallInit) {
    const charset = init.charset ?? 'utf-8';
    this.id = nextId;
    nextId += 1;
    this.operation = init.operation;
    this.entry = init.entry;
    this.args = [...init.args];
    this.mode = init.mode;
    this.async = init.async;
    this.input = new FixedBuffer('input', INPUT_BUFFER_CAPACITY, charset);
    this.result = new FixedBuffer('result', RESULT_BUFFER_CAPACITY, charset);
    this.error = new FixedBuffer('error', ERROR_BUFFER_CAPACITY, charset);
    for (const arg of this.args) {
      this.input.write(arg);
    }
  }

  get state(): CallState {
    return this.current;
  }

  get settled(): boolean {
    return this.current === 'completed' || this.current === 'failed';
  }

  transition(to: CallState): void {
    if (!TRANSITIONS[this.current].includes(to)) {
      throw StateError.illegalTransition(this.id, this.current, to);
    }
    this.current = to;
  }

  fail(error: Error): void {
    this.failure = error;
    this.transition('failed');
  }
}
