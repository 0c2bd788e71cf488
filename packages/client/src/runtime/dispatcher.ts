/**
 * Dispatcher
 *
 * Runs call descriptors against the engine channel, one at a time, behind
 * the CallGate. `execute` runs a call on the caller's stack; `submit`
 * queues it for a pool of lanes that drain the queue on later event-loop
 * turns, so the caller never waits.
 */

import { INTERRUPT_MNEMONIC } from '../constants';
import { parseFailure, type EngineChannel } from '../engine/channel';
import { EngineError, InterruptError, StateError } from '../errors';
import type { Tracer } from '../logger';
import type { CallDescriptor } from './descriptor';
import type { CallGate } from './gate';

interface QueuedCall {
  descriptor: CallDescriptor;
  settle: (descriptor: CallDescriptor) => void;
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Maps a nonzero engine status and its error-buffer text to an error.
 */
export function engineFailure(status: number, text: string, entry: string): EngineError {
  const { message } = parseFailure(status, text);
  if (message.includes(`-E-${INTERRUPT_MNEMONIC}`)) {
    return new InterruptError(status, message, entry);
  }
  return new EngineError(status, message, entry);
}

/**
 * Lanes are `setImmediate` chains on the host's single thread, not worker
 * threads. Each engine call still blocks the event loop while it runs;
 * `poolSize` bounds how many queued calls are started per event-loop turn,
 * which decides how far a burst of callback calls can run ahead of other
 * host work.
 */
export class Dispatcher {
  private readonly queue: QueuedCall[] = [];
  private lanes = 0;
  private stopped = false;

  constructor(
    private readonly channel: EngineChannel,
    private readonly gate: CallGate,
    private readonly tracer: Tracer,
    private poolSize: number
  ) {}

  /**
   * Descriptors waiting for a lane.
   */
  get pending(): number {
    return this.queue.length;
  }

  resize(poolSize: number): void {
    this.poolSize = poolSize;
    this.pump();
  }

  /**
   * Runs a descriptor to completion on the caller's stack. The descriptor
   * is settled when this returns; check `state` and `failure`.
   */
  execute(descriptor: CallDescriptor): CallDescriptor {
    descriptor.transition('queued');
    if (this.stopped) {
      descriptor.fail(StateError.closed(descriptor.operation));
      return descriptor;
    }
    this.run(descriptor);
    return descriptor;
  }

  /**
   * Queues a descriptor and returns at once. The promise resolves with the
   * settled descriptor; it never rejects.
   */
  submit(descriptor: CallDescriptor): Promise<CallDescriptor> {
    descriptor.transition('queued');
    if (this.stopped) {
      descriptor.fail(StateError.closed(descriptor.operation));
      return Promise.resolve(descriptor);
    }
    return new Promise((resolve) => {
      this.queue.push({ descriptor, settle: resolve });
      this.tracer.high(`[dispatcher] #${descriptor.id} ${descriptor.operation} queued (pending=${this.queue.length})`);
      this.pump();
    });
  }

  /**
   * Stops accepting work and fails every descriptor still queued.
   */
  shutdown(): number {
    this.stopped = true;
    const abandoned = this.queue.splice(0, this.queue.length);
    for (const { descriptor, settle } of abandoned) {
      descriptor.fail(StateError.closed(descriptor.operation));
      settle(descriptor);
    }
    return abandoned.length;
  }

  private pump(): void {
    while (this.lanes < this.poolSize && this.lanes < this.queue.length) {
      this.lanes += 1;
      setImmediate(() => this.lane());
    }
  }

  private lane(): void {
    const next = this.queue.shift();
    if (!next) {
      this.lanes -= 1;
      return;
    }
    this.run(next.descriptor);
    next.settle(next.descriptor);
    setImmediate(() => this.lane());
  }

  private run(descriptor: CallDescriptor): void {
    descriptor.transition('executing');
    this.tracer.high(`[dispatcher] #${descriptor.id} ${descriptor.entry}(${descriptor.args.join(', ')})`);
    try {
      const status = this.gate.run(descriptor.entry, () =>
        this.channel.call(descriptor.entry, descriptor.args, descriptor.result, descriptor.error)
      );
      descriptor.status = status;
      if (status === 0) {
        descriptor.transition('completed');
        this.tracer.medium(`[dispatcher] #${descriptor.id} ${descriptor.entry} completed`);
        return;
      }
      descriptor.fail(engineFailure(status, descriptor.error.toString(), descriptor.entry));
      this.tracer.medium(`[dispatcher] #${descriptor.id} ${descriptor.entry} failed with status ${status}`);
    } catch (error) {
      descriptor.fail(toError(error));
      this.tracer.medium(`[dispatcher] #${descriptor.id} ${descriptor.entry} failed: ${toError(error).message}`);
    }
  }
}
