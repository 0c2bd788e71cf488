/**
 * CallGate
 *
 * The one mutual-exclusion point in front of the engine channel. Every
 * engine call runs inside `run`, which holds the gate for exactly the
 * duration of the call and releases it on every exit path.
 */

import { ConcurrencyError } from '../errors';

export class CallGate {
  private holder: string | undefined;
  private inFlight = 0;
  private peakInFlight = 0;
  private entries = 0;

  /**
   * Calls currently inside the gate. Never more than 1.
   */
  get executing(): number {
    return this.inFlight;
  }

  /**
   * Highest value `executing` has reached.
   */
  get peak(): number {
    return this.peakInFlight;
  }

  /**
   * Total calls admitted.
   */
  get admitted(): number {
    return this.entries;
  }

  get isHeld(): boolean {
    return this.holder !== undefined;
  }

  /**
   * Runs `call` while holding the gate.
   *
   * @throws ConcurrencyError when the gate is already held, which can only
   * happen when `call` itself (directly or through engine callbacks) tries to
   * re-enter the channel
   */
  run<T>(label: string, call: () => T): T {
    if (this.holder !== undefined) {
      throw ConcurrencyError.reentrantCall(label, this.holder);
    }
    this.holder = label;
    this.inFlight += 1;
    this.entries += 1;
    this.peakInFlight = Math.max(this.peakInFlight, this.inFlight);
    try {
      return call();
    } finally {
      this.inFlight -= 1;
      this.holder = undefined;
    }
  }
}

const gates = new WeakMap<object, CallGate>();

/**
 * The gate guarding a channel. Every connection opened over the same
 * channel object shares it.
 */
export function gateFor(channel: object): CallGate {
  let gate = gates.get(channel);
  if (!gate) {
    gate = new CallGate();
    gates.set(channel, gate);
  }
  return gate;
}
