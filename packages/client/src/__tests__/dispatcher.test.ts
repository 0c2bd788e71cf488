/**
 * Tests for the call gate, call descriptors and the dispatcher
 */

import { pack } from '../codec/packer';
import { ERROR_BUFFER_CAPACITY, INPUT_BUFFER_CAPACITY, RESULT_BUFFER_CAPACITY } from '../constants';
import type { ChannelOutput, EngineChannel, EngineEntry } from '../engine/channel';
import { ConcurrencyError, EncodingError, EngineError, ErrorCode, InterruptError, StateError } from '../errors';
import { Tracer } from '../logger';
import { FixedBuffer } from '../runtime/buffer';
import { CallDescriptor } from '../runtime/descriptor';
import { Dispatcher } from '../runtime/dispatcher';
import { CallGate, gateFor } from '../runtime/gate';
import { thrown } from './helpers';

type Reply = (entry: EngineEntry, args: readonly string[], result: ChannelOutput, error: ChannelOutput) => number;

const echo: Reply = (entry, args, result) => {
  result.write(pack([entry, ...args]));
  return 0;
};

/**
 * Channel that records every call and the gate occupancy it observed.
 */
class ScriptedChannel implements EngineChannel {
  readonly calls: string[] = [];
  maxObserved = 0;

  constructor(
    private readonly gate: CallGate,
    private readonly reply: Reply = echo
  ) {}

  call(entry: EngineEntry, args: readonly string[], result: ChannelOutput, error: ChannelOutput): number {
    this.calls.push([entry, ...args].join(' '));
    this.maxObserved = Math.max(this.maxObserved, this.gate.executing);
    return this.reply(entry, args, result, error);
  }
}

function descriptor(args: string[] = [], entry: EngineEntry = 'get'): CallDescriptor {
  return new CallDescriptor({ operation: entry, entry, args, mode: 'canonical', async: false });
}

describe('CallGate', () => {
  it('should hold the gate for the duration of the call', () => {
    const gate = new CallGate();
    const observed = gate.run('get', () => [gate.executing, gate.isHeld]);

    expect(observed).toEqual([1, true]);
    expect(gate.executing).toBe(0);
    expect(gate.isHeld).toBe(false);
    expect(gate.peak).toBe(1);
    expect(gate.admitted).toBe(1);
  });

  it('should refuse reentrant calls', () => {
    const gate = new CallGate();
    const error = thrown(() => gate.run('get', () => gate.run('set', () => 1)));

    expect(error).toBeInstanceOf(ConcurrencyError);
    expect(error).toMatchObject({
      code: ErrorCode.CONCURRENCY_REENTRANT_CALL,
      message: "Cannot call 'set' while 'get' is executing: the engine channel is not reentrant",
    });
    expect(gate.isHeld).toBe(false);
    expect(gate.peak).toBe(1);
  });

  it('should release the gate when the call throws', () => {
    const gate = new CallGate();

    expect(() =>
      gate.run('get', () => {
        throw new Error('engine crashed');
      })
    ).toThrow('engine crashed');
    expect(gate.isHeld).toBe(false);
    expect(gate.run('set', () => 'next')).toBe('next');
  });

  it('should share one gate per channel object', () => {
    const first = {};
    const second = {};

    expect(gateFor(first)).toBe(gateFor(first));
    expect(gateFor(first)).not.toBe(gateFor(second));
  });
});

describe('FixedBuffer', () => {
  it('should refuse writes past its capacity without truncating', () => {
    const buffer = new FixedBuffer('result', 4);
    buffer.write('ab');

    const error = thrown(() => buffer.write('abc'));
    expect(error).toBeInstanceOf(ConcurrencyError);
    expect(error).toMatchObject({ message: 'result buffer overflow: 5 bytes required, capacity is 4' });
    expect(buffer.toString()).toBe('ab');
    expect(buffer.byteLength).toBe(2);
  });

  it('should count bytes in its charset', () => {
    const utf8 = new FixedBuffer('result', 4);
    const m = new FixedBuffer('result', 4, 'm');
    utf8.write('éé');
    m.write('éé');

    expect(utf8.byteLength).toBe(4);
    expect(m.byteLength).toBe(2);
    expect(() => utf8.write('x')).toThrow(ConcurrencyError);
  });

  it('should refuse text the m charset cannot hold', () => {
    const buffer = new FixedBuffer('result', 16, 'm');
    buffer.write('ab');

    expect(thrown(() => buffer.write('€'))).toBeInstanceOf(EncodingError);
    expect(buffer.toString()).toBe('ab');
    expect(buffer.byteLength).toBe(2);
  });

  it('should start over after clear', () => {
    const buffer = new FixedBuffer('error', 2);
    buffer.write('ab');
    buffer.clear();
    buffer.write('cd');
    expect(buffer.toString()).toBe('cd');
  });
});

describe('CallDescriptor', () => {
  it('should follow created, queued, executing, completed', () => {
    const call = descriptor();
    expect(call.state).toBe('created');
    call.transition('queued');
    call.transition('executing');
    call.transition('completed');

    expect(call.state).toBe('completed');
    expect(call.settled).toBe(true);
  });

  it('should reject illegal transitions', () => {
    const call = descriptor();
    const error = thrown(() => call.transition('completed'));

    expect(error).toBeInstanceOf(StateError);
    expect(error).toMatchObject({ code: ErrorCode.STATE_ILLEGAL_TRANSITION });
    expect(call.state).toBe('created');
  });

  it('should take distinct ids', () => {
    expect(descriptor().id).not.toBe(descriptor().id);
  });

  it('should size each buffer by its own ceiling', () => {
    const call = descriptor();

    expect(call.input.capacity).toBe(INPUT_BUFFER_CAPACITY);
    expect(call.result.capacity).toBe(RESULT_BUFFER_CAPACITY);
    expect(call.error.capacity).toBe(ERROR_BUFFER_CAPACITY);
  });

  it('should refuse arguments larger than the input buffer', () => {
    expect(() => descriptor(['x'.repeat(1048577)])).toThrow(
      'input buffer overflow: 1048577 bytes required, capacity is 1048576'
    );
  });
});

describe('Dispatcher', () => {
  const tracer = new Tracer('off');

  it('should execute calls on the caller stack', () => {
    const gate = new CallGate();
    const channel = new ScriptedChannel(gate);
    const dispatcher = new Dispatcher(channel, gate, tracer, 4);

    const call = dispatcher.execute(descriptor(['^x', '']));

    expect(call.state).toBe('completed');
    expect(call.status).toBe(0);
    expect(call.result.toString()).toBe('3:get2:^x0:');
    expect(channel.calls).toEqual(['get ^x ']);
  });

  it('should turn a nonzero status into an engine error', () => {
    const gate = new CallGate();
    const channel = new ScriptedChannel(gate, (_entry, _args, _result, error) => {
      error.write('150373850,get^%mbrEngine,%YDB-E-LVUNDEF, Undefined local variable: x');
      return 150373850;
    });
    const dispatcher = new Dispatcher(channel, gate, tracer, 4);

    const call = dispatcher.execute(descriptor());

    expect(call.state).toBe('failed');
    expect(call.status).toBe(150373850);
    expect(call.failure).toBeInstanceOf(EngineError);
    expect(call.failure).toMatchObject({
      status: 150373850,
      message: 'get^%mbrEngine,%YDB-E-LVUNDEF, Undefined local variable: x',
      mnemonic: 'LVUNDEF',
    });
  });

  it('should surface a trapped interrupt as an InterruptError', () => {
    const gate = new CallGate();
    const channel = new ScriptedChannel(gate, (_entry, _args, _result, error) => {
      error.write('150372987,get^%mbrEngine,%YDB-E-CTRAP, Character trap $C(3) encountered');
      return 150372987;
    });
    const dispatcher = new Dispatcher(channel, gate, tracer, 4);

    expect(dispatcher.execute(descriptor()).failure).toBeInstanceOf(InterruptError);
  });

  it('should fail the call when the engine overflows a buffer', () => {
    const gate = new CallGate();
    const channel = new ScriptedChannel(gate, (_entry, _args, _result, error) => {
      error.write('x'.repeat(3000));
      return 1;
    });
    const dispatcher = new Dispatcher(channel, gate, tracer, 4);

    const call = dispatcher.execute(descriptor());
    expect(call.failure).toBeInstanceOf(ConcurrencyError);
    expect(call.failure).toMatchObject({ code: ErrorCode.CONCURRENCY_BUFFER_OVERFLOW });
    expect(gate.isHeld).toBe(false);
  });

  it('should fail a call that re-enters the channel from inside the engine', () => {
    const gate = new CallGate();
    const inner: CallDescriptor[] = [];
    const holder: { dispatcher?: Dispatcher } = {};
    const channel = new ScriptedChannel(gate, (entry, _args, result) => {
      if (entry === 'function' && holder.dispatcher) {
        inner.push(holder.dispatcher.execute(descriptor([], 'get')));
      }
      result.write(pack(['done']));
      return 0;
    });
    const dispatcher = new Dispatcher(channel, gate, tracer, 4);
    holder.dispatcher = dispatcher;

    const outer = dispatcher.execute(descriptor([], 'function'));

    expect(outer.state).toBe('completed');
    expect(inner).toHaveLength(1);
    expect(inner[0].state).toBe('failed');
    expect(inner[0].failure).toMatchObject({ code: ErrorCode.CONCURRENCY_REENTRANT_CALL });
    expect(channel.calls).toEqual(['function']);
  });

  it('should return from submit before the call runs', async () => {
    const gate = new CallGate();
    const channel = new ScriptedChannel(gate);
    const dispatcher = new Dispatcher(channel, gate, tracer, 4);

    const pending = dispatcher.submit(descriptor(['^x', '']));

    expect(channel.calls).toEqual([]);
    expect(dispatcher.pending).toBe(1);

    const call = await pending;
    expect(call.state).toBe('completed');
    expect(channel.calls).toEqual(['get ^x ']);
    expect(dispatcher.pending).toBe(0);
  });

  it('should run queued calls one at a time in submission order', async () => {
    const gate = new CallGate();
    const channel = new ScriptedChannel(gate);
    const dispatcher = new Dispatcher(channel, gate, tracer, 4);

    const submitted = Array.from({ length: 25 }, (_, index) => dispatcher.submit(descriptor([String(index)])));
    const synchronous = dispatcher.execute(descriptor(['sync']));
    const settled = await Promise.all(submitted);

    expect(synchronous.state).toBe('completed');
    expect(settled.every((call) => call.state === 'completed')).toBe(true);
    expect(channel.calls).toEqual(['get sync', ...Array.from({ length: 25 }, (_, index) => `get ${index}`)]);
    expect(channel.maxObserved).toBe(1);
    expect(gate.peak).toBe(1);
    expect(gate.admitted).toBe(26);
  });

  it('should start at most poolSize queued calls per event-loop turn', async () => {
    const gate = new CallGate();
    const channel = new ScriptedChannel(gate);
    const dispatcher = new Dispatcher(channel, gate, tracer, 2);

    const submitted = Array.from({ length: 5 }, (_, index) => dispatcher.submit(descriptor([String(index)])));
    await new Promise((resolve) => setImmediate(resolve));

    expect(channel.calls).toEqual(['get 0', 'get 1']);
    expect(dispatcher.pending).toBe(3);

    await Promise.all(submitted);
    expect(channel.calls).toHaveLength(5);
  });

  it('should fail queued calls on shutdown', async () => {
    const gate = new CallGate();
    const channel = new ScriptedChannel(gate);
    const dispatcher = new Dispatcher(channel, gate, tracer, 1);

    const pending = [dispatcher.submit(descriptor()), dispatcher.submit(descriptor()), dispatcher.submit(descriptor())];

    expect(dispatcher.shutdown()).toBe(3);
    const settled = await Promise.all(pending);

    expect(settled.map((call) => call.state)).toEqual(['failed', 'failed', 'failed']);
    expect(settled[0].failure).toMatchObject({ code: ErrorCode.STATE_CLOSED });
    expect(channel.calls).toEqual([]);
    expect(dispatcher.execute(descriptor()).failure).toBeInstanceOf(StateError);
  });
});
