/**
 * Tests for the Database connection object against the in-process engine
 */

import { Database } from '../database';
import { MemoryEngine, type MemoryEngineOptions } from '../engine/memory/engine';
import { LockTable } from '../engine/memory/locks';
import { RoutineRegistry, type RoutineArgument } from '../engine/memory/routines';
import { toNumber } from '../engine/memory/numeric';
import type { BridgeOptions } from '../config';
import { EncodingError, EngineError, ErrorCode, InterruptError, StateError, ValidationError } from '../errors';
import { settle, thrown } from './helpers';

function openDatabase(engine: MemoryEngine = new MemoryEngine(), options: BridgeOptions = {}): Database {
  const db = new Database(engine, {}, {});
  db.open(options);
  return db;
}

function engineWith(options: MemoryEngineOptions): MemoryEngine {
  return new MemoryEngine(options);
}

function asNumber(arg: RoutineArgument): number {
  return typeof arg === 'string' ? toNumber(arg) : toNumber(arg.get() ?? '');
}

function mathRoutines(): RoutineRegistry {
  return new RoutineRegistry().define('math', () => ({
    add: (a, b) => asNumber(a) + asNumber(b),
    double: (target) => {
      if (typeof target !== 'string') {
        target.set(asNumber(target) * 2);
      }
    },
  }));
}

describe('Database lifecycle', () => {
  it('should negotiate capabilities on open', () => {
    const db = new Database(engineWith({ release: '1.34' }), {}, {});

    expect(db.open()).toEqual({ ok: true, product: 'YottaDB', release: '1.34', reverseQuery: true });
    expect(db.isOpen()).toBe(true);
    expect(db.engine).toEqual({ product: 'YottaDB', release: '1.34', reverseQuery: true });
  });

  it('should detect GT.M from the missing release intrinsic', () => {
    const db = new Database(engineWith({ product: 'GT.M' }), {}, {});

    expect(db.open()).toEqual({ ok: true, product: 'GT.M', release: '6.3-011', reverseQuery: false });
  });

  it('should pass the debug level to the engine', () => {
    const engine = new MemoryEngine();
    openDatabase(engine, { debug: 'medium' });
    expect(engine.debugLevel).toBe(2);
  });

  it('should refuse operations before open', () => {
    const db = new Database(new MemoryEngine(), {}, {});
    const error = thrown(() => db.get({ global: 'x' }));

    expect(error).toBeInstanceOf(StateError);
    expect(error).toMatchObject({
      code: ErrorCode.STATE_NOT_OPEN,
      message: "Cannot run 'get': the database is not open",
    });
  });

  it('should refuse a second open', () => {
    const db = openDatabase();
    expect(() => db.open()).toThrow('The database is already open');
  });

  it('should not reopen after close', () => {
    const engine = new MemoryEngine();
    const db = openDatabase(engine);
    db.close();

    expect(db.connectionState).toBe('closed');
    expect(thrown(() => db.get({ global: 'x' }))).toMatchObject({ code: ErrorCode.STATE_CLOSED });
    expect(() => db.open()).toThrow("Cannot run 'open': the database connection is closed and cannot be reopened");
  });

  it('should release the engine when closed', () => {
    const locks = new LockTable();
    const engine = engineWith({ locks, processId: 7 });
    const db = openDatabase(engine);
    db.lock({ global: 'job' });
    db.close();

    expect(locks.levelOf(7, ['^job'])).toBe(0);
  });

  it('should read mode from the environment', () => {
    const db = new Database(new MemoryEngine(), {}, { MBRIDGE_MODE: 'strict' });
    expect(db.settings.mode).toBe('strict');
  });

  it('should change settings on an open connection', () => {
    const engine = new MemoryEngine();
    const db = openDatabase(engine);

    expect(db.configure({ mode: 'strict', debug: 'high' })).toMatchObject({ mode: 'strict', debug: 'high' });
    expect(engine.debugLevel).toBe(3);
    expect(db.settings.mode).toBe('strict');
  });
});

describe('Database version and help', () => {
  it('should report the client version, and the engine once open', () => {
    const db = new Database(engineWith({ release: '1.34' }), {}, {});
    expect(db.version()).toBe('mbridge: Version: 0.1.0');

    db.open();
    expect(db.version()).toBe('mbridge: Version: 0.1.0; YottaDB Version: 1.34');
  });

  it('should report GT.M versions', () => {
    const db = openDatabase(engineWith({ product: 'GT.M' }));
    expect(db.version()).toBe('mbridge: Version: 0.1.0; GT.M Version: 6.3-011');
  });

  it('should describe methods', () => {
    const db = new Database(new MemoryEngine(), {}, {});

    expect(db.help()).toContain('Available methods:');
    expect(db.help('nosuch')).toMatch(/^No help for 'nosuch'\. Available methods:/);
  });
});

describe('Database data access', () => {
  let db: Database;

  beforeEach(() => {
    db = openDatabase();
  });

  it('should read an undefined node as an empty string', () => {
    expect(db.get({ global: 'x' })).toEqual({ defined: 0, data: '' });
  });

  it('should store numeric strings as numbers', () => {
    expect(db.set({ global: 'x', subscripts: [1], data: '42' })).toEqual({});
    expect(db.get({ global: 'x', subscripts: [1] })).toEqual({ defined: 1, data: 42 });
  });

  it('should keep the leading zero of fractions', () => {
    db.set({ global: 'x', data: 0.5 });
    db.set({ global: 'y', data: -0.25 });

    expect(db.get({ global: 'x' })).toEqual({ defined: 1, data: 0.5 });
    expect(db.get({ global: 'y' })).toEqual({ defined: 1, data: -0.25 });
  });

  it('should keep long digit strings as strings', () => {
    db.set({ global: 'x', data: '123456789012345678' });
    expect(db.get({ global: 'x' })).toEqual({ defined: 1, data: '123456789012345678' });
  });

  it('should round-trip quotes and control characters', () => {
    db.set({ local: 'msg', data: 'say "hi"\n' });
    expect(db.get({ local: 'msg' })).toEqual({ defined: 1, data: 'say "hi"\n' });
  });

  it('should store null and undefined as the empty string', () => {
    db.set({ global: 'x', data: null });
    expect(db.get({ global: 'x' })).toEqual({ defined: 1, data: '' });
  });

  it('should accept subscripts past the indirection limit', () => {
    const long = 'k'.repeat(9000);
    db.set({ global: 'big', subscripts: [long, 'q"uote'], data: 'v' });

    expect(db.get({ global: 'big', subscripts: [long, 'q"uote'] })).toEqual({ defined: 1, data: 'v' });
    expect(db.order({ global: 'big', subscripts: [''] })).toEqual({ result: long });
  });

  it('should report $data flags', () => {
    db.set({ global: 'x', data: 1 });
    db.set({ global: 'x', subscripts: ['a'], data: 2 });

    expect(db.data({ global: 'x' })).toEqual({ defined: 11 });
    expect(db.data({ global: '^x', subscripts: ['a'] })).toEqual({ defined: 1 });
    expect(db.data({ global: 'x', subscripts: ['b'] })).toEqual({ defined: 0 });
  });

  it('should kill nodes, values only, or every local', () => {
    db.set({ global: 'x', data: 1 });
    db.set({ global: 'x', subscripts: [1], data: 2 });
    db.set({ local: 'tmp', data: 3 });

    db.kill({ global: 'x', nodeOnly: true });
    expect(db.data({ global: 'x' })).toEqual({ defined: 10 });
    db.kill({ global: 'x' });
    expect(db.data({ global: 'x' })).toEqual({ defined: 0 });
    db.kill();
    expect(db.localDirectory()).toEqual([]);
  });

  it('should walk siblings', () => {
    for (const key of [1, 2, 'a']) {
      db.set({ global: 'x', subscripts: [key], data: key });
    }

    expect(db.order({ global: 'x', subscripts: [''] })).toEqual({ result: 1 });
    expect(db.order({ global: 'x', subscripts: [2] })).toEqual({ result: 'a' });
    expect(db.order({ global: 'x', subscripts: ['a'] })).toEqual({ result: '' });
    expect(db.previous({ global: 'x', subscripts: [''] })).toEqual({ result: 'a' });
  });

  it('should skip a stored empty subscript when walking siblings', () => {
    db.set({ global: 'x', subscripts: [''], data: 'empty' });
    db.set({ global: 'x', subscripts: ['a'], data: 'v' });

    expect(db.order({ global: 'x', subscripts: [''] })).toEqual({ result: 'a' });
    expect(db.previous({ global: 'x', subscripts: ['a'] })).toEqual({ result: '' });
  });

  it('should walk nodes in both directions', () => {
    db.set({ global: 'x', subscripts: [1], data: 'a' });
    db.set({ global: 'x', subscripts: [1, 'b'], data: 'c' });

    expect(db.nextNode({ global: 'x' })).toEqual({ defined: 1, data: 'a', subscripts: [1] });
    expect(db.nextNode({ global: 'x', subscripts: [1] })).toEqual({ defined: 1, data: 'c', subscripts: [1, 'b'] });
    expect(db.nextNode({ global: 'x', subscripts: [1, 'b'] })).toEqual({ defined: 0 });
    expect(db.previousNode({ global: 'x', subscripts: [1, 'b'] })).toEqual({ defined: 1, data: 'a', subscripts: [1] });
  });

  it('should increment', () => {
    expect(db.increment({ global: 'n' })).toEqual({ data: 1 });
    expect(db.increment({ global: 'n', increment: 0.5 })).toEqual({ data: 1.5 });
  });

  it('should merge trees and refuse overlapping ones', () => {
    db.set({ global: 'src', subscripts: [1], data: 'a' });
    db.set({ global: 'src', subscripts: [1, 2], data: 'b' });

    expect(db.merge({ to: { global: 'dst' }, from: { global: 'src', subscripts: [1] } })).toEqual({});
    expect(db.get({ global: 'dst' })).toEqual({ defined: 1, data: 'a' });
    expect(db.get({ global: 'dst', subscripts: [2] })).toEqual({ defined: 1, data: 'b' });

    const error = thrown(() => db.merge({ to: { global: 'src', subscripts: [1, 2] }, from: { global: 'src', subscripts: [1] } }));
    expect(error).toBeInstanceOf(EngineError);
    expect(error).toMatchObject({ mnemonic: 'MERGEDESC' });
  });

  it('should list global and local names', () => {
    for (const name of ['a', 'b', 'c']) {
      db.set({ global: name, data: 1 });
    }
    db.set({ local: 'v', data: 1 });

    expect(db.globalDirectory()).toEqual(['a', 'b', 'c']);
    expect(db.globalDirectory({ max: 2 })).toEqual(['a', 'b']);
    expect(db.globalDirectory({ lo: '^b' })).toEqual(['b', 'c']);
    expect(db.globalDirectory({ lo: 'b', hi: 'b' })).toEqual(['b']);
    expect(db.localDirectory()).toEqual(['v']);
  });

  it('should read and write intrinsic variables', () => {
    expect(db.get({ local: '$ZGBLDIR' })).toEqual({ defined: 1, data: 'mumps.gld' });

    db.set({ local: '$zgbldir', data: 'other.gld' });
    expect(db.get({ local: '$ZGBLDIR' })).toEqual({ defined: 1, data: 'other.gld' });
    expect(() => db.data({ local: '$ZGBLDIR' })).toThrow(ValidationError);
  });

  it('should surface engine errors with their status', () => {
    const error = thrown(() => db.set({ local: '$JOB', data: 1 }));

    expect(error).toBeInstanceOf(EngineError);
    expect(error).toMatchObject({
      status: 150373082,
      mnemonic: 'SVNOSET',
      message: 'call^%mbrEngine,%YDB-E-SVNOSET, Cannot SET this special variable: $JOB',
    });
  });

  it('should reject an unknown per-call mode', () => {
    db.set({ global: 'x', data: 5 });
    const error = thrown(() => Reflect.apply(db.get, db, [{ global: 'x', mode: 'bogus' }]));

    expect(error).toBeInstanceOf(ValidationError);
    expect(error).toMatchObject({ message: "Invalid value 'bogus' for option 'mode'. Allowed: canonical, strict" });
  });

  it('should refuse characters the m charset cannot hold', () => {
    const m = openDatabase(engineWith({ charset: 'm' }), { charset: 'm' });
    const error = thrown(() => m.set({ global: 'x', data: 'a€b' }));

    expect(error).toBeInstanceOf(EncodingError);
    expect(error).toMatchObject({
      code: ErrorCode.ENCODING_INVALID_TOKEN,
      message: "Invalid token 'a€b': U+20AC at index 1 is outside the m charset",
    });
    expect(m.data({ global: 'x' })).toEqual({ defined: 0 });
    expect(m.set({ global: 'x', data: 'café' })).toEqual({});
    expect(m.get({ global: 'x' })).toEqual({ defined: 1, data: 'café' });
  });

  it('should validate input before reaching the engine', () => {
    expect(() => Reflect.apply(db.set, db, [{ global: 'x' }])).toThrow("Missing required field 'data' for set");
    expect(() => db.get({ global: 'x(1)' })).toThrow(ValidationError);
    expect(() => db.get({ local: '%mbrArgs' })).toThrow(ValidationError);
  });
});

describe('Database interrupts', () => {
  it('should fail the interrupted call and carry on', () => {
    const engine = new MemoryEngine();
    const db = openDatabase(engine);
    engine.interrupt();

    const error = thrown(() => db.get({ global: 'x' }));
    expect(error).toBeInstanceOf(InterruptError);
    expect(error).toMatchObject({ code: ErrorCode.ENGINE_INTERRUPTED, status: 150372987 });
    expect(db.get({ global: 'x' })).toEqual({ defined: 0, data: '' });
  });
});

describe('Database previousNode support', () => {
  it('should answer without calling the engine on GT.M', () => {
    const db = openDatabase(engineWith({ product: 'GT.M' }));

    expect(db.previousNode({ global: 'x', subscripts: [2] })).toEqual({
      ok: false,
      status: 'previous_node not yet implemented',
    });
  });

  it('should treat releases before 1.10 as unsupported', () => {
    const db = openDatabase(engineWith({ release: '1.9' }));

    expect(db.engine?.reverseQuery).toBe(false);
    expect(db.previousNode({ global: 'x', mode: 'strict' })).toEqual({
      ok: 0,
      status: 'previous_node not yet implemented',
    });
  });

  it('should answer unsupported calls through the callback', async () => {
    const db = openDatabase(engineWith({ product: 'GT.M' }));

    await expect(settle((callback) => db.previousNode({ global: 'x' }, callback))).resolves.toEqual({
      ok: false,
      status: 'previous_node not yet implemented',
    });
  });
});

describe('Database strict mode', () => {
  let db: Database;

  beforeEach(() => {
    db = openDatabase(new MemoryEngine(), { mode: 'strict' });
  });

  it('should annotate results with the call', () => {
    expect(db.set({ global: 'x', subscripts: [1], data: 42 })).toEqual({
      ok: 1,
      global: 'x',
      subscripts: [1],
      data: 42,
      result: 0,
    });
    expect(db.get({ global: 'x', subscripts: [1] })).toEqual({
      ok: 1,
      global: 'x',
      subscripts: [1],
      defined: 1,
      data: '42',
    });
  });

  it('should replace the last subscript with the sibling found', () => {
    db.set({ global: 'x', subscripts: [1], data: 'a' });
    db.set({ global: 'x', subscripts: [2], data: 'b' });

    expect(db.order({ global: 'x', subscripts: [1] })).toEqual({
      ok: 1,
      global: 'x',
      subscripts: ['2'],
      result: '2',
    });
  });

  it('should annotate merges and calls without a target', () => {
    expect(db.merge({ to: { global: 'b' }, from: { local: 'a', subscripts: [1] } })).toEqual({
      ok: 1,
      to: { global: 'b' },
      from: { local: 'a', subscripts: [1] },
      result: 0,
    });
    expect(db.unlock()).toEqual({ ok: 1, result: 0 });
  });

  it('should let a call fall back to canonical mode', () => {
    db.set({ global: 'x', data: 7 });
    expect(db.get({ global: 'x', mode: 'canonical' })).toEqual({ defined: 1, data: 7 });
  });
});

describe('Database routine calls', () => {
  it('should pass values, variables and references', () => {
    const db = openDatabase(engineWith({ routines: mathRoutines() }));
    db.set({ local: 'n', data: 21 });

    expect(db.function({ function: 'add^math', arguments: [1, 0.5] })).toEqual({ result: 1.5 });
    expect(db.function({ function: 'add^math', arguments: [{ type: 'variable', value: 'n' }, 2] })).toEqual({
      result: 23,
    });
    expect(db.procedure({ procedure: 'double^math', arguments: [{ type: 'reference', value: 'n' }] })).toEqual({});
    expect(db.get({ local: 'n' })).toEqual({ defined: 1, data: 42 });
  });

  it('should annotate calls in strict mode', () => {
    const db = openDatabase(engineWith({ routines: mathRoutines() }), { mode: 'strict' });

    expect(db.function({ function: 'add^math', arguments: ['1', '2'] })).toEqual({
      ok: 1,
      function: 'add^math',
      arguments: ['1', '2'],
      result: '3',
    });
  });

  it('should relink when asked', () => {
    let generation = 0;
    const routines = new RoutineRegistry().define('gen', () => {
      generation += 1;
      const linked = generation;
      return { gen: () => linked };
    });
    const db = openDatabase(engineWith({ routines }));

    expect(db.function({ function: 'gen' })).toEqual({ result: 1 });
    expect(db.function({ function: '^gen' })).toEqual({ result: 1 });
    expect(db.function({ function: 'gen', autoRelink: true })).toEqual({ result: 2 });
    expect(routines.linkCount('gen')).toBe(2);
  });

  it('should report missing labels', () => {
    const db = openDatabase(engineWith({ routines: mathRoutines() }));
    expect(thrown(() => db.function({ function: 'math' }))).toMatchObject({ mnemonic: 'LABELMISSING' });
  });
});

describe('Database locks', () => {
  it('should share locks between connections on one lock table', () => {
    const locks = new LockTable();
    const first = openDatabase(engineWith({ locks, processId: 1 }));
    const second = openDatabase(engineWith({ locks, processId: 2 }));
    const account = { global: 'acct', subscripts: [1] };

    expect(first.lock(account)).toEqual({ result: 1 });
    expect(first.lock(account)).toEqual({ result: 1 });
    expect(second.lock({ ...account, timeout: 0 })).toEqual({ result: 0 });
    expect(thrown(() => second.lock(account))).toMatchObject({ mnemonic: 'LOCKWAIT' });

    first.unlock(account);
    expect(second.lock({ ...account, timeout: 0 })).toEqual({ result: 0 });
    first.unlock();
    expect(second.lock({ ...account, timeout: 0 })).toEqual({ result: 1 });
  });

  it('should reject invalid timeouts', () => {
    const db = openDatabase();
    expect(() => db.lock({ global: 'x', timeout: -2 })).toThrow(
      'lock: timeout must be -1 or a non-negative number of seconds'
    );
  });
});

describe('Database callback form', () => {
  it('should return at once and call back on a later turn', async () => {
    const db = openDatabase();
    db.set({ global: 'x', data: 'v' });
    const seen: string[] = [];

    const pending = settle((callback) =>
      db.get({ global: 'x' }, (error, result) => {
        seen.push('callback');
        callback(error, result);
      })
    );
    seen.push('returned');

    await expect(pending).resolves.toEqual({ defined: 1, data: 'v' });
    expect(seen).toEqual(['returned', 'callback']);
  });

  it('should pass engine errors to the callback', async () => {
    const db = openDatabase(engineWith({ routines: mathRoutines() }));

    await expect(settle((callback) => db.function({ function: '^missing' }, callback))).rejects.toMatchObject({
      mnemonic: 'ZLINKFILE',
    });
  });

  it('should throw validation errors synchronously', () => {
    const db = openDatabase();
    const callback = jest.fn();

    expect(() => db.get({ global: '' }, callback)).toThrow(ValidationError);
    expect(callback).not.toHaveBeenCalled();
  });

  it('should run the callback on its own tick, outside the promise chain', async () => {
    const db = openDatabase();
    db.set({ global: 'x', data: 'v' });
    const scheduled: Array<() => void> = [];
    const nextTick = jest.spyOn(process, 'nextTick').mockImplementation((callback, ...args) => {
      scheduled.push(() => Reflect.apply(callback, undefined, args));
    });
    const received: unknown[] = [];

    try {
      db.get({ global: 'x' }, (error, result) => {
        received.push(error, result);
        throw new Error('callback failed');
      });
      await new Promise((resolve) => setImmediate(resolve));
    } finally {
      nextTick.mockRestore();
    }

    expect(received).toEqual([]);
    expect(scheduled).toHaveLength(1);
    expect(() => scheduled[0]()).toThrow('callback failed');
    expect(received).toEqual([null, { defined: 1, data: 'v' }]);
  });

  it('should fail queued calls when the connection closes', async () => {
    const db = openDatabase();
    const pending = settle((callback) => db.get({ global: 'x' }, callback));
    db.close();

    await expect(pending).rejects.toMatchObject({ code: ErrorCode.STATE_CLOSED });
  });
});
