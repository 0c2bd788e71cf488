/**
 * MemoryEngine
 *
 * An in-process engine behind the EngineChannel contract: sparse global and
 * local trees, incremental locks, a routine registry and the intrinsic
 * variables the bridge relies on. One instance stands for one engine
 * process; instances created with the same `globals` and `locks` share a
 * database.
 */

import { INDIRECTION_LIMIT, RESERVED_PREFIX, REVERSE_QUERY_RELEASE } from '../../constants';
import { pack, unpack, type Charset } from '../../codec/packer';
import { compareRelease } from '../../runtime/capabilities';
import type { ChannelOutput, EngineChannel, EngineEntry } from '../channel';
import { LockTable } from './locks';
import { formatNumber, toNumber } from './numeric';
import { parseReference, type ParsedReference } from './parser';
import { LocalReference, RoutineRegistry, type RoutineArgument } from './routines';
import { EngineFault } from './status';
import { SparseStore } from './store';

export interface MemoryEngineOptions {
  /**
   * Product the engine reports itself as. GT.M has no release intrinsic.
   */
  product?: 'YottaDB' | 'GT.M';

  /**
   * YottaDB release number, e.g. `1.34`.
   */
  release?: string;

  /**
   * Underlying GT.M version, e.g. `V6.3-011`.
   */
  version?: string;

  /**
   * Character set the engine counts packed lengths in; must match the
   * connection's.
   */
  charset?: Charset;

  processId?: number;
  globals?: SparseStore;
  locks?: LockTable;
  routines?: RoutineRegistry;
  indirectionLimit?: number;
}

interface Target {
  store: SparseStore;
  name: string;
  path: string[];
}

const DAYS_BEFORE_EPOCH = 47117;
const MS_PER_DAY = 86400000;

let nextProcessId = 1000;

export class MemoryEngine implements EngineChannel {
  readonly globals: SparseStore;
  readonly locals = new SparseStore();
  readonly locks: LockTable;
  readonly routines: RoutineRegistry;
  readonly processId: number;
  readonly product: 'YottaDB' | 'GT.M';
  readonly release: string;
  readonly version: string;
  readonly charset: Charset;

  /**
   * Trace level last set through the `debug` entry point.
   */
  debugLevel = 0;

  private readonly indirectionLimit: number;
  private directory: string;
  private globalDirectory = 'mumps.gld';
  private interruptPending = false;
  private closed = false;

  constructor(options: MemoryEngineOptions = {}) {
    this.globals = options.globals ?? new SparseStore();
    this.locks = options.locks ?? new LockTable();
    this.routines = options.routines ?? new RoutineRegistry();
    this.processId = options.processId ?? (nextProcessId += 1);
    this.product = options.product ?? 'YottaDB';
    this.release = options.release ?? '1.34';
    this.version = options.version ?? 'V6.3-011';
    this.charset = options.charset ?? 'utf-8';
    this.indirectionLimit = options.indirectionLimit ?? INDIRECTION_LIMIT;
    this.directory = process.cwd();
  }

  /**
   * Raises an interrupt. The call executing when it arrives (or the next
   * call, if none is) completes with the interrupt status instead of its
   * result.
   */
  interrupt(): void {
    this.interruptPending = true;
  }

  close(): void {
    this.locks.releaseAll(this.processId);
    this.closed = true;
  }

  call(entry: EngineEntry, args: readonly string[], result: ChannelOutput, error: ChannelOutput): number {
    try {
      if (this.closed) {
        throw new EngineFault('INVCMD', 'engine process has shut down');
      }
      const values = this.dispatch(entry, args);
      if (this.interruptPending) {
        this.interruptPending = false;
        throw new EngineFault('CTRAP', undefined, `${entry}^%mbrEngine`);
      }
      result.write(pack(values, this.charset));
      return 0;
    } catch (fault) {
      if (fault instanceof EngineFault) {
        error.write(fault.format(this.product === 'GT.M' ? 'GTM' : 'YDB'));
        return fault.status;
      }
      throw fault;
    }
  }

  private dispatch(entry: EngineEntry, args: readonly string[]): string[] {
    switch (entry) {
      case 'data': {
        const target = this.target(this.parse(args[0], args[1]));
        return [String(target.store.data(target.name, target.path))];
      }
      case 'get':
        return this.get(this.parse(args[0], args[1]));
      case 'set':
        this.set(this.parse(args[0], args[1]), args[2] ?? '');
        return [];
      case 'kill':
        this.kill(args[0], args[1], args[2] === '1');
        return [];
      case 'merge':
        this.merge(this.parse(args[0], args[1]), this.parse(args[2], args[3]));
        return [];
      case 'order':
        return [this.order(this.parse(args[0], args[1]), 1)];
      case 'previous':
        return [this.order(this.parse(args[0], args[1]), -1)];
      case 'next_node':
        return this.query(this.parse(args[0], args[1]), 1);
      case 'previous_node':
        if (!this.supportsReverseQuery()) {
          throw new EngineFault(this.product === 'GT.M' ? 'INVSVN' : 'INVCMD', '$query direction argument');
        }
        return this.query(this.parse(args[0], args[1]), -1);
      case 'increment': {
        const target = this.target(this.parse(args[0], args[1]));
        return [target.store.increment(target.name, target.path, toNumber(args[2] ?? '1'))];
      }
      case 'lock':
        return [this.lock(this.parse(args[0], args[1]), toNumber(args[2] ?? '-1')) ? '1' : '0'];
      case 'unlock':
        this.unlock(args[0], args[1]);
        return [];
      case 'function':
        return [this.invoke(this.parse(args[0], args[1]), args[2] === '1')];
      case 'procedure':
        this.invoke(this.parse(args[0], args[1]), args[2] === '1');
        return [];
      case 'global_directory':
        return this.listNames(this.globals.names(), args);
      case 'local_directory':
        return this.listNames(
          this.locals.names().filter((name) => !name.startsWith(RESERVED_PREFIX)),
          args
        );
      case 'version':
        return [this.zversion()];
      case 'release':
        return [this.zyrelease()];
      case 'debug':
        this.debugLevel = toNumber(args[0] ?? '0');
        return [];
    }
  }

  private parse(text: string | undefined, slots: string | undefined): ParsedReference {
    const values = unpack(slots ?? '', { charset: this.charset });
    return parseReference(text ?? '', values, (name) => this.resolveLocal(name), this.indirectionLimit);
  }

  private resolveLocal(name: string): string {
    const value = this.locals.get(name, []);
    if (value === undefined) {
      throw new EngineFault('LVUNDEF', name);
    }
    return value;
  }

  private target(reference: ParsedReference): Target {
    if (reference.kind !== 'global' && reference.kind !== 'local') {
      throw new EngineFault('INVCMD', `${reference.name} is not a variable`);
    }
    const path = reference.args.map((arg) => {
      if (arg.kind !== 'value') {
        throw new EngineFault('INVCMD', `.${arg.name} is not a subscript`);
      }
      return arg.value;
    });
    return reference.kind === 'global'
      ? { store: this.globals, name: reference.name.slice(1), path }
      : { store: this.locals, name: reference.name, path };
  }

  private get(reference: ParsedReference): string[] {
    if (reference.kind === 'intrinsic') {
      return ['1', this.readIntrinsic(reference.name)];
    }
    const target = this.target(reference);
    const value = target.store.get(target.name, target.path);
    return value === undefined ? ['0', ''] : ['1', value];
  }

  private set(reference: ParsedReference, value: string): void {
    if (reference.kind === 'intrinsic') {
      this.writeIntrinsic(reference.name, value);
      return;
    }
    const target = this.target(reference);
    target.store.set(target.name, target.path, value);
  }

  private kill(text: string | undefined, slots: string | undefined, nodeOnly: boolean): void {
    if (!text) {
      this.locals.clear((name) => !name.startsWith(RESERVED_PREFIX));
      return;
    }
    const target = this.target(this.parse(text, slots));
    if (nodeOnly) {
      target.store.killNode(target.name, target.path);
    } else {
      target.store.kill(target.name, target.path);
    }
  }

  private merge(to: ParsedReference, from: ParsedReference): void {
    const destination = this.target(to);
    const source = this.target(from);
    if (destination.store === source.store && destination.name === source.name) {
      const shorter = Math.min(destination.path.length, source.path.length);
      if (destination.path.slice(0, shorter).every((key, index) => key === source.path[index])) {
        throw new EngineFault('MERGEDESC', `${to.name} and ${from.name} overlap`);
      }
    }
    source.store.copyTo(destination.store, destination.name, destination.path, source.name, source.path);
  }

  private order(reference: ParsedReference, direction: 1 | -1): string {
    const target = this.target(reference);
    if (target.path.length > 0) {
      return target.store.order(target.name, target.path, direction);
    }
    const global = reference.kind === 'global';
    const names = target.store.names().filter((name) => global || !name.startsWith(RESERVED_PREFIX));
    const next =
      direction === 1
        ? names.find((name) => name > target.name)
        : [...names].reverse().find((name) => name < target.name);
    if (next === undefined) {
      return '';
    }
    return global ? `^${next}` : next;
  }

  private query(reference: ParsedReference, direction: 1 | -1): string[] {
    const target = this.target(reference);
    const found = target.store.query(target.name, target.path, direction);
    if (!found) {
      return ['0'];
    }
    return ['1', target.store.get(target.name, found) ?? '', ...found];
  }

  private lock(reference: ParsedReference, timeout: number): boolean {
    const target = this.target(reference);
    const resource = [reference.name, ...target.path];
    if (this.locks.tryAcquire(this.processId, resource)) {
      return true;
    }
    if (timeout < 0) {
      throw new EngineFault('LOCKWAIT', reference.name);
    }
    if (timeout > 0) {
      // Nothing else runs on this thread while we wait, so the holder
      // cannot release; wait out the timeout and check once more.
      Atomics.wait(new Int32Array(new SharedArrayBuffer(4)), 0, 0, timeout * 1000);
      return this.locks.tryAcquire(this.processId, resource);
    }
    return false;
  }

  private unlock(text: string | undefined, slots: string | undefined): void {
    if (!text) {
      this.locks.releaseAll(this.processId);
      return;
    }
    const reference = this.parse(text, slots);
    const target = this.target(reference);
    this.locks.release(this.processId, [reference.name, ...target.path]);
  }

  private invoke(reference: ParsedReference, relink: boolean): string {
    if (reference.kind === 'local') {
      throw new EngineFault('LABELMISSING', reference.name);
    }
    if (reference.kind === 'intrinsic') {
      throw new EngineFault('INVCMD', `${reference.name} is not a routine`);
    }
    const code = this.routines.resolve(reference.name, relink);
    const args: RoutineArgument[] = reference.args.map((arg) =>
      arg.kind === 'value' ? arg.value : new LocalReference(this.locals, arg.name)
    );
    let returned: string | number | void;
    try {
      returned = code(...args);
    } catch (error) {
      if (error instanceof EngineFault) {
        throw error;
      }
      const detail = error instanceof Error ? error.message : String(error);
      throw new EngineFault('RTNERROR', detail.slice(0, 512), reference.name);
    }
    if (typeof returned === 'number') {
      return formatNumber(returned);
    }
    return typeof returned === 'string' ? returned : '';
  }

  private listNames(names: string[], args: readonly string[]): string[] {
    const max = toNumber(args[0] ?? '0');
    const lo = args[1] ?? '';
    const hi = args[2] ?? '';
    const selected = names.filter((name) => (lo === '' || name >= lo) && (hi === '' || name <= hi));
    return max > 0 ? selected.slice(0, max) : selected;
  }

  private supportsReverseQuery(): boolean {
    return this.product === 'YottaDB' && compareRelease(this.release, REVERSE_QUERY_RELEASE) >= 0;
  }

  private zversion(): string {
    return `GT.M ${this.version} Linux x86_64`;
  }

  private zyrelease(): string {
    if (this.product === 'GT.M') {
      throw new EngineFault('INVSVN', '$ZYRELEASE');
    }
    return `YottaDB r${this.release} Linux x86_64`;
  }

  private readIntrinsic(name: string): string {
    switch (name.toUpperCase()) {
      case '$ZV':
      case '$ZVERSION':
        return this.zversion();
      case '$ZYRE':
      case '$ZYRELEASE':
        return this.zyrelease();
      case '$J':
      case '$JOB':
        return String(this.processId);
      case '$H':
      case '$HOROLOG': {
        const now = Date.now();
        return `${Math.floor(now / MS_PER_DAY) + DAYS_BEFORE_EPOCH},${Math.floor((now % MS_PER_DAY) / 1000)}`;
      }
      case '$ZD':
      case '$ZDIRECTORY':
        return this.directory;
      case '$ZG':
      case '$ZGBLDIR':
        return this.globalDirectory;
      default:
        throw new EngineFault('INVSVN', name);
    }
  }

  private writeIntrinsic(name: string, value: string): void {
    switch (name.toUpperCase()) {
      case '$ZD':
      case '$ZDIRECTORY':
        this.directory = value;
        return;
      case '$ZG':
      case '$ZGBLDIR':
        this.globalDirectory = value;
        return;
      default:
        this.readIntrinsic(name);
        throw new EngineFault('SVNOSET', name);
    }
  }
}
