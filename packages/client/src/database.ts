/**
 * Database
 *
 * The connection object callers use. Every operation validates its input
 * into a typed command, runs it through the dispatcher as a call
 * descriptor and shapes the engine's reply into a result object.
 *
 * Each operation has two forms: called without a callback it runs on the
 * caller's stack and returns the result (or throws); called with an
 * error-first callback it returns at once and the callback runs on a later
 * turn of the event loop. Input validation throws synchronously in both
 * forms.
 *
 * @example
 * ```typescript
 * const db = new Database(new MemoryEngine());
 * db.open({ mode: 'canonical' });
 * db.set({ global: 'orders', subscripts: [1, 'total'], data: 42 });
 * db.get({ global: 'orders', subscripts: [1, 'total'] }); // { defined: 1, data: 42 }
 * db.close();
 * ```
 */

import { CLIENT_NAME, CLIENT_VERSION, STATUS_INVALID_INTRINSIC } from './constants';
import { debugRank, parseMode, resolveConfig, type BridgeConfig, type BridgeOptions } from './config';
import type { EngineChannel, EngineEntry } from './engine/channel';
import { EngineError, StateError, ValidationError } from './errors';
import { helpText } from './help';
import {
  toDirectoryFilter,
  toIncrement,
  toNodeSpec,
  toOptionalNodeSpec,
  toRoutineCall,
  toTimeout,
  type CallInput,
  type DirectoryInput,
  type FunctionInput,
  type IncrementInput,
  type KillInput,
  type LockInput,
  type MergeInput,
  type NodeInput,
  type ProcedureInput,
  type SetInput,
} from './input';
import { createLogger, Tracer } from './logger';
import { describeEngine, negotiate, type Capabilities } from './runtime/capabilities';
import { CallDescriptor } from './runtime/descriptor';
import { Dispatcher } from './runtime/dispatcher';
import { gateFor, type CallGate } from './runtime/gate';
import {
  OPERATIONS,
  readReply,
  type CallContext,
  type CommandMap,
  type Operation,
  type ResultMap,
} from './runtime/operations';
import { annotation, unsupportedPreviousNode, type Annotation, type UnsupportedResult } from './runtime/results';

/**
 * Error-first callback of the asynchronous form.
 */
export type Callback<T> = (error: Error | null, result?: T) => void;

/**
 * A canonical result, or the same result with the strict-mode annotation.
 */
export type Annotated<T> = T | (T & Annotation);

export type ConnectionState = 'not-open' | 'open' | 'closed';

/**
 * What `open()` reports about the engine behind the channel.
 */
export interface OpenResult {
  ok: true;
  product: Capabilities['product'];
  release: string;
  reverseQuery: boolean;
}

type AnnotatedOperation = Exclude<Operation, 'globalDirectory' | 'localDirectory' | 'version' | 'release'>;

type Shape<K extends Operation, R> = (result: ResultMap[K], context: CallContext) => R;

export class Database {
  private state: ConnectionState = 'not-open';
  private config: BridgeConfig;
  private readonly tracer: Tracer;
  private readonly gate: CallGate;
  private dispatcher: Dispatcher | undefined;
  private capabilities: Capabilities | undefined;

  /**
   * @param channel - the engine channel; connections over the same channel
   * object share one call gate
   * @param env - environment consulted for `MBRIDGE_*` overrides
   */
  constructor(
    private readonly channel: EngineChannel,
    options: BridgeOptions = {},
    private readonly env: NodeJS.ProcessEnv = process.env
  ) {
    this.config = resolveConfig(options, env);
    this.tracer = new Tracer(this.config.debug, createLogger('mbridge'));
    this.gate = gateFor(channel);
  }

  get connectionState(): ConnectionState {
    return this.state;
  }

  /**
   * Effective configuration.
   */
  get settings(): Readonly<BridgeConfig> {
    return this.config;
  }

  /**
   * Engine capabilities, known once the database is open.
   */
  get engine(): Readonly<Capabilities> | undefined {
    return this.capabilities;
  }

  isOpen(): boolean {
    return this.state === 'open';
  }

  /**
   * Opens the connection and negotiates engine capabilities.
   *
   * @throws StateError when already open or closed
   */
  open(options: BridgeOptions = {}): OpenResult {
    if (this.state === 'closed') {
      throw StateError.closed('open');
    }
    if (this.state === 'open') {
      throw StateError.alreadyOpen();
    }
    this.config = resolveConfig(options, this.env, this.config);
    this.tracer.setLevel(this.config.debug);
    const dispatcher = new Dispatcher(this.channel, this.gate, this.tracer, this.config.poolSize);
    this.dispatcher = dispatcher;
    this.state = 'open';

    let capabilities: Capabilities;
    try {
      this.engineCall('debug', [String(debugRank(this.config.debug))]);
      const zversion = this.engineCall('version', [])[0] ?? '';
      capabilities = negotiate(zversion, this.queryRelease());
    } catch (error) {
      dispatcher.shutdown();
      this.dispatcher = undefined;
      this.state = 'not-open';
      throw error;
    }
    this.capabilities = capabilities;
    this.tracer.low(`[database] open: ${describeEngine(capabilities)}, reverse $query ${capabilities.reverseQuery}`);
    return {
      ok: true,
      product: capabilities.product,
      release: capabilities.release,
      reverseQuery: capabilities.reverseQuery,
    };
  }

  /**
   * Closes the connection. Asynchronous calls still queued fail with a
   * StateError. A closed database cannot be reopened.
   */
  close(): void {
    if (this.state !== 'open') {
      this.state = 'closed';
      return;
    }
    const abandoned = this.dispatcher?.shutdown() ?? 0;
    if (abandoned > 0) {
      this.tracer.warn(`[database] closed with ${abandoned} queued call(s) abandoned`);
    }
    this.channel.close?.();
    this.dispatcher = undefined;
    this.state = 'closed';
    this.tracer.low('[database] closed');
  }

  /**
   * Changes settings on an open connection; returns the effective ones.
   */
  configure(options: BridgeOptions = {}): BridgeConfig {
    this.requireOpen('configure');
    const previous = this.config.debug;
    this.config = resolveConfig(options, {}, this.config);
    this.tracer.setLevel(this.config.debug);
    this.dispatcher?.resize(this.config.poolSize);
    if (previous !== this.config.debug) {
      this.engineCall('debug', [String(debugRank(this.config.debug))]);
    }
    return { ...this.config };
  }

  /**
   * `mbridge: Version: 0.1.0`, followed by the engine's version once open.
   */
  version(): string {
    const client = `${CLIENT_NAME}: Version: ${CLIENT_VERSION}`;
    if (!this.capabilities || this.state !== 'open') {
      return client;
    }
    return `${client}; ${describeEngine(this.capabilities)}`;
  }

  help(topic?: string): string {
    return helpText(topic);
  }

  /**
   * Whether a node exists: 0, 1 (value only), 10 (descendants only) or 11.
   */
  data(input: NodeInput): Annotated<ResultMap['data']>;
  data(input: NodeInput, callback: Callback<Annotated<ResultMap['data']>>): void;
  data(input: NodeInput, callback?: Callback<Annotated<ResultMap['data']>>): Annotated<ResultMap['data']> | void {
    const command = { node: toNodeSpec(input, 'data') };
    return this.perform('data', command, input, this.annotated('data', command), callback);
  }

  /**
   * Reads a node, or an intrinsic variable such as `{ local: '$ZGBLDIR' }`.
   * An undefined node gives `{ defined: 0, data: '' }`.
   */
  get(input: NodeInput): Annotated<ResultMap['get']>;
  get(input: NodeInput, callback: Callback<Annotated<ResultMap['get']>>): void;
  get(input: NodeInput, callback?: Callback<Annotated<ResultMap['get']>>): Annotated<ResultMap['get']> | void {
    const command = { node: toNodeSpec(input, 'get', true) };
    return this.perform('get', command, input, this.annotated('get', command), callback);
  }

  set(input: SetInput): Annotated<ResultMap['set']>;
  set(input: SetInput, callback: Callback<Annotated<ResultMap['set']>>): void;
  set(input: SetInput, callback?: Callback<Annotated<ResultMap['set']>>): Annotated<ResultMap['set']> | void {
    if (!('data' in input)) {
      throw ValidationError.requiredField('data', 'set');
    }
    const command = { node: toNodeSpec(input, 'set', true), data: input.data };
    return this.perform('set', command, input, this.annotated('set', command), callback);
  }

  /**
   * Removes a node and its descendants, or only its value with
   * `nodeOnly`. Without a name, removes every local variable.
   */
  kill(input?: KillInput | CallInput): Annotated<ResultMap['kill']>;
  kill(input: KillInput | CallInput | undefined, callback: Callback<Annotated<ResultMap['kill']>>): void;
  kill(
    input: KillInput | CallInput = {},
    callback?: Callback<Annotated<ResultMap['kill']>>
  ): Annotated<ResultMap['kill']> | void {
    const nodeOnly = 'nodeOnly' in input && input.nodeOnly === true;
    const command = { node: toOptionalNodeSpec(input, 'kill'), nodeOnly };
    return this.perform('kill', command, input, this.annotated('kill', command), callback);
  }

  /**
   * Copies the tree under `from` over `to`.
   */
  merge(input: MergeInput): Annotated<ResultMap['merge']>;
  merge(input: MergeInput, callback: Callback<Annotated<ResultMap['merge']>>): void;
  merge(input: MergeInput, callback?: Callback<Annotated<ResultMap['merge']>>): Annotated<ResultMap['merge']> | void {
    const command = { to: toNodeSpec(input.to, 'merge'), from: toNodeSpec(input.from, 'merge') };
    return this.perform('merge', command, input, this.annotated('merge', command), callback);
  }

  /**
   * Next sibling subscript in collation order; `''` when there is none.
   * Without subscripts, the next variable name.
   */
  order(input: NodeInput): Annotated<ResultMap['order']>;
  order(input: NodeInput, callback: Callback<Annotated<ResultMap['order']>>): void;
  order(input: NodeInput, callback?: Callback<Annotated<ResultMap['order']>>): Annotated<ResultMap['order']> | void {
    const command = { node: toNodeSpec(input, 'order') };
    return this.perform('order', command, input, this.annotated('order', command), callback);
  }

  previous(input: NodeInput): Annotated<ResultMap['previous']>;
  previous(input: NodeInput, callback: Callback<Annotated<ResultMap['previous']>>): void;
  previous(
    input: NodeInput,
    callback?: Callback<Annotated<ResultMap['previous']>>
  ): Annotated<ResultMap['previous']> | void {
    const command = { node: toNodeSpec(input, 'previous') };
    return this.perform('previous', command, input, this.annotated('previous', command), callback);
  }

  /**
   * Next node holding a value, in depth-first order.
   */
  nextNode(input: NodeInput): Annotated<ResultMap['nextNode']>;
  nextNode(input: NodeInput, callback: Callback<Annotated<ResultMap['nextNode']>>): void;
  nextNode(
    input: NodeInput,
    callback?: Callback<Annotated<ResultMap['nextNode']>>
  ): Annotated<ResultMap['nextNode']> | void {
    const command = { node: toNodeSpec(input, 'nextNode') };
    return this.perform('nextNode', command, input, this.annotated('nextNode', command), callback);
  }

  /**
   * Previous node holding a value. Engines without reverse `$query` get a
   * `{ ok: false, status }` result instead of an engine call.
   */
  previousNode(input: NodeInput): Annotated<ResultMap['previousNode']> | UnsupportedResult;
  previousNode(
    input: NodeInput,
    callback: Callback<Annotated<ResultMap['previousNode']> | UnsupportedResult>
  ): void;
  previousNode(
    input: NodeInput,
    callback?: Callback<Annotated<ResultMap['previousNode']> | UnsupportedResult>
  ): Annotated<ResultMap['previousNode']> | UnsupportedResult | void {
    const command = { node: toNodeSpec(input, 'previousNode') };
    this.requireOpen('previousNode');
    if (this.capabilities && !this.capabilities.reverseQuery) {
      const result = unsupportedPreviousNode(this.context(input).mode);
      this.tracer.low(`[database] previousNode: ${result.status} on ${describeEngine(this.capabilities)}`);
      if (!callback) {
        return result;
      }
      setImmediate(() => callback(null, result));
      return;
    }
    return this.perform('previousNode', command, input, this.annotated('previousNode', command), callback);
  }

  /**
   * Adds `increment` (default 1) to a node and returns the new value.
   */
  increment(input: IncrementInput): Annotated<ResultMap['increment']>;
  increment(input: IncrementInput, callback: Callback<Annotated<ResultMap['increment']>>): void;
  increment(
    input: IncrementInput,
    callback?: Callback<Annotated<ResultMap['increment']>>
  ): Annotated<ResultMap['increment']> | void {
    const command = { node: toNodeSpec(input, 'increment'), increment: toIncrement(input.increment) };
    return this.perform('increment', command, input, this.annotated('increment', command), callback);
  }

  /**
   * Adds an incremental lock; `result` is 1 when granted.
   */
  lock(input: LockInput): Annotated<ResultMap['lock']>;
  lock(input: LockInput, callback: Callback<Annotated<ResultMap['lock']>>): void;
  lock(input: LockInput, callback?: Callback<Annotated<ResultMap['lock']>>): Annotated<ResultMap['lock']> | void {
    const command = { node: toNodeSpec(input, 'lock'), timeout: toTimeout(input.timeout) };
    return this.perform('lock', command, input, this.annotated('lock', command), callback);
  }

  /**
   * Removes one incremental lock level, or every lock without a name.
   */
  unlock(input?: NodeInput | CallInput): Annotated<ResultMap['unlock']>;
  unlock(input: NodeInput | CallInput | undefined, callback: Callback<Annotated<ResultMap['unlock']>>): void;
  unlock(
    input: NodeInput | CallInput = {},
    callback?: Callback<Annotated<ResultMap['unlock']>>
  ): Annotated<ResultMap['unlock']> | void {
    const command = { node: toOptionalNodeSpec(input, 'unlock') };
    return this.perform('unlock', command, input, this.annotated('unlock', command), callback);
  }

  /**
   * Calls an extrinsic function and returns its value.
   */
  function(input: FunctionInput): Annotated<ResultMap['function']>;
  function(input: FunctionInput, callback: Callback<Annotated<ResultMap['function']>>): void;
  function(
    input: FunctionInput,
    callback?: Callback<Annotated<ResultMap['function']>>
  ): Annotated<ResultMap['function']> | void {
    const relink = input.autoRelink ?? this.config.autoRelink;
    const command = toRoutineCall(input.function, input.arguments, relink, 'function');
    return this.perform('function', command, input, this.annotated('function', command), callback);
  }

  /**
   * Calls a routine for its side effects.
   */
  procedure(input: ProcedureInput): Annotated<ResultMap['procedure']>;
  procedure(input: ProcedureInput, callback: Callback<Annotated<ResultMap['procedure']>>): void;
  procedure(
    input: ProcedureInput,
    callback?: Callback<Annotated<ResultMap['procedure']>>
  ): Annotated<ResultMap['procedure']> | void {
    const relink = input.autoRelink ?? this.config.autoRelink;
    const command = toRoutineCall(input.procedure, input.arguments, relink, 'procedure');
    return this.perform('procedure', command, input, this.annotated('procedure', command), callback);
  }

  /**
   * Global names (without `^`) between `lo` and `hi`, at most `max` of them.
   */
  globalDirectory(input?: DirectoryInput): string[];
  globalDirectory(input: DirectoryInput | undefined, callback: Callback<string[]>): void;
  globalDirectory(input: DirectoryInput = {}, callback?: Callback<string[]>): string[] | void {
    const command = toDirectoryFilter(input, 'globalDirectory');
    return this.perform('globalDirectory', command, input, (names) => names, callback);
  }

  localDirectory(input?: DirectoryInput): string[];
  localDirectory(input: DirectoryInput | undefined, callback: Callback<string[]>): void;
  localDirectory(input: DirectoryInput = {}, callback?: Callback<string[]>): string[] | void {
    const command = toDirectoryFilter(input, 'localDirectory');
    return this.perform('localDirectory', command, input, (names) => names, callback);
  }

  private requireOpen(operation: string): Dispatcher {
    if (this.state === 'closed') {
      throw StateError.closed(operation);
    }
    if (this.state !== 'open' || !this.dispatcher) {
      throw StateError.notOpen(operation);
    }
    return this.dispatcher;
  }

  /**
   * @throws ValidationError for a per-call mode other than `canonical` or `strict`
   */
  private context(input: CallInput): CallContext {
    const mode = input.mode === undefined ? this.config.mode : parseMode(input.mode);
    return { mode, charset: this.config.charset };
  }

  /**
   * Result shaper adding the strict-mode annotation.
   */
  private annotated<K extends AnnotatedOperation>(
    operation: K,
    command: CommandMap[K]
  ): Shape<K, Annotated<ResultMap[K]>> {
    return (result, { mode }) => {
      const extra = mode === 'strict' ? annotation(operation, command, result) : undefined;
      return extra ? { ...extra, ...result } : result;
    };
  }

  private perform<K extends Operation, R>(
    operation: K,
    command: CommandMap[K],
    input: CallInput,
    shape: Shape<K, R>,
    callback?: Callback<R>
  ): R | void {
    const dispatcher = this.requireOpen(operation);
    const context = this.context(input);
    const handler = OPERATIONS[operation];
    const descriptor = new CallDescriptor({
      operation,
      entry: handler.entry,
      args: handler.prepare(command, context),
      mode: context.mode,
      async: callback !== undefined,
      charset: context.charset,
    });

    const finish = (settled: CallDescriptor): R => {
      if (settled.failure) {
        throw settled.failure;
      }
      const values = readReply(settled.result.toString(), context.charset);
      return shape(handler.complete(values, command, context), context);
    };

    if (!callback) {
      return finish(dispatcher.execute(descriptor));
    }

    // Callbacks run outside the submit promise: a throw from one is an
    // uncaught exception.
    const deliver = (settled: CallDescriptor): void => {
      try {
        const result = finish(settled);
        process.nextTick(() => callback(null, result));
      } catch (error) {
        const failure = error instanceof Error ? error : new Error(String(error));
        process.nextTick(() => callback(failure));
      }
    };
    void dispatcher.submit(descriptor).then(deliver);
  }

  /**
   * Runs an engine entry outside the operation table (version probing and
   * trace level) and returns its raw values.
   */
  private engineCall(entry: EngineEntry, args: string[]): string[] {
    const dispatcher = this.requireOpen(entry);
    const descriptor = dispatcher.execute(
      new CallDescriptor({ operation: entry, entry, args, mode: 'canonical', async: false, charset: this.config.charset })
    );
    if (descriptor.failure) {
      throw descriptor.failure;
    }
    return readReply(descriptor.result.toString(), this.config.charset);
  }

  /**
   * `$ZYRELEASE`, or undefined on an engine that does not know it.
   */
  private queryRelease(): string | undefined {
    try {
      return this.engineCall('release', [])[0];
    } catch (error) {
      if (error instanceof EngineError && error.status === STATUS_INVALID_INTRINSIC) {
        return undefined;
      }
      throw error;
    }
  }
}
