/**
 * @mbridge/client - Binding layer between a host program and a hierarchical
 * key-value database engine
 *
 * @packageDocumentation
 */

// Connection
export { Database } from './database';
export type { Annotated, Callback, ConnectionState, OpenResult } from './database';
export type {
  CallInput,
  DirectoryInput,
  FunctionInput,
  GlobalNode,
  IncrementInput,
  KillInput,
  LocalNode,
  LockInput,
  MergeInput,
  NodeInput,
  ProcedureInput,
  SetInput,
} from './input';
export type { Annotation, UnsupportedResult } from './runtime/results';
export type { EmptyResult, NodeResult, ResultMap, Operation } from './runtime/operations';
export { bannerVersion, compareRelease, describeEngine, negotiate } from './runtime/capabilities';
export type { Capabilities } from './runtime/capabilities';

// Configuration and logging
export { resolveConfig, configFromEnv, DEFAULT_CONFIG, DEBUG_LEVELS } from './config';
export type { BridgeConfig, BridgeOptions, DebugLevel } from './config';
export { Tracer, createLogger } from './logger';
export type { Logger } from './logger';

// Codec
export * from './codec';

// Runtime
export { CallGate, gateFor } from './runtime/gate';
export { CallDescriptor } from './runtime/descriptor';
export type { CallState } from './runtime/descriptor';
export { Dispatcher } from './runtime/dispatcher';
export { FixedBuffer } from './runtime/buffer';

// Engine
export type { EngineChannel, EngineEntry, ChannelOutput } from './engine/channel';
export * from './engine/memory';

// Errors
export * from './errors';

export * from './constants';
