export { MemoryEngine } from './engine';
export type { MemoryEngineOptions } from './engine';
export { SparseStore } from './store';
export type { Path } from './store';
export { LockTable } from './locks';
export { RoutineRegistry, LocalReference } from './routines';
export type { RoutineArgument, RoutineLabel, RoutineLoader } from './routines';
export { EngineFault, ENGINE_ERRORS } from './status';
export type { EngineErrorName } from './status';
export { compareSubscripts } from './collation';
export { formatNumber, toNumber } from './numeric';
