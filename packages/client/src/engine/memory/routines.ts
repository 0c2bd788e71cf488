/**
 * Routine registry: the code the MemoryEngine runs for function and
 * procedure calls. Routines link lazily on first call and relink on
 * request, which re-runs their loader.
 */

import type { SparseStore, Path } from './store';
import { formatNumber } from './numeric';
import { EngineFault } from './status';

/**
 * A local variable passed by reference. Reads and writes go straight to the
 * caller's local symbol table.
 */
export class LocalReference {
  constructor(
    private readonly locals: SparseStore,
    readonly name: string
  ) {}

  get(path: Path = []): string | undefined {
    return this.locals.get(this.name, path);
  }

  set(value: string | number, path: Path = []): void {
    this.locals.set(this.name, path, typeof value === 'number' ? formatNumber(value) : value);
  }

  kill(path: Path = []): void {
    this.locals.kill(this.name, path);
  }
}

export type RoutineArgument = string | LocalReference;

export type RoutineLabel = (...args: RoutineArgument[]) => string | number | void;

/**
 * Produces the labels of a routine each time it is (re)linked.
 */
export type RoutineLoader = () => Record<string, RoutineLabel>;

export class RoutineRegistry {
  private readonly loaders = new Map<string, RoutineLoader>();
  private readonly linked = new Map<string, Record<string, RoutineLabel>>();
  private readonly linkCounts = new Map<string, number>();

  /**
   * Registers (or replaces) a routine. Already-linked code keeps running
   * until the routine is relinked.
   */
  define(routine: string, loader: RoutineLoader): this {
    this.loaders.set(routine, loader);
    return this;
  }

  /**
   * Number of times the routine has been linked.
   */
  linkCount(routine: string): number {
    return this.linkCounts.get(routine) ?? 0;
  }

  /**
   * Finds the label for `label^routine` (or `^routine`, whose label is the
   * routine name), linking the routine if needed.
   */
  resolve(entry: string, relink: boolean): RoutineLabel {
    const caret = entry.indexOf('^');
    const routine = entry.slice(caret + 1);
    const label = caret > 0 ? entry.slice(0, caret) : routine;

    let labels = this.linked.get(routine);
    if (!labels || relink) {
      const loader = this.loaders.get(routine);
      if (!loader) {
        throw new EngineFault('ZLINKFILE', routine);
      }
      labels = loader();
      this.linked.set(routine, labels);
      this.linkCounts.set(routine, this.linkCount(routine) + 1);
    }

    const code = Object.hasOwn(labels, label) ? labels[label] : undefined;
    if (!code) {
      throw new EngineFault('LABELMISSING', `${label}^${routine}`);
    }
    return code;
  }
}
