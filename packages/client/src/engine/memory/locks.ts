/**
 * Lock table shared by every MemoryEngine that stands for a process on the
 * same database. Locks are incremental and cover the locked node's
 * ancestors and descendants.
 */

interface HeldLock {
  owner: number;
  resource: readonly string[];
  count: number;
}

function keyOf(resource: readonly string[]): string {
  return JSON.stringify(resource);
}

function overlaps(a: readonly string[], b: readonly string[]): boolean {
  const shorter = Math.min(a.length, b.length);
  for (let index = 0; index < shorter; index += 1) {
    if (a[index] !== b[index]) {
      return false;
    }
  }
  return true;
}

export class LockTable {
  private readonly held = new Map<string, HeldLock>();

  /**
   * Takes one more level of the lock on `resource` (name followed by its
   * subscripts) unless another owner holds an overlapping lock.
   */
  tryAcquire(owner: number, resource: readonly string[]): boolean {
    for (const lock of this.held.values()) {
      if (lock.owner !== owner && overlaps(lock.resource, resource)) {
        return false;
      }
    }
    const key = keyOf(resource);
    const existing = this.held.get(key);
    if (existing) {
      existing.count += 1;
    } else {
      this.held.set(key, { owner, resource: [...resource], count: 1 });
    }
    return true;
  }

  /**
   * Drops one level of the owner's lock on `resource`.
   */
  release(owner: number, resource: readonly string[]): void {
    const key = keyOf(resource);
    const existing = this.held.get(key);
    if (!existing || existing.owner !== owner) {
      return;
    }
    existing.count -= 1;
    if (existing.count === 0) {
      this.held.delete(key);
    }
  }

  releaseAll(owner: number): void {
    for (const [key, lock] of this.held) {
      if (lock.owner === owner) {
        this.held.delete(key);
      }
    }
  }

  /**
   * Lock level the owner holds on `resource`.
   */
  levelOf(owner: number, resource: readonly string[]): number {
    const existing = this.held.get(keyOf(resource));
    return existing && existing.owner === owner ? existing.count : 0;
  }
}
