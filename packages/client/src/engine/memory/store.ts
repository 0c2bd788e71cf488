/**
 * Sparse hierarchical tree backing one namespace (globals or locals) of the
 * MemoryEngine.
 */

import { searchSorted } from './collation';
import { formatNumber, toNumber } from './numeric';

/**
 * Path of subscripts from a variable down to a node. Subscripts are stored
 * in canonical form.
 */
export type Path = readonly string[];

class TreeNode {
  value: string | undefined;
  readonly keys: string[] = [];
  readonly children = new Map<string, TreeNode>();

  isEmpty(): boolean {
    return this.value === undefined && this.keys.length === 0;
  }

  child(key: string): TreeNode | undefined {
    return this.children.get(key);
  }

  ensureChild(key: string): TreeNode {
    const existing = this.children.get(key);
    if (existing) {
      return existing;
    }
    const created = new TreeNode();
    const { index } = searchSorted(this.keys, key);
    this.keys.splice(index, 0, key);
    this.children.set(key, created);
    return created;
  }

  removeChild(key: string): void {
    if (!this.children.delete(key)) {
      return;
    }
    const { index, found } = searchSorted(this.keys, key);
    if (found) {
      this.keys.splice(index, 1);
    }
  }

  /**
   * Next (direction 1) or previous (direction -1) key after `key`; `''`
   * starts from either end. A stored `''` key is never returned, since
   * `''` also marks the end of the walk.
   */
  adjacentKey(key: string, direction: 1 | -1): string | undefined {
    const first = this.keys[0] === '' ? 1 : 0;
    if (this.keys.length === first) {
      return undefined;
    }
    if (key === '') {
      return direction === 1 ? this.keys[first] : this.keys[this.keys.length - 1];
    }
    const { index, found } = searchSorted(this.keys, key);
    if (direction === 1) {
      return this.keys[found ? index + 1 : index];
    }
    return index > first ? this.keys[index - 1] : undefined;
  }

  clone(): TreeNode {
    const copy = new TreeNode();
    copy.value = this.value;
    for (const key of this.keys) {
      const source = this.children.get(key);
      if (source) {
        copy.keys.push(key);
        copy.children.set(key, source.clone());
      }
    }
    return copy;
  }
}

/**
 * A namespace of named variables, each a sparse tree of subscripted nodes.
 */
export class SparseStore {
  private readonly roots = new Map<string, TreeNode>();

  /**
   * Variable names in collation order.
   */
  names(): string[] {
    return [...this.roots.keys()].sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
  }

  private find(name: string, path: Path): TreeNode | undefined {
    let node = this.roots.get(name);
    for (const key of path) {
      if (!node) {
        return undefined;
      }
      node = node.child(key);
    }
    return node;
  }

  private ensure(name: string, path: Path): TreeNode {
    let node = this.roots.get(name);
    if (!node) {
      node = new TreeNode();
      this.roots.set(name, node);
    }
    for (const key of path) {
      node = node.ensureChild(key);
    }
    return node;
  }

  /**
   * Removes empty nodes along `path`, bottom up.
   */
  private prune(name: string, path: Path): void {
    const root = this.roots.get(name);
    if (!root) {
      return;
    }
    const trail: TreeNode[] = [root];
    for (const key of path) {
      const next = trail[trail.length - 1].child(key);
      if (!next) {
        break;
      }
      trail.push(next);
    }
    for (let depth = trail.length - 1; depth > 0; depth -= 1) {
      if (!trail[depth].isEmpty()) {
        return;
      }
      trail[depth - 1].removeChild(path[depth - 1]);
    }
    if (root.isEmpty()) {
      this.roots.delete(name);
    }
  }

  /**
   * 0 (nothing), 1 (value), 10 (children), 11 (both).
   */
  data(name: string, path: Path): 0 | 1 | 10 | 11 {
    const node = this.find(name, path);
    if (!node) {
      return 0;
    }
    if (node.keys.length > 0) {
      return node.value !== undefined ? 11 : 10;
    }
    return node.value !== undefined ? 1 : 0;
  }

  get(name: string, path: Path): string | undefined {
    return this.find(name, path)?.value;
  }

  set(name: string, path: Path, value: string): void {
    this.ensure(name, path).value = value;
  }

  /**
   * Removes the node and its descendants.
   */
  kill(name: string, path: Path): void {
    if (path.length === 0) {
      this.roots.delete(name);
      return;
    }
    const parent = this.find(name, path.slice(0, -1));
    parent?.removeChild(path[path.length - 1]);
    this.prune(name, path.slice(0, -1));
  }

  /**
   * Removes only the node's own value, keeping its descendants.
   */
  killNode(name: string, path: Path): void {
    const node = this.find(name, path);
    if (!node) {
      return;
    }
    node.value = undefined;
    this.prune(name, path);
  }

  /**
   * Next or previous sibling subscript of the node at `path` (whose last
   * element is the starting subscript, `''` to start from either end).
   */
  order(name: string, path: Path, direction: 1 | -1): string {
    const parent = this.find(name, path.slice(0, -1));
    return parent?.adjacentKey(path[path.length - 1], direction) ?? '';
  }

  /**
   * Next node holding a value in depth-first order after `path`, or
   * undefined when there is none. With direction -1 the walk runs backwards
   * and may end on the unsubscripted variable itself.
   */
  query(name: string, path: Path, direction: 1 | -1): string[] | undefined {
    const root = this.roots.get(name);
    if (!root) {
      return undefined;
    }
    return direction === 1 ? this.queryForward(root, path) : this.queryBackward(root, path);
  }

  private queryForward(root: TreeNode, path: Path): string[] | undefined {
    // Descend into the node's children first, then climb to later siblings.
    const start = this.findFrom(root, path);
    if (start) {
      const below = this.firstWithValue(start, [...path]);
      if (below) {
        return below;
      }
    }
    for (let depth = path.length; depth > 0; depth -= 1) {
      const parent = this.findFrom(root, path.slice(0, depth - 1));
      if (!parent) {
        continue;
      }
      let key = parent.adjacentKey(path[depth - 1], 1);
      while (key !== undefined) {
        const prefix = [...path.slice(0, depth - 1), key];
        const child = parent.child(key);
        if (child) {
          if (child.value !== undefined) {
            return prefix;
          }
          const below = this.firstWithValue(child, prefix);
          if (below) {
            return below;
          }
        }
        key = parent.adjacentKey(key, 1);
      }
    }
    return undefined;
  }

  private queryBackward(root: TreeNode, path: Path): string[] | undefined {
    for (let depth = path.length; depth > 0; depth -= 1) {
      const parent = this.findFrom(root, path.slice(0, depth - 1));
      if (!parent) {
        continue;
      }
      let key = parent.adjacentKey(path[depth - 1], -1);
      while (key !== undefined) {
        const prefix = [...path.slice(0, depth - 1), key];
        const child = parent.child(key);
        if (child) {
          const last = this.lastWithValue(child, prefix);
          if (last) {
            return last;
          }
        }
        key = parent.adjacentKey(key, -1);
      }
      if (depth > 1 && parent.value !== undefined) {
        return path.slice(0, depth - 1);
      }
    }
    return root.value !== undefined && path.length > 0 ? [] : undefined;
  }

  private findFrom(root: TreeNode, path: Path): TreeNode | undefined {
    let node: TreeNode | undefined = root;
    for (const key of path) {
      node = node?.child(key);
    }
    return node;
  }

  /**
   * First descendant (excluding `node` itself) holding a value.
   */
  private firstWithValue(node: TreeNode, prefix: string[]): string[] | undefined {
    for (const key of node.keys) {
      const child = node.child(key);
      if (!child) {
        continue;
      }
      const path = [...prefix, key];
      if (child.value !== undefined) {
        return path;
      }
      const below = this.firstWithValue(child, path);
      if (below) {
        return below;
      }
    }
    return undefined;
  }

  /**
   * Last node holding a value in depth-first order within `node`'s subtree,
   * `node` itself included.
   */
  private lastWithValue(node: TreeNode, prefix: string[]): string[] | undefined {
    for (let index = node.keys.length - 1; index >= 0; index -= 1) {
      const key = node.keys[index];
      const child = node.child(key);
      if (!child) {
        continue;
      }
      const below = this.lastWithValue(child, [...prefix, key]);
      if (below) {
        return below;
      }
    }
    return node.value !== undefined ? prefix : undefined;
  }

  /**
   * Adds `increment` to the numeric value of a node (absent counts as 0),
   * stores and returns the canonical result.
   */
  increment(name: string, path: Path, increment: number): string {
    const node = this.ensure(name, path);
    const next = formatNumber(toNumber(node.value ?? '') + increment);
    node.value = next;
    return next;
  }

  /**
   * Copies the subtree at `from` over the subtree at `to` in `target`,
   * leaving nodes of `to` that `from` does not define in place.
   */
  copyTo(target: SparseStore, toName: string, toPath: Path, fromName: string, fromPath: Path): void {
    const source = this.find(fromName, fromPath);
    if (!source) {
      return;
    }
    const snapshot = source.clone();
    const destination = target.ensure(toName, toPath);
    overlay(destination, snapshot);
    target.prune(toName, toPath);
  }

  clear(filter?: (name: string) => boolean): void {
    for (const name of [...this.roots.keys()]) {
      if (!filter || filter(name)) {
        this.roots.delete(name);
      }
    }
  }
}

function overlay(destination: TreeNode, source: TreeNode): void {
  if (source.value !== undefined) {
    destination.value = source.value;
  }
  for (const key of source.keys) {
    const child = source.child(key);
    if (child) {
      overlay(destination.ensureChild(key), child);
    }
  }
}
