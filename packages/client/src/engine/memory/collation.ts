import { isNumericSubscript } from './numeric';

/**
 * Subscript collation: the empty string first, then canonical numbers in
 * numeric order, then every other string in code-point order.
 */
export function compareSubscripts(a: string, b: string): number {
  if (a === b) {
    return 0;
  }
  if (a === '') {
    return -1;
  }
  if (b === '') {
    return 1;
  }
  const aNumeric = isNumericSubscript(a);
  const bNumeric = isNumericSubscript(b);
  if (aNumeric && bNumeric) {
    return Number(a) - Number(b);
  }
  if (aNumeric) {
    return -1;
  }
  if (bNumeric) {
    return 1;
  }
  return a < b ? -1 : 1;
}

/**
 * Index at which `key` sits in, or would be inserted into, a sorted list.
 */
export function searchSorted(keys: readonly string[], key: string): { index: number; found: boolean } {
  let low = 0;
  let high = keys.length;
  while (low < high) {
    const middle = (low + high) >>> 1;
    const order = compareSubscripts(keys[middle], key);
    if (order === 0) {
      return { index: middle, found: true };
    }
    if (order < 0) {
      low = middle + 1;
    } else {
      high = middle;
    }
  }
  return { index: low, found: false };
}
