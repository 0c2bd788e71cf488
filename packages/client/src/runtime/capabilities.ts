/**
 * Engine capability negotiation, performed once when a connection opens.
 */

import { REVERSE_QUERY_RELEASE } from '../constants';

export interface Capabilities {
  product: 'YottaDB' | 'GT.M';

  /**
   * Version of the product (`1.34` for YottaDB, `6.3-011` for GT.M).
   */
  release: string;

  /**
   * Whether `$query` accepts a direction, which `previousNode` needs.
   */
  reverseQuery: boolean;
}

/**
 * Compares dotted release numbers field by field (`1.9` is before `1.10`).
 */
export function compareRelease(a: string, b: string): number {
  const left = a.split('.').map((part) => parseInt(part, 10) || 0);
  const right = b.split('.').map((part) => parseInt(part, 10) || 0);
  for (let index = 0; index < Math.max(left.length, right.length); index += 1) {
    const difference = (left[index] ?? 0) - (right[index] ?? 0);
    if (difference !== 0) {
      return difference;
    }
  }
  return 0;
}

/**
 * Second space-separated field of a version banner without its leading
 * letter: `GT.M V6.3-011 Linux x86_64` gives `6.3-011`.
 */
export function bannerVersion(banner: string): string {
  return (banner.split(' ')[1] ?? '').slice(1);
}

/**
 * Derives capabilities from `$ZVERSION` and `$ZYRELEASE`; a missing release
 * banner means GT.M.
 */
export function negotiate(zversion: string, zyrelease: string | undefined): Capabilities {
  if (zyrelease === undefined) {
    return { product: 'GT.M', release: bannerVersion(zversion), reverseQuery: false };
  }
  const release = bannerVersion(zyrelease);
  return {
    product: 'YottaDB',
    release,
    reverseQuery: compareRelease(release, REVERSE_QUERY_RELEASE) >= 0,
  };
}

/**
 * Engine line of the version string.
 */
export function describeEngine(capabilities: Capabilities): string {
  return `${capabilities.product} Version: ${capabilities.release}`;
}
