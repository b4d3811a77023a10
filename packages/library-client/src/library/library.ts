/**
 * Immutable collection of library assets.
 */

import type { Asset } from './types.js';

export class Library implements Iterable<Asset> {
  readonly assets: readonly Asset[];

  /** Total reported by the server for the fetch that built this library */
  readonly totalCount: number;

  constructor(assets: readonly Asset[], totalCount: number = assets.length) {
    this.assets = Object.freeze([...assets]);
    this.totalCount = totalCount;
  }

  get size(): number {
    return this.assets.length;
  }

  [Symbol.iterator](): Iterator<Asset> {
    return this.assets[Symbol.iterator]();
  }

  /**
   * Return a new Library with the assets matching `predicate`.
   * The new library's total count is the filtered length.
   */
  filter(predicate: (asset: Asset) => boolean): Library {
    const filtered = this.assets.filter(predicate);
    return new Library(filtered, filtered.length);
  }

  filterByStatus(status: string): Library {
    return this.filter((asset) => asset.status === status);
  }

  findByUid(uid: string): Asset | undefined {
    return this.assets.find((asset) => asset.uid === uid);
  }

  uids(): Set<string> {
    return new Set(this.assets.map((asset) => asset.uid));
  }
}
