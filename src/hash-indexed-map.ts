/**
 * Map keyed by archive path hashes.
 */
import { pathHash } from './hash.js';

export class HashIndexedMap<V> implements Iterable<[bigint, V]> {
  private readonly entries = new Map<bigint, V>();

  /**
   * Inserts a value under a hash read from the archive. An existing entry with
   * the same hash is replaced; the format has no way to tell them apart.
   */
  insert(hash: bigint, value: V): void {
    this.entries.set(hash, value);
  }

  get(hash: bigint): V | undefined {
    return this.entries.get(hash);
  }

  has(hash: bigint): boolean {
    return this.entries.has(hash);
  }

  /**
   * Looks up a value by a name without extension, e.g. a folder path.
   * Files need `pathHash(name, ext)` and {@link get}.
   */
  lookupByName(key: string): V | undefined {
    return this.entries.get(pathHash(key, ''));
  }

  get size(): number {
    return this.entries.size;
  }

  [Symbol.iterator](): IterableIterator<[bigint, V]> {
    return this.entries.entries();
  }
}
