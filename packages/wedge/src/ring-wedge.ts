/**
 * Ring-buffer wedge for dense keys (arrival counters, regularly sampled
 * timestamps).
 *
 * update() is O(1) amortized and O(log n) worst case; the dominated suffix
 * is dropped with a single truncation.
 */

import type { WedgeEntry } from '@monowedge/contracts';
import { BaseWedge, type BaseWedgeOptions, type InsertResult } from './base-wedge.js';
import { RingDeque } from './ring-deque.js';
import { wedgeSearch, type IndexedView } from './search.js';

export interface RingWedgeOptions<K, V> extends BaseWedgeOptions<K, V> {
  /** Initial slot count, rounded up to a power of two */
  initialCapacity?: number;
}

export class RingWedge<K, V> extends BaseWedge<K, V> {
  private readonly deque: RingDeque<WedgeEntry<K, V>>;
  private readonly values: IndexedView<V>;
  private readonly keys: IndexedView<K>;

  constructor(options: RingWedgeOptions<K, V>) {
    super(options);
    const deque = new RingDeque<WedgeEntry<K, V>>(options.initialCapacity);
    this.deque = deque;
    this.values = {
      get length() {
        return deque.length;
      },
      at: (index) => deque.at(index).value,
    };
    this.keys = {
      get length() {
        return deque.length;
      },
      at: (index) => deque.at(index).key,
    };
  }

  peekFront(): WedgeEntry<K, V> | undefined {
    return this.deque.peekFront();
  }

  extremumSince(fromKey: K): WedgeEntry<K, V> | undefined {
    // Keys ascend, so the same boundary search finds the first key >= fromKey.
    const { index } = wedgeSearch(this.keys, fromKey, this.keyCompare);
    return index < this.deque.length ? this.deque.at(index) : undefined;
  }

  size(): number {
    return this.deque.length;
  }

  protected insert(entry: WedgeEntry<K, V>): InsertResult {
    const { index, probes } = wedgeSearch(this.values, entry.value, this.compare);
    const evicted = this.deque.truncate(index);
    this.deque.pushBack(entry);
    return { evicted, probes };
  }

  protected removeFront(): WedgeEntry<K, V> | undefined {
    return this.deque.popFront();
  }

  protected removeAll(): void {
    this.deque.clear();
  }

  protected iterate(): Iterator<WedgeEntry<K, V>> {
    return this.deque[Symbol.iterator]();
  }
}
