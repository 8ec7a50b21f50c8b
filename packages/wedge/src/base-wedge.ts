/**
 * Shared behaviour of every wedge representation: key-order checking,
 * empty-state errors, operation counters and iterator invalidation.
 *
 * Subclasses only decide how entries are stored.
 */

import {
  ConcurrentModificationError,
  EmptyWedgeError,
  KeyOrderError,
  type Compare,
  type MonoWedge,
  type WedgeEntry,
  type WedgeStats,
} from '@monowedge/contracts';
import { naturalKeyOrder } from './comparators.js';

export interface BaseWedgeOptions<K, V> {
  /** Strict order over values; `less` for a min-wedge, `greater` for a max-wedge */
  compare: Compare<V>;
  /** Strict ascending order over keys. Defaults to `naturalKeyOrder`. */
  keyCompare?: Compare<K>;
  /**
   * Reject keys that are not strictly greater than the newest stored key.
   * An empty wedge accepts any key. When disabled, ordering is an
   * unchecked precondition and out-of-order keys corrupt the wedge.
   * @default true
   */
  checkKeyOrder?: boolean;
}

export interface InsertResult {
  evicted: number;
  probes: number;
}

export abstract class BaseWedge<K, V> implements MonoWedge<K, V> {
  protected readonly compare: Compare<V>;
  protected readonly keyCompare: Compare<K>;
  private readonly checkKeyOrder: boolean;

  // Boxed so that `undefined` stays usable as a key. The newest insert is
  // never evicted by later inserts, so while the wedge is non-empty this is
  // the back entry's key.
  private newest: { key: K } | undefined;
  private version: number = 0;
  private readonly counters: WedgeStats = {
    inserted: 0,
    evicted: 0,
    popped: 0,
    probes: 0,
  };

  constructor(options: BaseWedgeOptions<K, V>) {
    this.compare = options.compare;
    this.keyCompare = options.keyCompare ?? naturalKeyOrder;
    this.checkKeyOrder = options.checkKeyOrder ?? true;
  }

  update(key: K, value: V): void {
    if (
      this.checkKeyOrder &&
      this.newest !== undefined &&
      this.size() > 0 &&
      !this.keyCompare(this.newest.key, key)
    ) {
      throw new KeyOrderError(key, this.newest.key);
    }

    const { evicted, probes } = this.insert(Object.freeze({ key, value }));

    this.newest = { key };
    this.counters.inserted++;
    this.counters.evicted += evicted;
    this.counters.probes += probes;
    this.version++;
  }

  front(): WedgeEntry<K, V> {
    const entry = this.peekFront();
    if (entry === undefined) {
      throw new EmptyWedgeError('front');
    }
    return entry;
  }

  popFront(): WedgeEntry<K, V> {
    const entry = this.removeFront();
    if (entry === undefined) {
      throw new EmptyWedgeError('popFront');
    }
    this.counters.popped++;
    this.version++;
    return entry;
  }

  entries(): IterableIterator<WedgeEntry<K, V>> {
    return this.guarded(this.iterate(), this.version);
  }

  [Symbol.iterator](): IterableIterator<WedgeEntry<K, V>> {
    return this.entries();
  }

  isEmpty(): boolean {
    return this.size() === 0;
  }

  clear(): void {
    this.removeAll();
    this.newest = undefined;
    this.version++;
  }

  stats(): WedgeStats {
    return { ...this.counters };
  }

  abstract peekFront(): WedgeEntry<K, V> | undefined;

  abstract extremumSince(fromKey: K): WedgeEntry<K, V> | undefined;

  abstract size(): number;

  /**
   * Drops the dominated suffix for `entry.value` and appends `entry`.
   */
  protected abstract insert(entry: WedgeEntry<K, V>): InsertResult;

  protected abstract removeFront(): WedgeEntry<K, V> | undefined;

  protected abstract removeAll(): void;

  protected abstract iterate(): Iterator<WedgeEntry<K, V>>;

  private *guarded(
    source: Iterator<WedgeEntry<K, V>>,
    version: number
  ): IterableIterator<WedgeEntry<K, V>> {
    while (true) {
      if (this.version !== version) {
        throw new ConcurrentModificationError();
      }
      const step = source.next();
      if (step.done === true) {
        return;
      }
      yield step.value;
    }
  }
}
