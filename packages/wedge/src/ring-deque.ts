/**
 * Growable ring buffer with O(1) amortized append, O(1) removal at the
 * front and O(1) truncation of any suffix.
 *
 * Capacity is always a power of two so the physical slot of a logical
 * index is a mask away.
 */

import type { IndexedView } from './search.js';

const DEFAULT_CAPACITY = 16;

function nextPowerOfTwo(n: number): number {
  let capacity = DEFAULT_CAPACITY;
  while (capacity < n) {
    capacity *= 2;
  }
  return capacity;
}

export class RingDeque<T> implements IndexedView<T>, Iterable<T> {
  private buffer: (T | undefined)[];
  private head: number = 0;
  private count: number = 0;
  private mask: number;

  constructor(initialCapacity: number = DEFAULT_CAPACITY) {
    const capacity = nextPowerOfTwo(initialCapacity);
    this.buffer = new Array<T | undefined>(capacity);
    this.mask = capacity - 1;
  }

  get length(): number {
    return this.count;
  }

  /**
   * Element at logical index (0 = front).
   *
   * @throws RangeError if index is outside [0, length)
   */
  at(index: number): T {
    if (index < 0 || index >= this.count) {
      throw new RangeError(`Index ${index} out of range [0, ${this.count})`);
    }
    return this.slot(index);
  }

  pushBack(item: T): void {
    if (this.count === this.buffer.length) {
      this.grow();
    }
    this.buffer[(this.head + this.count) & this.mask] = item;
    this.count++;
  }

  popFront(): T | undefined {
    if (this.count === 0) {
      return undefined;
    }
    const item = this.buffer[this.head];
    this.buffer[this.head] = undefined;
    this.head = (this.head + 1) & this.mask;
    this.count--;
    return item;
  }

  peekFront(): T | undefined {
    return this.count === 0 ? undefined : this.buffer[this.head];
  }

  /**
   * Drops every element at logical index >= length.
   *
   * @returns Number of elements removed
   */
  truncate(length: number): number {
    if (length < 0) {
      throw new RangeError(`Cannot truncate to negative length ${length}`);
    }
    if (length >= this.count) {
      return 0;
    }
    const removed = this.count - length;
    for (let i = length; i < this.count; i++) {
      this.buffer[(this.head + i) & this.mask] = undefined;
    }
    this.count = length;
    return removed;
  }

  clear(): void {
    this.buffer.fill(undefined);
    this.head = 0;
    this.count = 0;
  }

  *[Symbol.iterator](): Iterator<T> {
    for (let i = 0; i < this.count; i++) {
      yield this.slot(i);
    }
  }

  private slot(index: number): T {
    const item = this.buffer[(this.head + index) & this.mask];
    if (item === undefined) {
      throw new RangeError(`Slot for index ${index} is empty`);
    }
    return item;
  }

  /**
   * Doubles capacity and unwraps the contents so the front lands at slot 0.
   */
  private grow(): void {
    const next = new Array<T | undefined>(this.buffer.length * 2);
    for (let i = 0; i < this.count; i++) {
      next[i] = this.buffer[(this.head + i) & this.mask];
    }
    this.buffer = next;
    this.head = 0;
    this.mask = next.length - 1;
  }
}
