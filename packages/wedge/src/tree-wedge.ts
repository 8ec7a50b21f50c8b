/**
 * Balanced-tree wedge for sparse, explicit keys.
 *
 * Entries live in a size-augmented treap ordered by key. Because stored
 * values are monotonic in key order, the dominance boundary can be found by
 * descending on the projected value, and the whole dominated suffix is split
 * off in one O(log n) step instead of being removed entry by entry.
 * Complexities are expected-case (random priorities).
 */

import type { WedgeEntry } from '@monowedge/contracts';
import { BaseWedge, type InsertResult } from './base-wedge.js';

interface TreapNode<K, V> {
  entry: WedgeEntry<K, V>;
  priority: number;
  size: number;
  left: TreapNode<K, V> | null;
  right: TreapNode<K, V> | null;
}

type Split<K, V> = [TreapNode<K, V> | null, TreapNode<K, V> | null];

function sizeOf<K, V>(node: TreapNode<K, V> | null): number {
  return node === null ? 0 : node.size;
}

function resize<K, V>(node: TreapNode<K, V>): void {
  node.size = 1 + sizeOf(node.left) + sizeOf(node.right);
}

/**
 * Joins two treaps where every key of `a` precedes every key of `b`.
 */
function merge<K, V>(a: TreapNode<K, V> | null, b: TreapNode<K, V> | null): TreapNode<K, V> | null {
  if (a === null) return b;
  if (b === null) return a;

  if (a.priority > b.priority) {
    a.right = merge(a.right, b);
    resize(a);
    return a;
  }
  b.left = merge(a, b.left);
  resize(b);
  return b;
}

export class TreeWedge<K, V> extends BaseWedge<K, V> {
  private root: TreapNode<K, V> | null = null;

  peekFront(): WedgeEntry<K, V> | undefined {
    let node = this.root;
    if (node === null) {
      return undefined;
    }
    while (node.left !== null) {
      node = node.left;
    }
    return node.entry;
  }

  extremumSince(fromKey: K): WedgeEntry<K, V> | undefined {
    let node = this.root;
    let found: WedgeEntry<K, V> | undefined;

    while (node !== null) {
      if (this.keyCompare(node.entry.key, fromKey)) {
        node = node.right;
      } else {
        found = node.entry;
        node = node.left;
      }
    }

    return found;
  }

  size(): number {
    return sizeOf(this.root);
  }

  protected insert(entry: WedgeEntry<K, V>): InsertResult {
    const probe = { count: 0 };
    const [kept, dominated] = this.splitDominated(this.root, entry.value, probe);

    const leaf: TreapNode<K, V> = {
      entry,
      priority: Math.random(),
      size: 1,
      left: null,
      right: null,
    };
    this.root = merge(kept, leaf);

    return { evicted: sizeOf(dominated), probes: probe.count };
  }

  protected removeFront(): WedgeEntry<K, V> | undefined {
    let node = this.root;
    if (node === null) {
      return undefined;
    }

    const path: TreapNode<K, V>[] = [];
    while (node.left !== null) {
      path.push(node);
      node = node.left;
    }

    const parent = path[path.length - 1];
    if (parent === undefined) {
      this.root = node.right;
    } else {
      parent.left = node.right;
    }
    for (const ancestor of path) {
      ancestor.size--;
    }

    return node.entry;
  }

  protected removeAll(): void {
    this.root = null;
  }

  protected *iterate(): Iterator<WedgeEntry<K, V>> {
    const stack: TreapNode<K, V>[] = [];
    let node = this.root;

    while (node !== null || stack.length > 0) {
      while (node !== null) {
        stack.push(node);
        node = node.left;
      }
      const next = stack.pop();
      if (next === undefined) {
        return;
      }
      yield next.entry;
      node = next.right;
    }
  }

  /**
   * Splits into the prefix of entries strictly more extreme than `value`
   * and the dominated remainder.
   */
  private splitDominated(
    node: TreapNode<K, V> | null,
    value: V,
    probe: { count: number }
  ): Split<K, V> {
    if (node === null) {
      return [null, null];
    }

    probe.count++;
    if (this.compare(node.entry.value, value)) {
      const [left, right] = this.splitDominated(node.right, value, probe);
      node.right = left;
      resize(node);
      return [node, right];
    }

    const [left, right] = this.splitDominated(node.left, value, probe);
    node.left = right;
    resize(node);
    return [left, node];
  }
}
