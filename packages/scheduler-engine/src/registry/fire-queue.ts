// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@cadence/scheduler-engine/registry/fire-queue`
 * Purpose: Binary min-heap ordering entries by (next fire time, insertion sequence).
 * Scope: Ordering only. Does not know about names, states or timers.
 * Invariants: Equal fire times pop in insertion order; removal of arbitrary items keeps the heap valid.
 * Side-effects: none
 * @internal
 */

export interface Queued {
  readonly seq: number;
  readonly nextFireTime: number | null;
}

function fireTimeOf(item: Queued): number {
  return item.nextFireTime ?? Number.POSITIVE_INFINITY;
}

function precedes(a: Queued, b: Queued): boolean {
  const delta = fireTimeOf(a) - fireTimeOf(b);
  return delta < 0 || (delta === 0 && a.seq < b.seq);
}

/**
 * Min-heap with the earliest entry at the root.
 */
export class FireQueue<T extends Queued> {
  private heap: T[] = [];

  get size(): number {
    return this.heap.length;
  }

  peek(): T | undefined {
    return this.heap[0];
  }

  push(item: T): void {
    this.heap.push(item);
    this.heapifyUp(this.heap.length - 1);
  }

  pop(): T | undefined {
    const top = this.heap[0];
    const last = this.heap.pop();
    if (top !== undefined && last !== undefined && this.heap.length > 0) {
      this.heap[0] = last;
      this.heapifyDown(0);
    }
    return top;
  }

  /** Removes `item` if queued. O(n). */
  remove(item: T): boolean {
    const index = this.heap.indexOf(item);
    if (index === -1) {
      return false;
    }
    const last = this.heap.pop();
    if (last !== undefined && index < this.heap.length) {
      this.heap[index] = last;
      this.heapifyDown(index);
      this.heapifyUp(index);
    }
    return true;
  }

  has(item: T): boolean {
    return this.heap.includes(item);
  }

  /** Items in pop order, without mutating the heap. */
  toSortedArray(): T[] {
    return [...this.heap].sort((a, b) =>
      precedes(a, b) ? -1 : precedes(b, a) ? 1 : 0
    );
  }

  clear(): T[] {
    const drained = this.heap;
    this.heap = [];
    return drained;
  }

  private heapifyUp(index: number): void {
    while (index > 0) {
      const parent = Math.floor((index - 1) / 2);
      if (!precedes(this.at(index), this.at(parent))) break;
      this.swap(parent, index);
      index = parent;
    }
  }

  private heapifyDown(index: number): void {
    const length = this.heap.length;
    while (true) {
      const left = 2 * index + 1;
      const right = 2 * index + 2;
      let smallest = index;

      if (left < length && precedes(this.at(left), this.at(smallest))) {
        smallest = left;
      }
      if (right < length && precedes(this.at(right), this.at(smallest))) {
        smallest = right;
      }

      if (smallest === index) break;
      this.swap(smallest, index);
      index = smallest;
    }
  }

  private at(index: number): T {
    const item = this.heap[index];
    if (item === undefined) {
      throw new RangeError(`Fire queue index out of range: ${index}`);
    }
    return item;
  }

  private swap(i: number, j: number): void {
    const temp = this.at(i);
    this.heap[i] = this.at(j);
    this.heap[j] = temp;
  }
}
