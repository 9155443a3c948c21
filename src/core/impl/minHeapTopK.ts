import type { Heap, TopKSelector } from "../heap.js";

class ArrayHeap<T> implements Heap<T> {
  private readonly data: T[] = [];

  constructor(private readonly less: (a: T, b: T) => boolean) {}

  size(): number {
    return this.data.length;
  }

  peek(): T | undefined {
    return this.data[0];
  }

  push(item: T): void {
    const a = this.data;
    a.push(item);
    let i = a.length - 1;
    while (i > 0) {
      const p = (i - 1) >> 1;
      if (!this.less(a[i]!, a[p]!)) break;
      [a[i]!, a[p]!] = [a[p]!, a[i]!];
      i = p;
    }
  }

  pop(): T | undefined {
    const a = this.data;
    if (a.length === 0) return undefined;
    const top = a[0];
    const last = a.pop()!;
    if (a.length) {
      a[0] = last;
      this.siftDown(0);
    }
    return top;
  }

  toArray(): T[] {
    return Array.from(this.data);
  }

  private siftDown(i: number): void {
    const a = this.data;
    const n = a.length;

    while (true) {
      const l = i * 2 + 1;
      const r = l + 1;
      let smallest = i;

      if (l < n && this.less(a[l]!, a[smallest]!)) smallest = l;
      if (r < n && this.less(a[r]!, a[smallest]!)) smallest = r;
      if (smallest === i) return;

      [a[i]!, a[smallest]!] = [a[smallest]!, a[i]!];
      i = smallest;
    }
  }
}

interface Entry<T> {
  item: T;
  seq: number;
}

/**
 * Keeps a fixed-size min-heap of the best K items.
 *
 * Comparator uses Array.sort semantics (a before b if <0). Ties are broken
 * by arrival order, earlier first, so equal items keep their input order.
 */
export class MinHeapTopKSelector<T> implements TopKSelector<T> {
  topK(items: Iterable<T>, k: number, comparator: (a: T, b: T) => number): T[] {
    // fractional k means the first floor(k); NaN selects nothing
    k = Math.floor(k);
    if (Number.isNaN(k) || k <= 0) return [];

    const order = (a: Entry<T>, b: Entry<T>): number => comparator(a.item, b.item) || a.seq - b.seq;
    // less(a,b) means a is WORSE than b, so the root is the worst kept entry
    const heap = new ArrayHeap<Entry<T>>((a, b) => order(a, b) > 0);

    let seq = 0;
    for (const item of items) {
      const entry = { item, seq: seq++ };
      if (heap.size() < k) {
        heap.push(entry);
        continue;
      }
      const worst = heap.peek()!;
      if (order(entry, worst) < 0) {
        heap.pop();
        heap.push(entry);
      }
    }

    return heap
      .toArray()
      .sort(order)
      .map((e) => e.item);
  }
}
