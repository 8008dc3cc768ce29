import type { Heap, TopKSelector } from "../heap.js";

export class ArrayHeap<T> implements Heap<T> {
  private readonly data: T[] = [];

  constructor(private readonly less: (a: T, b: T) => boolean) {}

  size(): number {
    return this.data.length;
  }

  peek(): T | undefined {
    return this.data[0];
  }

  push(item: T): void {
    this.data.push(item);
    this.siftUp(this.data.length - 1);
  }

  pop(): T | undefined {
    const a = this.data;
    const top = a[0];
    const last = a.pop();
    if (a.length && last !== undefined) {
      a[0] = last;
      this.siftDown(0);
    }
    return top;
  }

  replaceTop(item: T): T | undefined {
    const top = this.data[0];
    if (top === undefined) {
      this.push(item);
      return undefined;
    }
    this.data[0] = item;
    this.siftDown(0);
    return top;
  }

  toArray(): T[] {
    return Array.from(this.data);
  }

  private swap(i: number, j: number): void {
    const a = this.data;
    const t = a[i];
    const u = a[j];
    if (t === undefined || u === undefined) return;
    a[i] = u;
    a[j] = t;
  }

  private before(i: number, j: number): boolean {
    const x = this.data[i];
    const y = this.data[j];
    return x !== undefined && y !== undefined && this.less(x, y);
  }

  private siftUp(i: number): void {
    while (i > 0) {
      const p = (i - 1) >> 1;
      if (!this.before(i, p)) return;
      this.swap(i, p);
      i = p;
    }
  }

  private siftDown(i: number): void {
    const n = this.data.length;
    while (true) {
      const l = i * 2 + 1;
      const r = l + 1;
      let top = i;
      if (l < n && this.before(l, top)) top = l;
      if (r < n && this.before(r, top)) top = r;
      if (top === i) return;
      this.swap(i, top);
      i = top;
    }
  }
}

/**
 * Keeps a K-sized heap whose top is the worst of the best K seen so far.
 * O(n log k) instead of sorting every candidate.
 */
export class MinHeapTopKSelector<T> implements TopKSelector<T> {
  topK(items: Iterable<T>, k: number, comparator: (a: T, b: T) => number): T[] {
    if (k <= 0) return [];

    // a is nearer the top when it would sort after b
    const heap = new ArrayHeap<T>((a, b) => comparator(a, b) > 0);

    for (const item of items) {
      if (heap.size() < k) {
        heap.push(item);
        continue;
      }
      const worst = heap.peek();
      if (worst !== undefined && comparator(item, worst) < 0) heap.replaceTop(item);
    }

    return heap.toArray().sort(comparator);
  }
}
