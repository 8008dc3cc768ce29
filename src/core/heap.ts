/**
 * Binary heap contract. `less(a, b)` decides which item sits nearer the top.
 */
export interface Heap<T> {
  size(): number;
  peek(): T | undefined;
  push(item: T): void;
  pop(): T | undefined;
  /** Replaces the top item in one sift; returns the item removed. */
  replaceTop(item: T): T | undefined;
  /** Heap contents, order implementation-defined. */
  toArray(): T[];
}

export interface TopKSelector<T> {
  /**
   * Returns the first K items in comparator order, sorted.
   * Comparator behaves like Array.sort: <0 means a before b.
   */
  topK(items: Iterable<T>, k: number, comparator: (a: T, b: T) => number): T[];
}
