/**
 * Minimal heap contract used for bounded ranking.
 * The item the ordering puts first sits at the top.
 */
export interface Heap<T> {
  size(): number;
  peek(): T | undefined;
  push(item: T): void;
  pop(): T | undefined;
  /** Converts heap contents to array (order implementation-defined). */
  toArray(): T[];
}
