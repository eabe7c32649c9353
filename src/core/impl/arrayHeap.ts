import type { Heap } from "../heap.js";

/** Binary heap over an array; `first(a, b)` means a belongs nearer the top than b. */
export class ArrayHeap<T> implements Heap<T> {
  private readonly data: T[] = [];

  constructor(private readonly first: (a: T, b: T) => boolean) {}

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
      if (!this.first(a[i], a[p])) break;
      [a[i], a[p]] = [a[p], a[i]];
      i = p;
    }
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

  toArray(): T[] {
    return Array.from(this.data);
  }

  private siftDown(i: number): void {
    const a = this.data;
    const n = a.length;

    while (true) {
      const l = i * 2 + 1;
      const r = l + 1;
      let top = i;

      if (l < n && this.first(a[l], a[top])) top = l;
      if (r < n && this.first(a[r], a[top])) top = r;
      if (top === i) return;

      [a[i], a[top]] = [a[top], a[i]];
      i = top;
    }
  }
}
