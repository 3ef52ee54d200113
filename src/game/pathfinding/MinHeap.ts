/**
 * Binary min-heap with caller-defined ordering. O(log n) push/pop.
 */

export type MinHeapCompare<T> = (a: T, b: T) => number;

export class MinHeap<T> {
  private readonly items: T[] = [];

  constructor(private readonly compare: MinHeapCompare<T>) {}

  push(value: T): void {
    this.items.push(value);
    this.siftUp(this.items.length - 1);
  }

  pop(): T | undefined {
    const best = this.items[0];
    const tail = this.items.pop();
    if (best === undefined || tail === undefined) return undefined;
    if (this.items.length === 0) return best;

    this.items[0] = tail;
    this.siftDown(0);
    return best;
  }

  private siftUp(start: number): void {
    let index = start;
    const value = this.items[index];

    while (index > 0) {
      const parent = (index - 1) >> 1;
      const parentValue = this.items[parent];
      if (this.compare(parentValue, value) <= 0) break;
      this.items[index] = parentValue;
      index = parent;
    }

    this.items[index] = value;
  }

  private siftDown(start: number): void {
    let index = start;
    const value = this.items[index];
    const n = this.items.length;

    while (true) {
      const left = index * 2 + 1;
      if (left >= n) break;
      const right = left + 1;

      let child = left;
      if (right < n && this.compare(this.items[right], this.items[left]) < 0) child = right;
      if (this.compare(value, this.items[child]) <= 0) break;

      this.items[index] = this.items[child];
      index = child;
    }

    this.items[index] = value;
  }
}
