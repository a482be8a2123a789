// =============================================================================
// Binary Heap
// =============================================================================

/**
 * Returns a negative number when `a` belongs closer to the top than `b`
 */
export type HeapComparator<T> = (a: T, b: T) => number;

export const minFirst: HeapComparator<number> = (a, b) => a - b;
export const maxFirst: HeapComparator<number> = (a, b) => b - a;

/**
 * Array-backed binary heap ordered by a comparator
 */
export class BinaryHeap<T> {
  private readonly items: T[] = [];

  constructor(private readonly compare: HeapComparator<T>) {}

  get size(): number {
    return this.items.length;
  }

  isEmpty(): boolean {
    return this.items.length === 0;
  }

  peek(): T | undefined {
    return this.items[0];
  }

  push(item: T): void {
    this.items.push(item);
    this.siftUp(this.items.length - 1);
  }

  pop(): T | undefined {
    const top = this.items[0];
    const last = this.items.pop();

    if (this.items.length > 0 && last !== undefined) {
      this.items[0] = last;
      this.siftDown(0);
    }

    return top;
  }

  clear(): void {
    this.items.length = 0;
  }

  private siftUp(index: number): void {
    let child = index;

    while (child > 0) {
      const parent = (child - 1) >> 1;
      if (this.compare(this.items[child]!, this.items[parent]!) >= 0) {
        break;
      }
      this.swap(child, parent);
      child = parent;
    }
  }

  private siftDown(index: number): void {
    const length = this.items.length;
    let parent = index;

    for (;;) {
      const left = 2 * parent + 1;
      const right = left + 1;
      let best = parent;

      if (left < length && this.compare(this.items[left]!, this.items[best]!) < 0) {
        best = left;
      }
      if (right < length && this.compare(this.items[right]!, this.items[best]!) < 0) {
        best = right;
      }
      if (best === parent) {
        return;
      }

      this.swap(parent, best);
      parent = best;
    }
  }

  private swap(i: number, j: number): void {
    const tmp = this.items[i]!;
    this.items[i] = this.items[j]!;
    this.items[j] = tmp;
  }
}
