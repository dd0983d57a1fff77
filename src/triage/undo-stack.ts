export const DEFAULT_UNDO_CAPACITY = 10;

/**
 * Bounded LIFO history. Pushing past capacity drops the oldest entry.
 */
export class UndoStack<T> {
  private readonly items: T[] = [];

  constructor(readonly capacity: number = DEFAULT_UNDO_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`Undo capacity must be a positive integer, got ${capacity}`);
    }
  }

  get size(): number {
    return this.items.length;
  }

  push(item: T): void {
    this.items.push(item);
    if (this.items.length > this.capacity) {
      this.items.shift();
    }
  }

  peek(): T | undefined {
    return this.items[this.items.length - 1];
  }

  pop(): T | undefined {
    return this.items.pop();
  }

  /** Most recent first. */
  history(): readonly T[] {
    return [...this.items].reverse();
  }
}
