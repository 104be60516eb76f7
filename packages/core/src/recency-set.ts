/**
 * Insertion-ordered set of recently seen ids with a fixed capacity.
 * Re-adding a present id keeps its original position; once full, the
 * oldest-inserted id is evicted to make room.
 */
export class RecencySet {
  private readonly ids = new Set<string>();

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new RangeError(`Capacity must be a positive integer, got: ${capacity}`);
    }
  }

  get size(): number {
    return this.ids.size;
  }

  has(id: string): boolean {
    return this.ids.has(id);
  }

  add(id: string): void {
    if (this.ids.has(id)) {
      return;
    }

    if (this.ids.size >= this.capacity) {
      const oldest = this.ids.values().next();
      if (!oldest.done) {
        this.ids.delete(oldest.value);
      }
    }
    this.ids.add(id);
  }
}
