import {
  referenceKey,
  type BeatmapRecord,
  type MetadataLookup,
  type ResourceReference,
} from "@maplink/types";

type Lookup = Promise<readonly BeatmapRecord[]>;

/**
 * Bounded LRU in front of another lookup. Callers asking for the same
 * reference while a request is in flight share it; failures are forgotten.
 */
export class CachedMetadataLookup implements MetadataLookup {
  private readonly entries = new Map<string, Lookup>();

  constructor(
    private readonly inner: MetadataLookup,
    readonly capacity: number,
  ) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new RangeError(`Cache capacity must be a positive integer, got: ${capacity}`);
    }
  }

  get size(): number {
    return this.entries.size;
  }

  async lookup(ref: ResourceReference): Promise<readonly BeatmapRecord[]> {
    const key = referenceKey(ref);
    const cached = this.entries.get(key);
    if (cached) {
      this.entries.delete(key);
      this.entries.set(key, cached);
      return cached;
    }

    const pending = this.inner.lookup(ref);
    this.entries.set(key, pending);
    if (this.entries.size > this.capacity) {
      const oldest = this.entries.keys().next();
      if (!oldest.done) {
        this.entries.delete(oldest.value);
      }
    }

    try {
      return await pending;
    } catch (error) {
      if (this.entries.get(key) === pending) {
        this.entries.delete(key);
      }
      throw error;
    }
  }
}
