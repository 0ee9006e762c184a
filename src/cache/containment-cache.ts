/**
 * Bounded cache of family bitmasks, keyed by metadata document (or a
 * caller-supplied key such as a record id).
 *
 * Eviction is FIFO: when full, the oldest inserted key goes first. Reads do
 * not refresh an entry.
 */

export class ContainmentCache {
  private store = new Map<string, number>();

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error("capacity must be a positive integer");
    }
  }

  get(key: string): number | undefined {
    return this.store.get(key);
  }

  set(key: string, mask: number): void {
    if (this.store.size >= this.capacity && !this.store.has(key)) {
      const oldest = this.store.keys().next().value;
      if (oldest !== undefined) this.store.delete(oldest);
    }
    this.store.set(key, mask);
  }

  has(key: string): boolean {
    return this.store.has(key);
  }

  clear(): void {
    this.store.clear();
  }

  get size(): number {
    return this.store.size;
  }
}
