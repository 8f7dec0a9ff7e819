/** Result of a registry lookup. */
export type LoadResult<V> = { value: V; found: true } | { value: undefined; found: false };

/**
 * Keyed registry shared by request handlers, host workers and the reconciler.
 *
 * Every read that walks the map (`range`, `keys`, `values`, `pairs`) works on a
 * point-in-time copy of the entries, so a visitor that awaits or mutates the
 * registry never sees a half-updated iteration.
 */
export class ConcurrentMap<K, V> {
  // Values are boxed so a stored `undefined` is still distinguishable from a miss.
  private readonly entries = new Map<K, { value: V }>();

  store(key: K, value: V): void {
    this.entries.set(key, { value });
  }

  load(key: K): LoadResult<V> {
    const entry = this.entries.get(key);
    if (!entry) {
      return { value: undefined, found: false };
    }
    return { value: entry.value, found: true };
  }

  /** Remove a key. Returns whether it was present. */
  delete(key: K): boolean {
    return this.entries.delete(key);
  }

  exists(key: K): boolean {
    return this.entries.has(key);
  }

  /** Visit a snapshot of the entries. Returning `false` from the visitor stops the walk. */
  range(visit: (key: K, value: V) => unknown): void {
    for (const [key, value] of this.snapshot()) {
      if (visit(key, value) === false) return;
    }
  }

  keys(): K[] {
    return this.snapshot().map(([key]) => key);
  }

  values(): V[] {
    return this.snapshot().map(([, value]) => value);
  }

  pairs(): Map<K, V> {
    return new Map(this.snapshot());
  }

  len(): number {
    return this.entries.size;
  }

  private snapshot(): Array<[K, V]> {
    return Array.from(this.entries, ([key, entry]) => [key, entry.value]);
  }
}
