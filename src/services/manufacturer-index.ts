/**
 * Read-only mapping of organization name to the entries registered under it.
 * Names are compared exactly (case-sensitive, no normalization) and every
 * bucket keeps table order.
 */
export class ManufacturerIndex<T> {
  private readonly buckets = new Map<string, readonly T[]>();

  constructor(entries: Iterable<T>, nameOf: (entry: T) => string) {
    const grouped = new Map<string, T[]>();
    for (const entry of entries) {
      const name = nameOf(entry);
      const bucket = grouped.get(name);
      if (bucket) {
        bucket.push(entry);
      } else {
        grouped.set(name, [entry]);
      }
    }

    for (const [name, bucket] of grouped) {
      this.buckets.set(name, Object.freeze(bucket));
    }
  }

  /** Number of distinct names */
  get size(): number {
    return this.buckets.size;
  }

  get(name: string): readonly T[] | null {
    return this.buckets.get(name) ?? null;
  }

  has(name: string): boolean {
    return this.buckets.has(name);
  }

  /** Distinct names in first-seen order */
  names(): string[] {
    return [...this.buckets.keys()];
  }
}
