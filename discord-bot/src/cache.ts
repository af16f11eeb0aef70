export type CacheKey = readonly (bigint | number)[];

export type CacheInfo = {
  hits: number;
  misses: number;
  size: number;
};

type Entry<V> = { value: V };

// Absent results (`undefined`) are cached too. Entries only leave through invalidate/clear.
export class MemoCache<K extends CacheKey, V> {
  readonly name: string;
  private readonly entries = new Map<string, Entry<V>>();
  private hits = 0;
  private misses = 0;

  constructor(name: string) {
    this.name = name;
  }

  get(key: K, load: () => V): V {
    const id = this.keyOf(key);
    if (id === undefined) return load();

    const entry = this.entries.get(id);
    if (entry) {
      this.hits += 1;
      return entry.value;
    }
    this.misses += 1;
    const value = load();
    this.entries.set(id, { value });
    return value;
  }

  invalidate(key: K): boolean {
    const id = this.keyOf(key);
    if (id === undefined) {
      // Nothing could have been stored under a key that cannot be serialized.
      return false;
    }
    return this.entries.delete(id);
  }

  clear(): void {
    this.entries.clear();
    this.hits = 0;
    this.misses = 0;
  }

  info(): CacheInfo {
    return { hits: this.hits, misses: this.misses, size: this.entries.size };
  }

  protected serialize(key: K): string {
    return key.map((part) => part.toString()).join(':');
  }

  private keyOf(key: K): string | undefined {
    try {
      return this.serialize(key);
    } catch (err) {
      console.warn(`Cache '${this.name}' could not key ${key.length}-part lookup; reading through`, err);
      return undefined;
    }
  }
}
