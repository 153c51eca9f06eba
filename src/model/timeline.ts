/**
 * Timestamp-ordered map used for a server's stat and test series.
 * Keys are epoch milliseconds of `savedAt`, kept sorted for neighbour lookup.
 */

export interface Timestamped {
  readonly savedAt: Date;
}

export interface Neighbours<T> {
  previous: T | undefined;
  next: T | undefined;
}

export class Timeline<T extends Timestamped> implements Iterable<T> {
  private readonly entries = new Map<number, T>();
  private readonly keys: number[] = [];

  constructor(items: Iterable<T> = []) {
    for (const item of items) {
      this.set(item);
    }
  }

  get size(): number {
    return this.keys.length;
  }

  get(at: Date): T | undefined {
    return this.entries.get(at.getTime());
  }

  /** Inserts or replaces the entry at `item.savedAt` */
  set(item: T): void {
    const key = item.savedAt.getTime();
    if (!this.entries.has(key)) {
      this.keys.splice(bisectLeft(this.keys, key), 0, key);
    }
    this.entries.set(key, item);
  }

  /** Closest entries strictly before and strictly after `at` */
  neighbours(at: Date): Neighbours<T> {
    const key = at.getTime();
    const idx = bisectLeft(this.keys, key);
    const nextIdx = this.keys[idx] === key ? idx + 1 : idx;
    return {
      previous: idx > 0 ? this.entries.get(this.keys[idx - 1]) : undefined,
      next: nextIdx < this.keys.length ? this.entries.get(this.keys[nextIdx]) : undefined,
    };
  }

  last(): T | undefined {
    return this.keys.length > 0 ? this.entries.get(this.keys[this.keys.length - 1]) : undefined;
  }

  values(): T[] {
    const result: T[] = [];
    for (const key of this.keys) {
      const item = this.entries.get(key);
      if (item !== undefined) result.push(item);
    }
    return result;
  }

  [Symbol.iterator](): Iterator<T> {
    return this.values()[Symbol.iterator]();
  }

  /** Shallow copy: entries are shared, ordering state is not */
  clone(): Timeline<T> {
    return new Timeline(this.values());
  }
}

function bisectLeft(sorted: number[], key: number): number {
  let lo = 0;
  let hi = sorted.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (sorted[mid] < key) lo = mid + 1;
    else hi = mid;
  }
  return lo;
}
