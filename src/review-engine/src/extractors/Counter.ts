/**
 * Frequency tally with insertion-ordered tie breaking.
 */
export class Counter<K extends string = string> {
  private counts = new Map<K, number>();

  add(key: K, amount: number = 1): void {
    this.counts.set(key, (this.counts.get(key) ?? 0) + amount);
  }

  addAll(keys: Iterable<K>): void {
    for (const key of keys) this.add(key);
  }

  /**
   * Entries by descending count; equal counts keep first-seen order.
   */
  mostCommon(limit?: number): Array<[K, number]> {
    const entries = [...this.counts.entries()].sort((a, b) => b[1] - a[1]);
    return limit === undefined ? entries : entries.slice(0, limit);
  }

  /** Most frequent key, or undefined when nothing was counted */
  mode(): K | undefined {
    let best: K | undefined;
    let bestCount = 0;
    for (const [key, count] of this.counts) {
      if (count > bestCount) {
        best = key;
        bestCount = count;
      }
    }
    return best;
  }

  toRecord(limit?: number): Record<string, number> {
    return Object.fromEntries(this.mostCommon(limit));
  }
}
