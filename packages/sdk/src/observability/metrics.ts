/**
 * Operation counters for the record index
 */

export interface IndexMetrics {
  inserts: number;
  duplicateInserts: number;
  removes: number;
  missedRemoves: number;
  lookupHits: number;
  lookupMisses: number;
  lookupDeleted: number;
}

export type IndexCounter = keyof IndexMetrics;

function emptyMetrics(): IndexMetrics {
  return {
    inserts: 0,
    duplicateInserts: 0,
    removes: 0,
    missedRemoves: 0,
    lookupHits: 0,
    lookupMisses: 0,
    lookupDeleted: 0,
  };
}

class MetricsCollector {
  #metrics: IndexMetrics = emptyMetrics();

  /**
   * Increment a counter
   */
  increment(counter: IndexCounter): void {
    this.#metrics[counter]++;
  }

  /**
   * Snapshot of all counters
   */
  getMetrics(): IndexMetrics {
    return { ...this.#metrics };
  }

  /**
   * Lookup hit rate: found / (found + deleted + not found)
   */
  getHitRate(): number {
    const { lookupHits, lookupMisses, lookupDeleted } = this.#metrics;
    const total = lookupHits + lookupMisses + lookupDeleted;
    return total > 0 ? lookupHits / total : 0;
  }

  /**
   * Reset all counters to zero
   */
  reset(): void {
    this.#metrics = emptyMetrics();
  }
}

/**
 * Global metrics collector instance
 */
export const metrics = new MetricsCollector();
