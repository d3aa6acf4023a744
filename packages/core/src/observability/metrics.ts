/**
 * Metrics tracking for read latency over a windowed list
 */

export interface ReadMetrics {
  readCount: number;
  totalNs: number;
  roundNs: number[];
}

/** Samples kept per key */
const MAX_SAMPLES = 100;

export class MetricsCollector {
  #metrics = new Map<string, ReadMetrics>();

  /**
   * Get or create metrics for a subject/block pair
   */
  #getMetrics(subject: string, block: number): ReadMetrics {
    const key = `${subject}/${block}`;
    let metrics = this.#metrics.get(key);
    if (!metrics) {
      metrics = {
        readCount: 0,
        totalNs: 0,
        roundNs: [],
      };
      this.#metrics.set(key, metrics);
    }
    return metrics;
  }

  /**
   * Record one timed round of reads against a block
   */
  recordReadRound(subject: string, block: number, reads: number, ns: number): void {
    const metrics = this.#getMetrics(subject, block);
    metrics.readCount += reads;
    metrics.totalNs += ns;
    metrics.roundNs.push(ns);

    if (metrics.roundNs.length > MAX_SAMPLES) {
      metrics.roundNs.shift();
    }
  }

  /**
   * Get metrics for a subject/block pair
   */
  getMetrics(subject: string, block: number): ReadMetrics | undefined {
    return this.#metrics.get(`${subject}/${block}`);
  }

  /**
   * Average nanoseconds per read, 0 when nothing was recorded
   */
  getNsPerRead(subject: string, block: number): number {
    const metrics = this.getMetrics(subject, block);
    if (!metrics || metrics.readCount === 0) return 0;
    return metrics.totalNs / metrics.readCount;
  }

  /**
   * Calculate p95 for a set of samples
   */
  getP95(values: number[]): number {
    if (values.length === 0) return 0;

    const sorted = [...values].sort((a, b) => a - b);
    const idx = Math.ceil(sorted.length * 0.95) - 1;
    return sorted[Math.max(0, idx)] ?? 0;
  }

  /**
   * p95 round time for a subject/block pair
   */
  getP95RoundNs(subject: string, block: number): number {
    const metrics = this.getMetrics(subject, block);
    return metrics ? this.getP95(metrics.roundNs) : 0;
  }

  /**
   * Reset metrics for one subject, or all
   */
  reset(subject?: string): void {
    if (subject === undefined) {
      this.#metrics.clear();
      return;
    }
    for (const key of [...this.#metrics.keys()]) {
      if (key.startsWith(`${subject}/`)) {
        this.#metrics.delete(key);
      }
    }
  }
}
