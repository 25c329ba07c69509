/**
 * Metrics tracking for slot I/O
 */

export interface SlotMetrics {
  reads: number;
  writes: number;
  shortReads: number;
  readTimeMs: number[];
  writeTimeMs: number[];
}

/** Samples kept per timing series */
const MAX_SAMPLES = 100;

function pushSample(samples: number[], ms: number): void {
  samples.push(ms);
  if (samples.length > MAX_SAMPLES) {
    samples.shift();
  }
}

export class MetricsCollector {
  #metrics = new Map<string, SlotMetrics>();

  #getMetrics(file: string): SlotMetrics {
    let metrics = this.#metrics.get(file);
    if (!metrics) {
      metrics = { reads: 0, writes: 0, shortReads: 0, readTimeMs: [], writeTimeMs: [] };
      this.#metrics.set(file, metrics);
    }
    return metrics;
  }

  recordRead(file: string, ms: number): void {
    const metrics = this.#getMetrics(file);
    metrics.reads++;
    pushSample(metrics.readTimeMs, ms);
  }

  recordShortRead(file: string): void {
    this.#getMetrics(file).shortReads++;
  }

  recordWrite(file: string, ms: number): void {
    const metrics = this.#getMetrics(file);
    metrics.writes++;
    pushSample(metrics.writeTimeMs, ms);
  }

  getMetrics(file: string): SlotMetrics | undefined {
    return this.#metrics.get(file);
  }

  getAllMetrics(): Map<string, SlotMetrics> {
    return new Map(this.#metrics);
  }

  /**
   * Calculate p95 for a series of samples
   */
  getP95(values: number[]): number {
    if (values.length === 0) return 0;

    const sorted = [...values].sort((a, b) => a - b);
    const idx = Math.max(0, Math.ceil(sorted.length * 0.95) - 1);
    return sorted[idx] ?? 0;
  }

  /**
   * Reset metrics for one data file, or all of them
   */
  reset(file?: string): void {
    if (file) {
      this.#metrics.delete(file);
    } else {
      this.#metrics.clear();
    }
  }
}

/**
 * Global metrics collector instance
 */
export const metrics = new MetricsCollector();
