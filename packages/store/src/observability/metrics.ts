/**
 * Metrics tracking for store operations and index probes
 */

/** Samples kept per series */
const MAX_SAMPLES = 100;

export type IndexName = "name" | "phone" | "email";

export type OperationName = "create" | "get" | "update" | "delete" | "search" | "list" | "verify";

export interface IndexMetrics {
  hitCount: number;
  missCount: number;
}

export interface OperationMetrics {
  count: number;
  errorCount: number;
  timeMs: number[];
}

function pushSample(values: number[], value: number): void {
  values.push(value);

  // Keep only the most recent samples to avoid unbounded memory growth
  if (values.length > MAX_SAMPLES) {
    values.shift();
  }
}

export class MetricsCollector {
  #indexes = new Map<IndexName, IndexMetrics>();
  #operations = new Map<OperationName, OperationMetrics>();
  #scanned: number[] = [];

  #getIndex(index: IndexName): IndexMetrics {
    let metrics = this.#indexes.get(index);
    if (!metrics) {
      metrics = { hitCount: 0, missCount: 0 };
      this.#indexes.set(index, metrics);
    }
    return metrics;
  }

  #getOperation(op: OperationName): OperationMetrics {
    let metrics = this.#operations.get(op);
    if (!metrics) {
      metrics = { count: 0, errorCount: 0, timeMs: [] };
      this.#operations.set(op, metrics);
    }
    return metrics;
  }

  /**
   * Record an index probe that found at least one id
   */
  recordHit(index: IndexName): void {
    this.#getIndex(index).hitCount++;
  }

  /**
   * Record an index probe that found nothing
   */
  recordMiss(index: IndexName): void {
    this.#getIndex(index).missCount++;
  }

  /**
   * Record a completed (or failed) operation and its duration
   */
  recordOperation(op: OperationName, ms: number, ok: boolean): void {
    const metrics = this.#getOperation(op);
    metrics.count++;
    if (!ok) {
      metrics.errorCount++;
    }
    pushSample(metrics.timeMs, ms);
  }

  /**
   * Record how many primary-table records a search examined
   */
  recordScan(records: number): void {
    pushSample(this.#scanned, records);
  }

  getIndexMetrics(index: IndexName): IndexMetrics | undefined {
    return this.#indexes.get(index);
  }

  getOperationMetrics(op: OperationName): OperationMetrics | undefined {
    return this.#operations.get(op);
  }

  /**
   * Records examined by the most recent search (0 before any search)
   */
  get lastScanned(): number {
    return this.#scanned.at(-1) ?? 0;
  }

  /**
   * Calculate hit rate for an index
   */
  getHitRate(index: IndexName): number {
    const metrics = this.#getIndex(index);
    const total = metrics.hitCount + metrics.missCount;
    return total > 0 ? metrics.hitCount / total : 0;
  }

  /**
   * Calculate p95 for a series
   */
  getP95(values: number[]): number {
    if (values.length === 0) return 0;

    const sorted = [...values].sort((a, b) => a - b);
    const idx = Math.max(0, Math.ceil(sorted.length * 0.95) - 1);
    return sorted[idx] ?? 0;
  }

  /**
   * Get p95 duration for an operation
   */
  getP95Time(op: OperationName): number {
    return this.getP95(this.#getOperation(op).timeMs);
  }

  reset(): void {
    this.#indexes.clear();
    this.#operations.clear();
    this.#scanned = [];
  }
}
