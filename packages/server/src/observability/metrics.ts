/**
 * In-process metrics for the tool surface
 * Labelled counters plus histograms over a sliding window of recent samples
 */

import type { SearchMode } from "@contactbook/store";
import type { ToolName } from "../tools.js";

export type MetricName =
  | "contactbook.tool.calls_total"
  | "contactbook.tool.errors_total"
  | "contactbook.tool.latency_ms"
  | "contactbook.records_total"
  | "contactbook.search.results";

export type Labels = Record<string, string>;

export interface HistogramStats {
  count: number;
  sum: number;
  p50: number;
  p95: number;
  p99: number;
}

/** Samples kept per histogram series */
const WINDOW = 1000;

function seriesKey(name: MetricName, labels: Labels): string {
  const pairs = Object.keys(labels)
    .sort()
    .map((key) => `${key}="${labels[key] ?? ""}"`);
  return pairs.length ? `${name}{${pairs.join(",")}}` : name;
}

// Nearest-rank percentile over sorted samples
function percentile(sorted: number[], p: number): number {
  return sorted[Math.max(0, Math.ceil((p / 100) * sorted.length) - 1)] ?? 0;
}

export class MetricsRegistry {
  #counters = new Map<string, number>();
  #samples = new Map<string, number[]>();

  inc(name: MetricName, labels: Labels = {}, by = 1): void {
    const key = seriesKey(name, labels);
    this.#counters.set(key, (this.#counters.get(key) ?? 0) + by);
  }

  observe(name: MetricName, value: number, labels: Labels = {}): void {
    const key = seriesKey(name, labels);
    const samples = this.#samples.get(key) ?? [];
    samples.push(value);
    if (samples.length > WINDOW) {
      samples.shift();
    }
    this.#samples.set(key, samples);
  }

  getCounter(name: MetricName, labels: Labels = {}): number {
    return this.#counters.get(seriesKey(name, labels)) ?? 0;
  }

  getHistogram(name: MetricName, labels: Labels = {}): HistogramStats | null {
    const samples = this.#samples.get(seriesKey(name, labels));
    if (!samples?.length) {
      return null;
    }

    const sorted = [...samples].sort((a, b) => a - b);
    return {
      count: sorted.length,
      sum: sorted.reduce((total, value) => total + value, 0),
      p50: percentile(sorted, 50),
      p95: percentile(sorted, 95),
      p99: percentile(sorted, 99),
    };
  }

  reset(): void {
    this.#counters.clear();
    this.#samples.clear();
  }
}

export const metrics = new MetricsRegistry();

export function recordToolExecution(tool: ToolName, durationMs: number, success: boolean, errCode?: string): void {
  metrics.inc("contactbook.tool.calls_total", { tool });
  if (!success) {
    metrics.inc("contactbook.tool.errors_total", { tool, err_code: errCode ?? "UNKNOWN" });
  }
  metrics.observe("contactbook.tool.latency_ms", durationMs, { tool });
}

/**
 * Count the records a bulk call applied and the ones it reported as failed
 */
export function recordBatchOutcome(tool: ToolName, succeeded: number, failed: number): void {
  if (succeeded > 0) {
    metrics.inc("contactbook.records_total", { tool, outcome: "ok" }, succeeded);
  }
  if (failed > 0) {
    metrics.inc("contactbook.records_total", { tool, outcome: "failed" }, failed);
  }
}

/**
 * Result-set sizes per search mode; "default" when the call left the mode to the store
 */
export function recordSearchResults(mode: SearchMode | undefined, results: number): void {
  metrics.observe("contactbook.search.results", results, { mode: mode ?? "default" });
}
