/**
 * Optimization run counters and timing statistics for GET /metrics.
 */

export interface Metrics {
  runs: {
    completed: number;
    empty: number; // completed without a feasible recommendation
    failed: number; // aborted or timed out
  };
  search: {
    subsetsEvaluated: number;
    recommendationsGenerated: number;
  };
  performance: {
    runTimes: number[]; // run durations in ms
    p95RunTime?: number;
    avgRunTime?: number;
  };
}

function emptyMetrics(): Metrics {
  return {
    runs: { completed: 0, empty: 0, failed: 0 },
    search: { subsetsEvaluated: 0, recommendationsGenerated: 0 },
    performance: { runTimes: [] },
  };
}

class MetricsStore {
  private metrics: Metrics = emptyMetrics();

  private readonly MAX_RUN_TIMES = 1000;

  recordRun(subsetsEvaluated: number, recommendations: number, durationMs: number): void {
    this.metrics.runs.completed++;
    if (recommendations === 0) {
      this.metrics.runs.empty++;
    }
    this.metrics.search.subsetsEvaluated += subsetsEvaluated;
    this.metrics.search.recommendationsGenerated += recommendations;

    this.metrics.performance.runTimes.push(durationMs);
    if (this.metrics.performance.runTimes.length > this.MAX_RUN_TIMES) {
      this.metrics.performance.runTimes.shift();
    }
    this.updatePerformanceStats();
  }

  recordFailedRun(): void {
    this.metrics.runs.failed++;
  }

  private updatePerformanceStats(): void {
    const times = this.metrics.performance.runTimes;
    if (times.length === 0) return;

    const sum = times.reduce((a, b) => a + b, 0);
    this.metrics.performance.avgRunTime = sum / times.length;

    const sorted = [...times].sort((a, b) => a - b);
    const p95Index = Math.min(sorted.length - 1, Math.floor(sorted.length * 0.95));
    this.metrics.performance.p95RunTime = sorted[p95Index];
  }

  getMetrics(): Metrics {
    return {
      runs: { ...this.metrics.runs },
      search: { ...this.metrics.search },
      performance: {
        ...this.metrics.performance,
        // Raw samples stay internal
        runTimes: [],
      },
    };
  }

  reset(): void {
    this.metrics = emptyMetrics();
  }
}

export const metricsStore = new MetricsStore();
