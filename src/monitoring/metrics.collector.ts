/**
 * Metrics Collector
 *
 * Collects and exposes Prometheus-compatible metrics via
 * GET /api/registration/v1/metrics.
 * Tracks: row outcomes, captcha attempts, day outcomes, manual replies
 * and day worker duration.
 *
 * Uses simple in-memory counters; values reset with the process.
 */

interface MetricCounters {
  [key: string]: number;
}

const COUNTER_HELP: Array<[name: string, help: string]> = [
  ["registration_rows_total", "Registrant rows finished, by status"],
  ["captcha_attempts_total", "Captcha solve-and-submit attempts, by result"],
  ["registration_days_total", "Sale day workers finished, by status"],
  ["manual_replies_total", "Operator captcha replies, by outcome"],
];

const DURATION_BUCKETS = [10, 30, 60, 300, 900];

export class MetricsCollector {
  private counters: MetricCounters = {};
  private durations: number[] = [];
  private maxDurationSamples = 1000;

  /** Increment a counter metric */
  increment(name: string, labels: Record<string, string> = {}): void {
    const key = this.buildKey(name, labels);
    this.counters[key] = (this.counters[key] || 0) + 1;
  }

  /** Current value of a counter, 0 if never incremented */
  get(name: string, labels: Record<string, string> = {}): number {
    return this.counters[this.buildKey(name, labels)] || 0;
  }

  /** Record a day worker duration for the histogram */
  recordDuration(durationSeconds: number): void {
    this.durations.push(durationSeconds);
    // Keep only the last N samples to bound memory
    if (this.durations.length > this.maxDurationSamples) {
      this.durations = this.durations.slice(-this.maxDurationSamples);
    }
  }

  /**
   * Format all metrics as Prometheus text exposition format.
   * This string is returned by the /metrics endpoint.
   */
  format(): string {
    const lines: string[] = [];

    for (const [name, help] of COUNTER_HELP) {
      lines.push(`# HELP ${name} ${help}`);
      lines.push(`# TYPE ${name} counter`);
      for (const [key, value] of Object.entries(this.counters)) {
        if (key === name || key.startsWith(`${name}{`)) {
          lines.push(`${key} ${value}`);
        }
      }
      lines.push("");
    }

    lines.push("# HELP registration_day_duration_seconds Sale day worker duration");
    lines.push("# TYPE registration_day_duration_seconds histogram");
    for (const le of DURATION_BUCKETS) {
      const count = this.durations.filter((d) => d <= le).length;
      lines.push(`registration_day_duration_seconds_bucket{le="${le}"} ${count}`);
    }
    lines.push(
      `registration_day_duration_seconds_bucket{le="+Inf"} ${this.durations.length}`
    );
    lines.push(`registration_day_duration_seconds_count ${this.durations.length}`);
    const sum = this.durations.reduce((a, b) => a + b, 0);
    lines.push(`registration_day_duration_seconds_sum ${sum.toFixed(2)}`);

    return lines.join("\n");
  }

  reset(): void {
    this.counters = {};
    this.durations = [];
  }

  private buildKey(name: string, labels: Record<string, string>): string {
    if (Object.keys(labels).length === 0) return name;
    const labelStr = Object.entries(labels)
      .map(([k, v]) => `${k}="${v}"`)
      .join(",");
    return `${name}{${labelStr}}`;
  }
}

/** Singleton metrics collector instance */
export const metrics = new MetricsCollector();
