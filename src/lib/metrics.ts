import type { DecisionOutcome } from '../types';

export interface MetricsData {
  admitted: number;
  rejected: number;
  bypassedMethod: number;
  bypassedIdentity: number;
  decisionTimeSum: number; // ms
  decisionTimeCount: number;
  rejectedByPath: Map<string, number>;
  timestamp: number;
}

function emptyMetrics(): MetricsData {
  return {
    admitted: 0,
    rejected: 0,
    bypassedMethod: 0,
    bypassedIdentity: 0,
    decisionTimeSum: 0,
    decisionTimeCount: 0,
    rejectedByPath: new Map(),
    timestamp: Date.now(),
  };
}

function sanitizeLabel(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/"/g, '\\"').replace(/\n/g, '\\n');
}

export const OTHER_PATHS = 'other';

export class MetricsCollector {
  private metrics: MetricsData = emptyMetrics();
  // set by the limiter that reports into this collector
  private bucketCount: () => number = () => 0;

  /**
   * @param maxPathLabels distinct paths counted under their own label; rejections
   *   on any further path are counted under `other`
   */
  constructor(
    private readonly prefix: string = 'ratebooth_',
    private readonly maxPathLabels: number = 100,
  ) {}

  recordDecision(outcome: DecisionOutcome, path: string, decisionTimeMs: number): void {
    switch (outcome) {
      case 'admitted':
        this.metrics.admitted++;
        break;
      case 'rejected': {
        this.metrics.rejected++;
        const byPath = this.metrics.rejectedByPath;
        const label = byPath.has(path) || byPath.size < this.maxPathLabels ? path : OTHER_PATHS;
        byPath.set(label, (byPath.get(label) || 0) + 1);
        break;
      }
      case 'bypass-method':
        this.metrics.bypassedMethod++;
        break;
      case 'bypass-identity':
        this.metrics.bypassedIdentity++;
        break;
    }
    this.metrics.decisionTimeSum += decisionTimeMs;
    this.metrics.decisionTimeCount++;
  }

  trackBuckets(count: () => number): void {
    this.bucketCount = count;
  }

  getCurrentMetrics(): MetricsData {
    return { ...this.metrics, rejectedByPath: new Map(this.metrics.rejectedByPath) };
  }

  reset(): void {
    this.metrics = emptyMetrics();
  }

  getPrometheusMetrics(): string {
    const current = this.getCurrentMetrics();
    const p = this.prefix;

    let text = `# HELP ${p}requests_admitted_total Requests admitted by the limiter
# TYPE ${p}requests_admitted_total counter
${p}requests_admitted_total ${current.admitted}

# HELP ${p}requests_rejected_total Requests rejected by the limiter
# TYPE ${p}requests_rejected_total counter
${p}requests_rejected_total ${current.rejected}

# HELP ${p}requests_bypassed_total Requests admitted without touching a bucket
# TYPE ${p}requests_bypassed_total counter
${p}requests_bypassed_total{reason="method"} ${current.bypassedMethod}
${p}requests_bypassed_total{reason="identity"} ${current.bypassedIdentity}

# HELP ${p}decision_time_seconds Time spent deciding
# TYPE ${p}decision_time_seconds summary
${p}decision_time_seconds_sum ${current.decisionTimeSum / 1000}
${p}decision_time_seconds_count ${current.decisionTimeCount}

# HELP ${p}buckets Live token buckets
# TYPE ${p}buckets gauge
${p}buckets ${this.bucketCount()}
`;

    if (current.rejectedByPath.size > 0) {
      text += `
# HELP ${p}path_rejections_total Rejections per request path
# TYPE ${p}path_rejections_total counter
`;
      for (const [path, count] of current.rejectedByPath) {
        text += `${p}path_rejections_total{path="${sanitizeLabel(path)}"} ${count}\n`;
      }
    }

    return text;
  }
}
