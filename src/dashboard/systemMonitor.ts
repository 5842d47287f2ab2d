import type { ModuleHealth, SystemHealthSnapshot } from "./dashboardTypes";

export interface RequestMetric {
  timestamp: number;
  durationMs: number;
  status: number;
  module: string;
}

const MODULE_PREFIXES: Array<[prefix: string, module: string]> = [
  ["/api/chat", "chat"],
  ["/api/assignment", "assignment"],
  ["/api/auth", "auth"],
  ["/api/dashboard", "dashboard"],
  ["/health", "health"]
];

export const moduleForPath = (url: string): string =>
  MODULE_PREFIXES.find(([prefix]) => url.startsWith(prefix))?.[1] ?? "other";

const percentile = (sorted: number[], p: number): number => {
  if (sorted.length === 0) return 0;
  const idx = Math.min(sorted.length - 1, Math.max(0, Math.floor((p / 100) * sorted.length)));
  return sorted[idx] ?? 0;
};

export class SystemMonitor {
  private readonly metrics: RequestMetric[] = [];
  private readonly maxEntries: number;
  private readonly now: () => number;
  private readonly start: number;

  constructor(opts?: { maxEntries?: number; now?: () => number }) {
    this.maxEntries = opts?.maxEntries ?? 10_000;
    this.now = opts?.now ?? Date.now;
    this.start = this.now();
  }

  recordRequest(metric: RequestMetric): void {
    this.metrics.push(metric);
    if (this.metrics.length > this.maxEntries) {
      this.metrics.splice(0, this.metrics.length - this.maxEntries);
    }
  }

  getUptimeSeconds(): number {
    return Math.floor((this.now() - this.start) / 1000);
  }

  getSnapshot(rangeMs: number): SystemHealthSnapshot {
    const cutoff = this.now() - rangeMs;
    const recent = this.metrics.filter((m) => m.timestamp >= cutoff);

    const durations = recent.map((m) => m.durationMs).sort((a, b) => a - b);
    const total = recent.length;
    const errors = recent.filter((m) => m.status >= 500).length;

    const avgResponseTimeMs = total === 0 ? 0 : recent.reduce((acc, m) => acc + m.durationMs, 0) / total;

    const moduleMap = new Map<string, { count: number; errors: number }>();
    for (const m of recent) {
      const current = moduleMap.get(m.module) ?? { count: 0, errors: 0 };
      current.count += 1;
      if (m.status >= 500) current.errors += 1;
      moduleMap.set(m.module, current);
    }

    const modules: ModuleHealth[] = [...moduleMap.entries()].map(([module, s]) => ({
      module,
      count: s.count,
      errors: s.errors,
      errorRate: s.count === 0 ? 0 : Number((s.errors / s.count).toFixed(4))
    }));

    return {
      uptimeSeconds: this.getUptimeSeconds(),
      total,
      errors,
      avgResponseTimeMs: Number(avgResponseTimeMs.toFixed(1)),
      p95ResponseTimeMs: Number(percentile(durations, 95).toFixed(1)),
      errorRate: total === 0 ? 0 : Number((errors / total).toFixed(4)),
      modules
    };
  }
}
