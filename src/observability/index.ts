import fs from "node:fs";
import path from "node:path";

export type LexiconLogEvent =
  | "resolve.completed"
  | "enrichment.echo_mismatch"
  | "enrichment.lemma_mismatch"
  | "enrichment.persisted"
  | "enrichment.transient_failure"
  | "enrichment.attached_inflight"
  | "history.write_failed";

export type LexiconLogLevel = "info" | "warn";

export type LexiconStructuredLog = {
  ts: string;
  event: LexiconLogEvent;
  level: LexiconLogLevel;
  details: Record<string, unknown>;
};

export interface LexiconObserverOptions {
  console?: boolean;
  structuredLogPath?: string;
  maxLatencySamples?: number;
  now?: () => number;
}

export interface LexiconMetricsSnapshot {
  total: number;
  outcomes: Record<string, number>;
  tiers: Record<string, number>;
  reasons: Record<string, number>;
  latency: {
    samples: number;
    p50Ms: number;
    p95Ms: number;
  };
}

export function percentile(values: readonly number[], p: number): number {
  if (values.length === 0) return 0;
  const sorted = [...values].sort((a, b) => a - b);
  const index = Math.min(sorted.length - 1, Math.max(0, Math.floor((p / 100) * (sorted.length - 1))));
  return sorted[index] ?? 0;
}

function bump(counter: Record<string, number>, key: string): void {
  counter[key] = (counter[key] ?? 0) + 1;
}

export class LexiconObserver {
  private readonly consoleEnabled: boolean;
  private readonly structuredLogPath: string;
  private readonly maxLatencySamples: number;
  private readonly now: () => number;
  private readonly latenciesMs: number[] = [];
  private readonly outcomes: Record<string, number> = {};
  private readonly tiers: Record<string, number> = {};
  private readonly reasons: Record<string, number> = {};
  private total = 0;

  constructor(options: LexiconObserverOptions = {}) {
    this.consoleEnabled = options.console ?? true;
    this.structuredLogPath = String(options.structuredLogPath ?? "").trim();
    this.maxLatencySamples = Math.max(10, Math.floor(options.maxLatencySamples ?? 2_000));
    this.now = options.now ?? Date.now;
  }

  public log(event: LexiconLogEvent, details: Record<string, unknown> = {}, level: LexiconLogLevel = "info"): void {
    const entry: LexiconStructuredLog = {
      ts: new Date(this.now()).toISOString(),
      event,
      level,
      details,
    };
    if (this.consoleEnabled) {
      const payload = { event, ts: entry.ts, ...details };
      if (level === "warn") console.warn("[Lexicon]", payload);
      else console.info("[Lexicon]", payload);
    }
    if (this.structuredLogPath) this.appendJsonl(entry);
  }

  public recordOutcome(input: { kind: string; tier?: string | null; reason?: string | null; latencyMs: number }): void {
    this.total += 1;
    bump(this.outcomes, input.kind);
    if (input.tier) bump(this.tiers, input.tier);
    if (input.reason) bump(this.reasons, input.reason);
    if (Number.isFinite(input.latencyMs) && input.latencyMs >= 0) {
      this.latenciesMs.push(input.latencyMs);
      if (this.latenciesMs.length > this.maxLatencySamples) this.latenciesMs.shift();
    }
  }

  public snapshot(): LexiconMetricsSnapshot {
    return {
      total: this.total,
      outcomes: { ...this.outcomes },
      tiers: { ...this.tiers },
      reasons: { ...this.reasons },
      latency: {
        samples: this.latenciesMs.length,
        p50Ms: percentile(this.latenciesMs, 50),
        p95Ms: percentile(this.latenciesMs, 95),
      },
    };
  }

  private appendJsonl(entry: LexiconStructuredLog): void {
    try {
      fs.mkdirSync(path.dirname(this.structuredLogPath), { recursive: true });
      fs.appendFileSync(this.structuredLogPath, `${JSON.stringify(entry)}\n`, "utf8");
    } catch (err) {
      if (this.consoleEnabled) {
        console.warn("[Lexicon] structured log write failed", {
          path: this.structuredLogPath,
          error: err instanceof Error ? err.message : String(err),
        });
      }
    }
  }
}
