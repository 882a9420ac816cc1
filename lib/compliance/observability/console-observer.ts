/**
 * Console Observer
 *
 * Default observer that writes one structured JSON line per run event,
 * for easy parsing in hosted log systems.
 */

import type { ComplianceRunObserver, ObserverMetrics } from "./types";

export type LogSink = (line: string) => void;

export interface ConsoleObserverOptions {
  /** Where JSON lines go; defaults to console.log */
  sink?: LogSink;
  /** Clock used for event timestamps */
  now?: () => Date;
}

export class ConsoleObserver implements ComplianceRunObserver {
  private metrics: ObserverMetrics = {
    counters: {},
    timings: {},
    steps: [],
  };

  private readonly sink: LogSink;
  private readonly now: () => Date;

  constructor(options: ConsoleObserverOptions = {}) {
    this.sink = options.sink ?? ((line) => console.log(line));
    this.now = options.now ?? (() => new Date());
  }

  onRunStart(meta: { runId: string; input: unknown }): void {
    this.emit({
      event: "compliance_run_start",
      runId: meta.runId,
      input: meta.input,
    });
  }

  onStepStart(meta: { runId: string; step: string }): void {
    this.emit({
      event: "compliance_step_start",
      runId: meta.runId,
      step: meta.step,
    });
  }

  onStepEnd(meta: {
    runId: string;
    step: string;
    ok: boolean;
    durationMs: number;
    data?: unknown;
  }): void {
    this.metrics.steps.push({
      step: meta.step,
      ok: meta.ok,
      durationMs: meta.durationMs,
      data: meta.data,
    });

    this.emit({
      event: "compliance_step_end",
      runId: meta.runId,
      step: meta.step,
      ok: meta.ok,
      durationMs: meta.durationMs,
      data: meta.data,
    });
  }

  onRunEnd(meta: {
    runId: string;
    ok: boolean;
    durationMs: number;
    error?: string;
  }): void {
    this.emit({
      event: "compliance_run_end",
      runId: meta.runId,
      ok: meta.ok,
      durationMs: meta.durationMs,
      error: meta.error,
      metrics: this.metrics,
    });
  }

  increment(name: string, by = 1, tags?: Record<string, string>): void {
    const key = metricKey(name, tags);
    this.metrics.counters[key] = (this.metrics.counters[key] || 0) + by;
  }

  timing(name: string, durationMs: number, tags?: Record<string, string>): void {
    const key = metricKey(name, tags);
    const series = this.metrics.timings[key] ?? [];
    series.push(durationMs);
    this.metrics.timings[key] = series;
  }

  getMetrics(): ObserverMetrics {
    return { ...this.metrics };
  }

  private emit(payload: Record<string, unknown>): void {
    this.sink(
      JSON.stringify({
        ...payload,
        timestamp: this.now().toISOString(),
      })
    );
  }
}

function metricKey(name: string, tags?: Record<string, string>): string {
  return tags ? `${name}:${JSON.stringify(tags)}` : name;
}

/**
 * Create a new console observer instance.
 */
export function createConsoleObserver(options?: ConsoleObserverOptions): ConsoleObserver {
  return new ConsoleObserver(options);
}
