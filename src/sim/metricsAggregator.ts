import type { AgentRole, RunStatus, RunSummary } from "./types";
import { systemTimeSource, type TimeSource } from "./timeSource";

/**
 * The one piece of lifecycle state for a run. Owned by the aggregator; every
 * increment goes through it.
 */
type SimulationRun = {
  runId: string;
  status: RunStatus;
  failureCause?: string;
  startedAt: number;
  endedAt?: number;
  configuredDurationMs: number;
  tickIntervalMs: number;
  ticks: number;
  decisions: number;
  messages: number;
  alerts: number;
  suppressedAlerts: number;
  timeouts: number;
  decisionFailures: number;
  feedFailures: number;
  rejectedDecisions: number;
  supersededDecisions: number;
  decisionsByRole: Record<AgentRole, number>;
};

function emptyByRole(): Record<AgentRole, number> {
  return { physician: 0, nurse: 0, pharmacist: 0 };
}

export class MetricsAggregator {
  private readonly run: SimulationRun;
  private readonly time: TimeSource;
  private finalized?: RunSummary;

  constructor(opts: { runId: string; configuredDurationMs: number; tickIntervalMs: number; time?: TimeSource }) {
    this.time = opts.time ?? systemTimeSource;
    this.run = {
      runId: opts.runId,
      status: "idle",
      startedAt: this.time.now(),
      configuredDurationMs: opts.configuredDurationMs,
      tickIntervalMs: opts.tickIntervalMs,
      ticks: 0,
      decisions: 0,
      messages: 0,
      alerts: 0,
      suppressedAlerts: 0,
      timeouts: 0,
      decisionFailures: 0,
      feedFailures: 0,
      rejectedDecisions: 0,
      supersededDecisions: 0,
      decisionsByRole: emptyByRole(),
    };
  }

  get runId(): string {
    return this.run.runId;
  }

  get status(): RunStatus {
    return this.run.status;
  }

  markRunning(): void {
    this.run.status = "running";
    this.run.startedAt = this.time.now();
  }

  recordTick(): void {
    this.run.ticks++;
  }

  recordDecision(role: AgentRole): void {
    this.run.decisions++;
    this.run.decisionsByRole[role]++;
  }

  recordMessage(): void {
    this.run.messages++;
  }

  recordAlert(): void {
    this.run.alerts++;
  }

  recordSuppressedAlert(): void {
    this.run.suppressedAlerts++;
  }

  recordTimeout(): void {
    this.run.timeouts++;
  }

  recordDecisionFailure(): void {
    this.run.decisionFailures++;
  }

  recordFeedFailure(): void {
    this.run.feedFailures++;
  }

  recordRejectedDecision(): void {
    this.run.rejectedDecisions++;
  }

  recordSupersededDecision(): void {
    this.run.supersededDecisions++;
  }

  /** Close the run. Only the first call counts; later calls return the same summary. */
  finalize(status: "completed" | "failed", cause?: string): RunSummary {
    if (this.finalized) return this.finalized;
    this.run.status = status;
    this.run.endedAt = this.time.now();
    if (cause) this.run.failureCause = cause;
    this.finalized = this.summary();
    return this.finalized;
  }

  /** Read-only view; live while running, fixed once finalized. */
  summary(): RunSummary {
    if (this.finalized) return this.finalized;
    const run = this.run;
    const elapsedMs = Math.max(0, (run.endedAt ?? this.time.now()) - run.startedAt);
    return Object.freeze({
      runId: run.runId,
      status: run.status,
      ...(run.failureCause ? { failureCause: run.failureCause } : {}),
      startedAt: run.startedAt,
      ...(run.endedAt !== undefined ? { endedAt: run.endedAt } : {}),
      elapsedMs,
      configuredDurationMs: run.configuredDurationMs,
      tickIntervalMs: run.tickIntervalMs,
      ticks: run.ticks,
      decisionCount: run.decisions,
      messageCount: run.messages,
      alertCount: run.alerts,
      suppressedAlerts: run.suppressedAlerts,
      timeouts: run.timeouts,
      decisionFailures: run.decisionFailures,
      feedFailures: run.feedFailures,
      rejectedDecisions: run.rejectedDecisions,
      supersededDecisions: run.supersededDecisions,
      decisionsPerMinute: this.decisionsPerMinute(elapsedMs),
      decisionsByRole: Object.freeze({ ...run.decisionsByRole }),
    });
  }

  // Rate over the configured duration, or the elapsed time when the run ended early.
  private decisionsPerMinute(elapsedMs: number): number {
    if (this.run.status === "failed" || this.run.status === "idle") return 0;
    const windowMs = Math.min(elapsedMs, this.run.configuredDurationMs);
    if (windowMs <= 0) return 0;
    return this.run.decisions / (windowMs / 60_000);
  }
}

export type { SimulationRun };
