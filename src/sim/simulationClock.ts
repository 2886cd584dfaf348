/**
 * Simulation Clock
 *
 * Owns the run lifecycle: idle -> running -> completed, or running -> failed
 * when setup cannot complete. Each tick feeds every patient, then holds a soft
 * barrier until the bus backlog drains (or the drain timeout passes), then
 * sleeps to the next tick boundary.
 */

import { SetupFailureError, describeError, isBusClosed } from "../errors";
import { generateId } from "../idGenerator";
import { log, logError, logEvent, logWarn } from "../logger";
import { parseLabResult, parseVitals } from "../validators";
import type { DataFeed } from "./dataFeed";
import type { EventLogger } from "./eventLog";
import type { MessageBus } from "./messageBus";
import type { MetricsAggregator } from "./metricsAggregator";
import type { PatientStore } from "./patientStore";
import { systemTimeSource, type TimeSource } from "./timeSource";
import type { EventLogType, PatientRecord, RunSummary, SimEvent } from "./types";

export type ClockState = "idle" | "running" | "completed" | "failed";

/** A concurrently running component; `start` resolves when its loop exits. */
export interface SimulationUnit {
  readonly name: string;
  start(): Promise<void>;
}

export type SimulationClockOptions = {
  runId: string;
  bus: MessageBus<SimEvent>;
  store: PatientStore;
  feed: DataFeed;
  metrics: MetricsAggregator;
  units: SimulationUnit[];
  patientCount: number;
  tickIntervalMs: number;
  durationMs: number;
  drainThreshold: number;
  drainTimeoutMs: number;
  statusReportEvery?: number;
  statusReport?: () => Record<string, unknown>;
  eventLog?: EventLogger;
  time?: TimeSource;
};

export function feedProducerId(patientId: string): string {
  return `feed:${patientId}`;
}

export class SimulationClock {
  private readonly opts: SimulationClockOptions;
  private readonly time: TimeSource;
  private readonly stopController = new AbortController();
  private state: ClockState = "idle";
  private tick = 0;
  private barrierTimeouts = 0;

  constructor(opts: SimulationClockOptions) {
    if (opts.tickIntervalMs <= 0) throw new Error(`tick interval must be positive, got ${opts.tickIntervalMs}`);
    this.opts = opts;
    this.time = opts.time ?? systemTimeSource;
  }

  get status(): ClockState {
    return this.state;
  }

  get currentTick(): number {
    return this.tick;
  }

  get barrierTimeoutCount(): number {
    return this.barrierTimeouts;
  }

  /**
   * Run to completion. Resolves with the final summary for both completed and
   * failed runs; only a second call rejects.
   */
  async start(): Promise<RunSummary> {
    if (this.state !== "idle") throw new Error(`clock already ${this.state}`);
    const { metrics, bus, runId } = this.opts;
    this.state = "running";
    metrics.markRunning();
    this.record("run.started", {
      patients: this.opts.patientCount,
      tickIntervalMs: this.opts.tickIntervalMs,
      durationMs: this.opts.durationMs,
    });

    try {
      await this.setup();
    } catch (err) {
      const failure = err instanceof SetupFailureError ? err : new SetupFailureError(describeError(err), err);
      this.state = "failed";
      bus.close();
      logError(`[clock] run ${runId} failed during setup:`, failure.message);
      this.record("run.failed", { cause: failure.message });
      return metrics.finalize("failed", failure.message);
    }

    const loops = this.opts.units.map((unit) =>
      unit.start().catch((err: unknown) => {
        logError(`[clock] unit ${unit.name} stopped with an error:`, describeError(err));
      })
    );

    await this.tickLoop();

    const drained = await bus.waitForBacklogBelow(0, this.opts.drainTimeoutMs, this.time);
    if (!drained) logWarn(`[clock] closing with ${bus.backlog()} events still queued`);
    bus.close();
    await Promise.all(loops);

    this.state = "completed";
    const summary = metrics.finalize("completed");
    this.record("run.completed", {
      ticks: summary.ticks,
      decisions: summary.decisionCount,
      alerts: summary.alertCount,
    });
    log(`[clock] run ${runId} completed after ${summary.ticks} ticks`);
    return summary;
  }

  /** End the run at the next tick boundary. Safe to call at any time. */
  stop(): void {
    if (!this.stopController.signal.aborted) {
      log(`[clock] stop requested at tick ${this.tick}`);
      this.stopController.abort();
    }
  }

  private async setup(): Promise<void> {
    const { feed, store, patientCount } = this.opts;
    let census: PatientRecord[];
    try {
      census = await feed.census(patientCount, this.time.now());
    } catch (err) {
      throw new SetupFailureError(`census failed: ${describeError(err)}`, err);
    }
    if (census.length === 0) throw new SetupFailureError("census returned no patients");
    for (const patient of census) {
      try {
        store.admit(patient);
      } catch (err) {
        throw new SetupFailureError(`admission failed for ${patient.id}: ${describeError(err)}`, err);
      }
    }
    log(`[clock] admitted ${store.size} patients`);
  }

  private async tickLoop(): Promise<void> {
    const { bus, metrics, tickIntervalMs, durationMs, drainThreshold, drainTimeoutMs } = this.opts;
    const signal = this.stopController.signal;
    const startedAt = this.time.now();

    while (!signal.aborted && this.time.now() - startedAt < durationMs) {
      const tick = this.tick;
      await this.runTick(tick);
      metrics.recordTick();
      this.tick = tick + 1;

      const drained = await bus.waitForBacklogBelow(drainThreshold, drainTimeoutMs, this.time);
      if (!drained) {
        this.barrierTimeouts++;
        logWarn(`[clock] tick ${tick}: backlog ${bus.backlog()} still above ${drainThreshold} after ${drainTimeoutMs}ms`);
        this.record("tick.barrier_timeout", { tick, backlog: bus.backlog() });
      }
      this.record("tick.completed", { tick });

      const every = this.opts.statusReportEvery ?? 0;
      if (every > 0 && this.tick % every === 0) this.reportStatus();

      const nextBoundary = startedAt + this.tick * tickIntervalMs;
      await this.time.sleep(Math.max(0, nextBoundary - this.time.now()), signal);
    }
  }

  private async runTick(tick: number): Promise<void> {
    const now = this.time.now();
    await Promise.all(this.opts.store.ids().map((patientId) => this.feedPatient(patientId, tick, now)));
  }

  // Failures stay with the patient; the rest of the tick goes ahead.
  private async feedPatient(patientId: string, tick: number, now: number): Promise<void> {
    const { feed, store, bus, metrics } = this.opts;
    const producer = feedProducerId(patientId);
    try {
      const vitals = parseVitals(await feed.generateVitals(patientId, now));
      await store.applyVitalUpdate(patientId, vitals);
      await bus.publish({ type: "vital_update", patientId, vitals, ts: now, tick }, producer);

      const raw = await feed.generateLab(patientId, now);
      if (raw) {
        const lab = parseLabResult(raw);
        await store.applyLabResult(patientId, lab);
        await bus.publish({ type: "lab_result", patientId, lab, ts: now, tick }, producer);
      }
    } catch (err) {
      if (isBusClosed(err)) return;
      metrics.recordFeedFailure();
      logWarn(`[clock] tick ${tick}: feed failed for ${patientId}:`, describeError(err));
      this.record("feed.failed", { tick, patientId, error: describeError(err) });
    }
  }

  private reportStatus(): void {
    const summary = this.opts.metrics.summary();
    const payload: Record<string, unknown> = {
      tick: this.tick,
      decisions: summary.decisionCount,
      alerts: summary.alertCount,
      timeouts: summary.timeouts,
      backlog: this.opts.bus.backlog(),
      ...(this.opts.statusReport ? this.opts.statusReport() : {}),
    };
    logEvent("status.report", payload);
    this.record("status.report", payload);
  }

  private record(type: EventLogType, payload: Record<string, unknown>): void {
    this.opts.eventLog?.append({ id: generateId(), ts: Date.now(), runId: this.opts.runId, type, payload });
  }
}
