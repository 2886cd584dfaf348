/**
 * Alert Engine
 *
 * Rule-agnostic: evaluate every configured threshold against the latest
 * readings, dedup on (patient, rule, value bucket) within a cooldown, emit.
 * Simultaneous breaches stay separate alerts and go out critical first.
 */

import { generateAlertId, generateId } from "../idGenerator";
import { describeError, isBusClosed } from "../errors";
import { log, logError } from "../logger";
import type { EventLogger } from "./eventLog";
import type { MessageBus, Subscription, Envelope } from "./messageBus";
import type { MetricsAggregator } from "./metricsAggregator";
import {
  VITAL_METRICS,
  compareUrgency,
  type Alert,
  type AlertMetric,
  type AlertRule,
  type EventLogType,
  type SimEvent,
  type VitalMetric,
} from "./types";

export const ALERT_ENGINE_PRODUCER = "alert-engine";

export type Breach = {
  rule: AlertRule;
  patientId: string;
  value: number;
  ts: number;
  tick: number;
};

export type AlertEngineOptions = {
  rules: AlertRule[];
  cooldownMs: number;
  bus: MessageBus<SimEvent>;
  runId: string;
  metrics?: MetricsAggregator;
  eventLog?: EventLogger;
  historyLimit?: number;
};

function isVitalMetric(metric: AlertMetric): metric is VitalMetric {
  return VITAL_METRICS.some((m) => m === metric);
}

export function isBreached(rule: AlertRule, value: number): boolean {
  if (rule.below !== undefined && value < rule.below) return true;
  if (rule.above !== undefined && value > rule.above) return true;
  return false;
}

export function dedupKey(patientId: string, rule: AlertRule, value: number): string {
  return `${patientId}|${rule.id}|${Math.floor(value / rule.bucketSize)}`;
}

/** Critical first; equal severities keep time order. */
export function sortBySeverity(alerts: readonly Alert[]): Alert[] {
  return [...alerts].sort((a, b) => compareUrgency(b.severity, a.severity) || a.ts - b.ts);
}

export class AlertEngine {
  readonly name = ALERT_ENGINE_PRODUCER;
  private readonly rules: AlertRule[];
  private readonly cooldownMs: number;
  private readonly bus: MessageBus<SimEvent>;
  private readonly runId: string;
  private readonly metrics?: MetricsAggregator;
  private readonly eventLog?: EventLogger;
  private readonly historyLimit: number;
  private readonly cooldowns = new Map<string, number>();
  private history: Alert[] = [];
  private subscription?: Subscription<SimEvent>;
  private suppressed = 0;

  constructor(opts: AlertEngineOptions) {
    this.rules = [...opts.rules];
    this.cooldownMs = opts.cooldownMs;
    this.bus = opts.bus;
    this.runId = opts.runId;
    this.metrics = opts.metrics;
    this.eventLog = opts.eventLog;
    this.historyLimit = opts.historyLimit ?? 200;
  }

  /** Every rule the event's readings breach. Pure. */
  evaluate(event: SimEvent): Breach[] {
    const breaches: Breach[] = [];
    if (event.type === "vital_update") {
      for (const rule of this.rules) {
        if (!isVitalMetric(rule.metric)) continue;
        const reading = event.vitals[rule.metric];
        if (reading && isBreached(rule, reading.value)) {
          breaches.push({ rule, patientId: event.patientId, value: reading.value, ts: event.ts, tick: event.tick });
        }
      }
    } else if (event.type === "lab_result") {
      for (const rule of this.rules) {
        if (rule.metric === event.lab.test && isBreached(rule, event.lab.value)) {
          breaches.push({ rule, patientId: event.patientId, value: event.lab.value, ts: event.ts, tick: event.tick });
        }
      }
    }
    return breaches;
  }

  /**
   * Evaluate, dedup against the cooldown table and return the alerts to emit,
   * critical first. Updates the cooldown table for emitted alerts only.
   */
  process(event: SimEvent): Alert[] {
    const emitted: Alert[] = [];
    for (const breach of this.evaluate(event)) {
      const key = dedupKey(breach.patientId, breach.rule, breach.value);
      const lastFired = this.cooldowns.get(key);
      if (lastFired !== undefined && breach.ts - lastFired < this.cooldownMs) {
        this.suppressed++;
        this.metrics?.recordSuppressedAlert();
        this.record("alert.suppressed", { patientId: breach.patientId, ruleId: breach.rule.id, key });
        continue;
      }
      this.cooldowns.set(key, breach.ts);
      emitted.push(
        Object.freeze({
          id: generateAlertId(),
          patientId: breach.patientId,
          ruleId: breach.rule.id,
          metric: breach.rule.metric,
          value: breach.value,
          severity: breach.rule.severity,
          description: breach.rule.description,
          ts: breach.ts,
          tick: breach.tick,
          dedupKey: key,
        })
      );
    }
    return sortBySeverity(emitted);
  }

  /** Subscribes synchronously, then runs the pull loop until the bus closes. */
  start(): Promise<void> {
    if (this.subscription) throw new Error("alert engine already started");
    const subscription = this.bus.subscribe(
      this.name,
      (event) => event.type === "vital_update" || event.type === "lab_result"
    );
    this.subscription = subscription;
    return this.loop(subscription);
  }

  recentAlerts(limit = 50): Alert[] {
    return this.history.slice(-limit);
  }

  get suppressedCount(): number {
    return this.suppressed;
  }

  get cooldownEntries(): number {
    return this.cooldowns.size;
  }

  private async loop(subscription: Subscription<SimEvent>): Promise<void> {
    for await (const envelope of subscription) {
      const keepGoing = await this.handle(envelope);
      if (!keepGoing) break;
    }
    log("[alert-engine] stopped", { emitted: this.history.length, suppressed: this.suppressed });
  }

  private async handle(envelope: Envelope<SimEvent>): Promise<boolean> {
    let alerts: Alert[];
    try {
      alerts = this.process(envelope.event);
    } catch (err) {
      logError("[alert-engine] evaluation failed", describeError(err));
      return true;
    }
    for (const alert of alerts) {
      try {
        await this.bus.publish({ type: "alert", alert }, ALERT_ENGINE_PRODUCER);
      } catch (err) {
        if (isBusClosed(err)) return false;
        throw err;
      }
      this.history.push(alert);
      if (this.history.length > this.historyLimit) this.history.shift();
      this.metrics?.recordAlert();
      this.record("alert.emitted", {
        patientId: alert.patientId,
        ruleId: alert.ruleId,
        severity: alert.severity,
        value: alert.value,
      });
    }
    return true;
  }

  private record(type: EventLogType, payload: Record<string, unknown>): void {
    this.eventLog?.append({ id: generateId(), ts: Date.now(), runId: this.runId, type, payload });
  }
}
