/**
 * Decision Coordinator
 *
 * Single writer of the decision log. Entries are frozen and only ever
 * appended. Arbitration lives beside the log in a resolution index keyed by
 * (patient, tick window, conflict domain), so which decision is authoritative
 * does not depend on the order decisions arrived in. Windows count from the
 * run's first tick and use the tick that triggered the decision, not the time
 * the agent acted.
 */

import { DEFAULT_ROLE_PRIORITY } from "../config";
import { isBusClosed } from "../errors";
import { generateId } from "../idGenerator";
import { log, logWarn } from "../logger";
import type { EventLogger } from "./eventLog";
import type { MessageBus, Subscription } from "./messageBus";
import type { MetricsAggregator } from "./metricsAggregator";
import { systemTimeSource, type TimeSource } from "./timeSource";
import { compareUrgency, type AgentRole, type Decision, type EventLogType, type SimEvent } from "./types";

export type DecisionLogEntry = {
  readonly sequence: number;
  readonly decision: Decision;
  readonly committedAt: number;
  readonly window: number;
  readonly domain: string;
};

export type DecisionStatus = "authoritative" | "superseded";

export type DecisionView = DecisionLogEntry & {
  status: DecisionStatus;
  supersededBy?: string;
};

export type DecisionCoordinatorOptions = {
  bus: MessageBus<SimEvent>;
  store: { has(patientId: string): boolean };
  runId: string;
  windowMs: number;
  /** Defaults to `windowMs`, i.e. one tick per window. */
  tickIntervalMs?: number;
  rolePriority?: readonly AgentRole[];
  metrics?: MetricsAggregator;
  eventLog?: EventLogger;
  time?: TimeSource;
};

/** Decisions only compete inside the same domain. */
export function conflictDomain(decision: Decision): string {
  switch (decision.kind) {
    case "medication_order":
    case "drug_interaction":
      return `medication:${decision.drug.toLowerCase()}`;
    case "escalation":
    case "clinical_assessment":
      return "acuity";
    case "nursing_intervention":
      return `nursing:${decision.intervention}`;
  }
}

/**
 * Orders two decisions; negative means `a` wins. Higher urgency, then earlier
 * timestamp, then role priority, then id so the order is total.
 */
export function compareDecisions(a: Decision, b: Decision, rolePriority: readonly AgentRole[]): number {
  const byUrgency = compareUrgency(b.urgency, a.urgency);
  if (byUrgency !== 0) return byUrgency;
  if (a.ts !== b.ts) return a.ts - b.ts;
  const byRole = rolePriority.indexOf(a.role) - rolePriority.indexOf(b.role);
  if (byRole !== 0) return byRole;
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

export class DecisionCoordinator {
  readonly name = "decision-coordinator";
  private readonly bus: MessageBus<SimEvent>;
  private readonly store: { has(patientId: string): boolean };
  private readonly runId: string;
  private readonly windowMs: number;
  private readonly tickIntervalMs: number;
  private readonly rolePriority: readonly AgentRole[];
  private readonly metrics?: MetricsAggregator;
  private readonly eventLog?: EventLogger;
  private readonly time: TimeSource;
  private readonly byPatient = new Map<string, DecisionLogEntry[]>();
  private readonly entries: DecisionLogEntry[] = [];
  private readonly byId = new Map<string, DecisionLogEntry>();
  // group key -> id of the authoritative decision
  private readonly resolutions = new Map<string, string>();
  private subscription?: Subscription<SimEvent>;
  private rejected = 0;

  constructor(opts: DecisionCoordinatorOptions) {
    this.bus = opts.bus;
    this.store = opts.store;
    this.runId = opts.runId;
    this.windowMs = opts.windowMs;
    this.tickIntervalMs = opts.tickIntervalMs ?? opts.windowMs;
    this.rolePriority = opts.rolePriority ?? DEFAULT_ROLE_PRIORITY;
    this.metrics = opts.metrics;
    this.eventLog = opts.eventLog;
    this.time = opts.time ?? systemTimeSource;
    if (this.windowMs <= 0) throw new Error(`arbitration window must be positive, got ${this.windowMs}`);
  }

  start(): Promise<void> {
    if (this.subscription) throw new Error("decision coordinator already started");
    const subscription = this.bus.subscribe(this.name, (event) => event.type === "decision");
    this.subscription = subscription;
    return this.loop(subscription);
  }

  /**
   * Append a decision and re-resolve its conflict group.
   * Returns null when the patient is unknown; nothing is recorded then.
   */
  commit(decision: Decision): DecisionLogEntry | null {
    if (!this.store.has(decision.patientId)) {
      this.rejected++;
      this.metrics?.recordRejectedDecision();
      logWarn(`[coordinator] rejected ${decision.id}: unknown patient ${decision.patientId}`);
      this.record("decision.rejected", { decisionId: decision.id, patientId: decision.patientId });
      return null;
    }
    if (this.byId.has(decision.id)) {
      logWarn(`[coordinator] ignoring duplicate decision ${decision.id}`);
      return null;
    }

    const entry: DecisionLogEntry = Object.freeze({
      sequence: this.entries.length + 1,
      decision,
      committedAt: this.time.now(),
      window: this.windowOf(decision.tick),
      domain: conflictDomain(decision),
    });
    this.entries.push(entry);
    this.byId.set(decision.id, entry);
    const patientLog = this.byPatient.get(decision.patientId) ?? [];
    patientLog.push(entry);
    this.byPatient.set(decision.patientId, patientLog);
    this.metrics?.recordDecision(decision.role);
    this.record("decision.committed", {
      decisionId: decision.id,
      patientId: decision.patientId,
      role: decision.role,
      kind: decision.kind,
      urgency: decision.urgency,
    });

    this.arbitrate(entry);
    return entry;
  }

  getLog(patientId: string): DecisionView[] {
    return (this.byPatient.get(patientId) ?? []).map((entry) => this.view(entry));
  }

  /** Most recent commits across all patients, oldest first. */
  tail(limit = 20): DecisionView[] {
    return this.entries.slice(-limit).map((entry) => this.view(entry));
  }

  authoritative(patientId: string): DecisionView[] {
    return this.getLog(patientId).filter((v) => v.status === "authoritative");
  }

  statusOf(decisionId: string): DecisionStatus | undefined {
    const entry = this.byId.get(decisionId);
    return entry ? this.view(entry).status : undefined;
  }

  isAuthoritative(decisionId: string): boolean {
    return this.statusOf(decisionId) === "authoritative";
  }

  get committedCount(): number {
    return this.entries.length;
  }

  get rejectedCount(): number {
    return this.rejected;
  }

  windowOf(tick: number): number {
    return Math.floor((tick * this.tickIntervalMs) / this.windowMs);
  }

  private arbitrate(entry: DecisionLogEntry): void {
    const key = this.groupKey(entry);
    const currentId = this.resolutions.get(key);
    const current = currentId ? this.byId.get(currentId) : undefined;
    if (!current) {
      this.resolutions.set(key, entry.decision.id);
      return;
    }
    const newWins = compareDecisions(entry.decision, current.decision, this.rolePriority) < 0;
    const winner = newWins ? entry : current;
    const loser = newWins ? current : entry;
    this.resolutions.set(key, winner.decision.id);
    this.metrics?.recordSupersededDecision();
    this.record("decision.superseded", {
      patientId: entry.decision.patientId,
      domain: entry.domain,
      winner: winner.decision.id,
      superseded: loser.decision.id,
    });
  }

  private view(entry: DecisionLogEntry): DecisionView {
    const winnerId = this.resolutions.get(this.groupKey(entry));
    if (winnerId === undefined || winnerId === entry.decision.id) {
      return { ...entry, status: "authoritative" };
    }
    return { ...entry, status: "superseded", supersededBy: winnerId };
  }

  private groupKey(entry: DecisionLogEntry): string {
    return `${entry.decision.patientId}|${entry.window}|${entry.domain}`;
  }

  private async loop(subscription: Subscription<SimEvent>): Promise<void> {
    try {
      for await (const envelope of subscription) {
        const event = envelope.event;
        if (event.type === "decision") this.commit(event.decision);
      }
    } catch (err) {
      if (!isBusClosed(err)) throw err;
    }
    log("[coordinator] stopped", { committed: this.entries.length, rejected: this.rejected });
  }

  private record(type: EventLogType, payload: Record<string, unknown>): void {
    this.eventLog?.append({ id: generateId(), ts: Date.now(), runId: this.runId, type, payload });
  }
}
