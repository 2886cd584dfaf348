/**
 * Agent Runtime
 *
 * One pull loop per role instance, covering every patient the role observes.
 * Events are handled strictly one at a time in arrival order:
 *   perceive (pull) -> reason (decide, time-bounded) -> act (publish)
 * A slow, failing or malformed decision function costs one cycle, never the loop.
 */

import { performance } from "perf_hooks";
import { DecisionTimeoutError, NotFoundError, describeError, isBusClosed } from "../errors";
import { generateId } from "../idGenerator";
import { log, logError, logWarn } from "../logger";
import { buildDecision, buildMessage } from "../validators";
import type { EventLogger } from "./eventLog";
import type { MessageBus, PublishOptions, Subscription } from "./messageBus";
import type { MetricsAggregator } from "./metricsAggregator";
import type { PatientStore } from "./patientStore";
import { systemTimeSource, type TimeSource } from "./timeSource";
import {
  eventPatientId,
  eventTick,
  type AgentMessage,
  type AgentRole,
  type Decision,
  type DecisionDraft,
  type EventLogType,
  type MedicationChange,
  type MessageDraft,
  type PatientSnapshot,
  type SimEvent,
} from "./types";

export type AgentOutcome = {
  decision?: DecisionDraft;
  message?: MessageDraft;
  medicationChange?: MedicationChange;
};

/** What a role must provide to be driven by the runtime. */
export interface ClinicalAgent {
  readonly role: AgentRole;
  /** Subscription filter: which bus events this role perceives. */
  observe(event: SimEvent): boolean;
  /** `signal` aborts when the runtime stops waiting for this call. */
  decide(
    event: SimEvent,
    snapshot: PatientSnapshot,
    signal?: AbortSignal
  ): AgentOutcome | null | Promise<AgentOutcome | null>;
}

export type AgentState = "idle" | "running" | "stopped";

export type AgentStatus = {
  role: AgentRole;
  state: AgentState;
  processed: number;
  decisions: number;
  messages: number;
  medicationChanges: number;
  timeouts: number;
  failures: number;
  skipped: number;
  queueDepth: number;
  avgDecideMs: number;
  avgConfidence: number;
  lastDecisionAt?: number;
};

export type AgentRuntimeOptions<A extends ClinicalAgent> = {
  agent: A;
  bus: MessageBus<SimEvent>;
  store: PatientStore;
  runId: string;
  decisionTimeoutMs: number;
  metrics?: MetricsAggregator;
  eventLog?: EventLogger;
  time?: TimeSource;
};

// Agents also pull from the bus: their publishes must not wait on a peer's full queue.
const PEER: PublishOptions = { lane: "peer" };

export function agentProducerId(role: AgentRole): string {
  return `agent:${role}`;
}

/** Peer messages reach a role only when broadcast or addressed to it, never its own. */
export function isAddressedTo(message: AgentMessage, role: AgentRole): boolean {
  return message.from !== role && (message.to === undefined || message.to === role);
}

export class AgentRuntime<A extends ClinicalAgent = ClinicalAgent> {
  readonly agent: A;
  private readonly bus: MessageBus<SimEvent>;
  private readonly store: PatientStore;
  private readonly runId: string;
  private readonly timeoutMs: number;
  private readonly metrics?: MetricsAggregator;
  private readonly eventLog?: EventLogger;
  private readonly time: TimeSource;
  private readonly producer: string;
  private subscription?: Subscription<SimEvent>;
  private state: AgentState = "idle";
  private sequence = 0;
  private processed = 0;
  private decisions = 0;
  private messages = 0;
  private medicationChanges = 0;
  private timeouts = 0;
  private failures = 0;
  private skipped = 0;
  private decideMsTotal = 0;
  private decideCalls = 0;
  private confidenceTotal = 0;
  private lastDecisionAt?: number;

  constructor(opts: AgentRuntimeOptions<A>) {
    this.agent = opts.agent;
    this.bus = opts.bus;
    this.store = opts.store;
    this.runId = opts.runId;
    this.timeoutMs = opts.decisionTimeoutMs;
    this.metrics = opts.metrics;
    this.eventLog = opts.eventLog;
    this.time = opts.time ?? systemTimeSource;
    this.producer = agentProducerId(opts.agent.role);
  }

  get role(): AgentRole {
    return this.agent.role;
  }

  get name(): string {
    return this.producer;
  }

  /** Last sequence number stamped on an outgoing message. */
  get lastSequence(): number {
    return this.sequence;
  }

  /** Subscribes synchronously, then runs the loop until the bus closes. */
  start(): Promise<void> {
    if (this.state !== "idle") throw new Error(`${this.role} runtime already started`);
    const role = this.role;
    const subscription = this.bus.subscribe(this.producer, (event) => {
      if (event.type === "agent_message" && !isAddressedTo(event.message, role)) return false;
      return this.agent.observe(event);
    });
    this.subscription = subscription;
    this.state = "running";
    return this.loop(subscription);
  }

  status(): AgentStatus {
    return {
      role: this.role,
      state: this.state,
      processed: this.processed,
      decisions: this.decisions,
      messages: this.messages,
      medicationChanges: this.medicationChanges,
      timeouts: this.timeouts,
      failures: this.failures,
      skipped: this.skipped,
      queueDepth: this.subscription?.depth ?? 0,
      avgDecideMs: this.decideCalls ? this.decideMsTotal / this.decideCalls : 0,
      avgConfidence: this.decisions ? this.confidenceTotal / this.decisions : 0,
      ...(this.lastDecisionAt !== undefined ? { lastDecisionAt: this.lastDecisionAt } : {}),
    };
  }

  private async loop(subscription: Subscription<SimEvent>): Promise<void> {
    try {
      for await (const envelope of subscription) {
        const keepGoing = await this.cycle(envelope.event);
        if (!keepGoing) break;
      }
    } finally {
      this.state = "stopped";
      log(`[agent:${this.role}] stopped`, {
        processed: this.processed,
        decisions: this.decisions,
        timeouts: this.timeouts,
        failures: this.failures,
      });
    }
  }

  /** One perceive -> reason -> act pass. Returns false once the bus is closed. */
  private async cycle(event: SimEvent): Promise<boolean> {
    this.processed++;
    const patientId = eventPatientId(event);

    let snapshot: PatientSnapshot;
    try {
      snapshot = this.store.get(patientId);
    } catch (err) {
      if (!(err instanceof NotFoundError)) throw err;
      this.skipped++;
      logWarn(`[agent:${this.role}] skipping ${event.type} for unknown patient ${patientId}`);
      return true;
    }

    let outcome: AgentOutcome | null;
    const started = performance.now();
    try {
      outcome = await this.decideWithTimeout(event, snapshot);
    } catch (err) {
      this.onDecideFailure(err, event, patientId);
      return true;
    } finally {
      this.decideCalls++;
      this.decideMsTotal += performance.now() - started;
    }

    if (!outcome) return true;
    try {
      await this.act(outcome, patientId, eventTick(event));
    } catch (err) {
      if (isBusClosed(err)) return false;
      this.failures++;
      this.metrics?.recordDecisionFailure();
      logError(`[agent:${this.role}] act failed for ${patientId}:`, describeError(err));
      this.record("agent.failed", { patientId, stage: "act", error: describeError(err) });
    }
    return true;
  }

  private decideWithTimeout(event: SimEvent, snapshot: PatientSnapshot): Promise<AgentOutcome | null> {
    let timer: NodeJS.Timeout | undefined;
    const controller = new AbortController();
    const call = Promise.resolve().then(() => this.agent.decide(event, snapshot, controller.signal));
    const deadline = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        const err = new DecisionTimeoutError(this.role, this.timeoutMs);
        controller.abort(err);
        reject(err);
      }, this.timeoutMs);
    });
    return Promise.race([call, deadline]).finally(() => clearTimeout(timer));
  }

  private onDecideFailure(err: unknown, event: SimEvent, patientId: string): void {
    if (err instanceof DecisionTimeoutError) {
      this.timeouts++;
      this.metrics?.recordTimeout();
      logWarn(`[agent:${this.role}] ${err.message}; skipping ${event.type} for ${patientId}`);
      this.record("agent.timeout", { patientId, eventType: event.type, timeoutMs: this.timeoutMs });
      return;
    }
    this.failures++;
    this.metrics?.recordDecisionFailure();
    logError(`[agent:${this.role}] decision function failed for ${patientId}:`, describeError(err));
    this.record("agent.failed", { patientId, stage: "decide", error: describeError(err) });
  }

  private async act(outcome: AgentOutcome, patientId: string, tick: number): Promise<void> {
    const ts = this.time.now();
    // Validate everything before publishing anything.
    const decision: Decision | undefined = outcome.decision
      ? buildDecision(outcome.decision, this.role, ts, tick)
      : undefined;
    const message: AgentMessage | undefined = outcome.message
      ? buildMessage(outcome.message, this.role, this.sequence + 1, ts, tick)
      : undefined;

    if (decision) {
      await this.bus.publish({ type: "decision", decision }, this.producer, PEER);
      this.decisions++;
      this.confidenceTotal += decision.confidence;
      this.lastDecisionAt = ts;
    }
    if (message) {
      this.sequence = message.sequence;
      await this.bus.publish({ type: "agent_message", message }, this.producer, PEER);
      this.messages++;
      this.metrics?.recordMessage();
    }
    if (outcome.medicationChange) {
      const change = outcome.medicationChange;
      await this.store.applyMedicationChange(patientId, change);
      this.medicationChanges++;
      await this.bus.publish(
        { type: "medication_change", patientId, change, by: this.role, ts: this.time.now(), tick },
        this.producer,
        PEER
      );
    }
  }

  private record(type: EventLogType, payload: Record<string, unknown>): void {
    this.eventLog?.append({ id: generateId(), ts: Date.now(), runId: this.runId, type, payload });
  }
}
