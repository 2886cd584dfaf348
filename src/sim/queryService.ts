import { NotFoundError } from "../errors";
import type { AgentRuntime, AgentStatus } from "./agentRuntime";
import type { AlertEngine } from "./alertEngine";
import type { DecisionCoordinator, DecisionView } from "./decisionCoordinator";
import type { MessageBus, SubscriptionStats } from "./messageBus";
import type { MetricsAggregator } from "./metricsAggregator";
import type { PatientStore } from "./patientStore";
import type { ClockState } from "./simulationClock";
import type { Alert, AgentRole, PatientSnapshot, RunSummary, SimEvent } from "./types";

export type PatientListing = {
  id: string;
  name: string;
  diagnosis: string;
  acuity: string;
  activeMedications: number;
  version: number;
};

export type RunStatusView = {
  clock: ClockState;
  tick: number;
  backlog: number;
  summary: RunSummary;
};

export type QueryServiceDeps = {
  store: PatientStore;
  runtimes: AgentRuntime[];
  coordinator: DecisionCoordinator;
  alertEngine: AlertEngine;
  metrics: MetricsAggregator;
  bus: MessageBus<SimEvent>;
  clock: () => { status: ClockState; currentTick: number };
};

/**
 * Read-only view over a running or finished simulation. Every read returns
 * snapshots or copies; nothing here mutates.
 */
export class QueryService {
  constructor(private readonly deps: QueryServiceDeps) {}

  listPatients(): PatientListing[] {
    return this.deps.store.list().map((p) => ({
      id: p.id,
      name: `${p.demographics.firstName} ${p.demographics.lastName}`,
      diagnosis: p.demographics.diagnosis,
      acuity: p.demographics.acuity,
      activeMedications: Object.keys(p.medications).length,
      version: p.version,
    }));
  }

  getPatient(patientId: string): PatientSnapshot {
    return this.deps.store.get(patientId);
  }

  getAgentRoster(): AgentStatus[] {
    return this.deps.runtimes.map((runtime) => runtime.status());
  }

  getAgent(role: AgentRole): AgentStatus {
    const runtime = this.deps.runtimes.find((r) => r.role === role);
    if (!runtime) throw new NotFoundError("agent", role);
    return runtime.status();
  }

  getDecisionLogTail(limit = 20): DecisionView[] {
    return this.deps.coordinator.tail(limit);
  }

  getPatientDecisions(patientId: string): DecisionView[] {
    if (!this.deps.store.has(patientId)) throw new NotFoundError("patient", patientId);
    return this.deps.coordinator.getLog(patientId);
  }

  getRecentAlerts(limit = 20): Alert[] {
    return this.deps.alertEngine.recentAlerts(limit);
  }

  getRunStatus(): RunStatusView {
    const clock = this.deps.clock();
    return {
      clock: clock.status,
      tick: clock.currentTick,
      backlog: this.deps.bus.backlog(),
      summary: this.deps.metrics.summary(),
    };
  }

  getBusStats(): SubscriptionStats[] {
    return this.deps.bus.stats();
  }
}
