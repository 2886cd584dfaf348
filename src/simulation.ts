/**
 * Simulation factory
 * Wires store, bus, alert engine, agent runtimes, coordinator, metrics and
 * clock for one run. A simulation runs once; create another for the next run.
 */

import { loadAlertRules, type SimulationConfig } from "./config";
import { generateRunId } from "./idGenerator";
import { createCompletionClient, type CompletionClient } from "./openaiClient";
import type { RunReport } from "./persistence";
import { AgentRuntime, type ClinicalAgent } from "./sim/agentRuntime";
import { createDefaultAgents } from "./sim/agents";
import { AlertEngine } from "./sim/alertEngine";
import { SyntheticDataFeed, type DataFeed } from "./sim/dataFeed";
import { DecisionCoordinator } from "./sim/decisionCoordinator";
import { createEventLog, type EventLogger } from "./sim/eventLog";
import { MessageBus } from "./sim/messageBus";
import { MetricsAggregator } from "./sim/metricsAggregator";
import { PatientStore } from "./sim/patientStore";
import { QueryService } from "./sim/queryService";
import { SimulationClock } from "./sim/simulationClock";
import { createTimeSource, type TimeSource } from "./sim/timeSource";
import type { AlertRule, RunSummary, SimEvent } from "./sim/types";

// ============================================================================
// Types
// ============================================================================

export interface SimulationDeps {
  feed?: DataFeed;
  agents?: ClinicalAgent[];
  rules?: AlertRule[];
  eventLog?: EventLogger;
  time?: TimeSource;
  completionClient?: CompletionClient | null;
  runId?: string;
}

export interface Simulation {
  readonly runId: string;
  /** Run to completion (or failure) and return the final summary. */
  run: () => Promise<RunSummary>;
  /** End early at the next tick boundary. */
  stop: () => void;
  query: QueryService;
  /** Summary plus roster, recent decisions and alerts, for printing or persisting. */
  report: (decisionLimit?: number, alertLimit?: number) => RunReport;
  eventLog: EventLogger;
}

// ============================================================================
// Factory
// ============================================================================

export function createSimulation(config: SimulationConfig, deps: SimulationDeps = {}): Simulation {
  const runId = deps.runId ?? generateRunId();
  const time = deps.time ?? createTimeSource(config.timeMode);
  const eventLog = deps.eventLog ?? createEventLog();
  const rules = deps.rules ?? loadAlertRules(config.alertRulesPath);
  const feed = deps.feed ?? new SyntheticDataFeed({ seed: config.seed });
  const client =
    deps.completionClient !== undefined
      ? deps.completionClient
      : config.agentMode === "llm"
        ? createCompletionClient(config.openaiModel)
        : null;
  const agents = deps.agents ?? createDefaultAgents(config.agentMode, client);

  const roles = new Set(agents.map((a) => a.role));
  if (roles.size !== agents.length) {
    throw new Error("one agent per role: duplicate roles supplied");
  }

  const metrics = new MetricsAggregator({
    runId,
    configuredDurationMs: config.durationMs,
    tickIntervalMs: config.tickIntervalMs,
    time,
  });
  const store = new PatientStore({ now: () => time.now() });
  const bus = new MessageBus<SimEvent>({ capacity: config.busQueueCapacity, time });

  const alertEngine = new AlertEngine({
    rules,
    cooldownMs: config.alertCooldownMs,
    bus,
    runId,
    metrics,
    eventLog,
  });
  const coordinator = new DecisionCoordinator({
    bus,
    store,
    runId,
    windowMs: config.arbitrationWindowMs,
    tickIntervalMs: config.tickIntervalMs,
    rolePriority: config.rolePriority,
    metrics,
    eventLog,
    time,
  });
  const runtimes = agents.map(
    (agent) =>
      new AgentRuntime({
        agent,
        bus,
        store,
        runId,
        decisionTimeoutMs: config.decisionTimeoutMs,
        metrics,
        eventLog,
        time,
      })
  );

  const clock = new SimulationClock({
    runId,
    bus,
    store,
    feed,
    metrics,
    units: [coordinator, alertEngine, ...runtimes],
    patientCount: config.patientCount,
    tickIntervalMs: config.tickIntervalMs,
    durationMs: config.durationMs,
    drainThreshold: config.drainThreshold,
    drainTimeoutMs: config.drainTimeoutMs,
    statusReportEvery: config.statusReportEvery,
    statusReport: () => ({
      agents: runtimes.map((r) => {
        const s = r.status();
        return { role: s.role, decisions: s.decisions, queueDepth: s.queueDepth, timeouts: s.timeouts };
      }),
    }),
    eventLog,
    time,
  });

  const query = new QueryService({
    store,
    runtimes,
    coordinator,
    alertEngine,
    metrics,
    bus,
    clock: () => ({ status: clock.status, currentTick: clock.currentTick }),
  });

  function report(decisionLimit = 100, alertLimit = 50): RunReport {
    return {
      summary: metrics.summary(),
      roster: query.getAgentRoster(),
      decisions: coordinator.tail(decisionLimit),
      alerts: alertEngine.recentAlerts(alertLimit),
    };
  }

  return {
    runId,
    run: () => clock.start(),
    stop: () => clock.stop(),
    query,
    report,
    eventLog,
  };
}
