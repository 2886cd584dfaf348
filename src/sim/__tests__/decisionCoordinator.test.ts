import { setLogLevel } from "../../logger";
import { compareDecisions, conflictDomain, DecisionCoordinator } from "../decisionCoordinator";
import { MessageBus } from "../messageBus";
import { MetricsAggregator } from "../metricsAggregator";
import type { AgentRole, Decision, SimEvent, Urgency } from "../types";

const PRIORITY: AgentRole[] = ["physician", "pharmacist", "nurse"];

function escalation(id: string, urgency: Urgency, ts: number, role: AgentRole = "physician", patientId = "P1"): Decision {
  return {
    id,
    patientId,
    role,
    urgency,
    confidence: 0.9,
    rationale: "test",
    ts,
    tick: Math.floor(ts / 1000),
    kind: "escalation",
    trigger: "hr",
    target: "rapid_response",
  };
}

function order(id: string, drug: string, ts: number, role: AgentRole = "physician"): Decision {
  return {
    id,
    patientId: "P1",
    role,
    urgency: "high",
    confidence: 0.8,
    rationale: "test",
    ts,
    tick: Math.floor(ts / 1000),
    kind: "medication_order",
    drug,
    action: "hold",
  };
}

describe("conflictDomain", () => {
  it("groups by what the decision is about", () => {
    expect(conflictDomain(order("a", "Warfarin", 0))).toBe("medication:warfarin");
    expect(conflictDomain(escalation("b", "high", 0))).toBe("acuity");
    expect(
      conflictDomain({
        id: "c",
        patientId: "P1",
        role: "nurse",
        urgency: "routine",
        confidence: 0.8,
        rationale: "",
        ts: 0,
        tick: 0,
        kind: "nursing_intervention",
        intervention: "fever_management",
        details: "",
      })
    ).toBe("nursing:fever_management");
  });
});

describe("compareDecisions", () => {
  it("prefers higher urgency over earlier timestamp", () => {
    expect(compareDecisions(escalation("a", "critical", 12), escalation("b", "high", 10), PRIORITY)).toBeLessThan(0);
  });

  it("breaks urgency ties by timestamp, then role, then id", () => {
    expect(compareDecisions(escalation("a", "high", 5), escalation("b", "high", 6), PRIORITY)).toBeLessThan(0);
    expect(
      compareDecisions(escalation("a", "high", 5, "nurse"), escalation("b", "high", 5, "pharmacist"), PRIORITY)
    ).toBeGreaterThan(0);
    expect(compareDecisions(escalation("a", "high", 5), escalation("b", "high", 5), PRIORITY)).toBeLessThan(0);
  });

  it("follows a configured role priority", () => {
    const nurseFirst: AgentRole[] = ["nurse", "physician", "pharmacist"];
    expect(
      compareDecisions(escalation("a", "high", 5, "nurse"), escalation("b", "high", 5, "physician"), nurseFirst)
    ).toBeLessThan(0);
  });
});

describe("DecisionCoordinator", () => {
  let bus: MessageBus<SimEvent>;
  let metrics: MetricsAggregator;
  let coordinator: DecisionCoordinator;

  beforeAll(() => setLogLevel("error"));

  beforeEach(() => {
    bus = new MessageBus<SimEvent>();
    metrics = new MetricsAggregator({ runId: "run-test", configuredDurationMs: 60_000, tickIntervalMs: 1000 });
    coordinator = new DecisionCoordinator({
      bus,
      store: { has: (id) => id === "P1" || id === "P2" },
      runId: "run-test",
      windowMs: 1000,
      rolePriority: PRIORITY,
      metrics,
    });
  });

  it("appends frozen entries with increasing sequence", () => {
    const first = coordinator.commit(escalation("d1", "high", 10));
    const second = coordinator.commit(order("d2", "heparin", 20));

    expect(first?.sequence).toBe(1);
    expect(second?.sequence).toBe(2);
    expect(first && Object.isFrozen(first)).toBe(true);
    expect(coordinator.getLog("P1").map((v) => v.decision.id)).toEqual(["d1", "d2"]);
    expect(metrics.summary().decisionsByRole.physician).toBe(2);
  });

  it.each([
    ["high first", ["high", "critical"]],
    ["critical first", ["critical", "high"]],
  ])("resolves the same winner regardless of arrival order (%s)", (_label, arrival) => {
    const decisions: Record<string, Decision> = {
      high: escalation("d-high", "high", 10),
      critical: escalation("d-critical", "critical", 12),
    };
    for (const key of arrival) coordinator.commit(decisions[key]);

    expect(coordinator.statusOf("d-critical")).toBe("authoritative");
    expect(coordinator.statusOf("d-high")).toBe("superseded");
    expect(coordinator.authoritative("P1").map((v) => v.decision.id)).toEqual(["d-critical"]);
    expect(coordinator.getLog("P1").map((v) => v.decision.id)).toEqual(arrival.map((k) => decisions[k].id));
    expect(metrics.summary().supersededDecisions).toBe(1);
  });

  it("keeps superseded entries in the log with their winner", () => {
    coordinator.commit(escalation("d-high", "high", 10));
    coordinator.commit(escalation("d-critical", "critical", 12));
    const loser = coordinator.getLog("P1").find((v) => v.decision.id === "d-high");
    expect(loser).toEqual(expect.objectContaining({ status: "superseded", supersededBy: "d-critical" }));
    expect(coordinator.committedCount).toBe(2);
  });

  it("does not arbitrate across domains, windows or patients", () => {
    coordinator.commit(escalation("a", "high", 10));
    coordinator.commit(order("b", "heparin", 10));
    coordinator.commit(escalation("c", "critical", 1500));
    coordinator.commit(escalation("d", "critical", 10, "physician", "P2"));

    expect(["a", "b", "c", "d"].every((id) => coordinator.isAuthoritative(id))).toBe(true);
  });

  it("arbitrates by the triggering tick, not the time the agent acted", () => {
    coordinator.commit({ ...escalation("early", "high", 999), tick: 0 });
    coordinator.commit({ ...escalation("late", "critical", 1001), tick: 0 });

    expect(coordinator.statusOf("late")).toBe("authoritative");
    expect(coordinator.statusOf("early")).toBe("superseded");
    expect(coordinator.getLog("P1").map((v) => v.window)).toEqual([0, 0]);
  });

  it("counts windows in ticks from the start of the run", () => {
    const twoTicks = new DecisionCoordinator({
      bus,
      store: { has: () => true },
      runId: "run-test",
      windowMs: 2000,
      tickIntervalMs: 1000,
    });
    expect([0, 1, 2, 3, 4].map((tick) => twoTicks.windowOf(tick))).toEqual([0, 0, 1, 1, 2]);
  });

  it("lets the higher-priority role win a full tie", () => {
    coordinator.commit(order("n", "warfarin", 100, "nurse"));
    coordinator.commit(order("p", "warfarin", 100, "pharmacist"));
    expect(coordinator.statusOf("p")).toBe("authoritative");
    expect(coordinator.statusOf("n")).toBe("superseded");
  });

  it("rejects decisions for unknown patients without recording them", () => {
    expect(coordinator.commit(escalation("ghost", "critical", 10, "physician", "P9"))).toBeNull();
    expect(coordinator.rejectedCount).toBe(1);
    expect(coordinator.committedCount).toBe(0);
    expect(coordinator.statusOf("ghost")).toBeUndefined();
    expect(metrics.summary().rejectedDecisions).toBe(1);
    expect(metrics.summary().decisionCount).toBe(0);
  });

  it("ignores a decision id committed twice", () => {
    coordinator.commit(escalation("d1", "high", 10));
    expect(coordinator.commit(escalation("d1", "critical", 10))).toBeNull();
    expect(coordinator.committedCount).toBe(1);
  });

  it("returns the most recent commits from tail", () => {
    for (let i = 1; i <= 5; i++) coordinator.commit(escalation(`d${i}`, "routine", i * 1000));
    expect(coordinator.tail(2).map((v) => v.sequence)).toEqual([4, 5]);
  });

  it("commits decisions read from the bus", async () => {
    const running = coordinator.start();
    await bus.publish({ type: "decision", decision: escalation("bus-1", "high", 10) }, "agent:physician");
    await bus.publish({ type: "vital_update", patientId: "P1", vitals: {}, ts: 0, tick: 0 }, "feed:P1");
    bus.close();
    await running;

    expect(coordinator.getLog("P1").map((v) => v.decision.id)).toEqual(["bus-1"]);
  });
});
