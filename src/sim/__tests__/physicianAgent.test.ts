import { criticalVitals, PhysicianAgent } from "../agents/physician";
import type { Alert, Medication, MessagePayload, SimEvent } from "../types";
import { makeSnapshot, medication, NORMAL_VITALS, vitals } from "./fixtures";

function vitalEvent(ts: number): SimEvent {
  return { type: "vital_update", patientId: "P1", vitals: {}, ts, tick: 0 };
}

function withVitals(values: Partial<typeof NORMAL_VITALS>, medications: Record<string, Medication> = {}) {
  return makeSnapshot("P1", { vitals: vitals({ ...NORMAL_VITALS, ...values }), medications });
}

function messageEvent(payload: MessagePayload, sequence = 7): SimEvent {
  return { type: "agent_message", message: { from: "nurse", to: "physician", payload, ts: 0, tick: 0, sequence } };
}

describe("criticalVitals", () => {
  it("flags values outside the band and marks the critical ones", () => {
    expect(criticalVitals(vitals({ heartRate: 125, systolicBp: 75, spo2: 93 }))).toEqual([
      { metric: "heartRate", value: 125, critical: false },
      { metric: "systolicBp", value: 75, critical: true },
    ]);
  });

  it("treats band edges as in range", () => {
    expect(criticalVitals(vitals({ heartRate: 120, systolicBp: 90, spo2: 92 }))).toEqual([]);
  });
});

describe("PhysicianAgent", () => {
  let agent: PhysicianAgent;

  beforeEach(() => {
    agent = new PhysicianAgent();
  });

  describe("observe", () => {
    it("takes vitals, serious alerts and consult traffic", () => {
      const alert = (severity: Alert["severity"]): SimEvent => ({
        type: "alert",
        alert: { id: "a", patientId: "P1", ruleId: "r", metric: "heartRate", value: 0, severity, description: "", ts: 0, tick: 0, dedupKey: "" },
      });
      expect(agent.observe(vitalEvent(0))).toBe(true);
      expect(agent.observe(alert("high"))).toBe(true);
      expect(agent.observe(alert("elevated"))).toBe(false);
      expect(agent.observe(messageEvent({ kind: "consult_request", patientId: "P1", reason: "r" }))).toBe(true);
      expect(agent.observe(messageEvent({ kind: "handoff_note", patientId: "P1", note: "n" }))).toBe(false);
    });
  });

  describe("vitals", () => {
    it("reassesses a stable patient once per interval", () => {
      const snapshot = withVitals({});
      const first = agent.decide(vitalEvent(0), snapshot);
      expect(first?.decision).toEqual(
        expect.objectContaining({
          kind: "clinical_assessment",
          urgency: "routine",
          assessment: "Stable on reassessment (HR 80, BP 120/75, SpO2 97%, T 37). Continue current plan.",
        })
      );
      expect(agent.decide(vitalEvent(59_999), snapshot)).toBeNull();
      expect(agent.decide(vitalEvent(60_000), snapshot)).not.toBeNull();
    });

    it("starts norepinephrine for hypotension and asks the pharmacist to review", () => {
      const outcome = agent.decide(vitalEvent(5000), withVitals({ systolicBp: 85 }));
      expect(outcome?.decision).toEqual(
        expect.objectContaining({ kind: "medication_order", drug: "norepinephrine", action: "start", dose: 0.1, urgency: "high" })
      );
      expect(outcome?.message).toEqual({
        to: "pharmacist",
        payload: {
          kind: "medication_review_request",
          patientId: "P1",
          drug: "norepinephrine",
          reason: "Vasopressor started for hypotension",
        },
      });
      expect(outcome?.medicationChange).toEqual({
        action: "start",
        medication: expect.objectContaining({ drug: "norepinephrine", startedAt: 5000, orderedBy: "physician" }),
      });
    });

    it("orders at critical urgency when the hypotension is critical", () => {
      const outcome = agent.decide(vitalEvent(0), withVitals({ systolicBp: 75 }));
      expect(outcome?.decision?.urgency).toBe("critical");
    });

    it("escalates to the nurse when the vasopressor is already running", () => {
      const outcome = agent.decide(
        vitalEvent(0),
        withVitals({ systolicBp: 85 }, { norepinephrine: medication("norepinephrine", 0.1) })
      );
      expect(outcome?.decision).toEqual(
        expect.objectContaining({ kind: "escalation", target: "nurse", trigger: "critical_vital: systolicBp=85" })
      );
      expect(outcome?.message).toEqual({
        to: "nurse",
        payload: { kind: "handoff_note", patientId: "P1", note: "Watch closely: systolicBp=85" },
      });
    });

    it("starts rate control for non-critical tachycardia", () => {
      const outcome = agent.decide(vitalEvent(0), withVitals({ heartRate: 130 }));
      expect(outcome?.decision).toEqual(expect.objectContaining({ drug: "digoxin", dose: 0.25, doseUnit: "mg" }));
      expect(outcome?.medicationChange).toEqual({
        action: "start",
        medication: expect.objectContaining({ drug: "digoxin", frequency: "q6h" }),
      });
    });

    it("calls rapid response for critical vitals and throttles repeats", () => {
      const snapshot = withVitals({ heartRate: 160 });
      const outcome = agent.decide(vitalEvent(0), snapshot);
      expect(outcome?.decision).toEqual(
        expect.objectContaining({ kind: "escalation", urgency: "critical", target: "rapid_response" })
      );
      expect(outcome?.message).toBeUndefined();
      expect(agent.decide(vitalEvent(29_999), snapshot)).toBeNull();
      expect(agent.decide(vitalEvent(30_000), snapshot)?.decision?.kind).toBe("escalation");
    });
  });

  it("escalates a high alert and hands off to the nurse", () => {
    const event: SimEvent = {
      type: "alert",
      alert: {
        id: "alert-1",
        patientId: "P1",
        ruleId: "spo2_low",
        metric: "spo2",
        value: 88,
        severity: "high",
        description: "Hypoxemia",
        ts: 0,
        tick: 0,
        dedupKey: "P1|spo2_low|44",
      },
    };
    const outcome = agent.decide(event, withVitals({}));
    expect(outcome?.decision).toEqual(
      expect.objectContaining({
        kind: "escalation",
        urgency: "high",
        confidence: 0.9,
        trigger: "clinical_alert: spo2_low",
        target: "nurse",
        rationale: "Hypoxemia (spo2 88)",
      })
    );
    expect(outcome?.message?.payload).toEqual({
      kind: "handoff_note",
      patientId: "P1",
      note: "Hypoxemia; bedside check requested",
    });
  });

  it("answers a consult with an assessment and an acknowledgement", () => {
    const outcome = agent.decide(
      messageEvent({ kind: "consult_request", patientId: "P1", reason: "low SpO2 (89%)" }),
      withVitals({ spo2: 89 })
    );
    expect(outcome?.decision).toEqual(
      expect.objectContaining({ kind: "clinical_assessment", urgency: "high", rationale: "Requested by nurse" })
    );
    expect(outcome?.message).toEqual({ to: "nurse", payload: { kind: "acknowledgement", patientId: "P1", ref: 7 } });
  });

  it("holds a flagged drug, stops it and does not restart it", () => {
    const review: SimEvent = {
      type: "agent_message",
      message: {
        from: "pharmacist",
        to: "physician",
        payload: { kind: "medication_review_request", patientId: "P1", drug: "Norepinephrine", reason: "interaction" },
        ts: 0,
        tick: 0,
        sequence: 3,
      },
    };
    const outcome = agent.decide(review, withVitals({}, { norepinephrine: medication("norepinephrine", 0.1) }));
    expect(outcome?.decision).toEqual(
      expect.objectContaining({ kind: "medication_order", drug: "norepinephrine", action: "hold", rationale: "interaction" })
    );
    expect(outcome?.medicationChange).toEqual({ action: "stop", drug: "norepinephrine", reason: "held pending review" });

    const later = agent.decide(vitalEvent(1000), withVitals({ systolicBp: 85 }));
    expect(later?.decision?.kind).toBe("escalation");
  });

  it("holds without a stop when the drug is not active", () => {
    const outcome = agent.decide(
      messageEvent({ kind: "medication_review_request", patientId: "P1", drug: "heparin", reason: "r" }),
      withVitals({})
    );
    expect(outcome?.decision?.kind).toBe("medication_order");
    expect(outcome?.medicationChange).toBeUndefined();
  });
});
