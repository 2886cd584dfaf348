import { findInteractions, PharmacistAgent } from "../agents/pharmacist";
import type { LabResult, Medication, SimEvent } from "../types";
import { makeSnapshot, medication } from "./fixtures";

function startEvent(drug: string, by: "physician" | "pharmacist" = "physician"): SimEvent {
  return {
    type: "medication_change",
    patientId: "P1",
    change: { action: "start", medication: medication(drug, 1, { orderedBy: by }) },
    by,
    ts: 0,
    tick: 0,
  };
}

function creatinine(value: number, ts: number): SimEvent {
  const lab: LabResult = {
    test: "creatinine",
    value,
    unit: "mg/dL",
    referenceRange: "0.6-1.2",
    abnormalFlag: value > 1.2 ? "H" : "",
    ts,
  };
  return { type: "lab_result", patientId: "P1", lab, ts, tick: 0 };
}

function onMeds(...meds: Medication[]) {
  return makeSnapshot("P1", { medications: Object.fromEntries(meds.map((m) => [m.drug, m])) });
}

describe("findInteractions", () => {
  it("matches the table in both directions", () => {
    expect(findInteractions("heparin", ["warfarin", "propofol"])).toEqual(["warfarin"]);
    expect(findInteractions("Warfarin", ["heparin", "aspirin", "warfarin"])).toEqual(["aspirin", "heparin"]);
  });

  it("finds nothing for unlisted drugs", () => {
    expect(findInteractions("propofol", ["fentanyl", "midazolam"])).toEqual([]);
  });
});

describe("PharmacistAgent", () => {
  let agent: PharmacistAgent;

  beforeEach(() => {
    agent = new PharmacistAgent();
  });

  it("observes new starts by others, creatinine and review requests", () => {
    expect(agent.observe(startEvent("heparin"))).toBe(true);
    expect(agent.observe(startEvent("heparin", "pharmacist"))).toBe(false);
    expect(
      agent.observe({ type: "medication_change", patientId: "P1", change: { action: "adjust", drug: "heparin", dose: 1 }, by: "physician", ts: 0, tick: 0 })
    ).toBe(false);
    expect(agent.observe(creatinine(1.0, 0))).toBe(true);
  });

  it("flags an interaction and asks the physician to review", () => {
    const snapshot = onMeds(medication("warfarin", 5), medication("heparin", 5000));
    const outcome = agent.decide(startEvent("heparin"), snapshot);
    expect(outcome?.decision).toEqual({
      kind: "drug_interaction",
      patientId: "P1",
      urgency: "high",
      confidence: 0.95,
      drug: "heparin",
      interactsWith: ["warfarin"],
      rationale: "Drug interaction database match",
    });
    expect(outcome?.message).toEqual({
      to: "physician",
      payload: {
        kind: "medication_review_request",
        patientId: "P1",
        drug: "heparin",
        reason: "heparin interacts with warfarin; hold pending review",
      },
    });
  });

  it("stays quiet when a new drug has no interactions", () => {
    expect(agent.decide(startEvent("propofol"), onMeds(medication("propofol", 20), medication("fentanyl", 50)))).toBeNull();
  });

  it("halves a renally cleared drug when creatinine is high", () => {
    const snapshot = onMeds(medication("furosemide", 40));
    const outcome = agent.decide(creatinine(2.5, 1000), snapshot);
    expect(outcome?.decision).toEqual(
      expect.objectContaining({
        kind: "medication_order",
        drug: "furosemide",
        action: "adjust",
        dose: 20,
        doseUnit: "mg",
        rationale: "Creatinine 2.5 mg/dL: renal dose adjustment",
      })
    );
    expect(outcome?.medicationChange).toEqual({ action: "adjust", drug: "furosemide", dose: 20 });
  });

  it("rounds the adjusted dose to two decimals", () => {
    const outcome = agent.decide(creatinine(3, 0), onMeds(medication("digoxin", 0.125)));
    expect(outcome?.medicationChange).toEqual({ action: "adjust", drug: "digoxin", dose: 0.06 });
  });

  it("reviews renal dosing once per interval", () => {
    const snapshot = onMeds(medication("vancomycin", 1000));
    expect(agent.decide(creatinine(2.5, 0), snapshot)).not.toBeNull();
    expect(agent.decide(creatinine(2.8, 299_999), snapshot)).toBeNull();
    expect(agent.decide(creatinine(2.8, 300_000), snapshot)).not.toBeNull();
  });

  it("ignores normal creatinine and patients without renal drugs", () => {
    expect(agent.decide(creatinine(2.0, 0), onMeds(medication("digoxin", 0.25)))).toBeNull();
    expect(agent.decide(creatinine(3.1, 0), onMeds(medication("propofol", 20)))).toBeNull();
  });

  it("acknowledges a review request and screens the drug", () => {
    const event: SimEvent = {
      type: "agent_message",
      message: {
        from: "physician",
        to: "pharmacist",
        payload: { kind: "medication_review_request", patientId: "P1", drug: "digoxin", reason: "started" },
        ts: 0,
        tick: 0,
        sequence: 2,
      },
    };
    const outcome = agent.decide(event, onMeds(medication("digoxin", 0.25), medication("furosemide", 40)));
    expect(outcome?.message).toEqual({ to: "physician", payload: { kind: "acknowledgement", patientId: "P1", ref: 2 } });
    expect(outcome?.decision).toEqual(expect.objectContaining({ kind: "drug_interaction", interactsWith: ["furosemide"] }));
    expect(outcome?.medicationChange).toBeUndefined();
  });
});
