import type { AgentOutcome, ClinicalAgent } from "../agentRuntime";
import type { AgentMessage, Alert, PatientSnapshot, SimEvent } from "../types";
import { Throttle } from "./throttle";

export const FEVER_THRESHOLD_C = 38.0;
export const LOW_SPO2_THRESHOLD = 92;

export type NurseOptions = {
  /** Minimum event-time gap before the same intervention is repeated for a patient. */
  interventionEveryMs?: number;
  /** Minimum event-time gap between routine bedside assessments of one patient. */
  routineEveryMs?: number;
};

/**
 * ICU nurse. Runs the fever and oxygenation protocols, asks the physician to
 * see hypoxic patients and picks up physician handoffs.
 */
export class NurseAgent implements ClinicalAgent {
  readonly role = "nurse" as const;
  private readonly interventions: Throttle;
  private readonly routine: Throttle;

  constructor(opts: NurseOptions = {}) {
    this.interventions = new Throttle(opts.interventionEveryMs ?? 60_000);
    this.routine = new Throttle(opts.routineEveryMs ?? 120_000);
  }

  observe(event: SimEvent): boolean {
    switch (event.type) {
      case "vital_update":
        return true;
      case "alert":
        return event.alert.severity === "elevated";
      case "agent_message":
        return event.message.payload.kind === "handoff_note";
      default:
        return false;
    }
  }

  decide(event: SimEvent, snapshot: PatientSnapshot): AgentOutcome | null {
    switch (event.type) {
      case "vital_update":
        return this.onVitals(snapshot, event.ts);
      case "alert":
        return this.onAlert(event.alert);
      case "agent_message":
        return this.onHandoff(event.message, snapshot);
      default:
        return null;
    }
  }

  private onVitals(snapshot: PatientSnapshot, ts: number): AgentOutcome | null {
    const spo2 = snapshot.vitals.spo2?.value;
    if (spo2 !== undefined && spo2 < LOW_SPO2_THRESHOLD && this.interventions.ready(`${snapshot.id}|oxygen`, ts)) {
      return {
        decision: {
          kind: "nursing_intervention",
          patientId: snapshot.id,
          urgency: "high",
          confidence: 0.9,
          intervention: "oxygen_titration",
          details: `SpO2 ${spo2}%: titrate supplemental oxygen, reposition, check probe`,
          rationale: "Oxygenation protocol",
        },
        message: {
          to: "physician",
          payload: { kind: "consult_request", patientId: snapshot.id, reason: `low SpO2 (${spo2}%)` },
        },
      };
    }

    const temp = snapshot.vitals.temperature?.value;
    if (temp !== undefined && temp > FEVER_THRESHOLD_C && this.interventions.ready(`${snapshot.id}|fever`, ts)) {
      return {
        decision: {
          kind: "nursing_intervention",
          patientId: snapshot.id,
          urgency: "elevated",
          confidence: 0.9,
          intervention: "fever_management",
          details: "Administer antipyretic, cooling measures",
          rationale: "Standard nursing protocol",
        },
      };
    }

    if (!this.routine.ready(snapshot.id, ts)) return null;
    return {
      decision: {
        kind: "nursing_intervention",
        patientId: snapshot.id,
        urgency: "routine",
        confidence: 0.8,
        intervention: "routine_assessment",
        details: "Hourly assessment: lines, skin, pain, sedation score",
        rationale: "Scheduled bedside assessment",
      },
    };
  }

  private onAlert(alert: Alert): AgentOutcome | null {
    if (!this.interventions.ready(`${alert.patientId}|monitoring|${alert.ruleId}`, alert.ts)) return null;
    return {
      decision: {
        kind: "nursing_intervention",
        patientId: alert.patientId,
        urgency: "elevated",
        confidence: 0.85,
        intervention: "increase_monitoring",
        details: `${alert.description}: vitals every 15 minutes`,
        rationale: `Alert ${alert.ruleId}`,
      },
    };
  }

  private onHandoff(message: AgentMessage, snapshot: PatientSnapshot): AgentOutcome {
    const note = message.payload.kind === "handoff_note" ? message.payload.note : "handoff";
    return {
      decision: {
        kind: "nursing_intervention",
        patientId: snapshot.id,
        urgency: "elevated",
        confidence: 0.85,
        intervention: "bedside_check",
        details: note,
        rationale: `Handoff from ${message.from}`,
      },
      message: {
        to: message.from,
        payload: { kind: "acknowledgement", patientId: snapshot.id, ref: message.sequence },
      },
    };
  }
}
