import type { AgentOutcome, ClinicalAgent } from "../agentRuntime";
import type {
  AgentMessage,
  Alert,
  MessageDraft,
  PatientSnapshot,
  SimEvent,
  Urgency,
  VitalMetric,
  Vitals,
} from "../types";
import { Throttle } from "./throttle";

type Band = { metric: VitalMetric; low: number; high: number; criticalLow: number; criticalHigh: number };

// Outside [low, high] is actionable; outside the critical band goes to rapid response.
export const PHYSICIAN_THRESHOLDS: readonly Band[] = [
  { metric: "heartRate", low: 50, high: 120, criticalLow: 40, criticalHigh: 150 },
  { metric: "systolicBp", low: 90, high: 180, criticalLow: 80, criticalHigh: 220 },
  { metric: "spo2", low: 92, high: 100, criticalLow: 85, criticalHigh: 101 },
];

export type VitalBreach = { metric: VitalMetric; value: number; critical: boolean };

export function criticalVitals(vitals: Vitals): VitalBreach[] {
  const breaches: VitalBreach[] = [];
  for (const band of PHYSICIAN_THRESHOLDS) {
    const reading = vitals[band.metric];
    if (!reading) continue;
    const { value } = reading;
    if (value < band.low || value > band.high) {
      breaches.push({
        metric: band.metric,
        value,
        critical: value < band.criticalLow || value > band.criticalHigh,
      });
    }
  }
  return breaches;
}

function describeVitals(snapshot: PatientSnapshot): string {
  const v = snapshot.vitals;
  const parts: string[] = [];
  if (v.heartRate) parts.push(`HR ${v.heartRate.value}`);
  if (v.systolicBp && v.diastolicBp) parts.push(`BP ${v.systolicBp.value}/${v.diastolicBp.value}`);
  if (v.spo2) parts.push(`SpO2 ${v.spo2.value}%`);
  if (v.temperature) parts.push(`T ${v.temperature.value}`);
  return parts.length ? parts.join(", ") : "no vitals yet";
}

export type PhysicianOptions = {
  /** Minimum event-time gap between routine reassessments of one patient. */
  reassessEveryMs?: number;
  /** Minimum gap between escalations for the same set of abnormal vitals. */
  escalateEveryMs?: number;
};

/**
 * Critical care physician. Escalates on critical vitals and high alerts,
 * starts a vasopressor for hypotension and rate control for tachycardia,
 * answers consults and holds drugs the pharmacist flags.
 */
export class PhysicianAgent implements ClinicalAgent {
  readonly role = "physician" as const;
  private readonly reassess: Throttle;
  private readonly escalate: Throttle;
  // Drugs held after a pharmacist review are not restarted for that patient.
  private readonly held = new Map<string, Set<string>>();

  constructor(opts: PhysicianOptions = {}) {
    this.reassess = new Throttle(opts.reassessEveryMs ?? 60_000);
    this.escalate = new Throttle(opts.escalateEveryMs ?? 30_000);
  }

  observe(event: SimEvent): boolean {
    switch (event.type) {
      case "vital_update":
        return true;
      case "alert":
        return event.alert.severity === "high" || event.alert.severity === "critical";
      case "agent_message":
        return (
          event.message.payload.kind === "consult_request" ||
          event.message.payload.kind === "medication_review_request"
        );
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
        return this.onMessage(event.message, snapshot);
      default:
        return null;
    }
  }

  private onVitals(snapshot: PatientSnapshot, ts: number): AgentOutcome | null {
    const breaches = criticalVitals(snapshot.vitals);
    if (breaches.length === 0) {
      if (!this.reassess.ready(snapshot.id, ts)) return null;
      return {
        decision: {
          kind: "clinical_assessment",
          patientId: snapshot.id,
          urgency: "routine",
          confidence: 0.75,
          assessment: `Stable on reassessment (${describeVitals(snapshot)}). Continue current plan.`,
          rationale: "Vitals within physician thresholds",
        },
      };
    }

    const critical = breaches.some((b) => b.critical);
    const urgency: Urgency = critical ? "critical" : "high";
    const sbp = snapshot.vitals.systolicBp?.value;
    const hr = snapshot.vitals.heartRate?.value;

    if (sbp !== undefined && sbp < 90 && this.canStart(snapshot, "norepinephrine")) {
      return {
        decision: {
          kind: "medication_order",
          patientId: snapshot.id,
          urgency,
          confidence: 0.85,
          drug: "norepinephrine",
          action: "start",
          dose: 0.1,
          doseUnit: "mcg/kg/min",
          rationale: `Hypotension, SBP ${sbp} mmHg`,
        },
        message: {
          to: "pharmacist",
          payload: {
            kind: "medication_review_request",
            patientId: snapshot.id,
            drug: "norepinephrine",
            reason: "Vasopressor started for hypotension",
          },
        },
        medicationChange: {
          action: "start",
          medication: {
            drug: "norepinephrine",
            dose: 0.1,
            doseUnit: "mcg/kg/min",
            route: "IV",
            frequency: "continuous",
            startedAt: ts,
            orderedBy: "physician",
          },
        },
      };
    }

    if (hr !== undefined && hr > 120 && !critical && this.canStart(snapshot, "digoxin")) {
      return {
        decision: {
          kind: "medication_order",
          patientId: snapshot.id,
          urgency,
          confidence: 0.8,
          drug: "digoxin",
          action: "start",
          dose: 0.25,
          doseUnit: "mg",
          rationale: `Sustained tachycardia, HR ${hr}`,
        },
        medicationChange: {
          action: "start",
          medication: {
            drug: "digoxin",
            dose: 0.25,
            doseUnit: "mg",
            route: "IV",
            frequency: "q6h",
            startedAt: ts,
            orderedBy: "physician",
          },
        },
      };
    }

    const metrics = breaches.map((b) => b.metric).join(",");
    if (!this.escalate.ready(`${snapshot.id}|${metrics}|${urgency}`, ts)) return null;
    const trigger = breaches.map((b) => `${b.metric}=${b.value}`).join(", ");
    const outcome: AgentOutcome = {
      decision: {
        kind: "escalation",
        patientId: snapshot.id,
        urgency,
        confidence: 0.85,
        trigger: `critical_vital: ${trigger}`,
        target: critical ? "rapid_response" : "nurse",
        rationale: "Vital signs outside critical care thresholds",
      },
    };
    if (!critical) {
      outcome.message = {
        to: "nurse",
        payload: { kind: "handoff_note", patientId: snapshot.id, note: `Watch closely: ${trigger}` },
      };
    }
    return outcome;
  }

  private onAlert(alert: Alert): AgentOutcome {
    const critical = alert.severity === "critical";
    return {
      decision: {
        kind: "escalation",
        patientId: alert.patientId,
        urgency: alert.severity,
        confidence: 0.9,
        trigger: `clinical_alert: ${alert.ruleId}`,
        target: critical ? "rapid_response" : "nurse",
        rationale: `${alert.description} (${alert.metric} ${alert.value})`,
      },
      message: {
        to: "nurse",
        payload: {
          kind: "handoff_note",
          patientId: alert.patientId,
          note: `${alert.description}; bedside check requested`,
        },
      },
    };
  }

  private onMessage(message: AgentMessage, snapshot: PatientSnapshot): AgentOutcome | null {
    const payload = message.payload;
    const ack: MessageDraft = {
      to: message.from,
      payload: { kind: "acknowledgement", patientId: snapshot.id, ref: message.sequence },
    };

    if (payload.kind === "consult_request") {
      const breaches = criticalVitals(snapshot.vitals);
      return {
        decision: {
          kind: "clinical_assessment",
          patientId: snapshot.id,
          urgency: breaches.length ? "high" : "elevated",
          confidence: 0.8,
          assessment: `Consult for ${payload.reason}: ${describeVitals(snapshot)}`,
          rationale: `Requested by ${message.from}`,
        },
        message: ack,
      };
    }

    if (payload.kind === "medication_review_request" && payload.drug) {
      const drug = payload.drug.toLowerCase();
      this.markHeld(snapshot.id, drug);
      const outcome: AgentOutcome = {
        decision: {
          kind: "medication_order",
          patientId: snapshot.id,
          urgency: "high",
          confidence: 0.8,
          drug,
          action: "hold",
          rationale: payload.reason,
        },
        message: ack,
      };
      if (drug in snapshot.medications) {
        outcome.medicationChange = { action: "stop", drug, reason: "held pending review" };
      }
      return outcome;
    }

    return null;
  }

  private canStart(snapshot: PatientSnapshot, drug: string): boolean {
    if (drug in snapshot.medications) return false;
    return !this.held.get(snapshot.id)?.has(drug);
  }

  private markHeld(patientId: string, drug: string): void {
    const drugs = this.held.get(patientId) ?? new Set<string>();
    drugs.add(drug);
    this.held.set(patientId, drugs);
  }
}
