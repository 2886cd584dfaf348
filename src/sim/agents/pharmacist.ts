import type { AgentOutcome, ClinicalAgent } from "../agentRuntime";
import type { AgentMessage, LabResult, MedicationChange, PatientSnapshot, SimEvent } from "../types";
import { Throttle } from "./throttle";

export const DRUG_INTERACTIONS: Readonly<Record<string, readonly string[]>> = {
  warfarin: ["aspirin", "heparin"],
  digoxin: ["furosemide"],
};

// Renally cleared; dose halved when creatinine runs high.
export const RENAL_DOSE_DRUGS: readonly string[] = ["digoxin", "furosemide", "vancomycin"];

export const CREATININE_LIMIT = 2.0;

/** Active drugs on the patient that interact with `drug`, in either direction of the table. */
export function findInteractions(drug: string, activeDrugs: Iterable<string>): string[] {
  const name = drug.toLowerCase();
  const hits: string[] = [];
  for (const other of activeDrugs) {
    const candidate = other.toLowerCase();
    if (candidate === name) continue;
    const forward = DRUG_INTERACTIONS[name]?.includes(candidate) ?? false;
    const reverse = DRUG_INTERACTIONS[candidate]?.includes(name) ?? false;
    if (forward || reverse) hits.push(candidate);
  }
  return hits.sort();
}

function startedDrug(change: MedicationChange): string | undefined {
  return change.action === "start" ? change.medication.drug : undefined;
}

/**
 * Clinical pharmacist. Screens every new medication against the interaction
 * table and adjusts renally cleared drugs when creatinine rises.
 */
export class PharmacistAgent implements ClinicalAgent {
  readonly role = "pharmacist" as const;
  private readonly renalReview: Throttle;

  constructor(opts: { renalReviewEveryMs?: number } = {}) {
    this.renalReview = new Throttle(opts.renalReviewEveryMs ?? 300_000);
  }

  observe(event: SimEvent): boolean {
    switch (event.type) {
      case "medication_change":
        return event.by !== "pharmacist" && event.change.action === "start";
      case "lab_result":
        return event.lab.test === "creatinine";
      case "agent_message":
        return event.message.payload.kind === "medication_review_request";
      default:
        return false;
    }
  }

  decide(event: SimEvent, snapshot: PatientSnapshot): AgentOutcome | null {
    switch (event.type) {
      case "medication_change": {
        const drug = startedDrug(event.change);
        return drug ? this.screen(drug, snapshot) : null;
      }
      case "lab_result":
        return this.onRenalLab(event.lab, snapshot);
      case "agent_message":
        return this.onReviewRequest(event.message, snapshot);
      default:
        return null;
    }
  }

  private screen(drug: string, snapshot: PatientSnapshot): AgentOutcome | null {
    const interactsWith = findInteractions(drug, Object.keys(snapshot.medications));
    if (interactsWith.length === 0) return null;
    return {
      decision: {
        kind: "drug_interaction",
        patientId: snapshot.id,
        urgency: "high",
        confidence: 0.95,
        drug: drug.toLowerCase(),
        interactsWith,
        rationale: "Drug interaction database match",
      },
      message: {
        to: "physician",
        payload: {
          kind: "medication_review_request",
          patientId: snapshot.id,
          drug: drug.toLowerCase(),
          reason: `${drug} interacts with ${interactsWith.join(", ")}; hold pending review`,
        },
      },
    };
  }

  private onRenalLab(lab: LabResult, snapshot: PatientSnapshot): AgentOutcome | null {
    if (lab.value <= CREATININE_LIMIT) return null;
    const target = RENAL_DOSE_DRUGS.find((drug) => drug in snapshot.medications);
    if (!target) return null;
    if (!this.renalReview.ready(`${snapshot.id}|${target}`, lab.ts)) return null;
    const current = snapshot.medications[target];
    const dose = Math.round((current.dose / 2) * 100) / 100;
    return {
      decision: {
        kind: "medication_order",
        patientId: snapshot.id,
        urgency: "elevated",
        confidence: 0.85,
        drug: target,
        action: "adjust",
        dose,
        doseUnit: current.doseUnit,
        rationale: `Creatinine ${lab.value} ${lab.unit}: renal dose adjustment`,
      },
      medicationChange: { action: "adjust", drug: target, dose },
    };
  }

  private onReviewRequest(message: AgentMessage, snapshot: PatientSnapshot): AgentOutcome | null {
    if (message.payload.kind !== "medication_review_request") return null;
    const drug = message.payload.drug;
    const outcome: AgentOutcome = {
      message: {
        to: message.from,
        payload: { kind: "acknowledgement", patientId: snapshot.id, ref: message.sequence },
      },
    };
    if (drug) {
      const screened = this.screen(drug, snapshot);
      if (screened?.decision) outcome.decision = screened.decision;
    }
    return outcome;
  }
}
