import { describeError } from "../../errors";
import { logError, logWarn } from "../../logger";
import type { ChatMessage, CompletionClient } from "../../openaiClient";
import { parseAgentReply } from "../../validators";
import type { AgentOutcome, ClinicalAgent } from "../agentRuntime";
import { eventPatientId, type AgentRole, type PatientSnapshot, type SimEvent } from "../types";

const ROLE_BRIEF: Record<AgentRole, string> = {
  physician: "the attending critical care physician, responsible for diagnosis, escalation and medication orders",
  nurse: "the ICU bedside nurse, responsible for monitoring, nursing interventions and calling the physician",
  pharmacist: "the clinical pharmacist, responsible for interactions, renal dosing and medication safety",
};

export function buildPrompt(role: AgentRole, event: SimEvent, snapshot: PatientSnapshot, suggestion: AgentOutcome): ChatMessage[] {
  const system = `
You are ${ROLE_BRIEF[role]} in a simulated ICU.
Given a bus event, the patient's current record and a protocol suggestion, return JSON with keys:
- decision: null, or an object with kind (clinical_assessment | medication_order | escalation | nursing_intervention | drug_interaction),
  patientId, urgency (routine | elevated | high | critical), confidence (0-1), rationale and the fields of its kind.
- message: null, or { to?, payload } where payload.kind is consult_request | handoff_note | medication_review_request | acknowledgement.
Keep the patientId unchanged. Prefer the protocol suggestion unless the record clearly argues otherwise.
Return only JSON.
  `.trim();

  const user = JSON.stringify({
    event,
    patient: {
      id: snapshot.id,
      diagnosis: snapshot.demographics.diagnosis,
      acuity: snapshot.demographics.acuity,
      ageYears: snapshot.demographics.ageYears,
      allergies: snapshot.demographics.allergies,
      vitals: snapshot.vitals,
      labs: snapshot.labs,
      medications: Object.keys(snapshot.medications),
    },
    suggestion: { decision: suggestion.decision ?? null, message: suggestion.message ?? null },
  });

  return [
    { role: "system", content: system },
    { role: "user", content: user },
  ];
}

/**
 * Model-backed decision function for any role. The rule-based agent decides
 * whether an event needs action at all and supplies the suggestion; the model
 * writes the decision. Without a client, or when the reply is unusable, the
 * rule-based outcome stands.
 */
export class LlmAgent implements ClinicalAgent {
  readonly role: AgentRole;

  constructor(
    private readonly fallback: ClinicalAgent,
    private readonly client: CompletionClient | null
  ) {
    this.role = fallback.role;
  }

  observe(event: SimEvent): boolean {
    return this.fallback.observe(event);
  }

  async decide(event: SimEvent, snapshot: PatientSnapshot, signal?: AbortSignal): Promise<AgentOutcome | null> {
    const suggestion = await this.fallback.decide(event, snapshot, signal);
    if (!suggestion || !this.client) return suggestion;
    if (signal?.aborted) return null;

    try {
      const raw = await this.client.completeJson(buildPrompt(this.role, event, snapshot, suggestion), signal);
      const reply = parseAgentReply(raw);
      const patientId = eventPatientId(event);
      if (reply.decision && reply.decision.patientId !== patientId) {
        logWarn(`[llm:${this.role}] reply named ${reply.decision.patientId}, expected ${patientId}; using protocol`);
        return suggestion;
      }
      const outcome: AgentOutcome = {};
      if (reply.decision) outcome.decision = reply.decision;
      const message = reply.message ?? suggestion.message;
      if (message) outcome.message = message;
      // Store mutations stay with the protocol so a reply cannot invent an order.
      if (suggestion.medicationChange && reply.decision?.kind === "medication_order") {
        outcome.medicationChange = suggestion.medicationChange;
      }
      return outcome;
    } catch (err) {
      if (signal?.aborted) {
        logWarn(`[llm:${this.role}] completion cancelled: ${describeError(signal.reason)}`);
        return null;
      }
      logError(`[llm:${this.role}] completion failed, using protocol:`, describeError(err));
      return suggestion;
    }
  }
}
