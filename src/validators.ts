import { z } from "zod";
import { ValidationError } from "./errors";
import { generateDecisionId } from "./idGenerator";
import type {
  AgentMessage,
  AgentRole,
  AlertRule,
  Decision,
  DecisionDraft,
  LabResult,
  MessageDraft,
  Vitals,
} from "./sim/types";

export const roleSchema = z.enum(["physician", "nurse", "pharmacist"]);

export const urgencySchema = z.enum(["routine", "elevated", "high", "critical"]);

const decisionBase = {
  patientId: z.string().min(1),
  urgency: urgencySchema,
  confidence: z.number().min(0).max(1),
  rationale: z.string().min(1),
};

const decisionDraftSchema: z.ZodType<DecisionDraft> = z.discriminatedUnion("kind", [
  z.object({
    ...decisionBase,
    kind: z.literal("clinical_assessment"),
    assessment: z.string().min(1),
  }),
  z.object({
    ...decisionBase,
    kind: z.literal("medication_order"),
    drug: z.string().min(1),
    action: z.enum(["start", "adjust", "hold", "stop"]),
    dose: z.number().positive().optional(),
    doseUnit: z.string().min(1).optional(),
  }),
  z.object({
    ...decisionBase,
    kind: z.literal("escalation"),
    trigger: z.string().min(1),
    target: z.union([roleSchema, z.literal("rapid_response")]),
  }),
  z.object({
    ...decisionBase,
    kind: z.literal("nursing_intervention"),
    intervention: z.string().min(1),
    details: z.string().min(1),
  }),
  z.object({
    ...decisionBase,
    kind: z.literal("drug_interaction"),
    drug: z.string().min(1),
    interactsWith: z.array(z.string().min(1)).min(1),
  }),
]);

const messagePayloadSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("consult_request"), patientId: z.string().min(1), reason: z.string().min(1) }),
  z.object({ kind: z.literal("handoff_note"), patientId: z.string().min(1), note: z.string().min(1) }),
  z.object({
    kind: z.literal("medication_review_request"),
    patientId: z.string().min(1),
    drug: z.string().min(1).optional(),
    reason: z.string().min(1),
  }),
  z.object({ kind: z.literal("acknowledgement"), patientId: z.string().min(1), ref: z.number().int().nonnegative() }),
]);

const messageDraftSchema: z.ZodType<MessageDraft> = z.object({
  to: roleSchema.optional(),
  payload: messagePayloadSchema,
});

const readingSchema = z.object({
  value: z.number().finite(),
  unit: z.string(),
  ts: z.number().nonnegative(),
});

const vitalsSchema: z.ZodType<Vitals> = z.object({
  heartRate: readingSchema.optional(),
  systolicBp: readingSchema.optional(),
  diastolicBp: readingSchema.optional(),
  respiratoryRate: readingSchema.optional(),
  spo2: readingSchema.optional(),
  temperature: readingSchema.optional(),
});

const labTestSchema = z.enum(["glucose", "sodium", "potassium", "creatinine", "hemoglobin"]);

const labResultSchema: z.ZodType<LabResult> = z.object({
  test: labTestSchema,
  value: z.number().finite(),
  unit: z.string(),
  referenceRange: z.string(),
  abnormalFlag: z.enum(["", "L", "H"]),
  ts: z.number().nonnegative(),
});

const alertMetricSchema = z.union([
  z.enum(["heartRate", "systolicBp", "diastolicBp", "respiratoryRate", "spo2", "temperature"]),
  labTestSchema,
]);

const alertRuleSchema: z.ZodType<AlertRule> = z
  .object({
    id: z.string().min(1),
    metric: alertMetricSchema,
    severity: urgencySchema,
    below: z.number().finite().optional(),
    above: z.number().finite().optional(),
    bucketSize: z.number().positive(),
    description: z.string().min(1),
  })
  .refine((rule) => rule.below !== undefined || rule.above !== undefined, {
    message: "rule needs a `below` or `above` bound",
  });

const alertRuleSetSchema = z
  .array(alertRuleSchema)
  .min(1)
  .refine((rules) => new Set(rules.map((r) => r.id)).size === rules.length, {
    message: "rule ids must be unique",
  });

function formatIssues(error: z.ZodError): string[] {
  return error.errors.map((issue) => {
    const path = issue.path.join(".");
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

/**
 * Build a committed-shape decision from a decision-function draft.
 * Rejects drafts missing the fields their kind requires.
 */
export function buildDecision(
  draft: unknown,
  role: AgentRole,
  ts: number,
  tick: number,
  id = generateDecisionId(role)
): Decision {
  const parsed = decisionDraftSchema.safeParse(draft);
  if (!parsed.success) {
    throw new ValidationError("decision", formatIssues(parsed.error));
  }
  const decision: Decision = { ...parsed.data, id, role, ts, tick };
  return Object.freeze(decision);
}

export function buildMessage(
  draft: unknown,
  from: AgentRole,
  sequence: number,
  ts: number,
  tick: number
): AgentMessage {
  const parsed = messageDraftSchema.safeParse(draft);
  if (!parsed.success) {
    throw new ValidationError("message", formatIssues(parsed.error));
  }
  if (parsed.data.to === from) {
    throw new ValidationError("message", [`${from} cannot address a message to itself`]);
  }
  const message: AgentMessage = {
    from,
    ...(parsed.data.to ? { to: parsed.data.to } : {}),
    payload: Object.freeze(parsed.data.payload),
    ts,
    tick,
    sequence,
  };
  return Object.freeze(message);
}

const agentReplySchema = z.object({
  decision: decisionDraftSchema.nullish(),
  message: messageDraftSchema.nullish(),
});

export type AgentReply = { decision?: DecisionDraft; message?: MessageDraft };

/** Parse a model's JSON reply: `{ "decision": ..., "message": ... }`, either may be null. */
export function parseAgentReply(raw: string): AgentReply {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new ValidationError("agent reply", [`not JSON: ${err instanceof Error ? err.message : String(err)}`]);
  }
  const parsed = agentReplySchema.safeParse(json);
  if (!parsed.success) {
    throw new ValidationError("agent reply", formatIssues(parsed.error));
  }
  const reply: AgentReply = {};
  if (parsed.data.decision) reply.decision = parsed.data.decision;
  if (parsed.data.message) reply.message = parsed.data.message;
  return reply;
}

export function parseVitals(raw: unknown): Vitals {
  const parsed = vitalsSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ValidationError("vitals", formatIssues(parsed.error));
  }
  return parsed.data;
}

export function parseLabResult(raw: unknown): LabResult {
  const parsed = labResultSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ValidationError("lab result", formatIssues(parsed.error));
  }
  return parsed.data;
}

export function parseAlertRules(raw: unknown): AlertRule[] {
  const parsed = alertRuleSetSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ValidationError("alert rules", formatIssues(parsed.error));
  }
  return parsed.data;
}
