export type AgentRole = "physician" | "nurse" | "pharmacist";

export const AGENT_ROLES: readonly AgentRole[] = ["physician", "nurse", "pharmacist"] as const;

// Shared by decision urgency and alert severity.
export type Urgency = "routine" | "elevated" | "high" | "critical";

export const URGENCY_LEVELS: readonly Urgency[] = ["routine", "elevated", "high", "critical"] as const;

export function urgencyRank(level: Urgency): number {
  return URGENCY_LEVELS.indexOf(level);
}

export function compareUrgency(a: Urgency, b: Urgency): number {
  return urgencyRank(a) - urgencyRank(b);
}

// ============================================================================
// Patient
// ============================================================================

export type Sex = "male" | "female";

export type Acuity = "stable" | "moderate" | "critical";

export type Demographics = {
  firstName: string;
  lastName: string;
  mrn: string;
  ageYears: number;
  sex: Sex;
  weightKg: number;
  heightCm: number;
  diagnosis: string;
  acuity: Acuity;
  allergies: string[];
  history: string[];
  admittedAt: number;
};

export type VitalMetric =
  | "heartRate"
  | "systolicBp"
  | "diastolicBp"
  | "respiratoryRate"
  | "spo2"
  | "temperature";

export const VITAL_METRICS: readonly VitalMetric[] = [
  "heartRate",
  "systolicBp",
  "diastolicBp",
  "respiratoryRate",
  "spo2",
  "temperature",
] as const;

export type LabTest = "glucose" | "sodium" | "potassium" | "creatinine" | "hemoglobin";

export const LAB_TESTS: readonly LabTest[] = ["glucose", "sodium", "potassium", "creatinine", "hemoglobin"] as const;

export type Reading = {
  value: number;
  unit: string;
  ts: number;
};

export type Vitals = Partial<Record<VitalMetric, Reading>>;

export type LabResult = {
  test: LabTest;
  value: number;
  unit: string;
  referenceRange: string;
  abnormalFlag: "" | "L" | "H";
  ts: number;
};

export type Medication = {
  drug: string;
  dose: number;
  doseUnit: string;
  route: "IV" | "PO";
  frequency: string;
  startedAt: number;
  orderedBy: AgentRole | "admission";
};

export type MedicationChange =
  | { action: "start"; medication: Medication }
  | { action: "adjust"; drug: string; dose: number }
  | { action: "stop"; drug: string; reason?: string };

export type PatientRecord = {
  id: string;
  demographics: Demographics;
  vitals: Vitals;
  labs: Partial<Record<LabTest, LabResult>>;
  medications: Record<string, Medication>;
};

export type PatientSnapshot = {
  readonly id: string;
  readonly demographics: Readonly<Demographics>;
  readonly vitals: Readonly<Vitals>;
  readonly labs: Readonly<Partial<Record<LabTest, LabResult>>>;
  readonly medications: Readonly<Record<string, Medication>>;
  readonly version: number;
  readonly updatedAt: number;
};

// ============================================================================
// Decisions
// ============================================================================

export type DecisionKind =
  | "clinical_assessment"
  | "medication_order"
  | "escalation"
  | "nursing_intervention"
  | "drug_interaction";

type DecisionBase = {
  id: string;
  patientId: string;
  role: AgentRole;
  urgency: Urgency;
  confidence: number;
  rationale: string;
  ts: number;
  /** Tick of the feed event that set off the chain leading to this decision. */
  tick: number;
};

export type Decision =
  | (DecisionBase & { kind: "clinical_assessment"; assessment: string })
  | (DecisionBase & {
      kind: "medication_order";
      drug: string;
      action: "start" | "adjust" | "hold" | "stop";
      dose?: number;
      doseUnit?: string;
    })
  | (DecisionBase & { kind: "escalation"; trigger: string; target: AgentRole | "rapid_response" })
  | (DecisionBase & { kind: "nursing_intervention"; intervention: string; details: string })
  | (DecisionBase & { kind: "drug_interaction"; drug: string; interactsWith: string[] });

// Decisions as returned by a decision function: the runtime stamps id, role, ts and tick.
export type DecisionDraft = DistributiveOmit<Decision, "id" | "role" | "ts" | "tick">;

// ============================================================================
// Agent messages
// ============================================================================

export type MessagePayload =
  | { kind: "consult_request"; patientId: string; reason: string }
  | { kind: "handoff_note"; patientId: string; note: string }
  | { kind: "medication_review_request"; patientId: string; drug?: string; reason: string }
  | { kind: "acknowledgement"; patientId: string; ref: number };

export type MessageKind = MessagePayload["kind"];

export type AgentMessage = {
  from: AgentRole;
  to?: AgentRole;
  payload: MessagePayload;
  ts: number;
  tick: number;
  sequence: number;
};

export type MessageDraft = {
  to?: AgentRole;
  payload: MessagePayload;
};

// ============================================================================
// Alerts
// ============================================================================

export type AlertMetric = VitalMetric | LabTest;

export type AlertRule = {
  id: string;
  metric: AlertMetric;
  severity: Urgency;
  below?: number;
  above?: number;
  bucketSize: number;
  description: string;
};

export type Alert = {
  id: string;
  patientId: string;
  ruleId: string;
  metric: AlertMetric;
  value: number;
  severity: Urgency;
  description: string;
  ts: number;
  tick: number;
  dedupKey: string;
};

// ============================================================================
// Bus events
// ============================================================================

export type SimEvent =
  | { type: "vital_update"; patientId: string; vitals: Vitals; ts: number; tick: number }
  | { type: "lab_result"; patientId: string; lab: LabResult; ts: number; tick: number }
  | { type: "medication_change"; patientId: string; change: MedicationChange; by: AgentRole; ts: number; tick: number }
  | { type: "agent_message"; message: AgentMessage }
  | { type: "decision"; decision: Decision }
  | { type: "alert"; alert: Alert };

export type SimEventType = SimEvent["type"];

export type EventOf<T extends SimEventType> = Extract<SimEvent, { type: T }>;

export function eventPatientId(event: SimEvent): string {
  switch (event.type) {
    case "agent_message":
      return event.message.payload.patientId;
    case "decision":
      return event.decision.patientId;
    case "alert":
      return event.alert.patientId;
    default:
      return event.patientId;
  }
}

export function eventTimestamp(event: SimEvent): number {
  switch (event.type) {
    case "agent_message":
      return event.message.ts;
    case "decision":
      return event.decision.ts;
    case "alert":
      return event.alert.ts;
    default:
      return event.ts;
  }
}

/** Events raised in response to a feed event carry that event's tick forward. */
export function eventTick(event: SimEvent): number {
  switch (event.type) {
    case "agent_message":
      return event.message.tick;
    case "decision":
      return event.decision.tick;
    case "alert":
      return event.alert.tick;
    default:
      return event.tick;
  }
}

// ============================================================================
// Event log (lifecycle / audit)
// ============================================================================

export type EventLogType =
  | "run.started"
  | "run.completed"
  | "run.failed"
  | "tick.completed"
  | "tick.barrier_timeout"
  | "feed.failed"
  | "alert.emitted"
  | "alert.suppressed"
  | "decision.committed"
  | "decision.rejected"
  | "decision.superseded"
  | "agent.timeout"
  | "agent.failed"
  | "status.report";

export type EventLogEntry = {
  id: string;
  ts: number;
  runId: string;
  type: EventLogType;
  payload?: Record<string, unknown>;
  correlationId?: string;
};

// ============================================================================
// Run
// ============================================================================

export type RunStatus = "idle" | "running" | "completed" | "failed";

export type RunSummary = {
  runId: string;
  status: RunStatus;
  failureCause?: string;
  startedAt: number;
  endedAt?: number;
  elapsedMs: number;
  configuredDurationMs: number;
  tickIntervalMs: number;
  ticks: number;
  decisionCount: number;
  messageCount: number;
  alertCount: number;
  suppressedAlerts: number;
  timeouts: number;
  decisionFailures: number;
  feedFailures: number;
  rejectedDecisions: number;
  supersededDecisions: number;
  decisionsPerMinute: number;
  decisionsByRole: Record<AgentRole, number>;
};

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;
