import admin from "firebase-admin";
import { z } from "zod";
import { getFirestore } from "./firebaseAdmin";
import { log, logWarn } from "./logger";
import type { AgentStatus } from "./sim/agentRuntime";
import type { DecisionView } from "./sim/decisionCoordinator";
import type { Alert, RunSummary } from "./sim/types";

export type RunReport = {
  summary: RunSummary;
  roster: AgentStatus[];
  decisions: DecisionView[];
  alerts: Alert[];
};

export type RunEvent = {
  type: string;
  payload?: Record<string, unknown>;
  correlationId?: string;
};

const reportCache: Map<string, { key: string; lastWrite: number }> = new Map();

const makeKey = (obj: unknown): string => JSON.stringify(obj);

/** Writes runs/{runId}. Identical reports written within 500ms are skipped. */
export async function persistRunReport(report: RunReport): Promise<void> {
  const db = getFirestore();
  if (!db) return;
  const runId = report.summary.runId;
  const key = makeKey(report);
  const now = Date.now();
  const cached = reportCache.get(runId);
  if (cached && cached.key === key && now - cached.lastWrite < 500) return;

  const payload: Record<string, unknown> = {
    summary: report.summary,
    roster: report.roster,
    decisions: report.decisions.map((entry) => ({
      sequence: entry.sequence,
      status: entry.status,
      committedAt: entry.committedAt,
      decision: entry.decision,
      ...(entry.supersededBy ? { supersededBy: entry.supersededBy } : {}),
    })),
    alerts: report.alerts,
    updatedAt: admin.firestore.FieldValue.serverTimestamp(),
  };
  await db.collection("runs").doc(runId).set(payload, { merge: true });
  reportCache.set(runId, { key, lastWrite: now });
  log(`[persistence] run report saved for ${runId}`);
}

export async function logRunEvent(runId: string, event: RunEvent): Promise<void> {
  const db = getFirestore();
  if (!db) return;
  const colRef = db.collection("runs").doc(runId).collection("events");
  await colRef.add({
    ts: admin.firestore.FieldValue.serverTimestamp(),
    type: event.type,
    payload: event.payload ?? {},
    ...(event.correlationId ? { correlationId: event.correlationId } : {}),
  });
}

const roleCountsSchema = z.object({
  physician: z.number().int().nonnegative(),
  nurse: z.number().int().nonnegative(),
  pharmacist: z.number().int().nonnegative(),
});

const persistedSummarySchema = z
  .object({
    runId: z.string(),
    status: z.enum(["idle", "running", "completed", "failed"]),
    failureCause: z.string().optional(),
    startedAt: z.number(),
    endedAt: z.number().optional(),
    elapsedMs: z.number().nonnegative(),
    configuredDurationMs: z.number().nonnegative(),
    tickIntervalMs: z.number().positive(),
    ticks: z.number().int().nonnegative(),
    decisionCount: z.number().int().nonnegative(),
    messageCount: z.number().int().nonnegative(),
    alertCount: z.number().int().nonnegative(),
    suppressedAlerts: z.number().int().nonnegative(),
    timeouts: z.number().int().nonnegative(),
    decisionFailures: z.number().int().nonnegative(),
    feedFailures: z.number().int().nonnegative(),
    rejectedDecisions: z.number().int().nonnegative(),
    supersededDecisions: z.number().int().nonnegative(),
    decisionsPerMinute: z.number().nonnegative(),
    decisionsByRole: roleCountsSchema,
  })
  .passthrough();

/**
 * Validate a stored summary. Returns null (with a warning) rather than a
 * partially typed object when the document does not match.
 */
export function sanitizePersistedSummary(data: unknown): RunSummary | null {
  const parsed = persistedSummarySchema.safeParse(data);
  if (!parsed.success) {
    logWarn(
      "[persistence] discarding malformed run summary",
      parsed.error.errors.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    );
    return null;
  }
  const s = parsed.data;
  return {
    runId: s.runId,
    status: s.status,
    ...(s.failureCause !== undefined ? { failureCause: s.failureCause } : {}),
    startedAt: s.startedAt,
    ...(s.endedAt !== undefined ? { endedAt: s.endedAt } : {}),
    elapsedMs: s.elapsedMs,
    configuredDurationMs: s.configuredDurationMs,
    tickIntervalMs: s.tickIntervalMs,
    ticks: s.ticks,
    decisionCount: s.decisionCount,
    messageCount: s.messageCount,
    alertCount: s.alertCount,
    suppressedAlerts: s.suppressedAlerts,
    timeouts: s.timeouts,
    decisionFailures: s.decisionFailures,
    feedFailures: s.feedFailures,
    rejectedDecisions: s.rejectedDecisions,
    supersededDecisions: s.supersededDecisions,
    decisionsPerMinute: s.decisionsPerMinute,
    decisionsByRole: s.decisionsByRole,
  };
}

export async function loadRunSummary(runId: string): Promise<RunSummary | null> {
  const db = getFirestore();
  if (!db) return null;
  const snap = await db.collection("runs").doc(runId).get();
  if (!snap.exists) return null;
  const data = snap.data() ?? {};
  return sanitizePersistedSummary(data.summary);
}

/** Only use in tests. */
export function clearReportCache(): void {
  reportCache.clear();
}
