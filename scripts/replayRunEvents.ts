#!/usr/bin/env ts-node
import type { DocumentData } from "firebase-admin/firestore";
import { getFirestore } from "../src/firebaseAdmin";
import { loadRunSummary } from "../src/persistence";

async function main() {
  const runId = process.argv[2];
  const limit = parseInt(process.argv[3] || "50", 10);
  if (!runId) {
    console.error("Usage: replayRunEvents <runId> [limit]");
    process.exit(1);
  }
  const db = getFirestore();
  if (!db) {
    console.error("Firestore not initialized. Set FIREBASE_SERVICE_ACCOUNT or FIRESTORE_EMULATOR_HOST first.");
    process.exit(1);
  }
  const summary = await loadRunSummary(runId);
  if (summary) {
    console.log(
      `run ${summary.runId}: ${summary.status}, ${summary.ticks} ticks, ${summary.decisionCount} decisions, ${summary.alertCount} alerts`
    );
  }
  const snap = await db.collection("runs").doc(runId).collection("events").orderBy("ts", "desc").limit(limit).get();
  const events = snap.docs.map((d): DocumentData => ({ id: d.id, ...d.data() })).reverse();
  events.forEach((evt) => {
    console.log(`[${evt.ts?.toDate ? evt.ts.toDate().toISOString() : "no-ts"}] ${evt.type}`, evt.payload || {});
  });
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
