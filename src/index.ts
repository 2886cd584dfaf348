#!/usr/bin/env node
import "dotenv/config";
import { loadConfig } from "./config";
import { describeError } from "./errors";
import { log, logError, logEvent } from "./logger";
import { persistRunReport, type RunReport } from "./persistence";
import { sortBySeverity } from "./sim/alertEngine";
import { createSimulation } from "./simulation";

function formatReport(report: RunReport): string {
  const s = report.summary;
  const lines = [
    "",
    "=".repeat(60),
    `ICU SIMULATION REPORT  run ${s.runId}`,
    "=".repeat(60),
    `status:              ${s.status}${s.failureCause ? ` (${s.failureCause})` : ""}`,
    `elapsed:             ${(s.elapsedMs / 1000).toFixed(1)}s of ${(s.configuredDurationMs / 1000).toFixed(0)}s, ${s.ticks} ticks`,
    `decisions:           ${s.decisionCount} (${s.decisionsPerMinute.toFixed(1)}/min)`,
    `  by role:           physician ${s.decisionsByRole.physician}, nurse ${s.decisionsByRole.nurse}, pharmacist ${s.decisionsByRole.pharmacist}`,
    `  superseded:        ${s.supersededDecisions}, rejected ${s.rejectedDecisions}`,
    `messages:            ${s.messageCount}`,
    `alerts:              ${s.alertCount} (${s.suppressedAlerts} suppressed)`,
    `timeouts/failures:   ${s.timeouts}/${s.decisionFailures}, feed failures ${s.feedFailures}`,
    "",
    "agents:",
  ];
  for (const agent of report.roster) {
    lines.push(
      `  ${agent.role.padEnd(11)} ${String(agent.decisions).padStart(5)} decisions, avg ${agent.avgDecideMs.toFixed(2)}ms, confidence ${agent.avgConfidence.toFixed(2)}`
    );
  }
  const alerts = sortBySeverity(report.alerts).slice(0, 5);
  if (alerts.length) {
    lines.push("", "top alerts:");
    for (const alert of alerts) {
      lines.push(`  [${alert.severity}] ${alert.patientId} ${alert.description} (${alert.metric} ${alert.value})`);
    }
  }
  lines.push("=".repeat(60));
  return lines.join("\n");
}

async function main(): Promise<number> {
  const config = loadConfig();
  const simulation = createSimulation(config);
  log(
    `[sim] run ${simulation.runId}: ${config.patientCount} patients, ${config.durationMs / 1000}s at ${config.tickIntervalMs}ms ticks (${config.timeMode}, ${config.agentMode} agents)`
  );

  const onSignal = (signal: NodeJS.Signals) => {
    log(`[sim] ${signal} received, stopping at the next tick`);
    simulation.stop();
  };
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);

  const summary = await simulation.run();
  const report = simulation.report();
  console.log(formatReport(report));
  logEvent("run.summary", { runId: summary.runId, status: summary.status, decisions: summary.decisionCount });

  try {
    await persistRunReport(report);
  } catch (err) {
    logError("[sim] failed to persist run report:", describeError(err));
  }
  return summary.status === "completed" ? 0 : 1;
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    logError("[sim] fatal:", describeError(err));
    process.exitCode = 1;
  }
);
