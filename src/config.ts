/**
 * Simulation configuration - single source of truth.
 *
 * Every knob can be overridden through the environment (see .env.example).
 * Values are parsed once with zod; an invalid value is a setup error, never a
 * silent fallback.
 */

import fs from "fs";
import path from "path";
import { z } from "zod";
import { ValidationError } from "./errors";
import { parseAlertRules } from "./validators";
import type { AgentRole, AlertRule } from "./sim/types";

export const DEFAULT_ROLE_PRIORITY: readonly AgentRole[] = ["physician", "pharmacist", "nurse"];

export const DEFAULT_ALERT_RULES_PATH = path.resolve(__dirname, "..", "config", "alert-rules.json");

const optionalInt = (min: number) => z.coerce.number().int().min(min).optional();

const envSchema = z.object({
  SIM_PATIENTS: z.coerce.number().int().min(1).max(500).default(10),
  SIM_DURATION_MS: z.coerce.number().int().positive().default(300_000),
  SIM_TICK_MS: z.coerce.number().int().positive().default(1000),
  DECISION_TIMEOUT_MS: optionalInt(1),
  BUS_QUEUE_CAPACITY: z.coerce.number().int().min(1).default(256),
  DRAIN_THRESHOLD: z.coerce.number().int().min(0).default(0),
  DRAIN_TIMEOUT_MS: optionalInt(0),
  ALERT_COOLDOWN_MS: z.coerce.number().int().min(0).default(60_000),
  ARBITRATION_WINDOW_MS: optionalInt(1),
  ROLE_PRIORITY: z.string().optional(),
  STATUS_REPORT_EVERY: z.coerce.number().int().min(0).default(30),
  ALERT_RULES_PATH: z.string().min(1).optional(),
  SIM_SEED: optionalInt(0),
  SIM_TIME_MODE: z.enum(["realtime", "virtual"]).default("realtime"),
  AGENT_MODE: z.enum(["rules", "llm"]).default("rules"),
  OPENAI_MODEL: z.string().min(1).default("gpt-4.1-mini"),
});

export type SimulationConfig = {
  patientCount: number;
  durationMs: number;
  tickIntervalMs: number;
  decisionTimeoutMs: number;
  busQueueCapacity: number;
  drainThreshold: number;
  drainTimeoutMs: number;
  alertCooldownMs: number;
  arbitrationWindowMs: number;
  rolePriority: AgentRole[];
  statusReportEvery: number;
  alertRulesPath: string;
  seed?: number;
  timeMode: "realtime" | "virtual";
  agentMode: "rules" | "llm";
  openaiModel: string;
};

/**
 * Parse a comma separated role order. Roles left out keep their default
 * relative order after the listed ones.
 */
export function parseRolePriority(raw: string | undefined): AgentRole[] {
  if (!raw || raw.trim() === "") return [...DEFAULT_ROLE_PRIORITY];
  const listed: AgentRole[] = [];
  for (const part of raw.split(",")) {
    const name = part.trim();
    if (name === "") continue;
    const role = DEFAULT_ROLE_PRIORITY.find((r) => r === name);
    if (!role) {
      throw new ValidationError("ROLE_PRIORITY", [`unknown role "${name}"`]);
    }
    if (listed.includes(role)) {
      throw new ValidationError("ROLE_PRIORITY", [`role "${name}" listed twice`]);
    }
    listed.push(role);
  }
  return [...listed, ...DEFAULT_ROLE_PRIORITY.filter((r) => !listed.includes(r))];
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): SimulationConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ValidationError(
      "configuration",
      parsed.error.errors.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    );
  }
  const e = parsed.data;
  return {
    patientCount: e.SIM_PATIENTS,
    durationMs: e.SIM_DURATION_MS,
    tickIntervalMs: e.SIM_TICK_MS,
    decisionTimeoutMs: e.DECISION_TIMEOUT_MS ?? e.SIM_TICK_MS,
    busQueueCapacity: e.BUS_QUEUE_CAPACITY,
    drainThreshold: e.DRAIN_THRESHOLD,
    drainTimeoutMs: e.DRAIN_TIMEOUT_MS ?? e.SIM_TICK_MS,
    alertCooldownMs: e.ALERT_COOLDOWN_MS,
    arbitrationWindowMs: e.ARBITRATION_WINDOW_MS ?? e.SIM_TICK_MS,
    rolePriority: parseRolePriority(e.ROLE_PRIORITY),
    statusReportEvery: e.STATUS_REPORT_EVERY,
    alertRulesPath: e.ALERT_RULES_PATH ?? DEFAULT_ALERT_RULES_PATH,
    seed: e.SIM_SEED,
    timeMode: e.SIM_TIME_MODE,
    agentMode: e.AGENT_MODE,
    openaiModel: e.OPENAI_MODEL,
  };
}

export function loadAlertRules(filePath: string = DEFAULT_ALERT_RULES_PATH): AlertRule[] {
  const raw: unknown = JSON.parse(fs.readFileSync(filePath, "utf8"));
  return parseAlertRules(raw);
}
