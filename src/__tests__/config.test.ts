import fs from "fs";
import os from "os";
import path from "path";
import { DEFAULT_ALERT_RULES_PATH, loadAlertRules, loadConfig, parseRolePriority } from "../config";
import { ValidationError } from "../errors";

describe("loadConfig", () => {
  it("applies defaults to an empty environment", () => {
    const config = loadConfig({});
    expect(config).toEqual({
      patientCount: 10,
      durationMs: 300_000,
      tickIntervalMs: 1000,
      decisionTimeoutMs: 1000,
      busQueueCapacity: 256,
      drainThreshold: 0,
      drainTimeoutMs: 1000,
      alertCooldownMs: 60_000,
      arbitrationWindowMs: 1000,
      rolePriority: ["physician", "pharmacist", "nurse"],
      statusReportEvery: 30,
      alertRulesPath: DEFAULT_ALERT_RULES_PATH,
      seed: undefined,
      timeMode: "realtime",
      agentMode: "rules",
      openaiModel: "gpt-4.1-mini",
    });
  });

  it("derives timeouts and window from the tick interval", () => {
    const config = loadConfig({ SIM_TICK_MS: "250" });
    expect(config.decisionTimeoutMs).toBe(250);
    expect(config.drainTimeoutMs).toBe(250);
    expect(config.arbitrationWindowMs).toBe(250);
  });

  it("coerces numeric strings", () => {
    const config = loadConfig({ SIM_PATIENTS: "4", DECISION_TIMEOUT_MS: "50", SIM_SEED: "7", SIM_TIME_MODE: "virtual" });
    expect(config.patientCount).toBe(4);
    expect(config.decisionTimeoutMs).toBe(50);
    expect(config.seed).toBe(7);
    expect(config.timeMode).toBe("virtual");
  });

  it("rejects invalid values instead of falling back", () => {
    expect(() => loadConfig({ SIM_PATIENTS: "zero" })).toThrow(ValidationError);
    expect(() => loadConfig({ SIM_TICK_MS: "0" })).toThrow(/SIM_TICK_MS/);
    expect(() => loadConfig({ AGENT_MODE: "magic" })).toThrow(/AGENT_MODE/);
  });
});

describe("parseRolePriority", () => {
  it("keeps unlisted roles in default order after listed ones", () => {
    expect(parseRolePriority("nurse")).toEqual(["nurse", "physician", "pharmacist"]);
    expect(parseRolePriority(" pharmacist , nurse ")).toEqual(["pharmacist", "nurse", "physician"]);
  });

  it("rejects unknown and duplicate roles", () => {
    expect(() => parseRolePriority("surgeon")).toThrow('unknown role "surgeon"');
    expect(() => parseRolePriority("nurse,nurse")).toThrow('role "nurse" listed twice');
  });
});

describe("loadAlertRules", () => {
  it("loads the bundled rule set", () => {
    const rules = loadAlertRules();
    expect(rules.length).toBe(15);
    expect(rules.find((r) => r.id === "temp_fever_elevated")).toEqual(
      expect.objectContaining({ metric: "temperature", severity: "elevated", above: 38.0 })
    );
  });

  it("rejects a malformed rules file", () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "icu-rules-"));
    const file = path.join(dir, "rules.json");
    fs.writeFileSync(file, JSON.stringify([{ id: "x", metric: "heartRate", severity: "high", bucketSize: 5 }]));
    try {
      expect(() => loadAlertRules(file)).toThrow(ValidationError);
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});
