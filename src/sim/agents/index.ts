import type { CompletionClient } from "../../openaiClient";
import type { ClinicalAgent } from "../agentRuntime";
import { LlmAgent } from "./llmAgent";
import { NurseAgent } from "./nurse";
import { PharmacistAgent } from "./pharmacist";
import { PhysicianAgent } from "./physician";

export { LlmAgent } from "./llmAgent";
export { NurseAgent } from "./nurse";
export { PharmacistAgent } from "./pharmacist";
export { PhysicianAgent } from "./physician";

export type AgentMode = "rules" | "llm";

/** One agent per role. In llm mode each rule-based agent is wrapped with the model. */
export function createDefaultAgents(mode: AgentMode = "rules", client: CompletionClient | null = null): ClinicalAgent[] {
  const agents: ClinicalAgent[] = [new PhysicianAgent(), new NurseAgent(), new PharmacistAgent()];
  if (mode === "rules") return agents;
  return agents.map((agent) => new LlmAgent(agent, client));
}
