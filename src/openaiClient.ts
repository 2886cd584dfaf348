import OpenAI from "openai";
import { logWarn } from "./logger";

const MODEL = process.env.OPENAI_MODEL || "gpt-4.1-mini";
let warned = false;
let client: OpenAI | null = null;

export function getOpenAIClient(): OpenAI | null {
  if (client) return client;
  const apiKey = process.env.OPENAI_API_KEY;
  if (!apiKey) {
    if (!warned) {
      logWarn("[sim] OPENAI_API_KEY is not set. Agents use their rule-based decision functions.");
      warned = true;
    }
    return null;
  }
  client = new OpenAI({ apiKey });
  return client;
}

export type ChatMessage = { role: "system" | "user"; content: string };

/** The one call the LLM agents make; tests substitute a fake. */
export interface CompletionClient {
  completeJson(messages: ChatMessage[], signal?: AbortSignal): Promise<string>;
}

export class OpenAICompletionClient implements CompletionClient {
  constructor(
    private readonly openai: OpenAI,
    private readonly model: string = MODEL
  ) {}

  async completeJson(messages: ChatMessage[], signal?: AbortSignal): Promise<string> {
    const completion = await this.openai.chat.completions.create(
      {
        model: this.model,
        messages,
        temperature: 0.2,
        response_format: { type: "json_object" },
      },
      { signal }
    );
    return completion.choices[0]?.message?.content ?? "";
  }
}

export function createCompletionClient(model: string = MODEL): CompletionClient | null {
  const openai = getOpenAIClient();
  return openai ? new OpenAICompletionClient(openai, model) : null;
}

export { MODEL };
