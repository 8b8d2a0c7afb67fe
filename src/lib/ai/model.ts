import { createAnthropic } from "@ai-sdk/anthropic";
import { createOpenAI } from "@ai-sdk/openai";
import type { LanguageModel } from "ai";

import type { GenerationConfig } from "@/lib/config";

export type HostedProvider = Exclude<GenerationConfig["provider"], "ollama">;

// Keys come from the loaded config, not from whatever the process env holds.
export function getChatModel(provider: HostedProvider, model: string, apiKey: string): LanguageModel {
  return provider === "anthropic" ? createAnthropic({ apiKey })(model) : createOpenAI({ apiKey })(model);
}
