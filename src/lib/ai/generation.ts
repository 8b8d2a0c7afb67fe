import { generateText } from "ai";

import type { GenerationConfig } from "@/lib/config";
import { errorMessage } from "@/lib/errors";

import { getChatModel, type HostedProvider } from "./model";
import { createOllamaClient } from "./ollama";
import { SYSTEM_PROMPT, buildPrompt } from "./system";
import {
  generationFailure,
  isTimeoutError,
  type GenerationClient,
} from "./types";

export function createAiSdkClient(
  config: GenerationConfig & { provider: HostedProvider },
): GenerationClient {
  const label = config.provider === "anthropic" ? "Anthropic" : "OpenAI";

  return {
    provider: config.provider,
    model: config.model,

    async generate(question, context) {
      const apiKey = config.apiKey;
      if (!apiKey) {
        return generationFailure(config.model, `Missing API key for ${label}.`);
      }

      const started = Date.now();
      try {
        const result = await generateText({
          model: getChatModel(config.provider, config.model, apiKey),
          system: SYSTEM_PROMPT,
          prompt: buildPrompt(question, context),
          temperature: config.temperature,
          maxOutputTokens: config.maxTokens,
          maxRetries: 0,
          abortSignal: AbortSignal.timeout(config.timeoutMs),
        });
        return {
          content: result.text,
          model: result.response.modelId || config.model,
          success: true,
          totalDurationMs: Date.now() - started,
          evalCount: result.usage.outputTokens ?? 0,
        };
      } catch (err) {
        const message = isTimeoutError(err)
          ? `Request timed out after ${config.timeoutMs / 1000}s.`
          : `${label} request failed: ${errorMessage(err)}`;
        return generationFailure(config.model, message);
      }
    },

    // Hosted providers have no cheap liveness endpoint; a configured key is the best signal.
    async health() {
      return config.apiKey
        ? { ok: true, latency_ms: 0 }
        : { ok: false, latency_ms: 0, message: `Missing API key for ${label}.` };
    },
  };
}

export function createGenerationClient(config: GenerationConfig): GenerationClient {
  const { provider } = config;
  if (provider === "ollama") return createOllamaClient(config);
  return createAiSdkClient({ ...config, provider });
}
