import { z } from "zod";

import type { GenerationConfig } from "@/lib/config";
import { errorMessage } from "@/lib/errors";
import { timedHealthCheck } from "@/lib/health";

import { SYSTEM_PROMPT, buildPrompt } from "./system";
import { generationFailure, isTimeoutError, type GenerationClient } from "./types";

const HEALTH_TIMEOUT_MS = 2_000;
const TAGS_TIMEOUT_MS = 5_000;
const CONNECTION_ERROR_CODES = new Set(["ECONNREFUSED", "ECONNRESET", "ENOTFOUND", "EAI_AGAIN"]);

const generateResponseSchema = z.object({
  response: z.string(),
  model: z.string().optional(),
  total_duration: z.number().optional(),
  eval_count: z.number().optional(),
});

const tagsResponseSchema = z.object({
  models: z.array(z.object({ name: z.string() })).default([]),
});

export type OllamaClient = GenerationClient & {
  baseUrl: string;
  listModels(): Promise<string[]>;
};

function causeCode(err: unknown): string | undefined {
  const cause = err instanceof Error ? err.cause : undefined;
  if (typeof cause !== "object" || cause === null || !("code" in cause)) return undefined;
  return typeof cause.code === "string" ? cause.code : undefined;
}

async function getJson(url: string, timeoutMs: number): Promise<unknown> {
  const res = await fetch(url, {
    method: "GET",
    headers: { Accept: "application/json" },
    signal: AbortSignal.timeout(timeoutMs),
  });
  if (!res.ok) {
    throw new Error(`Ollama GET ${new URL(url).pathname} failed (${res.status})`);
  }
  return await res.json();
}

export function createOllamaClient(config: GenerationConfig): OllamaClient {
  const baseUrl = config.ollamaUrl.replace(/\/+$/, "");
  const generateUrl = `${baseUrl}/api/generate`;
  const tagsUrl = `${baseUrl}/api/tags`;

  function describeFailure(err: unknown): string {
    if (isTimeoutError(err)) {
      return `Request timed out after ${config.timeoutMs / 1000}s. The model may be loading or overloaded.`;
    }
    const code = causeCode(err);
    if (code && CONNECTION_ERROR_CODES.has(code)) {
      return `Cannot connect to Ollama at ${baseUrl}. Make sure it is running: \`ollama serve\``;
    }
    return errorMessage(err);
  }

  return {
    provider: "ollama",
    model: config.model,
    baseUrl,

    async generate(question, context) {
      const payload = {
        model: config.model,
        prompt: buildPrompt(question, context),
        system: SYSTEM_PROMPT,
        stream: false,
        options: {
          temperature: config.temperature,
          num_predict: config.maxTokens,
        },
      };

      try {
        const res = await fetch(generateUrl, {
          method: "POST",
          headers: { "Content-Type": "application/json", Accept: "application/json" },
          body: JSON.stringify(payload),
          signal: AbortSignal.timeout(config.timeoutMs),
        });

        if (!res.ok) {
          const text = await res.text().catch(() => "");
          return generationFailure(config.model, `HTTP ${res.status}: ${text || res.statusText}`);
        }

        const body: unknown = await res.json();
        const parsed = generateResponseSchema.safeParse(body);
        if (!parsed.success) {
          const issue = parsed.error.issues[0];
          const where = issue?.path.length ? ` at "${issue.path.join(".")}"` : "";
          return generationFailure(
            config.model,
            `Malformed response from Ollama${where}: ${issue?.message ?? "invalid body"}`,
          );
        }

        return {
          content: parsed.data.response,
          model: parsed.data.model ?? config.model,
          success: true,
          totalDurationMs: (parsed.data.total_duration ?? 0) / 1_000_000,
          evalCount: parsed.data.eval_count ?? 0,
        };
      } catch (err) {
        if (err instanceof SyntaxError) {
          return generationFailure(config.model, `Malformed response from Ollama: ${err.message}`);
        }
        return generationFailure(config.model, describeFailure(err));
      }
    },

    async health() {
      return timedHealthCheck(() => getJson(tagsUrl, HEALTH_TIMEOUT_MS));
    },

    async listModels() {
      const parsed = tagsResponseSchema.parse(await getJson(tagsUrl, TAGS_TIMEOUT_MS));
      return parsed.models.map((m) => m.name);
    },
  };
}
