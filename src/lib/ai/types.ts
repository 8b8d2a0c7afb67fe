import type { GenerationConfig } from "@/lib/config";
import type { ServiceHealth } from "@/lib/health";

export type GenerationResult = {
  content: string;
  model: string;
  success: boolean;
  error?: string;
  totalDurationMs?: number;
  evalCount?: number;
};

/**
 * One synchronous call per question. Implementations never throw from `generate`: every
 * failure comes back as `success: false` with a readable `error`. No retries.
 */
export type GenerationClient = {
  provider: GenerationConfig["provider"];
  model: string;
  generate(question: string, context: string): Promise<GenerationResult>;
  health(): Promise<ServiceHealth>;
  /** Models available on the backend, where it can list them. */
  listModels?(): Promise<string[]>;
};

export function generationFailure(model: string, error: string): GenerationResult {
  return { content: "", model, success: false, error };
}

export function errorName(err: unknown): string | undefined {
  if (typeof err !== "object" || err === null || !("name" in err)) return undefined;
  return typeof err.name === "string" ? err.name : undefined;
}

export function isTimeoutError(err: unknown): boolean {
  const name = errorName(err);
  return name === "TimeoutError" || name === "AbortError";
}
