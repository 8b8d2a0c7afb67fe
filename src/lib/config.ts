import { z } from "zod";

import { ConfigError } from "@/lib/errors";

export const GENERATION_PROVIDERS = ["ollama", "openai", "anthropic"] as const;
export type GenerationProvider = (typeof GENERATION_PROVIDERS)[number];

export type Neo4jConfig = {
  uri: string;
  username: string;
  password: string;
  database: string;
  connectionTimeoutMs: number;
  maxPoolSize: number;
  maxConnectionLifetimeMs: number;
};

export type GenerationConfig = {
  provider: GenerationProvider;
  model: string;
  temperature: number;
  maxTokens: number;
  timeoutMs: number;
  ollamaUrl: string;
  apiKey?: string;
};

export type RagConfig = {
  maxContextChars: number;
};

export type AppConfig = {
  neo4j: Neo4jConfig;
  generation: GenerationConfig;
  rag: RagConfig;
  debug: boolean;
};

const envSchema = z.object({
  NEO4J_URI: z.string().default("bolt://localhost:7687"),
  NEO4J_USERNAME: z.string().default("neo4j"),
  NEO4J_PASSWORD: z.string().default("password"),
  NEO4J_DATABASE: z.string().default("neo4j"),
  NEO4J_CONNECTION_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  NEO4J_MAX_POOL_SIZE: z.coerce.number().int().positive().default(50),
  NEO4J_MAX_CONNECTION_LIFETIME_MS: z.coerce.number().int().positive().default(3_600_000),

  GENERATION_PROVIDER: z
    .string()
    .transform((v) => v.toLowerCase())
    .pipe(z.enum(GENERATION_PROVIDERS))
    .default("ollama"),
  GENERATION_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.3),
  GENERATION_MAX_TOKENS: z.coerce.number().int().positive().default(500),
  GENERATION_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),

  OLLAMA_URL: z.string().url().default("http://localhost:11434"),
  OLLAMA_MODEL: z.string().default("mistral"),
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_MODEL: z.string().default("gpt-4o-mini"),
  ANTHROPIC_API_KEY: z.string().optional(),
  ANTHROPIC_MODEL: z.string().default("claude-3-5-haiku-latest"),

  RAG_MAX_CONTEXT_CHARS: z.coerce.number().int().min(200).default(8000),
  DEBUG: z
    .string()
    .transform((v) => v.toLowerCase() === "true")
    .default("false"),
});

type Env = Record<string, string | undefined>;

// Blank values count as unset so `FOO=` in an env file falls back to the default.
function cleanEnv(env: Env): Env {
  const out: Env = {};
  for (const key of Object.keys(envSchema.shape)) {
    const value = env[key]?.trim();
    out[key] = value ? value : undefined;
  }
  return out;
}

export function loadConfig(env: Env = process.env): AppConfig {
  const parsed = envSchema.safeParse(cleanEnv(env));
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    );
  }

  const e = parsed.data;
  const provider = e.GENERATION_PROVIDER;

  return {
    neo4j: {
      uri: e.NEO4J_URI,
      username: e.NEO4J_USERNAME,
      password: e.NEO4J_PASSWORD,
      database: e.NEO4J_DATABASE,
      connectionTimeoutMs: e.NEO4J_CONNECTION_TIMEOUT_MS,
      maxPoolSize: e.NEO4J_MAX_POOL_SIZE,
      maxConnectionLifetimeMs: e.NEO4J_MAX_CONNECTION_LIFETIME_MS,
    },
    generation: {
      provider,
      model:
        provider === "openai"
          ? e.OPENAI_MODEL
          : provider === "anthropic"
            ? e.ANTHROPIC_MODEL
            : e.OLLAMA_MODEL,
      temperature: e.GENERATION_TEMPERATURE,
      maxTokens: e.GENERATION_MAX_TOKENS,
      timeoutMs: e.GENERATION_TIMEOUT_MS,
      ollamaUrl: e.OLLAMA_URL.replace(/\/+$/, ""),
      apiKey:
        provider === "openai"
          ? e.OPENAI_API_KEY
          : provider === "anthropic"
            ? e.ANTHROPIC_API_KEY
            : undefined,
    },
    rag: {
      maxContextChars: e.RAG_MAX_CONTEXT_CHARS,
    },
    debug: e.DEBUG,
  };
}
