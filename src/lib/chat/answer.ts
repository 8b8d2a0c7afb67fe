import type { GenerationClient } from "@/lib/ai/types";
import { GraphConnectivityError, GraphQueryError, errorMessage } from "@/lib/errors";
import type { ServiceHealth } from "@/lib/health";
import type { GraphStore } from "@/lib/neo4j/client";
import { neo4jHealthCheck } from "@/lib/neo4j/health";
import type { ContextBuilder, RetrievalResult } from "@/lib/retrieval/context";
import type { GraphQueries, GraphStats } from "@/lib/retrieval/graph";
import type { Intent } from "@/lib/retrieval/intent";

export type QueryServices = {
  store: GraphStore;
  queries: GraphQueries;
  builder: ContextBuilder;
  generation: GenerationClient;
};

export type QueryResponse = {
  ok: boolean;
  answer: string;
  context: string;
  sources: string[];
  intent: Intent | null;
  entitiesFound: number;
  timing: {
    retrievalMs: number;
    generationMs: number;
  };
  model?: string;
  error?: string;
};

export type ConnectivityReport = {
  graph: boolean;
  generation: boolean;
  stats: GraphStats | null;
  services: {
    neo4j: ServiceHealth;
    generation: ServiceHealth;
  };
};

function failed(error: string, partial: Partial<QueryResponse> = {}): QueryResponse {
  return {
    ok: false,
    answer: `⚠️ ${error}`,
    context: "",
    sources: [],
    intent: null,
    entitiesFound: 0,
    timing: { retrievalMs: 0, generationMs: 0 },
    ...partial,
    error,
  };
}

/**
 * Retrieval then generation, in sequence. Graph failures and generation failures both come
 * back as `ok: false`; nothing from the driver or the HTTP layer is thrown past here.
 */
export async function processQuery(
  services: Pick<QueryServices, "builder" | "generation">,
  question: string,
): Promise<QueryResponse> {
  let retrieval: RetrievalResult;
  try {
    retrieval = await services.builder.buildContext(question);
  } catch (err) {
    if (err instanceof GraphConnectivityError || err instanceof GraphQueryError) {
      console.error(`[retrieval] ${err.message}`);
      return failed(err.message);
    }
    throw err;
  }

  const started = performance.now();
  const generated = await services.generation.generate(question, retrieval.context);
  const generationMs = performance.now() - started;

  const base = {
    context: retrieval.context,
    sources: retrieval.sources,
    intent: retrieval.intent,
    entitiesFound: retrieval.entitiesFound,
    timing: { retrievalMs: retrieval.retrievalMs, generationMs },
    model: generated.model,
  };

  if (!generated.success) {
    const error = generated.error || "Generation failed.";
    console.error(`[generation] ${error}`);
    return failed(error, base);
  }

  return { ok: true, answer: generated.content, ...base };
}

async function checkServices(
  services: Pick<QueryServices, "store" | "generation">,
): Promise<{ neo4j: ServiceHealth; generation: ServiceHealth }> {
  const [neo4j, generation] = await Promise.all([
    neo4jHealthCheck(services.store),
    services.generation.health(),
  ]);
  return { neo4j, generation };
}

export async function checkConnectivity(
  services: Pick<QueryServices, "store" | "queries" | "generation">,
): Promise<ConnectivityReport> {
  const { neo4j, generation } = await checkServices(services);

  let stats: GraphStats | null = null;
  if (neo4j.ok) {
    try {
      stats = await services.queries.getGraphStats();
    } catch (err) {
      console.warn(`[neo4j] graph stats unavailable: ${errorMessage(err)}`);
    }
  }

  return {
    graph: neo4j.ok,
    generation: generation.ok,
    stats,
    services: { neo4j, generation },
  };
}

export function unavailableServices(status: { graph: boolean; generation: boolean }): string[] {
  const down: string[] = [];
  if (!status.graph) down.push("Neo4j");
  if (!status.generation) down.push("generation service");
  return down;
}

/**
 * Remembers the last liveness result. Once both services answered, questions skip the checks
 * until a query fails; then the next question checks again.
 */
export type HealthGate = {
  check(): Promise<string[]>;
  invalidate(): void;
};

export function createHealthGate(
  services: Pick<QueryServices, "store" | "generation">,
  initial?: Pick<ConnectivityReport, "graph" | "generation">,
): HealthGate {
  let healthy = initial ? unavailableServices(initial).length === 0 : false;

  return {
    async check() {
      if (healthy) return [];
      const { neo4j, generation } = await checkServices(services);
      const down = unavailableServices({ graph: neo4j.ok, generation: generation.ok });
      healthy = down.length === 0;
      return down;
    },
    invalidate() {
      healthy = false;
    },
  };
}

/**
 * The health-gated entry point: refuses to run the pipeline while either collaborator is
 * down, naming which ones.
 */
export async function answerQuestion(
  services: QueryServices,
  question: string,
  gate: HealthGate = createHealthGate(services),
): Promise<QueryResponse> {
  const down = await gate.check();
  if (down.length) {
    const message = `Cannot process query: ${down.join(" and ")} unavailable.`;
    return { ...failed(message), answer: message };
  }

  const res = await processQuery(services, question);
  if (!res.ok) gate.invalidate();
  return res;
}
