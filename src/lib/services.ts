import { createGenerationClient } from "@/lib/ai/generation";
import type { QueryServices } from "@/lib/chat/answer";
import type { AppConfig } from "@/lib/config";
import { createNeo4jStore, type Neo4jStore } from "@/lib/neo4j/client";
import { createContextBuilder } from "@/lib/retrieval/context";
import { createGraphQueries } from "@/lib/retrieval/graph";

export type AppServices = QueryServices & {
  store: Neo4jStore;
  close(): Promise<void>;
};

/** Builds the long-lived handles once per process; callers pass them down explicitly. */
export function createServices(config: AppConfig): AppServices {
  const store = createNeo4jStore(config.neo4j);
  const queries = createGraphQueries(store);
  const builder = createContextBuilder({
    queries,
    maxContextChars: config.rag.maxContextChars,
  });
  const generation = createGenerationClient(config.generation);

  return {
    store,
    queries,
    builder,
    generation,
    close: () => store.close(),
  };
}
