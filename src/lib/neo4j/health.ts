import { timedHealthCheck, type ServiceHealth } from "@/lib/health";

import type { GraphStore } from "./client";

export async function neo4jHealthCheck(store: GraphStore): Promise<ServiceHealth> {
  return timedHealthCheck(() => store.run("RETURN 1 AS ok"));
}
