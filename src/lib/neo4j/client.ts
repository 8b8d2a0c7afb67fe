import neo4j, { type Driver, type Session } from "neo4j-driver";

import type { Neo4jConfig } from "@/lib/config";
import { GraphConnectivityError, GraphQueryError, errorMessage } from "@/lib/errors";

export type GraphRecord = Record<string, unknown>;
export type GraphParams = Record<string, unknown>;

/**
 * The only primitive the query layer depends on: run a parameterized Cypher query and get
 * flat records back. Parameters are always sent out-of-band, never interpolated.
 */
export type GraphStore = {
  run(query: string, params?: GraphParams): Promise<GraphRecord[]>;
};

export type Neo4jStore = GraphStore & {
  close(): Promise<void>;
};

const CONNECTIVITY_CODES = new Set<string>([
  neo4j.error.SERVICE_UNAVAILABLE,
  neo4j.error.SESSION_EXPIRED,
  "Neo.ClientError.Security.Unauthorized",
  "Neo.ClientError.Security.AuthenticationRateLimit",
  "Neo.ClientError.Database.DatabaseNotFound",
]);

function errorCode(err: unknown): string | undefined {
  if (typeof err !== "object" || err === null || !("code" in err)) return undefined;
  return typeof err.code === "string" ? err.code : undefined;
}

export function toGraphError(err: unknown): GraphConnectivityError | GraphQueryError {
  if (err instanceof GraphConnectivityError || err instanceof GraphQueryError) return err;

  const code = errorCode(err);
  if (code && CONNECTIVITY_CODES.has(code)) {
    return new GraphConnectivityError(`Neo4j unavailable (${code}): ${errorMessage(err)}`, {
      cause: err,
    });
  }
  return new GraphQueryError(`Neo4j query failed: ${errorMessage(err)}`, { cause: err });
}

export function createNeo4jDriver(config: Neo4jConfig): Driver {
  return neo4j.driver(config.uri, neo4j.auth.basic(config.username, config.password), {
    disableLosslessIntegers: true,
    maxConnectionPoolSize: config.maxPoolSize,
    maxConnectionLifetime: config.maxConnectionLifetimeMs,
    connectionTimeout: config.connectionTimeoutMs,
  });
}

/**
 * Lazily opens one shared driver (a connection pool) and runs every query in its own
 * read session against the configured database.
 */
export function createNeo4jStore(
  config: Neo4jConfig,
  driverFactory: (config: Neo4jConfig) => Driver = createNeo4jDriver,
): Neo4jStore {
  let driver: Driver | undefined;

  function getDriver(): Driver {
    if (driver) return driver;
    try {
      driver = driverFactory(config);
    } catch (err) {
      throw new GraphConnectivityError(`Failed to create Neo4j driver: ${errorMessage(err)}`, {
        cause: err,
      });
    }
    return driver;
  }

  async function withSession<T>(fn: (session: Session) => Promise<T>): Promise<T> {
    const session = getDriver().session({
      database: config.database,
      defaultAccessMode: neo4j.session.READ,
    });
    try {
      return await fn(session);
    } finally {
      await session.close();
    }
  }

  return {
    async run(query, params = {}) {
      try {
        const res = await withSession((session) => session.run(query, params));
        return res.records.map((record) => record.toObject());
      } catch (err) {
        throw toGraphError(err);
      }
    },

    async close() {
      if (!driver) return;
      const current = driver;
      driver = undefined;
      await current.close();
    },
  };
}
