export type GraphErrorCode = "GRAPH_UNAVAILABLE" | "GRAPH_QUERY_FAILED";

/**
 * The graph store could not be reached: driver construction failed, the server refused the
 * connection, or the credentials were rejected.
 */
export class GraphConnectivityError extends Error {
  readonly code: GraphErrorCode = "GRAPH_UNAVAILABLE";

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "GraphConnectivityError";
  }
}

/** The store answered, but the query itself failed. */
export class GraphQueryError extends Error {
  readonly code: GraphErrorCode = "GRAPH_QUERY_FAILED";

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "GraphQueryError";
  }
}

export class ConfigError extends Error {
  readonly code = "INVALID_CONFIG";
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
