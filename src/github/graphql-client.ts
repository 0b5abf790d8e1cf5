import type { Octokit } from "@octokit/rest";
import type { Logger } from "pino";

/**
 * Executes a GraphQL document and hands back the raw `{ data, errors }`
 * envelope. GraphQL-level errors are data, not exceptions; only transport
 * failures (non-2xx, network) reject.
 */
export interface GraphQLClient {
  query(
    document: string,
    variables: Record<string, unknown>,
    signal?: AbortSignal,
  ): Promise<unknown>;
}

export function createOctokitGraphQLClient(octokit: Octokit, logger: Logger): GraphQLClient {
  return {
    async query(document, variables, signal): Promise<unknown> {
      logger.debug({ variables }, "Executing GitHub GraphQL query");

      // POST /graphql through the REST transport keeps partial data and the
      // errors array intact (octokit.graphql() throws on any error entry).
      const response = await octokit.request("POST /graphql", {
        query: document,
        variables,
        request: { signal },
      });

      return response.data;
    },
  };
}
