/**
 * @fileoverview Documentation query handler
 *
 * Validates the query, calls the retrieve-and-generate client, and renders
 * either the formatted answer or a user-facing failure message. This is the
 * only place query failures are recovered: {@link QueryHandler.execute}
 * always resolves.
 *
 * @packageDocumentation
 */

import type { KnowledgeBaseConfig } from './config.js';
import type { RetrieveAndGenerateClient } from './retrieval_client.js';
import { formatQueryResponse } from './response_format.js';
import {
  EMPTY_QUERY_MESSAGE,
  classifyQueryError,
  describeQueryError,
  type QueryErrorKind,
} from './query_errors.js';
import { logDebug, logError, logWarning } from '../telemetry/logger.js';

export type QueryOutcome =
  | { ok: true; value: string }
  | { ok: false; error: QueryErrorKind };

export class QueryHandler {
  constructor(
    private readonly client: RetrieveAndGenerateClient,
    private readonly config: KnowledgeBaseConfig
  ) {}

  /**
   * Run a query and render the outcome as display text.
   */
  async execute(query: string): Promise<string> {
    const outcome = await this.run(query);
    return outcome.ok ? outcome.value : describeQueryError(outcome.error);
  }

  /**
   * Run a query, returning the formatted answer or the classified failure.
   * Empty queries succeed with the prompt message and skip the remote call.
   */
  async run(query: string): Promise<QueryOutcome> {
    if (!query.trim()) {
      return { ok: true, value: EMPTY_QUERY_MESSAGE };
    }

    try {
      const result = await this.client.retrieveAndGenerate({
        queryText: query,
        knowledgeBaseId: this.config.knowledgeBaseId,
        modelArn: this.config.modelArn,
      });
      logDebug('[knowledge] query answered', { citations: result.citations.length });
      return { ok: true, value: formatQueryResponse(query, result) };
    } catch (error) {
      const classified = classifyQueryError(error);
      if (classified.kind === 'unexpected') {
        logError('[knowledge] query failed unexpectedly', { code: classified.kind, message: classified.message });
      } else {
        logWarning('[knowledge] query rejected by knowledge base', {
          code: classified.kind === 'remote_service' ? classified.code : classified.kind,
        });
      }
      return { ok: false, error: classified };
    }
  }
}
