/**
 * @fileoverview Retrieve-and-generate client
 *
 * The handler talks to a {@link RetrieveAndGenerateClient}; the Bedrock Agent
 * Runtime implementation below is the only one shipped. Only the answer text
 * and the citation locations of the service response are consumed.
 *
 * @packageDocumentation
 */

import {
  BedrockAgentRuntimeClient,
  RetrieveAndGenerateCommand,
  type RetrieveAndGenerateCommandOutput,
  type RetrieveAndGenerateResponse,
  type RetrievalResultLocation,
} from '@aws-sdk/client-bedrock-agent-runtime';
import type { KnowledgeBaseConfig } from './config.js';
import { logDebug } from '../telemetry/logger.js';

// ============================================================================
// TYPES
// ============================================================================

export interface RetrievalRequest {
  /** Raw query text as received from the caller */
  queryText: string;

  /** Knowledge base to retrieve from */
  knowledgeBaseId: string;

  /** Model used to generate the answer */
  modelArn: string;
}

export interface Citation {
  /** Storage location of the cited document, when the service reports one */
  sourceUri?: string;
}

export interface RetrievalResult {
  answerText: string;
  citations: Citation[];
}

export interface RetrieveAndGenerateClient {
  retrieveAndGenerate(request: RetrievalRequest): Promise<RetrievalResult>;
}

export class MalformedResponseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MalformedResponseError';
  }
}

// ============================================================================
// RESPONSE MAPPING
// ============================================================================

export function resolveSourceUri(location: RetrievalResultLocation | undefined): string | undefined {
  if (!location) return undefined;
  return location.s3Location?.uri
    ?? location.webLocation?.url
    ?? location.confluenceLocation?.url
    ?? location.salesforceLocation?.url
    ?? location.sharePointLocation?.url
    ?? location.kendraDocumentLocation?.uri;
}

/**
 * Flatten the service response: every retrieved reference of every citation
 * becomes one {@link Citation}, in response order. Sources are therefore
 * numbered per reference, not per citation.
 */
export function toRetrievalResult(
  response: Pick<RetrieveAndGenerateResponse, 'output' | 'citations'>
): RetrievalResult {
  const answerText = response.output?.text;
  if (typeof answerText !== 'string') {
    throw new MalformedResponseError('Knowledge base response did not include generated text');
  }

  const citations: Citation[] = [];
  for (const citation of response.citations ?? []) {
    for (const reference of citation.retrievedReferences ?? []) {
      const sourceUri = resolveSourceUri(reference.location);
      citations.push(sourceUri ? { sourceUri } : {});
    }
  }

  return { answerText, citations };
}

// ============================================================================
// BEDROCK IMPLEMENTATION
// ============================================================================

/** The single SDK operation this client needs. */
export type SendRetrieveAndGenerate = (
  command: RetrieveAndGenerateCommand,
  options: { abortSignal: AbortSignal }
) => Promise<RetrieveAndGenerateCommandOutput>;

export class BedrockRetrieveAndGenerateClient implements RetrieveAndGenerateClient {
  private readonly send: SendRetrieveAndGenerate;

  constructor(
    private readonly config: KnowledgeBaseConfig,
    send?: SendRetrieveAndGenerate
  ) {
    if (send) {
      this.send = send;
    } else {
      const client = new BedrockAgentRuntimeClient({ region: config.region });
      this.send = (command, options) => client.send(command, options);
    }
  }

  async retrieveAndGenerate(request: RetrievalRequest): Promise<RetrievalResult> {
    const command = new RetrieveAndGenerateCommand({
      input: { text: request.queryText },
      retrieveAndGenerateConfiguration: {
        type: 'KNOWLEDGE_BASE',
        knowledgeBaseConfiguration: {
          knowledgeBaseId: request.knowledgeBaseId,
          modelArn: request.modelArn,
        },
      },
    });

    const startedAt = Date.now();
    const response = await this.send(command, {
      abortSignal: AbortSignal.timeout(this.config.requestTimeoutMs),
    });
    logDebug('[knowledge] retrieve_and_generate completed', {
      durationMs: Date.now() - startedAt,
      requestId: response.$metadata.requestId,
      citations: response.citations?.length ?? 0,
    });

    return toRetrievalResult(response);
  }
}
