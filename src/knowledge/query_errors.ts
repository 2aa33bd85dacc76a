/**
 * @fileoverview Failure taxonomy for knowledge base queries
 *
 * Every failure of the remote call is classified into a {@link QueryErrorKind}
 * and rendered through {@link describeQueryError}. Nothing here throws.
 */

import {
  AccessDeniedException,
  BedrockAgentRuntimeServiceException,
} from '@aws-sdk/client-bedrock-agent-runtime';

export const EMPTY_QUERY_MESSAGE = 'Please provide a query to search the Strands Agent documentation.';
export const MISSING_CREDENTIALS_MESSAGE =
  "❌ AWS credentials not found. Please configure AWS CLI with 'aws configure' or set environment variables.";
export const ACCESS_DENIED_MESSAGE =
  '❌ Access denied. Please ensure your AWS credentials have bedrock:RetrieveAndGenerate permissions.';

export type QueryErrorKind =
  | { kind: 'missing_credentials' }
  | { kind: 'access_denied' }
  | { kind: 'remote_service'; code: string; message: string }
  | { kind: 'unexpected'; message: string };

/** Raised by the AWS SDK credential chain when no provider yields credentials. */
const CREDENTIALS_ERROR_NAME = 'CredentialsProviderError';

function describeUnknown(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

export function classifyQueryError(error: unknown): QueryErrorKind {
  if (error instanceof Error && error.name === CREDENTIALS_ERROR_NAME) {
    return { kind: 'missing_credentials' };
  }
  if (error instanceof AccessDeniedException) {
    return { kind: 'access_denied' };
  }
  if (error instanceof BedrockAgentRuntimeServiceException) {
    return { kind: 'remote_service', code: error.name, message: error.message };
  }
  return { kind: 'unexpected', message: describeUnknown(error) };
}

export function describeQueryError(error: QueryErrorKind): string {
  switch (error.kind) {
    case 'missing_credentials':
      return MISSING_CREDENTIALS_MESSAGE;
    case 'access_denied':
      return ACCESS_DENIED_MESSAGE;
    case 'remote_service':
      // Provider text is passed through verbatim.
      return `❌ AWS error (${error.code}): ${error.message}`;
    case 'unexpected':
      return `❌ Unexpected error: ${error.message}`;
  }
}
