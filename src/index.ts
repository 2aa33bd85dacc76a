/**
 * @fileoverview Public API of strands-docs-mcp
 *
 * @packageDocumentation
 */

export {
  StrandsDocsMCPServer,
  createStrandsDocsMCPServer,
  startStdioServer,
  main,
  type AuditLogEntry,
  type StrandsDocsMCPServerOptions,
} from './mcp/server.js';
export { listCapabilities, isKnownTool } from './mcp/tool_registry.js';
export { validateToolInput, QueryStrandsDocsToolInputSchema, type ValidationResult } from './mcp/schema.js';
export {
  DEFAULT_MCP_SERVER_CONFIG,
  QUERY_STRANDS_DOCS_TOOL,
  type QueryStrandsDocsToolInput,
  type ServerLifecycleState,
  type StrandsDocsMCPServerConfig,
} from './mcp/types.js';
export { QueryHandler, type QueryOutcome } from './knowledge/query_handler.js';
export {
  BedrockRetrieveAndGenerateClient,
  MalformedResponseError,
  toRetrievalResult,
  type Citation,
  type RetrievalRequest,
  type RetrievalResult,
  type RetrieveAndGenerateClient,
} from './knowledge/retrieval_client.js';
export { formatQueryResponse, UNKNOWN_SOURCE } from './knowledge/response_format.js';
export {
  classifyQueryError,
  describeQueryError,
  EMPTY_QUERY_MESSAGE,
  type QueryErrorKind,
} from './knowledge/query_errors.js';
export {
  ConfigurationError,
  createKnowledgeBaseConfig,
  loadKnowledgeBaseConfig,
  resolveModelArn,
  type KnowledgeBaseConfig,
} from './knowledge/config.js';
export { logDebug, logError, logInfo, logWarning } from './telemetry/logger.js';
