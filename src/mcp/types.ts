/**
 * @fileoverview MCP server types and defaults
 *
 * @packageDocumentation
 */

export const SERVER_VERSION = '0.2.0';

export const QUERY_STRANDS_DOCS_TOOL = 'query_strands_docs';

export type ToolName = typeof QUERY_STRANDS_DOCS_TOOL;

/** Lifecycle of the protocol session; tools are served only while `ready`. */
export type ServerLifecycleState = 'uninitialized' | 'ready' | 'closed';

export interface QueryStrandsDocsToolInput {
  /** The question or topic to search for */
  query: string;
}

export interface StrandsDocsMCPServerConfig {
  /** Server name reported during the handshake */
  name: string;

  /** Server version reported during the handshake */
  version: string;

  /** Audit settings */
  audit: {
    /** Record tool calls in memory */
    enabled: boolean;

    /** Oldest entries are dropped past this size */
    maxEntries: number;
  };
}

export const DEFAULT_MCP_SERVER_CONFIG: StrandsDocsMCPServerConfig = {
  name: 'bedrock-kb',
  version: SERVER_VERSION,
  audit: {
    enabled: true,
    maxEntries: 500,
  },
};
