/**
 * @fileoverview Tool registry
 *
 * Static declaration of the tools this server exposes. Discovery never fails
 * and never depends on server state.
 */

import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { JSON_SCHEMAS, isToolName } from './schema.js';
import { QUERY_STRANDS_DOCS_TOOL } from './types.js';

const TOOL_DESCRIPTIONS = {
  [QUERY_STRANDS_DOCS_TOOL]: 'Query AWS Strands Agent documentation using Bedrock Knowledge Base',
} as const;

export function listCapabilities(): Tool[] {
  return [
    {
      name: QUERY_STRANDS_DOCS_TOOL,
      description: TOOL_DESCRIPTIONS[QUERY_STRANDS_DOCS_TOOL],
      inputSchema: structuredClone(JSON_SCHEMAS[QUERY_STRANDS_DOCS_TOOL]),
    },
  ];
}

export function isKnownTool(name: string): boolean {
  return isToolName(name);
}
