/**
 * @fileoverview JSON Schema definitions and Zod validators for MCP Tool Inputs
 *
 * The JSON Schema is what clients see during discovery; the Zod schema is what
 * the server enforces at call time.
 *
 * @packageDocumentation
 */

import { z } from 'zod';
import { QUERY_STRANDS_DOCS_TOOL, type QueryStrandsDocsToolInput, type ToolName } from './types.js';

const QUERY_DESCRIPTION = 'The question or topic to search for in the documentation';

// ============================================================================
// ZOD SCHEMAS
// ============================================================================

/**
 * A missing query is accepted and treated as empty; the handler answers it
 * with a prompt instead of calling the knowledge base.
 */
export const QueryStrandsDocsToolInputSchema = z.object({
  query: z.string().default('').describe(QUERY_DESCRIPTION),
});

export const TOOL_INPUT_SCHEMAS: Record<ToolName, z.ZodType<QueryStrandsDocsToolInput, z.ZodTypeDef, unknown>> = {
  [QUERY_STRANDS_DOCS_TOOL]: QueryStrandsDocsToolInputSchema,
};

// ============================================================================
// JSON SCHEMAS
// ============================================================================

export interface JSONSchema {
  type: 'object';
  properties: Record<string, { type: string; description?: string }>;
  required: string[];
  [key: string]: unknown;
}

export const JSON_SCHEMAS: Record<ToolName, JSONSchema> = {
  [QUERY_STRANDS_DOCS_TOOL]: {
    type: 'object',
    properties: {
      query: {
        type: 'string',
        description: QUERY_DESCRIPTION,
      },
    },
    required: ['query'],
  },
};

// ============================================================================
// VALIDATION
// ============================================================================

export interface ValidationError {
  path: string;
  message: string;
  code: string;
}

export type ValidationResult =
  | { valid: true; errors: []; data: QueryStrandsDocsToolInput }
  | { valid: false; errors: ValidationError[] };

export function isToolName(name: string): name is ToolName {
  return Object.prototype.hasOwnProperty.call(TOOL_INPUT_SCHEMAS, name);
}

/**
 * Validate tool input against its schema. `undefined` arguments validate as
 * an empty object.
 */
export function validateToolInput(toolName: string, input: unknown): ValidationResult {
  if (!isToolName(toolName)) {
    return {
      valid: false,
      errors: [{
        path: '',
        message: `Unknown tool: ${toolName}`,
        code: 'unknown_tool',
      }],
    };
  }

  const result = TOOL_INPUT_SCHEMAS[toolName].safeParse(input ?? {});
  if (result.success) {
    return { valid: true, errors: [], data: result.data };
  }

  const errors: ValidationError[] = result.error.errors.map((err) => ({
    path: err.path.join('.') || '/',
    message: err.message,
    code: err.code,
  }));
  return { valid: false, errors };
}

export function getToolJsonSchema(toolName: string): JSONSchema | undefined {
  return isToolName(toolName) ? JSON_SCHEMAS[toolName] : undefined;
}
