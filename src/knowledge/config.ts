/**
 * @fileoverview Knowledge base configuration
 *
 * Read once from the environment at startup and frozen. The handler and the
 * Bedrock client receive the same instance and never mutate it.
 *
 * @packageDocumentation
 */

import { z } from 'zod';

export const DEFAULT_REGION = 'us-west-2';
export const DEFAULT_MODEL_ID = 'anthropic.claude-3-sonnet-20240229-v1:0';
export const DEFAULT_REQUEST_TIMEOUT_MS = 120_000;

export interface KnowledgeBaseConfig {
  /** Bedrock Knowledge Base identifier */
  readonly knowledgeBaseId: string;

  /** AWS region hosting the knowledge base */
  readonly region: string;

  /** Foundation model ARN used for generation */
  readonly modelArn: string;

  /** Abort the remote call after this many milliseconds */
  readonly requestTimeoutMs: number;
}

export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly issues: string[]
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

const EnvSchema = z.object({
  STRANDS_DOCS_KNOWLEDGE_BASE_ID: z
    .string({ required_error: 'is required' })
    .trim()
    .min(1, 'must not be empty')
    .regex(/^[0-9a-zA-Z]+$/, 'must be alphanumeric'),
  STRANDS_DOCS_REGION: z.string().trim().min(1).optional(),
  AWS_REGION: z.string().trim().min(1).optional(),
  STRANDS_DOCS_MODEL_ID: z.string().trim().min(1).optional(),
  STRANDS_DOCS_TIMEOUT_MS: z.coerce
    .number({ invalid_type_error: 'must be a number' })
    .int('must be an integer')
    .positive('must be positive')
    .optional(),
});

/**
 * Expand a bare foundation model id into its on-demand ARN. Values that are
 * already ARNs (foundation models, inference profiles, provisioned throughput)
 * pass through untouched.
 */
export function resolveModelArn(modelId: string, region: string): string {
  if (modelId.startsWith('arn:')) {
    return modelId;
  }
  return `arn:aws:bedrock:${region}::foundation-model/${modelId}`;
}

export function createKnowledgeBaseConfig(
  options: { knowledgeBaseId: string } & Partial<Omit<KnowledgeBaseConfig, 'knowledgeBaseId'>>
): KnowledgeBaseConfig {
  const region = options.region ?? DEFAULT_REGION;
  return Object.freeze({
    knowledgeBaseId: options.knowledgeBaseId,
    region,
    modelArn: options.modelArn ?? resolveModelArn(DEFAULT_MODEL_ID, region),
    requestTimeoutMs: options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS,
  });
}

export function loadKnowledgeBaseConfig(env: NodeJS.ProcessEnv = process.env): KnowledgeBaseConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.errors.map((err) => `${err.path.join('.')} ${err.message}`);
    throw new ConfigurationError(`Invalid configuration: ${issues.join('; ')}`, issues);
  }

  const values = parsed.data;
  const region = values.STRANDS_DOCS_REGION ?? values.AWS_REGION ?? DEFAULT_REGION;
  return createKnowledgeBaseConfig({
    knowledgeBaseId: values.STRANDS_DOCS_KNOWLEDGE_BASE_ID,
    region,
    modelArn: resolveModelArn(values.STRANDS_DOCS_MODEL_ID ?? DEFAULT_MODEL_ID, region),
    requestTimeoutMs: values.STRANDS_DOCS_TIMEOUT_MS,
  });
}
