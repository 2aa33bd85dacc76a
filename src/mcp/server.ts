#!/usr/bin/env node
/**
 * @fileoverview MCP Server for the Strands documentation knowledge base
 *
 * Exposes a single `query_strands_docs` tool over the Model Context Protocol.
 * The SDK performs the initialize handshake; this class tracks the resulting
 * lifecycle, dispatches discovery and tool calls, and records an audit trail.
 *
 * @packageDocumentation
 */

import { randomUUID } from 'node:crypto';
import { realpathSync } from 'node:fs';
import { pathToFileURL } from 'node:url';
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import {
  CallToolRequestSchema,
  ErrorCode,
  ListToolsRequestSchema,
  McpError,
  type CallToolResult,
  type ListToolsResult,
} from '@modelcontextprotocol/sdk/types.js';

import {
  DEFAULT_MCP_SERVER_CONFIG,
  QUERY_STRANDS_DOCS_TOOL,
  type ServerLifecycleState,
  type StrandsDocsMCPServerConfig,
} from './types.js';
import { validateToolInput } from './schema.js';
import { isKnownTool, listCapabilities } from './tool_registry.js';
import { QueryHandler } from '../knowledge/query_handler.js';
import { describeQueryError } from '../knowledge/query_errors.js';
import {
  BedrockRetrieveAndGenerateClient,
  type RetrieveAndGenerateClient,
} from '../knowledge/retrieval_client.js';
import {
  ConfigurationError,
  loadKnowledgeBaseConfig,
  type KnowledgeBaseConfig,
} from '../knowledge/config.js';
import { logDebug, logError, logInfo } from '../telemetry/logger.js';

// ============================================================================
// TYPES
// ============================================================================

/** Audit log entry */
export interface AuditLogEntry {
  /** Entry ID */
  id: string;

  /** Timestamp */
  timestamp: string;

  /** Tool name */
  name: string;

  /** Result status */
  status: 'success' | 'failure';

  /** Duration ms */
  durationMs: number;

  /** Error message (if any) */
  error?: string;
}

interface CallToolRequestLike {
  params: {
    name: string;
    arguments?: Record<string, unknown>;
  };
}

export interface StrandsDocsMCPServerOptions {
  /** Immutable knowledge base settings */
  knowledgeBase: KnowledgeBaseConfig;

  /** Remote client; defaults to the Bedrock Agent Runtime client */
  client?: RetrieveAndGenerateClient;

  /** Server identity and audit overrides */
  server?: Partial<StrandsDocsMCPServerConfig>;
}

function textResult(text: string, isError = false): CallToolResult {
  const result: CallToolResult = {
    content: [{ type: 'text', text }],
  };
  if (isError) {
    result.isError = true;
  }
  return result;
}

// ============================================================================
// SERVER IMPLEMENTATION
// ============================================================================

export class StrandsDocsMCPServer {
  private readonly server: Server;
  private readonly config: StrandsDocsMCPServerConfig;
  private lifecycle: ServerLifecycleState = 'uninitialized';
  private auditLog: AuditLogEntry[] = [];
  private connected = false;

  constructor(
    private readonly handler: QueryHandler,
    config: Partial<StrandsDocsMCPServerConfig> = {}
  ) {
    this.config = {
      ...DEFAULT_MCP_SERVER_CONFIG,
      ...config,
      audit: { ...DEFAULT_MCP_SERVER_CONFIG.audit, ...config.audit },
    };

    this.server = new Server(
      {
        name: this.config.name,
        version: this.config.version,
      },
      {
        capabilities: {
          tools: {},
        },
      }
    );

    this.server.oninitialized = () => {
      if (this.lifecycle === 'uninitialized') {
        this.lifecycle = 'ready';
        logInfo('[MCP] client initialized', { client: this.server.getClientVersion()?.name });
      }
    };
    this.server.onclose = () => {
      this.lifecycle = 'closed';
      this.connected = false;
    };

    this.registerHandlers();
  }

  /**
   * Register MCP request handlers.
   */
  private registerHandlers(): void {
    this.server.setRequestHandler(ListToolsRequestSchema, async (): Promise<ListToolsResult> => {
      this.assertReady('tools/list');
      return { tools: listCapabilities() };
    });

    this.server.setRequestHandler(CallToolRequestSchema, async (request: CallToolRequestLike): Promise<CallToolResult> => {
      this.assertReady('tools/call');
      const { name, arguments: args } = request.params;
      if (!isKnownTool(name)) {
        throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${name}`);
      }
      return this.callTool(name, args);
    });
  }

  private assertReady(method: string): void {
    if (this.lifecycle !== 'ready') {
      throw new McpError(ErrorCode.InvalidRequest, `Cannot handle ${method} while server is ${this.lifecycle}`);
    }
  }

  /**
   * Execute a tool call. Query failures come back as normal text content;
   * only malformed input is flagged with `isError`.
   */
  async callTool(name: string, args: unknown): Promise<CallToolResult> {
    const startTime = Date.now();

    const validation = validateToolInput(name, args);
    if (!validation.valid) {
      const message = `Invalid input: ${validation.errors.map((e) => `${e.path} ${e.message}`).join(', ')}`;
      this.recordAudit(name, 'failure', startTime, message);
      return textResult(message, true);
    }

    const outcome = await this.handler.run(validation.data.query);
    if (outcome.ok) {
      this.recordAudit(name, 'success', startTime);
      return textResult(outcome.value);
    }

    const text = describeQueryError(outcome.error);
    this.recordAudit(name, 'failure', startTime, outcome.error.kind);
    return textResult(text);
  }

  private recordAudit(name: string, status: AuditLogEntry['status'], startTime: number, error?: string): void {
    if (!this.config.audit.enabled) return;

    const entry: AuditLogEntry = {
      id: randomUUID(),
      timestamp: new Date().toISOString(),
      name,
      status,
      durationMs: Date.now() - startTime,
    };
    if (error) {
      entry.error = error;
    }
    this.auditLog.push(entry);

    const maxEntries = Math.max(1, this.config.audit.maxEntries);
    if (this.auditLog.length > maxEntries) {
      this.auditLog = this.auditLog.slice(-maxEntries);
    }
    logDebug(`[MCP Audit] tool_call: ${entry.name} - ${entry.status}`, { durationMs: entry.durationMs });
  }

  /**
   * Get audit log entries, oldest first.
   */
  getAuditLog(options?: { limit?: number }): AuditLogEntry[] {
    if (options?.limit !== undefined) {
      const limit = Math.max(0, Math.floor(options.limit));
      return limit === 0 ? [] : this.auditLog.slice(-limit);
    }
    return [...this.auditLog];
  }

  getLifecycleState(): ServerLifecycleState {
    return this.lifecycle;
  }

  // ============================================================================
  // SERVER LIFECYCLE
  // ============================================================================

  /**
   * Attach to an arbitrary transport. The lifecycle moves to `ready` once the
   * client acknowledges initialization.
   */
  async connect(transport: Transport): Promise<void> {
    if (this.lifecycle === 'closed') {
      throw new Error('Server has been closed and cannot be reconnected');
    }
    await this.server.connect(transport);
    this.connected = true;
  }

  /**
   * Start the server with stdio transport.
   */
  async start(): Promise<void> {
    await this.connect(new StdioServerTransport());
    logInfo(`[MCP] Strands docs server started (${this.config.name} v${this.config.version})`);
  }

  /**
   * Stop the server.
   */
  async stop(): Promise<void> {
    if (this.connected) {
      await this.server.close();
    }
    this.lifecycle = 'closed';
    logInfo('[MCP] Strands docs server stopped');
  }

  /**
   * Get server info.
   */
  getServerInfo(): {
    name: string;
    version: string;
    lifecycle: ServerLifecycleState;
    tools: string[];
    auditLogSize: number;
  } {
    return {
      name: this.config.name,
      version: this.config.version,
      lifecycle: this.lifecycle,
      tools: [QUERY_STRANDS_DOCS_TOOL],
      auditLogSize: this.auditLog.length,
    };
  }
}

// ============================================================================
// FACTORY FUNCTIONS
// ============================================================================

export function createStrandsDocsMCPServer(options: StrandsDocsMCPServerOptions): StrandsDocsMCPServer {
  const client = options.client ?? new BedrockRetrieveAndGenerateClient(options.knowledgeBase);
  const handler = new QueryHandler(client, options.knowledgeBase);
  return new StrandsDocsMCPServer(handler, options.server);
}

/**
 * Create and start a server with stdio transport.
 */
export async function startStdioServer(options: StrandsDocsMCPServerOptions): Promise<StrandsDocsMCPServer> {
  const server = createStrandsDocsMCPServer(options);
  await server.start();
  return server;
}

// ============================================================================
// CLI ENTRY POINT
// ============================================================================

export async function main(env: NodeJS.ProcessEnv = process.env): Promise<void> {
  const knowledgeBase = loadKnowledgeBaseConfig(env);
  logDebug('[MCP] knowledge base configuration loaded', {
    knowledgeBaseId: knowledgeBase.knowledgeBaseId,
    region: knowledgeBase.region,
    modelArn: knowledgeBase.modelArn,
  });

  const server = await startStdioServer({ knowledgeBase });

  const shutdown = (): void => {
    server.stop().then(
      () => process.exit(0),
      (error: unknown) => {
        logError('[MCP] Failed to stop cleanly', { error: error instanceof Error ? error.message : String(error) });
        process.exit(1);
      }
    );
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

function isEntryPoint(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return import.meta.url === pathToFileURL(realpathSync(entry)).href;
  } catch {
    return false;
  }
}

if (isEntryPoint()) {
  main().catch((error: unknown) => {
    if (error instanceof ConfigurationError) {
      console.error(`[MCP] ${error.message}`);
    } else {
      console.error('[MCP] Fatal error:', error);
    }
    process.exit(1);
  });
}
