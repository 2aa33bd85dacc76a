/**
 * @fileoverview Tests for MCP Server
 */

import { afterEach, describe, expect, it, vi } from 'vitest';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { ErrorCode, type JSONRPCMessage } from '@modelcontextprotocol/sdk/types.js';
import { AccessDeniedException } from '@aws-sdk/client-bedrock-agent-runtime';
import {
  StrandsDocsMCPServer,
  createStrandsDocsMCPServer,
} from '../server.js';
import { DEFAULT_MCP_SERVER_CONFIG, type StrandsDocsMCPServerConfig } from '../types.js';
import { createKnowledgeBaseConfig } from '../../knowledge/config.js';
import { ACCESS_DENIED_MESSAGE, EMPTY_QUERY_MESSAGE } from '../../knowledge/query_errors.js';
import type { RetrievalRequest, RetrievalResult } from '../../knowledge/retrieval_client.js';

// ============================================================================
// TEST SETUP
// ============================================================================

const knowledgeBase = createKnowledgeBaseConfig({ knowledgeBaseId: 'KBTEST0001' });

const openServers: StrandsDocsMCPServer[] = [];

function createServer(
  respond: (request: RetrievalRequest) => Promise<RetrievalResult> = async () => ({
    answerText: 'Agents call tools in a loop.',
    citations: [{ sourceUri: 's3://docs/agents.md' }],
  }),
  serverConfig?: Partial<StrandsDocsMCPServerConfig>
) {
  const retrieveAndGenerate = vi.fn(respond);
  const server = createStrandsDocsMCPServer({
    knowledgeBase,
    client: { retrieveAndGenerate },
    server: serverConfig,
  });
  openServers.push(server);
  return { server, retrieveAndGenerate };
}

async function connectClient(server: StrandsDocsMCPServer): Promise<Client> {
  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  await server.connect(serverTransport);
  const client = new Client({ name: 'test-client', version: '1.0.0' });
  await client.connect(clientTransport);
  return client;
}

afterEach(async () => {
  while (openServers.length > 0) {
    await openServers.pop()?.stop();
  }
});

describe('MCP Server', () => {
  // ============================================================================
  // SERVER CREATION
  // ============================================================================

  describe('server creation', () => {
    it('should create server with default config', () => {
      const { server } = createServer();
      const info = server.getServerInfo();

      expect(info).toEqual({
        name: DEFAULT_MCP_SERVER_CONFIG.name,
        version: DEFAULT_MCP_SERVER_CONFIG.version,
        lifecycle: 'uninitialized',
        tools: ['query_strands_docs'],
        auditLogSize: 0,
      });
    });

    it('should create server with custom config', () => {
      const { server } = createServer(undefined, { name: 'custom-server', version: '2.0.0' });
      const info = server.getServerInfo();

      expect(info.name).toBe('custom-server');
      expect(info.version).toBe('2.0.0');
    });
  });

  // ============================================================================
  // LIFECYCLE
  // ============================================================================

  describe('lifecycle', () => {
    it('becomes ready once the client completes the handshake', async () => {
      const { server } = createServer();
      const client = await connectClient(server);

      expect(server.getLifecycleState()).toBe('ready');
      expect(client.getServerVersion()).toEqual({ name: 'bedrock-kb', version: '0.2.0' });
    });

    it('rejects tool requests that arrive before initialization', async () => {
      const { server } = createServer();
      const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
      await server.connect(serverTransport);

      const response = new Promise<JSONRPCMessage>((resolve) => {
        clientTransport.onmessage = (message) => resolve(message);
      });
      await clientTransport.start();
      await clientTransport.send({ jsonrpc: '2.0', id: 1, method: 'tools/list', params: {} });

      expect(await response).toMatchObject({
        jsonrpc: '2.0',
        id: 1,
        error: {
          code: ErrorCode.InvalidRequest,
          message: expect.stringContaining('Cannot handle tools/list while server is uninitialized'),
        },
      });
      expect(server.getLifecycleState()).toBe('uninitialized');
    });

    it('closes when stopped and refuses to reconnect', async () => {
      const { server } = createServer();
      await connectClient(server);

      await server.stop();

      expect(server.getLifecycleState()).toBe('closed');
      const [, serverTransport] = InMemoryTransport.createLinkedPair();
      await expect(server.connect(serverTransport)).rejects.toThrow('Server has been closed and cannot be reconnected');
    });
  });

  // ============================================================================
  // TOOLS
  // ============================================================================

  describe('tools', () => {
    it('lists the documentation query tool', async () => {
      const { server } = createServer();
      const client = await connectClient(server);

      const { tools } = await client.listTools();

      expect(tools.map((tool) => tool.name)).toEqual(['query_strands_docs']);
      expect(tools[0]?.inputSchema.required).toEqual(['query']);
    });

    it('answers a query with the formatted response', async () => {
      const { server, retrieveAndGenerate } = createServer();
      const client = await connectClient(server);

      const result = await client.callTool({ name: 'query_strands_docs', arguments: { query: 'What is an agent?' } });

      expect(result.content).toEqual([
        {
          type: 'text',
          text: '**Query**: What is an agent?\n\n**Answer**: Agents call tools in a loop.\n\n**Sources**:\n1. s3://docs/agents.md',
        },
      ]);
      expect(result.isError).not.toBe(true);
      expect(retrieveAndGenerate).toHaveBeenCalledTimes(1);
    });

    it('prompts for a query when arguments are missing', async () => {
      const { server, retrieveAndGenerate } = createServer();
      const client = await connectClient(server);

      const result = await client.callTool({ name: 'query_strands_docs' });

      expect(result.content).toEqual([{ type: 'text', text: EMPTY_QUERY_MESSAGE }]);
      expect(retrieveAndGenerate).not.toHaveBeenCalled();
    });

    it('returns knowledge base failures as normal text content', async () => {
      const { server } = createServer(async () => {
        throw new AccessDeniedException({ message: 'denied', $metadata: {} });
      });
      const client = await connectClient(server);

      const result = await client.callTool({ name: 'query_strands_docs', arguments: { query: 'Q' } });

      expect(result.content).toEqual([{ type: 'text', text: ACCESS_DENIED_MESSAGE }]);
      expect(result.isError).not.toBe(true);
    });

    it('flags malformed input as an error result', async () => {
      const { server, retrieveAndGenerate } = createServer();
      const client = await connectClient(server);

      const result = await client.callTool({ name: 'query_strands_docs', arguments: { query: 42 } });

      expect(result.isError).toBe(true);
      expect(result.content).toEqual([
        { type: 'text', text: 'Invalid input: query Expected string, received number' },
      ]);
      expect(retrieveAndGenerate).not.toHaveBeenCalled();
    });

    it('rejects unknown tools with a protocol error', async () => {
      const { server } = createServer();
      const client = await connectClient(server);

      await expect(client.callTool({ name: 'bootstrap', arguments: {} })).rejects.toThrow('Unknown tool: bootstrap');
    });
  });

  // ============================================================================
  // AUDIT LOGGING
  // ============================================================================

  describe('audit logging', () => {
    it('records successes and classified failures', async () => {
      let calls = 0;
      const { server } = createServer(async () => {
        calls += 1;
        if (calls === 2) {
          throw new AccessDeniedException({ message: 'denied', $metadata: {} });
        }
        return { answerText: 'ok', citations: [] };
      });

      await server.callTool('query_strands_docs', { query: 'first' });
      await server.callTool('query_strands_docs', { query: 'second' });

      const log = server.getAuditLog();
      expect(log.map((entry) => [entry.name, entry.status, entry.error])).toEqual([
        ['query_strands_docs', 'success', undefined],
        ['query_strands_docs', 'failure', 'access_denied'],
      ]);
      expect(server.getServerInfo().auditLogSize).toBe(2);
    });

    it('keeps only the newest entries', async () => {
      const { server } = createServer(undefined, { audit: { enabled: true, maxEntries: 2 } });

      await server.callTool('query_strands_docs', { query: 'one' });
      await server.callTool('query_strands_docs', { query: 'two' });
      await server.callTool('query_strands_docs', { query: 42 });

      const log = server.getAuditLog();
      expect(log.map((entry) => entry.status)).toEqual(['success', 'failure']);
      expect(server.getAuditLog({ limit: 1 })).toEqual([log[1]]);
    });

    it('returns no entries for a zero or negative limit', async () => {
      const { server } = createServer();

      await server.callTool('query_strands_docs', { query: 'one' });
      await server.callTool('query_strands_docs', { query: 'two' });

      expect(server.getAuditLog({ limit: 0 })).toEqual([]);
      expect(server.getAuditLog({ limit: -3 })).toEqual([]);
      expect(server.getAuditLog({ limit: 5 })).toHaveLength(2);
    });

    it('records nothing when disabled', async () => {
      const { server } = createServer(undefined, { audit: { enabled: false, maxEntries: 10 } });

      await server.callTool('query_strands_docs', { query: 'one' });

      expect(server.getAuditLog()).toEqual([]);
    });
  });
});
