/**
 * Unit tests for mcp/client.ts
 *
 * Runs a stub server on the SDK's in-memory transport pair.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { setTimeout } from 'timers/promises';
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';

vi.mock('@shared/utils/logger', () => ({
  setupLogger: () => ({
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  }),
}));

import { buildServerArgs, buildServerEnvironment, McpConnectionError, McpToolClient } from '@/mcp/client';
import type { Config } from '@shared/types';

const config: Pick<Config, 'aws' | 'server'> = {
  aws: { region: 'eu-west-1', profile: 'test-profile' },
  server: {
    command: 'uvx',
    args: ['awslabs.aws-dataprocessing-mcp-server@latest'],
    allowWrite: true,
    callTimeoutMs: 50,
  },
};

function createStubServer(): Server {
  const server = new Server({ name: 'stub-dataprocessing', version: '1.0.0' }, { capabilities: { tools: {} } });

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: [
      { name: 'manage_aws_glue_jobs', inputSchema: { type: 'object' } },
      { name: 'manage_aws_athena_query_executions', inputSchema: { type: 'object' } },
    ],
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    if (name === 'slow_tool') {
      await setTimeout(500);
      return { content: [{ type: 'text', text: 'too late' }] };
    }
    if (name === 'failing_tool') {
      return { content: [{ type: 'text', text: 'Access denied' }], isError: true };
    }
    return { content: [{ type: 'text', text: JSON.stringify({ tool: name, args }) }] };
  });

  return server;
}

describe('McpToolClient', () => {
  let server: Server;
  let client: McpToolClient;

  beforeEach(async () => {
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    server = createStubServer();
    await server.connect(serverTransport);
    client = new McpToolClient(config, clientTransport);
  });

  afterEach(async () => {
    await client.close();
    await server.close();
  });

  it('should reject calls before connecting', async () => {
    await expect(client.callTool('manage_aws_glue_jobs', {})).rejects.toBeInstanceOf(McpConnectionError);
  });

  it('should list the server tools', async () => {
    await client.connect();

    const tools = await client.listTools();

    expect(tools.map((tool) => tool.name)).toEqual([
      'manage_aws_glue_jobs',
      'manage_aws_athena_query_executions',
    ]);
  });

  it('should wrap a tool result in the response envelope', async () => {
    await client.connect();

    const response = await client.callTool('manage_aws_glue_jobs', { operation: 'get-job', job_name: 'j1' });

    expect(response).toEqual({
      result: {
        content: [
          {
            type: 'text',
            text: '{"tool":"manage_aws_glue_jobs","args":{"operation":"get-job","job_name":"j1"}}',
          },
        ],
        isError: false,
      },
    });
  });

  it('should keep the isError flag of a failed tool', async () => {
    await client.connect();

    const response = await client.callTool('failing_tool', {});

    expect(response.result?.isError).toBe(true);
    expect(response.result?.content[0]?.text).toBe('Access denied');
  });

  it('should turn a request timeout into an error envelope', async () => {
    await client.connect();

    const response = await client.callTool('slow_tool', {});

    expect(response.result).toBeUndefined();
    expect(response.error?.code).toBe(-32001);
    expect(response.error?.message).toContain('Request timed out');
  });
});

describe('server launch settings', () => {
  it('should append --allow-write once when writes are allowed', () => {
    expect(buildServerArgs(config.server)).toEqual(['awslabs.aws-dataprocessing-mcp-server@latest', '--allow-write']);
    expect(buildServerArgs({ ...config.server, args: ['srv', '--allow-write'] })).toEqual(['srv', '--allow-write']);
  });

  it('should leave the args alone when writes are not allowed', () => {
    expect(buildServerArgs({ ...config.server, allowWrite: false })).toEqual([
      'awslabs.aws-dataprocessing-mcp-server@latest',
    ]);
  });

  it('should pass AWS profile and region to the server', () => {
    const env = buildServerEnvironment({
      ...config,
      server: { ...config.server, env: { FASTMCP_LOG_LEVEL: 'ERROR' } },
    });

    expect(env.AWS_PROFILE).toBe('test-profile');
    expect(env.AWS_REGION).toBe('eu-west-1');
    expect(env.AWS_DEFAULT_REGION).toBe('eu-west-1');
    expect(env.FASTMCP_LOG_LEVEL).toBe('ERROR');
  });

  it('should omit AWS_PROFILE without a profile', () => {
    const env = buildServerEnvironment({ ...config, aws: { region: 'us-east-1' } });

    expect(env.AWS_PROFILE).toBeUndefined();
  });
});
