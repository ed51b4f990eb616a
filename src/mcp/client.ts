/**
 * MCP client for the data-processing server under test.
 *
 * Spawns the server over stdio and exposes the {@link ToolInvoker} the
 * executor drives.
 */

import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { getDefaultEnvironment, StdioClientTransport } from '@modelcontextprotocol/sdk/client/stdio.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import { McpError, type Tool } from '@modelcontextprotocol/sdk/types.js';
import type { Config, JsonObject, ToolContent, ToolInvoker, ToolResponse } from '@shared/types';
import { isRecord } from '@shared/utils/json';
import { setupLogger } from '@shared/utils/logger';

const logger = setupLogger('dataprocessing-tests:mcp-client');

const CLIENT_INFO = { name: 'dataprocessing-mcp-integration-tests', version: '0.1.0' };
const ALLOW_WRITE_FLAG = '--allow-write';

export class McpConnectionError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'McpConnectionError';
  }
}

export type McpClientConfig = Pick<Config, 'aws' | 'server'>;

/**
 * Environment of the spawned server: the SDK's safe defaults, the configured
 * extras and the AWS profile/region.
 */
export function buildServerEnvironment(config: McpClientConfig): Record<string, string> {
  const env: Record<string, string> = { ...getDefaultEnvironment(), ...config.server.env };
  if (config.aws.profile) {
    env.AWS_PROFILE = config.aws.profile;
  }
  env.AWS_REGION = config.aws.region;
  env.AWS_DEFAULT_REGION = config.aws.region;
  return env;
}

export function buildServerArgs(server: Config['server']): string[] {
  const args = [...server.args];
  if (server.allowWrite && !args.includes(ALLOW_WRITE_FLAG)) {
    args.push(ALLOW_WRITE_FLAG);
  }
  return args;
}

function toToolContent(item: unknown): ToolContent {
  if (!isRecord(item)) {
    return { type: 'unknown', value: item };
  }
  const { type, text, ...rest } = item;
  return {
    ...rest,
    type: typeof type === 'string' ? type : 'unknown',
    ...(typeof text === 'string' ? { text } : {}),
  };
}

export class McpToolClient implements ToolInvoker {
  private readonly client = new Client(CLIENT_INFO, { capabilities: {} });
  private connected = false;

  /**
   * @param transport - Replaces the stdio transport (used by tests)
   */
  constructor(
    private readonly config: McpClientConfig,
    private readonly transport?: Transport
  ) {}

  /**
   * Start the server and perform the `initialize` handshake.
   */
  async connect(): Promise<void> {
    const transport = this.transport ?? this.createStdioTransport();

    try {
      await this.client.connect(transport);
    } catch (error) {
      throw new McpConnectionError(
        `Failed to connect to MCP server: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error }
      );
    }

    this.connected = true;
    logger.info({ server: this.client.getServerVersion() }, 'Connected to MCP server');
  }

  async listTools(): Promise<Tool[]> {
    this.ensureConnected();

    const tools: Tool[] = [];
    let cursor: string | undefined;
    do {
      const page = await this.client.listTools(cursor ? { cursor } : undefined);
      tools.push(...page.tools);
      cursor = page.nextCursor;
    } while (cursor);
    return tools;
  }

  /**
   * Call a tool and return the JSON-RPC shaped envelope. Protocol errors
   * (including timeouts) become `{ error }`; transport failures throw.
   */
  async callTool(toolName: string, params: JsonObject): Promise<ToolResponse> {
    this.ensureConnected();
    logger.debug({ toolName, params }, 'Calling tool');

    try {
      const result = await this.client.callTool({ name: toolName, arguments: params }, undefined, {
        timeout: this.config.server.callTimeoutMs,
      });
      const content = Array.isArray(result.content) ? result.content.map(toToolContent) : [];
      return { result: { content, isError: result.isError === true } };
    } catch (error) {
      if (error instanceof McpError) {
        logger.warn({ toolName, code: error.code, message: error.message }, 'Tool call returned an error');
        return {
          error: {
            code: error.code,
            message: error.message,
            ...(error.data !== undefined ? { data: error.data } : {}),
          },
        };
      }
      throw error;
    }
  }

  async close(): Promise<void> {
    if (!this.connected) return;
    this.connected = false;
    await this.client.close();
    logger.info('MCP server stopped');
  }

  private ensureConnected(): void {
    if (!this.connected) {
      throw new McpConnectionError('MCP client is not connected');
    }
  }

  private createStdioTransport(): StdioClientTransport {
    const { server } = this.config;
    const args = buildServerArgs(server);
    logger.info({ command: server.command, args }, 'Starting MCP server');

    return new StdioClientTransport({
      command: server.command,
      args,
      cwd: server.cwd,
      env: buildServerEnvironment(this.config),
    });
  }
}
