/**
 * MCP Tool Server Client
 *
 * Connects to an external MCP server over HTTP using the official
 * @modelcontextprotocol/sdk (Streamable HTTP first, SSE as fallback) and
 * exposes its tools through the agent's tool registry.
 */

import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { SSEClientTransport } from '@modelcontextprotocol/sdk/client/sse.js';
import { StreamableHTTPClientTransport } from '@modelcontextprotocol/sdk/client/streamableHttp.js';
import { errorMessage, isRecord } from '../../utils/guards';
import type { ToolRegistry } from '../tools/registry';
import type { AgentTool, ToolResult } from '../tools/types';

export interface McpServerOptions {
  url: string;
  timeoutSeconds: number;
}

export class McpToolServer {
  private client: Client | undefined;

  constructor(private readonly options: McpServerOptions) {}

  private get timeoutMs(): number {
    return this.options.timeoutSeconds * 1000;
  }

  async connect(): Promise<void> {
    const url = new URL(this.options.url);

    try {
      const client = newClient();
      await client.connect(new StreamableHTTPClientTransport(url));
      this.client = client;
      console.log(`[mcp] Connected to ${url.host} via Streamable HTTP`);
      return;
    } catch (err) {
      console.log(`[mcp] Streamable HTTP failed for ${url.host} (${errorMessage(err)}), trying SSE...`);
    }

    const client = newClient();
    await client.connect(new SSEClientTransport(url));
    this.client = client;
    console.log(`[mcp] Connected to ${url.host} via SSE`);
  }

  /**
   * Register every tool the server lists. Returns the names that were
   * registered; names already held by a built-in tool are left out.
   */
  async registerTools(registry: ToolRegistry): Promise<string[]> {
    const client = this.requireClient();
    const result = await client.listTools(undefined, { timeout: this.timeoutMs });

    const names: string[] = [];
    for (const tool of result.tools) {
      const agentTool: AgentTool = {
        name: tool.name,
        description: tool.description || '',
        source: 'mcp',
        inputSchema: { ...tool.inputSchema, type: 'object' as const },
        execute: (input) => this.callTool(tool.name, input),
      };
      if (registry.register(agentTool)) names.push(tool.name);
    }
    return names;
  }

  async callTool(toolName: string, args: Record<string, unknown>): Promise<ToolResult> {
    if (!this.client) {
      return { content: 'MCP server is not connected', isError: true };
    }

    try {
      const result = await this.client.callTool({ name: toolName, arguments: args }, undefined, {
        timeout: this.timeoutMs,
      });

      // MCP tool results have a content array of text/image blocks
      const content: unknown = result.content;
      const textParts: string[] = [];
      if (Array.isArray(content)) {
        for (const block of content) {
          if (isRecord(block) && typeof block.text === 'string') {
            textParts.push(block.text);
          } else if (typeof block === 'string') {
            textParts.push(block);
          }
        }
      } else if (typeof content === 'string') {
        textParts.push(content);
      }

      return {
        content: textParts.join('\n') || 'No output',
        isError: result.isError === true,
      };
    } catch (err) {
      return { content: `MCP tool error: ${errorMessage(err)}`, isError: true };
    }
  }

  async close(): Promise<void> {
    if (!this.client) return;
    try {
      await this.client.close();
    } catch (err) {
      console.warn('[mcp] Error while closing client:', errorMessage(err));
    }
    this.client = undefined;
  }

  private requireClient(): Client {
    if (!this.client) {
      throw new Error('MCP server is not connected');
    }
    return this.client;
  }
}

function newClient(): Client {
  return new Client({ name: 'weather-agent-gateway', version: '1.0.0' }, { capabilities: {} });
}
