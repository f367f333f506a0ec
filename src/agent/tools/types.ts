import Anthropic from '@anthropic-ai/sdk';

/** Where a tool came from: compiled in, or listed by the configured MCP server. */
export type ToolSource = 'builtin' | 'mcp';

export interface ToolResult {
  content: string;
  isError?: boolean;
}

export interface AgentTool {
  name: string;
  description: string;
  source: ToolSource;
  inputSchema: Anthropic.Tool['input_schema'];
  execute(input: Record<string, unknown>): Promise<ToolResult>;
}
