import Anthropic from '@anthropic-ai/sdk';
import { errorMessage } from '../../utils/guards';
import { AgentTool, ToolResult, ToolSource } from './types';

/**
 * Name-keyed set of tools offered to the model.
 *
 * Built-in tools own their names: a remote tool listed under the same name
 * is skipped, so an MCP server cannot replace `get_weather`.
 */
export class ToolRegistry {
  private tools = new Map<string, AgentTool>();

  /** Returns false when the name is already held by a built-in tool. */
  register(tool: AgentTool): boolean {
    const existing = this.tools.get(tool.name);
    if (existing?.source === 'builtin' && tool.source !== 'builtin') {
      console.warn(`[tools] Skipping ${tool.source} tool "${tool.name}": name is taken by a built-in tool`);
      return false;
    }
    this.tools.set(tool.name, tool);
    console.log(`[tools] Registered ${tool.source} tool: ${tool.name}`);
    return true;
  }

  getAllNames(source?: ToolSource): string[] {
    const names: string[] = [];
    for (const tool of this.tools.values()) {
      if (!source || tool.source === source) names.push(tool.name);
    }
    return names;
  }

  get(name: string): AgentTool | undefined {
    return this.tools.get(name);
  }

  getToolDefinitions(): Anthropic.Tool[] {
    return Array.from(this.tools.values(), (t) => ({
      name: t.name,
      description: t.description,
      input_schema: t.inputSchema,
    }));
  }

  async execute(name: string, input: Record<string, unknown>): Promise<ToolResult> {
    const tool = this.tools.get(name);
    if (!tool) {
      return { content: `Unknown tool: ${name}`, isError: true };
    }
    try {
      return await tool.execute(input);
    } catch (err) {
      const msg = errorMessage(err);
      console.error(`[tools] ${name} failed: ${msg}`);
      return { content: `Tool error: ${msg}`, isError: true };
    }
  }
}

export const toolRegistry = new ToolRegistry();
