import Anthropic from '@anthropic-ai/sdk';
import { config } from '../config';
import { isRecord } from '../utils/guards';
import { AgentCapability, AgentMessage, AgentRunResult } from './reply';
import { ToolRegistry } from './tools/registry';

// Maximum number of tool-use iterations per query to prevent runaway loops
const MAX_TOOL_ITERATIONS = 10;

export interface AnthropicAgentOptions {
  name: string;
  description: string;
  apiKey: string;
  model: string;
  maxTokens: number;
}

/** The slice of the Messages API the agent calls; `Anthropic#messages` satisfies it. */
export interface MessagesApi {
  create(
    params: Anthropic.MessageCreateParamsNonStreaming,
  ): Promise<Pick<Anthropic.Message, 'content' | 'stop_reason'>>;
}

export function buildSystemPrompt(name: string, description: string, toolNames: string[]): string {
  const toolList = toolNames.length > 0 ? toolNames.map((t, i) => `${i + 1}. ${t}`).join('\n') : '(none)';
  return `You are ${name}. ${description}

You have access to the following tools:
${toolList}

IMPORTANT INSTRUCTIONS:
- When providing weather information, ALWAYS call the get_weather tool.
- Then output the get_weather tool result *verbatim* (do not rewrite/reformat the JSON).
- After the verbatim tool output, add a short human-readable summary.

Use these tools when appropriate to provide comprehensive and accurate answers.
Always be helpful, accurate, and provide detailed responses with specific numbers and facts.`;
}

/**
 * Language-model agent with an agentic tool-use loop.
 * Calls Claude, executes any tool_use requests against the registry, feeds
 * results back, and repeats until Claude produces a final text response.
 */
export class AnthropicAgent implements AgentCapability {
  private readonly options: AnthropicAgentOptions;
  private api: MessagesApi | undefined;

  constructor(
    private readonly tools: ToolRegistry,
    options: Partial<AnthropicAgentOptions> = {},
    api?: MessagesApi,
  ) {
    this.api = api;
    this.options = {
      name: config.agentName,
      description: config.agentDescription,
      apiKey: config.anthropicApiKey,
      model: config.agentModel,
      maxTokens: config.agentMaxTokens,
      ...options,
    };
  }

  private getApi(): MessagesApi {
    if (!this.api) {
      this.api = new Anthropic({ apiKey: this.options.apiKey }).messages;
    }
    return this.api;
  }

  async run(query: string): Promise<AgentRunResult> {
    const api = this.getApi();
    const definitions = this.tools.getToolDefinitions();
    const system = buildSystemPrompt(this.options.name, this.options.description, this.tools.getAllNames());

    const messages: Anthropic.MessageParam[] = [{ role: 'user', content: query }];
    // Assistant turns only: the last entry is what the user gets back
    const transcript: AgentMessage[] = [];
    let toolCalls = 0;

    for (let iteration = 0; iteration < MAX_TOOL_ITERATIONS; iteration++) {
      const response = await api.create({
        model: this.options.model,
        max_tokens: this.options.maxTokens,
        system,
        messages,
        ...(definitions.length > 0 ? { tools: definitions } : {}),
      });

      const textBlocks = response.content.filter((b): b is Anthropic.TextBlock => b.type === 'text');
      const text = textBlocks.map((b) => b.text).join('\n');
      if (text) {
        transcript.push({ role: 'assistant', text });
      }

      // No tool use: this is the final answer
      if (response.stop_reason !== 'tool_use') {
        if (response.stop_reason === 'max_tokens') {
          console.warn(
            `[agent] Response truncated at max_tokens (${this.options.maxTokens}) on iteration ${iteration}, tool calls so far: ${toolCalls}`,
          );
        }
        return { text, messages: transcript };
      }

      messages.push({ role: 'assistant', content: response.content });

      const toolResultBlocks: Anthropic.ToolResultBlockParam[] = [];
      for (const block of response.content) {
        if (block.type !== 'tool_use') continue;
        toolCalls++;

        const input = isRecord(block.input) ? block.input : {};
        console.log(`[agent] Tool call #${toolCalls}: ${block.name}(${JSON.stringify(input).slice(0, 200)})`);

        const result = await this.tools.execute(block.name, input);
        console.log(`[agent] Tool result: ${result.isError ? 'ERROR' : 'OK'} (${result.content.length} chars)`);

        toolResultBlocks.push({
          type: 'tool_result',
          tool_use_id: block.id,
          content: result.content,
          is_error: result.isError,
        });
      }

      // Feed tool results back to Claude
      messages.push({ role: 'user', content: toolResultBlocks });
    }

    console.warn(`[agent] Max tool iterations (${MAX_TOOL_ITERATIONS}) reached`);
    return { text: '(max tool iterations reached - please try a simpler request)', messages: transcript };
  }
}
