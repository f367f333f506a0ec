import { config } from '../config';
import { AnthropicAgent } from './anthropic';
import { AgentFacade } from './facade';
import { QueryRouter } from './router';
import { registerBuiltinTools, toolRegistry, WeatherClient } from './tools';

/**
 * Wire the weather client, tool registry, language-model agent and router
 * into the facade both transports talk to.
 */
export function createAgent(): AgentFacade {
  const weather = new WeatherClient();
  registerBuiltinTools(weather);

  const model = new AnthropicAgent(toolRegistry);
  const router = new QueryRouter(weather, model);
  console.log(`[agent] ${config.agentName} ready (model: ${config.agentModel})`);
  return new AgentFacade(config.agentName, router);
}

export { AgentFacade } from './facade';
export type { AgentOutcome, QueryRunner } from './facade';
