import { toolRegistry } from './registry';
import { createWeatherTool, WeatherLookup } from './weather';

/**
 * Register all built-in tools.
 * Call this once at startup.
 */
export function registerBuiltinTools(weather: WeatherLookup): void {
  toolRegistry.register(createWeatherTool(weather));

  const names = toolRegistry.getAllNames('builtin');
  console.log(`[tools] ${names.length} built-in tools registered: ${names.join(', ')}`);
}

export { toolRegistry, ToolRegistry } from './registry';
export { WeatherClient, createWeatherTool } from './weather';
export type { WeatherLookup, WeatherOutcome } from './weather';
export type { AgentTool, ToolResult, ToolSource } from './types';
