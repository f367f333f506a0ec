/**
 * Query Router - sends weather questions straight to the weather tool so its
 * raw output reaches the user untouched, and everything else to the agent.
 */

import { WeatherLookup } from './tools/weather';
import { AgentCapability, AgentReply, normalizeRunResult } from './reply';

const WEATHER_WORD = /\bweather\b/i;
const WEATHER_LOCATION = /\bweather\b.*?\b(?:in|for)\s+([^?\n\r]+)/i;
const LOCATION_DELIMITER = /\s*(?:,|;|\.|\(|\)|\bincluding\b|\bwith\b|\bshow\b|\bgive\b|\band\b)\s*/i;

export type RouteName = 'weather' | 'agent';

export interface RoutedReply {
  route: RouteName;
  reply: AgentReply;
}

export function isWeatherQuery(query: string): boolean {
  return WEATHER_WORD.test(query);
}

/**
 * Pull the place name out of a weather question.
 *
 *   "weather in Faisalabad, including temperature" -> "Faisalabad"
 *   "weather for New York"                         -> "New York"
 */
export function extractWeatherLocation(query: string): string {
  const match = WEATHER_LOCATION.exec(query);
  const captured = match?.[1];
  const candidate = captured !== undefined ? captured.trim() : query.trim();

  const head = candidate.split(LOCATION_DELIMITER)[0] ?? '';
  return head.trim().replace(/^\?+|\?+$/g, '').trim();
}

export class QueryRouter {
  constructor(
    private readonly weather: WeatherLookup,
    private readonly agent: AgentCapability,
  ) {}

  async classifyAndRun(query: string): Promise<RoutedReply> {
    if (isWeatherQuery(query)) {
      const location = extractWeatherLocation(query);
      console.log(`[router] Weather query, bypassing agent (location: "${location}")`);
      const outcome = await this.weather.getWeather(location);
      return { route: 'weather', reply: { kind: 'plain-text', text: outcome.text } };
    }

    const result = await this.agent.run(query);
    return { route: 'agent', reply: normalizeRunResult(result) };
  }
}
