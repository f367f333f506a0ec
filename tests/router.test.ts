/**
 * Query Router Tests
 *
 * - Weather intent detection (whole word, any capitalization)
 * - Location extraction and truncation
 * - Bypass: weather queries never reach the language-model agent
 *
 * Run: npx tsx --test tests/router.test.ts
 */

import assert from 'node:assert/strict';
import { test, describe } from 'node:test';
import { QueryRouter, extractWeatherLocation, isWeatherQuery } from '../src/agent/router';
import type { AgentCapability, AgentRunResult } from '../src/agent/reply';
import type { WeatherLookup, WeatherOutcome } from '../src/agent/tools/weather';

class FakeWeather implements WeatherLookup {
  locations: string[] = [];
  async getWeather(location: string): Promise<WeatherOutcome> {
    this.locations.push(location);
    return { ok: false, kind: 'not-found', text: `weather for ${location}` };
  }
}

class FakeAgent implements AgentCapability {
  queries: string[] = [];
  constructor(private readonly result: AgentRunResult = { text: 'agent says hi' }) {}
  async run(query: string): Promise<AgentRunResult> {
    this.queries.push(query);
    return this.result;
  }
}

describe('isWeatherQuery', () => {
  test('matches the whole word regardless of case', () => {
    assert.equal(isWeatherQuery('weather in Paris'), true);
    assert.equal(isWeatherQuery('What is the Weather today'), true);
    assert.equal(isWeatherQuery('WEATHER FOR OSLO'), true);
  });

  test('ignores words that only contain "weather"', () => {
    assert.equal(isWeatherQuery('weatherproof jackets'), false);
    assert.equal(isWeatherQuery('tell me a joke'), false);
  });
});

describe('extractWeatherLocation', () => {
  test('stops at a comma and continuation phrase', () => {
    assert.equal(extractWeatherLocation('weather in Faisalabad, including temperature and humidity'), 'Faisalabad');
  });

  test('takes everything after "for"', () => {
    assert.equal(extractWeatherLocation('weather for New York'), 'New York');
  });

  test('stops at a question mark', () => {
    assert.equal(extractWeatherLocation('What is the weather in Lisbon?'), 'Lisbon');
  });

  test('cuts at "and" / "with" as whole words only', () => {
    assert.equal(extractWeatherLocation('weather in Rome and Milan'), 'Rome');
    assert.equal(extractWeatherLocation('Weather for Sandwich with details'), 'Sandwich');
  });

  test('falls back to the trimmed full query without "in"/"for"', () => {
    assert.equal(extractWeatherLocation("  what's the weather like?  "), "what's the weather like");
  });

  test('cuts at a parenthesis', () => {
    assert.equal(extractWeatherLocation('weather in Karachi (Pakistan)'), 'Karachi');
  });
});

describe('QueryRouter.classifyAndRun', () => {
  test('weather queries go to the weather tool and skip the agent', async () => {
    for (const query of ['weather in Oslo', 'Weather in Oslo', 'WEATHER IN Oslo']) {
      const weather = new FakeWeather();
      const agent = new FakeAgent();
      const router = new QueryRouter(weather, agent);

      const routed = await router.classifyAndRun(query);

      assert.deepEqual(routed, {
        route: 'weather',
        reply: { kind: 'plain-text', text: 'weather for Oslo' },
      });
      assert.deepEqual(weather.locations, ['Oslo']);
      assert.equal(agent.queries.length, 0);
    }
  });

  test('other queries are delegated to the agent', async () => {
    const weather = new FakeWeather();
    const agent = new FakeAgent({ text: 'The capital is Paris.' });
    const router = new QueryRouter(weather, agent);

    const routed = await router.classifyAndRun('capital of France?');

    assert.deepEqual(routed, { route: 'agent', reply: { kind: 'plain-text', text: 'The capital is Paris.' } });
    assert.deepEqual(agent.queries, ['capital of France?']);
    assert.equal(weather.locations.length, 0);
  });

  test('agent results without text become a message list', async () => {
    const messages = [
      { role: 'user' as const, text: 'hi' },
      { role: 'assistant' as const, text: 'hello there' },
    ];
    const router = new QueryRouter(new FakeWeather(), new FakeAgent({ text: '', messages }));

    const routed = await router.classifyAndRun('hi');

    assert.deepEqual(routed, { route: 'agent', reply: { kind: 'message-list', messages } });
  });
});
