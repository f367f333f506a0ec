/**
 * Tool Registry, MCP Adapter and System Prompt Tests
 *
 * Run: npx tsx --test tests/tools.test.ts
 */

import assert from 'node:assert/strict';
import { test, describe } from 'node:test';
import { ToolRegistry } from '../src/agent/tools/registry';
import { createWeatherTool } from '../src/agent/tools/weather';
import { McpToolServer } from '../src/agent/mcp/client';
import { buildSystemPrompt } from '../src/agent/anthropic';
import type { AgentTool } from '../src/agent/tools/types';

const echoTool: AgentTool = {
  name: 'echo',
  description: 'Echo the input back',
  source: 'mcp',
  inputSchema: { type: 'object', properties: { value: { type: 'string' } } },
  async execute(input) {
    return { content: String(input.value) };
  },
};

describe('ToolRegistry', () => {
  test('exposes registered tools as Anthropic definitions', () => {
    const registry = new ToolRegistry();
    registry.register(echoTool);

    assert.deepEqual(registry.getAllNames(), ['echo']);
    assert.deepEqual(registry.getToolDefinitions(), [
      {
        name: 'echo',
        description: 'Echo the input back',
        input_schema: { type: 'object', properties: { value: { type: 'string' } } },
      },
    ]);
  });

  test('remote tools cannot take a built-in name', async () => {
    const registry = new ToolRegistry();
    const builtin = createWeatherTool({
      async getWeather() {
        return { ok: false, kind: 'config', text: 'builtin' };
      },
    });
    registry.register(builtin);

    assert.equal(registry.register({ ...echoTool, name: 'get_weather' }), false);
    assert.equal(registry.get('get_weather'), builtin);
    assert.equal(registry.register(echoTool), true);
    assert.deepEqual(registry.getAllNames('mcp'), ['echo']);
    assert.deepEqual(registry.getAllNames(), ['get_weather', 'echo']);
  });

  test('executes a tool by name', async () => {
    const registry = new ToolRegistry();
    registry.register(echoTool);
    assert.deepEqual(await registry.execute('echo', { value: 'ping' }), { content: 'ping' });
  });

  test('unknown tools are an error result', async () => {
    const registry = new ToolRegistry();
    assert.deepEqual(await registry.execute('nope', {}), { content: 'Unknown tool: nope', isError: true });
  });

  test('exceptions thrown by a tool become an error result', async () => {
    const registry = new ToolRegistry();
    registry.register(
      createWeatherTool({
        async getWeather() {
          throw new Error('provider exploded');
        },
      }),
    );

    assert.deepEqual(await registry.execute('get_weather', { location: 'Oslo' }), {
      content: 'Tool error: provider exploded',
      isError: true,
    });
  });
});

describe('McpToolServer', () => {
  test('tool calls before connecting report the missing connection', async () => {
    const server = new McpToolServer({ url: 'http://localhost:9/mcp', timeoutSeconds: 1 });
    assert.deepEqual(await server.callTool('search', {}), {
      content: 'MCP server is not connected',
      isError: true,
    });
  });

  test('listing tools before connecting throws', async () => {
    const server = new McpToolServer({ url: 'http://localhost:9/mcp', timeoutSeconds: 1 });
    await assert.rejects(server.registerTools(new ToolRegistry()), { message: 'MCP server is not connected' });
  });
});

describe('buildSystemPrompt', () => {
  test('names the agent and numbers its tools', () => {
    const prompt = buildSystemPrompt('Test-Agent', 'Answers questions.', ['get_weather', 'search']);

    assert.ok(prompt.startsWith('You are Test-Agent. Answers questions.\n'));
    assert.ok(prompt.includes('\n1. get_weather\n2. search\n'));
  });

  test('says so when there are no tools', () => {
    const prompt = buildSystemPrompt('Test-Agent', 'Answers questions.', []);
    assert.ok(prompt.includes('following tools:\n(none)\n'));
  });
});
