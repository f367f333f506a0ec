import { config } from './config';
import { createServer } from './gateway/server';
import { A2AHandler } from './a2a/handler';
import { TaskStore } from './a2a/store';
import { BotActivityAdapter } from './channels/bot-activity';
import { createAgent } from './agent';
import { McpToolServer } from './agent/mcp/client';
import { toolRegistry } from './agent/tools';
import { errorMessage } from './utils/guards';

async function connectMcpServer(): Promise<void> {
  if (!config.mcp.serverUrl) return;

  const server = new McpToolServer({ url: config.mcp.serverUrl, timeoutSeconds: config.mcp.timeoutSeconds });
  try {
    await server.connect();
    const names = await server.registerTools(toolRegistry);
    console.log(`[mcp] ${names.length} tool(s) available from ${config.mcp.serverUrl}`);
  } catch (err) {
    console.error(`[mcp] Could not use MCP server ${config.mcp.serverUrl}: ${errorMessage(err)}`);
    await server.close();
  }
}

async function main() {
  console.log('='.repeat(50));
  console.log(`  ${config.agentName} - Bot Activity & A2A gateway`);
  console.log('='.repeat(50));

  if (!config.anthropicApiKey) {
    console.warn('[agent] ANTHROPIC_API_KEY is not set; only weather queries will be answered');
  }
  if (!config.weather.apiKey) {
    console.warn('[weather] OPENWEATHER_API_KEY is not set; weather lookups will report a configuration error');
  }

  const agent = createAgent();
  await connectMcpServer();

  // One task table for the life of the process
  const tasks = new TaskStore();

  const app = createServer({
    agentName: agent.agentName,
    a2a: new A2AHandler(agent, tasks),
    bot: new BotActivityAdapter(agent, agent.agentName),
  });

  app.listen(config.port, config.host, () => {
    console.log(`[server] Listening on http://${config.host}:${config.port}`);
    console.log(`[server] Endpoint: http://localhost:${config.port}/api/messages`);
    console.log(`[server] Health check: http://localhost:${config.port}/health`);
  });
}

main().catch((err) => {
  console.error('[FATAL]', err);
  process.exit(1);
});
