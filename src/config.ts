export const config = {
  port: parseInt(process.env.PORT || '3978', 10),
  host: process.env.HOST || '0.0.0.0',

  agentName: process.env.AGENT_NAME || 'Weather-Agent',
  agentDescription:
    process.env.AGENT_DESCRIPTION ||
    'An AI agent that answers user queries and looks up current weather conditions',

  anthropicApiKey: process.env.ANTHROPIC_API_KEY || '',
  agentModel: process.env.AGENT_MODEL || 'claude-sonnet-4-20250514',
  agentMaxTokens: parseInt(process.env.AGENT_MAX_TOKENS || '4096', 10),

  // --- OpenWeatherMap ---
  weather: {
    apiKey: process.env.OPENWEATHER_API_KEY || '',
    baseUrl: process.env.OPENWEATHER_BASE_URL || 'https://api.openweathermap.org',
    timeoutMs: parseInt(process.env.OPENWEATHER_TIMEOUT_MS || '10000', 10),
  },

  // --- External MCP tool server (optional) ---
  mcp: {
    serverUrl: process.env.MCP_SERVER_URL || '',
    timeoutSeconds: parseInt(process.env.MCP_SERVER_TIMEOUT || '30', 10),
  },

  bot: {
    replyTimeoutMs: parseInt(process.env.BOT_REPLY_TIMEOUT_MS || '15000', 10),
  },
};
