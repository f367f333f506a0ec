#!/usr/bin/env node

/**
 * weather-agent CLI
 *
 * Talks to the agent in-process, without the HTTP gateway.
 *
 * Usage:
 *   weather-agent "weather in Lisbon"     one query, then exit
 *   weather-agent                          interactive session (quit / exit / q to leave)
 */

import * as readline from 'readline';
import { config } from '../config';
import { AgentFacade, createAgent } from '../agent';

const EXIT_WORDS = new Set(['quit', 'exit', 'q']);

// --- Helpers ---

function bold(text: string): string {
  return `\x1b[1m${text}\x1b[0m`;
}

function dim(text: string): string {
  return `\x1b[2m${text}\x1b[0m`;
}

function red(text: string): string {
  return `\x1b[31m${text}\x1b[0m`;
}

function die(message: string): never {
  console.error(red(`Error: ${message}`));
  process.exit(1);
}

// --- Modes ---

async function runOnce(agent: AgentFacade, query: string): Promise<void> {
  console.log(`Query: ${query}`);
  const response = await agent.runQuery(query);
  console.log(`Response: ${response}`);
}

async function runInteractive(agent: AgentFacade): Promise<void> {
  console.log(bold(`${agent.agentName} is ready!`));
  console.log(`Description: ${config.agentDescription}`);
  console.log(dim("Type 'quit' or 'exit' to end the conversation.\n"));

  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  rl.on('SIGINT', () => rl.close());
  rl.setPrompt(`${bold('You')}: `);
  rl.prompt();

  for await (const line of rl) {
    const input = line.trim();

    if (EXIT_WORDS.has(input.toLowerCase())) break;

    if (input) {
      console.log(dim('Thinking...'));
      const response = await agent.runQuery(input);
      console.log(`\n${bold(agent.agentName)}: ${response}\n`);
    }

    rl.prompt();
  }

  rl.close();
  console.log('Goodbye!');
}

async function main(): Promise<void> {
  if (!config.anthropicApiKey) {
    die('ANTHROPIC_API_KEY is not set. Set it in the environment and try again.');
  }

  const agent = createAgent();
  const query = process.argv.slice(2).join(' ').trim();

  if (query) {
    await runOnce(agent, query);
  } else {
    await runInteractive(agent);
  }
}

main().catch((err) => {
  die(err instanceof Error ? err.message : String(err));
});
