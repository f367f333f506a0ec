export interface AgentMessage {
  role: 'user' | 'assistant';
  text: string;
}

/**
 * What an agent capability hands back. Implementations may fill in a
 * top-level text, a transcript, or both.
 */
export interface AgentRunResult {
  text?: string;
  messages?: AgentMessage[];
}

export interface AgentCapability {
  run(query: string): Promise<AgentRunResult>;
}

export type AgentReply =
  | { kind: 'plain-text'; text: string }
  | { kind: 'message-list'; messages: AgentMessage[] };

/**
 * Collapse a run result into a tagged reply: the top-level text wins, then
 * the transcript, then the serialized result.
 */
export function normalizeRunResult(result: AgentRunResult): AgentReply {
  if (result.text) {
    return { kind: 'plain-text', text: result.text };
  }
  if (result.messages && result.messages.length > 0) {
    return { kind: 'message-list', messages: result.messages };
  }
  return { kind: 'plain-text', text: JSON.stringify(result) };
}

/** Text shown to the user: a message list answers with its last assistant turn. */
export function replyText(reply: AgentReply): string {
  switch (reply.kind) {
    case 'plain-text':
      return reply.text;
    case 'message-list': {
      const last = reply.messages.filter((m) => m.role === 'assistant').pop();
      return last ? last.text : '';
    }
  }
}
