import { config } from '../config';
import { QueryRunner } from '../agent/facade';
import { errorMessage, isRecord } from '../utils/guards';

export interface ChannelAccount {
  id: string;
  name?: string;
}

export interface ConversationAccount {
  id: string;
}

export interface Activity {
  type: string;
  id?: string;
  text?: string;
  channelId?: string;
  serviceUrl?: string;
  conversation?: ConversationAccount;
  from?: ChannelAccount;
  recipient?: ChannelAccount;
  membersAdded?: ChannelAccount[];
}

/** Errors mentioning this host come from placeholder service URLs used in testing. */
export const TEST_SERVICE_HOST_MARKER = 'test.com';

export const EMPTY_MESSAGE_PROMPT = 'Please send a message.';
export const TURN_ERROR_REPLY = 'Sorry, an error occurred.';

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function parseAccount(value: unknown): ChannelAccount | undefined {
  if (!isRecord(value) || typeof value.id !== 'string') return undefined;
  return { id: value.id, name: optionalString(value.name) };
}

/**
 * Build a typed Activity from a JSON body whose `type` has already been checked.
 * Fields with the wrong shape are dropped.
 */
export function parseActivity(type: string, body: Record<string, unknown>): Activity {
  const conversation = isRecord(body.conversation) && typeof body.conversation.id === 'string'
    ? { id: body.conversation.id }
    : undefined;

  const membersAdded = Array.isArray(body.membersAdded)
    ? body.membersAdded.map(parseAccount).filter((m): m is ChannelAccount => m !== undefined)
    : undefined;

  return {
    type,
    id: optionalString(body.id),
    text: optionalString(body.text),
    channelId: optionalString(body.channelId),
    serviceUrl: optionalString(body.serviceUrl),
    conversation,
    from: parseAccount(body.from),
    recipient: parseAccount(body.recipient),
    membersAdded,
  };
}

/** Delivery primitive: send `text` back into the conversation `inbound` came from. */
export interface ActivitySender {
  sendActivity(inbound: Activity, text: string): Promise<void>;
}

/**
 * Posts reply activities to the channel's connector service:
 *   POST {serviceUrl}/v3/conversations/{conversationId}/activities/{replyToId}
 */
export class ConnectorSender implements ActivitySender {
  constructor(private readonly timeoutMs: number = config.bot.replyTimeoutMs) {}

  async sendActivity(inbound: Activity, text: string): Promise<void> {
    if (!inbound.serviceUrl) {
      throw new Error('Activity has no serviceUrl to reply to');
    }
    const conversationId = inbound.conversation?.id;
    if (!conversationId) {
      throw new Error('Activity has no conversation id to reply to');
    }

    const base = inbound.serviceUrl.replace(/\/+$/, '');
    let url = `${base}/v3/conversations/${encodeURIComponent(conversationId)}/activities`;
    if (inbound.id) url += `/${encodeURIComponent(inbound.id)}`;

    const reply = {
      type: 'message',
      text,
      channelId: inbound.channelId,
      conversation: inbound.conversation,
      from: inbound.recipient,
      recipient: inbound.from,
      replyToId: inbound.id,
    };

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      let res: Response;
      try {
        res = await fetch(url, {
          method: 'POST',
          headers: { 'Content-Type': 'application/json' },
          body: JSON.stringify(reply),
          signal: controller.signal,
        });
      } catch (err) {
        throw new Error(`Failed to send reply to ${base}: ${errorMessage(err)}`, { cause: err });
      }

      if (!res.ok) {
        const body = await res.text().catch(() => '');
        throw new Error(`Reply to ${base} failed: ${res.status} ${body}`.trim());
      }
    } finally {
      clearTimeout(timer);
    }
  }
}

type Reply = (text: string) => Promise<void>;

/**
 * Bot Activity channel adapter.
 *
 * Message activities are answered with the agent's reply; conversation updates
 * greet every member that joined other than the bot itself. Anything that
 * escapes a turn is logged and answered with a generic apology.
 */
export class BotActivityAdapter {
  constructor(
    private readonly agent: QueryRunner,
    private readonly agentName: string,
    private readonly sender: ActivitySender = new ConnectorSender(),
  ) {}

  async processActivity(activity: Activity): Promise<void> {
    const reply: Reply = (text) => this.sender.sendActivity(activity, text);

    try {
      await this.dispatch(activity, reply);
    } catch (err) {
      console.error(`[bot] Turn error: ${errorMessage(err)}`);
      if (err instanceof Error && err.stack) console.error(err.stack);
      try {
        await reply(TURN_ERROR_REPLY);
      } catch (sendErr) {
        console.error(`[bot] Could not deliver error reply: ${errorMessage(sendErr)}`);
      }
    }
  }

  private async dispatch(activity: Activity, reply: Reply): Promise<void> {
    switch (activity.type) {
      case 'message':
        await this.onMessage(activity, reply);
        return;
      case 'conversationUpdate':
        await this.onMembersAdded(activity, reply);
        return;
      default:
        console.log(`[bot] Ignoring activity type: ${activity.type}`);
    }
  }

  private async onMessage(activity: Activity, reply: Reply): Promise<void> {
    try {
      const text = (activity.text ?? '').trim();
      if (!text) {
        await reply(EMPTY_MESSAGE_PROMPT);
        return;
      }

      console.log(`[bot] Received message: ${text.slice(0, 200)}`);
      const answer = await this.agent.runQuery(text);
      console.log(`[bot] Sending response: ${answer.slice(0, 100)}`);
      await reply(answer);
    } catch (err) {
      const msg = errorMessage(err);
      console.error(`[bot] Error in message turn: ${msg}`);

      // Placeholder service URLs fail on every reply; the user never sees those
      if (msg.includes(TEST_SERVICE_HOST_MARKER)) return;

      await reply(`Sorry, I encountered an error: ${msg}`);
    }
  }

  private async onMembersAdded(activity: Activity, reply: Reply): Promise<void> {
    const botId = activity.recipient?.id;
    for (const member of activity.membersAdded ?? []) {
      if (member.id !== botId) {
        await reply(`Hello! I'm ${this.agentName}. How can I help you?`);
      }
    }
  }
}
