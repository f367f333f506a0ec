import { errorMessage } from '../utils/guards';
import { AgentReply, replyText } from './reply';
import { QueryRouter, RouteName } from './router';

export type AgentOutcome =
  | { ok: true; route: RouteName; reply: AgentReply }
  | { ok: false; error: string };

/** The one thing both transport handlers need from the agent. */
export interface QueryRunner {
  runQuery(query: string): Promise<string>;
}

export class AgentFacade implements QueryRunner {
  constructor(
    public readonly agentName: string,
    private readonly router: QueryRouter,
  ) {}

  async run(query: string): Promise<AgentOutcome> {
    try {
      const { route, reply } = await this.router.classifyAndRun(query);
      return { ok: true, route, reply };
    } catch (err) {
      const error = errorMessage(err);
      console.error('[agent] Error processing query:', error);
      return { ok: false, error };
    }
  }

  async runQuery(query: string): Promise<string> {
    const outcome = await this.run(query);
    if (!outcome.ok) {
      return `Error processing query: ${outcome.error}`;
    }
    return replyText(outcome.reply);
  }
}
