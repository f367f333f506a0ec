import express, { NextFunction, Request, Response } from 'express';
import { A2AHandler } from '../a2a/handler';
import { BotActivityAdapter } from '../channels/bot-activity';
import { errorMessage, isRecord } from '../utils/guards';
import { classifyEnvelope } from './envelope';

export interface ServerDeps {
  agentName: string;
  a2a: A2AHandler;
  bot: BotActivityAdapter;
}

function requireJsonContentType(req: Request, res: Response, next: NextFunction): void {
  // Media types are case-insensitive
  const contentType = (req.get('content-type') ?? '').toLowerCase();
  if (!contentType.includes('application/json')) {
    console.warn(`[server] Invalid content type: ${contentType || '(none)'}`);
    res.status(415).type('text/plain').send('Content-Type must be application/json');
    return;
  }
  next();
}

function isBodyParseError(err: unknown): boolean {
  return isRecord(err) && err.type === 'entity.parse.failed';
}

export function createServer(deps: ServerDeps) {
  const app = express();

  app.get('/health', (_req, res) => {
    res.json({ status: 'healthy', agent: deps.agentName });
  });

  // Single endpoint for both dialects: A2A JSON-RPC and Bot Activity
  app.post('/api/messages', requireJsonContentType, express.json(), async (req: Request, res: Response) => {
    console.log(`[server] Incoming request from ${req.ip ?? 'unknown'}`);

    try {
      const envelope = classifyEnvelope(req.body);

      switch (envelope.dialect) {
        case 'jsonrpc': {
          console.log(`[server] JSON-RPC (A2A) request: ${envelope.request.method}`);
          const result = await deps.a2a.handle(envelope.request);
          res.status(result.status).json(result.body);
          return;
        }
        case 'activity': {
          console.log(`[server] Bot Activity: ${envelope.activity.type}`);
          await deps.bot.processActivity(envelope.activity);
          res.status(201).end();
          return;
        }
        case 'invalid':
          console.warn(`[server] Rejected request: ${envelope.reason}`);
          res.status(400).type('text/plain').send(envelope.reason);
          return;
      }
    } catch (err) {
      console.error('[server] Error in messages endpoint:', err);
      res.status(500).type('text/plain').send(`Internal server error: ${errorMessage(err)}`);
    }
  });

  // body-parser rejects malformed JSON before the route runs
  app.use((err: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (isBodyParseError(err)) {
      res.status(400).type('text/plain').send('Invalid JSON body');
      return;
    }
    next(err);
  });

  return app;
}
