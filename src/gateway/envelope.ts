import { JsonRpcId, JsonRpcRequest } from '../a2a/types';
import { Activity, parseActivity } from '../channels/bot-activity';
import { isRecord } from '../utils/guards';

export type ClassifiedEnvelope =
  | { dialect: 'jsonrpc'; request: JsonRpcRequest }
  | { dialect: 'activity'; activity: Activity }
  | { dialect: 'invalid'; reason: string };

function toJsonRpcId(value: unknown): JsonRpcId {
  return typeof value === 'string' || typeof value === 'number' ? value : null;
}

/**
 * Decide which dialect an inbound body speaks. A body with a `jsonrpc` key and
 * a truthy `method` is JSON-RPC; anything else must carry an activity `type`.
 */
export function classifyEnvelope(body: unknown): ClassifiedEnvelope {
  if (!isRecord(body)) {
    return { dialect: 'invalid', reason: 'Missing activity type' };
  }

  if ('jsonrpc' in body && body.method) {
    return {
      dialect: 'jsonrpc',
      request: {
        jsonrpc: String(body.jsonrpc),
        method: String(body.method),
        params: body.params,
        id: toJsonRpcId(body.id),
      },
    };
  }

  if (typeof body.type !== 'string' || !body.type) {
    return { dialect: 'invalid', reason: 'Missing activity type' };
  }

  return { dialect: 'activity', activity: parseActivity(body.type, body) };
}
