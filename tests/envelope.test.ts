/**
 * Envelope classification tests.
 *
 * Run: npx tsx --test tests/envelope.test.ts
 */

import assert from 'node:assert/strict';
import { test, describe } from 'node:test';
import { classifyEnvelope } from '../src/gateway/envelope';

describe('classifyEnvelope: JSON-RPC', () => {
  test('jsonrpc key plus method selects the JSON-RPC dialect', () => {
    const result = classifyEnvelope({ jsonrpc: '2.0', id: 7, method: 'message/send', params: { a: 1 } });
    assert.deepEqual(result, {
      dialect: 'jsonrpc',
      request: { jsonrpc: '2.0', id: 7, method: 'message/send', params: { a: 1 } },
    });
  });

  test('unsupported methods are still JSON-RPC', () => {
    const result = classifyEnvelope({ jsonrpc: '2.0', id: 'abc', method: 'tasks/cancel' });
    assert.equal(result.dialect, 'jsonrpc');
  });

  test('non-scalar ids are echoed as null', () => {
    const result = classifyEnvelope({ jsonrpc: '2.0', id: { nested: true }, method: 'tasks/get' });
    assert.equal(result.dialect === 'jsonrpc' && result.request.id, null);
  });

  test('an empty method falls through to activity handling', () => {
    const result = classifyEnvelope({ jsonrpc: '2.0', method: '', type: 'message' });
    assert.equal(result.dialect, 'activity');
  });
});

describe('classifyEnvelope: Activity', () => {
  test('typed body becomes an activity with its known fields', () => {
    const result = classifyEnvelope({
      type: 'message',
      id: 'act-1',
      text: 'hello',
      serviceUrl: 'https://connector.example',
      conversation: { id: 'conv-1' },
      from: { id: 'user-1', name: 'User' },
      recipient: { id: 'bot-1' },
      extra: 'ignored',
    });

    assert.deepEqual(result, {
      dialect: 'activity',
      activity: {
        type: 'message',
        id: 'act-1',
        text: 'hello',
        channelId: undefined,
        serviceUrl: 'https://connector.example',
        conversation: { id: 'conv-1' },
        from: { id: 'user-1', name: 'User' },
        recipient: { id: 'bot-1', name: undefined },
        membersAdded: undefined,
      },
    });
  });

  test('membersAdded entries without an id are dropped', () => {
    const result = classifyEnvelope({
      type: 'conversationUpdate',
      membersAdded: [{ id: 'u1' }, { name: 'no id' }, 'junk'],
    });
    assert.equal(result.dialect, 'activity');
    if (result.dialect === 'activity') {
      assert.deepEqual(result.activity.membersAdded, [{ id: 'u1', name: undefined }]);
    }
  });

  test('missing type is invalid', () => {
    assert.deepEqual(classifyEnvelope({ text: 'hi' }), { dialect: 'invalid', reason: 'Missing activity type' });
  });

  test('arrays and scalars are invalid', () => {
    assert.equal(classifyEnvelope([{ type: 'message' }]).dialect, 'invalid');
    assert.equal(classifyEnvelope('message').dialect, 'invalid');
    assert.equal(classifyEnvelope(null).dialect, 'invalid');
  });
});
