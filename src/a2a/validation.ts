/**
 * Schema check for `message/send` success responses, following the A2A
 * SendMessageSuccessResponse shape (result is a Task or a Message).
 */

import { z } from 'zod';

const TextPartSchema = z.object({
  kind: z.literal('text'),
  text: z.string(),
  metadata: z.record(z.unknown()).optional(),
});

const FilePartSchema = z.object({
  kind: z.literal('file'),
  file: z.union([
    z.object({ bytes: z.string(), name: z.string().optional(), mimeType: z.string().optional() }),
    z.object({ uri: z.string(), name: z.string().optional(), mimeType: z.string().optional() }),
  ]),
  metadata: z.record(z.unknown()).optional(),
});

const DataPartSchema = z.object({
  kind: z.literal('data'),
  data: z.record(z.unknown()),
  metadata: z.record(z.unknown()).optional(),
});

const PartSchema = z.discriminatedUnion('kind', [TextPartSchema, FilePartSchema, DataPartSchema]);

export const MessageSchema = z.object({
  kind: z.literal('message'),
  messageId: z.string().min(1),
  role: z.enum(['user', 'agent']),
  parts: z.array(PartSchema),
  contextId: z.string().optional(),
  taskId: z.string().optional(),
  metadata: z.record(z.unknown()).optional(),
});

export const TaskSchema = z.object({
  kind: z.literal('task'),
  id: z.string().min(1),
  contextId: z.string().min(1),
  status: z.object({
    state: z.enum([
      'submitted',
      'working',
      'input-required',
      'completed',
      'canceled',
      'failed',
      'rejected',
      'auth-required',
      'unknown',
    ]),
    message: MessageSchema.optional(),
    timestamp: z.string().optional(),
  }),
  history: z.array(MessageSchema).optional(),
  metadata: z.record(z.unknown()).optional(),
});

export const SendMessageSuccessResponseSchema = z.object({
  jsonrpc: z.literal('2.0'),
  id: z.union([z.string(), z.number(), z.null()]),
  result: z.union([TaskSchema, MessageSchema]),
});

export type ValidationResult = { valid: true } | { valid: false; issues: string[] };

export function validateSendMessageResponse(response: unknown): ValidationResult {
  const parsed = SendMessageSuccessResponseSchema.safeParse(response);
  if (parsed.success) {
    return { valid: true };
  }
  return {
    valid: false,
    issues: parsed.error.errors.map((err) => `${err.path.join('.') || '(root)'}: ${err.message}`),
  };
}
