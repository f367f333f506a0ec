/**
 * A2A protocol and JSON-RPC 2.0 types for the subset this gateway serves.
 */

export type JsonRpcId = string | number | null;

export interface JsonRpcRequest {
  jsonrpc: string;
  method: string;
  params?: unknown;
  id?: JsonRpcId;
}

export interface JsonRpcError {
  code: number;
  message: string;
  data?: Record<string, unknown>;
}

export interface JsonRpcSuccessResponse<T> {
  jsonrpc: '2.0';
  id: JsonRpcId;
  result: T;
}

export interface JsonRpcErrorResponse {
  jsonrpc: '2.0';
  id: JsonRpcId;
  error: JsonRpcError;
}

export type JsonRpcResponse<T = Task> = JsonRpcSuccessResponse<T> | JsonRpcErrorResponse;

export enum JsonRpcErrorCode {
  INVALID_REQUEST = -32600,
  METHOD_NOT_FOUND = -32601,
  INVALID_PARAMS = -32602,
  INTERNAL_ERROR = -32603,
  /** A2A-specific: the requested task id was never issued (or predates a restart). */
  TASK_NOT_FOUND = -32001,
}

export type TaskState = 'completed';

export type MessageRole = 'user' | 'agent';

export interface TextPart {
  kind: 'text';
  text: string;
}

export interface Message {
  kind: 'message';
  contextId: string;
  messageId: string;
  taskId: string;
  parts: TextPart[];
  role: MessageRole;
}

export interface TaskStatus {
  state: TaskState;
  message: Message;
}

export interface Task {
  kind: 'task';
  id: string;
  contextId: string;
  history: Message[];
  status: TaskStatus;
}
