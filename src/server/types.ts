/**
 * Tool Server Types
 */

import type { z } from 'zod';

/**
 * Every tool answers with `success`; failures carry `error`, successes
 * carry tool-specific fields.
 */
export interface ToolResult {
  success: boolean;
  error?: string;
  [key: string]: unknown;
}

/**
 * A tool with typed arguments, as written in tools.ts.
 */
export interface ToolDefinition<Schema extends z.ZodTypeAny> {
  name: string;
  description: string;
  parameters: Schema;
  execute: (args: z.infer<Schema>) => Promise<ToolResult>;
}

/**
 * A tool after its argument type is erased: `run` validates raw input
 * before executing.
 */
export interface Tool {
  name: string;
  description: string;
  parameters: z.ZodTypeAny;
  run: (rawArgs: unknown) => Promise<ToolResult>;
}

/** What tools/list advertises */
export interface ToolDescriptor {
  name: string;
  description: string;
  inputSchema: unknown;
}

export type SessionState = 'UNINITIALIZED' | 'READY' | 'CLOSED';

export type JsonRpcId = string | number | null;

export interface JsonRpcError {
  code: number;
  message: string;
  data?: unknown;
}

export type JsonRpcResponse =
  | { jsonrpc: '2.0'; id: JsonRpcId; result: unknown }
  | { jsonrpc: '2.0'; id: JsonRpcId; error: JsonRpcError };
