/**
 * JSON-RPC over stdio
 *
 * One JSON-RPC 2.0 message per line in, one reply per line out. Requests
 * are handled concurrently, so replies may come back out of order; the
 * id ties them together. Notifications (no id) never get a reply.
 */

import { createInterface } from 'node:readline';
import { z } from 'zod';

import { getErrorMessage } from '../errors/index.js';
import { silentLogger, type Logger } from '../utils/index.js';
import { RpcError, RpcErrorCode, Session } from './session.js';
import type { ToolRegistry } from './tools.js';
import type { JsonRpcId, JsonRpcResponse } from './types.js';

export const PROTOCOL_VERSION = '2024-11-05';

const RequestSchema = z.object({
  jsonrpc: z.literal('2.0'),
  id: z.union([z.string(), z.number(), z.null()]).optional(),
  method: z.string().min(1),
  params: z.unknown().optional(),
});

const InitializeParamsSchema = z
  .object({
    protocolVersion: z.string().optional(),
    clientInfo: z.object({ name: z.string() }).passthrough().optional(),
  })
  .passthrough()
  .optional();

const CallParamsSchema = z.object({
  name: z.string().min(1),
  arguments: z.record(z.unknown()).optional(),
});

export interface ServerInfo {
  name: string;
  version: string;
}

export interface RpcServerOptions {
  serverInfo: ServerInfo;
  logger?: Logger;
}

function idOf(value: unknown): JsonRpcId {
  if (typeof value === 'object' && value !== null && 'id' in value) {
    const { id } = value;
    if (typeof id === 'string' || typeof id === 'number') return id;
  }
  return null;
}

function failure(id: JsonRpcId, code: number, message: string, data?: unknown): JsonRpcResponse {
  return {
    jsonrpc: '2.0',
    id,
    error: data === undefined ? { code, message } : { code, message, data },
  };
}

export class RpcServer {
  readonly session = new Session();
  private readonly logger: Logger;

  constructor(
    private readonly registry: ToolRegistry,
    private readonly options: RpcServerOptions
  ) {
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Handle one inbound line. Resolves to the reply, or null when none is
   * due (blank line or notification).
   */
  async handleMessage(line: string): Promise<JsonRpcResponse | null> {
    const text = line.trim();
    if (!text) return null;

    let message: unknown;
    try {
      message = JSON.parse(text);
    } catch (error) {
      return failure(null, RpcErrorCode.PARSE_ERROR, `Parse error: ${getErrorMessage(error)}`);
    }

    const parsed = RequestSchema.safeParse(message);
    if (!parsed.success) {
      return failure(idOf(message), RpcErrorCode.INVALID_REQUEST, 'Invalid request');
    }

    const { id, method, params } = parsed.data;

    try {
      const result = await this.dispatch(method, params);
      return id === undefined ? null : { jsonrpc: '2.0', id, result };
    } catch (error) {
      if (id === undefined) {
        this.logger.debug?.(`Notification ${method} failed: ${getErrorMessage(error)}`);
        return null;
      }
      if (error instanceof RpcError) {
        return failure(id, error.code, error.message, error.data);
      }
      this.logger.warn(`${method} failed: ${getErrorMessage(error)}`);
      return failure(id, RpcErrorCode.INTERNAL_ERROR, getErrorMessage(error));
    }
  }

  private async dispatch(method: string, params: unknown): Promise<unknown> {
    switch (method) {
      case 'initialize':
        return this.initialize(params);
      case 'ping':
        return {};
      case 'notifications/initialized':
      case 'notifications/cancelled':
        return {};
    }

    this.session.assertReady();

    switch (method) {
      case 'tools/list':
        return { tools: this.registry.list() };
      case 'tools/call':
        return this.callTool(params);
      case 'shutdown':
        this.session.close();
        return {};
      default:
        throw new RpcError(`Method not found: ${method}`, RpcErrorCode.METHOD_NOT_FOUND);
    }
  }

  private initialize(params: unknown): unknown {
    const parsed = InitializeParamsSchema.safeParse(params);
    if (!parsed.success) {
      throw new RpcError('Invalid initialize params', RpcErrorCode.INVALID_PARAMS);
    }

    this.session.initialize(parsed.data?.clientInfo?.name);
    this.logger.info?.(`Session initialized${this.session.client ? ` by ${this.session.client}` : ''}`);

    return {
      protocolVersion: parsed.data?.protocolVersion ?? PROTOCOL_VERSION,
      capabilities: { tools: {} },
      serverInfo: this.options.serverInfo,
    };
  }

  private async callTool(params: unknown): Promise<unknown> {
    const parsed = CallParamsSchema.safeParse(params);
    if (!parsed.success) {
      throw new RpcError('tools/call needs a tool name', RpcErrorCode.INVALID_PARAMS);
    }

    const { name } = parsed.data;
    if (!this.registry.has(name)) {
      throw new RpcError(`Unknown tool: ${name}`, RpcErrorCode.INVALID_PARAMS);
    }

    const result = await this.registry.call(name, parsed.data.arguments ?? {});
    return {
      content: [{ type: 'text', text: JSON.stringify(result, null, 2) }],
      isError: !result.success,
    };
  }
}

export interface StdioStreams {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
}

/**
 * Serve until the input ends or a `shutdown` request closes the session.
 * In-flight requests are answered before the returned promise resolves.
 */
export function serveStdio(server: RpcServer, streams: StdioStreams, logger: Logger = silentLogger): Promise<void> {
  const rl = createInterface({ input: streams.input, terminal: false });
  const pending = new Set<Promise<void>>();

  return new Promise((resolve, reject) => {
    rl.on('line', (line) => {
      const task = server
        .handleMessage(line)
        .then((response) => {
          if (response) {
            streams.output.write(`${JSON.stringify(response)}\n`);
          }
          if (server.session.state === 'CLOSED') {
            rl.close();
          }
        })
        .catch((error: unknown) => {
          logger.warn(`Failed to answer request: ${getErrorMessage(error)}`);
        })
        .finally(() => {
          pending.delete(task);
        });
      pending.add(task);
    });

    rl.on('close', () => {
      Promise.all([...pending]).then(() => {
        server.session.close();
        resolve();
      }, reject);
    });
  });
}
