/**
 * Tool Server Module
 *
 * The tool surface over shared services, and the JSON-RPC stdio loop that
 * exposes it to an agent.
 *
 * @example
 * ```ts
 * import { createToolServer, serveStdio } from './server/index.js';
 *
 * const server = createToolServer(services);
 * await serveStdio(server, { input: process.stdin, output: process.stdout });
 * ```
 */

import type { Services } from '../services.js';
import type { Logger } from '../utils/index.js';
import { VERSION } from '../version.js';
import { RpcServer } from './stdio.js';
import { ToolRegistry, createTools } from './tools.js';

export { Session, SessionError, RpcError, RpcErrorCode } from './session.js';
export { ToolRegistry, createTools, defineTool, withTimeout, type ToolRegistryOptions } from './tools.js';
export {
  RpcServer,
  serveStdio,
  PROTOCOL_VERSION,
  type ServerInfo,
  type RpcServerOptions,
  type StdioStreams,
} from './stdio.js';
export type {
  Tool,
  ToolDefinition,
  ToolDescriptor,
  ToolResult,
  SessionState,
  JsonRpcId,
  JsonRpcError,
  JsonRpcResponse,
} from './types.js';

export const SERVER_NAME = 'doc-retriever';

/**
 * Registry plus protocol server over `services`, with the configured
 * per-call timeout.
 */
export function createToolServer(services: Services, logger: Logger = services.logger): RpcServer {
  const registry = new ToolRegistry(createTools(services), {
    timeoutMs: services.config.server.tool_timeout_ms,
    logger,
  });
  return new RpcServer(registry, {
    serverInfo: { name: SERVER_NAME, version: VERSION },
    logger,
  });
}
