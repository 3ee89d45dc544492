/**
 * Session State Machine
 *
 * UNINITIALIZED ──initialize──▶ READY ──close──▶ CLOSED
 *
 * Only `initialize` and `ping` are served before READY. Nothing is served
 * once CLOSED.
 */

import type { SessionState } from './types.js';

/** JSON-RPC error codes used by the server */
export const RpcErrorCode = {
  PARSE_ERROR: -32700,
  INVALID_REQUEST: -32600,
  METHOD_NOT_FOUND: -32601,
  INVALID_PARAMS: -32602,
  INTERNAL_ERROR: -32603,
  SESSION_CLOSED: -32000,
  NOT_INITIALIZED: -32002,
} as const;

/**
 * A failure that maps onto a JSON-RPC error object.
 */
export class RpcError extends Error {
  constructor(
    message: string,
    readonly code: number,
    readonly data?: unknown
  ) {
    super(message);
    this.name = 'RpcError';
  }
}

export class SessionError extends RpcError {
  constructor(message: string, code: number) {
    super(message, code);
    this.name = 'SessionError';
  }
}

export class Session {
  private current: SessionState = 'UNINITIALIZED';
  private clientName: string | undefined;

  get state(): SessionState {
    return this.current;
  }

  get client(): string | undefined {
    return this.clientName;
  }

  /**
   * Re-initializing a READY session is allowed and keeps it READY.
   *
   * @throws SessionError once closed
   */
  initialize(clientName?: string): void {
    if (this.current === 'CLOSED') {
      throw new SessionError('Session is closed', RpcErrorCode.SESSION_CLOSED);
    }
    this.current = 'READY';
    this.clientName = clientName ?? this.clientName;
  }

  close(): void {
    this.current = 'CLOSED';
  }

  /**
   * @throws SessionError unless READY
   */
  assertReady(): void {
    if (this.current === 'UNINITIALIZED') {
      throw new SessionError('Server not initialized', RpcErrorCode.NOT_INITIALIZED);
    }
    if (this.current === 'CLOSED') {
      throw new SessionError('Session is closed', RpcErrorCode.SESSION_CLOSED);
    }
  }
}
