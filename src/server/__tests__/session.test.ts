import { describe, it, expect } from 'vitest';

import { RpcErrorCode, Session, SessionError } from '../session.js';

describe('Session', () => {
  it('starts uninitialized and rejects work', () => {
    const session = new Session();

    expect(session.state).toBe('UNINITIALIZED');
    expect(() => session.assertReady()).toThrow(SessionError);
    try {
      session.assertReady();
    } catch (error) {
      expect(error).toMatchObject({ code: RpcErrorCode.NOT_INITIALIZED, message: 'Server not initialized' });
    }
  });

  it('becomes ready on initialize and remembers the client', () => {
    const session = new Session();
    session.initialize('test-client');

    expect(session.state).toBe('READY');
    expect(session.client).toBe('test-client');
    expect(() => session.assertReady()).not.toThrow();
  });

  it('stays ready when initialized twice', () => {
    const session = new Session();
    session.initialize('first');
    session.initialize();

    expect(session.state).toBe('READY');
    expect(session.client).toBe('first');
  });

  it('refuses everything once closed', () => {
    const session = new Session();
    session.initialize();
    session.close();

    expect(session.state).toBe('CLOSED');
    expect(() => session.assertReady()).toThrow('Session is closed');
    expect(() => session.initialize()).toThrow('Session is closed');
  });
});
