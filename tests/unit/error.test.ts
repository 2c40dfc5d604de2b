import { describe, it, expect } from 'vitest';
import {
  ShellError,
  IdentityError,
  CryptoError,
  PacketError,
  ProtocolError,
  NetworkError,
  ConnectionError,
  RejectedError,
  SessionError,
  ExecutionError,
  AuthError,
  TimeoutError,
  ConfigError,
  errorMessage,
} from '../../src/error.js';

describe('Error Types', () => {
  describe('ShellError', () => {
    it('creates error with type and context', () => {
      const error = new ShellError('Identity', { key: 'value' }, 'Something went wrong');
      expect(error.type).toBe('Identity');
      expect(error.context).toEqual({ key: 'value' });
      expect(error.message).toBe('Something went wrong');
      expect(error instanceof Error).toBe(true);
    });

    it('has proper Error stack trace', () => {
      const error = new ShellError('Packet', {}, 'Test error');
      expect(error.stack).toBeDefined();
      expect(error.stack).toContain('ShellError');
    });
  });

  describe('subclasses', () => {
    it.each([
      [new IdentityError('x'), 'Identity', 'IdentityError'],
      [new CryptoError('x'), 'Crypto', 'CryptoError'],
      [new PacketError('x'), 'Packet', 'PacketError'],
      [new NetworkError('x'), 'Network', 'NetworkError'],
      [new ConnectionError('x'), 'Connection', 'ConnectionError'],
      [new SessionError('x'), 'Session', 'SessionError'],
      [new ExecutionError('x'), 'Execution', 'ExecutionError'],
      [new AuthError('x'), 'Auth', 'AuthError'],
      [new TimeoutError('x'), 'Timeout', 'TimeoutError'],
    ])('%s carries its type and name', (error, type, name) => {
      expect(error.type).toBe(type);
      expect(error.name).toBe(name);
      expect(error).toBeInstanceOf(ShellError);
      expect(error.context).toEqual({});
    });

    it('keeps instanceof across the hierarchy', () => {
      const error = new NetworkError('Handshake failed', { reply: 'HELLO REPLY RESULT=NOVERSION' });
      expect(error instanceof NetworkError).toBe(true);
      expect(error instanceof ConnectionError).toBe(false);
      expect(error.context.reply).toBe('HELLO REPLY RESULT=NOVERSION');
    });
  });

  describe('ProtocolError', () => {
    it('carries a machine-readable code', () => {
      const error = new ProtocolError('MessageTooLarge', 'Message too large', { size: 2 });
      expect(error.code).toBe('MessageTooLarge');
      expect(error.type).toBe('Protocol');
      expect(error.context.size).toBe(2);
    });
  });

  describe('RejectedError', () => {
    it('is a ConnectionError with reason and code', () => {
      const error = new RejectedError('Maximum sessions reached', 4);
      expect(error).toBeInstanceOf(ConnectionError);
      expect(error.message).toBe('Server rejected connection: Maximum sessions reached');
      expect(error.reason).toBe('Maximum sessions reached');
      expect(error.errorCode).toBe(4);
      expect(error.context).toEqual({ errorCode: 4 });
    });
  });

  describe('ConfigError', () => {
    it('carries validation issues', () => {
      const issues = [{ field: 'maxSessions', message: 'maxSessions must be a positive integer', value: 0 }];
      const error = new ConfigError('Invalid server configuration', issues);
      expect(error.type).toBe('Config');
      expect(error.errors).toEqual(issues);
    });
  });

  describe('errorMessage', () => {
    it('reads Error messages and stringifies anything else', () => {
      expect(errorMessage(new Error('boom'))).toBe('boom');
      expect(errorMessage('plain')).toBe('plain');
      expect(errorMessage(42)).toBe('42');
    });
  });
});
