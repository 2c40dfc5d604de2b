import { describe, it, expect } from 'vitest';
import {
  MAX_COMMAND_TIMEOUT,
  isClientAllowed,
  validateAddressHex,
  validateClientConfig,
  validateCommandRequest,
  validateControlAddress,
  validateServerConfig,
} from '../../src/validation.js';

const validHex = 'ab'.repeat(32);

const serverFields = {
  maxSessions: 10,
  commandTimeout: 300,
  sessionIdleTimeout: 900,
  allowedClients: [],
  capabilities: ['command-exec'],
  auditLogging: false,
  auditLogPath: 'audit.log',
  controlAddress: '127.0.0.1:7656',
};

const clientFields = {
  serverDestination: validHex,
  connectionTimeout: 30,
  commandTimeout: 300,
  capabilities: ['command-exec'],
  controlAddress: '127.0.0.1:7656',
};

describe('Validation Functions', () => {
  describe('validateAddressHex', () => {
    it('accepts 64 hex characters in either case', () => {
      expect(validateAddressHex(validHex).valid).toBe(true);
      expect(validateAddressHex('AB'.repeat(32)).valid).toBe(true);
    });

    it('rejects empty input', () => {
      const result = validateAddressHex('', 'serverDestination');
      expect(result.errors).toEqual([{ field: 'serverDestination', message: 'serverDestination cannot be empty' }]);
    });

    it('rejects the wrong length', () => {
      const result = validateAddressHex('abcd');
      expect(result.valid).toBe(false);
      expect(result.errors[0].message).toBe('address must be 64 hex characters');
    });

    it('rejects non-hex characters', () => {
      const result = validateAddressHex('zz'.repeat(32));
      expect(result.errors.map((e) => e.message)).toEqual(['address must be hexadecimal']);
    });
  });

  describe('validateControlAddress', () => {
    it('accepts host:port', () => {
      expect(validateControlAddress('127.0.0.1:7656').valid).toBe(true);
      expect(validateControlAddress('router.local:1').valid).toBe(true);
      expect(validateControlAddress('[::1]:65535').valid).toBe(true);
    });

    it('rejects a missing port separator', () => {
      expect(validateControlAddress('localhost').valid).toBe(false);
      expect(validateControlAddress(':7656').valid).toBe(false);
    });

    it('rejects ports outside 1-65535', () => {
      expect(validateControlAddress('localhost:0').valid).toBe(false);
      expect(validateControlAddress('localhost:65536').valid).toBe(false);
      expect(validateControlAddress('localhost:http').valid).toBe(false);
    });
  });

  describe('validateCommandRequest', () => {
    it('accepts a plain command', () => {
      expect(validateCommandRequest({ command: 'ls', args: ['-la'], workingDir: '/tmp', timeout: 5 }).valid).toBe(true);
    });

    it('rejects an empty or blank command', () => {
      expect(validateCommandRequest({ command: '', args: [] }).errors[0].field).toBe('command');
      expect(validateCommandRequest({ command: '   ', args: [] }).valid).toBe(false);
    });

    it('rejects parent traversal in the working directory', () => {
      const result = validateCommandRequest({ command: 'ls', args: [], workingDir: '/tmp/../etc' });
      expect(result.errors).toEqual([
        { field: 'workingDir', message: 'Working directory cannot contain ".."', value: '/tmp/../etc' },
      ]);
    });

    it('rejects a non-positive timeout', () => {
      expect(validateCommandRequest({ command: 'ls', args: [], timeout: 0 }).errors[0].message).toBe(
        'Timeout must be greater than 0',
      );
    });

    it('bounds the timeout to what a timer can hold', () => {
      expect(MAX_COMMAND_TIMEOUT).toBe(2147483);
      expect(validateCommandRequest({ command: 'sleep', args: ['1'], timeout: 2147483 }).valid).toBe(true);
      expect(validateCommandRequest({ command: 'sleep', args: ['1'], timeout: 3_000_000 }).errors).toEqual([
        { field: 'timeout', message: 'Timeout must be at most 2147483 seconds', value: 3_000_000 },
      ]);
    });

    it('accumulates every issue', () => {
      const result = validateCommandRequest({ command: '', args: [], workingDir: '..', timeout: -1 });
      expect(result.errors.map((e) => e.field)).toEqual(['command', 'workingDir', 'timeout']);
    });
  });

  describe('validateServerConfig', () => {
    it('accepts the defaults', () => {
      expect(validateServerConfig(serverFields).valid).toBe(true);
    });

    it('rejects a zero session limit', () => {
      expect(validateServerConfig({ ...serverFields, maxSessions: 0 }).errors[0].field).toBe('maxSessions');
    });

    it('names the offending allow-list entry', () => {
      const result = validateServerConfig({ ...serverFields, allowedClients: [validHex, 'nope'] });
      expect(result.errors[0].field).toBe('allowedClients[1]');
    });

    it('requires a path when auditing', () => {
      const result = validateServerConfig({ ...serverFields, auditLogging: true, auditLogPath: '' });
      expect(result.errors.map((e) => e.field)).toEqual(['auditLogPath']);
    });

    it('rejects non-positive timeouts', () => {
      const result = validateServerConfig({ ...serverFields, commandTimeout: 0, sessionIdleTimeout: -5 });
      expect(result.errors.map((e) => e.message)).toEqual([
        'commandTimeout must be greater than 0',
        'sessionIdleTimeout must be greater than 0',
      ]);
    });

    it('rejects a command timeout a timer cannot hold', () => {
      const result = validateServerConfig({ ...serverFields, commandTimeout: 3_000_000 });
      expect(result.errors.map((e) => e.message)).toEqual(['commandTimeout must be at most 2147483 seconds']);
    });
  });

  describe('validateClientConfig', () => {
    it('accepts a complete config', () => {
      expect(validateClientConfig(clientFields).valid).toBe(true);
    });

    it('checks the server destination and control address', () => {
      const result = validateClientConfig({ ...clientFields, serverDestination: '', controlAddress: 'nowhere' });
      expect(result.errors.map((e) => e.field)).toEqual(['serverDestination', 'controlAddress']);
    });

    it('rejects empty capabilities', () => {
      expect(validateClientConfig({ ...clientFields, capabilities: [''] }).valid).toBe(false);
    });
  });

  describe('isClientAllowed', () => {
    const key = new Uint8Array(32).fill(0xab);

    it('admits everyone with an empty list', () => {
      expect(isClientAllowed([], key)).toBe(true);
      expect(isClientAllowed([], new Uint8Array(3))).toBe(true);
    });

    it('matches listed keys case-insensitively', () => {
      expect(isClientAllowed(['AB'.repeat(32)], key)).toBe(true);
      expect(isClientAllowed(['cd'.repeat(32)], key)).toBe(false);
    });

    it('refuses keys of the wrong size', () => {
      expect(isClientAllowed([validHex], new Uint8Array(16).fill(0xab))).toBe(false);
    });
  });
});
