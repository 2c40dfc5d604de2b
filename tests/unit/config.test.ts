import { describe, it, expect } from 'vitest';
import {
  DEFAULT_CLIENT_CONFIG,
  DEFAULT_SERVER_CONFIG,
  buildClientConfig,
  buildServerConfig,
  parseServerDestination,
} from '../../src/config.js';
import { Identity } from '../../src/crypto/identity.js';
import { ConfigError } from '../../src/error.js';

describe('Configuration', () => {
  describe('buildServerConfig', () => {
    it('fills defaults and generates an identity', () => {
      const config = buildServerConfig();
      expect(config.identity).toBeInstanceOf(Identity);
      expect(config.maxSessions).toBe(10);
      expect(config.commandTimeout).toBe(300);
      expect(config.sessionIdleTimeout).toBe(900);
      expect(config.allowedClients).toEqual([]);
      expect(config.capabilities).toEqual(['command-exec']);
      expect(config.signResponses).toBe(false);
      expect(config.controlAddress).toBe('127.0.0.1:7656');
    });

    it('keeps a provided identity', () => {
      const identity = Identity.generate();
      expect(buildServerConfig({ identity }).identity).toBe(identity);
    });

    it('does not share default arrays', () => {
      const config = buildServerConfig();
      config.capabilities.push('ping');
      expect(DEFAULT_SERVER_CONFIG.capabilities).toEqual(['command-exec']);
    });

    it('lists every issue in the error', () => {
      const error = (() => {
        try {
          buildServerConfig({ maxSessions: 0, controlAddress: 'nowhere' });
        } catch (e) {
          return e;
        }
        return null;
      })();

      expect(error).toBeInstanceOf(ConfigError);
      expect(error).toMatchObject({
        message:
          'Invalid server configuration: maxSessions must be a positive integer; Control address must have format "host:port"',
      });
    });
  });

  describe('buildClientConfig', () => {
    it('fills defaults', () => {
      const config = buildClientConfig({ serverDestination: '11'.repeat(32) });
      expect(config.connectionTimeout).toBe(DEFAULT_CLIENT_CONFIG.connectionTimeout);
      expect(config.commandTimeout).toBe(300);
      expect(config.authToken).toBeUndefined();
      expect(config.serverOverlayDestination).toBeUndefined();
    });

    it('carries optional fields', () => {
      const config = buildClientConfig({
        serverDestination: '11'.repeat(32),
        authToken: 'test-secret',
        serverOverlayDestination: 'server-destination~AAAA',
      });
      expect(config.authToken).toBe('test-secret');
      expect(config.serverOverlayDestination).toBe('server-destination~AAAA');
    });

    it('rejects a malformed destination', () => {
      expect(() => buildClientConfig({ serverDestination: 'xyz' })).toThrow(ConfigError);
    });
  });

  describe('parseServerDestination', () => {
    it('decodes the address', () => {
      const address = parseServerDestination('0102'.repeat(16));
      expect(address.length).toBe(32);
      expect(address[0]).toBe(1);
      expect(address[1]).toBe(2);
    });

    it('refuses the all-zero placeholder', () => {
      expect(() => parseServerDestination('00'.repeat(32))).toThrow('Server destination is not configured');
    });

    it('refuses malformed hex', () => {
      expect(() => parseServerDestination('00')).toThrow('Invalid server destination: serverDestination must be 64 hex characters');
    });
  });
});
