/**
 * Server and client configuration
 *
 * Configuration arrives as plain objects; loading it from disk is the
 * caller's business. Builders fill defaults, validate and fail with
 * ConfigError listing every issue.
 */

import { ADDRESS_LENGTH, Address, Identity } from './crypto/identity.js';
import { hexToBytes } from './crypto/utils.js';
import { ConfigError } from './error.js';
import { validateAddressHex, validateClientConfig, validateServerConfig } from './validation.js';

export const DEFAULT_CONTROL_ADDRESS = '127.0.0.1:7656';
export const DEFAULT_CAPABILITIES: readonly string[] = ['command-exec'];

export interface ServerConfig {
  identity: Identity;
  maxSessions: number;
  /** Default command timeout (seconds) */
  commandTimeout: number;
  /** Sessions idle longer than this are evicted (seconds) */
  sessionIdleTimeout: number;
  /** Hex public keys; empty admits everyone */
  allowedClients: string[];
  capabilities: string[];
  signResponses: boolean;
  auditLogging: boolean;
  auditLogPath: string;
  controlAddress: string;
}

export interface ClientConfig {
  identity: Identity;
  /** Hex address of the server identity */
  serverDestination: string;
  /** Seconds */
  connectionTimeout: number;
  /** Seconds */
  commandTimeout: number;
  capabilities: string[];
  authToken?: string;
  controlAddress: string;
  /** Full overlay destination of the server, registered with the overlay transport */
  serverOverlayDestination?: string;
}

export type ServerConfigOptions = Partial<ServerConfig>;
export type ClientConfigOptions = Partial<Omit<ClientConfig, 'serverDestination'>> &
  Pick<ClientConfig, 'serverDestination'>;

export const DEFAULT_SERVER_CONFIG = {
  maxSessions: 10,
  commandTimeout: 300,
  sessionIdleTimeout: 900,
  allowedClients: [],
  capabilities: [...DEFAULT_CAPABILITIES],
  signResponses: false,
  auditLogging: false,
  auditLogPath: 'audit.log',
  controlAddress: DEFAULT_CONTROL_ADDRESS,
} satisfies Omit<ServerConfig, 'identity'>;

export const DEFAULT_CLIENT_CONFIG = {
  connectionTimeout: 30,
  commandTimeout: 300,
  capabilities: [...DEFAULT_CAPABILITIES],
  controlAddress: DEFAULT_CONTROL_ADDRESS,
} satisfies Omit<ClientConfig, 'identity' | 'serverDestination'>;

export function buildServerConfig(options: ServerConfigOptions = {}): ServerConfig {
  const config: ServerConfig = {
    identity: options.identity ?? Identity.generate(),
    maxSessions: options.maxSessions ?? DEFAULT_SERVER_CONFIG.maxSessions,
    commandTimeout: options.commandTimeout ?? DEFAULT_SERVER_CONFIG.commandTimeout,
    sessionIdleTimeout: options.sessionIdleTimeout ?? DEFAULT_SERVER_CONFIG.sessionIdleTimeout,
    allowedClients: [...(options.allowedClients ?? DEFAULT_SERVER_CONFIG.allowedClients)],
    capabilities: [...(options.capabilities ?? DEFAULT_SERVER_CONFIG.capabilities)],
    signResponses: options.signResponses ?? DEFAULT_SERVER_CONFIG.signResponses,
    auditLogging: options.auditLogging ?? DEFAULT_SERVER_CONFIG.auditLogging,
    auditLogPath: options.auditLogPath ?? DEFAULT_SERVER_CONFIG.auditLogPath,
    controlAddress: options.controlAddress ?? DEFAULT_SERVER_CONFIG.controlAddress,
  };

  const validation = validateServerConfig(config);
  if (!validation.valid) {
    throw new ConfigError(`Invalid server configuration: ${summarize(validation.errors)}`, validation.errors);
  }
  return config;
}

export function buildClientConfig(options: ClientConfigOptions): ClientConfig {
  const config: ClientConfig = {
    identity: options.identity ?? Identity.generate(),
    serverDestination: options.serverDestination,
    connectionTimeout: options.connectionTimeout ?? DEFAULT_CLIENT_CONFIG.connectionTimeout,
    commandTimeout: options.commandTimeout ?? DEFAULT_CLIENT_CONFIG.commandTimeout,
    capabilities: [...(options.capabilities ?? DEFAULT_CLIENT_CONFIG.capabilities)],
    controlAddress: options.controlAddress ?? DEFAULT_CLIENT_CONFIG.controlAddress,
  };
  if (options.authToken !== undefined) {
    config.authToken = options.authToken;
  }
  if (options.serverOverlayDestination !== undefined) {
    config.serverOverlayDestination = options.serverOverlayDestination;
  }

  const validation = validateClientConfig(config);
  if (!validation.valid) {
    throw new ConfigError(`Invalid client configuration: ${summarize(validation.errors)}`, validation.errors);
  }
  return config;
}

/**
 * Server address bytes from its hex form. The all-zero address is a
 * placeholder and never a real server.
 */
export function parseServerDestination(hex: string): Address {
  const validation = validateAddressHex(hex, 'serverDestination');
  if (!validation.valid) {
    throw new ConfigError(`Invalid server destination: ${summarize(validation.errors)}`, validation.errors);
  }

  const address = hexToBytes(hex);
  if (address.length !== ADDRESS_LENGTH || address.every((byte) => byte === 0)) {
    throw new ConfigError('Server destination is not configured', [
      { field: 'serverDestination', message: 'Server destination cannot be all zeros', value: hex },
    ]);
  }
  return address;
}

function summarize(errors: { field: string; message: string }[]): string {
  return errors.map((issue) => issue.message).join('; ');
}
