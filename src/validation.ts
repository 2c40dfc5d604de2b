/**
 * Pure validation functions
 * No side effects, fully testable, return ValidationResult
 */

import { ADDRESS_LENGTH, PUBLIC_KEY_LENGTH } from './crypto/identity.js';
import { bytesToHex, isHex } from './crypto/utils.js';
import { ValidationIssue, ValidationResult } from './error.js';

/**
 * Longest command timeout in seconds that a timer can represent
 */
export const MAX_COMMAND_TIMEOUT = Math.floor(0x7fffffff / 1000);

/**
 * Shape shared by the request message and the executor's input
 */
export interface CommandRequestFields {
  command: string;
  args: string[];
  workingDir?: string;
  timeout?: number;
}

export interface ServerConfigFields {
  maxSessions: number;
  commandTimeout: number;
  sessionIdleTimeout: number;
  allowedClients: string[];
  capabilities: string[];
  auditLogging: boolean;
  auditLogPath: string;
  controlAddress: string;
}

export interface ClientConfigFields {
  serverDestination: string;
  connectionTimeout: number;
  commandTimeout: number;
  capabilities: string[];
  controlAddress: string;
}

/**
 * Validate a hex-encoded 32-byte address or public key
 */
export function validateAddressHex(value: string, field: string = 'address'): ValidationResult {
  const errors: ValidationIssue[] = [];
  const expected = ADDRESS_LENGTH * 2;

  if (!value) {
    errors.push({ field, message: `${field} cannot be empty` });
    return { valid: false, errors };
  }

  if (value.length !== expected) {
    errors.push({
      field,
      message: `${field} must be ${expected} hex characters`,
      value: value.length,
    });
  }

  if (!isHex(value)) {
    errors.push({ field, message: `${field} must be hexadecimal` });
  }

  return {
    valid: errors.length === 0,
    errors,
  };
}

/**
 * Validate a control endpoint address
 * Format: host:port, port 1-65535
 */
export function validateControlAddress(address: string): ValidationResult {
  const errors: ValidationIssue[] = [];

  const index = address.lastIndexOf(':');
  if (index <= 0) {
    errors.push({
      field: 'controlAddress',
      message: 'Control address must have format "host:port"',
      value: address,
    });
    return { valid: false, errors };
  }

  const port = address.slice(index + 1);
  if (!/^\d{1,5}$/.test(port) || Number(port) < 1 || Number(port) > 65535) {
    errors.push({
      field: 'controlAddress',
      message: 'Control address port must be 1-65535',
      value: port,
    });
  }

  return {
    valid: errors.length === 0,
    errors,
  };
}

/**
 * Validate a command request before anything is spawned
 * Rules: non-empty command, no ".." in the working directory, timeout in 1..MAX_COMMAND_TIMEOUT
 */
export function validateCommandRequest(request: CommandRequestFields): ValidationResult {
  const errors: ValidationIssue[] = [];

  if (!request.command || request.command.trim().length === 0) {
    errors.push({ field: 'command', message: 'Command cannot be empty' });
  }

  if (request.workingDir !== undefined && request.workingDir.includes('..')) {
    errors.push({
      field: 'workingDir',
      message: 'Working directory cannot contain ".."',
      value: request.workingDir,
    });
  }

  if (request.timeout !== undefined && request.timeout <= 0) {
    errors.push({
      field: 'timeout',
      message: 'Timeout must be greater than 0',
      value: request.timeout,
    });
  } else if (request.timeout !== undefined && request.timeout > MAX_COMMAND_TIMEOUT) {
    errors.push({
      field: 'timeout',
      message: `Timeout must be at most ${MAX_COMMAND_TIMEOUT} seconds`,
      value: request.timeout,
    });
  }

  return {
    valid: errors.length === 0,
    errors,
  };
}

export function validateServerConfig(config: ServerConfigFields): ValidationResult {
  const errors: ValidationIssue[] = [];

  if (!Number.isInteger(config.maxSessions) || config.maxSessions < 1) {
    errors.push({
      field: 'maxSessions',
      message: 'maxSessions must be a positive integer',
      value: config.maxSessions,
    });
  }

  pushPositive(errors, 'commandTimeout', config.commandTimeout);
  pushTimerBound(errors, 'commandTimeout', config.commandTimeout);
  pushPositive(errors, 'sessionIdleTimeout', config.sessionIdleTimeout);
  pushTimerBound(errors, 'sessionIdleTimeout', config.sessionIdleTimeout);

  config.allowedClients.forEach((key, index) => {
    for (const issue of validateAddressHex(key, `allowedClients[${index}]`).errors) {
      errors.push(issue);
    }
  });

  if (config.capabilities.some((capability) => capability.length === 0)) {
    errors.push({ field: 'capabilities', message: 'Capabilities cannot be empty strings' });
  }

  if (config.auditLogging && !config.auditLogPath) {
    errors.push({ field: 'auditLogPath', message: 'Audit log path is required when audit logging is on' });
  }

  errors.push(...validateControlAddress(config.controlAddress).errors);

  return {
    valid: errors.length === 0,
    errors,
  };
}

export function validateClientConfig(config: ClientConfigFields): ValidationResult {
  const errors: ValidationIssue[] = [];

  errors.push(...validateAddressHex(config.serverDestination, 'serverDestination').errors);
  pushPositive(errors, 'connectionTimeout', config.connectionTimeout);
  pushTimerBound(errors, 'connectionTimeout', config.connectionTimeout);
  pushPositive(errors, 'commandTimeout', config.commandTimeout);
  pushTimerBound(errors, 'commandTimeout', config.commandTimeout);

  if (config.capabilities.some((capability) => capability.length === 0)) {
    errors.push({ field: 'capabilities', message: 'Capabilities cannot be empty strings' });
  }

  errors.push(...validateControlAddress(config.controlAddress).errors);

  return {
    valid: errors.length === 0,
    errors,
  };
}

/**
 * Empty allow-list admits every key
 */
export function isClientAllowed(allowList: readonly string[], publicKey: Uint8Array): boolean {
  if (allowList.length === 0) {
    return true;
  }
  if (publicKey.length !== PUBLIC_KEY_LENGTH) {
    return false;
  }
  const hex = bytesToHex(publicKey);
  return allowList.some((entry) => entry.toLowerCase() === hex);
}

function pushPositive(errors: ValidationIssue[], field: string, value: number): void {
  if (!Number.isFinite(value) || value <= 0) {
    errors.push({ field, message: `${field} must be greater than 0`, value });
  }
}

function pushTimerBound(errors: ValidationIssue[], field: string, value: number): void {
  if (value > MAX_COMMAND_TIMEOUT) {
    errors.push({ field, message: `${field} must be at most ${MAX_COMMAND_TIMEOUT} seconds`, value });
  }
}
