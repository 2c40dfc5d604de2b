/**
 * Error types for the shell stack
 * Domain-specific errors with contextual information
 */

export type ErrorType =
  | 'Identity'
  | 'Crypto'
  | 'Packet'
  | 'Protocol'
  | 'Network'
  | 'Connection'
  | 'Session'
  | 'Execution'
  | 'Auth'
  | 'Timeout'
  | 'Config';

export type ErrorContext = Record<string, unknown>;

export class ShellError extends Error {
  constructor(
    public type: ErrorType,
    public context: ErrorContext,
    message: string,
  ) {
    super(message);
    this.name = 'ShellError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class IdentityError extends ShellError {
  constructor(message: string, context: ErrorContext = {}) {
    super('Identity', context, message);
    this.name = 'IdentityError';
  }
}

export class CryptoError extends ShellError {
  constructor(message: string, context: ErrorContext = {}) {
    super('Crypto', context, message);
    this.name = 'CryptoError';
  }
}

export class PacketError extends ShellError {
  constructor(message: string, context: ErrorContext = {}) {
    super('Packet', context, message);
    this.name = 'PacketError';
  }
}

export type ProtocolErrorCode =
  | 'VersionMismatch'
  | 'MessageTooLarge'
  | 'InvalidMessageType'
  | 'InvalidFormat'
  | 'Serialization';

export class ProtocolError extends ShellError {
  code: ProtocolErrorCode;

  constructor(code: ProtocolErrorCode, message: string, context: ErrorContext = {}) {
    super('Protocol', context, message);
    this.name = 'ProtocolError';
    this.code = code;
  }
}

/**
 * Failures talking to the overlay control endpoint
 */
export class NetworkError extends ShellError {
  constructor(message: string, context: ErrorContext = {}) {
    super('Network', context, message);
    this.name = 'NetworkError';
  }
}

export class ConnectionError extends ShellError {
  constructor(message: string, context: ErrorContext = {}) {
    super('Connection', context, message);
    this.name = 'ConnectionError';
  }
}

/**
 * Server answered a Connect with Reject
 */
export class RejectedError extends ConnectionError {
  errorCode: number;
  reason: string;

  constructor(reason: string, errorCode: number, context: ErrorContext = {}) {
    super(`Server rejected connection: ${reason}`, { ...context, errorCode });
    this.name = 'RejectedError';
    this.errorCode = errorCode;
    this.reason = reason;
  }
}

export class SessionError extends ShellError {
  constructor(message: string, context: ErrorContext = {}) {
    super('Session', context, message);
    this.name = 'SessionError';
  }
}

export class ExecutionError extends ShellError {
  constructor(message: string, context: ErrorContext = {}) {
    super('Execution', context, message);
    this.name = 'ExecutionError';
  }
}

export class AuthError extends ShellError {
  constructor(message: string, context: ErrorContext = {}) {
    super('Auth', context, message);
    this.name = 'AuthError';
  }
}

export class TimeoutError extends ShellError {
  constructor(message: string, context: ErrorContext = {}) {
    super('Timeout', context, message);
    this.name = 'TimeoutError';
  }
}

export class ConfigError extends ShellError {
  errors: ValidationIssue[];

  constructor(message: string, errors: ValidationIssue[] = [], context: ErrorContext = {}) {
    super('Config', context, message);
    this.name = 'ConfigError';
    this.errors = errors;
  }
}

export interface ValidationIssue {
  field: string;
  message: string;
  value?: unknown;
}

/**
 * Validation result with error accumulation
 */
export interface ValidationResult {
  valid: boolean;
  errors: ValidationIssue[];
}

/**
 * Message of an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
