/**
 * Application message set
 *
 * Every message is a tagged record; the tag doubles as the `type` field of
 * the CBOR payload so a frame can be decoded without trusting its type byte.
 */

import { ProtocolError } from '../error.js';

export const CURRENT_PROTOCOL_VERSION = 1;
export const SESSION_ID_LENGTH = 16;

export type SessionId = Uint8Array;

export enum MessageType {
  Connect = 0x01,
  Accept = 0x02,
  Reject = 0x03,
  CommandRequest = 0x10,
  CommandResponse = 0x11,
  Disconnect = 0x20,
  Ack = 0x21,
  Ping = 0x30,
  Pong = 0x31,
}

/**
 * Machine-readable reasons carried by Reject
 */
export enum RejectCode {
  UnexpectedMessage = 1,
  VersionMismatch = 2,
  Unauthorized = 3,
  SessionLimit = 4,
}

export type CommandStatus = 'Success' | 'Error' | 'Timeout' | 'Killed';

const COMMAND_STATUSES: readonly CommandStatus[] = ['Success', 'Error', 'Timeout', 'Killed'];

export interface ConnectMessage {
  type: 'Connect';
  protocolVersion: number;
  /** Client public key */
  clientIdentity: Uint8Array;
  capabilities: string[];
  authToken?: string;
}

export interface AcceptMessage {
  type: 'Accept';
  protocolVersion: number;
  /** Server public key */
  serverIdentity: Uint8Array;
  sessionId: SessionId;
  capabilities: string[];
}

export interface RejectMessage {
  type: 'Reject';
  reason: string;
  errorCode: number;
}

export interface CommandRequest {
  type: 'CommandRequest';
  id: bigint;
  command: string;
  args: string[];
  env?: Record<string, string>;
  /** Seconds */
  timeout?: number;
  workingDir?: string;
}

export interface CommandResponse {
  type: 'CommandResponse';
  id: bigint;
  status: CommandStatus;
  stdout: Uint8Array;
  stderr: Uint8Array;
  exitCode: number;
  executionTimeMs: number;
}

export interface DisconnectMessage {
  type: 'Disconnect';
  reason?: string;
}

export interface AckMessage {
  type: 'Ack';
  messageId: bigint;
}

export interface PingMessage {
  type: 'Ping';
}

export interface PongMessage {
  type: 'Pong';
}

export type Message =
  | ConnectMessage
  | AcceptMessage
  | RejectMessage
  | CommandRequest
  | CommandResponse
  | DisconnectMessage
  | AckMessage
  | PingMessage
  | PongMessage;

export type MessageKind = Message['type'];

export function messageTypeCode(message: Message): MessageType {
  return MessageType[message.type];
}

export function isMessageTypeCode(value: number): value is MessageType {
  return typeof MessageType[value] === 'string';
}

export function isCommandStatus(value: unknown): value is CommandStatus {
  return COMMAND_STATUSES.some((status) => status === value);
}

type Fields = Record<string, unknown>;

/**
 * Plain record suitable for CBOR encoding. Optional fields that are unset
 * are left out rather than encoded as undefined.
 */
export function toPayload(message: Message): Fields {
  const payload: Fields = {};
  for (const entry of Object.entries(message)) {
    const key = entry[0];
    const value: unknown = entry[1];
    if (value === undefined) {
      continue;
    }
    payload[key] = value instanceof Uint8Array ? Buffer.from(value) : value;
  }
  return payload;
}

/**
 * Rebuild a message from a decoded payload, checking every field
 */
export function fromPayload(value: unknown): Message {
  if (!isRecord(value)) {
    throw new ProtocolError('InvalidFormat', 'Message payload must be a map');
  }
  const fields = new FieldReader(value);
  const type = fields.string('type');

  switch (type) {
    case 'Connect': {
      const message: ConnectMessage = {
        type,
        protocolVersion: fields.u32('protocolVersion'),
        clientIdentity: fields.bytes('clientIdentity'),
        capabilities: fields.stringArray('capabilities'),
      };
      const authToken = fields.optionalString('authToken');
      if (authToken !== undefined) message.authToken = authToken;
      return message;
    }
    case 'Accept': {
      const sessionId = fields.bytes('sessionId');
      if (sessionId.length !== SESSION_ID_LENGTH) {
        throw new ProtocolError('InvalidFormat', `Session id must be ${SESSION_ID_LENGTH} bytes`, {
          length: sessionId.length,
        });
      }
      return {
        type,
        protocolVersion: fields.u32('protocolVersion'),
        serverIdentity: fields.bytes('serverIdentity'),
        sessionId,
        capabilities: fields.stringArray('capabilities'),
      };
    }
    case 'Reject':
      return { type, reason: fields.string('reason'), errorCode: fields.u32('errorCode') };
    case 'CommandRequest': {
      const message: CommandRequest = {
        type,
        id: fields.u64('id'),
        command: fields.string('command'),
        args: fields.stringArray('args'),
      };
      const env = fields.optionalStringMap('env');
      if (env !== undefined) message.env = env;
      const timeout = fields.optionalU32('timeout');
      if (timeout !== undefined) message.timeout = timeout;
      const workingDir = fields.optionalString('workingDir');
      if (workingDir !== undefined) message.workingDir = workingDir;
      return message;
    }
    case 'CommandResponse': {
      const status = fields.value('status');
      if (!isCommandStatus(status)) {
        throw new ProtocolError('InvalidFormat', 'Invalid CommandResponse.status', { status });
      }
      return {
        type,
        id: fields.u64('id'),
        status,
        stdout: fields.bytes('stdout'),
        stderr: fields.bytes('stderr'),
        exitCode: fields.i32('exitCode'),
        executionTimeMs: fields.u32('executionTimeMs'),
      };
    }
    case 'Disconnect': {
      const reason = fields.optionalString('reason');
      return reason === undefined ? { type } : { type, reason };
    }
    case 'Ack':
      return { type, messageId: fields.u64('messageId') };
    case 'Ping':
      return { type };
    case 'Pong':
      return { type };
    default:
      throw new ProtocolError('InvalidMessageType', `Unknown message type: ${type}`, { type });
  }
}

function isRecord(value: unknown): value is Fields {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Uint8Array);
}

class FieldReader {
  constructor(private readonly fields: Fields) {}

  value(key: string): unknown {
    return this.fields[key];
  }

  string(key: string): string {
    const value = this.fields[key];
    if (typeof value !== 'string') {
      throw this.invalid(key, 'string');
    }
    return value;
  }

  optionalString(key: string): string | undefined {
    return this.fields[key] === undefined || this.fields[key] === null ? undefined : this.string(key);
  }

  bytes(key: string): Uint8Array {
    const value = this.fields[key];
    if (!(value instanceof Uint8Array)) {
      throw this.invalid(key, 'byte string');
    }
    return Uint8Array.from(value);
  }

  stringArray(key: string): string[] {
    const value = this.fields[key];
    if (!Array.isArray(value)) {
      throw this.invalid(key, 'array of strings');
    }
    const strings: string[] = [];
    for (const item of value) {
      if (typeof item !== 'string') {
        throw this.invalid(key, 'array of strings');
      }
      strings.push(item);
    }
    return strings;
  }

  optionalStringMap(key: string): Record<string, string> | undefined {
    const value = this.fields[key];
    if (value === undefined || value === null) {
      return undefined;
    }
    if (!isRecord(value)) {
      throw this.invalid(key, 'map of strings');
    }
    const map: Record<string, string> = {};
    for (const [name, entry] of Object.entries(value)) {
      if (typeof entry !== 'string') {
        throw this.invalid(key, 'map of strings');
      }
      map[name] = entry;
    }
    return map;
  }

  u32(key: string): number {
    const value = this.fields[key];
    if (typeof value !== 'number' || !Number.isInteger(value) || value < 0 || value > 0xffffffff) {
      throw this.invalid(key, 'u32');
    }
    return value;
  }

  optionalU32(key: string): number | undefined {
    return this.fields[key] === undefined || this.fields[key] === null ? undefined : this.u32(key);
  }

  i32(key: string): number {
    const value = this.fields[key];
    if (typeof value !== 'number' || !Number.isInteger(value) || value < -0x80000000 || value > 0x7fffffff) {
      throw this.invalid(key, 'i32');
    }
    return value;
  }

  /**
   * CBOR decoders hand back small integers as numbers and large ones as bigint
   */
  u64(key: string): bigint {
    const value = this.fields[key];
    let result: bigint;
    if (typeof value === 'bigint') {
      result = value;
    } else if (typeof value === 'number' && Number.isSafeInteger(value)) {
      result = BigInt(value);
    } else {
      throw this.invalid(key, 'u64');
    }
    if (result < 0n || result > 0xffffffffffffffffn) {
      throw this.invalid(key, 'u64');
    }
    return result;
  }

  private invalid(key: string, expected: string): ProtocolError {
    const variant = typeof this.fields.type === 'string' ? this.fields.type : 'message';
    return new ProtocolError('InvalidFormat', `Invalid ${variant}.${key}: expected ${expected}`, {
      field: key,
    });
  }
}
