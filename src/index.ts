/**
 * veilshell - authenticated remote command execution over an anonymizing
 * overlay network
 */

// Client and server
export { ShellClient } from './client/client.js';
export type { ConnectionState, ExecuteOptions } from './client/client.js';
export { ShellServer } from './server/server.js';
export { Listener, authorizeClient } from './server/listener.js';
export type { ListenerOptions } from './server/listener.js';
export { SessionRegistry } from './server/registry.js';
export { Session } from './server/session.js';
export type { SessionOptions, SessionState } from './server/session.js';
export { CommandExecutor } from './server/executor.js';
export { AuditLog } from './server/audit.js';
export type { AuditEvent } from './server/audit.js';

// Overlay wiring
export { createOverlayServer, createOverlayClient } from './bootstrap.js';
export type { OverlayBootstrapOptions, OverlayServer, OverlayClient } from './bootstrap.js';

// Configuration and validation
export {
  buildServerConfig,
  buildClientConfig,
  parseServerDestination,
  DEFAULT_SERVER_CONFIG,
  DEFAULT_CLIENT_CONFIG,
  DEFAULT_CONTROL_ADDRESS,
  DEFAULT_CAPABILITIES,
} from './config.js';
export type { ServerConfig, ClientConfig, ServerConfigOptions, ClientConfigOptions } from './config.js';
export {
  validateAddressHex,
  validateControlAddress,
  validateCommandRequest,
  validateServerConfig,
  validateClientConfig,
  isClientAllowed,
  MAX_COMMAND_TIMEOUT,
} from './validation.js';

// Identity
export {
  Identity,
  PRIVATE_KEY_LENGTH,
  PUBLIC_KEY_LENGTH,
  SIGNATURE_LENGTH,
  ADDRESS_LENGTH,
} from './crypto/identity.js';
export type { Address } from './crypto/identity.js';
export { sha256Hash, randomBytes, bytesToHex, hexToBytes, stringToBytes, bytesToString } from './crypto/utils.js';

// Wire protocol
export {
  CURRENT_PROTOCOL_VERSION,
  SESSION_ID_LENGTH,
  MessageType,
  RejectCode,
  messageTypeCode,
} from './protocol/messages.js';
export type {
  Message,
  MessageKind,
  SessionId,
  CommandStatus,
  ConnectMessage,
  AcceptMessage,
  RejectMessage,
  CommandRequest,
  CommandResponse,
  DisconnectMessage,
  AckMessage,
  PingMessage,
  PongMessage,
} from './protocol/messages.js';
export { encodeMessage, decodeMessage, decodeMessages, FrameReader, MAX_MESSAGE_SIZE } from './protocol/wire.js';
export type { DecodedMessage, DecodedMessages } from './protocol/wire.js';

// Transport
export {
  PacketType,
  MAX_PACKET_DATA,
  createPacket,
  dataPacket,
  announcePacket,
  withSignature,
  signableData,
  signPacket,
  verifyPacket,
  encodePacket,
  decodePacket,
} from './transport/packet.js';
export type { Packet } from './transport/packet.js';
export type { Transport, LoopbackOptions } from './transport/types.js';
export { LoopbackTransport } from './transport/loopback.js';
export { OverlayTransport, addressOfDestination } from './transport/overlay.js';
export type { OverlayTransportOptions } from './transport/overlay.js';
export { resolveControlAddress } from './transport/router.js';
export type { RouterBootstrap, ResolveControlOptions } from './transport/router.js';

// Overlay control protocol
export { SamClient, DEFAULT_SAM_PORT } from './sam/client.js';
export type { SamClientOptions, GeneratedDestination, ReceivedDatagram } from './sam/client.js';
export { parseReply } from './sam/reply.js';
export type { SamReply } from './sam/reply.js';

// Errors
export {
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
} from './error.js';
export type { ErrorType, ErrorContext, ProtocolErrorCode, ValidationIssue, ValidationResult } from './error.js';

// Output
export { ConsoleOutput, SilentOutput, MockOutput } from './output.js';
export type { Output } from './output.js';
