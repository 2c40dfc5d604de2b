/**
 * Admission control for Connect messages
 */

import { ServerConfig } from '../config.js';
import { Address } from '../crypto/identity.js';
import { bytesToHex, randomBytes } from '../crypto/utils.js';
import { AuthError } from '../error.js';
import { Output, SilentOutput } from '../output.js';
import {
  AcceptMessage,
  CURRENT_PROTOCOL_VERSION,
  ConnectMessage,
  Message,
  RejectCode,
  RejectMessage,
  SESSION_ID_LENGTH,
} from '../protocol/messages.js';
import { isClientAllowed } from '../validation.js';
import { AuditLog } from './audit.js';
import { CommandExecutor } from './executor.js';
import { SessionRegistry } from './registry.js';
import { Session } from './session.js';

export interface ListenerOptions {
  config: ServerConfig;
  registry: SessionRegistry;
  executor: CommandExecutor;
  audit?: AuditLog;
  output?: Output;
}

export class Listener {
  private readonly config: ServerConfig;
  private readonly registry: SessionRegistry;
  private readonly executor: CommandExecutor;
  private readonly audit: AuditLog | undefined;
  private readonly output: Output;

  constructor(options: ListenerOptions) {
    this.config = options.config;
    this.registry = options.registry;
    this.executor = options.executor;
    this.audit = options.audit;
    this.output = options.output ?? new SilentOutput();
  }

  /**
   * Entry point for a message from a sender without a session
   */
  async handleConnection(message: Message, source: Address): Promise<AcceptMessage | RejectMessage> {
    if (message.type !== 'Connect') {
      await this.output.warning(`Expected Connect from ${shortHex(source)}, got ${message.type}`);
      return reject(RejectCode.UnexpectedMessage, `Expected Connect message, got ${message.type}`);
    }
    return this.handleConnect(message, source);
  }

  async handleConnect(connect: ConnectMessage, source: Address): Promise<AcceptMessage | RejectMessage> {
    for (const session of this.registry.evictInactive()) {
      await this.output.info(`Evicted inactive session ${session.idHex()}`);
      await this.audit?.sessionClosed(session.idHex(), 'evicted');
    }

    if (connect.protocolVersion !== CURRENT_PROTOCOL_VERSION) {
      await this.output.warning(
        `Rejecting ${shortHex(source)}: protocol version ${connect.protocolVersion} (expected ${CURRENT_PROTOCOL_VERSION})`,
      );
      return reject(
        RejectCode.VersionMismatch,
        `Protocol version mismatch: expected ${CURRENT_PROTOCOL_VERSION}, got ${connect.protocolVersion}`,
      );
    }

    try {
      authorizeClient(this.config.allowedClients, connect.clientIdentity);
    } catch (error) {
      if (!(error instanceof AuthError)) {
        throw error;
      }
      await this.output.warning(`Rejecting ${shortHex(source)}: ${error.message}`);
      return reject(RejectCode.Unauthorized, 'Client identity not authorized');
    }

    // A session this Connect would replace does not count against the limit
    const previous = this.registry.getByAddress(source);
    const others = this.registry.count() - (previous ? 1 : 0);
    if (others >= this.config.maxSessions) {
      await this.output.warning(`Rejecting ${shortHex(source)}: session limit ${this.config.maxSessions} reached`);
      return reject(RejectCode.SessionLimit, 'Maximum sessions reached');
    }

    if (previous) {
      previous.close();
      this.registry.remove(previous.id);
      await this.output.info(`Replacing session ${previous.idHex()} for ${shortHex(source)}`);
      await this.audit?.sessionClosed(previous.idHex(), 'replaced');
    }

    const session = new Session({
      id: randomBytes(SESSION_ID_LENGTH),
      clientIdentity: Uint8Array.from(connect.clientIdentity),
      clientAddress: Uint8Array.from(source),
      executor: this.executor,
      audit: this.audit,
      output: this.output,
    });
    this.registry.add(session);

    await this.output.success(`Accepted session ${session.idHex()} from ${shortHex(source)}`);
    await this.audit?.sessionOpened(session.idHex(), session.clientIdentity);

    return {
      type: 'Accept',
      protocolVersion: CURRENT_PROTOCOL_VERSION,
      serverIdentity: this.config.identity.publicKey(),
      sessionId: Uint8Array.from(session.id),
      capabilities: [...this.config.capabilities],
    };
  }
}

/**
 * Throws AuthError when the key is not on a non-empty allow-list
 */
export function authorizeClient(allowList: readonly string[], publicKey: Uint8Array): void {
  if (!isClientAllowed(allowList, publicKey)) {
    throw new AuthError(`Identity ${shortHex(publicKey)} not allowed`, { publicKey: bytesToHex(publicKey) });
  }
}

function reject(errorCode: RejectCode, reason: string): RejectMessage {
  return { type: 'Reject', reason, errorCode };
}

function shortHex(bytes: Uint8Array): string {
  return `${bytesToHex(bytes).slice(0, 16)}...`;
}
