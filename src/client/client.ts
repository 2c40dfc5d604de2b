/**
 * Shell client
 * Connection state machine and command round trips over any Transport
 *
 * One request is outstanding at a time. Request ids start at 1 and keep
 * increasing for the life of the client, across reconnects.
 */

import { ClientConfig, parseServerDestination } from '../config.js';
import { Address } from '../crypto/identity.js';
import { bytesEqual, bytesToHex } from '../crypto/utils.js';
import {
  ConnectionError,
  PacketError,
  ProtocolError,
  RejectedError,
  TimeoutError,
  errorMessage,
} from '../error.js';
import { Output, SilentOutput } from '../output.js';
import {
  CURRENT_PROTOCOL_VERSION,
  CommandRequest,
  CommandResponse,
  ConnectMessage,
  Message,
  SessionId,
} from '../protocol/messages.js';
import { decodeMessages, encodeMessage } from '../protocol/wire.js';
import { withTimeout } from '../timeout.js';
import { Packet, dataPacket, verifyPacket } from '../transport/packet.js';
import { Transport } from '../transport/types.js';

export type ConnectionState = 'Disconnected' | 'Connecting' | 'Connected' | 'Disconnecting';

export interface ExecuteOptions {
  /** Seconds; defaults to the configured commandTimeout */
  timeout?: number;
  env?: Record<string, string>;
  workingDir?: string;
}

export class ShellClient {
  private state: ConnectionState = 'Disconnected';
  private sessionId: SessionId | null = null;
  private serverPublicKey: Uint8Array | null = null;
  /** The Accept arrived signed, so every later reply must be signed too */
  private serverSigns = false;
  private nextRequestId = 1n;
  private readonly serverAddress: Address;

  /** Receive in flight; survives a timed-out wait so no packet is lost */
  private pending: Promise<Packet> | null = null;
  /** Messages decoded from a packet but not yet consumed */
  private backlog: Message[] = [];
  /** Replies owed by the server for requests we stopped waiting on */
  private pendingAcks = 0;
  private stalePongs = 0;

  constructor(
    private readonly config: ClientConfig,
    private readonly transport: Transport,
    private readonly output: Output = new SilentOutput(),
  ) {
    this.serverAddress = parseServerDestination(config.serverDestination);
  }

  /**
   * Perform the Connect handshake; no-op when already connected
   */
  async connect(): Promise<void> {
    if (this.state === 'Connected') {
      return;
    }
    if (this.state === 'Connecting') {
      throw new ConnectionError('Connection already in progress');
    }

    this.state = 'Connecting';
    await this.output.info(`Connecting to ${this.config.serverDestination.slice(0, 16)}...`);

    try {
      const connect: ConnectMessage = {
        type: 'Connect',
        protocolVersion: CURRENT_PROTOCOL_VERSION,
        clientIdentity: this.config.identity.publicKey(),
        capabilities: [...this.config.capabilities],
      };
      if (this.config.authToken !== undefined) {
        connect.authToken = this.config.authToken;
      }
      await this.sendMessage(connect);

      const reply = await this.nextMessage(this.config.connectionTimeout * 1000, 'Connect');
      switch (reply.type) {
        case 'Accept':
          if (reply.protocolVersion !== CURRENT_PROTOCOL_VERSION) {
            throw new ProtocolError('VersionMismatch', `Server speaks protocol version ${reply.protocolVersion}`, {
              expected: CURRENT_PROTOCOL_VERSION,
              actual: reply.protocolVersion,
            });
          }
          this.sessionId = reply.sessionId;
          this.serverPublicKey = reply.serverIdentity;
          this.state = 'Connected';
          await this.output.success(`Connected (session: ${bytesToHex(reply.sessionId)})`);
          return;
        case 'Reject':
          throw new RejectedError(reply.reason, reply.errorCode);
        default:
          throw new ConnectionError(`Unexpected reply to Connect: ${reply.type}`, { type: reply.type });
      }
    } catch (error) {
      this.resetSession();
      await this.output.error(`Connection failed: ${errorMessage(error)}`);
      if (error instanceof ProtocolError || error instanceof PacketError) {
        throw new ConnectionError(`Invalid reply to Connect: ${error.message}`, { cause: error.type });
      }
      throw error;
    }
  }

  /**
   * Run a command on the server and wait for its response
   */
  async executeCommand(command: string, args: string[] = [], options: ExecuteOptions = {}): Promise<CommandResponse> {
    if (this.state !== 'Connected') {
      throw new ConnectionError('Not connected. Call connect() first', { command });
    }

    const id = this.nextRequestId;
    this.nextRequestId += 1n;

    const timeout = options.timeout ?? this.config.commandTimeout;
    const request: CommandRequest = { type: 'CommandRequest', id, command, args, timeout };
    if (options.env !== undefined) {
      request.env = options.env;
    }
    if (options.workingDir !== undefined) {
      request.workingDir = options.workingDir;
    }

    await this.output.debug(`Request ${id}: ${command} ${args.join(' ')}`);
    await this.sendMessage(request);

    // The server enforces `timeout`; allow a connection timeout on top for transit
    const deadline = Date.now() + (timeout + this.config.connectionTimeout) * 1000;
    for (;;) {
      const reply = await this.nextMessage(Math.max(0, deadline - Date.now()), `Command ${id}`);
      if (reply.type !== 'CommandResponse') {
        throw new ProtocolError('InvalidMessageType', `Expected CommandResponse, got ${reply.type}`, {
          id: id.toString(),
        });
      }
      if (reply.id < id) {
        await this.output.debug(`Discarding late response ${reply.id}`);
        continue;
      }
      if (reply.id !== id) {
        throw new ProtocolError('InvalidFormat', `Response id ${reply.id} does not match request ${id}`, {
          id: id.toString(),
          responseId: reply.id.toString(),
        });
      }
      await this.output.debug(`Response ${id}: ${reply.status} (exit ${reply.exitCode})`);
      return reply;
    }
  }

  /**
   * Round trip a Ping; resolves with the elapsed milliseconds
   */
  async ping(): Promise<number> {
    if (this.state !== 'Connected') {
      throw new ConnectionError('Not connected. Call connect() first');
    }

    const started = Date.now();
    await this.sendMessage({ type: 'Ping' });

    const deadline = started + this.config.connectionTimeout * 1000;
    for (;;) {
      let reply: Message;
      try {
        reply = await this.nextMessage(Math.max(0, deadline - Date.now()), 'Ping');
      } catch (error) {
        if (error instanceof TimeoutError) {
          this.stalePongs += 1;
        }
        throw error;
      }
      if (reply.type === 'Pong') {
        return Date.now() - started;
      }
      if (reply.type === 'CommandResponse' && reply.id < this.nextRequestId) {
        continue;
      }
      throw new ProtocolError('InvalidMessageType', `Expected Pong, got ${reply.type}`);
    }
  }

  /**
   * Drop the session. Idempotent; does not wait for the server's Ack.
   */
  async disconnect(): Promise<void> {
    if (this.state === 'Disconnected') {
      return;
    }

    const wasConnected = this.state === 'Connected';
    this.state = 'Disconnecting';

    if (wasConnected) {
      try {
        await this.sendMessage({ type: 'Disconnect', reason: 'Client disconnect' });
        this.pendingAcks += 1;
      } catch (error) {
        await this.output.warning(`Failed to send disconnect notice: ${errorMessage(error)}`);
      }
    }

    this.resetSession();
    await this.output.info('Disconnected');
  }

  getState(): ConnectionState {
    return this.state;
  }

  isConnected(): boolean {
    return this.state === 'Connected';
  }

  getSessionId(): SessionId | null {
    return this.sessionId ? Uint8Array.from(this.sessionId) : null;
  }

  getServerPublicKey(): Uint8Array | null {
    return this.serverPublicKey ? Uint8Array.from(this.serverPublicKey) : null;
  }

  private resetSession(): void {
    this.state = 'Disconnected';
    this.sessionId = null;
    this.serverPublicKey = null;
    this.serverSigns = false;
    this.backlog = [];
  }

  private async sendMessage(message: Message): Promise<void> {
    await this.transport.send(dataPacket(this.serverAddress, encodeMessage(message)));
  }

  /**
   * Next message from the server, skipping Acks and Pongs we no longer wait for
   */
  private async nextMessage(timeoutMs: number, description: string): Promise<Message> {
    for (;;) {
      let message = this.backlog.shift();
      if (!message) {
        const messages = await this.receiveMessages(timeoutMs, description);
        message = messages[0];
        this.backlog.push(...messages.slice(1));
      }

      if (message.type === 'Ack' && this.pendingAcks > 0) {
        this.pendingAcks -= 1;
        continue;
      }
      if (message.type === 'Pong' && this.stalePongs > 0) {
        this.stalePongs -= 1;
        continue;
      }
      return message;
    }
  }

  private async receiveMessages(timeoutMs: number, description: string): Promise<[Message, ...Message[]]> {
    const deadline = Date.now() + timeoutMs;
    let packet = await this.receivePacket(timeoutMs, description);
    while (packet.source && !bytesEqual(packet.source, this.serverAddress)) {
      await this.output.warning(`Ignoring packet from ${bytesToHex(packet.source).slice(0, 16)}...`);
      packet = await this.receivePacket(Math.max(0, deadline - Date.now()), description);
    }

    const { messages, bytesConsumed } = decodeMessages(packet.data);
    const [first, ...rest] = messages;
    if (first === undefined || bytesConsumed !== packet.data.length) {
      throw new ProtocolError('InvalidFormat', 'Packet does not contain whole frames', {
        size: packet.data.length,
        consumed: bytesConsumed,
      });
    }

    this.checkSignature(packet, first);
    return [first, ...rest];
  }

  /**
   * Verify signed packets against the server key. A signed Accept is checked
   * against the key it carries and makes signatures mandatory from then on.
   */
  private checkSignature(packet: Packet, first: Message): void {
    if (!packet.signature) {
      if (this.serverSigns) {
        throw new PacketError('Unsigned reply from a server that signs its replies');
      }
      return;
    }
    if (this.serverPublicKey) {
      verifyPacket(packet, this.serverPublicKey);
    } else if (this.state === 'Connecting' && first.type === 'Accept') {
      verifyPacket(packet, first.serverIdentity);
      this.serverSigns = true;
    }
  }

  private async receivePacket(timeoutMs: number, description: string): Promise<Packet> {
    if (!this.pending) {
      this.pending = this.transport.receive();
    }

    let packet: Packet;
    try {
      packet = await withTimeout(this.pending, timeoutMs, description);
    } catch (error) {
      if (!(error instanceof TimeoutError)) {
        this.pending = null;
      }
      throw error;
    }
    this.pending = null;
    return packet;
  }
}
