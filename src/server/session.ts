/**
 * Server-side session for one connected client
 */

import { Address } from '../crypto/identity.js';
import { bytesToHex, stringToBytes } from '../crypto/utils.js';
import { ExecutionError, SessionError } from '../error.js';
import { Output, SilentOutput } from '../output.js';
import { CommandRequest, CommandResponse, Message, SessionId } from '../protocol/messages.js';
import { AuditLog } from './audit.js';
import { CommandExecutor } from './executor.js';

export type SessionState = 'Active' | 'Disconnecting' | 'Closed';

export interface SessionOptions {
  id: SessionId;
  clientIdentity: Uint8Array;
  clientAddress: Address;
  executor: CommandExecutor;
  audit?: AuditLog;
  output?: Output;
}

export class Session {
  readonly id: SessionId;
  readonly clientIdentity: Uint8Array;
  readonly clientAddress: Address;
  private state: SessionState = 'Active';
  private lastActivityAt = Date.now();
  private readonly executor: CommandExecutor;
  private readonly audit: AuditLog | undefined;
  private readonly output: Output;

  constructor(options: SessionOptions) {
    this.id = options.id;
    this.clientIdentity = options.clientIdentity;
    this.clientAddress = options.clientAddress;
    this.executor = options.executor;
    this.audit = options.audit;
    this.output = options.output ?? new SilentOutput();
  }

  /**
   * Handle one message; resolves with the reply, if any.
   * Throws SessionError unless the session is Active.
   */
  async handleMessage(message: Message): Promise<Message | null> {
    if (this.state !== 'Active') {
      throw new SessionError(`Session ${this.idHex()} is ${this.state}`, {
        sessionId: this.idHex(),
        state: this.state,
      });
    }
    this.touch();

    switch (message.type) {
      case 'CommandRequest':
        return this.handleCommand(message);
      case 'Ping':
        return { type: 'Pong' };
      case 'Disconnect':
        await this.output.info(`Session ${this.idHex()} disconnecting${message.reason ? `: ${message.reason}` : ''}`);
        this.state = 'Disconnecting';
        this.close();
        return { type: 'Ack', messageId: 0n };
      default:
        await this.output.debug(`Session ${this.idHex()} ignoring ${message.type}`);
        return null;
    }
  }

  close(): void {
    this.state = 'Closed';
  }

  getState(): SessionState {
    return this.state;
  }

  isActive(): boolean {
    return this.state === 'Active';
  }

  /** Epoch milliseconds of the last handled message */
  lastActivity(): number {
    return this.lastActivityAt;
  }

  idHex(): string {
    return bytesToHex(this.id);
  }

  private touch(): void {
    this.lastActivityAt = Date.now();
  }

  private async handleCommand(request: CommandRequest): Promise<CommandResponse> {
    try {
      this.executor.validateRequest(request);
    } catch (error) {
      if (!(error instanceof ExecutionError)) {
        throw error;
      }
      await this.output.warning(`Rejected command ${request.id}: ${error.message}`);
      const rejected: CommandResponse = {
        type: 'CommandResponse',
        id: request.id,
        status: 'Error',
        stdout: new Uint8Array(0),
        stderr: stringToBytes(error.message),
        exitCode: -1,
        executionTimeMs: 0,
      };
      await this.audit?.commandExecuted(this.idHex(), request, rejected);
      return rejected;
    }

    await this.output.info(`Session ${this.idHex().slice(0, 8)} executing: ${request.command} ${request.args.join(' ')}`);
    const response = await this.executor.execute(request);
    this.touch();
    await this.audit?.commandExecuted(this.idHex(), request, response);
    return response;
  }
}
