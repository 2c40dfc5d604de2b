/**
 * Shell server
 * Sequential dispatch loop over one Transport
 */

import { ServerConfig } from '../config.js';
import { Address } from '../crypto/identity.js';
import { bytesToHex, concatBytes, stringToBytes } from '../crypto/utils.js';
import { ConnectionError, SessionError, errorMessage } from '../error.js';
import { Output, SilentOutput } from '../output.js';
import { CommandResponse, Message } from '../protocol/messages.js';
import { decodeMessages, encodeMessage } from '../protocol/wire.js';
import { MAX_PACKET_DATA, Packet, dataPacket, signPacket } from '../transport/packet.js';
import { Transport } from '../transport/types.js';
import { AuditLog } from './audit.js';
import { CommandExecutor } from './executor.js';
import { Listener } from './listener.js';
import { SessionRegistry } from './registry.js';

const TRUNCATION_NOTE = stringToBytes('\n[output truncated]\n');

export class ShellServer {
  private readonly registry: SessionRegistry;
  private readonly executor: CommandExecutor;
  private readonly listener: Listener;
  private readonly audit: AuditLog | undefined;
  private sweepTimer: NodeJS.Timeout | null = null;
  private running = false;
  private stopping = false;

  constructor(
    private readonly config: ServerConfig,
    private readonly transport: Transport,
    private readonly output: Output = new SilentOutput(),
  ) {
    this.registry = new SessionRegistry(config.sessionIdleTimeout * 1000);
    this.executor = new CommandExecutor(config.commandTimeout, output);
    this.audit = config.auditLogging ? new AuditLog(config.auditLogPath, output) : undefined;
    this.listener = new Listener({
      config,
      registry: this.registry,
      executor: this.executor,
      audit: this.audit,
      output,
    });
  }

  /**
   * Serve until stop() is called or the transport closes
   */
  async run(): Promise<void> {
    if (this.running) {
      throw new ConnectionError('Server is already running');
    }
    this.running = true;
    this.startSweep();

    await this.output.info(`Server listening on ${this.transport.name()} (identity ${this.config.identity.addressHex()})`);

    try {
      while (!this.stopping) {
        let packet: Packet;
        try {
          packet = await this.transport.receive();
        } catch (error) {
          if (this.stopping || error instanceof ConnectionError || !this.transport.isReady()) {
            break;
          }
          await this.output.error(`Receive failed: ${errorMessage(error)}`);
          continue;
        }

        try {
          await this.handlePacket(packet);
        } catch (error) {
          await this.output.error(`Failed to handle packet: ${errorMessage(error)}`);
        }
      }
    } finally {
      this.stopSweep();
      this.running = false;
    }

    await this.output.info('Server stopped');
  }

  /**
   * Close every session, kill running commands and close the transport
   */
  async stop(): Promise<void> {
    if (this.stopping) {
      return;
    }
    this.stopping = true;
    this.stopSweep();

    for (const session of this.registry.list()) {
      await this.audit?.sessionClosed(session.idHex(), 'shutdown');
    }
    this.registry.closeAll();
    this.executor.killAll();
    await this.transport.close();
  }

  /** Address of the server identity */
  address(): Address {
    return this.config.identity.address();
  }

  sessionCount(): number {
    return this.registry.count();
  }

  isRunning(): boolean {
    return this.running;
  }

  private async handlePacket(packet: Packet): Promise<void> {
    const source = packet.source;
    if (!source) {
      await this.output.warning('Dropping packet without sender address');
      return;
    }

    let messages: Message[];
    let bytesConsumed: number;
    try {
      ({ messages, bytesConsumed } = decodeMessages(packet.data));
    } catch (error) {
      await this.output.warning(`Dropping malformed packet from ${shortHex(source)}: ${errorMessage(error)}`);
      return;
    }
    if (bytesConsumed < packet.data.length) {
      await this.output.debug(`Ignoring ${packet.data.length - bytesConsumed} trailing bytes from ${shortHex(source)}`);
    }

    for (const message of messages) {
      const reply = await this.dispatch(message, source);
      if (reply) {
        await this.reply(reply, source);
      }
    }
  }

  private async dispatch(message: Message, source: Address): Promise<Message | null> {
    switch (message.type) {
      case 'Connect':
        return this.listener.handleConnection(message, source);
      case 'CommandRequest':
      case 'Ping':
      case 'Disconnect': {
        const session = this.registry.getByAddress(source);
        if (!session) {
          await this.output.warning(`No session for ${shortHex(source)}, dropping ${message.type}`);
          return null;
        }
        try {
          const reply = await session.handleMessage(message);
          if (session.getState() === 'Closed') {
            this.registry.remove(session.id);
            await this.audit?.sessionClosed(session.idHex(), 'disconnect');
          }
          return reply;
        } catch (error) {
          if (!(error instanceof SessionError)) {
            throw error;
          }
          await this.output.warning(error.message);
          this.registry.remove(session.id);
          return null;
        }
      }
      default:
        await this.output.debug(`Ignoring ${message.type} from ${shortHex(source)}`);
        return null;
    }
  }

  private async reply(message: Message, destination: Address): Promise<void> {
    try {
      let packet = dataPacket(destination, this.encodeReply(message));
      if (this.config.signResponses) {
        packet = signPacket(packet, this.config.identity);
      }
      await this.transport.send(packet);
    } catch (error) {
      await this.output.error(`Failed to send ${message.type} to ${shortHex(destination)}: ${errorMessage(error)}`);
    }
  }

  /**
   * Encode a reply, trimming command output that would not fit in one packet.
   * The output is sized against the empty envelope first, so oversized
   * output never reaches the frame codec's own size limit.
   */
  private encodeReply(message: Message): Uint8Array {
    if (message.type !== 'CommandResponse') {
      return encodeMessage(message);
    }
    const envelope = encodeMessage({ ...message, stdout: new Uint8Array(0), stderr: new Uint8Array(0) }).length;
    const outputSize = message.stdout.length + message.stderr.length;
    // A non-empty byte string header is up to 4 bytes longer than an empty one
    const room = MAX_PACKET_DATA - envelope - 8;
    if (outputSize <= room) {
      return encodeMessage(message);
    }
    return encodeMessage(truncateOutput(message, outputSize - (room - TRUNCATION_NOTE.length)));
  }

  private startSweep(): void {
    const intervalMs = (this.config.sessionIdleTimeout * 1000) / 2;
    this.sweepTimer = setInterval(() => {
      void this.sweep().catch((error: unknown) => this.output.error(`Session sweep failed: ${errorMessage(error)}`));
    }, intervalMs);
    this.sweepTimer.unref();
  }

  private stopSweep(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
  }

  private async sweep(): Promise<void> {
    for (const session of this.registry.evictInactive()) {
      await this.output.info(`Evicted inactive session ${session.idHex()}`);
      await this.audit?.sessionClosed(session.idHex(), 'evicted');
    }
  }
}

/**
 * Drop `excess` bytes from stdout first, then stderr, and note the cut on stderr
 */
function truncateOutput(response: CommandResponse, excess: number): CommandResponse {
  const fromStdout = Math.min(excess, response.stdout.length);
  const fromStderr = Math.min(excess - fromStdout, response.stderr.length);
  return {
    ...response,
    stdout: response.stdout.subarray(0, response.stdout.length - fromStdout),
    stderr: concatBytes(response.stderr.subarray(0, response.stderr.length - fromStderr), TRUNCATION_NOTE),
  };
}

function shortHex(bytes: Uint8Array): string {
  return `${bytesToHex(bytes).slice(0, 16)}...`;
}
