/**
 * Client for the overlay router's SAM v3 control protocol
 *
 * Speaks the line-oriented protocol over one stream: handshake, destination
 * generation, DATAGRAM session creation and datagram send/receive.
 * No operation retries; retry policy belongs to the caller.
 */

import { createConnection } from 'net';
import { Duplex } from 'stream';
import { ConnectionError, NetworkError, errorMessage } from '../error.js';
import { Output, SilentOutput } from '../output.js';
import { withTimeout } from '../timeout.js';
import { validateControlAddress } from '../validation.js';
import { StreamReader } from './reader.js';
import { SamReply, describeFailure, isOk, parseReply } from './reply.js';

export const DEFAULT_SAM_PORT = 7656;
export const SAM_VERSION = '3.1';
/** Ed25519 */
export const SIGNATURE_TYPE = 7;

export interface SamClientOptions {
  output?: Output;
  /** Upper bound on waiting for a command reply (ms) */
  replyTimeoutMs?: number;
  /** Upper bound on establishing the TCP connection (ms) */
  connectTimeoutMs?: number;
}

export interface GeneratedDestination {
  /** Full private descriptor (PRIV=), used to bind a session */
  privateKey: string;
  /** Public destination (PUB=) as peers see it, when the bridge reports it */
  publicKey?: string;
}

export interface ReceivedDatagram {
  source: string;
  data: Uint8Array;
}

export class SamClient {
  private readonly reader: StreamReader;
  private readonly output: Output;
  private readonly replyTimeoutMs: number;
  private closed = false;

  constructor(
    private readonly stream: Duplex,
    options: SamClientOptions = {},
  ) {
    this.reader = new StreamReader(stream);
    this.output = options.output ?? new SilentOutput();
    this.replyTimeoutMs = options.replyTimeoutMs ?? 30000;
    stream.on('close', () => {
      this.closed = true;
    });
  }

  /**
   * Open a TCP connection to host:port and perform the handshake
   */
  static async connect(address: string, options: SamClientOptions = {}): Promise<SamClient> {
    const validation = validateControlAddress(address);
    if (!validation.valid) {
      throw new NetworkError(`Invalid control address: ${address}`, {
        address,
        issues: validation.errors,
      });
    }
    const { host, port } = splitAddress(address);
    const output = options.output ?? new SilentOutput();

    await output.info(`Connecting to SAM bridge at ${host}:${port}`);

    const socket = createConnection({ host, port });
    try {
      await withTimeout(
        new Promise<void>((resolve, reject) => {
          socket.once('connect', resolve);
          socket.once('error', reject);
        }),
        options.connectTimeoutMs ?? 10000,
        'SAM connect',
      );
    } catch (error) {
      socket.destroy();
      throw new NetworkError(`Failed to connect to SAM: ${errorMessage(error)}`, { address });
    }

    const client = new SamClient(socket, { ...options, output });
    try {
      await client.handshake();
    } catch (error) {
      await client.close();
      throw error;
    }
    return client;
  }

  async handshake(): Promise<void> {
    await this.output.debug('Performing SAM handshake');
    await this.sendCommand(`HELLO VERSION MIN=${SAM_VERSION} MAX=${SAM_VERSION}`);

    const reply = await this.readReply('HELLO');
    if (reply.topic !== 'HELLO REPLY') {
      throw new NetworkError(`Unexpected handshake response: ${reply.raw}`, { reply: reply.raw });
    }
    if (!isOk(reply)) {
      throw new NetworkError(`Handshake failed: ${describeFailure(reply)}`, { reply: reply.raw });
    }

    await this.output.info(`SAM handshake successful (version ${reply.fields.get('VERSION') ?? SAM_VERSION})`);
  }

  async generateDestination(): Promise<GeneratedDestination> {
    await this.output.debug('Generating overlay destination');
    await this.sendCommand(`DEST GENERATE SIGNATURE_TYPE=${SIGNATURE_TYPE}`);

    const reply = await this.readReply('DEST GENERATE');
    if (reply.topic !== 'DEST REPLY') {
      throw new NetworkError(`Unexpected DEST GENERATE response: ${reply.raw}`, { reply: reply.raw });
    }

    const privateKey = reply.fields.get('PRIV');
    if (!privateKey) {
      throw new NetworkError('Failed to parse destination from response', { reply: reply.raw });
    }

    const publicKey = reply.fields.get('PUB');
    return publicKey ? { privateKey, publicKey } : { privateKey };
  }

  /**
   * Create a DATAGRAM session bound to `destination`, or a transient one
   */
  async createDatagramSession(sessionId: string, destination?: string): Promise<void> {
    await this.output.debug(`Creating DATAGRAM session: ${sessionId}`);

    const destinationParam = destination ?? 'TRANSIENT';
    await this.sendCommand(
      `SESSION CREATE STYLE=DATAGRAM ID=${sessionId} DESTINATION=${destinationParam} ` +
        `SIGNATURE_TYPE=${SIGNATURE_TYPE} PORT=0 HOST=127.0.0.1 FROM_PORT=0`,
    );

    const reply = await this.readReply('SESSION CREATE');
    if (reply.topic !== 'SESSION STATUS') {
      throw new NetworkError(`Unexpected SESSION CREATE response: ${reply.raw}`, { reply: reply.raw });
    }
    if (!isOk(reply)) {
      throw new NetworkError(`Session creation failed: ${describeFailure(reply)}`, {
        reply: reply.raw,
        sessionId,
      });
    }

    await this.output.info(`SAM DATAGRAM session created: ${sessionId}`);
  }

  /**
   * Header line and payload go out in a single write
   */
  async sendDatagram(sessionId: string, destination: string, data: Uint8Array): Promise<void> {
    await this.output.debug(`Sending datagram via session ${sessionId}, ${data.length} bytes`);

    const header = Buffer.from(
      `DATAGRAM SEND ID=${sessionId} DESTINATION=${destination} SIZE=${data.length}\n`,
      'utf-8',
    );
    try {
      await this.write(Buffer.concat([header, data]));
    } catch (error) {
      throw new NetworkError(`Failed to send datagram: ${errorMessage(error)}`, {
        sessionId,
        size: data.length,
      });
    }
  }

  /**
   * Wait for the next inbound datagram
   */
  async receiveDatagram(): Promise<ReceivedDatagram> {
    const line = await this.readLine('datagram');
    const reply = parseReply(line);

    if (reply.topic !== 'DATAGRAM RECEIVED') {
      throw new NetworkError(`Unexpected datagram response: ${line}`, { reply: line });
    }

    const source = reply.fields.get('DESTINATION');
    if (!source) {
      throw new NetworkError('Missing DESTINATION in datagram response', { reply: line });
    }
    const sizeField = reply.fields.get('SIZE');
    if (sizeField === undefined) {
      throw new NetworkError('Missing SIZE in datagram response', { reply: line });
    }
    if (!/^\d+$/.test(sizeField)) {
      throw new NetworkError('Invalid SIZE in datagram', { reply: line });
    }
    const size = Number(sizeField);

    let data: Uint8Array;
    try {
      data = await this.reader.readExact(size);
    } catch (error) {
      throw new NetworkError(`Failed to read datagram data: ${errorMessage(error)}`, { size });
    }

    await this.output.debug(`Received datagram from ${source.slice(0, 20)}..., ${size} bytes`);
    return { source, data };
  }

  isOpen(): boolean {
    return !this.closed && !this.stream.destroyed;
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    await this.output.debug('Closing SAM connection');
    this.stream.end();
    this.stream.destroy();
  }

  private async sendCommand(command: string): Promise<void> {
    try {
      await this.write(Buffer.from(`${command}\n`, 'utf-8'));
    } catch (error) {
      throw new NetworkError(`Failed to send SAM command: ${errorMessage(error)}`, {
        command: command.split(' ').slice(0, 2).join(' '),
      });
    }
  }

  private async readReply(operation: string): Promise<SamReply> {
    const line = await withTimeout(this.readLine(operation), this.replyTimeoutMs, `${operation} reply`);
    await this.output.debug(`${operation} response: ${line}`);
    return parseReply(line);
  }

  private async readLine(operation: string): Promise<string> {
    try {
      return await this.reader.readLine();
    } catch (error) {
      if (error instanceof ConnectionError || error instanceof NetworkError) {
        throw new NetworkError(`Failed to read SAM response: ${error.message}`, { operation });
      }
      throw error;
    }
  }

  private write(data: Uint8Array): Promise<void> {
    if (!this.isOpen()) {
      return Promise.reject(new ConnectionError('SAM connection closed'));
    }
    return new Promise((resolve, reject) => {
      this.stream.write(data, (error) => {
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      });
    });
  }
}

function splitAddress(address: string): { host: string; port: number } {
  const index = address.lastIndexOf(':');
  if (index < 0) {
    return { host: address, port: DEFAULT_SAM_PORT };
  }
  return { host: address.slice(0, index), port: Number(address.slice(index + 1)) };
}
