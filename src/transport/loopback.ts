/**
 * In-memory transport pair for tests and in-process composition
 */

import { ADDRESS_LENGTH } from '../crypto/identity.js';
import { randomBytes } from '../crypto/utils.js';
import { ConnectionError } from '../error.js';
import { Packet } from './packet.js';
import { AsyncQueue } from './queue.js';
import { LoopbackOptions, Transport } from './types.js';

export class LoopbackTransport implements Transport {
  private closed = false;

  private constructor(
    private readonly transportName: string,
    readonly localAddress: Uint8Array,
    private readonly inbound: AsyncQueue<Packet>,
    private readonly outbound: AsyncQueue<Packet>,
  ) {}

  /**
   * Create two endpoints joined by one queue in each direction
   */
  static createPair(options: LoopbackOptions = {}): [LoopbackTransport, LoopbackTransport] {
    const [firstName, secondName] = options.names ?? ['loopback-client', 'loopback-server'];
    const [firstAddress, secondAddress] = options.addresses ?? [
      randomBytes(ADDRESS_LENGTH),
      randomBytes(ADDRESS_LENGTH),
    ];

    const firstToSecond = new AsyncQueue<Packet>(`${firstName}->${secondName}`);
    const secondToFirst = new AsyncQueue<Packet>(`${secondName}->${firstName}`);

    return [
      new LoopbackTransport(firstName, firstAddress, secondToFirst, firstToSecond),
      new LoopbackTransport(secondName, secondAddress, firstToSecond, secondToFirst),
    ];
  }

  async send(packet: Packet): Promise<void> {
    if (this.closed) {
      throw new ConnectionError('Send failed: transport closed', { transport: this.transportName });
    }

    const copy: Packet = {
      type: packet.type,
      destination: Uint8Array.from(packet.destination),
      data: Uint8Array.from(packet.data),
      source: Uint8Array.from(this.localAddress),
    };
    if (packet.signature) {
      copy.signature = Uint8Array.from(packet.signature);
    }

    if (!this.outbound.push(copy)) {
      throw new ConnectionError('Send failed: peer closed', { transport: this.transportName });
    }
  }

  receive(): Promise<Packet> {
    return this.inbound.shift();
  }

  name(): string {
    return this.transportName;
  }

  isReady(): boolean {
    return !this.closed && !this.outbound.isClosed();
  }

  async close(): Promise<void> {
    this.closed = true;
    this.outbound.close();
    this.inbound.close();
  }
}
