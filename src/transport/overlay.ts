/**
 * Transport over an overlay DATAGRAM session
 *
 * Peers are known to callers by 32-byte addresses (SHA-256 of the overlay
 * destination string). The adapter keeps the address → destination map used
 * to route outbound packets; senders are added as their datagrams arrive.
 */

import { Address } from '../crypto/identity.js';
import { bytesToHex, randomBytes, sha256Hash, stringToBytes } from '../crypto/utils.js';
import { NetworkError } from '../error.js';
import { Output, SilentOutput } from '../output.js';
import { SamClient, SamClientOptions } from '../sam/client.js';
import { DEFAULT_CONTROL_ADDRESS } from '../config.js';
import { Packet, decodePacket, describePacket, encodePacket } from './packet.js';
import { Transport } from './types.js';

export interface OverlayTransportOptions {
  /** Already-connected control client; takes precedence over controlAddress */
  client?: SamClient;
  controlAddress?: string;
  /** Overlay session id; random when omitted */
  sessionId?: string;
  output?: Output;
  sam?: Omit<SamClientOptions, 'output'>;
}

export class OverlayTransport implements Transport {
  private readonly destinations = new Map<string, string>();
  private readonly ownAddress: Address;
  private ready = true;

  private constructor(
    private readonly client: SamClient,
    private readonly sessionId: string,
    private readonly destination: string,
    private readonly output: Output,
  ) {
    this.ownAddress = this.registerDestination(destination);
  }

  /**
   * Connect, generate a destination and bind a DATAGRAM session to it
   */
  static async create(options: OverlayTransportOptions = {}): Promise<OverlayTransport> {
    const output = options.output ?? new SilentOutput();
    const client =
      options.client ??
      (await SamClient.connect(options.controlAddress ?? DEFAULT_CONTROL_ADDRESS, {
        ...options.sam,
        output,
      }));
    const sessionId = options.sessionId ?? `veilshell-${bytesToHex(randomBytes(4))}`;

    try {
      const generated = await client.generateDestination();
      await client.createDatagramSession(sessionId, generated.privateKey);

      // Peers see the public form; older bridges only report PRIV
      const destination = generated.publicKey ?? generated.privateKey;
      const transport = new OverlayTransport(client, sessionId, destination, output);

      await output.success(`Overlay transport ready (address ${bytesToHex(transport.ownAddress).slice(0, 16)}...)`);
      return transport;
    } catch (error) {
      await client.close();
      throw error;
    }
  }

  /**
   * Remember a destination and return its address
   */
  registerDestination(destination: string): Address {
    const address = addressOfDestination(destination);
    this.destinations.set(bytesToHex(address), destination);
    return address;
  }

  resolve(address: Address): string | undefined {
    return this.destinations.get(bytesToHex(address));
  }

  localDestination(): string {
    return this.destination;
  }

  localAddress(): Address {
    return Uint8Array.from(this.ownAddress);
  }

  async send(packet: Packet): Promise<void> {
    const destination = this.resolve(packet.destination);
    if (destination === undefined) {
      throw new NetworkError('Unknown destination address', {
        address: bytesToHex(packet.destination),
      });
    }

    await this.output.debug(`Sending ${describePacket(packet)}`);
    await this.client.sendDatagram(this.sessionId, destination, encodePacket(packet));
  }

  async receive(): Promise<Packet> {
    const datagram = await this.client.receiveDatagram();
    const source = this.registerDestination(datagram.source);

    const packet = decodePacket(datagram.data);
    packet.source = source;
    await this.output.debug(`Received ${describePacket(packet)} from ${bytesToHex(source).slice(0, 16)}...`);
    return packet;
  }

  name(): string {
    return `overlay:${this.sessionId}`;
  }

  isReady(): boolean {
    return this.ready && this.client.isOpen();
  }

  async close(): Promise<void> {
    this.ready = false;
    await this.client.close();
  }
}

export function addressOfDestination(destination: string): Address {
  return sha256Hash(stringToBytes(destination));
}
