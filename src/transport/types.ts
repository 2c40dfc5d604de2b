/**
 * Transport layer types
 */

import { Packet } from './packet.js';

/**
 * A packet-moving capability. Implementations: in-memory loopback pair and
 * the overlay datagram adapter.
 */
export interface Transport {
  /** Send one packet to packet.destination */
  send(packet: Packet): Promise<void>;

  /**
   * Next inbound packet; suspends until one arrives, rejects with
   * ConnectionError once the channel is closed
   */
  receive(): Promise<Packet>;

  name(): string;

  isReady(): boolean;

  close(): Promise<void>;
}

export interface LoopbackOptions {
  names?: [string, string];
  addresses?: [Uint8Array, Uint8Array];
}
