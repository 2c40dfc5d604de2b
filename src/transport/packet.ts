/**
 * Binary packet envelope carried by every transport
 *
 * Wire format (big-endian):
 * - type: 1 byte
 * - destination: 32 bytes
 * - data_len: u16
 * - data: data_len bytes
 * - sig_flag: 1 byte (0x00 or 0x01)
 * - signature: 64 bytes, only when sig_flag is 0x01
 */

import { ADDRESS_LENGTH, Address, Identity, SIGNATURE_LENGTH } from '../crypto/identity.js';
import { bytesToHex } from '../crypto/utils.js';
import { PacketError } from '../error.js';

export enum PacketType {
  Data = 0x00,
  Announce = 0x01,
  LinkRequest = 0x02,
  LinkResponse = 0x03,
  Proof = 0x04,
}

export const MAX_PACKET_DATA = 0xffff;
const HEADER_SIZE = 1 + ADDRESS_LENGTH + 2; // 35
const SIG_ABSENT = 0x00;
const SIG_PRESENT = 0x01;

export interface Packet {
  type: PacketType;
  destination: Address;
  data: Uint8Array;
  signature?: Uint8Array;
  /** Sender address as observed by the transport; never encoded */
  source?: Address;
}

export function isPacketType(value: number): value is PacketType {
  return value >= PacketType.Data && value <= PacketType.Proof;
}

export function createPacket(type: PacketType, destination: Address, data: Uint8Array): Packet {
  return { type, destination, data };
}

export function dataPacket(destination: Address, data: Uint8Array): Packet {
  return createPacket(PacketType.Data, destination, data);
}

export function announcePacket(destination: Address, data: Uint8Array): Packet {
  return createPacket(PacketType.Announce, destination, data);
}

export function withSignature(packet: Packet, signature: Uint8Array): Packet {
  return { ...packet, signature };
}

/**
 * Bytes covered by the signature: everything before the signature flag
 */
export function signableData(packet: Packet): Uint8Array {
  checkFields(packet);
  const buffer = new Uint8Array(HEADER_SIZE + packet.data.length);
  const view = new DataView(buffer.buffer);
  buffer[0] = packet.type;
  buffer.set(packet.destination, 1);
  view.setUint16(1 + ADDRESS_LENGTH, packet.data.length, false);
  buffer.set(packet.data, HEADER_SIZE);
  return buffer;
}

export function signPacket(packet: Packet, identity: Identity): Packet {
  return withSignature(packet, identity.sign(signableData(packet)));
}

/**
 * Throws CryptoError unless the packet carries a valid signature by publicKey
 */
export function verifyPacket(packet: Packet, publicKey: Uint8Array): void {
  if (!packet.signature) {
    throw new PacketError('Packet is not signed');
  }
  Identity.verifyExternal(publicKey, signableData(packet), packet.signature);
}

export function encodePacket(packet: Packet): Uint8Array {
  const signable = signableData(packet);
  const signature = packet.signature;
  const frame = new Uint8Array(signable.length + 1 + (signature ? SIGNATURE_LENGTH : 0));
  frame.set(signable, 0);
  if (signature) {
    frame[signable.length] = SIG_PRESENT;
    frame.set(signature, signable.length + 1);
  } else {
    frame[signable.length] = SIG_ABSENT;
  }
  return frame;
}

export function decodePacket(bytes: Uint8Array): Packet {
  if (bytes.length < HEADER_SIZE) {
    throw new PacketError('Packet too short', { length: bytes.length });
  }

  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const typeByte = bytes[0];
  if (!isPacketType(typeByte)) {
    throw new PacketError(`Invalid packet type: ${typeByte}`, { type: typeByte });
  }

  const destination = bytes.slice(1, 1 + ADDRESS_LENGTH);
  const dataLength = view.getUint16(1 + ADDRESS_LENGTH, false);
  const flagOffset = HEADER_SIZE + dataLength;

  // data plus the signature flag must fit
  if (flagOffset + 1 > bytes.length) {
    throw new PacketError('Invalid data length', {
      declared: dataLength,
      available: bytes.length - HEADER_SIZE,
    });
  }

  const data = bytes.slice(HEADER_SIZE, flagOffset);
  const flag = bytes[flagOffset];
  const rest = bytes.length - flagOffset - 1;

  if (flag === SIG_ABSENT) {
    if (rest !== 0) {
      throw new PacketError('Trailing bytes after packet', { trailing: rest });
    }
    return { type: typeByte, destination, data };
  }

  if (flag !== SIG_PRESENT) {
    throw new PacketError(`Invalid signature flag: ${flag}`, { flag });
  }
  if (rest !== SIGNATURE_LENGTH) {
    throw new PacketError('Invalid signature length', { length: rest });
  }

  return {
    type: typeByte,
    destination,
    data,
    signature: bytes.slice(flagOffset + 1),
  };
}

export function describePacket(packet: Packet): string {
  return `${PacketType[packet.type]} to ${bytesToHex(packet.destination).slice(0, 16)}... ` +
    `(${packet.data.length} bytes${packet.signature ? ', signed' : ''})`;
}

function checkFields(packet: Packet): void {
  if (packet.destination.length !== ADDRESS_LENGTH) {
    throw new PacketError(`Destination must be ${ADDRESS_LENGTH} bytes`, {
      length: packet.destination.length,
    });
  }
  if (packet.data.length > MAX_PACKET_DATA) {
    throw new PacketError(`Packet data too large: ${packet.data.length} > ${MAX_PACKET_DATA}`, {
      length: packet.data.length,
    });
  }
  if (packet.signature && packet.signature.length !== SIGNATURE_LENGTH) {
    throw new PacketError(`Signature must be ${SIGNATURE_LENGTH} bytes`, {
      length: packet.signature.length,
    });
  }
}
