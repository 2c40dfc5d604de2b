/**
 * Wire protocol encoding/decoding
 *
 * Frame: 4-byte big-endian length (= 1 + payload length) ‖ type byte ‖ CBOR payload
 * Max payload size: 1 MiB
 */

import { encode, decode } from 'cbor';
import { concatBytes } from '../crypto/utils.js';
import { ProtocolError, errorMessage } from '../error.js';
import { Message, fromPayload, isMessageTypeCode, messageTypeCode, toPayload } from './messages.js';

export const MAX_MESSAGE_SIZE = 1024 * 1024; // 1 MiB
export const FRAME_HEADER_SIZE = 4; // 4-byte big-endian length
const TYPE_SIZE = 1;

export interface DecodedMessage {
  message: Message;
  bytesConsumed: number;
}

export interface DecodedMessages {
  messages: Message[];
  bytesConsumed: number;
}

/**
 * Encode a message to one frame
 */
export function encodeMessage(message: Message): Uint8Array {
  let payload: Uint8Array;
  try {
    payload = encode(toPayload(message));
  } catch (error) {
    throw new ProtocolError('Serialization', `Failed to encode ${message.type}: ${errorMessage(error)}`);
  }

  if (payload.byteLength > MAX_MESSAGE_SIZE) {
    throw new ProtocolError(
      'MessageTooLarge',
      `Message too large: ${payload.byteLength} > ${MAX_MESSAGE_SIZE}`,
      { size: payload.byteLength, max: MAX_MESSAGE_SIZE },
    );
  }

  const frame = new Uint8Array(FRAME_HEADER_SIZE + TYPE_SIZE + payload.byteLength);
  const view = new DataView(frame.buffer);
  view.setUint32(0, TYPE_SIZE + payload.byteLength, false); // big-endian
  frame[FRAME_HEADER_SIZE] = messageTypeCode(message);
  frame.set(payload, FRAME_HEADER_SIZE + TYPE_SIZE);

  return frame;
}

/**
 * Decode the first frame in `buffer`
 *
 * Returns null while the frame is incomplete. A declared length of zero or
 * beyond the ceiling is rejected as soon as the header is visible.
 */
export function decodeMessage(buffer: Uint8Array): DecodedMessage | null {
  if (buffer.length < FRAME_HEADER_SIZE) {
    return null;
  }

  const view = new DataView(buffer.buffer, buffer.byteOffset, buffer.byteLength);
  const length = view.getUint32(0, false);

  if (length < TYPE_SIZE) {
    throw new ProtocolError('InvalidFormat', 'Frame length must include the type byte', { length });
  }
  if (length - TYPE_SIZE > MAX_MESSAGE_SIZE) {
    throw new ProtocolError('MessageTooLarge', `Message too large: ${length - TYPE_SIZE} > ${MAX_MESSAGE_SIZE}`, {
      size: length - TYPE_SIZE,
      max: MAX_MESSAGE_SIZE,
    });
  }

  const frameSize = FRAME_HEADER_SIZE + length;
  if (buffer.length < frameSize) {
    return null;
  }

  const typeByte = buffer[FRAME_HEADER_SIZE];
  if (!isMessageTypeCode(typeByte)) {
    throw new ProtocolError('InvalidMessageType', `Unknown message type byte: 0x${typeByte.toString(16)}`, {
      typeByte,
    });
  }

  const message = decodePayload(buffer.subarray(FRAME_HEADER_SIZE + TYPE_SIZE, frameSize));
  if (messageTypeCode(message) !== typeByte) {
    throw new ProtocolError('InvalidMessageType', `Type byte 0x${typeByte.toString(16)} does not match ${message.type}`, {
      typeByte,
      payloadType: message.type,
    });
  }

  return { message, bytesConsumed: frameSize };
}

/**
 * Decode every complete frame in `buffer`
 */
export function decodeMessages(buffer: Uint8Array): DecodedMessages {
  const messages: Message[] = [];
  let offset = 0;

  for (;;) {
    const decoded = decodeMessage(buffer.subarray(offset));
    if (!decoded) {
      break;
    }
    messages.push(decoded.message);
    offset += decoded.bytesConsumed;
  }

  return { messages, bytesConsumed: offset };
}

/**
 * Accumulates stream bytes and yields messages as whole frames arrive.
 * A malformed frame discards everything buffered before the error is thrown.
 */
export class FrameReader {
  private buffer: Uint8Array = new Uint8Array(0);

  push(bytes: Uint8Array): void {
    this.buffer = concatBytes(this.buffer, bytes);
  }

  next(): Message | null {
    let decoded: DecodedMessage | null;
    try {
      decoded = decodeMessage(this.buffer);
    } catch (error) {
      this.buffer = new Uint8Array(0);
      throw error;
    }
    if (!decoded) {
      return null;
    }
    this.buffer = this.buffer.slice(decoded.bytesConsumed);
    return decoded.message;
  }

  drain(): Message[] {
    const messages: Message[] = [];
    for (let message = this.next(); message; message = this.next()) {
      messages.push(message);
    }
    return messages;
  }

  get buffered(): number {
    return this.buffer.length;
  }
}

function decodePayload(payload: Uint8Array): Message {
  let value: unknown;
  try {
    value = decode(payload);
  } catch (error) {
    throw new ProtocolError('Serialization', `Failed to decode payload: ${errorMessage(error)}`, {
      size: payload.length,
    });
  }
  return fromPayload(value);
}
