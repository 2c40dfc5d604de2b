/**
 * Buffered reader over a byte stream serving whole lines and exact-length
 * reads, in call order
 */

import { Readable } from 'stream';
import { concatBytes } from '../crypto/utils.js';
import { ConnectionError, NetworkError, errorMessage } from '../error.js';

const NEWLINE = 0x0a;
const CARRIAGE_RETURN = 0x0d;
export const MAX_LINE_LENGTH = 64 * 1024;

export class StreamReader {
  private buffer: Uint8Array = new Uint8Array(0);
  private ended = false;
  private failure: Error | null = null;
  private wakeup: (() => void) | null = null;
  private tail: Promise<void> = Promise.resolve();

  constructor(
    stream: Readable,
    private readonly maxLineLength = MAX_LINE_LENGTH,
  ) {
    stream.on('data', (chunk: Buffer | string) => {
      const bytes = typeof chunk === 'string' ? Buffer.from(chunk) : chunk;
      this.buffer = this.buffer.length === 0 ? Uint8Array.from(bytes) : concatBytes(this.buffer, bytes);
      this.notify();
    });
    stream.on('end', () => {
      this.ended = true;
      this.notify();
    });
    stream.on('close', () => {
      this.ended = true;
      this.notify();
    });
    stream.on('error', (error: Error) => {
      this.failure = error;
      this.notify();
    });
  }

  /**
   * Read one line without its terminator (LF or CRLF)
   */
  readLine(): Promise<string> {
    return this.enqueue(async () => {
      for (;;) {
        const index = this.buffer.indexOf(NEWLINE);
        if (index >= 0) {
          let end = index;
          if (end > 0 && this.buffer[end - 1] === CARRIAGE_RETURN) {
            end -= 1;
          }
          const line = Buffer.from(this.buffer.subarray(0, end)).toString('utf-8');
          this.buffer = this.buffer.slice(index + 1);
          return line;
        }
        if (this.buffer.length > this.maxLineLength) {
          throw new NetworkError(`Line exceeds ${this.maxLineLength} bytes`, {
            buffered: this.buffer.length,
          });
        }
        await this.waitForData('line');
      }
    });
  }

  /**
   * Read exactly `length` bytes
   */
  readExact(length: number): Promise<Uint8Array> {
    return this.enqueue(async () => {
      while (this.buffer.length < length) {
        await this.waitForData(`${length} bytes`);
      }
      const data = this.buffer.slice(0, length);
      this.buffer = this.buffer.slice(length);
      return data;
    });
  }

  get buffered(): number {
    return this.buffer.length;
  }

  private enqueue<T>(operation: () => Promise<T>): Promise<T> {
    const run = this.tail.then(operation);
    this.tail = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  private async waitForData(expecting: string): Promise<void> {
    if (this.failure) {
      throw new ConnectionError(`Stream error: ${errorMessage(this.failure)}`, { expecting });
    }
    if (this.ended) {
      throw new ConnectionError('Connection closed', {
        expecting,
        buffered: this.buffer.length,
      });
    }
    await new Promise<void>((resolve) => {
      this.wakeup = resolve;
    });
  }

  private notify(): void {
    const wakeup = this.wakeup;
    this.wakeup = null;
    wakeup?.();
  }
}
