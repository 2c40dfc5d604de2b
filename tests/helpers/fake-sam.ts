/**
 * In-process stand-in for an overlay router's SAM bridge
 *
 * Reads the client's command lines from one PassThrough, answers with
 * scripted reply lines on the other, records DATAGRAM SEND payloads and can
 * inject inbound datagrams.
 */

import { Duplex, PassThrough } from 'stream';
import { parseReply } from '../../src/sam/reply.js';

export interface SentDatagram {
  sessionId: string;
  destination: string;
  payload: Uint8Array;
}

export interface FakeSamReplies {
  /** null means the bridge stays silent */
  hello: string | null;
  dest: string | null;
  session: string | null;
}

export const TEST_PUB_DESTINATION = 'test-pub-destination~AAAA';
export const TEST_PRIV_DESTINATION = 'test-priv-destination~BBBB';

export const DEFAULT_REPLIES: FakeSamReplies = {
  hello: 'HELLO REPLY RESULT=OK VERSION=3.1',
  dest: `DEST REPLY PUB=${TEST_PUB_DESTINATION} PRIV=${TEST_PRIV_DESTINATION}`,
  session: 'SESSION STATUS RESULT=OK',
};

export class FakeSamBridge {
  /** Client end of the connection */
  readonly stream: Duplex;
  readonly commands: string[] = [];
  readonly sent: SentDatagram[] = [];
  /** Called for every datagram the client sends */
  onSent: ((datagram: SentDatagram) => void) | null = null;
  private readonly replies: FakeSamReplies;
  private readonly fromClient = new PassThrough();
  private readonly toClient = new PassThrough();
  private buffer = Buffer.alloc(0);
  private pendingSend: { sessionId: string; destination: string; size: number } | null = null;
  private sentWaiters: (() => void)[] = [];

  constructor(replies: Partial<FakeSamReplies> = {}) {
    this.replies = { ...DEFAULT_REPLIES, ...replies };
    this.stream = Duplex.from({ readable: this.toClient, writable: this.fromClient });
    this.fromClient.on('data', (chunk: Buffer) => this.onData(chunk));
  }

  /**
   * Push an inbound datagram to the client
   */
  deliver(source: string, payload: Uint8Array): void {
    this.toClient.write(
      Buffer.concat([Buffer.from(`DATAGRAM RECEIVED DESTINATION=${source} SIZE=${payload.length}\n`), payload]),
    );
  }

  /**
   * Write arbitrary bytes to the client
   */
  sendRaw(data: string | Uint8Array): void {
    this.toClient.write(data);
  }

  /**
   * End the bridge side of the connection
   */
  hangUp(): void {
    this.toClient.end();
  }

  /**
   * Resolves once `count` datagrams have been sent
   */
  waitForSent(count: number): Promise<SentDatagram[]> {
    return new Promise((resolve) => {
      const check = (): void => {
        if (this.sent.length >= count) {
          resolve(this.sent.slice(0, count));
        } else {
          this.sentWaiters.push(check);
        }
      };
      check();
    });
  }

  private onData(chunk: Buffer): void {
    this.buffer = Buffer.concat([this.buffer, chunk]);
    for (;;) {
      if (this.pendingSend) {
        if (this.buffer.length < this.pendingSend.size) {
          return;
        }
        const { sessionId, destination, size } = this.pendingSend;
        const datagram = { sessionId, destination, payload: Uint8Array.from(this.buffer.subarray(0, size)) };
        this.sent.push(datagram);
        this.onSent?.(datagram);
        this.buffer = this.buffer.subarray(size);
        this.pendingSend = null;
        for (const waiter of this.sentWaiters.splice(0)) {
          waiter();
        }
        continue;
      }

      const index = this.buffer.indexOf(0x0a);
      if (index < 0) {
        return;
      }
      const line = this.buffer.subarray(0, index).toString('utf-8');
      this.buffer = this.buffer.subarray(index + 1);
      this.commands.push(line);
      this.handleLine(line);
    }
  }

  private handleLine(line: string): void {
    if (line.startsWith('HELLO VERSION')) {
      this.reply(this.replies.hello);
    } else if (line.startsWith('DEST GENERATE')) {
      this.reply(this.replies.dest);
    } else if (line.startsWith('SESSION CREATE')) {
      this.reply(this.replies.session);
    } else if (line.startsWith('DATAGRAM SEND')) {
      const fields = parseReply(line).fields;
      this.pendingSend = {
        sessionId: fields.get('ID') ?? '',
        destination: fields.get('DESTINATION') ?? '',
        size: Number(fields.get('SIZE') ?? '0'),
      };
    }
  }

  private reply(line: string | null): void {
    if (line !== null) {
      this.toClient.write(`${line}\n`);
    }
  }
}
