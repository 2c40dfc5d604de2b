/**
 * Server behaviour against misbehaving peers
 */

import { describe, it, expect, afterEach } from 'vitest';
import {
  Identity,
  LoopbackTransport,
  Message,
  MockOutput,
  RejectCode,
  ShellServer,
  buildServerConfig,
  dataPacket,
  decodeMessages,
  encodeMessage,
  verifyPacket,
} from '../../src/index.js';
import type { Packet } from '../../src/index.js';

const CLIENT_ADDRESS = new Uint8Array(32).fill(0xc1);
const SERVER_ADDRESS = new Uint8Array(32).fill(0x5e);
const CLIENT_PREFIX = 'c1c1c1c1c1c1c1c1...';

const clientIdentity = Identity.generate();

interface Peer {
  raw: LoopbackTransport;
  server: ShellServer;
  serverIdentity: Identity;
  output: MockOutput;
  running: Promise<void>;
}

describe('Server robustness', () => {
  const peers: Peer[] = [];

  afterEach(async () => {
    for (const { raw, server, running } of peers.splice(0)) {
      await server.stop();
      await running;
      await raw.close();
    }
  });

  function start(options: Parameters<typeof buildServerConfig>[0] = {}): Peer {
    const [raw, serverTransport] = LoopbackTransport.createPair({ addresses: [CLIENT_ADDRESS, SERVER_ADDRESS] });
    const config = buildServerConfig(options);
    const output = new MockOutput();
    const server = new ShellServer(config, serverTransport, output);
    const peer = { raw, server, serverIdentity: config.identity, output, running: server.run() };
    peers.push(peer);
    return peer;
  }

  async function send(raw: LoopbackTransport, data: Uint8Array): Promise<void> {
    await raw.send(dataPacket(SERVER_ADDRESS, data));
  }

  async function reply(raw: LoopbackTransport): Promise<{ packet: Packet; messages: Message[] }> {
    const packet = await raw.receive();
    return { packet, messages: decodeMessages(packet.data).messages };
  }

  async function connect(raw: LoopbackTransport): Promise<Message[]> {
    await send(
      raw,
      encodeMessage({
        type: 'Connect',
        protocolVersion: 1,
        clientIdentity: clientIdentity.publicKey(),
        capabilities: ['command-exec'],
      }),
    );
    return (await reply(raw)).messages;
  }

  it('drops a malformed frame and keeps serving', async () => {
    const { raw, output } = start();

    await send(raw, new Uint8Array([0, 0, 0, 0]));
    const [accept] = await connect(raw);

    expect(accept?.type).toBe('Accept');
    expect(output.warnings).toContain(
      `Dropping malformed packet from ${CLIENT_PREFIX}: Frame length must include the type byte`,
    );
  });

  it('drops an unknown message type', async () => {
    const { raw, output } = start();

    await send(raw, new Uint8Array([0, 0, 0, 1, 0x7f]));
    const [accept] = await connect(raw);

    expect(accept?.type).toBe('Accept');
    expect(output.warnings).toContain(
      `Dropping malformed packet from ${CLIENT_PREFIX}: Unknown message type byte: 0x7f`,
    );
  });

  it('drops session messages from senders without a session', async () => {
    const { raw, output, server } = start();

    await send(raw, encodeMessage({ type: 'Ping' }));
    await send(raw, encodeMessage({ type: 'CommandRequest', id: 1n, command: 'true', args: [] }));
    const [accept] = await connect(raw);

    expect(accept?.type).toBe('Accept');
    expect(output.warnings).toEqual([
      `No session for ${CLIENT_PREFIX}, dropping Ping`,
      `No session for ${CLIENT_PREFIX}, dropping CommandRequest`,
    ]);
    expect(server.sessionCount()).toBe(1);
  });

  it('handles every frame in one packet in order', async () => {
    const { raw } = start();
    await connect(raw);

    const frames = [encodeMessage({ type: 'Ping' }), encodeMessage({ type: 'Ping' })];
    const data = new Uint8Array(frames[0].length * 2);
    data.set(frames[0], 0);
    data.set(frames[1], frames[0].length);
    await send(raw, data);

    expect((await reply(raw)).messages).toEqual([{ type: 'Pong' }]);
    expect((await reply(raw)).messages).toEqual([{ type: 'Pong' }]);
  });

  it('rejects a version mismatch without creating a session', async () => {
    const { raw, server } = start();

    await send(
      raw,
      encodeMessage({ type: 'Connect', protocolVersion: 9, clientIdentity: clientIdentity.publicKey(), capabilities: [] }),
    );

    expect((await reply(raw)).messages).toEqual([
      { type: 'Reject', reason: 'Protocol version mismatch: expected 1, got 9', errorCode: RejectCode.VersionMismatch },
    ]);
    expect(server.sessionCount()).toBe(0);
  });

  it('rejects unlisted clients', async () => {
    const { raw } = start({ allowedClients: ['ab'.repeat(32)] });
    const [reject] = await connect(raw);
    expect(reject).toEqual({
      type: 'Reject',
      reason: 'Client identity not authorized',
      errorCode: RejectCode.Unauthorized,
    });
  });

  it('signs replies with the server identity', async () => {
    const { raw, serverIdentity } = start({ signResponses: true });

    await send(
      raw,
      encodeMessage({ type: 'Connect', protocolVersion: 1, clientIdentity: clientIdentity.publicKey(), capabilities: [] }),
    );
    const { packet, messages } = await reply(raw);

    expect(messages[0]?.type).toBe('Accept');
    expect(packet.signature?.length).toBe(64);
    expect(() => verifyPacket(packet, serverIdentity.publicKey())).not.toThrow();
  });

  it('acknowledges Disconnect and forgets the session', async () => {
    const { raw, server } = start();
    await connect(raw);

    await send(raw, encodeMessage({ type: 'Disconnect', reason: 'done' }));

    expect((await reply(raw)).messages).toEqual([{ type: 'Ack', messageId: 0n }]);
    expect(server.sessionCount()).toBe(0);
  });

  it('ends the loop when the transport closes', async () => {
    const { server, running } = start();
    await server.stop();
    await expect(running).resolves.toBeUndefined();
    expect(server.isRunning()).toBe(false);
  });
});
