import { describe, it, expect } from 'vitest';
import { PassThrough } from 'stream';
import { ConnectionError, NetworkError } from '../../src/error.js';
import { StreamReader } from '../../src/sam/reader.js';
import { describeFailure, isOk, parseReply } from '../../src/sam/reply.js';

describe('parseReply', () => {
  it('splits topic words from fields', () => {
    const reply = parseReply('HELLO REPLY RESULT=OK VERSION=3.1');
    expect(reply.topic).toBe('HELLO REPLY');
    expect(reply.fields.get('RESULT')).toBe('OK');
    expect(reply.fields.get('VERSION')).toBe('3.1');
    expect(isOk(reply)).toBe(true);
  });

  it('keeps "=" inside values', () => {
    const reply = parseReply('DEST REPLY PUB=abc~== PRIV=def==');
    expect(reply.fields.get('PUB')).toBe('abc~==');
    expect(reply.fields.get('PRIV')).toBe('def==');
  });

  it('unquotes values with spaces', () => {
    const reply = parseReply('SESSION STATUS RESULT=DUPLICATED_ID MESSAGE="Session id in use"');
    expect(reply.fields.get('MESSAGE')).toBe('Session id in use');
    expect(isOk(reply)).toBe(false);
    expect(describeFailure(reply)).toBe('DUPLICATED_ID (Session id in use)');
  });

  it('describes a reply without RESULT', () => {
    expect(describeFailure(parseReply('SESSION STATUS'))).toBe('no RESULT');
  });
});

describe('StreamReader', () => {
  it('reads LF and CRLF terminated lines', async () => {
    const stream = new PassThrough();
    const reader = new StreamReader(stream);
    stream.write('first\r\nsecond\n');

    expect(await reader.readLine()).toBe('first');
    expect(await reader.readLine()).toBe('second');
  });

  it('waits for the rest of a line', async () => {
    const stream = new PassThrough();
    const reader = new StreamReader(stream);
    const pending = reader.readLine();
    stream.write('par');
    stream.write('tial\n');
    expect(await pending).toBe('partial');
  });

  it('serves line and exact reads in call order', async () => {
    const stream = new PassThrough();
    const reader = new StreamReader(stream);
    const line = reader.readLine();
    const body = reader.readExact(3);
    const next = reader.readLine();

    stream.write(Buffer.concat([Buffer.from('HEADER SIZE=3\n'), Buffer.from([0x0a, 0x00, 0xff]), Buffer.from('NEXT\n')]));

    expect(await line).toBe('HEADER SIZE=3');
    expect(await body).toEqual(new Uint8Array([0x0a, 0x00, 0xff]));
    expect(await next).toBe('NEXT');
    expect(reader.buffered).toBe(0);
  });

  it('reports closure before a full line as a connection error', async () => {
    const stream = new PassThrough();
    const reader = new StreamReader(stream);
    stream.end('no newline');
    await expect(reader.readLine()).rejects.toBeInstanceOf(ConnectionError);
  });

  it('reports closure before enough bytes', async () => {
    const stream = new PassThrough();
    const reader = new StreamReader(stream);
    const pending = reader.readExact(10);
    stream.end(Buffer.from([1, 2, 3]));
    await expect(pending).rejects.toThrow('Connection closed');
  });

  it('bounds line length', async () => {
    const stream = new PassThrough();
    const reader = new StreamReader(stream, 8);
    stream.write('0123456789');
    await expect(reader.readLine()).rejects.toBeInstanceOf(NetworkError);
  });

  it('reports stream errors', async () => {
    const stream = new PassThrough();
    const reader = new StreamReader(stream);
    const pending = reader.readLine();
    stream.destroy(new Error('reset by peer'));
    await expect(pending).rejects.toThrow('Stream error: reset by peer');
  });
});
