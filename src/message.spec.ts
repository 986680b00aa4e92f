import { describe, expect, it } from 'vitest';
import { MessageCodec, QueryMessage } from './message';
import { QueryCipher, SEAL_OVERHEAD } from './cipher';
import { FrameDecoder } from './frame';
import { ValidationError } from './errors';
import { Query } from './types';

const PASSWORD = 'test-secret';

function bodyOf(frame: Buffer): Buffer {
  const [body] = new FrameDecoder().push(frame);
  return body;
}

describe('QueryMessage', () => {
  it('packs sequence, timestamp, content type and payload', () => {
    const message = new QueryMessage(7, Query.ContentTypeToServer.Command, '/players', 1000);

    expect(message.buffer.length).toBe(13 + '/players'.length);
    expect(message.buffer.readUInt32BE(0)).toBe(7);
    expect(message.buffer.readBigInt64BE(4)).toBe(1000n);
    expect(message.buffer.readUInt8(12)).toBe(0);
    expect(message.sequence).toBe(7);
    expect(message.timestamp).toBe(1000);
    expect(message.contentType).toBe(Query.ContentTypeToServer.Command);
    expect(message.payload).toBe('/players');
  });

  it('keeps multi-byte UTF-8 payloads intact', () => {
    const message = new QueryMessage(new QueryMessage(1, Query.ContentTypeToServer.RawContent, 'zażółć 🙂').buffer);
    expect(message.payload).toBe('zażółć 🙂');
  });

  it('renders as a string', () => {
    const message = new QueryMessage(1, Query.ContentTypeToServer.Command, '/players', 0);
    expect(message.toString()).toBe(
      'QueryMessage{"sequence":1,"timestamp":0,"contentType":0,"payload":"/players"}',
    );
  });

  it('refuses to parse buffers shorter than the header', () => {
    expect(QueryMessage.parse(Buffer.alloc(12))).toBeNull();
    expect(() => new QueryMessage(Buffer.alloc(3))).toThrow(RangeError);
  });

  it.each([
    [Query.ContentTypeToClient.ConsoleString, { kind: 'console-line', message: 'text' }],
    [Query.ContentTypeToClient.RemoteAdminPlaintextResponse, { kind: 'remote-admin-success', text: 'text' }],
    [
      Query.ContentTypeToClient.RemoteAdminUnsuccessfulPlaintextResponse,
      { kind: 'remote-admin-failure', text: 'text' },
    ],
    [Query.ContentTypeToClient.CommandException, { kind: 'command-exception', text: 'text' }],
  ])('decodes content type %i', (contentType, expected) => {
    expect(new QueryMessage(1, contentType, 'text').decode()).toEqual(expected);
  });

  it('decodes reserved and unknown content types as unrecognized', () => {
    expect(
      new QueryMessage(1, Query.ContentTypeToClient.RemoteAdminSerializedResponse, 'x').decode(),
    ).toEqual({ kind: 'unrecognized', contentType: 2, cause: 'unsupported content type 2' });

    const unknown = Buffer.alloc(13);
    unknown.writeUInt8(200, 12);
    expect(new QueryMessage(unknown).decode()).toEqual({
      kind: 'unrecognized',
      contentType: 200,
      cause: 'unsupported content type 200',
    });
  });
});

describe('MessageCodec', () => {
  it.each([Query.ContentTypeToServer.Command, Query.ContentTypeToServer.RawContent])(
    'preserves content through encode and unpack for content type %i',
    (contentType) => {
      const frame = new MessageCodec(new QueryCipher(PASSWORD)).encode('/ban player 60', contentType);
      const message = new MessageCodec(new QueryCipher(PASSWORD)).unpack(bodyOf(frame));

      expect(message?.payload).toBe('/ban player 60');
      expect(message?.contentType).toBe(contentType);
    },
  );

  it('numbers outbound messages from 1', () => {
    const sender = new MessageCodec(new QueryCipher(PASSWORD));
    const receiver = new MessageCodec(new QueryCipher(PASSWORD));

    const sequences = ['/a', '/b', '/c'].map(
      (command) => receiver.unpack(bodyOf(sender.encode(command, Query.ContentTypeToServer.Command)))?.sequence,
    );
    expect(sequences).toEqual([1, 2, 3]);
  });

  it('seals the message so the payload is not readable on the wire', () => {
    const frame = new MessageCodec(new QueryCipher(PASSWORD)).encode(
      '/plaintext-marker',
      Query.ContentTypeToServer.Command,
    );
    expect(frame.length).toBe(2 + 13 + '/plaintext-marker'.length + SEAL_OVERHEAD);
    expect(frame.includes(Buffer.from('/plaintext-marker'))).toBe(false);
  });

  it('rejects messages above the max packet size', () => {
    const codec = new MessageCodec(new QueryCipher(PASSWORD));
    codec.maxPacketSize = 13 + SEAL_OVERHEAD + 4;

    expect(codec.encode('/abc', Query.ContentTypeToServer.Command).length).toBe(2 + 13 + 4 + SEAL_OVERHEAD);
    expect(() => codec.encode('/abcd', Query.ContentTypeToServer.Command)).toThrow(ValidationError);
  });

  it('decodes bodies sealed with another password as unrecognized', () => {
    const frame = new MessageCodec(new QueryCipher('other-secret')).encode(
      'hello',
      Query.ContentTypeToClient.ConsoleString,
    );
    const decoded = new MessageCodec(new QueryCipher(PASSWORD)).decode(bodyOf(frame));
    expect(decoded.kind).toBe('unrecognized');
  });

  it('decodes tampered and truncated bodies as unrecognized', () => {
    const codec = new MessageCodec(new QueryCipher(PASSWORD));
    const body = bodyOf(codec.encode('hello', Query.ContentTypeToClient.ConsoleString));
    body[body.length - 1] ^= 0xff;

    expect(codec.decode(body).kind).toBe('unrecognized');
    expect(codec.decode(Buffer.alloc(5))).toEqual({
      kind: 'unrecognized',
      cause: 'body of 5 bytes failed authentication',
    });
  });

  it('decodes a console line sealed with the shared password', () => {
    const server = new MessageCodec(new QueryCipher(PASSWORD));
    const client = new MessageCodec(new QueryCipher(PASSWORD));
    const frame = server.encode('Round started', Query.ContentTypeToClient.ConsoleString);

    expect(client.decode(bodyOf(frame))).toEqual({ kind: 'console-line', message: 'Round started' });
  });
});
