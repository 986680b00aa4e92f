import { Query } from './types';
import { QueryCipher, SEAL_OVERHEAD } from './cipher';
import { encodeFrame, MAX_FRAME_BODY_SIZE } from './frame';
import { ValidationError } from './errors';

const ENCODING: BufferEncoding = 'utf-8';
const HEADER_SIZE = 13; // number of bytes for fixed size message fields: Sequence(4), Timestamp(8), ContentType(1)
const MAX_SEQUENCE = 0xffffffff;

export type ContentType = Query.ContentTypeToServer | Query.ContentTypeToClient;

export class QueryMessage {
  private readonly $buffer: Buffer;

  /**
   * @description Construct a message by wrapping a decrypted body. Use `QueryMessage.parse` for untrusted input.
   * @example
   * ```ts
   * const message = new QueryMessage(plaintext);
   * ```
   * */
  constructor(buffer: Buffer);
  /**
   * @description Construct a message from sequence number, content type and payload.
   * @param sequence - Sequential number of the message on its connection.
   * @param contentType - Content type discriminator.
   * @param [payload] - UTF-8 payload.
   * @param [timestamp] - Unix time in milliseconds, defaults to now.
   * @example
   * ```ts
   * const message = new QueryMessage(7, Query.ContentTypeToServer.Command, "/players");
   * ```
   * */
  constructor(sequence: number, contentType: ContentType, payload?: string, timestamp?: number);
  constructor(
    sequence: number | Buffer,
    contentType: ContentType = Query.ContentTypeToServer.Command,
    payload: string = '',
    timestamp: number = Date.now(),
  ) {
    if (Buffer.isBuffer(sequence)) {
      if (sequence.length < HEADER_SIZE) {
        throw new RangeError(
          `QueryMessage requires at least ${HEADER_SIZE} bytes, got ${sequence.length}`,
        );
      }
      this.$buffer = sequence;
    } else {
      this.$buffer = QueryMessage.pack(sequence, contentType, payload, timestamp);
    }
  }

  /**
   * @description Parse a decrypted body, returning null when it is shorter than the message header.
   * */
  public static parse(buffer: Buffer): QueryMessage | null {
    return buffer.length >= HEADER_SIZE ? new QueryMessage(buffer) : null;
  }

  /**
   * @description Size of the plaintext body for a payload.
   * */
  public static sizeOf(payload: string): number {
    return HEADER_SIZE + Buffer.byteLength(payload, ENCODING);
  }

  private static pack(
    sequence: number,
    contentType: ContentType,
    payload: string,
    timestamp: number,
  ): Buffer {
    const buffer = Buffer.alloc(QueryMessage.sizeOf(payload));
    buffer.writeUInt32BE(sequence, 0);
    buffer.writeBigInt64BE(BigInt(Math.trunc(timestamp)), 4);
    buffer.writeUInt8(contentType, 12);
    buffer.write(payload, HEADER_SIZE, ENCODING);
    return buffer;
  }

  public get buffer(): Buffer {
    return this.$buffer;
  }

  public get sequence(): number {
    return this.$buffer.readUInt32BE(0);
  }

  public get timestamp(): number {
    return Number(this.$buffer.readBigInt64BE(4));
  }

  public get contentType(): number {
    return this.$buffer.readUInt8(12);
  }

  public get payload(): string {
    return this.$buffer.toString(ENCODING, HEADER_SIZE);
  }

  /**
   * @description Interpret the message as server-to-client traffic.
   * */
  public decode(): Query.DecodedMessage {
    switch (this.contentType) {
      case Query.ContentTypeToClient.ConsoleString:
        return { kind: 'console-line', message: this.payload };
      case Query.ContentTypeToClient.RemoteAdminPlaintextResponse:
        return { kind: 'remote-admin-success', text: this.payload };
      case Query.ContentTypeToClient.RemoteAdminUnsuccessfulPlaintextResponse:
        return { kind: 'remote-admin-failure', text: this.payload };
      case Query.ContentTypeToClient.CommandException:
        return { kind: 'command-exception', text: this.payload };
      default:
        return {
          kind: 'unrecognized',
          contentType: this.contentType,
          cause: `unsupported content type ${this.contentType}`,
        };
    }
  }

  /**
   * @description Convert instance to a string.
   * @example
   * ```ts
   * new QueryMessage(1, Query.ContentTypeToServer.Command, "/players", 0).toString();
   * // QueryMessage{"sequence":1,"timestamp":0,"contentType":0,"payload":"/players"}
   * ```
   * */
  public toString(): string {
    return `QueryMessage${JSON.stringify({
      sequence: this.sequence,
      timestamp: this.timestamp,
      contentType: this.contentType,
      payload: this.payload,
    })}`;
  }
}

/**
 * Encodes and decodes sealed messages for one connection.
 * Outbound sequence numbers start at 1 and wrap after 2^32 - 1.
 */
export class MessageCodec {
  private $sequence = 0;
  private $maxPacketSize = MAX_FRAME_BODY_SIZE;

  constructor(private readonly cipher: QueryCipher) {}

  /**
   * @description Largest frame body the peer accepts.
   * */
  public get maxPacketSize(): number {
    return this.$maxPacketSize;
  }

  public set maxPacketSize(size: number) {
    this.$maxPacketSize = Math.min(Math.max(size, 0), MAX_FRAME_BODY_SIZE);
  }

  private get nextSequence(): number {
    if (++this.$sequence > MAX_SEQUENCE) {
      this.$sequence = 1;
    }
    return this.$sequence;
  }

  /**
   * @description Encode content into a complete frame (length prefix included).
   * @throws {ValidationError} When the sealed body exceeds `maxPacketSize`.
   * */
  public encode(content: string, contentType: ContentType): Buffer {
    const size = QueryMessage.sizeOf(content) + SEAL_OVERHEAD;
    if (size > this.$maxPacketSize) {
      throw new ValidationError(
        `Message of ${size} bytes exceeds the server's max packet size of ${this.$maxPacketSize} bytes`,
      );
    }
    const message = new QueryMessage(this.nextSequence, contentType, content);
    return encodeFrame(this.cipher.seal(message.buffer));
  }

  /**
   * @description Open a frame body into its raw message, or null when it cannot be read.
   * */
  public unpack(body: Buffer): QueryMessage | null {
    const plaintext = this.cipher.open(body);
    return plaintext ? QueryMessage.parse(plaintext) : null;
  }

  /**
   * @description Decode a frame body. Never throws; unreadable input is `unrecognized`.
   * */
  public decode(body: Buffer): Query.DecodedMessage {
    const plaintext = this.cipher.open(body);
    if (!plaintext) {
      return { kind: 'unrecognized', cause: `body of ${body.length} bytes failed authentication` };
    }
    const message = QueryMessage.parse(plaintext);
    if (!message) {
      return {
        kind: 'unrecognized',
        cause: `message of ${plaintext.length} bytes is shorter than its header`,
      };
    }
    return message.decode();
  }
}
