import { Query } from './types';
import { QueryCipher, SEAL_OVERHEAD } from './cipher';
import { encodeFrame } from './frame';
import { QueryMessage } from './message';
import { AuthenticationError, HandshakeProtocolError, ValidationError } from './errors';

export const AUTH_CHALLENGE_SIZE = 24;
export const MAX_USERNAME_BYTES = 0xff;
export const MAX_PERMISSIONS = 0xffffffffffffffffn;

const SERVER_HELLO_SIZE = 34; // MaxPacketSize(2), AuthChallenge(24), Timestamp(8)
const CLIENT_HANDSHAKE_FIXED_SIZE = 44; // Flags(2), Permissions(8), KickPower(1), AuthChallenge(24), Timestamp(8), UsernameLength(1)
const MIN_PACKET_SIZE = QueryMessage.sizeOf('') + SEAL_OVERHEAD;

export interface ServerHello {
  maxPacketSize: number;
  authChallenge: Buffer;
  timestamp: number;
}

export interface ClientHandshake extends Query.HandshakeOptions {
  authChallenge: Buffer;
  timestamp: number;
}

export function encodeServerHello(hello: ServerHello): Buffer {
  if (hello.authChallenge.length !== AUTH_CHALLENGE_SIZE) {
    throw new ValidationError(`Auth challenge must be ${AUTH_CHALLENGE_SIZE} bytes`);
  }
  const buffer = Buffer.alloc(SERVER_HELLO_SIZE);
  buffer.writeUInt16BE(hello.maxPacketSize, 0);
  hello.authChallenge.copy(buffer, 2);
  buffer.writeBigInt64BE(BigInt(Math.trunc(hello.timestamp)), 26);
  return buffer;
}

export function decodeServerHello(body: Buffer): ServerHello {
  if (body.length !== SERVER_HELLO_SIZE) {
    throw new HandshakeProtocolError(
      `Server hello must be ${SERVER_HELLO_SIZE} bytes, got ${body.length}`,
    );
  }
  return {
    maxPacketSize: body.readUInt16BE(0),
    authChallenge: Buffer.from(body.subarray(2, 26)),
    timestamp: Number(body.readBigInt64BE(26)),
  };
}

export function encodeClientHandshake(handshake: ClientHandshake): Buffer {
  const username = Buffer.from(handshake.username ?? '', 'utf-8');
  if (username.length > MAX_USERNAME_BYTES) {
    throw new ValidationError(`Username must not exceed ${MAX_USERNAME_BYTES} bytes`);
  }
  if (handshake.authChallenge.length !== AUTH_CHALLENGE_SIZE) {
    throw new ValidationError(`Auth challenge must be ${AUTH_CHALLENGE_SIZE} bytes`);
  }
  const buffer = Buffer.alloc(CLIENT_HANDSHAKE_FIXED_SIZE + username.length);
  buffer.writeUInt16BE(handshake.flags, 0);
  buffer.writeBigUInt64BE(handshake.permissions, 2);
  buffer.writeUInt8(handshake.kickPower, 10);
  handshake.authChallenge.copy(buffer, 11);
  buffer.writeBigInt64BE(BigInt(Math.trunc(handshake.timestamp)), 35);
  buffer.writeUInt8(username.length, 43);
  username.copy(buffer, CLIENT_HANDSHAKE_FIXED_SIZE);
  return buffer;
}

export function decodeClientHandshake(body: Buffer): ClientHandshake {
  if (body.length < CLIENT_HANDSHAKE_FIXED_SIZE) {
    throw new HandshakeProtocolError(`Client handshake too short (${body.length} bytes)`);
  }
  const usernameLength = body.readUInt8(43);
  if (body.length !== CLIENT_HANDSHAKE_FIXED_SIZE + usernameLength) {
    throw new HandshakeProtocolError('Client handshake username length mismatch');
  }
  return {
    flags: body.readUInt16BE(0),
    permissions: body.readBigUInt64BE(2),
    kickPower: body.readUInt8(10),
    authChallenge: Buffer.from(body.subarray(11, 35)),
    timestamp: Number(body.readBigInt64BE(35)),
    username: usernameLength
      ? body.toString('utf-8', CLIENT_HANDSHAKE_FIXED_SIZE)
      : undefined,
  };
}

export function encodeHandshakeReply(status: number): Buffer {
  return Buffer.from([status]);
}

export function decodeHandshakeReply(body: Buffer): Query.HandshakeStatus {
  if (body.length !== 1) {
    throw new HandshakeProtocolError(
      `Handshake reply must be 1 byte, got ${body.length}`,
    );
  }
  const [status] = body;
  switch (status) {
    case Query.HandshakeStatus.Accepted:
      return Query.HandshakeStatus.Accepted;
    case Query.HandshakeStatus.InvalidPassword:
      return Query.HandshakeStatus.InvalidPassword;
    default:
      throw new HandshakeProtocolError(`Handshake rejected with unknown status ${status}`);
  }
}

export type HandshakeStep =
  | { done: false; reply: Buffer }
  | { done: true; maxPacketSize: number };

/**
 * Client side of the handshake: hello in, sealed handshake out, status in.
 * Feed it each inbound frame body until it reports `done`.
 */
export class HandshakeNegotiator {
  private $stage: 'hello' | 'reply' | 'done' = 'hello';
  private $maxPacketSize = 0;

  constructor(
    private readonly cipher: QueryCipher,
    private readonly options: Query.HandshakeOptions,
  ) {}

  public get stage(): 'hello' | 'reply' | 'done' {
    return this.$stage;
  }

  /**
   * @throws {AuthenticationError} When the server rejects the password.
   * @throws {HandshakeProtocolError} When a frame is malformed or arrives out of order.
   * */
  public step(body: Buffer): HandshakeStep {
    switch (this.$stage) {
      case 'hello': {
        const hello = decodeServerHello(body);
        if (hello.maxPacketSize < MIN_PACKET_SIZE) {
          throw new HandshakeProtocolError(
            `Server max packet size ${hello.maxPacketSize} is below ${MIN_PACKET_SIZE} bytes`,
          );
        }
        this.$maxPacketSize = hello.maxPacketSize;
        this.$stage = 'reply';
        const handshake = encodeClientHandshake({
          ...this.options,
          authChallenge: hello.authChallenge,
          timestamp: Date.now(),
        });
        return { done: false, reply: encodeFrame(this.cipher.seal(handshake)) };
      }
      case 'reply': {
        const status = decodeHandshakeReply(body);
        if (status === Query.HandshakeStatus.InvalidPassword) {
          throw new AuthenticationError('Authentication failed - invalid password');
        }
        this.$stage = 'done';
        return { done: true, maxPacketSize: this.$maxPacketSize };
      }
      case 'done':
        throw new HandshakeProtocolError('Unexpected frame after handshake completed');
    }
  }
}
