/**
 * In-process stand-ins for the query server used by the test suites.
 * Nothing here touches the network: sockets are EventEmitters and the
 * server side of the protocol runs on the library's own codecs.
 */

import { EventEmitter, once } from 'node:events';
import { randomBytes } from 'node:crypto';
import { pino } from 'pino';
import { Query } from './types';
import { QueryCipher } from './cipher';
import { encodeFrame, FrameDecoder, MAX_FRAME_BODY_SIZE } from './frame';
import {
  AUTH_CHALLENGE_SIZE,
  type ClientHandshake,
  decodeClientHandshake,
  encodeHandshakeReply,
  encodeServerHello,
} from './handshake';
import { MessageCodec, type ContentType, type QueryMessage } from './message';

export const TEST_PASSWORD = 'test-secret';

export const silentLogger = pino({ level: 'silent' });

// ============================================================================
// Mock socket
// ============================================================================

export class MockSocket extends EventEmitter implements Query.Socket {
  public destroyed = false;
  public readonly written: Buffer[] = [];
  public onWrite: ((data: Buffer) => void) | null = null;

  write(data: Uint8Array): boolean {
    if (this.destroyed) {
      return false;
    }
    const chunk = Buffer.from(data);
    this.written.push(chunk);
    this.onWrite?.(chunk);
    return true;
  }

  destroy(): void {
    if (this.destroyed) return;
    this.destroyed = true;
    setImmediate(() => this.emit('close', false));
  }

  // Helper methods for testing
  simulateData(data: Buffer): void {
    if (!this.destroyed) {
      this.emit('data', data);
    }
  }

  simulateError(error: Error): void {
    this.emit('error', error);
  }

  simulateEnd(): void {
    this.emit('end');
  }
}

// ============================================================================
// Mock query server
// ============================================================================

export type HandshakeBehaviour = 'accept' | 'reject' | 'silent' | 'garbage';

export interface MockQueryServerOptions {
  password?: string;
  maxPacketSize?: number;
}

export interface ReceivedCommand {
  session: MockSession;
  message: QueryMessage;
}

/**
 * Server side of one client connection.
 */
export class MockSession {
  public readonly socket = new MockSocket();
  public readonly received: QueryMessage[] = [];
  public handshake: ClientHandshake | null = null;
  private readonly $frames = new FrameDecoder();
  private readonly $codec: MessageCodec;
  private readonly $cipher: QueryCipher;
  private readonly $challenge = randomBytes(AUTH_CHALLENGE_SIZE);
  private $stage: 'handshake' | 'ready' | 'closed' = 'handshake';

  constructor(
    private readonly server: MockQueryServer,
    password: string,
  ) {
    this.$cipher = new QueryCipher(password);
    this.$codec = new MessageCodec(this.$cipher);
    this.socket.onWrite = (chunk) => this.handleWrite(chunk);
  }

  public get ready(): boolean {
    return this.$stage === 'ready';
  }

  /**
   * Sends the server hello, as a server does right after accepting a socket.
   */
  public greet(maxPacketSize: number): void {
    this.push(
      encodeFrame(
        encodeServerHello({
          maxPacketSize,
          authChallenge: this.$challenge,
          timestamp: Date.now(),
        }),
      ),
    );
  }

  /**
   * Builds a sealed frame without sending it.
   */
  public frame(contentType: ContentType, payload: string): Buffer {
    return this.$codec.encode(payload, contentType);
  }

  public send(contentType: ContentType, payload: string): void {
    this.push(this.frame(contentType, payload));
  }

  public sendConsole(line: string): void {
    this.send(Query.ContentTypeToClient.ConsoleString, line);
  }

  public respond(text: string, success = true): void {
    this.send(
      success
        ? Query.ContentTypeToClient.RemoteAdminPlaintextResponse
        : Query.ContentTypeToClient.RemoteAdminUnsuccessfulPlaintextResponse,
      text,
    );
  }

  public sendException(text: string): void {
    this.send(Query.ContentTypeToClient.CommandException, text);
  }

  /**
   * Server closes the connection cleanly.
   */
  public end(): void {
    this.$stage = 'closed';
    setImmediate(() => this.socket.simulateEnd());
  }

  /**
   * Network failure on this connection.
   */
  public fail(code = 'ECONNRESET'): void {
    this.$stage = 'closed';
    setImmediate(() => this.socket.simulateError(networkError(code)));
  }

  public push(frame: Buffer): void {
    setImmediate(() => this.socket.simulateData(frame));
  }

  private handleWrite(chunk: Buffer): void {
    for (const body of this.$frames.push(chunk)) {
      if (this.$stage === 'handshake') {
        this.handleHandshake(body);
      } else if (this.$stage === 'ready') {
        const message = this.$codec.unpack(body);
        if (message) {
          this.received.push(message);
          this.server.emit('command', { session: this, message });
        }
      }
    }
  }

  private handleHandshake(body: Buffer): void {
    const behaviour = this.server.handshakeBehaviour;
    if (behaviour === 'silent') {
      return;
    }
    if (behaviour === 'garbage') {
      this.push(encodeFrame(Buffer.from([0xde, 0xad])));
      return;
    }
    const plaintext = this.$cipher.open(body);
    const handshake = plaintext ? decodeClientHandshake(plaintext) : null;
    if (
      behaviour === 'reject' ||
      !handshake ||
      !handshake.authChallenge.equals(this.$challenge)
    ) {
      this.$stage = 'closed';
      this.push(encodeFrame(encodeHandshakeReply(Query.HandshakeStatus.InvalidPassword)));
      return;
    }
    this.handshake = handshake;
    this.$stage = 'ready';
    this.push(encodeFrame(encodeHandshakeReply(Query.HandshakeStatus.Accepted)));
  }
}

export declare interface MockQueryServer {
  on(event: 'command', listener: (command: ReceivedCommand) => void): this;
  once(event: 'command', listener: (command: ReceivedCommand) => void): this;
}

/**
 * Accepts every socket the client opens through `createSocket`.
 */
export class MockQueryServer extends EventEmitter {
  public readonly sessions: MockSession[] = [];
  public handshakeBehaviour: HandshakeBehaviour = 'accept';
  /**
   * When set, new connections fail with this error code instead of connecting.
   */
  public refuseWith: string | null = null;
  private readonly password: string;
  private readonly maxPacketSize: number;

  constructor(options: MockQueryServerOptions = {}) {
    super();
    this.password = options.password ?? TEST_PASSWORD;
    this.maxPacketSize = options.maxPacketSize ?? MAX_FRAME_BODY_SIZE;
  }

  public get current(): MockSession {
    const session = this.sessions[this.sessions.length - 1];
    if (!session) {
      throw new Error('No client has connected yet');
    }
    return session;
  }

  public get connectionAttempts(): number {
    return this.sessions.length;
  }

  public readonly createSocket: Query.SocketFactory = (_endpoint, onConnect) => {
    const session = new MockSession(this, this.password);
    this.sessions.push(session);
    const refuseWith = this.refuseWith;
    setImmediate(() => {
      if (refuseWith) {
        session.socket.simulateError(networkError(refuseWith));
        return;
      }
      onConnect();
      session.greet(this.maxPacketSize);
    });
    return session.socket;
  };

  /**
   * Resolves with the next command any session receives.
   */
  public async nextCommand(): Promise<ReceivedCommand> {
    return new Promise((resolve) => this.once('command', resolve));
  }

  /**
   * Answers every command with `reply(payload)` as a successful response.
   */
  public autoRespond(reply: (payload: string) => string = (payload) => `ok ${payload}`): this {
    return this.on('command', ({ session, message }) => {
      session.respond(reply(message.payload));
    });
  }
}

function networkError(code: string): Error {
  return Object.assign(new Error(`connect ${code}`), { code });
}

/**
 * Resolves once `emitter` emits `event`.
 */
export async function waitFor(emitter: EventEmitter, event: string): Promise<unknown[]> {
  return once(emitter, event);
}

/**
 * Yields to the event loop `turns` times so queued setImmediate callbacks run.
 */
export async function flush(turns = 5): Promise<void> {
  for (let i = 0; i < turns; i++) {
    await new Promise<void>((resolve) => setImmediate(resolve));
  }
}
