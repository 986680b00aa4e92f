import { EventEmitter } from 'node:events';
import { connect } from 'node:net';
import type { Logger } from 'pino';
import { Query } from './types';
import { QueryCipher } from './cipher';
import { FrameDecoder } from './frame';
import { HandshakeNegotiator, type HandshakeStep } from './handshake';
import { MessageCodec } from './message';
import { ConnectionLostError, HandshakeProtocolError } from './errors';
import { cloneErrorProperties, toError } from './utils';
import { DEFAULT_HANDSHAKE_TIMEOUT } from './config';

/**
 * @description Opens a TCP socket with keep-alive and no-delay enabled.
 * */
export const defaultSocketFactory: Query.SocketFactory = (endpoint, onConnect) =>
  connect(
    { host: endpoint.host, port: endpoint.port, keepAlive: true, noDelay: true },
    onConnect,
  );

const password = Symbol('password');

export declare interface QueryConnection {
  on(event: 'ready', listener: () => void): this;
  on(event: 'message', listener: (message: Query.DecodedMessage) => void): this;
  on(event: 'disconnect', listener: (event: Query.DisconnectEvent) => void): this;
  once(event: 'ready', listener: () => void): this;
  once(event: 'message', listener: (message: Query.DecodedMessage) => void): this;
  once(event: 'disconnect', listener: (event: Query.DisconnectEvent) => void): this;
}

/**
 * One socket to one query server, from TCP connect through handshake to close.
 *
 * A connection is single use: once it has emitted `disconnect` it stays
 * `closed`, and reconnecting means creating a new instance. `disconnect` is
 * emitted exactly once, whichever side ends the connection.
 */
export class QueryConnection extends EventEmitter implements Query.Endpoint {
  public readonly host: string;
  public readonly port: number;
  public readonly handshakeTimeout: number;
  private readonly [password]: string;
  private readonly logger: Logger;
  private readonly createSocket: Query.SocketFactory;
  private readonly $codec: MessageCodec;
  private readonly $negotiator: HandshakeNegotiator;
  private readonly $frames = new FrameDecoder();
  private $socket: Query.Socket | null = null;
  private $state: Query.ConnectionState = 'disconnected';
  private $handshakeTimeoutId: NodeJS.Timeout | null = null;
  private $connectPromise: Promise<void> | null = null;
  private $disconnect: Query.DisconnectEvent | null = null;

  /**
   * @private
   * @description Log prefix
   * */
  private get logprefix() {
    return `SL Query ${this.host}:${this.port}`;
  }

  public get state(): Query.ConnectionState {
    return this.$state;
  }

  /**
   * @description Is the handshake complete and the socket open.
   * */
  public get connected(): boolean {
    return this.$state === 'ready';
  }

  /**
   * @description How the connection ended, once it has.
   * */
  public get disconnectEvent(): Query.DisconnectEvent | null {
    return this.$disconnect;
  }

  constructor(options: Query.ConnectionOptions) {
    super();
    this.host = options.host;
    this.port = options.port;
    this[password] = options.password;
    this.handshakeTimeout = options.handshakeTimeout ?? DEFAULT_HANDSHAKE_TIMEOUT;
    this.logger = options.logger.child({ host: this.host, port: this.port });
    this.createSocket = options.createSocket ?? defaultSocketFactory;

    const cipher = new QueryCipher(this[password]);
    this.$codec = new MessageCodec(cipher);
    this.$negotiator = new HandshakeNegotiator(cipher, options.handshake);
  }

  /**
   * @description Start connecting. Progress is reported through `ready` and `disconnect` events.
   * Calling it again, or after the connection closed, does nothing.
   * */
  public open(): void {
    if (this.$state !== 'disconnected') {
      return;
    }
    this.$state = 'connecting';
    this.logger.debug('connecting');

    this.$handshakeTimeoutId = setTimeout(() => {
      this.terminate(
        'protocol-error',
        new HandshakeProtocolError(
          `${this.logprefix} handshake timed out after ${this.handshakeTimeout}ms`,
        ),
      );
    }, this.handshakeTimeout);

    try {
      this.$socket = this.createSocket(
        { host: this.host, port: this.port },
        () => this.handleConnect(),
      );
    } catch (err) {
      this.handleError(toError(err));
      return;
    }
    this.$socket
      .on('data', (chunk: Buffer) => this.handleData(chunk))
      .on('error', (err: Error) => this.handleError(err))
      .on('end', () => this.terminate('server-closed'))
      .on('close', () => this.terminate('server-closed'));
  }

  /**
   * @description Connect and complete the handshake.
   * If called while connecting, returns the promise of the attempt in progress.
   * */
  public connect(): Promise<void> {
    if (this.$state === 'ready') {
      return Promise.resolve();
    }
    if (this.$connectPromise) {
      return this.$connectPromise;
    }
    if (this.$state === 'closed') {
      return Promise.reject(this.disconnectError(this.$disconnect));
    }

    this.$connectPromise = new Promise<void>((resolve, reject) => {
      const handleReady = () => {
        this.off('disconnect', handleDisconnect);
        resolve();
      };
      const handleDisconnect = (event: Query.DisconnectEvent) => {
        this.off('ready', handleReady);
        reject(this.disconnectError(event));
      };
      this.once('ready', handleReady).once('disconnect', handleDisconnect);
      this.open();
    });
    return this.$connectPromise;
  }

  /**
   * @description Close the connection. Safe to call any number of times.
   * */
  public close(): void {
    this.terminate('client-initiated');
  }

  /**
   * @description Encode and write one message.
   * @throws {ConnectionLostError} When the handshake has not completed or the connection closed.
   * @throws {ValidationError} When the message exceeds the server's max packet size.
   * */
  public send(content: string, contentType: Query.ContentTypeToServer): void {
    if (this.$state !== 'ready' || !this.$socket) {
      throw new ConnectionLostError(
        `${this.logprefix} socket is not connected`,
        this.$disconnect?.reason ?? 'network-error',
      );
    }
    const frame = this.$codec.encode(content, contentType);
    this.$socket.write(frame);
    this.logger.trace({ contentType, bytes: frame.length }, 'message sent');
  }

  private handleConnect(): void {
    if (this.$state !== 'connecting') return;
    this.$state = 'handshaking';
    this.logger.debug('socket connected, awaiting server hello');
  }

  private handleData(chunk: Buffer): void {
    for (const body of this.$frames.push(chunk)) {
      if (this.$state === 'closed') return;
      this.handleFrame(body);
    }
  }

  private handleFrame(body: Buffer): void {
    if (this.$state === 'ready') {
      this.emit('message', this.$codec.decode(body));
      return;
    }

    const step = this.advanceHandshake(body);
    if (!step) {
      return;
    }
    if (!step.done) {
      this.$socket?.write(step.reply);
      return;
    }

    this.$codec.maxPacketSize = step.maxPacketSize;
    this.clearHandshakeTimeout();
    this.$state = 'ready';
    this.$connectPromise = null;
    this.logger.info({ maxPacketSize: step.maxPacketSize }, 'handshake complete');
    this.emit('ready');
  }

  private advanceHandshake(body: Buffer): HandshakeStep | null {
    try {
      return this.$negotiator.step(body);
    } catch (err) {
      this.terminate('protocol-error', toError(err));
      return null;
    }
  }

  private handleError(err: Error): void {
    this.terminate(
      'network-error',
      cloneErrorProperties(
        err,
        new ConnectionLostError(`${this.logprefix} ${err.message}`, 'network-error', {
          cause: err,
        }),
      ),
    );
  }

  /**
   * @private
   * @description Release the socket and report the disconnect. Only the first call has any effect.
   * */
  private terminate(reason: Query.DisconnectReason, error?: Error): void {
    if (this.$state === 'closed') return;
    this.$state = 'closed';
    this.$connectPromise = null;
    this.clearHandshakeTimeout();
    this.$frames.reset();

    const socket = this.$socket;
    this.$socket = null;
    if (socket) {
      socket.removeAllListeners();
      socket.on('error', (err: Error) =>
        this.logger.debug({ err }, 'socket error after close'),
      );
      if (!socket.destroyed) {
        socket.destroy();
      }
    }

    const event: Query.DisconnectEvent = error ? { reason, error } : { reason };
    this.$disconnect = event;
    if (reason === 'client-initiated') {
      this.logger.debug('connection closed');
    } else {
      this.logger.warn({ reason, err: error }, 'connection lost');
    }
    this.emit('disconnect', event);
  }

  private disconnectError(event: Query.DisconnectEvent | null): Error {
    if (event?.error) {
      return event.error;
    }
    const reason = event?.reason ?? 'client-initiated';
    return new ConnectionLostError(`${this.logprefix} connection closed (${reason})`, reason);
  }

  private clearHandshakeTimeout(): void {
    if (this.$handshakeTimeoutId) {
      clearTimeout(this.$handshakeTimeoutId);
      this.$handshakeTimeoutId = null;
    }
  }
}
