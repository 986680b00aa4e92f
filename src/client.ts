import { EventEmitter } from 'node:events';
import type { Logger } from 'pino';
import { Query } from './types';
import { QueryConnection } from './connection';
import { Mutex } from './mutex';
import { CommandResponse, PendingCommandSlot } from './pending';
import { ReconnectionSupervisor } from './supervisor';
import {
  DEFAULT_COMMAND_TIMEOUT,
  MAX_TIMER_DELAY,
  parseClientOptions,
  type ClientConfig,
} from './config';
import { createLogger } from './logger';
import {
  ClientDisposedError,
  CommandExecutionError,
  ConnectionLostError,
  ProtocolUsageError,
  TimeoutError,
  ValidationError,
} from './errors';

/**
 * @description Prefix that marks a remote admin command.
 * */
export const REMOTE_ADMIN_PREFIX = '/';

type ReadyWaiter = {
  resolve: (connection: QueryConnection) => void;
  reject: (err: Error) => void;
  timer: NodeJS.Timeout;
};

const password = Symbol('password');

export declare interface QueryClient {
  on(event: 'ready', listener: () => void): this;
  on(event: 'disconnected', listener: (event: Query.DisconnectEvent) => void): this;
  on(event: 'reconnecting', listener: (attempt: number) => void): this;
  on(event: 'terminated', listener: (error: Error) => void): this;
  on(event: 'disposed', listener: () => void): this;
  once(event: 'ready', listener: () => void): this;
  once(event: 'disconnected', listener: (event: Query.DisconnectEvent) => void): this;
  once(event: 'reconnecting', listener: (attempt: number) => void): this;
  once(event: 'terminated', listener: (error: Error) => void): this;
  once(event: 'disposed', listener: () => void): this;
}

/**
 * Query client for a game server's remote admin interface.
 *
 * Connects as soon as it is constructed and reconnects on its own after
 * unexpected disconnects. Only one command awaits a response at a time;
 * concurrent `sendCommand` calls queue behind each other.
 *
 * @example
 * ```ts
 * const client = new QueryClient({ host: '127.0.0.1', port: 7777, password: 'test-secret' });
 * const response = await client.sendCommand('/players');
 * console.log(response.toString());
 * client.dispose();
 * ```
 */
export class QueryClient extends EventEmitter implements Query.Endpoint {
  public readonly host: string;
  public readonly port: number;
  public readonly flags: number;
  private readonly [password]: string;
  private readonly config: ClientConfig;
  private readonly logger: Logger;
  private readonly createSocket?: Query.SocketFactory;
  private readonly $sendLock = new Mutex();
  private readonly $pending = new PendingCommandSlot();
  private readonly $supervisor: ReconnectionSupervisor;
  private readonly $consoleListeners: Query.ConsoleMessageListener[] = [];
  private $readyWaiters: ReadyWaiter[] = [];
  private $backlog: string[] = [];
  private $connection: QueryConnection | null = null;
  private $state: Query.ClientState = 'connecting';
  private $terminalError: Error | undefined;

  /**
   * @private
   * @description Log prefix
   * */
  private get logprefix() {
    return `SL Query ${this.host}:${this.port}`;
  }

  public get state(): Query.ClientState {
    return this.$state;
  }

  public get connected(): boolean {
    return this.$state === 'ready';
  }

  /**
   * @description Consecutive reconnect attempts since the last successful handshake.
   * */
  public get reconnectAttempts(): number {
    return this.$supervisor.attempts;
  }

  public get suppressesResponses(): boolean {
    return (this.flags & Query.ClientFlags.SuppressCommandResponses) !== 0;
  }

  /**
   * @description Construct a client and start connecting.
   * @throws {ValidationError} When an option is missing or out of range.
   * */
  constructor(options: Query.ClientOptions) {
    super();
    const { logger, createSocket, ...rest } = options;
    this.config = parseClientOptions(rest);
    this.host = this.config.host;
    this.port = this.config.port;
    this[password] = this.config.password;
    this.logger = logger ?? createLogger();
    this.createSocket = createSocket;

    let flags: number = Query.ClientFlags.None;
    if (this.config.suppressCommandResponses) {
      flags |= Query.ClientFlags.SuppressCommandResponses;
    }
    if (this.config.subscribeConsole) {
      flags |= Query.ClientFlags.SubscribeServerConsole;
    }
    if (this.config.subscribeLogs) {
      flags |= Query.ClientFlags.SubscribeServerLogs;
    }
    this.flags = flags;

    this.$supervisor = new ReconnectionSupervisor({
      limit: this.config.reconnectLimit,
      delay: this.config.reconnectDelay,
    });

    this.connect();
  }

  /**
   * @description Register a listener for console and server log lines.
   * Lines only arrive when the client subscribed to them at construction.
   * */
  public onConsoleMessage(listener: Query.ConsoleMessageListener): this {
    this.$consoleListeners.push(listener);
    return this;
  }

  /**
   * @description Send a command and wait for its response.
   * @param command Command text. Remote admin commands must start with '/'.
   * @param [timeout] Seconds to wait for the response.
   * @returns The response, or `CommandResponse.empty` when responses are suppressed.
   * @throws {ValidationError} When the command is empty or whitespace, or the timeout is out of range.
   * @throws {ProtocolUsageError} When the command lacks the '/' prefix.
   * @throws {TimeoutError} When no response arrives in time.
   * @throws {CommandExecutionError} When the server reports a command exception.
   * @throws {ClientDisposedError} When the client was disposed.
   * */
  public async sendCommand(
    command: string,
    timeout: number = DEFAULT_COMMAND_TIMEOUT,
  ): Promise<CommandResponse> {
    this.assertNotDisposed();
    if (typeof command !== 'string' || !command.trim()) {
      throw new ValidationError('Command must not be empty');
    }
    if (!Number.isFinite(timeout) || timeout <= 0) {
      throw new ValidationError(`Timeout must be a positive number of seconds, got ${timeout}`);
    }
    if (timeout * 1000 > MAX_TIMER_DELAY) {
      throw new ValidationError(
        `Timeout must not exceed ${MAX_TIMER_DELAY / 1000} seconds, got ${timeout}`,
      );
    }

    if (this.suppressesResponses) {
      this.fire(command);
      return CommandResponse.empty;
    }

    if (!command.startsWith(REMOTE_ADMIN_PREFIX)) {
      throw new ProtocolUsageError(
        `Remote admin commands must be prefixed with '${REMOTE_ADMIN_PREFIX}'`,
      );
    }

    return this.$sendLock.withLock(() => this.execute(command, timeout * 1000));
  }

  /**
   * @description Release the connection and cancel pending work. Safe to call more than once.
   * */
  public dispose(): void {
    this.shutdown();
  }

  /**
   * @private
   * @description Send under the send permit and await the pending slot.
   * */
  private async execute(command: string, timeout: number): Promise<CommandResponse> {
    this.assertNotDisposed();
    const deadline = Date.now() + timeout;
    const connection = await this.whenReady(timeout);
    connection.send(command, Query.ContentTypeToServer.Command);
    return this.$pending.arm(command, Math.max(deadline - Date.now(), 1));
  }

  /**
   * @private
   * @description Fire-and-forget send for suppressed mode; queued until the connection is ready.
   * */
  private fire(command: string): void {
    const connection = this.$connection;
    if (connection?.connected) {
      connection.send(command, Query.ContentTypeToServer.Command);
      return;
    }
    this.$backlog.push(command);
    this.logger.debug({ queued: this.$backlog.length }, 'not ready, command queued');
  }

  private whenReady(timeout: number): Promise<QueryConnection> {
    const connection = this.$connection;
    if (connection?.connected) {
      return Promise.resolve(connection);
    }
    return new Promise<QueryConnection>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.$readyWaiters = this.$readyWaiters.filter((entry) => entry !== waiter);
        reject(new TimeoutError(`${this.logprefix} not connected after ${timeout}ms`, timeout));
      }, timeout);
      const waiter: ReadyWaiter = { resolve, reject, timer };
      this.$readyWaiters.push(waiter);
    });
  }

  private settleReadyWaiters(settle: (waiter: ReadyWaiter) => void): void {
    const waiters = this.$readyWaiters;
    this.$readyWaiters = [];
    for (const waiter of waiters) {
      clearTimeout(waiter.timer);
      settle(waiter);
    }
  }

  /**
   * @private
   * @description Replace the current connection with a fresh one and start its handshake.
   * */
  private connect(): void {
    if (this.$state === 'disposed') return;
    this.detach();

    const connection = new QueryConnection({
      host: this.host,
      port: this.port,
      password: this[password],
      handshake: {
        flags: this.flags,
        permissions: this.config.permissions,
        kickPower: this.config.kickPower,
        username: this.config.username,
      },
      handshakeTimeout: this.config.handshakeTimeout,
      logger: this.logger,
      createSocket: this.createSocket,
    });
    this.$connection = connection;
    connection
      .on('ready', () => this.handleReady(connection))
      .on('message', (message: Query.DecodedMessage) => this.handleMessage(message))
      .once('disconnect', (event: Query.DisconnectEvent) =>
        this.handleDisconnect(connection, event),
      );
    connection.open();
  }

  /**
   * @private
   * @description Unhook and close the current connection without triggering a reconnect.
   * */
  private detach(): void {
    const connection = this.$connection;
    this.$connection = null;
    if (connection) {
      connection.removeAllListeners();
      connection.close();
    }
  }

  private handleReady(connection: QueryConnection): void {
    if (connection !== this.$connection) return;
    this.$supervisor.reset();
    this.$state = 'ready';
    this.logger.info('connected');

    const backlog = this.$backlog;
    this.$backlog = [];
    for (const command of backlog) {
      try {
        connection.send(command, Query.ContentTypeToServer.Command);
      } catch (err) {
        this.logger.error({ err }, 'failed to send queued command');
      }
    }

    this.settleReadyWaiters((waiter) => waiter.resolve(connection));
    this.notify('ready');
  }

  private handleMessage(message: Query.DecodedMessage): void {
    switch (message.kind) {
      case 'console-line':
        this.deliverConsoleMessage(message.message);
        break;
      case 'remote-admin-success':
        this.settle(this.$pending.resolve(new CommandResponse(message.text, true)));
        break;
      case 'remote-admin-failure':
        this.settle(this.$pending.resolve(new CommandResponse(message.text, false)));
        break;
      case 'command-exception':
        this.settle(this.$pending.reject(new CommandExecutionError(message.text)));
        break;
      case 'unrecognized':
        this.logger.debug(
          { contentType: message.contentType, cause: message.cause },
          'ignoring unrecognized message',
        );
        break;
    }
  }

  private settle(settled: boolean): void {
    if (!settled) {
      this.logger.debug('response arrived with no pending command, dropped');
    }
  }

  private deliverConsoleMessage(line: string): void {
    for (const listener of [...this.$consoleListeners]) {
      try {
        listener(line);
      } catch (err) {
        this.logger.error({ err }, 'console message listener threw');
      }
    }
  }

  /**
   * @private
   * @description Emit a lifecycle event. Listener errors are logged and never reach the socket handlers.
   * */
  private notify(event: string, ...args: unknown[]): void {
    try {
      this.emit(event, ...args);
    } catch (err) {
      this.logger.error({ err, event }, 'lifecycle listener threw');
    }
  }

  private handleDisconnect(connection: QueryConnection, event: Query.DisconnectEvent): void {
    if (connection !== this.$connection) return;
    connection.removeAllListeners();
    this.$connection = null;

    this.$pending.cancel(
      new ConnectionLostError(
        `${this.logprefix} connection lost while awaiting a response (${event.reason})`,
        event.reason,
        { cause: event.error },
      ),
    );
    this.notify('disconnected', event);

    const decision = this.$supervisor.handle(event, () => this.connect());
    if (decision.action === 'terminate') {
      this.logger.error({ err: decision.error }, 'giving up on connection');
      this.shutdown(decision.error);
      this.notify('terminated', decision.error);
      return;
    }
    this.$state = 'reconnecting';
    this.logger.warn(
      { attempt: decision.attempt, reason: event.reason, err: event.error },
      'reconnecting',
    );
    this.notify('reconnecting', decision.attempt);
  }

  private shutdown(cause?: Error): void {
    if (this.$state === 'disposed') return;
    this.$state = 'disposed';
    this.$terminalError = cause;
    this.$supervisor.cancel();

    const err = this.disposedError();
    this.$pending.cancel(err);
    this.settleReadyWaiters((waiter) => waiter.reject(err));
    this.$backlog = [];
    this.detach();

    this.logger.info('disposed');
    this.notify('disposed');
  }

  private disposedError(): ClientDisposedError {
    return new ClientDisposedError(
      this.$terminalError
        ? `${this.logprefix} client was disposed: ${this.$terminalError.message}`
        : `${this.logprefix} client was disposed`,
      { cause: this.$terminalError },
    );
  }

  private assertNotDisposed(): void {
    if (this.$state === 'disposed') {
      throw this.disposedError();
    }
  }
}
