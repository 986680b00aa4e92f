import type { Logger } from 'pino';
import type { ClientOptionsInput } from './config';

export namespace Query {
  /**
   * @description Capability flags sent in the client handshake.
   * */
  export enum ClientFlags {
    None = 0,
    SuppressCommandResponses = 1 << 0,
    SubscribeServerConsole = 1 << 1,
    SubscribeServerLogs = 1 << 2,
  }

  export enum ContentTypeToServer {
    Command = 0,
    RawContent = 1,
  }

  export enum ContentTypeToClient {
    ConsoleString = 0,
    CommandException = 1,
    RemoteAdminSerializedResponse = 2,
    RemoteAdminPlaintextResponse = 3,
    RemoteAdminUnsuccessfulPlaintextResponse = 4,
  }

  export enum HandshakeStatus {
    Accepted = 0,
    InvalidPassword = 1,
  }

  export type DisconnectReason =
    | 'client-initiated'
    | 'server-closed'
    | 'network-error'
    | 'protocol-error';

  export interface DisconnectEvent {
    reason: DisconnectReason;
    error?: Error;
  }

  export type ConnectionState =
    | 'disconnected'
    | 'connecting'
    | 'handshaking'
    | 'ready'
    | 'closed';

  export type ClientState = 'connecting' | 'ready' | 'reconnecting' | 'disposed';

  export interface Endpoint {
    readonly host: string;
    readonly port: number;
  }

  /**
   * @description Minimal duplex socket surface the transport relies on.
   * `net.Socket` satisfies it.
   * */
  export interface Socket {
    readonly destroyed: boolean;
    write(data: Uint8Array): boolean;
    destroy(): void;
    on(event: 'data', listener: (chunk: Buffer) => void): this;
    on(event: 'error', listener: (err: Error) => void): this;
    on(event: 'end', listener: () => void): this;
    on(event: 'close', listener: (hadError: boolean) => void): this;
    removeAllListeners(): this;
  }

  /**
   * @description Creates a socket connected to `endpoint`; `onConnect` runs once the TCP session is up.
   * */
  export type SocketFactory = (endpoint: Endpoint, onConnect: () => void) => Socket;

  export interface HandshakeOptions {
    /**
     * @description Bitwise OR of `ClientFlags`.
     * */
    flags: number;
    permissions: bigint;
    kickPower: number;
    username?: string;
  }

  export interface ConnectionOptions extends Endpoint {
    password: string;
    handshake: HandshakeOptions;
    /**
     * @description Time allowed for TCP connect plus handshake (ms).
     * @default 5000
     * */
    handshakeTimeout?: number;
    logger: Logger;
    createSocket?: SocketFactory;
  }

  export type ClientOptions = ClientOptionsInput & {
    /**
     * @description Logger for lifecycle and protocol diagnostics. Defaults to `createLogger()`.
     * */
    logger?: Logger;
    /**
     * @description Socket factory, `node:net` by default.
     * */
    createSocket?: SocketFactory;
  };

  export type ConsoleMessageListener = (message: string) => void;

  export type DecodedMessage =
    | { kind: 'console-line'; message: string }
    | { kind: 'remote-admin-success'; text: string }
    | { kind: 'remote-admin-failure'; text: string }
    | { kind: 'command-exception'; text: string }
    | { kind: 'unrecognized'; contentType?: number; cause: string };
}
