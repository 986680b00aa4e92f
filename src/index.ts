export { Query } from './types';
export { QueryClient, REMOTE_ADMIN_PREFIX } from './client';
export { QueryConnection, defaultSocketFactory } from './connection';
export { CommandResponse, PendingCommandSlot } from './pending';
export { ReconnectionSupervisor } from './supervisor';
export type { ReconnectPolicy, SupervisorDecision } from './supervisor';
export { QueryMessage, MessageCodec } from './message';
export type { ContentType } from './message';
export { QueryCipher, SEAL_OVERHEAD } from './cipher';
export { FrameDecoder, encodeFrame, MAX_FRAME_BODY_SIZE } from './frame';
export {
  HandshakeNegotiator,
  AUTH_CHALLENGE_SIZE,
  MAX_PERMISSIONS,
  MAX_USERNAME_BYTES,
  encodeServerHello,
  decodeServerHello,
  encodeClientHandshake,
  decodeClientHandshake,
  encodeHandshakeReply,
  decodeHandshakeReply,
} from './handshake';
export type { ServerHello, ClientHandshake, HandshakeStep } from './handshake';
export {
  clientOptionsSchema,
  parseClientOptions,
  loadClientOptions,
  DEFAULT_COMMAND_TIMEOUT,
  DEFAULT_HANDSHAKE_TIMEOUT,
  DEFAULT_RECONNECT_LIMIT,
  MAX_TIMER_DELAY,
} from './config';
export type { ClientConfig, ClientOptionsInput, LoadOptions } from './config';
export { createLogger } from './logger';
export { Mutex } from './mutex';
export * from './errors';
