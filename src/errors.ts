import type { Query } from './types';

/**
 * Base class for every error raised by the query client.
 */
export class QueryError extends Error {
  public readonly code: string;

  constructor(message: string, code: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'QueryError';
    this.code = code;
  }
}

/**
 * Invalid argument or option, raised before any network I/O.
 */
export class ValidationError extends QueryError {
  constructor(message: string) {
    super(message, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
  }
}

/**
 * Command text does not meet the protocol's requirements for the current mode.
 */
export class ProtocolUsageError extends QueryError {
  constructor(message: string) {
    super(message, 'PROTOCOL_USAGE_ERROR');
    this.name = 'ProtocolUsageError';
  }
}

export class AuthenticationError extends QueryError {
  constructor(message: string) {
    super(message, 'AUTHENTICATION_FAILED');
    this.name = 'AuthenticationError';
  }
}

/**
 * The server's handshake reply was malformed, unexpected, or never arrived.
 */
export class HandshakeProtocolError extends QueryError {
  constructor(message: string) {
    super(message, 'HANDSHAKE_PROTOCOL_ERROR');
    this.name = 'HandshakeProtocolError';
  }
}

export class TimeoutError extends QueryError {
  public readonly timeout: number;

  constructor(message: string, timeout: number) {
    super(message, 'COMMAND_TIMEOUT');
    this.name = 'TimeoutError';
    this.timeout = timeout;
  }
}

/**
 * The server reported an exception while executing the command.
 */
export class CommandExecutionError extends QueryError {
  constructor(message: string) {
    super(message, 'COMMAND_EXCEPTION');
    this.name = 'CommandExecutionError';
  }
}

/**
 * A pending command was superseded before it was answered.
 */
export class CommandCancelledError extends QueryError {
  constructor(message: string) {
    super(message, 'COMMAND_CANCELLED');
    this.name = 'CommandCancelledError';
  }
}

export class ConnectionLostError extends QueryError {
  public readonly reason: Query.DisconnectReason;

  constructor(message: string, reason: Query.DisconnectReason, options?: { cause?: unknown }) {
    super(message, 'CONNECTION_LOST', options);
    this.name = 'ConnectionLostError';
    this.reason = reason;
  }
}

export class ReconnectionExhaustedError extends QueryError {
  public readonly attempts: number;

  constructor(message: string, attempts: number, options?: { cause?: unknown }) {
    super(message, 'RECONNECTION_EXHAUSTED', options);
    this.name = 'ReconnectionExhaustedError';
    this.attempts = attempts;
  }
}

/**
 * The client was disposed; a new client has to be constructed.
 */
export class ClientDisposedError extends QueryError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'CLIENT_DISPOSED', options);
    this.name = 'ClientDisposedError';
  }
}
