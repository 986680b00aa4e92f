import type { Query } from './types';
import { ConnectionLostError, QueryError, ReconnectionExhaustedError } from './errors';

export interface ReconnectPolicy {
  /**
   * @description Reconnect attempts allowed since the last successful handshake before giving up.
   * A limit of 10 permits 11 attempts: the client gives up when a disconnect arrives with the counter above it.
   * */
  limit: number;
  /**
   * @description Delay before each attempt (ms). `0` retries immediately.
   * */
  delay: number;
}

export type SupervisorDecision =
  | { action: 'reconnect'; attempt: number }
  | { action: 'terminate'; error: QueryError };

/**
 * Decides what follows a disconnect and schedules the next connect attempt.
 * The counter resets only through `reset()`, which the client calls once a
 * handshake completes.
 */
export class ReconnectionSupervisor {
  private $attempts = 0;
  private $timer: NodeJS.Timeout | null = null;

  constructor(private readonly policy: ReconnectPolicy) {}

  /**
   * @description Consecutive attempts made since the last successful handshake.
   * */
  public get attempts(): number {
    return this.$attempts;
  }

  public get scheduled(): boolean {
    return this.$timer !== null;
  }

  public reset(): void {
    this.$attempts = 0;
  }

  /**
   * @description Handle a disconnect. On `reconnect`, `reconnect` runs after the policy delay.
   * */
  public handle(event: Query.DisconnectEvent, reconnect: () => void): SupervisorDecision {
    if (event.reason === 'client-initiated') {
      return {
        action: 'terminate',
        error: new ConnectionLostError('Connection closed by client', event.reason, {
          cause: event.error,
        }),
      };
    }
    if (this.$attempts > this.policy.limit) {
      return {
        action: 'terminate',
        error: new ReconnectionExhaustedError(
          `Gave up after ${this.$attempts} failed reconnect attempts`,
          this.$attempts,
          { cause: event.error },
        ),
      };
    }
    this.cancel();
    const attempt = ++this.$attempts;
    this.$timer = setTimeout(() => {
      this.$timer = null;
      reconnect();
    }, this.policy.delay);
    return { action: 'reconnect', attempt };
  }

  /**
   * @description Drop a scheduled attempt.
   * */
  public cancel(): void {
    if (this.$timer) {
      clearTimeout(this.$timer);
      this.$timer = null;
    }
  }
}
