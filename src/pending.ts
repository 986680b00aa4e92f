import { CommandCancelledError, TimeoutError } from './errors';

/**
 * Outcome delivered to whoever awaits the slot.
 */
export class CommandResponse {
  /**
   * @description Response returned when command responses are suppressed.
   * */
  public static readonly empty = new CommandResponse('', false);

  constructor(
    public readonly content: string,
    public readonly isSuccess: boolean,
  ) {
    Object.freeze(this);
  }

  public toString(): string {
    return `${this.isSuccess ? 'Success' : 'Failed'}: ${this.content}`;
  }
}

type SlotState =
  | { status: 'empty' }
  | {
      status: 'pending';
      command: string;
      resolve: (response: CommandResponse) => void;
      reject: (err: Error) => void;
      timer: NodeJS.Timeout;
    };

type PendingState = Extract<SlotState, { status: 'pending' }>;

/**
 * Single-slot holder for the command awaiting a response.
 *
 * Arming replaces the current occupant, which is cancelled first. Every
 * settle path empties the slot before it calls back, so a response that
 * arrives after a timeout or cancellation finds the slot empty.
 */
export class PendingCommandSlot {
  private $state: SlotState = { status: 'empty' };

  public get pending(): boolean {
    return this.$state.status === 'pending';
  }

  /**
   * @description Command text currently awaiting a response.
   * */
  public get command(): string | null {
    return this.$state.status === 'pending' ? this.$state.command : null;
  }

  /**
   * @description Install a new pending command; it rejects with `TimeoutError` after `timeout` ms.
   * */
  public arm(command: string, timeout: number): Promise<CommandResponse> {
    this.cancel(new CommandCancelledError(`Command "${command}" superseded a pending command`));
    return new Promise<CommandResponse>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.take()?.reject(
          new TimeoutError(`Command "${command}" timed out after ${timeout}ms`, timeout),
        );
      }, timeout);
      this.$state = { status: 'pending', command, resolve, reject, timer };
    });
  }

  /**
   * @returns false when no command was pending.
   * */
  public resolve(response: CommandResponse): boolean {
    const state = this.take();
    state?.resolve(response);
    return state !== null;
  }

  /**
   * @returns false when no command was pending.
   * */
  public reject(err: Error): boolean {
    const state = this.take();
    state?.reject(err);
    return state !== null;
  }

  public cancel(err: Error): boolean {
    return this.reject(err);
  }

  private take(): PendingState | null {
    const state = this.$state;
    if (state.status === 'empty') {
      return null;
    }
    clearTimeout(state.timer);
    this.$state = { status: 'empty' };
    return state;
  }
}
