import { LogLevel } from '../types';
import { StackTimeoutError } from '../stack/errors';
import { stackLog } from '../utils/logger';

export const DEFAULT_TIMEOUT_MS = 30_000;

/** Produces the operation's result together with the next state. */
export type Transition<S, T> = (state: S) => [T, S] | Promise<[T, S]>;

/**
 * Owns a piece of state and applies every operation against it one at a
 * time, in arrival order. Operations are queued on a single mailbox, so a
 * `cast` issued before a `call` is always applied before that call runs.
 */
export class StateOwner<S> {
  private state: S;
  private mailbox: Promise<void> = Promise.resolve();
  private readonly defaultTimeoutMs: number;

  constructor(initial: S, defaultTimeoutMs: number = DEFAULT_TIMEOUT_MS) {
    this.state = initial;
    this.defaultTimeoutMs = defaultTimeoutMs;
  }

  /**
   * Read-modify-write. Rejects with `StackTimeoutError` when the operation
   * has not completed within the timeout; the operation stays queued and is
   * still applied once its turn comes.
   */
  call<T>(
    operation: string,
    transition: Transition<S, T>,
    timeoutMs: number = this.defaultTimeoutMs,
  ): Promise<T> {
    return withTimeout(this.enqueue(transition), operation, timeoutMs);
  }

  get<T>(
    operation: string,
    read: (state: S) => T,
    timeoutMs: number = this.defaultTimeoutMs,
  ): Promise<T> {
    return this.call(operation, (state): [T, S] => [read(state), state], timeoutMs);
  }

  /** Fire-and-forget update. A failing update leaves the state untouched. */
  cast(operation: string, update: (state: S) => S): void {
    this.enqueue((state): [void, S] => [undefined, update(state)]).catch((error: unknown) => {
      const message = error instanceof Error ? error.message : String(error);
      stackLog(`Update "${operation}" failed: ${message}`, LogLevel.ERROR);
    });
  }

  private enqueue<T>(transition: Transition<S, T>): Promise<T> {
    const run = this.mailbox.then(async () => {
      const [result, next] = await transition(this.state);
      this.state = next;
      return result;
    });
    // The mailbox only tracks completion; failures are reported through `run`.
    this.mailbox = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }
}

function withTimeout<T>(promise: Promise<T>, operation: string, timeoutMs: number): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => reject(new StackTimeoutError(operation, timeoutMs)), timeoutMs);
    timer.unref();
    promise.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (error: unknown) => {
        clearTimeout(timer);
        reject(error);
      },
    );
  });
}
