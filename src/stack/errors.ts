export class StackTimeoutError extends Error {
  constructor(
    public readonly operation: string,
    public readonly timeoutMs: number,
  ) {
    super(`Project stack operation "${operation}" did not complete within ${timeoutMs}ms`);
    this.name = 'StackTimeoutError';
  }
}

/**
 * Raised when a caller breaks the stack's contract, e.g. calling `root`
 * with no recursing frame or `recur` on an empty stack.
 */
export class StackPreconditionError extends Error {
  constructor(
    message: string,
    public readonly operation: string,
  ) {
    super(message);
    this.name = 'StackPreconditionError';
  }
}
